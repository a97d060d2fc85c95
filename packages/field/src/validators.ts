// ---------------------------------------------------------------------------
// Validator types
// ---------------------------------------------------------------------------

export interface ValidationResult {
  readonly result: boolean
  /** Message (or translation key) shown when `result` is false. */
  readonly errorMessage: string
}

export interface Validator<V> {
  validate(value: V): ValidationResult
}

const PASSED: ValidationResult = { result: true, errorMessage: '' }

export function passed(): ValidationResult {
  return PASSED
}

export function failed(errorMessage: string): ValidationResult {
  return { result: false, errorMessage }
}

function check<V>(predicate: (value: V) => boolean, message: string): Validator<V> {
  return {
    validate: (value) => (predicate(value) ? passed() : failed(message)),
  }
}

const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/

// ---------------------------------------------------------------------------
// validators — ready-made rules
// ---------------------------------------------------------------------------

/**
 * Every factory takes the message that becomes the field's error message on
 * failure. With a translation service installed the message is used as a
 * translation key.
 *
 * @example
 *   field.setValidators([
 *     validators.between(0, 10, 'Between 0 and 10'),
 *     validators.refine((n) => n % 2 === 0, 'Must be even'),
 *   ])
 */
export const validators = {
  /** Inclusive range. */
  between(min: number, max: number, message = `Must be between ${min} and ${max}`): Validator<number> {
    return check((v: number) => v >= min && v <= max, message)
  },

  min(min: number, message = `Min value is ${min}`): Validator<number> {
    return check((v: number) => v >= min, message)
  },

  max(max: number, message = `Max value is ${max}`): Validator<number> {
    return check((v: number) => v <= max, message)
  },

  minLength(min: number, message = `Min ${min} characters`): Validator<string> {
    return check((v: string) => v.length >= min, message)
  },

  maxLength(max: number, message = `Max ${max} characters`): Validator<string> {
    return check((v: string) => v.length <= max, message)
  },

  lengthBetween(
    min: number,
    max: number,
    message = `Must be between ${min} and ${max} characters`,
  ): Validator<string> {
    return check((v: string) => v.length >= min && v.length <= max, message)
  },

  /** Empty strings pass; combine with a required field to reject them. */
  pattern(regex: RegExp, message = 'Invalid format'): Validator<string> {
    return check((v: string) => v.length === 0 || regex.test(v), message)
  },

  email(message = 'Invalid email address'): Validator<string> {
    return check((v: string) => v.length === 0 || EMAIL_RE.test(v), message)
  },

  oneOf<V>(options: ReadonlyArray<V>, message = 'Invalid option'): Validator<V> {
    return check((v: V) => options.includes(v), message)
  },

  refine<V>(fn: (value: V) => boolean, message = 'Invalid'): Validator<V> {
    return check(fn, message)
  },
}
