/**
 * Thrown by a value transformer when the raw input cannot be parsed.
 * The field records it as a format error; it never reaches the caller.
 */
export class ParseError extends Error {
  readonly input: string

  constructor(input: string, message = `Cannot parse "${input}"`) {
    super(message)
    this.name = 'ParseError'
    this.input = input
  }
}

/** Misuse of `bind` / `unbind`: double binding or releasing a foreign handle. */
export class FieldBindingError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'FieldBindingError'
  }
}
