import { handleFieldError } from './error-handler'

/** Resolves translation keys. Only the lookup contract is consumed here. */
export interface TranslationService {
  translate(key: string): string
}

/**
 * Resolve a display text. Without a service the text is literal. A lookup
 * that throws is reported and falls back to the key.
 */
export function resolveText(text: string, service: TranslationService | null): string {
  if (service === null || text.length === 0) return text
  try {
    return service.translate(text)
  } catch (err) {
    handleFieldError(err, 'translate')
    return text
  }
}
