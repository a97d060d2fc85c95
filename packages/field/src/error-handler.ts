// ---------------------------------------------------------------------------
// Configurable error handler for field collaborators
// ---------------------------------------------------------------------------

/**
 * Signature for custom error handlers set via `setFieldErrorHandler`.
 * @param error  The error thrown by a collaborator (translation service
 *               or bound slot)
 * @param context  A string identifying where the error surfaced
 *                 (`'translate'` or `'bind'`)
 */
export type FieldErrorHandler = (error: unknown, context: string) => void

const defaultHandler: FieldErrorHandler = (error, context) => {
  console.warn(`[@fieldstate/field] Error in ${context}:`, error)
}

let handler: FieldErrorHandler = defaultHandler

/**
 * Replace the error handler used by every field.
 *
 * The default handler logs to `console.warn`. Pass `null` to restore it.
 *
 * @example
 * ```ts
 * setFieldErrorHandler((error, context) => {
 *   reporter.capture(error, { tags: { context } })
 * })
 * ```
 */
export function setFieldErrorHandler(fn: FieldErrorHandler | null): void {
  handler = fn ?? defaultHandler
}

/**
 * Internal: call the configured error handler, swallowing any exception
 * thrown by the handler itself so it never breaks a field update.
 */
export function handleFieldError(error: unknown, context: string): void {
  try {
    handler(error, context)
  } catch {
    // A broken handler must not abort the state transition
  }
}
