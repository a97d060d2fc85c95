export { createField } from './field'
export type {
  BindingMode,
  DataField,
  FieldAction,
  FieldBinding,
  FieldErrorKind,
  FieldOptions,
  FieldState,
} from './field'
export { createSlot } from './slot'
export type { Slot } from './slot'
export { transformers } from './transformers'
export type { ValueTransformer } from './transformers'
export { validators, passed, failed } from './validators'
export type { ValidationResult, Validator } from './validators'
export type { TranslationService } from './translation'
export { ParseError, FieldBindingError } from './errors'
export { setFieldErrorHandler } from './error-handler'
export type { FieldErrorHandler } from './error-handler'
