import { BehaviorSubject, Observable, Subject, Subscription } from 'rxjs'
import { distinctUntilChanged, map, scan, shareReplay, skip, startWith } from 'rxjs/operators'
import { FieldBindingError } from './errors'
import { handleFieldError } from './error-handler'
import type { Slot } from './slot'
import type { ValueTransformer } from './transformers'
import { resolveText } from './translation'
import type { TranslationService } from './translation'
import type { Validator } from './validators'

// ---------------------------------------------------------------------------
// FieldState — what observers see
// ---------------------------------------------------------------------------

/** Failure category of the last validation pass, in check order. */
export type FieldErrorKind = 'required' | 'format' | 'validation'

/**
 * 'persistent' — only `persist()` commits the value.
 * 'continuous' — every successful validation commits the value as well.
 */
export type BindingMode = 'persistent' | 'continuous'

export interface FieldState<V> {
  /** Exactly what was entered, valid or not. */
  userInput: string
  /** Last value that passed the required check, the transformer and every validator. */
  value: V
  /** Last committed value. */
  persistentValue: V
  valid: boolean
  errorKind: FieldErrorKind | null
  /** Messages as configured; translation keys when a translation service is installed. */
  errorMessageKeys: ReadonlyArray<string>
  /** Messages for display. */
  errorMessages: ReadonlyArray<string>
  label: string
  placeholder: string
}

// ---------------------------------------------------------------------------
// FieldAction
// ---------------------------------------------------------------------------

export type FieldAction<V> =
  | { type: 'SET_INPUT'; input: string }
  | { type: 'VALIDATE' }
  | { type: 'SET_VALIDATORS'; validators: ReadonlyArray<Validator<V>> }
  | { type: 'SET_TRANSFORMER'; transformer: ValueTransformer<V>; formatError?: string }
  | { type: 'SET_FORMAT_ERROR'; formatError: string }
  | { type: 'SET_REQUIRED'; required: boolean; requiredError?: string }
  | { type: 'SET_LABEL'; label: string }
  | { type: 'SET_PLACEHOLDER'; placeholder: string }
  | { type: 'SET_BINDING_MODE'; mode: BindingMode }
  | { type: 'PERSIST' }
  | { type: 'RESET' }
  | { type: 'EXTERNAL_VALUE'; value: V }
  | { type: 'TRANSLATE'; service: TranslationService }

// ---------------------------------------------------------------------------
// FieldOptions
// ---------------------------------------------------------------------------

export interface FieldOptions<V> {
  /** Seeds both the persistent value and the user input. */
  initialValue: V
  transformer: ValueTransformer<V>
  /** Shown when the transformer rejects the input. Defaults to 'Invalid format'. */
  formatError?: string
  validators?: ReadonlyArray<Validator<V>>
  required?: boolean
  /** Defaults to 'Required'. */
  requiredError?: string
  /** When set, every message and text is treated as a translation key. */
  translationService?: TranslationService
  bindingMode?: BindingMode
  /** Turns a value back into input text. Defaults to `String`. */
  formatter?: (value: V) => string
  label?: string
  placeholder?: string
}

// ---------------------------------------------------------------------------
// FieldBinding — owned handle to a two-way link with an external slot
// ---------------------------------------------------------------------------

export interface FieldBinding<V> {
  readonly slot: Slot<V>
  readonly closed: boolean
  /** Same as `field.unbind(binding)`. Safe to call more than once. */
  unsubscribe(): void
}

// ---------------------------------------------------------------------------
// DataField<V>
// ---------------------------------------------------------------------------

export interface DataField<V> {
  state$: Observable<FieldState<V>>
  /** Every dispatched action, for wiring effects in an enclosing form. */
  actions$: Observable<FieldAction<V>>
  userInput$: Observable<string>
  value$: Observable<V>
  persistentValue$: Observable<V>
  valid$: Observable<boolean>
  /** True while the input differs from the formatted persistent value. */
  changed$: Observable<boolean>
  errorMessages$: Observable<ReadonlyArray<string>>
  errorKind$: Observable<FieldErrorKind | null>
  label$: Observable<string>
  placeholder$: Observable<string>

  setUserInput(text: string): void
  /**
   * Re-runs validation on the current input and returns the verdict. Called
   * from inside an observer, the validation is queued and the current verdict
   * is returned.
   */
  validate(): boolean
  /** Replaces every validator. */
  setValidators(validators: ReadonlyArray<Validator<V>>): void
  setTransformer(transformer: ValueTransformer<V>, formatError?: string): void
  setFormatError(message: string): void
  setRequired(required: boolean, requiredError?: string): void
  setLabel(label: string): void
  setPlaceholder(placeholder: string): void
  setBindingMode(mode: BindingMode): void
  /**
   * Links the persistent value with `slot` in both directions. The field
   * takes the slot's current value first. Throws `FieldBindingError` while
   * another binding is live.
   */
  bind(slot: Slot<V>): FieldBinding<V>
  unbind(binding: FieldBinding<V>): void
  /** Commits the value. Does nothing while the field is invalid. */
  persist(): void
  /** Restores the input from the persistent value. Does nothing when unchanged. */
  reset(): void
  translate(service: TranslationService): void

  getState(): FieldState<V>
  getUserInput(): string
  getValue(): V
  getPersistentValue(): V
  isValid(): boolean
  hasChanged(): boolean
  getErrorMessages(): ReadonlyArray<string>
}

// ---------------------------------------------------------------------------
// FieldModel (internal — stored in scan)
// ---------------------------------------------------------------------------

interface FieldRules<V> {
  required: boolean
  requiredError: string
  transformer: ValueTransformer<V>
  formatError: string
  validators: ReadonlyArray<Validator<V>>
  translationService: TranslationService | null
  bindingMode: BindingMode
  formatter: (value: V) => string
  label: string
  placeholder: string
}

interface FieldModel<V> {
  state: FieldState<V>
  rules: FieldRules<V>
}

type ValidationOutcome<V> =
  | { ok: true; value: V }
  | { ok: false; kind: FieldErrorKind; messages: string[] }

function messageList(message: string): string[] {
  return message.length > 0 ? [message] : []
}

/** required → transform → validators. Every validator runs; failures keep their order. */
function runValidation<V>(input: string, rules: FieldRules<V>): ValidationOutcome<V> {
  if (rules.required && input.length === 0) {
    return { ok: false, kind: 'required', messages: messageList(rules.requiredError) }
  }

  let transformed: V
  try {
    transformed = rules.transformer(input)
  } catch {
    return { ok: false, kind: 'format', messages: messageList(rules.formatError) }
  }

  const messages = rules.validators
    .map((v) => v.validate(transformed))
    .filter((r) => !r.result)
    .map((r) => r.errorMessage)

  if (messages.length > 0) {
    return { ok: false, kind: 'validation', messages }
  }
  return { ok: true, value: transformed }
}

/**
 * Applies new input and recomputes validity. `committed` pins the
 * persistent value (external writes); otherwise continuous mode commits
 * successful values.
 */
function withInput<V>(
  model: FieldModel<V>,
  userInput: string,
  committed?: { value: V },
): FieldModel<V> {
  const { state, rules } = model
  const outcome = runValidation(userInput, rules)
  const base = committed ? committed.value : state.persistentValue

  if (!outcome.ok) {
    return {
      rules,
      state: {
        ...state,
        userInput,
        persistentValue: base,
        valid: false,
        errorKind: outcome.kind,
        errorMessageKeys: outcome.messages,
        errorMessages: outcome.messages.map((m) => resolveText(m, rules.translationService)),
      },
    }
  }

  const persistentValue = !committed && rules.bindingMode === 'continuous' ? outcome.value : base
  return {
    rules,
    state: {
      ...state,
      userInput,
      value: outcome.value,
      persistentValue,
      valid: true,
      errorKind: null,
      errorMessageKeys: [],
      errorMessages: [],
    },
  }
}

function withTexts<V>(model: FieldModel<V>): FieldModel<V> {
  const { state, rules } = model
  return {
    rules,
    state: {
      ...state,
      label: resolveText(rules.label, rules.translationService),
      placeholder: resolveText(rules.placeholder, rules.translationService),
    },
  }
}

function fieldReducer<V>(model: FieldModel<V>, action: FieldAction<V>): FieldModel<V> {
  const { state, rules } = model
  switch (action.type) {
    case 'SET_INPUT':
      return withInput(model, action.input)
    case 'VALIDATE':
      return withInput(model, state.userInput)
    case 'SET_VALIDATORS':
      return withInput({ state, rules: { ...rules, validators: [...action.validators] } }, state.userInput)
    case 'SET_TRANSFORMER':
      return withInput(
        {
          state,
          rules: {
            ...rules,
            transformer: action.transformer,
            formatError: action.formatError ?? rules.formatError,
          },
        },
        state.userInput,
      )
    case 'SET_FORMAT_ERROR':
      return withInput({ state, rules: { ...rules, formatError: action.formatError } }, state.userInput)
    case 'SET_REQUIRED':
      return withInput(
        {
          state,
          rules: {
            ...rules,
            required: action.required,
            requiredError: action.requiredError ?? rules.requiredError,
          },
        },
        state.userInput,
      )
    case 'SET_LABEL':
      return withTexts({ state, rules: { ...rules, label: action.label } })
    case 'SET_PLACEHOLDER':
      return withTexts({ state, rules: { ...rules, placeholder: action.placeholder } })
    case 'SET_BINDING_MODE':
      return { state, rules: { ...rules, bindingMode: action.mode } }
    case 'PERSIST':
      if (!state.valid) return model
      return { rules, state: { ...state, persistentValue: state.value } }
    case 'RESET': {
      const restored = rules.formatter(state.persistentValue)
      if (restored === state.userInput) return model
      return withInput(model, restored)
    }
    case 'EXTERNAL_VALUE':
      return withInput(model, rules.formatter(action.value), { value: action.value })
    case 'TRANSLATE':
      return withInput(
        withTexts({ state, rules: { ...rules, translationService: action.service } }),
        state.userInput,
      )
    default:
      return model
  }
}

function sameMessages(a: ReadonlyArray<string>, b: ReadonlyArray<string>): boolean {
  return a.length === b.length && a.every((m, i) => m === b[i])
}

// ---------------------------------------------------------------------------
// createField
// ---------------------------------------------------------------------------

/**
 * createField<V>(options)
 *
 * A single editable value tracked three ways: the raw input, the last valid
 * value and the committed (persistent) value.
 *
 *   Subject<FieldAction>  →  scan(fieldReducer)  →  startWith(initial)  →  shareReplay(1)
 *
 * Each mutator dispatches one action, so one call produces one complete
 * state and every derived stream sees it at once.
 *
 * @example
 *   const age = createField({
 *     initialValue: 0,
 *     transformer: transformers.integer,
 *     formatError: 'Not a number',
 *     validators: [validators.between(0, 130, 'Out of range')],
 *     required: true,
 *   })
 *
 *   age.errorMessages$.subscribe((messages) => render(messages))
 *   age.setUserInput('42')
 *   age.persist()
 */
export function createField<V>(options: FieldOptions<V>): DataField<V> {
  const rules: FieldRules<V> = {
    required: options.required ?? false,
    requiredError: options.requiredError ?? 'Required',
    transformer: options.transformer,
    formatError: options.formatError ?? 'Invalid format',
    validators: [...(options.validators ?? [])],
    translationService: options.translationService ?? null,
    bindingMode: options.bindingMode ?? 'persistent',
    formatter: options.formatter ?? String,
    label: options.label ?? '',
    placeholder: options.placeholder ?? '',
  }

  const seed: FieldModel<V> = {
    rules,
    state: {
      userInput: '',
      value: options.initialValue,
      persistentValue: options.initialValue,
      valid: false,
      errorKind: null,
      errorMessageKeys: [],
      errorMessages: [],
      label: '',
      placeholder: '',
    },
  }
  const initialModel = withInput(withTexts(seed), rules.formatter(options.initialValue), {
    value: options.initialValue,
  })

  const actionsSubject = new Subject<FieldAction<V>>()
  const modelBs = new BehaviorSubject<FieldModel<V>>(initialModel)

  const actions$ = actionsSubject.asObservable()

  const model$ = actionsSubject.pipe(
    scan((model: FieldModel<V>, action: FieldAction<V>) => fieldReducer(model, action), initialModel),
    startWith(initialModel),
    shareReplay({ bufferSize: 1, refCount: false }),
  )

  // Keep the synchronous snapshot current before any other observer runs
  model$.subscribe((m) => modelBs.next(m))

  // Actions dispatched by an observer wait until every observer has seen the
  // current state, so no observer receives states out of order.
  const pending: FieldAction<V>[] = []
  let dispatching = false

  function dispatch(action: FieldAction<V>): void {
    pending.push(action)
    if (dispatching) return
    dispatching = true
    try {
      let next = pending.shift()
      while (next !== undefined) {
        actionsSubject.next(next)
        next = pending.shift()
      }
    } finally {
      dispatching = false
      pending.length = 0
    }
  }

  function select<T>(selector: (state: FieldState<V>) => T): Observable<T> {
    return model$.pipe(
      map((m) => selector(m.state)),
      distinctUntilChanged(),
    )
  }

  function isChanged(model: FieldModel<V>): boolean {
    return model.state.userInput !== model.rules.formatter(model.state.persistentValue)
  }

  const state$ = select((s) => s)
  const persistentValue$ = select((s) => s.persistentValue)

  let activeBinding: FieldBinding<V> | null = null

  return {
    state$,
    actions$,
    userInput$: select((s) => s.userInput),
    value$: select((s) => s.value),
    persistentValue$,
    valid$: select((s) => s.valid),
    changed$: model$.pipe(map(isChanged), distinctUntilChanged()),
    errorMessages$: model$.pipe(
      map((m) => m.state.errorMessages),
      distinctUntilChanged(sameMessages),
    ),
    errorKind$: select((s) => s.errorKind),
    label$: select((s) => s.label),
    placeholder$: select((s) => s.placeholder),

    setUserInput(text: string): void {
      dispatch({ type: 'SET_INPUT', input: text })
    },

    validate(): boolean {
      dispatch({ type: 'VALIDATE' })
      return modelBs.value.state.valid
    },

    setValidators(validators: ReadonlyArray<Validator<V>>): void {
      dispatch({ type: 'SET_VALIDATORS', validators })
    },

    setTransformer(transformer: ValueTransformer<V>, formatError?: string): void {
      dispatch({ type: 'SET_TRANSFORMER', transformer, formatError })
    },

    setFormatError(message: string): void {
      dispatch({ type: 'SET_FORMAT_ERROR', formatError: message })
    },

    setRequired(required: boolean, requiredError?: string): void {
      dispatch({ type: 'SET_REQUIRED', required, requiredError })
    },

    setLabel(label: string): void {
      dispatch({ type: 'SET_LABEL', label })
    },

    setPlaceholder(placeholder: string): void {
      dispatch({ type: 'SET_PLACEHOLDER', placeholder })
    },

    setBindingMode(mode: BindingMode): void {
      dispatch({ type: 'SET_BINDING_MODE', mode })
    },

    bind(slot: Slot<V>): FieldBinding<V> {
      if (activeBinding !== null) {
        throw new FieldBindingError('Field is already bound; unbind the current binding first')
      }

      const subscription = new Subscription()
      const binding: FieldBinding<V> = {
        slot,
        get closed() {
          return subscription.closed
        },
        unsubscribe: () => subscription.unsubscribe(),
      }
      activeBinding = binding
      subscription.add(() => {
        if (activeBinding === binding) activeBinding = null
      })

      dispatch({ type: 'EXTERNAL_VALUE', value: slot.getValue() })

      // slot → field: also rewrites the input so the control shows the new value
      subscription.add(
        slot.value$.subscribe({
          next: (value) => {
            if (!Object.is(value, modelBs.value.state.persistentValue)) {
              dispatch({ type: 'EXTERNAL_VALUE', value })
            }
          },
          error: (err: unknown) => handleFieldError(err, 'bind'),
        }),
      )

      // field → slot
      subscription.add(
        persistentValue$.pipe(skip(1)).subscribe((value) => {
          if (!Object.is(slot.getValue(), value)) slot.setValue(value)
        }),
      )

      return binding
    },

    unbind(binding: FieldBinding<V>): void {
      if (binding.closed) return
      if (binding !== activeBinding) {
        throw new FieldBindingError('Binding belongs to another field')
      }
      binding.unsubscribe()
    },

    persist(): void {
      dispatch({ type: 'PERSIST' })
    },

    reset(): void {
      dispatch({ type: 'RESET' })
    },

    translate(service: TranslationService): void {
      dispatch({ type: 'TRANSLATE', service })
    },

    getState(): FieldState<V> {
      return modelBs.value.state
    },

    getUserInput(): string {
      return modelBs.value.state.userInput
    },

    getValue(): V {
      return modelBs.value.state.value
    },

    getPersistentValue(): V {
      return modelBs.value.state.persistentValue
    },

    isValid(): boolean {
      return modelBs.value.state.valid
    },

    hasChanged(): boolean {
      return isChanged(modelBs.value)
    },

    getErrorMessages(): ReadonlyArray<string> {
      return modelBs.value.state.errorMessages
    },
  }
}
