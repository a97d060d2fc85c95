import { BehaviorSubject, Observable } from 'rxjs'
import { distinctUntilChanged } from 'rxjs/operators'

// ---------------------------------------------------------------------------
// Slot — a mutable, observable holder owned outside the field
// ---------------------------------------------------------------------------

export interface Slot<T> {
  /** Emits the current value on subscribe, then every change. */
  value$: Observable<T>
  getValue(): T
  setValue(value: T): void
}

/**
 * createSlot(initial)
 *
 * BehaviorSubject-backed slot. Writing a value that is `Object.is`-equal to
 * the current one does not emit, which keeps two-way bindings from echoing.
 *
 * @example
 *   const age = createSlot(42)
 *   const binding = field.bind(age)
 *   age.setValue(43) // field.getUserInput() → '43'
 */
export function createSlot<T>(initial: T): Slot<T> {
  const subject = new BehaviorSubject<T>(initial)

  return {
    value$: subject.pipe(distinctUntilChanged(Object.is)),
    getValue(): T {
      return subject.value
    },
    setValue(value: T): void {
      if (Object.is(subject.value, value)) return
      subject.next(value)
    },
  }
}
