import { BehaviorSubject, Observable, Subscription } from 'rxjs'
import { distinctUntilChanged } from 'rxjs/operators'

// ---------------------------------------------------------------------------
// collectFrom — reduce test boilerplate for Observable assertions
// ---------------------------------------------------------------------------

/**
 * collectFrom(obs$)
 *
 * Subscribes to an Observable and collects all emitted values into an array.
 * Call `.subscription.unsubscribe()` when done.
 *
 * @example
 *   const result = collectFrom(field.valid$)
 *   field.setUserInput('abc')
 *   expect(result.values).toEqual([true, false])
 *   result.subscription.unsubscribe()
 */
export function collectFrom<T>(obs$: Observable<T>): {
  values: T[]
  subscription: Subscription
} {
  const values: T[] = []
  const subscription = obs$.subscribe((v) => values.push(v))
  return { values, subscription }
}

// ---------------------------------------------------------------------------
// MockSlot — an external slot that records what the field writes
// ---------------------------------------------------------------------------

/**
 * Slot interface (mirrors @fieldstate/field's Slot<T>).
 * Duplicated here to avoid a package dependency.
 */
interface Slot<T> {
  value$: Observable<T>
  getValue(): T
  setValue(value: T): void
}

export interface MockSlot<T> extends Slot<T> {
  /** Change the value from the slot owner's side, as an external model would. */
  emit(value: T): void
  /** Every value passed to setValue(), in order. */
  writes: T[]
  /** Number of live subscriptions to value$. */
  observerCount(): number
}

/**
 * createMockSlot(initial)
 *
 * @example
 *   const slot = createMockSlot(3)
 *   const binding = field.bind(slot)
 *   field.setUserInput('4')
 *   field.persist()
 *   expect(slot.writes).toEqual([4])
 *   slot.emit(9) // field.getUserInput() → '9'
 */
export function createMockSlot<T>(initial: T): MockSlot<T> {
  const subject = new BehaviorSubject<T>(initial)
  const writes: T[] = []
  let observers = 0

  const value$ = new Observable<T>((subscriber) => {
    observers += 1
    const sub = subject.pipe(distinctUntilChanged(Object.is)).subscribe(subscriber)
    return () => {
      observers -= 1
      sub.unsubscribe()
    }
  })

  return {
    value$,
    getValue(): T {
      return subject.value
    },
    setValue(value: T): void {
      writes.push(value)
      subject.next(value)
    },
    emit(value: T): void {
      subject.next(value)
    },
    writes,
    observerCount(): number {
      return observers
    },
  }
}

// ---------------------------------------------------------------------------
// MockTranslationService
// ---------------------------------------------------------------------------

export interface MockTranslationService {
  translate(key: string): string
  /** Every key looked up, in order. */
  lookups: string[]
}

/**
 * createMockTranslationService(dictionary)
 *
 * Keys missing from the dictionary translate to `'??key??'` so untranslated
 * text is easy to spot in assertions.
 *
 * @example
 *   const de = createMockTranslationService({ required: 'Pflichtfeld' })
 *   field.translate(de)
 *   expect(field.getErrorMessages()).toEqual(['Pflichtfeld'])
 */
export function createMockTranslationService(
  dictionary: Record<string, string>,
): MockTranslationService {
  const lookups: string[] = []
  return {
    translate(key: string): string {
      lookups.push(key)
      return Object.prototype.hasOwnProperty.call(dictionary, key) ? dictionary[key] : `??${key}??`
    },
    lookups,
  }
}
