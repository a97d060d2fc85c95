import { describe, it, expect } from 'vitest'
import { BehaviorSubject } from 'rxjs'
import { collectFrom, createMockSlot, createMockTranslationService } from './public'

// ---------------------------------------------------------------------------
// collectFrom
// ---------------------------------------------------------------------------

describe('collectFrom', () => {
  it('collects every emitted value', () => {
    const subject = new BehaviorSubject(1)
    const result = collectFrom(subject)

    subject.next(2)
    subject.next(3)

    expect(result.values).toEqual([1, 2, 3])
    result.subscription.unsubscribe()
  })

  it('stops collecting after unsubscribe', () => {
    const subject = new BehaviorSubject('a')
    const result = collectFrom(subject)

    result.subscription.unsubscribe()
    subject.next('b')

    expect(result.values).toEqual(['a'])
  })
})

// ---------------------------------------------------------------------------
// createMockSlot
// ---------------------------------------------------------------------------

describe('createMockSlot', () => {
  it('records writes but not emits', () => {
    const slot = createMockSlot(0)

    slot.setValue(1)
    slot.emit(2)

    expect(slot.writes).toEqual([1])
    expect(slot.getValue()).toBe(2)
  })

  it('counts live observers', () => {
    const slot = createMockSlot('x')
    const first = collectFrom(slot.value$)
    const second = collectFrom(slot.value$)
    expect(slot.observerCount()).toBe(2)

    first.subscription.unsubscribe()
    second.subscription.unsubscribe()

    expect(slot.observerCount()).toBe(0)
  })

  it('emits only distinct values', () => {
    const slot = createMockSlot(1)
    const seen = collectFrom(slot.value$)

    slot.emit(1)
    slot.emit(2)

    expect(seen.values).toEqual([1, 2])
    seen.subscription.unsubscribe()
  })
})

// ---------------------------------------------------------------------------
// createMockTranslationService
// ---------------------------------------------------------------------------

describe('createMockTranslationService', () => {
  it('translates known keys and records lookups', () => {
    const service = createMockTranslationService({ greeting: 'Hallo' })

    expect(service.translate('greeting')).toBe('Hallo')
    expect(service.translate('farewell')).toBe('??farewell??')
    expect(service.lookups).toEqual(['greeting', 'farewell'])
  })
})
