/**
 * Segment 02: Recurrence Picker Tests
 *
 * Tests rule validation, the month calculation with its roll-forward
 * behavior, and next-occurrence stepping from a fixed reference date.
 */

import { describe, it, expect, vi } from 'vitest'
import {
  RecurrencePicker,
  createRecurrencePicker,
  createRecurrenceRule,
  DEFAULT_TIME_OF_DAY,
} from '../src/recurrence-picker'
import { fixedClock, systemClock } from '../src/reference-clock'
import { DateRangeError, InvalidConfigurationError, InvalidStepsError } from '../src/errors'
import type { LocalDate, Weekday } from '../src/time-date'

const d = (s: string) => s as LocalDate

function thirdWednesday(referenceDate: string, timeOfDay?: string): RecurrencePicker {
  return new RecurrencePicker(3, 'wed', { referenceDate, timeOfDay })
}

// ============================================================================
// 1. CONSTRUCTION
// ============================================================================

describe('Construction', () => {
  it.each([0, 6, -1, 2.5, Number.NaN])('rejects ordinal %s', (ordinal) => {
    expect(() => new RecurrencePicker(ordinal, 'wed', { referenceDate: '2024-03-10' })).toThrow(
      InvalidConfigurationError
    )
  })

  it.each([1, 5])('accepts ordinal %s', (ordinal) => {
    const picker = new RecurrencePicker(ordinal, 'wed', { referenceDate: '2024-03-10' })
    expect(picker.rule.ordinal).toBe(ordinal)
  })

  it('reports the allowed range in the message', () => {
    expect(() => createRecurrenceRule(6, 'fri')).toThrow('ordinal must be an integer in 1..5, got 6')
  })

  it('carries the INVALID_CONFIGURATION code', () => {
    try {
      createRecurrenceRule(0, 'fri')
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidConfigurationError)
      if (e instanceof InvalidConfigurationError) expect(e.code).toBe('INVALID_CONFIGURATION')
    }
  })

  it('rejects a weekday outside the union', () => {
    expect(() => createRecurrenceRule(1, 'xyz' as Weekday)).toThrow(InvalidConfigurationError)
  })

  it('defaults timeOfDay to noon', () => {
    expect(createRecurrenceRule(3, 'wed').timeOfDay).toBe('12:00:00')
    expect(DEFAULT_TIME_OF_DAY).toBe('12:00:00')
  })

  it('normalizes timeOfDay', () => {
    expect(createRecurrenceRule(3, 'wed', '14:30').timeOfDay).toBe('14:30:00')
  })

  it('rejects an invalid timeOfDay', () => {
    expect(() => createRecurrenceRule(3, 'wed', '25:00')).toThrow(InvalidConfigurationError)
  })

  it('rejects an invalid referenceDate', () => {
    expect(() => thirdWednesday('2024-02-30')).toThrow(InvalidConfigurationError)
  })

  it('rejects clock together with referenceDate', () => {
    expect(
      () =>
        new RecurrencePicker(3, 'wed', {
          clock: fixedClock(d('2024-03-10')),
          referenceDate: '2024-03-10',
        })
    ).toThrow('Specify either clock or referenceDate, not both')
  })

  it('rejects an unknown timeZone', () => {
    expect(() => new RecurrencePicker(3, 'wed', { timeZone: 'Mars/Olympus' })).toThrow(
      InvalidConfigurationError
    )
  })

  it('rejects timeZone together with referenceDate', () => {
    expect(
      () => new RecurrencePicker(3, 'wed', { referenceDate: '2024-03-10', timeZone: 'UTC' })
    ).toThrow('timeZone only applies when neither clock nor referenceDate is given')
  })

  it('rejects timeZone together with clock', () => {
    expect(
      () => new RecurrencePicker(3, 'wed', { clock: fixedClock(d('2024-03-10')), timeZone: 'UTC' })
    ).toThrow(InvalidConfigurationError)
  })

  it('samples the clock exactly once', () => {
    const today = vi.fn(() => d('2024-03-10'))
    const picker = new RecurrencePicker(3, 'wed', { clock: { today } })
    picker.nextOccurrenceDate(0)
    picker.nextOccurrenceDate(1)
    picker.nextOccurrenceDateTime(2)
    expect(today).toHaveBeenCalledTimes(1)
    expect(picker.referenceDate).toBe('2024-03-10')
  })

  it('reads today from a zoned system clock', () => {
    const clock = systemClock('UTC', () => Date.UTC(2024, 2, 25, 23, 0, 0))
    const picker = new RecurrencePicker(3, 'wed', { clock })
    expect(picker.referenceDate).toBe('2024-03-25')
    expect(picker.nextOccurrenceDate(0)).toBe('2024-04-17')
  })

  it('freezes the picker and its rule', () => {
    const picker = thirdWednesday('2024-03-10')
    expect(Object.isFrozen(picker)).toBe(true)
    expect(Object.isFrozen(picker.rule)).toBe(true)
  })
})

// ============================================================================
// 2. occurrenceForMonth
// ============================================================================

describe('occurrenceForMonth', () => {
  it('finds the third Wednesday of March 2024', () => {
    expect(thirdWednesday('2024-03-10').occurrenceForMonth(d('2024-03-31'))).toBe('2024-03-20')
  })

  it('finds the first Monday when the month starts on a Friday', () => {
    const picker = new RecurrencePicker(1, 'mon', { referenceDate: '2024-03-10' })
    expect(picker.occurrenceForMonth(d('2024-03-31'))).toBe('2024-03-04')
  })

  it('counts a weekday falling on the 1st as the first occurrence', () => {
    const picker = new RecurrencePicker(2, 'fri', { referenceDate: '2024-03-10' })
    expect(picker.occurrenceForMonth(d('2024-03-15'))).toBe('2024-03-08')
  })

  it('rolls a missing fifth Friday into the next month', () => {
    const picker = new RecurrencePicker(5, 'fri', { referenceDate: '2025-02-10' })
    expect(picker.occurrenceForMonth(d('2025-02-10'))).toBe('2025-03-07')
  })

  it('keeps an existing fifth occurrence in its month', () => {
    const picker = new RecurrencePicker(5, 'wed', { referenceDate: '2024-01-10' })
    expect(picker.occurrenceForMonth(d('2024-01-01'))).toBe('2024-01-31')
  })

  it('is deterministic', () => {
    const picker = thirdWednesday('2024-03-10')
    expect(picker.occurrenceForMonth(d('2024-07-04'))).toBe(
      picker.occurrenceForMonth(d('2024-07-04'))
    )
  })
})

// ============================================================================
// 3. nextOccurrenceDate
// ============================================================================

describe('nextOccurrenceDate', () => {
  it('moves to next month once this month has passed', () => {
    expect(thirdWednesday('2024-03-25').nextOccurrenceDate(0)).toBe('2024-04-17')
  })

  it('keeps this month when it has not passed', () => {
    expect(thirdWednesday('2024-03-10').nextOccurrenceDate(0)).toBe('2024-03-20')
  })

  it('keeps this month on the day itself', () => {
    expect(thirdWednesday('2024-03-20').nextOccurrenceDate(0)).toBe('2024-03-20')
  })

  it('defaults stepsAhead to 0', () => {
    expect(thirdWednesday('2024-03-10').nextOccurrenceDate()).toBe('2024-03-20')
  })

  it('steps whole months ahead', () => {
    const picker = thirdWednesday('2024-03-10')
    expect(picker.nextOccurrenceDate(1)).toBe('2024-04-17')
    expect(picker.nextOccurrenceDate(2)).toBe('2024-05-15')
  })

  it('adds the passed month to the requested steps', () => {
    expect(thirdWednesday('2024-03-25').nextOccurrenceDate(1)).toBe('2024-05-15')
  })

  it('crosses a year boundary', () => {
    // Third Wednesday of December 2024 is the 18th
    expect(thirdWednesday('2024-12-20').nextOccurrenceDate(0)).toBe('2025-01-15')
  })

  it('clamps month steps taken from a month-end occurrence', () => {
    const picker = new RecurrencePicker(5, 'wed', { referenceDate: '2024-01-10' })
    expect(picker.nextOccurrenceDate(0)).toBe('2024-01-31')
    expect(picker.nextOccurrenceDate(1)).toBe('2024-03-06')
    expect(picker.nextOccurrenceDate(2)).toBe('2024-04-03')
  })

  it('compounds steps from a rolled-forward occurrence', () => {
    const picker = new RecurrencePicker(5, 'fri', { referenceDate: '2025-02-10' })
    expect(picker.nextOccurrenceDate(0)).toBe('2025-03-07')
    expect(picker.nextOccurrenceDate(1)).toBe('2025-05-02')
  })

  it('rejects a step count that leaves safe integers', () => {
    expect(() => thirdWednesday('2024-03-10').nextOccurrenceDate(2 ** 53)).toThrow(
      'stepsAhead must be a non-negative integer, got 9007199254740992'
    )
  })

  it('rejects steps past December 9999', () => {
    expect(() => thirdWednesday('2024-03-10').nextOccurrenceDate(100000)).toThrow(InvalidStepsError)
  })

  it('reaches December 9999 but no further', () => {
    expect(thirdWednesday('9999-11-10').nextOccurrenceDate(1)).toBe('9999-12-15')
    expect(thirdWednesday('9999-12-10').nextOccurrenceDate(0)).toBe('9999-12-15')
    expect(() => thirdWednesday('9999-12-10').nextOccurrenceDate(1)).toThrow(InvalidStepsError)
  })

  it('rejects a passed occurrence in the last supported month', () => {
    expect(() => thirdWednesday('9999-12-25').nextOccurrenceDate(0)).toThrow(
      'stepsAhead 0 from 9999-12-25 goes past the last supported month'
    )
  })

  it('refuses to roll forward past year 9999', () => {
    const picker = new RecurrencePicker(5, 'sat', { referenceDate: '9999-12-01' })
    expect(() => picker.occurrenceForMonth(d('9999-12-01'))).toThrow(DateRangeError)
  })

  it.each([-1, 1.5, Number.NaN])('rejects stepsAhead %s', (steps) => {
    expect(() => thirdWednesday('2024-03-10').nextOccurrenceDate(steps)).toThrow(InvalidStepsError)
  })
})

// ============================================================================
// 4. nextOccurrenceDateTime
// ============================================================================

describe('nextOccurrenceDateTime', () => {
  it('combines the date with timeOfDay', () => {
    expect(thirdWednesday('2024-03-10', '14:30').nextOccurrenceDateTime(0)).toBe(
      '2024-03-20T14:30:00'
    )
  })

  it('uses noon by default', () => {
    expect(thirdWednesday('2024-03-25').nextOccurrenceDateTime(1)).toBe('2024-05-15T12:00:00')
  })
})

// ============================================================================
// 5. upcomingOccurrences
// ============================================================================

describe('upcomingOccurrences', () => {
  it('lists the next meetings in order', () => {
    expect(thirdWednesday('2024-03-10').upcomingOccurrences(3)).toEqual([
      '2024-03-20',
      '2024-04-17',
      '2024-05-15',
    ])
  })

  it('returns nothing for a count of zero', () => {
    expect(thirdWednesday('2024-03-10').upcomingOccurrences(0)).toEqual([])
  })

  it('rejects a negative count', () => {
    expect(() => thirdWednesday('2024-03-10').upcomingOccurrences(-2)).toThrow(
      'count must be a non-negative integer, got -2'
    )
  })
})

// ============================================================================
// 6. createRecurrencePicker
// ============================================================================

describe('createRecurrencePicker', () => {
  it('accepts weekday names', () => {
    const picker = createRecurrencePicker({
      ordinal: 3,
      weekday: 'Wednesday',
      referenceDate: '2024-03-25',
    })
    expect(picker.rule.weekday).toBe('wed')
    expect(picker.nextOccurrenceDate()).toBe('2024-04-17')
  })

  it('passes options through', () => {
    const picker = createRecurrencePicker({
      ordinal: 1,
      weekday: 'mon',
      timeOfDay: '09:15',
      clock: fixedClock(d('2024-03-10')),
    })
    expect(picker.nextOccurrenceDateTime(0)).toBe('2024-04-01T09:15:00')
  })

  it('rejects an unknown weekday name', () => {
    expect(() =>
      createRecurrencePicker({ ordinal: 1, weekday: 'someday', referenceDate: '2024-03-10' })
    ).toThrow(InvalidConfigurationError)
  })
})
