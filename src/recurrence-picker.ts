/**
 * Recurrence Picker
 *
 * Resolves "the Nth <weekday> of every month" rules against a fixed reference
 * date. Pure date arithmetic: no I/O, no mutable state after construction.
 *
 * @example
 * const picker = new RecurrencePicker(3, 'wed', { referenceDate: '2024-03-25' })
 * picker.nextOccurrenceDate(0) // '2024-04-17'
 */

import {
  type LocalDate,
  type LocalDateTime,
  type LocalTime,
  type Weekday,
  addMonths,
  addWeeks,
  dateBefore,
  firstInMonth,
  isValidTimezone,
  isWeekday,
  makeDateTime,
  MAX_MONTH_INDEX,
  monthIndexOf,
  makeTime,
  parseDate,
  parseTime,
  parseWeekday,
} from './time-date'
import { type ReferenceClock, systemClock } from './reference-clock'
import { InvalidConfigurationError, InvalidStepsError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type RecurrenceRule = Readonly<{
  /** 1-based position of the weekday within the month, 1 through 5 */
  ordinal: number
  weekday: Weekday
  timeOfDay: LocalTime
}>

export type RecurrencePickerOptions = {
  /** HH:MM or HH:MM:SS, defaults to noon */
  timeOfDay?: LocalTime | string
  /** Mutually exclusive with `referenceDate` */
  clock?: ReferenceClock
  referenceDate?: LocalDate | string
  /** Zone used to read the host clock; rejected alongside `clock` or `referenceDate` */
  timeZone?: string
}

export type RecurrencePickerConfig = RecurrencePickerOptions & {
  ordinal: number
  weekday: Weekday | string
}

export const MIN_ORDINAL = 1
export const MAX_ORDINAL = 5
export const DEFAULT_TIME_OF_DAY: LocalTime = makeTime(12, 0)

// ============================================================================
// Rule Construction
// ============================================================================

export function createRecurrenceRule(
  ordinal: number,
  weekday: Weekday,
  timeOfDay: LocalTime | string = DEFAULT_TIME_OF_DAY
): RecurrenceRule {
  if (!Number.isInteger(ordinal) || ordinal < MIN_ORDINAL || ordinal > MAX_ORDINAL) {
    throw new InvalidConfigurationError(
      `ordinal must be an integer in ${MIN_ORDINAL}..${MAX_ORDINAL}, got ${ordinal}`
    )
  }
  if (!isWeekday(weekday)) {
    throw new InvalidConfigurationError(`Invalid weekday: ${String(weekday)}`)
  }
  const time = parseTime(timeOfDay)
  if (!time.ok) {
    throw new InvalidConfigurationError(`Invalid timeOfDay: ${time.error.message}`)
  }
  return Object.freeze({ ordinal, weekday, timeOfDay: time.value })
}

function resolveReferenceDate(options: RecurrencePickerOptions): LocalDate {
  const { clock, referenceDate, timeZone } = options

  if (timeZone !== undefined && !isValidTimezone(timeZone)) {
    throw new InvalidConfigurationError(`Invalid timezone: ${timeZone}`)
  }
  if (clock !== undefined && referenceDate !== undefined) {
    throw new InvalidConfigurationError('Specify either clock or referenceDate, not both')
  }
  if (timeZone !== undefined && (clock !== undefined || referenceDate !== undefined)) {
    throw new InvalidConfigurationError('timeZone only applies when neither clock nor referenceDate is given')
  }

  if (referenceDate !== undefined) {
    const parsed = parseDate(referenceDate)
    if (!parsed.ok) {
      throw new InvalidConfigurationError(`Invalid referenceDate: ${parsed.error.message}`)
    }
    return parsed.value
  }

  return (clock ?? systemClock(timeZone)).today()
}

function assertSteps(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidStepsError(`${label} must be a non-negative integer, got ${value}`)
  }
}

// ============================================================================
// Picker
// ============================================================================

export class RecurrencePicker {
  readonly rule: RecurrenceRule
  /** "Today" for every query on this instance, sampled once */
  readonly referenceDate: LocalDate

  constructor(ordinal: number, weekday: Weekday, options: RecurrencePickerOptions = {}) {
    this.rule = createRecurrenceRule(ordinal, weekday, options.timeOfDay)
    this.referenceDate = resolveReferenceDate(options)
    Object.freeze(this)
  }

  /**
   * The rule's date in the month containing `monthAnchor`.
   *
   * Not clamped to that month: a 5th weekday that the month lacks lands in
   * the first week of the following month.
   */
  occurrenceForMonth(monthAnchor: LocalDate): LocalDate {
    const { ordinal, weekday } = this.rule
    return addWeeks(firstInMonth(monthAnchor, weekday), ordinal - 1)
  }

  /**
   * The occurrence `stepsAhead` cycles after the soonest one on or after the
   * reference date. Each step is a whole month counted from this month's
   * resolved occurrence, so a rolled-forward date shifts every later step.
   */
  nextOccurrenceDate(stepsAhead = 0): LocalDate {
    assertSteps(stepsAhead, 'stepsAhead')

    const current = this.occurrenceForMonth(this.referenceDate)
    // This month's occurrence already happened; next month becomes step 0
    const steps = dateBefore(current, this.referenceDate) ? stepsAhead + 1 : stepsAhead
    if (steps === 0) return current

    if (monthIndexOf(current) + steps > MAX_MONTH_INDEX) {
      throw new InvalidStepsError(
        `stepsAhead ${stepsAhead} from ${this.referenceDate} goes past the last supported month`
      )
    }
    return this.occurrenceForMonth(addMonths(current, steps))
  }

  /** Zone-naive; attach a zone at the boundary with `toInstant`. */
  nextOccurrenceDateTime(stepsAhead = 0): LocalDateTime {
    return makeDateTime(this.nextOccurrenceDate(stepsAhead), this.rule.timeOfDay)
  }

  upcomingOccurrences(count: number): LocalDate[] {
    assertSteps(count, 'count')
    return Array.from({ length: count }, (_, i) => this.nextOccurrenceDate(i))
  }
}

/**
 * Builds a picker from a single config object. Unlike the constructor,
 * `weekday` may be a name such as 'Wednesday' or 'wed'.
 */
export function createRecurrencePicker(config: RecurrencePickerConfig): RecurrencePicker {
  const { ordinal, weekday, ...options } = config
  const parsed = parseWeekday(weekday)
  if (!parsed.ok) {
    throw new InvalidConfigurationError(parsed.error.message)
  }
  return new RecurrencePicker(ordinal, parsed.value, options)
}
