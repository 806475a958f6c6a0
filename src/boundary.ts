/**
 * Boundary Adapters
 *
 * Everything that turns picker output into something a caller displays or
 * schedules: attaching a time zone, and English renderings of dates and rules.
 */

import {
  type LocalDate,
  type LocalDateTime,
  dateOf,
  dayOf,
  hourOf,
  isValidTimezone,
  minuteOf,
  monthOf,
  offsetMinutesAt,
  secondOf,
  timeOf,
  yearOf,
} from './time-date'
import type { RecurrencePicker, RecurrenceRule } from './recurrence-picker'
import { InvalidConfigurationError } from './errors'

// ============================================================================
// Zone Attachment
// ============================================================================

const DAY_MS = 86400000

/**
 * The instant at which `dateTime` is shown on clocks in `timeZone`.
 *
 * A wall time skipped by a DST gap is pushed forward by the gap's length.
 * A wall time repeated by an overlap takes the earlier offset.
 */
export function toInstant(dateTime: LocalDateTime, timeZone: string): Date {
  if (!isValidTimezone(timeZone)) {
    throw new InvalidConfigurationError(`Invalid timezone: ${timeZone}`)
  }

  const date = dateOf(dateTime)
  const time = timeOf(dateTime)
  const wallMs = Date.UTC(
    yearOf(date), monthOf(date) - 1, dayOf(date),
    hourOf(time), minuteOf(time), secondOf(time)
  )

  // Offsets on either side of any transition near this wall time
  const before = offsetMinutesAt(wallMs - DAY_MS, timeZone)
  const after = offsetMinutesAt(wallMs + DAY_MS, timeZone)

  const matches = [wallMs - before * 60000, wallMs - after * 60000].filter(
    (utcMs) => utcMs + offsetMinutesAt(utcMs, timeZone) * 60000 === wallMs
  )
  if (matches.length > 0) return new Date(Math.min(...matches))

  // Gap: no instant shows this wall time; the pre-transition offset lands past it
  return new Date(wallMs - before * 60000)
}

export function occurrenceInstant(
  picker: RecurrencePicker,
  stepsAhead: number,
  timeZone: string
): Date {
  return toInstant(picker.nextOccurrenceDateTime(stepsAhead), timeZone)
}

// ============================================================================
// Formatting
// ============================================================================

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
]

const ORDINAL_WORDS = ['first', 'second', 'third', 'fourth', 'fifth']

const WEEKDAY_WORDS = {
  mon: 'Monday', tue: 'Tuesday', wed: 'Wednesday', thu: 'Thursday',
  fri: 'Friday', sat: 'Saturday', sun: 'Sunday',
} as const

/** e.g. 'March 20, 2024' */
export function formatOccurrence(date: LocalDate): string {
  return `${MONTH_NAMES[monthOf(date) - 1]} ${dayOf(date)}, ${yearOf(date)}`
}

/** e.g. 'third Wednesday of every month at 12:00' */
export function describeRule(rule: RecurrenceRule): string {
  const ordinal = ORDINAL_WORDS[rule.ordinal - 1] ?? `#${rule.ordinal}`
  return `${ordinal} ${WEEKDAY_WORDS[rule.weekday]} of every month at ${rule.timeOfDay.substring(0, 5)}`
}
