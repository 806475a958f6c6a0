/**
 * Time & Date Utilities
 *
 * Pure functions over zone-naive ISO 8601 strings. All calendar arithmetic goes
 * through a proleptic Gregorian day count (days since 1970-01-01), so month
 * lengths and leap years never leak into callers.
 * Zero external dependencies: Intl.DateTimeFormat provides zone offsets.
 */

import { type Result, Ok, Err } from './result'
import { DateRangeError, ParseError } from './errors'

export { DateRangeError, ParseError } from './errors'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** ISO 8601 time string: HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** ISO 8601 datetime string: YYYY-MM-DDThh:mm:ss */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

export const WEEKDAYS: readonly Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

/** Dates are four-digit years; arithmetic past these bounds throws DateRangeError. */
export const MIN_YEAR = 0
export const MAX_YEAR = 9999

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1] ?? 0
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0')
}

// ============================================================================
// Day Count (for date arithmetic)
// ============================================================================

type DateParts = { year: number; month: number; day: number }

// Years are shifted to start in March so the leap day falls at the end.
function toEpochDay({ year, month, day }: DateParts): number {
  const y = month <= 2 ? year - 1 : year
  const era = Math.floor(y / 400)
  const yearOfEra = y - era * 400
  const dayOfYear = Math.floor((153 * ((month + 9) % 12) + 2) / 5) + day - 1
  const dayOfEra =
    yearOfEra * 365 + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100) + dayOfYear
  return era * 146097 + dayOfEra - 719468
}

function fromEpochDay(epochDay: number): DateParts {
  const z = epochDay + 719468
  const era = Math.floor(z / 146097)
  const dayOfEra = z - era * 146097
  const yearOfEra = Math.floor(
    (dayOfEra -
      Math.floor(dayOfEra / 1460) +
      Math.floor(dayOfEra / 36524) -
      Math.floor(dayOfEra / 146096)) /
      365
  )
  const dayOfYear =
    dayOfEra - (365 * yearOfEra + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100))
  const mp = Math.floor((5 * dayOfYear + 2) / 153)
  const day = dayOfYear - Math.floor((153 * mp + 2) / 5) + 1
  const month = mp < 10 ? mp + 3 : mp - 9
  return { year: yearOfEra + era * 400 + (month <= 2 ? 1 : 0), month, day }
}

function inRange({ year, month, day }: DateParts): LocalDate {
  if (year < MIN_YEAR || year > MAX_YEAR) {
    throw new DateRangeError(`Date out of range: year ${year}`)
  }
  return makeDate(year, month, day)
}

function partsOf(date: LocalDate): DateParts {
  return { year: yearOf(date), month: monthOf(date), day: dayOf(date) }
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])

  if (month < 1 || month > 12) return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(makeDate(year, month, day))
}

/** Accepts HH:MM or HH:MM:SS; the result always carries seconds. */
export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = /^(\d{2}):(\d{2})(?::(\d{2}))?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = Number(match[1])
  const minute = Number(match[2])
  const second = match[3] === undefined ? 0 : Number(match[3])

  if (hour > 23) return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59) return Err(new ParseError(`Invalid minute in time: '${str}'`))
  if (second > 59) return Err(new ParseError(`Invalid second in time: '${str}'`))

  return Ok(makeTime(hour, minute, second))
}

const WEEKDAY_NAMES: Record<string, Weekday> = {
  monday: 'mon', tuesday: 'tue', wednesday: 'wed', thursday: 'thu',
  friday: 'fri', saturday: 'sat', sunday: 'sun',
  mon: 'mon', tue: 'tue', wed: 'wed', thu: 'thu',
  fri: 'fri', sat: 'sat', sun: 'sun',
}

export function parseWeekday(name: string): Result<Weekday, ParseError> {
  const weekday = WEEKDAY_NAMES[name.trim().toLowerCase()]
  if (weekday === undefined) return Err(new ParseError(`Invalid weekday: '${name}'`))
  return Ok(weekday)
}

export function isWeekday(value: unknown): value is Weekday {
  return WEEKDAYS.some((w) => w === value)
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second?: number): LocalTime {
  return `${pad(hour, 2)}:${pad(minute, 2)}:${pad(second ?? 0, 2)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

export function hourOf(time: LocalTime): number {
  return parseInt(time.substring(0, 2), 10)
}

export function minuteOf(time: LocalTime): number {
  return parseInt(time.substring(3, 5), 10)
}

export function secondOf(time: LocalTime): number {
  return parseInt(time.substring(6, 8), 10)
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

export function timeOf(dt: LocalDateTime): LocalTime {
  return dt.substring(11) as LocalTime
}

// ============================================================================
// Date Arithmetic
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  return inRange(fromEpochDay(toEpochDay(partsOf(date)) + n))
}

export function addWeeks(date: LocalDate, n: number): LocalDate {
  return addDays(date, n * 7)
}

/**
 * Moves by whole calendar months. The day of month is clamped to the target
 * month's length, so Jan 31 + 1 month is the last day of February.
 */
export function addMonths(date: LocalDate, n: number): LocalDate {
  const monthIndex = monthIndexOf(date) + n
  const year = Math.floor(monthIndex / 12)
  const month = monthIndex - year * 12 + 1
  return inRange({ year, month, day: Math.min(dayOf(date), daysInMonth(year, month)) })
}

/** Months since January of year 0; consecutive months differ by one. */
export function monthIndexOf(date: LocalDate): number {
  return yearOf(date) * 12 + (monthOf(date) - 1)
}

export const MAX_MONTH_INDEX = MAX_YEAR * 12 + 11

export function daysBetween(a: LocalDate, b: LocalDate): number {
  return toEpochDay(partsOf(b)) - toEpochDay(partsOf(a))
}

export function firstOfMonth(date: LocalDate): LocalDate {
  return makeDate(yearOf(date), monthOf(date), 1)
}

// ============================================================================
// Day-of-Week
// ============================================================================

export function dayOfWeek(date: LocalDate): Weekday {
  // Epoch day 0 (1970-01-01) was a Thursday
  const idx = (((toEpochDay(partsOf(date)) + 3) % 7) + 7) % 7
  return indexToWeekday(idx)
}

/** Monday is 0, Sunday is 6. */
export function weekdayToIndex(w: Weekday): number {
  return WEEKDAYS.indexOf(w)
}

export function indexToWeekday(i: number): Weekday {
  return WEEKDAYS[((i % 7) + 7) % 7] ?? 'mon'
}

/** The given date if it falls on `weekday`, otherwise the next date that does. */
export function nextOrSame(date: LocalDate, weekday: Weekday): LocalDate {
  const ahead = (weekdayToIndex(weekday) - weekdayToIndex(dayOfWeek(date)) + 7) % 7
  return addDays(date, ahead)
}

/** The first date in `date`'s month that falls on `weekday`. */
export function firstInMonth(date: LocalDate, weekday: Weekday): LocalDate {
  return nextOrSame(firstOfMonth(date), weekday)
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDates(a: LocalDate, b: LocalDate): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function dateBefore(a: LocalDate, b: LocalDate): boolean {
  return a < b
}

export function dateAfter(a: LocalDate, b: LocalDate): boolean {
  return a > b
}

// ============================================================================
// Timezones
// ============================================================================

export function isValidTimezone(tz: string): boolean {
  try {
    Intl.DateTimeFormat('en-US', { timeZone: tz })
    return true
  } catch {
    return false
  }
}

/** The zone's host default, e.g. 'Europe/Berlin'. */
export function systemTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone
}

/** Wall-clock fields of an instant as seen in `tz`. */
export function wallClockAt(
  epochMs: number,
  tz: string
): { date: LocalDate; hour: number; minute: number; second: number } {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: tz,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  })

  const parts = formatter.formatToParts(new Date(epochMs))
  const get = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type)
    return part ? parseInt(part.value, 10) : 0
  }

  return {
    date: makeDate(get('year'), get('month'), get('day')),
    hour: get('hour') % 24,
    minute: get('minute'),
    second: get('second'),
  }
}

/** UTC offset of `tz` at the given instant, in minutes east of UTC. */
export function offsetMinutesAt(epochMs: number, tz: string): number {
  const { date, hour, minute, second } = wallClockAt(epochMs, tz)
  const wallMs = Date.UTC(yearOf(date), monthOf(date) - 1, dayOf(date), hour, minute, second)
  return Math.round((wallMs - Math.floor(epochMs / 1000) * 1000) / 60000)
}
