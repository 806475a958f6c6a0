/**
 * recurrence-picker
 *
 * Public API exports
 */

// Error system
export {
  PickerError, PickerErrorCode,
  InvalidConfigurationError, InvalidStepsError, ParseError, DateRangeError,
} from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime, Weekday } from './time-date'
export {
  WEEKDAYS, MIN_YEAR, MAX_YEAR, MAX_MONTH_INDEX,
  isLeapYear, daysInMonth,
  parseDate, parseTime, parseWeekday, isWeekday,
  makeDate, makeTime, makeDateTime,
  yearOf, monthOf, dayOf, hourOf, minuteOf, secondOf, dateOf, timeOf,
  addDays, addWeeks, addMonths, monthIndexOf, daysBetween, firstOfMonth,
  dayOfWeek, weekdayToIndex, indexToWeekday, nextOrSame, firstInMonth,
  compareDates, dateBefore, dateAfter,
  isValidTimezone, systemTimezone, wallClockAt, offsetMinutesAt,
} from './time-date'

// Reference clock
export type { ReferenceClock } from './reference-clock'
export { fixedClock, systemClock } from './reference-clock'

// Recurrence picker
export type {
  RecurrenceRule, RecurrencePickerOptions, RecurrencePickerConfig,
} from './recurrence-picker'
export {
  RecurrencePicker, createRecurrencePicker, createRecurrenceRule,
  MIN_ORDINAL, MAX_ORDINAL, DEFAULT_TIME_OF_DAY,
} from './recurrence-picker'

// Boundary adapters
export {
  toInstant, occurrenceInstant, formatOccurrence, describeRule,
} from './boundary'
