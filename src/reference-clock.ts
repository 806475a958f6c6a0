/**
 * Reference Clock
 *
 * Supplies the date a picker treats as "today". Pickers sample the clock once,
 * at construction, so a single instance always answers against the same day.
 */

import {
  type LocalDate,
  isValidTimezone,
  systemTimezone,
  wallClockAt,
} from './time-date'
import { InvalidConfigurationError } from './errors'

export interface ReferenceClock {
  today(): LocalDate
}

export function fixedClock(date: LocalDate): ReferenceClock {
  return { today: () => date }
}

/**
 * Reads the host clock and reports the calendar date in `timeZone`
 * (defaults to the host zone). `now` exists for tests.
 */
export function systemClock(
  timeZone: string = systemTimezone(),
  now: () => number = Date.now
): ReferenceClock {
  if (!isValidTimezone(timeZone)) {
    throw new InvalidConfigurationError(`Invalid timezone: ${timeZone}`)
  }
  return { today: () => wallClockAt(now(), timeZone).date }
}
