/**
 * Timetable helpers in the operator's time zone.
 */

import { DateTime } from 'luxon'

export const DEFAULT_TIME_ZONE = 'Asia/Tokyo'

export type ServiceDayType = 'weekday' | 'saturday' | 'sunday'

/** Night window: from 21:00 until 05:00 */
const NIGHT_START_HOUR = 21
const NIGHT_END_HOUR = 5

/** Departures further in the past than this are read as tomorrow's */
const NEXT_DAY_THRESHOLD_MINUTES = -30

const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/

function inZone(date: Date, timeZone: string): DateTime {
  return DateTime.fromJSDate(date, { zone: timeZone })
}

export function serviceDayType(date: Date, timeZone: string = DEFAULT_TIME_ZONE): ServiceDayType {
  const weekday = inZone(date, timeZone).weekday
  if (weekday === 6) return 'saturday'
  if (weekday === 7) return 'sunday'
  return 'weekday'
}

export function isNightTime(date: Date, timeZone: string = DEFAULT_TIME_ZONE): boolean {
  const hour = inZone(date, timeZone).hour
  return hour >= NIGHT_START_HOUR || hour < NIGHT_END_HOUR
}

/**
 * Day type of the next morning's first buses: today's before 05:00,
 * otherwise tomorrow's.
 */
export function nextMorningDayType(date: Date, timeZone: string = DEFAULT_TIME_ZONE): ServiceDayType {
  const local = inZone(date, timeZone)
  const morning = local.hour < NIGHT_END_HOUR ? local : local.plus({ days: 1 })
  return serviceDayType(morning.toJSDate(), timeZone)
}

/** "HH:mm" wall-clock time */
export function formatClock(date: Date, timeZone: string = DEFAULT_TIME_ZONE): string {
  return inZone(date, timeZone).toFormat('HH:mm')
}

/** "HH:MM:SS" → "HH:MM"; anything unparseable comes back unchanged */
export function shortClock(time: string): string {
  const match = CLOCK_PATTERN.exec(time.trim())
  if (!match) return time
  return `${match[1].padStart(2, '0')}:${match[2]}`
}

/**
 * Whole minutes (truncated toward zero) from `now` until a timetable time
 * given as "HH:MM" or "HH:MM:SS". Hours of 24 and above belong to the next
 * calendar day. A result more than 30 minutes in the past is taken to be
 * tomorrow's departure. Returns null for unparseable input.
 */
export function minutesUntilDeparture(
  departureTime: string,
  now: Date,
  timeZone: string = DEFAULT_TIME_ZONE,
): number | null {
  const match = CLOCK_PATTERN.exec(departureTime.trim())
  if (!match) return null

  const hours = Number(match[1])
  const minutes = Number(match[2])
  if (minutes > 59) return null

  const current = inZone(now, timeZone)
  let departure = current.startOf('day').plus({ hours, minutes })

  let diff = Math.trunc(departure.diff(current, 'minutes').minutes)
  if (diff < NEXT_DAY_THRESHOLD_MINUTES) {
    departure = departure.plus({ days: 1 })
    diff = Math.trunc(departure.diff(current, 'minutes').minutes)
  }
  return diff
}
