/**
 * Bus Position
 *
 * Converts a timetable-based trip-location report into the view shown under
 * a route: the three stops before the rider's boarding stop, and where the
 * bus is relative to them.
 */

import { shortClock } from './timetable.js'

export type TripStatus = 'not_started' | 'between_stops' | 'arrived' | 'unknown'

export interface TripStop {
  stopId?: string
  stopName: string
  time?: string
}

export interface TripLocation {
  tripId: string
  status: TripStatus
  fromStop: TripStop | null
  toStop: TripStop | null
  previousStops: TripStop[]
  boardingStop: TripStop | null
  estimatedArrivalMinutes: number | null
}

export interface StopTime {
  stopName: string
  time: string
}

/** Stops-away value used when the bus is beyond the listed previous stops */
export const FAR_STOPS_AWAY = 4

export type BusPosition =
  | { type: 'between'; fromStop: string; toStop: string | null; stopsAway: number }
  | { type: 'far'; stopsAway: typeof FAR_STOPS_AWAY }

export interface RealtimeInfo {
  previousStops: StopTime[]
  boardingStop: StopTime
  busPosition: BusPosition
}

function toStopTime(stop: TripStop): StopTime {
  return { stopName: stop.stopName, time: stop.time ? shortClock(stop.time) : '' }
}

function locateBus(location: TripLocation): BusPosition {
  const far: BusPosition = { type: 'far', stopsAway: FAR_STOPS_AWAY }
  if (location.status !== 'between_stops' || !location.fromStop || !location.toStop) return far

  const { fromStop, toStop, previousStops } = location
  let index = previousStops.findIndex((s) => s.stopName === fromStop.stopName)
  if (index < 0 && fromStop.stopId) {
    index = previousStops.findIndex((s) => s.stopId === fromStop.stopId)
  }
  if (index < 0) return far

  return {
    type: 'between',
    fromStop: fromStop.stopName,
    toStop: toStop.stopName || null,
    stopsAway: previousStops.length - index,
  }
}

/** Null when the report lacks the previous stops or the boarding stop */
export function describeBusPosition(location: TripLocation | null): RealtimeInfo | null {
  if (!location || location.previousStops.length === 0 || !location.boardingStop) return null

  return {
    previousStops: location.previousStops.map(toStopTime),
    boardingStop: toStopTime(location.boardingStop),
    busPosition: locateBus(location),
  }
}
