export { classifyArrival, APPROACHING_MAX_MINUTES, ON_TIME_MAX_MINUTES } from './classifier.js'
export type { ArrivalStatus } from './classifier.js'
export {
  serviceDayType,
  isNightTime,
  nextMorningDayType,
  formatClock,
  shortClock,
  minutesUntilDeparture,
  DEFAULT_TIME_ZONE,
} from './timetable.js'
export type { ServiceDayType } from './timetable.js'
export { describeBusPosition, FAR_STOPS_AWAY } from './bus-position.js'
export type {
  TripStatus,
  TripStop,
  TripLocation,
  StopTime,
  BusPosition,
  RealtimeInfo,
} from './bus-position.js'
