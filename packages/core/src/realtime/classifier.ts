/**
 * Arrival Classifier
 *
 * Coarse urgency bucket for a route, derived only from the minutes left
 * until departure.
 */

export type ArrivalStatus = 'approaching' | 'on_time' | 'no_info'

/** Upper bound (inclusive) of the approaching bucket */
export const APPROACHING_MAX_MINUTES = 3
/** Upper bound (inclusive) of the on-time bucket */
export const ON_TIME_MAX_MINUTES = 10

/**
 * Negative values (already departed, stale data) and non-finite values
 * have no meaningful urgency and fall into `no_info`.
 */
export function classifyArrival(minutesUntilDeparture: number): ArrivalStatus {
  if (!Number.isFinite(minutesUntilDeparture) || minutesUntilDeparture < 0) return 'no_info'
  if (minutesUntilDeparture <= APPROACHING_MAX_MINUTES) return 'approaching'
  if (minutesUntilDeparture <= ON_TIME_MAX_MINUTES) return 'on_time'
  return 'no_info'
}
