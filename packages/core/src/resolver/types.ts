import type { Coordinates, StopName } from '../parser/types.js'

/** The only payload handed to route lookup. Identical stops are allowed. */
export interface Query {
  departure: StopName
  destination: StopName
}

export type Outcome =
  | { type: 'complete_query'; query: Query }
  | { type: 'awaiting_destination'; departure: StopName }
  | { type: 'needs_location_selection'; coordinates: Coordinates }
  | { type: 'unrecognized' }
