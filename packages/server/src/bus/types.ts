import type { ServiceDayType, StopName, TripLocation } from "@noriba/core";

/** One itinerary returned by the route search endpoint */
export interface BusRoute {
  routeName: string;
  /** Timetable time, "HH:MM:SS" (hours may exceed 23) */
  departureTime: string;
  arrivalTime: string;
  travelTimeMinutes: number;
  departureStopDesc?: string;
  arrivalStopDesc?: string;
  tripId?: string;
  departureStopId?: string;
}

export interface StopMatch {
  stopName: string;
  stopId?: string;
}

export interface NearbyStop {
  stopName: string;
  distanceMeters: number;
}

export interface RouteSearchRequest {
  fromStop: StopName;
  toStop: StopName;
  /** "HH:MM" */
  currentTime: string;
  dayType: ServiceDayType;
  limit: number;
}

export interface NearbySearchRequest {
  latitude: number;
  longitude: number;
  radiusMeters: number;
  limit: number;
}

/**
 * Bus-data API. Methods reject with BusApiError; a `null` result means the
 * API answered but reported no success.
 */
export interface BusApi {
  searchStops(query: string, limit?: number): Promise<StopMatch[] | null>;
  stopExists(stopName: StopName): Promise<boolean>;
  searchRoutes(request: RouteSearchRequest): Promise<BusRoute[] | null>;
  nearbyStops(request: NearbySearchRequest): Promise<NearbyStop[]>;
  /** `null` when the trip is unknown */
  tripLocation(tripId: string, departureStopId?: string): Promise<TripLocation | null>;
}

/** Error whose message can be shown to the rider as is */
export class BusApiError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "BusApiError";
    this.status = status;
  }
}
