/**
 * In-process stand-ins shared by the server tests.
 */

import type { TripLocation } from "@noriba/core";
import type {
  BusApi,
  BusRoute,
  NearbySearchRequest,
  NearbyStop,
  RouteSearchRequest,
  StopMatch,
} from "../src/bus/types.js";

export class FakeBusApi implements BusApi {
  /** Responses handed out by searchRoutes, in order; the last one repeats */
  routeResponses: Array<BusRoute[] | null | Error> = [[]];
  routeRequests: RouteSearchRequest[] = [];

  knownStops = new Set<string>();
  stopChecks: string[] = [];
  stopCheckError: Error | null = null;
  /** Stop checks for these names wait for the promise before answering */
  stopCheckGates = new Map<string, Promise<void>>();

  nearby: NearbyStop[] = [];
  nearbyRequests: NearbySearchRequest[] = [];

  trips = new Map<string, TripLocation | Error>();
  tripRequests: Array<{ tripId: string; departureStopId?: string }> = [];

  async searchStops(query: string): Promise<StopMatch[] | null> {
    return this.knownStops.has(query) ? [{ stopName: query }] : [];
  }

  async stopExists(stopName: string): Promise<boolean> {
    this.stopChecks.push(stopName);
    await this.stopCheckGates.get(stopName);
    if (this.stopCheckError) throw this.stopCheckError;
    return this.knownStops.has(stopName);
  }

  async searchRoutes(request: RouteSearchRequest): Promise<BusRoute[] | null> {
    const index = Math.min(this.routeRequests.length, this.routeResponses.length - 1);
    this.routeRequests.push(request);
    const response = this.routeResponses[index] ?? [];
    if (response instanceof Error) throw response;
    return response;
  }

  async nearbyStops(request: NearbySearchRequest): Promise<NearbyStop[]> {
    this.nearbyRequests.push(request);
    return this.nearby;
  }

  async tripLocation(tripId: string, departureStopId?: string): Promise<TripLocation | null> {
    this.tripRequests.push({ tripId, departureStopId });
    const trip = this.trips.get(tripId);
    if (trip instanceof Error) throw trip;
    return trip ?? null;
  }
}

export function route(overrides: Partial<BusRoute> = {}): BusRoute {
  return {
    routeName: "市バス5",
    departureTime: "10:02:00",
    arrivalTime: "10:30:00",
    travelTimeMinutes: 28,
    ...overrides,
  };
}

// 10:00 JST, Monday
export const MONDAY_10AM = new Date("2026-10-19T01:00:00.000Z");
// 22:00 JST, Friday
export const FRIDAY_10PM = new Date("2026-10-16T13:00:00.000Z");
