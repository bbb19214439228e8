/**
 * Route Search
 *
 * Runs a complete query against the bus API and decorates each route with
 * its arrival status and the bus position. Late at night an empty result
 * falls back to the next morning's first buses.
 */

import {
  classifyArrival,
  describeBusPosition,
  formatClock,
  isNightTime,
  minutesUntilDeparture,
  nextMorningDayType,
  serviceDayType,
  silentLogger,
  DEFAULT_TIME_ZONE,
  type ArrivalStatus,
  type Logger,
  type Query,
  type RealtimeInfo,
} from "@noriba/core";
import type { BusApi, BusRoute } from "./types.js";

/** At night, a first departure further away than this means the last bus is gone */
export const LATE_DEPARTURE_MINUTES = 120;
/** Clock used when searching the next morning's first buses */
export const FIRST_BUS_SEARCH_TIME = "05:00";

export interface ClassifiedRoute {
  route: BusRoute;
  minutesUntilDeparture: number | null;
  status: ArrivalStatus;
  realtime: RealtimeInfo | null;
}

export interface RouteSearchResult {
  query: Query;
  routes: ClassifiedRoute[];
  /** The routes shown are the next morning's */
  lastBusPassed: boolean;
}

export interface RouteSearchOptions {
  api: BusApi;
  timeZone?: string;
  routeLimit?: number;
  logger?: Logger;
}

export class RouteSearchService {
  private readonly api: BusApi;
  private readonly timeZone: string;
  private readonly routeLimit: number;
  private readonly log: Logger;

  constructor(options: RouteSearchOptions) {
    this.api = options.api;
    this.timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;
    this.routeLimit = options.routeLimit ?? 3;
    this.log = options.logger ?? silentLogger();
  }

  async search(query: Query, now: Date = new Date()): Promise<RouteSearchResult> {
    const night = isNightTime(now, this.timeZone);
    let routes =
      (await this.api.searchRoutes({
        fromStop: query.departure,
        toStop: query.destination,
        currentTime: formatClock(now, this.timeZone),
        dayType: serviceDayType(now, this.timeZone),
        limit: this.routeLimit,
      })) ?? [];
    let lastBusPassed = false;

    if (routes.length === 0 && night) {
      this.log.info(
        { departure: query.departure, destination: query.destination },
        "No routes tonight, searching the first buses",
      );
      const firstBuses =
        (await this.api.searchRoutes({
          fromStop: query.departure,
          toStop: query.destination,
          currentTime: FIRST_BUS_SEARCH_TIME,
          dayType: nextMorningDayType(now, this.timeZone),
          limit: this.routeLimit,
        })) ?? [];
      if (firstBuses.length > 0) {
        routes = firstBuses;
        lastBusPassed = true;
      }
    } else if (routes.length > 0 && night) {
      const minutes = minutesUntilDeparture(routes[0].departureTime, now, this.timeZone);
      if (minutes !== null && minutes > LATE_DEPARTURE_MINUTES) {
        this.log.info({ minutes }, "Last bus has passed");
        lastBusPassed = true;
      }
    }

    const classified = await Promise.all(
      routes.map((route) => this.classify(route, now)),
    );
    return { query, routes: classified, lastBusPassed };
  }

  private async classify(route: BusRoute, now: Date): Promise<ClassifiedRoute> {
    const minutes = minutesUntilDeparture(route.departureTime, now, this.timeZone);
    return {
      route,
      minutesUntilDeparture: minutes,
      status: minutes === null ? "no_info" : classifyArrival(minutes),
      realtime: await this.realtimeFor(route),
    };
  }

  private async realtimeFor(route: BusRoute): Promise<RealtimeInfo | null> {
    if (!route.tripId) return null;
    try {
      const location = await this.api.tripLocation(route.tripId, route.departureStopId);
      return describeBusPosition(location);
    } catch (err) {
      this.log.warn({ err, tripId: route.tripId }, "Trip location unavailable");
      return null;
    }
  }
}
