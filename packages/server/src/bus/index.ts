export { HttpBusApiClient } from "./client.js";
export type { BusApiClientOptions } from "./client.js";
export { BusApiError } from "./types.js";
export type {
  BusApi,
  BusRoute,
  StopMatch,
  NearbyStop,
  RouteSearchRequest,
  NearbySearchRequest,
} from "./types.js";
export { RouteSearchService, LATE_DEPARTURE_MINUTES, FIRST_BUS_SEARCH_TIME } from "./route-search.js";
export type { ClassifiedRoute, RouteSearchResult, RouteSearchOptions } from "./route-search.js";
