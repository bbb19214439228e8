/**
 * Bus API Client
 *
 * HTTP client for the timetable backend. Responses are validated with zod
 * and converted to camelCase domain types; every failure the rider could
 * see is turned into a BusApiError with a Japanese message.
 */

import { z } from "zod";
import {
  silentLogger,
  type Logger,
  type TripLocation,
  type TripStatus,
  type TripStop,
} from "@noriba/core";
import {
  BusApiError,
  type BusApi,
  type BusRoute,
  type NearbySearchRequest,
  type NearbyStop,
  type RouteSearchRequest,
  type StopMatch,
} from "./types.js";

// ─────────────────────────────────────────────────────────────────
// Messages
// ─────────────────────────────────────────────────────────────────

const TIMEOUT_MESSAGE = "検索がタイムアウトしました。もう一度お試しください。";
const UNEXPECTED_MESSAGE = "予期しないエラーが発生しました。";

// ─────────────────────────────────────────────────────────────────
// Response schemas
// ─────────────────────────────────────────────────────────────────

const ErrorBodySchema = z.object({ error: z.string().optional() }).passthrough();

const StopSearchSchema = z.object({
  success: z.boolean(),
  error: z.string().nullish(),
  stops: z
    .array(
      z.object({
        stop_name: z.string(),
        stop_id: z.string().nullish(),
      }),
    )
    .nullish(),
});

const RouteSchema = z.object({
  route_name: z.string().nullish(),
  departure_time: z.string().nullish(),
  arrival_time: z.string().nullish(),
  travel_time_minutes: z.number().nullish(),
  departure_stop_desc: z.string().nullish(),
  arrival_stop_desc: z.string().nullish(),
  trip_id: z.string().nullish(),
  departure_stop_id: z.string().nullish(),
});

const RouteSearchSchema = z.object({
  success: z.boolean(),
  error: z.string().nullish(),
  routes: z.array(RouteSchema).nullish(),
});

const NearbySchema = z.object({
  stops: z
    .array(
      z.object({
        stop_name: z.string(),
        distance_meters: z.number(),
      }),
    )
    .nullish(),
});

const TripStopSchema = z.object({
  stop_id: z.string().nullish(),
  stop_name: z.string().nullish(),
  time: z.string().nullish(),
});

const TripLocationSchema = z.object({
  success: z.boolean(),
  error: z.string().nullish(),
  trip_id: z.string().nullish(),
  status: z.string().nullish(),
  from_stop: TripStopSchema.nullish(),
  to_stop: TripStopSchema.nullish(),
  estimated_arrival_minutes: z.number().nullish(),
  previous_stops: z.array(TripStopSchema).nullish(),
  boarding_stop: TripStopSchema.nullish(),
});

type RawTripStop = z.infer<typeof TripStopSchema>;

const TRIP_STATUSES: readonly TripStatus[] = ["not_started", "between_stops", "arrived"];

function toTripStatus(status: string | null | undefined): TripStatus {
  return TRIP_STATUSES.find((s) => s === status) ?? "unknown";
}

function toTripStop(stop: RawTripStop): TripStop {
  return {
    stopId: stop.stop_id ?? undefined,
    stopName: stop.stop_name ?? "",
    time: stop.time ?? undefined,
  };
}

function toBusRoute(raw: z.infer<typeof RouteSchema>): BusRoute {
  return {
    routeName: raw.route_name ?? "不明",
    departureTime: raw.departure_time ?? "",
    arrivalTime: raw.arrival_time ?? "",
    travelTimeMinutes: raw.travel_time_minutes ?? 0,
    departureStopDesc: raw.departure_stop_desc ?? undefined,
    arrivalStopDesc: raw.arrival_stop_desc ?? undefined,
    tripId: raw.trip_id ?? undefined,
    departureStopId: raw.departure_stop_id ?? undefined,
  };
}

// ─────────────────────────────────────────────────────────────────
// Client
// ─────────────────────────────────────────────────────────────────

export interface BusApiClientOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  logger?: Logger;
}

interface RequestSpec {
  method: "GET" | "POST";
  path: string;
  query?: Record<string, string | number | undefined>;
  body?: unknown;
  /** Message used when the request cannot reach the API */
  connectionMessage: string;
  /** Message used for a 400 without an `error` field */
  badRequestMessage: string;
}

interface ApiResponse {
  status: number;
  data: unknown;
}

export class HttpBusApiClient implements BusApi {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(options: BusApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey ?? "";
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.log = options.logger ?? silentLogger();
  }

  async searchStops(query: string, limit = 5): Promise<StopMatch[] | null> {
    const response = await this.request({
      method: "GET",
      path: "/stops/search",
      query: { q: query, limit },
      connectionMessage: "バス停の検索に失敗しました。",
      badRequestMessage: "バス停名が見つかりません。",
    });
    const data = this.parse(StopSearchSchema, response, "stops/search");

    if (!data.success) {
      this.log.warn({ error: data.error }, "Stop search failed");
      return null;
    }
    return (data.stops ?? []).map((s) => ({
      stopName: s.stop_name,
      stopId: s.stop_id ?? undefined,
    }));
  }

  async stopExists(stopName: string): Promise<boolean> {
    const stops = await this.searchStops(stopName, 1);
    return stops !== null && stops.length > 0;
  }

  async searchRoutes(request: RouteSearchRequest): Promise<BusRoute[] | null> {
    const response = await this.request({
      method: "POST",
      path: "/search",
      body: {
        from_stop: request.fromStop,
        to_stop: request.toStop,
        current_time: request.currentTime,
        day_type: request.dayType,
        limit: request.limit,
      },
      connectionMessage: "バス路線の検索に失敗しました。",
      badRequestMessage: "バス停名が見つかりません。",
    });
    const data = this.parse(RouteSearchSchema, response, "search");

    if (!data.success) {
      this.log.warn({ error: data.error }, "Route search failed");
      return null;
    }
    return (data.routes ?? []).map(toBusRoute);
  }

  async nearbyStops(request: NearbySearchRequest): Promise<NearbyStop[]> {
    const response = await this.request({
      method: "GET",
      path: "/stops/nearby",
      query: {
        lat: request.latitude,
        lon: request.longitude,
        radius: request.radiusMeters,
        limit: request.limit,
      },
      connectionMessage: "バス停の検索に失敗しました。",
      badRequestMessage: "無効な座標です。",
    });
    const data = this.parse(NearbySchema, response, "stops/nearby");

    return (data.stops ?? []).map((s) => ({
      stopName: s.stop_name,
      distanceMeters: s.distance_meters,
    }));
  }

  async tripLocation(tripId: string, departureStopId?: string): Promise<TripLocation | null> {
    // 404 is an unknown trip, not a failure
    const response = await this.request(
      {
        method: "GET",
        path: `/trip/${encodeURIComponent(tripId)}/location`,
        query: { departure_stop_id: departureStopId },
        connectionMessage: "トリップ情報の取得に失敗しました。",
        badRequestMessage: "トリップ情報の取得に失敗しました。",
      },
      [404],
    );
    if (response.status === 404) {
      this.log.warn({ tripId }, "Trip ID not found");
      return null;
    }

    const data = this.parse(TripLocationSchema, response, "trip/location");
    if (!data.success) {
      this.log.warn({ tripId, error: data.error }, "Trip location fetch failed");
      return null;
    }

    return {
      tripId: data.trip_id ?? tripId,
      status: toTripStatus(data.status),
      fromStop: data.from_stop ? toTripStop(data.from_stop) : null,
      toStop: data.to_stop ? toTripStop(data.to_stop) : null,
      previousStops: (data.previous_stops ?? []).map(toTripStop),
      boardingStop: data.boarding_stop ? toTripStop(data.boarding_stop) : null,
      estimatedArrivalMinutes: data.estimated_arrival_minutes ?? null,
    };
  }

  // ── Internals ──────────────────────────────────────────────────

  private buildUrl(path: string, query: RequestSpec["query"]): string {
    const url = new URL(this.baseUrl + path);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async request(spec: RequestSpec, passStatuses: number[] = []): Promise<ApiResponse> {
    const url = this.buildUrl(spec.path, spec.query);
    const headers: Record<string, string> = { "X-API-Key": this.apiKey };
    if (spec.body !== undefined) headers["Content-Type"] = "application/json";

    let response: Response;
    try {
      response = await fetch(url, {
        method: spec.method,
        headers,
        body: spec.body === undefined ? undefined : JSON.stringify(spec.body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
        this.log.error({ path: spec.path }, "Bus API request timed out");
        throw new BusApiError(TIMEOUT_MESSAGE);
      }
      this.log.error({ err, path: spec.path }, "Bus API unreachable");
      throw new BusApiError(spec.connectionMessage);
    }

    if (passStatuses.includes(response.status)) {
      return { status: response.status, data: null };
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (err) {
      this.log.error({ err, path: spec.path, status: response.status }, "Bus API returned invalid JSON");
      throw new BusApiError(
        response.ok ? UNEXPECTED_MESSAGE : `API通信エラー: ${response.status}`,
        response.status,
      );
    }

    if (response.status === 400) {
      const body = ErrorBodySchema.safeParse(data);
      const message = (body.success ? body.data.error : undefined) ?? spec.badRequestMessage;
      throw new BusApiError(message, 400);
    }
    if (!response.ok) {
      this.log.error({ path: spec.path, status: response.status }, "Bus API HTTP error");
      throw new BusApiError(`API通信エラー: ${response.status}`, response.status);
    }

    return { status: response.status, data };
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, response: ApiResponse, endpoint: string): T {
    const result = schema.safeParse(response.data);
    if (!result.success) {
      this.log.error({ endpoint, issues: result.error.issues }, "Unexpected bus API response");
      throw new BusApiError(UNEXPECTED_MESSAGE, response.status);
    }
    return result.data;
  }
}
