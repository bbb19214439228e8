/**
 * Unit Tests — Bus API client (fetch stubbed)
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { HttpBusApiClient } from "../src/bus/client.js";
import { BusApiError } from "../src/bus/types.js";

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("HttpBusApiClient", () => {
  const fetchMock = vi.fn<typeof fetch>();
  let client: HttpBusApiClient;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    client = new HttpBusApiClient({
      baseUrl: "http://bus.test/api/",
      apiKey: "test-key",
      timeoutMs: 500,
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function lastCall(): { url: URL; init: RequestInit | undefined } {
    const call = fetchMock.mock.calls.at(-1);
    return { url: new URL(String(call?.[0])), init: call?.[1] };
  }

  // -------------------------------------------------------------------
  // Route search
  // -------------------------------------------------------------------

  describe("searchRoutes", () => {
    const request = {
      fromStop: "四条河原町",
      toStop: "京都駅",
      currentTime: "10:00",
      dayType: "weekday" as const,
      limit: 3,
    };

    it("posts a snake_case body with the API key", async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ success: true, routes: [] }));

      await client.searchRoutes(request);

      const { url, init } = lastCall();
      expect(url.toString()).toBe("http://bus.test/api/search");
      expect(init?.method).toBe("POST");
      expect(new Headers(init?.headers).get("X-API-Key")).toBe("test-key");
      expect(JSON.parse(String(init?.body))).toEqual({
        from_stop: "四条河原町",
        to_stop: "京都駅",
        current_time: "10:00",
        day_type: "weekday",
        limit: 3,
      });
    });

    it("maps routes to camelCase", async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({
          success: true,
          routes: [
            {
              route_name: "市バス5",
              departure_time: "10:02:00",
              arrival_time: "10:30:00",
              travel_time_minutes: 28,
              departure_stop_desc: "A乗り場",
              arrival_stop_desc: null,
              trip_id: "t1",
              departure_stop_id: "s1",
            },
          ],
        }),
      );

      expect(await client.searchRoutes(request)).toEqual([
        {
          routeName: "市バス5",
          departureTime: "10:02:00",
          arrivalTime: "10:30:00",
          travelTimeMinutes: 28,
          departureStopDesc: "A乗り場",
          arrivalStopDesc: undefined,
          tripId: "t1",
          departureStopId: "s1",
        },
      ]);
    });

    it("returns null when the API reports no success", async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ success: false, error: "busy" }));
      expect(await client.searchRoutes(request)).toBeNull();
    });

    it("surfaces the error of a 400 response", async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({ success: false, error: "出発地が見つかりません" }, 400),
      );

      const error = await client.searchRoutes(request).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(BusApiError);
      expect(error).toMatchObject({ message: "出発地が見つかりません", status: 400 });
    });

    it("falls back to a default message for a 400 without error", async () => {
      fetchMock.mockImplementation(async () => jsonResponse({}, 400));
      await expect(client.searchRoutes(request)).rejects.toThrow("バス停名が見つかりません。");
    });

    it("reports other HTTP errors with the status", async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ detail: "down" }, 503));
      await expect(client.searchRoutes(request)).rejects.toMatchObject({
        message: "API通信エラー: 503",
        status: 503,
      });
    });

    it("reports timeouts", async () => {
      fetchMock.mockRejectedValue(Object.assign(new Error("aborted"), { name: "TimeoutError" }));
      await expect(client.searchRoutes(request)).rejects.toThrow(
        "検索がタイムアウトしました。もう一度お試しください。",
      );
    });

    it("reports connection failures", async () => {
      fetchMock.mockRejectedValue(new TypeError("fetch failed"));
      await expect(client.searchRoutes(request)).rejects.toThrow("バス路線の検索に失敗しました。");
    });

    it("rejects a response of the wrong shape", async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ routes: "none" }));
      await expect(client.searchRoutes(request)).rejects.toThrow("予期しないエラーが発生しました。");
    });
  });

  // -------------------------------------------------------------------
  // Stops
  // -------------------------------------------------------------------

  describe("stops", () => {
    it("checks a stop exists with a one-result search", async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({ success: true, stops: [{ stop_name: "京都駅", stop_id: "s9" }] }),
      );

      expect(await client.stopExists("京都駅")).toBe(true);

      const { url } = lastCall();
      expect(url.pathname).toBe("/api/stops/search");
      expect(url.searchParams.get("q")).toBe("京都駅");
      expect(url.searchParams.get("limit")).toBe("1");
    });

    it("treats an empty or unsuccessful search as missing", async () => {
      fetchMock.mockImplementationOnce(async () => jsonResponse({ success: true, stops: [] }));
      fetchMock.mockImplementationOnce(async () => jsonResponse({ success: false }));

      expect(await client.stopExists("どこか")).toBe(false);
      expect(await client.stopExists("どこか")).toBe(false);
    });

    it("finds nearby stops", async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({ stops: [{ stop_name: "四条河原町", distance_meters: 120.5 }] }),
      );

      const stops = await client.nearbyStops({
        latitude: 35.0037,
        longitude: 135.7689,
        radiusMeters: 500,
        limit: 5,
      });

      expect(stops).toEqual([{ stopName: "四条河原町", distanceMeters: 120.5 }]);
      const { url } = lastCall();
      expect(url.pathname).toBe("/api/stops/nearby");
      expect(Object.fromEntries(url.searchParams)).toEqual({
        lat: "35.0037",
        lon: "135.7689",
        radius: "500",
        limit: "5",
      });
    });

    it("returns no nearby stops when the list is missing", async () => {
      fetchMock.mockImplementation(async () => jsonResponse({}));
      const stops = await client.nearbyStops({ latitude: 0, longitude: 0, radiusMeters: 1, limit: 1 });
      expect(stops).toEqual([]);
    });
  });

  // -------------------------------------------------------------------
  // Trip location
  // -------------------------------------------------------------------

  describe("tripLocation", () => {
    it("maps the location report", async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({
          success: true,
          trip_id: "t1",
          status: "between_stops",
          from_stop: { stop_id: "p2", stop_name: "河原町三条", time: "09:58:00" },
          to_stop: { stop_id: "p3", stop_name: "蛸薬師", time: "10:00:00" },
          estimated_arrival_minutes: 2,
          previous_stops: [{ stop_id: "p2", stop_name: "河原町三条", time: "09:58:00" }],
          boarding_stop: { stop_id: "s1", stop_name: "四条河原町", time: "10:02:00" },
        }),
      );

      const location = await client.tripLocation("t1", "s1");

      expect(location).toEqual({
        tripId: "t1",
        status: "between_stops",
        fromStop: { stopId: "p2", stopName: "河原町三条", time: "09:58:00" },
        toStop: { stopId: "p3", stopName: "蛸薬師", time: "10:00:00" },
        previousStops: [{ stopId: "p2", stopName: "河原町三条", time: "09:58:00" }],
        boardingStop: { stopId: "s1", stopName: "四条河原町", time: "10:02:00" },
        estimatedArrivalMinutes: 2,
      });
      const { url } = lastCall();
      expect(url.pathname).toBe("/api/trip/t1/location");
      expect(url.searchParams.get("departure_stop_id")).toBe("s1");
    });

    it("maps unknown statuses and missing stops", async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ success: true, status: "parked" }));

      const location = await client.tripLocation("t1");

      expect(location).toMatchObject({
        status: "unknown",
        fromStop: null,
        previousStops: [],
        boardingStop: null,
        estimatedArrivalMinutes: null,
      });
      expect(lastCall().url.searchParams.has("departure_stop_id")).toBe(false);
    });

    it("returns null for an unknown trip", async () => {
      fetchMock.mockImplementation(async () => new Response("not found", { status: 404 }));
      expect(await client.tripLocation("missing")).toBeNull();
    });
  });
});
