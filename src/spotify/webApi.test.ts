/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * webApi.test.ts: Tests for the Web API playback client.
 */
import { CredentialError, RemoteApiError } from "../utils/index.js";
import { SpotifyWebApi, decodeDeviceList, decodePlaybackState, toRemoteApiError } from "./webApi.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { StaticTokenProvider } from "./tokens.js";

function jsonResponse(body: unknown, status = 200): Response {

  return new Response(JSON.stringify(body), { headers: { "Content-Type": "application/json" }, status });
}

describe("SpotifyWebApi", () => {

  const fetchMock = vi.fn<typeof fetch>();
  let api: SpotifyWebApi;

  beforeEach(() => {

    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);

    api = new SpotifyWebApi({ baseUrl: "https://api.test/v1/", requestTimeout: 1000, tokens: new StaticTokenProvider("test-secret") });
  });

  afterEach(() => {

    vi.unstubAllGlobals();
  });

  function lastCall(): { init: RequestInit | undefined; url: string } {

    const call = fetchMock.mock.calls[fetchMock.mock.calls.length - 1];

    return { init: call[1], url: String(call[0]) };
  }

  it("lists devices with a bearer token", async () => {

    fetchMock.mockResolvedValue(jsonResponse({ devices: [{ id: "abc", "is_active": true, "is_restricted": false, name: "Kitchen", type: "Speaker",
      "volume_percent": 40 }] }));

    await expect(api.listDevices()).resolves.toEqual([{ id: "abc", isActive: true, isRestricted: false, name: "Kitchen", type: "Speaker", volumePercent: 40 }]);

    const { init, url } = lastCall();

    expect(url).toBe("https://api.test/v1/me/player/devices");
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual({ "Authorization": "Bearer test-secret" });
  });

  it("starts playback on a device with a start position", async () => {

    fetchMock.mockResolvedValue(new Response(null, { status: 204 }));

    await api.startPlayback("spotify:track:one", "dev-123", 1500.4);

    const { init, url } = lastCall();

    expect(url).toBe("https://api.test/v1/me/player/play?device_id=dev-123");
    expect(init?.method).toBe("PUT");
    expect(init?.body).toBe(JSON.stringify({ uris: ["spotify:track:one"], "position_ms": 1500 }));
  });

  it("omits the device when none is given", async () => {

    fetchMock.mockResolvedValue(new Response(null, { status: 204 }));

    await api.pause();

    expect(lastCall().url).toBe("https://api.test/v1/me/player/pause");
  });

  it("rounds and clamps the volume percentage", async () => {

    fetchMock.mockResolvedValue(new Response(null, { status: 204 }));

    await api.setVolume(140, "dev-123");

    expect(lastCall().url).toBe("https://api.test/v1/me/player/volume?device_id=dev-123&volume_percent=100");
  });

  it("sends shuffle and repeat states", async () => {

    fetchMock.mockResolvedValue(new Response(null, { status: 204 }));

    await api.setShuffle(true);
    expect(lastCall().url).toBe("https://api.test/v1/me/player/shuffle?state=true");

    await api.setRepeat("track", "dev-123");
    expect(lastCall().url).toBe("https://api.test/v1/me/player/repeat?device_id=dev-123&state=track");
  });

  it("uses POST for skipping", async () => {

    fetchMock.mockResolvedValue(new Response(null, { status: 204 }));

    await api.skipNext("dev-123");

    expect(lastCall().init?.method).toBe("POST");
    expect(lastCall().url).toBe("https://api.test/v1/me/player/next?device_id=dev-123");
  });

  it("keeps the reason of a failed request", async () => {

    fetchMock.mockResolvedValue(jsonResponse({ error: { message: "Player command failed: No active device found", reason: "NO_ACTIVE_DEVICE", status: 404 } },
      404));

    const error = await api.resume("dev-123").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RemoteApiError);
    expect(error).toMatchObject({ message: "Player command failed: No active device found", reason: "NO_ACTIVE_DEVICE", statusCode: 404 });
  });

  it("reports requests that never got an answer with status 0", async () => {

    fetchMock.mockRejectedValue(new TypeError("fetch failed"));

    await expect(api.skipPrevious()).rejects.toMatchObject({ message: "fetch failed", statusCode: 0 });
  });

  it("returns null playback state when nothing is playing", async () => {

    fetchMock.mockResolvedValue(new Response(null, { status: 204 }));

    await expect(api.getPlaybackState()).resolves.toBeNull();
  });

  it("passes token provider failures through without calling the API", async () => {

    api = new SpotifyWebApi({ baseUrl: "https://api.test/v1", requestTimeout: 1000, tokens: new StaticTokenProvider("") });

    await expect(api.pause()).rejects.toBeInstanceOf(CredentialError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("decodeDeviceList", () => {

  it("prefers device_id over id and skips entries without either", () => {

    expect(decodeDeviceList({ devices: [ { "device_id": "real", id: "other", name: "Player" }, { name: "Broken" }, 42 ] })).toEqual([

      { id: "real", isActive: false, isRestricted: false, name: "Player", type: "Unknown", volumePercent: null }
    ]);
  });

  it("accepts the enveloped proxy shape", () => {

    expect(decodeDeviceList({ data: { devices: [{ id: "abc", name: "Desk" }] }, success: true }).map((device) => device.id)).toEqual(["abc"]);
  });

  it("returns nothing for unexpected bodies", () => {

    expect(decodeDeviceList("nope")).toEqual([]);
    expect(decodeDeviceList({ devices: "nope" })).toEqual([]);
  });
});

describe("decodePlaybackState", () => {

  it("reads the current track", () => {

    expect(decodePlaybackState({ "is_playing": true, item: { artists: [ { name: "A" }, { name: "B" } ], "duration_ms": 200000, name: "Song",
      uri: "spotify:track:one" }, "progress_ms": 1234 })).toEqual({

      artistName: "A, B",
      durationMs: 200000,
      isBuffering: false,
      isPlaying: true,
      positionMs: 1234,
      trackName: "Song",
      trackUri: "spotify:track:one"
    });
  });
});

describe("toRemoteApiError", () => {

  it("falls back to the raw body", () => {

    expect(toRemoteApiError(502, "Bad Gateway")).toMatchObject({ message: "Bad Gateway", reason: null, statusCode: 502 });
    expect(toRemoteApiError(500, "")).toMatchObject({ message: "HTTP 500", statusCode: 500 });
  });
});
