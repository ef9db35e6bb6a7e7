/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * webApi.ts: Spotify Web API playback client for Slideshow Player.
 */
import type { Nullable, PlaybackState, RemoteDevice, RepeatMode } from "../types/index.js";
import { LOG, RemoteApiError, clamp, formatError } from "../utils/index.js";
import type { TokenProvider } from "./tokens.js";

/* Only the player endpoints are covered here, and only as far as the playback backends need them. Every request carries a fresh bearer token from the token
 * provider and is bounded by the configured request timeout. Any failure becomes a RemoteApiError: HTTP failures keep their status and the API's reason string,
 * and requests that never got an answer (network errors, timeouts) use status 0.
 */

const log = LOG.withComponent("WebApi");

/**
 * The remote playback operations the backends depend on. SpotifyWebApi is the production implementation; tests substitute fakes.
 */
export interface RemotePlaybackApi {

  getPlaybackState(): Promise<Nullable<PlaybackState>>;
  listDevices(): Promise<RemoteDevice[]>;
  pause(deviceId?: Nullable<string>): Promise<void>;
  resume(deviceId?: Nullable<string>): Promise<void>;
  seek(positionMs: number, deviceId?: Nullable<string>): Promise<void>;
  setRepeat(mode: RepeatMode, deviceId?: Nullable<string>): Promise<void>;
  setShuffle(enabled: boolean, deviceId?: Nullable<string>): Promise<void>;
  setVolume(percent: number, deviceId?: Nullable<string>): Promise<void>;
  skipNext(deviceId?: Nullable<string>): Promise<void>;
  skipPrevious(deviceId?: Nullable<string>): Promise<void>;
  startPlayback(trackUri: string, deviceId?: Nullable<string>, startPositionMs?: number): Promise<void>;
}

export interface SpotifyWebApiOptions {

  baseUrl: string;
  requestTimeout: number;
  tokens: TokenProvider;
}

type QueryValue = Nullable<number | string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {

  return (value !== null) && (typeof value === "object") && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): Nullable<string> {

  const value = record[key];

  return (typeof value === "string") ? value : null;
}

function readNumber(record: Record<string, unknown>, key: string): Nullable<number> {

  const value = record[key];

  return ((typeof value === "number") && Number.isFinite(value)) ? value : null;
}

/**
 * Decodes one entry of the device list. The device id is taken from device_id when present, otherwise from id. Entries without either are dropped.
 * @param raw - The raw device object.
 * @returns The device, or null when the entry is unusable.
 */
export function decodeDevice(raw: unknown): Nullable<RemoteDevice> {

  if(!isRecord(raw)) {

    return null;
  }

  const id = readString(raw, "device_id") ?? readString(raw, "id");

  if(!id) {

    return null;
  }

  return {

    id,
    isActive: raw.is_active === true,
    isRestricted: raw.is_restricted === true,
    name: readString(raw, "name") ?? "",
    type: readString(raw, "type") ?? "Unknown",
    volumePercent: readNumber(raw, "volume_percent")
  };
}

/**
 * Decodes a device list response. Accepts the Web API shape ({ devices }) as well as the enveloped shape some proxies return ({ data: { devices } }).
 * @param body - The parsed response body.
 * @returns The usable devices.
 */
export function decodeDeviceList(body: unknown): RemoteDevice[] {

  let list: unknown = null;

  if(isRecord(body)) {

    list = Array.isArray(body.devices) ? body.devices : (isRecord(body.data) ? body.data.devices : null);
  }

  if(!Array.isArray(list)) {

    return [];
  }

  const devices: RemoteDevice[] = [];

  for(const entry of list) {

    const device = decodeDevice(entry);

    if(device) {

      devices.push(device);
    }
  }

  return devices;
}

/**
 * Decodes the currently-playing response of GET me/player into a PlaybackState.
 * @param body - The parsed response body.
 */
export function decodePlaybackState(body: unknown): Nullable<PlaybackState> {

  if(!isRecord(body)) {

    return null;
  }

  const item = isRecord(body.item) ? body.item : null;
  let artistName: Nullable<string> = null;

  if(item && Array.isArray(item.artists)) {

    const names = item.artists.flatMap((artist: unknown) => (isRecord(artist) && (typeof artist.name === "string")) ? [artist.name] : []);

    artistName = (names.length > 0) ? names.join(", ") : null;
  }

  return {

    artistName,
    durationMs: (item ? readNumber(item, "duration_ms") : null) ?? 0,
    isBuffering: false,
    isPlaying: body.is_playing === true,
    positionMs: readNumber(body, "progress_ms") ?? 0,
    trackName: item ? readString(item, "name") : null,
    trackUri: item ? readString(item, "uri") : null
  };
}

/**
 * Folds an error response into a RemoteApiError. The API answers { error: { status, message, reason } }; a bare { status, message, reason } or a non-JSON body is
 * also accepted.
 * @param status - The HTTP status.
 * @param text - The raw response body.
 */
export function toRemoteApiError(status: number, text: string): RemoteApiError {

  let payload: unknown = null;

  try {

    payload = JSON.parse(text);
  } catch {

    payload = null;
  }

  const error = isRecord(payload) ? (isRecord(payload.error) ? payload.error : payload) : null;
  const message = (error ? readString(error, "message") : null) ?? (text.trim() || ("HTTP " + String(status)));
  const reason = error ? readString(error, "reason") : null;

  return new RemoteApiError(status, message, reason);
}

/**
 * Fetch-based Web API client.
 */
export class SpotifyWebApi implements RemotePlaybackApi {

  private readonly baseUrl: string;
  private readonly requestTimeout: number;
  private readonly tokens: TokenProvider;

  constructor(options: SpotifyWebApiOptions) {

    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.requestTimeout = options.requestTimeout;
    this.tokens = options.tokens;
  }

  async listDevices(): Promise<RemoteDevice[]> {

    const response = await this.request("GET", "me/player/devices");
    const devices = decodeDeviceList(await response.json().catch(() => null));

    LOG.debug("webapi", "Device list: %s.", devices.map((device) => [ device.name, " (", device.id, ")" ].join("")).join(", ") || "empty");

    return devices;
  }

  async getPlaybackState(): Promise<Nullable<PlaybackState>> {

    const response = await this.request("GET", "me/player");

    // 204: nothing is playing anywhere.
    if(response.status === 204) {

      return null;
    }

    return decodePlaybackState(await response.json().catch(() => null));
  }

  async startPlayback(trackUri: string, deviceId?: Nullable<string>, startPositionMs?: number): Promise<void> {

    const body: Record<string, unknown> = { uris: [trackUri] };

    if(startPositionMs !== undefined) {

      body["position_ms"] = Math.max(0, Math.round(startPositionMs));
    }

    log.info("Starting %s on device %s.", trackUri, deviceId ?? "(active)");

    await this.request("PUT", "me/player/play", { "device_id": deviceId }, body);
  }

  async resume(deviceId?: Nullable<string>): Promise<void> {

    await this.request("PUT", "me/player/play", { "device_id": deviceId });
  }

  async pause(deviceId?: Nullable<string>): Promise<void> {

    await this.request("PUT", "me/player/pause", { "device_id": deviceId });
  }

  async seek(positionMs: number, deviceId?: Nullable<string>): Promise<void> {

    await this.request("PUT", "me/player/seek", { "device_id": deviceId, "position_ms": Math.max(0, Math.round(positionMs)) });
  }

  async setVolume(percent: number, deviceId?: Nullable<string>): Promise<void> {

    await this.request("PUT", "me/player/volume", { "device_id": deviceId, "volume_percent": Math.round(clamp(percent, 0, 100)) });
  }

  async skipNext(deviceId?: Nullable<string>): Promise<void> {

    await this.request("POST", "me/player/next", { "device_id": deviceId });
  }

  async skipPrevious(deviceId?: Nullable<string>): Promise<void> {

    await this.request("POST", "me/player/previous", { "device_id": deviceId });
  }

  async setShuffle(enabled: boolean, deviceId?: Nullable<string>): Promise<void> {

    await this.request("PUT", "me/player/shuffle", { "device_id": deviceId, state: enabled ? "true" : "false" });
  }

  async setRepeat(mode: RepeatMode, deviceId?: Nullable<string>): Promise<void> {

    await this.request("PUT", "me/player/repeat", { "device_id": deviceId, state: mode });
  }

  /**
   * Issues one authorized request.
   * @param method - HTTP method.
   * @param endpoint - Path relative to the API base URL.
   * @param query - Query parameters. Null and undefined values are left out.
   * @param body - Optional JSON body.
   * @returns The successful response.
   * @throws CredentialError from the token provider, or RemoteApiError.
   */
  private async request(method: string, endpoint: string, query: Record<string, QueryValue> = {}, body?: unknown): Promise<Response> {

    const token = await this.tokens.getValidAccessCredential();
    const params = new URLSearchParams();

    for(const [ key, value ] of Object.entries(query)) {

      if((value !== null) && (value !== undefined)) {

        params.set(key, String(value));
      }
    }

    const search = params.toString();
    const url = [ this.baseUrl, "/", endpoint, search ? "?" : "", search ].join("");
    const headers: Record<string, string> = { "Authorization": "Bearer " + token };

    if(body !== undefined) {

      headers["Content-Type"] = "application/json";
    }

    LOG.debug("webapi", "%s %s", method, url);

    let response: Response;

    try {

      response = await fetch(url, {

        body: (body !== undefined) ? JSON.stringify(body) : undefined,
        headers,
        method,
        signal: AbortSignal.timeout(this.requestTimeout)
      });
    } catch(error) {

      log.warn("%s %s failed: %s.", method, endpoint, formatError(error));

      throw new RemoteApiError(0, formatError(error));
    }

    if(!response.ok) {

      const error = toRemoteApiError(response.status, await response.text().catch(() => ""));

      log.warn("%s %s returned HTTP %s: %s%s.", method, endpoint, response.status, formatError(error), error.reason ? " (" + error.reason + ")" : "");

      throw error;
    }

    return response;
  }
}
