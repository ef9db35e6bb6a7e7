/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * events.ts: Inbound player event decoding.
 */
import type { ControlEvent, Nullable } from "../types/index.js";

/* The player page posts loosely-typed objects: a type string plus whatever fields that event carries, any of which may be missing or null. decodeControlEvent()
 * turns one of those into the closed ControlEvent union. It never throws. Anything it cannot make sense of comes back as Unknown with the raw payload attached.
 *
 * Wire type        Event
 * ---------        -----
 * ready            Ready (requires a device id)
 * notReady         NotReady
 * stateChanged     StateChanged
 * error            Error
 * htmlLoaded       ContentLoaded (contentLoaded is accepted as well)
 * tokenUpdated     CredentialAck
 * connectResult    ConnectResult (ok when message is "connected")
 */

function isRecord(value: unknown): value is Record<string, unknown> {

  return (value !== null) && (typeof value === "object") && !Array.isArray(value);
}

function optionalString(value: unknown): Nullable<string> {

  return ((typeof value === "string") && (value.length > 0)) ? value : null;
}

function finiteNumber(value: unknown): number {

  return ((typeof value === "number") && Number.isFinite(value)) ? value : 0;
}

/**
 * Decodes one inbound payload. A JSON string is parsed first.
 * @param raw - The payload as received.
 * @returns The decoded event.
 */
export function decodeControlEvent(raw: unknown): ControlEvent {

  let payload = raw;

  if(typeof raw === "string") {

    try {

      payload = JSON.parse(raw);
    } catch {

      return { raw, type: "Unknown" };
    }
  }

  if(!isRecord(payload) || (typeof payload.type !== "string")) {

    return { raw, type: "Unknown" };
  }

  const deviceId = optionalString(payload.deviceId) ?? optionalString(payload.device_id);

  switch(payload.type) {

    case "ready": {

      return deviceId ? { deviceId, type: "Ready" } : { raw, type: "Unknown" };
    }

    case "notReady": {

      return { deviceId, type: "NotReady" };
    }

    case "stateChanged": {

      return {

        artistName: optionalString(payload.artistName),
        durationMs: finiteNumber(payload.durationMs),
        isPlaying: payload.isPlaying === true,
        positionMs: finiteNumber(payload.positionMs),
        trackName: optionalString(payload.trackName),
        trackUri: optionalString(payload.trackUri),
        type: "StateChanged"
      };
    }

    case "error": {

      return { code: optionalString(payload.code) ?? "unknown", message: optionalString(payload.message) ?? "Unknown player error", type: "Error" };
    }

    case "contentLoaded":
    case "htmlLoaded": {

      return { type: "ContentLoaded" };
    }

    case "tokenUpdated": {

      return { type: "CredentialAck" };
    }

    case "connectResult": {

      return { ok: (payload.message === "connected") || (payload.ok === true), type: "ConnectResult" };
    }

    default: {

      return { raw, type: "Unknown" };
    }
  }
}
