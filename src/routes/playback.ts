/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * playback.ts: Playback control routes for Slideshow Player.
 */
import type { BackendMode, RepeatMode } from "../types/index.js";
import { CredentialError, ReadinessError, RemoteApiError, formatError, toPlaybackErrorKind } from "../utils/index.js";
import type { Express, Request, Response } from "express";
import type { PlaybackSession } from "../playback/session.js";

/* The playback routes are a thin JSON layer over the playback session. Every command route answers with the session snapshot on success, so a caller sees the
 * resulting readiness and state without a second request. Failures are mapped onto HTTP statuses by the error's type:
 *
 * - 400: the request body is malformed.
 * - 401: no usable Spotify credential.
 * - 404: the player's device could not be found.
 * - 409: the backend is not ready for commands yet.
 * - 502: the Web API answered with an error. The body carries its status and reason.
 * - 500: anything else, such as a player process that failed to launch.
 */

/**
 * A request body that failed validation.
 */
export class InvalidRequestError extends Error {

  constructor(message: string) {

    super(message);

    this.name = "InvalidRequestError";
  }
}

/**
 * Maps an error from the playback session to the HTTP status it is reported with.
 * @param error - The error to map.
 * @returns The HTTP status code.
 */
export function httpStatusForError(error: unknown): number {

  if(error instanceof InvalidRequestError) {

    return 400;
  }

  if(error instanceof CredentialError) {

    return 401;
  }

  if(error instanceof ReadinessError) {

    return (error.code === "NotReady") ? 409 : 404;
  }

  if(error instanceof RemoteApiError) {

    return 502;
  }

  return 500;
}

/**
 * Sends the JSON error response for a failed playback request.
 * @param res - The Express response.
 * @param error - The error the request failed with.
 */
export function sendPlaybackError(res: Response, error: unknown): void {

  const body: Record<string, unknown> = { error: formatError(error) + ".", kind: toPlaybackErrorKind(error) };

  if(error instanceof RemoteApiError) {

    body.reason = error.reason;
    body.statusCode = error.statusCode;
  }

  res.status(httpStatusForError(error)).json(body);
}

/*
 * REQUEST PARSING
 *
 * Bodies arrive through express.json() and are untyped. Each parser checks the fields a route needs and throws InvalidRequestError naming the first bad one.
 */

function asObject(body: unknown): Record<string, unknown> {

  if(!body || (typeof body !== "object") || Array.isArray(body)) {

    return {};
  }

  return Object.fromEntries(Object.entries(body));
}

function readNumber(body: Record<string, unknown>, field: string): number {

  const value = body[field];

  if((typeof value !== "number") || !Number.isFinite(value)) {

    throw new InvalidRequestError([ "Expected a number for ", field ].join(""));
  }

  return value;
}

/**
 * Parses the body of POST /playback/play.
 * @param body - The request body.
 * @returns The track URI and the optional start position.
 */
export function parsePlayRequest(body: unknown): { positionMs?: number; trackUri: string } {

  const fields = asObject(body);
  const trackUri = fields.trackUri;

  if((typeof trackUri !== "string") || !trackUri.startsWith("spotify:")) {

    throw new InvalidRequestError("Expected a spotify: URI for trackUri");
  }

  if(fields.positionMs === undefined) {

    return { trackUri };
  }

  const positionMs = readNumber(fields, "positionMs");

  if(positionMs < 0) {

    throw new InvalidRequestError("positionMs must not be negative");
  }

  return { positionMs, trackUri };
}

/**
 * Parses the body of POST /playback/seek.
 * @param body - The request body.
 * @returns The target position in milliseconds.
 */
export function parseSeekRequest(body: unknown): number {

  const positionMs = readNumber(asObject(body), "positionMs");

  if(positionMs < 0) {

    throw new InvalidRequestError("positionMs must not be negative");
  }

  return positionMs;
}

/**
 * Parses the body of POST /playback/volume. Volume is a fraction between 0 and 1.
 * @param body - The request body.
 * @returns The volume.
 */
export function parseVolumeRequest(body: unknown): number {

  const volume = readNumber(asObject(body), "volume");

  if((volume < 0) || (volume > 1)) {

    throw new InvalidRequestError("volume must be between 0 and 1");
  }

  return volume;
}

/**
 * Parses the body of POST /playback/shuffle.
 * @param body - The request body.
 * @returns Whether shuffle should be on.
 */
export function parseShuffleRequest(body: unknown): boolean {

  const enabled = asObject(body).enabled;

  if(typeof enabled !== "boolean") {

    throw new InvalidRequestError("Expected a boolean for enabled");
  }

  return enabled;
}

const REPEAT_MODES: readonly RepeatMode[] = [ "context", "off", "track" ];

/**
 * Parses the body of POST /playback/repeat.
 * @param body - The request body.
 * @returns The repeat mode.
 */
export function parseRepeatRequest(body: unknown): RepeatMode {

  const mode = REPEAT_MODES.find((candidate) => candidate === asObject(body).mode);

  if(!mode) {

    throw new InvalidRequestError("mode must be one of " + REPEAT_MODES.join(", "));
  }

  return mode;
}

const BACKEND_MODES: readonly BackendMode[] = [ "external", "internal" ];

/**
 * Parses the body of POST /playback/backend.
 * @param body - The request body.
 * @returns The backend mode to switch to.
 */
export function parseBackendRequest(body: unknown): BackendMode {

  const mode = BACKEND_MODES.find((candidate) => candidate === asObject(body).mode);

  if(!mode) {

    throw new InvalidRequestError("mode must be one of " + BACKEND_MODES.join(", "));
  }

  return mode;
}

/**
 * Creates the playback endpoints.
 * @param app - The Express application.
 * @param session - The playback session the routes drive.
 */
export function setupPlaybackEndpoints(app: Express, session: PlaybackSession): void {

  // Registers a POST route that runs one session operation and answers with the resulting snapshot.
  const command = (route: string, operation: (body: unknown) => Promise<void>): void => {

    app.post(route, async (req: Request, res: Response): Promise<void> => {

      try {

        await operation(req.body);

        res.json(session.snapshot());
      } catch(error) {

        sendPlaybackError(res, error);
      }
    });
  };

  // The snapshot holds the last state a backend pushed. With ?refresh=true the state is read from the backend first, which costs a Web API call for the remote
  // backends.
  app.get("/playback", async (req: Request, res: Response): Promise<void> => {

    if((req.query.refresh === "true") && session.backend.isReady) {

      try {

        await session.refreshState();
      } catch(error) {

        sendPlaybackError(res, error);

        return;
      }
    }

    res.json(session.snapshot());
  });

  app.get("/playback/devices", async (_req: Request, res: Response): Promise<void> => {

    try {

      res.json({ devices: await session.listDevices() });
    } catch(error) {

      sendPlaybackError(res, error);
    }
  });

  command("/playback/backend", async (body) => {

    await session.select(parseBackendRequest(body));
  });

  command("/playback/initialize", async () => session.initialize());
  command("/playback/stop", async () => session.stop());

  command("/playback/play", async (body) => {

    const { positionMs, trackUri } = parsePlayRequest(body);

    await session.play(trackUri, positionMs);
  });

  command("/playback/pause", async () => session.pause());
  command("/playback/resume", async () => session.resume());
  command("/playback/next", async () => session.next());
  command("/playback/previous", async () => session.previous());
  command("/playback/seek", async (body) => session.seek(parseSeekRequest(body)));
  command("/playback/volume", async (body) => session.setVolume(parseVolumeRequest(body)));
  command("/playback/shuffle", async (body) => session.setShuffle(parseShuffleRequest(body)));
  command("/playback/repeat", async (body) => session.setRepeat(parseRepeatRequest(body)));
}
