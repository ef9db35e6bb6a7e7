/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Route aggregator for Slideshow Player.
 */
import type { Express } from "express";
import type { PlaybackSession } from "../playback/session.js";
import type { PlayerSupervisor } from "../player/supervisor.js";
import { setupDiagnosticsEndpoint } from "./diagnostics.js";
import { setupHealthEndpoint } from "./health.js";
import { setupLogsEndpoint } from "./logs.js";
import { setupPlaybackEndpoints } from "./playback.js";

/**
 * What the routes operate on. Built once at startup by the application.
 */
export interface RouteContext {

  session: PlaybackSession;
  supervisor: PlayerSupervisor;
}

/**
 * Configures all HTTP endpoints on the Express application.
 * @param app - The Express application.
 * @param context - The playback session and the player supervisor.
 */
export function setupRoutes(app: Express, context: RouteContext): void {

  setupDiagnosticsEndpoint(app);
  setupHealthEndpoint(app, context.session, context.supervisor);
  setupLogsEndpoint(app);
  setupPlaybackEndpoints(app, context.session);
}

export { getHealthStatus, setupHealthEndpoint } from "./health.js";
export { httpStatusForError, setupPlaybackEndpoints } from "./playback.js";
export { setupDiagnosticsEndpoint } from "./diagnostics.js";
export { setupLogsEndpoint } from "./logs.js";
