/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * health.ts: Health check route for Slideshow Player.
 */
import type { Express, Request, Response } from "express";
import type { HealthStatus } from "../types/index.js";
import type { PlaybackSession } from "../playback/session.js";
import type { PlayerSupervisor } from "../player/supervisor.js";
import { getPackageVersion } from "../utils/index.js";

/* The health endpoint reports the playback backend's readiness alongside the player process and memory figures. A degraded backend (one that lost its player
 * process or its device) is unhealthy and answers with HTTP 503 so monitoring picks it up by status code. A backend that is still coming up is reported as degraded
 * with 200.
 */

/**
 * Computes the health report from the session and the player supervisor.
 * @param session - The playback session.
 * @param supervisor - The player process supervisor.
 * @returns The health status.
 */
export function getHealthStatus(session: PlaybackSession, supervisor: PlayerSupervisor): HealthStatus {

  const backend = session.backend;
  const memoryUsage = process.memoryUsage();

  let status: HealthStatus["status"] = "healthy";
  let message: string | undefined;

  if(backend.readiness === "Degraded") {

    status = "unhealthy";
    message = "Playback backend is degraded.";
  } else if(!backend.isReady) {

    status = "degraded";
    message = [ "Playback backend is not ready (", backend.readiness, ")." ].join("");
  } else if(backend.mode === "none") {

    message = "No playback backend selected.";
  }

  const health: HealthStatus = {

    backend: {

      deviceId: backend.deviceId,
      mode: backend.mode,
      readiness: backend.readiness
    },
    memory: {

      heapTotal: memoryUsage.heapTotal,
      heapUsed: memoryUsage.heapUsed,
      rss: memoryUsage.rss
    },
    player: {

      pid: supervisor.pid,
      running: supervisor.isRunning
    },
    status: status,
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    version: getPackageVersion()
  };

  if(message) {

    health.message = message;
  }

  return health;
}

/**
 * Creates a health check endpoint for monitoring application status.
 * @param app - The Express application.
 * @param session - The playback session.
 * @param supervisor - The player process supervisor.
 */
export function setupHealthEndpoint(app: Express, session: PlaybackSession, supervisor: PlayerSupervisor): void {

  app.get("/health", (_req: Request, res: Response): void => {

    const health = getHealthStatus(session, supervisor);

    res.status((health.status === "unhealthy") ? 503 : 200).json(health);
  });
}
