/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.ts: Express application builder for Slideshow Player.
 */
import { CONFIG, displayConfiguration, initializeConfiguration, validateConfiguration } from "./config/index.js";
import type { Express, NextFunction, Request, Response } from "express";
import { LOG, createMorganStream, formatDuration, formatError, setConsoleLogging, startDiagnosticCapture, stopDiagnosticCapture } from "./utils/index.js";
import { getLogFilePath, getResourcesDir } from "./config/paths.js";
import { initializeFileLogger, shutdownFileLogger } from "./utils/fileLogger.js";
import type { Nullable } from "./types/index.js";
import { PlaybackSession } from "./playback/session.js";
import { PlayerSupervisor } from "./player/supervisor.js";
import type { RouteContext } from "./routes/index.js";
import type { Server } from "http";
import { SpotifyWebApi } from "./spotify/webApi.js";
import consoleStamp from "console-stamp";
import { createPlaybackBackendFactory } from "./playback/factory.js";
import { createTokenProvider } from "./spotify/tokens.js";
import express from "express";
import morgan from "morgan";
import { setupRoutes } from "./routes/index.js";

/*
 * LOGGING MODE
 *
 * The logging mode is set at startup based on the --console CLI flag. When console logging is enabled, timestamps are added via console-stamp and output goes to
 * stdout/stderr. When file logging is used (the default), output goes to <data-dir>/slideshow-player.log.
 */

let usingConsoleLogging = false;

/*
 * APPLICATION STATE
 *
 * The HTTP server is kept so graceful shutdown can close it.
 */

let server: Nullable<Server> = null;

/**
 * Options the entry point passes in from the command line. CLI values override the merged configuration.
 */
export interface ServerOptions {

  consoleLogging: boolean;
  logFile?: string;
  port?: number;
}

/*
 * GRACEFUL SHUTDOWN
 *
 * On SIGINT or SIGTERM the playback backend is stopped first, which pauses playback and terminates the player process, then the HTTP server is closed and the file
 * log flushed.
 */

/**
 * Sets up signal handlers for graceful shutdown.
 * @param session - The playback session whose backend is stopped on the way out.
 */
function setupGracefulShutdown(session: PlaybackSession): void {

  let shutdownInProgress = false;

  async function shutdown(): Promise<void> {

    // A second signal while we are already shutting down is ignored.
    if(shutdownInProgress) {

      return;
    }

    shutdownInProgress = true;

    LOG.info("Shutting down after %s.", formatDuration(process.uptime() * 1000));

    try {

      await session.stop();
    } catch(error) {

      LOG.error("Error stopping the playback backend during shutdown: %s.", formatError(error));
    }

    stopDiagnosticCapture();

    if(server) {

      server.close((): void => {

        LOG.info("HTTP server closed successfully.");
      });
    }

    if(!usingConsoleLogging) {

      shutdownFileLogger();
    }

    process.exit(0);
  }

  process.on("SIGINT", (): void => {

    void shutdown();
  });

  process.on("SIGTERM", (): void => {

    void shutdown();
  });
}

/*
 * APPLICATION BUILDER
 */

/**
 * Creates and configures the Express application with request logging and all routes.
 * @param context - The playback session and player supervisor the routes operate on.
 * @returns The configured Express application.
 */
export function buildApp(context: RouteContext): Express {

  const app = express();

  app.use(express.json());

  // Morgan output goes through morganStream, which timestamps lines the same way in console and file modes.
  if(CONFIG.logging.httpLogLevel !== "none") {

    const morganFormat = ":method :url from :remote-addr responded :status in :response-time ms.";
    const morganStream = createMorganStream();

    if(CONFIG.logging.httpLogLevel === "errors") {

      app.use(morgan(morganFormat, {

        skip: (_req, res): boolean => res.statusCode < 400,
        stream: morganStream
      }));
    } else if(CONFIG.logging.httpLogLevel === "filtered") {

      // Commands are always logged. Successful polling of status endpoints is not.
      const pollingPatterns = [ "/diagnostics", "/health", "/logs", "/playback" ];

      app.use(morgan(morganFormat, {

        skip: (req, res): boolean => {

          if((res.statusCode >= 400) || (req.method !== "GET")) {

            return false;
          }

          const url = req.originalUrl || req.url;

          return pollingPatterns.some((pattern) => url.startsWith(pattern));
        },

        stream: morganStream
      }));
    } else {

      app.use(morgan(morganFormat, { stream: morganStream }));
    }
  }

  setupRoutes(app, context);

  // Express recognizes error handlers by their four parameters.
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction): void => {

    LOG.error("Unhandled error in request: %s.", formatError(err));

    if(!res.headersSent) {

      res.status(500).json({ error: "Internal server error." });
    }
  });

  return app;
}

/**
 * Brings the configured backend up after the server is listening. The internal player is pre-warmed when enabled so that it is ready by the time the first
 * slideshow starts. The remote device backend needs no warm-up.
 * @param session - The playback session.
 */
async function startPlayback(session: PlaybackSession): Promise<void> {

  const mode = CONFIG.playback.backend;

  if(mode === "internal") {

    if(CONFIG.playback.prewarm) {

      await session.prewarm(mode);

      return;
    }

    await session.select(mode);

    return;
  }

  await session.select(mode);
  await session.initialize();
}

/*
 * SERVER STARTUP
 */

/**
 * Initializes configuration and logging, builds the playback stack, and starts the HTTP server.
 * @param options - Options from the command line.
 */
export async function startServer(options: ServerOptions): Promise<void> {

  // Set logging mode early before any log calls.
  usingConsoleLogging = options.consoleLogging;
  setConsoleLogging(options.consoleLogging);

  if(options.consoleLogging) {

    consoleStamp.default(console, { format: ":date(yyyy/mm/dd HH:MM:ss.l)" });
  }

  try {

    await initializeConfiguration();

    if(options.port !== undefined) {

      CONFIG.server.port = options.port;
    }

    if(options.logFile) {

      CONFIG.paths.logFile = options.logFile;
    }

    validateConfiguration();
  } catch(error) {

    LOG.error(formatError(error));

    process.exit(1);
  }

  if(!options.consoleLogging) {

    await initializeFileLogger(getLogFilePath(CONFIG), CONFIG.logging.maxSize);
  }

  displayConfiguration();
  startDiagnosticCapture();

  const supervisor = new PlayerSupervisor({

    debugPort: CONFIG.player.debugPort,
    devRepoPath: CONFIG.player.devRepoPath,
    helperName: CONFIG.player.helperName,
    launchMode: CONFIG.player.launchMode,
    resourcesDir: getResourcesDir(CONFIG)
  });

  const tokens = createTokenProvider(CONFIG);
  const api = tokens ? new SpotifyWebApi({ baseUrl: CONFIG.spotify.apiBaseUrl, requestTimeout: CONFIG.spotify.requestTimeout, tokens }) : null;
  const session = new PlaybackSession({ api, factory: createPlaybackBackendFactory(CONFIG, supervisor), tokens });

  if(!tokens) {

    LOG.warn("No Spotify credentials are configured. Playback stays disabled until SPOTIFY_ACCESS_TOKEN or SPOTIFY_REFRESH_TOKEN is set.");
  }

  setupGracefulShutdown(session);

  const app = buildApp({ session, supervisor });

  server = app.listen(CONFIG.server.port, CONFIG.server.host, (): void => {

    LOG.info("Slideshow Player is now listening on %s:%s.", CONFIG.server.host, CONFIG.server.port);
  });

  if(tokens) {

    startPlayback(session).catch((error: unknown): void => {

      LOG.error("Failed to start the %s playback backend: %s.", CONFIG.playback.backend, formatError(error));
    });
  }
}
