/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Type definitions for Slideshow Player.
 */

/**
 * A utility type that represents a value that can be null.
 * @typeParam T - The type that can be nullable.
 */
export type Nullable<T> = T | null;

/*
 * CONFIGURATION TYPES
 *
 * These interfaces define the structure of the application configuration. The Config interface is the root configuration object, with nested interfaces for each
 * functional area. Values come from defaults, the user config file, environment variables, and CLI flags, in increasing order of priority, and are validated at
 * startup before the server accepts connections.
 */

/**
 * How the player runtime is launched. Dev mode runs the player's own repository with its package manager; packaged mode runs the helper executable shipped in the
 * application's resources directory.
 */
export type LaunchMode = "dev" | "packaged";

/**
 * Which playback backend the session selects.
 */
export type BackendMode = "external" | "internal";

/**
 * Player runtime configuration: how the process is launched and how the control channel reaches it.
 */
export interface PlayerConfig {

  // Time in milliseconds allowed for a single player command evaluation before it is abandoned. Environment variable: PLAYER_COMMAND_TIMEOUT.
  commandTimeout: number;

  // Time in milliseconds to keep retrying the DevTools attach while the freshly spawned runtime opens its debugging port. Environment variable:
  // PLAYER_CONNECT_TIMEOUT.
  connectTimeout: number;

  // Time in milliseconds allowed for the player page to load. Environment variable: PLAYER_CONTENT_TIMEOUT.
  contentTimeout: number;

  // Local DevTools port the runtime listens on. Passed to the process as an argument and in its environment. Environment variable: PLAYER_DEBUG_PORT.
  debugPort: number;

  // The display name the player registers under as a Connect device. Discovery matches remote devices against this name exactly. Environment variable:
  // PLAYER_DEVICE_NAME.
  deviceName: string;

  // Absolute path of the player's repository, required in dev mode. Environment variable: PLAYER_DEV_PATH.
  devRepoPath: Nullable<string>;

  // Name of the packaged helper executable. Environment variable: PLAYER_HELPER_NAME.
  helperName: string;

  // Launch mode. Environment variable: PLAYER_LAUNCH_MODE.
  launchMode: LaunchMode;

  // Explicit player page URL. When null, the page is served by the backend at <backendBaseUrl>/internal-player. Environment variable: PLAYER_PAGE_URL.
  pageUrl: Nullable<string>;

  // Directory holding the packaged helper. When null, the resources directory next to the installed package is used. Environment variable: PLAYER_RESOURCES_DIR.
  resourcesDir: Nullable<string>;
}

/**
 * Spotify Web API and companion backend configuration.
 */
export interface SpotifyConfig {

  // Initial access token. Environment variable: SPOTIFY_ACCESS_TOKEN.
  accessToken: Nullable<string>;

  // Base URL of the Spotify Web API. Environment variable: SPOTIFY_API_BASE_URL.
  apiBaseUrl: string;

  // Base URL of the companion backend that serves the player page and refreshes tokens. Environment variable: BACKEND_BASE_URL.
  backendBaseUrl: Nullable<string>;

  // Refresh token used to obtain new access tokens through the backend. Environment variable: SPOTIFY_REFRESH_TOKEN.
  refreshToken: Nullable<string>;

  // Per-request timeout in milliseconds for Web API and backend calls. Environment variable: SPOTIFY_REQUEST_TIMEOUT.
  requestTimeout: number;
}

/**
 * Playback session configuration.
 */
export interface PlaybackConfig {

  // Backend selected at startup. Environment variable: PLAYBACK_BACKEND.
  backend: BackendMode;

  // Whether to pre-warm the selected backend as soon as the server starts. Environment variable: PLAYBACK_PREWARM.
  prewarm: boolean;
}

/**
 * HTTP server configuration.
 */
export interface ServerConfig {

  // Address to bind. The control surface is meant for the local host application, so the default binds to loopback only. Environment variable: HOST.
  host: string;

  // TCP port. Environment variable: PORT.
  port: number;
}

/**
 * HTTP request logging level.
 */
export type HttpLogLevel = "all" | "errors" | "filtered" | "none";

/**
 * Logging configuration.
 */
export interface LoggingConfig {

  // Which HTTP requests morgan records. Environment variable: HTTP_LOG_LEVEL.
  httpLogLevel: HttpLogLevel;

  // Maximum log file size in bytes before trimming. Environment variable: LOG_MAX_SIZE.
  maxSize: number;
}

/**
 * Filesystem locations.
 */
export interface PathsConfig {

  // Absolute log file path. When null, the log lives in the data directory. Environment variable: SLIDESHOW_PLAYER_LOG_FILE.
  logFile: Nullable<string>;
}

/**
 * Root configuration object.
 */
export interface Config {

  logging: LoggingConfig;
  paths: PathsConfig;
  playback: PlaybackConfig;
  player: PlayerConfig;
  server: ServerConfig;
  spotify: SpotifyConfig;
}

/*
 * PLAYBACK TYPES
 *
 * These types are the backend-agnostic playback vocabulary. Every backend reports its state as a PlaybackState and its readiness through BackendReadiness, so the
 * rest of the application never needs to know which backend is active.
 */

/**
 * Normalized playback snapshot.
 */
export interface PlaybackState {

  artistName: Nullable<string>;
  durationMs: number;
  isBuffering: boolean;
  isPlaying: boolean;
  positionMs: number;
  trackName: Nullable<string>;
  trackUri: Nullable<string>;
}

/**
 * The idle state: no track, nothing playing. This is the state every backend reports before a track is loaded.
 */
export const IDLE_PLAYBACK_STATE: Readonly<PlaybackState> = Object.freeze({

  artistName: null,
  durationMs: 0,
  isBuffering: false,
  isPlaying: false,
  positionMs: 0,
  trackName: null,
  trackUri: null
});

/**
 * Readiness stages of the internal backend. Simpler backends only ever report "Uninitialized" or "Ready".
 */
export type BackendReadiness = "ConnectingDevice" | "ContentLoading" | "CredentialPending" | "Degraded" | "DiscoveringDevice" | "ProcessStarting" | "Ready" |
  "Uninitialized";

/**
 * Repeat modes understood by the Web API.
 */
export type RepeatMode = "context" | "off" | "track";

/**
 * A Connect device as reported by the Web API device list.
 */
export interface RemoteDevice {

  id: string;
  isActive: boolean;
  isRestricted: boolean;
  name: string;
  type: string;
  volumePercent: Nullable<number>;
}

/*
 * CONTROL EVENTS
 *
 * Inbound messages from the player page decode into this closed union. Anything that cannot be decoded becomes an Unknown event carrying the raw payload.
 */

export type ControlEvent =
  { deviceId: string; type: "Ready" } |
  { artistName: Nullable<string>; durationMs: number; isPlaying: boolean; positionMs: number; trackName: Nullable<string>; trackUri: Nullable<string>;
    type: "StateChanged" } |
  { code: string; message: string; type: "Error" } |
  { type: "ContentLoaded" } |
  { type: "CredentialAck" } |
  { deviceId: Nullable<string>; type: "NotReady" } |
  { ok: boolean; type: "ConnectResult" } |
  { raw: unknown; type: "Unknown" };

export type ControlEventType = ControlEvent["type"];

/*
 * HEALTH TYPES
 */

/**
 * Response body of the /health endpoint.
 */
export interface HealthStatus {

  backend: {

    deviceId: Nullable<string>;
    mode: BackendMode | "none";
    readiness: BackendReadiness;
  };
  memory: {

    heapTotal: number;
    heapUsed: number;
    rss: number;
  };
  message?: string;
  player: {

    pid: Nullable<number>;
    running: boolean;
  };
  status: "degraded" | "healthy" | "unhealthy";
  timestamp: string;

  // Seconds since the process started.
  uptime: number;
  version: string;
}
