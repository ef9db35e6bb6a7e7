/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.ts: User configuration file management for Slideshow Player.
 */
import type { Config, Nullable } from "../types/index.js";
import { LOG } from "../utils/index.js";
import fs from "node:fs";
import { getConfigFilePath } from "./paths.js";

const { promises: fsPromises } = fs;

/*
 * USER CONFIGURATION FILE
 *
 * Slideshow Player reads user configuration from config.json in its data directory (~/.slideshow-player by default). The configuration system is layered:
 *
 * 1. Hard-coded defaults (defined in DEFAULTS)
 * 2. User config file (<data-dir>/config.json)
 * 3. Environment variables
 * 4. CLI flags (applied by the entry point, highest priority)
 *
 * The host application sets environment variables when it launches us, while a developer running the service by hand can keep settings in the config file.
 */

/*
 * SETTING METADATA
 *
 * Each configurable setting has metadata describing its type, valid range, and environment variable. The merge walks this table, and --list-env prints it.
 */

/**
 * Metadata describing a single configuration setting. Defaults are not stored here; use getNestedValue(DEFAULTS, setting.path).
 */
export interface SettingMetadata {

  // Human-readable description.
  description: string;

  // Environment variable that can override this setting, or null if not overridable.
  envVar: Nullable<string>;

  // Maximum allowed value for numeric settings.
  max?: number;

  // Minimum allowed value for numeric settings.
  min?: number;

  // Dot-separated path to the setting (e.g., "player.debugPort").
  path: string;

  // Data type, used to parse environment values.
  type: "boolean" | "host" | "integer" | "path" | "port" | "string" | "url";

  // Valid values for enumerated string settings.
  validValues?: string[];

  // Unit of measurement for display.
  unit?: string;
}

/**
 * Metadata for all configurable settings, organized by category.
 */
export const CONFIG_METADATA: Record<string, SettingMetadata[]> = {

  logging: [
    {

      description: "HTTP request logging level. \"none\" disables logging, \"errors\" logs only 4xx/5xx responses, \"filtered\" skips the high-frequency status " +
        "endpoints, \"all\" logs everything.",
      envVar: "HTTP_LOG_LEVEL",
      path: "logging.httpLogLevel",
      type: "string",
      validValues: [ "none", "errors", "filtered", "all" ]
    },
    {

      description: "Maximum log file size. When exceeded, the file is trimmed to half this size keeping the most recent lines.",
      envVar: "LOG_MAX_SIZE",
      max: 104857600,
      min: 10240,
      path: "logging.maxSize",
      type: "integer",
      unit: "bytes"
    }
  ],

  paths: [
    {

      description: "Absolute path of the log file. Defaults to slideshow-player.log in the data directory.",
      envVar: "SLIDESHOW_PLAYER_LOG_FILE",
      path: "paths.logFile",
      type: "path"
    }
  ],

  playback: [
    {

      description: "Playback backend selected at startup. \"internal\" runs the bundled player, \"external\" drives whichever Connect device is active.",
      envVar: "PLAYBACK_BACKEND",
      path: "playback.backend",
      type: "string",
      validValues: [ "internal", "external" ]
    },
    {

      description: "Start the selected backend as soon as the server is up, so the first play command does not wait for the player to come up.",
      envVar: "PLAYBACK_PREWARM",
      path: "playback.prewarm",
      type: "boolean"
    }
  ],

  player: [
    {

      description: "How the player runtime is launched: \"packaged\" runs the helper executable, \"dev\" runs the player repository's dev script.",
      envVar: "PLAYER_LAUNCH_MODE",
      path: "player.launchMode",
      type: "string",
      validValues: [ "packaged", "dev" ]
    },
    {

      description: "Absolute path of the player repository. Required in dev mode.",
      envVar: "PLAYER_DEV_PATH",
      path: "player.devRepoPath",
      type: "path"
    },
    {

      description: "Name of the packaged helper executable.",
      envVar: "PLAYER_HELPER_NAME",
      path: "player.helperName",
      type: "string"
    },
    {

      description: "Directory holding the packaged helper. Defaults to the resources directory of the installed package.",
      envVar: "PLAYER_RESOURCES_DIR",
      path: "player.resourcesDir",
      type: "path"
    },
    {

      description: "Local DevTools port the player runtime listens on.",
      envVar: "PLAYER_DEBUG_PORT",
      max: 65535,
      min: 1,
      path: "player.debugPort",
      type: "port"
    },
    {

      description: "Time to keep retrying the DevTools attach after the player process starts.",
      envVar: "PLAYER_CONNECT_TIMEOUT",
      max: 120000,
      min: 1000,
      path: "player.connectTimeout",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Time allowed for the player page to load.",
      envVar: "PLAYER_CONTENT_TIMEOUT",
      max: 120000,
      min: 1000,
      path: "player.contentTimeout",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Time allowed for a single player command.",
      envVar: "PLAYER_COMMAND_TIMEOUT",
      max: 60000,
      min: 500,
      path: "player.commandTimeout",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Connect device name the player registers under. Discovery matches on this name exactly.",
      envVar: "PLAYER_DEVICE_NAME",
      path: "player.deviceName",
      type: "string"
    },
    {

      description: "Player page URL. Defaults to <backend base URL>/internal-player.",
      envVar: "PLAYER_PAGE_URL",
      path: "player.pageUrl",
      type: "url"
    }
  ],

  server: [
    {

      description: "TCP port for the control server.",
      envVar: "PORT",
      max: 65535,
      min: 1,
      path: "server.port",
      type: "port"
    },
    {

      description: "Address to bind the control server to.",
      envVar: "HOST",
      path: "server.host",
      type: "host"
    }
  ],

  spotify: [
    {

      description: "Base URL of the Spotify Web API.",
      envVar: "SPOTIFY_API_BASE_URL",
      path: "spotify.apiBaseUrl",
      type: "url"
    },
    {

      description: "Base URL of the companion backend that serves the player page and refreshes tokens.",
      envVar: "BACKEND_BASE_URL",
      path: "spotify.backendBaseUrl",
      type: "url"
    },
    {

      description: "Initial Spotify access token.",
      envVar: "SPOTIFY_ACCESS_TOKEN",
      path: "spotify.accessToken",
      type: "string"
    },
    {

      description: "Spotify refresh token, exchanged through the companion backend.",
      envVar: "SPOTIFY_REFRESH_TOKEN",
      path: "spotify.refreshToken",
      type: "string"
    },
    {

      description: "Timeout for a single Web API or backend request.",
      envVar: "SPOTIFY_REQUEST_TIMEOUT",
      max: 120000,
      min: 1000,
      path: "spotify.requestTimeout",
      type: "integer",
      unit: "ms"
    }
  ]
};

/**
 * User configuration with all fields optional. This is the structure of the config.json file.
 */
export interface UserConfig {

  logging?: Partial<Config["logging"]>;
  paths?: Partial<Config["paths"]>;
  playback?: Partial<Config["playback"]>;
  player?: Partial<Config["player"]>;
  server?: Partial<Config["server"]>;
  spotify?: Partial<Config["spotify"]>;
}

/**
 * Result of loading user config.
 */
export interface UserConfigLoadResult {

  // The loaded configuration (empty object if the file is missing or unparseable).
  config: UserConfig;

  // True if the config file exists but contains invalid JSON.
  parseError: boolean;

  // Error message if parseError is true.
  parseErrorMessage?: string;
}

/**
 * Loads user configuration from the config file. A missing file yields an empty config; invalid JSON yields an empty config with parseError set.
 * @returns The loaded configuration with parse status.
 */
export async function loadUserConfig(): Promise<UserConfigLoadResult> {

  const configFilePath = getConfigFilePath();
  let content: string;

  try {

    content = await fsPromises.readFile(configFilePath, "utf-8");
  } catch(error) {

    if(error && (typeof error === "object") && ("code" in error) && (error.code === "ENOENT")) {

      return { config: {}, parseError: false };
    }

    LOG.warn("Failed to read configuration file %s: %s. Using defaults.", configFilePath, (error instanceof Error) ? error.message : String(error));

    return { config: {}, parseError: false };
  }

  try {

    const parsed: unknown = JSON.parse(content);

    if(!isRecord(parsed)) {

      throw new Error("top level must be an object");
    }

    return { config: parsed as UserConfig, parseError: false };
  } catch(parseError) {

    const message = (parseError instanceof Error) ? parseError.message : String(parseError);

    LOG.warn("Invalid JSON in configuration file %s: %s. Using defaults.", configFilePath, message);

    return { config: {}, parseError: true, parseErrorMessage: message };
  }
}

/**
 * Returns a map of setting paths to their environment variable values, for every setting currently overridden from the environment.
 */
export function getEnvOverrides(): Map<string, string> {

  const overrides = new Map<string, string>();

  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const envValue = setting.envVar ? process.env[setting.envVar] : undefined;

      if(envValue !== undefined) {

        overrides.set(setting.path, envValue);
      }
    }
  }

  return overrides;
}

/*
 * CONFIGURATION MERGING
 */

/**
 * Hard-coded default configuration values.
 */
export const DEFAULTS: Config = {

  logging: {

    httpLogLevel: "errors",
    maxSize: 1048576
  },

  paths: {

    logFile: null
  },

  playback: {

    backend: "internal",
    prewarm: true
  },

  player: {

    commandTimeout: 5000,
    connectTimeout: 15000,
    contentTimeout: 20000,
    debugPort: 9230,
    deviceName: "Electric Slideshow Internal Player",
    devRepoPath: null,
    helperName: "ElectricSlideshowInternalPlayer",
    launchMode: "packaged",
    pageUrl: null,
    resourcesDir: null
  },

  server: {

    host: "127.0.0.1",
    port: 5690
  },

  spotify: {

    accessToken: null,
    apiBaseUrl: "https://api.spotify.com/v1",
    backendBaseUrl: null,
    refreshToken: null,
    requestTimeout: 10000
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {

  return (value !== null) && (typeof value === "object") && !Array.isArray(value);
}

/**
 * Parses an environment variable value according to the setting type. Empty strings clear nullable path, URL, and token settings.
 * @param value - The raw environment variable value.
 * @param type - The expected type of the setting.
 * @returns The parsed value, or undefined if parsing fails.
 */
export function parseEnvValue(value: string, type: SettingMetadata["type"]): Nullable<boolean | number | string> | undefined {

  switch(type) {

    case "boolean": {

      const lower = value.toLowerCase();

      return (lower === "true") || (lower === "1") || (lower === "yes");
    }

    case "integer":
    case "port": {

      const num = parseInt(value, 10);

      return Number.isNaN(num) ? undefined : num;
    }

    case "path":
    case "url": {

      return (value.trim() === "") ? null : value;
    }

    default: {

      return value;
    }
  }
}

/**
 * Gets a value from a nested object using a dot-separated path.
 * @param obj - The object to read from.
 * @param settingPath - Dot-separated path (e.g., "player.debugPort").
 * @returns The value at the path, or undefined if not found.
 */
export function getNestedValue(obj: unknown, settingPath: string): unknown {

  let current: unknown = obj;

  for(const part of settingPath.split(".")) {

    if(!isRecord(current)) {

      return undefined;
    }

    current = current[part];
  }

  return current;
}

/**
 * Sets a value in a nested object using a dot-separated path, creating intermediate objects as needed.
 * @param obj - The object to modify.
 * @param settingPath - Dot-separated path (e.g., "player.debugPort").
 * @param value - The value to set.
 */
export function setNestedValue(obj: Record<string, unknown>, settingPath: string, value: unknown): void {

  const parts = settingPath.split(".");
  let current = obj;

  for(const part of parts.slice(0, -1)) {

    const next = current[part];

    if(isRecord(next)) {

      current = next;

      continue;
    }

    const created: Record<string, unknown> = {};

    current[part] = created;
    current = created;
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Merges user configuration with defaults and environment overrides. Priority: env vars > user config > defaults.
 * @param userConfig - User configuration from the config file.
 * @returns The merged configuration.
 */
export function mergeConfiguration(userConfig: UserConfig): Config {

  const config = structuredClone(DEFAULTS);

  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const userValue = getNestedValue(userConfig, setting.path);

      if(userValue !== undefined) {

        setNestedValue(config as unknown as Record<string, unknown>, setting.path, userValue);
      }
    }
  }

  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const envValue = setting.envVar ? process.env[setting.envVar] : undefined;

      if(envValue === undefined) {

        continue;
      }

      const parsedValue = parseEnvValue(envValue, setting.type);

      if(parsedValue !== undefined) {

        setNestedValue(config as unknown as Record<string, unknown>, setting.path, parsedValue);
      }
    }
  }

  return config;
}
