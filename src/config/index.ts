/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Configuration management for Slideshow Player.
 */
import type { Config, Nullable } from "../types/index.js";
import { CONFIG_METADATA, DEFAULTS, getEnvOverrides, getNestedValue, loadUserConfig, mergeConfiguration } from "./userConfig.js";
import { LOG, redactCredential } from "../utils/index.js";
import path from "node:path";

/*
 * CONFIGURATION
 *
 * The CONFIG object centralizes all tunable parameters. Priority, highest to lowest:
 *
 * 1. CLI flags (applied by the entry point after initialization)
 * 2. Environment variables
 * 3. User config file (<data-dir>/config.json)
 * 4. Hard-coded defaults (defined in userConfig.ts)
 *
 * The settings are organized by functional area:
 *
 * - server: Network binding for the control server
 * - player: How the player runtime is launched and reached
 * - spotify: Web API endpoint, companion backend, and credentials
 * - playback: Backend selection and pre-warming
 * - logging, paths: Log output
 *
 * Configuration is initialized at startup via initializeConfiguration() and checked with validateConfiguration() before the server starts.
 */

// Starts as a copy of DEFAULTS and is replaced by the merged configuration.
export let CONFIG: Config = structuredClone(DEFAULTS);

/**
 * Loads the user config file, merges it with defaults, and applies environment variable overrides. Must run before anything reads CONFIG.
 */
export async function initializeConfiguration(): Promise<void> {

  const result = await loadUserConfig();

  CONFIG = mergeConfiguration(result.config);

  LOG.info("Configuration initialized from defaults, user config, and environment variables.");
}

/**
 * Returns a deep copy of the default configuration.
 */
export function getDefaults(): Config {

  return structuredClone(DEFAULTS);
}

/**
 * Resolves the URL of the page the player runtime loads: the explicit player.pageUrl, or the backend's internal player route.
 * @param config - The application configuration.
 * @param backendBaseUrl - The backend base URL handed to the player process, if any.
 * @returns The page URL, or null when neither is available.
 */
export function getPlayerPageUrl(config: Config, backendBaseUrl: Nullable<string>): Nullable<string> {

  if(config.player.pageUrl) {

    return config.player.pageUrl;
  }

  if(!backendBaseUrl) {

    return null;
  }

  return backendBaseUrl.replace(/\/+$/, "") + "/internal-player";
}

/*
 * CONFIGURATION VALIDATION
 *
 * Validation collects every error before throwing, so one restart is enough to see all problems. Numeric ranges and enumerated values come from CONFIG_METADATA;
 * the cross-field rules are below.
 */

/**
 * Validates that a value is a positive integer within an optional range.
 * @param name - The configuration name for error messages, typically the environment variable name.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validatePositiveInt(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if(!Number.isInteger(value) || (value < 1)) {

    return [ name, " must be a positive integer, got: ", String(value) ].join("");
  }

  if((min !== undefined) && (value < min)) {

    return [ name, " must be at least ", String(min), ", got: ", String(value) ].join("");
  }

  if((max !== undefined) && (value > max)) {

    return [ name, " must be at most ", String(max), ", got: ", String(value) ].join("");
  }

  return null;
}

function isValidUrl(value: string): boolean {

  try {

    const url = new URL(value);

    return (url.protocol === "http:") || (url.protocol === "https:");
  } catch {

    return false;
  }
}

/**
 * Validates a configuration and throws if any value is invalid.
 * @param config - The configuration to validate. Defaults to CONFIG.
 * @throws If any configuration value is invalid. The message lists every invalid value.
 */
export function validateConfiguration(config: Config = CONFIG): void {

  const errors: string[] = [];

  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const name = setting.envVar ?? setting.path;
      const value = getNestedValue(config, setting.path);

      switch(setting.type) {

        case "integer":
        case "port": {

          const error = validatePositiveInt(name, (typeof value === "number") ? value : NaN, setting.min, setting.max);

          if(error) {

            errors.push(error);
          }

          break;
        }

        case "path": {

          if((value !== null) && ((typeof value !== "string") || !path.isAbsolute(value))) {

            errors.push([ name, " must be an absolute path, got: ", String(value) ].join(""));
          }

          break;
        }

        case "url": {

          if((value !== null) && ((typeof value !== "string") || !isValidUrl(value))) {

            errors.push([ name, " must be an http or https URL, got: ", String(value) ].join(""));
          }

          break;
        }

        case "boolean": {

          if(typeof value !== "boolean") {

            errors.push([ name, " must be true or false, got: ", String(value) ].join(""));
          }

          break;
        }

        default: {

          if((value !== null) && (typeof value !== "string")) {

            errors.push([ name, " must be a string, got: ", String(value) ].join(""));
          } else if(setting.validValues && ((value === null) || !setting.validValues.includes(value))) {

            errors.push([ name, " must be one of ", setting.validValues.join(", "), ", got: ", String(value) ].join(""));
          }

          break;
        }
      }
    }
  }

  if((config.player.launchMode === "dev") && !config.player.devRepoPath) {

    errors.push("PLAYER_DEV_PATH is required when PLAYER_LAUNCH_MODE is dev.");
  }

  if(!config.player.helperName.trim()) {

    errors.push("PLAYER_HELPER_NAME must not be empty.");
  }

  if(!config.player.deviceName.trim()) {

    errors.push("PLAYER_DEVICE_NAME must not be empty.");
  }

  // The player's DevTools port and the control server both bind locally.
  if(config.player.debugPort === config.server.port) {

    errors.push("PLAYER_DEBUG_PORT (" + String(config.player.debugPort) + ") conflicts with the server port.");
  }

  if(errors.length > 0) {

    throw new Error([ "Configuration validation failed:\n  ", errors.join("\n  ") ].join(""));
  }
}

/**
 * Logs the most commonly adjusted values at startup. Credentials appear only as redacted prefixes.
 */
export function displayConfiguration(): void {

  LOG.info("Starting Slideshow Player with configuration:");
  LOG.info("  Server: %s:%s", CONFIG.server.host, CONFIG.server.port);
  LOG.info("  Playback backend: %s%s", CONFIG.playback.backend, CONFIG.playback.prewarm ? " (pre-warmed)" : "");
  LOG.info("  Player launch mode: %s%s", CONFIG.player.launchMode, (CONFIG.player.launchMode === "dev") ? " (" + (CONFIG.player.devRepoPath ?? "") + ")" : "");
  LOG.info("  Player DevTools port: %s", CONFIG.player.debugPort);
  LOG.info("  Player device name: %s", CONFIG.player.deviceName);
  LOG.info("  Backend base URL: %s", CONFIG.spotify.backendBaseUrl ?? "none");
  LOG.info("  Access token: %s, refresh token: %s", redactCredential(CONFIG.spotify.accessToken), redactCredential(CONFIG.spotify.refreshToken));
  LOG.info("  Environment overrides: %s", [...getEnvOverrides().keys()].join(", ") || "none");
}
