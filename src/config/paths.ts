/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * paths.ts: Centralized filesystem path resolution for Slideshow Player.
 */
import type { Config } from "../types/index.js";
import { getPackageRoot } from "../utils/index.js";
import os from "node:os";
import path from "node:path";

/* This module is the single source of truth for filesystem paths. The data directory is resolved once at startup via initializeDataDir(), before config.json is
 * loaded, because the data directory determines where config.json lives.
 *
 * Resolution priority for the data directory (highest to lowest):
 *   1. CLI flag (--data-dir)
 *   2. Environment variable (SLIDESHOW_PLAYER_DATA_DIR)
 *   3. Default (~/.slideshow-player)
 *
 * The log file and the helper resources directory are stored in Config and resolved after config loading.
 */

let resolvedDataDir: string | undefined;

/**
 * Initializes the data directory from the CLI flag, environment variable, or default. May be called a second time with a CLI flag to override the initial
 * resolution.
 * @param cliDataDir - Optional data directory from the --data-dir CLI flag.
 * @throws If SLIDESHOW_PLAYER_DATA_DIR is set to a relative path.
 */
export function initializeDataDir(cliDataDir?: string): void {

  const envDataDir = process.env.SLIDESHOW_PLAYER_DATA_DIR;

  if(cliDataDir) {

    resolvedDataDir = cliDataDir;
  } else if(envDataDir) {

    if(!path.isAbsolute(envDataDir)) {

      throw new Error("SLIDESHOW_PLAYER_DATA_DIR must be an absolute path, got: " + envDataDir);
    }

    resolvedDataDir = envDataDir;
  } else {

    resolvedDataDir = path.join(os.homedir(), ".slideshow-player");
  }
}

/**
 * Returns the resolved data directory. Throws if called before initializeDataDir().
 */
export function getDataDir(): string {

  if(!resolvedDataDir) {

    throw new Error("Data directory not initialized. Call initializeDataDir() first.");
  }

  return resolvedDataDir;
}

/**
 * Returns the path to config.json inside the data directory.
 */
export function getConfigFilePath(): string {

  return path.join(getDataDir(), "config.json");
}

/**
 * Returns the log file path: config.paths.logFile when set, otherwise slideshow-player.log in the data directory.
 * @param config - The application configuration.
 */
export function getLogFilePath(config: Config): string {

  return config.paths.logFile ?? path.join(getDataDir(), "slideshow-player.log");
}

/**
 * Returns the directory the packaged player helper is looked up in: config.player.resourcesDir when set, otherwise the resources directory shipped with the
 * package.
 * @param config - The application configuration.
 */
export function getResourcesDir(config: Config): string {

  return config.player.resourcesDir ?? path.join(getPackageRoot(), "resources");
}
