#!/usr/bin/env node
/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Entry point for Slideshow Player.
 */
import { CONFIG_METADATA, DEFAULTS, getNestedValue } from "./config/userConfig.js";
import { DEBUG_CATEGORIES, LOG, formatError, getPackageVersion, initDebugFilter, setDebugLogging } from "./utils/index.js";
import { flushLogBufferSync } from "./utils/fileLogger.js";
import { initializeDataDir } from "./config/paths.js";
import path from "node:path";
import { startServer } from "./app.js";

/* A failed Web API call or a player page that vanished mid-command must not take the control server down with it. These handlers log and keep the process
 * running. Player process crashes are handled by the supervisor's exit listener.
 */

process.on("unhandledRejection", (reason: unknown): void => {

  LOG.error("Unhandled promise rejection: %s.", formatError(reason));
});

process.on("uncaughtException", (error: Error): void => {

  LOG.error("Uncaught exception: %s.", formatError(error));
});

/**
 * Prints usage information to the console.
 */
function printUsage(): void {

  /* eslint-disable no-console */
  console.log("Usage: slideshow-player [options]");
  console.log("");
  console.log("Options:");
  console.log("  -c, --console                   Log to console instead of file");
  console.log("  -d, --debug                     Enable debug logging (verbose output for troubleshooting)");
  console.log("  -h, --help                      Show this help message");
  console.log("  -p, --port <port>               Set server port (default: 5690)");
  console.log("  -v, --version                   Show version number");
  console.log("  --data-dir <path>               Set data directory (default: ~/.slideshow-player)");
  console.log("  --list-env                      List all environment variables");
  console.log("  --log-file <path>               Set log file path (default: <data-dir>/slideshow-player.log)");
  console.log("");
  console.log("Common Environment Variables:");
  console.log("  BACKEND_BASE_URL                Companion backend base URL (player page and token refresh)");
  console.log("  PLAYBACK_BACKEND                Playback backend: internal or external");
  console.log("  PLAYER_DEV_PATH                 Player repository path, required in dev launch mode");
  console.log("  PLAYER_LAUNCH_MODE              Player launch mode: packaged or dev");
  console.log("  PORT                            HTTP server port");
  console.log("  SLIDESHOW_PLAYER_DATA_DIR       Data directory path (default: ~/.slideshow-player)");
  console.log("  SLIDESHOW_PLAYER_DEBUG          Debug category filter (e.g., 'channel:events', 'player', '*,-player:output')");
  console.log("  SPOTIFY_ACCESS_TOKEN            Spotify access token");
  console.log("  SPOTIFY_REFRESH_TOKEN           Spotify refresh token, exchanged through the companion backend");
  console.log("");
  console.log("Debug Categories:");

  for(const entry of DEBUG_CATEGORIES) {

    console.log("  " + entry.category.padEnd(32) + entry.description);
  }

  console.log("");
  console.log("  Run 'slideshow-player --list-env' for a complete list of all environment variables.");
  /* eslint-enable no-console */
}

/**
 * Prints every environment variable CONFIG_METADATA knows about, grouped by category, with its default.
 */
function printEnvironmentVariables(): void {

  /* eslint-disable no-console */

  const categoryOrder: { displayName: string; key: string }[] = [
    { displayName: "Server", key: "server" },
    { displayName: "Logging", key: "logging" },
    { displayName: "Paths", key: "paths" },
    { displayName: "Playback", key: "playback" },
    { displayName: "Player", key: "player" },
    { displayName: "Spotify", key: "spotify" }
  ];

  // Null defaults that resolve at runtime.
  const dynamicDefaults: Record<string, string> = {

    "paths.logFile": "<data-dir>/slideshow-player.log",
    "player.pageUrl": "<backend base URL>/internal-player",
    "player.resourcesDir": "<package>/resources"
  };

  console.log("Slideshow Player Environment Variables");
  console.log("");
  console.log("All settings can also be configured in config.json in the data directory.");
  console.log("Priority: CLI flags > environment variables > config.json > defaults.");

  for(const category of categoryOrder) {

    const settings = CONFIG_METADATA[category.key] ?? [];

    console.log("");
    console.log(category.displayName + ":");

    let first = true;

    for(const setting of settings) {

      if(!setting.envVar) {

        continue;
      }

      if(!first) {

        console.log("");
      }

      first = false;

      // First sentence only.
      const periodSpace = setting.description.indexOf(". ");

      console.log("  " + setting.envVar);
      console.log("    " + ((periodSpace !== -1) ? setting.description.slice(0, periodSpace + 1) : setting.description));

      const defaultValue = getNestedValue(DEFAULTS, setting.path);
      let defaultStr = dynamicDefaults[setting.path] ?? String(defaultValue);

      if((typeof defaultValue === "number") && setting.unit) {

        defaultStr = defaultStr + " (" + setting.unit + ")";
      }

      console.log("    Default: " + defaultStr);
    }
  }

  // Resolved before config.json can be read, so they live outside CONFIG_METADATA.
  console.log("");
  console.log("Special:");
  console.log("  SLIDESHOW_PLAYER_DATA_DIR");
  console.log("    Data directory path. Must be an absolute path.");
  console.log("    Default: ~/.slideshow-player");
  console.log("");
  console.log("  SLIDESHOW_PLAYER_DEBUG");
  console.log("    Debug category filter (e.g., 'channel:events', 'player', '*,-player:output').");
  console.log("    Default: (disabled)");

  /* eslint-enable no-console */
}

/**
 * Result of parsing command-line arguments. CLI flags have the highest priority in the configuration merge order.
 */
export interface ParsedArgs {

  consoleLogging: boolean;
  dataDir?: string;
  debugLogging: boolean;
  logFile?: string;
  port?: number;
}

/**
 * Exits with an error unless the flag was given an absolute path.
 * @param flag - The CLI flag name for the error message.
 * @param value - The path value, undefined when the flag was the last argument.
 * @returns The validated path.
 */
function requireAbsolutePath(flag: string, value: string | undefined): string {

  if(!value) {

    // eslint-disable-next-line no-console
    console.error("Error: " + flag + " requires a path argument.");

    process.exit(1);
  }

  if(!path.isAbsolute(value)) {

    // eslint-disable-next-line no-console
    console.error("Error: " + flag + " requires an absolute path, got: " + value);

    process.exit(1);
  }

  return value;
}

/**
 * Parses command-line arguments. Values go into ParsedArgs rather than CONFIG so that startServer() can apply them after the configuration merge.
 * @returns Parsed argument flags and values.
 */
function parseArgs(): ParsedArgs {

  const args = process.argv.slice(2);
  const parsed: ParsedArgs = { consoleLogging: false, debugLogging: false };

  for(let i = 0; i < args.length; i++) {

    const arg = args[i];

    if((arg === "-c") || (arg === "--console")) {

      parsed.consoleLogging = true;
    }

    if((arg === "-d") || (arg === "--debug")) {

      parsed.debugLogging = true;
    }

    if((arg === "-h") || (arg === "--help")) {

      printUsage();

      process.exit(0);
    }

    if((arg === "-p") || (arg === "--port")) {

      const port = parseInt(args[++i] ?? "", 10);

      if(!isNaN(port)) {

        parsed.port = port;
      }
    }

    if(arg === "--data-dir") {

      parsed.dataDir = requireAbsolutePath("--data-dir", args[++i]);
    }

    if(arg === "--log-file") {

      parsed.logFile = requireAbsolutePath("--log-file", args[++i]);
    }

    if((arg === "-v") || (arg === "--version")) {

      // eslint-disable-next-line no-console
      console.log("Slideshow Player v" + getPackageVersion());

      process.exit(0);
    }
  }

  return parsed;
}

if(process.argv.slice(2).includes("--list-env")) {

  printEnvironmentVariables();

  process.exit(0);
}

const parsedArgs = parseArgs();

try {

  initializeDataDir(parsedArgs.dataDir);
} catch(error) {

  // eslint-disable-next-line no-console
  console.error("Error: " + formatError(error));

  process.exit(1);
}

// SLIDESHOW_PLAYER_DEBUG takes precedence over --debug, since it can name individual categories.
const debugEnv = process.env.SLIDESHOW_PLAYER_DEBUG;

if(debugEnv) {

  initDebugFilter(debugEnv);
} else if(parsedArgs.debugLogging) {

  setDebugLogging(true);
}

// The exit event runs synchronously, so buffered log lines from a fatal startup error are written here rather than by the async shutdown path.
process.on("exit", (): void => {

  flushLogBufferSync();
});

startServer({ consoleLogging: parsedArgs.consoleLogging, logFile: parsedArgs.logFile, port: parsedArgs.port }).catch((error: unknown): void => {

  LOG.error("Fatal startup error occurred: %s.", formatError(error));

  process.exit(1);
});
