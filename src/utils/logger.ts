/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.ts: Logging utilities with color-coded output for Slideshow Player.
 */
import { initDebugFilter, isAnyDebugEnabled, isCategoryEnabled } from "./debugFilter.js";
import type { LogEntry } from "./logEmitter.js";
import df from "dateformat";
import { emitLogEntry } from "./logEmitter.js";
import { format } from "util";
import { writeLogEntry } from "./fileLogger.js";

// Terminal color codes. Warnings are yellow, errors red, debug cyan.
const ANSI_COLORS = {

  cyan: "\x1b[36m",
  red: "\x1b[31m",
  reset: "\x1b[0m",
  yellow: "\x1b[33m"
};

/* The logger writes either to the console (with colors, enabled by --console) or to the log file (the default). Either way, every entry is also broadcast on the
 * log emitter so the SSE endpoint and the diagnostic collector see it.
 */

let useConsoleLogging = false;

/**
 * Sets the logging mode. When true, logs go to console with colors. When false, logs go to the file logger.
 * @param enabled - True to enable console logging, false for file logging.
 */
export function setConsoleLogging(enabled: boolean): void {

  useConsoleLogging = enabled;
}

/**
 * Returns whether console logging is currently enabled.
 */
export function isConsoleLogging(): boolean {

  return useConsoleLogging;
}

/**
 * Enables or disables all debug categories. Equivalent to SLIDESHOW_PLAYER_DEBUG=* when enabled.
 * @param enabled - True to enable all debug logging, false to disable.
 */
export function setDebugLogging(enabled: boolean): void {

  initDebugFilter(enabled ? "*" : "");
}


/**
 * Core logging implementation shared by all log levels. Handles the component prefix, broadcast, and output routing.
 * @param level - The log level.
 * @param color - ANSI color code for console output (empty string for no color).
 * @param message - The format string.
 * @param args - Format arguments.
 * @param component - Optional component tag, rendered as a "[Component] " prefix.
 * @param categoryTag - Optional debug category.
 */
function logWithLevel(level: LogEntry["level"], color: string, message: string, args: unknown[], component?: string, categoryTag?: string): void {

  const formatted = args.length > 0 ? format(message, ...args) : message;
  const logMessage = component ? [ "[", component, "] ", formatted ].join("") : formatted;

  const entry: LogEntry = { level, message: formatted, timestamp: df(new Date(), "yyyy/mm/dd HH:MM:ss.l") };

  if(component) {

    entry.component = component;
  }

  if(categoryTag) {

    entry.categoryTag = categoryTag;
  }

  emitLogEntry(entry);

  if(!useConsoleLogging) {

    writeLogEntry(level, logMessage, color || undefined, categoryTag);

    return;
  }

  /* eslint-disable no-console */
  let consoleMethod;

  switch(level) {

    case "error": {

      consoleMethod = console.error;

      break;
    }

    case "warn": {

      consoleMethod = console.warn;

      break;
    }

    default: {

      consoleMethod = console.log;

      break;
    }
  }
  /* eslint-enable no-console */

  if(color) {

    consoleMethod("%s%s%s", color, logMessage, ANSI_COLORS.reset);
  } else {

    consoleMethod(logMessage);
  }
}

/**
 * Logger bound to a component tag, returned by LOG.withComponent().
 */
export interface ComponentLogger {

  debug: (category: string, message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
}

export const LOG = {

  /**
   * Logs a debug message in cyan, filtered by category. Debug messages are only output when the category is enabled via SLIDESHOW_PLAYER_DEBUG or --debug.
   * @param category - The debug category (e.g., "player:output", "channel:events").
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  debug: function(category: string, message: string, ...args: unknown[]): void {

    if(!isAnyDebugEnabled() || !isCategoryEnabled(category)) {

      return;
    }

    logWithLevel("debug", ANSI_COLORS.cyan, message, args, undefined, category);
  },

  /**
   * Logs an error message in red. Use this for failures that stop an operation, such as a player launch that could not complete.
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  error: function(message: string, ...args: unknown[]): void {

    logWithLevel("error", ANSI_COLORS.red, message, args);
  },

  /**
   * Logs an informational message in the default terminal color.
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  info: function(message: string, ...args: unknown[]): void {

    logWithLevel("info", "", message, args);
  },

  /**
   * Logs a warning message in yellow. Use this for problems the service recovers from, like a discovery attempt that failed and will be retried.
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  warn: function(message: string, ...args: unknown[]): void {

    logWithLevel("warn", ANSI_COLORS.yellow, message, args);
  },

  /**
   * Creates a logger bound to a component tag. Every line it writes is prefixed with the tag and carries it on the broadcast entry, which is what the diagnostic
   * collector keys on.
   *
   * Example:
   *   const log = LOG.withComponent("Supervisor");
   *   log.info("Process launched with PID %s.", pid);
   *
   * @param component - The component tag.
   * @returns A logger with debug, error, info, and warn methods that include the tag.
   */
  withComponent: function(component: string): ComponentLogger {

    return {

      debug: (category: string, message: string, ...args: unknown[]): void => {

        if(isAnyDebugEnabled() && isCategoryEnabled(category)) {

          logWithLevel("debug", ANSI_COLORS.cyan, message, args, component, category);
        }
      },
      error: (message: string, ...args: unknown[]): void => { logWithLevel("error", ANSI_COLORS.red, message, args, component); },
      info: (message: string, ...args: unknown[]): void => { logWithLevel("info", "", message, args, component); },
      warn: (message: string, ...args: unknown[]): void => { logWithLevel("warn", ANSI_COLORS.yellow, message, args, component); }
    };
  }
};
