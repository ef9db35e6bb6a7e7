/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.ts: File-based logging with size-based trimming for Slideshow Player.
 */
import type { Nullable } from "../types/index.js";
import df from "dateformat";
import fs from "node:fs";
import { isAnyDebugEnabled } from "./debugFilter.js";
import path from "node:path";

const { promises: fsPromises } = fs;

/* Log lines are buffered in memory and appended to the log file once a second. When the file grows past the configured maximum it is cut down to the most recent
 * half, on whole-line boundaries, through a temp file and rename. Trimming is skipped while debug output is on, since that is exactly when the history is wanted.
 * A write failure pauses file logging for a minute instead of failing every subsequent line.
 */

interface FileLoggerState {

  // Approximate file size, corrected from stat every SIZE_CHECK_FREQUENCY writes.
  approximateSize: number;
  buffer: string[];
  disabledUntil: number;
  flushTimer: Nullable<ReturnType<typeof setInterval>>;
  logFilePath: string;
  maxSize: number;
  writeCount: number;
}

const FLUSH_INTERVAL_MS = 1000;
const SIZE_CHECK_FREQUENCY = 100;
const ERROR_RETRY_DELAY_MS = 60000;
const ANSI_RESET = "\x1b[0m";

// Null until initializeFileLogger() succeeds.
let state: Nullable<FileLoggerState> = null;

/**
 * Initializes the file logger, creating the log file and its directory when missing. Failure is reported on the console and leaves file logging off.
 * @param logPath - Absolute path to the log file.
 * @param maxSize - Maximum log file size in bytes.
 */
export async function initializeFileLogger(logPath: string, maxSize: number): Promise<void> {

  try {

    await fsPromises.mkdir(path.dirname(logPath), { recursive: true });

    // Opening in append mode creates the file without truncating an existing one.
    const handle = await fsPromises.open(logPath, "a");
    const stats = await handle.stat();

    await handle.close();

    state = {

      approximateSize: stats.size,
      buffer: [],
      disabledUntil: 0,
      flushTimer: setInterval((): void => {

        void flushLogBuffer();
      }, FLUSH_INTERVAL_MS),
      logFilePath: logPath,
      maxSize,
      writeCount: 0
    };
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to initialize file logger: %s. File logging disabled.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Queues a log entry for the next flush.
 * @param level - Log level ("info", "warn", "error", "debug"). Info lines carry no level prefix.
 * @param message - The formatted log message.
 * @param color - Optional ANSI color code wrapped around the level prefix and message.
 * @param categoryTag - Optional debug category, rendered as [DEBUG:category].
 */
export function writeLogEntry(level: string, message: string, color?: string, categoryTag?: string): void {

  if(!state || (Date.now() < state.disabledUntil)) {

    return;
  }

  const levelTag = categoryTag ? [ level.toUpperCase(), ":", categoryTag ].join("") : level.toUpperCase();
  const levelPrefix = (level === "info") ? "" : [ "[", levelTag, "] " ].join("");
  const line = [ "[", df(new Date(), "yyyy/mm/dd HH:MM:ss.l"), "] ", color ?? "", levelPrefix, message, color ? ANSI_RESET : "", "\n" ].join("");

  state.buffer.push(line);
  state.approximateSize += line.length;
  state.writeCount++;

  if((state.writeCount % SIZE_CHECK_FREQUENCY) === 0) {

    void trimIfNeeded();
  }
}

/**
 * Appends the buffered entries to the log file.
 */
export async function flushLogBuffer(): Promise<void> {

  if(!state || (state.buffer.length === 0)) {

    return;
  }

  const content = state.buffer.join("");

  state.buffer = [];

  try {

    await fsPromises.appendFile(state.logFilePath, content, "utf-8");
  } catch(error) {

    state.disabledUntil = Date.now() + ERROR_RETRY_DELAY_MS;

    // eslint-disable-next-line no-console
    console.error("Failed to write to log file: %s. File logging disabled for %s seconds.", (error instanceof Error) ? error.message : String(error),
      ERROR_RETRY_DELAY_MS / 1000);
  }
}

/**
 * Flushes the buffer synchronously. Used from process exit handlers, where asynchronous work never completes.
 */
export function flushLogBufferSync(): void {

  if(!state || (state.buffer.length === 0)) {

    return;
  }

  const content = state.buffer.join("");

  state.buffer = [];

  try {

    fs.appendFileSync(state.logFilePath, content, "utf-8");
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to write final log entries: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Re-reads the file size and trims the file to the most recent half of the maximum when it is over the limit.
 */
async function trimIfNeeded(): Promise<void> {

  if(!state) {

    return;
  }

  const { logFilePath, maxSize } = state;

  try {

    const stats = await fsPromises.stat(logFilePath);

    state.approximateSize = stats.size;

    if((stats.size <= maxSize) || isAnyDebugEnabled()) {

      return;
    }

    const content = await fsPromises.readFile(logFilePath, "utf-8");
    const cutPosition = content.length - Math.floor(maxSize / 2);

    if(cutPosition <= 0) {

      return;
    }

    // Keep whole lines: start right after the first newline past the cut.
    const newline = content.indexOf("\n", cutPosition);
    const trimmed = content.substring((newline === -1) ? cutPosition : (newline + 1));
    const tempPath = logFilePath + ".tmp";

    await fsPromises.writeFile(tempPath, trimmed, "utf-8");
    await fsPromises.rename(tempPath, logFilePath);

    state.approximateSize = trimmed.length;
  } catch(error) {

    // eslint-disable-next-line no-console
    console.warn("Error trimming log file: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Stops the flush timer and writes out anything still buffered.
 */
export function shutdownFileLogger(): void {

  if(!state) {

    return;
  }

  if(state.flushTimer) {

    clearInterval(state.flushTimer);
    state.flushTimer = null;
  }

  flushLogBufferSync();

  state = null;
}
