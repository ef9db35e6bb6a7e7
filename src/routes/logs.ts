/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logs.ts: Log viewing endpoints for Slideshow Player.
 */
import type { Express, Request, Response } from "express";
import { LOG, formatError, isConsoleLogging, subscribeToLogs } from "../utils/index.js";
import { CONFIG } from "../config/index.js";
import type { LogEntry } from "../utils/index.js";
import type { Nullable } from "../types/index.js";
import fs from "node:fs";
import { getLogFilePath } from "../config/paths.js";

const { promises: fsPromises } = fs;

/* Log file lines look like "[YYYY/MM/DD HH:MM:ss.l] [LEVEL] [Component] message". The level tag is present for debug, warn, and error entries and may carry a debug
 * category as [DEBUG:category]. The component tag is present for lines written through a component logger. Console mode writes no file, so the file endpoint
 * reports an empty list with mode "console".
 */

export type LogLevel = LogEntry["level"];

export interface LogsResponse {

  entries: LogEntry[];
  filtered: number;
  mode: "console" | "file";
  total: number;
}

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;
const COMPONENT_PATTERN = /^\[([A-Za-z]+)\] (.*)$/;
const LOG_LINE_PATTERN = /^\[(\d{4}\/\d{2}\/\d{2} \d{2}:\d{2}:\d{2}\.\d{3})\] (?:\[(WARN|ERROR|DEBUG(?::[^\]]+)?)\] )?(.*)$/;
const LEVELS: readonly LogLevel[] = [ "debug", "error", "info", "warn" ];

/**
 * Narrows a query parameter to a log level.
 * @param value - The raw query value.
 * @returns The level, or null when the value is not one.
 */
export function parseLevel(value: unknown): Nullable<LogLevel> {

  return LEVELS.find((level) => level === value) ?? null;
}

/**
 * Parses a single log file line.
 * @param line - The raw line, possibly with ANSI color codes.
 * @returns The entry, or null if the line does not match the log format.
 */
export function parseLogLine(line: string): Nullable<LogEntry> {

  const match = LOG_LINE_PATTERN.exec(line.replace(ANSI_PATTERN, ""));

  if(!match) {

    return null;
  }

  const [ , timestamp, levelTag = "", rest ] = match;
  const entry: LogEntry = { level: "info", message: rest, timestamp };

  if(levelTag.startsWith("DEBUG")) {

    entry.level = "debug";

    const colonIndex = levelTag.indexOf(":");

    if(colonIndex !== -1) {

      entry.categoryTag = levelTag.substring(colonIndex + 1);
    }
  } else if(levelTag === "WARN") {

    entry.level = "warn";
  } else if(levelTag === "ERROR") {

    entry.level = "error";
  }

  const component = COMPONENT_PATTERN.exec(rest);

  if(component) {

    entry.component = component[1];
    entry.message = component[2];
  }

  return entry;
}

/**
 * Reads the most recent entries from a log file.
 * @param logFilePath - The log file.
 * @param lines - Maximum number of entries to return.
 * @param level - Only return entries of this level, when set.
 * @returns The entries and counts. A missing file reads as empty.
 */
export async function readLogEntries(logFilePath: string, lines: number, level: Nullable<LogLevel> = null): Promise<LogsResponse> {

  let content: string;

  try {

    content = await fsPromises.readFile(logFilePath, "utf-8");
  } catch(error) {

    if((error instanceof Error) && ("code" in error) && (error.code === "ENOENT")) {

      return { entries: [], filtered: 0, mode: "file", total: 0 };
    }

    throw error;
  }

  const allEntries: LogEntry[] = [];

  for(const line of content.split("\n")) {

    const entry = line.trim() ? parseLogLine(line) : null;

    if(entry) {

      allEntries.push(entry);
    }
  }

  const filteredEntries = level ? allEntries.filter((entry) => entry.level === level) : allEntries;

  return { entries: filteredEntries.slice(-lines), filtered: filteredEntries.length, mode: "file", total: allEntries.length };
}

/**
 * Creates the log endpoints: GET /logs reads recent entries from the log file, GET /logs/stream relays new entries as Server-Sent Events.
 * @param app - The Express application.
 */
export function setupLogsEndpoint(app: Express): void {

  app.get("/logs", async (req: Request, res: Response): Promise<void> => {

    const linesParam = (typeof req.query.lines === "string") ? parseInt(req.query.lines, 10) : NaN;
    const lines = (!isNaN(linesParam) && (linesParam > 0) && (linesParam <= 1000)) ? linesParam : 100;

    if(isConsoleLogging()) {

      res.json({ entries: [], filtered: 0, mode: "console", total: 0 });

      return;
    }

    try {

      res.json(await readLogEntries(getLogFilePath(CONFIG), lines, parseLevel(req.query.level)));
    } catch(error) {

      LOG.error("Failed to read the log file: %s.", formatError(error));

      res.status(500).json({ entries: [], error: "Failed to read log file.", filtered: 0, mode: "file", total: 0 });
    }
  });

  app.get("/logs/stream", (req: Request, res: Response): void => {

    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("Content-Type", "text/event-stream");
    res.flushHeaders();

    const level = parseLevel(req.query.level);

    const unsubscribe = subscribeToLogs((entry) => {

      if(level && (entry.level !== level)) {

        return;
      }

      res.write("data: " + JSON.stringify(entry) + "\n\n");
    });

    // Named heartbeat so proxies keep the connection open and clients can detect a stale stream.
    const heartbeatInterval = setInterval(() => {

      res.write("event: heartbeat\ndata: \n\n");
    }, 30000);

    req.on("close", () => {

      clearInterval(heartbeatInterval);
      unsubscribe();
    });
  });
}
