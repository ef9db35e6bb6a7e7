/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logs.test.ts: Tests for log file parsing.
 */
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parseLevel, parseLogLine, readLogEntries } from "./logs.js";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const LINES = [

  "[2026/01/02 10:00:00.000] Server started.",
  "[2026/01/02 10:00:01.000] \x1b[33m[WARN] [Discovery] Attempt 1 failed: service unavailable.\x1b[0m",
  "not a log line",
  "[2026/01/02 10:00:02.000] \x1b[36m[DEBUG:channel:events] [Channel] Received ready.\x1b[0m",
  "[2026/01/02 10:00:03.000] \x1b[31m[ERROR] Unhandled promise rejection: boom.\x1b[0m",
  ""
];

describe("parseLogLine", () => {

  it("reads an info line without a level tag", () => {

    expect(parseLogLine(LINES[0])).toEqual({ level: "info", message: "Server started.", timestamp: "2026/01/02 10:00:00.000" });
  });

  it("strips colors and splits off the level and component", () => {

    expect(parseLogLine(LINES[1])).toEqual({

      component: "Discovery",
      level: "warn",
      message: "Attempt 1 failed: service unavailable.",
      timestamp: "2026/01/02 10:00:01.000"
    });
  });

  it("keeps the debug category", () => {

    expect(parseLogLine(LINES[3])).toMatchObject({ categoryTag: "channel:events", component: "Channel", level: "debug", message: "Received ready." });
  });

  it("rejects lines in another format", () => {

    expect(parseLogLine(LINES[2])).toBeNull();
  });
});

describe("parseLevel", () => {

  it("accepts the four levels only", () => {

    expect(parseLevel("warn")).toBe("warn");
    expect(parseLevel("WARN")).toBeNull();
    expect(parseLevel(undefined)).toBeNull();
  });
});

describe("readLogEntries", () => {

  let tempDir: string;
  let logFile: string;

  beforeEach(() => {

    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "slideshow-player-logs-"));
    logFile = path.join(tempDir, "slideshow-player.log");
    fs.writeFileSync(logFile, LINES.join("\n"));
  });

  afterEach(() => {

    fs.rmSync(tempDir, { force: true, recursive: true });
  });

  it("returns the most recent entries", async () => {

    const result = await readLogEntries(logFile, 2);

    expect(result).toMatchObject({ filtered: 4, mode: "file", total: 4 });
    expect(result.entries.map((entry) => entry.level)).toEqual([ "debug", "error" ]);
  });

  it("filters by level", async () => {

    const result = await readLogEntries(logFile, 100, "warn");

    expect(result.filtered).toBe(1);
    expect(result.total).toBe(4);
    expect(result.entries[0].component).toBe("Discovery");
  });

  it("reads a missing file as empty", async () => {

    await expect(readLogEntries(path.join(tempDir, "missing.log"), 100)).resolves.toEqual({ entries: [], filtered: 0, mode: "file", total: 0 });
  });
});
