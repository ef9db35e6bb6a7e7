/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * diagnostics.ts: Component-tagged diagnostic log collection for Slideshow Player.
 */
import type { LogEntry } from "./logEmitter.js";
import type { Nullable } from "../types/index.js";
import df from "dateformat";
import { subscribeToLogs } from "./logEmitter.js";

/* When player initialization fails, the user is shown the recent lifecycle log so they can see which stage stalled: process start, content load, or device
 * discovery. The collector listens on the log emitter and keeps the component-tagged entries (those written through LOG.withComponent()) in a bounded ring.
 * Untagged lines, such as HTTP request logs, are not kept. Components only ever log redacted credentials, so nothing secret reaches the collector.
 */

export interface DiagnosticEntry {

  component: string;
  level: LogEntry["level"];
  message: string;
  timestamp: Date;
}

const MAX_DIAGNOSTIC_ENTRIES = 500;

const entries: DiagnosticEntry[] = [];

let unsubscribe: Nullable<() => void> = null;

/**
 * Starts collecting. Idempotent.
 */
export function startDiagnosticCapture(): void {

  if(unsubscribe) {

    return;
  }

  unsubscribe = subscribeToLogs((entry) => {

    if(!entry.component) {

      return;
    }

    entries.push({ component: entry.component, level: entry.level, message: entry.message, timestamp: new Date() });

    if(entries.length > MAX_DIAGNOSTIC_ENTRIES) {

      entries.splice(0, entries.length - MAX_DIAGNOSTIC_ENTRIES);
    }
  });
}

/**
 * Stops collecting. Collected entries are kept until cleared.
 */
export function stopDiagnosticCapture(): void {

  unsubscribe?.();
  unsubscribe = null;
}

/**
 * Returns a copy of the collected entries, oldest first.
 */
export function getDiagnostics(): DiagnosticEntry[] {

  return [...entries];
}

/**
 * Renders the collected entries as "[HH:MM:ss.l] [Component] message" lines.
 * @returns The formatted log, or "No logs available" when nothing has been collected.
 */
export function formattedDiagnostics(): string {

  if(entries.length === 0) {

    return "No logs available";
  }

  return entries.map((entry) => [ "[", df(entry.timestamp, "HH:MM:ss.l"), "] [", entry.component, "] ", entry.message ].join("")).join("\n");
}

/**
 * Discards all collected entries.
 */
export function clearDiagnostics(): void {

  entries.length = 0;
}
