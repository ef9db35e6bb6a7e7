/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logEmitter.ts: In-process broadcast of log entries for Slideshow Player.
 */
import { EventEmitter } from "events";

/* Every log line is broadcast here as a structured entry. Two kinds of consumers subscribe: the /logs/stream SSE endpoint, which relays entries to connected
 * clients, and the diagnostic collector, which keeps the recent component-tagged lines for display when player initialization fails.
 */

export interface LogEntry {

  categoryTag?: string;

  // Component tag (e.g., "Supervisor", "Channel") when the entry was written through a bound component logger.
  component?: string;
  level: "debug" | "error" | "info" | "warn";
  message: string;
  timestamp: string;
}

const logEmitter = new EventEmitter();

// SSE clients and the diagnostic collector each hold a listener.
logEmitter.setMaxListeners(50);

/**
 * Broadcasts a log entry to all subscribers.
 * @param entry - The log entry to broadcast.
 */
export function emitLogEntry(entry: LogEntry): void {

  logEmitter.emit("log", entry);
}

/**
 * Subscribes a callback to receive log entries. Returns an unsubscribe function.
 * @param callback - Function to call when a log entry is emitted.
 * @returns A function to unsubscribe the callback.
 */
export function subscribeToLogs(callback: (entry: LogEntry) => void): () => void {

  logEmitter.on("log", callback);

  return (): void => {

    logEmitter.off("log", callback);
  };
}
