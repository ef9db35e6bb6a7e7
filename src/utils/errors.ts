/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * errors.ts: Error taxonomy and formatting utilities for Slideshow Player.
 */
import type { Nullable } from "../types/index.js";

/* Every failure the playback subsystem reports is one of five error classes, each with a code discriminant. Callers outside the subsystem (the HTTP surface, the
 * playback session) mostly work with the coarser PlaybackErrorKind that toPlaybackErrorKind() derives from them.
 */

/**
 * Formats an error for logging by extracting the message if available, falling back to string conversion for non-Error objects. Trailing punctuation is stripped
 * so callers can add their own.
 * @param error - The error to format.
 * @returns A string representation suitable for logging, without trailing punctuation.
 */
export function formatError(error: unknown): string {

  let message: string;

  if(error instanceof Error) {

    message = error.message;
  } else if(error && (typeof error === "object") && ("message" in error) && (typeof error.message === "string")) {

    message = error.message;
  } else {

    message = String(error);
  }

  return message.replace(/[.!?]+$/, "");
}

/**
 * Checks whether an error means the DevTools target behind a page is gone. Retrying against a closed target never succeeds, so retry loops abort on these.
 * @param error - The error to check.
 * @returns True if the error indicates a closed or detached target.
 */
export function isSessionClosedError(error: unknown): boolean {

  const message = formatError(error);

  return [ "Target closed", "Session closed", "detached Frame", "Connection closed" ].some((pattern) => message.includes(pattern));
}

export type ProcessErrorCode = "HelperNotFound" | "InvalidPath" | "LaunchFailed";

/**
 * Player process supervision failures. These end the initialize() attempt that hit them.
 */
export class ProcessError extends Error {

  readonly code: ProcessErrorCode;

  constructor(code: ProcessErrorCode, message: string) {

    super(message);

    this.code = code;
    this.name = "ProcessError";
  }
}

export type CredentialErrorCode = "NetworkFailure" | "NoAccessCredential";

/**
 * Token provider failures.
 */
export class CredentialError extends Error {

  readonly code: CredentialErrorCode;

  constructor(code: CredentialErrorCode, message: string) {

    super(message);

    this.code = code;
    this.name = "CredentialError";
  }
}

export type ChannelErrorCode = "DecodeFailed" | "SendFailed";

/**
 * Control channel failures. DecodeFailed is never fatal: the event becomes Unknown.
 */
export class ChannelError extends Error {

  readonly code: ChannelErrorCode;

  constructor(code: ChannelErrorCode, message: string) {

    super(message);

    this.code = code;
    this.name = "ChannelError";
  }
}

export type ReadinessErrorCode = "DeviceNotFound" | "NotReady";

/**
 * Commands rejected because the backend is not in a state to run them.
 */
export class ReadinessError extends Error {

  readonly code: ReadinessErrorCode;

  constructor(code: ReadinessErrorCode, message?: string) {

    super(message ?? ((code === "NotReady") ? "Playback backend is not ready." : "Playback device not found."));

    this.code = code;
    this.name = "ReadinessError";
  }
}

/**
 * A Web API call that answered with a non-success status, or did not answer at all (status 0).
 */
export class RemoteApiError extends Error {

  // The Web API's machine-readable reason, such as NO_ACTIVE_DEVICE, when the error body carried one.
  readonly reason: Nullable<string>;
  readonly statusCode: number;

  constructor(statusCode: number, message: string, reason: Nullable<string> = null) {

    super(message);

    this.name = "RemoteApiError";
    this.reason = reason;
    this.statusCode = statusCode;
  }
}

/**
 * The caller-facing error kinds surfaced to the playback session and UI.
 */
export type PlaybackErrorKind = { kind: "backend"; message: string } | { kind: "network" } | { kind: "notReady" } | { kind: "unauthorized" };

/**
 * Maps any error to the caller-facing kind.
 * @param error - The error to classify.
 * @returns The playback error kind.
 */
export function toPlaybackErrorKind(error: unknown): PlaybackErrorKind {

  if(error instanceof ReadinessError) {

    return (error.code === "NotReady") ? { kind: "notReady" } : { kind: "backend", message: error.message };
  }

  if(error instanceof CredentialError) {

    return (error.code === "NetworkFailure") ? { kind: "network" } : { kind: "unauthorized" };
  }

  if(error instanceof RemoteApiError) {

    if(error.statusCode === 401) {

      return { kind: "unauthorized" };
    }

    if(error.statusCode === 0) {

      return { kind: "network" };
    }
  }

  return { kind: "backend", message: formatError(error) };
}
