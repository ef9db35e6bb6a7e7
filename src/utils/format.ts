/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * format.ts: Formatting utilities for Slideshow Player.
 */

// Number of leading characters of a credential that may appear in logs.
const CREDENTIAL_PREFIX_LENGTH = 6;

/**
 * Formats a duration in milliseconds as a human-readable string. The format varies based on duration length:
 * - Less than 60 seconds: "17s"
 * - Less than 1 hour: "6m 39s"
 * - 1 hour or more: "1h 23m"
 * @param ms - Duration in milliseconds.
 * @returns Formatted duration string.
 */
export function formatDuration(ms: number): string {

  const totalSeconds = Math.round(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if(hours > 0) {

    return [ String(hours), "h ", String(minutes), "m" ].join("");
  }

  if(minutes > 0) {

    return [ String(minutes), "m ", String(seconds), "s" ].join("");
  }

  return [ String(seconds), "s" ].join("");
}

/**
 * Redacts a credential for logging, keeping only a short prefix (e.g., "BQDx7a…"). Credentials are never written to any log in full.
 * @param credential - The access token or other secret.
 * @returns The redacted form, or "(none)" for an empty value.
 */
export function redactCredential(credential: string | null | undefined): string {

  if(!credential) {

    return "(none)";
  }

  return credential.slice(0, CREDENTIAL_PREFIX_LENGTH) + "…";
}

/**
 * Clamps a number into [min, max]. NaN clamps to min.
 */
export function clamp(value: number, min: number, max: number): number {

  if(Number.isNaN(value)) {

    return min;
  }

  return Math.min(max, Math.max(min, value));
}
