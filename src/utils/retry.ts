/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * retry.ts: Retry logic with exponential backoff for Slideshow Player.
 */
import { formatError, isSessionClosedError } from "./errors.js";
import { LOG } from "./logger.js";

/* Retries with exponential backoff and jitter, for operations that fail transiently while something else comes up, such as attaching to the player runtime's
 * DevTools port before the runtime has opened it. This is deliberately not used by device discovery, which runs on a fixed schedule.
 */

export interface RetryOptions {

  // Maximum number of attempts before giving up.
  attempts: number;

  // Timeout in milliseconds for each individual attempt.
  attemptTimeout: number;

  // Random jitter in milliseconds added to each backoff delay.
  backoffJitter: number;

  // Human-readable description for logging.
  description: string;

  // Upper bound for a single backoff delay in milliseconds. Delays start at 250ms and double per attempt.
  maxBackoffDelay: number;

  // Called before each attempt. Returning true aborts the remaining attempts.
  shouldAbort?: () => boolean;
}

/**
 * Races a promise against a timeout, clearing the timer whichever settles first.
 * @param promise - The promise to race.
 * @param timeoutMs - Timeout in milliseconds.
 * @param description - Used in the timeout error message.
 * @returns The promise's result.
 * @throws An Error mentioning "timed out" when the timeout wins.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, description: string): Promise<T> {

  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {

    timer = setTimeout(() => {

      reject(new Error([ description, " timed out after ", String(timeoutMs), "ms." ].join("")));
    }, timeoutMs);
  });

  try {

    return await Promise.race([ promise, timeoutPromise ]);
  } finally {

    clearTimeout(timer);
  }
}

/**
 * Attempts an operation up to options.attempts times, waiting with exponential backoff plus jitter between attempts.
 * @param operation - An async function to attempt. Should throw on failure.
 * @param options - Attempt budget, timing, and abort check.
 * @returns The result of the first successful attempt.
 * @throws The last error encountered if all attempts fail, or immediately on a closed-session error or an abort.
 */
export async function retryOperation<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {

  let lastError: unknown = new Error([ "No attempts made for ", options.description, "." ].join(""));

  for(let attempt = 1; attempt <= options.attempts; attempt++) {

    if(options.shouldAbort?.()) {

      throw new Error([ "Aborted ", options.description, " before attempt ", String(attempt), "." ].join(""));
    }

    if(attempt > 1) {

      LOG.debug("retry", "Retrying %s (attempt %s of %s).", options.description, attempt, options.attempts);
    }

    try {

      // eslint-disable-next-line no-await-in-loop
      return await withTimeout(operation(), options.attemptTimeout, options.description);
    } catch(error) {

      lastError = error;

      if(isSessionClosedError(error)) {

        LOG.debug("retry", "Target closed, aborting retries for %s.", options.description);

        throw error;
      }

      LOG.debug("retry", "Attempt %s failed for %s: %s.", attempt, options.description, formatError(error));

      if(attempt < options.attempts) {

        const baseDelay = Math.min(250 * Math.pow(2, attempt - 1), options.maxBackoffDelay);

        // eslint-disable-next-line no-await-in-loop
        await new Promise<void>((resolve) => {

          setTimeout(resolve, baseDelay + (Math.random() * options.backoffJitter));
        });
      }
    }
  }

  throw lastError;
}
