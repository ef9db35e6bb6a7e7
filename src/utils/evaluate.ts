/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * evaluate.ts: Puppeteer evaluate wrapper with abort and timeout support.
 */
import type { Frame, Page } from "puppeteer-core";

/* Page evaluations against the player runtime can hang when the runtime stops responding, and Puppeteer would otherwise wait for its protocol timeout. This
 * wrapper bounds every evaluation with a timeout and, when given a signal, rejects as soon as the channel is closed.
 *
 * When we stop waiting, the CDP call itself is still pending inside Puppeteer. A no-op catch on it keeps its eventual rejection from surfacing as unhandled.
 */

const DEFAULT_EVALUATE_TIMEOUT = 5000;

/**
 * Rejection raised when an evaluation outlives its timeout.
 */
export class EvaluateTimeoutError extends Error {

  constructor(timeoutMs: number) {

    super("Evaluate timed out after " + String(timeoutMs) + "ms.");

    this.name = "EvaluateTimeoutError";
  }
}

/**
 * Rejection raised when an evaluation is abandoned because its signal fired.
 */
export class EvaluateAbortError extends Error {

  constructor() {

    super("Evaluate aborted because the player channel closed.");

    this.name = "EvaluateAbortError";
  }
}

/**
 * Executes a Puppeteer evaluate call bounded by a timeout and an optional abort signal.
 * @param context - The Page or Frame to evaluate in.
 * @param pageFunction - The function to evaluate in the page.
 * @param args - Arguments to pass to the function.
 * @param timeoutMs - Timeout in milliseconds (default: 5000).
 * @param signal - Optional signal that abandons the evaluation.
 * @returns The result of the evaluate call.
 * @throws EvaluateAbortError if the signal fired, EvaluateTimeoutError on timeout, or any error from the evaluation itself.
 */
export async function evaluateWithAbort<T, Args extends unknown[]>(
  context: Frame | Page,
  pageFunction: (...args: Args) => T,
  args: Args,
  timeoutMs = DEFAULT_EVALUATE_TIMEOUT,
  signal?: AbortSignal
): Promise<Awaited<T>> {

  if(signal?.aborted) {

    throw new EvaluateAbortError();
  }

  // Puppeteer's evaluate signature maps handle types through its own parameter helpers, which does not line up with a plain generic function type.
  const evaluatePromise = context.evaluate(pageFunction as unknown as (...params: unknown[]) => Awaited<T>, ...args);

  evaluatePromise.catch(() => { /* Suppress the late rejection of an abandoned CDP call. */ });

  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const cutoff = new Promise<never>((_, reject) => {

    timer = setTimeout(() => {

      reject(new EvaluateTimeoutError(timeoutMs));
    }, timeoutMs);

    if(signal) {

      onAbort = (): void => reject(new EvaluateAbortError());

      signal.addEventListener("abort", onAbort, { once: true });
    }
  });

  try {

    return await Promise.race([ evaluatePromise, cutoff ]);
  } finally {

    clearTimeout(timer);

    if(signal && onAbort) {

      signal.removeEventListener("abort", onAbort);
    }
  }
}
