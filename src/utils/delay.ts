/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * delay.ts: Async delay utility for Slideshow Player.
 */

/**
 * Creates a promise that resolves after the specified delay. When an abort signal is given, the delay ends early (resolving, not rejecting) as soon as the signal
 * fires, so loops that sleep between attempts can check their own cancellation state right after waking.
 * @param ms - The delay duration in milliseconds.
 * @param signal - Optional signal that cuts the delay short.
 * @returns A promise that resolves after the delay or on abort.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {

  return new Promise<void>((resolve) => {

    if(signal?.aborted) {

      resolve();

      return;
    }

    const onAbort = (): void => {

      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout((): void => {

      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
