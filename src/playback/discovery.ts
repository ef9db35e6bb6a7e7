/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * discovery.ts: Bounded Connect device discovery.
 */
import { LOG, delay, formatError } from "../utils/index.js";
import type { Nullable, RemoteDevice } from "../types/index.js";
import type { RemotePlaybackApi } from "../spotify/webApi.js";

/* The player announces itself with a ready event, but that event is not always delivered. As a safety net we look for the player in the Web API's device list,
 * matching on the display name it registers under. The schedule is fixed: a handful of attempts a short interval apart, no backoff. Device registration is
 * eventually consistent, and the player usually appears within the first two or three attempts when it appears at all.
 *
 * Only one poll runs at a time. A run() while a poll is in flight returns the in-flight poll's result. A cancelled poll still counts as in flight until its
 * outstanding device-list request settles, and a run() in the meantime waits for it before starting a fresh poll.
 */

const log = LOG.withComponent("Discovery");

export const DISCOVERY_ATTEMPTS = 6;
export const DISCOVERY_INTERVAL = 500;

export interface DeviceDiscoveryOptions {

  attempts?: number;
  intervalMs?: number;

  // Waits between attempts. Must end early when the signal fires.
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export class DeviceDiscovery {

  private readonly api: RemotePlaybackApi;
  private readonly attempts: number;
  private controller: Nullable<AbortController> = null;
  private readonly deviceName: string;
  private readonly intervalMs: number;
  private pending: Nullable<Promise<Nullable<RemoteDevice>>> = null;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;

  constructor(api: RemotePlaybackApi, deviceName: string, options: DeviceDiscoveryOptions = {}) {

    this.api = api;
    this.attempts = options.attempts ?? DISCOVERY_ATTEMPTS;
    this.deviceName = deviceName;
    this.intervalMs = options.intervalMs ?? DISCOVERY_INTERVAL;
    this.sleep = options.sleep ?? delay;
  }

  get isRunning(): boolean {

    return this.pending !== null;
  }

  /**
   * Polls the device list for the player.
   * @returns The matching device, or null when the attempts ran out or the poll was cancelled.
   */
  async run(): Promise<Nullable<RemoteDevice>> {

    while(this.pending) {

      if(this.controller) {

        return this.pending;
      }

      // eslint-disable-next-line no-await-in-loop
      await this.pending;
    }

    const controller = new AbortController();

    this.controller = controller;

    const pending = this.poll(controller.signal).finally(() => {

      if(this.pending === pending) {

        this.controller = null;
        this.pending = null;
      }
    });

    this.pending = pending;

    return pending;
  }

  /**
   * Cancels the poll in flight, if any. Its run() callers get null.
   */
  cancel(): void {

    this.controller?.abort();
    this.controller = null;
  }

  private async poll(signal: AbortSignal): Promise<Nullable<RemoteDevice>> {

    for(let attempt = 1; attempt <= this.attempts; attempt++) {

      if(signal.aborted) {

        log.info("Discovery cancelled.");

        return null;
      }

      try {

        // eslint-disable-next-line no-await-in-loop
        const devices = await this.api.listDevices();

        if(signal.aborted) {

          log.info("Discovery cancelled.");

          return null;
        }

        LOG.debug("discovery", "Attempt %s saw: %s.", attempt, devices.map((candidate) => candidate.name).join(", ") || "no devices");

        const device = devices.find((candidate) => candidate.name === this.deviceName);

        if(device) {

          log.info("Found %s as device %s on attempt %s.", this.deviceName, device.id, attempt);

          return device;
        }

        log.info("Attempt %s of %s: %s not among %s device(s).", attempt, this.attempts, this.deviceName, devices.length);
      } catch(error) {

        log.warn("Attempt %s of %s failed: %s.", attempt, this.attempts, formatError(error));
      }

      if(attempt < this.attempts) {

        // eslint-disable-next-line no-await-in-loop
        await this.sleep(this.intervalMs, signal);
      }
    }

    log.warn("%s did not appear in the device list after %s attempts.", this.deviceName, this.attempts);

    return null;
  }
}
