/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * external.ts: Remote device control backend.
 */
import type { BackendReadiness, Nullable, PlaybackState, RepeatMode } from "../types/index.js";
import { LOG, clamp } from "../utils/index.js";
import { BaseBackend } from "./backend.js";
import { IDLE_PLAYBACK_STATE } from "../types/index.js";
import type { RemotePlaybackApi } from "../spotify/webApi.js";

const log = LOG.withComponent("ExternalBackend");

export interface ExternalDeviceBackendOptions {

  api: RemotePlaybackApi;

  // Device to target. Null lets the Web API pick the user's active device.
  deviceId?: Nullable<string>;
}

/**
 * Drives whatever Connect device the user already has running, through the Web API alone. There is no process and no channel, so initialize() only marks the
 * backend ready.
 */
export class ExternalDeviceBackend extends BaseBackend {

  readonly mode = "external";

  private readonly api: RemotePlaybackApi;
  private ready = false;
  private readonly targetDeviceId: Nullable<string>;

  constructor(options: ExternalDeviceBackendOptions) {

    super();

    this.api = options.api;
    this.targetDeviceId = options.deviceId ?? null;
  }

  get deviceId(): Nullable<string> {

    return this.targetDeviceId;
  }

  get readiness(): BackendReadiness {

    return this.ready ? "Ready" : "Uninitialized";
  }

  async initialize(): Promise<void> {

    if(!this.ready) {

      log.info("Using remote device control%s.", this.targetDeviceId ? " on device " + this.targetDeviceId : "");
    }

    this.ready = true;
  }

  async stop(): Promise<void> {

    this.ready = false;
    this.emitState({ ...IDLE_PLAYBACK_STATE });
  }

  async play(trackUri: string, startPositionMs?: number): Promise<void> {

    this.assertReady();

    await this.api.startPlayback(trackUri, this.targetDeviceId, startPositionMs);
  }

  async pause(): Promise<void> {

    this.assertReady();

    await this.api.pause(this.targetDeviceId);
  }

  async resume(): Promise<void> {

    this.assertReady();

    await this.api.resume(this.targetDeviceId);
  }

  async next(): Promise<void> {

    this.assertReady();

    await this.api.skipNext(this.targetDeviceId);
  }

  async previous(): Promise<void> {

    this.assertReady();

    await this.api.skipPrevious(this.targetDeviceId);
  }

  async seek(positionMs: number): Promise<void> {

    this.assertReady();

    await this.api.seek(positionMs, this.targetDeviceId);
  }

  async setVolume(volume: number): Promise<void> {

    this.assertReady();

    await this.api.setVolume(Math.round(clamp(volume, 0, 1) * 100), this.targetDeviceId);
  }

  async setShuffle(enabled: boolean): Promise<void> {

    this.assertReady();

    await this.api.setShuffle(enabled, this.targetDeviceId);
  }

  async setRepeat(mode: RepeatMode): Promise<void> {

    this.assertReady();

    await this.api.setRepeat(mode, this.targetDeviceId);
  }

  /**
   * Reads the current playback state from the Web API. Nothing playing reads as idle.
   */
  async refreshState(): Promise<PlaybackState> {

    this.assertReady();

    const state = (await this.api.getPlaybackState()) ?? { ...IDLE_PLAYBACK_STATE };

    this.emitState(state);

    return state;
  }
}
