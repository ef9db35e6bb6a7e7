/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * noop.ts: Backend that plays nothing.
 */
import type { BackendReadiness, Nullable } from "../types/index.js";
import { BaseBackend } from "./backend.js";
import { IDLE_PLAYBACK_STATE } from "../types/index.js";

/**
 * Stands in until a real backend is selected. Always ready, always idle, and every command succeeds without doing anything.
 */
export class NoopBackend extends BaseBackend {

  readonly mode = "none";

  get deviceId(): Nullable<string> {

    return null;
  }

  get readiness(): BackendReadiness {

    return "Ready";
  }

  async initialize(): Promise<void> {

    this.emitState({ ...IDLE_PLAYBACK_STATE });
  }

  async stop(): Promise<void> {

    this.emitState({ ...IDLE_PLAYBACK_STATE });
  }

  async next(): Promise<void> {

    // Nothing to do.
  }

  async pause(): Promise<void> {

    // Nothing to do.
  }

  async play(): Promise<void> {

    // Nothing to do.
  }

  async previous(): Promise<void> {

    // Nothing to do.
  }

  async resume(): Promise<void> {

    // Nothing to do.
  }

  async seek(): Promise<void> {

    // Nothing to do.
  }

  async setRepeat(): Promise<void> {

    // Nothing to do.
  }

  async setShuffle(): Promise<void> {

    // Nothing to do.
  }

  async setVolume(): Promise<void> {

    // Nothing to do.
  }
}
