/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * backend.ts: Playback backend capability interface.
 */
import type { BackendMode, BackendReadiness, Nullable, PlaybackState, RepeatMode } from "../types/index.js";
import { IDLE_PLAYBACK_STATE } from "../types/index.js";
import type { PlaybackErrorKind } from "../utils/index.js";
import { ReadinessError } from "../utils/index.js";

/* A playback backend is whatever actually makes music play. The session only ever talks to this interface, so swapping between the internal player, remote device
 * control, and the no-op backend never reaches the rest of the application.
 *
 * Commands resolve once they have been handed off. Backends that are not ready reject with ReadinessError NotReady without doing anything.
 */

/**
 * Error notice delivered to error listeners. diagnostics carries the formatted lifecycle log when the failure ended an initialization attempt.
 */
export interface PlaybackErrorNotice {

  diagnostics: Nullable<string>;
  error: PlaybackErrorKind;
  message: string;
}

export type PlaybackStateListener = (state: PlaybackState) => void;
export type PlaybackErrorListener = (notice: PlaybackErrorNotice) => void;

export interface PlaybackBackend {

  // The Connect device commands are targeted at, when known.
  readonly deviceId: Nullable<string>;
  readonly isReady: boolean;
  readonly mode: BackendMode | "none";
  readonly readiness: BackendReadiness;

  // The last known playback state.
  readonly state: PlaybackState;

  initialize(): Promise<void>;
  stop(): Promise<void>;

  next(): Promise<void>;
  pause(): Promise<void>;
  play(trackUri: string, startPositionMs?: number): Promise<void>;
  previous(): Promise<void>;
  resume(): Promise<void>;
  seek(positionMs: number): Promise<void>;
  setRepeat(mode: RepeatMode): Promise<void>;
  setShuffle(enabled: boolean): Promise<void>;

  /**
   * Sets the playback volume.
   * @param volume - Volume between 0 and 1. Values outside are clamped.
   */
  setVolume(volume: number): Promise<void>;

  /**
   * Refreshes and returns the playback state. Backends that receive state pushes return the last one.
   */
  refreshState(): Promise<PlaybackState>;

  onError(listener: PlaybackErrorListener): () => void;
  onStateChange(listener: PlaybackStateListener): () => void;
}

/**
 * Listener bookkeeping and state retention shared by the backends.
 */
export abstract class BaseBackend implements PlaybackBackend {

  abstract readonly mode: BackendMode | "none";

  private readonly errorListeners = new Set<PlaybackErrorListener>();
  private lastState: PlaybackState = { ...IDLE_PLAYBACK_STATE };
  private readonly stateListeners = new Set<PlaybackStateListener>();

  abstract get deviceId(): Nullable<string>;
  abstract get readiness(): BackendReadiness;

  abstract initialize(): Promise<void>;
  abstract stop(): Promise<void>;
  abstract next(): Promise<void>;
  abstract pause(): Promise<void>;
  abstract play(trackUri: string, startPositionMs?: number): Promise<void>;
  abstract previous(): Promise<void>;
  abstract resume(): Promise<void>;
  abstract seek(positionMs: number): Promise<void>;
  abstract setRepeat(mode: RepeatMode): Promise<void>;
  abstract setShuffle(enabled: boolean): Promise<void>;
  abstract setVolume(volume: number): Promise<void>;

  get isReady(): boolean {

    return this.readiness === "Ready";
  }

  get state(): PlaybackState {

    return this.lastState;
  }

  async refreshState(): Promise<PlaybackState> {

    return this.lastState;
  }

  onError(listener: PlaybackErrorListener): () => void {

    this.errorListeners.add(listener);

    return (): void => {

      this.errorListeners.delete(listener);
    };
  }

  onStateChange(listener: PlaybackStateListener): () => void {

    this.stateListeners.add(listener);

    return (): void => {

      this.stateListeners.delete(listener);
    };
  }

  protected emitError(notice: PlaybackErrorNotice): void {

    for(const listener of [...this.errorListeners]) {

      listener(notice);
    }
  }

  protected emitState(state: PlaybackState): void {

    this.lastState = state;

    for(const listener of [...this.stateListeners]) {

      listener(state);
    }
  }

  /**
   * @throws ReadinessError NotReady unless the backend is ready.
   */
  protected assertReady(): void {

    if(!this.isReady) {

      throw new ReadinessError("NotReady", [ "Playback backend is not ready (", this.readiness, ")." ].join(""));
    }
  }
}
