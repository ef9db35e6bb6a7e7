/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * session.ts: The playback session.
 */
import type { BackendMode, BackendReadiness, Nullable, PlaybackState, RemoteDevice, RepeatMode } from "../types/index.js";
import { CredentialError, LOG, formatError, toPlaybackErrorKind } from "../utils/index.js";
import type { PlaybackBackend, PlaybackErrorNotice } from "./backend.js";
import type { PlaybackBackendFactory } from "./factory.js";
import type { PlaybackErrorKind } from "../utils/index.js";
import type { RemotePlaybackApi } from "../spotify/webApi.js";
import type { TokenProvider } from "../spotify/tokens.js";
import { NoopBackend } from "./noop.js";

/* The session is the one place that holds the active backend. It starts out with the no-op backend, switches when a mode is selected, and keeps the last error
 * so the HTTP surface can report it without subscribing to anything itself.
 */

const log = LOG.withComponent("Session");

export interface PlaybackSessionOptions {

  // Web API client for the device list. Null when there is no token provider.
  api: Nullable<RemotePlaybackApi>;
  factory: PlaybackBackendFactory;
  tokens: Nullable<TokenProvider>;
}

/**
 * The last error the session saw, as reported by GET /playback.
 */
export interface SessionError {

  diagnostics: Nullable<string>;
  error: PlaybackErrorKind;
  message: string;
  timestamp: string;
}

export interface SessionSnapshot {

  deviceId: Nullable<string>;
  lastError: Nullable<SessionError>;
  mode: BackendMode | "none";
  readiness: BackendReadiness;
  state: PlaybackState;
}

export class PlaybackSession {

  private active: PlaybackBackend;
  private readonly api: Nullable<RemotePlaybackApi>;
  private detach: Nullable<() => void> = null;
  private readonly factory: PlaybackBackendFactory;
  private lastError: Nullable<SessionError> = null;
  private readonly tokens: Nullable<TokenProvider>;

  constructor(options: PlaybackSessionOptions) {

    this.api = options.api;
    this.factory = options.factory;
    this.tokens = options.tokens;
    this.active = new NoopBackend();
    this.attach(this.active);
  }

  get backend(): PlaybackBackend {

    return this.active;
  }

  snapshot(): SessionSnapshot {

    return {

      deviceId: this.active.deviceId,
      lastError: this.lastError,
      mode: this.active.mode,
      readiness: this.active.readiness,
      state: this.active.state
    };
  }

  /**
   * Switches to the backend for the mode. The previous backend is stopped when it is a different one.
   * @throws CredentialError NoAccessCredential when there is no token provider.
   */
  async select(mode: BackendMode): Promise<PlaybackBackend> {

    const backend = this.factory.makeBackend(mode, this.tokens);

    if(!backend) {

      throw new CredentialError("NoAccessCredential", "No Spotify credentials are configured.");
    }

    if(backend === this.active) {

      return backend;
    }

    const previous = this.active;

    log.info("Switching playback backend from %s to %s.", previous.mode, backend.mode);

    this.attach(backend);

    try {

      await previous.stop();
    } catch(error) {

      log.warn("Stopping the %s backend failed: %s.", previous.mode, formatError(error));
    }

    return backend;
  }

  /**
   * Prewarms the internal backend. Failures are logged, not thrown, since nothing is waiting on the result.
   * @param mode - The configured mode. The internal backend becomes the active one when the mode is internal.
   */
  async prewarm(mode: BackendMode): Promise<void> {

    if(!this.tokens) {

      log.info("Skipping prewarm, no Spotify credentials are configured.");

      return;
    }

    try {

      if(mode === "internal") {

        await this.select("internal");
      }

      await this.factory.prewarmBackend(this.tokens);
    } catch(error) {

      log.warn("Prewarming the internal player failed: %s.", formatError(error));
    }
  }

  /**
   * Initializes the active backend. A failure reaches lastError through the backend's own error notice, which carries the diagnostic log.
   */
  async initialize(): Promise<void> {

    await this.active.initialize();
  }

  async stop(): Promise<void> {

    await this.active.stop();
  }

  async play(trackUri: string, startPositionMs?: number): Promise<void> {

    await this.run(() => this.active.play(trackUri, startPositionMs));
  }

  async pause(): Promise<void> {

    await this.run(() => this.active.pause());
  }

  async resume(): Promise<void> {

    await this.run(() => this.active.resume());
  }

  async next(): Promise<void> {

    await this.run(() => this.active.next());
  }

  async previous(): Promise<void> {

    await this.run(() => this.active.previous());
  }

  async seek(positionMs: number): Promise<void> {

    await this.run(() => this.active.seek(positionMs));
  }

  async setVolume(volume: number): Promise<void> {

    await this.run(() => this.active.setVolume(volume));
  }

  async setShuffle(enabled: boolean): Promise<void> {

    await this.run(() => this.active.setShuffle(enabled));
  }

  async setRepeat(mode: RepeatMode): Promise<void> {

    await this.run(() => this.active.setRepeat(mode));
  }

  async refreshState(): Promise<PlaybackState> {

    let state = this.active.state;

    await this.run(async () => {

      state = await this.active.refreshState();
    });

    return state;
  }

  /**
   * Lists the user's Connect devices.
   * @throws CredentialError NoAccessCredential when there is no token provider, or the Web API's error.
   */
  async listDevices(): Promise<RemoteDevice[]> {

    const api = this.api;

    if(!api) {

      throw new CredentialError("NoAccessCredential", "No Spotify credentials are configured.");
    }

    let devices: RemoteDevice[] = [];

    await this.run(async () => {

      devices = await api.listDevices();
    });

    return devices;
  }

  private attach(backend: PlaybackBackend): void {

    this.detach?.();

    this.active = backend;
    this.detach = backend.onError((notice) => this.recordNotice(notice));
  }

  // Runs a backend call, recording its failure before passing it on.
  private async run(operation: () => Promise<void>): Promise<void> {

    try {

      await operation();
    } catch(error) {

      this.recordError(error);

      throw error;
    }
  }

  private recordError(error: unknown): void {

    this.recordNotice({ diagnostics: null, error: toPlaybackErrorKind(error), message: formatError(error) });
  }

  private recordNotice(notice: PlaybackErrorNotice): void {

    log.warn("Playback error: %s.", notice.message);

    this.lastError = { ...notice, timestamp: new Date().toISOString() };
  }
}
