/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * internal.ts: Internal player backend and its readiness state machine.
 */
import type { BackendReadiness, ControlEvent, Nullable, RepeatMode } from "../types/index.js";
import { LOG, ReadinessError, RemoteApiError, clearDiagnostics, formatError, formattedDiagnostics, startTimer, toPlaybackErrorKind } from "../utils/index.js";
import { BaseBackend } from "./backend.js";
import type { ControlChannel } from "../player/channel.js";
import { DeviceDiscovery } from "./discovery.js";
import type { DeviceDiscoveryOptions } from "./discovery.js";
import { IDLE_PLAYBACK_STATE } from "../types/index.js";
import type { PlayerSupervisor } from "../player/supervisor.js";
import type { ProcessExit } from "../player/launcher.js";
import type { RemotePlaybackApi } from "../spotify/webApi.js";
import type { TokenProvider } from "../spotify/tokens.js";

/*
 * READINESS STATE MACHINE
 *
 * Getting the internal player to the point where it can take commands is a sequence of steps, each of which can stall or fail on its own:
 *
 *   Uninitialized -> ProcessStarting -> ContentLoading -> CredentialPending -> ConnectingDevice -> Ready
 *
 * ProcessStarting     A credential is fetched and the supervisor makes sure the player process is running.
 * ContentLoading      The credential is buffered on the channel and the player page is loaded.
 * CredentialPending   The page has loaded. The channel flushed the buffered credential, or a fresh one is fetched and sent.
 * ConnectingDevice    connect has been issued to the page's SDK player.
 * Ready               A ready event carried the device id, connect reported success, or discovery found the device.
 *
 * The player's own ready event is not reliable, so after connect (or on a credential acknowledgement) a bounded discovery poll races it. Whichever confirms
 * readiness first wins and the other is ignored; the poll is cancelled once the ready event arrives. While the poll runs and nothing has confirmed readiness,
 * the state reads DiscoveringDevice. A poll that runs out of attempts leaves the state unresolved (back to ConnectingDevice) for a late ready event to settle.
 *
 * Degraded is entered when initialization fails, the player process exits unexpectedly, or a Ready backend sees notReady for its device or an error event. The
 * device id and process are kept, so a later ready event or successful discovery recovers, and initialize() from Degraded starts over at ProcessStarting.
 *
 * Only stop() returns to Uninitialized. Every stop() bumps a generation counter; asynchronous steps that resume after a stop see the new generation and drop
 * their results.
 */

const log = LOG.withComponent("InternalBackend");

export interface InternalPlayerBackendOptions {

  api: RemotePlaybackApi;
  backendBaseUrl: Nullable<string>;
  channel: ControlChannel;

  // The display name the player registers under.
  deviceName: string;
  discovery?: DeviceDiscoveryOptions;
  supervisor: PlayerSupervisor;
  tokens: TokenProvider;
}

export class InternalPlayerBackend extends BaseBackend {

  readonly mode = "internal";

  private readonly api: RemotePlaybackApi;
  private readonly backendBaseUrl: Nullable<string>;
  private readonly channel: ControlChannel;
  private currentDeviceId: Nullable<string> = null;
  private currentReadiness: BackendReadiness = "Uninitialized";
  private readonly discovery: DeviceDiscovery;
  private generation = 0;
  private initializing: Nullable<Promise<void>> = null;
  private readonly supervisor: PlayerSupervisor;
  private readonly tokens: TokenProvider;

  constructor(options: InternalPlayerBackendOptions) {

    super();

    this.api = options.api;
    this.backendBaseUrl = options.backendBaseUrl;
    this.channel = options.channel;
    this.discovery = new DeviceDiscovery(options.api, options.deviceName, options.discovery);
    this.supervisor = options.supervisor;
    this.tokens = options.tokens;

    this.channel.onEvent((event) => this.handleEvent(event));
    this.supervisor.onExit((exit, expected) => this.handleExit(exit, expected));
  }

  get deviceId(): Nullable<string> {

    return this.currentDeviceId;
  }

  get readiness(): BackendReadiness {

    return this.currentReadiness;
  }

  /**
   * Brings the player up. Resolves once the device is confirmed ready or the discovery poll has run its course; check readiness for the outcome. Calls while an
   * initialization is in flight share it, and calls on a backend that is already past Uninitialized (and not Degraded) return immediately.
   * @throws CredentialError or ProcessError when the attempt fails. The backend is Degraded afterwards.
   */
  async initialize(): Promise<void> {

    if(this.initializing) {

      return this.initializing;
    }

    if((this.currentReadiness !== "Uninitialized") && (this.currentReadiness !== "Degraded")) {

      return;
    }

    const initializing = this.runInitialize().finally(() => {

      if(this.initializing === initializing) {

        this.initializing = null;
      }
    });

    this.initializing = initializing;

    return initializing;
  }

  /**
   * Cancels discovery, sends a best-effort pause, detaches the channel and terminates the player process. The backend returns to Uninitialized with an idle state.
   */
  async stop(): Promise<void> {

    // An initialization still winding down belongs to the old generation. The next initialize() starts over rather than joining it.
    this.generation++;
    this.initializing = null;
    this.discovery.cancel();

    log.info("Stopping the internal player.");

    if(this.channel.isContentLoaded) {

      this.channel.pause();
    }

    await this.channel.close();
    await this.supervisor.stop();

    this.currentDeviceId = null;
    this.transition("Uninitialized");
    this.emitState({ ...IDLE_PLAYBACK_STATE });
  }

  async play(trackUri: string, startPositionMs?: number): Promise<void> {

    this.assertReady();

    await this.withDevice("play", (deviceId) => this.api.startPlayback(trackUri, deviceId, startPositionMs));
  }

  async resume(): Promise<void> {

    this.assertReady();

    await this.withDevice("resume", (deviceId) => this.api.resume(deviceId));
  }

  async pause(): Promise<void> {

    this.assertReady();
    this.channel.pause();
  }

  async next(): Promise<void> {

    this.assertReady();
    this.channel.next();
  }

  async previous(): Promise<void> {

    this.assertReady();
    this.channel.previous();
  }

  async seek(positionMs: number): Promise<void> {

    this.assertReady();
    this.channel.seek(positionMs);
  }

  async setVolume(volume: number): Promise<void> {

    this.assertReady();
    this.channel.setVolume(volume);
  }

  async setShuffle(enabled: boolean): Promise<void> {

    this.assertReady();

    await this.withDevice("shuffle", (deviceId) => this.api.setShuffle(enabled, deviceId));
  }

  async setRepeat(mode: RepeatMode): Promise<void> {

    this.assertReady();

    await this.withDevice("repeat", (deviceId) => this.api.setRepeat(mode, deviceId));
  }

  private async runInitialize(): Promise<void> {

    const generation = this.generation;
    const elapsed = startTimer();

    clearDiagnostics();

    this.transition("ProcessStarting");

    try {

      const credential = await this.tokens.getValidAccessCredential();

      if(generation !== this.generation) {

        return;
      }

      await this.supervisor.ensureRunning(credential, this.backendBaseUrl);

      if(generation !== this.generation) {

        return;
      }

      LOG.debug("timing:init", "Player process running. (+%sms)", elapsed());

      this.transition("ContentLoading");
      this.channel.sendCredential(credential);

      // The ContentLoaded event moves us to CredentialPending and flushes the buffered credential before this resolves.
      await this.channel.loadContent();

      if(generation !== this.generation) {

        return;
      }

      LOG.debug("timing:init", "Player content loaded. (+%sms)", elapsed());

      if(!this.channel.hasDeliveredCredential) {

        log.info("No credential was delivered with the content, requesting a fresh one.");

        const fresh = await this.tokens.getValidAccessCredential();

        if(generation !== this.generation) {

          return;
        }

        this.channel.sendCredential(fresh);
      }
    } catch(error) {

      if(generation === this.generation) {

        this.fail(error);
      }

      throw error;
    }

    if(this.currentReadiness !== "Ready") {

      this.transition("ConnectingDevice");
      this.channel.connect();
    }

    await this.runDiscovery();

    LOG.debug("timing:init", "Initialization finished in state %s. (+%sms)", this.currentReadiness, elapsed());
  }

  // Runs the discovery poll as the safety net for the ready event.
  private async runDiscovery(): Promise<void> {

    if(this.currentReadiness === "Ready") {

      return;
    }

    const generation = this.generation;

    if((this.currentReadiness === "ConnectingDevice") || (this.currentReadiness === "CredentialPending")) {

      this.transition("DiscoveringDevice");
    }

    const device = await this.discovery.run();

    if(generation !== this.generation) {

      return;
    }

    if(device) {

      if(this.readiness !== "Ready") {

        this.adopt(device.id, "discovery");
      }

      return;
    }

    if(this.currentReadiness === "DiscoveringDevice") {

      log.warn("Discovery did not confirm the player, waiting for its ready event.");
      this.transition("ConnectingDevice");
    }
  }

  // Runs a device-targeted command. A missing or stale device id triggers one rediscovery before giving up.
  private async withDevice(description: string, command: (deviceId: string) => Promise<void>): Promise<void> {

    if(this.currentDeviceId) {

      try {

        await command(this.currentDeviceId);

        return;
      } catch(error) {

        if(!(error instanceof RemoteApiError) || (error.statusCode !== 404)) {

          throw error;
        }

        log.warn("Device %s is stale (%s), rediscovering.", this.currentDeviceId, error.message);
      }
    } else {

      log.info("No device id for %s, rediscovering.", description);
    }

    const generation = this.generation;
    const device = await this.discovery.run();

    if(generation !== this.generation) {

      throw new ReadinessError("NotReady", "Playback backend was stopped.");
    }

    if(!device) {

      throw new ReadinessError("DeviceNotFound", "The player device could not be found.");
    }

    this.currentDeviceId = device.id;

    await command(device.id);
  }

  private handleEvent(event: ControlEvent): void {

    if(this.currentReadiness === "Uninitialized") {

      return;
    }

    switch(event.type) {

      case "ContentLoaded": {

        if(this.currentReadiness === "ContentLoading") {

          this.transition("CredentialPending");
        }

        break;
      }

      case "CredentialAck": {

        void this.runDiscovery();

        break;
      }

      case "Ready": {

        this.adopt(event.deviceId, "ready event");

        break;
      }

      case "ConnectResult": {

        if(!event.ok) {

          log.warn("The player failed to connect.");

          break;
        }

        if(this.currentReadiness !== "Ready") {

          this.discovery.cancel();
          this.transition("Ready");
        }

        break;
      }

      case "NotReady": {

        if((this.currentReadiness === "Ready") && (!event.deviceId || !this.currentDeviceId || (event.deviceId === this.currentDeviceId))) {

          log.warn("Device %s went offline.", event.deviceId ?? this.currentDeviceId ?? "(unknown)");
          this.transition("Degraded");
        }

        break;
      }

      case "Error": {

        if(this.currentReadiness === "Ready") {

          this.transition("Degraded");
        }

        this.emitError({

          diagnostics: null,
          error: { kind: "backend", message: event.message },
          message: [ "Player error ", event.code, ": ", event.message ].join("")
        });

        break;
      }

      case "StateChanged": {

        this.emitState({

          artistName: event.artistName,
          durationMs: event.durationMs,
          isBuffering: false,
          isPlaying: event.isPlaying,
          positionMs: event.positionMs,
          trackName: event.trackName,
          trackUri: event.trackUri
        });

        break;
      }

      default: {

        break;
      }
    }
  }

  private handleExit(exit: ProcessExit, expected: boolean): void {

    if(expected || (this.currentReadiness === "Uninitialized")) {

      return;
    }

    const message = [ "Player process exited unexpectedly (code ", String(exit.code ?? "none"), ", signal ", exit.signal ?? "none", ")." ].join("");

    // Work started for the dead process must not carry on against its page or adopt its lingering device entry.
    this.generation++;
    this.initializing = null;
    this.discovery.cancel();
    this.transition("Degraded");

    // The page went with the process. Forget its content and credential state so the next initialize() loads it again.
    void this.channel.close();

    this.emitError({ diagnostics: formattedDiagnostics(), error: { kind: "backend", message }, message });
  }

  private adopt(deviceId: string, source: string): void {

    this.discovery.cancel();

    if(this.currentDeviceId !== deviceId) {

      log.info("Player device is %s (from %s).", deviceId, source);
    }

    this.currentDeviceId = deviceId;
    this.transition("Ready");
  }

  private fail(error: unknown): void {

    const diagnostics = formattedDiagnostics();

    log.error("Player initialization failed: %s.", formatError(error));

    this.discovery.cancel();
    this.transition("Degraded");
    this.emitError({ diagnostics, error: toPlaybackErrorKind(error), message: formatError(error) });
  }

  private transition(next: BackendReadiness): void {

    if(this.currentReadiness === next) {

      return;
    }

    log.info("Readiness %s -> %s.", this.currentReadiness, next);

    this.currentReadiness = next;
  }
}
