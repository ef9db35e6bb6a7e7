/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * channel.ts: Control channel to the player runtime.
 */
import { ChannelError, LOG, clamp, formatError, redactCredential } from "../utils/index.js";
import type { ControlEvent, Nullable } from "../types/index.js";
import { decodeControlEvent } from "./events.js";

/*
 * CONTROL CHANNEL
 *
 * The channel is the only way anything talks to the player page. Outbound, it turns commands into calls of window.INTERNAL_PLAYER methods. Inbound, it decodes
 * whatever the page posts into ControlEvents and hands them to subscribers. How the bytes travel is the transport's business; see transport.ts.
 *
 * Two rules shape the outbound side:
 *
 * - Commands are fire-and-forget. A failed send is logged as a ChannelError and never reaches the caller, because the caller cannot do anything useful with it and
 *   the player reports its real state through events anyway.
 * - The access token cannot be delivered before the page has loaded. sendCredential() before that point keeps the token (the latest one wins) and delivers it the
 *   moment ContentLoaded is observed, exactly once.
 */

const log = LOG.withComponent("Channel");

/**
 * Methods the transport can invoke on the player page. "connect" asks the page's SDK player to connect as a device.
 */
export type PlayerCommand = "connect" | "next" | "pause" | "play" | "previous" | "resume" | "seek" | "setAccessToken" | "setVolume";

/**
 * A way of reaching the player page.
 */
export interface PlayerTransport {

  /**
   * Detaches from the player. Safe to call when not open.
   */
  close(): Promise<void>;

  /**
   * Invokes a player method with arguments.
   * @returns Whatever the page returned.
   */
  invoke(command: PlayerCommand, args: unknown[]): Promise<unknown>;

  /**
   * Attaches to the player and loads its page. Resolves once the page is loaded and ready for commands; every payload the page posts from then on goes to
   * onMessage.
   */
  open(onMessage: (payload: unknown) => void): Promise<void>;
}

export type ControlEventListener = (event: ControlEvent) => void;

export class ControlChannel {

  private contentLoaded = false;
  private credentialDelivered = false;
  private readonly listeners = new Set<ControlEventListener>();
  private loading: Nullable<Promise<void>> = null;
  private pendingCredential: Nullable<string> = null;
  private readonly transport: PlayerTransport;

  constructor(transport: PlayerTransport) {

    this.transport = transport;
  }

  get isContentLoaded(): boolean {

    return this.contentLoaded;
  }

  /**
   * Whether a credential has been handed to the page since the content loaded.
   */
  get hasDeliveredCredential(): boolean {

    return this.credentialDelivered;
  }

  /**
   * Subscribes to decoded inbound events.
   * @returns A function that removes the listener.
   */
  onEvent(listener: ControlEventListener): () => void {

    this.listeners.add(listener);

    return (): void => {

      this.listeners.delete(listener);
    };
  }

  /**
   * Loads the player page. Emits ContentLoaded once it has loaded. Concurrent calls share one load, and a loaded page is not loaded again.
   * @throws ChannelError SendFailed when the page could not be loaded. There is no automatic retry.
   */
  async loadContent(): Promise<void> {

    if(this.contentLoaded) {

      return;
    }

    if(this.loading) {

      return this.loading;
    }

    log.info("Loading player content.");

    this.loading = this.transport.open((payload) => this.receive(payload)).then(() => {

      this.receive({ type: "contentLoaded" });
    }, (error: unknown) => {

      throw new ChannelError("SendFailed", "Unable to load player content: " + formatError(error) + ".");
    }).finally(() => {

      this.loading = null;
    });

    return this.loading;
  }

  /**
   * Delivers an access token to the page, or keeps it until the page has loaded.
   * @param token - The access token.
   * @returns "sent" when delivered now, "buffered" when held for ContentLoaded.
   */
  sendCredential(token: string): "buffered" | "sent" {

    if(!this.contentLoaded) {

      if(this.pendingCredential) {

        log.info("Replacing buffered credential %s with %s.", redactCredential(this.pendingCredential), redactCredential(token));
      } else {

        log.info("Content not loaded yet, buffering credential %s.", redactCredential(token));
      }

      this.pendingCredential = token;

      return "buffered";
    }

    this.deliverCredential(token);

    return "sent";
  }

  play(trackUri: string, startPositionMs?: number): void {

    this.send("play", (startPositionMs === undefined) ? [trackUri] : [ trackUri, Math.max(0, Math.round(startPositionMs)) ]);
  }

  pause(): void {

    this.send("pause", []);
  }

  resume(): void {

    this.send("resume", []);
  }

  next(): void {

    this.send("next", []);
  }

  previous(): void {

    this.send("previous", []);
  }

  seek(positionMs: number): void {

    this.send("seek", [Math.max(0, Math.round(positionMs))]);
  }

  /**
   * Sets the player volume. Values are clamped to 0..1.
   */
  setVolume(volume: number): void {

    this.send("setVolume", [clamp(volume, 0, 1)]);
  }

  /**
   * Asks the page's SDK player to connect. The page reports the outcome as a connectResult event.
   */
  connect(): void {

    this.send("connect", []);
  }

  /**
   * Detaches the transport and forgets the content and credential state. Listeners stay subscribed.
   */
  async close(): Promise<void> {

    this.contentLoaded = false;
    this.credentialDelivered = false;
    this.pendingCredential = null;

    try {

      await this.transport.close();
    } catch(error) {

      log.warn("Closing the player transport failed: %s.", formatError(error));
    }
  }

  /**
   * Decodes and dispatches one inbound payload.
   * @param payload - The payload as posted by the page.
   */
  receive(payload: unknown): void {

    LOG.debug("channel:events", "Received %j.", payload);

    const event = decodeControlEvent(payload);

    switch(event.type) {

      case "Unknown": {

        log.warn("%s", new ChannelError("DecodeFailed", "Ignoring undecodable player event " + JSON.stringify(event.raw) + ".").message);

        break;
      }

      case "ContentLoaded": {

        log.info("Player content loaded.");

        this.contentLoaded = true;

        if(this.pendingCredential) {

          const token = this.pendingCredential;

          this.pendingCredential = null;
          log.info("Flushing buffered credential.");
          this.deliverCredential(token);
        }

        break;
      }

      case "StateChanged": {

        log.info("Player state: %s %s at %sms of %sms.", event.isPlaying ? "playing" : "paused", event.trackUri ?? "(no track)", event.positionMs,
          event.durationMs);

        break;
      }

      case "Error": {

        log.warn("Player error %s: %s.", event.code, event.message);

        break;
      }

      default: {

        log.info("Player event %s%s.", event.type, ("deviceId" in event) ? " (device " + (event.deviceId ?? "unknown") + ")" : "");

        break;
      }
    }

    for(const listener of [...this.listeners]) {

      listener(event);
    }
  }

  private deliverCredential(token: string): void {

    this.credentialDelivered = true;
    this.send("setAccessToken", [token], "setAccessToken(" + redactCredential(token) + ")");
  }

  private send(command: PlayerCommand, args: unknown[], description?: string): void {

    const label = description ?? [ command, "(", args.map((arg) => JSON.stringify(arg)).join(", "), ")" ].join("");

    log.info("Sending %s.", label);

    this.transport.invoke(command, args).then((result) => {

      LOG.debug("channel:commands", "%s returned %j.", label, result);
    }, (error: unknown) => {

      log.warn("%s", new ChannelError("SendFailed", "Sending " + label + " failed: " + formatError(error) + ".").message);
    });
  }
}
