/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * pageScripts.ts: Functions evaluated inside the player page.
 */
import type { PlayerCommand } from "./channel.js";

/* Everything in this file runs in the player page, not in Node. Puppeteer serializes each function and evaluates it there, so a function may only use its own
 * parameters and the page's globals. Nothing from the surrounding module is in scope at run time, which is why helpers are declared inside the function that
 * uses them.
 *
 * The page reports its events by posting to window.webkit.messageHandlers.playerEvent. That is the handler name the player page was written against, and the
 * message shim provides it on top of the function binding the transport exposes.
 */

/**
 * Provides window.webkit.messageHandlers.playerEvent and routes posts to the exposed __slideshowPlayerEvent binding. Installed before any page script runs.
 */
export function installMessageShim(): void {

  const deliver = (payload: unknown): void => {

    const bridge = window.__slideshowPlayerEvent;

    if(!bridge) {

      return;
    }

    bridge(payload).catch((error: unknown) => {

      // eslint-disable-next-line no-console
      console.warn("Player event bridge failed:", error);
    });
  };

  const webkit = window.webkit ?? {};
  const handlers = webkit.messageHandlers ?? {};

  handlers.playerEvent = { postMessage: deliver };
  webkit.messageHandlers = handlers;
  window.webkit = webkit;
}

/**
 * Points the Web Playback SDK's ready callback at the page's player factory, and runs it right away when the SDK finished loading first.
 */
export function installSdkReadyBridge(): boolean {

  const handle = window.INTERNAL_PLAYER;

  if(!handle) {

    return false;
  }

  const onReady = (): void => {

    handle._sdkReady = true;
    handle._maybeCreatePlayer?.();
  };

  window.onSpotifyWebPlaybackSDKReady = onReady;

  if(window.Spotify) {

    onReady();
  }

  return true;
}

/**
 * Hooks the SDK player so its lifecycle reaches us as player events. Safe to run more than once.
 *
 * - ready and not_ready become ready and notReady events carrying the device id.
 * - The SDK's error listeners become error events with the listener name as the code.
 * - connect() is wrapped to report a connectResult, plus an error when the connection fails or throws.
 * - The device id is also polled from the player's options every 500ms, because the SDK does not always fire ready for a player created before our listeners.
 *
 * @returns False when the page has no INTERNAL_PLAYER.
 */
export function installPlayerHooks(): boolean {

  const handle = window.INTERNAL_PLAYER;

  if(!handle) {

    return false;
  }

  const post = (payload: Record<string, unknown>): void => {

    window.webkit?.messageHandlers?.playerEvent?.postMessage(payload);
  };

  const hookPlayer = (player: SdkPlayer): void => {

    if(!player.__slideshowHooks) {

      player.__slideshowHooks = true;

      player.addListener("ready", (payload) => post({ deviceId: payload.device_id, type: "ready" }));
      player.addListener("not_ready", (payload) => post({ deviceId: payload.device_id, type: "notReady" }));

      for(const code of [ "initialization_error", "authentication_error", "account_error", "playback_error" ]) {

        player.addListener(code, (payload) => post({ code, message: payload.message ?? code, type: "error" }));
      }
    }

    if(!player.__slideshowConnectWrapped) {

      player.__slideshowConnectWrapped = true;

      const connect = player.connect.bind(player);

      player.connect = async (): Promise<boolean> => {

        try {

          const connected = await connect();

          post({ message: connected ? "connected" : "failed", type: "connectResult" });

          if(!connected) {

            post({ code: "connect_failed", message: "The player refused to connect.", type: "error" });
          }

          return connected;
        } catch(error) {

          post({ code: "connect_throw", message: String(error), type: "error" });

          throw error;
        }
      };
    }

    // Undefined means the poll never ran. It is set back to null once the id has been seen, so a second install does not start it again.
    if(player.__slideshowIdPoll === undefined) {

      const poll = setInterval(() => {

        const deviceId = player._options?.id;

        if(deviceId) {

          clearInterval(poll);
          player.__slideshowIdPoll = null;
          post({ deviceId, type: "ready" });
        }
      }, 500);

      player.__slideshowIdPoll = poll;
    }
  };

  if(!handle.__slideshowHooks) {

    handle.__slideshowHooks = true;

    const createPlayer = handle._maybeCreatePlayer;

    if(typeof createPlayer === "function") {

      handle._maybeCreatePlayer = (): void => {

        createPlayer.call(handle);

        if(handle._player) {

          hookPlayer(handle._player);
        }
      };
    }
  }

  if(handle._player) {

    hookPlayer(handle._player);
  }

  handle._maybeCreatePlayer?.();

  return true;
}

/**
 * Whether the page has finished loading and defined its control object.
 */
export function isPlayerPageReady(): boolean {

  return (document.readyState === "complete") && (window.INTERNAL_PLAYER !== undefined);
}

/**
 * Runs one command against the page. "connect" goes to the SDK player itself, "resume" falls back to play() when the page has no resume().
 * @returns True once the page method has returned or its promise has settled.
 * @throws When the page has no such method, or the method throws.
 */
export async function invokePlayerMethod(command: PlayerCommand, args: unknown[]): Promise<boolean> {

  const handle = window.INTERNAL_PLAYER;

  if(!handle) {

    throw new Error("INTERNAL_PLAYER is not defined in the player page.");
  }

  if(command === "connect") {

    if(!handle._player) {

      throw new Error("The player page has not created its SDK player yet.");
    }

    await handle._player.connect();

    return true;
  }

  const name = ((command === "resume") && (typeof handle.resume !== "function")) ? "play" : command;
  const method = handle[name];

  if(typeof method !== "function") {

    throw new Error("INTERNAL_PLAYER." + name + " is not a function.");
  }

  await Promise.resolve(method.apply(handle, args));

  return true;
}
