/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * factory.ts: Playback backend selection and caching.
 */
import type { BackendMode, Config, Nullable } from "../types/index.js";
import { LOG } from "../utils/index.js";
import { ControlChannel } from "../player/channel.js";
import { ExternalDeviceBackend } from "./external.js";
import { InternalPlayerBackend } from "./internal.js";
import type { PlaybackBackend } from "./backend.js";
import type { PlayerSupervisor } from "../player/supervisor.js";
import { PuppeteerTransport } from "../player/transport.js";
import { SpotifyWebApi } from "../spotify/webApi.js";
import type { RemotePlaybackApi } from "../spotify/webApi.js";
import type { TokenProvider } from "../spotify/tokens.js";
import { getPlayerPageUrl } from "../config/index.js";

/* The factory is created once at startup and handed to the playback session. It owns the one internal backend of the session: the internal player is a process
 * plus a page plus a Connect device, and there must never be two of them. External backends are cheap and stateless, so each request gets a fresh one.
 */

const log = LOG.withComponent("Factory");

export interface PlaybackBackendBuilders {

  external: (tokens: TokenProvider) => PlaybackBackend;
  internal: (tokens: TokenProvider) => PlaybackBackend;
}

export class PlaybackBackendFactory {

  private readonly builders: PlaybackBackendBuilders;
  private cachedInternal: Nullable<PlaybackBackend> = null;
  private prewarmed: Nullable<PlaybackBackend> = null;

  constructor(builders: PlaybackBackendBuilders) {

    this.builders = builders;
  }

  /**
   * The cached internal backend, if one has been built.
   */
  get internalBackend(): Nullable<PlaybackBackend> {

    return this.cachedInternal;
  }

  /**
   * Returns a backend for the mode.
   * @param mode - Which backend to build.
   * @param tokens - The token provider the backend authenticates with.
   * @returns The backend, the cached one for internal mode, or null without a token provider.
   */
  makeBackend(mode: BackendMode, tokens: Nullable<TokenProvider>): Nullable<PlaybackBackend> {

    if(!tokens) {

      log.warn("No token provider is available, cannot build the %s backend.", mode);

      return null;
    }

    if(mode === "external") {

      return this.builders.external(tokens);
    }

    if(!this.cachedInternal) {

      log.info("Building the internal player backend.");

      this.cachedInternal = this.builders.internal(tokens);
    }

    return this.cachedInternal;
  }

  /**
   * Builds the internal backend and initializes it ahead of first use. Repeated calls for the same cached backend do nothing; a failed prewarm can be retried.
   * @param tokens - The token provider the backend authenticates with.
   * @returns The prewarmed backend, or null without a token provider.
   */
  async prewarmBackend(tokens: Nullable<TokenProvider>): Promise<Nullable<PlaybackBackend>> {

    const backend = this.makeBackend("internal", tokens);

    if(!backend || (this.prewarmed === backend)) {

      return backend;
    }

    this.prewarmed = backend;

    log.info("Prewarming the internal player backend.");

    try {

      await backend.initialize();
    } catch(error) {

      this.prewarmed = null;

      throw error;
    }

    return backend;
  }
}

/**
 * Builds the production factory: internal backends drive the supervised player over the DevTools transport, external backends use the Web API directly.
 * @param config - The effective configuration.
 * @param supervisor - The session's process supervisor.
 */
export function createPlaybackBackendFactory(config: Config, supervisor: PlayerSupervisor): PlaybackBackendFactory {

  const createApi = (tokens: TokenProvider): RemotePlaybackApi => new SpotifyWebApi({

    baseUrl: config.spotify.apiBaseUrl,
    requestTimeout: config.spotify.requestTimeout,
    tokens
  });

  return new PlaybackBackendFactory({

    external: (tokens) => new ExternalDeviceBackend({ api: createApi(tokens) }),
    internal: (tokens) => new InternalPlayerBackend({

      api: createApi(tokens),
      backendBaseUrl: config.spotify.backendBaseUrl,
      channel: new ControlChannel(new PuppeteerTransport({

        commandTimeout: config.player.commandTimeout,
        connectTimeout: config.player.connectTimeout,
        contentTimeout: config.player.contentTimeout,
        debugPort: config.player.debugPort,
        pageUrl: getPlayerPageUrl(config, config.spotify.backendBaseUrl)
      })),
      deviceName: config.player.deviceName,
      supervisor,
      tokens
    })
  });
}
