/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * global.d.ts: Global type declarations for Slideshow Player.
 */

// Payload shapes the Web Playback SDK hands to its listeners.
interface SdkListenerPayload {

  device_id?: string;
  message?: string;
}

// The subset of the Web Playback SDK player object the page hooks touch.
interface SdkPlayer {

  __slideshowConnectWrapped?: boolean;
  __slideshowHooks?: boolean;
  __slideshowIdPoll?: ReturnType<typeof setInterval> | null;
  _options?: { id?: string };
  addListener: (event: string, listener: (payload: SdkListenerPayload) => void) => boolean;
  connect: () => Promise<boolean>;
}

// The player page's global control object. Command methods are looked up by name, so the remaining members are left open.
interface InternalPlayerHandle {

  [member: string]: unknown;
  __slideshowHooks?: boolean;
  _maybeCreatePlayer?: () => void;
  _player?: SdkPlayer;
  _sdkReady?: boolean;
}

// Globals the player page and our bridge install on window. The webkit message handler shape is what the player page posts its events to.
interface Window {

  INTERNAL_PLAYER?: InternalPlayerHandle;
  Spotify?: unknown;
  __slideshowPlayerEvent?: (payload: unknown) => Promise<void>;
  onSpotifyWebPlaybackSDKReady?: () => void;
  webkit?: {

    messageHandlers?: {

      playerEvent?: {

        postMessage: (payload: unknown) => void;
      };
    };
  };
}
