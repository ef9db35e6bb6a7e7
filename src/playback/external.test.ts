/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * external.test.ts: Tests for the remote device control and no-op backends.
 */
import { describe, expect, it } from "vitest";
import { ExternalDeviceBackend } from "./external.js";
import { FakeWebApi } from "../testing/fakes.js";
import { IDLE_PLAYBACK_STATE } from "../types/index.js";
import { NoopBackend } from "./noop.js";
import { RemoteApiError } from "../utils/index.js";

describe("ExternalDeviceBackend", () => {

  it("is not ready until initialized", async () => {

    const api = new FakeWebApi();
    const backend = new ExternalDeviceBackend({ api });

    expect(backend.readiness).toBe("Uninitialized");
    await expect(backend.pause()).rejects.toMatchObject({ code: "NotReady" });

    await backend.initialize();

    expect(backend.isReady).toBe(true);
    expect(api.calls).toEqual([]);
  });

  it("sends every command to the Web API for the target device", async () => {

    const api = new FakeWebApi();
    const backend = new ExternalDeviceBackend({ api, deviceId: "speaker-1" });

    await backend.initialize();
    await backend.play("spotify:track:one", 2500);
    await backend.pause();
    await backend.resume();
    await backend.next();
    await backend.previous();
    await backend.seek(3000);
    await backend.setVolume(0.456);
    await backend.setShuffle(false);
    await backend.setRepeat("track");

    expect(api.calls).toEqual([

      { args: [ "spotify:track:one", "speaker-1", 2500 ], method: "startPlayback" },
      { args: ["speaker-1"], method: "pause" },
      { args: ["speaker-1"], method: "resume" },
      { args: ["speaker-1"], method: "skipNext" },
      { args: ["speaker-1"], method: "skipPrevious" },
      { args: [ 3000, "speaker-1" ], method: "seek" },
      { args: [ 46, "speaker-1" ], method: "setVolume" },
      { args: [ false, "speaker-1" ], method: "setShuffle" },
      { args: [ "track", "speaker-1" ], method: "setRepeat" }
    ]);
  });

  it("clamps the volume before converting it to a percentage", async () => {

    const api = new FakeWebApi();
    const backend = new ExternalDeviceBackend({ api });

    await backend.initialize();
    await backend.setVolume(2);
    await backend.setVolume(-1);

    expect(api.calls.map((call) => call.args)).toEqual([ [ 100, null ], [ 0, null ] ]);
  });

  it("surfaces Web API errors and stays ready", async () => {

    const api = new FakeWebApi();
    const backend = new ExternalDeviceBackend({ api });

    await backend.initialize();
    api.failures.push(new RemoteApiError(404, "No active device found", "NO_ACTIVE_DEVICE"));

    await expect(backend.resume()).rejects.toMatchObject({ reason: "NO_ACTIVE_DEVICE", statusCode: 404 });
    expect(backend.isReady).toBe(true);
  });

  it("reads the playback state, treating nothing playing as idle", async () => {

    const api = new FakeWebApi();
    const backend = new ExternalDeviceBackend({ api });

    await backend.initialize();

    await expect(backend.refreshState()).resolves.toEqual(IDLE_PLAYBACK_STATE);

    api.playbackState = { ...IDLE_PLAYBACK_STATE, isPlaying: true, positionMs: 1200, trackUri: "spotify:track:two" };

    await expect(backend.refreshState()).resolves.toMatchObject({ isPlaying: true, positionMs: 1200, trackUri: "spotify:track:two" });
    expect(backend.state.trackUri).toBe("spotify:track:two");
  });
});

describe("NoopBackend", () => {

  it("is always ready, idle, and accepts every command", async () => {

    const backend = new NoopBackend();

    await backend.initialize();

    expect(backend.isReady).toBe(true);
    expect(backend.mode).toBe("none");
    expect(backend.state).toEqual(IDLE_PLAYBACK_STATE);
    await expect(backend.play()).resolves.toBeUndefined();
    await expect(backend.setVolume()).resolves.toBeUndefined();
  });
});
