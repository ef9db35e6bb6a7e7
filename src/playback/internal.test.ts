/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * internal.test.ts: Tests for the internal player backend and its readiness state machine.
 */
import { CredentialError, ReadinessError, RemoteApiError, clearDiagnostics, startDiagnosticCapture, stopDiagnosticCapture } from "../utils/index.js";
import { FakeLauncher, FakeTokenProvider, FakeTransport, FakeWebApi, device, settle } from "../testing/fakes.js";
import type { PlaybackState, RemoteDevice } from "../types/index.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ControlChannel } from "../player/channel.js";
import { InternalPlayerBackend } from "./internal.js";
import type { PlaybackErrorNotice } from "./backend.js";
import { PlayerSupervisor } from "../player/supervisor.js";

const NAME = "Electric Slideshow Internal Player";

describe("InternalPlayerBackend", () => {

  let api: FakeWebApi;
  let backend: InternalPlayerBackend;
  let launcher: FakeLauncher;
  let notices: PlaybackErrorNotice[];
  let resolveHelper: (resourcesDir: string, helperName: string) => Promise<string>;
  let supervisor: PlayerSupervisor;
  let tokens: FakeTokenProvider;
  let transport: FakeTransport;

  function build(): InternalPlayerBackend {

    supervisor = new PlayerSupervisor({ debugPort: 9230, devRepoPath: null, helperName: "Player", launchMode: "packaged", launcher,
      resolveHelper: (resourcesDir, helperName) => resolveHelper(resourcesDir, helperName), resourcesDir: "/opt/resources" });

    const created = new InternalPlayerBackend({

      api,
      backendBaseUrl: null,
      channel: new ControlChannel(transport),
      deviceName: NAME,
      discovery: { sleep: async () => undefined },
      supervisor,
      tokens
    });

    created.onError((notice) => notices.push(notice));

    return created;
  }

  // Brings the backend to Ready through discovery on the first attempt.
  async function ready(): Promise<void> {

    api.devicesByCall = [[device("player-7", NAME)]];

    await backend.initialize();

    expect(backend.readiness).toBe("Ready");
  }

  beforeEach(() => {

    api = new FakeWebApi();
    launcher = new FakeLauncher();
    notices = [];
    resolveHelper = async () => "/opt/resources/Player/Player";
    tokens = new FakeTokenProvider("test-secret");
    transport = new FakeTransport();

    clearDiagnostics();
    startDiagnosticCapture();

    backend = build();
  });

  afterEach(() => {

    stopDiagnosticCapture();
    clearDiagnostics();
  });

  describe("initialize", () => {

    it("starts the process, delivers the credential once and connects", async () => {

      expect(backend.readiness).toBe("Uninitialized");

      await ready();

      expect(launcher.processes).toHaveLength(1);
      expect(launcher.specs[0].env.SPOTIFY_ACCESS_TOKEN).toBe("test-secret");
      expect(transport.invocations).toEqual([

        { args: ["test-secret"], command: "setAccessToken" },
        { args: [], command: "connect" }
      ]);
    });

    it("adopts a ready event that arrives before the poll completes and ignores the poll", async () => {

      let answer: (devices: RemoteDevice[]) => void = () => undefined;

      api.listDevicesHandler = async (): Promise<RemoteDevice[]> => new Promise((resolve) => {

        answer = resolve;
      });

      const initialized = backend.initialize();

      await settle();

      expect(backend.readiness).toBe("DiscoveringDevice");

      transport.post({ deviceId: "dev-123", type: "ready" });

      expect(backend.readiness).toBe("Ready");
      expect(backend.deviceId).toBe("dev-123");

      answer([device("player-7", NAME)]);
      await initialized;

      expect(backend.readiness).toBe("Ready");
      expect(backend.deviceId).toBe("dev-123");
      expect(api.listDevicesCalls).toBe(1);
    });

    it("becomes ready when the third poll attempt finds the well-known device", async () => {

      api.devicesByCall = [ [], [device("phone-1", "Phone")], [device("player-7", NAME)] ];

      await backend.initialize();

      expect(backend.readiness).toBe("Ready");
      expect(backend.deviceId).toBe("player-7");
      expect(api.listDevicesCalls).toBe(3);
    });

    it("leaves readiness unresolved when the poll runs out", async () => {

      await backend.initialize();

      expect(api.listDevicesCalls).toBe(6);
      expect(backend.readiness).toBe("ConnectingDevice");

      transport.post({ deviceId: "dev-123", type: "ready" });

      expect(backend.readiness).toBe("Ready");
    });

    it("becomes ready on a successful connect result", async () => {

      await backend.initialize();

      transport.post({ message: "connected", type: "connectResult" });

      expect(backend.readiness).toBe("Ready");
      expect(backend.deviceId).toBeNull();
    });

    it("does nothing when already ready", async () => {

      await ready();
      await backend.initialize();

      expect(launcher.processes).toHaveLength(1);
      expect(transport.opens).toBe(1);
    });

    it("degrades and reports the diagnostic log when no credential is available", async () => {

      tokens.failure = new CredentialError("NoAccessCredential", "No access token.");

      await expect(backend.initialize()).rejects.toBeInstanceOf(CredentialError);

      expect(backend.readiness).toBe("Degraded");
      expect(launcher.processes).toHaveLength(0);
      expect(notices).toHaveLength(1);
      expect(notices[0].error).toEqual({ kind: "unauthorized" });
      expect(notices[0].message).toBe("No access token");
      expect(notices[0].diagnostics).toContain("[InternalBackend] Readiness Uninitialized -> ProcessStarting.");
    });

    it("degrades when the helper cannot be found", async () => {

      resolveHelper = async () => {

        throw new Error("helper missing");
      };

      await expect(backend.initialize()).rejects.toThrow("helper missing");

      expect(backend.readiness).toBe("Degraded");
      expect(supervisor.isRunning).toBe(false);
    });

    it("degrades when the content fails to load", async () => {

      transport.failOpen = true;

      await expect(backend.initialize()).rejects.toMatchObject({ code: "SendFailed" });

      expect(backend.readiness).toBe("Degraded");
    });

    it("degrades once and stays down when the process exits while the content loads", async () => {

      api.devicesByCall = [[device("player-7", NAME)]];

      transport.whileOpening = async (): Promise<void> => {

        launcher.processes[0].exit();
        await settle();
      };

      await backend.initialize();

      expect(backend.readiness).toBe("Degraded");
      expect(backend.deviceId).toBeNull();
      expect(supervisor.isRunning).toBe(false);
      expect(api.listDevicesCalls).toBe(0);
      expect(transport.commands()).toEqual([]);
      expect(notices.map((notice) => notice.message)).toEqual(["Player process exited unexpectedly (code 1, signal none)."]);
    });
  });

  describe("commands", () => {

    it("fail with NotReady while connecting and send nothing", async () => {

      await backend.initialize();

      expect(backend.readiness).toBe("ConnectingDevice");

      const sent = transport.invocations.length;

      await expect(backend.pause()).rejects.toMatchObject({ code: "NotReady", name: "ReadinessError" });
      await expect(backend.play("spotify:track:one")).rejects.toBeInstanceOf(ReadinessError);
      await expect(backend.setVolume(0.5)).rejects.toBeInstanceOf(ReadinessError);

      expect(transport.invocations).toHaveLength(sent);
      expect(api.calls).toEqual([]);
    });

    it("send local commands through the channel", async () => {

      await ready();

      const sent = transport.invocations.length;

      await backend.pause();
      await backend.next();
      await backend.previous();
      await backend.seek(42000);
      await backend.setVolume(1.5);
      await backend.setVolume(-0.2);

      expect(transport.invocations.slice(sent)).toEqual([

        { args: [], command: "pause" },
        { args: [], command: "next" },
        { args: [], command: "previous" },
        { args: [42000], command: "seek" },
        { args: [1], command: "setVolume" },
        { args: [0], command: "setVolume" }
      ]);
      expect(api.calls).toEqual([]);
    });

    it("target the known device through the Web API", async () => {

      await ready();

      await backend.play("spotify:track:one", 1000);
      await backend.resume();
      await backend.setShuffle(true);
      await backend.setRepeat("context");

      expect(api.calls).toEqual([

        { args: [ "spotify:track:one", "player-7", 1000 ], method: "startPlayback" },
        { args: ["player-7"], method: "resume" },
        { args: [ true, "player-7" ], method: "setShuffle" },
        { args: [ "context", "player-7" ], method: "setRepeat" }
      ]);
    });

    it("rediscover once when the device is stale", async () => {

      await ready();

      api.failures.push(new RemoteApiError(404, "Device not found"));
      api.devicesByCall.push([device("player-8", NAME)]);

      await backend.play("spotify:track:one");

      expect(api.calls).toEqual([

        { args: [ "spotify:track:one", "player-7", null ], method: "startPlayback" },
        { args: [ "spotify:track:one", "player-8", null ], method: "startPlayback" }
      ]);
      expect(backend.deviceId).toBe("player-8");
    });

    it("fail with DeviceNotFound when rediscovery finds nothing", async () => {

      await ready();

      api.failures.push(new RemoteApiError(404, "Device not found"));

      await expect(backend.resume()).rejects.toMatchObject({ code: "DeviceNotFound", name: "ReadinessError" });
      expect(api.listDevicesCalls).toBe(7);
    });

    it("surface other Web API errors without rediscovering or degrading", async () => {

      await ready();

      api.failures.push(new RemoteApiError(403, "Premium required"));

      await expect(backend.play("spotify:track:one")).rejects.toMatchObject({ statusCode: 403 });
      expect(api.listDevicesCalls).toBe(1);
      expect(backend.readiness).toBe("Ready");
      expect(supervisor.isRunning).toBe(true);
    });
  });

  describe("events", () => {

    beforeEach(async () => {

      await ready();
    });

    it("degrade on notReady for the known device and recover on ready", () => {

      transport.post({ deviceId: "someone-else", type: "notReady" });

      expect(backend.readiness).toBe("Ready");

      transport.post({ deviceId: "player-7", type: "notReady" });

      expect(backend.readiness).toBe("Degraded");
      expect(backend.deviceId).toBe("player-7");

      transport.post({ deviceId: "player-7", type: "ready" });

      expect(backend.readiness).toBe("Ready");
    });

    it("degrade on an error event and report it", () => {

      transport.post({ code: "playback_error", message: "Track unavailable", type: "error" });

      expect(backend.readiness).toBe("Degraded");
      expect(notices).toEqual([

        { diagnostics: null, error: { kind: "backend", message: "Track unavailable" }, message: "Player error playback_error: Track unavailable" }
      ]);
    });

    it("republish state changes as playback state", () => {

      const states: PlaybackState[] = [];

      backend.onStateChange((state) => states.push(state));
      transport.post({ artistName: "Artist", durationMs: 180000, isPlaying: true, positionMs: 5000, trackName: "Song", trackUri: "spotify:track:one",
        type: "stateChanged" });

      const expected: PlaybackState = {

        artistName: "Artist",
        durationMs: 180000,
        isBuffering: false,
        isPlaying: true,
        positionMs: 5000,
        trackName: "Song",
        trackUri: "spotify:track:one"
      };

      expect(states).toEqual([expected]);
      expect(backend.state).toEqual(expected);
    });

    it("degrade when the process exits unexpectedly and start over on initialize", async () => {

      launcher.processes[0].exit();
      await settle();

      expect(backend.readiness).toBe("Degraded");
      expect(notices.map((notice) => notice.message)).toEqual(["Player process exited unexpectedly (code 1, signal none)."]);
      expect(transport.closed).toBe(1);

      api.devicesByCall.push([device("player-7", NAME)]);

      await backend.initialize();

      expect(backend.readiness).toBe("Ready");
      expect(launcher.processes).toHaveLength(2);
      expect(transport.opens).toBe(2);
      expect(transport.commands()).toEqual([ "setAccessToken", "connect", "setAccessToken", "connect" ]);
    });
  });

  describe("stop", () => {

    it("lets a later initialize start over after stopping one in flight", async () => {

      let release: () => void = () => undefined;

      tokens.gate = new Promise((resolve) => {

        release = resolve;
      });

      const first = backend.initialize();

      await settle();
      await backend.stop();

      api.devicesByCall = [[device("player-7", NAME)]];

      const second = backend.initialize();

      release();
      await Promise.all([ first, second ]);

      expect(launcher.processes).toHaveLength(1);
      expect(backend.readiness).toBe("Ready");
      expect(backend.deviceId).toBe("player-7");
      expect(notices).toEqual([]);
    });

    it("pauses, closes the channel, terminates the process and resets to idle", async () => {

      await ready();

      transport.post({ durationMs: 1000, isPlaying: true, positionMs: 10, trackUri: "spotify:track:one", type: "stateChanged" });

      await backend.stop();

      expect(transport.commands().at(-1)).toBe("pause");
      expect(transport.closed).toBe(1);
      expect(launcher.processes[0].terminateCalls).toBe(1);
      expect(supervisor.isRunning).toBe(false);
      expect(backend.readiness).toBe("Uninitialized");
      expect(backend.deviceId).toBeNull();
      expect(backend.state.isPlaying).toBe(false);
      expect(notices).toEqual([]);
    });

    it("cancels a discovery poll in flight", async () => {

      let answer: (devices: RemoteDevice[]) => void = () => undefined;

      api.listDevicesHandler = async (): Promise<RemoteDevice[]> => new Promise((resolve) => {

        answer = resolve;
      });

      const initialized = backend.initialize();

      await settle();
      await backend.stop();

      answer([device("player-7", NAME)]);
      await initialized;

      expect(api.listDevicesCalls).toBe(1);
      expect(backend.readiness).toBe("Uninitialized");
      expect(backend.deviceId).toBeNull();
    });
  });
});
