/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * channel.test.ts: Tests for the player control channel.
 */
import { FakeTransport, settle } from "../testing/fakes.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ControlChannel } from "./channel.js";
import type { LogEntry } from "../utils/logEmitter.js";
import type { ControlEvent } from "../types/index.js";
import { subscribeToLogs } from "../utils/logEmitter.js";

describe("ControlChannel", () => {

  let transport: FakeTransport;
  let channel: ControlChannel;
  let events: ControlEvent[];
  let logs: LogEntry[];
  let unsubscribeLogs: () => void;

  beforeEach(() => {

    transport = new FakeTransport();
    channel = new ControlChannel(transport);
    events = [];
    logs = [];

    channel.onEvent((event) => events.push(event));
    unsubscribeLogs = subscribeToLogs((entry) => logs.push(entry));
  });

  afterEach(() => {

    unsubscribeLogs();
  });

  describe("loadContent", () => {

    it("emits ContentLoaded once the page has loaded", async () => {

      await channel.loadContent();

      expect(channel.isContentLoaded).toBe(true);
      expect(events).toEqual([{ type: "ContentLoaded" }]);
    });

    it("shares one load between concurrent callers", async () => {

      await Promise.all([ channel.loadContent(), channel.loadContent() ]);
      await channel.loadContent();

      expect(transport.opens).toBe(1);
    });

    it("reports a failed load as a channel error and does not retry", async () => {

      transport.failOpen = true;

      await expect(channel.loadContent()).rejects.toMatchObject({ code: "SendFailed", name: "ChannelError" });
      expect(transport.opens).toBe(1);
      expect(channel.isContentLoaded).toBe(false);
    });
  });

  describe("credential buffering", () => {

    it("buffers a credential sent before the content loads and flushes it exactly once", async () => {

      expect(channel.sendCredential("test-token-one")).toBe("buffered");
      expect(transport.invocations).toEqual([]);

      await channel.loadContent();

      // A second ContentLoaded from the page must not deliver the credential again.
      transport.post({ type: "htmlLoaded" });

      expect(transport.invocations).toEqual([{ args: ["test-token-one"], command: "setAccessToken" }]);
      expect(channel.hasDeliveredCredential).toBe(true);
    });

    it("keeps only the latest buffered credential", async () => {

      channel.sendCredential("test-token-one");
      channel.sendCredential("test-token-two");

      await channel.loadContent();

      expect(transport.invocations).toEqual([{ args: ["test-token-two"], command: "setAccessToken" }]);
    });

    it("sends immediately once the content has loaded", async () => {

      await channel.loadContent();

      expect(channel.hasDeliveredCredential).toBe(false);
      expect(channel.sendCredential("test-token-one")).toBe("sent");
      expect(transport.invocations).toEqual([{ args: ["test-token-one"], command: "setAccessToken" }]);
    });

    it("flushes the credential before listeners hear about ContentLoaded", async () => {

      let deliveredWhenNotified = false;

      channel.onEvent((event) => {

        if(event.type === "ContentLoaded") {

          deliveredWhenNotified = channel.hasDeliveredCredential;
        }
      });

      channel.sendCredential("test-token-one");
      await channel.loadContent();

      expect(deliveredWhenNotified).toBe(true);
    });

    it("logs only a six character prefix of the credential", async () => {

      channel.sendCredential("test-secret-value");
      await channel.loadContent();

      const messages = logs.map((entry) => entry.message);

      expect(messages).toContain("Content not loaded yet, buffering credential test-s….");
      expect(messages).toContain("Sending setAccessToken(test-s…).");
      expect(messages.filter((message) => message.includes("test-secret-value"))).toEqual([]);
    });
  });

  describe("commands", () => {

    beforeEach(async () => {

      await channel.loadContent();
    });

    it("clamps the volume into 0..1", () => {

      channel.setVolume(1.5);
      channel.setVolume(-0.25);
      channel.setVolume(0.4);

      expect(transport.invocations).toEqual([

        { args: [1], command: "setVolume" },
        { args: [0], command: "setVolume" },
        { args: [0.4], command: "setVolume" }
      ]);
    });

    it("maps each command to its page method", () => {

      channel.play("spotify:track:one", 1500);
      channel.pause();
      channel.resume();
      channel.next();
      channel.previous();
      channel.seek(-20);
      channel.connect();

      expect(transport.invocations).toEqual([

        { args: [ "spotify:track:one", 1500 ], command: "play" },
        { args: [], command: "pause" },
        { args: [], command: "resume" },
        { args: [], command: "next" },
        { args: [], command: "previous" },
        { args: [0], command: "seek" },
        { args: [], command: "connect" }
      ]);
    });

    it("never throws when a send fails and logs a channel error", async () => {

      transport.failInvoke = true;

      expect(() => channel.pause()).not.toThrow();

      await settle();

      expect(logs.filter((entry) => (entry.component === "Channel") && (entry.level === "warn")).map((entry) => entry.message))
        .toEqual(["Sending pause() failed: page is gone."]);
    });
  });

  describe("inbound events", () => {

    beforeEach(async () => {

      await channel.loadContent();
      events = [];
    });

    it("decodes posted payloads and delivers them to every listener", () => {

      const second: ControlEvent[] = [];

      channel.onEvent((event) => second.push(event));
      transport.post({ deviceId: "device-1", type: "ready" });

      expect(events).toEqual([{ deviceId: "device-1", type: "Ready" }]);
      expect(second).toEqual(events);
    });

    it("stops delivering to a listener that unsubscribed", () => {

      const received: ControlEvent[] = [];
      const unsubscribe = channel.onEvent((event) => received.push(event));

      unsubscribe();
      transport.post({ type: "notReady" });

      expect(received).toEqual([]);
    });

    it("delivers undecodable payloads as Unknown and logs them", () => {

      transport.post("not json");

      expect(events).toEqual([{ raw: "not json", type: "Unknown" }]);
      expect(logs.some((entry) => (entry.component === "Channel") && (entry.message === "Ignoring undecodable player event \"not json\"."))).toBe(true);
    });
  });

  describe("close", () => {

    it("forgets the content and credential state", async () => {

      channel.sendCredential("test-token-one");
      await channel.loadContent();
      await channel.close();

      expect(transport.closed).toBe(1);
      expect(channel.isContentLoaded).toBe(false);
      expect(channel.hasDeliveredCredential).toBe(false);
      expect(channel.sendCredential("test-token-two")).toBe("buffered");
    });
  });
});
