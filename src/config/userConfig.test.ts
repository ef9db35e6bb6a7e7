/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.test.ts: Tests for configuration merging.
 */
import { CONFIG_METADATA, DEFAULTS, getNestedValue, mergeConfiguration, parseEnvValue, setNestedValue } from "./userConfig.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

const ENV_VARS = Object.values(CONFIG_METADATA).flat().flatMap((setting) => setting.envVar ? [setting.envVar] : []);

describe("mergeConfiguration", () => {

  let saved: Record<string, string | undefined> = {};

  beforeEach(() => {

    saved = {};

    for(const name of ENV_VARS) {

      saved[name] = process.env[name];
      delete process.env[name];
    }
  });

  afterEach(() => {

    for(const name of ENV_VARS) {

      const value = saved[name];

      if(value === undefined) {

        delete process.env[name];
      } else {

        process.env[name] = value;
      }
    }
  });

  it("returns the defaults without user config or environment", () => {

    expect(mergeConfiguration({})).toEqual(DEFAULTS);
  });

  it("does not share objects with the defaults", () => {

    const config = mergeConfiguration({});

    config.player.deviceName = "Changed";

    expect(DEFAULTS.player.deviceName).toBe("Electric Slideshow Internal Player");
  });

  it("applies user config values over defaults", () => {

    const config = mergeConfiguration({ player: { debugPort: 9333, launchMode: "dev" }, server: { port: 6000 } });

    expect(config.player.debugPort).toBe(9333);
    expect(config.player.launchMode).toBe("dev");
    expect(config.server.port).toBe(6000);
    expect(config.server.host).toBe("127.0.0.1");
  });

  it("applies environment variables over user config", () => {

    process.env.PLAYER_DEBUG_PORT = "9444";
    process.env.PLAYBACK_PREWARM = "no";
    process.env.BACKEND_BASE_URL = "http://127.0.0.1:8080";

    const config = mergeConfiguration({ player: { debugPort: 9333 } });

    expect(config.player.debugPort).toBe(9444);
    expect(config.playback.prewarm).toBe(false);
    expect(config.spotify.backendBaseUrl).toBe("http://127.0.0.1:8080");
  });

  it("ignores unparseable numeric environment values", () => {

    process.env.PORT = "not-a-port";

    expect(mergeConfiguration({}).server.port).toBe(5690);
  });
});

describe("parseEnvValue", () => {

  it("accepts common truthy spellings", () => {

    expect(parseEnvValue("YES", "boolean")).toBe(true);
    expect(parseEnvValue("1", "boolean")).toBe(true);
    expect(parseEnvValue("off", "boolean")).toBe(false);
  });

  it("clears paths and URLs given as empty strings", () => {

    expect(parseEnvValue("", "path")).toBeNull();
    expect(parseEnvValue(" ", "url")).toBeNull();
    expect(parseEnvValue("/opt/player", "path")).toBe("/opt/player");
  });
});

describe("nested values", () => {

  it("reads dot-separated paths", () => {

    expect(getNestedValue(DEFAULTS, "player.helperName")).toBe("ElectricSlideshowInternalPlayer");
    expect(getNestedValue(DEFAULTS, "player.missing.deeper")).toBeUndefined();
  });

  it("creates intermediate objects when setting", () => {

    const target: Record<string, unknown> = {};

    setNestedValue(target, "player.debugPort", 9230);

    expect(target).toEqual({ player: { debugPort: 9230 } });
  });
});
