/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.test.ts: Tests for configuration validation and derived values.
 */
import { describe, expect, it } from "vitest";
import { getDefaults, getPlayerPageUrl, validateConfiguration, validatePositiveInt } from "./index.js";

describe("validatePositiveInt", () => {

  it("accepts values inside the range", () => {

    expect(validatePositiveInt("PORT", 5690, 1, 65535)).toBeNull();
  });

  it("reports values outside the range", () => {

    expect(validatePositiveInt("PORT", 0, 1, 65535)).toBe("PORT must be a positive integer, got: 0");
    expect(validatePositiveInt("PORT", 70000, 1, 65535)).toBe("PORT must be at most 65535, got: 70000");
    expect(validatePositiveInt("PLAYER_COMMAND_TIMEOUT", 100, 500)).toBe("PLAYER_COMMAND_TIMEOUT must be at least 500, got: 100");
  });
});

describe("validateConfiguration", () => {

  it("accepts the defaults", () => {

    expect(() => validateConfiguration(getDefaults())).not.toThrow();
  });

  it("requires a repository path in dev mode", () => {

    const config = getDefaults();

    config.player.launchMode = "dev";

    expect(() => validateConfiguration(config)).toThrow("PLAYER_DEV_PATH is required when PLAYER_LAUNCH_MODE is dev.");
  });

  it("lists every invalid value at once", () => {

    const config = getDefaults();

    config.server.port = 0;
    config.player.devRepoPath = "relative/path";
    config.spotify.backendBaseUrl = "ftp://example.invalid";

    expect(() => validateConfiguration(config)).toThrow([

      "Configuration validation failed:",
      "  PLAYER_DEV_PATH must be an absolute path, got: relative/path",
      "  PORT must be a positive integer, got: 0",
      "  BACKEND_BASE_URL must be an http or https URL, got: ftp://example.invalid"
    ].join("\n"));
  });

  it("rejects values outside an enumeration", () => {

    const config = getDefaults();

    Object.assign(config.playback, { backend: "bluetooth" });

    expect(() => validateConfiguration(config)).toThrow("PLAYBACK_BACKEND must be one of internal, external, got: bluetooth");
  });

  it("rejects a DevTools port equal to the server port", () => {

    const config = getDefaults();

    config.player.debugPort = config.server.port;

    expect(() => validateConfiguration(config)).toThrow("PLAYER_DEBUG_PORT (5690) conflicts with the server port.");
  });
});

describe("getPlayerPageUrl", () => {

  it("prefers the configured page URL", () => {

    const config = getDefaults();

    config.player.pageUrl = "http://127.0.0.1:4000/player";

    expect(getPlayerPageUrl(config, "http://127.0.0.1:8080")).toBe("http://127.0.0.1:4000/player");
  });

  it("derives the page from the backend base URL", () => {

    expect(getPlayerPageUrl(getDefaults(), "http://127.0.0.1:8080/")).toBe("http://127.0.0.1:8080/internal-player");
  });

  it("returns null with neither", () => {

    expect(getPlayerPageUrl(getDefaults(), null)).toBeNull();
  });
});
