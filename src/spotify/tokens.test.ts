/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * tokens.test.ts: Tests for the access credential providers.
 */
import { RefreshingTokenProvider, StaticTokenProvider, createTokenProvider } from "./tokens.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { getDefaults } from "../config/index.js";

describe("StaticTokenProvider", () => {

  it("returns its token", async () => {

    await expect(new StaticTokenProvider("test-secret").getValidAccessCredential()).resolves.toBe("test-secret");
  });

  it("fails without a token", async () => {

    await expect(new StaticTokenProvider("").getValidAccessCredential()).rejects.toMatchObject({ code: "NoAccessCredential" });
  });
});

describe("RefreshingTokenProvider", () => {

  const fetchMock = vi.fn<typeof fetch>();
  let now = 1_000_000;

  beforeEach(() => {

    now = 1_000_000;
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {

    vi.unstubAllGlobals();
  });

  function provider(expiresAt: number): RefreshingTokenProvider {

    return new RefreshingTokenProvider({ accessToken: "test-access", backendBaseUrl: "http://backend.test/", expiresAt, now: () => now,
      refreshToken: "test-refresh", requestTimeout: 1000 });
  }

  it("returns the cached token while it is more than five minutes from expiry", async () => {

    await expect(provider(now + (10 * 60 * 1000)).getValidAccessCredential()).resolves.toBe("test-access");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("refreshes a token close to expiry through the backend", async () => {

    fetchMock.mockResolvedValue(new Response(JSON.stringify({ "access_token": "test-fresh", "expires_in": 3600 }), { status: 200 }));

    const tokens = provider(now + (60 * 1000));

    await expect(tokens.getValidAccessCredential()).resolves.toBe("test-fresh");

    const [ url, init ] = fetchMock.mock.calls[0];

    expect(String(url)).toBe("http://backend.test/auth/spotify/refresh");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify({ "refresh_token": "test-refresh" }));

    // The refreshed token is cached for its lifetime.
    now += 30 * 60 * 1000;
    await expect(tokens.getValidAccessCredential()).resolves.toBe("test-fresh");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("shares one refresh between concurrent callers", async () => {

    fetchMock.mockResolvedValue(new Response(JSON.stringify({ "access_token": "test-fresh", "expires_in": 3600 }), { status: 200 }));

    const tokens = provider(0);
    const results = await Promise.all([ tokens.getValidAccessCredential(), tokens.getValidAccessCredential() ]);

    expect(results).toEqual([ "test-fresh", "test-fresh" ]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("reports refresh failures as network failures", async () => {

    fetchMock.mockResolvedValue(new Response("nope", { status: 500 }));

    await expect(provider(0).getValidAccessCredential()).rejects.toMatchObject({ code: "NetworkFailure" });

    fetchMock.mockRejectedValue(new TypeError("fetch failed"));

    await expect(provider(0).getValidAccessCredential()).rejects.toMatchObject({ code: "NetworkFailure" });
  });

  it("reports a response without a token as a missing credential", async () => {

    fetchMock.mockResolvedValue(new Response(JSON.stringify({ "expires_in": 3600 }), { status: 200 }));

    await expect(provider(0).getValidAccessCredential()).rejects.toMatchObject({ code: "NoAccessCredential" });
  });

  it("fails without a refresh token once the token has expired", async () => {

    const tokens = new RefreshingTokenProvider({ accessToken: "test-access", backendBaseUrl: null, expiresAt: now - 1, now: () => now, refreshToken: null,
      requestTimeout: 1000 });

    await expect(tokens.getValidAccessCredential()).rejects.toMatchObject({ code: "NoAccessCredential" });
  });
});

describe("createTokenProvider", () => {

  it("returns null without any credential", () => {

    expect(createTokenProvider(getDefaults())).toBeNull();
  });

  it("prefers a refreshing provider when a refresh token and backend are configured", () => {

    const config = getDefaults();

    config.spotify.accessToken = "test-access";
    expect(createTokenProvider(config)).toBeInstanceOf(StaticTokenProvider);

    config.spotify.refreshToken = "test-refresh";
    config.spotify.backendBaseUrl = "http://backend.test";
    expect(createTokenProvider(config)).toBeInstanceOf(RefreshingTokenProvider);
  });
});
