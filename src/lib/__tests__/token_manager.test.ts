import { afterEach, describe, it, expect, vi } from "vitest";
import { AuthError } from "../errors.js";
import { OAuthTokenManager, type Credential } from "../token_manager.js";

function clock(start = 1_000_000) {
  let now = start;
  return {
    now: () => now,
    advance(ms: number) {
      now += ms;
    },
  };
}

describe("OAuthTokenManager", () => {
  it("shares one exchange between concurrent callers", async () => {
    const time = clock();
    let release: (c: Credential) => void = () => {};
    const exchange = vi.fn(
      () =>
        new Promise<Credential>((resolve) => {
          release = resolve;
        }),
    );
    const tokens = new OAuthTokenManager(exchange, { refreshMarginMs: 1000, now: time.now });

    const callers = Array.from({ length: 10 }, () => tokens.getToken());
    release({ token: "tok-1", expiresAt: time.now() + 60_000 });

    expect(await Promise.all(callers)).toEqual(Array(10).fill("tok-1"));
    expect(exchange).toHaveBeenCalledTimes(1);
    expect(tokens.refreshes).toBe(1);
  });

  it("reuses the credential until it enters the refresh margin", async () => {
    const time = clock();
    let n = 0;
    const tokens = new OAuthTokenManager(
      async () => ({ token: `tok-${++n}`, expiresAt: time.now() + 10_000 }),
      { refreshMarginMs: 2_000, now: time.now },
    );

    expect(await tokens.getToken()).toBe("tok-1");
    time.advance(7_999);
    expect(await tokens.getToken()).toBe("tok-1");
    time.advance(1);
    expect(await tokens.getToken()).toBe("tok-2");
  });

  it("treats an expired credential as needing a refresh", () => {
    const time = clock();
    const tokens = new OAuthTokenManager(async () => ({ token: "t", expiresAt: 0 }), {
      refreshMarginMs: 0,
      now: time.now,
    });
    expect(tokens.needsRefresh(null)).toBe(true);
    expect(tokens.needsRefresh({ token: "t", expiresAt: time.now() - 1 })).toBe(true);
    expect(tokens.needsRefresh({ token: "t", expiresAt: time.now() + 1 })).toBe(false);
  });

  it("wraps exchange failures in AuthError and lets the next call retry", async () => {
    const exchange = vi
      .fn<() => Promise<Credential>>()
      .mockRejectedValueOnce(new Error("network down"))
      .mockResolvedValueOnce({ token: "tok", expiresAt: Date.now() + 60_000 });
    const tokens = new OAuthTokenManager(exchange, { refreshMarginMs: 0 });

    await expect(tokens.getToken()).rejects.toBeInstanceOf(AuthError);
    await expect(tokens.getToken()).resolves.toBe("tok");
  });

  it("rejects an empty token", async () => {
    const tokens = new OAuthTokenManager(async () => ({ token: "", expiresAt: Date.now() + 60_000 }), {
      refreshMarginMs: 0,
    });
    await expect(tokens.getToken()).rejects.toThrow("Token exchange returned an empty token");
  });

  it("exchanges again after invalidate", async () => {
    let n = 0;
    const tokens = new OAuthTokenManager(async () => ({ token: `tok-${++n}`, expiresAt: Date.now() + 60_000 }), {
      refreshMarginMs: 0,
    });
    await tokens.getToken();
    tokens.invalidate();
    expect(await tokens.getToken()).toBe("tok-2");
  });
});

describe("OAuthTokenManager background refresh", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("exchanges up front and then on every tick until stopped", async () => {
    vi.useFakeTimers();
    let n = 0;
    const tokens = new OAuthTokenManager(async () => ({ token: `tok-${++n}`, expiresAt: Date.now() + 60_000 }), {
      refreshMarginMs: 0,
    });

    await tokens.startBackgroundRefresh(1_000);
    expect(tokens.refreshes).toBe(1);

    await vi.advanceTimersByTimeAsync(2_500);
    expect(tokens.refreshes).toBe(3);
    expect(await tokens.getToken()).toBe("tok-3");

    tokens.stopBackgroundRefresh();
    await vi.advanceTimersByTimeAsync(5_000);
    expect(tokens.refreshes).toBe(3);
  });

  it("keeps running after a failed tick", async () => {
    vi.useFakeTimers();
    let n = 0;
    const tokens = new OAuthTokenManager(
      async () => {
        n++;
        if (n === 2) throw new Error("token endpoint down");
        return { token: `tok-${n}`, expiresAt: Date.now() + 60_000 };
      },
      { refreshMarginMs: 0 },
    );

    await tokens.startBackgroundRefresh(1_000);
    await vi.advanceTimersByTimeAsync(2_000);
    expect(n).toBe(3);
    expect(await tokens.getToken()).toBe("tok-3");
    tokens.stopBackgroundRefresh();
  });
});
