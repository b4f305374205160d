import { describe, it, expect, vi, beforeEach } from "vitest";
import type { ToolCategory } from "@shared/schema";
import { BaseConnector, parseDate, toNumber } from "../baseConnector";
import type { ConnectorCredentials, Deal } from "../types";

const NOW = new Date("2026-03-01T12:00:00.000Z");

class FakeConnector extends BaseConnector {
  readonly source = "fake";
  readonly category: ToolCategory = "crm";
  refreshResult: ConnectorCredentials | null = { accessToken: "fresh-token" };
  refreshCalls = 0;
  loadCalls = 0;
  failLoad = false;

  constructor(credentials: ConnectorCredentials) {
    super("tenant-a", credentials, () => NOW);
  }

  get currentCredentials(): ConnectorCredentials {
    return this.credentials;
  }

  protected async checkConnection(): Promise<boolean> {
    throw new Error("network unreachable");
  }

  protected async loadDeals(): Promise<Deal[]> {
    this.loadCalls++;
    if (this.failLoad) throw new Error("api down");
    return [];
  }

  protected async refreshAccessToken(): Promise<ConnectorCredentials | null> {
    this.refreshCalls++;
    return this.refreshResult;
  }
}

function expiringIn(ms: number): string {
  return new Date(NOW.getTime() + ms).toISOString();
}

describe("BaseConnector", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  describe("needsRefresh", () => {
    it("assumes a token without expiry or refresh token is valid", () => {
      expect(new FakeConnector({ accessToken: "t" }).needsRefresh()).toBe(false);
    });

    it("refreshes when expiry is unknown but a refresh token exists", () => {
      expect(new FakeConnector({ accessToken: "t", refreshToken: "r" }).needsRefresh()).toBe(true);
    });

    it("refreshes within five minutes of expiry", () => {
      expect(new FakeConnector({ expiresAt: expiringIn(4 * 60_000) }).needsRefresh()).toBe(true);
    });

    it("does not refresh with more than five minutes left", () => {
      expect(new FakeConnector({ expiresAt: expiringIn(10 * 60_000) }).needsRefresh()).toBe(false);
    });

    it("reads unix seconds", () => {
      const inTenMinutes = NOW.getTime() / 1000 + 600;
      expect(new FakeConnector({ expiresAt: inTenMinutes }).needsRefresh()).toBe(false);
    });

    it("does not refresh when expiry cannot be parsed", () => {
      expect(new FakeConnector({ expiresAt: "soon" }).needsRefresh()).toBe(false);
    });
  });

  it("replaces credentials after a successful refresh", async () => {
    const connector = new FakeConnector({ accessToken: "stale", expiresAt: expiringIn(-1000) });

    expect(await connector.ensureValidToken()).toBe(true);
    expect(connector.currentCredentials).toEqual({ accessToken: "fresh-token" });
  });

  it("skips the fetch when the token cannot be refreshed", async () => {
    const connector = new FakeConnector({ accessToken: "stale", expiresAt: expiringIn(-1000) });
    connector.refreshResult = null;

    expect(await connector.fetchDeals()).toEqual([]);
    expect(connector.refreshCalls).toBe(1);
    expect(connector.loadCalls).toBe(0);
  });

  it("returns an empty list when loading throws", async () => {
    const connector = new FakeConnector({ accessToken: "t" });
    connector.failLoad = true;

    expect(await connector.fetchDeals()).toEqual([]);
    expect(connector.loadCalls).toBe(1);
  });

  it("returns false when connecting throws", async () => {
    expect(await new FakeConnector({}).connect()).toBe(false);
  });

  it("reports unsupported writes as false", async () => {
    const connector = new FakeConnector({});

    expect(await connector.updateDeal("d1", { dealstage: "closedwon" })).toBe(false);
    expect(await connector.addNote("d1", "note")).toBe(false);
  });
});

describe("parseDate", () => {
  it("reads milliseconds, seconds and ISO strings", () => {
    expect(parseDate(1_772_366_400_000)?.toISOString()).toBe("2026-03-01T12:00:00.000Z");
    expect(parseDate(1_772_366_400)?.toISOString()).toBe("2026-03-01T12:00:00.000Z");
    expect(parseDate("1772366400000")?.toISOString()).toBe("2026-03-01T12:00:00.000Z");
    expect(parseDate("2026-03-01T12:00:00Z")?.toISOString()).toBe("2026-03-01T12:00:00.000Z");
  });

  it("returns null for empty or unparseable input", () => {
    expect(parseDate(null)).toBeNull();
    expect(parseDate("")).toBeNull();
    expect(parseDate("not a date")).toBeNull();
    expect(parseDate({})).toBeNull();
  });
});

describe("toNumber", () => {
  it("falls back on non-numeric input", () => {
    expect(toNumber("1200.5")).toBe(1200.5);
    expect(toNumber("abc", 7)).toBe(7);
    expect(toNumber(null)).toBe(0);
  });
});
