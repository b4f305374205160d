import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Tenant } from "@shared/schema";
import { HubSpotConnector } from "../hubspotConnector";
import { TrelloConnector } from "../trelloConnector";
import { StripeConnector } from "../stripeConnector";
import { ConnectorRegistry, type ConnectorFactory } from "../registry";

const NOW = new Date("2026-03-01T12:00:00.000Z");
const clock = () => NOW;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

let fetchMock: ReturnType<typeof vi.fn>;

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  fetchMock = vi.fn();
  vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("HubSpotConnector", () => {
  it("follows paging and normalizes deals", async () => {
    fetchMock
      .mockResolvedValueOnce(
        jsonResponse({
          results: [
            {
              id: "101",
              properties: {
                dealname: "Acme renewal",
                amount: "1200.5",
                dealstage: "contractsent",
                hs_is_closed: "false",
                hs_is_closed_won: "false",
                createdate: "2026-01-10T09:00:00Z",
                hs_lastmodifieddate: "2026-02-01T00:00:00Z",
                hs_activity_timestamp: null,
              },
            },
          ],
          paging: { next: { after: "cursor-2" } },
        }),
      )
      .mockResolvedValueOnce(
        jsonResponse({
          results: [
            {
              id: "102",
              properties: {
                dealname: "Globex",
                hs_is_closed: "true",
                hs_is_closed_won: "true",
                closedate: "2026-02-20T00:00:00Z",
                hs_analytics_source: "ORGANIC_SEARCH",
              },
            },
          ],
        }),
      );
    const connector = new HubSpotConnector("tenant-a", { accessToken: "test-token" }, clock);

    const deals = await connector.fetchDeals();

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(String(fetchMock.mock.calls[1][0])).toContain("after=cursor-2");
    expect(deals.map((d) => [d.rawId, d.status])).toEqual([
      ["101", "active"],
      ["102", "won"],
    ]);
    expect(deals[0].amount).toBe(1200.5);
    expect(deals[0].currency).toBe("EUR");
    expect(deals[0].lastActivityAt?.toISOString()).toBe("2026-02-01T00:00:00.000Z");
    expect(deals[0].closedAt).toBeNull();
    expect(deals[1].closedAt?.toISOString()).toBe("2026-02-20T00:00:00.000Z");
    expect(deals[1].leadSource).toBe("organic_search");
    expect(fetchMock.mock.calls[0][1].headers.Authorization).toBe("Bearer test-token");
  });

  it("returns an empty list on an HTTP error", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ message: "rate limited" }, 429));
    const connector = new HubSpotConnector("tenant-a", { accessToken: "test-token" }, clock);

    expect(await connector.fetchDeals()).toEqual([]);
  });

  it("refreshes an expired token before fetching", async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ access_token: "fresh-token", expires_in: 1800 }))
      .mockResolvedValueOnce(jsonResponse({ results: [] }));
    const connector = new HubSpotConnector(
      "tenant-a",
      {
        accessToken: "stale-token",
        refreshToken: "test-refresh",
        clientId: "test-client",
        clientSecret: "test-secret",
        expiresAt: "2026-03-01T11:00:00.000Z",
      },
      clock,
    );

    await connector.fetchContacts();

    expect(String(fetchMock.mock.calls[0][0])).toBe("https://api.hubapi.com/oauth/v1/token");
    expect(fetchMock.mock.calls[1][1].headers.Authorization).toBe("Bearer fresh-token");
    expect(connector.needsRefresh()).toBe(false);
  });

  it("attaches a note to the deal", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ id: "note-1" }, 201));
    const connector = new HubSpotConnector("tenant-a", { accessToken: "test-token" }, clock);

    expect(await connector.addNote("101", "Stalled for 30 days")).toBe(true);

    const body = JSON.parse(fetchMock.mock.calls[0][1].body);
    expect(body.properties).toEqual({ hs_note_body: "Stalled for 30 days", hs_timestamp: "2026-03-01T12:00:00.000Z" });
    expect(body.associations[0].to).toEqual({ id: "101" });
  });

  it("reports a failed update as false", async () => {
    fetchMock.mockRejectedValueOnce(new Error("socket hang up"));
    const connector = new HubSpotConnector("tenant-a", { accessToken: "test-token" }, clock);

    expect(await connector.updateDeal("101", { dealstage: "closedlost" })).toBe(false);
  });
});

describe("TrelloConnector", () => {
  it("derives task status from list names and due dates", async () => {
    fetchMock
      .mockResolvedValueOnce(
        jsonResponse([
          { id: "l1", name: "Doing" },
          { id: "l2", name: "Done" },
        ]),
      )
      .mockResolvedValueOnce(
        jsonResponse([
          { id: "c1", name: "Ship invoice export", idList: "l1", due: "2026-02-20T00:00:00.000Z", members: [{ fullName: "Dana" }] },
          { id: "c2", name: "Kickoff", idList: "l2", due: "2026-02-01T00:00:00.000Z" },
          { id: "c3", name: "Write brief", idList: "l1" },
          { id: "c4", name: "Plan Q3", idList: "l9", due: "2026-04-01T00:00:00.000Z" },
        ]),
      );
    const connector = new TrelloConnector("tenant-a", { apiKey: "test-key", token: "test-token", boardId: "b1" }, clock);

    const tasks = await connector.fetchTasks();

    expect(tasks.map((t) => [t.rawId, t.status])).toEqual([
      ["c1", "overdue"],
      ["c2", "done"],
      ["c3", "in_progress"],
      ["c4", "todo"],
    ]);
    expect(tasks[0].assigneeName).toBe("Dana");
  });

  it("returns no tasks without a board id", async () => {
    const connector = new TrelloConnector("tenant-a", { apiKey: "test-key", token: "test-token" }, clock);

    expect(await connector.fetchTasks()).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("StripeConnector", () => {
  it("converts minor units and marks open invoices past due as overdue", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        data: [
          {
            id: "in_1",
            number: "INV-001",
            customer_name: "Acme",
            customer_email: "billing@acme.test",
            amount_due: 150000,
            amount_paid: 0,
            currency: "eur",
            status: "open",
            created: 1_769_904_000,
            due_date: 1_771_113_600,
          },
          {
            id: "in_2",
            number: null,
            amount_due: 5000,
            amount_paid: 5000,
            currency: "usd",
            status: "paid",
            created: 1_769_904_000,
          },
        ],
        has_more: false,
      }),
    );
    const connector = new StripeConnector("tenant-a", { secretKey: "test-secret" }, clock);

    const invoices = await connector.fetchInvoices();

    expect(invoices.map((i) => [i.number, i.status, i.amount, i.currency])).toEqual([
      ["INV-001", "overdue", 1500, "EUR"],
      ["in_2", "paid", 50, "USD"],
    ]);
    expect(invoices[0].clientEmail).toBe("billing@acme.test");
  });
});

describe("ConnectorRegistry", () => {
  function tenantWith(toolsConnected: Tenant["toolsConnected"]): Tenant {
    return {
      id: "tenant-a",
      name: "Acme",
      slug: "acme",
      agentConfigs: {},
      toolsConnected,
      createdAt: NOW,
      updatedAt: NOW,
    };
  }

  it("resolves the tenant's connector by category", () => {
    const registry = new ConnectorRegistry();

    const connector = registry.forTenant(
      tenantWith({ crm: { name: "hubspot", credentials: { accessToken: "test-token" } } }),
      "crm",
    );

    expect(connector).toBeInstanceOf(HubSpotConnector);
  });

  it("returns null when the category is not connected", () => {
    expect(new ConnectorRegistry().forTenant(tenantWith({}), "finance")).toBeNull();
  });

  it("returns null for an unknown tool", () => {
    const registry = new ConnectorRegistry();

    expect(registry.forTenant(tenantWith({ crm: { name: "abacus" } }), "crm")).toBeNull();
  });

  it("refuses a tool registered under the wrong category", () => {
    const registry = new ConnectorRegistry();

    expect(registry.forTenant(tenantWith({ finance: { name: "hubspot" } }), "finance")).toBeNull();
  });

  it("uses the factories it was built with", () => {
    const fake = new TrelloConnector("tenant-a", {}, clock);
    const factory = vi.fn<ConnectorFactory>(() => fake);
    const registry = new ConnectorRegistry(new Map([["board", factory]]));

    expect(registry.forTenant(tenantWith({ project: { name: "board", credentials: { boardId: "b1" } } }), "project")).toBe(fake);
    expect(factory).toHaveBeenCalledWith("tenant-a", { boardId: "b1" });
    expect(registry.tools).toEqual(["board"]);
  });
});
