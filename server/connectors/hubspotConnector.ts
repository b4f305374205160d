import { z } from "zod";
import type { ToolCategory } from "@shared/schema";
import { BaseConnector, parseDate, toNumber, toText } from "./baseConnector";
import type { ConnectorCredentials, Contact, Deal, DealStatus } from "./types";

export const HUBSPOT_BASE_URL = "https://api.hubapi.com";
const PAGE_SIZE = 100;
const MAX_PAGES = 50;
const REQUEST_TIMEOUT_MS = 15_000;
// HubSpot-defined association type: note → deal
const NOTE_TO_DEAL_ASSOCIATION = 214;

const DEAL_PROPERTIES = [
  "dealname",
  "amount",
  "deal_currency_code",
  "dealstage",
  "hs_deal_stage_probability",
  "hs_is_closed",
  "hs_is_closed_won",
  "createdate",
  "closedate",
  "hs_lastmodifieddate",
  "hs_activity_timestamp",
  "hubspot_owner_id",
  "hs_analytics_source",
];

const CONTACT_PROPERTIES = [
  "email",
  "firstname",
  "lastname",
  "company",
  "hs_lead_status",
  "createdate",
  "notes_last_activity",
];

const pageSchema = z.object({
  results: z.array(
    z.object({
      id: z.string(),
      properties: z.record(z.string().nullable()).default({}),
    }),
  ),
  paging: z.object({ next: z.object({ after: z.string() }).optional() }).optional(),
});

type HubSpotObject = z.infer<typeof pageSchema>["results"][number];

const tokenSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string().optional(),
  expires_in: z.number(),
});

export class HubSpotApiError extends Error {
  constructor(
    public readonly status: number,
    path: string,
  ) {
    super(`HubSpot ${path} returned HTTP ${status}`);
    this.name = "HubSpotApiError";
  }
}

export class HubSpotConnector extends BaseConnector {
  readonly source = "hubspot";
  readonly category: ToolCategory = "crm";

  constructor(
    tenantId: string,
    credentials: ConnectorCredentials,
    now?: () => Date,
    private readonly baseUrl = HUBSPOT_BASE_URL,
  ) {
    super(tenantId, credentials, now);
  }

  protected async checkConnection(): Promise<boolean> {
    const response = await this.request("GET", "/crm/v3/objects/deals?limit=1");
    return response.ok;
  }

  protected async loadDeals(): Promise<Deal[]> {
    const raw = await this.listAll("deals", DEAL_PROPERTIES);
    return raw.map((obj) => this.toDeal(obj));
  }

  protected async loadContacts(): Promise<Contact[]> {
    const raw = await this.listAll("contacts", CONTACT_PROPERTIES);
    return raw.map((obj) => this.toContact(obj));
  }

  protected async writeDeal(rawId: string, fields: Record<string, unknown>): Promise<boolean> {
    const response = await this.request("PATCH", `/crm/v3/objects/deals/${encodeURIComponent(rawId)}`, {
      properties: fields,
    });
    return response.ok;
  }

  protected async writeNote(rawId: string, text: string): Promise<boolean> {
    const response = await this.request("POST", "/crm/v3/objects/notes", {
      properties: { hs_note_body: text, hs_timestamp: this.now().toISOString() },
      associations: [
        {
          to: { id: rawId },
          types: [{ associationCategory: "HUBSPOT_DEFINED", associationTypeId: NOTE_TO_DEAL_ASSOCIATION }],
        },
      ],
    });
    return response.ok;
  }

  protected async refreshAccessToken(): Promise<ConnectorCredentials | null> {
    const { refreshToken, clientId, clientSecret } = this.credentials;
    if (typeof refreshToken !== "string" || typeof clientId !== "string" || typeof clientSecret !== "string") {
      return null;
    }

    const response = await fetch(`${this.baseUrl}/oauth/v1/token`, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({
        grant_type: "refresh_token",
        client_id: clientId,
        client_secret: clientSecret,
        refresh_token: refreshToken,
      }),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (!response.ok) return null;

    const token = tokenSchema.parse(await response.json());
    return {
      ...this.credentials,
      accessToken: token.access_token,
      refreshToken: token.refresh_token ?? refreshToken,
      expiresAt: new Date(this.now().getTime() + token.expires_in * 1000).toISOString(),
    };
  }

  private async listAll(objectType: "deals" | "contacts", properties: string[]): Promise<HubSpotObject[]> {
    const all: HubSpotObject[] = [];
    let after: string | undefined;

    for (let page = 0; page < MAX_PAGES; page++) {
      const params = new URLSearchParams({ limit: String(PAGE_SIZE), properties: properties.join(",") });
      if (after) params.set("after", after);

      const path = `/crm/v3/objects/${objectType}?${params.toString()}`;
      const response = await this.request("GET", path);
      if (!response.ok) throw new HubSpotApiError(response.status, path);

      const body = pageSchema.parse(await response.json());
      all.push(...body.results);
      after = body.paging?.next?.after;
      if (!after) break;
    }
    return all;
  }

  private request(method: string, path: string, body?: unknown): Promise<Response> {
    return fetch(`${this.baseUrl}${path}`, {
      method,
      headers: {
        Authorization: `Bearer ${toText(this.credentials.accessToken)}`,
        "Content-Type": "application/json",
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
  }

  private toDeal(obj: HubSpotObject): Deal {
    const p = obj.properties;
    const closed = p.hs_is_closed === "true";
    const won = p.hs_is_closed_won === "true";
    const status: DealStatus = won ? "won" : closed ? "lost" : "active";
    return {
      rawId: obj.id,
      source: this.source,
      title: toText(p.dealname),
      amount: toNumber(p.amount),
      currency: toText(p.deal_currency_code, "EUR") || "EUR",
      stage: toText(p.dealstage),
      probability: toNumber(p.hs_deal_stage_probability),
      status,
      createdAt: parseDate(p.createdate) ?? this.now(),
      lastActivityAt: parseDate(p.hs_activity_timestamp) ?? parseDate(p.hs_lastmodifieddate),
      expectedCloseDate: parseDate(p.closedate),
      closedAt: closed ? parseDate(p.closedate) : null,
      leadSource: toText(p.hs_analytics_source).toLowerCase(),
      ownerName: toText(p.hubspot_owner_id),
    };
  }

  private toContact(obj: HubSpotObject): Contact {
    const p = obj.properties;
    return {
      rawId: obj.id,
      source: this.source,
      email: toText(p.email),
      firstName: toText(p.firstname),
      lastName: toText(p.lastname),
      company: toText(p.company),
      leadStatus: toText(p.hs_lead_status),
      createdAt: parseDate(p.createdate) ?? this.now(),
      lastActivityAt: parseDate(p.notes_last_activity),
    };
  }
}
