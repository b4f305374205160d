import { z } from "zod";
import type { Tenant, ToolCategory } from "@shared/schema";
import type { Connector, ConnectorCredentials } from "./types";
import { HubSpotConnector } from "./hubspotConnector";
import { StripeConnector } from "./stripeConnector";
import { TrelloConnector } from "./trelloConnector";
import { logWarn } from "../logger";

export type ConnectorFactory = (tenantId: string, credentials: ConnectorCredentials) => Connector;

const credentialsSchema = z
  .object({
    accessToken: z.string().optional(),
    refreshToken: z.string().optional(),
    expiresAt: z.union([z.string(), z.number()]).optional(),
  })
  .passthrough();

export const DEFAULT_CONNECTORS: ReadonlyMap<string, ConnectorFactory> = new Map<string, ConnectorFactory>([
  ["hubspot", (tenantId, credentials) => new HubSpotConnector(tenantId, credentials)],
  ["stripe", (tenantId, credentials) => new StripeConnector(tenantId, credentials)],
  ["trello", (tenantId, credentials) => new TrelloConnector(tenantId, credentials)],
]);

/**
 * Tool name → connector factory. Built once; a tenant's connector for a
 * category is resolved from its `tools_connected` entry.
 */
export class ConnectorRegistry {
  private readonly factories: ReadonlyMap<string, ConnectorFactory>;

  constructor(factories: ReadonlyMap<string, ConnectorFactory> = DEFAULT_CONNECTORS) {
    this.factories = new Map(factories);
  }

  get tools(): string[] {
    return Array.from(this.factories.keys());
  }

  create(tool: string, tenantId: string, credentials: ConnectorCredentials = {}): Connector | null {
    const factory = this.factories.get(tool);
    if (!factory) {
      logWarn(`Unknown tool "${tool}" for ${tenantId}`, "connectors");
      return null;
    }
    return factory(tenantId, credentials);
  }

  /** The tenant's connector for `category`, or null when none is configured or known. */
  forTenant(tenant: Tenant, category: ToolCategory): Connector | null {
    const entry = tenant.toolsConnected[category];
    if (!entry) return null;

    const parsed = credentialsSchema.safeParse(entry.credentials ?? {});
    if (!parsed.success) {
      logWarn(`Invalid ${entry.name} credentials for ${tenant.id}`, "connectors");
      return null;
    }

    const connector = this.create(entry.name, tenant.id, parsed.data);
    if (connector && connector.category !== category) {
      logWarn(`${entry.name} is a ${connector.category} tool, not ${category}`, "connectors");
      return null;
    }
    return connector;
  }
}
