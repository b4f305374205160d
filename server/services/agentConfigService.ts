import type { IStorage } from "../storage";
import type { AgentConfigs, AgentConfigValues, Tenant } from "@shared/schema";
import { log, logError } from "../logger";

/**
 * Per-agent defaults. A tenant's stored `agent_configs` entry is merged over
 * these, key by key, so a tenant only stores what it overrides.
 */
export const DEFAULT_AGENT_CONFIGS: Readonly<AgentConfigs> = Object.freeze({
  revenue_velocity: {
    enabled: true,
    stagnation_threshold_days: 21,
    head_of_sales_email: "",
  },
  cash_predictability: {
    enabled: true,
    reminder_after_days: 7,
    escalation_day: 30,
    ceo_email: "",
  },
  process_clarity: {
    enabled: true,
    overdue_escalation_days: 3,
    manager_email: "",
  },
  acquisition_efficiency: {
    enabled: true,
    ceo_email: "",
  },
});

export async function getAgentConfig(
  storage: IStorage,
  tenantId: string,
  agent: string,
): Promise<AgentConfigValues> {
  const defaults = DEFAULT_AGENT_CONFIGS[agent] ?? {};
  const tenant = await storage.getTenant(tenantId);
  const stored = tenant?.agentConfigs[agent] ?? {};
  return { ...defaults, ...stored };
}

export async function isAgentEnabled(storage: IStorage, tenantId: string, agent: string): Promise<boolean> {
  const config = await getAgentConfig(storage, tenantId, agent);
  return config.enabled !== false;
}

function hasEnabledAgent(tenant: Tenant, agents: readonly string[]): boolean {
  return agents.some((agent) => tenant.agentConfigs[agent]?.enabled !== false);
}

/** Tenants with at least one of `agents` enabled. */
export async function getActiveTenants(
  storage: IStorage,
  agents: readonly string[] = Object.keys(DEFAULT_AGENT_CONFIGS),
): Promise<Tenant[]> {
  const all = await storage.getTenants();
  return all.filter((tenant) => hasEnabledAgent(tenant, agents));
}

/**
 * Shallow-merge `updates` into one agent's stored config. Writing the same
 * updates twice leaves the same stored value. Never throws.
 */
export async function updateAgentConfig(
  storage: IStorage,
  tenantId: string,
  agent: string,
  updates: AgentConfigValues,
): Promise<boolean> {
  try {
    const tenant = await storage.getTenant(tenantId);
    if (!tenant) return false;

    const next: AgentConfigs = {
      ...tenant.agentConfigs,
      [agent]: { ...(tenant.agentConfigs[agent] ?? {}), ...updates },
    };
    const updated = await storage.updateTenantAgentConfigs(tenantId, next);
    if (!updated) return false;

    log(`${agent} config updated for ${tenantId}: ${JSON.stringify(updates)}`, "agent-config");
    return true;
  } catch (err) {
    logError(`Could not update ${agent} config for ${tenantId}`, "agent-config", err);
    return false;
  }
}

/** Manual recalibration of one parameter, kept with its reason for later review. */
export async function applyAdjustment(
  storage: IStorage,
  tenantId: string,
  agent: string,
  parameter: string,
  value: string | number | boolean,
  reason = "",
): Promise<boolean> {
  const previous = (await getAgentConfig(storage, tenantId, agent))[parameter];
  const applied = await updateAgentConfig(storage, tenantId, agent, {
    [parameter]: value,
    last_adjustment: {
      parameter,
      previous: previous ?? null,
      value,
      reason,
      at: new Date().toISOString(),
    },
  });
  if (applied) {
    log(`Adjustment applied: ${agent}.${parameter} = ${String(value)} (${reason})`, "agent-config");
  }
  return applied;
}
