import type { TenantContext } from "../tenant";
import { getTenantStorage } from "../tenantStorage";
import { getRuntime, isAgentRunning, runAgentForTenant } from "../runtime";
import { applyAdjustment, getAgentConfig, updateAgentConfig } from "./agentConfigService";
import type { AgentRunResult } from "@shared/actionTypes";
import type { AgentConfigValues, AgentRun } from "@shared/schema";

export class AgentServiceError extends Error {
  constructor(message: string, public statusCode: number) {
    super(message);
    this.name = "AgentServiceError";
  }
}

export type AgentStatus = {
  agent: string;
  description: string;
  schedule: string;
  enabled: boolean;
  running: boolean;
  config: AgentConfigValues;
  lastRun: AgentRun | null;
};

export type ConfigAdjustment = {
  agent: string;
  parameter: string;
  value: string | number | boolean;
  reason: string;
};

function requireKnownAgent(agent: string): void {
  if (!getRuntime().agents.has(agent)) {
    throw new AgentServiceError(`Unknown agent "${agent}"`, 400);
  }
}

async function requireTenant(ctx: TenantContext) {
  const tenant = await getTenantStorage(ctx).getTenant();
  if (!tenant) throw new AgentServiceError("Tenant not found", 404);
  return tenant;
}

/** Same entry point the scheduler uses. Refused while a run for this pair is in progress. */
export async function runAgent(ctx: TenantContext, agent: string): Promise<AgentRunResult> {
  requireKnownAgent(agent);
  const runtime = getRuntime();
  const tenant = await requireTenant(ctx);
  if (isAgentRunning(runtime, tenant.id, agent)) {
    throw new AgentServiceError(`${agent} is already running`, 409);
  }
  return runAgentForTenant(runtime, tenant, agent);
}

export async function getAgentStatus(ctx: TenantContext): Promise<AgentStatus[]> {
  const runtime = getRuntime();
  const tenant = await requireTenant(ctx);
  const runs = await getTenantStorage(ctx).getAgentRuns();

  return Promise.all(
    runtime.agents.list().map(async (def) => {
      const config = await getAgentConfig(runtime.storage, tenant.id, def.type);
      return {
        agent: def.type,
        description: def.description,
        schedule: def.schedule,
        enabled: config.enabled !== false,
        running: isAgentRunning(runtime, tenant.id, def.type),
        config,
        lastRun: runs.find((r) => r.agent === def.type) ?? null,
      };
    }),
  );
}

export async function getAgentRuns(ctx: TenantContext, limit?: number): Promise<AgentRun[]> {
  return getTenantStorage(ctx).getAgentRuns(limit);
}

export async function adjustAgentConfig(ctx: TenantContext, adjustment: ConfigAdjustment): Promise<AgentConfigValues> {
  requireKnownAgent(adjustment.agent);
  if (adjustment.parameter === "enabled") {
    throw new AgentServiceError("Use /api/agents/toggle to enable or disable an agent", 400);
  }
  const runtime = getRuntime();
  const tenant = await requireTenant(ctx);

  const applied = await applyAdjustment(
    runtime.storage,
    tenant.id,
    adjustment.agent,
    adjustment.parameter,
    adjustment.value,
    adjustment.reason,
  );
  if (!applied) {
    throw new AgentServiceError(`Could not update ${adjustment.agent} configuration`, 500);
  }
  return getAgentConfig(runtime.storage, tenant.id, adjustment.agent);
}

export async function setAgentEnabled(ctx: TenantContext, agent: string, enabled: boolean): Promise<boolean> {
  requireKnownAgent(agent);
  const tenant = await requireTenant(ctx);
  return updateAgentConfig(getRuntime().storage, tenant.id, agent, { enabled });
}
