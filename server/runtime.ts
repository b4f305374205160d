import type { IStorage } from "./storage";
import { ActionExecutor, type SleepFn } from "./executors/actionExecutor";
import type { AlertFn, SendEmailFn } from "./executors/operations";
import { EventRouter, type EventRoute } from "./services/eventRouter";
import { createEventRoutes } from "./services/eventHandlers";
import { AgentRegistry } from "./agents/registry";
import { persistRunResult, type AgentContext } from "./agents/agentRuntime";
import { ConnectorRegistry } from "./connectors/registry";
import { createDraftingAdapter, type DraftingAdapter } from "./services/draftingService";
import { sendEmail as sendResendEmail, alertManager } from "./services/notificationService";
import { getAgentConfig } from "./services/agentConfigService";
import type { AgentRunResult } from "@shared/actionTypes";
import type { Tenant } from "@shared/schema";
import { logWarn, logError, errorMessage } from "./logger";

/** Process-wide collaborators shared by the scheduler, services and routes. */
export type Runtime = {
  storage: IStorage;
  executor: ActionExecutor;
  router: EventRouter;
  agents: AgentRegistry;
  connectors: ConnectorRegistry;
  drafting: DraftingAdapter;
  sendEmail: SendEmailFn;
  alertManager: AlertFn;
  now: () => Date;
  /** `${tenantId}:${agentType}` keys of runs in progress. */
  inFlight: Set<string>;
};

export type RuntimeOptions = {
  storage: IStorage;
  sleep?: SleepFn;
  now?: () => Date;
  routes?: readonly EventRoute[];
  agents?: AgentRegistry;
  connectors?: ConnectorRegistry;
  drafting?: DraftingAdapter;
  sendEmail?: SendEmailFn;
  alertManager?: AlertFn;
};

export function createRuntime(options: RuntimeOptions): Runtime {
  const now = options.now ?? (() => new Date());
  const { storage } = options;
  return {
    storage,
    executor: new ActionExecutor({ storage, sleep: options.sleep, now }),
    router: new EventRouter(storage, options.routes ?? createEventRoutes(storage)),
    agents: options.agents ?? new AgentRegistry(),
    connectors: options.connectors ?? new ConnectorRegistry(),
    drafting: options.drafting ?? createDraftingAdapter({ provider: "stub" }),
    sendEmail: options.sendEmail ?? sendResendEmail,
    alertManager: options.alertManager ?? alertManager,
    now,
    inFlight: new Set(),
  };
}

let current: Runtime | null = null;

export function configureRuntime(runtime: Runtime): void {
  current = runtime;
}

export function getRuntime(): Runtime {
  if (!current) throw new Error("Runtime not configured; call configureRuntime() at startup");
  return current;
}

export function resetRuntime(): void {
  current = null;
}

export async function buildAgentContext(runtime: Runtime, tenant: Tenant, agentType: string): Promise<AgentContext> {
  return {
    tenant,
    config: await getAgentConfig(runtime.storage, tenant.id, agentType),
    storage: runtime.storage,
    executor: runtime.executor,
    router: runtime.router,
    connectors: runtime.connectors,
    drafting: runtime.drafting,
    sendEmail: runtime.sendEmail,
    alertManager: runtime.alertManager,
    now: runtime.now,
  };
}

function runKey(tenantId: string, agentType: string): string {
  return `${tenantId}:${agentType}`;
}

export function isAgentRunning(runtime: Runtime, tenantId: string, agentType: string): boolean {
  return runtime.inFlight.has(runKey(tenantId, agentType));
}

async function notStarted(
  runtime: Runtime,
  tenant: Tenant,
  agentType: string,
  error: string,
): Promise<AgentRunResult> {
  const at = runtime.now();
  const result: AgentRunResult = {
    agent: agentType,
    tenantId: tenant.id,
    startedAt: at,
    finishedAt: at,
    actionsTaken: [],
    kpiName: "",
    kpiValue: 0,
    errors: [error],
  };
  await persistRunResult(runtime.storage, result);
  return result;
}

/**
 * One fresh agent instance for one tenant. Two runs of the same (tenant,
 * agent type) never overlap: the second is refused. Failures before the
 * agent starts (unknown type, config read) come back as a failed result
 * rather than a throw, and are persisted like any other run.
 */
export async function runAgentForTenant(runtime: Runtime, tenant: Tenant, agentType: string): Promise<AgentRunResult> {
  const key = runKey(tenant.id, agentType);
  if (runtime.inFlight.has(key)) {
    logWarn(`Already running for ${tenant.id}; skipped`, `agent:${agentType}`);
    return notStarted(runtime, tenant, agentType, `${agentType} is already running for ${tenant.id}`);
  }

  runtime.inFlight.add(key);
  try {
    const ctx = await buildAgentContext(runtime, tenant, agentType);
    return await runtime.agents.create(agentType, ctx).run();
  } catch (err) {
    logError(`Could not start for ${tenant.id}`, `agent:${agentType}`, err);
    return notStarted(runtime, tenant, agentType, errorMessage(err));
  } finally {
    runtime.inFlight.delete(key);
  }
}
