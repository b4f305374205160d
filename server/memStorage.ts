import { randomUUID } from "crypto";
import type {
  Tenant,
  InsertTenant,
  AgentConfigs,
  StoredEvent,
  InsertEvent,
  PendingAction,
  InsertPendingAction,
  ActionLog,
  InsertActionLog,
  AgentRun,
  InsertAgentRun,
  SchedulerJobState,
} from "@shared/schema";
import type { ActionStatus } from "@shared/actionTypes";
import type { IStorage, EventQuery, PendingActionCompletion } from "./storage";

const DEFAULT_LIST_LIMIT = 100;

function newest<T>(items: T[], at: (item: T) => Date): T[] {
  return [...items].sort((a, b) => at(b).getTime() - at(a).getTime());
}

/**
 * In-process IStorage. Used when no DATABASE_URL is configured and by tests.
 * Rows are copied on the way in and out so callers never share references
 * with the store.
 */
export class MemStorage implements IStorage {
  private readonly tenants = new Map<string, Tenant>();
  private readonly events: StoredEvent[] = [];
  private readonly pendingActions = new Map<string, PendingAction>();
  private readonly actionLogs: ActionLog[] = [];
  private readonly agentRuns: AgentRun[] = [];
  private readonly schedulerJobs = new Map<string, SchedulerJobState>();
  private eventSequence = 0;

  async getTenants(): Promise<Tenant[]> {
    return Array.from(this.tenants.values()).map((t) => ({ ...t }));
  }

  async getTenant(id: string): Promise<Tenant | undefined> {
    const tenant = this.tenants.get(id);
    return tenant ? { ...tenant } : undefined;
  }

  async getTenantBySlug(slug: string): Promise<Tenant | undefined> {
    const tenant = Array.from(this.tenants.values()).find((t) => t.slug === slug);
    return tenant ? { ...tenant } : undefined;
  }

  async createTenant(data: InsertTenant): Promise<Tenant> {
    const now = new Date();
    const tenant: Tenant = {
      id: data.id ?? randomUUID(),
      name: data.name,
      slug: data.slug,
      agentConfigs: structuredClone(data.agentConfigs ?? {}),
      toolsConnected: structuredClone(data.toolsConnected ?? {}),
      createdAt: data.createdAt ?? now,
      updatedAt: data.updatedAt ?? now,
    };
    this.tenants.set(tenant.id, tenant);
    return { ...tenant };
  }

  async updateTenantAgentConfigs(id: string, agentConfigs: AgentConfigs): Promise<Tenant | undefined> {
    const tenant = this.tenants.get(id);
    if (!tenant) return undefined;
    const updated: Tenant = { ...tenant, agentConfigs: structuredClone(agentConfigs), updatedAt: new Date() };
    this.tenants.set(id, updated);
    return { ...updated };
  }

  async createEvent(data: InsertEvent): Promise<StoredEvent> {
    const event: StoredEvent = {
      id: randomUUID(),
      sequence: ++this.eventSequence,
      eventType: data.eventType,
      tenantId: data.tenantId,
      payload: structuredClone(data.payload ?? {}),
      processed: false,
      createdAt: new Date(),
    };
    this.events.push(event);
    return { ...event };
  }

  async getUnprocessedEvents(tenantId: string): Promise<StoredEvent[]> {
    return this.events
      .filter((e) => e.tenantId === tenantId && !e.processed)
      .sort((a, b) => a.sequence - b.sequence)
      .map((e) => ({ ...e }));
  }

  async markEventProcessed(id: string): Promise<boolean> {
    const event = this.events.find((e) => e.id === id);
    if (!event || event.processed) return false;
    event.processed = true;
    return true;
  }

  async getEventsByTenant(tenantId: string, query: EventQuery = {}): Promise<StoredEvent[]> {
    return this.events
      .filter((e) => e.tenantId === tenantId)
      .filter((e) => query.processed === undefined || e.processed === query.processed)
      .sort((a, b) => b.sequence - a.sequence)
      .slice(0, query.limit ?? DEFAULT_LIST_LIMIT)
      .map((e) => ({ ...e }));
  }

  async createPendingAction(data: InsertPendingAction): Promise<PendingAction> {
    const action: PendingAction = {
      id: randomUUID(),
      actionType: data.actionType,
      level: data.level,
      tenantId: data.tenantId,
      agent: data.agent,
      payload: structuredClone(data.payload ?? {}),
      description: data.description ?? "",
      preview: structuredClone(data.preview ?? {}),
      status: "pending",
      attempts: 0,
      result: null,
      error: null,
      createdAt: new Date(),
      executedAt: null,
    };
    this.pendingActions.set(action.id, action);
    return { ...action };
  }

  async getPendingAction(id: string): Promise<PendingAction | undefined> {
    const action = this.pendingActions.get(id);
    return action ? { ...action } : undefined;
  }

  async getPendingActionsByTenant(tenantId: string, status?: ActionStatus): Promise<PendingAction[]> {
    const matching = Array.from(this.pendingActions.values()).filter(
      (a) => a.tenantId === tenantId && (status === undefined || a.status === status),
    );
    return newest(matching, (a) => a.createdAt).map((a) => ({ ...a }));
  }

  async claimPendingAction(id: string): Promise<PendingAction | undefined> {
    return this.transition(id, "pending", { status: "running" });
  }

  async completePendingAction(
    id: string,
    completion: PendingActionCompletion,
  ): Promise<PendingAction | undefined> {
    return this.transition(id, "running", { ...completion });
  }

  async cancelPendingAction(id: string, cancelledAt: Date): Promise<PendingAction | undefined> {
    return this.transition(id, "pending", { status: "cancelled", executedAt: cancelledAt });
  }

  async createActionLog(data: InsertActionLog): Promise<ActionLog> {
    const log: ActionLog = {
      id: randomUUID(),
      actionType: data.actionType,
      level: data.level,
      tenantId: data.tenantId,
      agent: data.agent,
      pendingActionId: data.pendingActionId ?? null,
      payload: structuredClone(data.payload ?? {}),
      status: data.status,
      result: structuredClone(data.result ?? {}),
      error: data.error ?? "",
      attempts: data.attempts ?? 0,
      executedAt: new Date(),
    };
    this.actionLogs.push(log);
    return { ...log };
  }

  async getActionLogsByTenant(tenantId: string, limit = DEFAULT_LIST_LIMIT): Promise<ActionLog[]> {
    const matching = this.actionLogs.filter((l) => l.tenantId === tenantId);
    // Insertion order breaks ties between rows written in the same millisecond.
    return matching
      .map((log, index) => ({ log, index }))
      .sort((a, b) => b.log.executedAt.getTime() - a.log.executedAt.getTime() || b.index - a.index)
      .slice(0, limit)
      .map(({ log }) => ({ ...log }));
  }

  async createAgentRun(data: InsertAgentRun): Promise<AgentRun> {
    const run: AgentRun = {
      id: randomUUID(),
      agent: data.agent,
      tenantId: data.tenantId,
      startedAt: data.startedAt,
      finishedAt: data.finishedAt,
      durationMs: data.durationMs,
      kpiName: data.kpiName ?? "",
      kpiValue: data.kpiValue ?? 0,
      actionsCount: data.actionsCount ?? 0,
      actions: structuredClone(data.actions ?? []),
      errors: [...(data.errors ?? [])],
      success: data.success,
    };
    this.agentRuns.push(run);
    return { ...run };
  }

  async getAgentRunsByTenant(tenantId: string, limit = DEFAULT_LIST_LIMIT): Promise<AgentRun[]> {
    const matching = this.agentRuns.filter((r) => r.tenantId === tenantId);
    return newest(matching, (r) => r.startedAt)
      .slice(0, limit)
      .map((r) => ({ ...r }));
  }

  async getSchedulerJobState(jobId: string): Promise<SchedulerJobState | undefined> {
    const state = this.schedulerJobs.get(jobId);
    return state ? { ...state } : undefined;
  }

  async saveSchedulerJobState(jobId: string, lastFiredAt: Date): Promise<void> {
    this.schedulerJobs.set(jobId, { jobId, lastFiredAt });
  }

  private transition(
    id: string,
    from: ActionStatus,
    updates: Partial<PendingAction>,
  ): PendingAction | undefined {
    const current = this.pendingActions.get(id);
    if (!current || current.status !== from) return undefined;
    const next: PendingAction = { ...current, ...updates };
    this.pendingActions.set(id, next);
    return { ...next };
  }
}
