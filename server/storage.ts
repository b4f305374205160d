import { eq, desc, asc, and } from "drizzle-orm";
import type { Database } from "./db";
import {
  tenants,
  events,
  pendingActions,
  actionLogs,
  agentRuns,
  schedulerJobs,
  type Tenant,
  type InsertTenant,
  type AgentConfigs,
  type StoredEvent,
  type InsertEvent,
  type PendingAction,
  type InsertPendingAction,
  type ActionLog,
  type InsertActionLog,
  type AgentRun,
  type InsertAgentRun,
  type SchedulerJobState,
} from "@shared/schema";
import type { ActionStatus, TerminalActionStatus } from "@shared/actionTypes";

export type PendingActionCompletion = {
  status: TerminalActionStatus;
  attempts: number;
  result: Record<string, unknown>;
  error: string | null;
  executedAt: Date;
};

export type EventQuery = {
  processed?: boolean;
  limit?: number;
};

/**
 * Durable store shared by every tenant. All writes are single-row inserts or
 * conditional updates scoped by id or tenant id; nothing spans a transaction.
 */
export interface IStorage {
  getTenants(): Promise<Tenant[]>;
  getTenant(id: string): Promise<Tenant | undefined>;
  getTenantBySlug(slug: string): Promise<Tenant | undefined>;
  createTenant(data: InsertTenant): Promise<Tenant>;
  updateTenantAgentConfigs(id: string, agentConfigs: AgentConfigs): Promise<Tenant | undefined>;

  createEvent(data: InsertEvent): Promise<StoredEvent>;
  getUnprocessedEvents(tenantId: string): Promise<StoredEvent[]>;
  /** unprocessed → processed. False when another pass already acknowledged it. */
  markEventProcessed(id: string): Promise<boolean>;
  getEventsByTenant(tenantId: string, query?: EventQuery): Promise<StoredEvent[]>;

  createPendingAction(data: InsertPendingAction): Promise<PendingAction>;
  getPendingAction(id: string): Promise<PendingAction | undefined>;
  getPendingActionsByTenant(tenantId: string, status?: ActionStatus): Promise<PendingAction[]>;
  /** pending → running, only if still pending. Returns undefined when the claim lost. */
  claimPendingAction(id: string): Promise<PendingAction | undefined>;
  completePendingAction(id: string, completion: PendingActionCompletion): Promise<PendingAction | undefined>;
  /** pending → cancelled, only if still pending. */
  cancelPendingAction(id: string, cancelledAt: Date): Promise<PendingAction | undefined>;

  createActionLog(data: InsertActionLog): Promise<ActionLog>;
  getActionLogsByTenant(tenantId: string, limit?: number): Promise<ActionLog[]>;

  createAgentRun(data: InsertAgentRun): Promise<AgentRun>;
  getAgentRunsByTenant(tenantId: string, limit?: number): Promise<AgentRun[]>;

  getSchedulerJobState(jobId: string): Promise<SchedulerJobState | undefined>;
  saveSchedulerJobState(jobId: string, lastFiredAt: Date): Promise<void>;
}

const DEFAULT_LIST_LIMIT = 100;

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Database) {}

  async getTenants(): Promise<Tenant[]> {
    return this.db.select().from(tenants).orderBy(asc(tenants.createdAt));
  }

  async getTenant(id: string): Promise<Tenant | undefined> {
    const [tenant] = await this.db.select().from(tenants).where(eq(tenants.id, id));
    return tenant;
  }

  async getTenantBySlug(slug: string): Promise<Tenant | undefined> {
    const [tenant] = await this.db.select().from(tenants).where(eq(tenants.slug, slug));
    return tenant;
  }

  async createTenant(data: InsertTenant): Promise<Tenant> {
    const [tenant] = await this.db.insert(tenants).values(data).returning();
    return tenant;
  }

  async updateTenantAgentConfigs(id: string, agentConfigs: AgentConfigs): Promise<Tenant | undefined> {
    const [tenant] = await this.db
      .update(tenants)
      .set({ agentConfigs, updatedAt: new Date() })
      .where(eq(tenants.id, id))
      .returning();
    return tenant;
  }

  async createEvent(data: InsertEvent): Promise<StoredEvent> {
    const [event] = await this.db.insert(events).values(data).returning();
    return event;
  }

  async getUnprocessedEvents(tenantId: string): Promise<StoredEvent[]> {
    return this.db
      .select()
      .from(events)
      .where(and(eq(events.tenantId, tenantId), eq(events.processed, false)))
      .orderBy(asc(events.sequence));
  }

  async markEventProcessed(id: string): Promise<boolean> {
    const updated = await this.db
      .update(events)
      .set({ processed: true })
      .where(and(eq(events.id, id), eq(events.processed, false)))
      .returning({ id: events.id });
    return updated.length > 0;
  }

  async getEventsByTenant(tenantId: string, query: EventQuery = {}): Promise<StoredEvent[]> {
    const where =
      query.processed === undefined
        ? eq(events.tenantId, tenantId)
        : and(eq(events.tenantId, tenantId), eq(events.processed, query.processed));
    return this.db
      .select()
      .from(events)
      .where(where)
      .orderBy(desc(events.sequence))
      .limit(query.limit ?? DEFAULT_LIST_LIMIT);
  }

  async createPendingAction(data: InsertPendingAction): Promise<PendingAction> {
    const [action] = await this.db.insert(pendingActions).values(data).returning();
    return action;
  }

  async getPendingAction(id: string): Promise<PendingAction | undefined> {
    const [action] = await this.db.select().from(pendingActions).where(eq(pendingActions.id, id));
    return action;
  }

  async getPendingActionsByTenant(tenantId: string, status?: ActionStatus): Promise<PendingAction[]> {
    const where = status
      ? and(eq(pendingActions.tenantId, tenantId), eq(pendingActions.status, status))
      : eq(pendingActions.tenantId, tenantId);
    return this.db.select().from(pendingActions).where(where).orderBy(desc(pendingActions.createdAt));
  }

  async claimPendingAction(id: string): Promise<PendingAction | undefined> {
    const [action] = await this.db
      .update(pendingActions)
      .set({ status: "running" })
      .where(and(eq(pendingActions.id, id), eq(pendingActions.status, "pending")))
      .returning();
    return action;
  }

  async completePendingAction(
    id: string,
    completion: PendingActionCompletion,
  ): Promise<PendingAction | undefined> {
    const [action] = await this.db
      .update(pendingActions)
      .set(completion)
      .where(and(eq(pendingActions.id, id), eq(pendingActions.status, "running")))
      .returning();
    return action;
  }

  async cancelPendingAction(id: string, cancelledAt: Date): Promise<PendingAction | undefined> {
    const [action] = await this.db
      .update(pendingActions)
      .set({ status: "cancelled", executedAt: cancelledAt })
      .where(and(eq(pendingActions.id, id), eq(pendingActions.status, "pending")))
      .returning();
    return action;
  }

  async createActionLog(data: InsertActionLog): Promise<ActionLog> {
    const [log] = await this.db.insert(actionLogs).values(data).returning();
    return log;
  }

  async getActionLogsByTenant(tenantId: string, limit = DEFAULT_LIST_LIMIT): Promise<ActionLog[]> {
    return this.db
      .select()
      .from(actionLogs)
      .where(eq(actionLogs.tenantId, tenantId))
      .orderBy(desc(actionLogs.executedAt))
      .limit(limit);
  }

  async createAgentRun(data: InsertAgentRun): Promise<AgentRun> {
    const [run] = await this.db.insert(agentRuns).values(data).returning();
    return run;
  }

  async getAgentRunsByTenant(tenantId: string, limit = DEFAULT_LIST_LIMIT): Promise<AgentRun[]> {
    return this.db
      .select()
      .from(agentRuns)
      .where(eq(agentRuns.tenantId, tenantId))
      .orderBy(desc(agentRuns.startedAt))
      .limit(limit);
  }

  async getSchedulerJobState(jobId: string): Promise<SchedulerJobState | undefined> {
    const [state] = await this.db.select().from(schedulerJobs).where(eq(schedulerJobs.jobId, jobId));
    return state;
  }

  async saveSchedulerJobState(jobId: string, lastFiredAt: Date): Promise<void> {
    await this.db
      .insert(schedulerJobs)
      .values({ jobId, lastFiredAt })
      .onConflictDoUpdate({ target: schedulerJobs.jobId, set: { lastFiredAt } });
  }
}
