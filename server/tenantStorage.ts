import type { IStorage, EventQuery } from "./storage";
import { getRuntime } from "./runtime";
import type { TenantContext } from "./tenant";
import type { ActionStatus } from "@shared/actionTypes";
import type { ActionLog, AgentRun, PendingAction, StoredEvent, Tenant } from "@shared/schema";

/** Reads bound to one tenant. Rows owned by another tenant are invisible. */
export function getTenantStorage(ctx: TenantContext, storage: IStorage = getRuntime().storage) {
  const tenantId = ctx.tenantId;
  return {
    async getTenant(): Promise<Tenant | undefined> {
      return storage.getTenant(tenantId);
    },

    async getPendingActions(status?: ActionStatus): Promise<PendingAction[]> {
      return storage.getPendingActionsByTenant(tenantId, status);
    },

    async getPendingAction(id: string): Promise<PendingAction | undefined> {
      const action = await storage.getPendingAction(id);
      return action && action.tenantId === tenantId ? action : undefined;
    },

    async getActionLogs(limit?: number): Promise<ActionLog[]> {
      return storage.getActionLogsByTenant(tenantId, limit);
    },

    async getAgentRuns(limit?: number): Promise<AgentRun[]> {
      return storage.getAgentRunsByTenant(tenantId, limit);
    },

    async getEvents(query?: EventQuery): Promise<StoredEvent[]> {
      return storage.getEventsByTenant(tenantId, query);
    },
  };
}
