import type { TenantContext } from "../tenant";
import { getTenantStorage } from "../tenantStorage";
import { getRuntime } from "../runtime";
import { isKnownOperation, resolveOperation } from "../executors/operations";
import type { ActionResult, ActionStatus } from "@shared/actionTypes";
import type { ActionLog, PendingAction } from "@shared/schema";
import { log } from "../logger";

export class ActionServiceError extends Error {
  constructor(message: string, public statusCode: number) {
    super(message);
    this.name = "ActionServiceError";
  }
}

const MAX_LOG_LIMIT = 500;

export async function listPendingActions(ctx: TenantContext, status?: ActionStatus): Promise<PendingAction[]> {
  return getTenantStorage(ctx).getPendingActions(status);
}

export async function listActionLogs(ctx: TenantContext, limit = 100): Promise<ActionLog[]> {
  return getTenantStorage(ctx).getActionLogs(Math.min(Math.max(1, limit), MAX_LOG_LIMIT));
}

async function requirePendingAction(ctx: TenantContext, id: string): Promise<PendingAction> {
  const action = await getTenantStorage(ctx).getPendingAction(id);
  if (!action) throw new ActionServiceError("Pending action not found", 404);
  if (action.status !== "pending") {
    throw new ActionServiceError(`Action is already ${action.status}`, 409);
  }
  return action;
}

/**
 * Rebuild the queued operation from its type and payload, then hand it to
 * the executor. A concurrent approval that wins the claim first surfaces
 * here as a 409.
 */
export async function approveAction(ctx: TenantContext, id: string): Promise<ActionResult> {
  const runtime = getRuntime();
  const action = await requirePendingAction(ctx, id);

  if (!isKnownOperation(action.actionType)) {
    throw new ActionServiceError(`No operation registered for ${action.actionType}`, 400);
  }
  const tenant = await getTenantStorage(ctx).getTenant();
  if (!tenant) throw new ActionServiceError("Tenant not found", 404);

  const operation = resolveOperation(action.actionType, action.payload, {
    tenant,
    sendEmail: runtime.sendEmail,
    alertManager: runtime.alertManager,
    connectors: runtime.connectors,
  });
  if (!operation) {
    throw new ActionServiceError(`${action.actionType} cannot be executed for this tenant`, 400);
  }

  log(`${action.actionType} ${id} approved by ${ctx.userId ?? "anonymous"}`, "actions");
  const result = await runtime.executor.approve(id, operation);
  if (result.attempts === 0 && result.status !== "success") {
    throw new ActionServiceError(result.error || `Action is already ${result.status}`, 409);
  }
  return result;
}

export async function rejectAction(ctx: TenantContext, id: string): Promise<PendingAction> {
  const runtime = getRuntime();
  const action = await requirePendingAction(ctx, id);
  log(`${action.actionType} ${id} rejected by ${ctx.userId ?? "anonymous"}`, "actions");
  await runtime.executor.reject(id);

  const after = await getTenantStorage(ctx).getPendingAction(id);
  if (!after || after.status !== "cancelled") {
    throw new ActionServiceError(`Action is already ${after?.status ?? "gone"}`, 409);
  }
  return after;
}
