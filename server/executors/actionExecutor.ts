import type { IStorage } from "../storage";
import type { Action, ActionResult, ActionStatus, Operation } from "@shared/actionTypes";
import type { PendingAction } from "@shared/schema";
import { log, logWarn, logError, errorMessage } from "../logger";

export const MAX_ATTEMPTS = 3;
export const RETRY_DELAYS_MS: readonly number[] = [1_000, 3_000, 9_000];

export type SleepFn = (ms: number) => Promise<void>;

export type ExecutorOptions = {
  storage: IStorage;
  sleep?: SleepFn;
  now?: () => Date;
  maxAttempts?: number;
  retryDelaysMs?: readonly number[];
};

type ExecutedResult = ActionResult & { status: "success" | "failed" };

type AuditEntry = {
  status: ActionStatus;
  attempts: number;
  result?: Record<string, unknown>;
  error?: string;
  pendingActionId?: string;
};

const realSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toResultPayload(value: unknown): Record<string, unknown> {
  if (value === undefined) return {};
  if (isRecord(value)) return { ...value };
  return { value };
}

function actionFromRecord(record: PendingAction): Action {
  return {
    type: record.actionType,
    level: record.level,
    tenantId: record.tenantId,
    agent: record.agent,
    payload: record.payload,
    description: record.description,
    preview: record.preview,
  };
}

/**
 * The single path through which agent logic touches the outside world or
 * defers to a human.
 *
 * Level A runs the operation now with bounded retry. Level B is stored as a
 * pending action and only runs through approve(). Level C is stored as a
 * brief for a human to act on; the executor never runs it itself.
 *
 * None of the public methods throw. Audit writes are best-effort and never
 * change the result returned to the caller.
 */
export class ActionExecutor {
  private readonly storage: IStorage;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;
  private readonly maxAttempts: number;
  private readonly retryDelaysMs: readonly number[];

  constructor(options: ExecutorOptions) {
    this.storage = options.storage;
    this.sleep = options.sleep ?? realSleep;
    this.now = options.now ?? (() => new Date());
    this.maxAttempts = Math.max(1, options.maxAttempts ?? MAX_ATTEMPTS);
    this.retryDelaysMs = options.retryDelaysMs ?? RETRY_DELAYS_MS;
  }

  async run<TArgs extends unknown[]>(
    action: Action,
    operation: Operation<TArgs>,
    ...args: TArgs
  ): Promise<ActionResult> {
    switch (action.level) {
      case "A":
        return this.executeWithRetry(action, operation, args);
      case "B":
        return this.enqueue(action, { queued: true, description: action.description });
      case "C":
        return this.enqueue(action, { briefReady: true, description: action.description });
      default: {
        const level: never = action.level;
        return this.result(action.type, "failed", { error: `Unknown action level "${String(level)}"` });
      }
    }
  }

  /**
   * Execute a queued action after a human approved it. The pending → running
   * claim is conditional, so the operation runs at most once per id. An id that
   * is no longer pending is refused: the operation is not called, the record is
   * left as it is, and the returned result carries the stored status with
   * attempts = 0.
   */
  async approve<TArgs extends unknown[]>(
    pendingActionId: string,
    operation: Operation<TArgs>,
    ...args: TArgs
  ): Promise<ActionResult> {
    let claimed: PendingAction | undefined;
    try {
      claimed = await this.storage.claimPendingAction(pendingActionId);
    } catch (err) {
      logError(`Could not claim pending action ${pendingActionId}`, "executor", err);
      return this.result("unknown", "failed", { error: errorMessage(err), pendingActionId });
    }

    if (!claimed) {
      return this.refuseApproval(pendingActionId);
    }

    const action = actionFromRecord(claimed);
    log(`[${action.agent}] ${action.type} approved (id: ${pendingActionId})`, "executor");
    const outcome = await this.executeWithRetry(action, operation, args, pendingActionId);

    try {
      await this.storage.completePendingAction(pendingActionId, {
        status: outcome.status,
        attempts: outcome.attempts,
        result: outcome.result,
        error: outcome.error || null,
        executedAt: outcome.timestamp,
      });
    } catch (err) {
      logError(
        `Could not record ${outcome.status} on pending action ${pendingActionId}; record left running`,
        "executor",
        err,
      );
    }

    return { ...outcome, pendingActionId };
  }

  /** pending → cancelled. Any other status, or an unknown id, is a no-op. */
  async reject(pendingActionId: string): Promise<void> {
    try {
      const cancelled = await this.storage.cancelPendingAction(pendingActionId, this.now());
      if (!cancelled) {
        const existing = await this.storage.getPendingAction(pendingActionId);
        logWarn(
          existing
            ? `Reject ignored: pending action ${pendingActionId} is already ${existing.status}`
            : `Reject ignored: pending action ${pendingActionId} not found`,
          "executor",
        );
        return;
      }
      log(`[${cancelled.agent}] ${cancelled.actionType} cancelled by a human (id: ${pendingActionId})`, "executor");
      await this.audit(actionFromRecord(cancelled), {
        status: "cancelled",
        attempts: 0,
        pendingActionId,
      });
    } catch (err) {
      logError(`Could not reject pending action ${pendingActionId}`, "executor", err);
    }
  }

  private async executeWithRetry<TArgs extends unknown[]>(
    action: Action,
    operation: Operation<TArgs>,
    args: TArgs,
    pendingActionId?: string,
  ): Promise<ExecutedResult> {
    let lastError = "";

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        log(`[${action.agent}] ${action.type} attempt ${attempt}/${this.maxAttempts}`, "executor");
        const value = await operation(...args);
        const result = toResultPayload(value);
        await this.audit(action, { status: "success", attempts: attempt, result, pendingActionId });
        return { ...this.result(action.type, "success", { result, pendingActionId }), status: "success", attempts: attempt };
      } catch (err) {
        lastError = errorMessage(err) || "operation failed";
        logWarn(`[${action.agent}] ${action.type} attempt ${attempt} failed: ${lastError}`, "executor");

        if (attempt < this.maxAttempts) {
          await this.audit(action, { status: "running", attempts: attempt, error: lastError, pendingActionId });
          const delay = this.retryDelaysMs[Math.min(attempt - 1, this.retryDelaysMs.length - 1)] ?? 0;
          await this.sleep(delay);
        }
      }
    }

    await this.audit(action, {
      status: "failed",
      attempts: this.maxAttempts,
      error: lastError,
      pendingActionId,
    });
    logError(
      `[${action.agent}] ${action.type} failed after ${this.maxAttempts} attempts: ${lastError}`,
      "executor",
    );
    return {
      ...this.result(action.type, "failed", { error: lastError, pendingActionId }),
      status: "failed",
      attempts: this.maxAttempts,
    };
  }

  private async enqueue(action: Action, result: Record<string, unknown>): Promise<ActionResult> {
    let record: PendingAction;
    try {
      record = await this.storage.createPendingAction({
        actionType: action.type,
        level: action.level,
        tenantId: action.tenantId,
        agent: action.agent,
        payload: { ...action.payload },
        description: action.description,
        preview: { ...(action.preview ?? {}) },
      });
    } catch (err) {
      logError(`[${action.agent}] ${action.type} could not be queued`, "executor", err);
      return this.result(action.type, "failed", { error: `Could not queue action: ${errorMessage(err)}` });
    }

    log(
      `[${action.agent}] ${action.type} level ${action.level} awaiting a human (id: ${record.id})`,
      "executor",
    );
    await this.audit(action, { status: "pending", attempts: 0, result, pendingActionId: record.id });
    return this.result(action.type, "pending", { result, pendingActionId: record.id });
  }

  private async refuseApproval(pendingActionId: string): Promise<ActionResult> {
    let existing: PendingAction | undefined;
    try {
      existing = await this.storage.getPendingAction(pendingActionId);
    } catch (err) {
      logError(`Could not load pending action ${pendingActionId}`, "executor", err);
      return this.result("unknown", "failed", { error: errorMessage(err), pendingActionId });
    }

    if (!existing) {
      logWarn(`Approve ignored: pending action ${pendingActionId} not found`, "executor");
      return this.result("unknown", "failed", {
        error: `Pending action ${pendingActionId} not found`,
        pendingActionId,
      });
    }

    logWarn(`Approve ignored: pending action ${pendingActionId} is already ${existing.status}`, "executor");
    return this.result(existing.actionType, existing.status, {
      result: existing.result ?? {},
      error: `Pending action ${pendingActionId} is already ${existing.status}`,
      pendingActionId,
    });
  }

  private result(
    actionType: string,
    status: ActionStatus,
    fields: { result?: Record<string, unknown>; error?: string; pendingActionId?: string } = {},
  ): ActionResult {
    const result: ActionResult = {
      actionType,
      status,
      timestamp: this.now(),
      result: fields.result ?? {},
      error: fields.error ?? "",
      attempts: 0,
    };
    if (fields.pendingActionId) result.pendingActionId = fields.pendingActionId;
    return result;
  }

  private async audit(action: Action, entry: AuditEntry): Promise<void> {
    try {
      await this.storage.createActionLog({
        actionType: action.type,
        level: action.level,
        tenantId: action.tenantId,
        agent: action.agent,
        pendingActionId: entry.pendingActionId ?? null,
        payload: { ...action.payload },
        status: entry.status,
        result: entry.result ?? {},
        error: entry.error ?? "",
        attempts: entry.attempts,
      });
    } catch (err) {
      logError(`[${action.agent}] ${action.type} audit write failed`, "executor", err);
    }
  }
}
