import type { IStorage } from "../storage";
import type { ActionExecutor } from "../executors/actionExecutor";
import type { EventRouter } from "../services/eventRouter";
import type { ConnectorRegistry } from "../connectors/registry";
import type { DraftingAdapter } from "../services/draftingService";
import type { AlertFn, BoundOperation, OperationContext, SendEmailFn } from "../executors/operations";
import type { Action, ActionResult, AgentRunResult } from "@shared/actionTypes";
import { isRunSuccessful, runDurationMs } from "@shared/actionTypes";
import type { ActionLog, ActionSummary, AgentConfigValues, PendingAction, Tenant } from "@shared/schema";
import { log, logError, errorMessage } from "../logger";

/** Everything one agent invocation may touch. Built fresh for each run. */
export type AgentContext = {
  tenant: Tenant;
  config: AgentConfigValues;
  storage: IStorage;
  executor: ActionExecutor;
  router: EventRouter;
  connectors: ConnectorRegistry;
  drafting: DraftingAdapter;
  sendEmail: SendEmailFn;
  alertManager: AlertFn;
  now: () => Date;
};

export type AgentOutcome = {
  kpiName: string;
  kpiValue: number;
};

export type AgentRunState = "idle" | "running" | "succeeded" | "failed";

export type ActionSpec = Omit<Action, "tenantId" | "agent">;

export type PayloadMatcher = (payload: Readonly<Record<string, unknown>>) => boolean;

type ActionHistory = {
  pending: PendingAction[];
  logs: ActionLog[];
};

const DAY_MS = 24 * 60 * 60 * 1000;
const HISTORY_LOG_LIMIT = 500;

// Handed to the executor for levels B and C, which never run it.
const awaitsApproval: BoundOperation = async () => {
  throw new Error("queued actions run only through approval");
};

/**
 * Envelope around one (tenant, agent type) unit of work.
 *
 * run() records the start time, calls execute(), and converts anything that
 * escapes into a failed result whose only error is the exception text. The
 * result is persisted whether the run succeeded or not. Instances are single
 * use.
 */
export abstract class TenantAgent {
  abstract readonly name: string;

  private runState: AgentRunState = "idle";
  private readonly actions: ActionSummary[] = [];
  private readonly errors: string[] = [];
  private history: ActionHistory | null = null;

  constructor(protected readonly ctx: AgentContext) {}

  protected abstract execute(): Promise<AgentOutcome>;

  get state(): AgentRunState {
    return this.runState;
  }

  get tenantId(): string {
    return this.ctx.tenant.id;
  }

  protected get config(): AgentConfigValues {
    return this.ctx.config;
  }

  async run(): Promise<AgentRunResult> {
    const startedAt = this.ctx.now();
    const tag = `agent:${this.name}`;

    if (this.runState !== "idle") {
      logError(`Instance already ran for ${this.tenantId}; create a new one`, tag);
      return this.buildResult(startedAt, { kpiName: "", kpiValue: 0 }, ["agent instance already ran"]);
    }

    this.runState = "running";
    log(`Starting for ${this.tenantId}`, tag);

    let outcome: AgentOutcome = { kpiName: "", kpiValue: 0 };
    let errors: string[];
    try {
      outcome = await this.execute();
      errors = [...this.errors];
    } catch (err) {
      logError(`Run failed for ${this.tenantId}`, tag, err);
      errors = [errorMessage(err) || "agent run failed"];
    }

    const result = this.buildResult(startedAt, outcome, errors);
    this.runState = isRunSuccessful(result) ? "succeeded" : "failed";
    await persistRunResult(this.ctx.storage, result);

    log(
      `Finished for ${this.tenantId} in ${runDurationMs(result)}ms: ` +
        `${result.kpiName || "kpi"}=${result.kpiValue}, ${result.actionsTaken.length} actions, ` +
        `${result.errors.length} errors`,
      tag,
    );
    return result;
  }

  /**
   * Hand an action to the executor. Level A needs an operation; levels B and
   * C are queued and ignore it. A failed action is recorded as a run error
   * but does not stop the run.
   */
  protected async submit(spec: ActionSpec, operation: BoundOperation | null = null): Promise<ActionResult> {
    const action: Action = { ...spec, tenantId: this.tenantId, agent: this.name };

    let result: ActionResult;
    if (action.level === "A" && !operation) {
      result = {
        actionType: action.type,
        status: "failed",
        timestamp: this.ctx.now(),
        result: {},
        error: `No operation available for ${action.type}`,
        attempts: 0,
      };
    } else {
      result = await this.ctx.executor.run(action, operation ?? awaitsApproval);
    }

    this.actions.push({
      type: action.type,
      level: action.level,
      status: result.status,
      description: action.description,
    });
    if (result.status === "failed") {
      this.recordError(`${action.type}: ${result.error}`);
    }
    return result;
  }

  /**
   * Whether this tenant already has an action of `type` for the record
   * `matches` picks out: still awaiting a decision, or logged within
   * `withinDays` without failing or being cancelled. History is read once per
   * run; a read failure throws and fails the run.
   */
  protected async alreadyActed(type: string, matches: PayloadMatcher, withinDays: number): Promise<boolean> {
    if (!this.history) {
      const [pending, logs] = await Promise.all([
        this.ctx.storage.getPendingActionsByTenant(this.tenantId),
        this.ctx.storage.getActionLogsByTenant(this.tenantId, HISTORY_LOG_LIMIT),
      ]);
      this.history = { pending, logs };
    }

    const open = this.history.pending.some(
      (p) => p.actionType === type && (p.status === "pending" || p.status === "running") && matches(p.payload),
    );
    if (open) return true;

    const cutoff = this.ctx.now().getTime() - withinDays * DAY_MS;
    return this.history.logs.some(
      (l) =>
        l.actionType === type &&
        l.status !== "failed" &&
        l.status !== "cancelled" &&
        l.executedAt.getTime() >= cutoff &&
        matches(l.payload),
    );
  }

  protected async publish(eventType: string, payload: Record<string, unknown>): Promise<void> {
    const event = await this.ctx.router.publish(eventType, this.tenantId, payload);
    if (!event) this.recordError(`could not publish ${eventType}`);
  }

  protected recordError(message: string): void {
    this.errors.push(message);
  }

  protected operationContext(): OperationContext {
    return {
      tenant: this.ctx.tenant,
      sendEmail: this.ctx.sendEmail,
      alertManager: this.ctx.alertManager,
      connectors: this.ctx.connectors,
    };
  }

  private buildResult(startedAt: Date, outcome: AgentOutcome, errors: string[]): AgentRunResult {
    const finishedAt = this.ctx.now();
    return {
      agent: this.name,
      tenantId: this.tenantId,
      startedAt,
      // finishedAt >= startedAt
      finishedAt: finishedAt.getTime() < startedAt.getTime() ? startedAt : finishedAt,
      actionsTaken: [...this.actions],
      kpiName: outcome.kpiName,
      kpiValue: outcome.kpiValue,
      errors,
    };
  }
}

/** Write one run to agent_runs. A failed write is logged, never thrown. */
export async function persistRunResult(storage: IStorage, result: AgentRunResult): Promise<void> {
  try {
    await storage.createAgentRun({
      agent: result.agent,
      tenantId: result.tenantId,
      startedAt: result.startedAt,
      finishedAt: result.finishedAt,
      durationMs: runDurationMs(result),
      kpiName: result.kpiName,
      kpiValue: result.kpiValue,
      actionsCount: result.actionsTaken.length,
      actions: [...result.actionsTaken],
      errors: [...result.errors],
      success: isRunSuccessful(result),
    });
  } catch (err) {
    logError(`Could not persist run for ${result.tenantId}`, `agent:${result.agent}`, err);
  }
}
