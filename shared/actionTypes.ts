import type { ACTION_LEVELS, ACTION_STATUSES, TERMINAL_ACTION_STATUSES, ActionSummary } from "./schema";

/**
 * A = autonomous (execute now), B = supervised (queue for approval),
 * C = assisted (brief a human who acts).
 */
export type ActionLevel = (typeof ACTION_LEVELS)[number];

export type ActionStatus = (typeof ACTION_STATUSES)[number];

export type TerminalActionStatus = (typeof TERMINAL_ACTION_STATUSES)[number];

export type Action = Readonly<{
  type: string;
  level: ActionLevel;
  tenantId: string;
  agent: string;
  payload: Readonly<Record<string, unknown>>;
  description: string;
  preview?: Readonly<Record<string, unknown>>;
}>;

export type ActionResult = {
  actionType: string;
  status: ActionStatus;
  timestamp: Date;
  result: Record<string, unknown>;
  error: string;
  attempts: number;
  pendingActionId?: string;
};

export type Operation<TArgs extends unknown[] = unknown[]> = (...args: TArgs) => unknown;

export type AgentRunResult = Readonly<{
  agent: string;
  tenantId: string;
  startedAt: Date;
  finishedAt: Date;
  actionsTaken: readonly ActionSummary[];
  kpiName: string;
  kpiValue: number;
  errors: readonly string[];
}>;

export function isRunSuccessful(run: AgentRunResult): boolean {
  return run.errors.length === 0;
}

export function runDurationMs(run: AgentRunResult): number {
  return run.finishedAt.getTime() - run.startedAt.getTime();
}
