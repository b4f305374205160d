import { TenantAgent, type AgentOutcome } from "./agentRuntime";
import type { Task } from "../connectors/types";
import { log } from "../logger";

const DAY_MS = 24 * 60 * 60 * 1000;
const BRIEF_COOLDOWN_DAYS = 7;

function daysOverdue(task: Task, now: Date): number {
  if (!task.dueAt) return 0;
  return Math.floor((now.getTime() - task.dueAt.getTime()) / DAY_MS);
}

/**
 * Briefs the manager (level C) on tasks overdue past the escalation threshold.
 * A task already in an open brief, or briefed in the last week, is left out.
 */
export class ProcessClarityAgent extends TenantAgent {
  readonly name = "process_clarity";

  protected async execute(): Promise<AgentOutcome> {
    const project = this.ctx.connectors.forTenant(this.ctx.tenant, "project");
    if (!project) {
      log(`No project tool connected for ${this.tenantId}; nothing to analyse`, `agent:${this.name}`);
      return { kpiName: "overdue_tasks", kpiValue: 0 };
    }

    const now = this.ctx.now();
    const threshold =
      typeof this.config.overdue_escalation_days === "number" ? this.config.overdue_escalation_days : 3;

    const overdue = (await project.fetchTasks()).filter(
      (t) => t.status !== "done" && t.dueAt !== null && t.dueAt.getTime() < now.getTime(),
    );
    const late = overdue
      .filter((t) => daysOverdue(t, now) >= threshold)
      .sort((a, b) => daysOverdue(b, now) - daysOverdue(a, now));
    const escalated: Task[] = [];
    for (const task of late) {
      const briefed = (payload: Readonly<Record<string, unknown>>) =>
        Array.isArray(payload.taskIds) && payload.taskIds.includes(task.rawId);
      if (!(await this.alreadyActed("manager_brief", briefed, BRIEF_COOLDOWN_DAYS))) escalated.push(task);
    }

    if (escalated.length > 0) {
      const tasks = escalated.map((t) => ({
        title: t.title,
        assignee: t.assigneeName,
        daysOverdue: daysOverdue(t, now),
      }));
      const summary = await this.ctx.drafting.generate(
        { tasks: tasks.map((t) => `${t.title} (${t.assignee || "unassigned"}, ${t.daysOverdue}d)`) },
        "Write a brief for the manager: which tasks are late, who owns them, and what to unblock first.",
      );

      await this.submit({
        type: "manager_brief",
        level: "C",
        payload: {
          managerEmail: typeof this.config.manager_email === "string" ? this.config.manager_email : "",
          taskIds: escalated.map((t) => t.rawId),
          tasks,
          ...(summary ? { summary } : {}),
        },
        description: `${escalated.length} tasks overdue by ${threshold}+ days`,
      });
    }

    return { kpiName: "overdue_tasks", kpiValue: overdue.length };
  }
}
