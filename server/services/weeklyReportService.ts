import type { Runtime } from "../runtime";
import type { ActionLog, AgentRun, PendingAction, Tenant } from "@shared/schema";
import { getActiveTenants, getAgentConfig } from "./agentConfigService";
import { log, logWarn, logError } from "../logger";

export const WEEKLY_REPORT_JOB_ID = "report:weekly";
export const WEEKLY_REPORT_SCHEDULE = "30 6 * * 1";
const WEEKLY_REPORT_ACTION = "weekly_report_sent";

const DAY_MS = 24 * 60 * 60 * 1000;
const REPORT_WINDOW_DAYS = 7;
const HISTORY_LIMIT = 500;
// first configured ceo_email wins
const RECIPIENT_SOURCES = ["cash_predictability", "acquisition_efficiency", "revenue_velocity"] as const;

type WeeklyReport = {
  subject: string;
  body: string;
};

type WeeklyReportInput = {
  agents: readonly string[];
  runs: readonly AgentRun[];
  pending: readonly PendingAction[];
  logs: readonly ActionLog[];
  now: Date;
};

function agentLine(agent: string, runs: readonly AgentRun[]): string {
  const mine = runs.filter((r) => r.agent === agent);
  if (mine.length === 0) return `- ${agent}: no run this week`;
  const latest = mine.reduce((a, b) => (b.startedAt.getTime() > a.startedAt.getTime() ? b : a));
  const failed = mine.filter((r) => !r.success).length;
  const kpi = latest.kpiName ? `${latest.kpiName} ${latest.kpiValue}` : "no KPI";
  return `- ${agent}: ${kpi} (${mine.length} runs, ${failed} failed)`;
}

/** Plain-text digest of the last seven days. Pure; the caller loads the rows. */
function buildWeeklyReport(input: WeeklyReportInput): WeeklyReport {
  const since = input.now.getTime() - REPORT_WINDOW_DAYS * DAY_MS;
  const runs = input.runs.filter((r) => r.startedAt.getTime() >= since);
  const logs = input.logs.filter((l) => l.executedAt.getTime() >= since && l.actionType !== WEEKLY_REPORT_ACTION);
  const awaiting = input.pending.filter((a) => a.status === "pending");
  const succeeded = logs.filter((l) => l.status === "success").length;
  const failed = logs.filter((l) => l.status === "failed").length;

  const week = new Date(since).toISOString().slice(0, 10);
  let subject = `Weekly report, week of ${week}`;
  if (awaiting.length > 0) subject += `: ${awaiting.length} actions awaiting approval`;

  const lines = [
    `Agents since ${week}:`,
    ...input.agents.map((agent) => agentLine(agent, runs)),
    "",
    `Actions executed: ${succeeded} succeeded, ${failed} failed.`,
    `Awaiting approval: ${awaiting.length}.`,
    ...awaiting.slice(0, 10).map((a) => `- [${a.level}] ${a.description}`),
  ];
  return { subject, body: lines.join("\n") };
}

async function recipientFor(runtime: Runtime, tenantId: string): Promise<string> {
  for (const agent of RECIPIENT_SOURCES) {
    const config = await getAgentConfig(runtime.storage, tenantId, agent);
    if (typeof config.ceo_email === "string" && config.ceo_email) return config.ceo_email;
  }
  return "";
}

/**
 * Email one tenant's digest to its CEO and log the send. False when no
 * `ceo_email` is configured or the provider refused the message.
 */
export async function sendWeeklyReport(runtime: Runtime, tenant: Tenant): Promise<boolean> {
  const to = await recipientFor(runtime, tenant.id);
  if (!to) {
    logWarn(`No ceo_email for ${tenant.id}; weekly report skipped`, "report");
    return false;
  }

  const [runs, pending, logs] = await Promise.all([
    runtime.storage.getAgentRunsByTenant(tenant.id, HISTORY_LIMIT),
    runtime.storage.getPendingActionsByTenant(tenant.id),
    runtime.storage.getActionLogsByTenant(tenant.id, HISTORY_LIMIT),
  ]);
  const report = buildWeeklyReport({ agents: runtime.agents.types, runs, pending, logs, now: runtime.now() });

  const sent = await runtime.sendEmail(to, report.subject, report.body);
  await runtime.storage.createActionLog({
    actionType: WEEKLY_REPORT_ACTION,
    level: "A",
    tenantId: tenant.id,
    agent: "scheduler",
    payload: { to, subject: report.subject },
    status: sent ? "success" : "failed",
    error: sent ? "" : "email provider refused the report",
    attempts: 1,
  });
  if (sent) log(`Weekly report sent to ${to} for ${tenant.id}`, "report");
  return sent;
}

/** Tenants without a recipient are skipped, not counted as failures. */
export async function runWeeklyReportJob(runtime: Runtime): Promise<{ tenants: number; failures: number }> {
  const tenants = await getActiveTenants(runtime.storage);
  let sent = 0;
  let failures = 0;

  for (const tenant of tenants) {
    try {
      if (!(await recipientFor(runtime, tenant.id))) continue;
      if (await sendWeeklyReport(runtime, tenant)) sent++;
      else failures++;
    } catch (err) {
      failures++;
      logError(`Weekly report failed for tenant ${tenant.id}`, "report", err);
    }
  }

  log(`Weekly report: ${sent} sent, ${failures} failed`, "report");
  return { tenants: sent + failures, failures };
}
