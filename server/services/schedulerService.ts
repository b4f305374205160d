import type { Runtime } from "../runtime";
import { runAgentForTenant } from "../runtime";
import { getActiveTenants, isAgentEnabled } from "./agentConfigService";
import { parseCron, latestFiringBetween, type CronSchedule } from "./cronSchedule";
import { runWeeklyReportJob, WEEKLY_REPORT_JOB_ID, WEEKLY_REPORT_SCHEDULE } from "./weeklyReportService";
import { isRunSuccessful } from "@shared/actionTypes";
import { log, logWarn, logError } from "../logger";

export const ROUTER_DRAIN_JOB_ID = "router:drain";
export const ROUTER_DRAIN_SCHEDULE = "15 6 * * *";

export type JobOutcome = {
  tenants: number;
  failures: number;
};

export type JobReport = JobOutcome & {
  jobId: string;
  firedAt: Date;
  durationMs: number;
};

export type SchedulerJob = Readonly<{
  id: string;
  cron: string;
  run: () => Promise<JobOutcome>;
}>;

export type SchedulerSettings = {
  timezone: string;
  pollIntervalMs: number;
  maxCatchUpHours: number;
};

export type ScheduledJobInfo = {
  id: string;
  cron: string;
  lastCheckedAt: Date | null;
  running: boolean;
};

type JobSlot = {
  job: SchedulerJob;
  schedule: CronSchedule;
  lastCheckedAt: Date | null;
  running: boolean;
};

type SchedulerState = {
  running: boolean;
  intervalHandle: ReturnType<typeof setInterval> | null;
  runtime: Runtime | null;
  settings: SchedulerSettings;
  slots: Map<string, JobSlot>;
};

const HOUR_MS = 3_600_000;

const state: SchedulerState = {
  running: false,
  intervalHandle: null,
  runtime: null,
  settings: { timezone: "UTC", pollIntervalMs: 60_000, maxCatchUpHours: 72 },
  slots: new Map(),
};

export class UnknownJobError extends Error {
  constructor(jobId: string) {
    super(`Unknown scheduler job "${jobId}"`);
    this.name = "UnknownJobError";
  }
}

/** Every enabled tenant, one at a time; one tenant's failure never stops the loop. */
export async function runAgentJob(runtime: Runtime, agentType: string): Promise<JobOutcome> {
  const tag = "scheduler";
  const tenants = await getActiveTenants(runtime.storage);
  let ran = 0;
  let failures = 0;

  for (const tenant of tenants) {
    try {
      if (!(await isAgentEnabled(runtime.storage, tenant.id, agentType))) continue;
      ran++;
      const result = await runAgentForTenant(runtime, tenant, agentType);
      if (!isRunSuccessful(result)) failures++;
    } catch (err) {
      failures++;
      logError(`${agentType} failed for tenant ${tenant.id}`, tag, err);
    }
  }

  log(`${agentType}: ${ran} tenants, ${failures} failed`, tag);
  return { tenants: ran, failures };
}

export async function drainAllTenants(runtime: Runtime): Promise<JobOutcome> {
  const tenants = await runtime.storage.getTenants();
  let processed = 0;
  let failures = 0;

  for (const tenant of tenants) {
    try {
      processed += await runtime.router.drain(tenant.id);
    } catch (err) {
      failures++;
      logError(`Drain failed for tenant ${tenant.id}`, "scheduler", err);
    }
  }

  log(`Router drain: ${processed} events across ${tenants.length} tenants`, "scheduler");
  return { tenants: tenants.length, failures };
}

/** One job per registered agent type, the router drain and the weekly report. */
export function buildSchedulerJobs(runtime: Runtime): SchedulerJob[] {
  const agentJobs = runtime.agents.list().map<SchedulerJob>((def) => ({
    id: `agent:${def.type}`,
    cron: def.schedule,
    run: () => runAgentJob(runtime, def.type),
  }));
  return [
    ...agentJobs,
    { id: ROUTER_DRAIN_JOB_ID, cron: ROUTER_DRAIN_SCHEDULE, run: () => drainAllTenants(runtime) },
    { id: WEEKLY_REPORT_JOB_ID, cron: WEEKLY_REPORT_SCHEDULE, run: () => runWeeklyReportJob(runtime) },
  ];
}

function requireRuntime(): Runtime {
  if (!state.runtime) throw new Error("Scheduler not initialised");
  return state.runtime;
}

/**
 * Load jobs and restore each one's last firing from storage. A job never
 * fired before starts checking from now, so a first boot does not catch up.
 */
export async function initScheduler(
  runtime: Runtime,
  settings: SchedulerSettings,
  jobs: readonly SchedulerJob[] = buildSchedulerJobs(runtime),
): Promise<void> {
  state.runtime = runtime;
  state.settings = { ...settings };
  state.slots = new Map();

  for (const job of jobs) {
    let lastCheckedAt: Date | null = null;
    try {
      const saved = await runtime.storage.getSchedulerJobState(job.id);
      lastCheckedAt = saved?.lastFiredAt ?? null;
    } catch (err) {
      logError(`Could not restore state for ${job.id}`, "scheduler", err);
    }
    state.slots.set(job.id, { job, schedule: parseCron(job.cron), lastCheckedAt, running: false });
  }

  log(`Loaded ${state.slots.size} jobs (${settings.timezone})`, "scheduler");
}

async function fire(slot: JobSlot, firedAt: Date): Promise<JobReport> {
  const started = Date.now();
  let outcome: JobOutcome = { tenants: 0, failures: 0 };

  try {
    outcome = await slot.job.run();
  } catch (err) {
    // retried at the next scheduled firing
    outcome = { tenants: 0, failures: 1 };
    logError(`Job ${slot.job.id} failed`, "scheduler", err);
  } finally {
    slot.running = false;
  }

  const report: JobReport = { jobId: slot.job.id, firedAt, durationMs: Date.now() - started, ...outcome };
  log(
    `Job ${report.jobId} done in ${report.durationMs}ms: ${report.tenants} tenants, ${report.failures} failed`,
    "scheduler",
  );
  return report;
}

async function recordFiring(jobId: string, firedAt: Date): Promise<void> {
  try {
    await requireRuntime().storage.saveSchedulerJobState(jobId, firedAt);
  } catch (err) {
    logError(`Could not save state for ${jobId}`, "scheduler", err);
  }
}

/**
 * One poll. A job fires at most once per tick however many of its firings
 * fell in (lastCheckedAt, now], looking back no further than the catch-up
 * cap. A job still running is skipped and its firing dropped.
 */
export async function checkScheduledJobs(now: Date = requireRuntime().now()): Promise<JobReport[]> {
  const { timezone, maxCatchUpHours } = state.settings;
  const floor = new Date(now.getTime() - maxCatchUpHours * HOUR_MS);
  const due: JobSlot[] = [];

  for (const slot of state.slots.values()) {
    const since = slot.lastCheckedAt;
    slot.lastCheckedAt = now;
    if (!since) continue;

    const after = since.getTime() > floor.getTime() ? since : floor;
    const firing = latestFiringBetween(slot.schedule, after, now, timezone);
    if (!firing) continue;

    if (slot.running) {
      logWarn(`Job ${slot.job.id} still running; firing at ${firing.toISOString()} skipped`, "scheduler");
      continue;
    }
    slot.running = true;
    due.push(slot);
  }

  const reports: JobReport[] = [];
  for (const slot of due) {
    await recordFiring(slot.job.id, now);
    reports.push(await fire(slot, now));
  }
  return reports;
}

/** Fire a job outside its schedule. Returns null when it is already running. */
export async function runJobNow(jobId: string): Promise<JobReport | null> {
  const slot = state.slots.get(jobId);
  if (!slot) throw new UnknownJobError(jobId);
  if (slot.running) {
    logWarn(`Job ${jobId} already running; manual run refused`, "scheduler");
    return null;
  }
  slot.running = true;
  return fire(slot, requireRuntime().now());
}

export function listScheduledJobs(): ScheduledJobInfo[] {
  return Array.from(state.slots.values()).map((slot) => ({
    id: slot.job.id,
    cron: slot.job.cron,
    lastCheckedAt: slot.lastCheckedAt,
    running: slot.running,
  }));
}

export async function startScheduler(runtime: Runtime, settings: SchedulerSettings): Promise<void> {
  if (state.running) return;
  state.running = true;

  try {
    await initScheduler(runtime, settings);
  } catch (err) {
    state.running = false;
    throw err;
  }

  state.intervalHandle = setInterval(() => {
    void tick();
  }, settings.pollIntervalMs);
  log(`Started, polling every ${settings.pollIntervalMs}ms`, "scheduler");

  // Catch-up for firings missed while the process was down. Not awaited:
  // jobs it fires can take minutes.
  void tick();
}

async function tick(): Promise<void> {
  try {
    await checkScheduledJobs();
  } catch (err) {
    logError("Tick failed", "scheduler", err);
  }
}

export function stopScheduler(): void {
  if (state.intervalHandle) {
    clearInterval(state.intervalHandle);
    state.intervalHandle = null;
  }
  state.running = false;
}

export function isSchedulerRunning(): boolean {
  return state.running;
}

/** Drop jobs and runtime. Tests only. */
export function resetScheduler(): void {
  stopScheduler();
  state.runtime = null;
  state.slots = new Map();
}
