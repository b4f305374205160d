import { describe, it, expect, vi, beforeEach } from "vitest";
import { MemStorage } from "../../memStorage";
import { createRuntime, type Runtime } from "../../runtime";
import { sendWeeklyReport, runWeeklyReportJob } from "../weeklyReportService";
import type { AgentConfigs, Tenant } from "@shared/schema";

const NOW = new Date("2026-03-02T06:30:00.000Z");

describe("weeklyReportService", () => {
  let storage: MemStorage;
  let sendEmail: ReturnType<typeof vi.fn>;
  let runtime: Runtime;

  function makeTenant(slug: string, agentConfigs: AgentConfigs = {}): Promise<Tenant> {
    return storage.createTenant({ name: "Acme", slug, agentConfigs });
  }

  async function seedWeek(tenantId: string): Promise<void> {
    const run = {
      agent: "revenue_velocity",
      tenantId,
      durationMs: 1000,
      kpiName: "stalled_deals",
      actionsCount: 0,
      actions: [],
      errors: [],
    };
    await storage.createAgentRun({
      ...run,
      startedAt: new Date("2026-03-01T06:00:00Z"),
      finishedAt: new Date("2026-03-01T06:00:01Z"),
      kpiValue: 2,
      success: true,
    });
    await storage.createAgentRun({
      ...run,
      startedAt: new Date("2026-02-25T06:00:00Z"),
      finishedAt: new Date("2026-02-25T06:00:01Z"),
      kpiValue: 4,
      success: false,
    });
    await storage.createAgentRun({
      ...run,
      agent: "cash_predictability",
      startedAt: new Date("2026-02-10T05:00:00Z"),
      finishedAt: new Date("2026-02-10T05:00:01Z"),
      kpiValue: 1200,
      success: true,
    });
    await storage.createPendingAction({
      actionType: "send_invoice_reminder",
      level: "B",
      tenantId,
      agent: "cash_predictability",
      description: "Remind Acme about invoice INV-001",
    });
    await storage.createActionLog({
      actionType: "add_note",
      level: "A",
      tenantId,
      agent: "revenue_velocity",
      status: "success",
    });
    await storage.createActionLog({
      actionType: "send_email",
      level: "B",
      tenantId,
      agent: "process_clarity",
      status: "failed",
    });
  }

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    storage = new MemStorage();
    sendEmail = vi.fn().mockResolvedValue(true);
    runtime = createRuntime({ storage, sendEmail, now: () => NOW });
  });

  it("emails the CEO a digest of the last seven days", async () => {
    const tenant = await makeTenant("acme", { cash_predictability: { ceo_email: "ceo@acme.test" } });
    await seedWeek(tenant.id);

    expect(await sendWeeklyReport(runtime, tenant)).toBe(true);

    expect(sendEmail).toHaveBeenCalledWith(
      "ceo@acme.test",
      "Weekly report, week of 2026-02-23: 1 actions awaiting approval",
      [
        "Agents since 2026-02-23:",
        "- cash_predictability: no run this week",
        "- revenue_velocity: stalled_deals 2 (2 runs, 1 failed)",
        "- process_clarity: no run this week",
        "- acquisition_efficiency: no run this week",
        "",
        "Actions executed: 1 succeeded, 1 failed.",
        "Awaiting approval: 1.",
        "- [B] Remind Acme about invoice INV-001",
      ].join("\n"),
    );
    const logs = await storage.getActionLogsByTenant(tenant.id);
    const logEntry = logs.find((l) => l.actionType === "weekly_report_sent");
    expect(logEntry?.status).toBe("success");
    expect(logEntry?.payload).toEqual({
      to: "ceo@acme.test",
      subject: "Weekly report, week of 2026-02-23: 1 actions awaiting approval",
    });
  });

  it("falls back to the acquisition agent's ceo_email", async () => {
    const tenant = await makeTenant("acme", { acquisition_efficiency: { ceo_email: "founder@acme.test" } });

    await sendWeeklyReport(runtime, tenant);

    expect(sendEmail.mock.calls[0][0]).toBe("founder@acme.test");
    expect(sendEmail.mock.calls[0][1]).toBe("Weekly report, week of 2026-02-23");
  });

  it("skips a tenant without a ceo_email", async () => {
    const tenant = await makeTenant("acme");

    expect(await sendWeeklyReport(runtime, tenant)).toBe(false);
    expect(sendEmail).not.toHaveBeenCalled();
    expect(await storage.getActionLogsByTenant(tenant.id)).toEqual([]);
  });

  it("logs a refused send as failed", async () => {
    sendEmail.mockResolvedValue(false);
    const tenant = await makeTenant("acme", { cash_predictability: { ceo_email: "ceo@acme.test" } });

    expect(await sendWeeklyReport(runtime, tenant)).toBe(false);

    const [logEntry] = await storage.getActionLogsByTenant(tenant.id);
    expect(logEntry.status).toBe("failed");
    expect(logEntry.error).toBe("email provider refused the report");
  });

  it("counts only tenants with a recipient in the job outcome", async () => {
    await makeTenant("with-ceo", { cash_predictability: { ceo_email: "ceo@acme.test" } });
    await makeTenant("without-ceo");
    await makeTenant("refused", { cash_predictability: { ceo_email: "ceo@globex.test" } });
    sendEmail.mockImplementation(async (to: string) => to === "ceo@acme.test");

    expect(await runWeeklyReportJob(runtime)).toEqual({ tenants: 2, failures: 1 });
    expect(sendEmail).toHaveBeenCalledTimes(2);
  });
});
