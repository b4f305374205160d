import { TenantAgent, type AgentOutcome } from "./agentRuntime";
import { resolveOperation } from "../executors/operations";
import type { Deal } from "../connectors/types";
import { log } from "../logger";

const DAY_MS = 24 * 60 * 60 * 1000;
const FORECAST_HORIZON_DAYS = 30;
const MAX_NOTES_PER_RUN = 20;
const NOTE_COOLDOWN_DAYS = 7;

function numberSetting(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function normalizedProbability(p: number): number {
  const fraction = p > 1 ? p / 100 : p;
  return Math.min(1, Math.max(0, fraction));
}

/**
 * Flags deals with no activity past the stagnation threshold and publishes a
 * 30-day weighted pipeline forecast for the other agents. A deal is noted at
 * most once a week.
 */
export class RevenueVelocityAgent extends TenantAgent {
  readonly name = "revenue_velocity";

  protected async execute(): Promise<AgentOutcome> {
    const crm = this.ctx.connectors.forTenant(this.ctx.tenant, "crm");
    if (!crm) {
      log(`No CRM connected for ${this.tenantId}; nothing to analyse`, `agent:${this.name}`);
      return { kpiName: "stalled_deals", kpiValue: 0 };
    }

    const now = this.ctx.now();
    const thresholdDays = numberSetting(this.config.stagnation_threshold_days, 21);
    const active = (await crm.fetchDeals()).filter((d) => d.status === "active");
    const stalled = active.filter((d) => this.daysIdle(d, now) >= thresholdDays);

    // Under cash pressure the largest weighted deals get looked at first.
    const ordered =
      this.config.cash_pressure_mode === true
        ? [...stalled].sort((a, b) => b.amount * b.probability - a.amount * a.probability)
        : stalled;

    const toNote: Deal[] = [];
    for (const deal of ordered) {
      if (toNote.length >= MAX_NOTES_PER_RUN) break;
      const sameDeal = (payload: Readonly<Record<string, unknown>>) => payload.dealId === deal.rawId;
      if (!(await this.alreadyActed("add_note", sameDeal, NOTE_COOLDOWN_DAYS))) toNote.push(deal);
    }

    for (const deal of toNote) {
      const days = this.daysIdle(deal, now);
      const payload = {
        dealId: deal.rawId,
        note: `No activity for ${days} days (threshold ${thresholdDays}). Next step needed.`,
      };
      await this.submit(
        {
          type: "add_note",
          level: "A",
          payload,
          description: `Flag stalled deal "${deal.title}" (${days} days idle)`,
        },
        resolveOperation("add_note", payload, this.operationContext()),
      );
    }

    const horizon = now.getTime() + FORECAST_HORIZON_DAYS * DAY_MS;
    const forecast30d = active
      .filter((d) => d.expectedCloseDate && d.expectedCloseDate.getTime() <= horizon)
      .reduce((sum, d) => sum + d.amount * normalizedProbability(d.probability), 0);
    const confidence = active.length === 0 ? 0 : (active.length - stalled.length) / active.length;

    await this.publish("forecast_updated", {
      forecast30d: Math.round(forecast30d * 100) / 100,
      confidence: Math.round(confidence * 100) / 100,
      computedAt: now.toISOString(),
    });

    return { kpiName: "stalled_deals", kpiValue: stalled.length };
  }

  private daysIdle(deal: Deal, now: Date): number {
    const last = deal.lastActivityAt ?? deal.createdAt;
    return Math.floor((now.getTime() - last.getTime()) / DAY_MS);
  }
}
