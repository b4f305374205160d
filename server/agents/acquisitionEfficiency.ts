import { TenantAgent, type AgentOutcome } from "./agentRuntime";
import type { Deal, Expense } from "../connectors/types";
import { resolveOperation } from "../executors/operations";
import { log } from "../logger";

const DAY_MS = 24 * 60 * 60 * 1000;
const CAC_WINDOW_DAYS = 90;
const CAC_RISE_ALERT_RATIO = 0.3;
const DEFAULT_MARKETING_KEYWORDS = [
  "marketing",
  "advertising",
  "publicite",
  "ads",
  "pub",
  "communication",
  "acquisition",
];

type CacSummary = {
  blendedCac: number;
  marketingSpend: number;
  clientsAcquired: number;
  cacBySource: Record<string, number>;
  topSource: string;
};

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function keywords(value: unknown): string[] {
  if (!Array.isArray(value)) return DEFAULT_MARKETING_KEYWORDS;
  const words = value.filter((v): v is string => typeof v === "string" && v.trim() !== "");
  return words.length > 0 ? words.map((w) => w.trim().toLowerCase()) : DEFAULT_MARKETING_KEYWORDS;
}

function isMarketingExpense(expense: Expense, words: readonly string[]): boolean {
  const category = expense.category.toLowerCase();
  const vendor = expense.vendor.toLowerCase();
  return words.some((w) => category.includes(w) || vendor.includes(w));
}

/**
 * Blended CAC over won deals and marketing spend since `since`. Spend is not
 * broken down by channel, so it is shared out by each source's client count.
 * Null when nothing was won in the window.
 */
function computeCac(
  deals: readonly Deal[],
  expenses: readonly Expense[],
  since: Date,
  words: readonly string[] = DEFAULT_MARKETING_KEYWORDS,
): CacSummary | null {
  const won = deals.filter((d) => d.status === "won" && d.closedAt && d.closedAt.getTime() >= since.getTime());
  if (won.length === 0) return null;

  const spend = expenses
    .filter((e) => e.spentAt.getTime() >= since.getTime() && isMarketingExpense(e, words))
    .reduce((sum, e) => sum + e.amount, 0);

  const clientsBySource = new Map<string, number>();
  for (const deal of won) {
    const source = deal.leadSource || "unknown";
    clientsBySource.set(source, (clientsBySource.get(source) ?? 0) + 1);
  }

  const cacBySource: Record<string, number> = {};
  let topSource = "unknown";
  for (const [source, clients] of clientsBySource) {
    const share = spend * (clients / won.length);
    cacBySource[source] = round2(share / clients);
    if (topSource === "unknown" || cacBySource[source] < cacBySource[topSource]) topSource = source;
  }

  return {
    blendedCac: round2(spend / won.length),
    marketingSpend: round2(spend),
    clientsAcquired: won.length,
    cacBySource,
    topSource,
  };
}

/**
 * Monthly customer acquisition cost. Reads won deals from the CRM and
 * expenses from the finance tool, publishes `cac_updated` and alerts the CEO
 * when the blended CAC rose more than 30% over the previous run.
 */
export class AcquisitionEfficiencyAgent extends TenantAgent {
  readonly name = "acquisition_efficiency";

  protected async execute(): Promise<AgentOutcome> {
    const crm = this.ctx.connectors.forTenant(this.ctx.tenant, "crm");
    if (!crm) {
      log(`No CRM connected for ${this.tenantId}; nothing to analyse`, `agent:${this.name}`);
      return { kpiName: "blended_cac_eur", kpiValue: 0 };
    }
    const finance = this.ctx.connectors.forTenant(this.ctx.tenant, "finance");

    const now = this.ctx.now();
    const since = new Date(now.getTime() - CAC_WINDOW_DAYS * DAY_MS);
    const [deals, expenses] = await Promise.all([crm.fetchDeals(), finance ? finance.fetchExpenses() : []]);

    const cac = computeCac(deals, expenses, since, keywords(this.config.marketing_expense_categories));
    if (!cac) {
      log(`No deals won in the last ${CAC_WINDOW_DAYS} days for ${this.tenantId}`, `agent:${this.name}`);
      return { kpiName: "blended_cac_eur", kpiValue: 0 };
    }

    log(
      `CAC ${cac.blendedCac} for ${this.tenantId}: ${cac.marketingSpend} spend, ${cac.clientsAcquired} clients`,
      `agent:${this.name}`,
    );
    const previous = await this.previousCac();
    await this.publish("cac_updated", {
      blendedCac: cac.blendedCac,
      cacBySource: cac.cacBySource,
      topSource: cac.topSource,
    });
    if (previous !== null) await this.alertOnRise(previous, cac);

    return { kpiName: "blended_cac_eur", kpiValue: cac.blendedCac };
  }

  /** Blended CAC of the last successful run with a non-zero value. */
  private async previousCac(): Promise<number | null> {
    const runs = await this.ctx.storage.getAgentRunsByTenant(this.tenantId);
    const last = runs.find((r) => r.agent === this.name && r.success && r.kpiValue > 0);
    return last ? last.kpiValue : null;
  }

  private async alertOnRise(previous: number, cac: CacSummary): Promise<void> {
    const change = (cac.blendedCac - previous) / previous;
    if (change <= CAC_RISE_ALERT_RATIO) return;

    const ceoEmail = typeof this.config.ceo_email === "string" ? this.config.ceo_email : "";
    if (!ceoEmail) {
      log(`CAC up ${Math.round(change * 100)}% for ${this.tenantId}; no ceo_email to alert`, `agent:${this.name}`);
      return;
    }

    const payload = {
      to: ceoEmail,
      subject: `Customer acquisition cost up ${(change * 100).toFixed(1)}%`,
      body:
        `Blended CAC went from ${previous} to ${cac.blendedCac} EUR over the last ${CAC_WINDOW_DAYS} days.\n` +
        `Cheapest source: ${cac.topSource}. Check the marketing spend.`,
      urgency: "normal",
    };
    await this.submit(
      {
        type: "alert_manager",
        level: "A",
        payload,
        description: `Alert ${ceoEmail} about a ${Math.round(change * 100)}% CAC rise`,
      },
      resolveOperation("alert_manager", payload, this.operationContext()),
    );
  }
}
