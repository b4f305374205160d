import { TenantAgent, type AgentOutcome, type PayloadMatcher } from "./agentRuntime";
import type { Invoice } from "../connectors/types";
import { resolveOperation } from "../executors/operations";
import { log } from "../logger";

const DAY_MS = 24 * 60 * 60 * 1000;
const INFLOW_HORIZON_DAYS = 30;
const REMINDER_COOLDOWN_DAYS = 7;
const ESCALATION_COOLDOWN_DAYS = 7;

function numberSetting(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function outstanding(invoice: Invoice): number {
  return Math.max(0, invoice.amount - invoice.amountPaid);
}

function forInvoice(invoice: Invoice): PayloadMatcher {
  return (payload) => payload.invoiceNumber === invoice.number;
}

/**
 * Chases overdue receivables and projects when cash runs out.
 *
 * Invoices overdue past `reminder_after_days` get a drafted reminder queued
 * for approval (level B). Past `escalation_day` the case goes to the CEO as a
 * brief (level C) instead, and when `ceo_email` is set an urgent alert is
 * sent straight away (level A). An invoice gets at most one reminder and one
 * escalation a week.
 */
export class CashPredictabilityAgent extends TenantAgent {
  readonly name = "cash_predictability";

  protected async execute(): Promise<AgentOutcome> {
    const finance = this.ctx.connectors.forTenant(this.ctx.tenant, "finance");
    if (!finance) {
      log(`No finance tool connected for ${this.tenantId}; nothing to analyse`, `agent:${this.name}`);
      return { kpiName: "overdue_receivables", kpiValue: 0 };
    }

    const now = this.ctx.now();
    const reminderAfter = numberSetting(this.config.reminder_after_days, 7);
    const escalationDay = numberSetting(this.config.escalation_day, 30);

    const unpaid = (await finance.fetchInvoices()).filter((i) => i.status !== "paid" && i.status !== "draft");
    const overdue = unpaid.filter((i) => i.dueAt.getTime() < now.getTime());

    for (const invoice of overdue) {
      const days = Math.floor((now.getTime() - invoice.dueAt.getTime()) / DAY_MS);
      if (days >= escalationDay) {
        await this.escalate(invoice, days);
      } else if (days >= reminderAfter) {
        await this.queueReminder(invoice, days);
      }
    }

    await this.publish("cash_forecast_updated", this.forecast(unpaid, now));

    const overdueTotal = overdue.reduce((sum, i) => sum + outstanding(i), 0);
    return { kpiName: "overdue_receivables", kpiValue: Math.round(overdueTotal * 100) / 100 };
  }

  private async queueReminder(invoice: Invoice, daysOverdue: number): Promise<void> {
    if (await this.alreadyActed("send_invoice_reminder", forInvoice(invoice), REMINDER_COOLDOWN_DAYS)) {
      log(`Invoice ${invoice.number} was reminded recently; skipped`, `agent:${this.name}`);
      return;
    }
    if (!invoice.clientEmail) {
      log(`Invoice ${invoice.number} has no client email; reminder skipped`, `agent:${this.name}`);
      return;
    }

    const body = await this.ctx.drafting.draft(
      {
        client: invoice.clientName,
        invoice: invoice.number,
        amount: `${outstanding(invoice)} ${invoice.currency}`,
        daysOverdue,
      },
      "Write a short, courteous payment reminder email body for this overdue invoice.",
    );
    if (!body) {
      log(`No draft for invoice ${invoice.number}; reminder skipped`, `agent:${this.name}`);
      return;
    }

    const subject = `Payment reminder: invoice ${invoice.number}`;
    await this.submit({
      type: "send_invoice_reminder",
      level: "B",
      payload: { to: invoice.clientEmail, subject, body, invoiceNumber: invoice.number },
      description: `Remind ${invoice.clientName || invoice.clientEmail} about invoice ${invoice.number} (${daysOverdue} days overdue)`,
      preview: { to: invoice.clientEmail, subject, body },
    });
  }

  private async escalate(invoice: Invoice, daysOverdue: number): Promise<void> {
    if (await this.alreadyActed("escalate_overdue_invoice", forInvoice(invoice), ESCALATION_COOLDOWN_DAYS)) {
      log(`Invoice ${invoice.number} is already escalated; skipped`, `agent:${this.name}`);
      return;
    }
    const ceoEmail = typeof this.config.ceo_email === "string" ? this.config.ceo_email : "";
    await this.submit({
      type: "escalate_overdue_invoice",
      level: "C",
      payload: {
        invoiceNumber: invoice.number,
        clientName: invoice.clientName,
        amount: outstanding(invoice),
        currency: invoice.currency,
        daysOverdue,
        ceoEmail,
      },
      description: `Invoice ${invoice.number} is ${daysOverdue} days overdue; call ${invoice.clientName || "the client"}`,
    });

    if (!ceoEmail) return;
    const payload = {
      to: ceoEmail,
      subject: `Invoice ${invoice.number} is ${daysOverdue} days overdue`,
      body: `${invoice.clientName || "A client"} owes ${outstanding(invoice)} ${invoice.currency} on invoice ${invoice.number}.`,
      urgency: "urgent",
      invoiceNumber: invoice.number,
    };
    await this.submit(
      {
        type: "alert_manager",
        level: "A",
        payload,
        description: `Alert ${ceoEmail} about invoice ${invoice.number}`,
      },
      resolveOperation("alert_manager", payload, this.operationContext()),
    );
  }

  private forecast(unpaid: Invoice[], now: Date): Record<string, unknown> {
    const balance = numberSetting(this.config.cash_balance, 0);
    const monthlyBurn = numberSetting(this.config.monthly_burn, 0);
    const horizon = now.getTime() + INFLOW_HORIZON_DAYS * DAY_MS;
    const expectedInflows = unpaid
      .filter((i) => i.dueAt.getTime() <= horizon)
      .reduce((sum, i) => sum + outstanding(i), 0);

    return {
      projectedBalance: Math.round((balance + expectedInflows - monthlyBurn) * 100) / 100,
      daysUntilCritical: monthlyBurn > 0 ? Math.floor(balance / (monthlyBurn / 30)) : null,
    };
  }
}
