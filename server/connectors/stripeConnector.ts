import { z } from "zod";
import type { ToolCategory } from "@shared/schema";
import { BaseConnector, toText } from "./baseConnector";
import type { ConnectorCredentials, Invoice, InvoiceStatus } from "./types";

export const STRIPE_BASE_URL = "https://api.stripe.com/v1";
const PAGE_SIZE = 100;
const MAX_PAGES = 20;
const REQUEST_TIMEOUT_MS = 15_000;

const invoicePageSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      number: z.string().nullable().default(null),
      customer_name: z.string().nullable().default(null),
      customer_email: z.string().nullable().default(null),
      amount_due: z.number().default(0),
      amount_paid: z.number().default(0),
      currency: z.string().default("eur"),
      status: z.string().nullable().default(null),
      created: z.number(),
      due_date: z.number().nullable().default(null),
    }),
  ),
  has_more: z.boolean().default(false),
});

type StripeInvoice = z.infer<typeof invoicePageSchema>["data"][number];

/** Stripe invoices as the finance source. Credentials: `secretKey`. */
export class StripeConnector extends BaseConnector {
  readonly source = "stripe";
  readonly category: ToolCategory = "finance";

  constructor(
    tenantId: string,
    credentials: ConnectorCredentials,
    now?: () => Date,
    private readonly baseUrl = STRIPE_BASE_URL,
  ) {
    super(tenantId, credentials, now);
  }

  protected async checkConnection(): Promise<boolean> {
    const response = await this.get("/balance");
    return response.ok;
  }

  protected async loadInvoices(): Promise<Invoice[]> {
    const invoices: Invoice[] = [];
    let startingAfter: string | undefined;

    for (let page = 0; page < MAX_PAGES; page++) {
      const params = new URLSearchParams({ limit: String(PAGE_SIZE) });
      if (startingAfter) params.set("starting_after", startingAfter);

      const response = await this.get(`/invoices?${params.toString()}`);
      if (!response.ok) throw new Error(`Stripe invoices returned HTTP ${response.status}`);

      const body = invoicePageSchema.parse(await response.json());
      invoices.push(...body.data.map((raw) => this.toInvoice(raw)));
      startingAfter = body.data.at(-1)?.id;
      if (!body.has_more || !startingAfter) break;
    }
    return invoices;
  }

  private toInvoice(raw: StripeInvoice): Invoice {
    const issuedAt = new Date(raw.created * 1000);
    const dueAt = raw.due_date ? new Date(raw.due_date * 1000) : issuedAt;

    let status: InvoiceStatus;
    if (raw.status === "paid") {
      status = "paid";
    } else if (raw.status === "open" || raw.status === "uncollectible") {
      status = dueAt.getTime() < this.now().getTime() ? "overdue" : "sent";
    } else {
      status = "draft";
    }

    return {
      rawId: raw.id,
      source: this.source,
      number: raw.number ?? raw.id,
      clientName: raw.customer_name ?? "",
      clientEmail: raw.customer_email ?? "",
      // Stripe amounts are in minor units.
      amount: raw.amount_due / 100,
      amountPaid: raw.amount_paid / 100,
      currency: raw.currency.toUpperCase(),
      status,
      issuedAt,
      dueAt,
    };
  }

  private get(path: string): Promise<Response> {
    return fetch(`${this.baseUrl}${path}`, {
      headers: { Authorization: `Bearer ${toText(this.credentials.secretKey)}` },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
  }
}
