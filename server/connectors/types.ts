import type { ToolCategory } from "@shared/schema";

export type DealStatus = "active" | "won" | "lost" | "stagnant";
export type InvoiceStatus = "draft" | "sent" | "paid" | "overdue";
export type TaskStatus = "todo" | "in_progress" | "done" | "overdue";

export type Deal = {
  rawId: string;
  source: string;
  title: string;
  amount: number;
  currency: string;
  stage: string;
  probability: number;
  status: DealStatus;
  createdAt: Date;
  lastActivityAt: Date | null;
  expectedCloseDate: Date | null;
  /** Set once the deal is won or lost. */
  closedAt: Date | null;
  /** Acquisition channel the deal came from; "" when the CRM does not track it. */
  leadSource: string;
  ownerName: string;
};

export type Contact = {
  rawId: string;
  source: string;
  email: string;
  firstName: string;
  lastName: string;
  company: string;
  leadStatus: string;
  createdAt: Date;
  lastActivityAt: Date | null;
};

export type Invoice = {
  rawId: string;
  source: string;
  number: string;
  clientName: string;
  clientEmail: string;
  amount: number;
  amountPaid: number;
  currency: string;
  status: InvoiceStatus;
  issuedAt: Date;
  dueAt: Date;
};

export type Task = {
  rawId: string;
  source: string;
  title: string;
  assigneeName: string;
  assigneeEmail: string;
  status: TaskStatus;
  dueAt: Date | null;
  projectName: string;
};

export type Expense = {
  rawId: string;
  source: string;
  vendor: string;
  category: string;
  amount: number;
  currency: string;
  spentAt: Date;
};

/**
 * OAuth-style credentials as stored in `tools_connected`. `expiresAt` is an
 * ISO string or a unix timestamp in seconds.
 */
export type ConnectorCredentials = {
  accessToken?: string;
  refreshToken?: string;
  expiresAt?: string | number;
  [key: string]: unknown;
};

/**
 * Narrow contract over one external system. Implementations never throw:
 * failure is `false` or an empty list. They must not retry internally; the
 * executor's retry loop is the only one.
 */
export interface Connector {
  readonly source: string;
  readonly category: ToolCategory;
  connect(): Promise<boolean>;
  fetchDeals(): Promise<Deal[]>;
  fetchContacts(): Promise<Contact[]>;
  fetchInvoices(): Promise<Invoice[]>;
  fetchTasks(): Promise<Task[]>;
  fetchExpenses(): Promise<Expense[]>;
  updateDeal(rawId: string, fields: Record<string, unknown>): Promise<boolean>;
  addNote(rawId: string, text: string): Promise<boolean>;
}
