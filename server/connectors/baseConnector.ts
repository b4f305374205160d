import type { ToolCategory } from "@shared/schema";
import type { Connector, ConnectorCredentials, Contact, Deal, Expense, Invoice, Task } from "./types";
import { log, logWarn, logError } from "../logger";

export const TOKEN_REFRESH_MARGIN_MS = 5 * 60 * 1000;

/** Accepts ISO strings, unix seconds and unix milliseconds. */
export function parseDate(value: unknown): Date | null {
  if (value === null || value === undefined || value === "") return null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value === "number") {
    return new Date(value > 1e10 ? value : value * 1000);
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (/^\d+$/.test(trimmed)) return parseDate(Number(trimmed));
    const parsed = new Date(trimmed);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
}

export function toNumber(value: unknown, fallback = 0): number {
  if (value === null || value === undefined || value === "") return fallback;
  const n = typeof value === "number" ? value : Number(value);
  return Number.isFinite(n) ? n : fallback;
}

export function toText(value: unknown, fallback = ""): string {
  if (value === null || value === undefined) return fallback;
  return String(value).trim();
}

/**
 * Shared connector envelope. Subclasses implement the `load*` and `write*`
 * hooks they support and may throw freely inside them; the public methods
 * refresh an expiring token first and turn any failure into `false` / `[]`.
 */
export abstract class BaseConnector implements Connector {
  abstract readonly source: string;
  abstract readonly category: ToolCategory;

  protected credentials: ConnectorCredentials;

  constructor(
    readonly tenantId: string,
    credentials: ConnectorCredentials,
    protected readonly now: () => Date = () => new Date(),
  ) {
    this.credentials = { ...credentials };
  }

  protected abstract checkConnection(): Promise<boolean>;

  protected async loadDeals(): Promise<Deal[]> {
    return [];
  }

  protected async loadContacts(): Promise<Contact[]> {
    return [];
  }

  protected async loadInvoices(): Promise<Invoice[]> {
    return [];
  }

  protected async loadTasks(): Promise<Task[]> {
    return [];
  }

  protected async loadExpenses(): Promise<Expense[]> {
    return [];
  }

  protected async writeDeal(_rawId: string, _fields: Record<string, unknown>): Promise<boolean> {
    logWarn(`updateDeal is not supported`, this.source);
    return false;
  }

  protected async writeNote(_rawId: string, _text: string): Promise<boolean> {
    logWarn(`addNote is not supported`, this.source);
    return false;
  }

  /**
   * Exchange the refresh token for new credentials. Connectors without OAuth
   * keep the default, which reports the current credentials as valid.
   */
  protected async refreshAccessToken(): Promise<ConnectorCredentials | null> {
    return this.credentials;
  }

  async connect(): Promise<boolean> {
    return this.guard("connect", false, () => this.checkConnection());
  }

  fetchDeals(): Promise<Deal[]> {
    return this.guardedFetch("fetchDeals", () => this.loadDeals());
  }

  fetchContacts(): Promise<Contact[]> {
    return this.guardedFetch("fetchContacts", () => this.loadContacts());
  }

  fetchInvoices(): Promise<Invoice[]> {
    return this.guardedFetch("fetchInvoices", () => this.loadInvoices());
  }

  fetchTasks(): Promise<Task[]> {
    return this.guardedFetch("fetchTasks", () => this.loadTasks());
  }

  fetchExpenses(): Promise<Expense[]> {
    return this.guardedFetch("fetchExpenses", () => this.loadExpenses());
  }

  async updateDeal(rawId: string, fields: Record<string, unknown>): Promise<boolean> {
    if (!(await this.ensureValidToken())) return false;
    return this.guard("updateDeal", false, () => this.writeDeal(rawId, fields));
  }

  async addNote(rawId: string, text: string): Promise<boolean> {
    if (!(await this.ensureValidToken())) return false;
    return this.guard("addNote", false, () => this.writeNote(rawId, text));
  }

  /**
   * Refresh when expiry is within the margin, or when it is unknown but a
   * refresh token is available. Without either, the token is assumed valid.
   */
  needsRefresh(): boolean {
    const { expiresAt, refreshToken } = this.credentials;
    if (expiresAt === undefined || expiresAt === "") return Boolean(refreshToken);

    const expiry = parseDate(expiresAt);
    if (!expiry) return false;
    return expiry.getTime() - this.now().getTime() < TOKEN_REFRESH_MARGIN_MS;
  }

  async ensureValidToken(): Promise<boolean> {
    if (!this.needsRefresh()) return true;

    log(`Token expired or close to expiry for ${this.tenantId}; refreshing`, this.source);
    const refreshed = await this.guard<ConnectorCredentials | null>("refreshAccessToken", null, () => this.refreshAccessToken());
    if (!refreshed) {
      logError(`Token refresh failed for ${this.tenantId}`, this.source);
      return false;
    }
    this.credentials = { ...refreshed };
    return true;
  }

  private async guardedFetch<T>(operation: string, load: () => Promise<T[]>): Promise<T[]> {
    if (!(await this.ensureValidToken())) {
      logError(`Invalid token; ${operation} skipped`, this.source);
      return [];
    }
    return this.guard<T[]>(operation, [], load);
  }

  private async guard<T>(operation: string, fallback: T, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      logError(`${operation} failed for ${this.tenantId}`, this.source, err);
      return fallback;
    }
  }
}
