import type { z } from "zod";
import type { IStorage } from "../storage";
import type { StoredEvent } from "@shared/schema";
import { log, logWarn, logError, errorMessage } from "../logger";

export type EventHandler<TPayload> = (tenantId: string, payload: TPayload) => unknown;

type BoundHandler = {
  name: string;
  invoke: (tenantId: string, payload: Record<string, unknown>) => Promise<void>;
};

export type EventRoute = Readonly<{
  eventType: string;
  handlers: readonly BoundHandler[];
}>;

export type RoutingTable = ReadonlyMap<string, readonly BoundHandler[]>;

export class EventPayloadError extends Error {
  constructor(eventType: string, issues: string) {
    super(`Invalid ${eventType} payload: ${issues}`);
    this.name = "EventPayloadError";
  }
}

/**
 * Bind handlers to an event type. The payload is parsed with `schema` before
 * each handler sees it, so handlers receive a typed value; a payload that
 * does not parse counts as a handler failure.
 */
export function defineRoute<TSchema extends z.ZodTypeAny>(
  eventType: string,
  schema: TSchema,
  ...handlers: EventHandler<z.infer<TSchema>>[]
): EventRoute {
  return {
    eventType,
    handlers: handlers.map((handler) => ({
      name: handler.name || "anonymous",
      invoke: async (tenantId, payload) => {
        const parsed = schema.safeParse(payload);
        if (!parsed.success) {
          throw new EventPayloadError(eventType, parsed.error.message);
        }
        await handler(tenantId, parsed.data);
      },
    })),
  };
}

export function buildRoutingTable(routes: readonly EventRoute[]): RoutingTable {
  const table = new Map<string, BoundHandler[]>();
  for (const route of routes) {
    const existing = table.get(route.eventType) ?? [];
    table.set(route.eventType, [...existing, ...route.handlers]);
  }
  return new Map(Array.from(table, ([type, handlers]) => [type, Object.freeze(handlers)]));
}

/**
 * Per-tenant durable mailbox plus a fixed type → handler dispatch.
 *
 * Delivery is at-least-once per handler: an event is marked processed only
 * after all of its handlers were attempted, so a crash mid-drain redelivers
 * it on the next pass. Handlers must be idempotent.
 *
 * One drain per tenant at a time in this process; the acknowledge is
 * conditional so a pass running elsewhere never counts an event twice.
 */
export class EventRouter {
  private readonly table: RoutingTable;
  private readonly draining = new Set<string>();

  constructor(
    private readonly storage: IStorage,
    routes: readonly EventRoute[],
  ) {
    this.table = buildRoutingTable(routes);
  }

  async publish(
    eventType: string,
    tenantId: string,
    payload: Record<string, unknown> = {},
  ): Promise<StoredEvent | undefined> {
    try {
      const event = await this.storage.createEvent({ eventType, tenantId, payload });
      log(`${eventType} published for ${tenantId}`, "router");
      return event;
    } catch (err) {
      logError(`Could not publish ${eventType} for ${tenantId}`, "router", err);
      return undefined;
    }
  }

  isDraining(tenantId: string): boolean {
    return this.draining.has(tenantId);
  }

  /**
   * Deliver every unprocessed event of one tenant, oldest first. Returns the
   * number acknowledged; 0 when a drain for the tenant is already under way.
   */
  async drain(tenantId: string): Promise<number> {
    if (this.draining.has(tenantId)) {
      logWarn(`Drain already running for ${tenantId}; skipped`, "router");
      return 0;
    }
    this.draining.add(tenantId);
    try {
      return await this.drainPending(tenantId);
    } finally {
      this.draining.delete(tenantId);
    }
  }

  private async drainPending(tenantId: string): Promise<number> {
    let pending: StoredEvent[];
    try {
      pending = await this.storage.getUnprocessedEvents(tenantId);
    } catch (err) {
      logError(`Could not read events for ${tenantId}`, "router", err);
      return 0;
    }

    let processed = 0;
    for (const event of pending) {
      await this.dispatch(tenantId, event);
      try {
        if (await this.storage.markEventProcessed(event.id)) {
          processed++;
        } else {
          logWarn(`${event.eventType} (${event.id}) was already acknowledged`, "router");
        }
      } catch (err) {
        logError(`Could not acknowledge ${event.eventType} (${event.id}); will redeliver`, "router", err);
      }
    }

    if (processed > 0) {
      log(`${processed} events processed for ${tenantId}`, "router");
    }
    return processed;
  }

  private async dispatch(tenantId: string, event: StoredEvent): Promise<void> {
    const handlers = this.table.get(event.eventType);
    if (!handlers || handlers.length === 0) {
      logWarn(`No route for ${event.eventType} (${event.id}); acknowledging`, "router");
      return;
    }

    for (const handler of handlers) {
      try {
        log(`${event.eventType} → ${handler.name} for ${tenantId}`, "router");
        await handler.invoke(tenantId, event.payload);
      } catch (err) {
        logError(`Handler ${handler.name} failed on ${event.eventType}: ${errorMessage(err)}`, "router");
      }
    }
  }
}
