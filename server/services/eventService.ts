import type { TenantContext } from "../tenant";
import { getTenantStorage } from "../tenantStorage";
import { getRuntime } from "../runtime";
import type { EventQuery } from "../storage";
import type { StoredEvent } from "@shared/schema";

export async function listEvents(ctx: TenantContext, query: EventQuery = {}): Promise<StoredEvent[]> {
  return getTenantStorage(ctx).getEvents(query);
}

export class EventServiceError extends Error {
  constructor(message: string, public statusCode: number) {
    super(message);
    this.name = "EventServiceError";
  }
}

/** On-demand drain of this tenant's mailbox, outside the scheduled pass. */
export async function drainEvents(ctx: TenantContext): Promise<{ processed: number }> {
  const { router } = getRuntime();
  if (router.isDraining(ctx.tenantId)) {
    throw new EventServiceError("A drain is already running for this tenant", 409);
  }
  const processed = await router.drain(ctx.tenantId);
  return { processed };
}
