import { z } from "zod";
import type { Tenant } from "@shared/schema";
import type { ConnectorRegistry } from "../connectors/registry";
import type { AlertUrgency } from "../services/notificationService";
import { logWarn } from "../logger";

export type SendEmailFn = (to: string | string[], subject: string, body: string) => Promise<boolean>;

export type AlertFn = (to: string, subject: string, body: string, urgency: AlertUrgency) => Promise<boolean>;

export type OperationContext = {
  tenant: Tenant;
  sendEmail: SendEmailFn;
  alertManager: AlertFn;
  connectors: ConnectorRegistry;
};

/** A side effect ready to hand to the executor, arguments already bound. */
export type BoundOperation = () => Promise<Record<string, unknown>>;

type OperationEntry = {
  actionType: string;
  resolve: (payload: Record<string, unknown>, ctx: OperationContext) => BoundOperation | null;
};

export class OperationFailedError extends Error {
  constructor(actionType: string, detail: string) {
    super(`${actionType} failed: ${detail}`);
    this.name = "OperationFailedError";
  }
}

/**
 * Capabilities and connectors report failure as `false`; the executor only
 * retries on a throw. This turns one into the other.
 */
export function requireSuccess(
  actionType: string,
  call: () => Promise<boolean>,
  result: Record<string, unknown>,
): BoundOperation {
  return async () => {
    const ok = await call();
    if (!ok) throw new OperationFailedError(actionType, "returned false");
    return result;
  };
}

function defineOperation<TSchema extends z.ZodTypeAny>(
  actionType: string,
  schema: TSchema,
  build: (payload: z.infer<TSchema>, ctx: OperationContext) => BoundOperation | null,
): OperationEntry {
  return {
    actionType,
    resolve: (payload, ctx) => {
      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        logWarn(`Invalid ${actionType} payload: ${parsed.error.message}`, "operations");
        return null;
      }
      return build(parsed.data, ctx);
    },
  };
}

const emailPayload = z.object({
  to: z.union([z.string().email(), z.array(z.string().email()).min(1)]),
  subject: z.string().min(1),
  body: z.string().min(1),
});

const alertPayload = z.object({
  to: z.string().email(),
  subject: z.string().min(1),
  body: z.string().min(1),
  urgency: z.enum(["normal", "urgent"]).default("normal"),
});

const dealUpdatePayload = z.object({
  dealId: z.string().min(1),
  fields: z.record(z.unknown()),
});

const dealNotePayload = z.object({
  dealId: z.string().min(1),
  note: z.string().min(1),
});

function emailOperation(actionType: string): OperationEntry {
  return defineOperation(actionType, emailPayload, (p, ctx) =>
    requireSuccess(actionType, () => ctx.sendEmail(p.to, p.subject, p.body), { sent: true, to: p.to }),
  );
}

const entries: OperationEntry[] = [
  emailOperation("send_email"),
  emailOperation("send_invoice_reminder"),
  emailOperation("send_nurture_email"),
  defineOperation("alert_manager", alertPayload, (p, ctx) =>
    requireSuccess("alert_manager", () => ctx.alertManager(p.to, p.subject, p.body, p.urgency), {
      sent: true,
      to: p.to,
      urgency: p.urgency,
    }),
  ),
  defineOperation("update_deal", dealUpdatePayload, (p, ctx) => {
    const crm = ctx.connectors.forTenant(ctx.tenant, "crm");
    if (!crm) return null;
    return requireSuccess("update_deal", () => crm.updateDeal(p.dealId, p.fields), {
      dealId: p.dealId,
      source: crm.source,
    });
  }),
  defineOperation("add_note", dealNotePayload, (p, ctx) => {
    const crm = ctx.connectors.forTenant(ctx.tenant, "crm");
    if (!crm) return null;
    return requireSuccess("add_note", () => crm.addNote(p.dealId, p.note), {
      dealId: p.dealId,
      source: crm.source,
    });
  }),
];

export const OPERATIONS: ReadonlyMap<string, OperationEntry> = new Map(entries.map((e) => [e.actionType, e]));

export function isKnownOperation(actionType: string): boolean {
  return OPERATIONS.has(actionType);
}

/**
 * Rebuild the side effect for an action type and payload. Unknown types,
 * payloads that do not parse and missing connectors all return null.
 */
export function resolveOperation(
  actionType: string,
  payload: Record<string, unknown>,
  ctx: OperationContext,
): BoundOperation | null {
  const entry = OPERATIONS.get(actionType);
  if (!entry) {
    logWarn(`No operation registered for ${actionType}`, "operations");
    return null;
  }
  const operation = entry.resolve(payload, ctx);
  if (!operation) {
    logWarn(`${actionType} could not be resolved for ${ctx.tenant.id}`, "operations");
  }
  return operation;
}
