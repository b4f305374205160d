import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { MemStorage } from "../../memStorage";
import { configureRuntime, createRuntime, resetRuntime, type Runtime } from "../../runtime";
import type { TenantContext } from "../../tenant";
import type { Action } from "@shared/actionTypes";
import {
  approveAction,
  rejectAction,
  listPendingActions,
  listActionLogs,
  ActionServiceError,
} from "../actionService";
import { drainEvents, listEvents, EventServiceError } from "../eventService";

describe("actionService", () => {
  let storage: MemStorage;
  let runtime: Runtime;
  let sendEmail: ReturnType<typeof vi.fn>;
  let acme: TenantContext;
  let globex: TenantContext;

  async function queue(overrides: Partial<Action> = {}): Promise<string> {
    const result = await runtime.executor.run(
      {
        type: "send_email",
        level: "B",
        tenantId: acme.tenantId,
        agent: "cash_predictability",
        payload: { to: "client@acme.test", subject: "Hi", body: "Hello" },
        description: "Say hello",
        ...overrides,
      },
      async () => ({}),
    );
    if (!result.pendingActionId) throw new Error("not queued");
    return result.pendingActionId;
  }

  async function expectServiceError(promise: Promise<unknown>, statusCode: number, message: string) {
    const err = await promise.then(
      () => null,
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(ActionServiceError);
    expect(err).toMatchObject({ statusCode, message });
  }

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    storage = new MemStorage();
    sendEmail = vi.fn().mockResolvedValue(true);
    runtime = createRuntime({ storage, sendEmail, sleep: vi.fn().mockResolvedValue(undefined) });
    configureRuntime(runtime);
    acme = { tenantId: (await storage.createTenant({ name: "Acme", slug: "acme" })).id };
    globex = { tenantId: (await storage.createTenant({ name: "Globex", slug: "globex" })).id };
  });

  afterEach(() => {
    resetRuntime();
  });

  describe("approveAction", () => {
    it("rebuilds the operation from the stored payload and runs it", async () => {
      const id = await queue();

      const result = await approveAction(acme, id);

      expect(result.status).toBe("success");
      expect(result.attempts).toBe(1);
      expect(result.pendingActionId).toBe(id);
      expect(sendEmail).toHaveBeenCalledWith("client@acme.test", "Hi", "Hello");
    });

    it("records who approved the action", async () => {
      const id = await queue();

      await approveAction({ ...acme, userId: "robin" }, id);

      const lines = vi.mocked(console.log).mock.calls.map((call) => String(call[0]));
      expect(lines.some((line) => line.endsWith(`[actions] send_email ${id} approved by robin`))).toBe(true);
    });

    it("returns the failed result after exhausting retries", async () => {
      sendEmail.mockResolvedValue(false);
      const id = await queue();

      const result = await approveAction(acme, id);

      expect(result.status).toBe("failed");
      expect(result.attempts).toBe(3);
      expect(result.error).toBe("send_email failed: returned false");
    });

    it("answers 404 for another tenant's action", async () => {
      const id = await queue();

      await expectServiceError(approveAction(globex, id), 404, "Pending action not found");
      expect(sendEmail).not.toHaveBeenCalled();
    });

    it("answers 409 once the action is no longer pending", async () => {
      const id = await queue();
      await approveAction(acme, id);

      await expectServiceError(approveAction(acme, id), 409, "Action is already success");
      expect(sendEmail).toHaveBeenCalledTimes(1);
    });

    it("answers 400 when no operation exists for the type", async () => {
      const id = await queue({ type: "manager_brief", level: "C" });

      await expectServiceError(approveAction(acme, id), 400, "No operation registered for manager_brief");
    });

    it("answers 400 when the stored payload no longer parses", async () => {
      const id = await queue({ payload: { to: "not-an-email", subject: "Hi", body: "Hello" } });

      await expectServiceError(approveAction(acme, id), 400, "send_email cannot be executed for this tenant");
      expect((await storage.getPendingAction(id))?.status).toBe("pending");
    });
  });

  describe("rejectAction", () => {
    it("cancels a pending action", async () => {
      const id = await queue();

      const rejected = await rejectAction(acme, id);

      expect(rejected.status).toBe("cancelled");
      await expectServiceError(rejectAction(acme, id), 409, "Action is already cancelled");
      await expectServiceError(approveAction(acme, id), 409, "Action is already cancelled");
      expect(sendEmail).not.toHaveBeenCalled();
    });
  });

  describe("listings", () => {
    it("only returns the tenant's own pending actions", async () => {
      const id = await queue();
      await runtime.executor.run(
        {
          type: "send_email",
          level: "B",
          tenantId: globex.tenantId,
          agent: "cash_predictability",
          payload: {},
          description: "other tenant",
        },
        async () => ({}),
      );

      const pending = await listPendingActions(acme, "pending");

      expect(pending.map((p) => p.id)).toEqual([id]);
    });

    it("lists action logs newest first", async () => {
      const id = await queue();
      await approveAction(acme, id);

      const logs = await listActionLogs(acme, 10);

      expect(logs.map((l) => l.status)).toEqual(["success", "pending"]);
    });
  });

  describe("eventService", () => {
    it("lists and drains the tenant's events", async () => {
      await runtime.router.publish("cash_forecast_updated", acme.tenantId, { daysUntilCritical: 10 });
      await runtime.router.publish("cash_forecast_updated", globex.tenantId, { daysUntilCritical: 10 });

      expect(await listEvents(acme, { processed: false })).toHaveLength(1);
      expect(await drainEvents(acme)).toEqual({ processed: 1 });
      expect(await listEvents(acme, { processed: false })).toEqual([]);
      expect(await listEvents(globex, { processed: false })).toHaveLength(1);
    });

    it("answers 409 while a drain for the tenant is running", async () => {
      await runtime.router.publish("cash_forecast_updated", acme.tenantId, { daysUntilCritical: 10 });

      const running = drainEvents(acme);
      const second = await drainEvents(acme).then(
        () => null,
        (e: unknown) => e,
      );

      expect(second).toBeInstanceOf(EventServiceError);
      expect(second).toMatchObject({ statusCode: 409 });
      expect(await running).toEqual({ processed: 1 });
    });
  });
});
