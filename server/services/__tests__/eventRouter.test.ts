import { describe, it, expect, vi, beforeEach } from "vitest";
import { z } from "zod";
import { MemStorage } from "../../memStorage";
import { EventRouter, defineRoute, buildRoutingTable } from "../eventRouter";

const anyPayload = z.record(z.unknown());

describe("EventRouter", () => {
  let storage: MemStorage;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    storage = new MemStorage();
  });

  it("delivers a published event to its handler once and marks it processed", async () => {
    const handler = vi.fn();
    const router = new EventRouter(storage, [defineRoute("x", z.object({ v: z.number() }), handler)]);

    await router.publish("x", "t1", { v: 1 });
    const count = await router.drain("t1");

    expect(count).toBe(1);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith("t1", { v: 1 });
    const [event] = await storage.getEventsByTenant("t1");
    expect(event.processed).toBe(true);
  });

  it("processes nothing on a second drain with no new events", async () => {
    const handler = vi.fn();
    const router = new EventRouter(storage, [defineRoute("x", anyPayload, handler)]);
    await router.publish("x", "t1", { v: 1 });

    expect(await router.drain("t1")).toBe(1);
    expect(await router.drain("t1")).toBe(0);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("acknowledges and counts events with no route without calling any handler", async () => {
    const handler = vi.fn();
    const router = new EventRouter(storage, [defineRoute("x", anyPayload, handler)]);
    await router.publish("mystery", "t1", { v: 2 });

    const count = await router.drain("t1");

    expect(count).toBe(1);
    expect(handler).not.toHaveBeenCalled();
    expect(await storage.getUnprocessedEvents("t1")).toEqual([]);
  });

  it("keeps calling sibling handlers after one throws", async () => {
    const failing = vi.fn().mockRejectedValue(new Error("handler exploded"));
    const sibling = vi.fn();
    const router = new EventRouter(storage, [defineRoute("x", anyPayload, failing, sibling)]);
    await router.publish("x", "t1", { v: 1 });

    const count = await router.drain("t1");

    expect(count).toBe(1);
    expect(failing).toHaveBeenCalledTimes(1);
    expect(sibling).toHaveBeenCalledWith("t1", { v: 1 });
  });

  it("moves on to the next event after a handler failure", async () => {
    const seen: number[] = [];
    const handler = vi.fn((_tenantId: string, payload: { n: number }) => {
      seen.push(payload.n);
      if (payload.n === 1) throw new Error("first one fails");
    });
    const router = new EventRouter(storage, [defineRoute("x", z.object({ n: z.number() }), handler)]);
    await router.publish("x", "t1", { n: 1 });
    await router.publish("x", "t1", { n: 2 });

    expect(await router.drain("t1")).toBe(2);
    expect(seen).toEqual([1, 2]);
  });

  it("drains in publish order", async () => {
    const seen: number[] = [];
    const router = new EventRouter(storage, [
      defineRoute("x", z.object({ n: z.number() }), (_tenantId, payload) => {
        seen.push(payload.n);
      }),
    ]);
    for (const n of [1, 2, 3]) {
      await router.publish("x", "t1", { n });
    }

    await router.drain("t1");

    expect(seen).toEqual([1, 2, 3]);
  });

  it("skips the handler but still acknowledges an event whose payload does not parse", async () => {
    const handler = vi.fn();
    const router = new EventRouter(storage, [defineRoute("x", z.object({ v: z.number() }), handler)]);
    await router.publish("x", "t1", { v: "not a number" });

    expect(await router.drain("t1")).toBe(1);
    expect(handler).not.toHaveBeenCalled();
  });

  it("only drains the given tenant", async () => {
    const handler = vi.fn();
    const router = new EventRouter(storage, [defineRoute("x", anyPayload, handler)]);
    await router.publish("x", "t1", {});
    await router.publish("x", "t2", {});

    expect(await router.drain("t1")).toBe(1);
    expect(handler).toHaveBeenCalledWith("t1", {});
    expect(await storage.getUnprocessedEvents("t2")).toHaveLength(1);
  });

  it("runs one drain per tenant at a time", async () => {
    const handler = vi.fn(() => new Promise<void>((resolve) => setTimeout(resolve, 10)));
    const router = new EventRouter(storage, [defineRoute("x", anyPayload, handler)]);
    await router.publish("x", "t1", { v: 1 });

    const counts = await Promise.all([router.drain("t1"), router.drain("t1")]);

    expect(counts).toEqual([1, 0]);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(router.isDraining("t1")).toBe(false);
  });

  it("counts an event once when two routers drain the same store", async () => {
    const handler = vi.fn(() => new Promise<void>((resolve) => setTimeout(resolve, 10)));
    const first = new EventRouter(storage, [defineRoute("x", anyPayload, handler)]);
    const second = new EventRouter(storage, [defineRoute("x", anyPayload, handler)]);
    await first.publish("x", "t1", {});

    const counts = await Promise.all([first.drain("t1"), second.drain("t1")]);

    expect(counts).toEqual([1, 0]);
    expect(await storage.getUnprocessedEvents("t1")).toEqual([]);
  });

  it("redelivers an event whose acknowledgement failed", async () => {
    const handler = vi.fn();
    const router = new EventRouter(storage, [defineRoute("x", anyPayload, handler)]);
    await router.publish("x", "t1", {});
    vi.spyOn(storage, "markEventProcessed").mockRejectedValueOnce(new Error("connection reset"));

    expect(await router.drain("t1")).toBe(0);
    expect(await router.drain("t1")).toBe(1);
    expect(handler).toHaveBeenCalledTimes(2);
  });

  it("returns 0 when the mailbox cannot be read", async () => {
    vi.spyOn(storage, "getUnprocessedEvents").mockRejectedValue(new Error("db down"));
    const router = new EventRouter(storage, []);

    expect(await router.drain("t1")).toBe(0);
  });

  it("returns undefined instead of throwing when publish cannot write", async () => {
    vi.spyOn(storage, "createEvent").mockRejectedValue(new Error("db down"));
    const router = new EventRouter(storage, []);

    await expect(router.publish("x", "t1", {})).resolves.toBeUndefined();
  });
});

describe("buildRoutingTable", () => {
  it("merges handlers declared for the same type in declaration order", () => {
    function first() {}
    function second() {}
    const table = buildRoutingTable([
      defineRoute("x", anyPayload, first),
      defineRoute("x", anyPayload, second),
      defineRoute("y", anyPayload),
    ]);

    expect(table.get("x")?.map((h) => h.name)).toEqual(["first", "second"]);
    expect(table.get("y")).toEqual([]);
    expect(Object.isFrozen(table.get("x"))).toBe(true);
  });
});
