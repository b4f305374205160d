import { describe, it, expect, vi, beforeEach } from "vitest";
import { MemStorage } from "../../memStorage";
import { EventRouter } from "../eventRouter";
import { createEventRoutes } from "../eventHandlers";
import { getAgentConfig } from "../agentConfigService";

describe("default event routes", () => {
  let storage: MemStorage;
  let router: EventRouter;
  let tenantId: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    storage = new MemStorage();
    router = new EventRouter(storage, createEventRoutes(storage));
    tenantId = (await storage.createTenant({ name: "Acme", slug: "acme" })).id;
  });

  it("records a low-confidence alert on revenue_velocity", async () => {
    await router.publish("forecast_updated", tenantId, {
      forecast30d: 12000,
      confidence: 0.2,
      computedAt: "2026-01-05T06:00:00.000Z",
    });

    await router.drain(tenantId);

    const config = await getAgentConfig(storage, tenantId, "revenue_velocity");
    expect(config.last_low_confidence_alert).toBe("2026-01-05T06:00:00.000Z");
  });

  it("leaves revenue_velocity alone when confidence is acceptable", async () => {
    await router.publish("forecast_updated", tenantId, { forecast30d: 12000, confidence: 0.8 });

    await router.drain(tenantId);

    const config = await getAgentConfig(storage, tenantId, "revenue_velocity");
    expect(config.last_low_confidence_alert).toBeUndefined();
  });

  it("turns on cash_pressure_mode when cash is critical within 45 days", async () => {
    await router.publish("cash_forecast_updated", tenantId, { daysUntilCritical: 30 });

    await router.drain(tenantId);

    const config = await getAgentConfig(storage, tenantId, "revenue_velocity");
    expect(config.cash_pressure_mode).toBe(true);
  });

  it("does not turn on cash_pressure_mode at 45 days or when no date is known", async () => {
    await router.publish("cash_forecast_updated", tenantId, { daysUntilCritical: 45 });
    await router.publish("cash_forecast_updated", tenantId, { daysUntilCritical: null });

    expect(await router.drain(tenantId)).toBe(2);

    const config = await getAgentConfig(storage, tenantId, "revenue_velocity");
    expect(config.cash_pressure_mode).toBeUndefined();
  });

  it("gives the same stored config when an event is delivered twice", async () => {
    await router.publish("cash_forecast_updated", tenantId, { daysUntilCritical: 10 });
    await router.publish("cash_forecast_updated", tenantId, { daysUntilCritical: 10 });

    await router.drain(tenantId);

    const tenant = await storage.getTenant(tenantId);
    expect(tenant?.agentConfigs).toEqual({ revenue_velocity: { cash_pressure_mode: true } });
  });

  it("hands the CAC by lead source to revenue_velocity", async () => {
    await router.publish("cac_updated", tenantId, {
      blendedCac: 700,
      cacBySource: { organic_search: 650, paid_social: 800 },
      topSource: "organic_search",
    });

    await router.drain(tenantId);

    const config = await getAgentConfig(storage, tenantId, "revenue_velocity");
    expect(config.cac_by_source).toEqual({ organic_search: 650, paid_social: 800 });
    expect(config.top_acquisition_source).toBe("organic_search");
  });

  it("ignores a CAC update without a per-source breakdown", async () => {
    await router.publish("cac_updated", tenantId, { blendedCac: 700, cacBySource: {} });

    expect(await router.drain(tenantId)).toBe(1);

    const config = await getAgentConfig(storage, tenantId, "revenue_velocity");
    expect(config.cac_by_source).toBeUndefined();
    expect(config.top_acquisition_source).toBeUndefined();
  });
});
