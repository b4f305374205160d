import { z } from "zod";
import type { IStorage } from "../storage";
import { defineRoute, type EventRoute } from "./eventRouter";
import { updateAgentConfig } from "./agentConfigService";
import { log } from "../logger";

export const LOW_CONFIDENCE_THRESHOLD = 0.3;
export const CASH_PRESSURE_HORIZON_DAYS = 45;

export const forecastUpdatedSchema = z.object({
  forecast30d: z.number().default(0),
  confidence: z.number().min(0).max(1),
  computedAt: z.string().optional(),
});

export const cashForecastUpdatedSchema = z.object({
  daysUntilCritical: z.number().nullable().optional(),
  projectedBalance: z.number().optional(),
});

export const cacUpdatedSchema = z.object({
  blendedCac: z.number().default(0),
  cacBySource: z.record(z.number()).default({}),
  topSource: z.string().default("unknown"),
});

/**
 * Cross-agent routes. Each handler only writes a flag onto another agent's
 * config, read on that agent's next scheduled run.
 */
export function createEventRoutes(storage: IStorage): EventRoute[] {
  async function flagLowForecastConfidence(
    tenantId: string,
    payload: z.infer<typeof forecastUpdatedSchema>,
  ): Promise<void> {
    if (payload.confidence >= LOW_CONFIDENCE_THRESHOLD) return;
    const at = payload.computedAt ?? new Date().toISOString();
    await updateAgentConfig(storage, tenantId, "revenue_velocity", { last_low_confidence_alert: at });
  }

  async function enableCashPressureMode(
    tenantId: string,
    payload: z.infer<typeof cashForecastUpdatedSchema>,
  ): Promise<void> {
    const days = payload.daysUntilCritical;
    if (days === null || days === undefined) return;
    if (days >= CASH_PRESSURE_HORIZON_DAYS) return;

    const updated = await updateAgentConfig(storage, tenantId, "revenue_velocity", { cash_pressure_mode: true });
    if (updated) {
      log(`cash_pressure_mode on for ${tenantId} (critical in ${days}d)`, "router");
    }
  }

  async function shareCacWithSales(tenantId: string, payload: z.infer<typeof cacUpdatedSchema>): Promise<void> {
    if (Object.keys(payload.cacBySource).length === 0) return;
    await updateAgentConfig(storage, tenantId, "revenue_velocity", {
      cac_by_source: payload.cacBySource,
      top_acquisition_source: payload.topSource,
    });
  }

  return [
    defineRoute("forecast_updated", forecastUpdatedSchema, flagLowForecastConfidence),
    defineRoute("cash_forecast_updated", cashForecastUpdatedSchema, enableCashPressureMode),
    defineRoute("cac_updated", cacUpdatedSchema, shareCacWithSales),
  ];
}
