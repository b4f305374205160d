import type { Express, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import { getRuntime } from "./runtime";
import { adjustConfigRequestSchema, runAgentRequestSchema, ACTION_STATUSES } from "@shared/schema";
import { tenantResolution } from "./middleware/tenant";
import * as agentService from "./services/agentService";
import { AgentServiceError } from "./services/agentService";
import * as actionService from "./services/actionService";
import { ActionServiceError } from "./services/actionService";
import * as eventService from "./services/eventService";
import { EventServiceError } from "./services/eventService";
import { listScheduledJobs, runJobNow, UnknownJobError } from "./services/schedulerService";

const pendingQuerySchema = z.object({
  status: z.enum(ACTION_STATUSES).optional(),
});

const limitQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).optional(),
});

const eventsQuerySchema = limitQuerySchema.extend({
  processed: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .optional(),
});

const toggleAgentSchema = z.object({
  agent: z.string().min(1),
  enabled: z.boolean(),
});

/** Known service errors become their status; anything else goes to the error middleware. */
function handleServiceError(res: Response, err: unknown): boolean {
  if (err instanceof AgentServiceError || err instanceof ActionServiceError || err instanceof EventServiceError) {
    res.status(err.statusCode).json({ message: err.message });
    return true;
  }
  return false;
}

export async function registerRoutes(httpServer: Server, app: Express): Promise<Server> {
  app.get("/api/tenants", async (_req, res, next) => {
    try {
      const tenantList = await getRuntime().storage.getTenants();
      res.json(tenantList.map((t) => ({ id: t.id, name: t.name, slug: t.slug })));
    } catch (err) {
      next(err);
    }
  });

  // Scheduler jobs span every tenant
  app.get("/api/scheduler/jobs", (_req, res) => {
    res.json(listScheduledJobs());
  });

  app.post("/api/scheduler/jobs/:id/run", async (req, res, next) => {
    try {
      const report = await runJobNow(req.params.id);
      if (!report) {
        res.status(409).json({ message: `Job ${req.params.id} is already running` });
        return;
      }
      res.json(report);
    } catch (err) {
      if (err instanceof UnknownJobError) {
        res.status(404).json({ message: err.message });
        return;
      }
      next(err);
    }
  });

  app.use("/api", tenantResolution);

  // Agents
  app.get("/api/agents/status", async (req, res, next) => {
    try {
      res.json(await agentService.getAgentStatus(req.tenantContext));
    } catch (err) {
      if (!handleServiceError(res, err)) next(err);
    }
  });

  app.get("/api/agents/runs", async (req, res, next) => {
    const parsed = limitQuerySchema.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ message: parsed.error.message });
    try {
      res.json(await agentService.getAgentRuns(req.tenantContext, parsed.data.limit));
    } catch (err) {
      next(err);
    }
  });

  app.post("/api/agents/run", async (req, res, next) => {
    const parsed = runAgentRequestSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ message: parsed.error.message });
    try {
      res.json(await agentService.runAgent(req.tenantContext, parsed.data.agent));
    } catch (err) {
      if (!handleServiceError(res, err)) next(err);
    }
  });

  app.post("/api/agents/config", async (req, res, next) => {
    const parsed = adjustConfigRequestSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ message: parsed.error.message });
    try {
      res.json(await agentService.adjustAgentConfig(req.tenantContext, parsed.data));
    } catch (err) {
      if (!handleServiceError(res, err)) next(err);
    }
  });

  app.post("/api/agents/toggle", async (req, res, next) => {
    const parsed = toggleAgentSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ message: parsed.error.message });
    try {
      const updated = await agentService.setAgentEnabled(req.tenantContext, parsed.data.agent, parsed.data.enabled);
      if (!updated) return res.status(500).json({ message: "Could not update agent" });
      res.json({ agent: parsed.data.agent, enabled: parsed.data.enabled });
    } catch (err) {
      if (!handleServiceError(res, err)) next(err);
    }
  });

  // Actions
  app.get("/api/actions/pending", async (req, res, next) => {
    const parsed = pendingQuerySchema.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ message: parsed.error.message });
    try {
      res.json(await actionService.listPendingActions(req.tenantContext, parsed.data.status ?? "pending"));
    } catch (err) {
      next(err);
    }
  });

  app.get("/api/actions/logs", async (req, res, next) => {
    const parsed = limitQuerySchema.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ message: parsed.error.message });
    try {
      res.json(await actionService.listActionLogs(req.tenantContext, parsed.data.limit));
    } catch (err) {
      next(err);
    }
  });

  app.post("/api/actions/:id/approve", async (req, res, next) => {
    try {
      res.json(await actionService.approveAction(req.tenantContext, req.params.id));
    } catch (err) {
      if (!handleServiceError(res, err)) next(err);
    }
  });

  app.post("/api/actions/:id/reject", async (req, res, next) => {
    try {
      res.json(await actionService.rejectAction(req.tenantContext, req.params.id));
    } catch (err) {
      if (!handleServiceError(res, err)) next(err);
    }
  });

  // Events
  app.get("/api/events", async (req, res, next) => {
    const parsed = eventsQuerySchema.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ message: parsed.error.message });
    try {
      res.json(await eventService.listEvents(req.tenantContext, parsed.data));
    } catch (err) {
      next(err);
    }
  });

  app.post("/api/events/drain", async (req, res, next) => {
    try {
      res.json(await eventService.drainEvents(req.tenantContext));
    } catch (err) {
      if (!handleServiceError(res, err)) next(err);
    }
  });

  return httpServer;
}
