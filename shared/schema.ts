import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  varchar,
  timestamp,
  pgEnum,
  boolean,
  integer,
  serial,
  doublePrecision,
  jsonb,
  index,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const ACTION_LEVELS = ["A", "B", "C"] as const;
export const ACTION_STATUSES = ["pending", "running", "success", "failed", "cancelled"] as const;
export const TERMINAL_ACTION_STATUSES = ["success", "failed", "cancelled"] as const;

export const actionLevelEnum = pgEnum("action_level", ACTION_LEVELS);
export const actionStatusEnum = pgEnum("action_status", ACTION_STATUSES);

export type AgentConfigValues = Record<string, unknown>;
export type AgentConfigs = Record<string, AgentConfigValues>;
export type ToolCategory = "crm" | "finance" | "project";
export type ToolsConnected = Partial<
  Record<ToolCategory, { name: string; credentials?: Record<string, unknown> }>
>;

export const tenants = pgTable("tenants", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: text("name").notNull(),
  slug: text("slug").notNull().unique(),
  agentConfigs: jsonb("agent_configs").$type<AgentConfigs>().notNull().default({}),
  toolsConnected: jsonb("tools_connected").$type<ToolsConnected>().notNull().default({}),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

// Append-only mailbox. `processed` flips false → true exactly once; rows are never deleted.
export const events = pgTable(
  "events",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    sequence: serial("sequence").notNull(),
    eventType: text("event_type").notNull(),
    tenantId: varchar("tenant_id").notNull().references(() => tenants.id),
    payload: jsonb("payload").$type<Record<string, unknown>>().notNull().default({}),
    processed: boolean("processed").notNull().default(false),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => [index("events_unprocessed_idx").on(table.tenantId, table.processed)],
);

export const pendingActions = pgTable(
  "pending_actions",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    actionType: text("action_type").notNull(),
    level: actionLevelEnum("level").notNull(),
    tenantId: varchar("tenant_id").notNull().references(() => tenants.id),
    agent: text("agent").notNull(),
    payload: jsonb("payload").$type<Record<string, unknown>>().notNull().default({}),
    description: text("description").notNull().default(""),
    preview: jsonb("preview").$type<Record<string, unknown>>().notNull().default({}),
    status: actionStatusEnum("status").notNull().default("pending"),
    attempts: integer("attempts").notNull().default(0),
    result: jsonb("result").$type<Record<string, unknown>>(),
    error: text("error"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    executedAt: timestamp("executed_at"),
  },
  (table) => [index("pending_actions_tenant_status_idx").on(table.tenantId, table.status)],
);

// Insert-only audit trail.
export const actionLogs = pgTable(
  "action_logs",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    actionType: text("action_type").notNull(),
    level: actionLevelEnum("level").notNull(),
    tenantId: varchar("tenant_id").notNull().references(() => tenants.id),
    agent: text("agent").notNull(),
    pendingActionId: varchar("pending_action_id"),
    payload: jsonb("payload").$type<Record<string, unknown>>().notNull().default({}),
    status: actionStatusEnum("status").notNull(),
    result: jsonb("result").$type<Record<string, unknown>>().notNull().default({}),
    error: text("error").notNull().default(""),
    attempts: integer("attempts").notNull().default(0),
    executedAt: timestamp("executed_at").defaultNow().notNull(),
  },
  (table) => [index("action_logs_tenant_idx").on(table.tenantId, table.executedAt)],
);

export type ActionSummary = {
  type: string;
  level: (typeof ACTION_LEVELS)[number];
  status: (typeof ACTION_STATUSES)[number];
  description: string;
};

export const agentRuns = pgTable(
  "agent_runs",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    agent: text("agent").notNull(),
    tenantId: varchar("tenant_id").notNull().references(() => tenants.id),
    startedAt: timestamp("started_at").notNull(),
    finishedAt: timestamp("finished_at").notNull(),
    durationMs: integer("duration_ms").notNull(),
    kpiName: text("kpi_name").notNull().default(""),
    kpiValue: doublePrecision("kpi_value").notNull().default(0),
    actionsCount: integer("actions_count").notNull().default(0),
    actions: jsonb("actions").$type<ActionSummary[]>().notNull().default([]),
    errors: jsonb("errors").$type<string[]>().notNull().default([]),
    success: boolean("success").notNull(),
  },
  (table) => [index("agent_runs_tenant_idx").on(table.tenantId, table.startedAt)],
);

// Last firing per scheduler job, so a coalesced catch-up survives restarts.
export const schedulerJobs = pgTable("scheduler_jobs", {
  jobId: text("job_id").primaryKey(),
  lastFiredAt: timestamp("last_fired_at").notNull(),
});

// Insert schemas
const connectedToolSchema = z.object({
  name: z.string().min(1),
  credentials: z.record(z.unknown()).optional(),
});

export const toolsConnectedSchema = z.object({
  crm: connectedToolSchema.optional(),
  finance: connectedToolSchema.optional(),
  project: connectedToolSchema.optional(),
});

export const insertTenantSchema = createInsertSchema(tenants, {
  slug: (schema) => schema.regex(/^[a-z0-9-]+$/),
  agentConfigs: z.record(z.record(z.unknown())).default({}),
  toolsConnected: toolsConnectedSchema.default({}),
}).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});

// Request bodies
export const runAgentRequestSchema = z.object({
  agent: z.string().min(1),
});

export const adjustConfigRequestSchema = z.object({
  agent: z.string().min(1),
  // `enabled` belongs to the toggle route
  parameter: z
    .string()
    .min(1)
    .refine((p) => p !== "enabled", { message: "enabled is set through /api/agents/toggle" }),
  value: z.union([z.string(), z.number(), z.boolean()]),
  reason: z.string().default(""),
});

// Types
export type InsertTenant = typeof tenants.$inferInsert;
export type Tenant = typeof tenants.$inferSelect;

export type InsertEvent = Omit<typeof events.$inferInsert, "id" | "sequence" | "processed" | "createdAt">;
export type StoredEvent = typeof events.$inferSelect;

export type InsertPendingAction = Omit<
  typeof pendingActions.$inferInsert,
  "id" | "status" | "attempts" | "result" | "error" | "createdAt" | "executedAt"
>;
export type PendingAction = typeof pendingActions.$inferSelect;

export type InsertActionLog = Omit<typeof actionLogs.$inferInsert, "id" | "executedAt">;
export type ActionLog = typeof actionLogs.$inferSelect;

export type InsertAgentRun = Omit<typeof agentRuns.$inferInsert, "id">;
export type AgentRun = typeof agentRuns.$inferSelect;

export type SchedulerJobState = typeof schedulerJobs.$inferSelect;
