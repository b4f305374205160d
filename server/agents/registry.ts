import type { AgentContext, TenantAgent } from "./agentRuntime";
import { RevenueVelocityAgent } from "./revenueVelocity";
import { CashPredictabilityAgent } from "./cashPredictability";
import { ProcessClarityAgent } from "./processClarity";
import { AcquisitionEfficiencyAgent } from "./acquisitionEfficiency";

export type AgentFactory = (ctx: AgentContext) => TenantAgent;

export type AgentDefinition = Readonly<{
  type: string;
  /** 5-field cron, evaluated in the scheduler's timezone. */
  schedule: string;
  description: string;
  create: AgentFactory;
}>;

export const BUILT_IN_AGENTS: readonly AgentDefinition[] = [
  {
    type: "cash_predictability",
    schedule: "0 5 * * *",
    description: "Overdue receivables and cash runway",
    create: (ctx) => new CashPredictabilityAgent(ctx),
  },
  {
    type: "revenue_velocity",
    schedule: "0 6 * * *",
    description: "Stalled deals and 30-day pipeline forecast",
    create: (ctx) => new RevenueVelocityAgent(ctx),
  },
  {
    type: "process_clarity",
    schedule: "0 9 * * 1-5",
    description: "Overdue tasks brief for the manager",
    create: (ctx) => new ProcessClarityAgent(ctx),
  },
  {
    type: "acquisition_efficiency",
    schedule: "0 7 1 * *",
    description: "Monthly customer acquisition cost by lead source",
    create: (ctx) => new AcquisitionEfficiencyAgent(ctx),
  },
];

export class UnknownAgentError extends Error {
  constructor(type: string) {
    super(`Unknown agent type "${type}"`);
    this.name = "UnknownAgentError";
  }
}

/** Agent type → definition. Fixed at construction. */
export class AgentRegistry {
  private readonly definitions: ReadonlyMap<string, AgentDefinition>;

  constructor(definitions: readonly AgentDefinition[] = BUILT_IN_AGENTS) {
    const map = new Map<string, AgentDefinition>();
    for (const def of definitions) {
      if (map.has(def.type)) throw new Error(`Agent type "${def.type}" registered twice`);
      map.set(def.type, def);
    }
    this.definitions = map;
  }

  get types(): string[] {
    return Array.from(this.definitions.keys());
  }

  list(): AgentDefinition[] {
    return Array.from(this.definitions.values());
  }

  has(type: string): boolean {
    return this.definitions.has(type);
  }

  get(type: string): AgentDefinition {
    const def = this.definitions.get(type);
    if (!def) throw new UnknownAgentError(type);
    return def;
  }

  /** A fresh instance; agents are single use. */
  create(type: string, ctx: AgentContext): TenantAgent {
    return this.get(type).create(ctx);
  }
}
