import { z } from "zod";
import { log, logError } from "../logger";

/**
 * Short-text drafting (explanations, reminder emails, briefs).
 *
 * Every method returns "" when nothing could be produced; callers treat ""
 * as "skip this item", never as an error to retry.
 */
export interface DraftingAdapter {
  /** One or two sentences explaining a number. */
  explain(data: Record<string, unknown>, instruction: string): Promise<string>;
  /** A short message ready to send (email body, note). */
  draft(data: Record<string, unknown>, instruction: string): Promise<string>;
  /** A longer structured document. */
  generate(data: Record<string, unknown>, instruction: string): Promise<string>;
}

export type DraftingSettings = {
  provider: "anthropic" | "stub";
  anthropicApiKey?: string;
  model?: string;
};

const ANTHROPIC_API_URL = "https://api.anthropic.com/v1/messages";
const FAST_MODEL = "claude-haiku-4-5";
const CAPABLE_MODEL = "claude-sonnet-4-5";
const REQUEST_TIMEOUT_MS = 30_000;

const SYSTEM_PROMPT =
  "You write short, factual business messages for a small company's operations team. " +
  "Use only the data provided. No preamble, no sign-off unless asked.";

const messagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

/** Render a nested object as indented "key: value" lines for the prompt. */
export function formatContext(data: Record<string, unknown>, indent = 0): string {
  const pad = "  ".repeat(indent);
  const lines: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    if (value !== null && typeof value === "object" && !Array.isArray(value) && !(value instanceof Date)) {
      lines.push(`${pad}${key}:`);
      lines.push(formatContext(Object.fromEntries(Object.entries(value)), indent + 1));
    } else if (Array.isArray(value)) {
      lines.push(`${pad}${key}: ${value.map((v) => String(v)).join(", ")}`);
    } else {
      lines.push(`${pad}${key}: ${value instanceof Date ? value.toISOString() : String(value)}`);
    }
  }
  return lines.join("\n");
}

class StubDraftingAdapter implements DraftingAdapter {
  async explain(): Promise<string> {
    return "";
  }

  async draft(): Promise<string> {
    return "";
  }

  async generate(): Promise<string> {
    return "";
  }
}

/**
 * Anthropic drafting adapter. Uses the Messages API via native fetch.
 */
export class AnthropicDraftingAdapter implements DraftingAdapter {
  constructor(
    private readonly apiKey: string,
    private readonly model?: string,
  ) {}

  explain(data: Record<string, unknown>, instruction: string): Promise<string> {
    return this.complete(data, instruction, this.model ?? FAST_MODEL, 150);
  }

  draft(data: Record<string, unknown>, instruction: string): Promise<string> {
    return this.complete(data, instruction, this.model ?? FAST_MODEL, 300);
  }

  generate(data: Record<string, unknown>, instruction: string): Promise<string> {
    return this.complete(data, instruction, this.model ?? CAPABLE_MODEL, 1500);
  }

  private async complete(
    data: Record<string, unknown>,
    instruction: string,
    model: string,
    maxTokens: number,
  ): Promise<string> {
    try {
      const response = await fetch(ANTHROPIC_API_URL, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-api-key": this.apiKey,
          "anthropic-version": "2023-06-01",
        },
        body: JSON.stringify({
          model,
          max_tokens: maxTokens,
          system: SYSTEM_PROMPT,
          messages: [{ role: "user", content: `${instruction}\n\nData:\n${formatContext(data)}` }],
        }),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });

      if (!response.ok) {
        const body = await response.text();
        logError(`Anthropic API error ${response.status}: ${body}`, "drafting");
        return "";
      }

      const parsed = messagesResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        logError("Unexpected Anthropic response shape", "drafting");
        return "";
      }
      const text = parsed.data.content.find((b) => b.type === "text")?.text?.trim() ?? "";
      log(`[${model}] drafted ${text.length} chars`, "drafting");
      return text;
    } catch (err) {
      logError("Drafting request failed", "drafting", err);
      return "";
    }
  }
}

export function createDraftingAdapter(settings: DraftingSettings): DraftingAdapter {
  if (settings.provider === "anthropic") {
    if (!settings.anthropicApiKey) {
      throw new Error("DRAFTING_PROVIDER=anthropic but ANTHROPIC_API_KEY is not set");
    }
    return new AnthropicDraftingAdapter(settings.anthropicApiKey, settings.model);
  }
  return new StubDraftingAdapter();
}
