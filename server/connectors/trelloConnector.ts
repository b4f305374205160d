import { z } from "zod";
import type { ToolCategory } from "@shared/schema";
import { BaseConnector, parseDate, toText } from "./baseConnector";
import type { ConnectorCredentials, Task, TaskStatus } from "./types";

export const TRELLO_BASE_URL = "https://api.trello.com/1";
const REQUEST_TIMEOUT_MS = 15_000;

const DONE_LIST_KEYWORDS = ["done", "completed", "archive"];
const IN_PROGRESS_LIST_KEYWORDS = ["doing", "in progress", "wip"];

const listsSchema = z.array(z.object({ id: z.string(), name: z.string() }));

const cardsSchema = z.array(
  z.object({
    id: z.string(),
    name: z.string().default(""),
    idList: z.string().default(""),
    due: z.string().nullable().default(null),
    dueComplete: z.boolean().default(false),
    closed: z.boolean().default(false),
    members: z.array(z.object({ fullName: z.string().default("") })).default([]),
  }),
);

type TrelloCard = z.infer<typeof cardsSchema>[number];

/**
 * Trello board as a task source. Credentials: `apiKey`, `token`, `boardId`.
 * Token-based; there is nothing to refresh.
 */
export class TrelloConnector extends BaseConnector {
  readonly source = "trello";
  readonly category: ToolCategory = "project";

  constructor(
    tenantId: string,
    credentials: ConnectorCredentials,
    now?: () => Date,
    private readonly baseUrl = TRELLO_BASE_URL,
  ) {
    super(tenantId, credentials, now);
  }

  protected async checkConnection(): Promise<boolean> {
    const response = await this.get("/members/me");
    return response.ok;
  }

  protected async loadTasks(): Promise<Task[]> {
    const boardId = toText(this.credentials.boardId);
    if (!boardId) throw new Error("boardId missing from Trello credentials");

    const listsResponse = await this.get(`/boards/${encodeURIComponent(boardId)}/lists`);
    if (!listsResponse.ok) throw new Error(`Trello lists returned HTTP ${listsResponse.status}`);
    const listNames = new Map(
      listsSchema.parse(await listsResponse.json()).map((l) => [l.id, l.name.toLowerCase()]),
    );

    const cardsResponse = await this.get(`/boards/${encodeURIComponent(boardId)}/cards`, {
      fields: "name,idList,due,dueComplete,closed",
      members: "true",
      member_fields: "fullName",
    });
    if (!cardsResponse.ok) throw new Error(`Trello cards returned HTTP ${cardsResponse.status}`);
    const cards = cardsSchema.parse(await cardsResponse.json());

    return cards.map((card) => this.toTask(card, listNames.get(card.idList) ?? ""));
  }

  private toTask(card: TrelloCard, listName: string): Task {
    const dueAt = parseDate(card.due);
    let status: TaskStatus;
    if (card.closed || card.dueComplete || DONE_LIST_KEYWORDS.some((k) => listName.includes(k))) {
      status = "done";
    } else if (dueAt && dueAt.getTime() < this.now().getTime()) {
      status = "overdue";
    } else if (IN_PROGRESS_LIST_KEYWORDS.some((k) => listName.includes(k))) {
      status = "in_progress";
    } else {
      status = "todo";
    }

    return {
      rawId: card.id,
      source: this.source,
      title: card.name || "Untitled",
      assigneeName: card.members[0]?.fullName ?? "",
      assigneeEmail: "",
      status,
      dueAt,
      projectName: listName,
    };
  }

  private get(path: string, extra: Record<string, string> = {}): Promise<Response> {
    const params = new URLSearchParams({
      key: toText(this.credentials.apiKey),
      token: toText(this.credentials.token),
      ...extra,
    });
    return fetch(`${this.baseUrl}${path}?${params.toString()}`, {
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
  }
}
