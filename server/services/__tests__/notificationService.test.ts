import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  configureNotifications,
  sendEmail,
  sendSlack,
  alertManager,
  buildEmailPayload,
  RESEND_API_URL,
} from "../notificationService";

function ok(): Response {
  return new Response("{}", { status: 200 });
}

describe("notificationService", () => {
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    fetchMock = vi.fn().mockResolvedValue(ok());
    vi.stubGlobal("fetch", fetchMock);
    configureNotifications({
      resendApiKey: "test-secret",
      fromEmail: "agents@example.com",
      fromName: "Agents",
      slackWebhookUrl: "https://hooks.example.com/slack",
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("buildEmailPayload", () => {
    it("sends plain bodies as text", () => {
      expect(buildEmailPayload("a@example.com", "Hi", "Hello there")).toEqual({
        from: "Agents <agents@example.com>",
        to: ["a@example.com"],
        subject: "Hi",
        text: "Hello there",
      });
    });

    it("sends bodies starting with a tag as html", () => {
      const payload = buildEmailPayload(["a@example.com", "b@example.com"], "Hi", "  <p>Hello</p>", {
        replyTo: "ops@example.com",
      });

      expect(payload.html).toBe("  <p>Hello</p>");
      expect(payload.text).toBeUndefined();
      expect(payload.reply_to).toBe("ops@example.com");
      expect(payload.to).toEqual(["a@example.com", "b@example.com"]);
    });
  });

  describe("sendEmail", () => {
    it("posts to Resend with the api key", async () => {
      expect(await sendEmail("a@example.com", "Invoice reminder", "Please pay")).toBe(true);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(RESEND_API_URL);
      expect(init.headers.Authorization).toBe("Bearer test-secret");
      expect(JSON.parse(init.body).subject).toBe("Invoice reminder");
    });

    it("returns false without an api key and sends nothing", async () => {
      configureNotifications({ fromEmail: "agents@example.com", fromName: "Agents" });

      expect(await sendEmail("a@example.com", "Hi", "Body")).toBe(false);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("returns false on an HTTP error", async () => {
      fetchMock.mockResolvedValueOnce(new Response("nope", { status: 500 }));

      expect(await sendEmail("a@example.com", "Hi", "Body")).toBe(false);
    });

    it("returns false when the request throws", async () => {
      fetchMock.mockRejectedValueOnce(new Error("ECONNREFUSED"));

      expect(await sendEmail("a@example.com", "Hi", "Body")).toBe(false);
    });
  });

  describe("sendSlack", () => {
    it("posts the message to the configured webhook", async () => {
      expect(await sendSlack("Cash is tight")).toBe(true);

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe("https://hooks.example.com/slack");
      expect(JSON.parse(init.body)).toEqual({ text: "Cash is tight" });
    });

    it("skips when no webhook is configured", async () => {
      configureNotifications({ fromEmail: "agents@example.com", fromName: "Agents", resendApiKey: "test-secret" });

      expect(await sendSlack("hello")).toBe(false);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe("alertManager", () => {
    it("emails normal alerts only", async () => {
      expect(await alertManager("ceo@example.com", "Heads up", "Details")).toBe(true);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("adds Slack for urgent alerts", async () => {
      await alertManager("ceo@example.com", "Cash critical", "12 days left", "urgent");

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(JSON.parse(fetchMock.mock.calls[1][1].body)).toEqual({ text: "*Cash critical*\n12 days left" });
    });

    it("posts an urgent alert to Slack once across retried attempts", async () => {
      fetchMock
        .mockResolvedValueOnce(new Response("{}", { status: 500 }))
        .mockResolvedValueOnce(new Response("{}", { status: 500 }))
        .mockResolvedValue(ok());

      const results = [];
      for (let attempt = 0; attempt < 3; attempt++) {
        results.push(await alertManager("ceo@example.com", "Cash critical", "12 days left", "urgent"));
      }

      expect(results).toEqual([false, false, true]);
      const slackCalls = fetchMock.mock.calls.filter((call) => call[0] === "https://hooks.example.com/slack");
      expect(slackCalls).toHaveLength(1);
    });
  });
});
