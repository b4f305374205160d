import { log, logWarn, logError } from "../logger";

/**
 * Outbound email (Resend) and Slack notifications.
 *
 * Best-effort: nothing here throws. Each send returns whether it was
 * accepted so callers (usually an executor operation) decide what a failure
 * means.
 */

export const RESEND_API_URL = "https://api.resend.com/emails";

export type NotificationSettings = {
  resendApiKey?: string;
  fromEmail: string;
  fromName: string;
  slackWebhookUrl?: string;
};

export interface WebhookResult {
  success: boolean;
  error?: string;
}

export type EmailOptions = {
  fromName?: string;
  replyTo?: string;
};

export type AlertUrgency = "normal" | "urgent";

let settings: NotificationSettings = {
  fromEmail: "agents@example.com",
  fromName: "Agents",
};

export function configureNotifications(next: NotificationSettings): void {
  settings = { ...next };
}

/**
 * POST a JSON payload to the given URL with a timeout.
 * Returns a structured result; never throws.
 */
export async function sendWebhook(
  url: string,
  payload: unknown,
  timeoutMs = 5000,
  headers: Record<string, string> = {},
): Promise<WebhookResult> {
  try {
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (response.ok) {
      return { success: true };
    }

    return {
      success: false,
      error: `HTTP ${response.status}: ${response.statusText}`,
    };
  } catch (err) {
    return {
      success: false,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

/** Body starting with "<" is sent as HTML, anything else as plain text. */
export function buildEmailPayload(
  to: string | string[],
  subject: string,
  body: string,
  options: EmailOptions = {},
): Record<string, unknown> {
  const isHtml = body.trim().startsWith("<");
  const payload: Record<string, unknown> = {
    from: `${options.fromName ?? settings.fromName} <${settings.fromEmail}>`,
    to: Array.isArray(to) ? to : [to],
    subject,
    [isHtml ? "html" : "text"]: body,
  };
  if (options.replyTo) payload.reply_to = options.replyTo;
  return payload;
}

export async function sendEmail(
  to: string | string[],
  subject: string,
  body: string,
  options: EmailOptions = {},
): Promise<boolean> {
  if (!settings.resendApiKey) {
    logError("RESEND_API_KEY is not configured; email not sent", "notification");
    return false;
  }

  const result = await sendWebhook(RESEND_API_URL, buildEmailPayload(to, subject, body, options), 15_000, {
    Authorization: `Bearer ${settings.resendApiKey}`,
  });
  if (!result.success) {
    logError(`Email "${subject}" failed: ${result.error ?? "unknown error"}`, "notification");
    return false;
  }

  log(`Email sent to ${Array.isArray(to) ? to.join(", ") : to}: ${subject}`, "notification");
  return true;
}

export async function sendSlack(message: string, webhookUrl?: string): Promise<boolean> {
  const url = webhookUrl ?? settings.slackWebhookUrl;
  if (!url) {
    logWarn("Slack webhook not configured; notification skipped", "notification");
    return false;
  }

  const result = await sendWebhook(url, { text: message }, 10_000);
  if (!result.success) {
    logError(`Slack notification failed: ${result.error ?? "unknown error"}`, "notification");
    return false;
  }
  log("Slack notification sent", "notification");
  return true;
}

/**
 * Email an alert; urgent alerts also go to Slack once the email is accepted.
 * Returns the email outcome. A failed email posts nothing to Slack, so a
 * retried alert reaches Slack at most once.
 */
export async function alertManager(
  to: string,
  subject: string,
  body: string,
  urgency: AlertUrgency = "normal",
  slackWebhookUrl?: string,
): Promise<boolean> {
  const sent = await sendEmail(to, subject, body);
  if (sent && urgency === "urgent") {
    await sendSlack(`*${subject}*\n${body}`, slackWebhookUrl);
  }
  return sent;
}
