/**
 * SlackWebhookSink posts failure notifications to a Slack incoming webhook.
 * Purpose: keep the channel/username/icon/color conventions of CI chat notifications.
 * Assumptions: global fetch (Node 20); any non-2xx response or a request past timeoutMs is a failed delivery.
 * Usage: new SlackWebhookSink({ webhookUrl, channel, username, iconUrl, timeoutMs }).send(message)
 */

import { NotificationError } from "../../../core/errors.js";
import type { NotificationMessage, NotificationSink } from "../ports.js";

export type SlackWebhookSinkOptions = {
  webhookUrl: string;
  channel?: string;
  username?: string;
  iconUrl?: string;
  timeoutMs?: number;
};

export const DEFAULT_SLACK_TIMEOUT_MS = 10_000;

export type SlackPayload = {
  channel?: string;
  username?: string;
  icon_url?: string;
  attachments: Array<{
    color: string;
    title: string;
    text: string;
    footer: string;
  }>;
};

const STATUS_COLORS: Record<string, string> = {
  success: "good",
  failure: "danger",
  cancelled: "warning",
};

export class SlackWebhookSink implements NotificationSink {
  readonly name = "slack";
  private readonly opts: SlackWebhookSinkOptions;

  constructor(opts: SlackWebhookSinkOptions) {
    this.opts = opts;
  }

  async send(message: NotificationMessage): Promise<void> {
    const timeoutMs = this.opts.timeoutMs ?? DEFAULT_SLACK_TIMEOUT_MS;
    const signal = AbortSignal.timeout(timeoutMs);
    let response: Response;
    try {
      response = await fetch(this.opts.webhookUrl, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(buildSlackPayload(message, this.opts)),
        signal,
      });
    } catch (err) {
      if (signal.aborted) {
        throw new NotificationError(`Slack webhook request timed out after ${timeoutMs}ms`, err);
      }
      throw new NotificationError(
        `Slack webhook request failed: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    }

    if (!response.ok) {
      const body = await response.text();
      throw new NotificationError(
        `Slack webhook responded ${response.status}: ${body.trim() || response.statusText}`,
      );
    }
  }
}

export function buildSlackPayload(
  message: NotificationMessage,
  opts: Omit<SlackWebhookSinkOptions, "webhookUrl">,
): SlackPayload {
  const text = message.link ? `${message.message} (${message.link})` : message.message;
  const payload: SlackPayload = {
    attachments: [
      {
        color: STATUS_COLORS[message.status] ?? "warning",
        title: `${message.pipeline} ${message.point}`,
        text,
        footer: `run ${message.runId}`,
      },
    ],
  };
  if (opts.channel) payload.channel = opts.channel;
  if (opts.username) payload.username = opts.username;
  if (opts.iconUrl) payload.icon_url = opts.iconUrl;
  return payload;
}
