/**
 * Webhook External Service
 * Posts an episode's audio to a Discord-compatible webhook as a multipart upload.
 */

import { openAsBlob } from "fs";
import path from "path";
import { sleep } from "../../utils/sleep.js";
import { describeError } from "../../utils/errors.js";

/** Accent color of embed messages (0x5865F2) */
export const EMBED_COLOR = 5793266;

const DEFAULT_RETRY_AFTER_SEC = 1;

export interface WebhookMessage {
  title: string;
  description: string;
}

export interface WebhookResponse {
  status: number;
  body: string;
}

/**
 * Builds the plain-text message: bold title, then the description after a blank line.
 */
export function formatPlainContent({ title, description }: WebhookMessage): string {
  return description ? `**${title}**\n\n${description}` : `**${title}**`;
}

/**
 * Builds the `payload_json` field of an embed message.
 */
export function formatEmbedPayload({ title, description }: WebhookMessage): string {
  return JSON.stringify({
    embeds: [{ title, description, color: EMBED_COLOR }],
  });
}

/**
 * Uploads `filePath` with the message and returns the final response.
 * A 429 is retried once after the advertised `retry_after`.
 * Returns null when the request could not be sent at all.
 */
export async function sendToWebhook(
  webhookUrl: string,
  message: WebhookMessage,
  filePath: string,
  embed: boolean
): Promise<WebhookResponse | null> {
  const fileName = path.basename(filePath);
  console.log(`[webhook] Uploading '${fileName}'...`);

  try {
    let response = await postOnce(webhookUrl, message, filePath, embed);

    if (response.status === 429) {
      const retryAfter = parseRetryAfter(response.body);
      console.log(`[webhook] Rate limited. Waiting for ${retryAfter} seconds.`);
      await sleep(retryAfter * 1000);
      response = await postOnce(webhookUrl, message, filePath, embed);
    }

    return response;
  } catch (error) {
    console.error(`[webhook] ✗ Error sending to webhook: ${describeError(error)}`);
    return null;
  }
}

/**
 * Sends one multipart request. The file is streamed from disk and reopened on every call.
 */
async function postOnce(
  webhookUrl: string,
  message: WebhookMessage,
  filePath: string,
  embed: boolean
): Promise<WebhookResponse> {
  const form = new FormData();
  if (embed) {
    form.append("payload_json", formatEmbedPayload(message));
  } else {
    form.append("content", formatPlainContent(message));
  }

  const audio = await openAsBlob(filePath, { type: "audio/mpeg" });
  form.append("file", audio, path.basename(filePath));

  const response = await fetch(webhookUrl, {
    method: "POST",
    body: form,
  });

  return { status: response.status, body: await response.text() };
}

/**
 * Seconds to wait from a 429 body, e.g. `{"retry_after": 3}`.
 */
export function parseRetryAfter(body: string): number {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === "object" && parsed !== null && "retry_after" in parsed) {
      const value = parsed.retry_after;
      if (typeof value === "number" && Number.isFinite(value) && value >= 0) {
        return value;
      }
    }
  } catch {
    // Not JSON; fall back to the default wait
  }
  return DEFAULT_RETRY_AFTER_SEC;
}
