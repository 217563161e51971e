/**
 * Outbound transport — the two capabilities the relay calls into:
 *
 *   deliver(target, message) → external reference (or null)
 *   notify(channel, text)
 *
 * The relay never talks to a messaging platform itself. The shipped
 * implementation hands each send to the front-end over an HTTP webhook.
 */

import { z } from "zod";
import { DeliveryFailure } from "../errors.js";
import type { MediaKind, MessageContent } from "../types.js";

export interface OutboundMessage {
  /** Line shown above the content ("Anonymous message:"). */
  heading?: string | null;
  content: MessageContent;
  /** Line shown below the content (ids, classification). */
  footer?: string | null;
  /** External reference to thread under. */
  replyToRef?: string | null;
  /** Deep-link payload to attach as the answer button. */
  deepLink?: string | null;
}

export interface Transport {
  deliver(targetExternalId: string, message: OutboundMessage): Promise<string | null>;
  notify(channel: string, text: string): Promise<void>;
}

export type OutboundPart =
  | { type: "text"; text: string; replyToPrevious: boolean }
  | { type: "media"; media: MediaKind; fileRef: string; caption: string | null };

function frame(message: OutboundMessage, body: string | null): string {
  return [message.heading, body, message.footer]
    .filter((line): line is string => typeof line === "string" && line.length > 0)
    .join("\n\n");
}

/**
 * Split a message into the parts a chat platform can send. Stickers and
 * video notes cannot carry a caption, so their text follows as a second
 * part replying to the first.
 */
export function toParts(message: OutboundMessage): OutboundPart[] {
  const { content } = message;
  if (content.kind === "text") {
    return [{ type: "text", text: frame(message, content.text), replyToPrevious: false }];
  }

  const text = frame(message, content.caption);
  const media: MediaKind = content.media;
  switch (media) {
    case "sticker":
    case "video_note": {
      const parts: OutboundPart[] = [
        { type: "media", media, fileRef: content.fileRef, caption: null },
      ];
      if (text) parts.push({ type: "text", text, replyToPrevious: true });
      return parts;
    }
    case "photo":
    case "video":
    case "voice":
    case "audio":
    case "document":
    case "animation":
      return [{ type: "media", media, fileRef: content.fileRef, caption: text || null }];
    default: {
      const unknown: never = media;
      throw new Error(`Unsupported media kind: ${String(unknown)}`);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Webhook transport
// ─────────────────────────────────────────────────────────────────────────────

const DeliverResponseSchema = z.object({
  ref: z.union([z.string(), z.number()]).nullish(),
});

export class WebhookTransport implements Transport {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async deliver(targetExternalId: string, message: OutboundMessage): Promise<string | null> {
    const body = await this.post("/deliver", {
      target: targetExternalId,
      replyTo: message.replyToRef ?? null,
      deepLink: message.deepLink ?? null,
      parts: toParts(message),
    });
    const parsed = DeliverResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new DeliveryFailure("Transport returned an unexpected deliver response");
    }
    const { ref } = parsed.data;
    return ref === null || ref === undefined ? null : String(ref);
  }

  async notify(channel: string, text: string): Promise<void> {
    await this.post("/notify", { channel, text });
  }

  private async post(path: string, payload: unknown): Promise<unknown> {
    let res: Response;
    try {
      res = await this.fetchImpl(new URL(path, this.baseUrl), {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new DeliveryFailure(`Transport ${path} failed`, err);
    }

    if (!res.ok) {
      throw new DeliveryFailure(`Transport ${path} answered ${res.status}`);
    }
    if (res.status === 204) return {};
    try {
      return await res.json();
    } catch (err) {
      throw new DeliveryFailure(`Transport ${path} returned invalid JSON`, err);
    }
  }
}

/**
 * Transport used when no webhook is configured: logs what would have
 * been sent and reports nothing published.
 */
export class LoggingTransport implements Transport {
  async deliver(targetExternalId: string, message: OutboundMessage): Promise<string | null> {
    console.log(`[transport] deliver → ${targetExternalId}:`, JSON.stringify(toParts(message)));
    return null;
  }

  async notify(channel: string, text: string): Promise<void> {
    console.log(`[transport] notify → ${channel}: ${text}`);
  }
}
