/**
 * Unit tests for outbound framing and the webhook transport
 */

import { describe, it, expect, vi } from "vitest";
import { DeliveryFailure } from "../src/errors.js";
import { toParts, WebhookTransport } from "../src/services/transport.js";

describe("toParts", () => {
  it("frames text with heading and footer", () => {
    expect(
      toParts({
        heading: "📨 Anonymous message:",
        content: { kind: "text", text: "hello" },
        footer: "ID: 1",
      })
    ).toEqual([
      { type: "text", text: "📨 Anonymous message:\n\nhello\n\nID: 1", replyToPrevious: false },
    ]);
  });

  it("puts framed text in the caption of captionable media", () => {
    expect(
      toParts({
        heading: "Heading",
        content: { kind: "media", media: "photo", fileRef: "f-1", caption: "look" },
      })
    ).toEqual([{ type: "media", media: "photo", fileRef: "f-1", caption: "Heading\n\nlook" }]);
  });

  it("leaves the caption null when there is nothing to say", () => {
    expect(
      toParts({ content: { kind: "media", media: "voice", fileRef: "f-2", caption: null } })
    ).toEqual([{ type: "media", media: "voice", fileRef: "f-2", caption: null }]);
  });

  it("sends sticker text as a second part replying to the first", () => {
    expect(
      toParts({
        heading: "From someone",
        content: { kind: "media", media: "sticker", fileRef: "s-1", caption: null },
      })
    ).toEqual([
      { type: "media", media: "sticker", fileRef: "s-1", caption: null },
      { type: "text", text: "From someone", replyToPrevious: true },
    ]);
  });

  it("sends a bare video note as a single part", () => {
    expect(
      toParts({ content: { kind: "media", media: "video_note", fileRef: "v-1", caption: null } })
    ).toEqual([{ type: "media", media: "video_note", fileRef: "v-1", caption: null }]);
  });
});

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("WebhookTransport", () => {
  it("posts parts to /deliver and returns the ref", async () => {
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({ ref: 42 })
    );
    const transport = new WebhookTransport("http://front.test", 1000, fetchImpl);

    const ref = await transport.deliver("chat-7", {
      content: { kind: "text", text: "hi" },
      deepLink: "r_abcd1234",
    });

    expect(ref).toBe("42");
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(String(url)).toBe("http://front.test/deliver");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      target: "chat-7",
      replyTo: null,
      deepLink: "r_abcd1234",
      parts: [{ type: "text", text: "hi", replyToPrevious: false }],
    });
  });

  it("returns null when the front-end reports no ref", async () => {
    const transport = new WebhookTransport("http://front.test", 1000, async () =>
      jsonResponse({})
    );
    await expect(
      transport.deliver("chat-7", { content: { kind: "text", text: "hi" } })
    ).resolves.toBeNull();
  });

  it("posts notifications to /notify", async () => {
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response(null, { status: 204 })
    );
    const transport = new WebhookTransport("http://front.test", 1000, fetchImpl);

    await transport.notify("admin-chat", "alert");

    const [url, init] = fetchImpl.mock.calls[0];
    expect(String(url)).toBe("http://front.test/notify");
    expect(JSON.parse(String(init?.body))).toEqual({ channel: "admin-chat", text: "alert" });
  });

  it("raises DeliveryFailure on an error status", async () => {
    const transport = new WebhookTransport("http://front.test", 1000, async () =>
      jsonResponse({ error: "nope" }, 503)
    );
    await expect(transport.notify("admin-chat", "x")).rejects.toBeInstanceOf(DeliveryFailure);
  });

  it("raises DeliveryFailure when the request itself fails", async () => {
    const transport = new WebhookTransport("http://front.test", 1000, async () => {
      throw new TypeError("fetch failed");
    });
    await expect(
      transport.deliver("chat-7", { content: { kind: "text", text: "hi" } })
    ).rejects.toThrow("Transport /deliver failed");
  });

  it("gives up on a hanging front-end after the timeout", async () => {
    const hanging = vi.fn(
      (_input: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          signal?.addEventListener("abort", () => reject(signal.reason));
        })
    );
    const transport = new WebhookTransport("http://front.test", 20, hanging);

    const attempt = transport.deliver("chat-7", { content: { kind: "text", text: "hi" } });

    await expect(attempt).rejects.toBeInstanceOf(DeliveryFailure);
    await expect(attempt).rejects.toThrow("Transport /deliver failed");
    expect(hanging).toHaveBeenCalledTimes(1);
  });
});
