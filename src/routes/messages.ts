/**
 * Message routes — the inbound side of the relay.
 *
 * POST /messages          — Submit to a compose target or through a reply token
 * POST /messages/:id/read — Mark a received message read
 */

import { Router, type RequestHandler, type Response } from "express";
import { z } from "zod";
import type { RelayContext } from "../context.js";
import { authUser } from "../middleware/auth.js";
import { respondError } from "../middleware/errors.js";
import type { SubmitOutcome } from "../services/relay.js";
import { anonymousView, MEDIA_KINDS } from "../types.js";

const ContentSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("text"),
    text: z.string().min(1).max(4096),
  }),
  z.object({
    kind: z.literal("media"),
    media: z.enum(MEDIA_KINDS),
    fileRef: z.string().min(1).max(512),
    caption: z
      .string()
      .max(1024)
      .nullish()
      .transform((value) => value ?? null),
  }),
]);

const SubmitSchema = z.object({
  receiverId: z.string().min(1).nullish(),
  replyToken: z.string().min(1).max(64).nullish(),
  content: ContentSchema,
  replyToId: z.string().min(1).nullish(),
});

function respondDenied(res: Response, outcome: Exclude<SubmitOutcome, { kind: "accepted" }>): void {
  switch (outcome.kind) {
    case "rate_limited":
      res.status(429).json({
        error: {
          code: "RATE_LIMITED",
          message: `Limit reached: ${outcome.limit} messages per window`,
          details: { count: outcome.count, limit: outcome.limit },
        },
      });
      return;
    case "blocked":
      res.status(429).json({
        error: {
          code: "BLOCKED",
          message: `Blocked until ${outcome.until}`,
          details: { until: outcome.until },
        },
      });
      return;
    case "auto_blocked":
      res.status(429).json({
        error: {
          code: "AUTO_BLOCKED",
          message: `Blocked for spam until ${outcome.until}`,
          details: { until: outcome.until, count: outcome.count },
        },
      });
      return;
  }
}

export function messageRoutes(ctx: RelayContext, authenticate: RequestHandler): Router {
  const router = Router();

  // ───────────────────────────────────────────────────────────────────────────
  // POST /messages — Submit
  // ───────────────────────────────────────────────────────────────────────────

  router.post("/", authenticate, async (req, res) => {
    try {
      const body = SubmitSchema.parse(req.body);
      const caller = authUser(req);

      const outcome = await ctx.relay.submit({
        senderExternalId: caller.externalId,
        displayName: caller.displayName,
        receiverId: body.receiverId,
        replyToken: body.replyToken,
        content: body.content,
        replyToId: body.replyToId,
      });

      if (outcome.kind !== "accepted") {
        respondDenied(res, outcome);
        return;
      }
      res.status(201).json({ data: anonymousView(outcome.message) });
    } catch (err) {
      respondError(res, err, "Submit message");
    }
  });

  // ───────────────────────────────────────────────────────────────────────────
  // POST /messages/:id/read — Read receipt
  // ───────────────────────────────────────────────────────────────────────────

  router.post("/:id/read", authenticate, async (req, res) => {
    try {
      const reader = await ctx.identity.getOrCreate(authUser(req).externalId);
      await ctx.relay.markRead(req.params.id, reader.id);
      res.json({ data: { id: req.params.id, read: true } });
    } catch (err) {
      respondError(res, err, "Mark read");
    }
  });

  return router;
}
