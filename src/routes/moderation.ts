/**
 * Moderation routes — operator only.
 *
 * GET  /moderation/queue                  — Pending messages, oldest first
 * GET  /moderation/urgent                 — Urgent pending messages, newest first
 * POST /moderation/messages/:id/approve   — Approve and publish
 * POST /moderation/messages/:id/reject    — Reject
 * POST /moderation/messages/:id/answer    — Answer the sender (dm | public)
 * POST /moderation/users/:id/block        — Block for N hours
 * POST /moderation/users/:id/unblock      — Lift a block
 * GET  /moderation/alerts                 — Unresolved alerts
 * POST /moderation/alerts/:id/resolve     — Resolve an alert
 * GET  /moderation/log                    — Latest moderator actions
 */

import { Router, type Request, type RequestHandler, type Response } from "express";
import { z } from "zod";
import type { RelayContext } from "../context.js";
import { authUser, requireOperator } from "../middleware/auth.js";
import { respondError } from "../middleware/errors.js";
import type { ModerationAction } from "../types.js";

const LimitQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

const AnswerSchema = z.object({
  channel: z.enum(["dm", "public"]),
  text: z.string().min(1).max(4096),
});

const BlockSchema = z.object({
  hours: z.number().int().min(1).max(8760).default(24),
});

export function moderationRoutes(ctx: RelayContext, authenticate: RequestHandler): Router {
  const router = Router();

  router.use(authenticate, requireOperator(ctx.config.operatorExternalId));

  const moderator = (req: Request) => {
    const caller = authUser(req);
    return ctx.identity.getOrCreate(caller.externalId, caller.displayName);
  };

  // ───────────────────────────────────────────────────────────────────────────
  // Queues
  // ───────────────────────────────────────────────────────────────────────────

  router.get("/queue", async (req, res) => {
    try {
      const { limit } = LimitQuerySchema.parse(req.query);
      const queue = await ctx.relay.pendingQueue(limit);
      res.json({ data: queue, meta: { count: queue.length } });
    } catch (err) {
      respondError(res, err, "Get queue");
    }
  });

  router.get("/urgent", async (req, res) => {
    try {
      const { limit } = LimitQuerySchema.parse(req.query);
      const urgent = await ctx.relay.urgentPending(limit);
      res.json({ data: urgent, meta: { count: urgent.length } });
    } catch (err) {
      respondError(res, err, "Get urgent messages");
    }
  });

  // ───────────────────────────────────────────────────────────────────────────
  // Decisions
  // ───────────────────────────────────────────────────────────────────────────

  const decide = (action: ModerationAction) => async (req: Request, res: Response) => {
    try {
      const mod = await moderator(req);
      const message = await ctx.relay.transition(req.params.id, action, mod.id);
      res.json({ data: message });
    } catch (err) {
      respondError(res, err, action === "approve" ? "Approve message" : "Reject message");
    }
  };

  router.post("/messages/:id/approve", decide("approve"));
  router.post("/messages/:id/reject", decide("reject"));

  router.post("/messages/:id/answer", async (req, res) => {
    try {
      const body = AnswerSchema.parse(req.body);
      const mod = await moderator(req);
      await ctx.relay.answerSender(req.params.id, mod.id, body.channel, body.text);
      res.json({ data: { messageId: req.params.id, channel: body.channel } });
    } catch (err) {
      respondError(res, err, "Answer sender");
    }
  });

  // ───────────────────────────────────────────────────────────────────────────
  // Blocks
  // ───────────────────────────────────────────────────────────────────────────

  router.post("/users/:id/block", async (req, res) => {
    try {
      const { hours } = BlockSchema.parse(req.body ?? {});
      const mod = await moderator(req);
      const blockedUntil = await ctx.relay.blockUser(mod.id, req.params.id, hours);
      res.json({ data: { userId: req.params.id, blockedUntil } });
    } catch (err) {
      respondError(res, err, "Block user");
    }
  });

  router.post("/users/:id/unblock", async (req, res) => {
    try {
      const mod = await moderator(req);
      await ctx.relay.unblockUser(mod.id, req.params.id);
      res.json({ data: { userId: req.params.id, blocked: false } });
    } catch (err) {
      respondError(res, err, "Unblock user");
    }
  });

  // ───────────────────────────────────────────────────────────────────────────
  // Alerts & log
  // ───────────────────────────────────────────────────────────────────────────

  router.get("/alerts", async (_req, res) => {
    try {
      const alerts = await ctx.audit.unresolvedAlerts();
      res.json({ data: alerts, meta: { count: alerts.length } });
    } catch (err) {
      respondError(res, err, "Get alerts");
    }
  });

  router.post("/alerts/:id/resolve", async (req, res) => {
    try {
      const outcome = await ctx.audit.resolveAlert(req.params.id);
      switch (outcome) {
        case "resolved":
          res.json({ data: { id: req.params.id, resolved: true } });
          return;
        case "not_open":
          res.status(404).json({ error: { code: "NOT_FOUND", message: "Open alert not found" } });
          return;
        case "failed":
          res.status(500).json({ error: { code: "INTERNAL_ERROR", message: "Failed to resolve alert" } });
          return;
      }
    } catch (err) {
      respondError(res, err, "Resolve alert");
    }
  });

  router.get("/log", async (req, res) => {
    try {
      const { limit } = LimitQuerySchema.parse(req.query);
      const entries = await ctx.audit.latestActions(limit ?? 20);
      res.json({ data: entries, meta: { count: entries.length } });
    } catch (err) {
      respondError(res, err, "Get moderation log");
    }
  });

  return router;
}
