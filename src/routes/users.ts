/**
 * User routes — registration, share link, stats and inbox.
 *
 * POST /users/me         — Register on first contact / refresh display name
 * GET  /users/me         — Own profile with public code and share link
 * GET  /users/me/stats   — Approved messages received and sent
 * GET  /users/me/inbox   — Approved messages received, newest first
 */

import { Router, type RequestHandler } from "express";
import { z } from "zod";
import type { RelayContext } from "../context.js";
import { authUser } from "../middleware/auth.js";
import { respondError } from "../middleware/errors.js";
import { shareLink } from "../services/deepLink.js";
import type { User } from "../types.js";

const RegisterSchema = z.object({
  displayName: z.string().min(1).max(100).optional(),
});

const InboxQuerySchema = z.object({
  page: z.coerce.number().int().min(0).default(0),
});

export function userRoutes(ctx: RelayContext, authenticate: RequestHandler): Router {
  const router = Router();

  const profile = (user: User) => ({
    id: user.id,
    publicCode: user.publicCode,
    displayName: user.displayName,
    link: shareLink(ctx.config.linkBaseUrl, user),
    createdAt: user.createdAt,
  });

  // ───────────────────────────────────────────────────────────────────────────
  // POST /users/me — Register / refresh
  // ───────────────────────────────────────────────────────────────────────────

  router.post("/me", authenticate, async (req, res) => {
    try {
      const body = RegisterSchema.parse(req.body ?? {});
      const caller = authUser(req);
      const user = await ctx.identity.getOrCreate(
        caller.externalId,
        body.displayName ?? caller.displayName
      );
      res.status(201).json({ data: profile(user) });
    } catch (err) {
      respondError(res, err, "Register user");
    }
  });

  // ───────────────────────────────────────────────────────────────────────────
  // GET /users/me — Own profile
  // ───────────────────────────────────────────────────────────────────────────

  router.get("/me", authenticate, async (req, res) => {
    try {
      const caller = authUser(req);
      const user = await ctx.identity.getOrCreate(caller.externalId, caller.displayName);
      res.json({ data: profile(user) });
    } catch (err) {
      respondError(res, err, "Get profile");
    }
  });

  // ───────────────────────────────────────────────────────────────────────────
  // GET /users/me/stats
  // ───────────────────────────────────────────────────────────────────────────

  router.get("/me/stats", authenticate, async (req, res) => {
    try {
      const user = await ctx.identity.getOrCreate(authUser(req).externalId);
      res.json({ data: await ctx.relay.userStats(user.id) });
    } catch (err) {
      respondError(res, err, "Get stats");
    }
  });

  // ───────────────────────────────────────────────────────────────────────────
  // GET /users/me/inbox?page=0
  // ───────────────────────────────────────────────────────────────────────────

  router.get("/me/inbox", authenticate, async (req, res) => {
    try {
      const { page } = InboxQuerySchema.parse(req.query);
      const user = await ctx.identity.getOrCreate(authUser(req).externalId);
      const inbox = await ctx.relay.inbox(user.id, page);
      res.json({
        data: inbox.messages,
        meta: { page: inbox.page, hasMore: inbox.hasMore, count: inbox.messages.length },
      });
    } catch (err) {
      respondError(res, err, "Get inbox");
    }
  });

  return router;
}
