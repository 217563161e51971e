/**
 * Analytics routes — operator only. Numbers for charts; no rendering.
 *
 * GET /analytics/summary
 * GET /analytics/status
 * GET /analytics/sentiment
 * GET /analytics/hourly?days=7
 * GET /analytics/weekly?days=30
 * GET /analytics/daily?days=30
 */

import { Router, type RequestHandler } from "express";
import { z } from "zod";
import type { RelayContext } from "../context.js";
import { requireOperator } from "../middleware/auth.js";
import { respondError } from "../middleware/errors.js";

const daysQuery = (fallback: number) =>
  z.object({
    days: z.coerce.number().int().min(1).max(365).default(fallback),
  });

export function analyticsRoutes(ctx: RelayContext, authenticate: RequestHandler): Router {
  const router = Router();

  router.use(authenticate, requireOperator(ctx.config.operatorExternalId));

  router.get("/summary", async (_req, res) => {
    try {
      res.json({ data: await ctx.analytics.summary() });
    } catch (err) {
      respondError(res, err, "Get summary");
    }
  });

  router.get("/status", async (_req, res) => {
    try {
      res.json({ data: await ctx.analytics.byStatus() });
    } catch (err) {
      respondError(res, err, "Get status counts");
    }
  });

  router.get("/sentiment", async (_req, res) => {
    try {
      res.json({ data: await ctx.analytics.bySentiment() });
    } catch (err) {
      respondError(res, err, "Get sentiment counts");
    }
  });

  router.get("/hourly", async (req, res) => {
    try {
      const { days } = daysQuery(7).parse(req.query);
      res.json({ data: await ctx.analytics.hourly(days), meta: { days } });
    } catch (err) {
      respondError(res, err, "Get hourly activity");
    }
  });

  router.get("/weekly", async (req, res) => {
    try {
      const { days } = daysQuery(30).parse(req.query);
      res.json({ data: await ctx.analytics.weekly(days), meta: { days } });
    } catch (err) {
      respondError(res, err, "Get weekly activity");
    }
  });

  router.get("/daily", async (req, res) => {
    try {
      const { days } = daysQuery(30).parse(req.query);
      res.json({ data: await ctx.analytics.daily(days), meta: { days } });
    } catch (err) {
      respondError(res, err, "Get daily activity");
    }
  });

  return router;
}
