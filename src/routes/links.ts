/**
 * Deep-link routes.
 *
 * POST /links/resolve — Turn a start payload into a conversation target
 */

import { Router, type RequestHandler } from "express";
import { z } from "zod";
import type { RelayContext } from "../context.js";
import { authUser } from "../middleware/auth.js";
import { respondError } from "../middleware/errors.js";

const ResolveSchema = z.object({
  payload: z.string().max(256).nullish(),
});

export function linkRoutes(ctx: RelayContext, authenticate: RequestHandler): Router {
  const router = Router();

  router.post("/resolve", authenticate, async (req, res) => {
    try {
      const { payload } = ResolveSchema.parse(req.body ?? {});
      const caller = authUser(req);
      const viewer = await ctx.identity.getOrCreate(caller.externalId, caller.displayName);
      const resolution = await ctx.deepLinks.resolve(payload, viewer);
      res.json({ data: resolution });
    } catch (err) {
      respondError(res, err, "Resolve link");
    }
  });

  return router;
}
