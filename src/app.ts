/**
 * Express application for a wired relay context.
 */

import cors from "cors";
import express, { type Express } from "express";
import type { RelayContext } from "./context.js";
import { createAuthenticate } from "./middleware/auth.js";
import { analyticsRoutes } from "./routes/analytics.js";
import { linkRoutes } from "./routes/links.js";
import { messageRoutes } from "./routes/messages.js";
import { moderationRoutes } from "./routes/moderation.js";
import { userRoutes } from "./routes/users.js";

export const SERVICE_NAME = "veil-relay";
export const VERSION = "0.1.0";

export function createApp(ctx: RelayContext): Express {
  const app = express();
  const authenticate = createAuthenticate({
    secret: ctx.config.jwtSecret,
    issuer: ctx.config.jwtIssuer,
  });

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  // Health
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", service: SERVICE_NAME, version: VERSION });
  });

  // Core routes
  app.use("/users", userRoutes(ctx, authenticate));
  app.use("/links", linkRoutes(ctx, authenticate));
  app.use("/messages", messageRoutes(ctx, authenticate));
  app.use("/moderation", moderationRoutes(ctx, authenticate));
  app.use("/analytics", analyticsRoutes(ctx, authenticate));

  // 404 catch-all
  app.use((_req, res) => {
    res.status(404).json({
      error: { code: "NOT_FOUND", message: `Route not found` },
    });
  });

  return app;
}
