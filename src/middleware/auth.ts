/**
 * JWT authentication — HS256 bearer tokens whose subject is the acting
 * user's platform (external) id.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import { jwtVerify } from "jose";

export interface AuthUser {
  externalId: string;
  displayName: string | null;
}

declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

export interface AuthOptions {
  secret: string;
  issuer: string | null;
}

export function createAuthenticate(options: AuthOptions): RequestHandler {
  const key = new TextEncoder().encode(options.secret);

  return async (req: Request, res: Response, next: NextFunction) => {
    const header = req.headers.authorization ?? "";
    const [scheme, token] = header.split(" ");
    if (scheme !== "Bearer" || !token) {
      res.status(401).json({ error: { code: "UNAUTHORIZED", message: "Missing bearer token" } });
      return;
    }

    try {
      const { payload } = await jwtVerify(token, key, {
        algorithms: ["HS256"],
        ...(options.issuer ? { issuer: options.issuer } : {}),
      });
      if (!payload.sub) {
        res.status(401).json({ error: { code: "UNAUTHORIZED", message: "Token has no subject" } });
        return;
      }
      req.user = {
        externalId: payload.sub,
        displayName: typeof payload.name === "string" ? payload.name : null,
      };
      next();
    } catch {
      res.status(401).json({ error: { code: "UNAUTHORIZED", message: "Invalid or expired token" } });
    }
  };
}

/** The authenticated caller; routes mount `authenticate` before using this. */
export function authUser(req: Request): AuthUser {
  if (!req.user) {
    throw new Error("authUser() called on an unauthenticated route");
  }
  return req.user;
}

/** Only the configured operator passes; mount after `authenticate`. */
export function requireOperator(operatorExternalId: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (authUser(req).externalId !== operatorExternalId) {
      res.status(403).json({ error: { code: "FORBIDDEN", message: "Operator access required" } });
      return;
    }
    next();
  };
}
