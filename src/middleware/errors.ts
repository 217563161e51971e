import type { Response } from "express";
import { z } from "zod";
import { RelayError } from "../errors.js";

/**
 * Answer a failed request. Known relay errors keep their code; anything
 * else is logged and reported as a generic failure.
 */
export function respondError(res: Response, err: unknown, context: string): void {
  if (err instanceof z.ZodError) {
    res.status(400).json({ error: { code: "VALIDATION_ERROR", message: err.message } });
    return;
  }
  if (err instanceof RelayError) {
    res.status(err.status).json({ error: { code: err.code, message: err.message } });
    return;
  }
  console.error(`${context} error:`, err);
  res.status(500).json({ error: { code: "INTERNAL_ERROR", message: `Failed to ${context.toLowerCase()}` } });
}
