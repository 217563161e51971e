/**
 * veil-relay configuration
 *
 * All settings from environment, fixed at process start.
 */

import { z } from "zod";

const flag = z
  .enum(["true", "false"])
  .default("true")
  .transform((value) => value === "true");

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : null));

export const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3002),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DATABASE_URL: z.string().min(1).default("file:veil-relay.db"),

  // Auth — pluggable JWT verification
  JWT_SECRET: z.string().min(8).default("change-me-in-production"),
  JWT_ISSUER: optionalString,

  // Operator (moderator) identity and channels
  OPERATOR_EXTERNAL_ID: z.string().min(1).default("operator"),
  ADMIN_CHANNEL: optionalString,
  PUBLISH_CHANNEL: optionalString,

  // Outbound transport
  TRANSPORT_URL: optionalString,
  DELIVERY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LINK_BASE_URL: optionalString,

  // Limits
  RATE_LIMIT_MESSAGES: z.coerce.number().int().positive().default(10),
  RATE_LIMIT_WINDOW_MINUTES: z.coerce.number().int().positive().default(60),
  SPAM_THRESHOLD: z.coerce.number().int().positive().default(20),
  AUTO_BLOCK_HOURS: z.coerce.number().int().positive().default(24),

  MODERATION_ENABLED: flag,
  DELIVER_ON_APPROVE: flag,
});

export interface RateLimitConfig {
  maxMessages: number;
  windowMinutes: number;
  spamThreshold: number;
  autoBlockHours: number;
}

export interface RelayConfig {
  port: number;
  nodeEnv: "development" | "production" | "test";
  databaseUrl: string;
  jwtSecret: string;
  jwtIssuer: string | null;
  operatorExternalId: string;
  /** Where operator alerts go; defaults to the operator's own chat. */
  adminChannel: string;
  /** Public channel approved messages are published to; null disables publishing. */
  publishChannel: string | null;
  transportUrl: string | null;
  deliveryTimeoutMs: number;
  linkBaseUrl: string | null;
  rateLimit: RateLimitConfig;
  moderationEnabled: boolean;
  deliverOnApprove: boolean;
}

export function loadConfig(env: Record<string, string | undefined>): RelayConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(formatted, null, 2)}`);
  }
  const e = result.data;

  return Object.freeze({
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    databaseUrl: e.DATABASE_URL,
    jwtSecret: e.JWT_SECRET,
    jwtIssuer: e.JWT_ISSUER,
    operatorExternalId: e.OPERATOR_EXTERNAL_ID,
    adminChannel: e.ADMIN_CHANNEL ?? e.OPERATOR_EXTERNAL_ID,
    publishChannel: e.PUBLISH_CHANNEL,
    transportUrl: e.TRANSPORT_URL,
    deliveryTimeoutMs: e.DELIVERY_TIMEOUT_MS,
    linkBaseUrl: e.LINK_BASE_URL,
    rateLimit: Object.freeze({
      maxMessages: e.RATE_LIMIT_MESSAGES,
      windowMinutes: e.RATE_LIMIT_WINDOW_MINUTES,
      spamThreshold: e.SPAM_THRESHOLD,
      autoBlockHours: e.AUTO_BLOCK_HOURS,
    }),
    moderationEnabled: e.MODERATION_ENABLED,
    deliverOnApprove: e.DELIVER_ON_APPROVE,
  });
}
