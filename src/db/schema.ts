/**
 * veil-relay database schema
 *
 * Core tables for relaying anonymous messages through moderation.
 * Timestamps are ISO-8601 strings in the host's local time zone.
 */

import { sqliteTable, text, integer, index } from "drizzle-orm/sqlite-core";

// ─────────────────────────────────────────────────────────────────────────────
// USERS — platform identity ↔ internal id ↔ shareable code
// ─────────────────────────────────────────────────────────────────────────────

export const users = sqliteTable(
  "users",
  {
    id: text("id").primaryKey(), // UUID
    externalId: text("external_id").notNull().unique(), // platform user id
    publicCode: text("public_code").notNull().unique(), // random alnum, goes into share links
    displayName: text("display_name"),
    isActive: integer("is_active", { mode: "boolean" }).notNull().default(true),
    createdAt: text("created_at").notNull(),
  },
  (table) => [
    index("idx_users_code").on(table.publicCode),
    index("idx_users_external").on(table.externalId),
  ]
);

// ─────────────────────────────────────────────────────────────────────────────
// MESSAGES — the relayed message and its moderation state
// ─────────────────────────────────────────────────────────────────────────────

export const messages = sqliteTable(
  "messages",
  {
    id: text("id").primaryKey(), // UUID
    senderId: text("sender_id").notNull(), // users.id
    receiverId: text("receiver_id").notNull(), // users.id

    // Content — either text, or a media triple
    text: text("text"),
    mediaKind: text("media_kind"), // photo | video | voice | video_note | audio | document | sticker | animation
    mediaFileRef: text("media_file_ref"),
    caption: text("caption"),

    // State
    status: text("status").notNull().default("pending"), // pending | approved | rejected
    isRead: integer("is_read", { mode: "boolean" }).notNull().default(false),
    readAt: text("read_at"),
    replyToId: text("reply_to_id"), // messages.id
    publishedRef: text("published_ref"), // transport reference of the published copy

    // Classification
    sentiment: text("sentiment"), // positive | neutral | negative
    isUrgent: integer("is_urgent", { mode: "boolean" }).notNull().default(false),

    createdAt: text("created_at").notNull(),
  },
  (table) => [
    index("idx_messages_receiver").on(table.receiverId),
    index("idx_messages_sender").on(table.senderId),
    index("idx_messages_status").on(table.status),
    index("idx_messages_created").on(table.createdAt),
  ]
);

// ─────────────────────────────────────────────────────────────────────────────
// REPLY TOKENS — anonymous (sender, receiver) correlation
// ─────────────────────────────────────────────────────────────────────────────

export const replyTokens = sqliteTable(
  "reply_tokens",
  {
    hash: text("hash").primaryKey(),
    senderId: text("sender_id").notNull(),
    receiverId: text("receiver_id").notNull(),
    createdAt: text("created_at").notNull(),
  },
  (table) => [index("idx_reply_pair").on(table.senderId, table.receiverId)]
);

// ─────────────────────────────────────────────────────────────────────────────
// RATE LIMITS — one row per user
// ─────────────────────────────────────────────────────────────────────────────

export const rateLimits = sqliteTable("rate_limits", {
  userId: text("user_id").primaryKey(),
  windowStart: text("window_start").notNull(),
  messageCount: integer("message_count").notNull().default(0),
  isBlocked: integer("is_blocked", { mode: "boolean" }).notNull().default(false),
  blockedUntil: text("blocked_until"),
});

// ─────────────────────────────────────────────────────────────────────────────
// ALERTS — operator attention queue
// ─────────────────────────────────────────────────────────────────────────────

export const alerts = sqliteTable(
  "alerts",
  {
    id: text("id").primaryKey(), // UUID
    type: text("type").notNull(), // "urgent_message" | "spam_attempt" | "auto_block"
    userId: text("user_id"),
    details: text("details"),
    isResolved: integer("is_resolved", { mode: "boolean" }).notNull().default(false),
    createdAt: text("created_at").notNull(),
  },
  (table) => [index("idx_alerts_type").on(table.type, table.isResolved)]
);

// ─────────────────────────────────────────────────────────────────────────────
// MOD LOG — append-only, every moderator action recorded
// ─────────────────────────────────────────────────────────────────────────────

export const modLog = sqliteTable(
  "mod_log",
  {
    id: text("id").primaryKey(), // UUID
    moderatorId: text("moderator_id").notNull(),
    action: text("action").notNull(),
    // "approve" | "reject" | "answer_dm" | "answer_channel" | "block" | "unblock"
    messageId: text("message_id"),
    targetUserId: text("target_user_id"),
    details: text("details"),
    createdAt: text("created_at").notNull(),
  },
  (table) => [index("idx_mod_log_time").on(table.createdAt)]
);

export type UserRow = typeof users.$inferSelect;
export type MessageRow = typeof messages.$inferSelect;
export type ReplyTokenRow = typeof replyTokens.$inferSelect;
export type RateLimitRow = typeof rateLimits.$inferSelect;
export type AlertRow = typeof alerts.$inferSelect;
export type ModLogRow = typeof modLog.$inferSelect;
