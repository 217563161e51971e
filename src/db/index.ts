/**
 * Database handle — libsql client wrapped by Drizzle.
 *
 * The handle is created once by the entry point and passed to the
 * repositories; nothing else opens connections.
 */

import { createClient, type Client } from "@libsql/client";
import { drizzle, type LibSQLDatabase } from "drizzle-orm/libsql";
import * as schema from "./schema.js";

export type Database = LibSQLDatabase<typeof schema>;

export interface DatabaseHandle {
  client: Client;
  db: Database;
}

export const DDL = `
  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    external_id TEXT NOT NULL UNIQUE,
    public_code TEXT NOT NULL UNIQUE,
    display_name TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_users_code ON users(public_code);
  CREATE INDEX IF NOT EXISTS idx_users_external ON users(external_id);

  CREATE TABLE IF NOT EXISTS messages (
    id TEXT PRIMARY KEY,
    sender_id TEXT NOT NULL,
    receiver_id TEXT NOT NULL,
    text TEXT,
    media_kind TEXT,
    media_file_ref TEXT,
    caption TEXT,
    status TEXT NOT NULL DEFAULT 'pending',
    is_read INTEGER NOT NULL DEFAULT 0,
    read_at TEXT,
    reply_to_id TEXT,
    published_ref TEXT,
    sentiment TEXT,
    is_urgent INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_messages_receiver ON messages(receiver_id);
  CREATE INDEX IF NOT EXISTS idx_messages_sender ON messages(sender_id);
  CREATE INDEX IF NOT EXISTS idx_messages_status ON messages(status);
  CREATE INDEX IF NOT EXISTS idx_messages_created ON messages(created_at);

  CREATE TABLE IF NOT EXISTS reply_tokens (
    hash TEXT PRIMARY KEY,
    sender_id TEXT NOT NULL,
    receiver_id TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_reply_pair ON reply_tokens(sender_id, receiver_id);

  CREATE TABLE IF NOT EXISTS rate_limits (
    user_id TEXT PRIMARY KEY,
    window_start TEXT NOT NULL,
    message_count INTEGER NOT NULL DEFAULT 0,
    is_blocked INTEGER NOT NULL DEFAULT 0,
    blocked_until TEXT
  );

  CREATE TABLE IF NOT EXISTS alerts (
    id TEXT PRIMARY KEY,
    type TEXT NOT NULL,
    user_id TEXT,
    details TEXT,
    is_resolved INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_alerts_type ON alerts(type, is_resolved);

  CREATE TABLE IF NOT EXISTS mod_log (
    id TEXT PRIMARY KEY,
    moderator_id TEXT NOT NULL,
    action TEXT NOT NULL,
    message_id TEXT,
    target_user_id TEXT,
    details TEXT,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_mod_log_time ON mod_log(created_at);
`;

/**
 * Open the database at `url` and make sure every table exists.
 */
export async function openDatabase(url: string): Promise<DatabaseHandle> {
  const client = createClient({ url });
  await client.executeMultiple(DDL);
  return { client, db: drizzle(client, { schema }) };
}

export * from "./schema.js";
