import { and, desc, eq } from "drizzle-orm";
import type { Database } from "../db/index.js";
import { replyTokens } from "../db/schema.js";
import type { ReplyToken } from "../types.js";

export interface ReplyTokenRepository {
  /** False when the hash is already taken. */
  insertIfAbsent(token: ReplyToken): Promise<boolean>;
  findByHash(hash: string): Promise<ReplyToken | null>;
  findLatestForPair(senderId: string, receiverId: string): Promise<ReplyToken | null>;
}

export class DrizzleReplyTokenRepository implements ReplyTokenRepository {
  constructor(private readonly db: Database) {}

  async insertIfAbsent(token: ReplyToken): Promise<boolean> {
    const rows = await this.db
      .insert(replyTokens)
      .values(token)
      .onConflictDoNothing()
      .returning({ hash: replyTokens.hash });
    return rows.length > 0;
  }

  async findByHash(hash: string): Promise<ReplyToken | null> {
    const rows = await this.db
      .select()
      .from(replyTokens)
      .where(eq(replyTokens.hash, hash))
      .limit(1);
    return rows[0] ?? null;
  }

  async findLatestForPair(senderId: string, receiverId: string): Promise<ReplyToken | null> {
    const rows = await this.db
      .select()
      .from(replyTokens)
      .where(and(eq(replyTokens.senderId, senderId), eq(replyTokens.receiverId, receiverId)))
      .orderBy(desc(replyTokens.createdAt))
      .limit(1);
    return rows[0] ?? null;
  }
}
