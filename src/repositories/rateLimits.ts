import { eq } from "drizzle-orm";
import type { Database } from "../db/index.js";
import { rateLimits } from "../db/schema.js";
import type { RateLimitState } from "../types.js";

export type RateLimitPatch = Partial<Omit<RateLimitState, "userId">>;

export interface RateLimitRepository {
  find(userId: string): Promise<RateLimitState | null>;
  /** Insert the first row for a user; false when one already exists. */
  insertIfAbsent(state: RateLimitState): Promise<boolean>;
  update(userId: string, patch: RateLimitPatch): Promise<void>;
  /** Block a user, creating the row if the user never sent anything. */
  upsertBlock(userId: string, blockedUntil: string, windowStart: string): Promise<void>;
}

export class DrizzleRateLimitRepository implements RateLimitRepository {
  constructor(private readonly db: Database) {}

  async find(userId: string): Promise<RateLimitState | null> {
    const rows = await this.db
      .select()
      .from(rateLimits)
      .where(eq(rateLimits.userId, userId))
      .limit(1);
    return rows[0] ?? null;
  }

  async insertIfAbsent(state: RateLimitState): Promise<boolean> {
    const rows = await this.db
      .insert(rateLimits)
      .values(state)
      .onConflictDoNothing()
      .returning({ userId: rateLimits.userId });
    return rows.length > 0;
  }

  async update(userId: string, patch: RateLimitPatch): Promise<void> {
    await this.db.update(rateLimits).set(patch).where(eq(rateLimits.userId, userId));
  }

  async upsertBlock(userId: string, blockedUntil: string, windowStart: string): Promise<void> {
    await this.db
      .insert(rateLimits)
      .values({ userId, windowStart, messageCount: 0, isBlocked: true, blockedUntil })
      .onConflictDoUpdate({
        target: rateLimits.userId,
        set: { isBlocked: true, blockedUntil },
      });
  }
}
