import { eq } from "drizzle-orm";
import type { Database } from "../db/index.js";
import { users, type UserRow } from "../db/schema.js";
import type { User } from "../types.js";

export interface UserRepository {
  findById(id: string): Promise<User | null>;
  findByExternalId(externalId: string): Promise<User | null>;
  findByCode(code: string): Promise<User | null>;
  /** Insert unless the external id or public code is taken. True when the row was written. */
  insertIfAbsent(user: User): Promise<boolean>;
  updateDisplayName(id: string, displayName: string): Promise<void>;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    externalId: row.externalId,
    publicCode: row.publicCode,
    displayName: row.displayName,
    active: row.isActive,
    createdAt: row.createdAt,
  };
}

export class DrizzleUserRepository implements UserRepository {
  constructor(private readonly db: Database) {}

  async findById(id: string): Promise<User | null> {
    const rows = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return rows.length > 0 ? toUser(rows[0]) : null;
  }

  async findByExternalId(externalId: string): Promise<User | null> {
    const rows = await this.db
      .select()
      .from(users)
      .where(eq(users.externalId, externalId))
      .limit(1);
    return rows.length > 0 ? toUser(rows[0]) : null;
  }

  async findByCode(code: string): Promise<User | null> {
    const rows = await this.db.select().from(users).where(eq(users.publicCode, code)).limit(1);
    return rows.length > 0 ? toUser(rows[0]) : null;
  }

  async insertIfAbsent(user: User): Promise<boolean> {
    const inserted = await this.db
      .insert(users)
      .values({
        id: user.id,
        externalId: user.externalId,
        publicCode: user.publicCode,
        displayName: user.displayName,
        isActive: user.active,
        createdAt: user.createdAt,
      })
      .onConflictDoNothing()
      .returning({ id: users.id });
    return inserted.length > 0;
  }

  async updateDisplayName(id: string, displayName: string): Promise<void> {
    await this.db.update(users).set({ displayName }).where(eq(users.id, id));
  }
}
