import { desc } from "drizzle-orm";
import type { Database } from "../db/index.js";
import { modLog } from "../db/schema.js";
import type { ModLogEntry } from "../types.js";

export interface ModLogRepository {
  append(entry: ModLogEntry): Promise<void>;
  latest(limit: number): Promise<ModLogEntry[]>;
}

export class DrizzleModLogRepository implements ModLogRepository {
  constructor(private readonly db: Database) {}

  async append(entry: ModLogEntry): Promise<void> {
    await this.db.insert(modLog).values(entry);
  }

  async latest(limit: number): Promise<ModLogEntry[]> {
    return this.db.select().from(modLog).orderBy(desc(modLog.createdAt)).limit(limit);
  }
}
