import { and, desc, eq } from "drizzle-orm";
import type { Database } from "../db/index.js";
import { alerts, type AlertRow } from "../db/schema.js";
import type { Alert } from "../types.js";

export interface AlertRepository {
  insert(alert: Alert): Promise<void>;
  /** True when the alert existed and was still open. */
  resolve(id: string): Promise<boolean>;
  listUnresolved(): Promise<Alert[]>;
}

function toAlert(row: AlertRow): Alert {
  return {
    id: row.id,
    type: row.type,
    userId: row.userId,
    details: row.details,
    resolved: row.isResolved,
    createdAt: row.createdAt,
  };
}

export class DrizzleAlertRepository implements AlertRepository {
  constructor(private readonly db: Database) {}

  async insert(alert: Alert): Promise<void> {
    await this.db.insert(alerts).values({
      id: alert.id,
      type: alert.type,
      userId: alert.userId,
      details: alert.details,
      isResolved: alert.resolved,
      createdAt: alert.createdAt,
    });
  }

  async resolve(id: string): Promise<boolean> {
    const rows = await this.db
      .update(alerts)
      .set({ isResolved: true })
      .where(and(eq(alerts.id, id), eq(alerts.isResolved, false)))
      .returning({ id: alerts.id });
    return rows.length > 0;
  }

  async listUnresolved(): Promise<Alert[]> {
    const rows = await this.db
      .select()
      .from(alerts)
      .where(eq(alerts.isResolved, false))
      .orderBy(desc(alerts.createdAt));
    return rows.map(toAlert);
  }
}
