/**
 * Analytics — read-only grouped counts over the message log, for a
 * reporting or charting collaborator. Days and hours are the host's local
 * time, as stored.
 */

import { and, count, eq, gt, isNotNull, sql, type SQL } from "drizzle-orm";
import type { Database } from "../db/index.js";
import { messages } from "../db/schema.js";
import { addMinutes, localDay, localTimestamp, systemClock, type Clock } from "../lib/time.js";

export const HOURS_PER_DAY = 24;
export const DAYS_PER_WEEK = 7;

/** 7 × 24 counts; row 0 is Monday. */
export type WeekGrid = number[][];

export interface AnalyticsSummary {
  total: number;
  today: number;
  week: number;
  pending: number;
  urgentPending: number;
  sentiments: Record<string, number>;
  peakHour: number | null;
}

const hourOf = sql`cast(strftime('%H', ${messages.createdAt}) as integer)`.mapWith(Number);
const weekdayOf = sql`cast(strftime('%w', ${messages.createdAt}) as integer)`.mapWith(Number);
const dayOf = sql`date(${messages.createdAt})`.mapWith(String);

export function emptyWeekGrid(): WeekGrid {
  return Array.from({ length: DAYS_PER_WEEK }, () => new Array<number>(HOURS_PER_DAY).fill(0));
}

export class AnalyticsAggregator {
  constructor(
    private readonly db: Database,
    private readonly clock: Clock = systemClock
  ) {}

  private since(days: number): string {
    return localTimestamp(addMinutes(this.clock(), -days * 24 * 60));
  }

  async byStatus(): Promise<Record<string, number>> {
    const rows = await this.db
      .select({ status: messages.status, n: count() })
      .from(messages)
      .groupBy(messages.status);
    return Object.fromEntries(rows.map((r) => [r.status, r.n]));
  }

  async bySentiment(): Promise<Record<string, number>> {
    const rows = await this.db
      .select({ sentiment: messages.sentiment, n: count() })
      .from(messages)
      .where(isNotNull(messages.sentiment))
      .groupBy(messages.sentiment);
    return Object.fromEntries(rows.map((r) => [r.sentiment ?? "neutral", r.n]));
  }

  /** Messages per hour of day over the last `days` days. */
  async hourly(days = 7): Promise<number[]> {
    const rows = await this.db
      .select({ hour: hourOf, n: count() })
      .from(messages)
      .where(gt(messages.createdAt, this.since(days)))
      .groupBy(hourOf);

    const hours = new Array<number>(HOURS_PER_DAY).fill(0);
    for (const { hour, n } of rows) {
      if (hour >= 0 && hour < HOURS_PER_DAY) hours[hour] = n;
    }
    return hours;
  }

  /** Day-of-week × hour-of-day grid over the last `days` days. */
  async weekly(days = 30): Promise<WeekGrid> {
    const rows = await this.db
      .select({ weekday: weekdayOf, hour: hourOf, n: count() })
      .from(messages)
      .where(gt(messages.createdAt, this.since(days)))
      .groupBy(weekdayOf, hourOf);

    const grid = emptyWeekGrid();
    for (const { weekday, hour, n } of rows) {
      // SQLite counts Sunday as 0
      const row = (weekday + 6) % DAYS_PER_WEEK;
      if (hour >= 0 && hour < HOURS_PER_DAY) grid[row][hour] = n;
    }
    return grid;
  }

  /** Messages per local day over the last `days` days, oldest first. */
  async daily(days = 30): Promise<{ day: string; count: number }[]> {
    const rows = await this.db
      .select({ day: dayOf, n: count() })
      .from(messages)
      .where(gt(messages.createdAt, this.since(days)))
      .groupBy(dayOf)
      .orderBy(dayOf);
    return rows.map((r) => ({ day: r.day, count: r.n }));
  }

  async summary(): Promise<AnalyticsSummary> {
    const total = await this.countWhere();
    const today = await this.countWhere(sql`date(${messages.createdAt}) = ${localDay(this.clock())}`);
    const week = await this.countWhere(gt(messages.createdAt, this.since(7)));
    const pending = await this.countWhere(eq(messages.status, "pending"));
    const urgentPending = await this.countWhere(
      and(eq(messages.status, "pending"), eq(messages.isUrgent, true))
    );

    const hourRows = await this.db
      .select({ hour: hourOf, n: count() })
      .from(messages)
      .groupBy(hourOf);
    let peakHour: number | null = null;
    let peak = 0;
    for (const { hour, n } of hourRows) {
      if (n > peak || (n === peak && peakHour !== null && hour < peakHour)) {
        peak = n;
        peakHour = hour;
      }
    }

    return {
      total,
      today,
      week,
      pending,
      urgentPending,
      sentiments: await this.bySentiment(),
      peakHour,
    };
  }

  private async countWhere(condition?: SQL): Promise<number> {
    const rows = await this.db.select({ n: count() }).from(messages).where(condition);
    return rows[0]?.n ?? 0;
  }
}
