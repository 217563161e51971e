/**
 * Audit service — alerts for the operator and the append-only moderation log.
 *
 * Writes here never fail the operation that triggered them: a storage or
 * notification error is logged and swallowed, and nothing is retried.
 */

import { randomUUID } from "crypto";
import { localTimestamp, systemClock, type Clock } from "../lib/time.js";
import type { AlertRepository } from "../repositories/alerts.js";
import type { ModLogRepository } from "../repositories/modLog.js";
import type { Alert, AlertType, ModLogAction, ModLogEntry } from "../types.js";
import type { Transport } from "./transport.js";

export interface ModActionEntry {
  moderatorId: string;
  action: ModLogAction;
  messageId?: string | null;
  targetUserId?: string | null;
  details?: string | null;
}

export type ResolveAlertOutcome = "resolved" | "not_open" | "failed";

export class AuditLog {
  constructor(
    private readonly alerts: AlertRepository,
    private readonly modLog: ModLogRepository,
    private readonly transport: Transport,
    private readonly adminChannel: string,
    private readonly clock: Clock = systemClock
  ) {}

  /** Returns the alert id, or null when the write failed. */
  async createAlert(
    type: AlertType,
    userId?: string | null,
    details?: string | null
  ): Promise<string | null> {
    const alert: Alert = {
      id: randomUUID(),
      type,
      userId: userId ?? null,
      details: details ?? null,
      resolved: false,
      createdAt: localTimestamp(this.clock()),
    };
    try {
      await this.alerts.insert(alert);
      return alert.id;
    } catch (err) {
      console.error(`Create alert (${type}) error:`, err);
      return null;
    }
  }

  /** `not_open` for unknown or already resolved alerts; `failed` when storage errored. */
  async resolveAlert(id: string): Promise<ResolveAlertOutcome> {
    try {
      return (await this.alerts.resolve(id)) ? "resolved" : "not_open";
    } catch (err) {
      console.error("Resolve alert error:", err);
      return "failed";
    }
  }

  async logModAction(entry: ModActionEntry): Promise<void> {
    const row: ModLogEntry = {
      id: randomUUID(),
      moderatorId: entry.moderatorId,
      action: entry.action,
      messageId: entry.messageId ?? null,
      targetUserId: entry.targetUserId ?? null,
      details: entry.details ?? null,
      createdAt: localTimestamp(this.clock()),
    };
    try {
      await this.modLog.append(row);
    } catch (err) {
      console.error(`Mod log (${entry.action}) error:`, err);
    }
  }

  async notifyOperator(text: string): Promise<void> {
    try {
      await this.transport.notify(this.adminChannel, text);
    } catch (err) {
      console.error("Operator notification error:", err);
    }
  }

  /** Record an alert and tell the operator about it. */
  async raise(
    type: AlertType,
    userId: string | null,
    details: string,
    notice: string
  ): Promise<string | null> {
    const id = await this.createAlert(type, userId, details);
    await this.notifyOperator(notice);
    return id;
  }

  unresolvedAlerts(): Promise<Alert[]> {
    return this.alerts.listUnresolved();
  }

  latestActions(limit: number): Promise<ModLogEntry[]> {
    return this.modLog.latest(limit);
  }
}
