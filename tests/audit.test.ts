/**
 * Unit tests for the alert & moderation log
 *
 * Storage and notification failures must never escape.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import type { AlertRepository } from "../src/repositories/alerts.js";
import type { ModLogRepository } from "../src/repositories/modLog.js";
import { AuditLog } from "../src/services/audit.js";
import { createFakeTransport, createManualClock } from "./setup.js";

function createMockAlerts(overrides: Partial<AlertRepository> = {}): AlertRepository {
  return {
    insert: vi.fn(async () => {}),
    resolve: vi.fn(async () => true),
    listUnresolved: vi.fn(async () => []),
    ...overrides,
  };
}

function createMockModLog(overrides: Partial<ModLogRepository> = {}): ModLogRepository {
  return {
    append: vi.fn(async () => {}),
    latest: vi.fn(async () => []),
    ...overrides,
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("AuditLog", () => {
  it("stores an alert with the current time", async () => {
    const alerts = createMockAlerts();
    const audit = new AuditLog(
      alerts,
      createMockModLog(),
      createFakeTransport(),
      "admin-chat",
      createManualClock().now
    );

    const id = await audit.createAlert("spam_attempt", "user-1", "Rate limit hit: 15 msgs");

    expect(id).toEqual(expect.any(String));
    expect(alerts.insert).toHaveBeenCalledWith({
      id,
      type: "spam_attempt",
      userId: "user-1",
      details: "Rate limit hit: 15 msgs",
      resolved: false,
      createdAt: "2026-01-05T10:00:00.000",
    });
  });

  it("returns null when the alert cannot be stored", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});
    const audit = new AuditLog(
      createMockAlerts({ insert: vi.fn(async () => Promise.reject(new Error("disk full"))) }),
      createMockModLog(),
      createFakeTransport(),
      "admin-chat"
    );

    await expect(audit.createAlert("urgent_message")).resolves.toBeNull();
    expect(errors).toHaveBeenCalledWith("Create alert (urgent_message) error:", expect.any(Error));
  });

  it("swallows mod log failures", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const audit = new AuditLog(
      createMockAlerts(),
      createMockModLog({ append: vi.fn(async () => Promise.reject(new Error("locked"))) }),
      createFakeTransport(),
      "admin-chat"
    );

    await expect(
      audit.logModAction({ moderatorId: "mod-1", action: "approve", messageId: "m-1" })
    ).resolves.toBeUndefined();
  });

  it("still notifies the operator when the alert write fails", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const transport = createFakeTransport();
    const audit = new AuditLog(
      createMockAlerts({ insert: vi.fn(async () => Promise.reject(new Error("disk full"))) }),
      createMockModLog(),
      transport,
      "admin-chat"
    );

    await audit.raise("auto_block", "user-1", "Auto-blocked for spam: 20 msgs", "blocked!");

    expect(transport.notifications).toEqual([{ channel: "admin-chat", text: "blocked!" }]);
  });

  it("swallows notification failures", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const transport = createFakeTransport();
    transport.notify.mockRejectedValueOnce(new Error("offline"));
    const audit = new AuditLog(createMockAlerts(), createMockModLog(), transport, "admin-chat");

    await expect(audit.notifyOperator("hello")).resolves.toBeUndefined();
  });

  it("reports how resolving an alert went", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const resolve = vi
      .fn<(id: string) => Promise<boolean>>()
      .mockResolvedValueOnce(true)
      .mockResolvedValueOnce(false)
      .mockRejectedValueOnce(new Error("disk full"));
    const audit = new AuditLog(
      createMockAlerts({ resolve }),
      createMockModLog(),
      createFakeTransport(),
      "admin-chat"
    );

    expect(await audit.resolveAlert("a-1")).toBe("resolved");
    expect(await audit.resolveAlert("a-1")).toBe("not_open");
    expect(await audit.resolveAlert("a-1")).toBe("failed");
  });
});
