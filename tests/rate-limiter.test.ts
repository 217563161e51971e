/**
 * Integration tests for the rate limiter & abuse control
 *
 * Defaults under test: 10 messages per 60-minute window,
 * spam threshold 20, auto-block for 24 hours.
 */

import { describe, it, expect, beforeAll, beforeEach, afterAll } from "vitest";
import type { RateLimitOutcome } from "../src/services/rateLimiter.js";
import {
  cleanDb,
  closeTestDb,
  createTestContext,
  initTestDb,
  type TestHarness,
} from "./setup.js";

let h: TestHarness;
const USER = "user-flood";

beforeAll(async () => {
  await initTestDb();
});

beforeEach(async () => {
  await cleanDb();
  h = createTestContext();
});

afterAll(async () => {
  await closeTestDb();
});

async function send(times: number, userId = USER): Promise<RateLimitOutcome[]> {
  const outcomes: RateLimitOutcome[] = [];
  for (let i = 0; i < times; i++) {
    outcomes.push(await h.ctx.limiter.check(userId));
  }
  return outcomes;
}

async function alertsOfType(type: string) {
  const alerts = await h.ctx.audit.unresolvedAlerts();
  return alerts.filter((a) => a.type === type);
}

describe("RateLimiter", () => {
  it("allows up to the limit within a window", async () => {
    const outcomes = await send(10);
    expect(outcomes.map((o) => o.kind)).toEqual(new Array(10).fill("allowed"));
    expect(outcomes[9]).toEqual({ kind: "allowed", count: 10 });
  });

  it("rate-limits the eleventh message", async () => {
    const outcomes = await send(11);
    expect(outcomes[10]).toEqual({ kind: "rate_limited", count: 11, limit: 10, nearSpam: false });
    expect(await alertsOfType("spam_attempt")).toHaveLength(0);
  });

  it("raises spam alerts as the count nears the threshold", async () => {
    const outcomes = await send(19);

    const near = outcomes.filter((o) => o.kind === "rate_limited" && o.nearSpam);
    expect(near).toHaveLength(5);

    const spam = await alertsOfType("spam_attempt");
    expect(spam.map((a) => a.details).sort()).toEqual([
      "Rate limit hit: 15 msgs",
      "Rate limit hit: 16 msgs",
      "Rate limit hit: 17 msgs",
      "Rate limit hit: 18 msgs",
      "Rate limit hit: 19 msgs",
    ]);
    expect(spam.every((a) => a.userId === USER)).toBe(true);
  });

  it("auto-blocks at the spam threshold with exactly one alert", async () => {
    const outcomes = await send(21);

    expect(outcomes[19]).toEqual({
      kind: "auto_blocked",
      until: "2026-01-06T10:00:00.000",
      count: 20,
    });
    expect(outcomes[20]).toEqual({ kind: "blocked", until: "2026-01-06T10:00:00.000" });

    const autoBlocks = await alertsOfType("auto_block");
    expect(autoBlocks).toHaveLength(1);
    expect(autoBlocks[0].details).toBe("Auto-blocked for spam: 20 msgs");
  });

  it("notifies the operator channel for each alert", async () => {
    await send(20);
    expect(h.transport.notifications).toHaveLength(6);
    expect(h.transport.notifications.every((n) => n.channel === "admin-chat")).toBe(true);
  });

  it("lifts an auto-block once it expires", async () => {
    await send(20);
    h.clock.advance(24 * 60 + 1);

    expect(await h.ctx.limiter.check(USER)).toEqual({ kind: "allowed", count: 1 });
    expect((await h.ctx.repositories.rateLimits.find(USER))?.isBlocked).toBe(false);
  });

  it("starts a new window only after the window has passed", async () => {
    await send(10);

    h.clock.advance(60);
    expect((await h.ctx.limiter.check(USER)).kind).toBe("rate_limited");

    h.clock.advance(1);
    expect(await h.ctx.limiter.check(USER)).toEqual({ kind: "allowed", count: 1 });
  });

  it("keeps users independent", async () => {
    await send(11);
    expect(await h.ctx.limiter.check("someone-else")).toEqual({ kind: "allowed", count: 1 });
  });

  it("serializes concurrent checks for one user", async () => {
    const outcomes = await Promise.all(
      Array.from({ length: 12 }, () => h.ctx.limiter.check(USER))
    );

    const counts = outcomes
      .map((o) => (o.kind === "allowed" || o.kind === "rate_limited" ? o.count : 0))
      .sort((a, b) => a - b);
    expect(counts).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
    expect(outcomes.filter((o) => o.kind === "allowed")).toHaveLength(10);
  });

  it("blocks and unblocks on request", async () => {
    const until = await h.ctx.limiter.block("quiet-user", 2);
    expect(until).toBe("2026-01-05T12:00:00.000");
    expect(await h.ctx.limiter.check("quiet-user")).toEqual({ kind: "blocked", until });

    await h.ctx.limiter.unblock("quiet-user");
    expect(await h.ctx.limiter.check("quiet-user")).toEqual({ kind: "allowed", count: 1 });
  });
});
