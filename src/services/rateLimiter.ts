/**
 * Rate limiter & abuse control.
 *
 * One row per user: a fixed window that opens on the first message and a
 * counter of attempts inside it. Escalation:
 *
 *   count ≤ maxMessages              allowed
 *   maxMessages < count < threshold  rate_limited (spam_attempt alert from threshold − 5)
 *   count ≥ spamThreshold            auto_blocked for autoBlockHours (auto_block alert)
 *
 * Denied attempts still advance the counter, so a flood climbs the ladder.
 * The read-modify-write of one user's row is serialized per user; alerts
 * go out after the lock is released.
 */

import type { RateLimitConfig } from "../config.js";
import { KeyedLock } from "../lib/keyedLock.js";
import { addMinutes, localTimestamp, parseTimestamp, systemClock, type Clock } from "../lib/time.js";
import type { RateLimitRepository } from "../repositories/rateLimits.js";
import type { AuditLog } from "./audit.js";

export type RateLimitOutcome =
  | { kind: "allowed"; count: number }
  | { kind: "rate_limited"; count: number; limit: number; nearSpam: boolean }
  | { kind: "blocked"; until: string }
  | { kind: "auto_blocked"; until: string; count: number };

export class RateLimiter {
  private readonly lock = new KeyedLock();

  constructor(
    private readonly repo: RateLimitRepository,
    private readonly limits: RateLimitConfig,
    private readonly audit: AuditLog,
    private readonly clock: Clock = systemClock
  ) {}

  async check(userId: string): Promise<RateLimitOutcome> {
    const outcome = await this.lock.run(userId, () => this.evaluate(userId));

    if (outcome.kind === "rate_limited" && outcome.nearSpam) {
      await this.audit.raise(
        "spam_attempt",
        userId,
        `Rate limit hit: ${outcome.count} msgs`,
        `⚠️ Suspicious activity: user ${userId} hit the rate limit (${outcome.count} messages)`
      );
    } else if (outcome.kind === "auto_blocked") {
      await this.audit.raise(
        "auto_block",
        userId,
        `Auto-blocked for spam: ${outcome.count} msgs`,
        `🚫 Auto-block: user ${userId} blocked until ${outcome.until} (${outcome.count} messages)`
      );
    }

    return outcome;
  }

  /** Block a user for `hours`, returning the local timestamp the block ends. */
  async block(userId: string, hours: number): Promise<string> {
    return this.lock.run(userId, async () => {
      const now = this.clock();
      const until = localTimestamp(addMinutes(now, hours * 60));
      await this.repo.upsertBlock(userId, until, localTimestamp(now));
      return until;
    });
  }

  /** Lift a block and start a fresh window. */
  async unblock(userId: string): Promise<void> {
    await this.lock.run(userId, () =>
      this.repo.update(userId, {
        isBlocked: false,
        blockedUntil: null,
        messageCount: 0,
        windowStart: localTimestamp(this.clock()),
      })
    );
  }

  private async evaluate(userId: string): Promise<RateLimitOutcome> {
    const now = this.clock();
    const nowStamp = localTimestamp(now);
    const state = await this.repo.find(userId);

    if (!state) {
      const inserted = await this.repo.insertIfAbsent({
        userId,
        windowStart: nowStamp,
        messageCount: 1,
        isBlocked: false,
        blockedUntil: null,
      });
      if (inserted) return { kind: "allowed", count: 1 };
      // Another process created the row first; evaluate against it.
      return this.evaluate(userId);
    }

    if (state.isBlocked) {
      if (state.blockedUntil !== null && now < parseTimestamp(state.blockedUntil)) {
        return { kind: "blocked", until: state.blockedUntil };
      }
      await this.repo.update(userId, {
        isBlocked: false,
        blockedUntil: null,
        messageCount: 1,
        windowStart: nowStamp,
      });
      return { kind: "allowed", count: 1 };
    }

    const windowEnds = addMinutes(parseTimestamp(state.windowStart), this.limits.windowMinutes);
    if (now > windowEnds) {
      await this.repo.update(userId, { messageCount: 1, windowStart: nowStamp });
      return { kind: "allowed", count: 1 };
    }

    const count = state.messageCount + 1;
    const { maxMessages, spamThreshold, autoBlockHours } = this.limits;

    if (count >= spamThreshold) {
      const until = localTimestamp(addMinutes(now, autoBlockHours * 60));
      await this.repo.update(userId, { messageCount: count, isBlocked: true, blockedUntil: until });
      return { kind: "auto_blocked", until, count };
    }

    await this.repo.update(userId, { messageCount: count });

    if (count > maxMessages) {
      return {
        kind: "rate_limited",
        count,
        limit: maxMessages,
        nearSpam: count >= spamThreshold - 5,
      };
    }
    return { kind: "allowed", count };
  }
}
