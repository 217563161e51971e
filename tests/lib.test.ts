/**
 * Unit tests for the keyed lock and local-time helpers
 */

import { describe, it, expect } from "vitest";
import { KeyedLock } from "../src/lib/keyedLock.js";
import { addMinutes, localDay, localTimestamp, parseTimestamp } from "../src/lib/time.js";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe("KeyedLock", () => {
  it("runs work for the same key one at a time", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const job = (name: string) =>
      lock.run("user-1", async () => {
        events.push(`${name}:start`);
        await tick();
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([job("a"), job("b"), job("c")]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("lets different keys interleave", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all(
      ["x", "y"].map((key) =>
        lock.run(key, async () => {
          events.push(`${key}:start`);
          await tick();
          events.push(`${key}:end`);
        })
      )
    );

    expect(events.slice(0, 2).sort()).toEqual(["x:start", "y:start"]);
  });

  it("releases the key when work throws", async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run("k", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    await expect(lock.run("k", async () => "next")).resolves.toBe("next");
    expect(lock.size).toBe(0);
  });
});

describe("local time helpers", () => {
  it("formats without an offset", () => {
    const date = new Date(2026, 2, 7, 9, 5, 3, 42);
    expect(localTimestamp(date)).toBe("2026-03-07T09:05:03.042");
    expect(localDay(date)).toBe("2026-03-07");
  });

  it("parses its own output back to the same instant", () => {
    const date = new Date(2026, 10, 30, 23, 59, 59, 999);
    expect(parseTimestamp(localTimestamp(date)).getTime()).toBe(date.getTime());
  });

  it("adds minutes", () => {
    const date = new Date(2026, 0, 1, 23, 30);
    expect(localTimestamp(addMinutes(date, 45))).toBe("2026-01-02T00:15:00.000");
  });
});
