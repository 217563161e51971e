/**
 * Unit tests for environment configuration
 */

import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});
    expect(config.port).toBe(3002);
    expect(config.operatorExternalId).toBe("operator");
    expect(config.adminChannel).toBe("operator");
    expect(config.publishChannel).toBeNull();
    expect(config.transportUrl).toBeNull();
    expect(config.rateLimit).toEqual({
      maxMessages: 10,
      windowMinutes: 60,
      spamThreshold: 20,
      autoBlockHours: 24,
    });
    expect(config.moderationEnabled).toBe(true);
    expect(config.deliverOnApprove).toBe(true);
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      PORT: "8081",
      OPERATOR_EXTERNAL_ID: "42",
      ADMIN_CHANNEL: "-100200",
      PUBLISH_CHANNEL: "@channel",
      RATE_LIMIT_MESSAGES: "3",
      MODERATION_ENABLED: "false",
    });
    expect(config.port).toBe(8081);
    expect(config.adminChannel).toBe("-100200");
    expect(config.publishChannel).toBe("@channel");
    expect(config.rateLimit.maxMessages).toBe(3);
    expect(config.moderationEnabled).toBe(false);
  });

  it("treats empty optional values as unset", () => {
    const config = loadConfig({ PUBLISH_CHANNEL: "", JWT_ISSUER: "" });
    expect(config.publishChannel).toBeNull();
    expect(config.jwtIssuer).toBeNull();
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ RATE_LIMIT_MESSAGES: "many" })).toThrow(
      /Environment validation failed/
    );
    expect(() => loadConfig({ MODERATION_ENABLED: "yes" })).toThrow();
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});
