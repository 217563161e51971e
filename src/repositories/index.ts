import type { Database } from "../db/index.js";
import { DrizzleAlertRepository, type AlertRepository } from "./alerts.js";
import { DrizzleMessageRepository, type MessageRepository } from "./messages.js";
import { DrizzleModLogRepository, type ModLogRepository } from "./modLog.js";
import { DrizzleRateLimitRepository, type RateLimitRepository } from "./rateLimits.js";
import { DrizzleReplyTokenRepository, type ReplyTokenRepository } from "./replyTokens.js";
import { DrizzleUserRepository, type UserRepository } from "./users.js";

export interface Repositories {
  users: UserRepository;
  messages: MessageRepository;
  replyTokens: ReplyTokenRepository;
  rateLimits: RateLimitRepository;
  alerts: AlertRepository;
  modLog: ModLogRepository;
}

export function createRepositories(db: Database): Repositories {
  return {
    users: new DrizzleUserRepository(db),
    messages: new DrizzleMessageRepository(db),
    replyTokens: new DrizzleReplyTokenRepository(db),
    rateLimits: new DrizzleRateLimitRepository(db),
    alerts: new DrizzleAlertRepository(db),
    modLog: new DrizzleModLogRepository(db),
  };
}

export type { AlertRepository, MessageRepository, ModLogRepository, RateLimitRepository, ReplyTokenRepository, UserRepository };
