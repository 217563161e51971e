/**
 * Reply token store.
 *
 * A token correlates the (sender, receiver) pair of an anonymous delivery
 * so the receiver can answer without either side seeing the other's
 * identity. Tokens are lookup-only: resolving one does not consume it and
 * nothing expires them.
 */

import { createHash, randomBytes } from "crypto";
import { localTimestamp, systemClock, type Clock } from "../lib/time.js";
import type { ReplyTokenRepository } from "../repositories/replyTokens.js";
import type { ReplyToken } from "../types.js";

export const TOKEN_LENGTH = 8;
const MAX_ISSUE_ATTEMPTS = 5;

export function deriveToken(senderId: string, receiverId: string, salt: string): string {
  return createHash("sha256")
    .update(`${senderId}:${receiverId}:${salt}`)
    .digest("hex")
    .slice(0, TOKEN_LENGTH);
}

export interface ReplyPair {
  senderId: string;
  receiverId: string;
}

export class ReplyTokenStore {
  constructor(
    private readonly tokens: ReplyTokenRepository,
    private readonly clock: Clock = systemClock
  ) {}

  async issue(senderId: string, receiverId: string): Promise<string> {
    for (let attempt = 0; attempt < MAX_ISSUE_ATTEMPTS; attempt++) {
      const hash = deriveToken(senderId, receiverId, randomBytes(4).toString("hex"));
      const stored = await this.tokens.insertIfAbsent({
        hash,
        senderId,
        receiverId,
        createdAt: localTimestamp(this.clock()),
      });
      if (stored) return hash;
    }
    throw new Error("Could not issue a unique reply token");
  }

  async resolve(hash: string): Promise<ReplyPair | null> {
    const token = await this.tokens.findByHash(hash);
    return token ? { senderId: token.senderId, receiverId: token.receiverId } : null;
  }

  findForPair(senderId: string, receiverId: string): Promise<ReplyToken | null> {
    return this.tokens.findLatestForPair(senderId, receiverId);
  }
}
