/**
 * Identity registry — platform identity ↔ internal user ↔ public code.
 */

import { randomInt, randomUUID } from "crypto";
import { NotFoundError } from "../errors.js";
import { localTimestamp, systemClock, type Clock } from "../lib/time.js";
import type { UserRepository } from "../repositories/users.js";
import type { User } from "../types.js";

const ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";
const CODE_LENGTH = 8;
const MAX_CREATE_ATTEMPTS = 10;

export function generateCode(length: number = CODE_LENGTH): string {
  let code = "";
  for (let i = 0; i < length; i++) {
    code += ALPHABET[randomInt(ALPHABET.length)];
  }
  return code;
}

export class IdentityRegistry {
  constructor(
    private readonly users: UserRepository,
    private readonly newCode: () => string = generateCode,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Return the user for `externalId`, creating it on first contact.
   * Refreshes the display name when a different one is supplied.
   */
  async getOrCreate(externalId: string, displayName?: string | null): Promise<User> {
    const existing = await this.users.findByExternalId(externalId);
    if (existing) {
      if (displayName && existing.displayName !== displayName) {
        await this.users.updateDisplayName(existing.id, displayName);
        return { ...existing, displayName };
      }
      return existing;
    }

    for (let attempt = 0; attempt < MAX_CREATE_ATTEMPTS; attempt++) {
      let code = this.newCode();
      while (await this.users.findByCode(code)) {
        code = this.newCode();
      }

      const user: User = {
        id: randomUUID(),
        externalId,
        publicCode: code,
        displayName: displayName ?? null,
        active: true,
        createdAt: localTimestamp(this.clock()),
      };
      if (await this.users.insertIfAbsent(user)) {
        return user;
      }

      // Lost a race: either the same person was registered concurrently,
      // or the code was taken between the check and the insert.
      const raced = await this.users.findByExternalId(externalId);
      if (raced) return raced;
    }

    throw new Error(`Could not allocate a public code for ${externalId}`);
  }

  lookupByCode(code: string): Promise<User | null> {
    return this.users.findByCode(code);
  }

  lookupById(id: string): Promise<User | null> {
    return this.users.findById(id);
  }

  async requireById(id: string): Promise<User> {
    const user = await this.users.findById(id);
    if (!user) throw new NotFoundError("User");
    return user;
  }
}
