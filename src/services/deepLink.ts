/**
 * Deep-link payloads carried opaquely by the front-end.
 *
 *   <publicCode>   start an anonymous conversation addressed to that user
 *   r_<token>      answer the sender behind a reply token
 *
 * Anything else falls back to onboarding.
 */

import type { User } from "../types.js";
import type { IdentityRegistry } from "./identity.js";
import type { ReplyTokenStore } from "./replyTokens.js";

export const REPLY_PREFIX = "r_";

const PAYLOAD = /^[A-Za-z0-9_-]{1,64}$/;

export type DeepLink =
  | { kind: "reply"; token: string }
  | { kind: "code"; code: string }
  | { kind: "invalid" };

export type DeepLinkResolution =
  | { mode: "reply"; token: string }
  | { mode: "compose"; targetId: string }
  | { mode: "self" }
  | { mode: "onboarding" };

export function replyPayload(token: string): string {
  return `${REPLY_PREFIX}${token}`;
}

export function composePayload(user: User): string {
  return user.publicCode;
}

export function parseDeepLink(payload: string | null | undefined): DeepLink {
  if (!payload || !PAYLOAD.test(payload)) return { kind: "invalid" };
  if (payload.startsWith(REPLY_PREFIX)) {
    const token = payload.slice(REPLY_PREFIX.length);
    return token ? { kind: "reply", token } : { kind: "invalid" };
  }
  return { kind: "code", code: payload };
}

export function shareLink(baseUrl: string | null, user: User): string | null {
  if (!baseUrl) return null;
  const url = new URL(baseUrl);
  url.searchParams.set("start", composePayload(user));
  return url.toString();
}

export class DeepLinkResolver {
  constructor(
    private readonly identity: IdentityRegistry,
    private readonly tokens: ReplyTokenStore,
    private readonly operatorExternalId: string
  ) {}

  async resolve(payload: string | null | undefined, viewer: User): Promise<DeepLinkResolution> {
    const link = parseDeepLink(payload);

    switch (link.kind) {
      case "reply": {
        // Only the receiver of the delivery may answer through it. The
        // sender stays behind the token; submit resolves it again.
        const pair = await this.tokens.resolve(link.token);
        return pair && pair.receiverId === viewer.id
          ? { mode: "reply", token: link.token }
          : { mode: "onboarding" };
      }
      case "code":
        return this.resolveCode(link.code, viewer);
      case "invalid":
        return { mode: "onboarding" };
    }
  }

  private async resolveCode(code: string, viewer: User): Promise<DeepLinkResolution> {
    const target = await this.identity.lookupByCode(code);
    if (!target) return { mode: "onboarding" };
    if (target.id === viewer.id && viewer.externalId !== this.operatorExternalId) {
      return { mode: "self" };
    }
    return { mode: "compose", targetId: target.id };
  }
}
