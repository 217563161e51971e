/**
 * Message relay — the moderation state machine and the orchestration
 * around it.
 *
 *   submit → rate limiter → classifier → create (pending | approved)
 *          → [urgent alert] → moderator decision → transition
 *          → publish / notify / anonymous delivery (reply token)
 *
 * A message leaves `pending` at most once. Every outbound call happens
 * after the state change is stored, outside any lock, and is attempted
 * once: a failed send is logged and dropped.
 */

import { randomUUID } from "crypto";
import {
  AlreadyProcessedError,
  DeliveryFailure,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from "../errors.js";
import { localDay, localTimestamp, systemClock, type Clock } from "../lib/time.js";
import type { MessageRepository } from "../repositories/messages.js";
import {
  anonymousView,
  contentText,
  type AnonymousMessage,
  type Message,
  type MessageContent,
  type ModerationAction,
  type User,
} from "../types.js";
import type { AuditLog } from "./audit.js";
import { replyPayload } from "./deepLink.js";
import type { IdentityRegistry } from "./identity.js";
import type { RateLimiter, RateLimitOutcome } from "./rateLimiter.js";
import type { ReplyTokenStore } from "./replyTokens.js";
import { classifyContent, classify, type Classifier } from "./sentiment.js";
import type { OutboundMessage, Transport } from "./transport.js";

export interface RelaySettings {
  moderationEnabled: boolean;
  deliverOnApprove: boolean;
  operatorExternalId: string;
  adminChannel: string;
  publishChannel: string | null;
}

export interface RelayDeps {
  messages: MessageRepository;
  identity: IdentityRegistry;
  replyTokens: ReplyTokenStore;
  limiter: RateLimiter;
  audit: AuditLog;
  transport: Transport;
  settings: RelaySettings;
  classifier?: Classifier;
  clock?: Clock;
}

/**
 * An inbound message. The target is either a user id from compose mode
 * or the reply token of a delivery the sender received.
 */
export interface InboundMessage {
  senderExternalId: string;
  displayName?: string | null;
  receiverId?: string | null;
  replyToken?: string | null;
  content: MessageContent;
  replyToId?: string | null;
}

export type SubmitOutcome =
  | { kind: "accepted"; message: Message }
  | Exclude<RateLimitOutcome, { kind: "allowed" }>;

export type AnswerChannel = "dm" | "public";

export interface InboxPage {
  messages: AnonymousMessage[];
  page: number;
  hasMore: boolean;
}

const INBOX_PAGE_SIZE = 5;
const EXCERPT_LENGTH = 200;

export const NOTICES = {
  approved: "✅ Your message was approved and published.",
  rejected: "❌ Your message was rejected by the moderator.",
  read: "👀 Your anonymous message was read.",
  blocked: (until: string) => `🚫 You are blocked until ${until}.`,
  unblocked: "✅ Your block was lifted.",
} as const;

function excerpt(content: MessageContent, length: number = EXCERPT_LENGTH): string {
  const text = contentText(content);
  if (text) return text.slice(0, length);
  return content.kind === "media" ? `[${content.media}]` : "";
}

export class MessageRelay {
  private readonly messages: MessageRepository;
  private readonly identity: IdentityRegistry;
  private readonly replyTokens: ReplyTokenStore;
  private readonly limiter: RateLimiter;
  private readonly audit: AuditLog;
  private readonly transport: Transport;
  private readonly settings: RelaySettings;
  private readonly classifier: Classifier;
  private readonly clock: Clock;

  constructor(deps: RelayDeps) {
    this.messages = deps.messages;
    this.identity = deps.identity;
    this.replyTokens = deps.replyTokens;
    this.limiter = deps.limiter;
    this.audit = deps.audit;
    this.transport = deps.transport;
    this.settings = deps.settings;
    this.classifier = deps.classifier ?? classify;
    this.clock = deps.clock ?? systemClock;
  }

  isOperator(user: User): boolean {
    return user.externalId === this.settings.operatorExternalId;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Inbound
  // ───────────────────────────────────────────────────────────────────────────

  async submit(input: InboundMessage): Promise<SubmitOutcome> {
    const sender = await this.identity.getOrCreate(input.senderExternalId, input.displayName);

    if (!this.isOperator(sender)) {
      const gate = await this.limiter.check(sender.id);
      if (gate.kind !== "allowed") return gate;
    }

    const receiverId = await this.resolveTarget(sender, input);
    const receiver = await this.identity.lookupById(receiverId);
    if (!receiver) throw new NotFoundError("Recipient");

    if (input.replyToId && !(await this.messages.findById(input.replyToId))) {
      throw new NotFoundError("Message");
    }

    const message = await this.create(sender.id, receiver.id, input.content, input.replyToId);

    if (message.status === "pending") {
      await this.forwardToModeration(message);
      return { kind: "accepted", message };
    }

    const published = await this.publish(message);
    await this.deliverAnonymous(message.id, message.receiverId, message.senderId);
    return { kind: "accepted", message: published };
  }

  /**
   * A reply token names the person who wrote to `sender`; it only works
   * for the receiver it was issued to.
   */
  private async resolveTarget(sender: User, input: InboundMessage): Promise<string> {
    if (input.replyToken && input.receiverId) {
      throw new ValidationError("Give either receiverId or replyToken, not both");
    }
    if (input.replyToken) {
      const pair = await this.replyTokens.resolve(input.replyToken);
      if (!pair) throw new NotFoundError("Reply token");
      if (pair.receiverId !== sender.id) {
        throw new ForbiddenError("Reply token was issued to another user");
      }
      return pair.senderId;
    }
    if (!input.receiverId) {
      throw new ValidationError("No conversation target");
    }
    return input.receiverId;
  }

  async create(
    senderId: string,
    receiverId: string,
    content: MessageContent,
    replyToId?: string | null
  ): Promise<Message> {
    const classification = classifyContent(content, this.classifier);
    const message = await this.messages.insert({
      id: randomUUID(),
      senderId,
      receiverId,
      content,
      status: this.settings.moderationEnabled ? "pending" : "approved",
      replyToId: replyToId ?? null,
      sentiment: classification.sentiment,
      urgent: classification.urgent,
      createdAt: localTimestamp(this.clock()),
    });

    if (classification.urgent) {
      const text = excerpt(content);
      await this.audit.raise(
        "urgent_message",
        senderId,
        `Message ${message.id}: ${text}`,
        `🔥 URGENT message\n\nID: ${message.id}\n${text}`
      );
    }

    return message;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Moderation
  // ───────────────────────────────────────────────────────────────────────────

  async transition(
    messageId: string,
    action: ModerationAction,
    moderatorId: string
  ): Promise<Message> {
    const target = action === "approve" ? "approved" : "rejected";
    const updated = await this.messages.transition(messageId, "pending", target);

    if (!updated) {
      const current = await this.messages.findById(messageId);
      if (!current) throw new NotFoundError("Message");
      throw new AlreadyProcessedError(messageId, current.status);
    }

    await this.audit.logModAction({
      moderatorId,
      action,
      messageId,
      targetUserId: updated.senderId,
    });

    if (action === "reject") {
      await this.notifyUser(updated.senderId, NOTICES.rejected);
      return updated;
    }

    const published = await this.publish(updated);
    await this.notifyUser(updated.senderId, NOTICES.approved);
    if (this.settings.deliverOnApprove) {
      await this.deliverAnonymous(updated.id, updated.receiverId, updated.senderId);
    }
    return published;
  }

  /**
   * Answer the sender of a message, privately or as a public reply
   * threaded under the published copy.
   */
  async answerSender(
    messageId: string,
    moderatorId: string,
    channel: AnswerChannel,
    text: string
  ): Promise<void> {
    const message = await this.requireMessage(messageId);
    const content: MessageContent = { kind: "text", text };

    if (channel === "dm") {
      const sender = await this.identity.requireById(message.senderId);
      await this.sendOrFail(sender.externalId, {
        heading: "💬 Message from the moderator:",
        content,
      });
      await this.audit.logModAction({
        moderatorId,
        action: "answer_dm",
        messageId,
        targetUserId: sender.id,
      });
      return;
    }

    const { publishChannel } = this.settings;
    if (!publishChannel) {
      throw new ValidationError("Publishing is not configured");
    }
    await this.sendOrFail(publishChannel, {
      heading: "👑 Moderator's answer:",
      content,
      replyToRef: message.publishedRef,
    });
    await this.audit.logModAction({ moderatorId, action: "answer_channel", messageId });
  }

  async blockUser(moderatorId: string, userId: string, hours: number): Promise<string> {
    const user = await this.identity.requireById(userId);
    const until = await this.limiter.block(user.id, hours);
    await this.audit.logModAction({
      moderatorId,
      action: "block",
      targetUserId: user.id,
      details: `${hours}h`,
    });
    await this.send(user.externalId, { content: { kind: "text", text: NOTICES.blocked(until) } }, "block notice");
    return until;
  }

  async unblockUser(moderatorId: string, userId: string): Promise<void> {
    const user = await this.identity.requireById(userId);
    await this.limiter.unblock(user.id);
    await this.audit.logModAction({ moderatorId, action: "unblock", targetUserId: user.id });
    await this.send(user.externalId, { content: { kind: "text", text: NOTICES.unblocked } }, "unblock notice");
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Receiver side
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Mark a message read. Only the first call has an effect; it sends a
   * read receipt when the message reached the reader through an
   * anonymous delivery (a reply token exists for the pair).
   */
  async markRead(messageId: string, readerId: string): Promise<void> {
    const message = await this.requireMessage(messageId);
    if (message.receiverId !== readerId) {
      throw new ForbiddenError("Only the recipient can mark a message read");
    }
    if (message.isRead) return;

    const flipped = await this.messages.markRead(messageId, localTimestamp(this.clock()));
    if (!flipped) return;

    const token = await this.replyTokens.findForPair(message.senderId, message.receiverId);
    if (token) {
      await this.notifyUser(message.senderId, NOTICES.read);
    }
  }

  /**
   * Deliver a message to its receiver without revealing the sender. A
   * fresh reply token rides along as the deep-link payload so the
   * receiver's answer can be routed back.
   */
  async deliverAnonymous(messageId: string, receiverId: string, senderId: string): Promise<void> {
    const message = await this.requireMessage(messageId);
    const receiver = await this.identity.requireById(receiverId);
    const token = await this.replyTokens.issue(senderId, receiverId);

    await this.send(
      receiver.externalId,
      {
        heading: message.replyToId ? "↩️ Anonymous reply:" : "📨 Anonymous message:",
        content: message.content,
        deepLink: replyPayload(token),
      },
      "anonymous delivery"
    );
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────────

  pendingQueue(limit = 20): Promise<Message[]> {
    return this.messages.listByStatus("pending", limit);
  }

  urgentPending(limit = 10): Promise<Message[]> {
    return this.messages.listUrgentPending(limit);
  }

  async inbox(userId: string, page = 0): Promise<InboxPage> {
    const rows = await this.messages.listInbox(
      userId,
      INBOX_PAGE_SIZE + 1,
      page * INBOX_PAGE_SIZE
    );
    return {
      messages: rows.slice(0, INBOX_PAGE_SIZE).map(anonymousView),
      page,
      hasMore: rows.length > INBOX_PAGE_SIZE,
    };
  }

  async userStats(userId: string): Promise<{ received: number; sent: number }> {
    const [received, sent] = await Promise.all([
      this.messages.countApproved({ receiverId: userId }),
      this.messages.countApproved({ senderId: userId }),
    ]);
    return { received, sent };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Outbound helpers
  // ───────────────────────────────────────────────────────────────────────────

  private async requireMessage(id: string): Promise<Message> {
    const message = await this.messages.findById(id);
    if (!message) throw new NotFoundError("Message");
    return message;
  }

  private async forwardToModeration(message: Message): Promise<void> {
    const sentToday = await this.messages.countSentOnDay(message.senderId, localDay(this.clock()));
    const footer = [
      `ID: ${message.id} | from: ${message.senderId}`,
      `today: ${sentToday} | ${message.sentiment ?? "neutral"}`,
      message.replyToId ? `reply to: ${message.replyToId}` : null,
    ]
      .filter((part): part is string => part !== null)
      .join(" | ");

    const heading = [
      message.urgent ? "🔥 URGENT!" : null,
      message.replyToId ? "↩️ Reply for moderation" : "📨 New message for moderation",
    ]
      .filter((part): part is string => part !== null)
      .join("\n");

    await this.send(
      this.settings.adminChannel,
      { heading, content: message.content, footer },
      "moderation forward"
    );
  }

  /** Publish an approved message, threaded under its parent's published copy. */
  private async publish(message: Message): Promise<Message> {
    const { publishChannel } = this.settings;
    if (!publishChannel) return message;

    let parentRef: string | null = null;
    if (message.replyToId) {
      const parent = await this.messages.findById(message.replyToId);
      parentRef = parent?.publishedRef ?? null;
    }

    const ref = await this.send(
      publishChannel,
      {
        heading: message.replyToId ? "↩️ Reply:" : "📨 Anonymous message:",
        content: message.content,
        replyToRef: parentRef,
      },
      "publish"
    );
    if (!ref) return message;

    await this.messages.setPublishedRef(message.id, ref);
    return { ...message, publishedRef: ref };
  }

  private async notifyUser(userId: string, text: string): Promise<void> {
    const user = await this.identity.lookupById(userId);
    if (!user) {
      console.error(`Relay: cannot notify unknown user ${userId}`);
      return;
    }
    await this.send(user.externalId, { content: { kind: "text", text } }, "notification");
  }

  private async send(target: string, message: OutboundMessage, what: string): Promise<string | null> {
    try {
      return await this.transport.deliver(target, message);
    } catch (err) {
      console.error(`Relay: ${what} to ${target} failed:`, err);
      return null;
    }
  }

  private async sendOrFail(target: string, message: OutboundMessage): Promise<string | null> {
    try {
      return await this.transport.deliver(target, message);
    } catch (err) {
      if (err instanceof DeliveryFailure) throw err;
      throw new DeliveryFailure(`Delivery to ${target} failed`, err);
    }
  }
}
