import { and, count, desc, eq, sql } from "drizzle-orm";
import type { Database } from "../db/index.js";
import { messages, type MessageRow } from "../db/schema.js";
import {
  MEDIA_KINDS,
  type MediaKind,
  type Message,
  type MessageContent,
  type MessageStatus,
  type Sentiment,
} from "../types.js";

export interface NewMessage {
  id: string;
  senderId: string;
  receiverId: string;
  content: MessageContent;
  status: MessageStatus;
  replyToId: string | null;
  sentiment: Sentiment;
  urgent: boolean;
  createdAt: string;
}

export interface MessageRepository {
  insert(message: NewMessage): Promise<Message>;
  findById(id: string): Promise<Message | null>;
  /**
   * Conditional status update keyed on the current value. Returns the
   * updated message, or null when the row was not in `from`.
   */
  transition(id: string, from: MessageStatus, to: MessageStatus): Promise<Message | null>;
  setPublishedRef(id: string, ref: string): Promise<void>;
  /** Flip is_read once. True only for the call that flipped it. */
  markRead(id: string, readAt: string): Promise<boolean>;
  listByStatus(status: MessageStatus, limit: number): Promise<Message[]>;
  listUrgentPending(limit: number): Promise<Message[]>;
  listInbox(receiverId: string, limit: number, offset: number): Promise<Message[]>;
  countApproved(by: { senderId: string } | { receiverId: string }): Promise<number>;
  countSentOnDay(senderId: string, day: string): Promise<number>;
}

const STATUSES: readonly MessageStatus[] = ["pending", "approved", "rejected"];
const SENTIMENTS: readonly Sentiment[] = ["positive", "neutral", "negative"];

function isMediaKind(value: string): value is MediaKind {
  return MEDIA_KINDS.some((kind) => kind === value);
}

function isStatus(value: string): value is MessageStatus {
  return STATUSES.some((status) => status === value);
}

function isSentiment(value: string): value is Sentiment {
  return SENTIMENTS.some((sentiment) => sentiment === value);
}

function toContent(row: MessageRow): MessageContent {
  if (row.mediaKind !== null && row.mediaFileRef !== null) {
    if (!isMediaKind(row.mediaKind)) {
      throw new Error(`Message ${row.id} has unknown media kind "${row.mediaKind}"`);
    }
    return { kind: "media", media: row.mediaKind, fileRef: row.mediaFileRef, caption: row.caption };
  }
  return { kind: "text", text: row.text ?? "" };
}

export function toMessage(row: MessageRow): Message {
  if (!isStatus(row.status)) {
    throw new Error(`Message ${row.id} has unknown status "${row.status}"`);
  }
  return {
    id: row.id,
    senderId: row.senderId,
    receiverId: row.receiverId,
    content: toContent(row),
    status: row.status,
    isRead: row.isRead,
    readAt: row.readAt,
    replyToId: row.replyToId,
    publishedRef: row.publishedRef,
    sentiment: row.sentiment !== null && isSentiment(row.sentiment) ? row.sentiment : null,
    urgent: row.isUrgent,
    createdAt: row.createdAt,
  };
}

export class DrizzleMessageRepository implements MessageRepository {
  constructor(private readonly db: Database) {}

  async insert(message: NewMessage): Promise<Message> {
    const { content } = message;
    const rows = await this.db
      .insert(messages)
      .values({
        id: message.id,
        senderId: message.senderId,
        receiverId: message.receiverId,
        text: content.kind === "text" ? content.text : null,
        mediaKind: content.kind === "media" ? content.media : null,
        mediaFileRef: content.kind === "media" ? content.fileRef : null,
        caption: content.kind === "media" ? content.caption : null,
        status: message.status,
        replyToId: message.replyToId,
        sentiment: message.sentiment,
        isUrgent: message.urgent,
        createdAt: message.createdAt,
      })
      .returning();
    return toMessage(rows[0]);
  }

  async findById(id: string): Promise<Message | null> {
    const rows = await this.db.select().from(messages).where(eq(messages.id, id)).limit(1);
    return rows.length > 0 ? toMessage(rows[0]) : null;
  }

  async transition(id: string, from: MessageStatus, to: MessageStatus): Promise<Message | null> {
    const rows = await this.db
      .update(messages)
      .set({ status: to })
      .where(and(eq(messages.id, id), eq(messages.status, from)))
      .returning();
    return rows.length > 0 ? toMessage(rows[0]) : null;
  }

  async setPublishedRef(id: string, ref: string): Promise<void> {
    await this.db
      .update(messages)
      .set({ publishedRef: ref })
      .where(and(eq(messages.id, id), sql`${messages.publishedRef} IS NULL`));
  }

  async markRead(id: string, readAt: string): Promise<boolean> {
    const rows = await this.db
      .update(messages)
      .set({ isRead: true, readAt })
      .where(and(eq(messages.id, id), eq(messages.isRead, false)))
      .returning({ id: messages.id });
    return rows.length > 0;
  }

  async listByStatus(status: MessageStatus, limit: number): Promise<Message[]> {
    const rows = await this.db
      .select()
      .from(messages)
      .where(eq(messages.status, status))
      .orderBy(messages.createdAt)
      .limit(limit);
    return rows.map(toMessage);
  }

  async listUrgentPending(limit: number): Promise<Message[]> {
    const rows = await this.db
      .select()
      .from(messages)
      .where(and(eq(messages.status, "pending"), eq(messages.isUrgent, true)))
      .orderBy(desc(messages.createdAt))
      .limit(limit);
    return rows.map(toMessage);
  }

  async listInbox(receiverId: string, limit: number, offset: number): Promise<Message[]> {
    const rows = await this.db
      .select()
      .from(messages)
      .where(and(eq(messages.receiverId, receiverId), eq(messages.status, "approved")))
      .orderBy(desc(messages.createdAt))
      .limit(limit)
      .offset(offset);
    return rows.map(toMessage);
  }

  async countApproved(by: { senderId: string } | { receiverId: string }): Promise<number> {
    const party =
      "senderId" in by ? eq(messages.senderId, by.senderId) : eq(messages.receiverId, by.receiverId);
    const rows = await this.db
      .select({ n: count() })
      .from(messages)
      .where(and(party, eq(messages.status, "approved")));
    return rows[0]?.n ?? 0;
  }

  async countSentOnDay(senderId: string, day: string): Promise<number> {
    const rows = await this.db
      .select({ n: count() })
      .from(messages)
      .where(and(eq(messages.senderId, senderId), sql`date(${messages.createdAt}) = ${day}`));
    return rows[0]?.n ?? 0;
  }
}
