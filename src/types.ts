/**
 * Domain types shared by the services and routes.
 */

export const MEDIA_KINDS = [
  "photo",
  "video",
  "voice",
  "video_note",
  "audio",
  "document",
  "sticker",
  "animation",
] as const;

export type MediaKind = (typeof MEDIA_KINDS)[number];

export type MessageContent =
  | { kind: "text"; text: string }
  | { kind: "media"; media: MediaKind; fileRef: string; caption: string | null };

export type MessageStatus = "pending" | "approved" | "rejected";

export type Sentiment = "positive" | "neutral" | "negative";

export type ModerationAction = "approve" | "reject";

export interface User {
  id: string;
  externalId: string;
  publicCode: string;
  displayName: string | null;
  active: boolean;
  createdAt: string;
}

export interface Message {
  id: string;
  senderId: string;
  receiverId: string;
  content: MessageContent;
  status: MessageStatus;
  isRead: boolean;
  readAt: string | null;
  replyToId: string | null;
  publishedRef: string | null;
  sentiment: Sentiment | null;
  urgent: boolean;
  createdAt: string;
}

/**
 * A message without the identities of either party, as shown to its
 * sender or receiver.
 */
export type AnonymousMessage = Omit<Message, "senderId" | "receiverId" | "publishedRef">;

export interface ReplyToken {
  hash: string;
  senderId: string;
  receiverId: string;
  createdAt: string;
}

export interface RateLimitState {
  userId: string;
  windowStart: string;
  messageCount: number;
  isBlocked: boolean;
  blockedUntil: string | null;
}

export type AlertType = "urgent_message" | "spam_attempt" | "auto_block";

export interface Alert {
  id: string;
  type: string;
  userId: string | null;
  details: string | null;
  resolved: boolean;
  createdAt: string;
}

export type ModLogAction =
  | ModerationAction
  | "answer_dm"
  | "answer_channel"
  | "block"
  | "unblock";

export interface ModLogEntry {
  id: string;
  moderatorId: string;
  action: string;
  messageId: string | null;
  targetUserId: string | null;
  details: string | null;
  createdAt: string;
}

export function anonymousView(message: Message): AnonymousMessage {
  return {
    id: message.id,
    content: message.content,
    status: message.status,
    isRead: message.isRead,
    readAt: message.readAt,
    replyToId: message.replyToId,
    sentiment: message.sentiment,
    urgent: message.urgent,
    createdAt: message.createdAt,
  };
}

/** Text used for classification and excerpts: the text body or the media caption. */
export function contentText(content: MessageContent): string {
  return content.kind === "text" ? content.text : content.caption ?? "";
}
