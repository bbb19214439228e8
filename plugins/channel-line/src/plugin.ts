import { messagingApi, validateSignature } from "@line/bot-sdk";
import type {
  ChannelPlugin,
  IncomingMessage,
  OutgoingMessage,
  QuickReplyOption,
} from "@noriba/core";
import { parseWebhookBody } from "./webhook.js";

// ─────────────────────────────────────────────────────────────────
// Messaging API limits
// ─────────────────────────────────────────────────────────────────

export const MAX_REPLY_MESSAGES = 5;
export const MAX_QUICK_REPLY_ITEMS = 13;
export const MAX_QUICK_REPLY_LABEL = 20;

/** The part of MessagingApiClient the plugin talks to */
export interface ReplyClient {
  replyMessage(request: messagingApi.ReplyMessageRequest): Promise<unknown>;
}

export interface LinePluginOptions {
  channelSecret: string;
  channelAccessToken: string;
  /** Replaces the Messaging API client (tests) */
  client?: ReplyClient;
}

/** Shorten to the quick-reply label limit, ending in "…" when cut */
export function truncateLabel(label: string, max = MAX_QUICK_REPLY_LABEL): string {
  const chars = Array.from(label);
  if (chars.length <= max) return label;
  return chars.slice(0, max - 1).join("") + "…";
}

function toQuickReply(options: QuickReplyOption[]): messagingApi.QuickReply {
  const items: messagingApi.QuickReplyItem[] = options
    .slice(0, MAX_QUICK_REPLY_ITEMS)
    .map((option) => ({
      type: "action",
      action: {
        type: "message",
        label: truncateLabel(option.label),
        text: option.text,
      },
    }));
  return { items };
}

export function toLineMessage(message: OutgoingMessage): messagingApi.TextMessage {
  const line: messagingApi.TextMessage = { type: "text", text: message.text };
  if (message.quickReplies && message.quickReplies.length > 0) {
    line.quickReply = toQuickReply(message.quickReplies);
  }
  return line;
}

// ─────────────────────────────────────────────────────────────────
// Plugin class
// ─────────────────────────────────────────────────────────────────

export class LinePlugin implements ChannelPlugin {
  readonly name = "line";
  readonly signatureHeader = "x-line-signature";

  private readonly channelSecret: string;
  private readonly client: ReplyClient;

  constructor(options: LinePluginOptions) {
    this.channelSecret = options.channelSecret;
    this.client =
      options.client ??
      new messagingApi.MessagingApiClient({
        channelAccessToken: options.channelAccessToken,
      });
  }

  verify(rawBody: string, signature: string): boolean {
    if (!signature) return false;
    return validateSignature(rawBody, this.channelSecret, signature);
  }

  parseEvents(rawBody: string): IncomingMessage[] {
    return parseWebhookBody(rawBody);
  }

  async reply(to: IncomingMessage, messages: OutgoingMessage[]): Promise<void> {
    if (messages.length === 0) return;
    if (!to.replyToken) {
      throw new Error(`[channel-line] No reply token for event ${to.id}`);
    }

    await this.client.replyMessage({
      replyToken: to.replyToken,
      messages: messages.slice(0, MAX_REPLY_MESSAGES).map(toLineMessage),
    });
  }
}
