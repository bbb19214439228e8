/**
 * LINE webhook body parsing.
 *
 * Only message events carrying text or a location are turned into
 * IncomingMessages; follows, postbacks, stickers and the rest are dropped.
 */

import { z } from "zod";
import type { IncomingContent, IncomingMessage } from "@noriba/core";

// ─────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────

const SourceSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("user"), userId: z.string() }),
  z.object({
    type: z.literal("group"),
    groupId: z.string(),
    userId: z.string().optional(),
  }),
  z.object({
    type: z.literal("room"),
    roomId: z.string(),
    userId: z.string().optional(),
  }),
]);

const TextMessageSchema = z.object({
  id: z.string(),
  type: z.literal("text"),
  text: z.string(),
});

const LocationMessageSchema = z.object({
  id: z.string(),
  type: z.literal("location"),
  latitude: z.number(),
  longitude: z.number(),
  title: z.string().optional(),
  address: z.string().optional(),
});

const MessageEventSchema = z.object({
  type: z.literal("message"),
  timestamp: z.number(),
  source: SourceSchema,
  replyToken: z.string().optional(),
  webhookEventId: z.string().optional(),
  deliveryContext: z.object({ isRedelivery: z.boolean() }).optional(),
  message: z.discriminatedUnion("type", [TextMessageSchema, LocationMessageSchema]),
});

const WebhookBodySchema = z.object({
  destination: z.string().optional(),
  events: z.array(z.unknown()),
});

export type LineSource = z.infer<typeof SourceSchema>;
export type LineMessageEvent = z.infer<typeof MessageEventSchema>;

// ─────────────────────────────────────────────────────────────────
// Mapping
// ─────────────────────────────────────────────────────────────────

export class WebhookParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WebhookParseError";
  }
}

/** Group and room chats share one conversation across members */
export function conversationKeyFor(source: LineSource): string {
  switch (source.type) {
    case "user":
      return `user:${source.userId}`;
    case "group":
      return `group:${source.groupId}`;
    case "room":
      return `room:${source.roomId}`;
  }
}

function toContent(message: LineMessageEvent["message"]): IncomingContent {
  if (message.type === "text") {
    return { type: "text", text: message.text };
  }
  return {
    type: "location",
    coordinates: {
      latitude: message.latitude,
      longitude: message.longitude,
      title: message.title,
      address: message.address,
    },
  };
}

export function toIncomingMessage(event: LineMessageEvent): IncomingMessage {
  return {
    id: event.webhookEventId ?? event.message.id,
    conversationKey: conversationKeyFor(event.source),
    senderId: event.source.userId,
    content: toContent(event.message),
    timestamp: new Date(event.timestamp),
    replyToken: event.replyToken,
    isRedelivery: event.deliveryContext?.isRedelivery ?? false,
  };
}

/**
 * Parse a raw webhook body. Throws WebhookParseError when the body is not
 * JSON or lacks an events array; unsupported events are skipped.
 */
export function parseWebhookBody(rawBody: string): IncomingMessage[] {
  let json: unknown;
  try {
    json = JSON.parse(rawBody);
  } catch {
    throw new WebhookParseError("Webhook body is not valid JSON");
  }

  const body = WebhookBodySchema.safeParse(json);
  if (!body.success) {
    throw new WebhookParseError("Webhook body has no events array");
  }

  const messages: IncomingMessage[] = [];
  for (const raw of body.data.events) {
    const event = MessageEventSchema.safeParse(raw);
    if (event.success) {
      messages.push(toIncomingMessage(event.data));
    }
  }
  return messages;
}
