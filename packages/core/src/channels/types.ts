/**
 * Channel System — Type Definitions
 *
 * Channel-neutral message shapes and the plugin interface implemented by
 * each chat platform (LINE today).
 */

import type { Coordinates } from '../parser/types.js'
import type { ConversationKey } from '../session/types.js'

// ─────────────────────────────────────────────────────────────────
// Messages
// ─────────────────────────────────────────────────────────────────

export type IncomingContent =
  | { type: 'text'; text: string }
  | { type: 'location'; coordinates: Coordinates }

/** Incoming message from an external channel */
export interface IncomingMessage {
  /** Unique event ID (from the platform), used for redelivery dedup */
  id: string
  /** Party the conversation state belongs to */
  conversationKey: ConversationKey
  /** Platform user ID of the sender, when known */
  senderId?: string
  content: IncomingContent
  /** When the platform received the message */
  timestamp: Date
  /** Token needed to answer this message */
  replyToken?: string
  /** True when the platform says this is a redelivery */
  isRedelivery: boolean
}

/** Tap-to-send suggestion shown under a reply */
export interface QuickReplyOption {
  label: string
  /** Text sent back as the rider's next message */
  text: string
}

/** Outgoing message to an external channel */
export interface OutgoingMessage {
  text: string
  quickReplies?: QuickReplyOption[]
}

// ─────────────────────────────────────────────────────────────────
// Plugin Interface
// ─────────────────────────────────────────────────────────────────

/** Implemented by each chat platform */
export interface ChannelPlugin {
  /** Plugin name (e.g., "line", "mock") */
  readonly name: string
  /** Request header carrying the webhook signature (lower-case) */
  readonly signatureHeader: string
  /** Check the webhook signature against the raw request body */
  verify(rawBody: string, signature: string): boolean
  /** Extract the supported message events; throws on a malformed body */
  parseEvents(rawBody: string): IncomingMessage[]
  /** Answer an incoming message */
  reply(to: IncomingMessage, messages: OutgoingMessage[]): Promise<void>
}
