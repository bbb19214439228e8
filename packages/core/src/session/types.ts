import type { StopName } from '../parser/types.js'

/** Identifies the party a session belongs to (one per user, group or room) */
export type ConversationKey = string

/** A departure stop waiting for its destination */
export interface PendingSession {
  key: ConversationKey
  departure: StopName
  createdAt: Date
  expiresAt: Date
}

/**
 * Per-conversation pending-departure storage.
 *
 * Async so it can be backed by memory, an external cache or a test double.
 * Callers needing read-modify-write atomicity per key serialise through
 * {@link KeyedLock}; the store itself only guarantees single-call atomicity.
 */
export interface SessionStore {
  /** Live session for `key`, or null. Expired sessions are evicted by the read. */
  get(key: ConversationKey, now?: Date): Promise<PendingSession | null>
  /** Create or overwrite the session for `key`, expiring at `now + ttlMs` */
  put(key: ConversationKey, departure: StopName, now: Date, ttlMs: number): Promise<void>
  /** Remove any session for `key`. Idempotent. */
  clear(key: ConversationKey): Promise<void>
  /** Stored sessions, live or not yet evicted */
  size(): Promise<number>
}
