/**
 * In-memory Session Store
 *
 * Map-backed {@link SessionStore} with lazy expiry: sessions are checked
 * on read, never swept by a timer. Lost on restart.
 */

import type { StopName } from '../parser/types.js'
import type { ConversationKey, PendingSession, SessionStore } from './types.js'

export class MemorySessionStore implements SessionStore {
  private sessions = new Map<ConversationKey, PendingSession>()

  async get(key: ConversationKey, now: Date = new Date()): Promise<PendingSession | null> {
    const session = this.sessions.get(key)
    if (!session) return null

    if (now.getTime() >= session.expiresAt.getTime()) {
      this.sessions.delete(key)
      return null
    }
    return { ...session }
  }

  async put(key: ConversationKey, departure: StopName, now: Date, ttlMs: number): Promise<void> {
    this.sessions.set(key, {
      key,
      departure,
      createdAt: new Date(now.getTime()),
      expiresAt: new Date(now.getTime() + ttlMs),
    })
  }

  async clear(key: ConversationKey): Promise<void> {
    this.sessions.delete(key)
  }

  async size(): Promise<number> {
    return this.sessions.size
  }
}
