/**
 * Webhook Event Dedup
 *
 * Platforms redeliver webhook events they think were lost. Each channel's
 * event IDs are remembered until a per-event expiry; a webhook batch is
 * split into events seen for the first time and repeats, including
 * repeats inside the same batch.
 */

import type { IncomingMessage } from '../channels/types.js'

export interface DedupOptions {
  /** Maximum number of remembered events across channels (default: 5000) */
  maxEntries?: number
  /** How long an event is remembered, in milliseconds (default: 20 minutes) */
  ttlMs?: number
}

export interface DedupResult {
  fresh: IncomingMessage[]
  duplicates: IncomingMessage[]
}

export class EventDedup {
  private expiries = new Map<string, number>() // "channel:eventId" → expiry epoch ms
  private maxEntries: number
  private ttlMs: number

  constructor(options?: DedupOptions) {
    this.maxEntries = options?.maxEntries ?? 5000
    this.ttlMs = options?.ttlMs ?? 20 * 60 * 1000
  }

  /** Split `messages` from `channel`, remembering the fresh ones */
  partition(channel: string, messages: IncomingMessage[], now: number = Date.now()): DedupResult {
    const result: DedupResult = { fresh: [], duplicates: [] }
    for (const message of messages) {
      if (this.remember(`${channel}:${message.id}`, now)) {
        result.fresh.push(message)
      } else {
        result.duplicates.push(message)
      }
    }
    return result
  }

  /** Events currently remembered, expired ones included until evicted */
  get size(): number {
    return this.expiries.size
  }

  private remember(eventKey: string, now: number): boolean {
    const expiry = this.expiries.get(eventKey)
    if (expiry !== undefined) {
      if (now < expiry) return false
      this.expiries.delete(eventKey)
    }
    if (this.expiries.size >= this.maxEntries) this.makeRoom(now)
    this.expiries.set(eventKey, now + this.ttlMs)
    return true
  }

  private makeRoom(now: number): void {
    for (const [eventKey, expiry] of this.expiries) {
      if (expiry <= now) this.expiries.delete(eventKey)
    }
    if (this.expiries.size < this.maxEntries) return

    // Map iteration is insertion order: the first key is the oldest event
    const oldest = this.expiries.keys().next()
    if (!oldest.done) this.expiries.delete(oldest.value)
  }
}
