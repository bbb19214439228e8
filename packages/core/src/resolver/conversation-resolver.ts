/**
 * Conversation Resolver
 *
 * Turns one inbound message plus the conversation's pending state into an
 * {@link Outcome}:
 * - pair of stops → complete query (an explicit pair beats a pending session)
 * - single stop with a pending departure → complete query
 * - single stop otherwise → awaiting destination (session created)
 * - location → nearest-stop selection (session untouched)
 * - nothing recognisable → unrecognized (session untouched)
 *
 * Session reads and writes for one key run under a {@link KeyedLock}, so
 * duplicate or out-of-order deliveries for a key never interleave.
 */

import { silentLogger, type Logger } from '../logger.js'
import { StopNameParser } from '../parser/stop-name-parser.js'
import type { RawInput, StopName } from '../parser/types.js'
import { KeyedLock } from '../session/keyed-lock.js'
import type { ConversationKey, SessionStore } from '../session/types.js'
import type { Outcome } from './types.js'

export const DEFAULT_SESSION_TTL_MS = 10 * 60 * 1000 // 10 minutes

export interface ConversationResolverOptions {
  store: SessionStore
  parser?: StopNameParser
  /** How long a departure waits for its destination */
  sessionTtlMs?: number
  logger?: Logger
}

export class ConversationResolver {
  private store: SessionStore
  private parser: StopNameParser
  private sessionTtlMs: number
  private logger: Logger
  private lock = new KeyedLock()

  constructor(options: ConversationResolverOptions) {
    this.store = options.store
    this.parser = options.parser ?? new StopNameParser()
    this.sessionTtlMs = options.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS
    this.logger = options.logger ?? silentLogger()
  }

  get ttlMs(): number {
    return this.sessionTtlMs
  }

  resolve(key: ConversationKey, input: RawInput, now: Date = new Date()): Promise<Outcome> {
    const parsed = this.parser.parse(input)

    switch (parsed.type) {
      case 'location':
        return Promise.resolve({ type: 'needs_location_selection', coordinates: parsed.coordinates })

      case 'empty':
        return Promise.resolve({ type: 'unrecognized' })

      case 'pair_stop':
        return this.lock.run<Outcome>(key, async () => {
          await this.store.clear(key)
          this.logger.debug({ key }, 'Explicit pair, pending session cleared')
          return {
            type: 'complete_query',
            query: { departure: parsed.departure, destination: parsed.destination },
          }
        })

      case 'single_stop':
        return this.lock.run<Outcome>(key, async () => {
          const pending = await this.store.get(key, now)
          if (pending) {
            await this.store.clear(key)
            this.logger.info(
              { key, departure: pending.departure, destination: parsed.stop },
              'Paired pending departure with destination',
            )
            return {
              type: 'complete_query',
              query: { departure: pending.departure, destination: parsed.stop },
            }
          }

          await this.store.put(key, parsed.stop, now, this.sessionTtlMs)
          this.logger.info({ key, departure: parsed.stop }, 'Started destination session')
          return { type: 'awaiting_destination', departure: parsed.stop }
        })
    }
  }

  /** Explicit cancellation: drop any pending departure for `key` */
  cancel(key: ConversationKey): Promise<void> {
    return this.lock.run(key, async () => {
      await this.store.clear(key)
      this.logger.info({ key }, 'Cleared session')
    })
  }

  /**
   * Drop the session for `key` only if it is still the one started for
   * `departure` at `createdAt`. A session that was paired, replaced or
   * cancelled in the meantime is left alone. Resolves true when cleared.
   */
  cancelIfPending(
    key: ConversationKey,
    departure: StopName,
    createdAt: Date,
    now: Date = new Date(),
  ): Promise<boolean> {
    return this.lock.run(key, async () => {
      const pending = await this.store.get(key, now)
      if (
        !pending ||
        pending.departure !== departure ||
        pending.createdAt.getTime() !== createdAt.getTime()
      ) {
        this.logger.debug({ key, departure }, 'Session already moved on, not cleared')
        return false
      }
      await this.store.clear(key)
      this.logger.info({ key, departure }, 'Cleared session')
      return true
    })
  }
}
