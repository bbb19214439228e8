import { describe, it, expect } from 'vitest'
import { EventDedup } from '../src/utils/dedup.js'
import type { IncomingMessage } from '../src/channels/types.js'

function event(id: string): IncomingMessage {
  return {
    id,
    conversationKey: 'user:U1',
    content: { type: 'text', text: '四条河原町' },
    timestamp: new Date('2026-10-19T01:00:00.000Z'),
    isRedelivery: false,
  }
}

function ids(messages: IncomingMessage[]): string[] {
  return messages.map((m) => m.id)
}

describe('EventDedup', () => {
  it('splits out events already seen on the channel within the ttl', () => {
    const dedup = new EventDedup({ ttlMs: 1000 })

    expect(ids(dedup.partition('line', [event('evt-1')], 0).fresh)).toEqual(['evt-1'])

    const second = dedup.partition('line', [event('evt-1'), event('evt-2')], 999)
    expect(ids(second.fresh)).toEqual(['evt-2'])
    expect(ids(second.duplicates)).toEqual(['evt-1'])
  })

  it('drops a repeat inside one batch', () => {
    const dedup = new EventDedup()

    const result = dedup.partition('line', [event('evt-1'), event('evt-1')], 0)

    expect(ids(result.fresh)).toEqual(['evt-1'])
    expect(ids(result.duplicates)).toEqual(['evt-1'])
  })

  it('keeps channels apart', () => {
    const dedup = new EventDedup()

    dedup.partition('line', [event('evt-1')], 0)

    expect(ids(dedup.partition('mock', [event('evt-1')], 1).fresh)).toEqual(['evt-1'])
  })

  it('forgets an event once the ttl has passed', () => {
    const dedup = new EventDedup({ ttlMs: 1000 })

    dedup.partition('line', [event('evt-1')], 0)

    expect(dedup.partition('line', [event('evt-1')], 1000).fresh).toHaveLength(1)
    expect(dedup.partition('line', [event('evt-1')], 1500).duplicates).toHaveLength(1)
  })

  it('evicts the oldest event when full', () => {
    const dedup = new EventDedup({ maxEntries: 2, ttlMs: 60_000 })

    dedup.partition('line', [event('a'), event('b')], 0)
    dedup.partition('line', [event('c')], 2)

    expect(dedup.size).toBe(2)
    expect(dedup.partition('line', [event('c')], 3).duplicates).toHaveLength(1)
    expect(dedup.partition('line', [event('a')], 4).fresh).toHaveLength(1)
  })

  it('drops expired events before evicting live ones', () => {
    const dedup = new EventDedup({ maxEntries: 2, ttlMs: 100 })

    dedup.partition('line', [event('a')], 0)
    dedup.partition('line', [event('b')], 90)
    dedup.partition('line', [event('c')], 150) // 'a' has expired, 'b' stays

    expect(dedup.partition('line', [event('b')], 160).duplicates).toHaveLength(1)
  })
})
