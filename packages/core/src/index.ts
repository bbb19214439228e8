import * as readline from 'node:readline/promises'
import { stdin as input, stdout as output } from 'node:process'
import { loadConfig, sessionTtlMs } from './config.js'
import { StopNameParser } from './parser/stop-name-parser.js'
import { ConversationResolver } from './resolver/conversation-resolver.js'
import type { Outcome } from './resolver/types.js'
import { MemorySessionStore } from './session/memory-store.js'

// Local console for trying the resolver without LINE or the bus API.
// `npm run resolve -w @noriba/core -- "四条河原町から京都駅"` for one message,
// no argument for an interactive two-step conversation.

const CONSOLE_KEY = 'console'

function describe(outcome: Outcome): string {
  switch (outcome.type) {
    case 'complete_query':
      return `search: ${outcome.query.departure} → ${outcome.query.destination}`
    case 'awaiting_destination':
      return `waiting for destination (departure: ${outcome.departure})`
    case 'needs_location_selection':
      return `choose a stop near ${outcome.coordinates.latitude},${outcome.coordinates.longitude}`
    case 'unrecognized':
      return 'not recognised'
  }
}

function parseLocation(line: string): { latitude: number; longitude: number } | null {
  const match = line.trim().match(/^@(-?\d+(?:\.\d+)?),\s*(-?\d+(?:\.\d+)?)$/)
  return match ? { latitude: Number(match[1]), longitude: Number(match[2]) } : null
}

async function main(): Promise<void> {
  const config = loadConfig()
  const resolver = new ConversationResolver({
    store: new MemorySessionStore(),
    parser: new StopNameParser(config.parser),
    sessionTtlMs: sessionTtlMs(config),
  })

  const message = process.argv.slice(2).join(' ')
  if (message) {
    console.log(describe(await resolver.resolve(CONSOLE_KEY, parseLocation(message) ?? message)))
    return
  }

  console.log('Type a stop, two stops, or @lat,lon. Ctrl+D to quit.')
  const rl = readline.createInterface({ input, output })
  try {
    for await (const line of rl) {
      console.log(describe(await resolver.resolve(CONSOLE_KEY, parseLocation(line) ?? line)))
    }
  } finally {
    rl.close()
  }
}

main().catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : String(err))
  process.exit(1)
})
