export { MemorySessionStore } from './memory-store.js'
export { KeyedLock } from './keyed-lock.js'
export type { ConversationKey, PendingSession, SessionStore } from './types.js'
