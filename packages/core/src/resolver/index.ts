export { ConversationResolver, DEFAULT_SESSION_TTL_MS } from './conversation-resolver.js'
export type { ConversationResolverOptions } from './conversation-resolver.js'
export type { Query, Outcome } from './types.js'
