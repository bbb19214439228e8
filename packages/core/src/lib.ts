// Public API for consumption by other packages (server, channel plugins)

// Parsing
export {
  StopNameParser,
  parseStopNames,
  DEFAULT_PARSER_OPTIONS,
  DEFAULT_MATCHERS,
  matchLocation,
  matchDelimitedPair,
  matchWhitespacePair,
  matchSingleStop,
  isCoordinates,
  matchCommand,
  DEFAULT_COMMAND_KEYWORDS,
} from './parser/index.js'
export type {
  StopName,
  Coordinates,
  RawInput,
  ParsedInput,
  ParserOptions,
  InputMatcher,
  BotCommand,
  CommandKeywords,
} from './parser/index.js'

// Sessions
export { MemorySessionStore, KeyedLock } from './session/index.js'
export type { ConversationKey, PendingSession, SessionStore } from './session/index.js'

// Resolution
export { ConversationResolver, DEFAULT_SESSION_TTL_MS } from './resolver/index.js'
export type { ConversationResolverOptions, Query, Outcome } from './resolver/index.js'

// Realtime
export {
  classifyArrival,
  APPROACHING_MAX_MINUTES,
  ON_TIME_MAX_MINUTES,
  serviceDayType,
  isNightTime,
  nextMorningDayType,
  formatClock,
  shortClock,
  minutesUntilDeparture,
  DEFAULT_TIME_ZONE,
  describeBusPosition,
  FAR_STOPS_AWAY,
} from './realtime/index.js'
export type {
  ArrivalStatus,
  ServiceDayType,
  TripStatus,
  TripStop,
  TripLocation,
  StopTime,
  BusPosition,
  RealtimeInfo,
} from './realtime/index.js'

// Channel types
export type {
  IncomingContent,
  IncomingMessage,
  QuickReplyOption,
  OutgoingMessage,
  ChannelPlugin,
} from './channels/index.js'

// Config + logging
export { loadConfig, requireLineCredentials, sessionTtlMs, ConfigError } from './config.js'
export type { NoribaConfig, LineCredentials, LoadConfigOptions } from './config.js'
export { createLogger, silentLogger } from './logger.js'
export type { Logger, LoggingConfig } from './logger.js'

// Utilities
export { EventDedup } from './utils/dedup.js'
export type { DedupOptions, DedupResult } from './utils/dedup.js'
