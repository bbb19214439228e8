export { StopNameParser, parseStopNames, DEFAULT_PARSER_OPTIONS } from './stop-name-parser.js'
export {
  DEFAULT_MATCHERS,
  matchLocation,
  matchDelimitedPair,
  matchWhitespacePair,
  matchSingleStop,
  isCoordinates,
} from './matchers.js'
export { matchCommand, DEFAULT_COMMAND_KEYWORDS } from './commands.js'
export type { BotCommand, CommandKeywords } from './commands.js'
export type {
  StopName,
  Coordinates,
  RawInput,
  ParsedInput,
  ParserOptions,
  InputMatcher,
} from './types.js'
