/**
 * Stop Name Parser
 *
 * Extracts zero, one or two stop names (or a location signal) from one
 * inbound message. Rules are evaluated in priority order; the first rule
 * that matches decides. Never throws: unmatched input is `empty`.
 */

import { DEFAULT_MATCHERS } from './matchers.js'
import type { InputMatcher, ParsedInput, ParserOptions, RawInput } from './types.js'

export const DEFAULT_PARSER_OPTIONS: ParserOptions = {
  delimiters: ['から', '→', '⇒'],
  destinationSuffixes: ['まで'],
  minStopNameLength: 1,
}

export class StopNameParser {
  private options: ParserOptions
  private matchers: readonly InputMatcher[]

  constructor(options?: Partial<ParserOptions>, matchers: readonly InputMatcher[] = DEFAULT_MATCHERS) {
    this.options = { ...DEFAULT_PARSER_OPTIONS, ...options }
    this.matchers = matchers
  }

  parse(input: RawInput): ParsedInput {
    for (const matcher of this.matchers) {
      const result = matcher(input, this.options)
      if (result) return result
    }
    return { type: 'empty' }
  }
}

/** Parse with the default rules and delimiters */
export function parseStopNames(input: RawInput, options?: Partial<ParserOptions>): ParsedInput {
  return new StopNameParser(options).parse(input)
}
