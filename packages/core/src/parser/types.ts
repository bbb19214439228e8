/**
 * Parser — Type Definitions
 *
 * Raw user input and the tagged result of stop-name extraction.
 */

/** Opaque, non-empty stop identifier as typed by the rider */
export type StopName = string

/** Shared location signal */
export interface Coordinates {
  latitude: number
  longitude: number
  /** Place title attached by the chat client, if any */
  title?: string
  /** Street address attached by the chat client, if any */
  address?: string
}

/** What a single inbound message carries: free text or a shared location */
export type RawInput = string | Coordinates

export type ParsedInput =
  | { type: 'empty' }
  | { type: 'single_stop'; stop: StopName }
  | { type: 'pair_stop'; departure: StopName; destination: StopName }
  | { type: 'location'; coordinates: Coordinates }

export interface ParserOptions {
  /** Directional delimiters separating departure (left) from destination (right) */
  delimiters: string[]
  /** Suffixes stripped from the destination of a delimited pair ("まで") */
  destinationSuffixes: string[]
  /** Minimum character count for each extracted stop name */
  minStopNameLength: number
}

/**
 * One rule of the parser. Returns null when the rule does not apply,
 * letting the next rule in priority order try.
 */
export type InputMatcher = (input: RawInput, options: ParserOptions) => ParsedInput | null
