/**
 * Stop-name matchers, one per rule, in priority order.
 */

import type { InputMatcher, ParsedInput, ParserOptions, RawInput, StopName } from './types.js'

const WHITESPACE = /\s+/u

export function isCoordinates(input: RawInput): input is Exclude<RawInput, string> {
  return typeof input !== 'string'
}

function isStopName(value: string, options: ParserOptions): boolean {
  return value.length > 0 && Array.from(value).length >= options.minStopNameLength
}

function stripDestinationSuffix(destination: string, suffixes: string[]): string {
  for (const suffix of suffixes) {
    if (suffix && destination.endsWith(suffix)) {
      const stripped = destination.slice(0, -suffix.length).trim()
      if (stripped) return stripped
    }
  }
  return destination
}

function pair(departure: StopName, destination: StopName): ParsedInput {
  return { type: 'pair_stop', departure, destination }
}

/** Rule 1: a shared location wins over everything else. */
export const matchLocation: InputMatcher = (input) => {
  if (!isCoordinates(input)) return null
  return { type: 'location', coordinates: input }
}

/**
 * Rule 2: "AからB", "AからBまで", "A→B".
 *
 * Scans left to right and takes the first position where some delimiter
 * splits the text into two valid names. Longer delimiters are tried first
 * at each position so "->" is not shadowed by "-".
 */
export const matchDelimitedPair: InputMatcher = (input, options) => {
  if (isCoordinates(input)) return null
  const text = input.trim()
  const delimiters = options.delimiters
    .filter((d) => d.length > 0)
    .sort((a, b) => b.length - a.length)
  if (delimiters.length === 0) return null

  for (let i = 0; i < text.length; i++) {
    for (const delimiter of delimiters) {
      if (!text.startsWith(delimiter, i)) continue
      const departure = text.slice(0, i).trim()
      const destination = stripDestinationSuffix(
        text.slice(i + delimiter.length).trim(),
        options.destinationSuffixes,
      )
      if (isStopName(departure, options) && isStopName(destination, options)) {
        return pair(departure, destination)
      }
    }
  }
  return null
}

/** Rule 3: exactly two whitespace-separated tokens, departure first. */
export const matchWhitespacePair: InputMatcher = (input, options) => {
  if (isCoordinates(input)) return null
  const tokens = input.trim().split(WHITESPACE).filter(Boolean)
  if (tokens.length !== 2) return null
  const [departure, destination] = tokens
  if (!isStopName(departure, options) || !isStopName(destination, options)) return null
  return pair(departure, destination)
}

/** Rule 4: anything else non-empty is one stop name (phrases included). */
export const matchSingleStop: InputMatcher = (input, options) => {
  if (isCoordinates(input)) return null
  const text = input.trim()
  if (!isStopName(text, options)) return null
  return { type: 'single_stop', stop: text }
}

export const DEFAULT_MATCHERS: readonly InputMatcher[] = [
  matchLocation,
  matchDelimitedPair,
  matchWhitespacePair,
  matchSingleStop,
]
