/**
 * Fixed command keywords recognised before stop-name parsing.
 */

export type BotCommand = 'help' | 'cancel' | 'nearby'

export type CommandKeywords = Record<BotCommand, string[]>

export const DEFAULT_COMMAND_KEYWORDS: CommandKeywords = {
  help: ['ヘルプ', 'へるぷ', 'help', '使い方', 'つかいかた'],
  cancel: ['キャンセル', 'きゃんせる', 'やめる'],
  nearby: ['周辺バス停'],
}

/** Exact match on the trimmed, lower-cased message */
export function matchCommand(
  text: string,
  keywords: CommandKeywords = DEFAULT_COMMAND_KEYWORDS,
): BotCommand | null {
  const normalized = text.trim().toLowerCase()
  if (!normalized) return null
  for (const command of ['cancel', 'help', 'nearby'] as const) {
    if (keywords[command].some((kw) => kw.toLowerCase() === normalized)) {
      return command
    }
  }
  return null
}
