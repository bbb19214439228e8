import { LinePlugin, type LinePluginOptions } from "./plugin.js";

export {
  LinePlugin,
  toLineMessage,
  truncateLabel,
  MAX_REPLY_MESSAGES,
  MAX_QUICK_REPLY_ITEMS,
  MAX_QUICK_REPLY_LABEL,
} from "./plugin.js";
export type { LinePluginOptions, ReplyClient } from "./plugin.js";
export {
  parseWebhookBody,
  toIncomingMessage,
  conversationKeyFor,
  WebhookParseError,
} from "./webhook.js";
export type { LineSource, LineMessageEvent } from "./webhook.js";

/**
 * Factory function for creating a LINE channel plugin.
 */
export function createLinePlugin(options: LinePluginOptions): LinePlugin {
  return new LinePlugin(options);
}
