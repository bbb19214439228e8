export { ChannelManager } from "./manager.js";
export type {
  ChannelManagerOptions,
  DispatchSummary,
  MessageResponder,
  WebhookResult,
} from "./manager.js";
export { BusMessageHandler } from "./message-handler.js";
export { MockChannelPlugin } from "./mock-plugin.js";
export type { MockEvent } from "./mock-plugin.js";
