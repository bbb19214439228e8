export type {
  IncomingContent,
  IncomingMessage,
  QuickReplyOption,
  OutgoingMessage,
  ChannelPlugin,
} from './types.js'
