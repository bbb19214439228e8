/**
 * Channel Manager
 *
 * Webhook entry point for a channel plugin: signature check, event
 * parsing, redelivery dedup, then handler → plugin reply per message.
 * Messages from one webhook are processed concurrently; a failure in one
 * is logged and does not affect the others.
 */

import {
  EventDedup,
  silentLogger,
  type ChannelPlugin,
  type IncomingMessage,
  type Logger,
  type OutgoingMessage,
} from "@noriba/core";

/** Anything that can answer an incoming message */
export interface MessageResponder {
  handle(message: IncomingMessage, now?: Date): Promise<OutgoingMessage[]>;
}

export interface ChannelManagerOptions {
  plugin: ChannelPlugin;
  handler: MessageResponder;
  dedup?: EventDedup;
  logger?: Logger;
}

export interface DispatchSummary {
  handled: number;
  duplicates: number;
  failed: number;
}

export type WebhookResult =
  | ({ status: "ok" } & DispatchSummary)
  | { status: "invalid_signature" }
  | { status: "bad_request"; error: string };

export class ChannelManager {
  private plugin: ChannelPlugin;
  private handler: MessageResponder;
  private dedup: EventDedup;
  private log: Logger;

  constructor(options: ChannelManagerOptions) {
    this.plugin = options.plugin;
    this.handler = options.handler;
    this.dedup = options.dedup ?? new EventDedup();
    this.log = options.logger ?? silentLogger();
  }

  get signatureHeader(): string {
    return this.plugin.signatureHeader;
  }

  /**
   * Handle one webhook request body. Resolves once every message in it has
   * been answered (or has failed).
   */
  async receive(rawBody: string, signature: string | undefined): Promise<WebhookResult> {
    if (!signature || !this.plugin.verify(rawBody, signature)) {
      this.log.warn({ channel: this.plugin.name, signed: Boolean(signature) }, "Invalid webhook signature");
      return { status: "invalid_signature" };
    }

    let messages: IncomingMessage[];
    try {
      messages = this.plugin.parseEvents(rawBody);
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      this.log.warn({ channel: this.plugin.name, error }, "Unparseable webhook body");
      return { status: "bad_request", error };
    }

    return { status: "ok", ...(await this.dispatch(messages)) };
  }

  /** Dedup, then answer each remaining message */
  async dispatch(messages: IncomingMessage[]): Promise<DispatchSummary> {
    const { fresh, duplicates } = this.dedup.partition(this.plugin.name, messages);
    for (const msg of duplicates) {
      this.log.info({ id: msg.id, redelivery: msg.isRedelivery }, "Dropped duplicate event");
    }

    const results = await Promise.allSettled(fresh.map((msg) => this.process(msg)));

    let failed = 0;
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        failed++;
        this.log.error(
          { err: result.reason, id: fresh[i]?.id, key: fresh[i]?.conversationKey },
          "Failed to answer message",
        );
      }
    });

    return {
      handled: fresh.length - failed,
      duplicates: duplicates.length,
      failed,
    };
  }

  private async process(msg: IncomingMessage): Promise<void> {
    const replies = await this.handler.handle(msg);
    await this.plugin.reply(msg, replies);
  }
}
