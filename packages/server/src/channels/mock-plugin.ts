import { z } from "zod";
import type {
  ChannelPlugin,
  IncomingContent,
  IncomingMessage,
  OutgoingMessage,
} from "@noriba/core";

const MockEventSchema = z.object({
  id: z.string(),
  key: z.string(),
  text: z.string().optional(),
  location: z.object({ latitude: z.number(), longitude: z.number() }).optional(),
  redelivery: z.boolean().default(false),
});

const MockBodySchema = z.object({ events: z.array(MockEventSchema) });

export type MockEvent = z.input<typeof MockEventSchema>;

/**
 * In-process channel for tests and local runs. The signature is the shared
 * secret itself; the body is `{ events: MockEvent[] }`.
 */
export class MockChannelPlugin implements ChannelPlugin {
  readonly name = "mock";
  readonly signatureHeader = "x-mock-signature";

  /** Sent messages are captured here for testing */
  sentMessages: Array<{ to: IncomingMessage; messages: OutgoingMessage[] }> = [];

  private secret: string;
  private replyError: Error | null = null;

  constructor(secret = "test-secret") {
    this.secret = secret;
  }

  verify(_rawBody: string, signature: string): boolean {
    return signature === this.secret;
  }

  parseEvents(rawBody: string): IncomingMessage[] {
    const body = MockBodySchema.parse(JSON.parse(rawBody));
    return body.events.map((event) => {
      const content: IncomingContent = event.location
        ? { type: "location", coordinates: event.location }
        : { type: "text", text: event.text ?? "" };
      return {
        id: event.id,
        conversationKey: event.key,
        content,
        timestamp: new Date(),
        replyToken: `reply-${event.id}`,
        isRedelivery: event.redelivery,
      };
    });
  }

  async reply(to: IncomingMessage, messages: OutgoingMessage[]): Promise<void> {
    if (this.replyError) throw this.replyError;
    this.sentMessages.push({ to, messages });
  }

  // ── Test Methods ───────────────────────────────────────────────

  /** Build a webhook body for `parseEvents` */
  static body(...events: MockEvent[]): string {
    return JSON.stringify({ events });
  }

  /** Make every following reply reject */
  simulateReplyFailure(error: Error): void {
    this.replyError = error;
  }
}
