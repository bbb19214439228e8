/**
 * Unit Tests — LINE channel plugin (signature check + reply mapping)
 */

import { describe, it, expect } from "vitest";
import { createHmac } from "node:crypto";
import type { messagingApi } from "@line/bot-sdk";
import type { IncomingMessage, OutgoingMessage } from "@noriba/core";
import { createLinePlugin, truncateLabel, type ReplyClient } from "../src/index.js";

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

const SECRET = "test-secret";

class RecordingClient implements ReplyClient {
  requests: messagingApi.ReplyMessageRequest[] = [];

  async replyMessage(request: messagingApi.ReplyMessageRequest): Promise<unknown> {
    this.requests.push(request);
    return {};
  }
}

function sign(rawBody: string, secret = SECRET): string {
  return createHmac("sha256", secret).update(rawBody).digest("base64");
}

function incoming(overrides: Partial<IncomingMessage> = {}): IncomingMessage {
  return {
    id: "evt-1",
    conversationKey: "user:U-rider",
    content: { type: "text", text: "京都駅" },
    timestamp: new Date(0),
    replyToken: "reply-1",
    isRedelivery: false,
    ...overrides,
  };
}

function setup() {
  const client = new RecordingClient();
  const plugin = createLinePlugin({
    channelSecret: SECRET,
    channelAccessToken: "test-token",
    client,
  });
  return { client, plugin };
}

// -------------------------------------------------------------------
// verify
// -------------------------------------------------------------------

describe("LinePlugin.verify", () => {
  const rawBody = JSON.stringify({ destination: "U-bot", events: [] });

  it("accepts a body signed with the channel secret", () => {
    const { plugin } = setup();
    expect(plugin.verify(rawBody, sign(rawBody))).toBe(true);
  });

  it("rejects a signature made with another secret", () => {
    const { plugin } = setup();
    expect(plugin.verify(rawBody, sign(rawBody, "other-secret"))).toBe(false);
  });

  it("rejects a tampered body", () => {
    const { plugin } = setup();
    expect(plugin.verify(rawBody + " ", sign(rawBody))).toBe(false);
  });

  it("rejects an empty signature", () => {
    const { plugin } = setup();
    expect(plugin.verify(rawBody, "")).toBe(false);
  });

  it("exposes the LINE signature header", () => {
    const { plugin } = setup();
    expect(plugin.name).toBe("line");
    expect(plugin.signatureHeader).toBe("x-line-signature");
  });
});

// -------------------------------------------------------------------
// reply
// -------------------------------------------------------------------

describe("LinePlugin.reply", () => {
  it("sends text messages with the reply token", async () => {
    const { client, plugin } = setup();

    await plugin.reply(incoming(), [{ text: "キャンセルしました。" }]);

    expect(client.requests).toEqual([
      {
        replyToken: "reply-1",
        messages: [{ type: "text", text: "キャンセルしました。" }],
      },
    ]);
  });

  it("maps quick replies to message actions", async () => {
    const { client, plugin } = setup();

    await plugin.reply(incoming(), [
      {
        text: "どこまで行きますか？",
        quickReplies: [{ label: "❌ キャンセル", text: "キャンセル" }],
      },
    ]);

    expect(client.requests[0]?.messages[0]).toEqual({
      type: "text",
      text: "どこまで行きますか？",
      quickReply: {
        items: [
          {
            type: "action",
            action: { type: "message", label: "❌ キャンセル", text: "キャンセル" },
          },
        ],
      },
    });
  });

  it("caps messages at five and quick-reply items at thirteen", async () => {
    const { client, plugin } = setup();
    const quickReplies = Array.from({ length: 15 }, (_, i) => ({
      label: `停留所${i}`,
      text: `停留所${i}`,
    }));
    const messages: OutgoingMessage[] = Array.from({ length: 7 }, (_, i) => ({
      text: `message ${i}`,
      quickReplies,
    }));

    await plugin.reply(incoming(), messages);

    const sent = client.requests[0]?.messages ?? [];
    expect(sent).toHaveLength(5);
    expect(sent[0]?.quickReply?.items).toHaveLength(13);
  });

  it("does not call the API when there is nothing to send", async () => {
    const { client, plugin } = setup();
    await plugin.reply(incoming(), []);
    expect(client.requests).toEqual([]);
  });

  it("fails without a reply token", async () => {
    const { plugin } = setup();
    await expect(
      plugin.reply(incoming({ replyToken: undefined }), [{ text: "hi" }]),
    ).rejects.toThrow(/No reply token/);
  });
});

describe("truncateLabel", () => {
  it("keeps labels within the limit", () => {
    expect(truncateLabel("四条河原町 (120m)")).toBe("四条河原町 (120m)");
  });

  it("cuts long labels and marks the cut", () => {
    const label = "あいうえおかきくけこさしすせそたちつてとなに";
    expect(truncateLabel(label)).toBe("あいうえおかきくけこさしすせそたちつて…");
    expect(Array.from(truncateLabel(label))).toHaveLength(20);
  });
});
