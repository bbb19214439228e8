/**
 * Reply Templates
 *
 * Rider-facing Japanese texts and quick-reply sets. Everything here is
 * pure: data in, OutgoingMessage out.
 */

import type {
  ArrivalStatus,
  BusPosition,
  Coordinates,
  OutgoingMessage,
  Query,
  QuickReplyOption,
  RealtimeInfo,
} from "@noriba/core";
import { shortClock } from "@noriba/core";
import type { ClassifiedRoute, RouteSearchResult } from "../bus/route-search.js";
import type { NearbyStop } from "../bus/types.js";

// ─────────────────────────────────────────────────────────────────
// Fixed texts
// ─────────────────────────────────────────────────────────────────

export const CANCELLED_TEXT = "キャンセルしました。";
export const DESTINATION_PROMPT_TEXT = "どこまで行きますか？\nバス停名を入力してください。";
export const LAST_BUS_NOTICE_TEXT = "🌙 本日のバス運行は終了しています。\n翌日の始バスをご案内します。";
export const GENERIC_ERROR_TEXT = "⚠️ エラーが発生しました。もう一度お試しください。";
export const NO_NEARBY_STOPS_TEXT =
  "📍 周辺にバス停が見つかりませんでした。\n\n別の場所を試すか、バス停名を直接入力してください。";
export const NEARBY_PROMPT_TEXT =
  "📍 周辺のバス停を検索します。\n\nLINEの「+」ボタンから「位置情報」を選択して、現在地を送信してください。";
export const UNRECOGNIZED_TEXT =
  "バス停名を入力してください。\n\n例: 「四条河原町 京都駅」\n（使い方を見るには「使い方」と入力）";

export const HELP_TEXT = [
  "🚌 市バス検索Bot",
  "",
  "【使い方】",
  "出発地と目的地をスペースで区切って入力してください。",
  "",
  "例:",
  "• 四条河原町 京都駅",
  "• 四条河原町から京都駅",
  "• 四条河原町→京都駅",
  "",
  "出発地だけを入力すると、目的地を聞かれます。",
  "",
  "【位置情報から検索】",
  "📍 位置情報を送信すると、周辺のバス停から選択できます。",
  "「周辺バス停」と入力しても案内が表示されます。",
  "",
  "※現在時刻をもとに検索します。",
].join("\n");

// ─────────────────────────────────────────────────────────────────
// Quick replies
// ─────────────────────────────────────────────────────────────────

export const QUICK_REPLY_LABEL_MAX = 20;
/** LINE shows at most 13 quick replies; one is kept for cancel */
export const NEARBY_OPTIONS_MAX = 12;

export const HELP_OPTION: QuickReplyOption = { label: "❓ 使い方", text: "使い方" };
export const CANCEL_OPTION: QuickReplyOption = { label: "キャンセル", text: "キャンセル" };
export const NEARBY_OPTION: QuickReplyOption = { label: "📍 周辺バス停", text: "周辺バス停" };

export function reverseSearchOption(query: Query): QuickReplyOption {
  return { label: "🔄 逆方向を検索", text: `${query.destination}→${query.departure}` };
}

/**
 * "name (120m)" within the label limit; the stop name is shortened, never
 * the distance.
 */
export function nearbyStopLabel(stop: NearbyStop): string {
  const distance = `(${Math.trunc(stop.distanceMeters)}m)`;
  const maxName = QUICK_REPLY_LABEL_MAX - distance.length - 1;
  const chars = Array.from(stop.stopName);
  const name = chars.length > maxName ? chars.slice(0, maxName - 1).join("") + "…" : stop.stopName;
  return `${name} ${distance}`;
}

// ─────────────────────────────────────────────────────────────────
// Messages
// ─────────────────────────────────────────────────────────────────

export function textMessage(text: string, quickReplies?: QuickReplyOption[]): OutgoingMessage {
  return quickReplies ? { text, quickReplies } : { text };
}

export function helpMessage(): OutgoingMessage {
  return textMessage(HELP_TEXT, [NEARBY_OPTION]);
}

export function destinationPrompt(): OutgoingMessage {
  return textMessage(DESTINATION_PROMPT_TEXT, [HELP_OPTION, CANCEL_OPTION]);
}

export function stopNotFoundMessage(stop: string): OutgoingMessage {
  return textMessage(`⚠️ 停留所「${stop}」が見つかりません。\n\n正しいバス停名を入力してください。`, [
    HELP_OPTION,
  ]);
}

export function apiErrorMessage(message: string): OutgoingMessage {
  return textMessage(`⚠️ ${message}`, [HELP_OPTION]);
}

export function nearbyStopsMessage(
  stops: NearbyStop[],
  coordinates: Coordinates,
  limit: number,
): OutgoingMessage {
  const shown = stops.slice(0, Math.min(limit, NEARBY_OPTIONS_MAX));
  const place = coordinates.title ? `場所: ${coordinates.title}\n` : "";
  const text =
    `📍 位置情報を受け取りました。\n${place}\n` +
    `近くのバス停が ${shown.length} 件見つかりました。\n` +
    "出発するバス停を選択してください。";
  const options = shown.map((stop) => ({ label: nearbyStopLabel(stop), text: stop.stopName }));
  return textMessage(text, [...options, CANCEL_OPTION]);
}

// ─────────────────────────────────────────────────────────────────
// Route results
// ─────────────────────────────────────────────────────────────────

const STATUS_LABELS: Record<ArrivalStatus, string | null> = {
  approaching: "🔴 市バス接近中",
  on_time: "✅ 定時運行",
  no_info: null,
};

function clockOrUnknown(time: string): string {
  return time ? shortClock(time) : "不明";
}

function describePosition(position: BusPosition, realtime: RealtimeInfo): string {
  if (position.type === "far") {
    return `   🚏 バスは${position.stopsAway}つ以上前の停留所です`;
  }
  const next = position.toStop ?? realtime.boardingStop.stopName;
  return `   🚏 ${position.fromStop} → ${next} を走行中（${position.stopsAway}つ前）`;
}

function routeLines(entry: ClassifiedRoute, index: number, query: Query): string[] {
  const { route } = entry;
  const lines = [
    `${index}. ${route.routeName}`,
    `   出発: ${clockOrUnknown(route.departureTime)} (${route.departureStopDesc ?? query.departure})`,
    `   到着: ${clockOrUnknown(route.arrivalTime)} (${route.arrivalStopDesc ?? query.destination})`,
    `   所要時間: ${route.travelTimeMinutes}分`,
  ];

  const label = STATUS_LABELS[entry.status];
  if (label) {
    const minutes = entry.minutesUntilDeparture;
    const eta =
      entry.status === "approaching" && minutes !== null && minutes > 0
        ? ` あと約 ${minutes} 分で到着予定`
        : "";
    lines.push(`   ${label}${eta}`);
  }
  if (entry.realtime) {
    lines.push(describePosition(entry.realtime.busPosition, entry.realtime));
  }
  return lines;
}

export function formatRoutes(query: Query, routes: ClassifiedRoute[]): string {
  if (routes.length === 0) {
    return `${query.departure} から ${query.destination} への路線が見つかりませんでした。`;
  }
  const blocks = routes.map((entry, i) => routeLines(entry, i + 1, query).join("\n"));
  return `🚌 ${query.departure} → ${query.destination}\n\n${blocks.join("\n\n")}`;
}

/** Results, preceded by the last-bus notice when the routes are tomorrow's */
export function routeResultMessages(result: RouteSearchResult): OutgoingMessage[] {
  const quickReplies = [reverseSearchOption(result.query), HELP_OPTION];
  const results = textMessage(formatRoutes(result.query, result.routes), quickReplies);
  return result.lastBusPassed ? [textMessage(LAST_BUS_NOTICE_TEXT), results] : [results];
}
