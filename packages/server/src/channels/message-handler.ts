/**
 * Bus Message Handler
 *
 * Turns one incoming channel message into the replies for it:
 * - command keywords (cancel / help / nearby) are answered directly
 * - everything else goes through the ConversationResolver, and the
 *   outcome decides between a route search, a destination prompt,
 *   a nearby-stop picker and a retry prompt
 *
 * Dedup happens in ChannelManager before messages reach here. Errors
 * never escape: they become an error reply.
 */

import {
  matchCommand,
  silentLogger,
  DEFAULT_COMMAND_KEYWORDS,
  type BotCommand,
  type CommandKeywords,
  type Coordinates,
  type ConversationResolver,
  type IncomingMessage,
  type Logger,
  type OutgoingMessage,
  type Outcome,
  type StopName,
} from "@noriba/core";
import { BusApiError, type BusApi } from "../bus/types.js";
import type { RouteSearchService } from "../bus/route-search.js";
import {
  CANCELLED_TEXT,
  GENERIC_ERROR_TEXT,
  NEARBY_PROMPT_TEXT,
  NO_NEARBY_STOPS_TEXT,
  UNRECOGNIZED_TEXT,
  apiErrorMessage,
  destinationPrompt,
  helpMessage,
  nearbyStopsMessage,
  routeResultMessages,
  stopNotFoundMessage,
  textMessage,
  HELP_OPTION,
} from "../replies/templates.js";

interface MessageHandlerDeps {
  resolver: ConversationResolver;
  routeSearch: RouteSearchService;
  api: BusApi;
  commands?: CommandKeywords;
  /** Check a lone departure stop exists before asking for the destination */
  validateStops?: boolean;
  nearbyRadiusMeters?: number;
  nearbyLimit?: number;
  logger?: Logger;
}

export class BusMessageHandler {
  private deps: MessageHandlerDeps;
  private commands: CommandKeywords;
  private log: Logger;

  constructor(deps: MessageHandlerDeps) {
    this.deps = deps;
    this.commands = deps.commands ?? DEFAULT_COMMAND_KEYWORDS;
    this.log = deps.logger ?? silentLogger();
  }

  async handle(message: IncomingMessage, now: Date = new Date()): Promise<OutgoingMessage[]> {
    const key = message.conversationKey;
    try {
      if (message.content.type === "text") {
        const command = matchCommand(message.content.text, this.commands);
        if (command) {
          return await this.handleCommand(key, command);
        }
      }

      const input =
        message.content.type === "text" ? message.content.text : message.content.coordinates;
      const outcome = await this.deps.resolver.resolve(key, input, now);
      this.log.debug({ key, outcome: outcome.type }, "Resolved message");
      return await this.handleOutcome(key, outcome, now);
    } catch (err) {
      if (err instanceof BusApiError) {
        this.log.error({ key, err }, "Bus API error");
        return [apiErrorMessage(err.message)];
      }
      this.log.error({ key, err }, "Failed to handle message");
      return [textMessage(GENERIC_ERROR_TEXT)];
    }
  }

  // ── Commands ───────────────────────────────────────────────────

  private async handleCommand(key: string, command: BotCommand): Promise<OutgoingMessage[]> {
    switch (command) {
      case "cancel":
        await this.deps.resolver.cancel(key);
        return [textMessage(CANCELLED_TEXT, [HELP_OPTION])];
      case "help":
        return [helpMessage()];
      case "nearby":
        return [textMessage(NEARBY_PROMPT_TEXT)];
    }
  }

  // ── Outcomes ───────────────────────────────────────────────────

  private async handleOutcome(
    key: string,
    outcome: Outcome,
    now: Date,
  ): Promise<OutgoingMessage[]> {
    switch (outcome.type) {
      case "complete_query": {
        const result = await this.deps.routeSearch.search(outcome.query, now);
        this.log.info(
          {
            key,
            departure: outcome.query.departure,
            destination: outcome.query.destination,
            routes: result.routes.length,
            lastBusPassed: result.lastBusPassed,
          },
          "Route search complete",
        );
        return routeResultMessages(result);
      }
      case "awaiting_destination":
        return this.promptForDestination(key, outcome.departure, now);
      case "needs_location_selection":
        return this.offerNearbyStops(outcome.coordinates);
      case "unrecognized":
        return [textMessage(UNRECOGNIZED_TEXT, [HELP_OPTION])];
    }
  }

  /**
   * The session was stored by the resolver at `startedAt`. The stop check
   * runs outside the resolver's lock, so a rejected departure only drops
   * that same session; a later message may already have paired or
   * replaced it.
   */
  private async promptForDestination(
    key: string,
    departure: StopName,
    startedAt: Date,
  ): Promise<OutgoingMessage[]> {
    if (this.deps.validateStops ?? true) {
      let exists: boolean;
      try {
        exists = await this.deps.api.stopExists(departure);
      } catch (err) {
        await this.deps.resolver.cancelIfPending(key, departure, startedAt, startedAt);
        throw err;
      }
      if (!exists) {
        const dropped = await this.deps.resolver.cancelIfPending(key, departure, startedAt, startedAt);
        this.log.info({ key, departure, dropped }, "Unknown departure stop");
        return [stopNotFoundMessage(departure)];
      }
    }
    return [destinationPrompt()];
  }

  private async offerNearbyStops(coordinates: Coordinates): Promise<OutgoingMessage[]> {
    const limit = this.deps.nearbyLimit ?? 5;
    const stops = await this.deps.api.nearbyStops({
      latitude: coordinates.latitude,
      longitude: coordinates.longitude,
      radiusMeters: this.deps.nearbyRadiusMeters ?? 500,
      limit,
    });
    if (stops.length === 0) {
      return [textMessage(NO_NEARBY_STOPS_TEXT)];
    }
    return [nearbyStopsMessage(stops, coordinates, limit)];
  }
}
