import {
  loadConfig,
  requireLineCredentials,
  sessionTtlMs,
  createLogger,
  ConfigError,
  ConversationResolver,
  EventDedup,
  MemorySessionStore,
  StopNameParser,
  type LineCredentials,
  type Logger,
  type NoribaConfig,
} from "@noriba/core";
import { createLinePlugin } from "@noriba/channel-line";
import { HttpBusApiClient, RouteSearchService } from "./bus/index.js";
import { BusMessageHandler, ChannelManager } from "./channels/index.js";
import { createServer } from "./server.js";

function readConfig(): NoribaConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[noriba] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

function readCredentials(config: NoribaConfig, logger: Logger): LineCredentials {
  try {
    return requireLineCredentials(config);
  } catch (err) {
    logger.fatal({ err }, "LINE credentials missing");
    process.exit(1);
  }
}

async function main() {
  const config = readConfig();
  const logger = createLogger(config.logging);

  const credentials = readCredentials(config, logger);

  const api = new HttpBusApiClient({
    baseUrl: config.busApi.baseUrl,
    apiKey: config.busApi.apiKey,
    timeoutMs: config.busApi.timeoutMs,
    logger: logger.child({ component: "bus-api" }),
  });

  const resolver = new ConversationResolver({
    store: new MemorySessionStore(),
    parser: new StopNameParser(config.parser),
    sessionTtlMs: sessionTtlMs(config),
    logger: logger.child({ component: "resolver" }),
  });

  const handler = new BusMessageHandler({
    resolver,
    api,
    routeSearch: new RouteSearchService({
      api,
      timeZone: config.realtime.timeZone,
      routeLimit: config.search.routeLimit,
      logger: logger.child({ component: "route-search" }),
    }),
    commands: config.commands,
    validateStops: config.busApi.validateStops,
    nearbyRadiusMeters: config.search.nearbyRadiusMeters,
    nearbyLimit: config.search.nearbyLimit,
    logger: logger.child({ component: "message-handler" }),
  });

  const channelManager = new ChannelManager({
    plugin: createLinePlugin(credentials),
    handler,
    dedup: new EventDedup({ ttlMs: config.dedup.ttlMinutes * 60 * 1000 }),
    logger: logger.child({ component: "channel-manager" }),
  });

  const server = await createServer({
    basePath: config.server.basePath,
    channelManager,
    logger,
  });

  await server.listen({ host: config.server.host, port: config.server.port });
  logger.info(
    { basePath: config.server.basePath, busApi: config.busApi.baseUrl },
    "Noriba server started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    try {
      await server.close();
      logger.info("Server closed.");
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
