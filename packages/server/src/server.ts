import Fastify, {
  type FastifyInstance,
  type RawReplyDefaultExpression,
  type RawRequestDefaultExpression,
  type RawServerDefault,
} from "fastify";
import type { Logger } from "@noriba/core";
import type { ChannelManager } from "./channels/index.js";

export interface ServerOptions {
  /** Prefix of the health and callback routes ("" or "/segment") */
  basePath: string;
  channelManager: ChannelManager;
  logger: Logger;
  serviceName?: string;
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    channelManager: ChannelManager;
    serviceName: string;
  }
}

/** Fastify instance logging through the process pino logger */
export type NoribaServer = FastifyInstance<
  RawServerDefault,
  RawRequestDefaultExpression,
  RawReplyDefaultExpression,
  Logger
>;

export async function createServer(options: ServerOptions): Promise<NoribaServer> {
  const { basePath, channelManager, logger } = options;

  const fastify = Fastify({ loggerInstance: logger });

  fastify.decorate("channelManager", channelManager);
  fastify.decorate("serviceName", options.serviceName ?? "noriba");

  fastify.get("/", async (_request, reply) => {
    return reply.type("text/plain").send("🚌 Noriba LINE bot is running");
  });

  await fastify.register(
    async (instance) => {
      // Signatures are computed over the exact bytes, so the callback
      // route keeps the JSON body as a string
      instance.removeContentTypeParser("application/json");
      instance.addContentTypeParser(
        "application/json",
        { parseAs: "string" },
        (_request, body, done) => {
          done(null, body);
        },
      );

      // GET {basePath}/health
      instance.get("/health", async () => {
        return {
          status: "ok",
          service: instance.serviceName,
          timestamp: new Date().toISOString(),
        };
      });

      // POST {basePath}/callback (channel webhook)
      instance.post("/callback", async (request, reply) => {
        const manager = instance.channelManager;
        const header = request.headers[manager.signatureHeader];
        const signature = Array.isArray(header) ? header[0] : header;

        if (typeof request.body !== "string") {
          return reply.code(400).send({ error: "Expected a JSON body" });
        }

        const result = await manager.receive(request.body, signature);
        switch (result.status) {
          case "invalid_signature":
            return reply.code(400).send({ error: "Invalid signature" });
          case "bad_request":
            return reply.code(400).send({ error: result.error });
          case "ok":
            request.log.info(
              { handled: result.handled, duplicates: result.duplicates, failed: result.failed },
              "Webhook processed",
            );
            return reply.type("text/plain").send("OK");
        }
      });
    },
    { prefix: basePath },
  );

  return fastify;
}
