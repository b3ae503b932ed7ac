import Fastify from "fastify";
import { getConfig } from "./config";
import { healthRoutes } from "./routes/health";
import { queriesRoutes, type QueriesRouteOptions } from "./routes/queries";
import { withRequestMeta } from "./utils/http-envelope";

export interface BuildServerOptions {
  logger?: boolean;
  queries?: QueriesRouteOptions;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const app = Fastify({
    logger: options.logger ?? { level: getConfig().logLevel },
  });

  app.addHook("onSend", (request, reply, payload, done) => {
    reply.header("x-request-id", request.id);
    done(null, payload);
  });

  app.addHook("preSerialization", (request, _reply, payload, done) => {
    done(null, withRequestMeta(payload, request.id));
  });

  app.register(healthRoutes, { prefix: "/api/v1" });
  app.register(queriesRoutes, {
    prefix: "/api/v1",
    ...(options.queries ?? {}),
  });

  return app;
}

export function getListenPort(): number {
  return getConfig().port;
}
