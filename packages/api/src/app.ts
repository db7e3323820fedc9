import cors from "@fastify/cors";
import type { NoveltyService } from "@pitchcheck/pipeline";
import { createLogger, isPitchcheckError, type Logger } from "@pitchcheck/shared";
import Fastify, { type FastifyInstance } from "fastify";
import { registerMetricsHooks } from "./metrics.js";
import { healthRoutes } from "./routes/health.js";
import { noveltyRoutes } from "./routes/novelty.js";

export interface ServerDeps {
  service: NoveltyService;
  log?: Logger;
  /** Fastify's own request logging (default true) */
  logRequests?: boolean;
}

interface ErrorEnvelope {
  ok: false;
  error: {
    code: string;
    message: string;
  };
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const log = deps.log ?? createLogger({ component: "api" });
  const fastify = Fastify({
    logger: deps.logRequests ?? true,
  });

  await fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
  });

  registerMetricsHooks(fastify);

  fastify.setErrorHandler((error: Error & { statusCode?: number; code?: string }, request, reply) => {
    const statusCode = isPitchcheckError(error) ? error.statusCode : (error.statusCode ?? 500);
    const envelope: ErrorEnvelope = {
      ok: false,
      error: {
        code: error.code ?? "INTERNAL_ERROR",
        message: error.message,
      },
    };
    if (statusCode >= 500) {
      log.error({ requestId: request.id, code: envelope.error.code, err: error.message }, "Request failed");
    }
    return reply.code(statusCode).send(envelope);
  });

  await fastify.register(healthRoutes, { prefix: "/api" });
  await fastify.register(noveltyRoutes, { prefix: "/api", service: deps.service, log });

  return fastify;
}
