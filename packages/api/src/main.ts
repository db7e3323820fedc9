import { createNoveltyDeps, createNoveltyService } from "@pitchcheck/pipeline";
import { createLogger, loadDotEnvIfPresent, loadRuntimeEnv } from "@pitchcheck/shared";
import { buildServer } from "./app.js";

// Load .env and .env.local files (must happen before reading env vars)
loadDotEnvIfPresent();

const log = createLogger({ component: "api" });

async function main(): Promise<void> {
  const env = loadRuntimeEnv();
  const service = createNoveltyService(createNoveltyDeps(env));
  const server = await buildServer({ service, log });

  const shutdown = async (signal: string): Promise<void> => {
    log.info({ signal }, "Received signal, shutting down");
    await server.close();
    log.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  await server.listen({ port: env.apiPort, host: "0.0.0.0" });
  log.info({ port: env.apiPort, appEnv: env.appEnv }, "API server listening");
}

main().catch((err: unknown) => {
  log.fatal({ err: err instanceof Error ? err.message : String(err) }, "API server failed to start");
  process.exit(1);
});
