import { createApp } from "./app";
import { loadEnv } from "./config/env";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const { app, logger, engine } = createApp(env);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, nodeEnv: env.nodeEnv });
    logger.info("SEMANTIC_MATCHING", { enabled: engine.isSemanticEnabled() });
  });
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`Failed to start server: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
