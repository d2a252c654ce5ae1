import express from "express";
import { createServer, type Server } from "http";
import { registerRoutes } from "./routes";
import { createLogger, diagnose } from "./diagnosis";
import { loadEnv } from "./env";

export async function createApp(): Promise<{ app: express.Express; httpServer: Server }> {
  const env = loadEnv();
  const logger = createLogger("server", env.DIAGNOSIS_LOG_LEVEL);

  const app = express();
  app.use(express.json({ limit: "100kb" }));

  const httpServer = createServer(app);
  await registerRoutes(httpServer, app, { diagnose, logger });
  return { app, httpServer };
}

async function main(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger("server", env.DIAGNOSIS_LOG_LEVEL);
  const { httpServer } = await createApp();

  httpServer.listen(env.PORT, () => {
    logger.info(`Listening on port ${env.PORT}`);
  });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error("[server] Failed to start:", error);
    process.exitCode = 1;
  });
}
