import dotenv from "dotenv";
import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";
import http from "node:http";

import { loadServerConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createRequestListener, createRouter } from "./http/routes.js";
import { JsonlTranscriptSink, noopTranscriptSink } from "./persistence/transcriptSink.js";
import { RecognitionDispatcher } from "./recognition/dispatcher.js";
import { createEngine } from "./recognition/engines/index.js";
import { createSessionRegistry } from "./session/sessionRegistry.js";
import { createLogger } from "./util/logger.js";
import { createWsServer } from "./ws/server.js";

// Load `.env` files if present: `apps/server/.env` first, then the repo root.
// Already-set variables are never overridden.
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const serverEnvPath = resolve(__dirname, "../.env"); // apps/server/.env
const repoRootEnvPath = resolve(__dirname, "../../../.env"); // repo root .env
if (existsSync(serverEnvPath)) {
  dotenv.config({ path: serverEnvPath });
}
if (existsSync(repoRootEnvPath)) {
  dotenv.config({ path: repoRootEnvPath });
}

const log = createLogger("server");

async function main() {
  const config = loadServerConfig();

  const dispatcher = new RecognitionDispatcher({
    engine: createEngine(config.engine),
    config: config.dispatcher,
  });
  await dispatcher.init();

  const sink = config.transcriptLogPath ? new JsonlTranscriptSink(config.transcriptLogPath) : noopTranscriptSink;

  const registry = createSessionRegistry({
    audio: config.audio,
    session: config.session,
    registry: config.registry,
    dispatcher,
    sink,
  });
  registry.startSweeper();

  const route = createRouter({ registry, dispatcherStats: () => dispatcher.stats(), sink });
  const server = http.createServer(createRequestListener(route));
  const ws = createWsServer({
    server,
    path: config.wsPath,
    registry,
    supportedLanguages: config.session.supportedLanguages,
  });

  server.listen(config.port, config.host, () => {
    log.info(`listening on http://${config.host}:${config.port} (WS ${config.wsPath})`, {
      engine: dispatcher.engineName,
      persistence: config.transcriptLogPath ?? "off",
    });
  });

  let shuttingDown = false;
  async function shutdown(signal: string) {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info("shutting down", { signal });
    await registry.close("server_shutdown");
    await dispatcher.shutdown();
    await ws.close();
    await new Promise<void>((done) => server.close(() => done()));
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log.error("shutdown failed", { error: errorMessage(err) });
          process.exit(1);
        });
    });
  }
}

main().catch((err: unknown) => {
  log.error("failed to start", { error: errorMessage(err) });
  process.exit(1);
});
