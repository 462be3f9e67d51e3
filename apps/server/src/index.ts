import dotenv from "dotenv";
dotenv.config({ quiet: true });

import config from "./config";
import log from "./logger";
import { WsTransport } from "./transport/WsTransport";
import { GameServer } from "./services/GameServer";

async function main(): Promise<void> {
  const transport = new WsTransport({ heartbeatIntervalMs: config.heartbeatIntervalMs });
  const server = new GameServer({
    transport,
    port: config.port,
    host: config.host,
    maxConnections: config.maxConnections,
  });

  try {
    await server.init();
  } catch {
    // init() already logged the bind failure
    process.exit(1);
  }

  const tickInterval = setInterval(() => {
    try {
      server.tick();
    } catch (err) {
      log.error({ err: err instanceof Error ? err.message : String(err) }, "Tick failed");
    }
  }, config.tickIntervalMs);

  log.info({ tickIntervalMs: config.tickIntervalMs }, "tic-tac-toe server started");

  // Graceful shutdown
  const shutdown = async () => {
    log.info("Shutting down...");
    clearInterval(tickInterval);
    await server.shutdown();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      log.error({ err: err instanceof Error ? err.message : String(err) }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
  process.on("SIGHUP", () => server.resetGame());
}

main().catch((err) => {
  log.fatal({ err: err instanceof Error ? err.message : String(err) }, "Server crashed");
  process.exit(1);
});
