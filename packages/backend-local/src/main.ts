import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import { mkdirSync } from "node:fs";
import type { AddressInfo } from "node:net";
import { dirname } from "node:path";
import type { WSContext } from "hono/ws";
import type { WebSocket } from "ws";

import { IN_MEMORY_DATABASE, SqliteStore } from "./adapters/SqliteStore.js";
import { WebSocketBus } from "./adapters/WebSocketBus.js";
import { createBackendApp } from "./app.js";
import { bootstrap } from "./bootstrap.js";
import { readServerConfig } from "./config.js";
import { ROUND_CHANNEL, TeardownRound, createGameConfig } from "./core.js";
import type { CommandContext } from "./core.js";
import { createSerialDispatch } from "./dispatchCommand.js";
import { createConsoleLogger } from "./logger.js";

export async function startServer(): Promise<void> {
  const logger = createConsoleLogger("word-hunt");
  const serverConfig = readServerConfig();

  if (serverConfig.databasePath !== IN_MEMORY_DATABASE) {
    mkdirSync(dirname(serverConfig.databasePath), { recursive: true });
  }
  const store = await SqliteStore.open({ filename: serverConfig.databasePath, logger });

  const config = createGameConfig();
  const engine = await bootstrap({
    store,
    config,
    logger,
    wordListPath: serverConfig.wordListPath,
  });
  const bus = new WebSocketBus(logger);
  const dispatch = createSerialDispatch();

  const createContext = (): CommandContext => ({
    engine,
    store,
    bus,
    config,
    logger,
  });

  const app = createBackendApp({
    port: serverConfig.port,
    store,
    logger,
    createContext,
    dispatch,
  });

  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  app.get(
    "/ws",
    upgradeWebSocket(() => ({
      onOpen(_event: Event, ws: WSContext<WebSocket>): void {
        const rawSocket = ws.raw;
        if (!rawSocket) {
          logger.warn("WebSocket connection missing raw handle");
          return;
        }
        bus.attach(ROUND_CHANNEL, rawSocket);
      },
    })),
  );

  const server = serve({ fetch: app.fetch, port: serverConfig.port }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });

  injectWebSocket(server);

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { signal });

    await dispatch(new TeardownRound(Date.now()), createContext());
    bus.close();
    server.close();
    store.close();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, (received: NodeJS.Signals) => {
      shutdown(received).catch((error: unknown) => {
        logger.error("Shutdown failed", { error });
        process.exitCode = 1;
      });
    });
  }
}

void startServer().catch((error) => {
  createConsoleLogger("word-hunt").error("Failed to start backend", { error });
  process.exit(1);
});
