import Fastify, { type FastifyInstance } from "fastify";
import websocket from "@fastify/websocket";
import cors from "@fastify/cors";

import { config, type LogLevel } from "./config";
import { namespaceRouter } from "./modules/namespace/namespace.router";
import { NamespaceService } from "./modules/namespace/namespace.service";
import { TreeBroadcaster } from "./modules/namespace/tree.broadcaster";
import { SnapshotStore } from "./modules/storage/snapshot.store";

export interface BuildServerOptions {
  logLevel?: LogLevel;
  corsOrigin?: string;
  /** SQLite file (or ":memory:") holding the namespace snapshot; omit to stay memory-only. */
  dataPath?: string;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const server = Fastify({
    logger: { level: options.logLevel ?? config.logLevel }
  });

  const service = new NamespaceService({ log: server.log });
  const corsOrigin = options.corsOrigin ?? config.corsOrigin;

  await server.register(cors, {
    origin: corsOrigin === "" ? true : corsOrigin.split(",").map((origin) => origin.trim()),
    credentials: true
  });
  await server.register(websocket);
  await server.register(namespaceRouter, { service });

  const dataPath = options.dataPath ?? config.dataPath;
  if (dataPath !== undefined) {
    await attachSnapshotStore(server, service, dataPath);
  }

  const broadcaster = new TreeBroadcaster(server.log, service, () => server.websocketServer);
  broadcaster.start();
  server.addHook("onClose", async () => {
    broadcaster.stop();
  });

  server.get("/health", async () => ({
    status: "ok"
  }));

  server.register(async function (fastify) {
    fastify.get("/ws/tree", { websocket: true }, (connection, request) => {
      const socket = connection.socket;
      const remoteAddress = request.ip ?? "unknown";

      socket.send(
        JSON.stringify({
          type: "connected",
          service: "tree",
          timestamp: new Date().toISOString()
        })
      );

      socket.on("error", (error: unknown) => {
        fastify.log.error({ module: "ws-tree", remoteAddress, err: error }, "WS tree socket error");
      });
    });
  });

  return server;
}

async function attachSnapshotStore(
  server: FastifyInstance,
  service: NamespaceService,
  dataPath: string
): Promise<void> {
  const log = server.log.child({ module: "snapshot-store" });
  const store = new SnapshotStore(dataPath);

  try {
    const snapshot = await store.load();
    if (snapshot) {
      service.importState(snapshot);
      log.info({ dataPath }, "Namespace restored from snapshot.");
    }
  } catch (error) {
    log.error({ err: error, dataPath }, "Failed to restore namespace snapshot.");
    await store.close();
    throw error;
  }

  // Saves run after the mutation has completed; a failed save leaves the in-memory state as is.
  let pending: Promise<void> = Promise.resolve();
  const unsubscribe = service.onChange(() => {
    const state = service.exportState();
    pending = pending
      .then(() => store.save(state))
      .catch((error: unknown) => {
        log.error({ err: error, dataPath }, "Failed to save namespace snapshot.");
      });
  });

  server.addHook("onClose", async () => {
    unsubscribe();
    await pending;
    await store.close();
  });
}
