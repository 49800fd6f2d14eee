import type { FastifyInstance } from "fastify";

import { config } from "./config";
import { buildServer } from "./app";

async function start() {
  let server: FastifyInstance | undefined;

  try {
    server = await buildServer();

    await server.listen({
      port: config.port,
      host: config.host
    });

    server.log.info(
      { dataPath: config.dataPath ?? null },
      `Server started on port ${config.port}`
    );
  } catch (error) {
    if (server) {
      server.log.error(error);
    } else {
      console.error("Failed to build server:", error);
    }
    process.exit(1);
  }
}

void start();
