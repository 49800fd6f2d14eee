import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";

import { registerNamespaceController } from "./namespace.controller";
import { NamespaceService } from "./namespace.service";

declare module "fastify" {
  interface FastifyInstance {
    namespaceService: NamespaceService;
  }
}

interface NamespacePluginOptions {
  service?: NamespaceService;
}

async function namespaceModule(
  fastify: FastifyInstance,
  options: NamespacePluginOptions
): Promise<void> {
  if (fastify.hasDecorator("namespaceService")) {
    fastify.log.warn("namespaceService is already registered, skipping reinitialization.");
    return;
  }

  const service = options.service ?? new NamespaceService({ log: fastify.log });
  fastify.decorate("namespaceService", service);

  fastify.register(
    async (scopedFastify) => {
      registerNamespaceController({ fastify: scopedFastify, service });
    },
    { prefix: "/api" }
  );
}

export const namespaceRouter = fp(namespaceModule, {
  name: "namespace-router",
  fastify: "4.x"
});
