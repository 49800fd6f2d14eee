import type { FastifyBaseLogger } from "fastify";

import type { NamespaceService } from "./namespace.service";
import type { TreeChangeEvent } from "../../types/namespace";

export interface WebSocketClientLike {
  readyState: number;
  send(data: string): void;
}

export interface WebSocketServerLike {
  clients: Set<WebSocketClientLike>;
}

const OPEN = 1;

/** Pushes every successful tree or recycle-bin mutation to connected WebSocket clients. */
export class TreeBroadcaster {
  private unsubscribe?: () => void;
  private readonly log: FastifyBaseLogger;

  constructor(
    log: FastifyBaseLogger,
    private readonly service: NamespaceService,
    private readonly getWebSocketServer: () => WebSocketServerLike | undefined
  ) {
    this.log = log.child({ module: "tree-broadcaster" });
  }

  public start(): void {
    if (this.unsubscribe !== undefined) {
      this.log.warn("Tree broadcaster already started, skipping reinitialization.");
      return;
    }

    this.unsubscribe = this.service.onChange((event) => {
      this.broadcast(event);
    });
    this.log.info("Tree broadcaster started.");
  }

  public stop(): void {
    if (this.unsubscribe === undefined) {
      return;
    }

    this.unsubscribe();
    this.unsubscribe = undefined;
    this.log.info("Tree broadcaster stopped.");
  }

  private broadcast(payload: TreeChangeEvent): void {
    const wsServer = this.getWebSocketServer();

    if (!wsServer) {
      this.log.warn("WebSocket server is not available; skipping broadcast.");
      return;
    }

    const serialized = JSON.stringify({
      channel: "tree:update",
      payload
    });

    for (const client of wsServer.clients) {
      if (client.readyState !== OPEN) {
        continue;
      }

      try {
        client.send(serialized);
      } catch (error) {
        this.log.error({ err: error }, "Failed to send tree event to WebSocket client.");
      }
    }
  }
}
