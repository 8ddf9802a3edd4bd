/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { WebSocket } from "ws";

import type { Logger, MessageBus } from "../core.js";

export interface PublishedEvent<TEvent extends object = object> {
  readonly channel: string;
  readonly event: TEvent;
}

/**
 * Fans round events out to chat clients connected over WebSocket. A chat
 * transport subscribes here and turns events into channel messages.
 */
export class WebSocketBus implements MessageBus {
  #clients: Map<string, Set<WebSocket>> = new Map();
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  async publish(channel: string, event: object): Promise<void> {
    const connections = this.#clients.get(channel);
    if (!connections || connections.size === 0) {
      this.#logger?.debug("Event published without subscribers", { channel, event });
      return;
    }

    const message = JSON.stringify(event);
    let delivered = 0;
    for (const socket of connections) {
      if (socket.readyState !== WebSocket.OPEN) {
        continue;
      }
      try {
        socket.send(message);
        delivered += 1;
      } catch (error) {
        this.#logger?.warn("Failed to deliver event", { channel, error });
      }
    }

    this.#logger?.debug("Event published", { channel, event, delivered });
  }

  attach(channel: string, socket: WebSocket): void {
    let connections = this.#clients.get(channel);
    if (!connections) {
      connections = new Set<WebSocket>();
      this.#clients.set(channel, connections);
    }
    connections.add(socket);

    this.#logger?.info("WebSocket client attached", {
      channel,
      size: connections.size,
    });

    socket.on("close", () => {
      const currentConnections = this.#clients.get(channel);
      if (!currentConnections) {
        return;
      }
      currentConnections.delete(socket);
      if (currentConnections.size === 0) {
        this.#clients.delete(channel);
      }
      this.#logger?.info("WebSocket client disconnected", {
        channel,
        size: currentConnections.size,
      });
    });

    socket.on("error", (error: Error) => {
      this.#logger?.warn("WebSocket client error", { channel, error });
    });
  }

  subscriberCount(channel: string): number {
    return this.#clients.get(channel)?.size ?? 0;
  }

  /** Close every client connection, e.g. on shutdown. */
  close(): void {
    for (const connections of this.#clients.values()) {
      for (const socket of connections) {
        socket.close(1001, "Server shutting down");
      }
    }
    this.#clients.clear();
  }
}
