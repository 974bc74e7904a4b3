/**
 * Control Server
 *
 * Hosts the control channel on a `ws` WebSocketServer sharing the HTTP server.
 * Each display client gets an id; outbound messages are JSON text frames.
 */

import type { Server } from "http";
import WebSocket, { RawData, WebSocketServer } from "ws";
import { OutboundMessage } from "../../types/index";
import { generateId, rawDataToString } from "../../utils/index";
import { asError } from "../../utils/errors";
import { Logger } from "../../utils/logger";
import { ControlChannel, ControlTransport } from "./controlChannel";

export class ControlServer implements ControlTransport {
  private readonly logger: Logger;
  private readonly wss: WebSocketServer;
  private readonly clients = new Map<string, WebSocket>();

  constructor(server: Server, logger?: Logger) {
    this.logger = logger ?? new Logger("ControlServer");
    this.wss = new WebSocketServer({ server });
    this.wss.on("error", (error: Error) => {
      this.logger.error("Control server error", error);
    });
  }

  get clientCount(): number {
    return this.clients.size;
  }

  /**
   * Routes every client connection through the channel
   */
  listen(channel: ControlChannel): void {
    this.wss.on("connection", (socket: WebSocket, req) => {
      const clientId = generateId();
      const clientLogger = this.logger.child(clientId.slice(0, 8));
      this.clients.set(clientId, socket);

      clientLogger.info("Display client connected", {
        ip: req.socket.remoteAddress,
        clients: this.clients.size,
      });

      socket.on("message", (data: RawData) => {
        channel.handleMessage(clientId, rawDataToString(data)).catch((error: unknown) => {
          clientLogger.error("Failed to handle control message", asError(error));
        });
      });

      socket.on("close", (code: number) => {
        this.clients.delete(clientId);
        clientLogger.info("Display client disconnected", { code, clients: this.clients.size });
      });

      socket.on("error", (error: Error) => {
        clientLogger.error("Control socket error", error);
      });

      channel.greet(clientId);
    });
  }

  broadcast(message: OutboundMessage): void {
    const payload = JSON.stringify(message);
    for (const [clientId, socket] of this.clients) {
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(payload);
      } else if (socket.readyState === WebSocket.CLOSED) {
        this.clients.delete(clientId);
      }
    }
  }

  send(clientId: string, message: OutboundMessage): void {
    const socket = this.clients.get(clientId);
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      this.logger.debug("Dropping message for unavailable client", { clientId, type: message.type });
      return;
    }
    socket.send(JSON.stringify(message));
  }

  close(): Promise<void> {
    for (const socket of this.clients.values()) {
      socket.close(1001, "server shutting down");
    }
    this.clients.clear();
    return new Promise((resolve, reject) => {
      this.wss.close((error?: Error) => (error ? reject(error) : resolve()));
    });
  }
}
