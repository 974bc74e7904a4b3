/**
 * Realtime Session Client
 *
 * Owns the WebSocket connection to the hosted realtime API: handshake and session
 * configuration, audio transmission, the inbound event stream and the proactive
 * reconnect clock. One APISession per connection; a reconnect replaces it.
 */

import WebSocket, { RawData } from "ws";
import { APISession, ApiEvent, Frame, RealtimeConfig } from "../../types/index";
import { generateId, rawDataToString } from "../../utils/index";
import { AsyncQueue } from "../../utils/concurrency";
import {
  ConnectionLostError,
  InvalidApiKeyError,
  ResponseTimeoutError,
  asError,
} from "../../utils/errors";
import { Logger } from "../../utils/logger";
import { concatFrames, resample, toBase64 } from "../audio/frame";
import { ClientEvent, buildAudioAppends, buildSessionUpdate, parseApiEvent } from "./protocol";

/**
 * The session surface the orchestrator drives
 */
export interface RealtimeSession {
  readonly session: APISession | null;
  connect(signal?: AbortSignal): Promise<APISession>;
  sendAudio(frames: readonly Frame[]): Promise<void>;
  pollEvents(): AsyncIterable<ApiEvent>;
  reconnect(signal?: AbortSignal): Promise<APISession>;
  close(): Promise<void>;
  isConnected(): boolean;
  isReconnectDue(): boolean;
  sessionAgeMs(): number;
}

export interface SocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
  onUnexpectedResponse(statusCode: number): void;
}

export interface RealtimeSocket {
  readonly isOpen: boolean;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export type SocketFactory = (
  url: string,
  headers: Record<string, string>,
  handlers: SocketHandlers
) => RealtimeSocket;

export const createWebSocket: SocketFactory = (url, headers, handlers) => {
  const ws = new WebSocket(url, { headers });

  ws.on("open", () => handlers.onOpen());
  ws.on("message", (data: RawData) => handlers.onMessage(rawDataToString(data)));
  ws.on("close", (code: number, reason: Buffer) => handlers.onClose(code, reason.toString()));
  ws.on("error", (error: Error) => handlers.onError(error));
  ws.on("unexpected-response", (req, res) => {
    handlers.onUnexpectedResponse(res.statusCode ?? 0);
    req.destroy();
  });

  return {
    get isOpen() {
      return ws.readyState === WebSocket.OPEN;
    },
    send: (data: string) => ws.send(data),
    close: (code?: number, reason?: string) => ws.close(code, reason),
  };
};

interface Connection {
  socket: RealtimeSocket;
  events: AsyncQueue<ApiEvent>;
  session: APISession;
  closing: boolean;
}

export interface RealtimeSessionClientOptions {
  socketFactory?: SocketFactory;
  now?: () => number;
  logger?: Logger;
}

export class RealtimeSessionClient implements RealtimeSession {
  private readonly logger: Logger;
  private readonly socketFactory: SocketFactory;
  private readonly now: () => number;
  private connection: Connection | null = null;

  constructor(
    private readonly config: RealtimeConfig,
    options: RealtimeSessionClientOptions = {}
  ) {
    this.logger = options.logger ?? new Logger("RealtimeClient");
    this.socketFactory = options.socketFactory ?? createWebSocket;
    this.now = options.now ?? Date.now;
  }

  get session(): APISession | null {
    return this.connection?.session ?? null;
  }

  isConnected(): boolean {
    return this.connection !== null && this.connection.socket.isOpen;
  }

  sessionAgeMs(): number {
    return this.connection ? this.now() - this.connection.session.createdAt : 0;
  }

  isReconnectDue(): boolean {
    return (
      this.connection !== null &&
      this.sessionAgeMs() >= this.config.sessionMaxAgeMs * this.config.reconnectFraction
    );
  }

  /**
   * Opens the socket, sends the session configuration and starts a fresh APISession.
   * Reuses the live connection when there is one. Aborting `signal` fails a pending
   * handshake with connection_lost.
   */
  async connect(signal?: AbortSignal): Promise<APISession> {
    if (this.connection && this.connection.socket.isOpen) {
      return this.connection.session;
    }
    this.connection = null;
    if (signal?.aborted) {
      throw new ConnectionLostError("Realtime connect aborted");
    }

    const url = `${this.config.url}?model=${encodeURIComponent(this.config.model)}`;
    const headers = {
      Authorization: `Bearer ${this.config.apiKey}`,
      "OpenAI-Beta": "realtime=v1",
    };
    const events = new AsyncQueue<ApiEvent>();
    const handle: { socket: RealtimeSocket | null; connection: Connection | null } = {
      socket: null,
      connection: null,
    };

    this.logger.info("Connecting to realtime API", { url });
    const startedAt = this.now();

    const openSocket = await new Promise<RealtimeSocket>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        fail(new ResponseTimeoutError(`Realtime connect timed out after ${this.config.connectTimeoutMs}ms`));
      }, this.config.connectTimeoutMs);

      const onAbort = (): void => fail(new ConnectionLostError("Realtime connect aborted"));
      signal?.addEventListener("abort", onAbort, { once: true });

      const settle = (): void => {
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };

      const fail = (error: Error): void => {
        if (settled) return;
        settle();
        handle.socket?.close();
        reject(error);
      };

      handle.socket = this.socketFactory(url, headers, {
        onOpen: () => {
          if (settled || !handle.socket) return;
          settle();
          resolve(handle.socket);
        },
        onMessage: (data) => this.handleMessage(events, data),
        onClose: (code, reason) => {
          if (!settled) {
            fail(this.closeError(code, reason));
            return;
          }
          if (handle.connection) this.handleClose(handle.connection, code, reason);
        },
        onError: (error) => {
          if (!settled) {
            fail(new ConnectionLostError(`Realtime connection failed: ${error.message}`));
            return;
          }
          this.logger.error("Realtime socket error", error);
        },
        onUnexpectedResponse: (statusCode) => {
          fail(
            statusCode === 401
              ? new InvalidApiKeyError()
              : new ConnectionLostError(`Realtime handshake rejected with HTTP ${statusCode}`)
          );
        },
      });
    });

    const connection: Connection = {
      socket: openSocket,
      events,
      session: { id: generateId(), createdAt: this.now(), callCount: 0 },
      closing: false,
    };
    handle.connection = connection;
    this.connection = connection;

    this.send(connection, buildSessionUpdate(this.config));
    this.logger.performance("realtime.connect", this.now() - startedAt, {
      sessionId: connection.session.id,
      model: this.config.model,
    });
    return connection.session;
  }

  /**
   * Transmits one flushed batch. With manual turn detection the batch is committed
   * and a response requested; the call counter counts batches.
   */
  async sendAudio(frames: readonly Frame[]): Promise<void> {
    const connection = this.requireConnection();
    const first = frames[0];
    if (!first) return;

    const samples = resample(concatFrames(frames), first.sampleRate, this.config.transmitSampleRate);
    for (const event of buildAudioAppends(toBase64(samples))) {
      this.send(connection, event);
    }
    if (this.config.turnDetection.type === "none") {
      this.send(connection, { type: "input_audio_buffer.commit" });
      this.send(connection, { type: "response.create" });
    }
    connection.session.callCount++;

    this.logger.debug("Sent audio batch", {
      sessionId: connection.session.id,
      frames: frames.length,
      samples: samples.length,
      callCount: connection.session.callCount,
    });
  }

  /**
   * Inbound events of the current connection. Ends when the connection is closed
   * deliberately and fails with ConnectionLostError when it drops.
   */
  pollEvents(): AsyncIterable<ApiEvent> {
    return this.requireConnection().events;
  }

  async reconnect(signal?: AbortSignal): Promise<APISession> {
    const previous = this.connection?.session.id;
    await this.close();
    const session = await this.connect(signal);
    this.logger.info("Realtime session replaced", { previous, sessionId: session.id });
    return session;
  }

  async close(): Promise<void> {
    const connection = this.connection;
    if (!connection) return;
    this.connection = null;
    connection.closing = true;
    connection.events.close();
    connection.socket.close(1000, "client closing");
    this.logger.info("Realtime session closed", {
      sessionId: connection.session.id,
      callCount: connection.session.callCount,
    });
  }

  private requireConnection(): Connection {
    if (!this.connection || !this.connection.socket.isOpen) {
      throw new ConnectionLostError("Realtime API is not connected");
    }
    return this.connection;
  }

  private send(connection: Connection, event: ClientEvent): void {
    try {
      connection.socket.send(JSON.stringify(event));
    } catch (error) {
      throw new ConnectionLostError(`Failed to send ${event.type}: ${asError(error).message}`);
    }
  }

  private handleMessage(events: AsyncQueue<ApiEvent>, data: string): void {
    const event = parseApiEvent(data);
    if (!event) {
      this.logger.warn("Dropping malformed realtime event", { preview: data.slice(0, 120) });
      return;
    }
    events.push(event);
  }

  private handleClose(connection: Connection, code: number, reason: string): void {
    if (this.connection === connection) {
      this.connection = null;
    }
    if (connection.closing) {
      connection.events.close();
      return;
    }
    this.logger.warn("Realtime connection closed unexpectedly", { code, reason });
    connection.events.fail(this.closeError(code, reason));
  }

  private closeError(code: number, reason: string): Error {
    if (reason.includes("invalid_api_key")) {
      return new InvalidApiKeyError(reason);
    }
    return new ConnectionLostError(
      `Realtime connection closed (${code}${reason ? `: ${reason}` : ""})`,
      code
    );
  }
}
