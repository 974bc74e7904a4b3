/**
 * Control Channel Adapter
 *
 * Translates inbound display commands into orchestrator inputs and session events
 * into outbound wire messages. The display never infers state from the commands it
 * sent; every state it shows arrives here as a status message.
 */

import Joi from "joi";
import {
  ControlAction,
  ControlMessage,
  OutboundMessage,
  SessionEvent,
  SessionSnapshot,
} from "../../types/index";
import { MessageFormatError, asError, getErrorCode } from "../../utils/errors";
import { Logger } from "../../utils/logger";
import { Orchestrator, statusLabel } from "../session/orchestrator";

export type SessionControls = Pick<
  Orchestrator,
  "start" | "pause" | "resume" | "stop" | "flushNow" | "subscribe" | "snapshot"
>;

export interface ControlTransport {
  broadcast(message: OutboundMessage): void;
  send(clientId: string, message: OutboundMessage): void;
}

const COMMANDS: Record<ControlAction, (session: SessionControls) => Promise<void>> = {
  start_listening: (session) => session.start(),
  pause_listening: (session) => session.pause(),
  resume_listening: (session) => session.resume(),
  stop_listening: (session) => session.stop(),
  flush_audio: (session) => session.flushNow(),
};

const CONTROL_ACTIONS = Object.keys(COMMANDS);

const controlMessageSchema = Joi.object<ControlMessage>({
  type: Joi.string().valid("control").required(),
  action: Joi.string()
    .valid(...CONTROL_ACTIONS)
    .required(),
}).unknown(true);

/**
 * Parses one inbound record into a control message
 * @throws MessageFormatError with code invalid_json, missing_field or invalid_value
 */
export function parseControlMessage(record: string): ControlMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(record);
  } catch (error) {
    throw new MessageFormatError(`Invalid JSON: ${asError(error).message}`, "invalid_json");
  }

  const { error, value } = controlMessageSchema.validate(parsed);
  if (error || !value) {
    const detail = error?.details[0];
    throw new MessageFormatError(
      detail?.message ?? "Invalid control message",
      detail?.type === "any.required" ? "missing_field" : "invalid_value"
    );
  }
  return value;
}

export function statusMessage(snapshot: SessionSnapshot, status?: string): OutboundMessage {
  return {
    type: "status",
    status: status ?? statusLabel(snapshot.state),
    state: snapshot.state,
    is_listening: snapshot.isListening,
    is_paused: snapshot.isPaused,
  };
}

export function toOutboundMessage(event: SessionEvent): OutboundMessage {
  switch (event.kind) {
    case "status":
      return {
        type: "status",
        status: event.status,
        state: event.state,
        is_listening: event.isListening,
        is_paused: event.isPaused,
      };
    case "response":
      return { type: "response", data: event.data };
    case "transcript":
      return { type: "transcript", delta: event.delta };
    case "response_complete":
      return { type: "response_complete", text: event.text };
    case "new_response":
      return { type: "new_response" };
    case "api_call_count":
      return { type: "api_call_count", count: event.count };
    case "audio_level":
      return { type: "audio_level", level: event.level };
    case "error":
      return { type: "error", error: { message: event.error.message, code: event.error.kind } };
  }
}

export class ControlChannel {
  private readonly logger: Logger;
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly session: SessionControls,
    private readonly transport: ControlTransport,
    private readonly maxApiCalls: number,
    logger?: Logger
  ) {
    this.logger = logger ?? new Logger("ControlChannel");
  }

  /**
   * Starts relaying session events to every client
   */
  attach(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.session.subscribe((event) => {
      this.transport.broadcast(toOutboundMessage(event));
    });
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /**
   * Sends the current status and configuration to a newly connected client
   */
  greet(clientId: string): void {
    this.transport.send(clientId, statusMessage(this.session.snapshot()));
    this.transport.send(clientId, { type: "config", max_api_calls: this.maxApiCalls });
  }

  /**
   * Handles one transport message, which may hold several newline-delimited
   * records. Records are dispatched in order; a malformed record is reported to
   * its sender and skipped.
   */
  async handleMessage(clientId: string, raw: string): Promise<void> {
    const records = raw.split(/\r?\n/).filter((record) => record.trim().length > 0);

    for (const record of records) {
      let message: ControlMessage;
      try {
        message = parseControlMessage(record);
      } catch (error) {
        const code = getErrorCode(error);
        this.logger.warn("Dropping malformed control message", {
          clientId,
          code,
          error: asError(error).message,
        });
        this.transport.send(clientId, {
          type: "error",
          error: { message: asError(error).message, code },
        });
        continue;
      }

      this.logger.info("Control command received", { clientId, action: message.action });
      await COMMANDS[message.action](this.session);
    }
  }
}
