/**
 * Realtime API wire messages
 *
 * Builders for the client events the relay sends and narrowing helpers for the
 * server events it consumes.
 */

import Joi from "joi";
import { ApiEvent, RealtimeConfig } from "../../types/index";

// Base64 length per `input_audio_buffer.append` message, well under the API's 15 MiB cap
export const MAX_APPEND_CHUNK_CHARS = 256 * 1024;

export type ClientEvent =
  | { type: "session.update"; session: SessionParameters }
  | { type: "input_audio_buffer.append"; audio: string }
  | { type: "input_audio_buffer.commit" }
  | { type: "input_audio_buffer.clear" }
  | { type: "response.create" };

export interface SessionParameters {
  modalities: string[];
  instructions: string;
  voice: string;
  temperature: number;
  input_audio_format: "pcm16";
  turn_detection: {
    type: "server_vad";
    threshold: number;
    prefix_padding_ms: number;
    silence_duration_ms: number;
  } | null;
}

export function buildSessionUpdate(config: RealtimeConfig): ClientEvent {
  const { turnDetection } = config;
  return {
    type: "session.update",
    session: {
      modalities: [...config.modalities],
      instructions: config.instructions,
      voice: config.voice,
      temperature: config.temperature,
      input_audio_format: "pcm16",
      turn_detection:
        turnDetection.type === "server_vad"
          ? {
              type: "server_vad",
              threshold: turnDetection.threshold,
              prefix_padding_ms: turnDetection.prefixPaddingMs,
              silence_duration_ms: turnDetection.silenceDurationMs,
            }
          : null,
    },
  };
}

/**
 * Splits base64 audio into append events. Chunk boundaries fall on multiples of
 * 4 characters so every chunk decodes on its own.
 */
export function buildAudioAppends(base64: string, chunkChars: number = MAX_APPEND_CHUNK_CHARS): ClientEvent[] {
  const size = Math.max(4, chunkChars - (chunkChars % 4));
  const events: ClientEvent[] = [];
  for (let offset = 0; offset < base64.length; offset += size) {
    events.push({ type: "input_audio_buffer.append", audio: base64.slice(offset, offset + size) });
  }
  return events;
}

const apiEventSchema = Joi.object<ApiEvent>({
  type: Joi.string().min(1).required(),
}).unknown(true);

/**
 * Parses one inbound frame. Returns null for non-JSON or typeless payloads.
 */
export function parseApiEvent(raw: string): ApiEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const { error, value } = apiEventSchema.validate(parsed);
  return error || !value ? null : value;
}

function field(source: unknown, key: string): unknown {
  if (typeof source === "object" && source !== null && key in source) {
    return Object.getOwnPropertyDescriptor(source, key)?.value;
  }
  return undefined;
}

/**
 * Text carried by a text or transcript delta event, if any
 */
export function textDelta(event: ApiEvent): string | null {
  if (event.type !== "response.text.delta" && event.type !== "response.audio_transcript.delta") {
    return null;
  }
  return typeof event.delta === "string" ? event.delta : null;
}

export function responseIdOf(event: ApiEvent): string | null {
  const id = field(event.response, "id");
  return typeof id === "string" ? id : null;
}

export interface ApiErrorDetail {
  code: string | null;
  message: string;
}

export function errorDetailOf(event: ApiEvent): ApiErrorDetail {
  const code = field(event.error, "code");
  const message = field(event.error, "message");
  return {
    code: typeof code === "string" ? code : null,
    message: typeof message === "string" ? message : "Realtime API error",
  };
}
