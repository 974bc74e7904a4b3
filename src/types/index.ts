/**
 * Global type definitions for the realtime voice relay
 * This file contains the core interfaces and types shared between the audio pipeline,
 * the realtime API client, the session orchestrator and the control channel
 */

import { StatusCodes } from "http-status-codes";

// Audio types
export interface Frame {
  readonly sequence: number;
  readonly samples: Int16Array;
  readonly sampleRate: number;
  readonly durationMs: number;
  readonly capturedAt: number;
}

export type Activity = "speech" | "silence";

export interface AudioDevice {
  id: string;
  name: string;
  isDefault: boolean;
}

/**
 * Asks the operator to pick an input device when no default is available
 */
export type DeviceSelector = (
  candidates: AudioDevice[]
) => Promise<AudioDevice>;

// Session state machine
export enum SessionState {
  Idle = "idle",
  Listening = "listening",
  Paused = "paused",
  AwaitingResponse = "awaiting_response",
  Cooldown = "cooldown",
  Reconnecting = "reconnecting",
  Stopped = "stopped",
}

export type CapturePolicy = "buffer" | "discard";
export type FlushMode = "activity" | "manual";
export type FlushReason = "activity" | "manual";

export interface APISession {
  readonly id: string;
  readonly createdAt: number;
  callCount: number;
}

export interface SessionSnapshot {
  state: SessionState;
  isListening: boolean;
  isPaused: boolean;
  apiCallCount: number;
  bufferedFrames: number;
  connected: boolean;
}

// Realtime API events (server -> client). Only `type` is guaranteed.
export interface ApiEvent {
  type: string;
  [key: string]: unknown;
}

// Errors
export type ErrorCode =
  | "device_error"
  | "connection_lost"
  | "timeout"
  | "invalid_json"
  | "missing_field"
  | "invalid_value"
  | "session_expired"
  | "invalid_api_key"
  | "unknown_error";

export interface ErrorRecord {
  kind: ErrorCode;
  message: string;
  recoverable: boolean;
}

// Events emitted by the orchestrator towards the control channel
export type SessionEvent =
  | {
      kind: "status";
      state: SessionState;
      status: string;
      isListening: boolean;
      isPaused: boolean;
    }
  | { kind: "response"; data: ApiEvent }
  | { kind: "transcript"; delta: string }
  | { kind: "response_complete"; text: string }
  | { kind: "new_response" }
  | { kind: "api_call_count"; count: number }
  | { kind: "audio_level"; level: number }
  | { kind: "error"; error: ErrorRecord };

export type SessionEventListener = (event: SessionEvent) => void;

// Control channel wire messages
export type ControlAction =
  | "start_listening"
  | "pause_listening"
  | "resume_listening"
  | "stop_listening"
  | "flush_audio";

export interface ControlMessage {
  type: "control";
  action: ControlAction;
}

export type OutboundMessage =
  | {
      type: "status";
      status: string;
      state: SessionState;
      is_listening: boolean;
      is_paused: boolean;
    }
  | { type: "response"; data: ApiEvent }
  | { type: "transcript"; delta: string }
  | { type: "response_complete"; text: string }
  | { type: "new_response" }
  | { type: "api_call_count"; count: number }
  | { type: "audio_level"; level: number }
  | { type: "config"; max_api_calls: number }
  | { type: "error"; error: { message: string; code: ErrorCode } };

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  timestamp: Date;
  requestId: string;
}

// Configuration types
export interface AppConfig {
  server: ServerConfig;
  realtime: RealtimeConfig;
  audio: AudioConfig;
  session: SessionConfig;
  logging: LoggingConfig;
  security: SecurityConfig;
}

export interface ServerConfig {
  port: number;
  host: string;
  environment: "development" | "test" | "production";
}

export interface TurnDetectionConfig {
  type: "none" | "server_vad";
  threshold: number;
  prefixPaddingMs: number;
  silenceDurationMs: number;
}

export interface RealtimeConfig {
  apiKey: string;
  model: string;
  url: string;
  instructions: string;
  voice: string;
  temperature: number;
  modalities: string[];
  turnDetection: TurnDetectionConfig;
  transmitSampleRate: number;
  sessionMaxAgeMs: number;
  reconnectFraction: number;
  connectTimeoutMs: number;
}

export interface AudioConfig {
  sampleRate: number;
  frameDurationMs: number;
  channels: number;
  device?: string;
  captureCommand: "arecord" | "sox";
  maxQueuedFrames: number;
}

export interface SessionConfig {
  speechThresholdMs: number;
  activityThreshold: number;
  flushMode: FlushMode;
  captureWhileAwaiting: CapturePolicy;
  cooldownMs: number;
  levelUpdatesPerSecond: number;
  maxApiCalls: number;
  responseTimeoutMs: number;
  reconnectCheckIntervalMs: number;
  maxReconnectAttempts: number;
  reconnectDelayMs: number;
}

export interface LoggingConfig {
  level: "error" | "warn" | "info" | "debug";
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface SecurityConfig {
  cors: {
    origin: string | string[];
    methods: string[];
  };
  helmet: {
    contentSecurityPolicy: boolean;
    hsts: boolean;
  };
}

// Health check types
export interface HealthCheck {
  status: "healthy" | "unhealthy" | "degraded";
  timestamp: Date;
  uptime: number;
  checks: ComponentHealth[];
}

export interface ComponentHealth {
  name: string;
  status: "healthy" | "unhealthy" | "degraded";
  detail?: string;
}

// Error types
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly recoverable: boolean;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode = "unknown_error",
    recoverable: boolean = false,
    statusCode: number = StatusCodes.INTERNAL_SERVER_ERROR
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.recoverable = recoverable;
    this.statusCode = statusCode;
    this.timestamp = new Date();

    Error.captureStackTrace(this, new.target);
  }

  toRecord(): ErrorRecord {
    return { kind: this.code, message: this.message, recoverable: this.recoverable };
  }
}

// Express Request extension
declare global {
  namespace Express {
    interface Request {
      requestId: string;
      startTime: number;
    }
  }
}
