/**
 * Configuration Management System
 *
 * Builds the immutable application configuration once at startup from environment
 * variables (optionally loaded from `.env`), validated and defaulted with Joi.
 * The result is passed explicitly to every component that needs it.
 */

import dotenv from "dotenv";
import Joi from "joi";
import * as fs from "fs";
import {
  AppConfig,
  AudioConfig,
  LoggingConfig,
  RealtimeConfig,
  SecurityConfig,
  ServerConfig,
  SessionConfig,
} from "../types/index";
import { Logger } from "../utils/logger";

export const DEFAULT_INSTRUCTIONS = [
  "You are an assistant that supports a person in a live conversation.",
  "Give short, direct answers as plain bullet points without markdown.",
  "Only elaborate when asked; focus on what can be said out loud right away.",
].join("\n");

interface EnvVars {
  NODE_ENV: ServerConfig["environment"];
  HOST: string;
  PORT: number;
  CORS_ORIGIN: string;

  OPENAI_API_KEY: string;
  OPENAI_REALTIME_MODEL: string;
  OPENAI_REALTIME_URL: string;
  REALTIME_INSTRUCTIONS: string;
  REALTIME_VOICE: string;
  REALTIME_TEMPERATURE: number;
  REALTIME_MODALITIES: string;
  TURN_DETECTION: RealtimeConfig["turnDetection"]["type"];
  VAD_THRESHOLD: number;
  VAD_PREFIX_PADDING_MS: number;
  VAD_SILENCE_DURATION_MS: number;
  SESSION_MAX_AGE_MS: number;
  RECONNECT_FRACTION: number;
  RECONNECT_CHECK_INTERVAL_MS: number;
  MAX_RECONNECT_ATTEMPTS: number;
  RECONNECT_DELAY_MS: number;
  CONNECT_TIMEOUT_MS: number;
  RESPONSE_TIMEOUT_MS: number;
  BACKGROUND_CONTEXT_FILE?: string;
  TASK_CONTEXT_FILE?: string;

  AUDIO_SAMPLE_RATE: number;
  AUDIO_FRAME_MS: number;
  AUDIO_DEVICE?: string;
  AUDIO_CAPTURE_COMMAND: AudioConfig["captureCommand"];
  AUDIO_MAX_QUEUED_FRAMES: number;
  TRANSMIT_SAMPLE_RATE: number;

  SPEECH_THRESHOLD_MS: number;
  ACTIVITY_THRESHOLD: number;
  FLUSH_MODE: SessionConfig["flushMode"];
  CAPTURE_WHILE_AWAITING: SessionConfig["captureWhileAwaiting"];
  COOLDOWN_MS: number;
  LEVEL_UPDATES_PER_SECOND: number;
  MAX_API_CALLS: number;

  LOG_LEVEL: LoggingConfig["level"];
  LOG_FILE_PATH: string;
  LOG_MAX_SIZE: string;
  LOG_MAX_FILES: number;
}

/**
 * Environment variable validation schema
 */
const envSchema = Joi.object<EnvVars>({
  // Server
  NODE_ENV: Joi.string().valid("development", "test", "production").default("development"),
  HOST: Joi.string().default("localhost"),
  PORT: Joi.number().port().default(8765),
  CORS_ORIGIN: Joi.string().default("http://localhost:3000"),

  // Realtime API
  OPENAI_API_KEY: Joi.string().required(),
  OPENAI_REALTIME_MODEL: Joi.string().default("gpt-4o-realtime-preview-2024-10-01"),
  OPENAI_REALTIME_URL: Joi.string()
    .uri({ scheme: ["ws", "wss"] })
    .default("wss://api.openai.com/v1/realtime"),
  REALTIME_INSTRUCTIONS: Joi.string().default(DEFAULT_INSTRUCTIONS),
  REALTIME_VOICE: Joi.string().default("alloy"),
  REALTIME_TEMPERATURE: Joi.number().min(0).max(2).default(0.6),
  REALTIME_MODALITIES: Joi.string()
    .pattern(/^(text|audio)(\s*,\s*(text|audio))*$/)
    .default("text"),
  TURN_DETECTION: Joi.string().valid("none", "server_vad").default("none"),
  VAD_THRESHOLD: Joi.number().min(0).max(1).default(0.5),
  VAD_PREFIX_PADDING_MS: Joi.number().integer().min(0).default(300),
  VAD_SILENCE_DURATION_MS: Joi.number().integer().min(0).default(500),
  SESSION_MAX_AGE_MS: Joi.number().integer().positive().default(30 * 60 * 1000),
  RECONNECT_FRACTION: Joi.number().greater(0).max(1).default(2 / 3),
  RECONNECT_CHECK_INTERVAL_MS: Joi.number().integer().positive().default(1000),
  MAX_RECONNECT_ATTEMPTS: Joi.number().integer().min(1).default(3),
  RECONNECT_DELAY_MS: Joi.number().integer().min(0).default(2000),
  CONNECT_TIMEOUT_MS: Joi.number().integer().positive().default(10000),
  RESPONSE_TIMEOUT_MS: Joi.number().integer().positive().default(30000),
  BACKGROUND_CONTEXT_FILE: Joi.string().optional(),
  TASK_CONTEXT_FILE: Joi.string().optional(),

  // Audio capture
  AUDIO_SAMPLE_RATE: Joi.number().integer().positive().default(48000),
  AUDIO_FRAME_MS: Joi.number().integer().positive().default(20),
  AUDIO_DEVICE: Joi.string().optional(),
  AUDIO_CAPTURE_COMMAND: Joi.string().valid("arecord", "sox").default("arecord"),
  AUDIO_MAX_QUEUED_FRAMES: Joi.number().integer().positive().default(250),
  TRANSMIT_SAMPLE_RATE: Joi.number().integer().positive().default(48000),

  // Session behavior
  SPEECH_THRESHOLD_MS: Joi.number().integer().positive().default(100),
  ACTIVITY_THRESHOLD: Joi.number().min(0).max(100).default(10),
  FLUSH_MODE: Joi.string().valid("activity", "manual").default("activity"),
  CAPTURE_WHILE_AWAITING: Joi.string().valid("buffer", "discard").default("buffer"),
  COOLDOWN_MS: Joi.number().integer().min(0).default(10000),
  LEVEL_UPDATES_PER_SECOND: Joi.number().integer().min(1).max(50).default(10),
  MAX_API_CALLS: Joi.number().integer().min(-1).default(-1),

  // Logging
  LOG_LEVEL: Joi.string().valid("error", "warn", "info", "debug").default("info"),
  LOG_FILE_PATH: Joi.string().default("./logs/relay.log"),
  LOG_MAX_SIZE: Joi.string().default("10m"),
  LOG_MAX_FILES: Joi.number().integer().positive().default(5),
}).unknown(true);

export type ContextReader = (path: string) => string | null;

/**
 * Reads a context file as UTF-8; a missing or unreadable file is skipped with a warning
 */
export function readContextFile(path: string, logger: Logger = new Logger("Config")): string | null {
  try {
    return fs.readFileSync(path, "utf8");
  } catch (error) {
    logger.warn("Skipping unreadable context file", {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Appends background and task context to the base instructions under their headings
 */
export function buildInstructions(
  base: string,
  backgroundContext?: string | null,
  taskContext?: string | null
): string {
  let instructions = base.trim();
  if (backgroundContext && backgroundContext.trim()) {
    instructions += `\n\nBACKGROUND CONTEXT:\n${backgroundContext.trim()}`;
  }
  if (taskContext && taskContext.trim()) {
    instructions += `\n\nCURRENT TASK/OBJECTIVE:\n${taskContext.trim()}`;
  }
  return instructions;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Object.getOwnPropertyDescriptor(value, key)?.value);
    }
  }
  return value;
}

/**
 * Validates the environment and builds the application configuration
 * @throws Error listing every invalid variable
 */
export function loadConfig(
  source: NodeJS.ProcessEnv = process.env,
  readContext: ContextReader = readContextFile
): Readonly<AppConfig> {
  const { error, value: env } = envSchema.validate(source, {
    abortEarly: false,
    convert: true,
  });

  if (error || !env) {
    const messages = error ? error.details.map((detail) => detail.message).join(", ") : "no values";
    throw new Error(`Environment variable validation failed: ${messages}`);
  }

  const server: ServerConfig = {
    port: env.PORT,
    host: env.HOST,
    environment: env.NODE_ENV,
  };

  const realtime: RealtimeConfig = {
    apiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_REALTIME_MODEL,
    url: env.OPENAI_REALTIME_URL,
    instructions: buildInstructions(
      env.REALTIME_INSTRUCTIONS,
      env.BACKGROUND_CONTEXT_FILE ? readContext(env.BACKGROUND_CONTEXT_FILE) : null,
      env.TASK_CONTEXT_FILE ? readContext(env.TASK_CONTEXT_FILE) : null
    ),
    voice: env.REALTIME_VOICE,
    temperature: env.REALTIME_TEMPERATURE,
    modalities: splitList(env.REALTIME_MODALITIES),
    turnDetection: {
      type: env.TURN_DETECTION,
      threshold: env.VAD_THRESHOLD,
      prefixPaddingMs: env.VAD_PREFIX_PADDING_MS,
      silenceDurationMs: env.VAD_SILENCE_DURATION_MS,
    },
    transmitSampleRate: env.TRANSMIT_SAMPLE_RATE,
    sessionMaxAgeMs: env.SESSION_MAX_AGE_MS,
    reconnectFraction: env.RECONNECT_FRACTION,
    connectTimeoutMs: env.CONNECT_TIMEOUT_MS,
  };

  const audio: AudioConfig = {
    sampleRate: env.AUDIO_SAMPLE_RATE,
    frameDurationMs: env.AUDIO_FRAME_MS,
    channels: 1,
    device: env.AUDIO_DEVICE,
    captureCommand: env.AUDIO_CAPTURE_COMMAND,
    maxQueuedFrames: env.AUDIO_MAX_QUEUED_FRAMES,
  };

  const session: SessionConfig = {
    speechThresholdMs: env.SPEECH_THRESHOLD_MS,
    activityThreshold: env.ACTIVITY_THRESHOLD,
    flushMode: env.FLUSH_MODE,
    captureWhileAwaiting: env.CAPTURE_WHILE_AWAITING,
    cooldownMs: env.COOLDOWN_MS,
    levelUpdatesPerSecond: env.LEVEL_UPDATES_PER_SECOND,
    maxApiCalls: env.MAX_API_CALLS,
    responseTimeoutMs: env.RESPONSE_TIMEOUT_MS,
    reconnectCheckIntervalMs: env.RECONNECT_CHECK_INTERVAL_MS,
    maxReconnectAttempts: env.MAX_RECONNECT_ATTEMPTS,
    reconnectDelayMs: env.RECONNECT_DELAY_MS,
  };

  const logging: LoggingConfig = {
    level: env.LOG_LEVEL,
    file: {
      enabled: env.NODE_ENV !== "test",
      path: env.LOG_FILE_PATH,
      maxSize: env.LOG_MAX_SIZE,
      maxFiles: env.LOG_MAX_FILES,
    },
    console: {
      enabled: env.NODE_ENV !== "test",
      colorize: env.NODE_ENV === "development",
    },
  };

  const security: SecurityConfig = {
    cors: {
      origin: splitList(env.CORS_ORIGIN),
      methods: ["GET", "HEAD"],
    },
    helmet: {
      contentSecurityPolicy: env.NODE_ENV === "production",
      hsts: env.NODE_ENV === "production",
    },
  };

  return deepFreeze({ server, realtime, audio, session, logging, security });
}

/**
 * Loads `.env` into the process environment, then builds the configuration
 */
export function loadConfigFromEnvironment(path?: string): Readonly<AppConfig> {
  dotenv.config(path ? { path } : undefined);
  return loadConfig(process.env);
}
