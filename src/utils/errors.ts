/**
 * Error Utilities
 *
 * Typed errors for each failure class the relay reports, and the mapping from any
 * thrown value to the machine-readable code the display client receives.
 */

import { StatusCodes } from "http-status-codes";
import { AppError, ErrorCode, ErrorRecord } from "../types/index";

/**
 * Audio hardware unavailable or disconnected. Fatal to the current session.
 */
export class DeviceError extends AppError {
  constructor(message: string) {
    super(message, "device_error", false, StatusCodes.SERVICE_UNAVAILABLE);
  }
}

/**
 * Transport to the hosted API dropped
 */
export class ConnectionLostError extends AppError {
  public readonly closeCode?: number;

  constructor(message: string, closeCode?: number) {
    super(message, "connection_lost", true, StatusCodes.BAD_GATEWAY);
    this.closeCode = closeCode;
  }
}

export class ResponseTimeoutError extends AppError {
  constructor(message: string) {
    super(message, "timeout", true, StatusCodes.GATEWAY_TIMEOUT);
  }
}

/**
 * The hosted API enforced its session ceiling before a proactive reconnect ran
 */
export class SessionExpiredError extends AppError {
  constructor(message: string = "Realtime session expired") {
    super(message, "session_expired", true, StatusCodes.BAD_GATEWAY);
  }
}

export class InvalidApiKeyError extends AppError {
  constructor(message: string = "Realtime API rejected the API key") {
    super(message, "invalid_api_key", false, StatusCodes.UNAUTHORIZED);
  }
}

export type MessageFormatCode = "invalid_json" | "missing_field" | "invalid_value";

/**
 * Malformed inbound control or API message. Logged and dropped; the session continues.
 */
export class MessageFormatError extends AppError {
  constructor(message: string, code: MessageFormatCode) {
    super(message, code, true, StatusCodes.BAD_REQUEST);
  }
}

const SYSTEM_ERROR_CODES: Record<string, ErrorCode> = {
  ECONNRESET: "connection_lost",
  ECONNREFUSED: "connection_lost",
  EPIPE: "connection_lost",
  ENOTFOUND: "connection_lost",
  ETIMEDOUT: "timeout",
  ENOENT: "device_error",
  EACCES: "device_error",
  EBUSY: "device_error",
};

const RECOVERABLE_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  "connection_lost",
  "timeout",
  "invalid_json",
  "missing_field",
  "invalid_value",
  "session_expired",
]);

function systemCodeOf(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Resolves the error code for any thrown value
 */
export function getErrorCode(error: unknown): ErrorCode {
  if (error instanceof AppError) {
    return error.code;
  }
  if (error instanceof SyntaxError) {
    return "invalid_json";
  }
  if (error instanceof Error) {
    const systemCode = systemCodeOf(error);
    if (systemCode && SYSTEM_ERROR_CODES[systemCode]) {
      return SYSTEM_ERROR_CODES[systemCode];
    }
  }
  return "unknown_error";
}

export function isRecoverable(code: ErrorCode): boolean {
  return RECOVERABLE_CODES.has(code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toErrorRecord(error: unknown): ErrorRecord {
  if (error instanceof AppError) {
    return error.toRecord();
  }
  const kind = getErrorCode(error);
  return { kind, message: errorMessage(error), recoverable: isRecoverable(kind) };
}

/**
 * Narrows an unknown value to an Error for the logger
 */
export function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
