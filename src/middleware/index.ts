/**
 * Middleware Collection
 *
 * Express middleware for the relay's HTTP surface: request correlation and timing,
 * security headers, CORS, the health and status endpoints and centralized error
 * handling.
 */

import { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from "express";
import { StatusCodes } from "http-status-codes";
import helmet from "helmet";
import cors from "cors";
import { Logger } from "../utils/logger";
import { generateRequestId } from "../utils/index";
import { asError } from "../utils/errors";
import {
  AppError,
  ApiResponse,
  ComponentHealth,
  HealthCheck,
  SecurityConfig,
  SessionSnapshot,
  SessionState,
} from "../types/index";

/**
 * Request ID middleware
 * Generates a unique ID for each request for tracking and correlation
 */
export function requestId(req: Request, res: Response, next: NextFunction): void {
  req.requestId = generateRequestId();
  res.setHeader("X-Request-ID", req.requestId);
  next();
}

/**
 * Request timing middleware
 */
export function requestTiming(req: Request, res: Response, next: NextFunction): void {
  req.startTime = Date.now();
  next();
}

export function createCorsMiddleware(security: SecurityConfig): RequestHandler {
  return cors({
    origin: security.cors.origin,
    methods: security.cors.methods,
    optionsSuccessStatus: 200,
    maxAge: 86400,
  });
}

/**
 * Security headers via Helmet. CSP and HSTS follow the environment.
 */
export function createSecurityMiddleware(security: SecurityConfig): RequestHandler {
  return helmet({
    contentSecurityPolicy: security.helmet.contentSecurityPolicy
      ? {
          directives: {
            defaultSrc: ["'self'"],
            connectSrc: ["'self'", "ws:", "wss:"],
            objectSrc: ["'none'"],
            frameSrc: ["'none'"],
          },
        }
      : false,
    hsts: security.helmet.hsts
      ? {
          maxAge: 31536000,
          includeSubDomains: true,
        }
      : false,
  });
}

export type SnapshotProvider = () => SessionSnapshot;

/**
 * Derives service health from the session snapshot. A stopped session or a lost
 * API connection while a session is active degrades the service.
 */
export function evaluateHealth(snapshot: SessionSnapshot, uptime: number): HealthCheck {
  const session: ComponentHealth = {
    name: "session",
    status: snapshot.state === SessionState.Stopped ? "degraded" : "healthy",
    detail: snapshot.state,
  };

  const realtimeApi: ComponentHealth = {
    name: "realtime_api",
    status:
      snapshot.connected || snapshot.state === SessionState.Stopped
        ? "healthy"
        : snapshot.state === SessionState.Reconnecting
          ? "degraded"
          : "unhealthy",
    detail: snapshot.connected ? "connected" : "disconnected",
  };

  const checks = [session, realtimeApi];
  const status = checks.some((check) => check.status === "unhealthy")
    ? "unhealthy"
    : checks.some((check) => check.status === "degraded")
      ? "degraded"
      : "healthy";

  return { status, timestamp: new Date(), uptime, checks };
}

/**
 * Health check endpoint
 */
export function createHealthHandler(snapshot: SnapshotProvider): RequestHandler {
  return (req: Request, res: Response): void => {
    const health = evaluateHealth(snapshot(), process.uptime());
    const statusCode =
      health.status === "unhealthy" ? StatusCodes.SERVICE_UNAVAILABLE : StatusCodes.OK;
    res.status(statusCode).json(health);
  };
}

/**
 * Current session snapshot
 */
export function createStatusHandler(snapshot: SnapshotProvider): RequestHandler {
  return (req: Request, res: Response): void => {
    const response: ApiResponse<SessionSnapshot> = {
      success: true,
      data: snapshot(),
    };
    res.json(response);
  };
}

/**
 * Error handling middleware
 * Centralized error handling with proper logging and response formatting
 */
export const errorHandler: ErrorRequestHandler = (
  error: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  const logger = new Logger(req.requestId);

  if (res.headersSent) {
    next(error);
    return;
  }

  let statusCode: number = StatusCodes.INTERNAL_SERVER_ERROR;
  let errorCode: string = "unknown_error";
  let message = "An unexpected error occurred";

  if (error instanceof AppError) {
    statusCode = error.statusCode;
    errorCode = error.code;
    message = error.message;

    if (error.recoverable) {
      logger.warn("Recoverable error occurred", {
        code: errorCode,
        message,
        statusCode,
        url: req.url,
        method: req.method,
      });
    } else {
      logger.error("Request failed", error, { url: req.url, method: req.method });
    }
  } else {
    logger.error("Unexpected error occurred", asError(error), {
      url: req.url,
      method: req.method,
      query: req.query,
    });
  }

  const response: ApiResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      timestamp: new Date(),
      requestId: req.requestId,
    },
  };

  res.status(statusCode).json(response);
};

/**
 * 404 Not Found middleware
 */
export function notFoundHandler(req: Request, res: Response): void {
  const logger = new Logger(req.requestId);

  logger.warn("Endpoint not found", {
    url: req.url,
    method: req.method,
    ip: req.ip,
  });

  const response: ApiResponse = {
    success: false,
    error: {
      code: "not_found",
      message: `Endpoint ${req.method} ${req.url} not found`,
      timestamp: new Date(),
      requestId: req.requestId,
    },
  };

  res.status(StatusCodes.NOT_FOUND).json(response);
}
