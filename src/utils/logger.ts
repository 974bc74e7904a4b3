/**
 * Logger Utility
 *
 * This module provides a centralized logging system for the relay using Winston.
 * It supports multiple log levels, file and console output, and structured logging.
 *
 * Features:
 * - Multiple log levels (error, warn, info, debug)
 * - File and console transports, reconfigured once the app config is loaded
 * - Structured logging with metadata
 * - Per-component scopes
 * - Error stack trace logging
 */

import winston from "winston";
import type { Request, Response, NextFunction } from "express";
import { LoggingConfig } from "../types/index";
import { formatDuration } from "./index";

type LogMetadata = Record<string, unknown>;

// Define log levels and colors
const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const logColors = {
  error: "red",
  warn: "yellow",
  info: "green",
  debug: "blue",
};

winston.addColors(logColors);

function renderLine(info: winston.Logform.TransformableInfo): string {
  const { timestamp, level, message, stack, ...metadata } = info;
  let logMessage = `${String(timestamp)} ${level}: ${String(message)}`;

  if (typeof stack === "string") {
    logMessage += `\n${stack}`;
  }

  if (Object.keys(metadata).length > 0) {
    logMessage += `\n${JSON.stringify(metadata, null, 2)}`;
  }

  return logMessage;
}

/**
 * Custom log format for structured logging
 */
const logFormat = winston.format.combine(
  winston.format.timestamp({
    format: "YYYY-MM-DD HH:mm:ss",
  }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

/**
 * Console format for development
 */
const consoleFormat = winston.format.combine(
  winston.format.colorize({ all: true }),
  winston.format.timestamp({
    format: "HH:mm:ss",
  }),
  winston.format.printf((info) => renderLine(info))
);

/**
 * Parse file size string to bytes
 */
export function parseFileSize(sizeStr: string): number {
  const match = sizeStr.match(/^(\d+(?:\.\d+)?)\s*(B|KB|MB|GB|K|M|G)?$/i);
  if (!match || !match[1]) {
    return 10 * 1024 * 1024; // Default 10MB
  }

  const size = parseFloat(match[1]);
  const unit = (match[2] || "B").toUpperCase();

  const multipliers: Record<string, number> = {
    B: 1,
    K: 1024,
    KB: 1024,
    M: 1024 * 1024,
    MB: 1024 * 1024,
    G: 1024 * 1024 * 1024,
    GB: 1024 * 1024 * 1024,
  };

  return size * (multipliers[unit] || 1);
}

function buildTransports(config: LoggingConfig): winston.transport[] {
  const transports: winston.transport[] = [];

  if (config.console.enabled) {
    transports.push(
      new winston.transports.Console({
        format: config.console.colorize ? consoleFormat : logFormat,
        level: config.level,
      })
    );
  }

  if (config.file.enabled) {
    const maxsize = parseFileSize(config.file.maxSize);
    transports.push(
      new winston.transports.File({
        filename: config.file.path,
        format: logFormat,
        level: config.level,
        maxsize,
        maxFiles: config.file.maxFiles,
        tailable: true,
      }),
      new winston.transports.File({
        filename: config.file.path.replace(/\.log$/, ".error.log"),
        format: logFormat,
        level: "error",
        maxsize,
        maxFiles: config.file.maxFiles,
        tailable: true,
      })
    );
  }

  return transports;
}

/**
 * Create the logger instance. Until the app config is applied it logs to the console
 * at info level.
 */
const logger = winston.createLogger({
  levels: logLevels,
  level: "info",
  format: logFormat,
  transports: [new winston.transports.Console({ format: consoleFormat })],
  exitOnError: false,
});

/**
 * Applies the logging section of the app config. With no transport enabled the
 * logger goes silent.
 */
export function configureLogging(config: LoggingConfig): void {
  const transports = buildTransports(config);
  logger.configure({
    levels: logLevels,
    level: config.level,
    format: logFormat,
    transports,
    exitOnError: false,
    silent: transports.length === 0,
  });
}

/**
 * Enhanced logging interface with additional methods
 */
export class Logger {
  private scope?: string;

  constructor(scope?: string) {
    if (scope) {
      this.scope = scope;
    }
  }

  /**
   * Logs an error message
   */
  error(message: string, error?: Error, metadata?: LogMetadata): void {
    logger.error({
      message,
      scope: this.scope,
      ...metadata,
      ...(error
        ? {
            error: {
              name: error.name,
              message: error.message,
              stack: error.stack,
            },
          }
        : {}),
    });
  }

  warn(message: string, metadata?: LogMetadata): void {
    logger.warn({ message, scope: this.scope, ...metadata });
  }

  info(message: string, metadata?: LogMetadata): void {
    logger.info({ message, scope: this.scope, ...metadata });
  }

  debug(message: string, metadata?: LogMetadata): void {
    logger.debug({ message, scope: this.scope, ...metadata });
  }

  /**
   * Logs HTTP request information
   */
  request(req: Request, res?: Response, duration?: number): void {
    const logData: LogMetadata = {
      method: req.method,
      url: req.url,
      userAgent: req.get("User-Agent"),
      ip: req.ip,
      requestId: req.requestId,
    };

    if (res) {
      logData.statusCode = res.statusCode;
    }

    if (duration !== undefined) {
      logData.duration = `${duration}ms`;
    }

    this.debug("HTTP Request", logData);
  }

  /**
   * Logs operation timing
   */
  performance(operation: string, duration: number, metadata?: LogMetadata): void {
    this.info(`Performance: ${operation}`, {
      operation,
      duration: `${duration}ms`,
      durationFormatted: formatDuration(duration),
      ...metadata,
    });
  }

  /**
   * Creates a child logger with a nested scope
   */
  child(scope: string): Logger {
    return new Logger(this.scope ? `${this.scope}:${scope}` : scope);
  }
}

/**
 * Default logger instance
 */
export const defaultLogger = new Logger();

/**
 * Express middleware for request logging
 */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();
    const requestLog = new Logger("http");

    requestLog.request(req);
    res.on("finish", () => {
      requestLog.request(req, res, Date.now() - startTime);
    });

    next();
  };
}
