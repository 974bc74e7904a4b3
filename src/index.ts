#!/usr/bin/env node
/**
 * Main Application Entry Point
 *
 * Wires the realtime voice relay together: configuration, logging, the audio
 * source, the realtime API client, the session orchestrator and the HTTP +
 * WebSocket control surface the display overlay connects to.
 */

import express from "express";
import { createServer, Server } from "http";
import { loadConfigFromEnvironment } from "./config/index";
import { configureLogging, defaultLogger, requestLogger, Logger } from "./utils/logger";
import { asError } from "./utils/errors";
import {
  requestId,
  requestTiming,
  createCorsMiddleware,
  createSecurityMiddleware,
  createHealthHandler,
  createStatusHandler,
  errorHandler,
  notFoundHandler,
} from "./middleware/index";
import { AppConfig } from "./types/index";
import { CommandAudioSource } from "./services/audio/commandAudioSource";
import { createConsoleDeviceSelector } from "./services/audio/consoleDeviceSelector";
import { RealtimeSessionClient } from "./services/realtime/realtimeClient";
import { Orchestrator } from "./services/session/orchestrator";
import { ControlChannel } from "./services/control/controlChannel";
import { ControlServer } from "./services/control/controlServer";

const SHUTDOWN_TIMEOUT_MS = 10000;

/**
 * Application class that owns the server and session lifecycle
 */
class Application {
  private readonly app: express.Application;
  private readonly server: Server;
  private readonly controlServer: ControlServer;
  private readonly orchestrator: Orchestrator;
  private readonly channel: ControlChannel;
  private readonly logger: Logger;
  private isShuttingDown = false;

  constructor(private readonly config: Readonly<AppConfig>) {
    this.logger = defaultLogger.child("app");
    this.app = express();
    this.server = createServer(this.app);

    this.orchestrator = new Orchestrator({
      config,
      source: new CommandAudioSource(config.audio),
      realtime: new RealtimeSessionClient(config.realtime),
      selectDevice: createConsoleDeviceSelector(),
    });
    this.controlServer = new ControlServer(this.server);
    this.channel = new ControlChannel(
      this.orchestrator,
      this.controlServer,
      config.session.maxApiCalls
    );

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
    this.setupGracefulShutdown();
  }

  private setupMiddleware(): void {
    this.app.use(createSecurityMiddleware(this.config.security));
    this.app.use(createCorsMiddleware(this.config.security));
    this.app.use(requestId);
    this.app.use(requestTiming);
    this.app.use(requestLogger());
  }

  private setupRoutes(): void {
    const snapshot = () => this.orchestrator.snapshot();
    this.app.get("/health", createHealthHandler(snapshot));
    this.app.get("/api/status", createStatusHandler(snapshot));
  }

  private setupErrorHandling(): void {
    this.app.use(notFoundHandler);
    this.app.use(errorHandler);

    process.on("uncaughtException", (error: Error) => {
      this.logger.error("Uncaught exception occurred", error);
      void this.gracefulShutdown("uncaughtException");
    });

    process.on("unhandledRejection", (reason: unknown) => {
      this.logger.error("Unhandled promise rejection", asError(reason));
      void this.gracefulShutdown("unhandledRejection");
    });
  }

  private setupGracefulShutdown(): void {
    process.on("SIGTERM", () => void this.gracefulShutdown("SIGTERM"));
    process.on("SIGINT", () => void this.gracefulShutdown("SIGINT"));
  }

  private async gracefulShutdown(signal: string): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.warn("Shutdown already in progress, forcing exit...");
      process.exit(1);
    }

    this.isShuttingDown = true;
    this.logger.info(`Received ${signal}, starting graceful shutdown...`);

    const shutdownTimeout = setTimeout(() => {
      this.logger.error("Graceful shutdown timeout, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
      await this.orchestrator.shutdown();
      this.channel.detach();
      await this.controlServer.close();
      await new Promise<void>((resolve, reject) => {
        this.server.close((error?: Error) => (error ? reject(error) : resolve()));
      });

      clearTimeout(shutdownTimeout);
      this.logger.info("Graceful shutdown completed");
      process.exit(0);
    } catch (error) {
      clearTimeout(shutdownTimeout);
      this.logger.error("Error during graceful shutdown", asError(error));
      process.exit(1);
    }
  }

  /**
   * Starts listening, then selects the device and opens the API session
   */
  async start(): Promise<void> {
    const { port, host, environment } = this.config.server;

    await new Promise<void>((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(port, host, () => {
        this.server.off("error", reject);
        resolve();
      });
    });

    this.channel.attach();
    this.controlServer.listen(this.channel);

    this.logger.info("Server started", { port, host, environment, processId: process.pid });
    this.logger.info("Configuration loaded", {
      model: this.config.realtime.model,
      turnDetection: this.config.realtime.turnDetection.type,
      flushMode: this.config.session.flushMode,
      captureWhileAwaiting: this.config.session.captureWhileAwaiting,
      maxApiCalls: this.config.session.maxApiCalls,
      logLevel: this.config.logging.level,
    });

    try {
      await this.orchestrator.initialize();
      this.logger.info("Voice relay ready, waiting for the display to start listening");
    } catch (error) {
      this.logger.error("Session initialization failed", asError(error));
    }
  }
}

/**
 * Create and start the application
 */
async function bootstrap(): Promise<void> {
  const config = loadConfigFromEnvironment();
  configureLogging(config.logging);

  defaultLogger.info("Starting realtime voice relay", {
    node: process.version,
    environment: config.server.environment,
  });

  const app = new Application(config);
  await app.start();
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    defaultLogger.error("Failed to bootstrap application", asError(error));
    process.exit(1);
  });
}

export { Application, bootstrap };
