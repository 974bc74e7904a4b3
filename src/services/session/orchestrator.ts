/**
 * Session Orchestrator
 *
 * Owns the capture -> gate -> buffer -> send loop and the session state machine.
 * Control commands are serialized on one lock; the capture loop, the API event pump
 * and the timers run as independent tasks that only ever go through the guarded
 * buffer or the single-writer state below.
 */

import {
  AppConfig,
  ApiEvent,
  DeviceSelector,
  ErrorRecord,
  Frame,
  FlushReason,
  SessionEvent,
  SessionEventListener,
  SessionSnapshot,
  SessionState,
} from "../../types/index";
import { retryWithBackoff } from "../../utils/index";
import { AsyncLock, Signal } from "../../utils/concurrency";
import {
  DeviceError,
  InvalidApiKeyError,
  ResponseTimeoutError,
  SessionExpiredError,
  asError,
  getErrorCode,
  toErrorRecord,
} from "../../utils/errors";
import { Logger } from "../../utils/logger";
import { ActivityGate } from "../audio/activityGate";
import { AudioSource } from "../audio/audioSource";
import { computeLevel } from "../audio/frame";
import { RealtimeSession } from "../realtime/realtimeClient";
import { errorDetailOf, responseIdOf, textDelta } from "../realtime/protocol";
import { LevelThrottle } from "./levelThrottle";
import { ResponseAccumulator } from "./responseAccumulator";
import { SessionBuffer } from "./sessionBuffer";

const STATUS_LABELS: Record<SessionState, string> = {
  [SessionState.Idle]: "ready",
  [SessionState.Listening]: "listening",
  [SessionState.Paused]: "paused",
  [SessionState.AwaitingResponse]: "processing",
  [SessionState.Cooldown]: "cooldown",
  [SessionState.Reconnecting]: "reconnecting",
  [SessionState.Stopped]: "stopped",
};

export const MAX_CALLS_REACHED = "max_calls_reached";

export function statusLabel(state: SessionState): string {
  return STATUS_LABELS[state];
}

export interface OrchestratorOptions {
  config: Pick<AppConfig, "session" | "audio">;
  source: AudioSource;
  realtime: RealtimeSession;
  selectDevice: DeviceSelector;
  gate?: ActivityGate;
  buffer?: SessionBuffer;
  now?: () => number;
  logger?: Logger;
}

type Timer = ReturnType<typeof setTimeout>;

export class Orchestrator {
  private readonly logger: Logger;
  private readonly config: OrchestratorOptions["config"];
  private readonly source: AudioSource;
  private readonly realtime: RealtimeSession;
  private readonly selectDevice: DeviceSelector;
  private readonly gate: ActivityGate;
  private readonly buffer: SessionBuffer;
  private readonly now: () => number;

  private readonly commandLock = new AsyncLock();
  private readonly resumeSignal = new Signal(true);
  private readonly accumulator = new ResponseAccumulator();
  private readonly throttle: LevelThrottle;
  private readonly listeners = new Set<SessionEventListener>();
  private readonly tasks = new Set<Promise<void>>();

  private state: SessionState = SessionState.Idle;
  private running = false;
  private paused = false;
  private awaitingResponse = false;
  private flushing = false;
  private apiCalls = 0;

  private captureTask: Promise<void> | null = null;
  private captureGeneration = 0;
  private pumpGeneration = 0;
  private turnGeneration = 0;

  private cooldownTimer: Timer | null = null;
  private responseTimer: Timer | null = null;
  private reconnectMonitor: ReturnType<typeof setInterval> | null = null;
  private reconnectAbort: AbortController | null = null;

  constructor(options: OrchestratorOptions) {
    this.config = options.config;
    this.source = options.source;
    this.realtime = options.realtime;
    this.selectDevice = options.selectDevice;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? new Logger("Orchestrator");
    this.buffer = options.buffer ?? new SessionBuffer();
    this.gate =
      options.gate ??
      new ActivityGate({
        activityThreshold: options.config.session.activityThreshold,
        speechThresholdMs: options.config.session.speechThresholdMs,
        frameDurationMs: options.config.audio.frameDurationMs,
      });
    this.throttle = new LevelThrottle(options.config.session.levelUpdatesPerSecond);
  }

  get currentState(): SessionState {
    return this.state;
  }

  get apiCallCount(): number {
    return this.apiCalls;
  }

  get bufferedFrames(): number {
    return this.buffer.size;
  }

  subscribe(listener: SessionEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(): SessionSnapshot {
    return {
      state: this.state,
      isListening: this.isListening(),
      isPaused: this.paused,
      apiCallCount: this.apiCalls,
      bufferedFrames: this.buffer.size,
      connected: this.realtime.isConnected(),
    };
  }

  /**
   * Re-broadcasts the current status without a transition
   */
  emitStatus(status?: string): void {
    this.emit({
      kind: "status",
      state: this.state,
      status: status ?? statusLabel(this.state),
      isListening: this.isListening(),
      isPaused: this.paused,
    });
  }

  /**
   * Selects the input device and opens the API session once at startup. Ends in
   * Idle with status "ready"; failures stop the session and are rethrown.
   */
  initialize(): Promise<void> {
    return this.commandLock.runExclusive(async () => {
      try {
        const device = await this.source.selectDevice(this.selectDevice);
        this.logger.info("Input device selected", { device: device.id });
        await this.ensureConnected();
        this.startReconnectMonitor();
        this.setState(SessionState.Idle);
      } catch (error) {
        this.emitError(toErrorRecord(error));
        await this.halt();
        throw error;
      }
    });
  }

  start(): Promise<void> {
    return this.runCommand("start_listening", async () => {
      if (this.running) {
        this.emitStatus();
        return;
      }
      await this.ensureConnected();
      this.paused = false;
      this.gate.reset();
      await this.buffer.clear();
      await this.source.open(this.selectDevice);

      this.running = true;
      this.resumeSignal.set();
      this.startReconnectMonitor();
      this.setState(SessionState.Listening);

      const generation = ++this.captureGeneration;
      this.captureTask = this.runCaptureLoop(generation);
    });
  }

  pause(): Promise<void> {
    return this.runCommand("pause_listening", async () => {
      if (!this.running || this.paused) {
        this.emitStatus();
        return;
      }
      this.paused = true;
      this.resumeSignal.clear();
      this.cancelCooldown();
      this.source.suspend();
      const dropped = await this.buffer.clear();
      this.logger.info("Listening paused", { droppedFrames: dropped });
      this.setState(SessionState.Paused);
    });
  }

  resume(): Promise<void> {
    return this.runCommand("resume_listening", async () => {
      if (!this.running || !this.paused) {
        this.emitStatus();
        return;
      }
      this.abandonTurn();
      this.gate.reset();
      this.paused = false;
      this.source.resume();
      this.resumeSignal.set();
      this.setState(SessionState.Listening);
    });
  }

  /**
   * A reconnect in progress holds the command lock; it is cancelled first so the
   * stop does not wait out its retries.
   */
  stop(): Promise<void> {
    this.cancelReconnect();
    return this.runCommand("stop_listening", () => this.halt());
  }

  /**
   * Explicit flush (push-to-talk release)
   */
  flushNow(): Promise<void> {
    return this.runCommand("flush_audio", async () => {
      if (this.state !== SessionState.Listening || this.flushing) {
        this.logger.debug("Ignoring flush", { state: this.state, flushing: this.flushing });
        this.emitStatus();
        return;
      }
      await this.flush("manual");
    });
  }

  /**
   * Proactive reconnect: replaces the API session once it has reached the reconnect
   * threshold, but only while Idle or Listening with nothing buffered. Returns true
   * when a reconnect happened.
   */
  checkReconnect(): Promise<boolean> {
    return this.commandLock.runExclusive(async () => {
      if (!this.realtime.isReconnectDue()) return false;
      if (this.state !== SessionState.Idle && this.state !== SessionState.Listening) return false;
      if (this.awaitingResponse || this.flushing || this.buffer.size > 0) return false;

      const prior = this.state;
      this.logger.info("Session age reached reconnect threshold", {
        ageMs: this.realtime.sessionAgeMs(),
      });
      const reconnected = await this.reestablish();
      if (reconnected && this.state === SessionState.Reconnecting) {
        this.setState(prior);
      }
      return reconnected;
    });
  }

  /**
   * Stops the session and waits for every background task to settle
   */
  async shutdown(): Promise<void> {
    this.stopReconnectMonitor();
    this.cancelReconnect();
    await this.commandLock.runExclusive(() => this.halt());
    await Promise.all([...this.tasks]);
  }

  private isListening(): boolean {
    return this.running && !this.paused;
  }

  private setState(next: SessionState, status?: string): void {
    const previous = this.state;
    this.state = next;
    if (previous !== next) {
      this.logger.debug("State transition", { from: previous, to: next });
    }
    this.emitStatus(status);
  }

  private emit(event: SessionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error("Session event listener failed", asError(error), { kind: event.kind });
      }
    }
  }

  private emitError(record: ErrorRecord): void {
    this.emit({ kind: "error", error: record });
  }

  private runCommand(name: string, command: () => Promise<void>): Promise<void> {
    return this.commandLock.runExclusive(async () => {
      try {
        await command();
      } catch (error) {
        const record = toErrorRecord(error);
        this.logger.error(`Command ${name} failed`, asError(error), { code: record.kind });
        this.emitError(record);
        if (!record.recoverable) {
          await this.halt();
        }
      }
    });
  }

  /**
   * Runs work outside the caller's flow, keeping a handle for shutdown
   */
  private track(work: () => Promise<void>): void {
    const task: Promise<void> = (async () => {
      try {
        await work();
      } catch (error) {
        this.logger.error("Background task failed", asError(error));
      } finally {
        this.tasks.delete(task);
      }
    })();
    this.tasks.add(task);
  }

  private async ensureConnected(): Promise<void> {
    if (this.realtime.isConnected()) return;
    await this.realtime.connect();
    this.startEventPump();
  }

  // Capture

  private async runCaptureLoop(generation: number): Promise<void> {
    const live = (): boolean => generation === this.captureGeneration && this.running;
    let failure: unknown = null;

    try {
      while (live()) {
        await this.resumeSignal.wait();
        if (!live()) break;

        const frame = await this.source.readFrame();
        if (frame === null) {
          if (live()) failure = new DeviceError("Audio source closed unexpectedly");
          break;
        }
        if (!live() || this.paused) continue;

        await this.handleFrame(frame, live);
      }
    } catch (error) {
      if (live()) failure = error;
    } finally {
      if (generation === this.captureGeneration) {
        await this.source.close();
      }
    }

    if (failure !== null) {
      this.logger.error("Capture loop failed", asError(failure));
      this.emitError(toErrorRecord(failure));
      this.requestHalt();
    }
  }

  private async handleFrame(frame: Frame, live: () => boolean): Promise<void> {
    if (this.throttle.tryAcquire(this.now())) {
      this.emit({ kind: "audio_level", level: computeLevel(frame.samples) });
    }

    const activity = this.gate.classify(frame);

    if (this.state === SessionState.Cooldown) return;
    if (
      this.state === SessionState.AwaitingResponse &&
      this.config.session.captureWhileAwaiting === "discard"
    ) {
      return;
    }

    if (activity === "speech") {
      await this.buffer.append(frame, () => live() && !this.paused);
    }

    if (
      this.config.session.flushMode === "activity" &&
      this.gate.sustained &&
      this.state === SessionState.Listening
    ) {
      await this.flush("activity");
    }
  }

  // Transmission

  private async flush(reason: FlushReason): Promise<void> {
    if (this.flushing || this.state !== SessionState.Listening) return;
    this.flushing = true;
    try {
      const limit = this.config.session.maxApiCalls;
      if (limit !== -1 && this.apiCalls >= limit) {
        const dropped = await this.buffer.clear();
        this.gate.reset();
        this.logger.warn("Maximum API calls reached, dropping audio", { limit, dropped });
        this.emitStatus(MAX_CALLS_REACHED);
        return;
      }

      const frames = await this.buffer.drain();
      this.gate.reset();
      if (frames.length === 0) {
        this.logger.debug("Flush with empty buffer", { reason });
        return;
      }
      if (this.state !== SessionState.Listening || !this.isListening()) {
        this.logger.debug("Discarding drained frames after state change", { state: this.state });
        return;
      }

      const generation = ++this.turnGeneration;
      this.awaitingResponse = true;
      this.accumulator.reset();
      this.emit({ kind: "new_response" });
      this.setState(SessionState.AwaitingResponse);
      this.startResponseTimer(generation);

      try {
        await this.realtime.sendAudio(frames);
      } catch (error) {
        if (generation !== this.turnGeneration) return;
        this.logger.error("Failed to send audio", asError(error), { frames: frames.length });
        this.track(() => this.recoverConnection(error, true));
        return;
      }

      this.apiCalls++;
      this.logger.info("Audio flushed", { reason, frames: frames.length, apiCalls: this.apiCalls });
      this.emit({ kind: "api_call_count", count: this.apiCalls });
    } finally {
      this.flushing = false;
    }
  }

  private startResponseTimer(generation: number): void {
    this.clearResponseTimer();
    this.responseTimer = setTimeout(() => {
      this.responseTimer = null;
      if (generation !== this.turnGeneration || !this.awaitingResponse) return;
      const timeout = new ResponseTimeoutError(
        `No response within ${this.config.session.responseTimeoutMs}ms`
      );
      this.logger.warn(timeout.message);
      this.emitError(timeout.toRecord());
      this.abandonTurn();
      this.track(() => this.recoverConnection(timeout, false));
    }, this.config.session.responseTimeoutMs);
  }

  private clearResponseTimer(): void {
    if (this.responseTimer) {
      clearTimeout(this.responseTimer);
      this.responseTimer = null;
    }
  }

  private abandonTurn(): void {
    this.turnGeneration++;
    this.awaitingResponse = false;
    this.clearResponseTimer();
    this.accumulator.reset();
  }

  // API events

  private startEventPump(): void {
    const generation = ++this.pumpGeneration;
    const events = this.realtime.pollEvents();
    this.track(() => this.runEventPump(events, generation));
  }

  private async runEventPump(events: AsyncIterable<ApiEvent>, generation: number): Promise<void> {
    try {
      for await (const event of events) {
        if (generation !== this.pumpGeneration) return;
        this.handleApiEvent(event);
      }
    } catch (error) {
      if (generation !== this.pumpGeneration) return;
      this.logger.warn("Realtime event stream failed", { error: asError(error).message });
      await this.recoverConnection(error, this.awaitingResponse);
    }
  }

  private handleApiEvent(event: ApiEvent): void {
    this.emit({ kind: "response", data: event });

    switch (event.type) {
      case "response.created":
        this.accumulator.begin(responseIdOf(event));
        return;
      case "response.done": {
        const expected = this.accumulator.currentResponseId;
        const finished = responseIdOf(event);
        if (expected !== null && finished !== null && expected !== finished) {
          this.logger.debug("Ignoring completion of another response", { expected, finished });
          return;
        }
        this.completeResponse();
        return;
      }
      case "error":
        this.handleApiError(event);
        return;
      default: {
        const delta = textDelta(event);
        if (delta !== null) {
          this.accumulator.append(delta);
          this.emit({ kind: "transcript", delta });
        }
      }
    }
  }

  private completeResponse(): void {
    const text = this.accumulator.finalize();
    this.emit({ kind: "response_complete", text });
    if (!this.awaitingResponse) return;

    this.abandonTurn();
    if (!this.isListening()) return;
    this.startCooldown();
  }

  private handleApiError(event: ApiEvent): void {
    const detail = errorDetailOf(event);
    this.logger.error("Realtime API error", undefined, { code: detail.code, message: detail.message });

    if (detail.code === "session_expired") {
      this.track(() => this.recoverConnection(new SessionExpiredError(detail.message), true));
      return;
    }
    if (detail.code === "invalid_api_key") {
      this.emitError(new InvalidApiKeyError(detail.message).toRecord());
      this.requestHalt();
      return;
    }

    this.emitError({ kind: "unknown_error", message: detail.message, recoverable: true });
    if (this.awaitingResponse) {
      this.abandonTurn();
      if (this.isListening()) this.setState(SessionState.Listening);
    }
  }

  // Cooldown

  private startCooldown(): void {
    this.cancelCooldown();
    this.setState(SessionState.Cooldown);
    this.cooldownTimer = setTimeout(() => {
      this.cooldownTimer = null;
      if (this.state !== SessionState.Cooldown) return;
      this.gate.reset();
      this.setState(SessionState.Listening);
    }, this.config.session.cooldownMs);
  }

  private cancelCooldown(): void {
    if (this.cooldownTimer) {
      clearTimeout(this.cooldownTimer);
      this.cooldownTimer = null;
    }
  }

  // Connection recovery

  private startReconnectMonitor(): void {
    if (this.reconnectMonitor) return;
    this.reconnectMonitor = setInterval(() => {
      this.track(async () => {
        await this.checkReconnect();
      });
    }, this.config.session.reconnectCheckIntervalMs);
  }

  private stopReconnectMonitor(): void {
    if (this.reconnectMonitor) {
      clearInterval(this.reconnectMonitor);
      this.reconnectMonitor = null;
    }
  }

  /**
   * Reacts to a lost or unusable API connection. The error is surfaced when a turn
   * was in flight; an idle reconnect only shows the transient Reconnecting status.
   */
  private recoverConnection(cause: unknown, surface: boolean): Promise<void> {
    return this.commandLock.runExclusive(async () => {
      if (this.state === SessionState.Stopped) return;

      const code = getErrorCode(cause);
      if (code === "invalid_api_key") {
        this.emitError(toErrorRecord(cause));
        await this.halt();
        return;
      }
      if (surface) {
        this.emitError(toErrorRecord(cause));
      }
      this.abandonTurn();
      this.cancelCooldown();

      if (await this.reestablish()) {
        if (this.state === SessionState.Reconnecting) {
          this.setState(this.restingState());
        }
      }
    });
  }

  private restingState(): SessionState {
    if (!this.running) return SessionState.Idle;
    return this.paused ? SessionState.Paused : SessionState.Listening;
  }

  /**
   * Replaces the API session under the retry policy. On exhaustion the session is
   * stopped with connection_lost. Caller holds the command lock.
   */
  private async reestablish(): Promise<boolean> {
    const { maxReconnectAttempts, reconnectDelayMs } = this.config.session;
    const controller = new AbortController();
    this.reconnectAbort = controller;
    this.setState(SessionState.Reconnecting);
    this.pumpGeneration++;

    try {
      await retryWithBackoff(
        async (attempt) => {
          this.logger.info("Reconnecting to realtime API", { attempt });
          await this.realtime.reconnect(controller.signal);
        },
        {
          maxAttempts: maxReconnectAttempts,
          baseDelayMs: reconnectDelayMs,
          signal: controller.signal,
          shouldRetry: (error) => getErrorCode(error) !== "invalid_api_key",
          onRetry: (error, attempt, delayMs) => {
            this.logger.warn("Reconnect attempt failed", {
              attempt,
              delayMs,
              error: asError(error).message,
            });
          },
        }
      );
    } catch (error) {
      if (controller.signal.aborted) {
        this.logger.info("Reconnect cancelled");
        return false;
      }
      const record =
        getErrorCode(error) === "invalid_api_key"
          ? toErrorRecord(error)
          : {
              kind: "connection_lost" as const,
              message: `Reconnect failed after ${maxReconnectAttempts} attempts: ${asError(error).message}`,
              recoverable: false,
            };
      this.logger.error("Giving up on realtime connection", asError(error));
      this.emitError(record);
      await this.halt();
      return false;
    } finally {
      if (this.reconnectAbort === controller) this.reconnectAbort = null;
    }

    if (controller.signal.aborted) {
      this.logger.info("Reconnect cancelled after the session was replaced");
      return false;
    }
    this.startEventPump();
    return true;
  }

  private cancelReconnect(): void {
    if (this.reconnectAbort) {
      this.reconnectAbort.abort();
      this.reconnectAbort = null;
    }
  }

  /**
   * Stops the session from a background path
   */
  private requestHalt(): void {
    this.cancelReconnect();
    this.track(() => this.commandLock.runExclusive(() => this.halt()));
  }

  // Teardown

  /**
   * Any state -> Stopped. Caller holds the command lock.
   */
  private async halt(): Promise<void> {
    this.running = false;
    this.paused = false;
    this.captureGeneration++;
    this.resumeSignal.set();
    this.cancelCooldown();
    this.abandonTurn();
    this.stopReconnectMonitor();

    const dropped = await this.buffer.clear();
    this.pumpGeneration++;
    await this.realtime.close();
    await this.source.close();

    const capture = this.captureTask;
    this.captureTask = null;
    if (capture) {
      await capture;
    }

    this.logger.info("Session stopped", { droppedFrames: dropped, apiCalls: this.apiCalls });
    this.setState(SessionState.Stopped);
  }
}
