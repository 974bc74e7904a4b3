import { describe, it, expect, vi, afterEach } from "vitest";
import { MAX_CALLS_REACHED, Orchestrator, statusLabel } from "./orchestrator";
import { SessionBuffer } from "./sessionBuffer";
import { ErrorRecord, Frame, SessionConfig, SessionEvent, SessionState } from "../../types/index";
import { ConnectionLostError, DeviceError, InvalidApiKeyError } from "../../utils/errors";
import {
  DEFAULT_DEVICE,
  FakeAudioSource,
  FakeRealtimeSession,
  fixedSelector,
  speechFrame,
  silenceFrame,
  testConfig,
} from "../../test/fakes";

const running: Orchestrator[] = [];

afterEach(async () => {
  await Promise.all(running.splice(0).map((orchestrator) => orchestrator.shutdown()));
});

interface SetupOptions {
  now?: () => number;
  buffer?: SessionBuffer;
}

/**
 * Buffer whose drain blocks until released, holding a flush open
 */
class HeldBuffer extends SessionBuffer {
  drainStarted = false;
  release: () => void = () => undefined;
  private readonly held = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  async drain(): Promise<Frame[]> {
    this.drainStarted = true;
    await this.held;
    return super.drain();
  }
}

function setup(session: Partial<SessionConfig> = {}, options: SetupOptions = {}) {
  const source = new FakeAudioSource();
  const realtime = new FakeRealtimeSession();
  const events: SessionEvent[] = [];
  const orchestrator = new Orchestrator({
    config: testConfig({ session }),
    source,
    realtime,
    selectDevice: fixedSelector(DEFAULT_DEVICE),
    now: options.now ?? (() => 0),
    buffer: options.buffer,
  });
  orchestrator.subscribe((event) => events.push(event));
  running.push(orchestrator);

  let sequence = 0;
  const speak = (frames: number): void => {
    for (let i = 0; i < frames; i++) source.push(speechFrame(sequence++));
  };
  const statuses = (): string[] => events.flatMap((event) => (event.kind === "status" ? [event.status] : []));
  const errors = (): ErrorRecord[] => events.flatMap((event) => (event.kind === "error" ? [event.error] : []));
  const kinds = (): string[] => events.map((event) => event.kind).filter((kind) => kind !== "audio_level");
  const waitForState = (state: SessionState) =>
    vi.waitFor(() => expect(orchestrator.currentState).toBe(state));

  // Starts listening and drives one activity flush into AwaitingResponse
  const startTurn = async (): Promise<void> => {
    await orchestrator.initialize();
    await orchestrator.start();
    speak(5);
    await waitForState(SessionState.AwaitingResponse);
  };

  return { orchestrator, source, realtime, events, speak, statuses, errors, kinds, waitForState, startTurn };
}

describe("statusLabel", () => {
  it("names every state for the display", () => {
    expect(Object.values(SessionState).map(statusLabel)).toEqual([
      "ready",
      "listening",
      "paused",
      "processing",
      "cooldown",
      "reconnecting",
      "stopped",
    ]);
  });
});

describe("Orchestrator", () => {
  it("initializes into Idle with an open API session", async () => {
    const { orchestrator, realtime, source, statuses } = setup();
    await orchestrator.initialize();

    expect(orchestrator.currentState).toBe(SessionState.Idle);
    expect(statuses()).toEqual(["ready"]);
    expect(realtime.connectCount).toBe(1);
    expect(source.selected).toBe(DEFAULT_DEVICE);
    expect(source.isOpen).toBe(false);
    expect(orchestrator.snapshot()).toEqual({
      state: SessionState.Idle,
      isListening: false,
      isPaused: false,
      apiCallCount: 0,
      bufferedFrames: 0,
      connected: true,
    });
  });

  it("flushes sustained speech, relays the response and cools down", async () => {
    const { orchestrator, realtime, events, speak, statuses, kinds, waitForState } = setup({ cooldownMs: 200 });
    await orchestrator.initialize();
    await orchestrator.start();
    expect(orchestrator.snapshot().isListening).toBe(true);

    speak(5);
    await waitForState(SessionState.AwaitingResponse);
    await vi.waitFor(() => expect(orchestrator.apiCallCount).toBe(1));
    expect(realtime.sent).toHaveLength(1);
    expect(realtime.sent[0]?.map((frame) => frame.sequence)).toEqual([0, 1, 2, 3, 4]);

    realtime.emit({ type: "response.created", response: { id: "resp_1" } });
    realtime.emit({ type: "response.text.delta", delta: "Hello" });
    realtime.emit({ type: "response.text.delta", delta: " there" });
    realtime.emit({ type: "response.done", response: { id: "resp_1" } });

    await waitForState(SessionState.Cooldown);
    expect(events).toContainEqual({ kind: "response_complete", text: "Hello there" });
    await waitForState(SessionState.Listening);

    expect(statuses()).toEqual(["ready", "listening", "processing", "cooldown", "listening"]);
    expect(kinds()).toEqual([
      "status",
      "status",
      "new_response",
      "status",
      "api_call_count",
      "response",
      "response",
      "transcript",
      "response",
      "transcript",
      "response",
      "response_complete",
      "status",
      "status",
    ]);
  });

  it("sends the speech run once it is sustained and keeps the frame after it", async () => {
    const { orchestrator, realtime, source, waitForState } = setup();
    await orchestrator.initialize();
    await orchestrator.start();
    for (let i = 0; i < 5; i++) source.push(silenceFrame(i));
    for (let i = 5; i < 11; i++) source.push(speechFrame(i));

    await waitForState(SessionState.AwaitingResponse);
    await vi.waitFor(() => expect(orchestrator.bufferedFrames).toBe(1));
    expect(realtime.sent.map((batch) => batch.map((frame) => frame.sequence))).toEqual([[5, 6, 7, 8, 9]]);
  });

  it("reports the audio level at most once per throttle interval", async () => {
    const { orchestrator, events, source } = setup({ flushMode: "manual" });
    await orchestrator.initialize();
    await orchestrator.start();
    source.push(speechFrame(0));
    source.push(silenceFrame(1));
    await vi.waitFor(() => expect(orchestrator.bufferedFrames).toBe(1));
    expect(events.filter((event) => event.kind === "audio_level")).toEqual([{ kind: "audio_level", level: 49 }]);
  });

  it("keeps throttling audio levels across pause and resume", async () => {
    let clock = 0;
    const { orchestrator, events, source } = setup({ flushMode: "manual" }, { now: () => clock });
    await orchestrator.initialize();
    await orchestrator.start();

    for (let cycle = 0; cycle < 10; cycle++) {
      clock = cycle * 50;
      source.push(speechFrame(cycle));
      await vi.waitFor(() => expect(orchestrator.bufferedFrames).toBe(1));
      await orchestrator.pause();
      await orchestrator.resume();
    }

    // 10 updates per second: one per 100 ms of the 0..450 ms clock
    expect(events.filter((event) => event.kind === "audio_level")).toHaveLength(5);
  });

  it("ignores silence when buffering", async () => {
    const { orchestrator, source } = setup({ flushMode: "manual" });
    await orchestrator.initialize();
    await orchestrator.start();
    source.push(silenceFrame(0));
    source.push(speechFrame(1));
    source.push(silenceFrame(2));
    source.push(speechFrame(3));
    await vi.waitFor(() => expect(orchestrator.bufferedFrames).toBe(2));
  });

  it("drops buffered audio on pause and starts over after resume", async () => {
    const { orchestrator, realtime, source, speak, waitForState } = setup();
    await orchestrator.initialize();
    await orchestrator.start();
    speak(3);
    await vi.waitFor(() => expect(orchestrator.bufferedFrames).toBe(3));

    await orchestrator.pause();
    expect(orchestrator.bufferedFrames).toBe(0);
    expect(orchestrator.snapshot()).toMatchObject({ state: SessionState.Paused, isListening: false, isPaused: true });
    expect(source.push(speechFrame(100))).toBe(false);

    await orchestrator.resume();
    expect(orchestrator.currentState).toBe(SessionState.Listening);
    speak(5);
    await waitForState(SessionState.AwaitingResponse);
    expect(realtime.sent[0]).toHaveLength(5);
  });

  it("acknowledges redundant commands with the current status", async () => {
    const { orchestrator, source, statuses } = setup();
    await orchestrator.initialize();
    await orchestrator.resume();
    await orchestrator.start();
    await orchestrator.start();
    expect(source.openCount).toBe(1);
    expect(statuses()).toEqual(["ready", "ready", "listening", "listening"]);
  });

  it("flushes on demand in manual mode only while listening", async () => {
    const { orchestrator, realtime, speak, statuses } = setup({ flushMode: "manual" });
    await orchestrator.initialize();
    await orchestrator.flushNow();
    expect(statuses()).toEqual(["ready", "ready"]);

    await orchestrator.start();
    speak(8);
    await vi.waitFor(() => expect(orchestrator.bufferedFrames).toBe(8));
    expect(realtime.sent).toHaveLength(0);

    await orchestrator.flushNow();
    expect(realtime.sent[0]).toHaveLength(8);
    expect(orchestrator.currentState).toBe(SessionState.AwaitingResponse);
    expect(orchestrator.apiCallCount).toBe(1);
  });

  it("answers a manual flush that overlaps an activity flush with the current status", async () => {
    const buffer = new HeldBuffer();
    const { orchestrator, realtime, speak, statuses } = setup({}, { buffer });
    await orchestrator.initialize();
    await orchestrator.start();
    speak(5);
    await vi.waitFor(() => expect(buffer.drainStarted).toBe(true));

    await orchestrator.flushNow();
    expect(statuses()).toEqual(["ready", "listening", "listening"]);

    buffer.release();
    await vi.waitFor(() => expect(orchestrator.apiCallCount).toBe(1));
    expect(realtime.sent).toHaveLength(1);
  });

  it("does not transmit an empty buffer", async () => {
    const { orchestrator, realtime } = setup({ flushMode: "manual" });
    await orchestrator.initialize();
    await orchestrator.start();
    await orchestrator.flushNow();
    expect(realtime.sent).toHaveLength(0);
    expect(orchestrator.currentState).toBe(SessionState.Listening);
  });

  it("keeps capturing while awaiting a response when buffering", async () => {
    const { orchestrator, realtime, speak, startTurn } = setup();
    await startTurn();
    speak(6);
    await vi.waitFor(() => expect(orchestrator.bufferedFrames).toBe(6));
    expect(realtime.sent).toHaveLength(1);
  });

  it("discards capture while awaiting a response when configured to", async () => {
    const { orchestrator, source, speak, startTurn } = setup({ captureWhileAwaiting: "discard" });
    await startTurn();
    speak(6);
    await vi.waitFor(() => expect(source.queued).toBe(0));
    expect(orchestrator.bufferedFrames).toBe(0);
  });

  it("stops transmitting once the call limit is reached", async () => {
    const { orchestrator, realtime, speak, statuses, waitForState, startTurn } = setup({
      maxApiCalls: 1,
      cooldownMs: 10,
    });
    await startTurn();
    realtime.emit({ type: "response.done" });
    await waitForState(SessionState.Listening);

    speak(5);
    await vi.waitFor(() => expect(statuses()).toContain(MAX_CALLS_REACHED));
    expect(realtime.sent).toHaveLength(1);
    expect(orchestrator.bufferedFrames).toBe(0);
    expect(orchestrator.currentState).toBe(SessionState.Listening);
  });

  it("completes only the response that was started", async () => {
    const { orchestrator, realtime, events, waitForState, startTurn } = setup({ cooldownMs: 200 });
    await startTurn();
    realtime.emit({ type: "response.created", response: { id: "resp_2" } });
    realtime.emit({ type: "response.text.delta", delta: "Hi" });
    realtime.emit({ type: "response.done", response: { id: "resp_1" } });
    realtime.emit({ type: "response.done", response: { id: "resp_2" } });

    await waitForState(SessionState.Cooldown);
    expect(events.filter((event) => event.kind === "response_complete")).toEqual([
      { kind: "response_complete", text: "Hi" },
    ]);
    expect(orchestrator.apiCallCount).toBe(1);
  });

  it("relays a late response after resume without entering cooldown", async () => {
    const { orchestrator, realtime, events, startTurn } = setup();
    await startTurn();
    await orchestrator.pause();
    await orchestrator.resume();

    realtime.emit({ type: "response.text.delta", delta: "late" });
    realtime.emit({ type: "response.done" });
    await vi.waitFor(() => expect(events).toContainEqual({ kind: "response_complete", text: "late" }));
    expect(orchestrator.currentState).toBe(SessionState.Listening);
  });

  it("reconnects after session expiry and returns to listening", async () => {
    const { orchestrator, realtime, errors, statuses, waitForState, startTurn } = setup();
    await startTurn();

    realtime.emit({ type: "error", error: { code: "session_expired", message: "Session expired" } });
    await vi.waitFor(() => expect(realtime.reconnectCount).toBe(1));
    await waitForState(SessionState.Listening);

    expect(errors()).toEqual([{ kind: "session_expired", message: "Session expired", recoverable: true }]);
    expect(statuses().slice(-3)).toEqual(["processing", "reconnecting", "listening"]);
    expect(orchestrator.snapshot().connected).toBe(true);
  });

  it("reconnects quietly when the connection drops while idle", async () => {
    const { orchestrator, realtime, errors, statuses, waitForState } = setup();
    await orchestrator.initialize();
    realtime.drop(new ConnectionLostError("Realtime connection closed (1006)", 1006));

    await vi.waitFor(() => expect(realtime.reconnectCount).toBe(1));
    await waitForState(SessionState.Idle);
    expect(errors()).toEqual([]);
    expect(statuses()).toEqual(["ready", "reconnecting", "ready"]);
  });

  it("surfaces a drop during a turn", async () => {
    const { realtime, errors, waitForState, startTurn } = setup();
    await startTurn();
    realtime.drop(new ConnectionLostError("Realtime connection closed (1006)", 1006));
    await vi.waitFor(() => expect(realtime.reconnectCount).toBe(1));
    await waitForState(SessionState.Listening);
    expect(errors()).toEqual([
      { kind: "connection_lost", message: "Realtime connection closed (1006)", recoverable: true },
    ]);
  });

  it("cancels a reconnect in progress when stopped", async () => {
    const { orchestrator, realtime, errors, waitForState } = setup({ reconnectDelayMs: 1000 });
    await orchestrator.initialize();
    const refused = new ConnectionLostError("refused");
    realtime.connectErrors = [refused, refused];
    realtime.drop(new ConnectionLostError("gone"));
    await waitForState(SessionState.Reconnecting);
    await vi.waitFor(() => expect(realtime.reconnectCount).toBe(1));

    const startedAt = Date.now();
    await orchestrator.stop();
    expect(Date.now() - startedAt).toBeLessThan(500);
    expect(orchestrator.currentState).toBe(SessionState.Stopped);
    expect(realtime.reconnectCount).toBe(1);
    expect(realtime.isConnected()).toBe(false);
    expect(errors()).toEqual([]);
  });

  it("stops with connection_lost when reconnecting is exhausted", async () => {
    const { orchestrator, realtime, errors, waitForState } = setup();
    await orchestrator.initialize();
    await orchestrator.start();
    const refused = new ConnectionLostError("refused");
    realtime.connectErrors = [refused, refused, refused];
    realtime.drop(new ConnectionLostError("gone"));

    await waitForState(SessionState.Stopped);
    expect(realtime.reconnectCount).toBe(3);
    expect(errors()).toEqual([
      { kind: "connection_lost", message: "Reconnect failed after 3 attempts: refused", recoverable: false },
    ]);
    expect(orchestrator.snapshot()).toMatchObject({ isListening: false, isPaused: false });
  });

  it("defers a proactive reconnect until the turn is over", async () => {
    const { orchestrator, realtime, statuses, waitForState, startTurn } = setup({ cooldownMs: 150 });
    await startTurn();
    realtime.reconnectDue = true;

    expect(await orchestrator.checkReconnect()).toBe(false);
    realtime.emit({ type: "response.done" });
    await waitForState(SessionState.Cooldown);
    expect(await orchestrator.checkReconnect()).toBe(false);

    await waitForState(SessionState.Listening);
    expect(await orchestrator.checkReconnect()).toBe(true);
    expect(realtime.reconnectCount).toBe(1);
    expect(orchestrator.currentState).toBe(SessionState.Listening);
    expect(statuses().slice(-2)).toEqual(["reconnecting", "listening"]);
  });

  it("defers a proactive reconnect while audio is buffered", async () => {
    const { orchestrator, realtime, speak } = setup({ flushMode: "manual" });
    await orchestrator.initialize();
    await orchestrator.start();
    speak(2);
    await vi.waitFor(() => expect(orchestrator.bufferedFrames).toBe(2));
    realtime.reconnectDue = true;
    expect(await orchestrator.checkReconnect()).toBe(false);
    expect(realtime.reconnectCount).toBe(0);
  });

  it("times out a missing response and reconnects", async () => {
    const { realtime, errors, waitForState, startTurn } = setup({ responseTimeoutMs: 200 });
    await startTurn();
    await vi.waitFor(() => expect(realtime.reconnectCount).toBe(1));
    await waitForState(SessionState.Listening);
    expect(errors()).toEqual([{ kind: "timeout", message: "No response within 200ms", recoverable: true }]);
  });

  it("recovers from a failed transmission without counting the call", async () => {
    const { orchestrator, realtime, errors, speak, waitForState } = setup();
    realtime.sendError = new ConnectionLostError("send failed");
    await orchestrator.initialize();
    await orchestrator.start();
    speak(5);

    await vi.waitFor(() => expect(realtime.reconnectCount).toBe(1));
    await waitForState(SessionState.Listening);
    expect(orchestrator.apiCallCount).toBe(0);
    expect(errors()).toEqual([{ kind: "connection_lost", message: "send failed", recoverable: true }]);
  });

  it("returns to listening after an unclassified API error", async () => {
    const { realtime, errors, waitForState, startTurn } = setup();
    await startTurn();
    realtime.emit({ type: "error", error: { code: "server_error", message: "try again" } });
    await waitForState(SessionState.Listening);
    expect(errors()).toEqual([{ kind: "unknown_error", message: "try again", recoverable: true }]);
  });

  it("stops on a rejected API key", async () => {
    const { orchestrator, realtime, errors, waitForState, startTurn } = setup();
    await startTurn();
    realtime.emit({ type: "error", error: { code: "invalid_api_key", message: "Incorrect API key" } });
    await waitForState(SessionState.Stopped);
    expect(errors()).toEqual([{ kind: "invalid_api_key", message: "Incorrect API key", recoverable: false }]);
    expect(orchestrator.snapshot().connected).toBe(false);
  });

  it("fails initialization when the key is rejected", async () => {
    const { orchestrator, realtime, errors } = setup();
    realtime.connectErrors = [new InvalidApiKeyError()];
    await expect(orchestrator.initialize()).rejects.toBeInstanceOf(InvalidApiKeyError);
    expect(orchestrator.currentState).toBe(SessionState.Stopped);
    expect(errors()[0]?.kind).toBe("invalid_api_key");
  });

  it("stops with device_error when the input device fails", async () => {
    const { orchestrator, source, errors, statuses, waitForState } = setup();
    await orchestrator.initialize();
    await orchestrator.start();
    source.fail(new DeviceError("Input device disconnected"));

    await waitForState(SessionState.Stopped);
    expect(errors()).toEqual([{ kind: "device_error", message: "Input device disconnected", recoverable: false }]);
    expect(statuses().at(-1)).toBe("stopped");
    expect(source.isOpen).toBe(false);
  });

  it("reports a device that cannot be opened and stays stopped", async () => {
    const { orchestrator, source, errors } = setup();
    await orchestrator.initialize();
    source.openError = new DeviceError("Device busy");
    await orchestrator.start();
    expect(errors()).toEqual([{ kind: "device_error", message: "Device busy", recoverable: false }]);
    expect(orchestrator.currentState).toBe(SessionState.Stopped);
  });

  it("releases everything on stop and can start again", async () => {
    const { orchestrator, realtime, source, statuses } = setup();
    await orchestrator.initialize();
    await orchestrator.start();
    await orchestrator.stop();

    expect(orchestrator.snapshot()).toEqual({
      state: SessionState.Stopped,
      isListening: false,
      isPaused: false,
      apiCallCount: 0,
      bufferedFrames: 0,
      connected: false,
    });
    expect(source.closeCount).toBe(1);
    expect(statuses().at(-1)).toBe("stopped");

    await orchestrator.start();
    expect(orchestrator.currentState).toBe(SessionState.Listening);
    expect(realtime.connectCount).toBe(2);
    expect(source.openCount).toBe(2);
  });

  it("delivers events to every subscriber until unsubscribed", async () => {
    const { orchestrator } = setup();
    const seen: string[] = [];
    const unsubscribe = orchestrator.subscribe((event) => seen.push(event.kind));
    orchestrator.emitStatus();
    unsubscribe();
    orchestrator.emitStatus();
    expect(seen).toEqual(["status"]);
  });
});
