import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FatalConfigurationError } from "../errors";
import { ParticipantDirectory } from "../participants";
import { SessionController } from "../session";
import { systemClock } from "../timing";
import type { ParticipantNameResolver, PipelineOptions, TranscriptSink, TranscriptionEngine } from "../types";
import { FakeCapture, MemoryStagingArea, createTestLogger } from "./helpers";

const options: PipelineOptions = {
  recorder: {
    baseDurationMs: 20_000,
    graceMs: 2_000,
    silenceHoldMs: 1_000,
    tickMs: 100,
    retryBackoffMs: 500,
    encoding: "wav",
  },
  sweeper: {
    tickMs: 500,
    settleMs: 750,
    minBytes: 1024,
    transcriptionTimeoutMs: 60_000,
    transcription: {
      model: "nova-3",
      language: "en",
      smartFormat: true,
      punctuate: true,
      fillerWords: false,
      minConfidence: 0,
    },
  },
  sessionSettleMs: 1_000,
};

function createController() {
  const staging = new MemoryStagingArea();
  const capture = new FakeCapture(staging);
  const engine = {
    transcribe: vi.fn<TranscriptionEngine["transcribe"]>().mockResolvedValue({ text: "hello world", confidence: 0.9 }),
  };
  const resolver = { resolve: vi.fn<ParticipantNameResolver["resolve"]>().mockResolvedValue("Alice") };
  const sink = { emit: vi.fn<TranscriptSink["emit"]>() };
  const logger = createTestLogger();
  const onConnectionLost = vi.fn<() => void>();
  const controller = new SessionController({
    sessionId: "guild-1",
    directory: "recordings/guild-1",
    capture,
    staging,
    engine,
    participants: new ParticipantDirectory(resolver, logger),
    sink,
    clock: systemClock,
    logger,
    options,
    onConnectionLost,
  });
  return { controller, capture, staging, engine, sink, logger, onConnectionLost };
}

// stop()はsessionSettleMsだけ待つため、その分タイマーを進める
async function stopAndSettle(controller: SessionController): Promise<void> {
  const stopping = controller.stop();
  await vi.advanceTimersByTimeAsync(options.sessionSettleMs);
  await stopping;
}

describe("SessionController", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("prepares the staging area, connects and wires activity events", async () => {
    const { controller, capture, staging } = createController();

    await controller.start();

    expect(controller.isActive).toBe(true);
    expect(staging.prepared).toBe(1);
    expect(capture.connects).toBe(1);
    expect(capture.listenerCount).toBe(1);
    expect(capture.started).toEqual(["0-1"]);

    capture.emit({ participantId: "42", speaking: true });
    expect(controller.currentContext?.activity.snapshot().isSpeaking).toBe(true);

    capture.emit({ participantId: "42", speaking: false });
    await stopAndSettle(controller);
  });

  it("transcribes a finished segment while the next one records", async () => {
    const { controller, capture, sink } = createController();

    await controller.start();
    capture.emit({ participantId: "42", speaking: true });
    setTimeout(() => capture.emit({ participantId: "42", speaking: false }), 3_000);

    await vi.advanceTimersByTimeAsync(20_500);
    expect(capture.started).toEqual(["0-1", "20000-2"]);
    expect(sink.emit).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(500);
    expect(sink.emit).toHaveBeenCalledWith({
      participantId: "42",
      displayName: "Alice",
      text: "hello world",
      timestamp: new Date(21_000),
    });

    await stopAndSettle(controller);
  });

  it("drains the last segment and disconnects on stop", async () => {
    const { controller, capture, staging, sink } = createController();

    await controller.start();
    await vi.advanceTimersByTimeAsync(5_000);
    await stopAndSettle(controller);

    expect(controller.isActive).toBe(false);
    expect(controller.currentContext).toBeNull();
    expect(capture.stopped).toBe(1);
    expect(capture.disconnects).toBe(1);
    expect(capture.listenerCount).toBe(0);
    expect(sink.emit).toHaveBeenCalledTimes(1);
    expect(staging.files.size).toBe(0);
  });

  it("ignores a second stop", async () => {
    const { controller, capture } = createController();

    await controller.start();
    await stopAndSettle(controller);
    await controller.stop();

    expect(capture.disconnects).toBe(1);
  });

  it("does nothing when stopped before it was started", async () => {
    const { controller, capture } = createController();

    await controller.stop();

    expect(capture.disconnects).toBe(0);
    expect(controller.isActive).toBe(false);
  });

  it("winds down the previous loops before restarting", async () => {
    const { controller, capture, logger } = createController();

    await controller.start();
    await vi.advanceTimersByTimeAsync(5_000);
    const previous = controller.currentContext;

    const restarting = controller.start();
    await vi.advanceTimersByTimeAsync(options.sessionSettleMs);
    await restarting;

    expect(logger.info).toHaveBeenCalledWith("Session guild-1 is already active, restarting");
    expect(previous?.active).toBe(false);
    expect(controller.currentContext).not.toBe(previous);
    expect(controller.isActive).toBe(true);
    expect(capture.connects).toBe(2);
    expect(capture.listenerCount).toBe(1);
    expect(capture.started).toEqual(["0-1", "6000-2"]);

    await stopAndSettle(controller);
  });

  it("reports a failed connection as a configuration error", async () => {
    const { controller, capture } = createController();
    capture.connectError = new Error("Missing Access");

    const starting = controller.start();

    await expect(starting).rejects.toBeInstanceOf(FatalConfigurationError);
    await expect(starting).rejects.toThrow("Failed to start session guild-1");
    expect(controller.isActive).toBe(false);
    expect(capture.listenerCount).toBe(0);
    expect(capture.started).toEqual([]);
  });

  it("runs a single pipeline when start is called again while connecting", async () => {
    const { controller, capture } = createController();
    capture.connectDelayMs = 2_000;

    const first = controller.start();
    const second = controller.start();
    const stopping = controller.stop();
    await vi.advanceTimersByTimeAsync(20_000);
    await Promise.all([first, second, stopping]);

    expect(capture.started).toEqual(["2000-1", "5000-2"]);
    expect(capture.stopped).toBe(2);
    expect(capture.connects).toBe(2);
    expect(capture.disconnects).toBe(1);
    expect(controller.isActive).toBe(false);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(capture.started).toEqual(["2000-1", "5000-2"]);
    expect(capture.listenerCount).toBe(0);
    expect(capture.closedListenerCount).toBe(0);
  });

  it("stops a session whose start is still connecting", async () => {
    const { controller, capture } = createController();
    capture.connectDelayMs = 2_000;

    const starting = controller.start();
    const stopping = controller.stop();
    await vi.advanceTimersByTimeAsync(10_000);
    await Promise.all([starting, stopping]);

    expect(controller.isActive).toBe(false);
    expect(capture.disconnects).toBe(1);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(capture.started).toEqual(["2000-1"]);
    expect(capture.listenerCount).toBe(0);
  });

  it("accepts a new start after a failed one", async () => {
    const { controller, capture } = createController();
    capture.connectError = new Error("Missing Access");

    await expect(controller.start()).rejects.toBeInstanceOf(FatalConfigurationError);

    capture.connectError = null;
    await controller.start();

    expect(controller.isActive).toBe(true);
    await stopAndSettle(controller);
  });

  it("stops itself when the voice connection closes", async () => {
    const { controller, capture, logger, onConnectionLost } = createController();

    await controller.start();
    await vi.advanceTimersByTimeAsync(5_000);
    capture.close();

    expect(logger.warn).toHaveBeenCalledWith("Voice connection closed, stopping session guild-1");

    await vi.advanceTimersByTimeAsync(options.sessionSettleMs);

    expect(controller.isActive).toBe(false);
    expect(capture.disconnects).toBe(1);
    expect(capture.closedListenerCount).toBe(0);
    expect(onConnectionLost).toHaveBeenCalledTimes(1);
  });

  it("does not report a connection loss after a deliberate stop", async () => {
    const { controller, capture, onConnectionLost } = createController();

    await controller.start();
    await stopAndSettle(controller);
    capture.close();

    expect(onConnectionLost).not.toHaveBeenCalled();
  });
});
