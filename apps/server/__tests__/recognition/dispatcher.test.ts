import { afterEach, describe, expect, it, vi } from "vitest";
import type { EngineTranscript, RecognitionEngine } from "@streamscribe/shared";
import type { DispatcherConfig } from "../../src/config.js";
import { RecognitionDispatcher } from "../../src/recognition/dispatcher.js";
import { ManualEngine, makeWindow, settle } from "../helpers.js";

const config: DispatcherConfig = { submitTimeoutMs: 1_000, workerPoolSize: 1, maxQueuedSubmissions: 1 };

function fixedEngine(transcript: EngineTranscript): RecognitionEngine {
  return {
    name: "fixed",
    transcribe: async () => transcript,
  };
}

describe("RecognitionDispatcher", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns a trimmed result tagged with the declared language", async () => {
    const dispatcher = new RecognitionDispatcher({
      engine: fixedEngine({ text: "  good morning  ", confidence: 0.7, detectedLanguage: "yo" }),
      config,
      now: () => 42,
    });

    const outcome = await dispatcher.submit(makeWindow(4), "en");

    expect(outcome).toEqual({
      ok: true,
      result: { text: "good morning", confidence: 0.7, language: "en", windowSequence: 4, producedAt: 42 },
    });
  });

  it("reports the detected language under auto, or auto when nothing was detected", async () => {
    const detected = new RecognitionDispatcher({
      engine: fixedEngine({ text: "bawo", confidence: 0.6, detectedLanguage: "yo" }),
      config,
    });
    const undetected = new RecognitionDispatcher({
      engine: fixedEngine({ text: "hm", confidence: 0.6 }),
      config,
    });

    const a = await detected.submit(makeWindow(0), "auto");
    const b = await undetected.submit(makeWindow(0), "auto");

    expect(a.ok && a.result.language).toBe("yo");
    expect(b.ok && b.result.language).toBe("auto");
  });

  it("clamps confidence and replaces non-finite values", async () => {
    const high = new RecognitionDispatcher({ engine: fixedEngine({ text: "x", confidence: 1.7 }), config });
    const nan = new RecognitionDispatcher({ engine: fixedEngine({ text: "x", confidence: Number.NaN }), config });

    const a = await high.submit(makeWindow(0), "en");
    const b = await nan.submit(makeWindow(0), "en");

    expect(a.ok && a.result.confidence).toBe(1);
    expect(b.ok && b.result.confidence).toBe(0.5);
  });

  it("turns an engine exception into model_failure", async () => {
    const dispatcher = new RecognitionDispatcher({
      engine: {
        name: "broken",
        transcribe: async () => {
          throw new Error("weights missing");
        },
      },
      config,
    });

    const outcome = await dispatcher.submit(makeWindow(0), "en");

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe("model_failure");
      expect(outcome.error.message).toBe("Recognition failed: weights missing");
      expect(outcome.error.retryable).toBe(false);
    }
    expect(dispatcher.stats().failed).toBe(1);
  });

  it("rejects with backpressure once the pool and queue are full", async () => {
    const engine = new ManualEngine();
    const dispatcher = new RecognitionDispatcher({ engine, config });

    const first = dispatcher.submit(makeWindow(0), "en");
    const second = dispatcher.submit(makeWindow(1), "en");
    const third = await dispatcher.submit(makeWindow(2), "en");

    expect(third.ok).toBe(false);
    if (!third.ok) {
      expect(third.error.kind).toBe("backpressure");
      expect(third.error.retryable).toBe(true);
    }
    await settle();
    expect(dispatcher.stats()).toMatchObject({ running: 1, queued: 1, rejected: 1 });
    expect(engine.calls).toHaveLength(1);

    engine.calls[0]?.resolve({ text: "zero", confidence: 1 });
    expect((await first).ok).toBe(true);
    await settle();
    expect(engine.calls).toHaveLength(2);

    engine.calls[1]?.resolve({ text: "one", confidence: 1 });
    const secondOutcome = await second;
    expect(secondOutcome.ok && secondOutcome.result.text).toBe("one");
  });

  it("times out a running call, aborts it, and keeps the slot until the engine returns", async () => {
    vi.useFakeTimers();
    const engine = new ManualEngine();
    const dispatcher = new RecognitionDispatcher({ engine, config });

    const pending = dispatcher.submit(makeWindow(0), "en");
    await settle();
    await vi.advanceTimersByTimeAsync(1_000);
    const outcome = await pending;

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.kind).toBe("timeout");
    expect(engine.calls[0]?.signal.aborted).toBe(true);
    expect(dispatcher.stats()).toMatchObject({ running: 1, timedOut: 1 });

    engine.calls[0]?.reject(new Error("aborted"));
    await settle();
    expect(dispatcher.stats()).toMatchObject({ running: 0, failed: 0 });
  });

  it("counts queue wait against the timeout", async () => {
    vi.useFakeTimers();
    const engine = new ManualEngine();
    const dispatcher = new RecognitionDispatcher({ engine, config });

    const running = dispatcher.submit(makeWindow(0), "en");
    const queued = dispatcher.submit(makeWindow(1), "en");
    await vi.advanceTimersByTimeAsync(1_000);

    const [a, b] = await Promise.all([running, queued]);
    expect(a.ok || a.error.kind).toBe("timeout");
    expect(b.ok || b.error.kind).toBe("timeout");
    expect(engine.calls).toHaveLength(1);
    expect(dispatcher.stats().queued).toBe(0);
  });

  it("runs up to the pool size concurrently", async () => {
    const engine = new ManualEngine();
    const dispatcher = new RecognitionDispatcher({
      engine,
      config: { submitTimeoutMs: 1_000, workerPoolSize: 3, maxQueuedSubmissions: 0 },
    });

    void dispatcher.submit(makeWindow(0), "en");
    void dispatcher.submit(makeWindow(1), "en");
    void dispatcher.submit(makeWindow(2), "en");
    const fourth = await dispatcher.submit(makeWindow(3), "en");
    await settle();

    expect(engine.calls).toHaveLength(3);
    expect(fourth.ok || fourth.error.kind).toBe("backpressure");
    for (const call of engine.calls) call.resolve({ text: "", confidence: 0 });
    await settle();
  });

  it("initializes the engine once", async () => {
    const init = vi.fn(async () => undefined);
    const dispatcher = new RecognitionDispatcher({
      engine: { name: "warm", init, transcribe: async () => ({ text: "x", confidence: 1 }) },
      config,
    });

    await dispatcher.init();
    await dispatcher.init();
    await dispatcher.submit(makeWindow(0), "en");

    expect(init).toHaveBeenCalledTimes(1);
  });

  it("retries engine initialization after a failed attempt", async () => {
    const init = vi
      .fn<() => Promise<void>>()
      .mockRejectedValueOnce(new Error("model not loaded"))
      .mockResolvedValue(undefined);
    const dispatcher = new RecognitionDispatcher({
      engine: { name: "flaky", init, transcribe: async () => ({ text: "ready", confidence: 1 }) },
      config,
    });

    const first = await dispatcher.submit(makeWindow(0), "en");
    const second = await dispatcher.submit(makeWindow(1), "en");

    expect(first.ok || first.error.message).toBe("Recognition failed: model not loaded");
    expect(second.ok && second.result.text).toBe("ready");
    expect(init).toHaveBeenCalledTimes(2);
  });

  it("fails queued work on shutdown, waits for running calls, then disposes the engine", async () => {
    const engine = new ManualEngine();
    const dispose = vi.fn(async () => undefined);
    const dispatcher = new RecognitionDispatcher({
      engine: { name: engine.name, transcribe: (args) => engine.transcribe(args), dispose },
      config,
    });

    const running = dispatcher.submit(makeWindow(0), "en");
    const queued = dispatcher.submit(makeWindow(1), "en");
    await settle();

    let shutDown = false;
    const shutdown = dispatcher.shutdown().then(() => {
      shutDown = true;
    });

    const queuedOutcome = await queued;
    expect(queuedOutcome.ok || queuedOutcome.error.kind).toBe("model_failure");
    await settle();
    expect(shutDown).toBe(false);

    engine.calls[0]?.resolve({ text: "last words", confidence: 0.9 });
    await shutdown;
    const runningOutcome = await running;

    expect(runningOutcome.ok && runningOutcome.result.text).toBe("last words");
    expect(dispose).toHaveBeenCalledTimes(1);

    const late = await dispatcher.submit(makeWindow(2), "en");
    expect(late.ok || late.error.kind).toBe("model_failure");
  });
});
