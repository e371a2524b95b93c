import type { LanguagePreference, RecognitionEngine } from "@streamscribe/shared";
import type { AudioWindow } from "../audio/frameBuffer.js";
import type { DispatcherConfig } from "../config.js";
import { RecognitionError, errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../util/logger.js";

export type RecognitionResult = Readonly<{
  text: string;
  /** In [0, 1]. */
  confidence: number;
  /** Declared preference, or the engine's detected language under "auto". */
  language: string;
  windowSequence: number;
  /** Epoch ms. */
  producedAt: number;
}>;

export type SubmitOutcome =
  | { ok: true; result: RecognitionResult }
  | { ok: false; error: RecognitionError };

export type DispatcherStats = {
  engine: string;
  running: number;
  queued: number;
  completed: number;
  failed: number;
  timedOut: number;
  rejected: number;
};

type JobState = "queued" | "running" | "settled";

type Job = {
  window: AudioWindow;
  language: LanguagePreference;
  state: JobState;
  controller: AbortController;
  timer: NodeJS.Timeout | null;
  resolve: (outcome: SubmitOutcome) => void;
};

const DEFAULT_CONFIDENCE = 0.5;

/**
 * Process-wide gateway to the recognition engine.
 *
 * - At most `workerPoolSize` engine calls run at once; further submissions wait
 *   in a FIFO of `maxQueuedSubmissions`, and beyond that fail fast with
 *   `backpressure`.
 * - Every submission settles within `submitTimeoutMs` of the call (queue wait
 *   included). A timed-out running call is aborted, but keeps its pool slot
 *   until the engine actually returns.
 * - `submit` never rejects; failures come back as `{ ok: false }`.
 */
export class RecognitionDispatcher {
  private readonly engine: RecognitionEngine;
  private readonly config: DispatcherConfig;
  private readonly logger: Logger;
  private readonly now: () => number;

  private readonly queue: Job[] = [];
  private readonly inFlight = new Set<Promise<void>>();
  private running = 0;
  private closed = false;
  private initPromise: Promise<void> | null = null;

  private counters = { completed: 0, failed: 0, timedOut: 0, rejected: 0 };

  constructor(args: {
    engine: RecognitionEngine;
    config: DispatcherConfig;
    logger?: Logger;
    now?: () => number;
  }) {
    this.engine = args.engine;
    this.config = args.config;
    this.logger = args.logger ?? createLogger("RecognitionDispatcher");
    this.now = args.now ?? Date.now;
  }

  get engineName() {
    return this.engine.name;
  }

  /**
   * Warm the engine once. Safe to call more than once; submissions made before
   * it finishes wait for it. A failed init is forgotten so the next call retries.
   */
  init(): Promise<void> {
    if (!this.initPromise) {
      this.logger.info("engine initializing", { engine: this.engine.name });
      const pending = this.engine.init ? this.engine.init() : Promise.resolve();
      this.initPromise = pending.catch((err: unknown) => {
        this.initPromise = null;
        this.logger.error("engine init failed", { engine: this.engine.name, error: errorMessage(err) });
        throw err;
      });
    }
    return this.initPromise;
  }

  submit(window: AudioWindow, language: LanguagePreference): Promise<SubmitOutcome> {
    if (this.closed) {
      return Promise.resolve({
        ok: false,
        error: new RecognitionError("model_failure", "Recognition dispatcher is shut down."),
      });
    }

    if (this.running >= this.config.workerPoolSize && this.queue.length >= this.config.maxQueuedSubmissions) {
      this.counters.rejected += 1;
      this.logger.warn("queue saturated, rejecting window", {
        windowSequence: window.sequence,
        running: this.running,
        queued: this.queue.length,
      });
      return Promise.resolve({
        ok: false,
        error: new RecognitionError(
          "backpressure",
          `Recognition queue is full (${this.running} running, ${this.queue.length} queued).`,
        ),
      });
    }

    return new Promise<SubmitOutcome>((resolve) => {
      const job: Job = {
        window,
        language,
        state: "queued",
        controller: new AbortController(),
        timer: null,
        resolve,
      };

      job.timer = setTimeout(() => this.expire(job), this.config.submitTimeoutMs);

      if (this.running < this.config.workerPoolSize) {
        this.start(job);
      } else {
        this.queue.push(job);
      }
    });
  }

  /**
   * Refuse new work, fail whatever is still queued, and wait for running
   * engine calls to return.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const queued = this.queue.splice(0, this.queue.length);
    for (const job of queued) {
      this.settle(job, {
        ok: false,
        error: new RecognitionError("model_failure", "Recognition dispatcher is shut down."),
      });
    }

    await Promise.allSettled([...this.inFlight]);
    if (this.engine.dispose) await this.engine.dispose();
    this.logger.info("dispatcher shut down", { ...this.counters });
  }

  stats(): DispatcherStats {
    return {
      engine: this.engine.name,
      running: this.running,
      queued: this.queue.length,
      ...this.counters,
    };
  }

  private start(job: Job) {
    job.state = "running";
    this.running += 1;

    const task = this.run(job).finally(() => {
      this.running -= 1;
      this.inFlight.delete(task);
      this.pump();
    });
    this.inFlight.add(task);
  }

  private async run(job: Job): Promise<void> {
    const { window, language } = job;
    try {
      await this.init();
      const transcript = await this.engine.transcribe({
        samples: window.samples,
        sampleRateHz: window.sampleRateHz,
        language,
        signal: job.controller.signal,
      });

      if (job.state === "settled") {
        this.logger.debug("discarding result of expired submission", { windowSequence: window.sequence });
        return;
      }

      this.counters.completed += 1;
      this.settle(job, {
        ok: true,
        result: Object.freeze({
          text: transcript.text.trim(),
          confidence: normalizeConfidence(transcript.confidence),
          language: resolveLanguage(language, transcript.detectedLanguage),
          windowSequence: window.sequence,
          producedAt: this.now(),
        }),
      });
    } catch (err) {
      if (job.state === "settled") return;
      this.counters.failed += 1;
      this.logger.error("engine failed", {
        engine: this.engine.name,
        windowSequence: window.sequence,
        error: errorMessage(err),
      });
      this.settle(job, {
        ok: false,
        error: new RecognitionError("model_failure", `Recognition failed: ${errorMessage(err)}`, { cause: err }),
      });
    }
  }

  private pump() {
    while (!this.closed && this.running < this.config.workerPoolSize) {
      const next = this.queue.shift();
      if (!next) return;
      this.start(next);
    }
  }

  private expire(job: Job) {
    if (job.state === "settled") return;

    if (job.state === "queued") {
      const idx = this.queue.indexOf(job);
      if (idx >= 0) this.queue.splice(idx, 1);
    } else {
      job.controller.abort();
    }

    this.counters.timedOut += 1;
    this.logger.warn("submission timed out", {
      windowSequence: job.window.sequence,
      phase: job.state,
      timeoutMs: this.config.submitTimeoutMs,
    });
    this.settle(job, {
      ok: false,
      error: new RecognitionError(
        "timeout",
        `Recognition did not finish within ${this.config.submitTimeoutMs} ms.`,
      ),
    });
  }

  private settle(job: Job, outcome: SubmitOutcome) {
    if (job.state === "settled") return;
    job.state = "settled";
    if (job.timer) {
      clearTimeout(job.timer);
      job.timer = null;
    }
    job.resolve(outcome);
  }
}

function normalizeConfidence(value: number) {
  if (!Number.isFinite(value)) return DEFAULT_CONFIDENCE;
  return Math.min(1, Math.max(0, value));
}

function resolveLanguage(requested: LanguagePreference, detected?: string) {
  if (requested !== "auto") return requested;
  const trimmed = detected?.trim();
  return trimmed ? trimmed : requested;
}
