import {
  parseLanguagePreference,
  type LanguagePreference,
  type ServerToClientMessage,
} from "@streamscribe/shared";
import { AudioFrameBuffer, type AudioWindow } from "../audio/frameBuffer.js";
import type { InputFormat } from "../audio/decode.js";
import type { AudioConfig, SessionConfig } from "../config.js";
import {
  RecognitionError,
  SessionClosedError,
  SessionFatalError,
  UnsupportedLanguageError,
  errorMessage,
} from "../errors.js";
import type { RecognitionDispatcher, SubmitOutcome } from "../recognition/dispatcher.js";
import type { TranscriptSink } from "../persistence/transcriptSink.js";
import { createLogger, type Logger } from "../util/logger.js";

export type SessionStatus = "active" | "draining" | "closed";

export type SessionState = {
  sessionId: string;
  language: LanguagePreference;
  status: SessionStatus;
  createdAt: number;
  lastActivityAt: number;
  fragmentsReceived: number;
  windowsDispatched: number;
  resultsEmitted: number;
  failuresEmitted: number;
};

export type IngestOutcome =
  | { accepted: true; windowsDispatched: number; droppedSamples: number }
  | { accepted: false; reason: "draining" | "decode_error" | "empty" };

export type Emit = (msg: ServerToClientMessage) => void;

/** The only part of the dispatcher a session needs. */
export type WindowSubmitter = Pick<RecognitionDispatcher, "submit">;

type ResolvedWindow = {
  window: AudioWindow;
  outcome: SubmitOutcome;
};

/**
 * Owns one client's live transcription: buffering, dispatch, retries and
 * in-order delivery.
 *
 * Lifecycle: `active` -> `draining` (after `stop()`) -> `closed`.
 *
 * Ingestion is synchronous and never waits on recognition. Results come back
 * in any order; they are held in `resolved` and released strictly by window
 * sequence, so a slow window N holds back N+1 until N succeeds, fails, or
 * times out.
 */
export class SessionCoordinator {
  readonly id: string;

  private readonly config: SessionConfig;
  private readonly dispatcher: WindowSubmitter;
  private readonly emit: Emit;
  private readonly sink: TranscriptSink | null;
  private readonly onClosed: ((session: SessionCoordinator) => void) | null;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly buffer: AudioFrameBuffer;

  private readonly state: SessionState;

  /** Dispatched windows still waiting on the engine, by sequence. */
  private readonly pending = new Map<number, AudioWindow>();
  /** Finished windows waiting for their turn to be emitted. */
  private readonly resolved = new Map<number, ResolvedWindow>();
  private nextSequenceToEmit = 0;

  private windowFailureStreak = 0;
  private decodeFailureStreak = 0;
  private fatal = false;

  private idleCutTimer: NodeJS.Timeout | null = null;
  private drainTimer: NodeJS.Timeout | null = null;
  private drainWaiter: (() => void) | null = null;
  private drainPromise: Promise<void> | null = null;

  constructor(args: {
    id: string;
    language: LanguagePreference;
    audio: AudioConfig;
    session: SessionConfig;
    input: InputFormat;
    dispatcher: WindowSubmitter;
    emit: Emit;
    sink?: TranscriptSink;
    onClosed?: (session: SessionCoordinator) => void;
    now?: () => number;
    logger?: Logger;
  }) {
    if (!args.session.supportedLanguages.includes(args.language)) {
      throw new UnsupportedLanguageError(args.language, args.session.supportedLanguages);
    }

    this.id = args.id;
    this.config = args.session;
    this.dispatcher = args.dispatcher;
    this.emit = args.emit;
    this.sink = args.sink ?? null;
    this.onClosed = args.onClosed ?? null;
    this.now = args.now ?? Date.now;
    this.logger = args.logger ?? createLogger("SessionCoordinator");
    this.buffer = new AudioFrameBuffer({
      config: args.audio,
      input: args.input,
      logger: this.logger,
      now: this.now,
    });

    const createdAt = this.now();
    this.state = {
      sessionId: args.id,
      language: args.language,
      status: "active",
      createdAt,
      lastActivityAt: createdAt,
      fragmentsReceived: 0,
      windowsDispatched: 0,
      resultsEmitted: 0,
      failuresEmitted: 0,
    };
  }

  get status(): SessionStatus {
    return this.state.status;
  }

  get language(): LanguagePreference {
    return this.state.language;
  }

  get lastActivityAt(): number {
    return this.state.lastActivityAt;
  }

  /** Audio accumulated but not yet cut into a window. */
  get bufferedMs(): number {
    return this.buffer.bufferedMs;
  }

  get pendingWindows(): number {
    return this.pending.size;
  }

  snapshot(): SessionState {
    return { ...this.state };
  }

  touch() {
    this.state.lastActivityAt = this.now();
  }

  ingest(bytes: Uint8Array): IngestOutcome {
    if (this.state.status === "closed") throw new SessionClosedError(this.id);
    if (this.state.status === "draining") return { accepted: false, reason: "draining" };

    this.touch();
    const appended = this.buffer.append({
      bytes,
      sequence: this.state.fragmentsReceived,
      receivedAt: this.now(),
    });
    this.state.fragmentsReceived += 1;

    if (appended.status === "decode_error") {
      this.decodeFailureStreak += 1;
      this.logger.warn("dropped undecodable fragment", {
        sessionId: this.id,
        streak: this.decodeFailureStreak,
        error: appended.error.message,
      });
      this.send({ type: "error", kind: "decode_error", message: appended.error.message });
      if (this.decodeFailureStreak >= this.config.maxConsecutiveDecodeFailures) {
        this.goFatal(
          new SessionFatalError(
            `${this.decodeFailureStreak} consecutive fragments could not be decoded; closing session.`,
          ),
        );
      }
      return { accepted: false, reason: "decode_error" };
    }

    this.decodeFailureStreak = 0;
    if (appended.status === "ignored") return { accepted: false, reason: appended.reason };

    let windowsDispatched = 0;
    for (let window = this.buffer.tryTakeWindow(); window; window = this.buffer.tryTakeWindow()) {
      this.dispatch(window);
      windowsDispatched += 1;
    }
    this.scheduleIdleCut();

    return { accepted: true, windowsDispatched, droppedSamples: appended.droppedSamples };
  }

  /**
   * Applies to windows formed from now on. Windows already dispatched keep the
   * language they were formed with.
   */
  changeLanguage(language: string): LanguagePreference {
    if (this.state.status === "closed") throw new SessionClosedError(this.id);

    const pref = parseLanguagePreference(language);
    if (!pref || !this.config.supportedLanguages.includes(pref)) {
      throw new UnsupportedLanguageError(language, this.config.supportedLanguages);
    }

    this.touch();
    this.state.language = pref;
    this.logger.info("language changed", { sessionId: this.id, language: pref });
    this.send({ type: "language_changed", language: pref });
    return pref;
  }

  /**
   * Drain and close. Idempotent: later calls share the first call's promise,
   * and calls after closure resolve immediately.
   */
  stop(reason = "client_stop"): Promise<void> {
    return this.beginDrain(reason, false);
  }

  private beginDrain(reason: string, discardBuffered: boolean): Promise<void> {
    if (this.drainPromise) return this.drainPromise;
    if (this.state.status === "closed") return Promise.resolve();
    this.drainPromise = this.drain(reason, discardBuffered);
    return this.drainPromise;
  }

  private async drain(reason: string, discardBuffered: boolean): Promise<void> {
    this.state.status = "draining";
    this.clearIdleCut();

    if (discardBuffered) {
      this.buffer.clear();
    } else {
      for (const window of this.buffer.flush()) this.dispatch(window);
    }

    this.logger.info("draining", { sessionId: this.id, reason, pending: this.pending.size });

    if (this.pending.size > 0) {
      await new Promise<void>((resolve) => {
        this.drainWaiter = resolve;
        this.drainTimer = setTimeout(resolve, this.config.drainTimeoutMs);
      });
    }
    if (this.drainTimer) clearTimeout(this.drainTimer);
    this.drainTimer = null;
    this.drainWaiter = null;

    if (this.pending.size > 0) {
      this.logger.warn("drain timeout, abandoning outstanding windows", {
        sessionId: this.id,
        windows: [...this.pending.keys()],
      });
      for (const [sequence, window] of this.pending) {
        this.resolved.set(sequence, {
          window,
          outcome: {
            ok: false,
            error: new RecognitionError(
              "timeout",
              `Window ${sequence} did not finish within the ${this.config.drainTimeoutMs} ms drain.`,
            ),
          },
        });
      }
      const abandoned = this.pending.size;
      this.pending.clear();
      this.release();

      if (!this.fatal) {
        this.fatal = true;
        const fatal = new SessionFatalError(
          `Drain timed out after ${this.config.drainTimeoutMs} ms with ${abandoned} window(s) outstanding; closing session.`,
        );
        this.logger.error("session fatal", { sessionId: this.id, error: fatal.message });
        this.send({ type: "error", kind: fatal.code, message: fatal.message });
      }
    }

    this.close(reason);
  }

  private close(reason: string) {
    this.state.status = "closed";
    this.buffer.clear();
    this.resolved.clear();

    this.send({
      type: "stopped",
      session_id: this.id,
      reason,
      windows_dispatched: this.state.windowsDispatched,
    });
    this.logger.info("session closed", {
      sessionId: this.id,
      reason,
      windowsDispatched: this.state.windowsDispatched,
      resultsEmitted: this.state.resultsEmitted,
      failuresEmitted: this.state.failuresEmitted,
    });
    this.onClosed?.(this);
  }

  private dispatch(window: AudioWindow) {
    // Captured now: a later language change must not reach this window.
    const language = this.state.language;
    this.state.windowsDispatched += 1;
    this.pending.set(window.sequence, window);

    this.logger.debug("dispatching window", {
      sessionId: this.id,
      windowSequence: window.sequence,
      durationMs: window.durationMs,
      language,
    });

    void this.recognize(window, language).then((outcome) => this.complete(window, outcome));
  }

  private async recognize(window: AudioWindow, language: LanguagePreference): Promise<SubmitOutcome> {
    try {
      const first = await this.dispatcher.submit(window, language);
      if (first.ok || !first.error.retryable || this.state.status === "closed") return first;

      this.logger.warn("transient recognition failure, retrying once", {
        sessionId: this.id,
        windowSequence: window.sequence,
        kind: first.error.kind,
      });
      return await this.dispatcher.submit(window, language);
    } catch (err) {
      return {
        ok: false,
        error: new RecognitionError("model_failure", errorMessage(err), { cause: err }),
      };
    }
  }

  private complete(window: AudioWindow, outcome: SubmitOutcome) {
    // Late arrival after a drain timeout already filled this slot.
    if (!this.pending.delete(window.sequence)) return;
    if (this.state.status === "closed") return;

    this.resolved.set(window.sequence, { window, outcome });
    this.release();

    if (this.pending.size === 0 && this.drainWaiter) this.drainWaiter();
  }

  private release() {
    for (
      let next = this.resolved.get(this.nextSequenceToEmit);
      next;
      next = this.resolved.get(this.nextSequenceToEmit)
    ) {
      this.resolved.delete(this.nextSequenceToEmit);
      this.nextSequenceToEmit += 1;

      if (next.outcome.ok) {
        this.emitResult(next.window, next.outcome.result);
      } else {
        this.emitFailure(next.window, next.outcome.error);
      }
    }
  }

  private emitResult(window: AudioWindow, result: Extract<SubmitOutcome, { ok: true }>["result"]) {
    this.windowFailureStreak = 0;
    if (!result.text) {
      this.logger.debug("empty transcript", { sessionId: this.id, windowSequence: window.sequence });
      return;
    }

    this.state.resultsEmitted += 1;
    this.send({
      type: "transcription",
      session_id: this.id,
      text: result.text,
      confidence: result.confidence,
      language: result.language,
      timestamp: result.producedAt,
      window_sequence: result.windowSequence,
      start_ms: Math.round(window.startMs),
      duration_ms: Math.round(window.durationMs),
    });

    if (!this.sink) return;
    this.sink
      .appendRecord({
        session_id: this.id,
        window_sequence: result.windowSequence,
        text: result.text,
        confidence: result.confidence,
        language: result.language,
        timestamp: result.producedAt,
      })
      .catch((err: unknown) => {
        this.logger.error("failed to persist transcript", {
          sessionId: this.id,
          windowSequence: result.windowSequence,
          error: errorMessage(err),
        });
      });
  }

  private emitFailure(window: AudioWindow, error: RecognitionError) {
    this.windowFailureStreak += 1;
    this.state.failuresEmitted += 1;
    this.send({
      type: "error",
      kind: error.kind,
      message: error.message,
      window_sequence: window.sequence,
    });

    if (this.windowFailureStreak >= this.config.maxConsecutiveFailures) {
      this.goFatal(
        new SessionFatalError(
          `${this.windowFailureStreak} consecutive windows failed recognition; closing session.`,
        ),
      );
    }
  }

  /**
   * Tell the client, then close through the normal drain path. Buffered audio
   * is discarded rather than flushed into a backend that keeps failing.
   */
  private goFatal(error: SessionFatalError) {
    if (this.fatal) return;
    this.fatal = true;
    this.logger.error("session fatal", { sessionId: this.id, error: error.message });
    this.send({ type: "error", kind: error.code, message: error.message });
    void this.beginDrain("session_fatal", true);
  }

  private scheduleIdleCut() {
    if (this.config.idleCutMs <= 0) return;
    this.clearIdleCut();
    if (this.buffer.bufferedMs === 0) return;

    this.idleCutTimer = setTimeout(() => {
      this.idleCutTimer = null;
      if (this.state.status !== "active") return;
      const window = this.buffer.tryTakeWindow({ allowPartial: true });
      if (window) this.dispatch(window);
    }, this.config.idleCutMs);
  }

  private clearIdleCut() {
    if (!this.idleCutTimer) return;
    clearTimeout(this.idleCutTimer);
    this.idleCutTimer = null;
  }

  private send(msg: ServerToClientMessage) {
    try {
      this.emit(msg);
    } catch (err) {
      this.logger.warn("emit failed", { sessionId: this.id, type: msg.type, error: errorMessage(err) });
    }
  }
}

