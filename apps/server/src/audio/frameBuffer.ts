import type { AudioConfig } from "../config.js";
import { DecodeError, errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../util/logger.js";
import { decodeFragment, type InputFormat } from "./decode.js";
import { msToSamples, samplesToMs } from "./resamplePcm16.js";

export type AudioFragment = {
  bytes: Uint8Array;
  /** Per-session arrival counter. */
  sequence: number;
  /** Epoch ms. */
  receivedAt: number;
};

export type AudioWindow = Readonly<{
  /** Monotonic per session, starting at 0. */
  sequence: number;
  /** Mono PCM16 at `sampleRateHz`. */
  samples: Int16Array;
  sampleRateHz: number;
  /** Position in the session's audio timeline. */
  startMs: number;
  durationMs: number;
  /** Cut by `flush()`; may be shorter than the minimum window. */
  flushed: boolean;
  formedAt: number;
}>;

export type AppendOutcome =
  | { status: "appended"; samples: number; droppedSamples: number }
  | { status: "ignored"; reason: "empty" }
  | { status: "decode_error"; error: DecodeError };

/**
 * Per-session accumulator: decodes fragments to canonical PCM16 and cuts them
 * into windows. Memory is capped at `maxBufferMs`; beyond that the oldest audio
 * is dropped and the timeline moves on (newest audio is the most useful).
 */
export class AudioFrameBuffer {
  private readonly config: AudioConfig;
  private readonly input: InputFormat;
  private readonly logger: Logger;
  private readonly now: () => number;

  private readonly targetSamples: number;
  private readonly minSamples: number;
  private readonly noiseFloorSamples: number;
  private readonly overlapSamples: number;
  private readonly maxSamples: number;

  private chunks: Int16Array[] = [];
  private headOffset = 0;
  private totalSamples = 0;
  /** Leading samples already sent in the previous window (overlap carry). */
  private carriedSamples = 0;
  /** Timeline index of the first buffered sample. */
  private positionSamples = 0;
  private nextWindowSequence = 0;
  private lastFragmentSequence: number | null = null;
  private droppedTotal = 0;

  constructor(args: {
    config: AudioConfig;
    input: InputFormat;
    logger?: Logger;
    now?: () => number;
  }) {
    this.config = args.config;
    this.input = args.input;
    this.logger = args.logger ?? createLogger("AudioFrameBuffer");
    this.now = args.now ?? Date.now;

    const rate = this.config.sampleRateHz;
    this.targetSamples = msToSamples(this.config.targetWindowMs, rate);
    this.minSamples = Math.max(1, msToSamples(this.config.minWindowMs, rate));
    this.noiseFloorSamples = Math.max(1, msToSamples(this.config.noiseFloorMs, rate));
    this.overlapSamples = msToSamples(this.config.windowOverlapMs, rate);
    this.maxSamples = Math.max(this.targetSamples, msToSamples(this.config.maxBufferMs, rate));
  }

  get bufferedMs() {
    return samplesToMs(this.totalSamples, this.config.sampleRateHz);
  }

  get positionMs() {
    return samplesToMs(this.positionSamples, this.config.sampleRateHz);
  }

  get droppedMs() {
    return samplesToMs(this.droppedTotal, this.config.sampleRateHz);
  }

  get windowsFormed() {
    return this.nextWindowSequence;
  }

  append(fragment: AudioFragment): AppendOutcome {
    if (this.lastFragmentSequence !== null && fragment.sequence <= this.lastFragmentSequence) {
      // Transport order is trusted as temporal order; this is logged, not corrected.
      this.logger.warn("protocol violation: fragment sequence did not increase", {
        sequence: fragment.sequence,
        previous: this.lastFragmentSequence,
      });
    }
    this.lastFragmentSequence = Math.max(this.lastFragmentSequence ?? fragment.sequence, fragment.sequence);

    let samples: Int16Array;
    try {
      samples = decodeFragment(fragment.bytes, this.input, this.config.sampleRateHz);
    } catch (err) {
      const error = err instanceof DecodeError ? err : new DecodeError(errorMessage(err), { cause: err });
      return { status: "decode_error", error };
    }

    if (samples.length === 0) return { status: "ignored", reason: "empty" };

    this.chunks.push(samples);
    this.totalSamples += samples.length;

    let droppedSamples = 0;
    if (this.totalSamples > this.maxSamples) {
      droppedSamples = this.totalSamples - this.maxSamples;
      this.consume(droppedSamples, null);
      this.positionSamples += droppedSamples;
      this.carriedSamples = Math.max(0, this.carriedSamples - droppedSamples);
      this.droppedTotal += droppedSamples;
      this.logger.warn("buffer full, dropped oldest audio", {
        droppedMs: samplesToMs(droppedSamples, this.config.sampleRateHz),
      });
    }

    return { status: "appended", samples: samples.length, droppedSamples };
  }

  /**
   * A full target window when one is buffered; with `allowPartial`, anything of
   * at least the minimum duration. `null` means not ready.
   */
  tryTakeWindow(opts: { allowPartial?: boolean } = {}): AudioWindow | null {
    const threshold = opts.allowPartial ? this.minSamples : this.targetSamples;
    if (this.totalSamples < threshold) return null;
    return this.cutWindow(Math.min(this.totalSamples, this.targetSamples), this.overlapSamples, false);
  }

  /**
   * End of stream: everything left, as full windows followed by one shorter
   * window if at least the noise floor of new audio remains. Leaves the buffer empty.
   */
  flush(): AudioWindow[] {
    const windows: AudioWindow[] = [];
    while (this.totalSamples >= this.targetSamples && this.totalSamples - this.carriedSamples > 0) {
      windows.push(this.cutWindow(this.targetSamples, 0, false));
    }

    const fresh = this.totalSamples - this.carriedSamples;
    if (fresh >= this.noiseFloorSamples) {
      windows.push(this.cutWindow(this.totalSamples, 0, true));
    } else {
      this.clear();
    }
    return windows;
  }

  /**
   * Drop everything buffered without forming a window.
   */
  clear() {
    this.positionSamples += this.totalSamples;
    this.chunks = [];
    this.headOffset = 0;
    this.totalSamples = 0;
    this.carriedSamples = 0;
  }

  private cutWindow(length: number, overlap: number, flushed: boolean): AudioWindow {
    const samples = new Int16Array(length);
    this.consume(length, samples);

    const startSamples = this.positionSamples;
    const carry = Math.min(overlap, length);
    if (carry > 0) {
      const head = this.chunks[0];
      if (head && this.headOffset > 0) {
        this.chunks[0] = head.subarray(this.headOffset);
        this.headOffset = 0;
      }
      this.chunks.unshift(samples.slice(length - carry));
      this.totalSamples += carry;
    }
    this.carriedSamples = carry;
    this.positionSamples += length - carry;

    const rate = this.config.sampleRateHz;
    return Object.freeze({
      sequence: this.nextWindowSequence++,
      samples,
      sampleRateHz: rate,
      startMs: samplesToMs(startSamples, rate),
      durationMs: samplesToMs(length, rate),
      flushed,
      formedAt: this.now(),
    });
  }

  /**
   * Remove `count` samples from the head, copying them into `into` when given.
   */
  private consume(count: number, into: Int16Array | null) {
    let written = 0;
    while (written < count) {
      const head = this.chunks[0];
      if (!head) break;
      const available = head.length - this.headOffset;
      const take = Math.min(available, count - written);
      if (into) into.set(head.subarray(this.headOffset, this.headOffset + take), written);
      written += take;
      if (take === available) {
        this.chunks.shift();
        this.headOffset = 0;
      } else {
        this.headOffset += take;
      }
    }
    this.totalSamples -= written;
  }
}
