import type { EngineTranscript, LanguagePreference, RecognitionEngine } from "@streamscribe/shared";
import type { AudioWindow } from "../src/audio/frameBuffer.js";
import type { AudioConfig, SessionConfig } from "../src/config.js";
import { RecognitionError, type RecognitionErrorKind } from "../src/errors.js";
import type { SubmitOutcome } from "../src/recognition/dispatcher.js";
import type { WindowSubmitter } from "../src/session/sessionCoordinator.js";

export const RATE = 16_000;

export const testAudioConfig: AudioConfig = {
  sampleRateHz: RATE,
  targetWindowMs: 2_000,
  minWindowMs: 1_000,
  noiseFloorMs: 200,
  windowOverlapMs: 0,
  maxBufferMs: 20_000,
};

export const testSessionConfig: SessionConfig = {
  idleCutMs: 0,
  drainTimeoutMs: 5_000,
  maxConsecutiveFailures: 3,
  maxConsecutiveDecodeFailures: 3,
  supportedLanguages: ["auto", "en", "yo", "ig", "ha"],
};

/** `count` little-endian PCM16 samples, all equal to `value`. */
export function pcm16Bytes(count: number, value = 1000): Uint8Array {
  const bytes = new Uint8Array(count * 2);
  const view = new DataView(bytes.buffer);
  for (let i = 0; i < count; i++) view.setInt16(i * 2, value, true);
  return bytes;
}

/** Samples whose value encodes their timeline index: `(start + i) % 7919`. */
export function pcm16Ramp(count: number, start = 0): Uint8Array {
  const bytes = new Uint8Array(count * 2);
  const view = new DataView(bytes.buffer);
  for (let i = 0; i < count; i++) view.setInt16(i * 2, (start + i) % 7919, true);
  return bytes;
}

export function makeWindow(sequence: number, sampleCount = 160): AudioWindow {
  return Object.freeze({
    sequence,
    samples: new Int16Array(sampleCount),
    sampleRateHz: RATE,
    startMs: sequence * 10,
    durationMs: (sampleCount * 1000) / RATE,
    flushed: false,
    formedAt: 0,
  });
}

/** Let chained promise callbacks run without touching timers. */
export async function settle(rounds = 50) {
  for (let i = 0; i < rounds; i++) await Promise.resolve();
}

export function ok(windowSequence: number, text: string, language = "en"): SubmitOutcome {
  return {
    ok: true,
    result: { text, confidence: 0.9, language, windowSequence, producedAt: 1_000 },
  };
}

export function fail(kind: RecognitionErrorKind, message = `${kind} happened`): SubmitOutcome {
  return { ok: false, error: new RecognitionError(kind, message) };
}

type SubmitCall = {
  window: AudioWindow;
  language: LanguagePreference;
  resolve: (outcome: SubmitOutcome) => void;
};

/** A dispatcher stand-in whose submissions the test settles by hand. */
export function createManualSubmitter(): WindowSubmitter & { calls: SubmitCall[] } {
  const calls: SubmitCall[] = [];
  return {
    calls,
    submit(window, language) {
      return new Promise<SubmitOutcome>((resolve) => {
        calls.push({ window, language, resolve });
      });
    },
  };
}

type EngineCall = {
  samples: Int16Array;
  sampleRateHz: number;
  language: LanguagePreference;
  signal: AbortSignal;
  resolve: (t: EngineTranscript) => void;
  reject: (err: Error) => void;
};

/** Engine whose calls stay pending until the test resolves them. */
export class ManualEngine implements RecognitionEngine {
  readonly name = "manual";
  readonly calls: EngineCall[] = [];

  transcribe(args: {
    samples: Int16Array;
    sampleRateHz: number;
    language: LanguagePreference;
    signal: AbortSignal;
  }): Promise<EngineTranscript> {
    return new Promise<EngineTranscript>((resolve, reject) => {
      this.calls.push({ ...args, resolve, reject });
    });
  }
}

/** Answers immediately with the number of samples it heard. */
export class EchoEngine implements RecognitionEngine {
  readonly name = "echo";

  async transcribe(args: { samples: Int16Array }): Promise<EngineTranscript> {
    return { text: `heard ${args.samples.length}`, confidence: 0.8 };
  }
}
