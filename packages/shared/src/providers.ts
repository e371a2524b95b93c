import type { LanguagePreference } from "./protocol.js";

export type EngineTranscript = {
  text: string;
  /**
   * Engine-reported confidence. The dispatcher clamps it to [0, 1].
   */
  confidence: number;
  /**
   * Language the engine heard, trusted verbatim under "auto".
   */
  detectedLanguage?: string;
};

export interface RecognitionEngine {
  readonly name: string;

  /**
   * One-time warm-up (model load, client construction). Called by the dispatcher.
   */
  init?(): Promise<void>;

  /**
   * Transcribe one window.
   *
   * The caller imposes a timeout and aborts `signal` when it elapses; engines
   * that cannot cancel may ignore it.
   */
  transcribe(args: {
    /**
     * Mono PCM16 at `sampleRateHz`.
     */
    samples: Int16Array;
    sampleRateHz: number;
    language: LanguagePreference;
    signal: AbortSignal;
  }): Promise<EngineTranscript>;

  dispose?(): Promise<void>;
}
