import { z } from "zod";
import type { EngineTranscript, LanguagePreference, RecognitionEngine } from "@streamscribe/shared";
import { pcm16MonoToWavBytes } from "../../audio/wav.js";
import { confidenceFromSegments, readErrorBody } from "./http.js";

const InferenceResponseSchema = z.object({
  text: z.string().default(""),
  language: z.string().optional(),
  detected_language: z.string().optional(),
  segments: z
    .array(z.object({ avg_logprob: z.number().optional(), no_speech_prob: z.number().optional() }))
    .optional(),
});

/**
 * Offline engine: a whisper.cpp `server` running next to us, reached over
 * loopback. Small models keep it cheap enough to share a box with the API.
 */
export class WhisperLocalEngine implements RecognitionEngine {
  readonly name = "whisper-local";
  private readonly url: string;

  constructor(args: { url: string }) {
    this.url = args.url;
  }

  async transcribe(args: {
    samples: Int16Array;
    sampleRateHz: number;
    language: LanguagePreference;
    signal: AbortSignal;
  }): Promise<EngineTranscript> {
    const form = new FormData();
    const wavBytes = pcm16MonoToWavBytes({ pcm16: args.samples, sampleRateHz: args.sampleRateHz });
    form.append("file", new Blob([wavBytes], { type: "audio/wav" }), "window.wav");
    form.append("response_format", "verbose_json");
    form.append("temperature", "0.0");
    form.append("language", args.language);

    const res = await fetch(`${this.url}/inference`, {
      method: "POST",
      body: form,
      signal: args.signal,
    });
    if (!res.ok) {
      const body = await readErrorBody(res);
      throw new Error(`whisper.cpp inference failed: ${res.status} ${res.statusText}${body ? ` - ${body}` : ""}`);
    }

    const body = InferenceResponseSchema.parse(await res.json());
    const detected = body.detected_language ?? body.language;
    return {
      text: body.text,
      confidence: confidenceFromSegments(body.segments ?? []),
      detectedLanguage: detected?.trim().toLowerCase() || undefined,
    };
  }
}
