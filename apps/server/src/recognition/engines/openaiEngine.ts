import { z } from "zod";
import type { EngineTranscript, LanguagePreference, RecognitionEngine } from "@streamscribe/shared";
import { pcm16MonoToWavBytes } from "../../audio/wav.js";
import { createLogger } from "../../util/logger.js";
import { confidenceFromSegments, readErrorBody } from "./http.js";

const log = createLogger("OpenAiEngine");

const VerboseTranscriptionSchema = z.object({
  text: z.string().default(""),
  language: z.string().optional(),
  segments: z
    .array(z.object({ avg_logprob: z.number().optional(), no_speech_prob: z.number().optional() }))
    .optional(),
});

const PlainTranscriptionSchema = z.object({
  text: z.string().default(""),
});

/**
 * Whisper's verbose output names languages in English ("english", "yoruba").
 * Map the ones we know back to their tags; anything else is passed through.
 */
const LANGUAGE_NAME_TO_TAG: Record<string, string> = {
  english: "en",
  yoruba: "yo",
  igbo: "ig",
  hausa: "ha",
};

/**
 * Hosted transcription via `POST /audio/transcriptions`.
 *
 * Some models reject `response_format: "verbose_json"`. We optimistically ask
 * for verbose metadata (language, segment log-probs), then remember per model
 * and fall back to plain `json`.
 */
export class OpenAiTranscriptionEngine implements RecognitionEngine {
  readonly name: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly verboseJsonSupportByModel = new Map<string, boolean>();

  constructor(args: { apiKey: string; model: string; baseUrl: string }) {
    this.apiKey = args.apiKey;
    this.model = args.model;
    this.baseUrl = args.baseUrl;
    this.name = `openai:${args.model}`;
  }

  async transcribe(args: {
    samples: Int16Array;
    sampleRateHz: number;
    language: LanguagePreference;
    signal: AbortSignal;
  }): Promise<EngineTranscript> {
    const wavBytes = pcm16MonoToWavBytes({ pcm16: args.samples, sampleRateHz: args.sampleRateHz });
    const language = args.language === "auto" ? undefined : args.language;

    // 1) Prefer verbose_json (text + language + segments) when supported.
    if (this.verboseJsonSupportByModel.get(this.model) ?? true) {
      const res = await this.request({ wavBytes, language, responseFormat: "verbose_json", signal: args.signal });
      if (res.ok) {
        this.verboseJsonSupportByModel.set(this.model, true);
        const body = VerboseTranscriptionSchema.parse(await res.json());
        return {
          text: body.text,
          confidence: confidenceFromSegments(body.segments ?? []),
          detectedLanguage: normalizeLanguage(body.language),
        };
      }

      const body = await readErrorBody(res);
      if (
        res.status === 400 &&
        (body.includes("response_format 'verbose_json'") ||
          body.includes("not compatible with model") ||
          body.includes('"param": "response_format"'))
      ) {
        log.info("model rejects verbose_json, falling back to json", { model: this.model });
        this.verboseJsonSupportByModel.set(this.model, false);
      } else {
        throw new Error(`OpenAI transcription failed: ${res.status} ${res.statusText}${body ? ` - ${body}` : ""}`);
      }
    }

    // 2) Fallback: plain `json`, which carries no confidence or language.
    const res = await this.request({ wavBytes, language, responseFormat: "json", signal: args.signal });
    if (!res.ok) {
      const body = await readErrorBody(res);
      throw new Error(`OpenAI transcription failed: ${res.status} ${res.statusText}${body ? ` - ${body}` : ""}`);
    }
    const body = PlainTranscriptionSchema.parse(await res.json());
    return { text: body.text, confidence: 0.5 };
  }

  private request(args: {
    wavBytes: Uint8Array;
    language?: string;
    responseFormat: "verbose_json" | "json";
    signal: AbortSignal;
  }): Promise<Response> {
    const form = new FormData();
    // Node.js/undici FormData supports Blob with filename.
    form.append("file", new Blob([args.wavBytes], { type: "audio/wav" }), "window.wav");
    form.append("model", this.model);
    form.append("response_format", args.responseFormat);
    if (args.language) form.append("language", args.language);

    return fetch(`${this.baseUrl}/audio/transcriptions`, {
      method: "POST",
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: form,
      signal: args.signal,
    });
  }
}

function normalizeLanguage(language?: string) {
  if (!language) return undefined;
  const key = language.trim().toLowerCase();
  return LANGUAGE_NAME_TO_TAG[key] ?? key;
}
