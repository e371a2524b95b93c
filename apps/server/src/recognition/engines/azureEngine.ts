import * as sdk from "microsoft-cognitiveservices-speech-sdk";
import { z } from "zod";
import type { EngineTranscript, Language, LanguagePreference, RecognitionEngine } from "@streamscribe/shared";
import type { EngineConfig } from "../../config.js";
import { createLogger } from "../../util/logger.js";

type AzureEngineConfig = Extract<EngineConfig, { kind: "azure" }>;

const log = createLogger("AzureSpeechEngine");

const DetailedResultSchema = z.object({
  NBest: z.array(z.object({ Confidence: z.number().optional() })).optional(),
});

/**
 * One-shot Azure Speech recognition per window: the window is written to a
 * push stream, the stream is closed, and `recognizeOnceAsync` returns the
 * first (and only) utterance.
 */
export class AzureSpeechEngine implements RecognitionEngine {
  readonly name = "azure-speech";
  private readonly config: AzureEngineConfig;

  constructor(config: AzureEngineConfig) {
    this.config = config;
  }

  transcribe(args: {
    samples: Int16Array;
    sampleRateHz: number;
    language: LanguagePreference;
    signal: AbortSignal;
  }): Promise<EngineTranscript> {
    const speechConfig = this.buildSpeechConfig();
    speechConfig.outputFormat = sdk.OutputFormat.Detailed;

    const format = sdk.AudioStreamFormat.getWaveFormatPCM(args.sampleRateHz, 16, 1);
    const stream = sdk.AudioInputStream.createPushStream(format);
    const pcmBytes = new ArrayBuffer(args.samples.byteLength);
    new Int16Array(pcmBytes).set(args.samples);
    stream.write(pcmBytes);
    stream.close();
    const audioConfig = sdk.AudioConfig.fromStreamInput(stream);

    let recognizer: sdk.SpeechRecognizer;
    if (args.language === "auto") {
      const autoDetectConfig = sdk.AutoDetectSourceLanguageConfig.fromLanguages(Object.values(this.config.locales));
      recognizer = sdk.SpeechRecognizer.FromConfig(speechConfig, autoDetectConfig, audioConfig);
    } else {
      speechConfig.speechRecognitionLanguage = this.localeFor(args.language);
      recognizer = new sdk.SpeechRecognizer(speechConfig, audioConfig);
    }

    return new Promise<EngineTranscript>((resolve, reject) => {
      let done = false;
      const finish = (fn: () => void) => {
        if (done) return;
        done = true;
        args.signal.removeEventListener("abort", onAbort);
        recognizer.close();
        fn();
      };
      const onAbort = () => finish(() => reject(new Error("Azure recognition aborted")));
      if (args.signal.aborted) {
        onAbort();
        return;
      }
      args.signal.addEventListener("abort", onAbort, { once: true });

      recognizer.recognizeOnceAsync(
        (result) => {
          if (result.reason === sdk.ResultReason.Canceled) {
            const details = sdk.CancellationDetails.fromResult(result);
            finish(() => reject(new Error(details.errorDetails || "Azure recognition canceled")));
            return;
          }
          if (result.reason === sdk.ResultReason.NoMatch) {
            finish(() => resolve({ text: "", confidence: 0 }));
            return;
          }
          const transcript: EngineTranscript = {
            text: String(result.text ?? ""),
            confidence: readConfidence(result),
            detectedLanguage: args.language === "auto" ? readDetectedLanguage(result) : undefined,
          };
          finish(() => resolve(transcript));
        },
        (err) => finish(() => reject(new Error(String(err)))),
      );
    });
  }

  private buildSpeechConfig() {
    const cfg = this.config;
    return cfg.endpoint
      ? sdk.SpeechConfig.fromEndpoint(new URL(cfg.endpoint), cfg.key)
      : sdk.SpeechConfig.fromSubscription(cfg.key, cfg.region);
  }

  private localeFor(language: Language) {
    const locale = this.config.locales[language];
    if (!locale) {
      log.warn("no Azure locale configured, sending bare language tag", { language });
      return language;
    }
    return locale;
  }
}

function readConfidence(result: sdk.SpeechRecognitionResult): number {
  const raw = result.properties.getProperty(sdk.PropertyId.SpeechServiceResponse_JsonResult);
  if (!raw) return 0.5;
  try {
    const parsed = DetailedResultSchema.safeParse(JSON.parse(raw));
    const confidence = parsed.success ? parsed.data.NBest?.[0]?.Confidence : undefined;
    return confidence ?? 0.5;
  } catch (err) {
    log.debug("unparseable detailed result", { error: String(err) });
    return 0.5;
  }
}

function readDetectedLanguage(result: sdk.SpeechRecognitionResult): string | undefined {
  const locale = sdk.AutoDetectSourceLanguageResult.fromResult(result).language;
  if (!locale) return undefined;
  // "yo-NG" -> "yo"
  return locale.split("-")[0]?.toLowerCase();
}
