import type { RecognitionEngine } from "@streamscribe/shared";
import type { EngineConfig } from "../../config.js";
import { AzureSpeechEngine } from "./azureEngine.js";
import { OpenAiTranscriptionEngine } from "./openaiEngine.js";
import { WhisperLocalEngine } from "./whisperLocalEngine.js";

/**
 * The one place that knows which engines exist.
 */
export function createEngine(config: EngineConfig): RecognitionEngine {
  switch (config.kind) {
    case "openai":
      return new OpenAiTranscriptionEngine(config);
    case "azure":
      return new AzureSpeechEngine(config);
    case "whisper-local":
      return new WhisperLocalEngine(config);
  }
}
