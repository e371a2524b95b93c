import {
  ALL_LANGUAGE_PREFERENCES,
  LanguageSchema,
  parseLanguagePreference,
  type Language,
  type LanguagePreference,
} from "@streamscribe/shared";

export type AudioConfig = {
  /** Canonical rate every window is normalized to. */
  sampleRateHz: number;
  targetWindowMs: number;
  minWindowMs: number;
  /** Smallest window `flush()` will still emit. */
  noiseFloorMs: number;
  /** Tail of each window kept for the next one; 0 = contiguous windows. */
  windowOverlapMs: number;
  /** Rolling store cap; oldest audio is evicted beyond it. */
  maxBufferMs: number;
};

export type DispatcherConfig = {
  submitTimeoutMs: number;
  workerPoolSize: number;
  maxQueuedSubmissions: number;
};

export type SessionConfig = {
  /** Silence after which a partial (>= min) window is cut; 0 disables. */
  idleCutMs: number;
  drainTimeoutMs: number;
  maxConsecutiveFailures: number;
  maxConsecutiveDecodeFailures: number;
  supportedLanguages: LanguagePreference[];
};

export type RegistryConfig = {
  idleSessionTimeoutMs: number;
  sweepIntervalMs: number;
};

export type EngineConfig =
  | { kind: "openai"; apiKey: string; model: string; baseUrl: string }
  | {
      kind: "azure";
      key: string;
      region: string;
      endpoint?: string;
      /** Azure locale per language, e.g. `en -> en-NG`. */
      locales: Partial<Record<Language, string>>;
    }
  | { kind: "whisper-local"; url: string };

export type ServerConfig = {
  host: string;
  port: number;
  wsPath: string;
  audio: AudioConfig;
  dispatcher: DispatcherConfig;
  session: SessionConfig;
  registry: RegistryConfig;
  engine: EngineConfig;
  transcriptLogPath?: string;
};

export const DEFAULT_AUDIO_CONFIG: AudioConfig = {
  sampleRateHz: 16_000,
  targetWindowMs: 2_000,
  minWindowMs: 1_000,
  noiseFloorMs: 200,
  windowOverlapMs: 0,
  maxBufferMs: 20_000,
};

export const DEFAULT_DISPATCHER_CONFIG: DispatcherConfig = {
  submitTimeoutMs: 15_000,
  workerPoolSize: 2,
  maxQueuedSubmissions: 16,
};

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  idleCutMs: 1_500,
  drainTimeoutMs: 8_000,
  maxConsecutiveFailures: 3,
  maxConsecutiveDecodeFailures: 10,
  supportedLanguages: [...ALL_LANGUAGE_PREFERENCES],
};

export const DEFAULT_REGISTRY_CONFIG: RegistryConfig = {
  idleSessionTimeoutMs: 60_000,
  sweepIntervalMs: 10_000,
};

const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_OPENAI_MODEL = "whisper-1";
const DEFAULT_WHISPER_LOCAL_URL = "http://127.0.0.1:8080";
const DEFAULT_AZURE_LOCALES: Partial<Record<Language, string>> = { en: "en-US" };

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const sampleRateHz = readInt(env, "SAMPLE_RATE", DEFAULT_AUDIO_CONFIG.sampleRateHz, 8_000, 48_000);
  const targetWindowMs = readInt(env, "TARGET_WINDOW_MS", DEFAULT_AUDIO_CONFIG.targetWindowMs, 250, 30_000);
  const audio = validateAudioConfig({
    sampleRateHz,
    targetWindowMs,
    minWindowMs: readInt(env, "MIN_WINDOW_MS", DEFAULT_AUDIO_CONFIG.minWindowMs, 100, 30_000),
    noiseFloorMs: readInt(env, "NOISE_FLOOR_MS", DEFAULT_AUDIO_CONFIG.noiseFloorMs, 0, 30_000),
    windowOverlapMs: readInt(env, "WINDOW_OVERLAP_MS", DEFAULT_AUDIO_CONFIG.windowOverlapMs, 0, 10_000),
    maxBufferMs: readInt(env, "MAX_BUFFER_MS", targetWindowMs * 10, targetWindowMs, 600_000),
  });

  return {
    host: env.HOST?.trim() || "0.0.0.0",
    port: readInt(env, "PORT", 8000, 0, 65_535),
    wsPath: env.WS_PATH?.trim() || "/ws/transcribe",
    audio,
    dispatcher: {
      submitTimeoutMs: readInt(env, "SUBMIT_TIMEOUT_MS", DEFAULT_DISPATCHER_CONFIG.submitTimeoutMs, 100, 300_000),
      workerPoolSize: readInt(env, "WORKER_POOL_SIZE", DEFAULT_DISPATCHER_CONFIG.workerPoolSize, 1, 64),
      maxQueuedSubmissions: readInt(
        env,
        "MAX_QUEUED_SUBMISSIONS",
        DEFAULT_DISPATCHER_CONFIG.maxQueuedSubmissions,
        0,
        10_000,
      ),
    },
    session: {
      idleCutMs: readInt(env, "IDLE_CUT_MS", DEFAULT_SESSION_CONFIG.idleCutMs, 0, 60_000),
      drainTimeoutMs: readInt(env, "DRAIN_TIMEOUT_MS", DEFAULT_SESSION_CONFIG.drainTimeoutMs, 100, 120_000),
      maxConsecutiveFailures: readInt(
        env,
        "MAX_CONSECUTIVE_FAILURES",
        DEFAULT_SESSION_CONFIG.maxConsecutiveFailures,
        1,
        100,
      ),
      maxConsecutiveDecodeFailures: readInt(
        env,
        "MAX_CONSECUTIVE_DECODE_FAILURES",
        DEFAULT_SESSION_CONFIG.maxConsecutiveDecodeFailures,
        1,
        1_000,
      ),
      supportedLanguages: parseSupportedLanguages(env.SUPPORTED_LANGUAGES),
    },
    registry: {
      idleSessionTimeoutMs: readInt(
        env,
        "IDLE_SESSION_TIMEOUT_MS",
        DEFAULT_REGISTRY_CONFIG.idleSessionTimeoutMs,
        1_000,
        86_400_000,
      ),
      sweepIntervalMs: readInt(env, "SWEEP_INTERVAL_MS", DEFAULT_REGISTRY_CONFIG.sweepIntervalMs, 100, 3_600_000),
    },
    engine: loadEngineConfig(env),
    transcriptLogPath: env.TRANSCRIPT_LOG_PATH?.trim() || undefined,
  };
}

export function validateAudioConfig(audio: AudioConfig): AudioConfig {
  if (audio.minWindowMs > audio.targetWindowMs) {
    throw new Error(
      `MIN_WINDOW_MS (${audio.minWindowMs}) must not exceed TARGET_WINDOW_MS (${audio.targetWindowMs}).`,
    );
  }
  if (audio.windowOverlapMs >= audio.minWindowMs) {
    throw new Error(
      `WINDOW_OVERLAP_MS (${audio.windowOverlapMs}) must be smaller than MIN_WINDOW_MS (${audio.minWindowMs}).`,
    );
  }
  if (audio.noiseFloorMs > audio.minWindowMs) {
    throw new Error(
      `NOISE_FLOOR_MS (${audio.noiseFloorMs}) must not exceed MIN_WINDOW_MS (${audio.minWindowMs}).`,
    );
  }
  if (audio.maxBufferMs < audio.targetWindowMs) {
    throw new Error(
      `MAX_BUFFER_MS (${audio.maxBufferMs}) must be at least TARGET_WINDOW_MS (${audio.targetWindowMs}).`,
    );
  }
  return audio;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const kind = env.STT_ENGINE?.trim().toLowerCase() || "openai";

  if (kind === "openai") {
    const apiKey = env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new Error("Missing OpenAI config. Set OPENAI_API_KEY (or choose another STT_ENGINE).");
    }
    return {
      kind,
      apiKey,
      model: env.OPENAI_TRANSCRIPTION_MODEL?.trim() || DEFAULT_OPENAI_MODEL,
      baseUrl: stripTrailingSlash(env.OPENAI_BASE_URL?.trim() || DEFAULT_OPENAI_BASE_URL),
    };
  }

  if (kind === "azure") {
    const key = env.AZURE_SPEECH_KEY;
    const region = env.AZURE_SPEECH_REGION;
    if (!key || !region) {
      throw new Error("Missing Azure Speech config. Set AZURE_SPEECH_KEY and AZURE_SPEECH_REGION.");
    }
    return {
      kind,
      key,
      region,
      endpoint: env.AZURE_SPEECH_ENDPOINT?.trim() || undefined,
      locales: parseLocaleMap(env.AZURE_SPEECH_LOCALES),
    };
  }

  if (kind === "whisper-local") {
    return {
      kind,
      url: stripTrailingSlash(env.WHISPER_LOCAL_URL?.trim() || DEFAULT_WHISPER_LOCAL_URL),
    };
  }

  throw new Error(`Unknown STT_ENGINE "${kind}". Expected openai, azure or whisper-local.`);
}

function parseSupportedLanguages(raw?: string): LanguagePreference[] {
  const out: LanguagePreference[] = [];
  for (const item of splitList(raw)) {
    const pref = parseLanguagePreference(item);
    if (!pref) {
      throw new Error(
        `SUPPORTED_LANGUAGES contains "${item}". Expected any of: ${ALL_LANGUAGE_PREFERENCES.join(", ")}.`,
      );
    }
    if (!out.includes(pref)) out.push(pref);
  }
  return withFallback(out, DEFAULT_SESSION_CONFIG.supportedLanguages);
}

/**
 * `"en=en-NG, yo=yo-NG"` -> `{ en: "en-NG", yo: "yo-NG" }`.
 */
function parseLocaleMap(raw?: string): Partial<Record<Language, string>> {
  const out: Partial<Record<Language, string>> = {};
  for (const item of splitList(raw)) {
    const [lang, locale] = item.split("=").map((v) => v.trim());
    const parsed = LanguageSchema.safeParse(lang);
    if (!parsed.success || !locale) {
      throw new Error(`AZURE_SPEECH_LOCALES entry "${item}" must look like en=en-US.`);
    }
    out[parsed.data] = locale;
  }
  return Object.keys(out).length > 0 ? out : { ...DEFAULT_AZURE_LOCALES };
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number (got "${raw}").`);
  }
  return clampNumber(Math.round(value), min, max);
}

function clampNumber(value: number, min: number, max: number) {
  return Math.min(max, Math.max(min, value));
}

function splitList(raw?: string): string[] {
  if (!raw) return [];
  return raw
    .split(/[,\s]+/g)
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

function withFallback<T>(list: T[], fallback: T[]): T[] {
  return list.length > 0 ? list : [...fallback];
}

function stripTrailingSlash(url: string) {
  return url.replace(/\/+$/, "");
}
