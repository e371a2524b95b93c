import { z } from "zod";

/**
 * WebSocket envelope: every JSON message is `{ type, ...payload }`.
 * Audio travels as binary frames, or base64 inside `audio_chunk`.
 * This file is the source of truth for the client/server contract.
 */

// ----------------------------
// Shared primitives
// ----------------------------

export const LanguageSchema = z.enum(["en", "yo", "ig", "ha"]);
export type Language = z.infer<typeof LanguageSchema>;

export const AUTO_LANGUAGE = "auto" as const;

export const LanguagePreferenceSchema = z.union([
  z.literal(AUTO_LANGUAGE),
  LanguageSchema,
]);
export type LanguagePreference = z.infer<typeof LanguagePreferenceSchema>;

export const ALL_LANGUAGE_PREFERENCES: readonly LanguagePreference[] = [
  AUTO_LANGUAGE,
  ...LanguageSchema.options,
];

export const IdSchema = z.string().min(1);
export type Id = z.infer<typeof IdSchema>;

export const TimestampMsSchema = z.number().int().nonnegative();
export type TimestampMs = z.infer<typeof TimestampMsSchema>;

export const PcmEncodingSchema = z.enum(["pcm_s16le", "pcm_f32le"]);
export type PcmEncoding = z.infer<typeof PcmEncodingSchema>;

export const ErrorKindSchema = z.enum([
  "decode_error",
  "timeout",
  "backpressure",
  "model_failure",
  "session_fatal",
  "session_closed",
  "not_found",
  "invalid_message",
  "unsupported_language",
]);
export type ErrorKind = z.infer<typeof ErrorKindSchema>;

// ----------------------------
// Client -> Server
// ----------------------------

export const AudioChunkSchema = z.object({
  type: z.literal("audio_chunk"),
  /**
   * Base64 of one audio fragment (WAV, or raw PCM in the connection's format).
   */
  data: z.string().min(1),
});
export type AudioChunk = z.infer<typeof AudioChunkSchema>;

export const ChangeLanguageSchema = z.object({
  type: z.literal("change_language"),
  language: z.string().min(1),
});
export type ChangeLanguage = z.infer<typeof ChangeLanguageSchema>;

export const ClientStopSchema = z.object({
  type: z.literal("stop"),
  reason: z.string().optional(),
});
export type ClientStop = z.infer<typeof ClientStopSchema>;

export const ClientPingSchema = z.object({
  type: z.literal("ping"),
});
export type ClientPing = z.infer<typeof ClientPingSchema>;

export const ClientToServerSchema = z.discriminatedUnion("type", [
  AudioChunkSchema,
  ChangeLanguageSchema,
  ClientStopSchema,
  ClientPingSchema,
]);
export type ClientToServerMessage = z.infer<typeof ClientToServerSchema>;

/**
 * Connection query parameters (`?language=en&sample_rate=48000&channels=2`).
 * Describe how raw PCM binary frames are encoded; WAV frames carry their own header.
 */
export const ConnectionParamsSchema = z.object({
  language: z.string().min(1).default(AUTO_LANGUAGE),
  sample_rate: z.coerce.number().int().min(8_000).max(192_000).optional(),
  channels: z.coerce.number().int().min(1).max(8).default(1),
  encoding: PcmEncodingSchema.default("pcm_s16le"),
});
export type ConnectionParams = z.infer<typeof ConnectionParamsSchema>;

// ----------------------------
// Server -> Client
// ----------------------------

export const ConnectedSchema = z.object({
  type: z.literal("connected"),
  session_id: IdSchema,
  message: z.string(),
  supported_languages: z.array(LanguagePreferenceSchema),
});
export type Connected = z.infer<typeof ConnectedSchema>;

export const TranscriptionSchema = z.object({
  type: z.literal("transcription"),
  session_id: IdSchema,
  text: z.string(),
  confidence: z.number().min(0).max(1),
  /**
   * Declared preference, or whatever the engine detected under "auto".
   */
  language: z.string(),
  /**
   * Epoch milliseconds at which the result was produced.
   */
  timestamp: TimestampMsSchema,
  window_sequence: z.number().int().nonnegative(),
  start_ms: TimestampMsSchema,
  duration_ms: TimestampMsSchema,
});
export type Transcription = z.infer<typeof TranscriptionSchema>;

export const LanguageChangedSchema = z.object({
  type: z.literal("language_changed"),
  language: LanguagePreferenceSchema,
});
export type LanguageChanged = z.infer<typeof LanguageChangedSchema>;

export const ServerErrorSchema = z.object({
  type: z.literal("error"),
  kind: ErrorKindSchema,
  message: z.string(),
  /**
   * Present when the error occupies a window's slot in the ordered output.
   */
  window_sequence: z.number().int().nonnegative().optional(),
});
export type ServerError = z.infer<typeof ServerErrorSchema>;

export const PongSchema = z.object({
  type: z.literal("pong"),
  timestamp: TimestampMsSchema,
});
export type Pong = z.infer<typeof PongSchema>;

export const StoppedSchema = z.object({
  type: z.literal("stopped"),
  session_id: IdSchema,
  reason: z.string(),
  windows_dispatched: z.number().int().nonnegative(),
});
export type Stopped = z.infer<typeof StoppedSchema>;

export const ServerToClientSchema = z.discriminatedUnion("type", [
  ConnectedSchema,
  TranscriptionSchema,
  LanguageChangedSchema,
  ServerErrorSchema,
  PongSchema,
  StoppedSchema,
]);
export type ServerToClientMessage = z.infer<typeof ServerToClientSchema>;

// ----------------------------
// Helpers
// ----------------------------

export function safeParseClientMessage(data: unknown) {
  return ClientToServerSchema.safeParse(data);
}

export function safeParseServerMessage(data: unknown) {
  return ServerToClientSchema.safeParse(data);
}

export function parseLanguagePreference(value: unknown): LanguagePreference | undefined {
  const parsed = LanguagePreferenceSchema.safeParse(
    typeof value === "string" ? value.trim().toLowerCase() : value,
  );
  return parsed.success ? parsed.data : undefined;
}
