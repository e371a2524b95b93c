import { afterEach, describe, expect, it, vi } from "vitest";
import { confidenceFromSegments } from "../../src/recognition/engines/http.js";
import { createEngine } from "../../src/recognition/engines/index.js";
import { OpenAiTranscriptionEngine } from "../../src/recognition/engines/openaiEngine.js";
import { WhisperLocalEngine } from "../../src/recognition/engines/whisperLocalEngine.js";

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function transcribeArgs(language: "auto" | "en" = "en") {
  return {
    samples: new Int16Array(160),
    sampleRateHz: 16_000,
    language,
    signal: new AbortController().signal,
  };
}

function formOf(call: unknown[] | undefined): FormData {
  const init = call?.[1];
  if (typeof init !== "object" || init === null || !("body" in init) || !(init.body instanceof FormData)) {
    throw new Error("expected a multipart request");
  }
  return init.body;
}

describe("confidenceFromSegments", () => {
  it("averages segment probabilities and skips likely silence", () => {
    const confidence = confidenceFromSegments([
      { avg_logprob: Math.log(0.8) },
      { avg_logprob: Math.log(0.6) },
      { avg_logprob: Math.log(0.1), no_speech_prob: 0.95 },
    ]);
    expect(confidence).toBeCloseTo(0.7, 10);
  });

  it("falls back to 0.5 without usable segments", () => {
    expect(confidenceFromSegments([])).toBe(0.5);
    expect(confidenceFromSegments([{ no_speech_prob: 0.1 }])).toBe(0.5);
  });
});

describe("OpenAiTranscriptionEngine", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const engine = () =>
    new OpenAiTranscriptionEngine({ apiKey: "test-secret", model: "whisper-1", baseUrl: "http://stt.test/v1" });

  it("posts a WAV and reads verbose_json", async () => {
    const fetchMock = vi.fn(async () =>
      jsonResponse({ text: " e kaaro ", language: "yoruba", segments: [{ avg_logprob: Math.log(0.9) }] }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await engine().transcribe(transcribeArgs("auto"));

    expect(result.text).toBe(" e kaaro ");
    expect(result.confidence).toBeCloseTo(0.9, 10);
    expect(result.detectedLanguage).toBe("yo");

    const call: unknown[] | undefined = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe("http://stt.test/v1/audio/transcriptions");
    const form = formOf(call);
    expect(form.get("model")).toBe("whisper-1");
    expect(form.get("response_format")).toBe("verbose_json");
    expect(form.get("language")).toBeNull();
  });

  it("sends the declared language", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ text: "hello" }));
    vi.stubGlobal("fetch", fetchMock);

    await engine().transcribe(transcribeArgs("en"));

    expect(formOf(fetchMock.mock.calls[0]).get("language")).toBe("en");
  });

  it("falls back to json once a model rejects verbose_json, and remembers it", async () => {
    const fetchMock = vi
      .fn(async () => jsonResponse({ text: "plain" }))
      .mockResolvedValueOnce(
        jsonResponse({ error: { message: "response_format 'verbose_json' is not compatible" } }, 400),
      );
    vi.stubGlobal("fetch", fetchMock);
    const stt = engine();

    const first = await stt.transcribe(transcribeArgs());
    const second = await stt.transcribe(transcribeArgs());

    expect(first).toEqual({ text: "plain", confidence: 0.5 });
    expect(second).toEqual({ text: "plain", confidence: 0.5 });
    expect(fetchMock.mock.calls.map((c: unknown[]) => formOf(c).get("response_format"))).toEqual([
      "verbose_json",
      "json",
      "json",
    ]);
  });

  it("throws on other HTTP errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("rate limited", { status: 429, statusText: "Too Many Requests" })),
    );

    await expect(engine().transcribe(transcribeArgs())).rejects.toThrow(
      "OpenAI transcription failed: 429 Too Many Requests - rate limited",
    );
  });
});

describe("WhisperLocalEngine", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts to /inference and reports the detected language", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ text: "sannu", detected_language: "HA" }));
    vi.stubGlobal("fetch", fetchMock);

    const result = await new WhisperLocalEngine({ url: "http://127.0.0.1:8080" }).transcribe(transcribeArgs("auto"));

    expect(result).toEqual({ text: "sannu", confidence: 0.5, detectedLanguage: "ha" });
    const call: unknown[] | undefined = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe("http://127.0.0.1:8080/inference");
    expect(formOf(call).get("language")).toBe("auto");
  });
});

describe("createEngine", () => {
  it("builds the configured engine", () => {
    expect(createEngine({ kind: "openai", apiKey: "test-secret", model: "whisper-1", baseUrl: "http://stt.test/v1" }).name).toBe(
      "openai:whisper-1",
    );
    expect(createEngine({ kind: "whisper-local", url: "http://127.0.0.1:8080" }).name).toBe("whisper-local");
    expect(
      createEngine({ kind: "azure", key: "test-secret", region: "westeurope", locales: { en: "en-US" } }).name,
    ).toBe("azure-speech");
  });
});
