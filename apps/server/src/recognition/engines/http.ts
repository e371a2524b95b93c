export async function readErrorBody(res: Response) {
  try {
    return await res.text();
  } catch {
    return "";
  }
}

/**
 * Whisper-style segments carry `avg_logprob`; `exp` of it is the mean token
 * probability. Segments the model marks as probable silence are skipped.
 * 0.5 when nothing usable is present.
 */
export function confidenceFromSegments(
  segments: ReadonlyArray<{ avg_logprob?: number; no_speech_prob?: number }>,
): number {
  const probs: number[] = [];
  for (const seg of segments) {
    if (typeof seg.avg_logprob !== "number" || !Number.isFinite(seg.avg_logprob)) continue;
    if ((seg.no_speech_prob ?? 0) > 0.9) continue;
    probs.push(Math.exp(seg.avg_logprob));
  }
  if (probs.length === 0) return 0.5;
  const mean = probs.reduce((a, b) => a + b, 0) / probs.length;
  return Math.min(1, Math.max(0, mean));
}
