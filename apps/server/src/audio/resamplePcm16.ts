/**
 * Linear resampler for mono PCM16.
 *
 * Each fragment is resampled on its own, so a fractional trailing sample can be
 * lost per fragment. At typical frame sizes (10–100 ms) the drift is inaudible
 * for recognition purposes.
 */
export function resamplePcm16MonoLinear(args: {
  input: Int16Array;
  inSampleRateHz: number;
  outSampleRateHz: number;
}): Int16Array {
  const { input, inSampleRateHz, outSampleRateHz } = args;
  if (inSampleRateHz === outSampleRateHz) return input;
  if (input.length === 0) return input;

  const ratio = outSampleRateHz / inSampleRateHz;
  const outLength = Math.max(1, Math.floor(input.length * ratio));
  const out = new Int16Array(outLength);
  const last = input.length - 1;

  for (let i = 0; i < outLength; i++) {
    const srcIndex = i / ratio;
    const i0 = Math.min(last, Math.floor(srcIndex));
    const i1 = Math.min(last, i0 + 1);
    const frac = srcIndex - i0;

    const s0 = input[i0] ?? 0;
    const s1 = input[i1] ?? s0;
    out[i] = clampInt16(s0 + (s1 - s0) * frac);
  }

  return out;
}

/**
 * Average interleaved channels down to mono.
 */
export function downmixToMono(interleaved: Int16Array, channels: number): Int16Array {
  if (channels <= 1) return interleaved;
  const frames = Math.floor(interleaved.length / channels);
  const out = new Int16Array(frames);
  for (let i = 0; i < frames; i++) {
    let acc = 0;
    for (let ch = 0; ch < channels; ch++) acc += interleaved[i * channels + ch] ?? 0;
    out[i] = clampInt16(acc / channels);
  }
  return out;
}

export function floatToInt16(sample: number): number {
  const s = Math.max(-1, Math.min(1, sample));
  return Math.round(s * 32767);
}

export function clampInt16(sample: number): number {
  return Math.max(-32768, Math.min(32767, Math.round(sample)));
}

export function samplesToMs(samples: number, sampleRateHz: number): number {
  return (samples * 1000) / sampleRateHz;
}

export function msToSamples(ms: number, sampleRateHz: number): number {
  return Math.round((ms * sampleRateHz) / 1000);
}
