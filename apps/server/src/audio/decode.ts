import type { PcmEncoding } from "@streamscribe/shared";
import { DecodeError } from "../errors.js";
import { downmixToMono, floatToInt16, resamplePcm16MonoLinear } from "./resamplePcm16.js";
import { decodeWav, looksLikeWav } from "./wav.js";

/**
 * How a connection's raw (headerless) binary frames are encoded.
 */
export type InputFormat = {
  encoding: PcmEncoding;
  sampleRateHz: number;
  channels: number;
};

const BYTES_PER_SAMPLE: Record<PcmEncoding, number> = {
  pcm_s16le: 2,
  pcm_f32le: 4,
};

/**
 * Normalize one fragment to mono PCM16 at `targetRateHz`.
 *
 * WAV fragments are recognized by their RIFF header and decoded from it;
 * anything else is read as raw PCM in `input`. Throws `DecodeError`.
 */
export function decodeFragment(bytes: Uint8Array, input: InputFormat, targetRateHz: number): Int16Array {
  if (bytes.length === 0) return new Int16Array(0);

  if (looksLikeWav(bytes)) {
    const wav = decodeWav(bytes);
    return resamplePcm16MonoLinear({
      input: wav.samples,
      inSampleRateHz: wav.sampleRateHz,
      outSampleRateHz: targetRateHz,
    });
  }

  const mono = downmixToMono(decodeRawPcm(bytes, input), input.channels);
  return resamplePcm16MonoLinear({
    input: mono,
    inSampleRateHz: input.sampleRateHz,
    outSampleRateHz: targetRateHz,
  });
}

function decodeRawPcm(bytes: Uint8Array, input: InputFormat): Int16Array {
  const sampleBytes = BYTES_PER_SAMPLE[input.encoding];
  const frameBytes = sampleBytes * input.channels;
  if (bytes.length % frameBytes !== 0) {
    throw new DecodeError(
      `Fragment of ${bytes.length} bytes is not a whole number of ${input.encoding} frames (${input.channels} ch).`,
    );
  }

  // Fragments may sit at any byte offset, so read through a DataView.
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const count = bytes.length / sampleBytes;
  const out = new Int16Array(count);

  if (input.encoding === "pcm_s16le") {
    for (let i = 0; i < count; i++) out[i] = view.getInt16(i * 2, true);
    return out;
  }

  for (let i = 0; i < count; i++) {
    const f = view.getFloat32(i * 4, true);
    if (!Number.isFinite(f)) {
      throw new DecodeError(`Fragment contains a non-finite float sample at index ${i}.`);
    }
    out[i] = floatToInt16(f);
  }
  return out;
}
