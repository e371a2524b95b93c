import { DecodeError } from "../errors.js";
import { clampInt16, downmixToMono, floatToInt16 } from "./resamplePcm16.js";

const WAV_FORMAT_PCM = 1;
const WAV_FORMAT_IEEE_FLOAT = 3;
const WAV_FORMAT_EXTENSIBLE = 0xfffe;

export type DecodedWav = {
  /** Mono PCM16, already downmixed. */
  samples: Int16Array;
  sampleRateHz: number;
  channels: number;
};

export function pcm16MonoToWavBytes(args: {
  pcm16: Int16Array;
  sampleRateHz: number;
}): Uint8Array {
  const { pcm16, sampleRateHz } = args;

  const numChannels = 1;
  const bitsPerSample = 16;
  const byteRate = sampleRateHz * numChannels * (bitsPerSample / 8);
  const blockAlign = numChannels * (bitsPerSample / 8);
  const dataSize = pcm16.length * 2;

  const buffer = new ArrayBuffer(44 + dataSize);
  const view = new DataView(buffer);

  // RIFF header
  writeAscii(view, 0, "RIFF");
  view.setUint32(4, 36 + dataSize, true);
  writeAscii(view, 8, "WAVE");

  // fmt chunk
  writeAscii(view, 12, "fmt ");
  view.setUint32(16, 16, true);
  view.setUint16(20, WAV_FORMAT_PCM, true);
  view.setUint16(22, numChannels, true);
  view.setUint32(24, sampleRateHz, true);
  view.setUint32(28, byteRate, true);
  view.setUint16(32, blockAlign, true);
  view.setUint16(34, bitsPerSample, true);

  // data chunk
  writeAscii(view, 36, "data");
  view.setUint32(40, dataSize, true);

  // Samples are written explicitly so the output is little-endian on any host.
  for (let i = 0; i < pcm16.length; i++) {
    view.setInt16(44 + i * 2, pcm16[i] ?? 0, true);
  }
  return new Uint8Array(buffer);
}

export function looksLikeWav(bytes: Uint8Array): boolean {
  return bytes.length >= 12 && readAscii(bytes, 0, 4) === "RIFF" && readAscii(bytes, 8, 4) === "WAVE";
}

/**
 * Decode a RIFF/WAVE buffer: integer PCM (8/16/24/32-bit) or IEEE float32,
 * any channel count, downmixed to mono PCM16.
 */
export function decodeWav(bytes: Uint8Array): DecodedWav {
  if (!looksLikeWav(bytes)) {
    throw new DecodeError("Not a RIFF/WAVE buffer.");
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let offset = 12;
  let fmt: { audioFormat: number; channels: number; sampleRateHz: number; bitsPerSample: number } | null = null;
  let data: { offset: number; size: number } | null = null;

  while (offset + 8 <= bytes.length) {
    const chunkId = readAscii(bytes, offset, 4);
    const chunkSize = view.getUint32(offset + 4, true);
    const chunkStart = offset + 8;

    if (chunkId === "fmt ") {
      if (chunkSize < 16 || chunkStart + 16 > bytes.length) {
        throw new DecodeError("WAV fmt chunk is truncated.");
      }
      let audioFormat = view.getUint16(chunkStart, true);
      if (audioFormat === WAV_FORMAT_EXTENSIBLE && chunkSize >= 26 && chunkStart + 26 <= bytes.length) {
        // First two bytes of the SubFormat GUID carry the real format tag.
        audioFormat = view.getUint16(chunkStart + 24, true);
      }
      fmt = {
        audioFormat,
        channels: view.getUint16(chunkStart + 2, true),
        sampleRateHz: view.getUint32(chunkStart + 4, true),
        bitsPerSample: view.getUint16(chunkStart + 14, true),
      };
    } else if (chunkId === "data") {
      // Streaming writers leave the size at 0 or 0xffffffff; take what is there.
      const available = bytes.length - chunkStart;
      const size = chunkSize === 0 || chunkSize > available ? available : chunkSize;
      data = { offset: chunkStart, size };
      break;
    }

    // Chunks are word-aligned.
    offset = chunkStart + chunkSize + (chunkSize % 2);
  }

  if (!fmt || !data) {
    throw new DecodeError("WAV is missing its fmt or data chunk.");
  }
  if (fmt.channels < 1 || fmt.sampleRateHz < 1) {
    throw new DecodeError(`WAV declares ${fmt.channels} channels at ${fmt.sampleRateHz} Hz.`);
  }

  const interleaved = decodeSamples(view, data.offset, data.size, fmt.audioFormat, fmt.bitsPerSample);
  return {
    samples: downmixToMono(interleaved, fmt.channels),
    sampleRateHz: fmt.sampleRateHz,
    channels: fmt.channels,
  };
}

function decodeSamples(
  view: DataView,
  start: number,
  size: number,
  audioFormat: number,
  bitsPerSample: number,
): Int16Array {
  if (audioFormat === WAV_FORMAT_IEEE_FLOAT) {
    if (bitsPerSample !== 32) {
      throw new DecodeError(`Unsupported float WAV bit depth: ${bitsPerSample}.`);
    }
    const count = Math.floor(size / 4);
    const out = new Int16Array(count);
    for (let i = 0; i < count; i++) {
      const f = view.getFloat32(start + i * 4, true);
      out[i] = Number.isFinite(f) ? floatToInt16(f) : 0;
    }
    return out;
  }

  if (audioFormat !== WAV_FORMAT_PCM) {
    throw new DecodeError(`Unsupported WAV audio format: ${audioFormat}.`);
  }

  const bytesPerSample = bitsPerSample / 8;
  if (![1, 2, 3, 4].includes(bytesPerSample)) {
    throw new DecodeError(`Unsupported WAV bit depth: ${bitsPerSample}.`);
  }

  const count = Math.floor(size / bytesPerSample);
  const out = new Int16Array(count);
  for (let i = 0; i < count; i++) {
    const base = start + i * bytesPerSample;
    let sample: number;
    if (bytesPerSample === 2) {
      sample = view.getInt16(base, true);
    } else if (bytesPerSample === 1) {
      // Unsigned 8-bit -> signed 16-bit
      sample = (view.getUint8(base) - 128) << 8;
    } else if (bytesPerSample === 3) {
      let v = view.getUint8(base) | (view.getUint8(base + 1) << 8) | (view.getUint8(base + 2) << 16);
      if (v & 0x800000) v |= ~0xffffff;
      sample = v >> 8;
    } else {
      sample = view.getInt32(base, true) >> 16;
    }
    out[i] = clampInt16(sample);
  }
  return out;
}

function writeAscii(view: DataView, offset: number, text: string) {
  for (let i = 0; i < text.length; i++) {
    view.setUint8(offset + i, text.charCodeAt(i));
  }
}

function readAscii(bytes: Uint8Array, offset: number, length: number) {
  let out = "";
  for (let i = 0; i < length; i++) out += String.fromCharCode(bytes[offset + i] ?? 0);
  return out;
}
