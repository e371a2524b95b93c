import { DecodeError } from "../errors.js";

const BASE64_RE = /^[A-Za-z0-9+/_-]*={0,2}$/;

/**
 * Decode a base64 (or base64url) audio payload. Node's decoder silently skips
 * garbage, so the alphabet is checked first.
 */
export function base64ToUint8Array(base64: string): Uint8Array {
  const compact = base64.replace(/\s+/g, "");
  if (!BASE64_RE.test(compact)) {
    throw new DecodeError("audio_chunk data is not valid base64.");
  }
  return new Uint8Array(Buffer.from(compact, "base64"));
}
