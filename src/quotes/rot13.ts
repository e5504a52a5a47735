const UPPER_A = 0x41;
const UPPER_M = 0x4d;
const UPPER_N = 0x4e;
const UPPER_Z = 0x5a;
const LOWER_A = 0x61;
const LOWER_M = 0x6d;
const LOWER_N = 0x6e;
const LOWER_Z = 0x7a;

/**
 * Rotate ASCII letters by 13 within their case; every other byte is copied
 * unchanged. Returns a new buffer. rot13(rot13(x)) equals x.
 */
export function rot13(input: Uint8Array): Buffer {
  const out = Buffer.from(input);
  for (let i = 0; i < out.length; i++) {
    const c = out[i];
    if ((c >= UPPER_A && c <= UPPER_M) || (c >= LOWER_A && c <= LOWER_M)) {
      out[i] = c + 13;
    } else if ((c >= UPPER_N && c <= UPPER_Z) || (c >= LOWER_N && c <= LOWER_Z)) {
      out[i] = c - 13;
    }
  }
  return out;
}
