import { InvalidKeyFormatError } from "../errors/index.js";

const HEX_RE = /^[0-9A-Fa-f]*$/;

/* ------------------------------------------------------------------ */

export function concat(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.byteLength, 0);
  const out   = new Uint8Array(total);
  let offset  = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

/* ----------  Hex decode  ------------------------------------------ */
export function hexDecode(hex: string, expectedBytes?: number): Uint8Array {
  if (hex.length % 2 !== 0 || !HEX_RE.test(hex)) {
    throw new InvalidKeyFormatError(
      `Invalid hex: length=${hex.length}, only [0-9A-Fa-f] pairs are accepted`,
    );
  }
  if (expectedBytes !== undefined && hex.length !== expectedBytes * 2) {
    throw new InvalidKeyFormatError(
      `Invalid hex: expected ${expectedBytes * 2} characters, got ${hex.length}`,
    );
  }

  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

/* ----------  Hex encode  ------------------------------------------ */
export function hexEncode(bytes: Uint8Array): string {
  let out = '';
  for (let i = 0; i < bytes.length; i++) out += bytes[i].toString(16).padStart(2, '0');
  return out;
}

/* ----------  Little-endian words  --------------------------------- */
export function readUint32LE(buf: Uint8Array, off: number): number {
  return (buf[off] | (buf[off + 1] << 8) | (buf[off + 2] << 16) | (buf[off + 3] << 24)) >>> 0;
}

export function writeUint32LE(buf: Uint8Array, off: number, word: number): void {
  buf[off]     = word & 0xff;
  buf[off + 1] = (word >>> 8) & 0xff;
  buf[off + 2] = (word >>> 16) & 0xff;
  buf[off + 3] = (word >>> 24) & 0xff;
}

export function wipe(buf: Uint8Array | Uint32Array): void {
  buf.fill(0);
}
