// packages/core/src/cipher/core.ts
import { BLOCK_SIZE, ROUNDS, STATE_WORDS } from '../config/defaults.js';
import { writeUint32LE } from '../util/bytes.js';
import { COLUMN_ROUND, ROW_ROUND } from './constants.js';
import type { WordState } from './WordState.js';

export function rotl(a: number, b: number): number {
  return (a << b) | (a >>> (32 - b));
}

/** quarter-round over four state positions, in place */
export function quarterRound(x: Uint32Array, a: number, b: number, c: number, d: number): void {
  x[b] ^= rotl((x[a] + x[d]) | 0, 7);
  x[c] ^= rotl((x[b] + x[a]) | 0, 9);
  x[d] ^= rotl((x[c] + x[b]) | 0, 13);
  x[a] ^= rotl((x[d] + x[c]) | 0, 18);
}

/** Columns first, then rows. The order is part of the cipher. */
export function doubleRound(x: Uint32Array): void {
  for (const [a, b, c, d] of COLUMN_ROUND) quarterRound(x, a, b, c, d);
  for (const [a, b, c, d] of ROW_ROUND)    quarterRound(x, a, b, c, d);
}

/**
 * Core block function: permute a copy of `state`, add the original back
 * word by word and write the 64-byte little-endian keystream block into `out`.
 * `state` is read only; the counter is advanced by the caller.
 */
export function salsaBlock(
  state: WordState,
  out: Uint8Array,
  scratch: Uint32Array = new Uint32Array(STATE_WORDS),
): Uint8Array {
  if (out.length < BLOCK_SIZE) {
    throw new RangeError(`Keystream block needs ${BLOCK_SIZE} bytes, got ${out.length}`);
  }
  scratch.set(state);
  for (let r = 0; r < ROUNDS; r += 2) doubleRound(scratch);
  for (let i = 0; i < STATE_WORDS; i++) {
    writeUint32LE(out, i * 4, (scratch[i] + state[i]) >>> 0);
  }
  scratch.fill(0);
  return out;
}
