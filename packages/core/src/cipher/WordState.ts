// packages/core/src/cipher/WordState.ts
import { STATE_WORDS } from '../config/defaults.js';
import { type Key, type Nonce, toKey, toNonce } from '../key/KeyMaterial.js';
import {
  SIGMA,
  CONSTANT_POS,
  KEY_POS,
  NONCE_POS,
  COUNTER_LO,
  COUNTER_HI,
} from './constants.js';

/** Sixteen 32-bit words; see constants.ts for the layout. */
export type WordState = Uint32Array;

/**
 * Key schedule: lay out constants, key, nonce and a zero counter.
 * @throws {InvalidKeyLengthError | InvalidNonceLengthError}
 */
export function initialize(key: Key | Uint8Array, nonce: Nonce | Uint8Array): WordState {
  const k = toKey(key).words();
  const n = toNonce(nonce).words();

  const state = new Uint32Array(STATE_WORDS);
  CONSTANT_POS.forEach((pos, i) => { state[pos] = SIGMA[i]; });
  KEY_POS.forEach((pos, i) => { state[pos] = k[i]; });
  NONCE_POS.forEach((pos, i) => { state[pos] = n[i]; });
  state[COUNTER_LO] = 0;
  state[COUNTER_HI] = 0;

  k.fill(0);
  return state;
}

/**
 * Replace the nonce words and reset the counter to zero, in place.
 * Key words and constants are left untouched. A rejected nonce leaves the
 * state as it was.
 */
export function rekeyNonce(state: WordState, nonce: Nonce | Uint8Array): WordState {
  const n = toNonce(nonce).words();
  NONCE_POS.forEach((pos, i) => { state[pos] = n[i]; });
  state[COUNTER_LO] = 0;
  state[COUNTER_HI] = 0;
  return state;
}

export function readCounter(state: WordState): bigint {
  return (BigInt(state[COUNTER_HI]) << 32n) | BigInt(state[COUNTER_LO]);
}

export function writeCounter(state: WordState, counter: bigint): void {
  state[COUNTER_LO] = Number(counter & 0xffffffffn);
  state[COUNTER_HI] = Number((counter >> 32n) & 0xffffffffn);
}

/**
 * Advance the counter by one with carry into the high word.
 * @returns false when the counter wrapped past 2^64 - 1
 */
export function incrementCounter(state: WordState): boolean {
  state[COUNTER_LO] = (state[COUNTER_LO] + 1) >>> 0;
  if (state[COUNTER_LO] !== 0) return true;
  state[COUNTER_HI] = (state[COUNTER_HI] + 1) >>> 0;
  return state[COUNTER_HI] !== 0;
}
