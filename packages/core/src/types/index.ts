import type { Key, Nonce } from '../key/KeyMaterial.js';

export type EnginePhase = 'ready' | 'streaming' | 'finalized' | 'wiped';

/* ------------------------- Keystream engine -------------------------- */
/**
 * Minimal contract the stream layer needs from a cipher engine.
 * Salsa20 satisfies this.
 */
export interface KeystreamCipher {
  processFullBlocks(input: Uint8Array, output: Uint8Array, count: number): Uint8Array;
  processPartialBlock(input: Uint8Array, output: Uint8Array, length: number): Uint8Array;
  wipe(): void;
}

/* ------------------------- Progress observer ------------------------- */
export interface Progress {
  /** Bytes transformed so far */
  bytes  : number;
  /** Keystream blocks consumed so far (a partial block counts as one) */
  blocks : number;
  /** Output chunks emitted so far */
  chunks : number;
}

export type ProgressObserver = (p: Readonly<Progress>) => void;

/* ------------------------- Key material input ------------------------ */
/** `{ key, nonce }` value pair, or its 80-character hex form */
export type KeyMaterialInput =
  | { key: Key | Uint8Array; nonce: Nonce | Uint8Array }
  | string;
