// packages/core/src/config/defaults.ts

/** Keystream block size in bytes (16 little-endian words) */
export const BLOCK_SIZE  = 64;
export const STATE_WORDS = 16;

export const KEY_LENGTH   = 32;
export const NONCE_LENGTH = 8;

/** Salsa20/20: ten double-rounds */
export const ROUNDS = 20;

/** 32 key bytes followed by 8 nonce bytes, two hex digits each */
export const KEY_MATERIAL_HEX_LENGTH = 2 * (KEY_LENGTH + NONCE_LENGTH);

export const DEFAULT_BLOCKS_PER_CHUNK = 8192;
export const DEFAULT_CHUNK_SIZE       = DEFAULT_BLOCKS_PER_CHUNK * BLOCK_SIZE;

/** Exclusive upper bound of the 64-bit block counter */
export const COUNTER_LIMIT = 1n << 64n;
