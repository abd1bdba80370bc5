// packages/core/src/cipher/constants.ts

/** "expand 32-byte k" as four little-endian words */
export const SIGMA = Uint32Array.of(0x61707865, 0x3320646e, 0x79622d32, 0x6b206574);

/*
 * Word State layout (4×4 matrix, row-major):
 *
 *    c0  k0  k1  k2
 *    k3  c1  n0  n1
 *    t0  t1  c2  k4
 *    k5  k6  k7  c3
 */
export const CONSTANT_POS = [0, 5, 10, 15] as const;
export const KEY_POS      = [1, 2, 3, 4, 11, 12, 13, 14] as const;
export const NONCE_POS    = [6, 7] as const;
export const COUNTER_LO   = 8;
export const COUNTER_HI   = 9;

export type QuarterRoundIndex = readonly [a: number, b: number, c: number, d: number];

/** Column round: each column, starting at its diagonal word */
export const COLUMN_ROUND: readonly QuarterRoundIndex[] = [
  [0, 4, 8, 12],
  [5, 9, 13, 1],
  [10, 14, 2, 6],
  [15, 3, 7, 11],
];

/** Row round: the transposed access pattern of the column round */
export const ROW_ROUND: readonly QuarterRoundIndex[] = [
  [0, 1, 2, 3],
  [5, 6, 7, 4],
  [10, 11, 8, 9],
  [15, 12, 13, 14],
];
