import {
  initialize,
  rekeyNonce,
  readCounter,
  writeCounter,
  incrementCounter,
} from '../../src/cipher/WordState.js';
import { InvalidKeyLengthError, InvalidNonceLengthError } from '../../src/errors/index.js';

const key   = Uint8Array.from({ length: 32 }, (_, i) => i);
const nonce = Uint8Array.from({ length: 8 }, (_, i) => 0xa0 + i);

describe('Word State key schedule', () => {
  it('places constants, key, nonce and a zero counter', () => {
    const s = initialize(key, nonce);
    expect([s[0], s[5], s[10], s[15]]).toEqual([0x61707865, 0x3320646e, 0x79622d32, 0x6b206574]);
    expect([s[1], s[2], s[3], s[4]]).toEqual([0x03020100, 0x07060504, 0x0b0a0908, 0x0f0e0d0c]);
    expect([s[11], s[12], s[13], s[14]]).toEqual([0x13121110, 0x17161514, 0x1b1a1918, 0x1f1e1d1c]);
    expect([s[6], s[7]]).toEqual([0xa3a2a1a0, 0xa7a6a5a4]);
    expect([s[8], s[9]]).toEqual([0, 0]);
  });

  it('rejects wrong key and nonce lengths', () => {
    expect(() => initialize(key.subarray(1), nonce)).toThrow(InvalidKeyLengthError);
    expect(() => initialize(key, new Uint8Array(9))).toThrow(InvalidNonceLengthError);
  });

  it('rekeyNonce swaps the nonce and resets the counter only', () => {
    const s = initialize(key, nonce);
    writeCounter(s, 0x0000000500000007n);
    const before = s.slice();

    rekeyNonce(s, new Uint8Array([1, 0, 0, 0, 2, 0, 0, 0]));
    expect([s[6], s[7], s[8], s[9]]).toEqual([1, 2, 0, 0]);
    for (const i of [0, 1, 2, 3, 4, 5, 10, 11, 12, 13, 14, 15]) expect(s[i]).toBe(before[i]);
  });

  it('rekeyNonce with a bad nonce leaves the state unchanged', () => {
    const s = initialize(key, nonce);
    writeCounter(s, 3n);
    const before = s.slice();
    expect(() => rekeyNonce(s, new Uint8Array(7))).toThrow(InvalidNonceLengthError);
    expect(s).toEqual(before);
  });
});

describe('Word State counter', () => {
  it('splits the 64-bit counter into low and high words', () => {
    const s = initialize(key, nonce);
    writeCounter(s, 0x123456789abcdef0n);
    expect([s[8], s[9]]).toEqual([0x9abcdef0, 0x12345678]);
    expect(readCounter(s)).toBe(0x123456789abcdef0n);
  });

  it('carries from the low word into the high word', () => {
    const s = initialize(key, nonce);
    writeCounter(s, 0xffffffffn);
    expect(incrementCounter(s)).toBe(true);
    expect([s[8], s[9]]).toEqual([0, 1]);
  });

  it('reports the wrap past 2^64 - 1', () => {
    const s = initialize(key, nonce);
    writeCounter(s, (1n << 64n) - 1n);
    expect(incrementCounter(s)).toBe(false);
    expect(readCounter(s)).toBe(0n);
  });
});
