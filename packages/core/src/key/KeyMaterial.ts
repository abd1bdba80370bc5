// packages/core/src/key/KeyMaterial.ts
import {
  InvalidKeyFormatError,
  InvalidKeyLengthError,
  InvalidNonceLengthError,
} from '../errors/index.js';
import { KEY_LENGTH, NONCE_LENGTH, KEY_MATERIAL_HEX_LENGTH } from '../config/defaults.js';
import { hexDecode, readUint32LE, wipe } from '../util/bytes.js';

/**
 * 256-bit secret key. The bytes are copied on construction, so later
 * changes to the caller's buffer never reach a running engine.
 */
export class Key {
  public static readonly LENGTH = KEY_LENGTH;

  readonly #bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    if (bytes.length !== Key.LENGTH) {
      throw new InvalidKeyLengthError(
        `Key must be ${Key.LENGTH} bytes, got ${bytes.length}`,
      );
    }
    this.#bytes = bytes.slice();
  }

  /** Key as eight little-endian words */
  words(): Uint32Array {
    const w = new Uint32Array(Key.LENGTH / 4);
    for (let i = 0; i < w.length; i++) w[i] = readUint32LE(this.#bytes, i * 4);
    return w;
  }

  /** Fresh copy of the raw key bytes */
  bytes(): Uint8Array {
    return this.#bytes.slice();
  }

  /** Overwrite the held key bytes */
  wipe(): void {
    wipe(this.#bytes);
  }
}

/** 64-bit public nonce; must never repeat under one key. */
export class Nonce {
  public static readonly LENGTH = NONCE_LENGTH;

  readonly #bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    if (bytes.length !== Nonce.LENGTH) {
      throw new InvalidNonceLengthError(
        `Nonce must be ${Nonce.LENGTH} bytes, got ${bytes.length}`,
      );
    }
    this.#bytes = bytes.slice();
  }

  words(): Uint32Array {
    return Uint32Array.of(readUint32LE(this.#bytes, 0), readUint32LE(this.#bytes, 4));
  }

  bytes(): Uint8Array {
    return this.#bytes.slice();
  }
}

export interface KeyMaterial {
  key   : Key;
  nonce : Nonce;
}

/**
 * Decode the 80-character hex form: 32 key bytes followed by 8 nonce bytes.
 * @throws {InvalidKeyFormatError} on wrong length or a non-hex character
 */
export function parseKeyMaterial(hex: string): KeyMaterial {
  if (hex.length !== KEY_MATERIAL_HEX_LENGTH) {
    throw new InvalidKeyFormatError(
      `Key material must be ${KEY_MATERIAL_HEX_LENGTH} hex characters, got ${hex.length}`,
    );
  }
  const raw = hexDecode(hex, KEY_LENGTH + NONCE_LENGTH);
  try {
    return {
      key   : new Key(raw.subarray(0, KEY_LENGTH)),
      nonce : new Nonce(raw.subarray(KEY_LENGTH)),
    };
  } finally {
    wipe(raw);
  }
}

export function toKey(k: Key | Uint8Array): Key {
  return k instanceof Key ? k : new Key(k);
}

export function toNonce(n: Nonce | Uint8Array): Nonce {
  return n instanceof Nonce ? n : new Nonce(n);
}
