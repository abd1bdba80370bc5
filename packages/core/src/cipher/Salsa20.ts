// packages/core/src/cipher/Salsa20.ts
import { BLOCK_SIZE, COUNTER_LIMIT, STATE_WORDS } from '../config/defaults.js';
import {
  CounterExhaustedError,
  InvalidArgumentError,
  InvalidPartialLengthError,
  MisuseError,
} from '../errors/index.js';
import type { Key, Nonce } from '../key/KeyMaterial.js';
import type { EnginePhase, KeystreamCipher } from '../types/index.js';
import { salsaBlock } from './core.js';
import {
  type WordState,
  initialize,
  rekeyNonce,
  readCounter,
  writeCounter,
  incrementCounter,
} from './WordState.js';

export interface Salsa20Options {
  /**
   * Index of the first keystream block (0 ≤ counter < 2^64). Only accepted
   * at construction; a running engine never moves backwards.
   */
  counter?: bigint;
}

/**
 * Salsa20/20 counter-mode engine.
 *
 * ## Lifecycle
 * - `ready` after construction or {@link setNonce}.
 * - `streaming` once a full block has been produced.
 * - `finalized` after {@link processPartialBlock}; only {@link setNonce}
 *   makes the engine usable again.
 * - `wiped` after {@link wipe}; terminal.
 *
 * ## Buffers
 * `output` may be the very same buffer as `input`: every byte is read
 * before it is overwritten. Overlapping views at different offsets are only
 * safe when `output` does not start after `input`.
 *
 * Every check runs before the first byte is transformed, so a rejected call
 * leaves both the counter and the caller's buffers untouched.
 */
export class Salsa20 implements KeystreamCipher {
  public static readonly BLOCK_SIZE = BLOCK_SIZE;

  private readonly state   : WordState;
  private readonly block   = new Uint8Array(BLOCK_SIZE);
  private readonly scratch = new Uint32Array(STATE_WORDS);

  private exhausted = false;
  private current   : EnginePhase = 'ready';

  constructor(key: Key | Uint8Array, nonce: Nonce | Uint8Array, opt: Salsa20Options = {}) {
    const counter = opt.counter ?? 0n;
    if (counter < 0n || counter >= COUNTER_LIMIT) {
      throw new InvalidArgumentError(`Counter preset out of range: ${counter}`);
    }
    this.state = initialize(key, nonce);
    writeCounter(this.state, counter);
  }

  get phase(): EnginePhase {
    return this.current;
  }

  /** Index of the next keystream block; 2^64 once the counter is spent. */
  get counter(): bigint {
    return this.exhausted ? COUNTER_LIMIT : readCounter(this.state);
  }

  get remainingBlocks(): bigint {
    return COUNTER_LIMIT - this.counter;
  }

  /**
   * Switch to a new nonce. The counter restarts at zero and a finalized or
   * exhausted engine becomes ready again.
   */
  setNonce(nonce: Nonce | Uint8Array): void {
    if (this.current === 'wiped') throw new MisuseError('Engine has been wiped');
    rekeyNonce(this.state, nonce);
    this.exhausted = false;
    this.current   = 'ready';
  }

  /**
   * XOR `count` whole keystream blocks into `input`, writing to `output`.
   * @returns `output`
   */
  processFullBlocks(input: Uint8Array, output: Uint8Array, count: number): Uint8Array {
    this.assertStreamable();
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new InvalidArgumentError(`Block count must be a non-negative integer, got ${count}`);
    }
    const len = count * BLOCK_SIZE;
    this.assertBuffers(input, output, len);
    this.reserve(count);

    for (let off = 0; off < len; off += BLOCK_SIZE) this.xorBlock(input, output, off, BLOCK_SIZE);
    if (count > 0) this.current = 'streaming';
    return output;
  }

  /**
   * XOR the first `length` bytes of one keystream block and drop the rest.
   * Consumes a counter value and finalizes the engine.
   * @throws {InvalidPartialLengthError} unless 0 ≤ length < 64
   */
  processPartialBlock(input: Uint8Array, output: Uint8Array, length: number): Uint8Array {
    if (!Number.isInteger(length) || length < 0 || length >= BLOCK_SIZE) {
      throw new InvalidPartialLengthError(
        `Partial block length must be in 0..${BLOCK_SIZE - 1}, got ${length}`,
      );
    }
    this.assertStreamable();
    this.assertBuffers(input, output, length);
    this.reserve(1);

    this.xorBlock(input, output, 0, length);
    this.current = 'finalized';
    return output;
  }

  /**
   * Whole message in one go: full blocks, then a partial block for any
   * remainder (which finalizes the engine).
   */
  processMessage(input: Uint8Array, output: Uint8Array = new Uint8Array(input.length)): Uint8Array {
    const blocks    = Math.floor(input.length / BLOCK_SIZE);
    const remainder = input.length % BLOCK_SIZE;
    this.assertStreamable();
    this.assertBuffers(input, output, input.length);
    this.reserve(blocks + (remainder ? 1 : 0));

    this.processFullBlocks(input, output, blocks);
    if (remainder) {
      this.processPartialBlock(
        input.subarray(blocks * BLOCK_SIZE),
        output.subarray(blocks * BLOCK_SIZE),
        remainder,
      );
    }
    return output;
  }

  /** Zero the key-bearing state; the engine cannot be used afterwards. */
  wipe(): void {
    this.state.fill(0);
    this.block.fill(0);
    this.scratch.fill(0);
    this.current = 'wiped';
  }

  /* ------------------------------------------------------------------ */
  /*  Internals                                                          */
  /* ------------------------------------------------------------------ */

  private xorBlock(input: Uint8Array, output: Uint8Array, off: number, len: number): void {
    salsaBlock(this.state, this.block, this.scratch);
    for (let i = 0; i < len; i++) {
      const b = input[off + i];
      output[off + i] = b ^ this.block[i];
    }
    if (!incrementCounter(this.state)) this.exhausted = true;
  }

  private assertStreamable(): void {
    if (this.current === 'finalized') {
      throw new MisuseError('Partial block already processed; set a new nonce before continuing');
    }
    if (this.current === 'wiped') throw new MisuseError('Engine has been wiped');
  }

  private assertBuffers(input: Uint8Array, output: Uint8Array, len: number): void {
    if (input.length < len) {
      throw new InvalidArgumentError(`Input holds ${input.length} bytes, ${len} required`);
    }
    if (output.length < len) {
      throw new InvalidArgumentError(`Output holds ${output.length} bytes, ${len} required`);
    }
  }

  private reserve(blocks: number): void {
    if (BigInt(blocks) > this.remainingBlocks) {
      throw new CounterExhaustedError(
        `Block counter exhausted: ${blocks} block(s) requested, ${this.remainingBlocks} left`,
      );
    }
  }
}
