// packages/core/src/stream/KeystreamTransform.ts
import { TransformStream, type TransformStreamDefaultController } from 'node:stream/web';
import { BLOCK_SIZE, DEFAULT_CHUNK_SIZE } from '../config/defaults.js';
import { InvalidArgumentError } from '../errors/index.js';
import type { KeystreamCipher, Progress, ProgressObserver } from '../types/index.js';
import { ensureUint8Array } from '../util/convert.js';

/** Round a chunk size down to whole keystream blocks (at least one). */
export function alignChunkSize(n: number): number {
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new InvalidArgumentError(`Chunk size must be a positive integer, got ${n}`);
  }
  return Math.max(BLOCK_SIZE, n - (n % BLOCK_SIZE));
}

/**
 * TransformStream that:
 *   • collects input into fixed-size chunks of whole blocks
 *   • XORs each chunk with the keystream, in place
 *   • on flush, handles the tail: whole blocks, then one partial block
 *
 * Same code path for both directions. The engine is wiped after flush, and
 * also when a chunk fails to convert or transform.
 */
export class KeystreamTransform {
  private buffer = new Uint8Array(0);
  private readonly chunkSize: number;
  private readonly progress: Progress = { bytes: 0, blocks: 0, chunks: 0 };

  constructor(
    private readonly engine: KeystreamCipher,
    chunkSize = DEFAULT_CHUNK_SIZE,
    private readonly onProgress?: ProgressObserver,
  ) {
    this.chunkSize = alignChunkSize(chunkSize);
  }

  toTransformStream(): TransformStream<Uint8Array | ArrayBuffer | Blob, Uint8Array> {
    return new TransformStream<Uint8Array | ArrayBuffer | Blob, Uint8Array>({
      transform: async (chunk, ctl) => {
        try {
          this.transform(await ensureUint8Array(chunk), ctl);
        } catch (err) {
          this.fail();
          throw err;
        }
      },
      flush: ctl => {
        try {
          this.flush(ctl);
        } catch (err) {
          this.fail();
          throw err;
        }
      },
    });
  }

  /** Drop buffered input and key-bearing state after an error */
  private fail(): void {
    this.buffer.fill(0);
    this.buffer = new Uint8Array(0);
    this.engine.wipe();
  }

  private transform(
    bytes: Uint8Array,
    ctl: TransformStreamDefaultController<Uint8Array>,
  ): void {
    const combined = new Uint8Array(this.buffer.length + bytes.length);
    combined.set(this.buffer);
    combined.set(bytes, this.buffer.length);

    const blocksPerChunk = this.chunkSize / BLOCK_SIZE;
    let offset = 0;
    while (combined.length - offset >= this.chunkSize) {
      const chunk = combined.slice(offset, offset + this.chunkSize);
      offset += this.chunkSize;

      this.engine.processFullBlocks(chunk, chunk, blocksPerChunk);
      this.emit(chunk, blocksPerChunk, ctl);
    }

    this.buffer = combined.slice(offset);
  }

  private flush(ctl: TransformStreamDefaultController<Uint8Array>): void {
    const rest = this.buffer;
    this.buffer = new Uint8Array(0);

    if (rest.length) {
      const blocks    = Math.floor(rest.length / BLOCK_SIZE);
      const remainder = rest.length % BLOCK_SIZE;

      this.engine.processFullBlocks(rest, rest, blocks);
      if (remainder) {
        const tail = rest.subarray(blocks * BLOCK_SIZE);
        this.engine.processPartialBlock(tail, tail, remainder);
      }
      this.emit(rest, blocks + (remainder ? 1 : 0), ctl);
    }

    this.engine.wipe();
  }

  private emit(
    out: Uint8Array,
    blocks: number,
    ctl: TransformStreamDefaultController<Uint8Array>,
  ): void {
    ctl.enqueue(out);
    this.progress.bytes  += out.length;
    this.progress.blocks += blocks;
    this.progress.chunks += 1;
    this.onProgress?.({ ...this.progress });
  }
}
