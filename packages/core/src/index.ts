// packages/core/src/index.ts
import type { TransformStream } from 'node:stream/web';

import { DEFAULT_CHUNK_SIZE } from './config/defaults.js';
import { Salsa20 } from './cipher/Salsa20.js';
import { type KeyMaterial, parseKeyMaterial } from './key/KeyMaterial.js';
import { KeystreamTransform, alignChunkSize } from './stream/KeystreamTransform.js';
import { StreamProcessor } from './stream/StreamProcessor.js';
import type { KeyMaterialInput, ProgressObserver } from './types/index.js';
import { createLogger, type Logger, type Verbosity } from './util/logger.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public configuration shape
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring SalsaStream instance behavior.
 */
export interface SalsaStreamOptions {
  /** Bytes per streamed chunk, rounded down to whole 64-byte blocks */
  chunkSize?  : number;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose?    : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?     : (msg: string) => void;
  /** Called after every emitted chunk of a stream or blob operation */
  onProgress? : ProgressObserver;
}

/**
 * SalsaStream wraps the Salsa20 engine for byte arrays, blobs and streams.
 * Every call starts a fresh engine at block 0, so the same material always
 * yields the same keystream; never reuse a nonce under one key for two
 * different messages.
 */
export class SalsaStream {
  private readonly chunkSize : number;
  private readonly onProgress: ProgressObserver | undefined;

  // — diagnostics ------------------------------------------------------------
  private readonly log : Logger;

  constructor(opt: SalsaStreamOptions = {}) {
    this.log        = createLogger(opt.verbose ?? 0, opt.logger);
    this.chunkSize  = alignChunkSize(opt.chunkSize ?? DEFAULT_CHUNK_SIZE);
    this.onProgress = opt.onProgress;

    if (opt.chunkSize !== undefined && this.chunkSize !== opt.chunkSize) {
      this.log.log(1, `Chunk size ${opt.chunkSize} aligned to ${this.chunkSize} bytes`);
    }
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Key material
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Decode 80 hex characters into a key and nonce.
   * @throws {InvalidKeyFormatError}
   */
  static parseKeyMaterial(hex: string): KeyMaterial {
    return parseKeyMaterial(hex);
  }

  getChunkSize(): number {
    return this.chunkSize;
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Byte arrays
  // ════════════════════════════════════════════════════════════════════════

  /**
   * XOR `data` with the keystream for `material`. Returns a new array; the
   * input is left as it was.
   */
  process(data: Uint8Array, material: KeyMaterialInput): Uint8Array {
    const engine = this.createEngine(material);
    this.log.log(1, `Start processing ${data.length} bytes`);
    try {
      const out = engine.processMessage(data);
      this.log.log(1, 'Processing finished');
      return out;
    } finally {
      engine.wipe();
    }
  }

  encrypt(plain: Uint8Array, material: KeyMaterialInput): Uint8Array {
    return this.process(plain, material);
  }

  decrypt(cipher: Uint8Array, material: KeyMaterialInput): Uint8Array {
    return this.process(cipher, material);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Blobs & streams
  // ════════════════════════════════════════════════════════════════════════

  async processBlob(blob: Blob, material: KeyMaterialInput): Promise<Blob> {
    this.log.log(1, `Start blob processing, ${blob.size} bytes`);
    const engine = this.createEngine(material);
    const out    = await new StreamProcessor(engine, this.chunkSize, this.onProgress)
      .collect(blob.stream());
    this.log.log(1, 'Blob processing finished');
    return new Blob([out], { type: 'application/octet-stream' });
  }

  /**
   * Stream transform for `material`. Chunk boundaries of the written data do
   * not affect the output.
   */
  createStream(material: KeyMaterialInput): TransformStream<Uint8Array | ArrayBuffer | Blob, Uint8Array> {
    const engine = this.createEngine(material);
    this.log.log(2, `Stream created, chunk size ${this.chunkSize} bytes`);
    return new KeystreamTransform(engine, this.chunkSize, p => {
      this.log.log(4, `Chunk ${p.chunks}: ${p.bytes} bytes, ${p.blocks} blocks`);
      this.onProgress?.(p);
    }).toTransformStream();
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PRIVATE
  // ════════════════════════════════════════════════════════════════════════

  private createEngine(material: KeyMaterialInput): Salsa20 {
    const { key, nonce } = typeof material === 'string'
      ? parseKeyMaterial(material)
      : material;
    this.log.log(3, 'Key schedule initialized');
    return new Salsa20(key, nonce);
  }
}

export { Salsa20, type Salsa20Options } from './cipher/Salsa20.js';
export { Key, Nonce, parseKeyMaterial, type KeyMaterial } from './key/KeyMaterial.js';
export { KeystreamTransform, alignChunkSize } from './stream/KeystreamTransform.js';
export { StreamProcessor } from './stream/StreamProcessor.js';
export { initialize, rekeyNonce } from './cipher/WordState.js';
export { quarterRound, doubleRound, salsaBlock } from './cipher/core.js';
export { hexDecode, hexEncode } from './util/bytes.js';
export { createLogger, toVerbosity, type Logger, type Verbosity } from './util/logger.js';
export * from './errors/index.js';
export * from './config/defaults.js';
export type {
  EnginePhase,
  KeystreamCipher,
  KeyMaterialInput,
  Progress,
  ProgressObserver,
} from './types/index.js';
