// packages/core/src/stream/StreamProcessor.ts
import type { ReadableStream, TransformStream } from 'node:stream/web';
import { KeystreamTransform } from './KeystreamTransform.js';
import type { KeystreamCipher, ProgressObserver } from '../types/index.js';
import { collectStream } from '../util/stream.js';

export class StreamProcessor {
  constructor(
    private readonly engine: KeystreamCipher,
    private readonly chunkSize?: number,
    private readonly onProgress?: ProgressObserver,
  ) {}

  transformStream(): TransformStream<Uint8Array | ArrayBuffer | Blob, Uint8Array> {
    return new KeystreamTransform(this.engine, this.chunkSize, this.onProgress)
      .toTransformStream();
  }

  async collect(readable: ReadableStream<Uint8Array>): Promise<Uint8Array> {
    return collectStream(readable.pipeThrough(this.transformStream()));
  }
}
