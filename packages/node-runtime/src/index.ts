// packages/node-runtime/src/index.ts
import { SalsaStream, type SalsaStreamOptions } from '../../core/src/index.js';

export function createSalsaStream(cfg?: SalsaStreamOptions): SalsaStream {
  return new SalsaStream(cfg);
}

export { SalsaStream, Salsa20, Key, Nonce, parseKeyMaterial } from '../../core/src/index.js';
export { processFile, type ProcessFileOptions, type ProcessFileResult } from './fileProcessor.js';
export { toWebReadable, toWebWritable } from './streamAdapter.js';
