// packages/node-runtime/src/fileProcessor.ts
import { createReadStream, createWriteStream, constants as fsConstants } from 'node:fs';
import { access, rm, stat } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { stdin, stdout } from 'node:process';
import { SalsaStream } from '../../core/src/index.js';
import { FilesystemError, SalsaError } from '../../core/src/errors/index.js';
import type { KeyMaterialInput, Progress } from '../../core/src/types/index.js';
import { createLogger, type Verbosity } from '../../core/src/util/logger.js';
import { toWebReadable, toWebWritable } from './streamAdapter.js';

export interface ProcessFileOptions {
  /** Bytes per chunk, rounded down to whole blocks */
  chunkSize? : number;
  /** Verbosity level 0-4 (0 = errors only) */
  verbose?   : Verbosity;
  /** Log sink; defaults to console.info */
  logger?    : (msg: string) => void;
  /**
   * Called after each chunk. `percent` is null when the input size is
   * unknown (STDIN).
   */
  onProgress?: (percent: number | null, p: Readonly<Progress>) => void;
}

export interface ProcessFileResult {
  bytes: number;
}

const STDIO = '-';

/**
 * Stream `input` through the keystream into `output`. `-` selects STDIN or
 * STDOUT. The key material is validated before any file is opened; a
 * partially written output file is removed when processing fails.
 */
export async function processFile(
  input   : string,
  output  : string,
  material: KeyMaterialInput,
  opts    : ProcessFileOptions = {},
): Promise<ProcessFileResult> {
  const log = createLogger(opts.verbose ?? 0, opts.logger);

  if (input !== STDIO && output !== STDIO && resolve(input) === resolve(output)) {
    throw new FilesystemError('Input and output files should be distinct.');
  }

  const total = input === STDIO ? null : await inputSize(input);
  if (output !== STDIO) await assertWritable(output);

  let bytes = 0;
  const salsa = new SalsaStream({
    chunkSize : opts.chunkSize,
    verbose   : opts.verbose,
    logger    : opts.logger,
    onProgress: p => {
      bytes = p.bytes;
      const percent = total ? (100 * p.bytes) / total : null;
      opts.onProgress?.(percent, p);
    },
  });
  const ts = salsa.createStream(material);
  log.log(1, `Processing ${input === STDIO ? 'STDIN' : input} (${total ?? 'unknown'} bytes), chunk size ${salsa.getChunkSize()}`);

  const inStream  = input  === STDIO ? stdin  : createReadStream(input);
  const outStream = output === STDIO ? stdout : createWriteStream(output);

  try {
    await toWebReadable(inStream).pipeThrough(ts).pipeTo(toWebWritable(outStream));
  } catch (err) {
    if (output !== STDIO) await rm(output, { force: true });
    if (err instanceof SalsaError) throw err;
    const msg = err instanceof Error ? err.message : String(err);
    throw new FilesystemError(`Processing failed: ${msg}`);
  }

  log.log(1, `Done, ${bytes} bytes written`);
  return { bytes };
}

async function inputSize(path: string): Promise<number> {
  try {
    const st = await stat(path);
    if (!st.isFile()) throw new FilesystemError(`Input is not a regular file: ${path}`);
    return st.size;
  } catch (err) {
    if (err instanceof FilesystemError) throw err;
    throw new FilesystemError(`Could not open input file: ${path}`);
  }
}

async function assertWritable(out: string): Promise<void> {
  const targetDir = dirname(resolve(out));
  try {
    await access(targetDir, fsConstants.W_OK);
  } catch {
    throw new FilesystemError(`Output directory is missing or not writeable: ${targetDir}`);
  }
}
