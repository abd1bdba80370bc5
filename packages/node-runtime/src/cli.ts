#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { Command, Option } from 'commander';
import { stderr, exit as processExit } from 'node:process';
import { DEFAULT_BLOCKS_PER_CHUNK, BLOCK_SIZE } from '../../core/src/config/defaults.js';
import { InvalidArgumentError, ValidationError } from '../../core/src/errors/index.js';
import { parseKeyMaterial } from '../../core/src/key/KeyMaterial.js';
import { createLogger, toVerbosity } from '../../core/src/util/logger.js';
import { processFile } from './fileProcessor.js';

const PKG_VERSION = '1.0.0'; // sync with root package.json

/** 1 = bad arguments or key, 2 = processing / I/O failure */
const EXIT_USAGE   = 1;
const EXIT_FAILURE = 2;

type GlobalOptions = {
  chunkBlocks : number;
  quiet?      : boolean;
  verbose     : number;
};

function reportAndExit(err: unknown): never {
  if (err instanceof Error) {
    stderr.write(`Error [${err.name}]: ${err.message}\n`);
  } else {
    stderr.write(`Error [Unknown]: ${String(err)}\n`);
  }
  processExit(err instanceof ValidationError ? EXIT_USAGE : EXIT_FAILURE);
}

const program = new Command();

program
  .name('salsa20')
  .version(PKG_VERSION)
  .description(
    'Salsa20 stream cipher (see http://cr.yp.to/snuffle.html)\n' +
    'Encryption and decryption are the same operation.',
  )

  // chunk-size in keystream blocks
  .addOption(
    new Option('-c, --chunk-blocks <n>', `keystream blocks (${BLOCK_SIZE} B) per chunk`)
      .env('SALSA20_CHUNK_BLOCKS')
      .argParser((v) => {
        const n = Number(v);
        if (!Number.isSafeInteger(n) || n <= 0) {
          throw new InvalidArgumentError('Chunk blocks must be a positive integer');
        }
        return n;
      })
      .default(DEFAULT_BLOCKS_PER_CHUNK, String(DEFAULT_BLOCKS_PER_CHUNK))
  )

  .addOption(new Option('-q, --quiet', 'do not print progress'))

  // verbosity (repeatable)
  .addOption(
    new Option('-v, --verbose', 'increase verbosity (use multiple times)')
      .default(0)
      .argParser((_: string, previous: number) => previous + 1)
  );

program
  .command('process <input> <output> [key]')
  .alias('p')
  .description(
    'Encrypt or decrypt INPUT and write the result to OUTPUT; use - for STDIN/STDOUT.\n' +
    'KEY is a 32-byte key followed by an 8-byte IV, written in hex (80 characters).',
  )
  .addOption(
    new Option('-k, --key <hex>', 'key material when KEY is omitted')
      .env('SALSA20_KEY')
  )
  .action(async (input: string, output: string, keyArg: string | undefined, cmd: { key?: string }) => {
    const opts = program.opts<GlobalOptions>();
    const log  = createLogger(toVerbosity(opts.verbose), m => stderr.write(m + '\n'));

    const hex = keyArg ?? cmd.key;
    if (!hex) throw new InvalidArgumentError('Key was not specified.');
    const material = parseKeyMaterial(hex);

    const showProgress = !opts.quiet;
    if (showProgress) stderr.write(`Processing file "${input}"\n`);

    const { bytes } = await processFile(input, output, material, {
      chunkSize : opts.chunkBlocks * BLOCK_SIZE,
      verbose   : log.level,
      logger    : m => stderr.write(m + '\n'),
      onProgress: (percent) => {
        if (showProgress && percent !== null) stderr.write(`[${percent.toFixed(2)}]\r`);
      },
    });

    log.log(1, `${bytes} bytes processed`);
    if (showProgress) stderr.write('\nOK\n');
  });

program.parseAsync().catch(reportAndExit);
