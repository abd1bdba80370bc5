import { ReadableStream } from 'node:stream/web';
import { SalsaStream } from '../src/index.js';
import { Salsa20 } from '../src/cipher/Salsa20.js';
import { InvalidKeyFormatError } from '../src/errors/index.js';
import type { Progress } from '../src/types/index.js';
import { collectStream } from '../src/util/stream.js';
import { hexDecode } from '../src/util/bytes.js';

const HEX = '00112233445566778899aabbccddeeff'.repeat(2) + '0102030405060708';
const raw = hexDecode(HEX);
const key   = raw.subarray(0, 32);
const nonce = raw.subarray(32);

function makePlain(len: number): Uint8Array {
  const u = new Uint8Array(len);
  for (let i = 0; i < len; i++) u[i] = (i * 29 + 11) & 0xff;
  return u;
}

describe('SalsaStream | byte arrays', () => {
  const salsa = new SalsaStream();

  it('hex material and { key, nonce } give the engine output', () => {
    const plain    = makePlain(777);
    const expected = new Salsa20(key, nonce).processMessage(plain);
    expect(salsa.process(plain, HEX)).toEqual(expected);
    expect(salsa.process(plain, { key, nonce })).toEqual(expected);
  });

  it('encrypt → decrypt round-trips and leaves the input alone', () => {
    const plain  = makePlain(100);
    const copy   = plain.slice();
    const cipher = salsa.encrypt(plain, HEX);
    expect(plain).toEqual(copy);
    expect(salsa.decrypt(cipher, HEX)).toEqual(plain);
  });

  it('every call starts from block 0', () => {
    const plain = makePlain(64);
    expect(salsa.process(plain, HEX)).toEqual(salsa.process(plain, HEX));
  });

  it('rejects malformed hex before processing', () => {
    expect(() => salsa.process(makePlain(8), HEX.slice(0, 79) + 'z'))
      .toThrow(InvalidKeyFormatError);
  });

  it('parseKeyMaterial is exposed statically', () => {
    const { nonce: n } = SalsaStream.parseKeyMaterial(HEX);
    expect(Array.from(n.bytes())).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });
});

describe('SalsaStream | blobs & streams', () => {
  it('processBlob round-trips and reports progress', async () => {
    const seen: Progress[] = [];
    const salsa = new SalsaStream({ chunkSize: 256, onProgress: p => seen.push(p) });
    const plain = makePlain(1000);

    const enc = await salsa.processBlob(new Blob([plain]), HEX);
    expect(enc.size).toBe(1000);
    expect(seen.at(-1)).toEqual({ bytes: 1000, blocks: 16, chunks: 4 });

    const dec = await salsa.processBlob(enc, HEX);
    expect(new Uint8Array(await dec.arrayBuffer())).toEqual(plain);
  });

  it('createStream matches the one-shot result', async () => {
    const salsa = new SalsaStream({ chunkSize: 512 });
    const plain = makePlain(2050);
    const rs = new ReadableStream<Uint8Array>({
      start(c) {
        c.enqueue(plain.slice(0, 1000));
        c.enqueue(plain.slice(1000));
        c.close();
      },
    });
    const out = await collectStream(rs.pipeThrough(salsa.createStream(HEX)));
    expect(out).toEqual(salsa.process(plain, HEX));
  });

  it('logs chunk size alignment', () => {
    const sink: string[] = [];
    const salsa = new SalsaStream({ chunkSize: 100, verbose: 1, logger: m => sink.push(m) });
    expect(salsa.getChunkSize()).toBe(64);
    expect(sink).toEqual(['1| Chunk size 100 aligned to 64 bytes']);
  });
});
