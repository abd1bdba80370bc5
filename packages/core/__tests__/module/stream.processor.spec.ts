import { ReadableStream } from 'node:stream/web';
import { StreamProcessor } from '../../src/stream/StreamProcessor.js';
import { Salsa20 } from '../../src/cipher/Salsa20.js';

const key   = Uint8Array.from({ length: 32 }, (_, i) => 255 - i);
const nonce = Uint8Array.from({ length: 8 }, (_, i) => i * 3);

function source(...parts: Uint8Array[]) {
  return new ReadableStream<Uint8Array>({
    start(c) {
      for (const p of parts) c.enqueue(p);
      c.close();
    },
  });
}

describe('StreamProcessor.collect', () => {
  it('collects the transformed stream', async () => {
    const sp    = new StreamProcessor(new Salsa20(key, nonce), 128);
    const plain = new Uint8Array([1, 2, 3, 4]);

    const enc = await sp.collect(source(plain));
    expect(enc).toHaveLength(4);
    expect(enc).toEqual(new Salsa20(key, nonce).processMessage(plain));

    const dec = await new StreamProcessor(new Salsa20(key, nonce), 128)
      .collect(source(enc));
    expect(dec).toEqual(plain);
  });

  it('reports progress through the observer', async () => {
    const bytes: number[] = [];
    const sp = new StreamProcessor(new Salsa20(key, nonce), 64, p => bytes.push(p.bytes));
    await sp.collect(source(new Uint8Array(150)));
    expect(bytes).toEqual([64, 128, 150]);
  });
});
