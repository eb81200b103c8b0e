import { describe, it, expect } from 'vitest';
import { decodeUtf8, findInvalidUtf8 } from '../utf8';
import { DecodeError } from '../errors';

async function* chunksOf(...parts: number[][]): AsyncGenerator<Buffer> {
  for (const part of parts) yield Buffer.from(part);
}

async function decodeAll(chunks: AsyncIterable<Buffer>): Promise<string> {
  let text = '';
  for await (const piece of decodeUtf8(chunks)) text += piece;
  return text;
}

async function decodeFailure(chunks: AsyncIterable<Buffer>): Promise<DecodeError> {
  try {
    await decodeAll(chunks);
  } catch (err) {
    if (err instanceof DecodeError) return err;
    throw err;
  }
  throw new Error('expected a DecodeError');
}

describe('findInvalidUtf8', () => {
  it('returns -1 for well-formed text', () => {
    expect(findInvalidUtf8(Buffer.from('plain, é, €, 😀'))).toBe(-1);
  });

  it('points at the lead byte of a broken sequence', () => {
    expect(findInvalidUtf8(Buffer.from([0x61, 0x62, 0xe2, 0x28, 0xa1]))).toBe(2);
    expect(findInvalidUtf8(Buffer.from([0x61, 0x80]))).toBe(1);
    expect(findInvalidUtf8(Buffer.from([0x61, 0xff]))).toBe(1);
  });

  it('rejects overlong forms and surrogates', () => {
    expect(findInvalidUtf8(Buffer.from([0xc0, 0xaf]))).toBe(0);
    expect(findInvalidUtf8(Buffer.from([0xe0, 0x80, 0xaf]))).toBe(0);
    expect(findInvalidUtf8(Buffer.from([0xed, 0xa0, 0x80]))).toBe(0);
  });

  it('reports a truncated sequence at the end', () => {
    expect(findInvalidUtf8(Buffer.from([0x61, 0xf0, 0x9f, 0x98]))).toBe(1);
  });
});

describe('decodeUtf8', () => {
  it('joins characters split across chunks and drops a BOM', async () => {
    // "é" is c3 a9 and "😀" is f0 9f 98 80.
    const text = await decodeAll(chunksOf([0xef, 0xbb, 0xbf, 0x61, 0xc3], [0xa9, 0xf0], [0x9f], [0x98, 0x80]));
    expect(text).toBe('aé😀');
  });

  it('reports the file offset of a sequence begun in earlier chunks', async () => {
    const err = await decodeFailure(chunksOf([0x61, 0x62, 0xf0], [0x9f], [0x41]));
    expect(err.byteOffset).toBe(2);
    expect(err.code).toBe('DECODE_ERROR');
  });

  it('reports a sequence cut off by the end of input', async () => {
    const err = await decodeFailure(chunksOf([0x61], [0x62, 0xe2, 0x82]));
    expect(err.byteOffset).toBe(2);
  });
});
