import { TextDecoder } from 'util';
import { DecodeError } from './errors';

const sequenceLength = (lead: number): number => (lead >= 0xf0 ? 4 : lead >= 0xe0 ? 3 : 2);

/**
 * Index of the first byte of the first invalid or truncated UTF-8 sequence
 * in `bytes`, or -1 when every sequence is well formed. Overlong forms and
 * surrogates count as invalid.
 */
export function findInvalidUtf8(bytes: Uint8Array): number {
  let i = 0;
  while (i < bytes.length) {
    const lead = bytes[i];
    if (lead < 0x80) {
      i += 1;
      continue;
    }
    if (lead < 0xc2 || lead > 0xf4) return i;

    // Second byte bounds are narrower after E0, ED, F0 and F4.
    const length = sequenceLength(lead);
    const low = lead === 0xe0 ? 0xa0 : lead === 0xf0 ? 0x90 : 0x80;
    const high = lead === 0xed ? 0x9f : lead === 0xf4 ? 0x8f : 0xbf;
    if (i + length > bytes.length) return i;
    for (let k = 1; k < length; k++) {
      const byte = bytes[i + k];
      const min = k === 1 ? low : 0x80;
      const max = k === 1 ? high : 0xbf;
      if (byte < min || byte > max) return i;
    }
    i += length;
  }
  return -1;
}

// Bytes of a multi-byte sequence still open at the end of `bytes`.
function openSequenceLength(bytes: Uint8Array): number {
  for (let back = 1; back <= Math.min(3, bytes.length); back++) {
    const byte = bytes[bytes.length - back];
    if (byte < 0x80) return 0;
    if (byte >= 0xc0) return sequenceLength(byte) > back ? back : 0;
  }
  return 0;
}

/**
 * Decode a byte stream as strict UTF-8. A leading BOM is dropped. Invalid
 * input throws DecodeError with the file offset of the offending sequence,
 * including one that began in the previous chunk.
 */
export async function* decodeUtf8(chunks: AsyncIterable<Buffer>): AsyncGenerator<string> {
  const decoder = new TextDecoder('utf-8', { fatal: true });
  let offset = 0;
  let held: Buffer = Buffer.alloc(0);

  for await (const chunk of chunks) {
    let text: string;
    try {
      text = decoder.decode(chunk, { stream: true });
    } catch (err) {
      const index = findInvalidUtf8(Buffer.concat([held, chunk]));
      throw new DecodeError(index === -1 ? offset : offset - held.length + index, err);
    }
    const window = Buffer.concat([held, chunk.subarray(Math.max(0, chunk.length - 3))]);
    held = window.subarray(window.length - openSequenceLength(window));
    offset += chunk.length;
    if (text) yield text;
  }

  let tail: string;
  try {
    tail = decoder.decode();
  } catch (err) {
    // Input ended inside a multi-byte sequence.
    throw new DecodeError(offset - held.length, err);
  }
  if (tail) yield tail;
}
