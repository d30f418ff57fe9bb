const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function toBytes(text: string): Uint8Array {
  return encoder.encode(text);
}

export function fromBytes(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

/**
 * Deterministic payload of exactly `size` bytes. The seed is used as-is when
 * long enough; otherwise numbered chunks of it are repeated.
 */
export function generateTestData(size: number, seed: string): Uint8Array {
  const seedBytes = toBytes(seed);
  if (seedBytes.byteLength >= size) {
    return seedBytes.slice(0, size);
  }

  const out = new Uint8Array(size);
  let offset = 0;
  let chunk = 0;
  while (offset < size) {
    const piece = toBytes(`${seed} - chunk ${chunk}\n`);
    const take = Math.min(piece.byteLength, size - offset);
    out.set(piece.subarray(0, take), offset);
    offset += take;
    chunk++;
  }
  return out;
}

/** `text` repeated `times` times. */
export function repeatText(text: string, times: number): Uint8Array {
  return toBytes(text.repeat(times));
}

export const RANGE_LINE_COUNT = 100;
export const RANGE_LINE_LENGTH = 100;

/**
 * 100 lines of exactly 100 bytes each, so any offset maps to a known line.
 */
export function createRangeTestData(): Uint8Array {
  let text = '';
  for (let i = 0; i < RANGE_LINE_COUNT; i++) {
    const n = String(i).padStart(3, '0');
    const line = `Line ${n}: This is line number ${n} with predictable content for range testing.`;
    text += line.padEnd(RANGE_LINE_LENGTH - 1).slice(0, RANGE_LINE_LENGTH - 1) + '\n';
  }
  return toBytes(text);
}

/** Payload for multipart part `partNumber`, exactly `size` bytes. */
export function multipartPartData(partNumber: number, size: number): Uint8Array {
  return generateTestData(size, `Multipart upload test data - Part ${partNumber}`);
}
