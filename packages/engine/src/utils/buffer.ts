const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function fromString(text: string): Uint8Array {
  return encoder.encode(text);
}

export function decodeToString(data: Uint8Array): string {
  return decoder.decode(data);
}

export function concat(chunks: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const chunk of chunks) {
    total += chunk.length;
  }

  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/** Index of the first occurrence of `byte` at or after `from`, or -1. */
export function indexOfByte(data: Uint8Array, byte: number, from = 0): number {
  for (let i = from; i < data.length; i++) {
    if (data[i] === byte) return i;
  }
  return -1;
}
