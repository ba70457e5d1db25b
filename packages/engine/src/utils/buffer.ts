const encoder = new TextEncoder();
const decoder = new TextDecoder();
const LATIN1_SLICE = 0x2000;

export function fromString(text: string): Uint8Array {
  return encoder.encode(text);
}

export function decodeToString(data: Uint8Array): string {
  return decoder.decode(data);
}

/** One character per byte (ISO-8859-1), so obs-text survives intact. */
export function decodeLatin1(data: Uint8Array): string {
  let text = "";
  for (let offset = 0; offset < data.length; offset += LATIN1_SLICE) {
    text += String.fromCharCode(...data.subarray(offset, offset + LATIN1_SLICE));
  }
  return text;
}

export function concat(parts: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const part of parts) {
    total += part.length;
  }

  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

/** Index of the first occurrence of `sequence` at or after `from`, or -1. */
export function indexOfSequence(
  buffer: Uint8Array,
  sequence: Uint8Array,
  from = 0,
): number {
  outer: for (let i = from; i <= buffer.length - sequence.length; i++) {
    for (let j = 0; j < sequence.length; j++) {
      if (buffer[i + j] !== sequence[j]) continue outer;
    }
    return i;
  }
  return -1;
}
