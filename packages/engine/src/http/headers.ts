import { decodeLatin1, indexOfSequence } from "../utils/buffer.js";
import { HttpError } from "./errors.js";

const CRLF = new Uint8Array([13, 10]);
const SPACE = 0x20;
const TAB = 0x09;
const COLON = 0x3a;

export const DEFAULT_MAX_HEADER_LINE_SIZE = 8 * 1024; // 8KB

// RFC 9110 token characters, indexed by octet.
const TOKEN_CHARS: readonly boolean[] = (() => {
  const table = new Array<boolean>(128).fill(false);
  const mark = (from: string, to: string) => {
    for (let c = from.charCodeAt(0); c <= to.charCodeAt(0); c++) {
      table[c] = true;
    }
  };
  mark("0", "9");
  mark("A", "Z");
  mark("a", "z");
  for (const c of "!#$%&'*+-.^_`|~") {
    table[c.charCodeAt(0)] = true;
  }
  return table;
})();

export function isToken(bytes: Uint8Array): boolean {
  if (bytes.length === 0) return false;
  for (const octet of bytes) {
    if (octet > 127 || !TOKEN_CHARS[octet]) return false;
  }
  return true;
}

export interface HeaderParseResult {
  /** Bytes of complete lines consumed from the front of the buffer. */
  bytesConsumed: number;
  /** True once the blank line ending the header block was consumed. */
  done: boolean;
}

export interface HeaderParseOptions {
  maxLineSize?: number;
}

/**
 * Field-name → value map with case-insensitive access. Names are stored
 * lower-cased; a repeated name is folded into one comma-joined value.
 */
export class Headers implements Iterable<[string, string]> {
  private fields = new Map<string, string>();

  get(name: string): string {
    return this.fields.get(name.toLowerCase()) ?? "";
  }

  has(name: string): boolean {
    return this.fields.has(name.toLowerCase());
  }

  /** Adds a value, comma-joining it onto any existing one. */
  set(name: string, value: string): void {
    const key = name.toLowerCase();
    const existing = this.fields.get(key);
    this.fields.set(key, existing === undefined ? value : `${existing},${value}`);
  }

  /** Replaces any existing value. */
  override(name: string, value: string): void {
    this.fields.set(name.toLowerCase(), value);
  }

  delete(name: string): void {
    this.fields.delete(name.toLowerCase());
  }

  get size(): number {
    return this.fields.size;
  }

  keys(): IterableIterator<string> {
    return this.fields.keys();
  }

  entries(): IterableIterator<[string, string]> {
    return this.fields.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.fields.entries();
  }

  clone(): Headers {
    const copy = new Headers();
    for (const [name, value] of this.fields) {
      copy.fields.set(name, value);
    }
    return copy;
  }

  /**
   * Parse as many complete header lines as `data` holds.
   *
   * Stops at the blank line that ends the block (`done: true`) or when the
   * remaining bytes do not yet form a complete line. Lines already parsed
   * are merged into this container and counted in `bytesConsumed`, so the
   * caller must drop them before calling again.
   */
  parse(data: Uint8Array, options?: HeaderParseOptions): HeaderParseResult {
    const maxLineSize = options?.maxLineSize ?? DEFAULT_MAX_HEADER_LINE_SIZE;
    let offset = 0;

    while (true) {
      const lineEnd = indexOfSequence(data, CRLF, offset);
      if (lineEnd === -1) {
        if (data.length - offset > maxLineSize) {
          throw lineTooLong(maxLineSize);
        }
        return { bytesConsumed: offset, done: false };
      }

      if (lineEnd - offset > maxLineSize) {
        throw lineTooLong(maxLineSize);
      }

      const line = data.subarray(offset, lineEnd);
      offset = lineEnd + CRLF.length;

      if (line.length === 0) {
        return { bytesConsumed: offset, done: true };
      }

      this.parseLine(line);
    }
  }

  private parseLine(line: Uint8Array): void {
    // obs-fold
    if (line[0] === SPACE || line[0] === TAB) {
      throw malformed("line starts with whitespace");
    }

    const colon = line.indexOf(COLON);
    if (colon <= 0) {
      throw malformed(colon === 0 ? "empty field name" : "missing colon");
    }

    const rawName = line.subarray(0, colon);
    if (rawName.includes(SPACE) || rawName.includes(TAB)) {
      throw malformed("whitespace in field name");
    }
    if (!isToken(rawName)) {
      throw malformed("invalid character in field name");
    }

    const name = decodeLatin1(rawName).toLowerCase();
    const value = trimWhitespace(decodeLatin1(line.subarray(colon + 1)));
    this.set(name, value);
  }
}

function trimWhitespace(value: string): string {
  return value.replace(/^[ \t]+|[ \t]+$/g, "");
}

function malformed(detail: string): HttpError {
  return new HttpError(
    "MALFORMED_HEADER_LINE",
    `Malformed header line: ${detail}`,
  );
}

function lineTooLong(maxLineSize: number): HttpError {
  return new HttpError(
    "HEADER_LINE_TOO_LONG",
    `Header line exceeds ${maxLineSize} bytes`,
  );
}
