import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import { errorMessage, HttpError } from "./errors.js";
import { Headers } from "./headers.js";
import { reasonPhrase, StatusCode } from "./types.js";

const CRLF = fromString("\r\n");
const LAST_CHUNK = fromString("0\r\n\r\n");
const DEFAULT_CHUNK_SIZE = 1024;

/** Phase the writer will accept next. */
export type WriterState =
  | "status-line"
  | "headers"
  | "body"
  | "chunked-body"
  | "done";

export interface ResponseWriterOptions {
  /** Largest chunk emitted by writeChunkedBody. Default: 1024 */
  chunkSize?: number;
}

export function getDefaultHeaders(contentLength: number): Headers {
  const headers = new Headers();
  headers.set("content-length", String(contentLength));
  headers.set("connection", "close");
  headers.set("content-type", "text/plain");
  return headers;
}

/** `content-type` → `Content-Type` */
export function canonicalHeaderName(name: string): string {
  return name
    .toLowerCase()
    .split("-")
    .map((segment) => segment.charAt(0).toUpperCase() + segment.slice(1))
    .join("-");
}

export function tokenListContains(list: string, token: string): boolean {
  return list.split(",").some((item) => item.trim() === token);
}

/**
 * Serializes one HTTP/1.1 response onto a socket.
 *
 * Handlers either fill in `status`, `headers` and the body and let the
 * server call {@link end}, or drive the phases themselves in order:
 * status line, header block, then a fixed or chunked body. Calls out of
 * order reject with a `WRITE_OUT_OF_ORDER` error.
 */
export class ResponseWriter {
  status: number = StatusCode.OK;
  /** Writer-level headers; these win over the set passed to writeHeaders. */
  readonly headers = new Headers();

  private body: Uint8Array = new Uint8Array(0);
  private _state: WriterState = "status-line";
  private chunked = false;
  private bodyWritten = false;
  private statusLineWritten = false;
  private readonly chunkSize: number;

  constructor(
    private readonly socket: ITcpSocket,
    options?: ResponseWriterOptions,
  ) {
    const chunkSize = options?.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError(
        `chunkSize must be a positive integer, got ${chunkSize}`,
      );
    }
    this.chunkSize = chunkSize;
  }

  get state(): WriterState {
    return this._state;
  }

  /** Whether the status line has reached the socket. */
  get statusLineSent(): boolean {
    return this.statusLineWritten;
  }

  /** Whether the header block declared `Transfer-Encoding: chunked`. */
  get isChunked(): boolean {
    return this.chunked;
  }

  setBody(body: Uint8Array | string): void {
    this.body = typeof body === "string" ? fromString(body) : body;
  }

  getBody(): Uint8Array {
    return this.body;
  }

  async writeStatusLine(code: number = this.status): Promise<void> {
    this.expectState("writeStatusLine", "status-line");
    this.status = code;
    await this.send(fromString(`HTTP/1.1 ${code} ${reasonPhrase(code)}\r\n`));
    this.statusLineWritten = true;
    this._state = "headers";
  }

  async writeHeaders(headers: Headers): Promise<void> {
    this.expectState("writeHeaders", "headers");

    const effective = headers.clone();
    for (const [name, value] of this.headers) {
      effective.override(name, value);
    }

    this.chunked = tokenListContains(
      effective.get("transfer-encoding"),
      "chunked",
    );
    if (this.chunked) {
      effective.delete("content-length");
    }

    let block = "";
    for (const name of [...effective.keys()].sort()) {
      block += `${canonicalHeaderName(name)}: ${effective.get(name)}\r\n`;
    }
    block += "\r\n";

    await this.send(fromString(block));
    this._state = "body";
  }

  async writeBody(data: Uint8Array): Promise<void> {
    this.expectState("writeBody", "body");
    if (this.chunked) {
      throw outOfOrder("writeBody called after declaring chunked framing");
    }
    this.bodyWritten = true;
    await this.send(data);
  }

  async writeChunkedBody(data: Uint8Array): Promise<void> {
    this.expectState("writeChunkedBody", "body", "chunked-body");
    if (!this.chunked) {
      throw outOfOrder(
        "writeChunkedBody called without Transfer-Encoding: chunked",
      );
    }
    this._state = "chunked-body";

    for (let offset = 0; offset < data.length; offset += this.chunkSize) {
      const chunk = data.subarray(offset, offset + this.chunkSize);
      await this.send(
        concat([fromString(`${chunk.length.toString(16)}\r\n`), chunk, CRLF]),
      );
    }
  }

  async closeChunkedBody(): Promise<void> {
    this.expectState("closeChunkedBody", "body", "chunked-body");
    if (!this.chunked) {
      throw outOfOrder(
        "closeChunkedBody called without Transfer-Encoding: chunked",
      );
    }
    await this.send(LAST_CHUNK);
    this._state = "done";
  }

  /**
   * Write whatever the handler left unwritten: the status line, default
   * headers overlaid with the writer's headers, and the buffered body.
   */
  async end(): Promise<void> {
    if (this._state === "status-line") {
      await this.writeStatusLine(this.status);
    }
    if (this._state === "headers") {
      await this.writeHeaders(getDefaultHeaders(this.body.length));
    }
    if (this._state === "body") {
      if (this.chunked) {
        await this.writeChunkedBody(this.body);
      } else {
        if (!this.bodyWritten) {
          await this.writeBody(this.body);
        }
        this._state = "done";
      }
    }
    if (this._state === "chunked-body") {
      await this.closeChunkedBody();
    }
  }

  private expectState(operation: string, ...allowed: WriterState[]): void {
    if (!allowed.includes(this._state)) {
      throw outOfOrder(
        `${operation} is not allowed while the writer is in state "${this._state}"`,
      );
    }
  }

  private async send(data: Uint8Array): Promise<void> {
    try {
      if (this.socket.sendAndWait) {
        await this.socket.sendAndWait(data);
      } else {
        this.socket.send(data);
      }
    } catch (err) {
      this._state = "done";
      throw new HttpError(
        "WRITE_FAILED",
        `Failed to write response: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }
}

function outOfOrder(message: string): HttpError {
  return new HttpError("WRITE_OUT_OF_ORDER", message);
}
