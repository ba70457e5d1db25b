import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, decodeLatin1, indexOfSequence } from "../utils/buffer.js";
import { HttpError } from "./errors.js";
import { DEFAULT_MAX_HEADER_LINE_SIZE, Headers } from "./headers.js";
import { type HttpRequest, isHttpMethod, type RequestLine } from "./types.js";

const CRLF = new Uint8Array([13, 10]);
const HTTP_VERSION = "HTTP/1.1";
const DEFAULT_MAX_START_LINE_SIZE = 8 * 1024; // 8KB
const DEFAULT_MAX_BODY_SIZE = 10 * 1024 * 1024; // 10MB
const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

export interface ParseHttpRequestOptions {
  maxStartLineSize?: number;
  maxHeaderLineSize?: number;
  maxBodySize?: number;
  timeoutMs?: number;
}

export type RequestState =
  | "initialized"
  | "parsing-headers"
  | "parsing-body"
  | "done"
  | "error";

export interface ParsedRequestLine {
  requestLine: RequestLine;
  /** Includes the CRLF terminator. */
  bytesConsumed: number;
}

/**
 * Parse `<method> <target> HTTP/1.1\r\n` from the front of `data`.
 * Returns null while the terminator has not arrived yet.
 */
export function parseRequestLine(
  data: Uint8Array,
  maxLineSize = DEFAULT_MAX_START_LINE_SIZE,
): ParsedRequestLine | null {
  const lineEnd = indexOfSequence(data, CRLF);
  if (lineEnd === -1) {
    if (data.length > maxLineSize) {
      throw startLineTooLong(maxLineSize);
    }
    return null;
  }
  if (lineEnd > maxLineSize) {
    throw startLineTooLong(maxLineSize);
  }

  const tokens = decodeLatin1(data.subarray(0, lineEnd))
    .split(/[\t\n\v\f\r ]+/)
    .filter((token) => token.length > 0);
  if (tokens.length !== 3) {
    throw new HttpError(
      "MALFORMED_REQUEST_LINE",
      `Malformed request line: expected 3 parts, got ${tokens.length}`,
    );
  }

  const [method, requestTarget, version] = tokens;
  if (!isHttpMethod(method)) {
    throw new HttpError(
      "UNSUPPORTED_METHOD",
      `Unsupported HTTP method: ${method}`,
    );
  }
  if (version !== HTTP_VERSION) {
    throw new HttpError(
      "UNSUPPORTED_VERSION",
      `Unsupported HTTP version: ${version}`,
    );
  }

  return {
    requestLine: Object.freeze({
      method,
      requestTarget,
      httpVersion: version.slice("HTTP/".length),
    }),
    bytesConsumed: lineEnd + CRLF.length,
  };
}

export interface BodyFraming {
  hasBody: boolean;
  /** Exact number of body bytes expected; 0 when there is no body. */
  contentLength: number;
}

/** Decide from the request headers whether a body follows and how long it is. */
export function resolveBodyFraming(
  headers: Headers,
  maxBodySize = DEFAULT_MAX_BODY_SIZE,
): BodyFraming {
  if (headers.has("transfer-encoding")) {
    const te = headers.get("transfer-encoding").trim().toLowerCase();
    throw new HttpError(
      "UNSUPPORTED_TRANSFER_ENCODING",
      te.includes("chunked")
        ? "Transfer-Encoding: chunked is not supported"
        : `Unsupported Transfer-Encoding: "${te}"`,
    );
  }

  const raw = headers.get("content-length").trim();
  if (raw === "") {
    return { hasBody: false, contentLength: 0 };
  }
  if (!/^\d+$/.test(raw)) {
    throw new HttpError(
      "INVALID_CONTENT_LENGTH",
      `Invalid Content-Length: "${raw}"`,
    );
  }

  const contentLength = Number(raw);
  if (contentLength === 0) {
    return { hasBody: false, contentLength: 0 };
  }
  if (contentLength > maxBodySize) {
    throw new HttpError(
      "MESSAGE_TOO_LARGE",
      `Content-Length ${raw} exceeds the ${maxBodySize} byte limit`,
    );
  }
  return { hasBody: true, contentLength };
}

/**
 * Incremental HTTP/1.1 request state machine.
 *
 * `feed` takes the bytes buffered so far and returns how many of them it
 * consumed; the caller drops that prefix and calls again once more bytes
 * arrive. States only move forward. The first error pins the parser in
 * `error` and is rethrown by every later `feed`.
 */
export class RequestParser {
  readonly headers = new Headers();

  private _state: RequestState = "initialized";
  private _error: HttpError | null = null;
  private _requestLine: RequestLine | null = null;
  private body: Uint8Array | null = null;
  private bodyLength = 0;

  private readonly maxStartLineSize: number;
  private readonly maxHeaderLineSize: number;
  private readonly maxBodySize: number;

  constructor(options?: ParseHttpRequestOptions) {
    this.maxStartLineSize =
      options?.maxStartLineSize ?? DEFAULT_MAX_START_LINE_SIZE;
    this.maxHeaderLineSize =
      options?.maxHeaderLineSize ?? DEFAULT_MAX_HEADER_LINE_SIZE;
    this.maxBodySize = options?.maxBodySize ?? DEFAULT_MAX_BODY_SIZE;
  }

  get state(): RequestState {
    return this._state;
  }

  get error(): HttpError | null {
    return this._error;
  }

  get requestLine(): RequestLine | null {
    return this._requestLine;
  }

  feed(data: Uint8Array): number {
    if (this._error) {
      throw this._error;
    }

    try {
      return this.advance(data);
    } catch (err) {
      if (err instanceof HttpError) {
        this._error = err;
        this._state = "error";
      }
      throw err;
    }
  }

  toRequest(): HttpRequest {
    if (this._state !== "done" || !this._requestLine) {
      throw new Error(`Request is not complete (state: ${this._state})`);
    }
    return {
      requestLine: this._requestLine,
      headers: this.headers,
      body: this.body ?? undefined,
    };
  }

  private advance(data: Uint8Array): number {
    let read = 0;

    while (true) {
      const current = data.subarray(read);

      switch (this._state) {
        case "initialized": {
          const parsed = parseRequestLine(current, this.maxStartLineSize);
          if (!parsed) {
            return read;
          }
          this._requestLine = parsed.requestLine;
          read += parsed.bytesConsumed;
          this._state = "parsing-headers";
          break;
        }

        case "parsing-headers": {
          const { bytesConsumed, done } = this.headers.parse(current, {
            maxLineSize: this.maxHeaderLineSize,
          });
          read += bytesConsumed;
          if (!done) {
            return read;
          }

          const framing = resolveBodyFraming(this.headers, this.maxBodySize);
          if (!framing.hasBody) {
            this._state = "done";
            return read;
          }
          this._state = "parsing-body";
          break;
        }

        case "parsing-body": {
          const { contentLength } = resolveBodyFraming(
            this.headers,
            this.maxBodySize,
          );
          if (this.bodyLength + current.length > contentLength) {
            throw new HttpError(
              "BODY_EXCEEDS_CONTENT_LENGTH",
              `Request body exceeds Content-Length of ${contentLength}`,
            );
          }

          const body = (this.body ??= new Uint8Array(contentLength));
          body.set(current, this.bodyLength);
          this.bodyLength += current.length;
          read += current.length;
          if (this.bodyLength === contentLength) {
            this._state = "done";
          }
          return read;
        }

        case "done":
        case "error":
          return read;
      }
    }
  }
}

/**
 * Reads one request off a socket, feeding whatever arrives into a
 * {@link RequestParser} until it completes, fails, or the stream ends.
 */
export class HttpRequestStreamParser {
  private buffer: Uint8Array = new Uint8Array(0);
  private unread = false;
  private ended = false;
  private finished = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      // Bytes after the request are not ours to hold.
      if (this.finished) return;
      this.buffer = concat([this.buffer, data]);
      this.unread = true;
      this.notifyWaiters();
    });

    socket.onEnd(() => {
      this.ended = true;
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.ended = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.ended = true;
      this.notifyWaiters();
    });
  }

  /** Bytes received but not yet consumed by a parse. */
  get bufferedBytes(): number {
    return this.buffer.length;
  }

  /**
   * Read one request. Once it settles, with a request or an error, the
   * parser drops its buffer and ignores any further data from the socket.
   */
  async readRequest(options?: ParseHttpRequestOptions): Promise<HttpRequest> {
    try {
      return await this.readUntilDone(options);
    } finally {
      this.finished = true;
      this.buffer = new Uint8Array(0);
      this.unread = false;
    }
  }

  private async readUntilDone(
    options?: ParseHttpRequestOptions,
  ): Promise<HttpRequest> {
    if (this.finished) {
      throw new Error("readRequest may only be called once per connection");
    }

    const parser = new RequestParser(options);
    const timeoutMs = options?.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    const deadline = Date.now() + timeoutMs;

    while (true) {
      if (this.unread) {
        this.unread = false;
        const consumed = parser.feed(this.buffer);
        this.buffer = this.buffer.subarray(consumed);
      }

      if (parser.state === "done") {
        return parser.toRequest();
      }

      if (this.socketError) {
        throw new HttpError(
          "CONNECTION_ERROR",
          `Connection error: ${this.socketError.message}`,
          { cause: this.socketError },
        );
      }

      if (this.ended) {
        throw new HttpError(
          "UNEXPECTED_EOF",
          "Connection closed before request was complete",
        );
      }

      const hadActivity = await this.waitForActivity(deadline - Date.now());
      if (!hadActivity) {
        throw new HttpError(
          "REQUEST_TIMEOUT",
          "Request timed out before completion",
        );
      }
    }
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      if (Number.isFinite(timeoutMs)) {
        timer = setTimeout(() => {
          if (settled) return;
          settled = true;
          this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
          resolve(false);
        }, timeoutMs);
      }

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

export function createHttpRequestParser(
  socket: ITcpSocket,
): HttpRequestStreamParser {
  return new HttpRequestStreamParser(socket);
}

/**
 * Parse a single HTTP/1.1 request from a TCP socket stream.
 * Rejects with an {@link HttpError} when the request cannot be parsed.
 */
export function parseHttpRequest(
  socket: ITcpSocket,
  options?: ParseHttpRequestOptions,
): Promise<HttpRequest> {
  return createHttpRequestParser(socket).readRequest(options);
}

function startLineTooLong(maxLineSize: number): HttpError {
  return new HttpError(
    "START_LINE_TOO_LONG",
    `Request line exceeds ${maxLineSize} bytes`,
  );
}
