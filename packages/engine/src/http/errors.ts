export type HttpErrorKind =
  | "malformed-start-line"
  | "malformed-header"
  | "too-long"
  | "framing"
  | "io"
  | "write";

export type HttpErrorCode =
  | "MALFORMED_REQUEST_LINE"
  | "UNSUPPORTED_METHOD"
  | "UNSUPPORTED_VERSION"
  | "START_LINE_TOO_LONG"
  | "HEADER_LINE_TOO_LONG"
  | "MALFORMED_HEADER_LINE"
  | "UNSUPPORTED_TRANSFER_ENCODING"
  | "INVALID_CONTENT_LENGTH"
  | "MESSAGE_TOO_LARGE"
  | "BODY_EXCEEDS_CONTENT_LENGTH"
  | "UNEXPECTED_EOF"
  | "REQUEST_TIMEOUT"
  | "CONNECTION_ERROR"
  | "WRITE_FAILED"
  | "WRITE_OUT_OF_ORDER";

const ERROR_KINDS: Record<HttpErrorCode, HttpErrorKind> = {
  MALFORMED_REQUEST_LINE: "malformed-start-line",
  UNSUPPORTED_METHOD: "malformed-start-line",
  UNSUPPORTED_VERSION: "malformed-start-line",
  START_LINE_TOO_LONG: "too-long",
  HEADER_LINE_TOO_LONG: "too-long",
  MALFORMED_HEADER_LINE: "malformed-header",
  UNSUPPORTED_TRANSFER_ENCODING: "framing",
  INVALID_CONTENT_LENGTH: "framing",
  MESSAGE_TOO_LARGE: "framing",
  BODY_EXCEEDS_CONTENT_LENGTH: "framing",
  UNEXPECTED_EOF: "io",
  REQUEST_TIMEOUT: "io",
  CONNECTION_ERROR: "io",
  WRITE_FAILED: "write",
  WRITE_OUT_OF_ORDER: "write",
};

export class HttpError extends Error {
  readonly kind: HttpErrorKind;

  constructor(
    readonly code: HttpErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "HttpError";
    this.kind = ERROR_KINDS[code];
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
