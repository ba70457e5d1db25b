import type { Headers } from "./headers.js";

export const HTTP_METHODS = [
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "DELETE",
  "CONNECT",
  "OPTIONS",
  "TRACE",
  "PATCH",
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export interface RequestLine {
  readonly method: HttpMethod;
  readonly requestTarget: string;
  readonly httpVersion: string;
}

export interface HttpRequest {
  requestLine: RequestLine;
  headers: Headers;
  body?: Uint8Array;
}

export const StatusCode = {
  OK: 200,
  BAD_REQUEST: 400,
  INTERNAL_SERVER_ERROR: 500,
} as const;

export type StatusCode = (typeof StatusCode)[keyof typeof StatusCode];

export const STATUS_TEXT: Record<StatusCode, string> = {
  200: "OK",
  400: "Bad Request",
  500: "Internal Server Error",
};

export function reasonPhrase(status: number): string {
  return isKnownStatus(status) ? STATUS_TEXT[status] : "Unknown";
}

function isKnownStatus(status: number): status is StatusCode {
  return Object.hasOwn(STATUS_TEXT, status);
}

const METHOD_SET: ReadonlySet<string> = new Set(HTTP_METHODS);

export function isHttpMethod(token: string): token is HttpMethod {
  return METHOD_SET.has(token);
}
