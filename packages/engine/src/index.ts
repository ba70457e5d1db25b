// Node adapters
export {
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/node-socket.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig, validateConfig } from "./config/server-config.js";
// HTTP
export type {
  HttpErrorCode,
  HttpErrorKind,
} from "./http/errors.js";
export { errorMessage, HttpError } from "./http/errors.js";
export type {
  HeaderParseOptions,
  HeaderParseResult,
} from "./http/headers.js";
export { Headers, isToken } from "./http/headers.js";
export type {
  BodyFraming,
  ParsedRequestLine,
  ParseHttpRequestOptions,
  RequestState,
} from "./http/request-parser.js";
export {
  createHttpRequestParser,
  HttpRequestStreamParser,
  parseHttpRequest,
  parseRequestLine,
  RequestParser,
  resolveBodyFraming,
} from "./http/request-parser.js";
export type {
  ResponseWriterOptions,
  WriterState,
} from "./http/response-writer.js";
export {
  canonicalHeaderName,
  getDefaultHeaders,
  ResponseWriter,
} from "./http/response-writer.js";
export type { HttpMethod, HttpRequest, RequestLine } from "./http/types.js";
export {
  HTTP_METHODS,
  reasonPhrase,
  STATUS_TEXT,
  StatusCode,
} from "./http/types.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { AccessLogEntry } from "./logging/access-log.js";
export { formatAccessLogLine } from "./logging/access-log.js";
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  prefixedLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type {
  HttpServerEvents,
  HttpServerOptions,
  RequestHandler,
} from "./server/http-server.js";
export { HttpServer } from "./server/http-server.js";
// Testing
export type {
  InMemoryRequestOptions,
  RequestPayload,
} from "./testing/in-memory-socket-factory.js";
export {
  InMemorySocketFactory,
  InMemoryTcpSocket,
} from "./testing/in-memory-socket-factory.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export { EventEmitter } from "./utils/event-emitter.js";
