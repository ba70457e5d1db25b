import { type ServerConfig, validateConfig } from "../config/server-config.js";
import { errorMessage } from "../http/errors.js";
import {
  createHttpRequestParser,
  type ParseHttpRequestOptions,
} from "../http/request-parser.js";
import { ResponseWriter } from "../http/response-writer.js";
import { type HttpRequest, StatusCode } from "../http/types.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import {
  type AccessLogEntry,
  formatAccessLogLine,
} from "../logging/access-log.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { fromString } from "../utils/buffer.js";
import { EventEmitter } from "../utils/event-emitter.js";

/**
 * Application callback, invoked once per successfully parsed request.
 * It sets `writer.status` and the body (or writes the response phases
 * itself); the server finishes whatever is left unwritten afterwards.
 */
export type RequestHandler = (
  request: HttpRequest,
  writer: ResponseWriter,
) => void | Promise<void>;

export interface HttpServerOptions {
  socketFactory: ISocketFactory;
  config: ServerConfig;
  handler: RequestHandler;
  logger?: Logger;
}

export type HttpServerEvents = {
  listening: [port: number];
  request: [entry: AccessLogEntry];
  error: [err: Error];
  close: [];
};

const BAD_REQUEST_RESPONSE = fromString(
  "HTTP/1.1 400 Bad Request\r\nConnection: close\r\nContent-Length: 0\r\n\r\n",
);

export class HttpServer extends EventEmitter<HttpServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private handler: RequestHandler;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private closed = false;

  constructor(options: HttpServerOptions) {
    super();
    validateConfig(options.config);
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.handler = options.handler;
    this.logger = options.logger ?? basicLogger();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  start(): Promise<number> {
    if (this.closed) {
      return Promise.reject(new Error("Server is closed"));
    }
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.onConnection((rawSocket) => {
        let socket: ITcpSocket;
        try {
          socket = this.socketFactory.wrapTcpSocket(rawSocket);
        } catch (err) {
          this.logger.warn("Dropping connection:", errorMessage(err));
          return;
        }

        this.handleConnection(socket).catch((err) => {
          this.logger.error("Connection task failed:", err);
        });
      });

      server.onError((err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        if (this.closed) {
          this.logger.debug("Listener error after close:", err.message);
          return;
        }

        // Accept failures are transient; keep serving.
        this.logger.warn("TCP server error:", err.message);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  /**
   * Stop accepting connections. In-flight requests run to completion.
   * Calling close more than once is a no-op.
   */
  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    this.closed = true;

    const server = this.tcpServer;
    this.tcpServer = null;

    return new Promise((resolve) => {
      if (!server) {
        this.emit("close");
        resolve();
        return;
      }

      server.close(() => {
        this.emit("close");
        resolve();
      });
    });
  }

  private async handleConnection(socket: ITcpSocket): Promise<void> {
    const startedAt = performance.now();
    const remoteHost = socket.remoteAddress ?? "-";
    const elapsed = () => performance.now() - startedAt;

    // Must subscribe before yielding so no early bytes are missed.
    const parser = createHttpRequestParser(socket);

    try {
      let request: HttpRequest;
      try {
        request = await parser.readRequest(this.parseOptions());
      } catch (err) {
        this.logRequest({
          remoteHost,
          method: "-",
          target: "-",
          status: 400,
          durationMs: elapsed(),
          error: errorMessage(err),
        });
        await this.sendBadRequest(socket);
        return;
      }

      const { method, requestTarget } = request.requestLine;
      const writer = new ResponseWriter(socket, {
        chunkSize: this.config.chunkSize,
      });

      try {
        await this.handler(request, writer);
        await writer.end();
      } catch (err) {
        this.logger.error(
          `Failed to respond to ${method} ${requestTarget}:`,
          errorMessage(err),
        );
        this.logRequest({
          remoteHost,
          method,
          target: requestTarget,
          // Nothing reached the client: record the failure as a 500.
          status: writer.statusLineSent
            ? writer.status
            : StatusCode.INTERNAL_SERVER_ERROR,
          durationMs: elapsed(),
          error: errorMessage(err),
        });
        return;
      }

      this.logRequest({
        remoteHost,
        method,
        target: requestTarget,
        status: writer.status,
        durationMs: elapsed(),
      });
    } finally {
      socket.close();
    }
  }

  private async sendBadRequest(socket: ITcpSocket): Promise<void> {
    try {
      if (socket.sendAndWait) {
        await socket.sendAndWait(BAD_REQUEST_RESPONSE);
      } else {
        socket.send(BAD_REQUEST_RESPONSE);
      }
    } catch (err) {
      this.logger.debug("Could not send 400 response:", errorMessage(err));
    }
  }

  private parseOptions(): ParseHttpRequestOptions {
    return {
      maxStartLineSize: this.config.maxStartLineSize,
      maxHeaderLineSize: this.config.maxHeaderLineSize,
      maxBodySize: this.config.maxBodySize,
      timeoutMs: this.config.requestTimeoutMs,
    };
  }

  private logRequest(entry: AccessLogEntry): void {
    this.emit("request", entry);
    if (!this.config.quiet) {
      this.logger.info(formatAccessLogLine(entry));
    }
  }
}
