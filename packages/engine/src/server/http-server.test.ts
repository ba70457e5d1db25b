import { describe, expect, it, vi } from "vitest";
import { defaultConfig, type ServerConfig } from "../config/server-config.js";
import { getDefaultHeaders } from "../http/response-writer.js";
import type { HttpRequest } from "../http/types.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { AccessLogEntry } from "../logging/access-log.js";
import type { Logger, LogLevel } from "../logging/logger.js";
import { InMemorySocketFactory } from "../testing/in-memory-socket-factory.js";
import { decodeToString, fromString } from "../utils/buffer.js";
import { HttpServer, type RequestHandler } from "./http-server.js";

const BAD_REQUEST =
  "HTTP/1.1 400 Bad Request\r\nConnection: close\r\nContent-Length: 0\r\n\r\n";

interface LogRecord {
  level: LogLevel;
  message: string;
  args: unknown[];
}

function recordingLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const record =
    (level: LogLevel) =>
    (message: string, ...args: unknown[]) => {
      records.push({ level, message, args });
    };
  return {
    records,
    logger: {
      debug: record("debug"),
      info: record("info"),
      warn: record("warn"),
      error: record("error"),
    },
  };
}

interface ServerContext {
  server: HttpServer;
  socketFactory: InMemorySocketFactory;
  records: LogRecord[];
  entries: AccessLogEntry[];
  request: (
    ...args: Parameters<InMemorySocketFactory["request"]>
  ) => Promise<string>;
}

async function withServer(
  handler: RequestHandler,
  configOverrides: Partial<ServerConfig>,
  testBody: (ctx: ServerContext) => Promise<void>,
): Promise<void> {
  const socketFactory = new InMemorySocketFactory();
  const { logger, records } = recordingLogger();
  const server = new HttpServer({
    socketFactory,
    logger,
    handler,
    config: {
      ...defaultConfig(),
      port: 0,
      quiet: true,
      ...configOverrides,
    },
  });
  const entries: AccessLogEntry[] = [];
  server.on("request", (entry) => entries.push(entry));

  await server.start();

  try {
    await testBody({
      server,
      socketFactory,
      records,
      entries,
      request: async (payload, options) =>
        decodeToString(await socketFactory.request(payload, options)),
    });
  } finally {
    await server.close();
  }
}

const helloHandler: RequestHandler = (_request, writer) => {
  writer.headers.set("content-type", "text/plain");
  writer.setBody("hello");
};

describe("HttpServer (in-memory)", () => {
  it("writes the handler's response and closes the connection", async () => {
    await withServer(helloHandler, {}, async ({ request }) => {
      const res = await request("GET / HTTP/1.1\r\nHost: local\r\n\r\n");
      expect(res).toBe(
        "HTTP/1.1 200 OK\r\nConnection: close\r\nContent-Length: 5\r\nContent-Type: text/plain\r\n\r\nhello",
      );
    });
  });

  it("passes the parsed request to the handler", async () => {
    const seen: HttpRequest[] = [];
    const handler: RequestHandler = (request) => {
      seen.push(request);
    };

    await withServer(handler, {}, async ({ request }) => {
      await request(
        "POST /submit HTTP/1.1\r\nHost: local\r\nContent-Length: 3\r\n\r\nabc",
      );
    });

    expect(seen).toHaveLength(1);
    const [parsed] = seen;
    expect(parsed?.requestLine).toEqual({
      method: "POST",
      requestTarget: "/submit",
      httpVersion: "1.1",
    });
    expect(parsed?.headers.get("host")).toBe("local");
    expect(decodeToString(parsed?.body ?? new Uint8Array(0))).toBe("abc");
  });

  it("reassembles a request delivered in fragments", async () => {
    const targets: string[] = [];
    const handler: RequestHandler = (request, writer) => {
      targets.push(request.requestLine.requestTarget);
      writer.setBody(request.body ?? "");
    };

    await withServer(handler, {}, async ({ request }) => {
      const res = await request(
        [
          "PO",
          "ST /frag HTTP/1.1\r\nHo",
          "st: local\r\nContent-Le",
          "ngth: 4\r\n\r\nbo",
          "dy",
        ],
        { fragments: true },
      );
      expect(res.endsWith("\r\n\r\nbody")).toBe(true);
    });

    expect(targets).toEqual(["/frag"]);
  });

  it("serves a request whose client half-closes after sending", async () => {
    await withServer(helloHandler, {}, async ({ request }) => {
      const res = await request("GET / HTTP/1.1\r\n\r\n", {
        endAfterSend: true,
      });
      expect(res.startsWith("HTTP/1.1 200 OK\r\n")).toBe(true);
    });
  });

  it.each([
    ["a two-part request line", "GET /\r\n\r\n"],
    ["an unsupported version", "GET / HTTP/1.0\r\n\r\n"],
    ["an unsupported method", "BREW /pot HTTP/1.1\r\n\r\n"],
    ["whitespace before a header colon", "GET / HTTP/1.1\r\nHost : x\r\n\r\n"],
    [
      "chunked request framing",
      "POST / HTTP/1.1\r\nTransfer-Encoding: chunked\r\n\r\n0\r\n\r\n",
    ],
    [
      "a non-numeric Content-Length",
      "POST / HTTP/1.1\r\nContent-Length: ten\r\n\r\n",
    ],
  ])("answers %s with a bare 400", async (_name, raw) => {
    const handler = vi.fn<RequestHandler>();

    await withServer(handler, {}, async ({ request }) => {
      expect(await request(raw)).toBe(BAD_REQUEST);
    });

    expect(handler).not.toHaveBeenCalled();
  });

  it("answers 400 when the client closes mid-request", async () => {
    await withServer(helloHandler, {}, async ({ request, entries }) => {
      const res = await request("GET / HTTP/1.1\r\nHost: local\r\n", {
        endAfterSend: true,
      });
      expect(res).toBe(BAD_REQUEST);
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        method: "-",
        target: "-",
        status: 400,
        error: "Connection closed before request was complete",
      });
    });
  });

  it("answers 400 when the request does not arrive in time", async () => {
    await withServer(
      helloHandler,
      { requestTimeoutMs: 30 },
      async ({ request, entries }) => {
        expect(await request("GET / HTTP/1.1\r\n")).toBe(BAD_REQUEST);
        expect(entries[0]?.error).toBe("Request timed out before completion");
      },
    );
  });

  it("applies the configured body limit", async () => {
    await withServer(
      helloHandler,
      { maxBodySize: 4 },
      async ({ request, entries }) => {
        const res = await request(
          "POST / HTTP/1.1\r\nContent-Length: 5\r\n\r\nhello",
        );
        expect(res).toBe(BAD_REQUEST);
        expect(entries[0]?.error).toBe(
          "Content-Length 5 exceeds the 4 byte limit",
        );
      },
    );
  });

  it("streams a chunked response using the configured chunk size", async () => {
    const handler: RequestHandler = async (_request, writer) => {
      writer.headers.set("transfer-encoding", "chunked");
      await writer.writeStatusLine(200);
      await writer.writeHeaders(getDefaultHeaders(0));
      await writer.writeChunkedBody(fromString("hello world"));
    };

    await withServer(handler, { chunkSize: 4 }, async ({ request }) => {
      const res = await request("GET /stream HTTP/1.1\r\n\r\n");
      expect(res).toBe(
        "HTTP/1.1 200 OK\r\nConnection: close\r\nContent-Type: text/plain\r\nTransfer-Encoding: chunked\r\n\r\n" +
          "4\r\nhell\r\n4\r\no wo\r\n3\r\nrld\r\n0\r\n\r\n",
      );
    });
  });

  it("emits a request event and an access log line", async () => {
    await withServer(
      helloHandler,
      { quiet: false },
      async ({ request, entries, records }) => {
        await request("GET /hello HTTP/1.1\r\n\r\n");

        expect(entries).toHaveLength(1);
        expect(entries[0]).toMatchObject({
          remoteHost: "in-memory",
          method: "GET",
          target: "/hello",
          status: 200,
        });
        expect(entries[0]?.error).toBeUndefined();

        const info = records.filter((r) => r.level === "info");
        expect(info).toHaveLength(1);
        expect(info[0]?.message).toMatch(
          /^in-memory\tGET\t\/hello\t200\t\d+\.\dms$/,
        );
      },
    );
  });

  it("keeps access logging out of the logger in quiet mode", async () => {
    await withServer(helloHandler, {}, async ({ request, entries, records }) => {
      await request("GET / HTTP/1.1\r\n\r\n");

      expect(entries).toHaveLength(1);
      expect(records.filter((r) => r.level === "info")).toEqual([]);
    });
  });

  it("logs a failing handler and closes without a response", async () => {
    const handler: RequestHandler = (_request, writer) => {
      writer.status = 404;
      throw new Error("handler exploded");
    };

    await withServer(handler, {}, async ({ request, entries, records }) => {
      expect(await request("GET /boom HTTP/1.1\r\n\r\n")).toBe("");

      expect(records).toContainEqual({
        level: "error",
        message: "Failed to respond to GET /boom:",
        args: ["handler exploded"],
      });
      expect(entries[0]).toMatchObject({
        method: "GET",
        target: "/boom",
        status: 500,
        error: "handler exploded",
      });
    });
  });

  it("keeps what a handler wrote before failing", async () => {
    const handler: RequestHandler = async (_request, writer) => {
      await writer.writeStatusLine(200);
      throw new Error("late failure");
    };

    await withServer(handler, {}, async ({ request, entries }) => {
      expect(await request("GET / HTTP/1.1\r\n\r\n")).toBe(
        "HTTP/1.1 200 OK\r\n",
      );
      expect(entries[0]).toMatchObject({ status: 200, error: "late failure" });
    });
  });

  it("drops connections the factory cannot wrap", async () => {
    await withServer(
      helloHandler,
      {},
      async ({ socketFactory, records, request }) => {
        socketFactory.acceptRaw({ not: "a socket" });

        expect(records).toContainEqual({
          level: "warn",
          message: "Dropping connection:",
          args: ["Expected an InMemoryTcpSocket instance"],
        });
        expect(await request("GET / HTTP/1.1\r\n\r\n")).toContain("hello");
      },
    );
  });

  it("keeps serving after a listener error", async () => {
    await withServer(helloHandler, {}, async (ctx) => {
      const errors: Error[] = [];
      ctx.server.on("error", (err) => errors.push(err));

      ctx.socketFactory.emitServerError(new Error("accept failed"));

      expect(errors.map((err) => err.message)).toEqual(["accept failed"]);
      expect(ctx.records).toContainEqual({
        level: "warn",
        message: "TCP server error:",
        args: ["accept failed"],
      });
      expect(await ctx.request("GET / HTTP/1.1\r\n\r\n")).toContain("hello");
    });
  });

  it("finishes in-flight requests after close()", async () => {
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let markStarted = () => {};
    const started = new Promise<void>((resolve) => {
      markStarted = resolve;
    });

    const handler: RequestHandler = async (_request, writer) => {
      markStarted();
      await gate;
      writer.setBody("late");
    };

    await withServer(handler, {}, async ({ server, request }) => {
      const pending = request("GET / HTTP/1.1\r\n\r\n");
      await started;

      await server.close();
      expect(server.isClosed).toBe(true);
      release();

      const res = await pending;
      expect(res.endsWith("\r\n\r\nlate")).toBe(true);
    });
  });
});

class FailingTcpServer implements ITcpServer {
  private errorCb: ((err: Error) => void) | null = null;

  listen(_port: number, _host?: string, _callback?: () => void): void {
    queueMicrotask(() => {
      this.errorCb?.(new Error("bind failed"));
    });
  }

  address(): { port: number } | null {
    return null;
  }

  onConnection(_cb: (socket: unknown) => void): void {}

  onError(cb: (err: Error) => void): void {
    this.errorCb = cb;
  }

  close(callback?: () => void): void {
    callback?.();
  }
}

class DelayedCloseTcpServer implements ITcpServer {
  constructor(private readonly onCloseDone: () => void) {}

  listen(_port: number, _host?: string, callback?: () => void): void {
    queueMicrotask(() => callback?.());
  }

  address(): { port: number } | null {
    return { port: 43210 };
  }

  onConnection(_cb: (socket: unknown) => void): void {}

  onError(_cb: (err: Error) => void): void {}

  close(callback?: () => void): void {
    setTimeout(() => {
      this.onCloseDone();
      callback?.();
    }, 20);
  }
}

class StubSocketFactory implements ISocketFactory {
  constructor(private readonly server: ITcpServer) {}

  createTcpServer(): ITcpServer {
    return this.server;
  }

  wrapTcpSocket(_socket: unknown): ITcpSocket {
    throw new Error("not used");
  }
}

function lifecycleServer(socketFactory: ISocketFactory): HttpServer {
  return new HttpServer({
    socketFactory,
    logger: recordingLogger().logger,
    handler: helloHandler,
    config: { ...defaultConfig(), quiet: true },
  });
}

describe("HttpServer lifecycle", () => {
  it("refuses a chunk size below one byte", () => {
    expect(
      () =>
        new HttpServer({
          socketFactory: new InMemorySocketFactory(),
          logger: recordingLogger().logger,
          handler: helloHandler,
          config: { ...defaultConfig(), chunkSize: 0 },
        }),
    ).toThrow("chunkSize must be a positive integer, got 0");
  });

  it("rejects start() on listen errors", async () => {
    const server = lifecycleServer(new StubSocketFactory(new FailingTcpServer()));

    await expect(server.start()).rejects.toThrow("bind failed");
  });

  it("resolves start() with the bound port", async () => {
    const server = lifecycleServer(
      new StubSocketFactory(new DelayedCloseTcpServer(() => {})),
    );
    const listening: number[] = [];
    server.on("listening", (port) => listening.push(port));

    expect(await server.start()).toBe(43210);
    expect(listening).toEqual([43210]);
    await server.close();
  });

  it("refuses to start twice", async () => {
    const server = lifecycleServer(
      new StubSocketFactory(new DelayedCloseTcpServer(() => {})),
    );

    const first = server.start();
    await expect(server.start()).rejects.toThrow("Server is already started");
    await first;
    await server.close();
  });

  it("waits for the listener to close before resolving close()", async () => {
    let closeFinished = false;
    const server = lifecycleServer(
      new StubSocketFactory(
        new DelayedCloseTcpServer(() => {
          closeFinished = true;
        }),
      ),
    );

    await server.start();
    const closing = server.close();
    await Promise.resolve();
    expect(closeFinished).toBe(false);
    await closing;
    expect(closeFinished).toBe(true);
  });

  it("treats repeated close() calls as one", async () => {
    const server = lifecycleServer(
      new StubSocketFactory(new DelayedCloseTcpServer(() => {})),
    );
    const onClose = vi.fn();
    server.on("close", onClose);

    await server.start();
    await Promise.all([server.close(), server.close()]);
    await server.close();

    expect(onClose).toHaveBeenCalledTimes(1);
    await expect(server.start()).rejects.toThrow("Server is closed");
  });
});
