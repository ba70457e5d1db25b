import { NodeSocketFactory } from "../adapters/node/node-socket.js";
import type { ServerConfig } from "../config/server-config.js";
import type { Logger } from "../logging/logger.js";
import { HttpServer, type RequestHandler } from "../server/http-server.js";

export interface NodeServerOptions {
  config: ServerConfig;
  handler: RequestHandler;
  logger?: Logger;
}

export function createNodeServer(options: NodeServerOptions): HttpServer {
  return new HttpServer({
    socketFactory: new NodeSocketFactory(),
    config: options.config,
    handler: options.handler,
    logger: options.logger,
  });
}
