export interface ServerConfig {
  /** Port to listen on. Default: 42069 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Suppress access logging. Default: false */
  quiet: boolean;
  /** Max time allowed for receiving a full HTTP request. Default: 5000ms */
  requestTimeoutMs: number;
  /** Max request-line length, terminator excluded. Default: 8KB */
  maxStartLineSize: number;
  /** Max length of a single header line. Default: 8KB */
  maxHeaderLineSize: number;
  /** Max declared Content-Length accepted. Default: 10MB */
  maxBodySize: number;
  /** Max bytes per chunk in chunked responses. Default: 1024 */
  chunkSize: number;
}

export function defaultConfig(): ServerConfig {
  return {
    port: 42069,
    host: "127.0.0.1",
    quiet: false,
    requestTimeoutMs: 5000,
    maxStartLineSize: 8 * 1024,
    maxHeaderLineSize: 8 * 1024,
    maxBodySize: 10 * 1024 * 1024,
    chunkSize: 1024,
  };
}

/** Reject values the server cannot run with. */
export function validateConfig(config: ServerConfig): void {
  if (!Number.isInteger(config.chunkSize) || config.chunkSize < 1) {
    throw new RangeError(
      `chunkSize must be a positive integer, got ${config.chunkSize}`,
    );
  }
}
