import { defaultConfig } from "@framewire/engine";

export type CliCommand =
  | {
      kind: "serve";
      port: number;
      host: string;
      quiet: boolean;
      dump: boolean;
    }
  | { kind: "help" }
  | { kind: "version" };

/** Bad command-line input; the entry point prints it with the help text. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const HELP_TEXT = `
framewire - HTTP/1.1 over raw TCP

Usage: framewire [options]

Options:
  --port, -p <port>    Port to listen on (default: 42069, env: PORT)
  --host, -H <host>    Host to bind (default: 127.0.0.1, env: HOST)
  --quiet, -q          Suppress request logging
  --dump, -d           Print each parsed request and answer OK
  --version, -v        Show version
  --help, -h           Show this help
`;

function parsePort(value: string): number {
  const port = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (Number.isNaN(port) || port > 65535) {
    throw new CliUsageError(`Invalid port number: ${value}`);
  }
  return port;
}

/**
 * Environment variables seed the defaults; flags win over both.
 * `--help` and `--version` short-circuit the remaining arguments.
 */
export function parseArgs(
  args: readonly string[],
  env: Record<string, string | undefined> = {},
): CliCommand {
  const defaults = defaultConfig();
  let port = env.PORT ? parsePort(env.PORT) : defaults.port;
  let host = env.HOST || defaults.host;
  let quiet = false;
  let dump = false;

  const valueFor = (flag: string, index: number): string => {
    const value = args[index];
    if (value === undefined || value.startsWith("-")) {
      throw new CliUsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--port" || arg === "-p") {
      port = parsePort(valueFor(arg, ++i));
    } else if (arg === "--host" || arg === "-H") {
      host = valueFor(arg, ++i);
    } else if (arg === "--quiet" || arg === "-q") {
      quiet = true;
    } else if (arg === "--dump" || arg === "-d") {
      dump = true;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return { kind: "serve", port, host, quiet, dump };
}
