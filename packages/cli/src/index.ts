import {
  createNodeServer,
  defaultConfig,
  filteredLogger,
  type Logger,
  prefixedLogger,
  type ServerConfig,
} from "@framewire/engine";
import { type CliCommand, CliUsageError, HELP_TEXT, parseArgs } from "./args.js";
import { demoHandler } from "./demo-handler.js";
import { createDumpHandler } from "./dump-handler.js";
import { readVersion } from "./version.js";

function readCommand(): CliCommand {
  try {
    return parseArgs(process.argv.slice(2), process.env);
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(err.message);
      console.log(HELP_TEXT);
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const command = readCommand();

  if (command.kind === "help") {
    console.log(HELP_TEXT);
    return;
  }
  if (command.kind === "version") {
    console.log(readVersion());
    return;
  }

  const base = prefixedLogger("framewire");
  const logger: Logger = command.quiet ? filteredLogger("warn", base) : base;

  const config: ServerConfig = {
    ...defaultConfig(),
    port: command.port,
    host: command.host,
    quiet: command.quiet,
  };

  const handler = command.dump
    ? createDumpHandler((text) => console.log(text))
    : demoHandler;
  const server = createNodeServer({ config, handler, logger });
  const port = await server.start();

  const url = `http://${config.host === "0.0.0.0" ? "localhost" : config.host}:${port}`;
  console.log(`\n  framewire listening\n`);
  console.log(`  Local:   ${url}`);
  if (config.host === "0.0.0.0") {
    console.log(`  Network: http://0.0.0.0:${port}`);
  }
  console.log();

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    await server.close();
    logger.info("Server gracefully stopped");
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
