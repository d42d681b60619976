import { ConversationRepository } from "@agentline/db";
import { EventLog, errorMessage } from "@agentline/core";
import { AgentServer } from "../AgentServer.js";
import { loadConfig } from "../config/ConfigLoader.js";
import type { ConfigSource } from "../config/ServerConfig.js";
import { registerShutdownSignals } from "../runtime/SignalHandlers.js";

export interface ServeArgs {
  configPath?: string;
  cli: ConfigSource;
}

export const SERVE_USAGE =
  "Usage: agentline serve [--host <host>] [--port <port>] [--config <file>] [--db <path>]\n" +
  "                       [--log-level <level>] [--quiet]";

export const parseServeArgs = (argv: string[]): ServeArgs => {
  const parsed: ServeArgs = { cli: {} };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === "--host" && next) {
      parsed.cli.host = next;
      i += 1;
      continue;
    }
    if (arg === "--port" && next) {
      const port = Number(next);
      if (!Number.isInteger(port)) {
        throw new Error(`Invalid --port: ${next}`);
      }
      parsed.cli.port = port;
      i += 1;
      continue;
    }
    if (arg === "--config" && next) {
      parsed.configPath = next;
      i += 1;
      continue;
    }
    if (arg === "--db" && next) {
      parsed.cli.storage = { dbPath: next };
      i += 1;
      continue;
    }
    if (arg === "--log-level" && next) {
      if (next !== "debug" && next !== "info" && next !== "warn" && next !== "error") {
        throw new Error(`Invalid --log-level: ${next}`);
      }
      parsed.cli.logging = { ...parsed.cli.logging, level: next };
      i += 1;
      continue;
    }
    if (arg === "--quiet") {
      parsed.cli.logging = { ...parsed.cli.logging, console: false };
      continue;
    }
    throw new Error(`Unknown option: ${arg}\n${SERVE_USAGE}`);
  }
  return parsed;
};

export class ServeCommand {
  static async run(argv: string[]): Promise<void> {
    const args = parseServeArgs(argv);
    const config = await loadConfig({ configPath: args.configPath, cli: args.cli, requireProvider: true });
    const logger = new EventLog({
      logDir: config.logging.directory,
      level: config.logging.level,
      console: config.logging.console,
    });
    const repository = await ConversationRepository.create(config.storage.dbPath);
    const server = new AgentServer({
      config,
      persistence: repository,
      logger,
      onShutdown: async () => {
        await repository.close();
        await logger.flush();
      },
    });

    try {
      await server.start();
    } catch (error) {
      await repository.close();
      await logger.flush();
      throw error;
    }

    registerShutdownSignals({
      onSignal: async (signal) => {
        logger.info("signal_received", { signal });
        await server.shutdown();
      },
      onError: (error) => {
        // eslint-disable-next-line no-console
        console.error(`Shutdown failed: ${errorMessage(error)}`);
      },
    });
  }
}
