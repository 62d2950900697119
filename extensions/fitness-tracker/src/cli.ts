#!/usr/bin/env node
import register from "../index.js";
import { resolveConfig } from "./config.js";
import { FitnessTrackerDb } from "./db.js";
import { describeError } from "./errors.js";
import { createHttpHost } from "./host.js";
import { createConsoleLogger } from "./logger.js";

function main(): void {
  const config = resolveConfig(process.env);
  const logger = createConsoleLogger({ level: config.logLevel });

  let store: FitnessTrackerDb;
  try {
    store = new FitnessTrackerDb(config.dbPath);
  } catch (err) {
    const cause = err instanceof Error ? err.cause : undefined;
    logger.error(
      cause === undefined ? describeError(err) : `${describeError(err)}: ${describeError(cause)}`,
    );
    process.exit(1);
  }
  logger.info(`Database ready at ${config.dbPath}`);

  const host = createHttpHost(config, logger);

  let shuttingDown = false;
  const shutdown = () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info("Shutting down");
    host.close().then(
      () => {
        store.close();
        process.exit(0);
      },
      (err: unknown) => {
        logger.error(`Failed to stop server: ${describeError(err)}`);
        store.close();
        process.exit(1);
      },
    );
  };

  register(host, { store, onExit: shutdown });

  host.listen().then(
    (address) => {
      logger.info(`Dashboard available at http://${config.host}:${address.port}/`);
    },
    (err: unknown) => {
      logger.error(`Cannot listen on ${config.host}:${config.port}: ${describeError(err)}`);
      store.close();
      process.exit(1);
    },
  );

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main();
