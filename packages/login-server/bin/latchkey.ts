#!/usr/bin/env -S node --import tsx
import { createServer } from "node:http";

import { Command, InvalidArgumentError } from "commander";
import pg, { type Pool } from "pg";

import {
  createPgQueryExecutor,
  createPostgresDataSourceFromPool,
  runPostgresMigrations,
} from "@latchkey/data-postgres";
import { createLatchkeyLogger } from "@latchkey/telemetry";

import { loadLoginServerConfig, type LoginServerConfig } from "../src/config.js";
import { createNodeRequestListener } from "../src/node-adapter.js";
import { createLoginRuntime } from "../src/runtime.js";

const program = new Command();

const readConfig = (): LoginServerConfig => {
  const config = loadLoginServerConfig(process.env);
  if (!config.ok) {
    throw new Error(config.error.message);
  }
  return config.value;
};

const createPool = (databaseUrl?: string): Pool =>
  databaseUrl ? new pg.Pool({ connectionString: databaseUrl }) : new pg.Pool();

const parsePositiveInteger = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError(`Expected a positive integer, received ${value}`);
  }
  return parsed;
};

program.name("latchkey").description("Password login service issuing challenge-derived session handles");

program
  .command("serve")
  .description("Start the HTTP login server")
  .option("--port <port>", "Port to listen on (overrides PORT)", parsePositiveInteger)
  .action(async (options: { port?: number }) => {
    const config = readConfig();
    const logger = createLatchkeyLogger({ name: "latchkey", level: config.logLevel });
    const pool = createPool(config.databaseUrl);
    const runtime = createLoginRuntime({ config, pool, logger });
    const server = createServer(createNodeRequestListener(runtime.handler, { logger }));
    const port = options.port ?? config.port;

    await new Promise<void>((resolve) => {
      server.listen(port, resolve);
    });
    logger.info("server.listening", { port, loginPath: config.loginPath });

    const shutdown = async (signal: string): Promise<void> => {
      logger.info("server.shutting_down", { signal });
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      await runtime.close();
      await pool.end();
    };

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        shutdown(signal).catch((error: unknown) => {
          logger.error("server.shutdown_failed", { error: error instanceof Error ? error.message : String(error) });
          process.exitCode = 1;
        });
      });
    }
  });

program
  .command("migrate")
  .description("Apply the Postgres schema migrations")
  .action(async () => {
    const config = readConfig();
    const logger = createLatchkeyLogger({ name: "latchkey", level: config.logLevel });
    const pool = createPool(config.databaseUrl);
    try {
      const applied = await runPostgresMigrations(createPgQueryExecutor(pool));
      logger.info("migrations.applied", { migrations: applied });
    } finally {
      await pool.end();
    }
  });

program
  .command("sweep-challenges")
  .description("Delete login challenges left behind by failed or abandoned logins")
  .requiredOption("--older-than-minutes <minutes>", "Only delete challenges issued before this age", parsePositiveInteger)
  .action(async (options: { olderThanMinutes: number }) => {
    const config = readConfig();
    const logger = createLatchkeyLogger({ name: "latchkey", level: config.logLevel });
    const pool = createPool(config.databaseUrl);
    try {
      const dataSource = createPostgresDataSourceFromPool(pool);
      const cutoff = new Date(Date.now() - options.olderThanMinutes * 60_000).toISOString();
      const removed = await dataSource.challengeStore.deleteIssuedBefore(cutoff);
      logger.info("challenges.swept", { cutoff, removed });
    } finally {
      await pool.end();
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
