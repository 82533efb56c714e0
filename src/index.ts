#!/usr/bin/env node
import { Command } from "commander";
import { Connection } from "@solana/web3.js";
import { CliOptions, IndexerConfig, loadConfig, parseAccountList, throughputCeiling, validateConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { createPool, PostgresStore } from "./db/postgres.js";
import { EventRegistry } from "./parser/registry.js";
import { LogScanner } from "./parser/log-scanner.js";
import { RpcTransactionSource } from "./indexer/source.js";
import { TransactionProcessor } from "./indexer/transaction-processor.js";
import { AccountIndexer } from "./indexer/account-indexer.js";
import { IndexerService } from "./indexer/service.js";

const program = new Command()
  .name("drift-event-indexer")
  .description("Drift account indexing service: polls account history and stores program events")
  .option("--accounts <list>", "comma separated accounts to monitor", parseAccountList)
  .option("--db <dsn>", "PostgreSQL connection string")
  .option("--rpc <url>", "Solana RPC endpoint")
  .option("--poll <seconds>", "polling interval in seconds")
  .option("--page-size <n>", "signatures fetched per account per tick")
  .option("--program-id <pubkey>", "program whose events are indexed (default: IDL address)")
  .option("--idl <path>", "Anchor IDL describing the program events");

async function main() {
  program.parse();

  let config: IndexerConfig;
  try {
    config = loadConfig(program.opts<CliOptions>());
    validateConfig(config);
  } catch (error) {
    logger.fatal({ error: errorMessage(error) }, "Configuration validation failed");
    process.exit(1);
  }

  // Installed before startup I/O so an early signal is not lost
  let stopping = false;
  let service: IndexerService | undefined;
  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutdown signal received");
    stopping = true;
    service?.stop().catch((error: unknown) => {
      logger.error({ error: errorMessage(error) }, "Error while stopping pollers");
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  const registry = EventRegistry.fromIdlFile(config.idlPath);
  const programId = config.programId ?? registry.programId;
  if (programId !== registry.programId) {
    logger.warn(
      { idlProgramId: registry.programId, configProgramId: programId },
      "IDL program ID mismatch - events may fail to parse"
    );
  }

  logger.info(
    {
      programId,
      rpcUrl: config.rpcUrl,
      accounts: config.accounts,
      pollingInterval: config.pollingInterval,
      pageSize: config.pageSize,
      maxSignaturesPerSecond: throughputCeiling(config),
    },
    "Starting Drift event indexer"
  );

  const pool = createPool({
    connectionString: config.dbConnStr ?? "",
    ssl: config.dbSsl,
    sslVerify: config.dbSslVerify,
  });
  const store = new PostgresStore(pool);
  await store.ensureSchema();

  const connection = new Connection(config.rpcUrl, config.commitment);
  const source = new RpcTransactionSource(connection, config.commitment);
  const processor = new TransactionProcessor({
    source,
    scanner: new LogScanner(registry),
    programId,
  });
  const indexer = new AccountIndexer({ source, processor, store, pageSize: config.pageSize });
  service = new IndexerService({
    accounts: config.accounts,
    indexer,
    pollingInterval: config.pollingInterval,
  });
  if (stopping) {
    logger.info("Stopped before pollers started");
    await pool.end();
    process.exit(0);
  }

  try {
    await service.run();
  } catch (error) {
    logger.fatal({ error: errorMessage(error), stats: service.getStats() }, "Indexer terminated");
    await pool.end();
    process.exit(1);
  }

  await pool.end();
  logger.info({ stats: service.getStats() }, "Shutdown complete");
  process.exit(0);
}

main().catch((error) => {
  logger.fatal({ error: errorMessage(error) }, "Unhandled error");
  process.exit(1);
});
