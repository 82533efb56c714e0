import "dotenv/config";
import { PublicKey } from "@solana/web3.js";
import type { Finality } from "@solana/web3.js";
import { InvalidConfigurationError } from "./errors.js";
import { DEFAULT_IDL_PATH } from "./parser/registry.js";
import { DEFAULT_PAGE_SIZE } from "./indexer/account-indexer.js";

export const SOLANA_MAINNET_RPC = "https://api.mainnet-beta.solana.com";
export const DEFAULT_POLL_INTERVAL_S = 3;

const VALID_COMMITMENTS: Finality[] = ["confirmed", "finalized"];

/** Values as given on the command line (all optional) */
export type CliOptions = {
  accounts?: string[];
  db?: string;
  rpc?: string;
  poll?: string;
  pageSize?: string;
  programId?: string;
  idl?: string;
};

export interface IndexerConfig {
  accounts: string[];
  dbConnStr: string | null;
  dbSsl: boolean;
  dbSslVerify: boolean;
  rpcUrl: string;
  // Polling config
  pollingInterval: number; // ms
  pageSize: number;
  commitment: Finality;
  // null = take the address from the IDL
  programId: string | null;
  idlPath: string;
  logLevel: string;
}

function parseCommitment(value: string | undefined): Finality {
  const commitment = value || "finalized";
  const match = VALID_COMMITMENTS.find((c) => c === commitment);
  if (!match) {
    throw new InvalidConfigurationError(
      `Invalid INDEXER_COMMITMENT '${commitment}'. Must be one of: ${VALID_COMMITMENTS.join(", ")}`
    );
  }
  return match;
}

function parseInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidConfigurationError(`${name} must be an integer, got '${value}'`);
  }
  return parseInt(value, 10);
}

export function parseAccountList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((a) => a.trim())
    .filter((a) => a.length > 0);
}

/**
 * Merge CLI flags with the environment; environment variables win.
 */
export function loadConfig(cli: CliOptions = {}, env: NodeJS.ProcessEnv = process.env): IndexerConfig {
  const envAccounts = parseAccountList(env.INDEXER_ACCOUNTS);
  const pollSeconds = parseInteger(
    "Poll interval",
    env.INDEXER_POLL_INTERVAL || cli.poll,
    DEFAULT_POLL_INTERVAL_S
  );

  return {
    accounts: envAccounts.length > 0 ? envAccounts : cli.accounts ?? [],
    dbConnStr: env.INDEXER_DB_CONN_STR || cli.db || null,
    dbSsl: env.INDEXER_DB_SSL === "true",
    dbSslVerify: env.INDEXER_DB_SSL_VERIFY !== "false", // default: verify SSL certs
    rpcUrl: env.INDEXER_SOLANA_RPC_URL || cli.rpc || SOLANA_MAINNET_RPC,
    pollingInterval: pollSeconds * 1000,
    pageSize: parseInteger("Page size", env.INDEXER_PAGE_SIZE || cli.pageSize, DEFAULT_PAGE_SIZE),
    commitment: parseCommitment(env.INDEXER_COMMITMENT),
    programId: env.INDEXER_PROGRAM_ID || cli.programId || null,
    idlPath: env.INDEXER_IDL_PATH || cli.idl || DEFAULT_IDL_PATH,
    logLevel: env.LOG_LEVEL || "info",
  };
}

function isPublicKey(value: string): boolean {
  try {
    new PublicKey(value);
    return true;
  } catch {
    return false;
  }
}

export function validateConfig(config: IndexerConfig): void {
  if (config.accounts.length === 0) {
    throw new InvalidConfigurationError("At least one account required (--accounts or INDEXER_ACCOUNTS)");
  }

  const invalid = config.accounts.filter((a) => !isPublicKey(a));
  if (invalid.length > 0) {
    throw new InvalidConfigurationError(`Invalid account public key(s): ${invalid.join(", ")}`);
  }

  if (config.programId !== null && !isPublicKey(config.programId)) {
    throw new InvalidConfigurationError(`Invalid program id '${config.programId}'`);
  }

  if (!config.dbConnStr) {
    throw new InvalidConfigurationError("Database connection string required (--db or INDEXER_DB_CONN_STR)");
  }

  if (config.pollingInterval < 1000) {
    throw new InvalidConfigurationError("Poll interval must be at least 1 second");
  }

  if (config.pageSize < 1 || config.pageSize > 1000) {
    throw new InvalidConfigurationError("Page size must be between 1 and 1000");
  }
}

/**
 * Upper bound on signatures examined per second per account
 */
export function throughputCeiling(config: Pick<IndexerConfig, "pageSize" | "pollingInterval">): number {
  return config.pageSize / (config.pollingInterval / 1000);
}
