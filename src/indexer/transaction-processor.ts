import {
  DecodeError,
  IndexerError,
  LogParseError,
  SourceUnavailableError,
  UnsupportedTransactionEncodingError,
  errorMessage,
} from "../errors.js";
import { createChildLogger } from "../logger.js";
import { LogScanner } from "../parser/log-scanner.js";
import type { ExtractedEvent } from "../parser/types.js";
import type { RawTransaction, TransactionSource } from "./source.js";

const logger = createChildLogger("transaction-processor");

export type SkipReason = "unsupported-encoding" | "failed-on-chain" | "program-not-involved";

export interface ProcessedTransaction {
  signature: string;
  slot: number | null;
  blockTime: Date | null;
  events: ExtractedEvent[];
  skipped?: SkipReason;
}

export interface TransactionProcessorOptions {
  source: TransactionSource;
  scanner: LogScanner;
  programId: string;
}

/**
 * Fetches one transaction and extracts the program's events from its logs.
 * Performs no storage I/O; persistence and cursor moves belong to the caller.
 */
export class TransactionProcessor {
  private source: TransactionSource;
  private scanner: LogScanner;
  private programId: string;

  constructor(options: TransactionProcessorOptions) {
    this.source = options.source;
    this.scanner = options.scanner;
    this.programId = options.programId;
  }

  async process(account: string, signature: string): Promise<ProcessedTransaction> {
    let tx: RawTransaction | null;
    try {
      tx = await this.source.getTransaction(signature);
    } catch (error) {
      if (error instanceof UnsupportedTransactionEncodingError) {
        logger.warn({ account, signature, error: error.message }, "Failed deserializing transaction, skipping");
        return { signature, slot: null, blockTime: null, events: [], skipped: "unsupported-encoding" };
      }
      if (error instanceof IndexerError) throw error;
      throw new SourceUnavailableError(`Fetching ${signature} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    // Listed but not served yet; must not be treated as examined
    if (!tx) {
      throw new SourceUnavailableError(`Transaction ${signature} not found`);
    }

    const base = {
      signature,
      slot: tx.slot,
      blockTime: tx.blockTime !== null ? new Date(tx.blockTime * 1000) : null,
    };

    if (!tx.accountKeys.includes(this.programId)) {
      logger.debug({ account, signature }, "Transaction does not involve program");
      return { ...base, events: [], skipped: "program-not-involved" };
    }

    if (tx.failed) {
      logger.debug({ account, signature }, "Transaction failed on chain, no events");
      return { ...base, events: [], skipped: "failed-on-chain" };
    }

    const events: ExtractedEvent[] = [];
    tx.logLines.forEach((line, logIndex) => {
      try {
        const event = this.scanner.extract(line);
        if (event) {
          events.push({ logIndex, event });
        }
      } catch (error) {
        if (error instanceof LogParseError) {
          logger.debug({ signature, logIndex, error: error.message }, "Unparseable log payload");
        } else if (error instanceof DecodeError) {
          logger.warn({ signature, logIndex, error: error.message }, "Event payload failed to decode");
        } else {
          throw error;
        }
      }
    });

    logger.debug({ signature, eventCount: events.length }, "Parsed transaction");
    return { ...base, events };
  }
}
