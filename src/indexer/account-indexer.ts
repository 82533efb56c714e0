import PQueue from "p-queue";
import { IndexerError, SourceUnavailableError, errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";
import type { AccountCursor, IndexerStore } from "../db/store.js";
import type { SignatureInfo, TransactionSource } from "./source.js";
import type { ProcessedTransaction, TransactionProcessor } from "./transaction-processor.js";

const logger = createChildLogger("account-indexer");

// Signatures requested per tick; together with the poll interval this is
// the per-account throughput ceiling (pageSize / interval)
export const DEFAULT_PAGE_SIZE = 3;

export interface AccountIndexerOptions {
  source: TransactionSource;
  processor: TransactionProcessor;
  store: IndexerStore;
  pageSize?: number;
}

export interface TickResult {
  signatures: number;
  eventsIndexed: number;
  duplicates: number;
  cursor: AccountCursor | null;
}

/**
 * One indexing pass for one account: read cursor, fetch a page of newer
 * signatures, process them concurrently, persist events, then commit the
 * cursor to the newest signature of the page.
 */
export class AccountIndexer {
  private source: TransactionSource;
  private processor: TransactionProcessor;
  private store: IndexerStore;
  private pageSize: number;

  constructor(options: AccountIndexerOptions) {
    this.source = options.source;
    this.processor = options.processor;
    this.store = options.store;
    this.pageSize = options.pageSize || DEFAULT_PAGE_SIZE;
  }

  async indexOnce(account: string): Promise<TickResult> {
    const cursor = await this.store.getCursor(account);
    const signatures = await this.fetchSignatures(account, cursor);

    if (signatures.length === 0) {
      logger.debug({ account, cursor: cursor?.signature }, "No new transactions");
      return { signatures: 0, eventsIndexed: 0, duplicates: 0, cursor };
    }

    logger.info(
      { account, count: signatures.length, until: cursor?.signature },
      "Processing new signatures"
    );
    if (cursor && signatures.length === this.pageSize) {
      logger.warn(
        { account, pageSize: this.pageSize },
        "Page full, signatures between the cursor and this page will not be indexed"
      );
    }

    const queue = new PQueue({ concurrency: this.pageSize });
    const result: TickResult = { signatures: signatures.length, eventsIndexed: 0, duplicates: 0, cursor };
    const errors: unknown[] = [];

    // Completion order is arbitrary; nothing below depends on it
    for (const info of signatures) {
      queue
        .add(async () => {
          const processed = await this.processor.process(account, info.signature);
          await this.persist(info, processed, result);
        })
        .catch((error: unknown) => {
          errors.push(error);
          if (errors.length > 1) {
            logger.warn({ account, signature: info.signature, error: errorMessage(error) }, "Additional failure in tick");
            return;
          }
          // Drop fetches not started yet; in-flight ones finish
          queue.clear();
        });
    }

    await queue.onIdle();

    if (errors.length > 0) {
      logger.error(
        { account, error: errorMessage(errors[0]), failures: errors.length, cursor: cursor?.signature },
        "Tick aborted, cursor not advanced"
      );
      throw errors[0];
    }

    // Batch commit: only once the whole page is examined, to its newest entry
    const newest = signatures[0];
    const next: AccountCursor = { signature: newest.signature, slot: newest.slot };
    await this.store.setCursor(account, next);
    result.cursor = next;

    logger.debug({ account, cursor: next.signature, slot: next.slot }, "Cursor advanced");
    return result;
  }

  private async fetchSignatures(account: string, cursor: AccountCursor | null): Promise<SignatureInfo[]> {
    try {
      return await this.source.listSignatures(account, this.pageSize, cursor?.signature);
    } catch (error) {
      if (error instanceof IndexerError) throw error;
      throw new SourceUnavailableError(`Listing signatures failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async persist(info: SignatureInfo, processed: ProcessedTransaction, result: TickResult): Promise<void> {
    const blockTime = processed.blockTime ?? (info.blockTime !== null ? new Date(info.blockTime * 1000) : null);

    for (const { logIndex, event } of processed.events) {
      const inserted = await this.store.insertEvent({
        signature: processed.signature,
        slot: processed.slot ?? info.slot,
        blockTime,
        logIndex,
        event,
      });
      if (inserted) {
        result.eventsIndexed++;
        logger.info({ type: event.type, signature: processed.signature, logIndex }, "Indexed event");
      } else {
        result.duplicates++;
        logger.debug({ type: event.type, signature: processed.signature, logIndex }, "Event already stored");
      }
    }
  }
}
