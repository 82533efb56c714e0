import type { IndexedEvent } from "../parser/types.js";

/** Newest fully examined transaction for an account */
export interface AccountCursor {
  signature: string;
  slot: number;
}

/**
 * Persistence used by the indexer. Implementations must tolerate concurrent
 * calls from several accounts' pollers and from the fetches of one tick.
 */
export interface IndexerStore {
  getCursor(account: string): Promise<AccountCursor | null>;
  /**
   * Upsert. A cursor older (by slot) than the stored one is ignored.
   */
  setCursor(account: string, cursor: AccountCursor): Promise<void>;
  /**
   * Idempotent on (signature, logIndex): returns false when the event was
   * already stored.
   */
  insertEvent(record: IndexedEvent): Promise<boolean>;
}

export function eventKey(record: Pick<IndexedEvent, "signature" | "logIndex">): string {
  return `${record.signature}:${record.logIndex}`;
}
