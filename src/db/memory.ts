import type { IndexedEvent } from "../parser/types.js";
import { AccountCursor, IndexerStore, eventKey } from "./store.js";

/**
 * In-process store with the same upsert and duplicate semantics as
 * PostgresStore, for tests.
 */
export class MemoryStore implements IndexerStore {
  private cursors = new Map<string, AccountCursor>();
  private events = new Map<string, IndexedEvent>();

  async getCursor(account: string): Promise<AccountCursor | null> {
    const cursor = this.cursors.get(account);
    return cursor ? { ...cursor } : null;
  }

  async setCursor(account: string, cursor: AccountCursor): Promise<void> {
    const current = this.cursors.get(account);
    if (current && current.slot > cursor.slot) return;
    this.cursors.set(account, { ...cursor });
  }

  async insertEvent(record: IndexedEvent): Promise<boolean> {
    const key = eventKey(record);
    if (this.events.has(key)) return false;
    this.events.set(key, record);
    return true;
  }

  listEvents(): IndexedEvent[] {
    return [...this.events.values()];
  }
}
