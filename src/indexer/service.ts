import { errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";
import type { AccountIndexer } from "./account-indexer.js";
import { Poller, PollerStats } from "./poller.js";

const logger = createChildLogger("service");

export interface IndexerServiceOptions {
  accounts: string[];
  indexer: Pick<AccountIndexer, "indexOnce">;
  pollingInterval: number;
}

/**
 * One poller per monitored account. The first fatal poller failure stops
 * the others and is surfaced from run(). Once stopped, the service does not
 * start again.
 */
export class IndexerService {
  private pollers: Poller[];
  private stopped = false;

  constructor(options: IndexerServiceOptions) {
    this.pollers = options.accounts.map(
      (account) =>
        new Poller({ indexer: options.indexer, account, pollingInterval: options.pollingInterval })
    );
  }

  async run(): Promise<void> {
    if (this.stopped) {
      logger.info("Service stopped before it started, pollers not spawned");
      return;
    }
    logger.info({ accounts: this.pollers.map((p) => p.account) }, "Spawning pollers");
    try {
      await Promise.all(this.pollers.map((poller) => poller.run()));
    } catch (error) {
      logger.fatal({ error: errorMessage(error) }, "Poller failed fatally, stopping service");
      await this.stop();
      throw error;
    }
  }

  async stop(): Promise<void> {
    this.stopped = true;
    await Promise.all(this.pollers.map((poller) => poller.stop()));
  }

  getStats(): Record<string, PollerStats> {
    return Object.fromEntries(this.pollers.map((p) => [p.account, p.getStats()]));
  }
}
