import { PublicKey } from "@solana/web3.js";
import { InvalidConfigurationError, errorMessage, isFatalError } from "../errors.js";
import { createChildLogger } from "../logger.js";
import type { AccountIndexer } from "./account-indexer.js";

const logger = createChildLogger("poller");

const STATS_LOG_INTERVAL_MS = 60000;

export interface PollerOptions {
  indexer: Pick<AccountIndexer, "indexOnce">;
  account: string;
  pollingInterval: number;
}

export interface PollerStats {
  ticks: number;
  failedTicks: number;
  eventsIndexed: number;
  lastSignature: string | null;
}

type TickOutcome = { fatal: false } | { fatal: true; error: unknown };

/**
 * Fixed-rate scheduler driving one account's indexing passes.
 *
 * A failed tick is logged and retried from the stored cursor on the next
 * one; only InvalidConfigurationError ends the loop.
 */
export class Poller {
  readonly account: string;
  private indexer: Pick<AccountIndexer, "indexOnce">;
  private pollingInterval: number;
  private isRunning = false;
  private inFlight: Promise<TickOutcome> | null = null;
  private wake: (() => void) | null = null;
  private stats: PollerStats = { ticks: 0, failedTicks: 0, eventsIndexed: 0, lastSignature: null };
  private lastStatsLog = Date.now();

  constructor(options: PollerOptions) {
    this.indexer = options.indexer;
    this.account = options.account;
    this.pollingInterval = options.pollingInterval;
  }

  /**
   * Resolves after stop(), rejects on a fatal error
   */
  async run(): Promise<void> {
    if (this.isRunning) {
      logger.warn({ account: this.account }, "Poller already running");
      return;
    }

    try {
      new PublicKey(this.account);
    } catch (error) {
      throw new InvalidConfigurationError(`Invalid account public key: ${this.account}`, { cause: error });
    }

    this.isRunning = true;
    logger.info({ account: this.account, pollingInterval: this.pollingInterval }, "Starting poller");

    try {
      while (this.isRunning) {
        const startedAt = Date.now();
        this.inFlight = this.tick();
        const outcome = await this.inFlight;
        this.inFlight = null;

        if (outcome.fatal) {
          logger.fatal({ account: this.account, error: errorMessage(outcome.error) }, "Poller terminated");
          throw outcome.error;
        }

        this.logStatsIfNeeded();
        await this.sleep(Math.max(0, this.pollingInterval - (Date.now() - startedAt)));
      }
    } finally {
      this.isRunning = false;
    }

    logger.info({ account: this.account, ...this.stats }, "Poller stopped");
  }

  /**
   * Stop ticking; waits for an in-flight pass so fetched events are not lost
   */
  async stop(): Promise<void> {
    this.isRunning = false;
    this.wake?.();
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  getStats(): PollerStats {
    return { ...this.stats };
  }

  private async tick(): Promise<TickOutcome> {
    this.stats.ticks++;
    logger.debug({ account: this.account, tick: this.stats.ticks }, "Tick");
    try {
      const result = await this.indexer.indexOnce(this.account);
      this.stats.eventsIndexed += result.eventsIndexed;
      if (result.cursor) {
        this.stats.lastSignature = result.cursor.signature;
      }
      return { fatal: false };
    } catch (error) {
      if (isFatalError(error)) {
        return { fatal: true, error };
      }
      this.stats.failedTicks++;
      logger.error({ account: this.account, error: errorMessage(error) }, "Error in polling loop");
      return { fatal: false };
    }
  }

  private sleep(ms: number): Promise<void> {
    if (!this.isRunning) return Promise.resolve();
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  private logStatsIfNeeded(): void {
    const now = Date.now();
    if (now - this.lastStatsLog > STATS_LOG_INTERVAL_MS) {
      logger.info({ account: this.account, ...this.stats }, "Poller stats (60s)");
      this.lastStatsLog = now;
    }
  }
}
