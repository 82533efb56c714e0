import { describe, it, expect, vi } from "vitest";
import { IndexerService } from "../../../src/indexer/service.js";
import type { TickResult } from "../../../src/indexer/account-indexer.js";
import { InvalidConfigurationError } from "../../../src/errors.js";
import { TEST_ACCOUNT, TEST_MAKER } from "../../mocks/solana.js";

const ACCOUNT_A = TEST_ACCOUNT.toBase58();
const ACCOUNT_B = TEST_MAKER.toBase58();

function createIndexer() {
  return {
    indexOnce: vi.fn(
      async (account: string): Promise<TickResult> => ({
        signatures: 0,
        eventsIndexed: 0,
        duplicates: 0,
        cursor: { signature: `${account.slice(0, 4)}-SIG`, slot: 1 },
      })
    ),
  };
}

describe("IndexerService", () => {
  it("should run one poller per account", async () => {
    const indexer = createIndexer();
    const service = new IndexerService({ accounts: [ACCOUNT_A, ACCOUNT_B], indexer, pollingInterval: 10 });

    const running = service.run();
    await vi.waitFor(() => {
      expect(indexer.indexOnce).toHaveBeenCalledWith(ACCOUNT_A);
      expect(indexer.indexOnce).toHaveBeenCalledWith(ACCOUNT_B);
    });
    await service.stop();
    await running;

    const stats = service.getStats();
    expect(Object.keys(stats)).toEqual([ACCOUNT_A, ACCOUNT_B]);
    expect(stats[ACCOUNT_A].lastSignature).toBe(`${ACCOUNT_A.slice(0, 4)}-SIG`);
    expect(stats[ACCOUNT_B].ticks).toBeGreaterThanOrEqual(1);
  });

  it("should not start pollers when stopped before run", async () => {
    const indexer = createIndexer();
    const service = new IndexerService({ accounts: [ACCOUNT_A, ACCOUNT_B], indexer, pollingInterval: 10 });

    await service.stop();
    await service.run();

    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(indexer.indexOnce).not.toHaveBeenCalled();
    expect(service.getStats()[ACCOUNT_A].ticks).toBe(0);
  });

  it("should stop every poller and surface the first fatal error", async () => {
    const indexer = createIndexer();
    const service = new IndexerService({
      accounts: [ACCOUNT_A, "not-a-pubkey"],
      indexer,
      pollingInterval: 10,
    });

    await expect(service.run()).rejects.toThrow(InvalidConfigurationError);

    const ticksAfterStop = service.getStats()[ACCOUNT_A].ticks;
    await new Promise((resolve) => setTimeout(resolve, 40));
    expect(service.getStats()[ACCOUNT_A].ticks).toBe(ticksAfterStop);
    expect(indexer.indexOnce).not.toHaveBeenCalledWith("not-a-pubkey");
  });
});
