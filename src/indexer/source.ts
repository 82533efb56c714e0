import {
  Connection,
  Finality,
  PublicKey,
  SolanaJSONRPCError,
  VersionedTransactionResponse,
} from "@solana/web3.js";
import {
  SourceUnavailableError,
  UnsupportedTransactionEncodingError,
  errorMessage,
} from "../errors.js";

// JSON_RPC_SERVER_ERROR_UNSUPPORTED_TRANSACTION_VERSION
const RPC_UNSUPPORTED_TRANSACTION_VERSION = -32015;

export interface SignatureInfo {
  signature: string;
  slot: number;
  blockTime: number | null;
}

/** Transaction body reduced to what event extraction needs */
export interface RawTransaction {
  signature: string;
  slot: number;
  blockTime: number | null;
  accountKeys: string[];
  logLines: string[];
  failed: boolean;
}

/**
 * Read side of the chain the indexer depends on
 */
export interface TransactionSource {
  /**
   * Up to `limit` signatures touching `account`, newest first, stopping
   * before `until` when given.
   */
  listSignatures(account: string, limit: number, until?: string): Promise<SignatureInfo[]>;
  /** null when the node does not know the transaction (yet) */
  getTransaction(signature: string): Promise<RawTransaction | null>;
}

export class RpcTransactionSource implements TransactionSource {
  private connection: Connection;
  private commitment: Finality;

  constructor(connection: Connection, commitment: Finality = "finalized") {
    this.connection = connection;
    this.commitment = commitment;
  }

  async listSignatures(account: string, limit: number, until?: string): Promise<SignatureInfo[]> {
    try {
      const infos = await this.connection.getSignaturesForAddress(
        new PublicKey(account),
        { limit, until },
        this.commitment
      );
      return infos.map((info) => ({
        signature: info.signature,
        slot: info.slot,
        blockTime: info.blockTime ?? null,
      }));
    } catch (error) {
      throw new SourceUnavailableError(`getSignaturesForAddress failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async getTransaction(signature: string): Promise<RawTransaction | null> {
    let response: VersionedTransactionResponse | null;
    try {
      response = await this.connection.getTransaction(signature, {
        commitment: this.commitment,
        maxSupportedTransactionVersion: 0,
      });
    } catch (error) {
      if (error instanceof SolanaJSONRPCError && error.code === RPC_UNSUPPORTED_TRANSACTION_VERSION) {
        throw new UnsupportedTransactionEncodingError(error.message, { cause: error });
      }
      throw new SourceUnavailableError(`getTransaction failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response) return null;
    return toRawTransaction(signature, response);
  }
}

export function toRawTransaction(
  signature: string,
  response: VersionedTransactionResponse
): RawTransaction {
  let accountKeys: string[];
  try {
    const loaded = response.meta?.loadedAddresses;
    accountKeys = [
      ...response.transaction.message.staticAccountKeys,
      ...(loaded?.writable ?? []),
      ...(loaded?.readonly ?? []),
    ].map((key) => key.toBase58());
  } catch (error) {
    throw new UnsupportedTransactionEncodingError(
      `Transaction message could not be read: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  return {
    signature,
    slot: response.slot,
    blockTime: response.blockTime ?? null,
    accountKeys,
    logLines: response.meta?.logMessages ?? [],
    failed: Boolean(response.meta?.err),
  };
}
