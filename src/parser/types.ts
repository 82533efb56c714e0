import type { PublicKey } from "@solana/web3.js";

// Unit enums from the IDL, carried as their variant names
export type OrderAction = "Place" | "Cancel" | "Fill" | "Trigger" | "Expire";

export type OrderActionExplanation =
  | "None"
  | "InsufficientFreeCollateral"
  | "OraclePriceBreachedLimitPrice"
  | "MarketOrderFilledToLimitPrice"
  | "OrderExpired"
  | "Liquidation"
  | "OrderFilledWithAMM"
  | "OrderFilledWithAMMJit"
  | "OrderFilledWithMatch"
  | "OrderFilledWithMatchJit"
  | "MarketExpired"
  | "RiskingIncreasingOrder"
  | "ReduceOnlyOrderIncreasedPosition"
  | "OrderFillWithSerum"
  | "NoBorrowLiquidity"
  | "OrderFillWithPhoenix"
  | "OrderFilledWithAMMJitLPSplit"
  | "OrderFilledWithLPJit"
  | "DeriskLp";

export type MarketType = "Spot" | "Perp";
export type PositionDirection = "Long" | "Short";
export type OrderStatus = "Init" | "Open" | "Filled" | "Canceled";
export type OrderType = "Market" | "Limit" | "TriggerMarket" | "TriggerLimit" | "Oracle";
export type OrderTriggerCondition = "Above" | "Below" | "TriggeredAbove" | "TriggeredBelow";

// Event layouts as declared in the IDL. Kept as type aliases: interfaces
// are not assignable to FieldRecord.
export type OrderActionRecord = {
  ts: bigint;                     // i64 unix seconds
  action: OrderAction;
  actionExplanation: OrderActionExplanation;
  marketIndex: number;            // u16
  marketType: MarketType;
  filler: PublicKey | null;
  fillerReward: bigint | null;
  fillRecordId: bigint | null;
  baseAssetAmountFilled: bigint | null;
  quoteAssetAmountFilled: bigint | null;
  takerFee: bigint | null;
  makerFee: bigint | null;        // i64, negative = rebate
  referrerReward: number | null;  // u32
  quoteAssetAmountSurplus: bigint | null;
  spotFulfillmentMethodFee: bigint | null;
  taker: PublicKey | null;
  takerOrderId: number | null;    // u32
  takerOrderDirection: PositionDirection | null;
  takerOrderBaseAssetAmount: bigint | null;
  takerOrderCumulativeBaseAssetAmountFilled: bigint | null;
  takerOrderCumulativeQuoteAssetAmountFilled: bigint | null;
  maker: PublicKey | null;
  makerOrderId: number | null;    // u32
  makerOrderDirection: PositionDirection | null;
  makerOrderBaseAssetAmount: bigint | null;
  makerOrderCumulativeBaseAssetAmountFilled: bigint | null;
  makerOrderCumulativeQuoteAssetAmountFilled: bigint | null;
  oraclePrice: bigint;            // i64
};

export type Order = {
  slot: bigint;
  price: bigint;
  baseAssetAmount: bigint;
  baseAssetAmountFilled: bigint;
  quoteAssetAmountFilled: bigint;
  triggerPrice: bigint;
  auctionStartPrice: bigint;      // i64
  auctionEndPrice: bigint;        // i64
  maxTs: bigint;                  // i64
  oraclePriceOffset: number;      // i32
  orderId: number;                // u32
  marketIndex: number;            // u16
  status: OrderStatus;
  orderType: OrderType;
  marketType: MarketType;
  userOrderId: number;            // u8
  existingPositionDirection: PositionDirection;
  direction: PositionDirection;
  reduceOnly: boolean;
  postOnly: boolean;
  immediateOrCancel: boolean;
  triggerCondition: OrderTriggerCondition;
  auctionDuration: number;        // u8
  padding: number[];              // [u8; 3]
};

export type OrderRecord = {
  ts: bigint;
  user: PublicKey;
  order: Order;
};

/** Event kinds the indexer understands, keyed by IDL event name */
export interface EventKinds {
  OrderActionRecord: OrderActionRecord;
  OrderRecord: OrderRecord;
}

export type EventName = keyof EventKinds;

export type ProgramEvent = {
  [K in EventName]: { type: K; data: EventKinds[K] };
}[EventName];

/**
 * Top-level field names per event, checked against the IDL when the
 * registry is built
 */
export const EVENT_FIELDS: { [K in EventName]: ReadonlyArray<keyof EventKinds[K]> } = {
  OrderActionRecord: [
    "ts",
    "action",
    "actionExplanation",
    "marketIndex",
    "marketType",
    "filler",
    "fillerReward",
    "fillRecordId",
    "baseAssetAmountFilled",
    "quoteAssetAmountFilled",
    "takerFee",
    "makerFee",
    "referrerReward",
    "quoteAssetAmountSurplus",
    "spotFulfillmentMethodFee",
    "taker",
    "takerOrderId",
    "takerOrderDirection",
    "takerOrderBaseAssetAmount",
    "takerOrderCumulativeBaseAssetAmountFilled",
    "takerOrderCumulativeQuoteAssetAmountFilled",
    "maker",
    "makerOrderId",
    "makerOrderDirection",
    "makerOrderBaseAssetAmount",
    "makerOrderCumulativeBaseAssetAmountFilled",
    "makerOrderCumulativeQuoteAssetAmountFilled",
    "oraclePrice",
  ],
  OrderRecord: ["ts", "user", "order"],
};

export function isEventName(name: string): name is EventName {
  return Object.prototype.hasOwnProperty.call(EVENT_FIELDS, name);
}

/**
 * Generic decoded value, before it is viewed through an event interface
 */
export type FieldValue =
  | boolean
  | number
  | bigint
  | string
  | PublicKey
  | Uint8Array
  | null
  | FieldValue[]
  | FieldRecord;

export interface FieldRecord {
  [field: string]: FieldValue;
}

/** Event as extracted from one log line of a transaction */
export interface ExtractedEvent {
  logIndex: number;
  event: ProgramEvent;
}

/** Event plus the transaction context it was found in, as persisted */
export interface IndexedEvent extends ExtractedEvent {
  signature: string;
  slot: number;
  blockTime: Date | null;
}
