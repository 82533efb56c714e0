import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import type { Idl } from "@coral-xyz/anchor";
import {
  DEFAULT_IDL_PATH,
  DISCRIMINATOR_SIZE,
  EventRegistry,
  eventDiscriminator,
} from "../../../src/parser/registry.js";
import { DecodeError, InvalidConfigurationError } from "../../../src/errors.js";
import { toStorageJson } from "../../../src/utils/serialize.js";
import type { ProgramEvent } from "../../../src/parser/types.js";
import { LogScanner } from "../../../src/parser/log-scanner.js";
import {
  MAINNET_FILLER,
  MAINNET_FILL_LOG_LINE,
  MAINNET_MAKER,
  MAINNET_TAKER,
  TEST_FILLER,
  TEST_PROGRAM_ID,
  TEST_USER,
  createOrderActionRecord,
  createOrderRecord,
  fillEvent,
  getTestRegistry,
  orderEvent,
} from "../../mocks/solana.js";

function loadIdlText(): string {
  return readFileSync(DEFAULT_IDL_PATH, "utf-8");
}

function split(envelope: Buffer): [Buffer, Buffer] {
  return [envelope.subarray(0, DISCRIMINATOR_SIZE), envelope.subarray(DISCRIMINATOR_SIZE)];
}

function decodeEnvelope(envelope: Buffer): ProgramEvent | null {
  const [discriminant, payload] = split(envelope);
  return getTestRegistry().resolve(discriminant, payload);
}

describe("EventRegistry", () => {
  describe("construction", () => {
    it("should register every modelled IDL event", () => {
      const registry = getTestRegistry();

      expect(registry.programId).toBe(TEST_PROGRAM_ID.toBase58());
      expect(registry.eventNames).toEqual(["OrderActionRecord", "OrderRecord"]);
    });

    it("should derive Anchor event discriminators", () => {
      expect([...eventDiscriminator("OrderActionRecord")]).toEqual([224, 52, 67, 71, 194, 237, 109, 1]);
      expect([...eventDiscriminator("OrderRecord")]).toEqual([104, 19, 64, 56, 89, 21, 2, 90]);
    });

    it("should reject an IDL that lacks a modelled event", () => {
      const idl: Idl = JSON.parse(loadIdlText());
      const withoutOrderRecord: Idl = {
        ...idl,
        events: (idl.events ?? []).filter((e) => e.name !== "OrderRecord"),
      };

      expect(() => new EventRegistry(withoutOrderRecord)).toThrow(InvalidConfigurationError);
      expect(() => new EventRegistry(withoutOrderRecord)).toThrow("IDL does not declare event OrderRecord");
    });

    it("should reject an IDL whose event fields differ from the model", () => {
      const text = JSON.stringify(JSON.parse(loadIdlText())).replace(
        '{"name":"user","type":"pubkey"}',
        '{"name":"authority","type":"pubkey"}'
      );
      const idl: Idl = JSON.parse(text);

      expect(() => new EventRegistry(idl)).toThrow(InvalidConfigurationError);
      expect(() => new EventRegistry(idl)).toThrow("IDL fields for OrderRecord do not match the event model");
    });

    it("should reject an IDL that changes the type of an event field", () => {
      const text = JSON.stringify(JSON.parse(loadIdlText())).replace(
        '{"name":"ts","type":"i64"}',
        '{"name":"ts","type":"u32"}'
      );
      const idl: Idl = JSON.parse(text);

      expect(() => new EventRegistry(idl)).toThrow(InvalidConfigurationError);
      expect(() => new EventRegistry(idl)).toThrow(
        "IDL layout for OrderActionRecord differs from the layout the event model is built on"
      );
    });

    it("should reject an IDL that renames an enum variant used by an event", () => {
      const text = JSON.stringify(JSON.parse(loadIdlText())).replace('{"name":"Short"}', '{"name":"Sell"}');
      const idl: Idl = JSON.parse(text);

      expect(() => new EventRegistry(idl)).toThrow(InvalidConfigurationError);
      expect(() => new EventRegistry(idl)).toThrow("differs from the layout the event model is built on");
    });

    it("should accept an IDL that only changes the program address and docs", () => {
      const idl: Idl = JSON.parse(loadIdlText());
      const relocated: Idl = {
        ...idl,
        address: TEST_USER.toBase58(),
        types: (idl.types ?? []).map((t) => ({ ...t, docs: ["Relocated deployment"] })),
      };

      const registry = new EventRegistry(relocated);

      expect(registry.programId).toBe(TEST_USER.toBase58());
      expect(registry.eventNames).toEqual(["OrderActionRecord", "OrderRecord"]);
    });

    it("should reject an unreadable IDL file", () => {
      expect(() => EventRegistry.fromIdlFile("/nonexistent/idl.json")).toThrow(InvalidConfigurationError);
      expect(() => EventRegistry.fromIdlFile("/nonexistent/idl.json")).toThrow(
        "Cannot read IDL at /nonexistent/idl.json"
      );
    });
  });

  describe("resolve", () => {
    it("should decode a fill recorded on mainnet", () => {
      const event = new LogScanner(getTestRegistry()).extract(MAINNET_FILL_LOG_LINE);

      expect(event?.type).toBe("OrderActionRecord");
      if (event?.type !== "OrderActionRecord") return;
      expect(event.data.ts).toBe(1685504150n);
      expect(event.data.action).toBe("Fill");
      expect(event.data.actionExplanation).toBe("OrderFilledWithMatch");
      expect(event.data.marketIndex).toBe(1);
      expect(event.data.marketType).toBe("Perp");
      expect(event.data.filler?.toBase58()).toBe(MAINNET_FILLER);
      expect(event.data.fillerReward).toBe(1245n);
      expect(event.data.fillRecordId).toBe(586114n);
      expect(event.data.baseAssetAmountFilled).toBe(1500000n);
      expect(event.data.quoteAssetAmountFilled).toBe(41526450n);
      expect(event.data.takerFee).toBe(12458n);
      expect(event.data.makerFee).toBe(-8305n);
      expect(event.data.referrerReward).toBeNull();
      expect(event.data.quoteAssetAmountSurplus).toBeNull();
      expect(event.data.spotFulfillmentMethodFee).toBeNull();
      expect(event.data.taker?.toBase58()).toBe(MAINNET_TAKER);
      expect(event.data.takerOrderId).toBe(2171151);
      expect(event.data.takerOrderDirection).toBe("Long");
      expect(event.data.takerOrderBaseAssetAmount).toBe(2000000n);
      expect(event.data.takerOrderCumulativeBaseAssetAmountFilled).toBe(2000000n);
      expect(event.data.takerOrderCumulativeQuoteAssetAmountFilled).toBe(55367850n);
      expect(event.data.maker?.toBase58()).toBe(MAINNET_MAKER);
      expect(event.data.makerOrderId).toBe(5534875);
      expect(event.data.makerOrderDirection).toBe("Short");
      expect(event.data.makerOrderBaseAssetAmount).toBe(36100000n);
      expect(event.data.makerOrderCumulativeBaseAssetAmountFilled).toBe(1500000n);
      expect(event.data.makerOrderCumulativeQuoteAssetAmountFilled).toBe(41526450n);
      expect(event.data.oraclePrice).toBe(27681000000n);
    });

    it("should re-encode a mainnet fill to the bytes it was decoded from", () => {
      const event = new LogScanner(getTestRegistry()).extract(MAINNET_FILL_LOG_LINE);
      if (!event) throw new Error("expected an event");

      expect(`Program log: ${getTestRegistry().encode(event).toString("base64")}`).toBe(MAINNET_FILL_LOG_LINE);
    });

    it("should decode an OrderActionRecord", () => {
      const envelope = getTestRegistry().encode(fillEvent());
      expect(envelope.length).toBe(DISCRIMINATOR_SIZE + 245);

      const event = decodeEnvelope(envelope);

      expect(event?.type).toBe("OrderActionRecord");
      if (event?.type !== "OrderActionRecord") return;
      expect(event.data.action).toBe("Fill");
      expect(event.data.actionExplanation).toBe("OrderFilledWithMatch");
      expect(event.data.marketType).toBe("Perp");
      expect(event.data.makerFee).toBe(-1125n);
      expect(event.data.referrerReward).toBeNull();
      expect(event.data.takerOrderId).toBe(4101);
      expect(event.data.makerOrderDirection).toBe("Short");
      expect(event.data.filler?.toBase58()).toBe(TEST_FILLER.toBase58());
      expect(toStorageJson(event.data)).toEqual(toStorageJson(createOrderActionRecord()));
    });

    it("should decode an OrderRecord with its nested order", () => {
      const envelope = getTestRegistry().encode(orderEvent());
      expect(envelope.length).toBe(DISCRIMINATOR_SIZE + 136);

      const event = decodeEnvelope(envelope);

      expect(event?.type).toBe("OrderRecord");
      if (event?.type !== "OrderRecord") return;
      expect(event.data.user.toBase58()).toBe(TEST_USER.toBase58());
      expect(event.data.order.oraclePriceOffset).toBe(-5000);
      expect(event.data.order.status).toBe("Open");
      expect(event.data.order.postOnly).toBe(true);
      expect(event.data.order.padding).toEqual([0, 0, 0]);
      expect(toStorageJson(event.data)).toEqual(toStorageJson(createOrderRecord()));
    });

    it("should decode absent optional fields as null", () => {
      const envelope = getTestRegistry().encode(
        fillEvent({ action: "Place", filler: null, fillerReward: null, maker: null, makerOrderDirection: null })
      );

      const event = decodeEnvelope(envelope);

      if (event?.type !== "OrderActionRecord") throw new Error("expected OrderActionRecord");
      expect(event.data.action).toBe("Place");
      expect(event.data.filler).toBeNull();
      expect(event.data.fillerReward).toBeNull();
      expect(event.data.maker).toBeNull();
      expect(event.data.makerOrderDirection).toBeNull();
    });

    it("should return null for an unknown discriminant", () => {
      const registry = getTestRegistry();
      const [, payload] = split(registry.encode(fillEvent()));

      expect(registry.resolve(Buffer.alloc(DISCRIMINATOR_SIZE, 7), payload)).toBeNull();
    });

    it("should reject a truncated payload", () => {
      const envelope = getTestRegistry().encode(fillEvent());

      expect(() => decodeEnvelope(envelope.subarray(0, envelope.length - 1))).toThrow(DecodeError);
      expect(() => decodeEnvelope(envelope.subarray(0, DISCRIMINATOR_SIZE + 20))).toThrow(DecodeError);
    });

    it("should reject trailing bytes after the layout", () => {
      const envelope = Buffer.concat([getTestRegistry().encode(fillEvent()), Buffer.from([0])]);

      expect(() => decodeEnvelope(envelope)).toThrow(
        "OrderActionRecord: layout spans 245 bytes, payload has 246"
      );
    });

    it("should reject an option tag other than 0 or 1", () => {
      const envelope = Buffer.from(getTestRegistry().encode(fillEvent()));
      // ts(8) action(1) explanation(1) marketIndex(2) marketType(1), then filler's tag
      envelope[DISCRIMINATOR_SIZE + 13] = 2;

      expect(() => decodeEnvelope(envelope)).toThrow(DecodeError);
    });

    it("should reject an enum tag outside the variant list", () => {
      const envelope = Buffer.from(getTestRegistry().encode(fillEvent()));
      envelope[DISCRIMINATOR_SIZE + 8] = 99; // action

      expect(() => decodeEnvelope(envelope)).toThrow(DecodeError);
    });

    it("should reject a bool byte other than 0 or 1", () => {
      const envelope = Buffer.from(getTestRegistry().encode(orderEvent()));
      // ts(8) user(32) order: 9 x 8-byte ints, i32, u32, u16, six single bytes, then reduceOnly
      envelope[DISCRIMINATOR_SIZE + 128] = 2;

      expect(() => decodeEnvelope(envelope)).toThrow(DecodeError);
    });
  });
});
