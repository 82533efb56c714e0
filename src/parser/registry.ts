import { BorshCoder, BN } from "@coral-xyz/anchor";
import type { Idl } from "@coral-xyz/anchor";
import type { IdlDefinedFields, IdlField, IdlType, IdlTypeDef } from "@coral-xyz/anchor/dist/cjs/idl.js";
import { PublicKey } from "@solana/web3.js";
import { createHash } from "crypto";
import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { DecodeError, InvalidConfigurationError, errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";
import {
  EVENT_FIELDS,
  EventName,
  FieldRecord,
  FieldValue,
  ProgramEvent,
  isEventName,
} from "./types.js";

const logger = createChildLogger("registry");

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_IDL_PATH = join(__dirname, "../../idl/drift.json");

export const DISCRIMINATOR_SIZE = 8;

const SMALL_INTS: Record<string, number> = {
  u8: 1, i8: 1, u16: 2, i16: 2, u32: 4, i32: 4, f32: 4, f64: 8,
};
const BIG_INTS: Record<string, number> = {
  u64: 8, i64: 8, u128: 16, i128: 16,
};

interface RegistryEntry {
  name: EventName;
  fields: IdlField[];
}

interface EnumVariants {
  // IDL variant name -> property the borsh layout uses, and back
  toLayoutKey: Map<string, string>;
  fromLayoutKey: Map<string, string>;
}

/**
 * Anchor event discriminator: first 8 bytes of sha256("event:<Name>")
 */
export function eventDiscriminator(name: string): Buffer {
  return createHash("sha256").update(`event:${name}`).digest().subarray(0, DISCRIMINATOR_SIZE);
}

function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}

function isNamedFields(fields: IdlDefinedFields | undefined): fields is IdlField[] {
  return Array.isArray(fields) && fields.every((f) => typeof f === "object" && f !== null && "name" in f);
}

let bundledIdl: Idl | undefined;

function readIdl(path: string): Idl {
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new InvalidConfigurationError(`Cannot read IDL at ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

function loadBundledIdl(): Idl {
  bundledIdl ??= readIdl(DEFAULT_IDL_PATH);
  return bundledIdl;
}

function forEachDefined(value: unknown, visit: (name: string) => void): void {
  if (Array.isArray(value)) {
    value.forEach((item: unknown) => forEachDefined(item, visit));
    return;
  }
  if (typeof value !== "object" || value === null) return;
  const defined: unknown = Reflect.get(value, "defined");
  const name: unknown =
    typeof defined === "object" && defined !== null ? Reflect.get(defined, "name") : defined;
  if (typeof name === "string") visit(name);
  Object.values(value).forEach((item: unknown) => forEachDefined(item, visit));
}

// Docs dropped and object keys sorted
function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (key: string, item: unknown) => {
    if (key === "docs") return undefined;
    if (typeof item === "object" && item !== null && !Array.isArray(item)) {
      return Object.fromEntries(Object.entries(item).sort(([a], [b]) => a.localeCompare(b)));
    }
    return item;
  });
}

/**
 * Layout of the type named `name` together with every type it references,
 * in a form that compares equal across IDL files.
 */
export function layoutSignature(idl: Idl, name: string): string {
  const types = new Map((idl.types ?? []).map((t) => [t.name, t]));
  const reached = new Map<string, unknown>();
  const visit = (typeName: string): void => {
    if (reached.has(typeName)) return;
    const typeDef = types.get(typeName);
    reached.set(typeName, typeDef ? typeDef.type : null);
    if (typeDef) forEachDefined(typeDef.type, visit);
  };
  visit(name);
  return canonicalJson([...reached.entries()].sort(([a], [b]) => a.localeCompare(b)));
}

function isFieldRecord(value: FieldValue): value is FieldRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof PublicKey) &&
    !(value instanceof Uint8Array)
  );
}

/**
 * Discriminant -> decoder lookup built from an Anchor IDL.
 *
 * Borsh layouts come from the IDL through Anchor's BorshCoder; this class adds
 * the discriminant table, strict length checking and the conversion of
 * Anchor's raw output (BN, Buffer, enum objects) into plain event values.
 *
 * The typed event model mirrors the bundled IDL. Another IDL may change the
 * program address, discriminators and unmodelled events, but the layout of
 * every modelled event must equal the bundled one.
 */
export class EventRegistry {
  readonly programId: string;
  private coder: BorshCoder;
  private types: Map<string, IdlTypeDef>;
  private enums = new Map<string, EnumVariants>();
  private entries = new Map<string, RegistryEntry>();

  constructor(idl: Idl, reference: Idl = loadBundledIdl()) {
    this.programId = idl.address;
    this.types = new Map((idl.types ?? []).map((t) => [t.name, t]));

    try {
      this.coder = new BorshCoder(idl);
    } catch (error) {
      throw new InvalidConfigurationError(`IDL layouts could not be built: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    for (const typeDef of this.types.values()) {
      if (typeDef.type.kind === "enum") {
        this.enums.set(typeDef.name, this.probeEnum(typeDef));
      }
    }

    for (const event of idl.events ?? []) {
      if (!isEventName(event.name)) {
        logger.debug({ eventName: event.name }, "IDL event has no typed model, not registered");
        continue;
      }
      const fields = this.eventFields(event.name);
      if (idl !== reference && layoutSignature(idl, event.name) !== layoutSignature(reference, event.name)) {
        throw new InvalidConfigurationError(
          `IDL layout for ${event.name} differs from the layout the event model is built on`
        );
      }
      const discriminator =
        Array.isArray(event.discriminator) && event.discriminator.length === DISCRIMINATOR_SIZE
          ? Buffer.from(event.discriminator)
          : eventDiscriminator(event.name);
      this.entries.set(toHex(discriminator), { name: event.name, fields });
    }

    for (const name of Object.keys(EVENT_FIELDS)) {
      if (![...this.entries.values()].some((e) => e.name === name)) {
        throw new InvalidConfigurationError(`IDL does not declare event ${name}`);
      }
    }

    logger.info(
      { programId: this.programId, idlVersion: idl.metadata?.version, events: this.eventNames },
      "Event registry loaded"
    );
  }

  static fromIdlFile(path: string = DEFAULT_IDL_PATH): EventRegistry {
    const idl = path === DEFAULT_IDL_PATH ? loadBundledIdl() : readIdl(path);
    return new EventRegistry(idl);
  }

  get eventNames(): EventName[] {
    return [...this.entries.values()].map((e) => e.name);
  }

  /**
   * Decode `payload` as the event registered under `discriminant`.
   * Returns null for unknown discriminants, throws DecodeError when the
   * discriminant is known but the bytes do not fit the layout.
   */
  resolve(discriminant: Uint8Array, payload: Uint8Array): ProgramEvent | null {
    const entry = this.entries.get(toHex(discriminant));
    if (!entry) return null;

    let raw: unknown;
    try {
      raw = this.coder.types.decode(entry.name, Buffer.from(payload));
    } catch (error) {
      throw new DecodeError(`${entry.name}: ${errorMessage(error)}`, { cause: error });
    }

    const data = this.fromStruct(entry.fields, raw);
    const consumed = this.structSize(entry.fields, data);
    if (consumed !== payload.length) {
      throw new DecodeError(
        `${entry.name}: layout spans ${consumed} bytes, payload has ${payload.length}`
      );
    }

    // Layout was checked against the bundled IDL and EVENT_FIELDS at registration
    return { type: entry.name, data } as ProgramEvent;
  }

  /**
   * Encode an event as discriminant + borsh payload (inverse of resolve)
   */
  encode(event: ProgramEvent): Buffer {
    const entry = [...this.entries.entries()].find(([, e]) => e.name === event.type);
    if (!entry) {
      throw new Error(`Event ${event.type} is not registered`);
    }
    const [hex, { fields }] = entry;
    const payload = this.coder.types.encode(event.type, this.toStruct(fields, event.data));
    return Buffer.concat([Buffer.from(hex, "hex"), payload]);
  }

  private eventFields(name: EventName): IdlField[] {
    const typeDef = this.types.get(name);
    if (!typeDef || typeDef.type.kind !== "struct" || !isNamedFields(typeDef.type.fields)) {
      throw new InvalidConfigurationError(`IDL type for event ${name} must be a struct with named fields`);
    }
    const fields = typeDef.type.fields;
    const expected = EVENT_FIELDS[name].map(String);
    const actual = fields.map((f) => f.name);
    if (expected.length !== actual.length || expected.some((f, i) => f !== actual[i])) {
      throw new InvalidConfigurationError(
        `IDL fields for ${name} do not match the event model: [${actual.join(", ")}]`
      );
    }
    fields.forEach((f) => this.assertSupported(f.type));
    return fields;
  }

  private assertSupported(type: IdlType): void {
    if (typeof type === "string") {
      if (type === "bool" || type === "string" || type === "bytes" || type === "pubkey") return;
      if (type in SMALL_INTS || type in BIG_INTS) return;
      throw new InvalidConfigurationError(`Unsupported IDL type ${type}`);
    }
    if ("option" in type) return this.assertSupported(type.option);
    if ("vec" in type) return this.assertSupported(type.vec);
    if ("array" in type) {
      if (typeof type.array[1] !== "number") {
        throw new InvalidConfigurationError("Generic array lengths are not supported");
      }
      return this.assertSupported(type.array[0]);
    }
    if ("defined" in type) {
      const typeDef = this.types.get(type.defined.name);
      if (!typeDef) throw new InvalidConfigurationError(`Undefined IDL type ${type.defined.name}`);
      if (typeDef.type.kind === "enum") return;
      if (typeDef.type.kind === "type") return this.assertSupported(typeDef.type.alias);
      if (!isNamedFields(typeDef.type.fields)) {
        throw new InvalidConfigurationError(`Tuple struct ${typeDef.name} is not supported`);
      }
      typeDef.type.fields.forEach((f) => this.assertSupported(f.type));
      return;
    }
    throw new InvalidConfigurationError(`Unsupported IDL type ${JSON.stringify(type)}`);
  }

  /**
   * Learn which property the borsh enum layout uses for each variant by
   * decoding each single-byte tag once.
   */
  private probeEnum(typeDef: IdlTypeDef): EnumVariants {
    const variants = typeDef.type.kind === "enum" ? typeDef.type.variants : [];
    const toLayoutKey = new Map<string, string>();
    const fromLayoutKey = new Map<string, string>();

    variants.forEach((variant, index) => {
      if (variant.fields && variant.fields.length > 0) {
        throw new InvalidConfigurationError(
          `Enum ${typeDef.name}::${variant.name} carries fields, only unit variants are supported`
        );
      }
      const probe: unknown = this.coder.types.decode(typeDef.name, Buffer.from([index]));
      const key = typeof probe === "object" && probe !== null ? Object.keys(probe)[0] : undefined;
      if (key === undefined) {
        throw new InvalidConfigurationError(`Enum ${typeDef.name} has no layout for variant ${variant.name}`);
      }
      toLayoutKey.set(variant.name, key);
      fromLayoutKey.set(key, variant.name);
    });

    return { toLayoutKey, fromLayoutKey };
  }

  private fromStruct(fields: IdlField[], raw: unknown): FieldRecord {
    if (typeof raw !== "object" || raw === null) {
      throw new DecodeError("Expected a struct");
    }
    const record: FieldRecord = {};
    for (const field of fields) {
      record[field.name] = this.fromValue(field.type, Reflect.get(raw, field.name));
    }
    return record;
  }

  private fromValue(type: IdlType, raw: unknown): FieldValue {
    if (typeof type === "string") {
      if (type in BIG_INTS) {
        if (!BN.isBN(raw)) throw new DecodeError(`Expected ${type}`);
        return BigInt(raw.toString());
      }
      if (type in SMALL_INTS) {
        if (typeof raw !== "number") throw new DecodeError(`Expected ${type}`);
        return raw;
      }
      switch (type) {
        case "bool":
          if (typeof raw !== "boolean") throw new DecodeError("Expected bool");
          return raw;
        case "string":
          if (typeof raw !== "string") throw new DecodeError("Expected string");
          return raw;
        case "bytes":
          if (!(raw instanceof Uint8Array)) throw new DecodeError("Expected bytes");
          return new Uint8Array(raw);
        case "pubkey":
          if (!(raw instanceof PublicKey)) throw new DecodeError("Expected pubkey");
          return raw;
      }
      throw new DecodeError(`Unsupported type ${type}`);
    }
    if ("option" in type) {
      return raw === null || raw === undefined ? null : this.fromValue(type.option, raw);
    }
    if ("vec" in type || "array" in type) {
      const inner = "vec" in type ? type.vec : type.array[0];
      if (!Array.isArray(raw)) throw new DecodeError("Expected a sequence");
      return raw.map((item: unknown) => this.fromValue(inner, item));
    }
    if ("defined" in type) {
      const typeDef = this.types.get(type.defined.name);
      if (!typeDef) throw new DecodeError(`Undefined type ${type.defined.name}`);
      switch (typeDef.type.kind) {
        case "enum": {
          const variants = this.enums.get(typeDef.name);
          const key = typeof raw === "object" && raw !== null ? Object.keys(raw)[0] : undefined;
          const name = key === undefined ? undefined : variants?.fromLayoutKey.get(key);
          if (name === undefined) throw new DecodeError(`Invalid ${typeDef.name} variant`);
          return name;
        }
        case "type":
          return this.fromValue(typeDef.type.alias, raw);
        case "struct":
          if (!isNamedFields(typeDef.type.fields)) throw new DecodeError(`Tuple struct ${typeDef.name}`);
          return this.fromStruct(typeDef.type.fields, raw);
      }
    }
    throw new DecodeError(`Unsupported type ${JSON.stringify(type)}`);
  }

  private toStruct(fields: IdlField[], record: FieldRecord): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const field of fields) {
      out[field.name] = this.toValue(field.type, record[field.name] ?? null);
    }
    return out;
  }

  private toValue(type: IdlType, value: FieldValue): unknown {
    if (typeof type === "string") {
      if (type in BIG_INTS) {
        if (typeof value !== "bigint") throw new TypeError(`Expected bigint for ${type}`);
        return new BN(value.toString());
      }
      if (type === "bytes") {
        if (!(value instanceof Uint8Array)) throw new TypeError("Expected bytes");
        return Buffer.from(value);
      }
      return value;
    }
    if ("option" in type) {
      return value === null ? null : this.toValue(type.option, value);
    }
    if ("vec" in type || "array" in type) {
      const inner = "vec" in type ? type.vec : type.array[0];
      if (!Array.isArray(value)) throw new TypeError("Expected a sequence");
      return value.map((item) => this.toValue(inner, item));
    }
    if ("defined" in type) {
      const typeDef = this.types.get(type.defined.name);
      if (!typeDef) throw new TypeError(`Undefined type ${type.defined.name}`);
      if (typeDef.type.kind === "enum") {
        const key = typeof value === "string" ? this.enums.get(typeDef.name)?.toLayoutKey.get(value) : undefined;
        if (key === undefined) throw new TypeError(`Invalid ${typeDef.name} variant ${String(value)}`);
        return { [key]: {} };
      }
      if (typeDef.type.kind === "type") return this.toValue(typeDef.type.alias, value);
      if (!isNamedFields(typeDef.type.fields) || !isFieldRecord(value)) {
        throw new TypeError(`Expected struct ${typeDef.name}`);
      }
      return this.toStruct(typeDef.type.fields, value);
    }
    throw new TypeError(`Unsupported type ${JSON.stringify(type)}`);
  }

  // Borsh size of an already decoded value
  private structSize(fields: IdlField[], record: FieldRecord): number {
    return fields.reduce((sum, f) => sum + this.valueSize(f.type, record[f.name] ?? null), 0);
  }

  private valueSize(type: IdlType, value: FieldValue): number {
    if (typeof type === "string") {
      if (type === "bool") return 1;
      if (type === "pubkey") return 32;
      if (type === "string") return 4 + Buffer.byteLength(typeof value === "string" ? value : "", "utf-8");
      if (type === "bytes") return 4 + (value instanceof Uint8Array ? value.length : 0);
      return SMALL_INTS[type] ?? BIG_INTS[type] ?? 0;
    }
    if ("option" in type) {
      return value === null ? 1 : 1 + this.valueSize(type.option, value);
    }
    if ("vec" in type || "array" in type) {
      const inner = "vec" in type ? type.vec : type.array[0];
      const items = Array.isArray(value) ? value : [];
      const prefix = "vec" in type ? 4 : 0;
      return items.reduce<number>((sum, item) => sum + this.valueSize(inner, item), prefix);
    }
    if ("defined" in type) {
      const typeDef = this.types.get(type.defined.name);
      if (!typeDef) return 0;
      if (typeDef.type.kind === "enum") return 1;
      if (typeDef.type.kind === "type") return this.valueSize(typeDef.type.alias, value);
      if (!isNamedFields(typeDef.type.fields) || !isFieldRecord(value)) return 0;
      return this.structSize(typeDef.type.fields, value);
    }
    return 0;
  }
}
