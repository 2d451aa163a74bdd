/**
 * Value system - the five tagged operand types
 *
 * Every value carries a `kind` tag and checked accessors. An accessor
 * returns the value itself when the tag matches and null otherwise, so
 * callers branch on the result instead of reading a field blindly.
 */

import { RuntimeFault } from './errors.js';
import type { AllocationTracker, ByteBuffer, SlotBuffer } from './tracker.js';
import { countScalars, decodeUtf8, encodeUtf8 } from './utf8.js';

export type ValueKind = 'integer' | 'float' | 'boolean' | 'text' | 'list';

export type Value = IntegerValue | FloatValue | BooleanValue | TextValue | ListValue;

/**
 * Base class for all values
 */
abstract class BaseValue {
  abstract readonly kind: ValueKind;

  asInteger(): IntegerValue | null { return null; }
  asFloat(): FloatValue | null { return null; }
  asBoolean(): BooleanValue | null { return null; }
  asText(): TextValue | null { return null; }
  asList(): ListValue | null { return null; }

  /** Float-promoted numeric value, null for non-numeric values */
  numericValue(): number | null { return null; }
}

/**
 * 64-bit signed integer
 */
export class IntegerValue extends BaseValue {
  readonly kind = 'integer' as const;

  constructor(public readonly value: bigint) {
    super();
  }

  asInteger(): IntegerValue { return this; }

  numericValue(): number {
    return Number(this.value);
  }
}

/**
 * 64-bit IEEE-754 float
 */
export class FloatValue extends BaseValue {
  readonly kind = 'float' as const;

  constructor(public readonly value: number) {
    super();
  }

  asFloat(): FloatValue { return this; }

  numericValue(): number {
    return this.value;
  }
}

export class BooleanValue extends BaseValue {
  readonly kind = 'boolean' as const;

  constructor(public readonly value: boolean) {
    super();
  }

  asBoolean(): BooleanValue { return this; }
}

export type TextOwnership = 'borrowed' | 'owned';

type TextStorage =
  | { ownership: 'borrowed'; bytes: Uint8Array }
  | { ownership: 'owned'; buffer: ByteBuffer; byteLength: number };

/**
 * Immutable UTF-8 text.
 *
 * Borrowed text wraps a literal handed in by the driver. Owned text is a
 * view into a tracked buffer and becomes unreadable once that buffer is
 * released.
 */
export class TextValue extends BaseValue {
  readonly kind = 'text' as const;

  private constructor(private readonly storage: TextStorage) {
    super();
  }

  static borrowed(literal: string): TextValue {
    return new TextValue({ ownership: 'borrowed', bytes: encodeUtf8(literal) });
  }

  static owned(buffer: ByteBuffer, byteLength: number): TextValue {
    if (byteLength > buffer.size) {
      throw new RuntimeFault('InvalidOperand', `text of ${byteLength} bytes does not fit buffer #${buffer.id}`);
    }
    return new TextValue({ ownership: 'owned', buffer, byteLength });
  }

  asText(): TextValue { return this; }

  get ownership(): TextOwnership {
    return this.storage.ownership;
  }

  /** Copy of the encoded bytes */
  get bytes(): Uint8Array {
    return this.view().slice();
  }

  /**
   * Live view of the backing bytes, for primitives that only read them.
   * Writing into it would change every alias of this text.
   * @internal
   */
  view(): Uint8Array {
    const storage = this.storage;
    if (storage.ownership === 'borrowed') {
      return storage.bytes;
    }
    return storage.buffer.data.subarray(0, storage.byteLength);
  }

  get byteLength(): number {
    const storage = this.storage;
    return storage.ownership === 'borrowed' ? storage.bytes.length : storage.byteLength;
  }

  /** Number of Unicode scalar values */
  get length(): number {
    return countScalars(this.view());
  }

  toString(): string {
    return decodeUtf8(this.view());
  }
}

export const INITIAL_LIST_CAPACITY = 8;

/**
 * Growable list storage shared by every List value that refers to it.
 *
 * Aliasing is the contract: pushing an item through one reference is
 * visible through all of them. Slots live in a tracked buffer; when the
 * list outgrows it, a buffer of twice the capacity replaces it and the old
 * one is released.
 */
export class SharedList {
  private count = 0;

  private constructor(
    private storage: SlotBuffer,
    private readonly tracker: AllocationTracker
  ) {}

  static create(tracker: AllocationTracker, capacity: number = INITIAL_LIST_CAPACITY): SharedList {
    return new SharedList(tracker.allocateSlots(capacity), tracker);
  }

  get length(): number {
    return this.count;
  }

  get capacity(): number {
    return this.storage.data.length;
  }

  append(value: Value): void {
    const slots = this.storage.data;
    if (this.count >= slots.length) {
      const grown = this.tracker.allocateSlots(Math.max(slots.length * 2, 1));
      const target = grown.data;
      for (let i = 0; i < this.count; i++) {
        target[i] = slots[i];
      }
      this.tracker.release(this.storage);
      this.storage = grown;
    }
    this.storage.data[this.count++] = value;
  }

  at(index: number): Value | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.count) {
      return null;
    }
    return this.storage.data[index] ?? null;
  }

  /** Snapshot of the elements, in order */
  items(): Value[] {
    const slots = this.storage.data;
    const result: Value[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = slots[i];
      if (item !== undefined) {
        result.push(item);
      }
    }
    return result;
  }
}

/**
 * List value - a reference to shared list storage
 */
export class ListValue extends BaseValue {
  readonly kind = 'list' as const;

  constructor(public readonly list: SharedList) {
    super();
  }

  asList(): ListValue { return this; }

  /** True when both values refer to the same storage */
  aliases(other: ListValue): boolean {
    return this.list === other.list;
  }
}

const INT64_MIN = -(1n << 63n);
const INT64_MAX = (1n << 63n) - 1n;

/**
 * Make an integer. Bigints outside the 64-bit range are rejected; use
 * `wrapInteger` for arithmetic results that should wrap.
 */
export function makeInteger(value: number | bigint): IntegerValue {
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new RuntimeFault('InvalidOperand', `${value} is not a safe integer`);
    }
    return new IntegerValue(BigInt(value));
  }
  if (value < INT64_MIN || value > INT64_MAX) {
    throw new RuntimeFault('InvalidOperand', `${value} does not fit in 64 bits`);
  }
  return new IntegerValue(value);
}

/**
 * Two's-complement wraparound to 64 bits
 */
export function wrapInteger(value: bigint): IntegerValue {
  return new IntegerValue(BigInt.asIntN(64, value));
}

export function makeFloat(value: number): FloatValue {
  return new FloatValue(value);
}

export const theTrueValue = new BooleanValue(true);
export const theFalseValue = new BooleanValue(false);

export function makeBoolean(value: boolean): BooleanValue {
  return value ? theTrueValue : theFalseValue;
}

export function makeText(literal: string): TextValue {
  return TextValue.borrowed(literal);
}

export const emptyText = makeText('');

export function isNumeric(value: Value): value is IntegerValue | FloatValue {
  return value.kind === 'integer' || value.kind === 'float';
}
