/**
 * Offset-table binary codec.
 *
 * A container is laid out as a fixed-size head followed by a variable-size tail.
 * Fixed-size fields sit inline in the head in declaration order; every
 * variable-size field takes a 4-byte little-endian offset slot in the head that
 * points (relative to the container start) at its bytes in the tail. Tails are
 * appended in declaration order, so offsets are non-decreasing.
 *
 * Decoding is two-pass: `SszDecoderBuilder.registerType` walks the head and
 * records where each field starts and ends, then `SszFieldDecoder.next`
 * materializes the fields in order, recursing into nested types.
 */

import { SszDecodeError } from "../errors";
import { logger } from "../logging";
import {
  readUint256LE,
  readUint32LE,
  readUint64LE,
  writeUint256LE,
  writeUint32LE,
  writeUint64LE,
} from "./quantity";

export const BYTES_PER_LENGTH_OFFSET = 4;

export interface Sized {
  /** Encoded width when it does not depend on the value, `null` otherwise. */
  readonly fixedSize: number | null;
}

export interface SszType<T> extends Sized {
  byteLength(value: T): number;
  /** Writes `value` at `offset`, returns the offset just past it. */
  serializeInto(out: Uint8Array, offset: number, value: T): number;
  /** `bytes` is exactly the slice holding the value; `path` names it in errors. */
  deserialize(bytes: Uint8Array, path: string): T;
}

export type FieldLayout = readonly (readonly [name: string, type: Sized])[];

/** Receives container fields in declaration order. */
export interface FieldSink {
  append<T>(type: SszType<T>, value: T): void;
}

/** Yields decoded container fields in declaration order. */
export interface FieldSource {
  next<T>(type: SszType<T>): T;
}

const headSize = (fields: FieldLayout) =>
  fields.reduce((n, [, t]) => n + (t.fixedSize ?? BYTES_PER_LENGTH_OFFSET), 0);

/* ── basic types ─────────────────────────────────────────── */

const fixedSlice = (bytes: Uint8Array, size: number, path: string) => {
  if (bytes.length !== size)
    throw new SszDecodeError("SSZ_LENGTH", path, `expected ${size} bytes, got ${bytes.length}`);
  return bytes;
};

export const uint64: SszType<bigint> = {
  fixedSize: 8,
  byteLength: () => 8,
  serializeInto: writeUint64LE,
  deserialize: (bytes, path) => readUint64LE(fixedSlice(bytes, 8, path)),
};

export const uint256: SszType<bigint> = {
  fixedSize: 32,
  byteLength: () => 32,
  serializeInto: writeUint256LE,
  deserialize: (bytes, path) => readUint256LE(fixedSlice(bytes, 32, path)),
};

export const byteVector = (size: number): SszType<Uint8Array> => ({
  fixedSize: size,
  byteLength: () => size,
  serializeInto: (out, offset, value) => {
    if (value.length !== size)
      throw new RangeError(`expected ${size}-byte value, got ${value.length} bytes`);
    out.set(value, offset);
    return offset + size;
  },
  deserialize: (bytes, path) => fixedSlice(bytes, size, path).slice(),
});

export const byteList: SszType<Uint8Array> = {
  fixedSize: null,
  byteLength: (value) => value.length,
  serializeInto: (out, offset, value) => {
    out.set(value, offset);
    return offset + value.length;
  },
  deserialize: (bytes) => bytes.slice(),
};

/* ── lists ───────────────────────────────────────────────── */

const fixedList = <T>(element: SszType<T>, size: number): SszType<T[]> => ({
  fixedSize: null,
  byteLength: (values) => values.length * size,
  serializeInto: (out, offset, values) =>
    values.reduce((at, v) => element.serializeInto(out, at, v), offset),
  deserialize: (bytes, path) => {
    if (bytes.length % size !== 0)
      throw new SszDecodeError(
        "SSZ_LENGTH",
        path,
        `${bytes.length} bytes is not a multiple of the ${size}-byte element size`,
      );
    const out: T[] = [];
    for (let at = 0, i = 0; at < bytes.length; at += size, i++)
      out.push(element.deserialize(bytes.subarray(at, at + size), `${path}[${i}]`));
    return out;
  },
});

const variableList = <T>(element: SszType<T>): SszType<T[]> => ({
  fixedSize: null,
  byteLength: (values) =>
    values.reduce((n, v) => n + BYTES_PER_LENGTH_OFFSET + element.byteLength(v), 0),
  serializeInto: (out, offset, values) => {
    let tail = offset + values.length * BYTES_PER_LENGTH_OFFSET;
    values.forEach((v, i) => {
      writeUint32LE(out, offset + i * BYTES_PER_LENGTH_OFFSET, tail - offset);
      tail = element.serializeInto(out, tail, v);
    });
    return tail;
  },
  deserialize: (bytes, path) => {
    if (bytes.length === 0) return [];
    if (bytes.length < BYTES_PER_LENGTH_OFFSET)
      throw new SszDecodeError("SSZ_LENGTH", path, `${bytes.length} bytes cannot hold an offset`);
    const first = readUint32LE(bytes, 0);
    if (first % BYTES_PER_LENGTH_OFFSET !== 0 || first === 0 || first > bytes.length)
      throw new SszDecodeError("SSZ_OFFSET", path, `invalid first offset ${first}`);
    const count = first / BYTES_PER_LENGTH_OFFSET;
    const offsets: number[] = [first];
    for (let i = 1; i < count; i++) {
      const o = readUint32LE(bytes, i * BYTES_PER_LENGTH_OFFSET);
      if (o < offsets[i - 1] || o > bytes.length)
        throw new SszDecodeError(
          "SSZ_OFFSET",
          `${path}[${i}]`,
          `offset ${o} outside [${offsets[i - 1]}, ${bytes.length}]`,
        );
      offsets.push(o);
    }
    return offsets.map((start, i) =>
      element.deserialize(bytes.subarray(start, offsets[i + 1] ?? bytes.length), `${path}[${i}]`),
    );
  },
});

export const list = <T>(element: SszType<T>): SszType<T[]> =>
  element.fixedSize === null ? variableList(element) : fixedList(element, element.fixedSize);

/* ── containers ──────────────────────────────────────────── */

/** Sums the encoded size of appended fields without writing anything. */
export class SszLengthCounter implements FieldSink {
  total = 0;

  append<T>(type: SszType<T>, value: T): void {
    this.total += type.fixedSize ?? (BYTES_PER_LENGTH_OFFSET + type.byteLength(value));
  }
}

export class SszEncoder implements FieldSink {
  private readonly headEnd: number;
  private head: number;
  private tail: number;
  private appended = 0;

  constructor(
    private readonly out: Uint8Array,
    private readonly start: number,
    private readonly fields: FieldLayout,
  ) {
    this.head = start;
    this.headEnd = start + headSize(fields);
    this.tail = this.headEnd;
  }

  append<T>(type: SszType<T>, value: T): void {
    const declared = this.fields[this.appended++];
    if (!declared || declared[1].fixedSize !== type.fixedSize)
      throw new Error(`field ${this.appended - 1} does not match the container layout`);
    if (type.fixedSize !== null) {
      this.head = type.serializeInto(this.out, this.head, value);
      return;
    }
    this.head = writeUint32LE(this.out, this.head, this.tail - this.start);
    this.tail = type.serializeInto(this.out, this.tail, value);
  }

  /** Returns the offset just past the container. */
  finalize(): number {
    if (this.appended !== this.fields.length || this.head !== this.headEnd)
      throw new Error(`appended ${this.appended} of ${this.fields.length} fields`);
    return this.tail;
  }
}

interface FieldSlot {
  readonly name: string;
  readonly fixedSize: number | null;
  start: number;
  end: number;
}

export class SszDecoderBuilder {
  private readonly slots: FieldSlot[] = [];
  private readonly variable: FieldSlot[] = [];
  private cursor = 0;

  constructor(
    private readonly bytes: Uint8Array,
    private readonly path: string,
  ) {}

  registerType(name: string, type: Sized): void {
    const field = `${this.path}.${name}`;
    const width = type.fixedSize ?? BYTES_PER_LENGTH_OFFSET;
    if (this.cursor + width > this.bytes.length)
      throw new SszDecodeError(
        "SSZ_LENGTH",
        field,
        `needs ${this.cursor + width} bytes, buffer has ${this.bytes.length}`,
      );

    if (type.fixedSize !== null) {
      this.slots.push({ name, fixedSize: type.fixedSize, start: this.cursor, end: this.cursor + width });
    } else {
      const offset = readUint32LE(this.bytes, this.cursor);
      const prev = this.variable[this.variable.length - 1];
      if (offset > this.bytes.length)
        throw new SszDecodeError(
          "SSZ_OFFSET",
          field,
          `offset ${offset} exceeds buffer length ${this.bytes.length}`,
        );
      if (prev && offset < prev.start)
        throw new SszDecodeError(
          "SSZ_OFFSET",
          field,
          `offset ${offset} precedes previous offset ${prev.start}`,
        );
      const slot: FieldSlot = { name, fixedSize: null, start: offset, end: this.bytes.length };
      this.slots.push(slot);
      this.variable.push(slot);
    }
    this.cursor += width;
  }

  build(): SszFieldDecoder {
    const [first] = this.variable;
    if (!first) {
      if (this.bytes.length !== this.cursor) {
        const last = this.slots[this.slots.length - 1];
        throw new SszDecodeError(
          "SSZ_LENGTH",
          `${this.path}.${last?.name ?? ""}`,
          `container is ${this.cursor} bytes, buffer has ${this.bytes.length}`,
        );
      }
    } else if (first.start !== this.cursor) {
      throw new SszDecodeError(
        "SSZ_OFFSET",
        `${this.path}.${first.name}`,
        `first offset ${first.start} does not match fixed part length ${this.cursor}`,
      );
    }
    this.variable.forEach((slot, i) => {
      slot.end = this.variable[i + 1]?.start ?? this.bytes.length;
    });
    return new SszFieldDecoder(this.bytes, this.path, this.slots);
  }
}

export class SszFieldDecoder implements FieldSource {
  private index = 0;

  constructor(
    private readonly bytes: Uint8Array,
    private readonly path: string,
    private readonly slots: readonly FieldSlot[],
  ) {}

  next<T>(type: SszType<T>): T {
    const slot = this.slots[this.index++];
    if (!slot || slot.fixedSize !== type.fixedSize)
      throw new Error(`field ${this.index - 1} does not match the registered layout`);
    return type.deserialize(this.bytes.subarray(slot.start, slot.end), `${this.path}.${slot.name}`);
  }

  finish(): void {
    if (this.index !== this.slots.length)
      throw new Error(`decoded ${this.index} of ${this.slots.length} registered fields`);
  }
}

export interface ContainerDef<T> {
  readonly fields: FieldLayout;
  write(sink: FieldSink, value: T): void;
  read(source: FieldSource): T;
}

export type ContainerType<T> = SszType<T> & { readonly fields: FieldLayout };

export const container = <T>(def: ContainerDef<T>): ContainerType<T> => {
  const allFixed = def.fields.every(([, t]) => t.fixedSize !== null);
  return {
    fields: def.fields,
    fixedSize: allFixed ? headSize(def.fields) : null,
    byteLength: (value) => {
      const counter = new SszLengthCounter();
      def.write(counter, value);
      return counter.total;
    },
    serializeInto: (out, offset, value) => {
      const encoder = new SszEncoder(out, offset, def.fields);
      def.write(encoder, value);
      return encoder.finalize();
    },
    deserialize: (bytes, path) => {
      const builder = new SszDecoderBuilder(bytes, path);
      for (const [name, type] of def.fields) builder.registerType(name, type);
      const decoder = builder.build();
      const value = def.read(decoder);
      decoder.finish();
      return value;
    },
  };
};

/* ── entry points ────────────────────────────────────────── */

export const serialize = <T>(type: SszType<T>, value: T): Uint8Array => {
  const out = new Uint8Array(type.byteLength(value));
  const end = type.serializeInto(out, 0, value);
  if (end !== out.length) throw new Error(`wrote ${end} of ${out.length} bytes`);
  return out;
};

/** All-or-nothing: either the whole value or an `SszDecodeError`. */
export const deserialize = <T>(type: SszType<T>, bytes: Uint8Array, name: string): T => {
  try {
    return type.deserialize(bytes, name);
  } catch (err) {
    if (err instanceof SszDecodeError)
      logger.debug({ field: err.field, code: err.code, length: bytes.length }, "ssz decode failed");
    throw err;
  }
};
