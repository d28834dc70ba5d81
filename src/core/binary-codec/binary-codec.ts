import { ConfigurationError, DecodeError, EncodeError } from "../errors";
import { fromHalfBits, toHalfBits } from "./half-float";

/**
 * A binary field descriptor.
 * Defines how a single value is serialized/deserialized.
 *
 * Fixed-width fields only declare `size`. Variable-width fields (strings, lists)
 * also declare `sizeOf` for encoding and `measure` for decoding, and use
 * `size` as the width of their length prefix.
 */
export type Field<T> = {
  /** Size of the field in bytes (minimum size for variable-width fields) */
  size: number;

  /** Stable descriptor of the wire layout, e.g. `u16` or `list<vec2h>(8)` */
  id: string;

  /** Encoded size of a value, for variable-width fields */
  sizeOf?(v: T): number;

  /** Encoded size of the value stored at the given offset, for variable-width fields */
  measure?(dv: DataView, o: number): number;

  /**
   * Writes a value into a DataView at the given offset.
   * @param dv DataView to write into
   * @param o Byte offset
   * @param v Value to write
   */
  write(dv: DataView, o: number, v: T): void;

  /**
   * Reads a value from a DataView at the given offset.
   * @param dv DataView to read from
   * @param o Byte offset
   */
  read(dv: DataView, o: number): T;

  /**
   * Returns the nil value
   */
  toNil(): T;
};

/**
 * A schema mapping object keys to binary fields.
 * The order of iteration defines the binary layout.
 *
 * IMPORTANT:
 * Property order is respected as insertion order.
 * Do not rely on computed or dynamic keys.
 */
export type Schema<T> = {
  [K in keyof T]: Field<T[K]>;
};

/** Any record of fields, used as a constraint for schema literals */
export type FieldRecord = Record<string, Field<unknown>>;

/**
 * Infers the value type described by a schema literal.
 */
export type InferSchema<S extends FieldRecord> = {
  [K in keyof S]: S[K] extends Field<infer V> ? V : never;
};

export type Vec2 = [number, number];
export type Vec3 = [number, number, number];
export type Vec4 = [number, number, number, number];

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

function schemaKeys<T extends object>(schema: Schema<T>): (keyof T)[] {
  return Object.keys(schema) as (keyof T)[];
}

function byteSize<T>(field: Field<T>, value: T): number {
  return field.sizeOf ? field.sizeOf(value) : field.size;
}

function storedSize<T>(field: Field<T>, dv: DataView, o: number): number {
  return field.measure ? field.measure(dv, o) : field.size;
}

function assertInteger(id: string, v: number, min: number, max: number): void {
  if (!Number.isInteger(v) || v < min || v > max) {
    throw new EncodeError(`Value ${v} does not fit ${id} (${min}..${max})`);
  }
}

function integer(
  id: string,
  size: number,
  min: number,
  max: number,
  write: (dv: DataView, o: number, v: number) => void,
  read: (dv: DataView, o: number) => number
): Field<number> {
  return {
    id,
    size,
    write(dv, o, v) {
      assertInteger(id, v, min, max);
      write(dv, o, v);
    },
    read,
    toNil: () => 0,
  };
}

function setHalf(dv: DataView, o: number, v: number): void {
  dv.setUint16(o, toHalfBits(v), false);
}

function getHalf(dv: DataView, o: number): number {
  return fromHalfBits(dv.getUint16(o, false));
}

/**
 * Layout descriptor of a schema, e.g. `moveDir:vec2h,aimPos:vec3h`.
 * Two schemas with the same descriptor share the same wire layout.
 */
export function describeSchema<T extends object>(schema: Schema<T>): string {
  return schemaKeys(schema)
    .map((k) => `${String(k)}:${schema[k].id}`)
    .join(",");
}

/**
 * Built-in binary primitive field definitions for multiplayer games.
 * All multi-byte values are big-endian (network order).
 */
export class BinaryPrimitives {
  /** Unsigned 8-bit integer */
  static readonly u8: Field<number> = integer(
    "u8", 1, 0, 0xff,
    (dv, o, v) => dv.setUint8(o, v),
    (dv, o) => dv.getUint8(o)
  );

  /** Unsigned 16-bit integer */
  static readonly u16: Field<number> = integer(
    "u16", 2, 0, 0xffff,
    (dv, o, v) => dv.setUint16(o, v, false),
    (dv, o) => dv.getUint16(o, false)
  );

  /** Unsigned 32-bit integer */
  static readonly u32: Field<number> = integer(
    "u32", 4, 0, 0xffffffff,
    (dv, o, v) => dv.setUint32(o, v, false),
    (dv, o) => dv.getUint32(o, false)
  );

  /** Signed 8-bit integer */
  static readonly i8: Field<number> = integer(
    "i8", 1, -0x80, 0x7f,
    (dv, o, v) => dv.setInt8(o, v),
    (dv, o) => dv.getInt8(o)
  );

  /** Signed 16-bit integer */
  static readonly i16: Field<number> = integer(
    "i16", 2, -0x8000, 0x7fff,
    (dv, o, v) => dv.setInt16(o, v, false),
    (dv, o) => dv.getInt16(o, false)
  );

  /** Signed 32-bit integer */
  static readonly i32: Field<number> = integer(
    "i32", 4, -0x80000000, 0x7fffffff,
    (dv, o, v) => dv.setInt32(o, v, false),
    (dv, o) => dv.getInt32(o, false)
  );

  /** 32-bit floating point number (IEEE 754) */
  static readonly f32: Field<number> = {
    id: "f32",
    size: 4,
    write: (dv, o, v) => dv.setFloat32(o, v, false),
    read: (dv, o) => dv.getFloat32(o, false),
    toNil: () => 0,
  };

  /** 64-bit floating point number (double) */
  static readonly f64: Field<number> = {
    id: "f64",
    size: 8,
    write: (dv, o, v) => dv.setFloat64(o, v, false),
    read: (dv, o) => dv.getFloat64(o, false),
    toNil: () => 0,
  };

  /** Boolean stored as 1 byte; any byte other than 0 or 1 is rejected */
  static readonly bool: Field<boolean> = {
    id: "bool",
    size: 1,
    write: (dv, o, v) => dv.setUint8(o, v ? 1 : 0),
    read(dv, o) {
      const b = dv.getUint8(o);
      if (b > 1) throw new DecodeError(`Invalid bool byte ${b}`);
      return b === 1;
    },
    toNil: () => false,
  };

  /** 2D vector, half-precision components */
  static readonly vec2h: Field<Vec2> = {
    id: "vec2h",
    size: 4,
    write(dv, o, v) {
      setHalf(dv, o, v[0]);
      setHalf(dv, o + 2, v[1]);
    },
    read: (dv, o) => [getHalf(dv, o), getHalf(dv, o + 2)],
    toNil: () => [0, 0],
  };

  /** 3D vector, half-precision components */
  static readonly vec3h: Field<Vec3> = {
    id: "vec3h",
    size: 6,
    write(dv, o, v) {
      setHalf(dv, o, v[0]);
      setHalf(dv, o + 2, v[1]);
      setHalf(dv, o + 4, v[2]);
    },
    read: (dv, o) => [getHalf(dv, o), getHalf(dv, o + 2), getHalf(dv, o + 4)],
    toNil: () => [0, 0, 0],
  };

  /** 4D vector, half-precision components (quaternions, colors) */
  static readonly vec4h: Field<Vec4> = {
    id: "vec4h",
    size: 8,
    write(dv, o, v) {
      setHalf(dv, o, v[0]);
      setHalf(dv, o + 2, v[1]);
      setHalf(dv, o + 4, v[2]);
      setHalf(dv, o + 6, v[3]);
    },
    read: (dv, o) => [
      getHalf(dv, o),
      getHalf(dv, o + 2),
      getHalf(dv, o + 4),
      getHalf(dv, o + 6),
    ],
    toNil: () => [0, 0, 0, 0],
  };

  /** 2D vector of f32 */
  static readonly vec2: Field<Vec2> = {
    id: "vec2",
    size: 8,
    write(dv, o, v) {
      dv.setFloat32(o, v[0], false);
      dv.setFloat32(o + 4, v[1], false);
    },
    read: (dv, o) => [dv.getFloat32(o, false), dv.getFloat32(o + 4, false)],
    toNil: () => [0, 0],
  };

  /** 3D vector of f32 */
  static readonly vec3: Field<Vec3> = {
    id: "vec3",
    size: 12,
    write(dv, o, v) {
      dv.setFloat32(o, v[0], false);
      dv.setFloat32(o + 4, v[1], false);
      dv.setFloat32(o + 8, v[2], false);
    },
    read: (dv, o) => [
      dv.getFloat32(o, false),
      dv.getFloat32(o + 4, false),
      dv.getFloat32(o + 8, false),
    ],
    toNil: () => [0, 0, 0],
  };

  /** 4D vector of f32 */
  static readonly vec4: Field<Vec4> = {
    id: "vec4",
    size: 16,
    write(dv, o, v) {
      dv.setFloat32(o, v[0], false);
      dv.setFloat32(o + 4, v[1], false);
      dv.setFloat32(o + 8, v[2], false);
      dv.setFloat32(o + 12, v[3], false);
    },
    read: (dv, o) => [
      dv.getFloat32(o, false),
      dv.getFloat32(o + 4, false),
      dv.getFloat32(o + 8, false),
      dv.getFloat32(o + 12, false),
    ],
    toNil: () => [0, 0, 0, 0],
  };

  /**
   * String field with UTF-8 encoding and 2-byte length prefix.
   * Only the actual bytes are sent, no padding.
   * @param maxBytes Maximum number of UTF-8 bytes allowed
   */
  static string(maxBytes: number = 0xffff): Field<string> {
    if (!Number.isInteger(maxBytes) || maxBytes < 0 || maxBytes > 0xffff) {
      throw new ConfigurationError(`String max length must be 0..65535, got ${maxBytes}`);
    }

    return {
      id: `string(${maxBytes})`,
      size: 2,
      sizeOf: (v) => 2 + utf8Encoder.encode(v).byteLength,
      measure: (dv, o) => 2 + dv.getUint16(o, false),
      write(dv, o, v) {
        const bytes = utf8Encoder.encode(v);
        if (bytes.byteLength > maxBytes) {
          throw new EncodeError(`String too long, max ${maxBytes} bytes`);
        }
        dv.setUint16(o, bytes.byteLength, false);
        new Uint8Array(dv.buffer, dv.byteOffset + o + 2, bytes.byteLength).set(bytes);
      },
      read(dv, o) {
        const length = dv.getUint16(o, false);
        if (length > maxBytes) {
          throw new DecodeError(`String length ${length} exceeds max ${maxBytes}`);
        }
        return utf8Decoder.decode(new Uint8Array(dv.buffer, dv.byteOffset + o + 2, length));
      },
      toNil: () => "",
    };
  }

  /**
   * List of items with a 2-byte count prefix.
   * Items may themselves be variable-width.
   * @param item Field used for every element
   * @param maxLength Maximum number of elements
   */
  static list<T>(item: Field<T>, maxLength: number = 0xffff): Field<T[]> {
    if (!Number.isInteger(maxLength) || maxLength < 0 || maxLength > 0xffff) {
      throw new ConfigurationError(`List max length must be 0..65535, got ${maxLength}`);
    }

    return {
      id: `list<${item.id}>(${maxLength})`,
      size: 2,
      sizeOf(v) {
        let size = 2;
        for (const x of v) size += byteSize(item, x);
        return size;
      },
      measure(dv, o) {
        const count = dv.getUint16(o, false);
        let offset = o + 2;
        for (let i = 0; i < count; i++) offset += storedSize(item, dv, offset);
        return offset - o;
      },
      write(dv, o, v) {
        if (v.length > maxLength) {
          throw new EncodeError(`List too long: ${v.length} > ${maxLength}`);
        }
        dv.setUint16(o, v.length, false);
        let offset = o + 2;
        for (const x of v) {
          item.write(dv, offset, x);
          offset += byteSize(item, x);
        }
      },
      read(dv, o) {
        const count = dv.getUint16(o, false);
        if (count > maxLength) {
          throw new DecodeError(`List length ${count} exceeds max ${maxLength}`);
        }
        const items: T[] = [];
        let offset = o + 2;
        for (let i = 0; i < count; i++) {
          items.push(item.read(dv, offset));
          offset += storedSize(item, dv, offset);
        }
        return items;
      },
      toNil: () => [],
    };
  }

  /**
   * Numeric enum stored as a u8 discriminant.
   * Decoding rejects any byte that is not a member of the enum.
   *
   * @example
   * ```ts
   * enum PlayerAction { Register, Remove, Fire }
   * const schema = { action: BinaryCodec.enumOf(PlayerAction) };
   * ```
   */
  static enumOf<E extends Record<string, string | number>>(
    values: E
  ): Field<Extract<E[keyof E], number>> {
    type Member = Extract<E[keyof E], number>;

    const raw: Array<string | number> = Object.values(values);
    const members = raw.filter((v): v is Member => typeof v === "number");

    if (members.length === 0) {
      throw new ConfigurationError("Enum field needs at least one numeric member");
    }
    for (const m of members) {
      if (!Number.isInteger(m) || m < 0 || m > 0xff) {
        throw new ConfigurationError(`Enum member ${m} does not fit in a u8 discriminant`);
      }
    }

    const nil = members[0];

    return {
      id: `enum(${members.join("|")})`,
      size: 1,
      write(dv, o, v) {
        if (!members.includes(v)) {
          throw new EncodeError(`Value ${v} is not a member of the enum`);
        }
        dv.setUint8(o, v);
      },
      read(dv, o) {
        const discriminant = dv.getUint8(o);
        const member = members.find((m) => m === discriminant);
        if (member === undefined) {
          throw new DecodeError(`Invalid enum discriminant ${discriminant}`);
        }
        return member;
      },
      toNil: () => nil,
    };
  }
}

/**
 * Public codec API.
 * Exposes every primitive plus schema-driven encode/decode helpers.
 */
export class BinaryCodec extends BinaryPrimitives {
  /**
   * Encodes an object into a right-sized buffer using the given schema.
   * The same value always produces the same bytes.
   *
   * @throws EncodeError if a value does not fit its field
   */
  static encode<T extends object>(schema: Schema<T>, data: T): Uint8Array {
    const keys = schemaKeys(schema);

    let size = 0;
    for (const k of keys) size += byteSize(schema[k], data[k]);

    const buffer = new Uint8Array(size);
    const view = new DataView(buffer.buffer);

    let o = 0;
    for (const k of keys) {
      const f = schema[k];
      const value = data[k];
      try {
        f.write(view, o, value);
      } catch (error) {
        if (error instanceof EncodeError) {
          throw new EncodeError(`Field "${String(k)}": ${error.message}`);
        }
        throw error;
      }
      o += byteSize(f, value);
    }

    return buffer;
  }

  /**
   * Decodes a buffer into a new object.
   *
   * @throws DecodeError if the buffer is truncated, has trailing bytes,
   * or holds an invalid value for a field
   */
  static decode<T extends object>(schema: Schema<T>, buf: Uint8Array): T {
    return this.decodeInto(schema, buf, {} as T);
  }

  /**
   * Decodes a buffer into an existing target object.
   */
  static decodeInto<T extends object>(schema: Schema<T>, buf: Uint8Array, target: T): T {
    const view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);

    let o = 0;
    for (const k of schemaKeys(schema)) {
      const f = schema[k];
      try {
        const size = storedSize(f, view, o);
        if (o + size > buf.byteLength) {
          throw new DecodeError(
            `Buffer truncated: expected at least ${o + size} bytes, got ${buf.byteLength}`
          );
        }
        target[k] = f.read(view, o);
        o += size;
      } catch (error) {
        throw toDecodeError(error, String(k));
      }
    }

    if (o !== buf.byteLength) {
      throw new DecodeError(`Unexpected trailing bytes: decoded ${o} of ${buf.byteLength}`);
    }

    return target;
  }
}

function toDecodeError(error: unknown, field: string): Error {
  if (error instanceof DecodeError) {
    return new DecodeError(`Field "${field}": ${error.message}`);
  }
  // DataView reads past the end throw RangeError; bad UTF-8 throws TypeError
  if (error instanceof RangeError || error instanceof TypeError) {
    return new DecodeError(`Field "${field}": ${error.message}`);
  }
  return error instanceof Error ? error : new DecodeError(String(error));
}
