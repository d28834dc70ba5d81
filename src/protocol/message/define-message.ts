import type { Schema } from "../../core/binary-codec";
import { BinaryCodec, describeSchema } from "../../core/binary-codec";
import { MessageSchemaError } from "../../core/errors";

/**
 * Shape shared by every message instance.
 * `connectionId` is never encoded: it is stamped on inbound messages
 * and used as the unicast target on outbound ones.
 */
export interface AnyMessage {
  kind: string;
  connectionId?: number;
}

/**
 * A message instance of kind `N` carrying the fields `T`.
 */
export type Message<N extends string, T extends object> = { kind: N; connectionId?: number } & T;

/**
 * Configuration for defining a message type.
 * @template N The message name, used as the `kind` discriminant
 * @template T The field values described by the schema
 */
export interface MessageDefinition<N extends string, T extends object> {
  /** Unique name of the message type */
  name: N;
  /** Ordered schema of the payload fields; key order is the wire order */
  schema: Schema<T>;
}

/**
 * Result of defineMessage: name, layout and codec for one message type.
 */
export interface MessageType<N extends string, T extends object> {
  readonly name: N;
  readonly schema: Schema<T>;
  /** Wire layout descriptor, used by the registry checksum */
  readonly layout: string;
  readonly fieldCount: number;

  /** Builds a message instance, optionally addressed to a connection */
  create(fields: T, connectionId?: number): Message<N, T>;
  /** Encodes the payload (without the type tag) */
  encode(message: Message<N, T>): Uint8Array;
  /** Decodes a payload (without the type tag) */
  decode(buf: Uint8Array): Message<N, T>;
}

/**
 * Infers the message instance type of a defined message type.
 *
 * @example
 * ```ts
 * type PlayerInputMsg = InferMessage<typeof PlayerInputMsg>;
 * ```
 */
export type InferMessage<D> = D extends MessageType<infer N, infer T> ? Message<N, T> : never;

const RESERVED_FIELDS = ["kind", "connectionId"];

/**
 * Define a type-safe message with its binary payload schema.
 *
 * The instance type is derived from the schema, so the TypeScript type and
 * the wire layout cannot drift apart. The `name` becomes the `kind`
 * discriminant of every instance.
 *
 * @example
 * ```ts
 * const PlayerInputMsg = defineMessage({
 *   name: "PlayerInputMsg",
 *   schema: {
 *     moveDir: BinaryCodec.vec2h,
 *     aimPos: BinaryCodec.vec3h,
 *     actions: BinaryCodec.list(BinaryCodec.string(32), 16),
 *   },
 * });
 *
 * type PlayerInputMsg = InferMessage<typeof PlayerInputMsg>;
 *
 * const input = PlayerInputMsg.create({
 *   moveDir: [1, 0],
 *   aimPos: [0, 0, 0],
 *   actions: ["fire"],
 * });
 * ```
 */
export function defineMessage<N extends string, T extends object>(
  definition: MessageDefinition<N, T>
): MessageType<N, T> {
  const { name, schema } = definition;

  if (name.length === 0) {
    throw new MessageSchemaError("Message name must not be empty");
  }

  const keys = Object.keys(schema);
  for (const reserved of RESERVED_FIELDS) {
    if (keys.includes(reserved)) {
      throw new MessageSchemaError(`Message "${name}" cannot declare reserved field "${reserved}"`);
    }
  }

  return {
    name,
    schema,
    layout: describeSchema(schema),
    fieldCount: keys.length,

    create(fields, connectionId) {
      return connectionId === undefined
        ? { kind: name, ...fields }
        : { kind: name, ...fields, connectionId };
    },

    encode(message) {
      return BinaryCodec.encode(schema, message);
    },

    decode(buf) {
      return { kind: name, ...BinaryCodec.decode(schema, buf) };
    },
  };
}
