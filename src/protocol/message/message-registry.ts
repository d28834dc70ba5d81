import { BinaryCodec } from "../../core/binary-codec";
import {
  ConfigurationError,
  DecodeError,
  DuplicateMessageTypeError,
  MessageSchemaError,
  UnknownTagError,
  UnregisteredMessageError,
} from "../../core/errors";
import type { AnyMessage } from "./define-message";
import { defineMessage } from "./define-message";

/**
 * What the registry needs from a message type.
 * Every `defineMessage` result satisfies it.
 */
export interface RegistrableType<M extends AnyMessage> {
  readonly name: M["kind"];
  readonly layout: string;
  readonly fieldCount: number;
  encode(message: M): Uint8Array;
  decode(buf: Uint8Array): M;
}

export interface MessageRegistryOptions {
  /**
   * Reserve tag 0 for the registry checksum control message.
   * User types then start at tag 1.
   */
  handshake?: boolean;
}

/** Number of distinct tags a u8 can carry */
export const MAX_TAGS = 256;

/** Tag reserved for the checksum control message when the handshake is on */
export const HANDSHAKE_TAG = 0;

const RegistryChecksum = defineMessage({
  name: "RegistryChecksum",
  schema: { checksum: BinaryCodec.string(8) },
});

/**
 * FNV-1a 32-bit hash, as 8 lowercase hex digits.
 */
export function fnv1a(text: string): string {
  let hash = 0x811c9dc5;
  for (const byte of new TextEncoder().encode(text)) {
    hash ^= byte;
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash.toString(16).padStart(8, "0");
}

/**
 * Ordered registry of message types.
 *
 * The tag of a type is its registration index, so both peers must register
 * the same types in the same order. The registry is an explicit object:
 * create one per protocol and hand it to every peer that speaks it.
 *
 * Wire frame: `[u8 tag][payload]`.
 *
 * @example
 * ```ts
 * const registry = new MessageRegistry<GameMessage>();
 * registry.register(PlayerInputMsg, PlayerUpdateMsg, PlayerActionMsg);
 *
 * const frame = registry.encode(PlayerInputMsg.create({ ... }));
 * const message = registry.decode(frame);
 * ```
 */
export class MessageRegistry<M extends AnyMessage = AnyMessage> {
  private types: RegistrableType<M>[] = [];
  private tags = new Map<string, number>();
  private readonly offset: number;

  constructor(options: MessageRegistryOptions = {}) {
    this.offset = options.handshake ? 1 : 0;
  }

  /** True when tag 0 is reserved for the checksum handshake */
  get handshake(): boolean {
    return this.offset === 1;
  }

  /** Number of registered user types */
  get size(): number {
    return this.types.length;
  }

  /**
   * Appends message types in call order.
   * A failing type leaves it and every later type unregistered; earlier
   * types of the same call stay registered.
   *
   * @throws DuplicateMessageTypeError if a name is already registered
   * @throws MessageSchemaError if a type has no fields or the tag space is full
   */
  register(...types: RegistrableType<M>[]): void {
    for (const type of types) {
      if (this.tags.has(type.name)) {
        throw new DuplicateMessageTypeError(type.name);
      }
      if (type.fieldCount === 0) {
        throw new MessageSchemaError(`Message type "${type.name}" has no serializable fields`);
      }
      const tag = this.types.length + this.offset;
      if (tag >= MAX_TAGS) {
        throw new MessageSchemaError(
          `Cannot register "${type.name}": all ${MAX_TAGS - this.offset} message tags are in use`
        );
      }
      this.types.push(type);
      this.tags.set(type.name, tag);
    }
  }

  has(kind: string): boolean {
    return this.tags.has(kind);
  }

  /** Tag of a registered kind, or undefined */
  tagOf(kind: string): number | undefined {
    return this.tags.get(kind);
  }

  /** Registered kinds in tag order */
  kinds(): M["kind"][] {
    return this.types.map((t) => t.name);
  }

  isReservedTag(tag: number): boolean {
    return this.handshake && tag === HANDSHAKE_TAG;
  }

  /**
   * Encodes a message into a tagged frame.
   * @throws UnregisteredMessageError if the message kind is not registered
   */
  encode(message: M): Uint8Array {
    const tag = this.tags.get(message.kind);
    if (tag === undefined) {
      throw new UnregisteredMessageError(message.kind);
    }
    return frame(tag, this.types[tag - this.offset].encode(message));
  }

  /**
   * Decodes a tagged frame.
   * @throws UnknownTagError on an empty frame or an unregistered tag
   * @throws DecodeError if the payload does not match the type's layout
   */
  decode(data: Uint8Array): M {
    if (data.byteLength === 0) {
      throw new UnknownTagError(undefined);
    }

    const tag = data[0];
    const type = tag >= this.offset ? this.types[tag - this.offset] : undefined;
    if (!type) {
      throw new UnknownTagError(tag);
    }

    try {
      return type.decode(data.subarray(1));
    } catch (error) {
      if (error instanceof DecodeError) {
        throw new DecodeError(`Message "${type.name}": ${error.message}`);
      }
      throw error;
    }
  }

  /**
   * Checksum of the registration order and of every type's layout.
   * Two registries produce the same fingerprint only when they assign
   * the same tags to the same layouts.
   */
  fingerprint(): string {
    return fnv1a(this.types.map((t) => `${t.name}(${t.layout});`).join(""));
  }

  /** Encodes the checksum control frame (tag 0) */
  encodeChecksum(): Uint8Array {
    this.assertHandshake();
    const payload = RegistryChecksum.encode(RegistryChecksum.create({ checksum: this.fingerprint() }));
    return frame(HANDSHAKE_TAG, payload);
  }

  /** Decodes the checksum carried by a control frame */
  decodeChecksum(data: Uint8Array): string {
    this.assertHandshake();
    if (data.byteLength === 0 || data[0] !== HANDSHAKE_TAG) {
      throw new UnknownTagError(data.byteLength === 0 ? undefined : data[0]);
    }
    return RegistryChecksum.decode(data.subarray(1)).checksum;
  }

  private assertHandshake(): void {
    if (!this.handshake) {
      throw new ConfigurationError("Registry was created without the handshake tag");
    }
  }
}

function frame(tag: number, payload: Uint8Array): Uint8Array {
  const out = new Uint8Array(payload.byteLength + 1);
  out[0] = tag;
  out.set(payload, 1);
  return out;
}
