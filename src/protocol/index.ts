/**
 * Protocol layer: message types and their registry.
 *
 * A message type is a name plus an ordered binary schema. Registering a type
 * assigns it the next one-byte tag; a frame on the wire is `[tag][payload]`.
 * Every peer registers the same types in the same order.
 *
 * @example
 * ```ts
 * import { defineMessage, MessageRegistry } from "./protocol";
 * import { BinaryCodec } from "./core/binary-codec";
 *
 * const PlayerInputMsg = defineMessage({
 *   name: "PlayerInputMsg",
 *   schema: {
 *     moveDir: BinaryCodec.vec2h,
 *     aimPos: BinaryCodec.vec3h,
 *   },
 * });
 *
 * const registry = new MessageRegistry<InferMessage<typeof PlayerInputMsg>>();
 * registry.register(PlayerInputMsg);
 *
 * const frame = registry.encode(PlayerInputMsg.create({ moveDir: [1, 0], aimPos: [0, 0, 0] }));
 * const message = registry.decode(frame); // { kind: "PlayerInputMsg", moveDir: [1, 0], ... }
 * ```
 */
export * from "./message";
