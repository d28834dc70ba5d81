/**
 * Typed wire protocol.
 *
 * Messages are defined once with a binary schema, registered in a fixed
 * order (the order defines the type tags) and dispatched exhaustively.
 *
 * @example
 * ```ts
 * import { defineMessage, MessageRegistry, createMessageDispatcher } from "./protocol/message";
 * import { BinaryCodec } from "./core/binary-codec";
 *
 * const ChatMsg = defineMessage({
 *   name: "ChatMsg",
 *   schema: { text: BinaryCodec.string(256) },
 * });
 *
 * type ChatMsg = InferMessage<typeof ChatMsg>;
 *
 * const registry = new MessageRegistry<ChatMsg>();
 * registry.register(ChatMsg);
 *
 * const frame = registry.encode(ChatMsg.create({ text: "hi" }));
 * const dispatch = createMessageDispatcher<ChatMsg>({
 *   ChatMsg: (msg) => console.log(msg.text),
 * });
 * dispatch([registry.decode(frame)]);
 * ```
 */

export { defineMessage } from "./define-message";
export type { AnyMessage, InferMessage, Message, MessageDefinition, MessageType } from "./define-message";
export { MessageRegistry, MAX_TAGS, HANDSHAKE_TAG, fnv1a } from "./message-registry";
export type { MessageRegistryOptions, RegistrableType } from "./message-registry";
export { createMessageDispatcher } from "./dispatch";
export type { DispatcherOptions, MessageHandlers } from "./dispatch";
