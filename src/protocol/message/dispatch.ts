import type { AnyMessage } from "./define-message";

/**
 * One handler per kind of the message union.
 * Leaving a kind out is a compile error.
 */
export type MessageHandlers<M extends AnyMessage> = {
  [K in M["kind"]]: (message: Extract<M, { kind: K }>) => void;
};

export interface DispatcherOptions {
  debug?: boolean;
}

/**
 * Builds an exhaustive dispatcher over a message union.
 *
 * @example
 * ```ts
 * const dispatch = createMessageDispatcher<GameMessage>({
 *   PlayerInputMsg: (msg) => applyInput(msg.connectionId, msg.moveDir),
 *   PlayerUpdateMsg: (msg) => moveAvatar(msg.playerId, msg.position),
 *   PlayerActionMsg: (msg) => handleAction(msg.playerId, msg.action),
 * });
 *
 * dispatch(network.getMessages(NetRole.SERVER));
 * ```
 */
export function createMessageDispatcher<M extends AnyMessage>(
  handlers: MessageHandlers<M>,
  options: DispatcherOptions = {}
): (messages: Iterable<M>) => void {
  return (messages) => {
    for (const message of messages) {
      const kind: M["kind"] = message.kind;
      if (!Object.prototype.hasOwnProperty.call(handlers, kind)) {
        if (options.debug) console.log(`[Dispatcher] No handler for message kind "${kind}"`);
        continue;
      }
      const handler = handlers[kind] as (message: M) => void;
      handler(message);
    }
  };
}
