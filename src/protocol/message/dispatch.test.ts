import { describe, it, expect, vi, afterEach } from "vitest";
import { createMessageDispatcher } from "./dispatch";
import { defineMessage } from "./define-message";
import type { InferMessage } from "./define-message";
import { BinaryCodec } from "../../core/binary-codec";

const Ping = defineMessage({ name: "Ping", schema: { seq: BinaryCodec.u16 } });
const Chat = defineMessage({ name: "Chat", schema: { text: BinaryCodec.string(64) } });

type Ping = InferMessage<typeof Ping>;
type Chat = InferMessage<typeof Chat>;
type TestMessage = Ping | Chat;

describe("createMessageDispatcher", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should route each message to the handler of its kind in order", () => {
    const seen: string[] = [];
    const dispatch = createMessageDispatcher<TestMessage>({
      Ping: (msg) => seen.push(`ping:${msg.seq}`),
      Chat: (msg) => seen.push(`chat:${msg.text}:${msg.connectionId}`),
    });

    dispatch([Ping.create({ seq: 1 }), Chat.create({ text: "yo" }, 4), Ping.create({ seq: 2 })]);

    expect(seen).toEqual(["ping:1", "chat:yo:4", "ping:2"]);
  });

  it("should ignore a kind without a handler", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const onPing = vi.fn();
    const dispatch = createMessageDispatcher<Ping>({ Ping: onPing }, { debug: true });

    const stray = Object.assign(Ping.create({ seq: 3 }), { kind: "Stray" });
    dispatch([stray, Ping.create({ seq: 4 })]);

    expect(onPing).toHaveBeenCalledTimes(1);
    expect(onPing).toHaveBeenCalledWith({ kind: "Ping", seq: 4 });
    expect(log).toHaveBeenCalledWith('[Dispatcher] No handler for message kind "Stray"');
  });
});
