/* ---------- Types ---------- */
type Callback<Props> = (props: Props) => void;

/** Function returned by `on`/`once` that removes the callback again */
export type Unsubscribe = () => void;

/* ---------- Interfaces ---------- */
interface EventSystemProps<EventMap> {
    /**
     * @description
     * The list of events to ever be registered.
     */
    events: (keyof EventMap & string)[];
}

/**
 * @description
 * A callback-based event handling system designed to simplify
 * event-driven programming.
 *
 * Callbacks run synchronously, in registration order, inside `emit`.
 * An error thrown by a callback propagates out of `emit`; the callbacks
 * after it do not run.
 *
 * @example
 * ```ts
 * type NetEvents = {
 *     connection: { connectionId: number };
 *     disconnect: { connectionId: number };
 * };
 *
 * const events = new EventSystem<NetEvents>({ events: ["connection", "disconnect"] });
 * const off = events.on("connection", ({ connectionId }) => console.log(connectionId));
 * events.emit("connection", { connectionId: 1 });
 * off();
 * ```
 */
export class EventSystem<EventMap extends Record<string, unknown>> {
    /**
     * @private
     * @description
     * The map of registered events and their callbacks.
    */
    private callbacks: Map<string, Set<Callback<never>>>;

    /**
     * @private
     * @description
     * The list of events that were registered.
    */
    private events: string[];

    constructor({ events }: EventSystemProps<EventMap>) {
        this.callbacks = new Map();
        this.events = events;

        for (const name of this.events) {
            this.callbacks.set(name, new Set());
        }
    }

    /**
     * @description
     * Registers a callback for an event.
     *
     * @param name Event name
     * @param callback Callback to run when the event is emitted
     * @returns A function that removes the callback
     */
    on<EventName extends keyof EventMap & string>(
        name: EventName,
        callback: Callback<EventMap[EventName]>
    ): Unsubscribe {
        const event = this.get(name);
        if (!event) {
            console.warn(`Event "${name}" does not exist.`);
            return () => {};
        }

        event.add(callback);
        return () => {
            event.delete(callback);
        };
    }

    /**
     * @description
     * Registers a callback for an event that runs only once.
     *
     * @param name Event name
     * @param callback Callback to run when the event is emitted
     */
    once<EventName extends keyof EventMap & string>(
        name: EventName,
        callback: Callback<EventMap[EventName]>
    ): Unsubscribe {
        const wrapper: Callback<EventMap[EventName]> = (props) => {
            this.off(name, wrapper);
            callback(props);
        };

        return this.on(name, wrapper);
    }

    /**
     * @description
     * Emits an event, running all registered callbacks.
     *
     * @param name Event name
     * @param data Event data
     */
    emit<EventName extends keyof EventMap & string>(
        name: EventName,
        data: EventMap[EventName]
    ): void {
        const event = this.get(name);
        if (!event) {
            console.warn(`Event "${name}" does not exist.`);
            return;
        }

        // Snapshot: callbacks may unsubscribe while we iterate
        for (const callback of [...event]) {
            callback(data);
        }
    }

    /**
     * @description
     * Removes a callback from an event.
     *
     * @param name Event name
     * @param callback Callback to remove
     */
    off<EventName extends keyof EventMap & string>(
        name: EventName,
        callback: Callback<EventMap[EventName]>
    ): void {
        const event = this.get(name);
        if (!event) return console.warn(`Event "${name}" does not exist.`);

        event.delete(callback);
    }

    /**
     * @description
     * Number of callbacks registered for an event.
     */
    listenerCount<EventName extends keyof EventMap & string>(name: EventName): number {
        return this.get(name)?.size ?? 0;
    }

    /**
     * @description
     * Removes all callbacks.
     *
     * @param name Optional event name
     */
    clear<EventName extends keyof EventMap & string>(name?: EventName): void {
        if (!name) {
            for (const event of this.callbacks.values()) {
                event.clear();
            }

            return;
        }

        const event = this.callbacks.get(name);
        if (!event) return console.warn(`Event "${name}" does not exist.`);

        event.clear();
    }

    private get<EventName extends keyof EventMap & string>(
        name: EventName
    ): Set<Callback<EventMap[EventName]>> | undefined {
        return this.callbacks.get(name) as Set<Callback<EventMap[EventName]>> | undefined;
    }
}
