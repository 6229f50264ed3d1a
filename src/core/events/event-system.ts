/* ---------- Types ---------- */
type Callback<Props> = (props: Props) => void;

export type EventMapFromTuple<T extends [string, unknown][]> = {
    [K in T[number]as K[0]]: K[1];
};

type EventNameOf<T extends [string, unknown][]> = keyof EventMapFromTuple<T> & string;

type CallbackStore<T extends [string, unknown][]> = {
    [K in keyof EventMapFromTuple<T>]?: Set<Callback<EventMapFromTuple<T>[K]>>;
};

/* ---------- Interfaces ---------- */
interface EventSystemProps<EventNames extends string> {
    /**
     * @description
     * The list of events to ever be registered.
     */
    events: EventNames[];
}

/**
 * @description
 * A callback-based event bus. Event names and payload types come from a
 * tuple list, so `emit` and `on` are checked against each other.
 *
 * A throwing callback is reported with `console.warn` and does not stop the
 * remaining callbacks of the same event.
 *
 * @example
 * ```ts
 * const events = new EventSystem<[["markerErased", string], ["synchronized", number]]>({
 *     events: ["markerErased", "synchronized"],
 * });
 * const off = events.on("markerErased", (name) => console.log(name));
 * events.emit("markerErased", "arrow");
 * off();
 * ```
 */
export class EventSystem<EventTuple extends [string, unknown][]> {
    /**
     * @private
     * @description
     * Registered callbacks per event.
    */
    private callbacks: CallbackStore<EventTuple> = {};

    /**
     * @private
     * @description
     * The list of events that were registered.
    */
    private events: Set<string>;

    constructor({ events }: EventSystemProps<EventNameOf<EventTuple>>) {
        this.events = new Set(events);
    }

    /**
     * @description
     * Registers a callback for an event.
     *
     * @returns Function that removes the callback
     */
    on<EventName extends EventNameOf<EventTuple>>(
        name: EventName,
        callback: Callback<EventMapFromTuple<EventTuple>[EventName]>
    ): () => void {
        const event = this.get(name);
        event?.add(callback);

        return () => {
            event?.delete(callback);
        };
    }

    /**
     * @description
     * Emits an event, running all registered callbacks.
     */
    emit<EventName extends EventNameOf<EventTuple>>(
        name: EventName,
        data: EventMapFromTuple<EventTuple>[EventName]
    ): void {
        const event = this.get(name);
        if (!event) return;

        for (const callback of [...event]) {
            try {
                callback(data);
            } catch (error) {
                console.warn(`Error in "${name}" callback: ${error}`);
            }
        }
    }

    /**
     * @private
     * @description
     * Callback set of a registered event, created on first use.
     */
    private get<EventName extends EventNameOf<EventTuple>>(
        name: EventName
    ): Set<Callback<EventMapFromTuple<EventTuple>[EventName]>> | undefined {
        if (!this.events.has(name)) {
            console.warn(`Event "${name}" does not exist.`);
            return undefined;
        }

        let event = this.callbacks[name];
        if (!event) {
            event = new Set<Callback<EventMapFromTuple<EventTuple>[EventName]>>();
            this.callbacks[name] = event;
        }

        return event;
    }
}
