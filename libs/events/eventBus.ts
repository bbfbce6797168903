import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('EventBus');

export interface BusEvent {
    readonly type: string;
}

/**
 * Returning `true` consumes the event: subscribers registered before this one
 * will not receive it.
 */
export type BusListener<E extends BusEvent> = (event: E) => boolean | void;

type EventOfType<Events extends BusEvent, K extends Events['type']> = Extract<Events, { type: K }>;

/**
 * Lightweight typed event bus.
 *
 * Used to decouple high-level concepts (connectivity monitoring, the call engine,
 * observers of engine state) without construction-order dependencies.
 * Listeners of one event type are notified last-subscribed-first.
 */
export class EventBus<Events extends BusEvent> {
    private readonly listeners = new Map<string, Array<BusListener<Events>>>();
    private readonly originals = new WeakMap<BusListener<Events>, unknown>();

    public subscribe<K extends Events['type']>(
        type: K,
        listener: BusListener<EventOfType<Events, K>>
    ): () => void {
        const wrapped = this.register(type, listener);
        if (!wrapped) {
            return () => undefined;
        }

        return () => {
            const current = this.listeners.get(type);
            if (!current) return;
            const index = current.indexOf(wrapped);
            if (index >= 0) {
                current.splice(index, 1);
            }
        };
    }

    public fire(event: Events): void {
        const current = this.listeners.get(event.type);
        if (!current || current.length === 0) return;

        // Listeners may unsubscribe while being notified.
        const snapshot = [...current];
        for (let i = snapshot.length - 1; i >= 0; i--) {
            const listener = snapshot[i];
            if (listener && listener(event) === true) {
                logger.debug({ type: event.type }, 'Event consumed');
                return;
            }
        }
    }

    public listenerCount(type: Events['type']): number {
        return this.listeners.get(type)?.length ?? 0;
    }

    public clear(): void {
        this.listeners.clear();
    }

    private register<K extends Events['type']>(
        type: K,
        listener: BusListener<EventOfType<Events, K>>
    ): BusListener<Events> | null {
        let current = this.listeners.get(type);
        if (!current) {
            current = [];
            this.listeners.set(type, current);
        }

        if (current.some(entry => this.originals.get(entry) === listener)) {
            logger.error({ type }, 'Listeners cannot be added twice');
            return null;
        }

        const wrapped: BusListener<Events> = (event) => {
            if (!isOfType(event, type)) return undefined;
            return listener(event);
        };
        this.originals.set(wrapped, listener);
        current.push(wrapped);
        return wrapped;
    }
}

function isOfType<Events extends BusEvent, K extends Events['type']>(
    event: Events,
    type: K
): event is EventOfType<Events, K> {
    return event.type === type;
}
