/**
 * Strongly-typed, synchronous event bus.
 *
 * publish() delivers immediately, in subscription order, over a snapshot of the
 * handler list taken at publish time: handlers added or removed while an event
 * is in flight only affect later publishes.
 */

import { guardTick } from '../errors/guard.js';
import { ConsoleLogger, type Logger } from '../logging/Logger.js';

export type EventHandler<T = unknown> = (payload: T) => void;

/** Strictly increasing; doubles as the delivery order. */
export type SubscriptionId = number;

/** Scene, entity key or any other token whose lifetime bounds its subscriptions. */
export type SubscriptionOwner = object | string;

export interface BusEvent<M, K extends keyof M = keyof M> {
    kind: K;
    payload: M[K];
}

interface Subscription<M> {
    id: SubscriptionId;
    kind: keyof M;
    owner: SubscriptionOwner | undefined;
    once: boolean;
    deliver(payload: M[keyof M]): void;
}

export interface EventBusOptions {
    logger?: Logger;
    /** Rethrow stale-handle errors raised by handlers instead of logging them. */
    strict?: boolean;
}

export class EventBus<M extends object> {
    private nextId: SubscriptionId = 1;
    private listeners = new Map<keyof M, Subscription<M>[]>();
    private byId = new Map<SubscriptionId, Subscription<M>>();
    private readonly logger: Logger;
    private readonly strict: boolean;

    constructor(options: EventBusOptions = {}) {
        this.logger = (options.logger ?? new ConsoleLogger()).child('EventBus');
        this.strict = options.strict ?? false;
    }

    /** `owner` groups subscriptions for unsubscribeOwner; entities own theirs through `entityKey(id)`. */
    subscribe<K extends keyof M>(kind: K, handler: EventHandler<M[K]>, owner?: SubscriptionOwner): SubscriptionId {
        return this.add(kind, handler, owner, false);
    }

    /** Delivered at most once; removed before the handler runs. */
    once<K extends keyof M>(kind: K, handler: EventHandler<M[K]>, owner?: SubscriptionOwner): SubscriptionId {
        return this.add(kind, handler, owner, true);
    }

    unsubscribe(id: SubscriptionId): boolean {
        const sub = this.byId.get(id);
        if (!sub) return false;
        this.byId.delete(id);
        const list = this.listeners.get(sub.kind);
        if (list) {
            const idx = list.indexOf(sub);
            if (idx !== -1) list.splice(idx, 1);
            if (list.length === 0) this.listeners.delete(sub.kind);
        }
        return true;
    }

    /** Drops every subscription held by `owner`. @returns how many were removed */
    unsubscribeOwner(owner: SubscriptionOwner): number {
        let removed = 0;
        for (const sub of [...this.byId.values()]) {
            if (sub.owner === owner && this.unsubscribe(sub.id)) removed++;
        }
        return removed;
    }

    publish<K extends keyof M>(event: BusEvent<M, K>): void {
        const list = this.listeners.get(event.kind);
        if (!list) return;

        const snapshot = list.slice();
        for (const sub of snapshot) {
            // A nested publish may already have consumed a once-subscription.
            if (sub.once && !this.unsubscribe(sub.id)) continue;
            guardTick(this.logger, this.strict, `handler #${sub.id} for '${String(event.kind)}'`, () =>
                sub.deliver(event.payload),
            );
        }
    }

    listenerCount(kind: keyof M): number {
        return this.listeners.get(kind)?.length ?? 0;
    }

    clear(): void {
        this.listeners.clear();
        this.byId.clear();
    }

    private add<K extends keyof M>(
        kind: K,
        handler: EventHandler<M[K]>,
        owner: SubscriptionOwner | undefined,
        once: boolean,
    ): SubscriptionId {
        const sub: Subscription<M> = { id: this.nextId++, kind, owner, once, deliver: handler };
        const list = this.listeners.get(kind) ?? [];
        list.push(sub);
        this.listeners.set(kind, list);
        this.byId.set(sub.id, sub);
        return sub.id;
    }
}
