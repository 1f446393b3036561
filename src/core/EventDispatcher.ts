/**
 * Multi-subscriber broadcast hub for decoded MeshCore events.
 * @module core/EventDispatcher
 */
import {MESHCORE_DEFAULT_SUBSCRIBER_CAPACITY} from '../protocols/meshcore/constants';
import {channelClosedError, timeoutError} from '../protocols/meshcore/errors';
import type {MeshCoreEvent} from '../protocols/meshcore/events';
import {type Logger, silentLogger} from '../logger';

export type EventPredicate = (event: MeshCoreEvent) => boolean;

export type RecvResult =
    | {status: 'event'; event: MeshCoreEvent}
    /** Events were dropped from this subscriber's queue since the last receive. */
    | {status: 'lagged'; missed: number}
    | {status: 'closed'}
    | {status: 'timeout'};

export type SubscribeOptions = {
    /** Only queue events accepted by this predicate. */
    filter?: EventPredicate;
    /** Queue bound for this subscriber. */
    capacity?: number;
};

type Receiver = {
    resolve: (result: RecvResult) => void;
    timeoutId: NodeJS.Timeout | null;
};

/**
 * Live feed of events dispatched after it was created.
 *
 * Each subscription owns a bounded queue. When the queue overflows the oldest
 * event is dropped and the next {@link Subscription.recv} reports `lagged`
 * with the number of dropped events before delivery resumes.
 */
export class Subscription implements AsyncIterable<MeshCoreEvent> {
    private queue: MeshCoreEvent[] = [];
    private receivers: Receiver[] = [];
    private missed = 0;
    private closed = false;

    /** @internal Created through {@link EventDispatcher.subscribe}. */
    constructor(
        private readonly capacity: number,
        private readonly filter: EventPredicate | undefined,
        private readonly onClose: (subscription: Subscription) => void,
    ) {}

    public get isClosed(): boolean {
        return this.closed;
    }

    /** Events currently queued. */
    public get pending(): number {
        return this.queue.length;
    }

    /** @internal */
    public push(event: MeshCoreEvent): void {
        if (this.closed) return;
        if (this.filter && !this.filter(event)) return;

        if (this.queue.length === 0 && this.missed === 0) {
            const receiver = this.receivers.shift();
            if (receiver) {
                if (receiver.timeoutId) clearTimeout(receiver.timeoutId);
                receiver.resolve({status: 'event', event});
                return;
            }
        }

        this.queue.push(event);
        if (this.queue.length > this.capacity) {
            this.queue.shift();
            this.missed += 1;
        }
    }

    /**
     * Receive the next queued event, waiting up to `timeoutMs` when the queue is
     * empty. Without a timeout the call waits until an event arrives or the
     * subscription closes.
     */
    public recv(timeoutMs?: number): Promise<RecvResult> {
        if (this.missed > 0) {
            const missed = this.missed;
            this.missed = 0;
            return Promise.resolve({status: 'lagged', missed});
        }
        const event = this.queue.shift();
        if (event) return Promise.resolve({status: 'event', event});
        if (this.closed) return Promise.resolve({status: 'closed'});

        return new Promise<RecvResult>((resolve) => {
            const receiver: Receiver = {resolve, timeoutId: null};
            if (timeoutMs !== undefined) {
                receiver.timeoutId = setTimeout(() => {
                    this.receivers = this.receivers.filter((r) => r !== receiver);
                    resolve({status: 'timeout'});
                }, Math.max(0, timeoutMs));
            }
            this.receivers.push(receiver);
        });
    }

    /**
     * Resolve with the first event matching `predicate`. Lag notices and
     * non-matching events are skipped.
     *
     * Rejects with `RESPONSE_TIMEOUT` after `timeoutMs`, or `CHANNEL_CLOSED`
     * if the subscription is closed first.
     */
    public waitFor<T extends MeshCoreEvent>(predicate: (event: MeshCoreEvent) => event is T, timeoutMs: number): Promise<T>;
    public waitFor(predicate: EventPredicate, timeoutMs: number): Promise<MeshCoreEvent>;
    public async waitFor(predicate: EventPredicate, timeoutMs: number): Promise<MeshCoreEvent> {
        const deadline = Date.now() + timeoutMs;
        for (;;) {
            const result = await this.recv(Math.max(0, deadline - Date.now()));
            if (result.status === 'timeout') throw timeoutError(timeoutMs);
            if (result.status === 'closed') throw channelClosedError();
            if (result.status === 'lagged') continue;
            if (predicate(result.event)) return result.event;
        }
    }

    /**
     * Stop receiving. Pending receives resolve with `closed`; queued events
     * are still returned by later calls.
     */
    public close(): void {
        if (this.closed) return;
        this.closed = true;
        for (const receiver of this.receivers.splice(0, this.receivers.length)) {
            if (receiver.timeoutId) clearTimeout(receiver.timeoutId);
            receiver.resolve({status: 'closed'});
        }
        this.onClose(this);
    }

    public async *[Symbol.asyncIterator](): AsyncIterator<MeshCoreEvent> {
        for (;;) {
            const result = await this.recv();
            if (result.status === 'closed') return;
            if (result.status === 'event') yield result.event;
        }
    }
}

/**
 * Broadcast hub. `dispatch` never blocks; `subscribe` is synchronous and sees
 * every event dispatched after it returns, in dispatch order. A subscription
 * whose filter throws misses that event and is otherwise unaffected.
 */
export class EventDispatcher {
    private readonly subscriptions = new Set<Subscription>();

    constructor(
        private readonly defaultCapacity = MESHCORE_DEFAULT_SUBSCRIBER_CAPACITY,
        private readonly logger: Logger = silentLogger,
    ) {}

    public get subscriberCount(): number {
        return this.subscriptions.size;
    }

    public dispatch(event: MeshCoreEvent): void {
        for (const subscription of this.subscriptions) {
            try {
                subscription.push(event);
            } catch (err) {
                this.logger.warn('MeshCore subscription filter failed', {
                    event: event.type,
                    error: err instanceof Error ? err.message : String(err),
                });
            }
        }
    }

    public subscribe(options: SubscribeOptions = {}): Subscription {
        const subscription = new Subscription(
            Math.max(1, options.capacity ?? this.defaultCapacity),
            options.filter,
            (closed) => {
                this.subscriptions.delete(closed);
            },
        );
        this.subscriptions.add(subscription);
        return subscription;
    }

    /**
     * Subscribe, wait for the first matching event, then unsubscribe.
     */
    public waitFor<T extends MeshCoreEvent>(predicate: (event: MeshCoreEvent) => event is T, timeoutMs: number): Promise<T>;
    public waitFor(predicate: EventPredicate, timeoutMs: number): Promise<MeshCoreEvent>;
    public async waitFor(predicate: EventPredicate, timeoutMs: number): Promise<MeshCoreEvent> {
        const subscription = this.subscribe({filter: predicate});
        try {
            return await subscription.waitFor(predicate, timeoutMs);
        } finally {
            subscription.close();
        }
    }

    /** End every live subscription with `closed`. New subscriptions may follow. */
    public closeAll(): void {
        for (const subscription of [...this.subscriptions]) {
            subscription.close();
        }
    }
}
