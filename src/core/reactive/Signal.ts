/**
 * @file Signal
 *
 * Push-based event streams for presenter pipelines.
 *
 * A `Signal` is hot: every operator subscribes to its source the moment it
 * is called, and observers are notified synchronously in the order they
 * were attached. Values sent before an observer attaches are not replayed.
 * A `Pipe` is the writable end used for input channels.
 *
 * Typed facade over Node's EventEmitter. Listener bookkeeping and ordered
 * dispatch are delegated to the emitter.
 *
 * @module core/reactive/Signal
 */

import { EventEmitter } from 'events';

export type Observer<T> = (value: T) => void;
export type Disposer = () => void;

/**
 * Outcome of an asynchronous step, observed rather than thrown.
 */
export type Materialized<T> =
    | { kind: 'value'; value: T }
    | { kind: 'failure'; error: Error };

/** Internal event channel. */
const CHANNEL = 'value' as const;

/**
 * Read-only event stream with chainable combinators.
 */
export class Signal<T> {
    private readonly emitter: EventEmitter;
    private readonly upstream: Disposer[] = [];
    private disposed: boolean = false;

    constructor() {
        this.emitter = new EventEmitter();
        this.emitter.setMaxListeners(0);
    }

    /**
     * Attach an observer.
     *
     * @returns Detaches this observer only.
     */
    observe(observer: Observer<T>): Disposer {
        if (this.disposed) return (): void => {};
        this.emitter.on(CHANNEL, observer);
        return (): void => {
            this.emitter.off(CHANNEL, observer);
        };
    }

    /**
     * Stop the stream: detach from every source and drop all observers.
     * Idempotent.
     */
    dispose(): void {
        if (this.disposed) return;
        this.disposed = true;
        for (const detach of this.upstream.splice(0)) {
            detach();
        }
        this.emitter.removeAllListeners();
    }

    get isDisposed(): boolean {
        return this.disposed;
    }

    protected value_emit(value: T): void {
        if (this.disposed) return;
        this.emitter.emit(CHANNEL, value);
    }

    protected upstream_attach(...detach: Disposer[]): void {
        if (this.disposed) {
            detach.forEach((d: Disposer): void => d());
            return;
        }
        this.upstream.push(...detach);
    }

    // ─── Transforming ───────────────────────────────────────────────────────

    map<U>(transform: (value: T) => U): Signal<U> {
        return signal_derive((out: Pipe<U>): Disposer[] => [
            this.observe((value: T): void => out.send(transform(value)))
        ]);
    }

    filter<S extends T>(predicate: (value: T) => value is S): Signal<S>;
    filter(predicate: (value: T) => boolean): Signal<T>;
    filter(predicate: (value: T) => boolean): Signal<T> {
        return signal_derive((out: Pipe<T>): Disposer[] => [
            this.observe((value: T): void => {
                if (predicate(value)) out.send(value);
            })
        ]);
    }

    /** Drops `null` and `undefined`. */
    skipNil(): Signal<NonNullable<T>> {
        return this.filter((value: T): value is NonNullable<T> => value !== null && value !== undefined);
    }

    /**
     * Drops values equal to the one forwarded just before. The first value
     * always passes.
     */
    skipRepeats(isEqual: (a: T, b: T) => boolean = Object.is): Signal<T> {
        let last: { value: T } | null = null;
        return signal_derive((out: Pipe<T>): Disposer[] => [
            this.observe((value: T): void => {
                if (last !== null && isEqual(last.value, value)) return;
                last = { value };
                out.send(value);
            })
        ]);
    }

    ignoreValues(): Signal<void> {
        return this.map((): void => undefined);
    }

    /** Runs a side effect for each value before forwarding it. */
    on(effect: (value: T) => void): Signal<T> {
        return this.map((value: T): T => {
            effect(value);
            return value;
        });
    }

    scan<U>(initial: U, reducer: (accumulated: U, value: T) => U): Signal<U> {
        let accumulated: U = initial;
        return signal_derive((out: Pipe<U>): Disposer[] => [
            this.observe((value: T): void => {
                accumulated = reducer(accumulated, value);
                out.send(accumulated);
            })
        ]);
    }

    // ─── Limiting & Sampling ────────────────────────────────────────────────

    /**
     * Forwards the first `count` values, then disposes itself.
     */
    take(count: number): Signal<T> {
        let forwarded: number = 0;
        const out: Signal<T> = signal_derive((pipe: Pipe<T>): Disposer[] => [
            this.observe((value: T): void => {
                if (forwarded >= count) return;
                forwarded += 1;
                pipe.send(value);
                if (forwarded >= count) pipe.dispose();
            })
        ]);
        if (count <= 0) out.dispose();
        return out;
    }

    /**
     * Emits the latest value of this signal every time `trigger` fires.
     * Nothing is emitted until this signal has produced a value.
     */
    takeWhen(trigger: Signal<unknown>): Signal<T> {
        let latest: { value: T } | null = null;
        return signal_derive((out: Pipe<T>): Disposer[] => [
            this.observe((value: T): void => {
                latest = { value };
            }),
            trigger.observe((): void => {
                if (latest !== null) out.send(latest.value);
            })
        ]);
    }

    // ─── Flattening ─────────────────────────────────────────────────────────

    /**
     * Maps each value to an inner signal and forwards only the most recent
     * inner signal's values. The inner signal returned by `project` is owned
     * by this operator and disposed when superseded.
     */
    flatMapLatest<U>(project: (value: T) => Signal<U>): Signal<U> {
        let inner: Signal<U> | null = null;
        return signal_derive((out: Pipe<U>): Disposer[] => [
            this.observe((value: T): void => {
                inner?.dispose();
                inner = project(value);
                inner.observe((innerValue: U): void => out.send(innerValue));
            }),
            (): void => {
                inner?.dispose();
                inner = null;
            }
        ]);
    }

    /**
     * Starts `operation` for every value and forwards each outcome as it
     * settles. Operations run independently: a later value never cancels
     * an earlier one, so results may arrive in any order.
     *
     * @param onDeliveryError - Receives errors thrown by downstream observers
     *   while an outcome is delivered.
     */
    flatMapMaterialized<U>(
        operation: (value: T) => Promise<U>,
        onDeliveryError: (error: Error) => void
    ): Signal<Materialized<U>> {
        return signal_derive((out: Pipe<Materialized<U>>): Disposer[] => [
            this.observe((value: T): void => {
                let pending: Promise<U>;
                try {
                    pending = operation(value);
                } catch (error: unknown) {
                    pending = Promise.reject(error);
                }
                void pending
                    .then(
                        (result: U): Materialized<U> => ({ kind: 'value', value: result }),
                        (error: unknown): Materialized<U> => ({ kind: 'failure', error: error_normalize(error) })
                    )
                    .then((outcome: Materialized<U>): void => out.send(outcome))
                    .catch((error: unknown): void => onDeliveryError(error_normalize(error)));
            })
        ]);
    }

    // ─── Combining ──────────────────────────────────────────────────────────

    /** Forwards every value of every source, in arrival order. */
    static merge<T>(...sources: Signal<T>[]): Signal<T> {
        return signal_derive((out: Pipe<T>): Disposer[] =>
            sources.map((source: Signal<T>): Disposer =>
                source.observe((value: T): void => out.send(value))
            )
        );
    }

    /**
     * Pairs the n-th value of `a` with the n-th value of `b`.
     */
    static zip<A, B>(a: Signal<A>, b: Signal<B>): Signal<[A, B]> {
        const left: A[] = [];
        const right: B[] = [];
        return signal_derive((out: Pipe<[A, B]>): Disposer[] => {
            const flush = (): void => {
                while (left.length > 0 && right.length > 0) {
                    const pair: [A, B] = [left[0], right[0]];
                    left.splice(0, 1);
                    right.splice(0, 1);
                    out.send(pair);
                }
            };
            return [
                a.observe((value: A): void => {
                    left.push(value);
                    flush();
                }),
                b.observe((value: B): void => {
                    right.push(value);
                    flush();
                })
            ];
        });
    }

    /**
     * Emits the latest pair whenever either side changes, once both have
     * produced a value.
     */
    static combineLatest<A, B>(a: Signal<A>, b: Signal<B>): Signal<[A, B]> {
        let latestA: { value: A } | null = null;
        let latestB: { value: B } | null = null;
        return signal_derive((out: Pipe<[A, B]>): Disposer[] => {
            const emit = (): void => {
                if (latestA !== null && latestB !== null) out.send([latestA.value, latestB.value]);
            };
            return [
                a.observe((value: A): void => {
                    latestA = { value };
                    emit();
                }),
                b.observe((value: B): void => {
                    latestB = { value };
                    emit();
                })
            ];
        });
    }
}

/**
 * Writable signal. Input channels of a presenter are pipes.
 */
export class Pipe<T> extends Signal<T> {
    send(value: T): void {
        this.value_emit(value);
    }

    /** Ties a source subscription to this pipe's lifetime. */
    link(...detach: Disposer[]): void {
        this.upstream_attach(...detach);
    }
}

/**
 * Builds a derived signal whose source subscriptions are released when it
 * is disposed.
 */
function signal_derive<U>(connect: (out: Pipe<U>) => Disposer[]): Signal<U> {
    const out: Pipe<U> = new Pipe<U>();
    out.link(...connect(out));
    return out;
}

// ─── Materialized Helpers ──────────────────────────────────────────────────

type MaterializedValue<T> = Extract<Materialized<T>, { kind: 'value' }>;
type MaterializedFailure<T> = Extract<Materialized<T>, { kind: 'failure' }>;

/** Successful outcomes only. */
export function materialized_values<T>(events: Signal<Materialized<T>>): Signal<T> {
    return events
        .filter((event: Materialized<T>): event is MaterializedValue<T> => event.kind === 'value')
        .map((event: MaterializedValue<T>): T => event.value);
}

/** Failed outcomes only. */
export function materialized_failures<T>(events: Signal<Materialized<T>>): Signal<Error> {
    return events
        .filter((event: Materialized<T>): event is MaterializedFailure<T> => event.kind === 'failure')
        .map((event: MaterializedFailure<T>): Error => event.error);
}

function error_normalize(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
