import type { CallEnvelope } from './types.js';

/**
 * Tracks every in-flight logical call and every live cancellation handle
 * of the resilient path.
 *
 * Envelopes are kept in registration order, which is also the replay order.
 */
export class CallRegistry {
    private readonly envelopes = new Map<number, CallEnvelope>();
    private readonly cancellations = new Set<AbortController>();

    public register(envelope: CallEnvelope): void {
        if (this.envelopes.has(envelope.id)) {
            throw new Error(`Call #${envelope.id} is already registered`);
        }
        this.envelopes.set(envelope.id, envelope);
    }

    /**
     * @returns whether the envelope was still registered
     */
    public remove(id: number): boolean {
        return this.envelopes.delete(id);
    }

    public get(id: number): CallEnvelope | undefined {
        return this.envelopes.get(id);
    }

    public has(id: number): boolean {
        return this.envelopes.has(id);
    }

    public get size(): number {
        return this.envelopes.size;
    }

    public isEmpty(): boolean {
        return this.envelopes.size === 0;
    }

    /**
     * Snapshot in registration order; safe to iterate while calls register or complete.
     */
    public snapshot(): CallEnvelope[] {
        return [...this.envelopes.values()];
    }

    /**
     * Registered envelopes with no attempt awaiting the transport, in registration order.
     */
    public idle(): CallEnvelope[] {
        return this.snapshot().filter(envelope => !envelope.inFlight);
    }

    public trackCancellation(handle: AbortController): void {
        this.cancellations.add(handle);
    }

    public untrackCancellation(handle: AbortController): void {
        this.cancellations.delete(handle);
    }

    public get activeCancellations(): number {
        return this.cancellations.size;
    }

    /**
     * Abort every tracked handle and forget them.
     * @returns number of handles aborted
     */
    public cancelAll(reason?: unknown): number {
        const handles = [...this.cancellations];
        this.cancellations.clear();
        for (const handle of handles) {
            handle.abort(reason);
        }
        return handles.length;
    }

    public clearCancellations(): void {
        this.cancellations.clear();
    }

    /**
     * Drop everything; used on engine disposal.
     */
    public drain(): CallEnvelope[] {
        const drained = this.snapshot();
        this.envelopes.clear();
        return drained;
    }
}
