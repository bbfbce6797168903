import { setImmediate as flushImmediate } from 'node:timers/promises';
import type { TickScheduler } from './tickScheduler.js';

export { Deferred } from './deferred.js';

if (process.env.NODE_ENV !== 'test') {
    throw new Error('testOnly helpers must not be imported outside NODE_ENV=test');
}

/**
 * Scheduler whose time only moves when a test says so.
 */
export class ManualTickScheduler implements TickScheduler {
    private waiters: Array<(elapsedMs: number) => void> = [];
    private elapsedTotal = 0;

    public nextTick(): Promise<number> {
        return new Promise(resolve => {
            this.waiters.push(resolve);
        });
    }

    /**
     * Number of suspensions currently waiting for the next tick.
     */
    public get pendingWaiters(): number {
        return this.waiters.length;
    }

    /**
     * Total simulated time handed out so far.
     */
    public get elapsedMs(): number {
        return this.elapsedTotal;
    }

    /**
     * Resolve every current waiter with `elapsedMs`, then let the resulting
     * promise chains run until they suspend again.
     */
    public async tick(elapsedMs: number): Promise<void> {
        const ready = this.waiters;
        this.waiters = [];
        this.elapsedTotal += elapsedMs;
        for (const resolve of ready) {
            resolve(elapsedMs);
        }
        await settle();
    }

    /**
     * Advance `totalMs` in steps of `stepMs`, one tick per step.
     */
    public async advance(totalMs: number, stepMs: number): Promise<void> {
        let remaining = totalMs;
        while (remaining > 0) {
            const step = Math.min(stepMs, remaining);
            await this.tick(step);
            remaining -= step;
        }
    }
}

/**
 * Drain pending microtasks and already-queued immediates.
 */
export async function settle(): Promise<void> {
    await flushImmediate();
    await flushImmediate();
}
