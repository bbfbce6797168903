/**
 * Source of cooperative scheduling ticks.
 *
 * Every wait inside the engine (escalation phases, transaction lock polling,
 * the deferral before a cycle starts) suspends on `nextTick()`. The resolved
 * value is the number of milliseconds that passed while waiting.
 */
export interface TickScheduler {
    nextTick(): Promise<number>;
}

export const DEFAULT_TICK_RESOLUTION_MS = 16;

/**
 * Timer-backed scheduler for production use.
 */
export class TimerTickScheduler implements TickScheduler {
    constructor(
        private readonly resolutionMs: number = DEFAULT_TICK_RESOLUTION_MS,
        private readonly now: () => number = () => performance.now()
    ) {
        if (!Number.isFinite(resolutionMs) || resolutionMs <= 0) {
            throw new Error(`Tick resolution must be a positive number of milliseconds, got ${resolutionMs}`);
        }
    }

    public nextTick(): Promise<number> {
        const startedAt = this.now();
        return new Promise(resolve => {
            setTimeout(() => resolve(this.now() - startedAt), this.resolutionMs);
        });
    }
}
