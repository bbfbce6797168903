import type { TickScheduler } from '../scheduling/tickScheduler.js';

/**
 * Per call-family gate: at most one transactional call of a family runs at a time.
 *
 * Waiters poll once per scheduler tick. There is no fairness among waiters and
 * no timeout; a family that is never released starves its waiters.
 */
export class TransactionLock {
    private readonly held = new Map<string, boolean>();

    constructor(private readonly scheduler: TickScheduler) { }

    public async acquire(family: string): Promise<void> {
        while (this.held.get(family) === true) {
            await this.scheduler.nextTick();
        }
        this.held.set(family, true);
    }

    public release(family: string): void {
        this.held.set(family, false);
    }

    public isHeld(family: string): boolean {
        return this.held.get(family) === true;
    }

    public heldFamilies(): string[] {
        return [...this.held.entries()].filter(([, isHeld]) => isHeld).map(([family]) => family);
    }
}
