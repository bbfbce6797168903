/**
 * Timeout Escalation State Machine
 *
 * One escalation cycle runs per burst of resilient calls:
 *
 *   IDLE -> PROCESSING -(spinner phase)-> spinner shown -(popup phase)-> TIMED_OUT
 *
 * The cycle returns to IDLE as soon as the registry is empty, and stops without
 * escalating when a server fault moves the engine to ERROR. Aborting the cycle's
 * clock (connectivity loss) skips the remaining waits and declares the timeout.
 *
 * Phase deadlines only ever grow: a call arriving mid-phase posts a fresh
 * duration that is added once to the running countdown.
 */

import { ManagerState, TimeoutPhase } from './types.js';
import type { CallRegistry } from './callRegistry.js';
import type { SpinnerArbiter } from './spinnerArbiter.js';
import type { TickScheduler } from '../scheduling/tickScheduler.js';
import type { EscalationTimeouts, TimeoutConfigSource } from '../config/timeoutConfig.js';
import type { OrchestratorEventBus } from '../events/events.js';
import { getComponentLogger } from '../logging/logger.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';

const logger = getComponentLogger('TimeoutEscalation');

export interface Countdown {
    readonly phase: TimeoutPhase;
    readonly remainingMs: number;
}

export interface TimeoutEscalationOptions {
    registry: CallRegistry;
    spinner: SpinnerArbiter;
    timeouts: TimeoutConfigSource;
    scheduler: TickScheduler;
    bus: OrchestratorEventBus;
    /** Invoked after TIMED_OUT is declared; the cycle ends when it settles. */
    onTimedOut: () => Promise<void>;
}

export class TimeoutEscalation {
    private currentState: ManagerState = ManagerState.IDLE;
    private readonly posted: Record<TimeoutPhase, number>;
    private lastGoodTimeouts: EscalationTimeouts;
    private clock: AbortController | null = null;
    private cycle = 0;
    private disposed = false;
    private activeCountdown: Countdown | null = null;

    constructor(private readonly options: TimeoutEscalationOptions) {
        this.lastGoodTimeouts = options.timeouts.current();
        this.posted = {
            [TimeoutPhase.TO_SPINNER]: this.lastGoodTimeouts.spinnerMs,
            [TimeoutPhase.TO_POPUP]: this.lastGoodTimeouts.popupMs
        };
    }

    public get state(): ManagerState {
        return this.currentState;
    }

    /**
     * Countdown of the running phase, or null outside of a phase.
     */
    public get countdown(): Countdown | null {
        return this.activeCountdown;
    }

    public get cycleCount(): number {
        return this.cycle;
    }

    /**
     * Whether the current cycle's clock has been aborted.
     */
    public get interrupted(): boolean {
        return this.clock?.signal.aborted ?? false;
    }

    /**
     * Entry point, called for every dispatched call.
     * Posts fresh phase durations; starts a cycle only when IDLE.
     */
    public start(): void {
        if (this.disposed) return;

        this.postConfiguredTimeouts();

        if (this.currentState !== ManagerState.IDLE) {
            return;
        }

        this.transition(ManagerState.PROCESSING);
        this.cycle += 1;
        const clock = new AbortController();
        this.clock = clock;

        logger.debug({ cycle: this.cycle, timeouts: this.lastGoodTimeouts }, 'Escalation cycle started');
        void this.run(clock.signal, this.cycle);
    }

    /**
     * Abort the running cycle's clock so it proceeds straight to the timeout
     * declaration (or exits, if the state already left PROCESSING).
     */
    public interrupt(reason: string): void {
        if (!this.clock || this.clock.signal.aborted) return;
        logger.info({ cycle: this.cycle, reason, state: this.currentState }, 'Escalation clock aborted');
        this.clock.abort(reason);
    }

    /**
     * Server fault: short-circuit the ladder without waiting for a phase to expire.
     */
    public fail(): void {
        this.transition(ManagerState.ERROR);
        this.activeCountdown = null;
        this.interrupt('server fault');
    }

    /**
     * Leave ERROR. Calls still registered get a fresh cycle.
     * @returns whether the state was ERROR
     */
    public recoverFromError(): boolean {
        if (this.currentState !== ManagerState.ERROR) return false;

        this.transition(ManagerState.IDLE);
        if (this.options.registry.isEmpty()) {
            this.options.spinner.reset();
            this.options.registry.clearCancellations();
        } else {
            this.start();
        }
        return true;
    }

    /**
     * Recovery finished resolving connectivity; a replay is about to start.
     */
    public markRecovered(): void {
        this.transition(ManagerState.IDLE);
    }

    public dispose(): void {
        this.disposed = true;
        this.activeCountdown = null;
        this.clock?.abort('disposed');
    }

    private async run(clock: AbortSignal, cycle: number): Promise<void> {
        try {
            // Calls dispatched in the same tick join this cycle without extending it.
            await this.options.scheduler.nextTick();

            await this.timeOutOrFinish(TimeoutPhase.TO_SPINNER, clock, cycle);
            if (this.isSettled(cycle)) return;

            this.options.spinner.onSpinnerDeadline();

            await this.timeOutOrFinish(TimeoutPhase.TO_POPUP, clock, cycle);
            if (this.isSettled(cycle)) return;

            this.declareTimeout();
            await this.options.onTimedOut();
        } catch (error) {
            const sanitized = ErrorSanitizer.sanitize(error, 'Escalation cycle');
            logger.error({
                cycle,
                incidentId: sanitized.incidentId,
                error: sanitized.message
            }, 'Escalation cycle failed');

            if (cycle === this.cycle && !this.disposed) {
                this.options.spinner.hide();
                this.transition(ManagerState.ERROR);
            }
        }
    }

    /**
     * Count down one phase, one tick at a time, or finish the cycle early once
     * every call has completed.
     */
    private async timeOutOrFinish(phase: TimeoutPhase, clock: AbortSignal, cycle: number): Promise<void> {
        if (clock.aborted) return;

        let remaining = this.posted[phase];
        // From here on, a non-zero posted value is an extension from a newly arrived call.
        this.posted[phase] = 0;
        this.activeCountdown = { phase, remainingMs: remaining };

        while (remaining > 0) {
            const elapsed = await this.options.scheduler.nextTick();
            if (cycle !== this.cycle || this.disposed || clock.aborted) return;

            const extension = this.posted[phase];
            if (extension > 0) {
                remaining += extension;
                this.posted[phase] = 0;
                logger.debug({ cycle, phase, extensionMs: extension }, 'Deadline extended by arriving call');
            }

            remaining -= elapsed;
            this.activeCountdown = { phase, remainingMs: Math.max(remaining, 0) };

            if (this.options.registry.isEmpty()) {
                this.finish();
                return;
            }
        }
    }

    private isSettled(cycle: number): boolean {
        return this.disposed ||
            cycle !== this.cycle ||
            this.currentState === ManagerState.IDLE ||
            this.currentState === ManagerState.ERROR;
    }

    private finish(): void {
        this.transition(ManagerState.IDLE);
        this.activeCountdown = null;
        this.options.spinner.reset();
        this.postConfiguredTimeouts();
        this.options.registry.clearCancellations();
        logger.debug({ cycle: this.cycle }, 'All calls concluded');
    }

    private declareTimeout(): void {
        this.transition(ManagerState.TIMED_OUT);
        this.activeCountdown = null;
        this.options.spinner.hide();

        const pendingCallIds = this.options.registry.snapshot().map(envelope => envelope.id);
        logger.warn({ cycle: this.cycle, pendingCallIds }, 'Calls timed out');
        this.options.bus.fire({ type: 'calls.timedOut', pendingCallIds });
    }

    private postConfiguredTimeouts(): void {
        try {
            this.lastGoodTimeouts = this.options.timeouts.current();
        } catch (error) {
            const sanitized = ErrorSanitizer.sanitize(error, 'Reading escalation timeouts');
            logger.error({
                incidentId: sanitized.incidentId,
                error: sanitized.message,
                fallback: this.lastGoodTimeouts
            }, 'Timeout configuration unreadable; keeping last known values');
        }

        this.posted[TimeoutPhase.TO_SPINNER] = this.lastGoodTimeouts.spinnerMs;
        this.posted[TimeoutPhase.TO_POPUP] = this.lastGoodTimeouts.popupMs;
    }

    private transition(next: ManagerState): void {
        const from = this.currentState;
        if (from === next) return;
        this.currentState = next;
        logger.debug({ from, to: next }, 'State transition');
        this.options.bus.fire({ type: 'calls.stateChanged', from, to: next });
    }
}
