import { ManagerState, SpinnerMode, type ConnectivityResolver } from './types.js';
import type { CallRegistry } from './callRegistry.js';
import type { SpinnerArbiter } from './spinnerArbiter.js';
import type { TimeoutEscalation } from './timeoutEscalation.js';
import { ConnectivityState, isConnectivityLoss } from '../events/events.js';
import { ConnectivityLostError, ServerFaultError, describeCause } from '../errors/errors.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('ConnectivityRecovery');

/**
 * Connectivity Recovery Controller
 *
 * Owns what happens after the escalation ladder gives up (abort, resolve
 * connectivity, replay) and the shortcuts into that ladder: server faults stop
 * it, connectivity signals fast-forward it.
 */
export class ConnectivityRecoveryController {
    private resolutions = 0;
    private replays = 0;
    private disposed = false;

    constructor(
        private readonly registry: CallRegistry,
        private readonly spinner: SpinnerArbiter,
        private readonly escalation: TimeoutEscalation,
        private readonly resolver: ConnectivityResolver
    ) { }

    /**
     * Number of times the connectivity resolver has been awaited.
     */
    public get resolutionCount(): number {
        return this.resolutions;
    }

    /**
     * Number of envelope replays issued by recoveries.
     */
    public get replayCount(): number {
        return this.replays;
    }

    /**
     * Entered from a declared timeout: abort every in-flight call, wait for
     * connectivity, then replay every registered call.
     */
    public async recover(): Promise<void> {
        const aborted = this.registry.cancelAll(new ConnectivityLostError('Escalation deadline exceeded'));
        logger.warn({ aborted, registered: this.registry.size }, 'Aborted in-flight calls; resolving connectivity');

        this.resolutions += 1;
        await this.resolver.resolve(true);

        if (this.disposed) return;
        this.reattempt();
    }

    /**
     * Replay every registered call, first-registered-first, under an instantly
     * visible spinner and a fresh escalation cycle.
     */
    public reattempt(): void {
        this.escalation.markRecovered();

        const envelopes = this.registry.snapshot();
        for (const envelope of envelopes) {
            envelope.replay();
        }
        this.replays += envelopes.length;

        logger.info({ replayed: envelopes.map(envelope => envelope.id) }, 'Reattempting calls after connectivity recovery');

        this.spinner.force(SpinnerMode.INSTANT);
        this.escalation.start();
    }

    /**
     * Leave ERROR: re-issue the registered calls no attempt is waiting on
     * (cancelled while the fault stood), then restart escalation.
     * @returns whether the engine was in ERROR
     */
    public resumeAfterError(): boolean {
        if (this.escalation.state !== ManagerState.ERROR) return false;

        const idle = this.registry.idle();
        for (const envelope of idle) {
            envelope.replay();
        }
        this.replays += idle.length;
        this.escalation.recoverFromError();

        logger.info({ replayed: idle.map(envelope => envelope.id), registered: this.registry.size }, 'Resumed after error');
        return true;
    }

    /**
     * A resilient call faulted outright.
     */
    public handleServerFault(fault: ServerFaultError): void {
        this.spinner.hide();
        this.escalation.fail();

        logger.error({
            incidentId: fault.incidentId,
            call: fault.callName,
            callId: fault.callId,
            cause: describeCause(fault.cause)
        }, 'Remote call faulted');
    }

    /**
     * A call was cancelled without an explicit fault: treat it as a
     * connectivity problem and let the escalation cycle own the recovery.
     */
    public handleConnectivityCancellation(reason: string): void {
        this.escalation.interrupt(reason);
    }

    public onConnectivityChanged(state: ConnectivityState): void {
        if (!isConnectivityLoss(state)) return;
        logger.info({ state }, 'Connectivity loss reported');
        this.escalation.interrupt(`connectivity ${state}`);
    }

    public dispose(): void {
        this.disposed = true;
    }
}
