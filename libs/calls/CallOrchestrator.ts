/**
 * Call Orchestrator
 *
 * Public API for remote calls. Resilient calls are wrapped in a retryable
 * envelope and watched by the timeout escalation cycle: when connectivity
 * degrades, every in-flight call is aborted and, once connectivity has been
 * resolved, issued again. Callers only ever see the final result.
 *
 * Features:
 * - any number of concurrent calls share one escalation cycle
 * - per-call loading indicator preference (never, after the spinner deadline, instantly)
 * - transactional call families are serialized
 * - fire-and-forget calls for optimistic flows
 * - `userData` / `resources` embedded in responses are forwarded to app state
 */

import {
    ManagerState,
    SpinnerMode,
    type AppStateSink,
    type CallDescriptor,
    type CallEnvelope,
    type CallParameters,
    type CallTransport,
    type ConnectivityResolver,
    type LoadingIndicator
} from './types.js';
import { CallRegistry } from './callRegistry.js';
import { TransactionLock } from './transactionLock.js';
import { SpinnerArbiter } from './spinnerArbiter.js';
import { TimeoutEscalation, type Countdown } from './timeoutEscalation.js';
import { ConnectivityRecoveryController } from './connectivityRecovery.js';
import { startTask, waitOrCancel } from './callOutcome.js';
import { applyBasePayload } from './basePayload.js';
import { Deferred } from '../scheduling/deferred.js';
import { TimerTickScheduler, type TickScheduler } from '../scheduling/tickScheduler.js';
import { createEventBus, type OrchestratorEventBus } from '../events/events.js';
import { CallIdSequence } from '../id/CallIdSequence.js';
import type { TimeoutConfigSource } from '../config/timeoutConfig.js';
import { EngineDisposedError, ServerFaultError, UsageError } from '../errors/errors.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { getCallLogger, getComponentLogger } from '../logging/logger.js';

const COMPONENT = 'CallOrchestrator';
const logger = getComponentLogger(COMPONENT);

export interface CallOrchestratorDeps {
    transport: CallTransport;
    connectivity: ConnectivityResolver;
    indicator: LoadingIndicator;
    appState: AppStateSink;
    timeouts: TimeoutConfigSource;
    scheduler?: TickScheduler;
    bus?: OrchestratorEventBus;
    ids?: CallIdSequence;
    now?: () => number;
}

/**
 * Introspection view of a registered call.
 */
export interface PendingCallInfo {
    readonly id: number;
    readonly name: string;
    readonly parameters: CallParameters;
    readonly attempts: number;
    /** Milliseconds since the call was registered. */
    readonly ageMs: number;
}

export class CallOrchestrator {
    public readonly bus: OrchestratorEventBus;

    private readonly transport: CallTransport;
    private readonly appState: AppStateSink;
    private readonly ids: CallIdSequence;
    private readonly now: () => number;
    private readonly registry = new CallRegistry();
    private readonly locks: TransactionLock;
    private readonly spinner: SpinnerArbiter;
    private readonly escalation: TimeoutEscalation;
    private readonly recovery: ConnectivityRecoveryController;
    private readonly pendingRejections = new Map<number, (error: unknown) => void>();
    private unsubscribe: (() => void) | null = null;
    private initialized = false;
    private disposed = false;

    constructor(deps: CallOrchestratorDeps) {
        const scheduler = deps.scheduler ?? new TimerTickScheduler();

        this.transport = deps.transport;
        this.appState = deps.appState;
        this.bus = deps.bus ?? createEventBus();
        this.ids = deps.ids ?? new CallIdSequence();
        this.now = deps.now ?? Date.now;
        this.locks = new TransactionLock(scheduler);
        this.spinner = new SpinnerArbiter(deps.indicator, this);
        this.escalation = new TimeoutEscalation({
            registry: this.registry,
            spinner: this.spinner,
            timeouts: deps.timeouts,
            scheduler,
            bus: this.bus,
            onTimedOut: () => this.recovery.recover()
        });
        this.recovery = new ConnectivityRecoveryController(
            this.registry,
            this.spinner,
            this.escalation,
            deps.connectivity
        );
    }

    /**
     * Subscribe to connectivity events. Must be called before dispatching calls.
     */
    public init(): void {
        if (this.disposed) {
            throw new EngineDisposedError();
        }
        if (this.initialized) {
            logger.warn('Call orchestrator already initialized');
            return;
        }

        this.initialized = true;
        this.unsubscribe = this.bus.subscribe('connectivity.changed', event => {
            this.recovery.onConnectivityChanged(event.state);
            return false;
        });
        logger.info('Call orchestrator initialized');
    }

    /**
     * Abort everything in flight and reject every pending caller.
     */
    public dispose(): void {
        if (this.disposed) return;
        this.disposed = true;

        this.unsubscribe?.();
        this.unsubscribe = null;

        this.escalation.dispose();
        this.recovery.dispose();
        this.registry.cancelAll(new EngineDisposedError());
        const dropped = this.registry.drain();
        this.spinner.reset();

        for (const reject of this.pendingRejections.values()) {
            reject(new EngineDisposedError());
        }
        this.pendingRejections.clear();

        logger.info({ dropped: dropped.length }, 'Call orchestrator disposed');
    }

    /**
     * Call the backend with timeout escalation and automatic retry after
     * connectivity issues. Resolves with the call's result once it succeeds;
     * rejects with ServerFaultError if the backend reports a failure.
     *
     * @param spinnerMode loading indicator preference while this call is active
     */
    public async callResilient<T>(
        call: CallDescriptor<T>,
        parameters: CallParameters = {},
        spinnerMode: SpinnerMode = SpinnerMode.AFTER_TIMEOUT
    ): Promise<T> {
        this.assertUsable();
        logger.info({ call: call.name, spinnerMode: SpinnerMode[spinnerMode] }, 'Dispatching resilient call');

        if (call.transactional) {
            await this.locks.acquire(call.name);
        }

        try {
            this.assertUsable();
            this.spinner.request(spinnerMode);

            const result = await this.createAndHandleCall(call, parameters);
            applyBasePayload(result, this.appState, call.name);
            return result;
        } finally {
            if (call.transactional) {
                this.locks.release(call.name);
            }
        }
    }

    /**
     * Call the backend without awaiting anything. Failures are logged only.
     */
    public callFireAndForget<T>(call: CallDescriptor<T>, parameters: CallParameters = {}): void {
        void this.callIgnoreIssues(call, parameters).catch((error: unknown) => {
            const sanitized = ErrorSanitizer.sanitize(error, `Fire-and-forget call ${call.name}`);
            logger.error({
                call: call.name,
                incidentId: sanitized.incidentId,
                code: sanitized.code,
                error: sanitized.message
            }, 'Fire-and-forget call failed');
        });
    }

    /**
     * Call the backend outside of timeout escalation and retry, without a spinner.
     * Faults and cancellations resolve with `undefined`.
     */
    public async callIgnoreIssues<T>(
        call: CallDescriptor<T>,
        parameters: CallParameters = {}
    ): Promise<T | undefined> {
        this.assertUsable();
        logger.info({ call: call.name }, 'Dispatching call without issue handling');

        if (call.transactional) {
            throw new UsageError(`Transactional call ${call.name} cannot ignore issues`);
        }

        const handle = new AbortController();
        const outcome = await waitOrCancel(
            startTask(() => this.transport.invoke(call, parameters, handle)),
            handle.signal
        );

        let result: T | undefined;
        switch (outcome.status) {
            case 'succeeded':
                result = outcome.value;
                break;
            case 'faulted': {
                // Silent: logged for diagnosis, no error flow.
                const sanitized = ErrorSanitizer.sanitize(outcome.error, `Call ${call.name}`);
                logger.warn({
                    call: call.name,
                    incidentId: sanitized.incidentId,
                    error: sanitized.message
                }, 'Best-effort call faulted');
                break;
            }
            case 'cancelled':
                this.recovery.handleConnectivityCancellation(`${call.name} cancelled`);
                break;
        }

        try {
            applyBasePayload(result, this.appState, call.name);
        } catch (error: unknown) {
            const sanitized = ErrorSanitizer.sanitize(error, `Applying payload of ${call.name}`);
            logger.warn({
                call: call.name,
                incidentId: sanitized.incidentId,
                error: sanitized.message
            }, 'Best-effort call payload not applied');
        }
        return result;
    }

    /**
     * Leave the ERROR state once the application's error flow has handled the fault.
     */
    public clearError(): void {
        if (this.recovery.resumeAfterError()) {
            logger.info({ registered: this.registry.size }, 'Error state cleared');
        }
    }

    public getState(): ManagerState {
        return this.escalation.state;
    }

    public getSpinnerMode(): SpinnerMode {
        return this.spinner.effectiveMode;
    }

    public isSpinnerVisible(): boolean {
        return this.spinner.isVisible;
    }

    public getCountdown(): Countdown | null {
        return this.escalation.countdown;
    }

    public pendingCallCount(): number {
        return this.registry.size;
    }

    public activeCancellationCount(): number {
        return this.registry.activeCancellations;
    }

    public pendingCalls(): PendingCallInfo[] {
        const now = this.now();
        return this.registry.snapshot().map(envelope => ({
            id: envelope.id,
            name: envelope.call.name,
            parameters: envelope.parameters,
            attempts: envelope.attempts,
            ageMs: now - envelope.registeredAt
        }));
    }

    public isTransactionHeld(family: string): boolean {
        return this.locks.isHeld(family);
    }

    /**
     * Register the call, run it unless a timeout is being resolved (the
     * upcoming replay picks it up then) and wait for its result.
     */
    private createAndHandleCall<T>(call: CallDescriptor<T>, parameters: CallParameters): Promise<T> {
        const result = new Deferred<T>();
        const envelope: CallEnvelope = {
            id: this.ids.next(),
            call,
            parameters,
            registeredAt: this.now(),
            attempts: 0,
            inFlight: false,
            replay: () => {
                void this.execute(envelope, call, result);
            }
        };

        this.registry.register(envelope);
        this.pendingRejections.set(envelope.id, error => result.reject(error));

        if (this.escalation.state !== ManagerState.TIMED_OUT) {
            envelope.replay();
            this.escalation.start();
        } else {
            logger.info({ callId: envelope.id, call: call.name }, 'Call queued until connectivity is resolved');
        }

        return result.promise;
    }

    /**
     * One attempt of a registered call under a fresh cancellation handle.
     * Success and server faults conclude the envelope; a cancellation leaves it
     * registered so recovery can replay it.
     */
    private async execute<T>(envelope: CallEnvelope, call: CallDescriptor<T>, result: Deferred<T>): Promise<void> {
        const handle = new AbortController();
        this.registry.trackCancellation(handle);
        envelope.attempts += 1;
        envelope.inFlight = true;

        const callLogger = getCallLogger(COMPONENT, {
            id: envelope.id,
            name: call.name,
            attempt: envelope.attempts
        });
        callLogger.debug({ parameters: envelope.parameters }, 'Issuing remote call');

        const outcome = await waitOrCancel(
            startTask(() => this.transport.invoke(call, envelope.parameters, handle)),
            handle.signal
        );
        this.registry.untrackCancellation(handle);
        envelope.inFlight = false;

        switch (outcome.status) {
            case 'succeeded':
                this.conclude(envelope.id);
                callLogger.debug('Remote call succeeded');
                result.resolve(outcome.value);
                break;
            case 'faulted': {
                this.conclude(envelope.id);
                const fault = new ServerFaultError(call.name, envelope.id, outcome.error);
                this.recovery.handleServerFault(fault);
                result.reject(fault);
                break;
            }
            case 'cancelled':
                callLogger.info('Remote call cancelled; kept for retry');
                this.recovery.handleConnectivityCancellation(`${call.name} cancelled`);
                break;
        }
    }

    private conclude(id: number): void {
        this.registry.remove(id);
        this.pendingRejections.delete(id);
    }

    private assertUsable(): void {
        if (this.disposed) {
            throw new EngineDisposedError();
        }
        if (!this.initialized) {
            throw new UsageError('Call orchestrator used before init()');
        }
    }
}
