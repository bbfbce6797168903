/**
 * Unit Tests: Timeout Escalation
 *
 * Exercises the escalation state machine in isolation, with a real registry
 * and spinner arbiter and a manual tick scheduler.
 *
 * @see libs/calls/timeoutEscalation.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { TimeoutEscalation } from '../../libs/calls/timeoutEscalation.js';
import { CallRegistry } from '../../libs/calls/callRegistry.js';
import { SpinnerArbiter } from '../../libs/calls/spinnerArbiter.js';
import { ManagerState, SpinnerMode, TimeoutPhase, defineCall, type CallEnvelope } from '../../libs/calls/types.js';
import { createEventBus, type OrchestratorEventBus } from '../../libs/events/events.js';
import { createStaticTimeoutSource, type EscalationTimeouts, type TimeoutConfigSource } from '../../libs/config/timeoutConfig.js';
import { ConfigurationError } from '../../libs/errors/errors.js';
import { ManualTickScheduler } from '../../libs/scheduling/testOnly.js';

const ping = defineCall({ name: 'ping' });

function envelope(id: number): CallEnvelope {
    return { id, call: ping, parameters: {}, registeredAt: 0, attempts: 1, inFlight: false, replay: () => undefined };
}

describe('TimeoutEscalation', () => {
    let registry: CallRegistry;
    let scheduler: ManualTickScheduler;
    let bus: OrchestratorEventBus;
    let spinner: SpinnerArbiter;
    let onTimedOut: () => Promise<void>;
    let timedOutCalls: number;

    const build = (timeouts: TimeoutConfigSource = createStaticTimeoutSource({ spinnerMs: 200, popupMs: 200 })) =>
        new TimeoutEscalation({ registry, spinner, timeouts, scheduler, bus, onTimedOut });

    beforeEach(() => {
        registry = new CallRegistry();
        scheduler = new ManualTickScheduler();
        bus = createEventBus();
        spinner = new SpinnerArbiter({ show: () => undefined, hide: () => undefined }, {});
        timedOutCalls = 0;
        onTimedOut = async () => {
            timedOutCalls += 1;
        };
    });

    it('should read the timeout configuration at construction', () => {
        const broken: TimeoutConfigSource = {
            current: () => {
                throw new ConfigurationError('timeouts unavailable');
            }
        };

        assert.throws(() => build(broken), ConfigurationError);
    });

    it('should start one cycle however many calls arrive', () => {
        const escalation = build();
        registry.register(envelope(1));

        escalation.start();
        escalation.start();

        assert.strictEqual(escalation.state, ManagerState.PROCESSING);
        assert.strictEqual(escalation.cycleCount, 1);
        assert.strictEqual(scheduler.pendingWaiters, 1);
    });

    it('should return to IDLE once the registry drains', async () => {
        const escalation = build();
        registry.register(envelope(1));
        registry.trackCancellation(new AbortController());
        escalation.start();

        await scheduler.tick(50);
        registry.remove(1);
        await scheduler.tick(50);

        assert.strictEqual(escalation.state, ManagerState.IDLE);
        assert.strictEqual(escalation.countdown, null);
        assert.strictEqual(registry.activeCancellations, 0);
        assert.strictEqual(scheduler.pendingWaiters, 0);
    });

    it('should show the spinner after the first phase and time out after the second', async () => {
        const escalation = build();
        const timedOut: number[][] = [];
        bus.subscribe('calls.timedOut', event => {
            timedOut.push([...event.pendingCallIds]);
            return false;
        });
        registry.register(envelope(7));
        spinner.request(SpinnerMode.AFTER_TIMEOUT);
        escalation.start();

        await scheduler.advance(300, 100);
        assert.strictEqual(spinner.isVisible, true);
        assert.deepStrictEqual(escalation.countdown, { phase: TimeoutPhase.TO_POPUP, remainingMs: 200 });
        assert.strictEqual(timedOutCalls, 0);

        await scheduler.advance(200, 100);
        assert.strictEqual(escalation.state, ManagerState.TIMED_OUT);
        assert.strictEqual(spinner.isVisible, false);
        assert.strictEqual(escalation.countdown, null);
        assert.strictEqual(timedOutCalls, 1);
        assert.deepStrictEqual(timedOut, [[7]]);
    });

    it('should declare the timeout on the next tick once interrupted', async () => {
        const escalation = build(createStaticTimeoutSource({ spinnerMs: 10_000, popupMs: 10_000 }));
        registry.register(envelope(1));
        escalation.start();
        await scheduler.tick(16);

        escalation.interrupt('connectivity UNREACHABLE');
        assert.strictEqual(escalation.interrupted, true);
        await scheduler.tick(16);

        assert.strictEqual(escalation.state, ManagerState.TIMED_OUT);
        assert.strictEqual(timedOutCalls, 1);
    });

    it('should stop without escalating after fail()', async () => {
        const escalation = build();
        registry.register(envelope(1));
        escalation.start();
        await scheduler.tick(100);

        escalation.fail();
        await scheduler.advance(1000, 100);

        assert.strictEqual(escalation.state, ManagerState.ERROR);
        assert.strictEqual(escalation.countdown, null);
        assert.strictEqual(timedOutCalls, 0);
    });

    it('should use a changed configuration from the next start()', async () => {
        let timeouts: EscalationTimeouts = { spinnerMs: 1000, popupMs: 1000 };
        const escalation = build({ current: () => timeouts });
        registry.register(envelope(1));

        timeouts = { spinnerMs: 250, popupMs: 250 };
        escalation.start();
        await scheduler.tick(16);

        assert.deepStrictEqual(escalation.countdown, { phase: TimeoutPhase.TO_SPINNER, remainingMs: 250 });
    });

    it('should keep the last readable configuration when the source starts failing', async () => {
        let reads = 0;
        const escalation = build({
            current: () => {
                reads += 1;
                if (reads > 1) {
                    throw new ConfigurationError('timeouts unavailable');
                }
                return { spinnerMs: 300, popupMs: 300 };
            }
        });
        registry.register(envelope(1));

        escalation.start();
        await scheduler.tick(16);

        assert.strictEqual(escalation.state, ManagerState.PROCESSING);
        assert.deepStrictEqual(escalation.countdown, { phase: TimeoutPhase.TO_SPINNER, remainingMs: 300 });
    });

    it('should move to ERROR when recovery after a timeout throws', async () => {
        onTimedOut = async () => {
            throw new Error('resolver crashed');
        };
        const escalation = build(createStaticTimeoutSource({ spinnerMs: 100, popupMs: 100 }));
        registry.register(envelope(1));
        escalation.start();

        await scheduler.advance(300, 100);

        assert.strictEqual(escalation.state, ManagerState.ERROR);
    });

    it('should leave ERROR through recoverFromError()', async () => {
        const escalation = build();
        registry.register(envelope(1));
        escalation.start();
        escalation.fail();

        assert.strictEqual(escalation.recoverFromError(), true);
        assert.strictEqual(escalation.state, ManagerState.PROCESSING);
        assert.strictEqual(escalation.cycleCount, 2);
        assert.strictEqual(escalation.recoverFromError(), false);
    });

    it('should publish every state transition', () => {
        const escalation = build();
        const transitions: string[] = [];
        bus.subscribe('calls.stateChanged', event => {
            transitions.push(`${event.from}->${event.to}`);
            return false;
        });
        registry.register(envelope(1));

        escalation.start();
        escalation.fail();
        escalation.recoverFromError();

        assert.deepStrictEqual(transitions, [
            'IDLE->PROCESSING',
            'PROCESSING->ERROR',
            'ERROR->IDLE',
            'IDLE->PROCESSING'
        ]);
    });

    it('should ignore start() after dispose()', async () => {
        const escalation = build();
        registry.register(envelope(1));

        escalation.dispose();
        escalation.start();
        await scheduler.tick(16);

        assert.strictEqual(escalation.state, ManagerState.IDLE);
        assert.strictEqual(escalation.cycleCount, 0);
    });
});
