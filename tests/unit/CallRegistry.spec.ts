/**
 * Unit Tests: Call Registry
 *
 * @see libs/calls/callRegistry.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { CallRegistry } from '../../libs/calls/callRegistry.js';
import { defineCall, type CallEnvelope } from '../../libs/calls/types.js';

const ping = defineCall({ name: 'ping' });

function envelope(id: number): CallEnvelope {
    return { id, call: ping, parameters: { id }, registeredAt: 0, attempts: 0, inFlight: false, replay: () => undefined };
}

describe('CallRegistry', () => {
    let registry: CallRegistry;

    beforeEach(() => {
        registry = new CallRegistry();
    });

    describe('envelopes', () => {
        it('should keep envelopes in registration order', () => {
            registry.register(envelope(5));
            registry.register(envelope(2));
            registry.register(envelope(9));

            assert.deepStrictEqual(registry.snapshot().map(entry => entry.id), [5, 2, 9]);
            assert.strictEqual(registry.size, 3);
        });

        it('should reject a duplicate id', () => {
            registry.register(envelope(1));

            assert.throws(() => registry.register(envelope(1)), /already registered/);
        });

        it('should report whether a removal found the envelope', () => {
            registry.register(envelope(1));

            assert.strictEqual(registry.remove(1), true);
            assert.strictEqual(registry.remove(1), false);
            assert.strictEqual(registry.isEmpty(), true);
        });

        it('should look envelopes up by id', () => {
            const entry = envelope(4);
            registry.register(entry);

            assert.strictEqual(registry.get(4), entry);
            assert.strictEqual(registry.has(4), true);
            assert.strictEqual(registry.get(5), undefined);
        });

        it('should return a snapshot unaffected by later changes', () => {
            registry.register(envelope(1));
            const snapshot = registry.snapshot();

            registry.register(envelope(2));
            registry.remove(1);

            assert.deepStrictEqual(snapshot.map(entry => entry.id), [1]);
        });

        it('should list only envelopes without an attempt in flight as idle', () => {
            const busy = envelope(1);
            busy.inFlight = true;
            registry.register(busy);
            registry.register(envelope(2));
            registry.register(envelope(3));

            assert.deepStrictEqual(registry.idle().map(entry => entry.id), [2, 3]);
        });

        it('should empty itself on drain()', () => {
            registry.register(envelope(1));
            registry.register(envelope(2));

            const drained = registry.drain();

            assert.deepStrictEqual(drained.map(entry => entry.id), [1, 2]);
            assert.strictEqual(registry.size, 0);
        });
    });

    describe('cancellation handles', () => {
        it('should abort every tracked handle with the given reason', () => {
            const first = new AbortController();
            const second = new AbortController();
            const reason = new Error('connectivity lost');
            registry.trackCancellation(first);
            registry.trackCancellation(second);

            const aborted = registry.cancelAll(reason);

            assert.strictEqual(aborted, 2);
            assert.strictEqual(first.signal.reason, reason);
            assert.strictEqual(second.signal.aborted, true);
            assert.strictEqual(registry.activeCancellations, 0);
        });

        it('should not abort untracked handles', () => {
            const handle = new AbortController();
            registry.trackCancellation(handle);
            registry.untrackCancellation(handle);

            assert.strictEqual(registry.cancelAll(), 0);
            assert.strictEqual(handle.signal.aborted, false);
        });

        it('should forget handles without aborting them on clearCancellations()', () => {
            const handle = new AbortController();
            registry.trackCancellation(handle);

            registry.clearCancellations();

            assert.strictEqual(registry.activeCancellations, 0);
            assert.strictEqual(handle.signal.aborted, false);
        });
    });
});
