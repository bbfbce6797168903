/**
 * Unit Tests: Spinner Arbiter
 *
 * @see libs/calls/spinnerArbiter.ts
 */

import { describe, it, beforeEach, mock } from 'node:test';
import assert from 'node:assert';
import { SpinnerArbiter } from '../../libs/calls/spinnerArbiter.js';
import { SpinnerMode } from '../../libs/calls/types.js';

describe('SpinnerArbiter', () => {
    const owner = { label: 'engine' };
    let indicator: {
        show: ReturnType<typeof createIndicatorFn>;
        hide: ReturnType<typeof createIndicatorFn>;
    };
    let spinner: SpinnerArbiter;

    beforeEach(() => {
        indicator = { show: createIndicatorFn(), hide: createIndicatorFn() };
        spinner = new SpinnerArbiter(indicator, owner);
    });

    it('should start invisible', () => {
        assert.strictEqual(spinner.effectiveMode, SpinnerMode.INVISIBLE);
        assert.strictEqual(spinner.isVisible, false);
    });

    it('should only ever raise the mode on request()', () => {
        spinner.request(SpinnerMode.AFTER_TIMEOUT);
        spinner.request(SpinnerMode.INVISIBLE);

        assert.strictEqual(spinner.effectiveMode, SpinnerMode.AFTER_TIMEOUT);
        assert.strictEqual(spinner.isVisible, false);
    });

    it('should show immediately for INSTANT, passing its owner', () => {
        spinner.request(SpinnerMode.INSTANT);
        spinner.request(SpinnerMode.INSTANT);

        assert.strictEqual(spinner.isVisible, true);
        assert.strictEqual(indicator.show.mock.callCount(), 1);
        assert.strictEqual(indicator.show.mock.calls[0]?.arguments[0], owner);
    });

    it('should show at the spinner deadline only for AFTER_TIMEOUT', () => {
        spinner.request(SpinnerMode.INVISIBLE);
        spinner.onSpinnerDeadline();
        assert.strictEqual(spinner.isVisible, false);

        spinner.request(SpinnerMode.AFTER_TIMEOUT);
        spinner.onSpinnerDeadline();
        assert.strictEqual(spinner.isVisible, true);
    });

    it('should set the mode unconditionally on force()', () => {
        spinner.request(SpinnerMode.INSTANT);

        spinner.force(SpinnerMode.INVISIBLE);

        assert.strictEqual(spinner.effectiveMode, SpinnerMode.INVISIBLE);
        assert.strictEqual(spinner.isVisible, true);
    });

    it('should hide and return to INVISIBLE on reset()', () => {
        spinner.request(SpinnerMode.INSTANT);

        spinner.reset();
        spinner.reset();

        assert.strictEqual(spinner.effectiveMode, SpinnerMode.INVISIBLE);
        assert.strictEqual(spinner.isVisible, false);
        assert.strictEqual(indicator.hide.mock.callCount(), 1);
    });

    it('should not call the indicator to hide what is not shown', () => {
        spinner.hide();

        assert.strictEqual(indicator.hide.mock.callCount(), 0);
    });
});

function createIndicatorFn() {
    return mock.fn((_owner: object): void => undefined);
}
