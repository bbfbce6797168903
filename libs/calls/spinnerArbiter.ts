import { SpinnerMode, type LoadingIndicator } from './types.js';

/**
 * Merges the spinner preferences of all contributing calls into one decision
 * and owns the engine's claim on the loading indicator.
 */
export class SpinnerArbiter {
    private mode: SpinnerMode = SpinnerMode.INVISIBLE;
    private visible = false;

    constructor(
        private readonly indicator: LoadingIndicator,
        private readonly owner: object
    ) { }

    public get effectiveMode(): SpinnerMode {
        return this.mode;
    }

    public get isVisible(): boolean {
        return this.visible;
    }

    /**
     * Raise the effective mode to `requested` if it is higher. Never lowers it.
     */
    public request(requested: SpinnerMode): void {
        if (requested > this.mode) {
            this.mode = requested;
        }

        if (this.mode === SpinnerMode.INSTANT) {
            this.show();
        }
    }

    /**
     * Set the mode regardless of the current value.
     */
    public force(mode: SpinnerMode): void {
        this.mode = mode;
        if (mode === SpinnerMode.INSTANT) {
            this.show();
        }
    }

    /**
     * Called once the spinner phase elapsed without all calls finishing.
     */
    public onSpinnerDeadline(): void {
        if (this.mode === SpinnerMode.AFTER_TIMEOUT) {
            this.show();
        }
    }

    public reset(): void {
        this.mode = SpinnerMode.INVISIBLE;
        this.hide();
    }

    public show(): void {
        if (this.visible) return;
        this.visible = true;
        this.indicator.show(this.owner);
    }

    public hide(): void {
        if (!this.visible) return;
        this.visible = false;
        this.indicator.hide(this.owner);
    }
}
