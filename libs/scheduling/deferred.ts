/**
 * A promise together with the functions that settle it.
 */
export class Deferred<T> {
    public readonly promise: Promise<T>;
    private resolveFn: (value: T) => void = () => undefined;
    private rejectFn: (error: unknown) => void = () => undefined;
    private settledFlag = false;

    constructor() {
        this.promise = new Promise<T>((resolve, reject) => {
            this.resolveFn = resolve;
            this.rejectFn = reject;
        });
    }

    public get settled(): boolean {
        return this.settledFlag;
    }

    public resolve(value: T): void {
        if (this.settledFlag) return;
        this.settledFlag = true;
        this.resolveFn(value);
    }

    public reject(error: unknown): void {
        if (this.settledFlag) return;
        this.settledFlag = true;
        this.rejectFn(error);
    }
}
