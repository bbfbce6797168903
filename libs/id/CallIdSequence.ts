/**
 * Monotonic call id sequence.
 *
 * Ids identify CallEnvelopes in the registry; they are never reused within
 * the lifetime of a sequence, so a late completion can never remove a newer call.
 */
export class CallIdSequence {
    private nextId: number;

    constructor(private readonly start: number = 0) {
        if (!Number.isSafeInteger(start) || start < 0) {
            throw new Error(`Call id sequence must start at a non-negative integer, got ${start}`);
        }
        this.nextId = start;
    }

    /**
     * Hand out the next id.
     */
    public next(): number {
        const id = this.nextId;
        this.nextId += 1;
        return id;
    }

    /**
     * Id the next call will receive.
     */
    public peek(): number {
        return this.nextId;
    }

    /**
     * Restart from the initial value. Only safe while no calls are registered.
     */
    public reset(): void {
        this.nextId = this.start;
    }
}
