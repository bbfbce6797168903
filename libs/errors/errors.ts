import crypto from 'node:crypto';

export type ErrorCategory = 'USAGE' | 'SERVER' | 'CONNECTIVITY' | 'CONFIG' | 'LIFECYCLE' | 'INTERNAL';

/**
 * Base class for every error raised by the call engine.
 * The incidentId correlates the thrown value with the log line that reported it.
 */
export class CallOrchestratorError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public override cause?: unknown;

    constructor(
        message: string,
        public readonly code: string,
        public readonly category: ErrorCategory,
        options?: { cause?: unknown }
    ) {
        super(message);
        this.name = 'CallOrchestratorError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.cause = options?.cause;
    }
}

/**
 * A precondition of the public API was violated by the caller.
 */
export class UsageError extends CallOrchestratorError {
    constructor(message: string) {
        super(message, 'USAGE_VIOLATION', 'USAGE');
        this.name = 'UsageError';
    }
}

/**
 * The backend answered a resilient call with an application-level failure.
 */
export class ServerFaultError extends CallOrchestratorError {
    constructor(
        public readonly callName: string,
        public readonly callId: number,
        cause: unknown
    ) {
        super(`Call ${callName} (#${callId}) faulted: ${describeCause(cause)}`, 'SERVER_FAULT', 'SERVER', { cause });
        this.name = 'ServerFaultError';
    }
}

/**
 * Thrown by transports to report that the backend could not be reached.
 * The engine treats it as a cancellation, never as a server fault.
 */
export class ConnectivityLostError extends CallOrchestratorError {
    constructor(message = 'Connectivity to the backend was lost', options?: { cause?: unknown }) {
        super(message, 'CONNECTIVITY_LOST', 'CONNECTIVITY', options);
        this.name = 'ConnectivityLostError';
    }
}

export class ConfigurationError extends CallOrchestratorError {
    constructor(
        message: string,
        public readonly violations: readonly string[] = []
    ) {
        super(message, 'INVALID_CONFIGURATION', 'CONFIG');
        this.name = 'ConfigurationError';
    }
}

export class EngineDisposedError extends CallOrchestratorError {
    constructor() {
        super('Call orchestrator has been disposed', 'ENGINE_DISPOSED', 'LIFECYCLE');
        this.name = 'EngineDisposedError';
    }
}

export function describeCause(cause: unknown): string {
    if (cause instanceof Error) return cause.message;
    if (typeof cause === 'string') return cause;
    return String(cause);
}
