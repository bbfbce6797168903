/**
 * Core types of the call engine.
 */

import type { ZodType } from 'zod';

/**
 * Loading indicator preference of a single call.
 * Ordered: a later entry overrides an earlier one for as long as both calls are active.
 */
export enum SpinnerMode {
    INVISIBLE = 0,
    AFTER_TIMEOUT = 1,
    INSTANT = 2
}

export enum ManagerState {
    IDLE = 'IDLE',
    PROCESSING = 'PROCESSING',
    TIMED_OUT = 'TIMED_OUT',
    ERROR = 'ERROR'
}

export enum TimeoutPhase {
    TO_SPINNER = 'TO_SPINNER',
    TO_POPUP = 'TO_POPUP'
}

export type CallParameters = Readonly<Record<string, unknown>>;

/**
 * Static description of one remote call type.
 * `name` doubles as the call family used for transaction serialization.
 */
export interface CallDescriptor<T> {
    readonly name: string;
    readonly transactional: boolean;
    /** Optional result schema for transports that parse raw responses. */
    readonly result?: ZodType<T>;
}

export function defineCall<T>(definition: {
    name: string;
    transactional?: boolean;
    result?: ZodType<T>;
}): CallDescriptor<T> {
    if (definition.name.trim() === '') {
        throw new Error('Call name must not be empty');
    }
    return Object.freeze({
        name: definition.name,
        transactional: definition.transactional ?? false,
        ...(definition.result ? { result: definition.result } : {})
    });
}

/**
 * Performs the actual remote call.
 *
 * The handle is owned by the engine; a transport may abort it itself to report
 * that it detected a connectivity problem.
 */
export interface CallTransport {
    invoke<T>(call: CallDescriptor<T>, parameters: CallParameters, handle: AbortController): Promise<T>;
}

/**
 * Resolves a connectivity problem (e.g. by asking the user to retry once the
 * network is back). Settles once the backend is believed reachable again.
 */
export interface ConnectivityResolver {
    resolve(blocking: boolean): Promise<void>;
}

/**
 * Loading indicator presentation. Claims are tracked per owner outside the engine.
 */
export interface LoadingIndicator {
    show(owner: object): void;
    hide(owner: object): void;
}

/**
 * Receives application state embedded in call responses.
 */
export interface AppStateSink {
    applyUserDataUpdate(payload: unknown): void;
    applyResourceUpdate(payload: unknown): void;
}

/**
 * The retryable record of one logical in-flight call.
 */
export interface CallEnvelope {
    readonly id: number;
    readonly call: CallDescriptor<unknown>;
    readonly parameters: CallParameters;
    readonly registeredAt: number;
    /** Number of times the remote call has been issued for this envelope. */
    attempts: number;
    /** Whether an attempt is currently awaiting the transport. */
    inFlight: boolean;
    /** Re-issue the remote call with the original parameters. */
    replay(): void;
}

export type CallOutcome<T> =
    | { readonly status: 'succeeded'; readonly value: T }
    | { readonly status: 'faulted'; readonly error: unknown }
    | { readonly status: 'cancelled'; readonly reason?: unknown };
