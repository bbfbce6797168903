import { EventBus } from './eventBus.js';
import type { ManagerState } from '../calls/types.js';

export enum ConnectivityState {
    REACHABLE = 'REACHABLE',
    DEGRADED = 'DEGRADED',     // network up, backend not answering
    UNREACHABLE = 'UNREACHABLE' // no network at all
}

export interface ConnectivityChangedEvent {
    readonly type: 'connectivity.changed';
    readonly state: ConnectivityState;
}

export interface CallStateChangedEvent {
    readonly type: 'calls.stateChanged';
    readonly from: ManagerState;
    readonly to: ManagerState;
}

export interface CallsTimedOutEvent {
    readonly type: 'calls.timedOut';
    readonly pendingCallIds: readonly number[];
}

export type OrchestratorEvent = ConnectivityChangedEvent | CallStateChangedEvent | CallsTimedOutEvent;

export type OrchestratorEventBus = EventBus<OrchestratorEvent>;

export function createEventBus(): OrchestratorEventBus {
    return new EventBus<OrchestratorEvent>();
}

/**
 * States in which the backend is considered out of reach.
 */
export function isConnectivityLoss(state: ConnectivityState): boolean {
    return state === ConnectivityState.UNREACHABLE || state === ConnectivityState.DEGRADED;
}
