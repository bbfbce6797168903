export {
    SpinnerMode,
    ManagerState,
    TimeoutPhase,
    defineCall,
    type AppStateSink,
    type CallDescriptor,
    type CallEnvelope,
    type CallOutcome,
    type CallParameters,
    type CallTransport,
    type ConnectivityResolver,
    type LoadingIndicator
} from './calls/types.js';
export { CallOrchestrator, type CallOrchestratorDeps, type PendingCallInfo } from './calls/CallOrchestrator.js';
export { type Countdown } from './calls/timeoutEscalation.js';
export { classifyFailure, isAbortError, type FailureKind } from './calls/failureClassifier.js';
export { EventBus, type BusEvent, type BusListener } from './events/eventBus.js';
export {
    ConnectivityState,
    createEventBus,
    isConnectivityLoss,
    type CallStateChangedEvent,
    type CallsTimedOutEvent,
    type ConnectivityChangedEvent,
    type OrchestratorEvent,
    type OrchestratorEventBus
} from './events/events.js';
export { TimerTickScheduler, DEFAULT_TICK_RESOLUTION_MS, type TickScheduler } from './scheduling/tickScheduler.js';
export {
    EscalationTimeoutsSchema,
    TIMEOUT_ENV_KEYS,
    createEnvTimeoutSource,
    createStaticTimeoutSource,
    type EscalationTimeouts,
    type TimeoutConfigSource
} from './config/timeoutConfig.js';
export {
    CallOrchestratorError,
    ConfigurationError,
    ConnectivityLostError,
    EngineDisposedError,
    ServerFaultError,
    UsageError,
    type ErrorCategory
} from './errors/errors.js';
export { bootstrapCallOrchestrator, type BootstrapDeps } from './bootstrap/startup.js';
export { CallIdSequence } from './id/CallIdSequence.js';
export { logger } from './logging/logger.js';
