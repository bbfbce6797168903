import { logger } from "../logging/logger.js";
import { ConfigGuard, timeoutConfigRequirements } from "./config-guard.js";
import { CallOrchestrator, type CallOrchestratorDeps } from "../calls/CallOrchestrator.js";
import { createEnvTimeoutSource } from "../config/timeoutConfig.js";

export type BootstrapDeps = Omit<CallOrchestratorDeps, "timeouts"> & {
    /** Defaults to the environment, guarded by the timeout config requirements. */
    timeouts?: CallOrchestratorDeps["timeouts"];
    env?: NodeJS.ProcessEnv;
};

/**
 * Validates configuration, then builds and initializes a call orchestrator.
 */
export function bootstrapCallOrchestrator(serviceName: string, deps: BootstrapDeps): CallOrchestrator {
    logger.info({ serviceName }, "Bootstrapping call orchestrator");

    const env = deps.env ?? process.env;
    let timeouts = deps.timeouts;
    if (!timeouts) {
        ConfigGuard.enforce(timeoutConfigRequirements(env), env);
        timeouts = createEnvTimeoutSource(env);
    }

    const orchestrator = new CallOrchestrator({ ...deps, timeouts });
    orchestrator.init();

    logger.info({ serviceName, timeouts: timeouts.current() }, "Startup checks passed");
    return orchestrator;
}
