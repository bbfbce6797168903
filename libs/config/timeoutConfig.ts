import { z } from 'zod';
import { validate } from '../validation/validate.js';

/**
 * Durations of the two escalation phases, in milliseconds.
 */
export const EscalationTimeoutsSchema = z.object({
    spinnerMs: z.number().finite().positive(),
    popupMs: z.number().finite().positive()
});

export type EscalationTimeouts = z.infer<typeof EscalationTimeoutsSchema>;

/**
 * Read at the start of every escalation cycle and whenever a call arrives,
 * so a changed value applies without restarting the engine.
 */
export interface TimeoutConfigSource {
    current(): EscalationTimeouts;
}

export const TIMEOUT_ENV_KEYS = {
    spinner: 'CALL_SPINNER_TIMEOUT_MS',
    popup: 'CALL_POPUP_TIMEOUT_MS'
} as const;

const EnvTimeoutsSchema = z.object({
    [TIMEOUT_ENV_KEYS.spinner]: z.coerce.number().finite().positive(),
    [TIMEOUT_ENV_KEYS.popup]: z.coerce.number().finite().positive()
});

export function createStaticTimeoutSource(timeouts: EscalationTimeouts): TimeoutConfigSource {
    const frozen = Object.freeze(validate(EscalationTimeoutsSchema, timeouts, 'escalation timeouts'));
    return { current: () => frozen };
}

/**
 * Reads both durations from the environment on every call.
 */
export function createEnvTimeoutSource(env: NodeJS.ProcessEnv = process.env): TimeoutConfigSource {
    return {
        current: () => {
            const parsed = validate(EnvTimeoutsSchema, {
                [TIMEOUT_ENV_KEYS.spinner]: env[TIMEOUT_ENV_KEYS.spinner],
                [TIMEOUT_ENV_KEYS.popup]: env[TIMEOUT_ENV_KEYS.popup]
            }, 'escalation timeout environment');
            return {
                spinnerMs: parsed[TIMEOUT_ENV_KEYS.spinner],
                popupMs: parsed[TIMEOUT_ENV_KEYS.popup]
            };
        }
    };
}
