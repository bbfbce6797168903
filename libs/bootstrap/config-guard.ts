import { logger } from '../logging/logger.js';
import { ConfigurationError, describeCause } from '../errors/errors.js';
import { TIMEOUT_ENV_KEYS } from '../config/timeoutConfig.js';

export type GuardRule =
    | { type: 'required'; name: string }
    | { type: 'forbidIf'; name: string; when: () => boolean; message: string }
    | { type: 'assert'; check: () => boolean; message: string };

const MIN_PRODUCTION_SPINNER_MS = 100;

/**
 * Environment requirements of an engine configured from env vars.
 */
export function timeoutConfigRequirements(env: NodeJS.ProcessEnv = process.env): GuardRule[] {
    return [
        { type: 'required', name: TIMEOUT_ENV_KEYS.spinner },
        { type: 'required', name: TIMEOUT_ENV_KEYS.popup },
        {
            type: 'forbidIf',
            name: TIMEOUT_ENV_KEYS.spinner,
            when: () => env['NODE_ENV'] === 'production' && Number(env[TIMEOUT_ENV_KEYS.spinner]) < MIN_PRODUCTION_SPINNER_MS,
            message: `Production spinner deadline must be at least ${MIN_PRODUCTION_SPINNER_MS}ms`
        },
        {
            type: 'assert',
            check: () => isPositiveNumber(env[TIMEOUT_ENV_KEYS.spinner]) && isPositiveNumber(env[TIMEOUT_ENV_KEYS.popup]),
            message: `${TIMEOUT_ENV_KEYS.spinner} and ${TIMEOUT_ENV_KEYS.popup} must be positive numbers of milliseconds`
        }
    ];
}

function isPositiveNumber(raw: string | undefined): boolean {
    if (raw === undefined || raw.trim() === '') return false;
    const value = Number(raw);
    return Number.isFinite(value) && value > 0;
}

/**
 * Fail-closed configuration guard.
 * Collects every violation, logs them together, then throws.
 */
export class ConfigGuard {
    static enforce(rules: GuardRule[], env: NodeJS.ProcessEnv = process.env): void {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`FATAL CONFIG: Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when()) {
                            errors.push(`FATAL CONFIG: ${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check()) {
                            errors.push(`FATAL CONFIG: ${rule.message}`);
                        }
                        break;
                    }
                }
            } catch (err: unknown) {
                errors.push(`Check failed for rule: ${describeCause(err)}`);
            }
        }

        if (errors.length > 0) {
            logger.fatal({
                errors,
                remediation: "Check environment variables."
            }, "Configuration Guard Violation");

            throw new ConfigurationError('Configuration guard violation', errors);
        }

        logger.info("Configuration guard passed.");
    }
}
