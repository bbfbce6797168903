import type { ZodSchema } from 'zod';
import { logger } from '../logging/logger.js';
import { ConfigurationError } from '../errors/errors.js';

/**
 * Parses `data` against `schema`, logging and throwing a ConfigurationError on failure.
 */
export function validate<T>(schema: ZodSchema<T>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const violations = result.error.issues.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`);

        logger.warn({
            context,
            errors: violations
        }, "Validation failure");

        throw new ConfigurationError(`Invalid ${context}: ${violations.join('; ')}`, violations);
    }

    return result.data;
}
