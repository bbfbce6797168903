import { logger } from '../logging/logger.js';
import { CallOrchestratorError } from './errors.js';

/**
 * Normalizes anything a transport or collaborator throws into a CallOrchestratorError
 * and logs the raw details once, keyed by the incidentId.
 */
export const ErrorSanitizer = {
    sanitize: (err: unknown, contextLabel: string): CallOrchestratorError => {
        if (err instanceof CallOrchestratorError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;
        let errorCode: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
            errorCode = readCode(err);
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err && typeof err === 'object' && 'message' in err) {
            if (typeof err.message === 'string') {
                originalErrorMessage = err.message;
            }
            if ('stack' in err && typeof err.stack === 'string') {
                originalErrorStack = err.stack;
            }
            errorCode = readCode(err);
        } else {
            originalErrorMessage = String(err);
        }

        const wrapped = new CallOrchestratorError(
            `${contextLabel} failed: ${originalErrorMessage ?? 'unknown error'}`,
            errorCode ?? 'UNEXPECTED_ERROR',
            'INTERNAL',
            { cause: err }
        );

        logger.debug({
            incidentId: wrapped.incidentId,
            context: contextLabel,
            originalError: originalErrorMessage,
            stack: originalErrorStack
        }, 'Sanitized unexpected error');

        return wrapped;
    }
};

/**
 * Reads a string `code` property (Node system errors, HTTP client errors) if present.
 */
export function readCode(err: object): string | undefined {
    if ('code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}
