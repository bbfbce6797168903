/**
 * Decides whether a rejected transport promise is a connectivity problem
 * (recoverable: the call stays registered and is retried) or a server fault
 * (terminal for that call).
 */

import { ConnectivityLostError } from '../errors/errors.js';
import { readCode } from '../errors/sanitizer.js';

export type FailureKind = 'CONNECTIVITY' | 'SERVER_FAULT';

/**
 * Error codes and message fragments of network-level failures.
 * Order does not matter: any match classifies as connectivity.
 */
const CONNECTIVITY_PATTERNS: readonly (string | RegExp)[] = [
    'ECONNRESET',
    'ECONNREFUSED',
    'ECONNABORTED',
    'ETIMEDOUT',
    'ENOTFOUND',
    'ENETUNREACH',
    'EHOSTUNREACH',
    'EAI_AGAIN',
    'EPIPE',
    'NETWORK_ERROR',
    /socket hang up/i,
    /network\s*(is\s*)?(error|down|unreachable)/i
];

export function classifyFailure(error: unknown): FailureKind {
    if (error instanceof ConnectivityLostError) return 'CONNECTIVITY';
    if (isAbortError(error)) return 'CONNECTIVITY';

    const code = error && typeof error === 'object' ? readCode(error) : undefined;
    const message = error instanceof Error ? error.message : typeof error === 'string' ? error : '';

    for (const pattern of CONNECTIVITY_PATTERNS) {
        if (typeof pattern === 'string') {
            if (code === pattern || message.includes(pattern)) return 'CONNECTIVITY';
        } else if (pattern.test(message)) {
            return 'CONNECTIVITY';
        }
    }

    return 'SERVER_FAULT';
}

/**
 * `AbortError` is what fetch and most Node clients reject with once their signal aborts.
 */
export function isAbortError(error: unknown): boolean {
    return error instanceof Error && error.name === 'AbortError';
}
