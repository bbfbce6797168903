import type { CallOutcome } from './types.js';
import { classifyFailure } from './failureClassifier.js';
import { getComponentLogger } from '../logging/logger.js';
import { describeCause } from '../errors/errors.js';

const logger = getComponentLogger('CallOutcome');

/**
 * Races a transport promise against its cancellation signal.
 *
 * An aborted signal settles the outcome as cancelled immediately, even if the
 * transport never settles. A rejection is cancelled when the signal was aborted
 * or the error is classified as a connectivity failure, and faulted otherwise.
 * Never rejects.
 */
export function waitOrCancel<T>(task: Promise<T>, signal: AbortSignal): Promise<CallOutcome<T>> {
    return new Promise(resolve => {
        if (signal.aborted) {
            resolve({ status: 'cancelled', reason: signal.reason });
            void task.catch((error: unknown) => {
                logger.debug({ error: describeCause(error) }, 'Transport settled after cancellation');
            });
            return;
        }

        const onAbort = () => resolve({ status: 'cancelled', reason: signal.reason });
        signal.addEventListener('abort', onAbort, { once: true });

        task.then(
            value => {
                signal.removeEventListener('abort', onAbort);
                resolve(signal.aborted ? { status: 'cancelled', reason: signal.reason } : { status: 'succeeded', value });
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                if (signal.aborted || classifyFailure(error) === 'CONNECTIVITY') {
                    resolve({ status: 'cancelled', reason: error });
                } else {
                    resolve({ status: 'faulted', error });
                }
            }
        );
    });
}

/**
 * Starts a transport call, turning a synchronous throw into a rejected promise.
 */
export function startTask<T>(invoke: () => Promise<T>): Promise<T> {
    try {
        return invoke();
    } catch (error) {
        return Promise.reject(error);
    }
}
