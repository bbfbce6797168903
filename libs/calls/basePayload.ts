import { z } from 'zod';
import type { AppStateSink } from './types.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('BasePayload');

/**
 * Application state the backend may piggyback on any response,
 * saving a separate round trip to refresh it.
 */
const BasePayloadSchema = z.object({
    userData: z.unknown().optional(),
    resources: z.unknown().optional()
});

/**
 * Forwards `userData` and `resources` of a response to the app-state sink.
 * Fields that are absent or empty are ignored, as are non-object results.
 */
export function applyBasePayload(result: unknown, sink: AppStateSink, callName: string): void {
    if (result === null || result === undefined) return;

    const parsed = BasePayloadSchema.safeParse(result);
    if (!parsed.success) return;

    const { userData, resources } = parsed.data;

    if (isPresent(userData)) {
        logger.debug({ call: callName }, 'Applying user data update from response');
        sink.applyUserDataUpdate(userData);
    }

    if (isPresent(resources)) {
        logger.debug({ call: callName }, 'Applying resource update from response');
        sink.applyResourceUpdate(resources);
    }
}

export function isPresent(value: unknown): boolean {
    if (value === null || value === undefined) return false;
    if (typeof value === 'string') return value.length > 0;
    if (Array.isArray(value)) return value.length > 0;
    if (typeof value === 'object') return Object.keys(value).length > 0;
    return true;
}
