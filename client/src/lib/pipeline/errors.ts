/**
 * Human-readable reasons for pipeline failures.
 * These strings end up in the single-row diagnostic table and the chart placeholder.
 */

import { observationKey } from '@shared/synoptic';
import type { PipelineError, ValidationReason } from './types';

const VALIDATION_MESSAGES: Record<ValidationReason, string> = {
    MissingStation: 'No station selected.',
    MissingDateRange: 'Invalid date range.',
    MalformedDate: 'Invalid date formatting.',
    InvertedDateRange: 'Start date must not be after end date.',
};

export function describePipelineError(error: PipelineError): string {
    switch (error.kind) {
        case 'ValidationError':
            return VALIDATION_MESSAGES[error.reason];
        case 'NetworkError':
            return `Error fetching API data: ${error.message}`;
        case 'HttpStatusError':
            return `API Error: ${error.status} - ${error.message}`;
        case 'UnexpectedShape':
            return 'Unexpected API response format.';
        case 'MissingVariable': {
            const keys = error.variables.map((v) => `'${observationKey(v)}'`);
            return keys.length === 1
                ? `Variable ${keys[0]} not found in API response.`
                : `Variables ${keys.join(', ')} not found in API response.`;
        }
        case 'NoData':
            return 'No valid data available.';
    }
}
