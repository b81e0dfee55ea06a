/**
 * Centralized configuration for the dashboard client.
 *
 * All environment-dependent values should be accessed through this module;
 * pipeline code receives them as explicit values.
 */

import { SYNOPTIC_TIMESERIES_URL } from '@shared/synoptic';

/** Timeout for a single timeseries GET, in milliseconds. */
export const TIMESERIES_TIMEOUT_MS = 10_000;

/** Timeout for the feedback POST, in milliseconds. */
export const FEEDBACK_TIMEOUT_MS = 10_000;

export interface SynopticConfig {
    /** Endpoint the request builder targets */
    timeseriesUrl: string;
    /** Sent as the `token` query field; empty when the server proxy injects it */
    token: string;
    timeoutMs: number;
}

function readEnv(name: keyof ImportMetaEnv): string {
    if (typeof import.meta === 'undefined' || !import.meta.env) return '';
    const raw = import.meta.env[name];
    return typeof raw === 'string' ? raw.trim() : '';
}

/**
 * Resolve where timeseries requests go.
 *
 * Priority:
 * 1. VITE_SYNOPTIC_TOKEN set: call the Synoptic API directly with it
 * 2. Otherwise: the server proxy at /api/timeseries, which adds its own token
 */
export function getSynopticConfig(): SynopticConfig {
    const token = readEnv('VITE_SYNOPTIC_TOKEN');
    if (token) {
        return { timeseriesUrl: SYNOPTIC_TIMESERIES_URL, token, timeoutMs: TIMESERIES_TIMEOUT_MS };
    }
    return { timeseriesUrl: '/api/timeseries', token: '', timeoutMs: TIMESERIES_TIMEOUT_MS };
}

/**
 * Get the feedback endpoint.
 *
 * Priority:
 * 1. VITE_FEEDBACK_URL environment variable
 * 2. The server route /api/feedback
 */
export function getFeedbackEndpoint(): string {
    return readEnv('VITE_FEEDBACK_URL') || '/api/feedback';
}
