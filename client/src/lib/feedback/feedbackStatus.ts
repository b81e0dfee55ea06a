/**
 * User-facing wording for feedback outcomes: the persistent status line and
 * the transient notification shown alongside it.
 */

import type { FeedbackStatus } from './feedbackSubmitter';

export type FeedbackNotificationType = 'warning' | 'success' | 'error';

export interface FeedbackNotification {
    type: FeedbackNotificationType;
    message: string;
    /** Omitted: the toaster's default */
    durationMs?: number;
}

export interface FeedbackStatusDescription {
    statusText: string;
    notification: FeedbackNotification | null;
}

const EMPTY_MESSAGE = 'Feedback is empty. Please type something first.';

export function describeFeedbackStatus(status: FeedbackStatus): FeedbackStatusDescription {
    switch (status.kind) {
        case 'Idle':
        case 'Submitting':
            return { statusText: '', notification: null };
        case 'Empty':
            return {
                statusText: EMPTY_MESSAGE,
                notification: { type: 'warning', message: EMPTY_MESSAGE, durationMs: 4000 }
            };
        case 'Succeeded':
            return {
                statusText: 'Thank you! Your feedback has been submitted.',
                notification: {
                    type: 'success',
                    message: 'Thank you! Your feedback has been submitted as a GitHub issue.',
                    durationMs: 5000
                }
            };
        case 'Failed': {
            const { error } = status;
            const message =
                error.kind === 'HttpStatusError'
                    ? `Error creating issue: ${error.status}\n${error.message}`
                    : `Error: ${error.message}`;
            return { statusText: message, notification: { type: 'error', message } };
        }
    }
}
