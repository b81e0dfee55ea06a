/**
 * Feedback Submitter
 *
 * State machine around one issue-creation call:
 *
 *   Idle/Empty/Succeeded/Failed --submit(blank)--> Empty
 *   Idle/Empty/Succeeded/Failed --submit(text)---> Submitting --> Succeeded | Failed
 *
 * Only one submission runs at a time. The submit control is disabled while
 * Submitting and re-enabled on every way out of it.
 */

import { FEEDBACK_ISSUE_TITLE, ISSUE_CREATED_STATUS, type IssueClient } from '@shared/feedback';

export type FeedbackError =
    | { kind: 'HttpStatusError'; status: number; message: string }
    | { kind: 'NetworkError'; message: string };

export type FeedbackStatus =
    | { kind: 'Idle' }
    | { kind: 'Empty' }
    | { kind: 'Submitting' }
    | { kind: 'Succeeded' }
    | { kind: 'Failed'; error: FeedbackError };

export interface FeedbackSnapshot {
    /** Last submitted text, trimmed */
    text: string;
    status: FeedbackStatus;
    controlEnabled: boolean;
}

const INITIAL_SNAPSHOT: FeedbackSnapshot = {
    text: '',
    status: { kind: 'Idle' },
    controlEnabled: true
};

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class FeedbackSubmitter {
    private snapshot: FeedbackSnapshot = INITIAL_SNAPSHOT;
    private readonly listeners = new Set<() => void>();

    constructor(private readonly client: IssueClient) {}

    getSnapshot = (): FeedbackSnapshot => this.snapshot;

    subscribe = (listener: () => void): (() => void) => {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    };

    /**
     * Resolves with the terminal status of this submission, or the current
     * status when a submission is already running.
     */
    submit = async (text: string): Promise<FeedbackStatus> => {
        if (this.snapshot.status.kind === 'Submitting') return this.snapshot.status;

        const body = text.trim();
        if (!body) {
            this.update({ text: body, status: { kind: 'Empty' } });
            return this.snapshot.status;
        }

        this.update({ text: body, status: { kind: 'Submitting' }, controlEnabled: false });

        let status: FeedbackStatus = {
            kind: 'Failed',
            error: { kind: 'NetworkError', message: 'Submission did not complete' }
        };
        try {
            const response = await this.client.createIssue({ title: FEEDBACK_ISSUE_TITLE, body });
            if (response.status === ISSUE_CREATED_STATUS) {
                status = { kind: 'Succeeded' };
                console.info('[feedback] Issue created');
            } else {
                status = {
                    kind: 'Failed',
                    error: { kind: 'HttpStatusError', status: response.status, message: response.body }
                };
                console.warn(`[feedback] Issue creation failed with status ${response.status}`);
            }
        } catch (error) {
            status = { kind: 'Failed', error: { kind: 'NetworkError', message: errorMessage(error) } };
            console.error('[feedback] Issue creation failed:', error);
        } finally {
            this.update({ status, controlEnabled: true });
        }
        return status;
    };

    private update(patch: Partial<FeedbackSnapshot>): void {
        this.snapshot = { ...this.snapshot, ...patch };
        this.listeners.forEach((listener) => listener());
    }
}
