/**
 * Browser-side issue client: posts the issue to the dashboard server, which
 * holds the tracker credentials and answers with the tracker's status and body.
 */

import type { IssueClient, IssuePayload, IssueResponse } from '@shared/feedback';
import { FEEDBACK_TIMEOUT_MS } from '@/lib/config';
import { fetchWithTimeout } from '@/lib/http';

export function createProxyIssueClient(endpoint: string, timeoutMs: number = FEEDBACK_TIMEOUT_MS): IssueClient {
    return {
        async createIssue(issue: IssuePayload): Promise<IssueResponse> {
            const response = await fetchWithTimeout(endpoint, timeoutMs, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(issue)
            });
            return { status: response.status, body: await response.text() };
        }
    };
}
