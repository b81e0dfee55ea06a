/**
 * Feedback issue contract shared by the client submitter and the server route.
 */

export const FEEDBACK_ISSUE_TITLE = 'User Feedback from Observation Dashboard';

export const GITHUB_API_BASE_URL = 'https://api.github.com';

export interface IssuePayload {
    title: string;
    body: string;
}

/** Raw outcome of an issue-creation call; status interpretation is the caller's. */
export interface IssueResponse {
    status: number;
    body: string;
}

export interface IssueClient {
    createIssue(issue: IssuePayload): Promise<IssueResponse>;
}

/** HTTP status the tracker answers with when an issue was created. */
export const ISSUE_CREATED_STATUS = 201;
