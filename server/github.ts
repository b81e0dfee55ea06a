/**
 * GitHub issue client. Returns the tracker's status and body as-is; deciding
 * what a status means is up to the caller.
 */

import { GITHUB_API_BASE_URL, type IssueClient, type IssuePayload, type IssueResponse } from "@shared/feedback";
import type { GitHubConfig } from "./config";
import { fetchWithTimeout, type FetchFn } from "./http";

export interface GitHubIssueClientOptions extends GitHubConfig {
  timeoutMs: number;
  fetch?: FetchFn;
}

export function issuesUrl(owner: string, repo: string): string {
  return `${GITHUB_API_BASE_URL}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/issues`;
}

export function createGitHubIssueClient(options: GitHubIssueClientOptions): IssueClient {
  const fetchFn = options.fetch ?? fetch;
  const url = issuesUrl(options.owner, options.repo);

  return {
    async createIssue(issue: IssuePayload): Promise<IssueResponse> {
      const response = await fetchWithTimeout(fetchFn, url, options.timeoutMs, {
        method: "POST",
        headers: {
          Authorization: `token ${options.token}`,
          Accept: "application/vnd.github.v3+json",
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ title: issue.title, body: issue.body }),
      });
      return { status: response.status, body: await response.text() };
    },
  };
}
