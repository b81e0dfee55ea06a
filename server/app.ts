import express, { type Express } from "express";
import path from "path";
import { FEEDBACK_ISSUE_TITLE, type IssueClient, type IssuePayload } from "@shared/feedback";
import { SYNOPTIC_TIMESERIES_URL } from "@shared/synoptic";
import type { ServerConfig } from "./config";
import { createGitHubIssueClient } from "./github";
import { fetchWithTimeout, type FetchFn } from "./http";

export interface AppDependencies {
  /** Upstream fetch; the global one by default */
  fetch?: FetchFn;
  /** Overrides the GitHub client built from config.github */
  issueClient?: IssueClient | null;
}

export interface TimeseriesQuery {
  stid: string;
  start?: string;
  end?: string;
  vars?: string;
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/** Upstream URL with the server's token appended last. */
export function buildUpstreamTimeseriesUrl(query: TimeseriesQuery, token: string): string {
  const url = new URL(SYNOPTIC_TIMESERIES_URL);
  url.searchParams.set("stid", query.stid);
  if (query.start) url.searchParams.set("start", query.start);
  if (query.end) url.searchParams.set("end", query.end);
  if (query.vars) url.searchParams.set("vars", query.vars);
  url.searchParams.set("token", token);
  return url.toString();
}

// Issues are always filed under the fixed title; a posted title is ignored.
function parseIssuePayload(body: unknown): IssuePayload | null {
  if (typeof body !== "object" || body === null) return null;
  const text: unknown = "body" in body ? body.body : undefined;
  if (typeof text !== "string") return null;
  return { title: FEEDBACK_ISSUE_TITLE, body: text };
}

export function createApp(config: ServerConfig, deps: AppDependencies = {}): Express {
  const app = express();
  const fetchFn = deps.fetch ?? fetch;
  const issueClient =
    deps.issueClient !== undefined
      ? deps.issueClient
      : config.github
        ? createGitHubIssueClient({ ...config.github, timeoutMs: config.upstreamTimeoutMs, fetch: fetchFn })
        : null;

  app.use(express.static(config.staticPath));

  app.get("/api/timeseries", async (req, res) => {
    const stid = queryString(req.query.stid);
    if (!stid) {
      res.status(400).json({ error: "Missing stid" });
      return;
    }

    if (!config.synopticToken) {
      res.status(503).json({ error: "Synoptic API token missing" });
      return;
    }

    const url = buildUpstreamTimeseriesUrl(
      {
        stid,
        start: queryString(req.query.start),
        end: queryString(req.query.end),
        vars: queryString(req.query.vars),
      },
      config.synopticToken
    );

    try {
      const response = await fetchWithTimeout(fetchFn, url, config.upstreamTimeoutMs, {
        headers: { Accept: "application/json" },
      });
      const body = await response.text();
      res
        .status(response.status)
        .type(response.headers.get("content-type") ?? "application/json")
        .send(body);
    } catch (error) {
      console.error("[server] Timeseries proxy failed:", error);
      res.status(502).json({ error: "Failed to fetch observations" });
    }
  });

  app.post("/api/feedback", express.json(), async (req, res) => {
    const issue = parseIssuePayload(req.body);
    if (!issue) {
      res.status(400).json({ error: "Feedback body must be a string" });
      return;
    }

    if (!issueClient) {
      res.status(503).json({ error: "Issue tracker is not configured" });
      return;
    }

    try {
      const result = await issueClient.createIssue(issue);
      if (result.status !== 201) {
        console.warn(`[server] Issue creation answered ${result.status}`);
      }
      res.status(result.status).type("application/json").send(result.body);
    } catch (error) {
      console.error("[server] Issue creation failed:", error);
      res.status(502).json({ error: "Failed to reach the issue tracker" });
    }
  });

  // Client-side routing: everything else gets the SPA shell
  app.get("*", (_req, res) => {
    res.sendFile(path.join(config.staticPath, "index.html"));
  });

  return app;
}
