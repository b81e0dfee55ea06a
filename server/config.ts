/**
 * Server configuration, read once from the environment at start-up.
 * Secrets stay on the server; the client only ever sees the proxy routes.
 */

import dotenv from "dotenv";
import path from "path";

export interface GitHubConfig {
  token: string;
  owner: string;
  repo: string;
}

export interface ServerConfig {
  port: number;
  /** Empty when unset; /api/timeseries then answers 503 */
  synopticToken: string;
  /** Null unless token, owner and repo are all set */
  github: GitHubConfig | null;
  upstreamTimeoutMs: number;
  staticPath: string;
}

const DEFAULT_PORT = 3000;
/** Must stay below the client's TIMESERIES_TIMEOUT_MS */
export const UPSTREAM_TIMEOUT_MS = 8_000;

function readEnv(env: NodeJS.ProcessEnv, ...names: string[]): string {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return "";
}

function parsePort(raw: string): number {
  const port = Number(raw);
  return Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT;
}

/**
 * Fill `env` from `.env` and then `.env.local` in `dir`. Variables already
 * set in `env` keep their value; a missing file is skipped.
 */
export function loadEnvFiles(dir: string, env: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const fromFiles: Record<string, string> = {};
  dotenv.config({ path: path.join(dir, ".env"), processEnv: fromFiles });
  dotenv.config({ path: path.join(dir, ".env.local"), processEnv: fromFiles, override: true });

  for (const [name, value] of Object.entries(fromFiles)) {
    if (env[name] === undefined) env[name] = value;
  }
  return env;
}

export function loadServerConfig(env: NodeJS.ProcessEnv, staticPath: string): ServerConfig {
  const synopticToken = readEnv(env, "syn_token", "SYNOPTIC_TOKEN");
  const token = readEnv(env, "GITHUB_TOKEN");
  const owner = readEnv(env, "REPO_OWNER");
  const repo = readEnv(env, "REPO_NAME");

  if (!synopticToken) {
    console.warn("[server] syn_token / SYNOPTIC_TOKEN not set; /api/timeseries will answer 503");
  }
  const missingGitHub = [
    ["GITHUB_TOKEN", token],
    ["REPO_OWNER", owner],
    ["REPO_NAME", repo],
  ]
    .filter(([, value]) => !value)
    .map(([name]) => name);
  if (missingGitHub.length > 0) {
    console.warn(`[server] ${missingGitHub.join(", ")} not set; /api/feedback will answer 503`);
  }

  return {
    port: parsePort(readEnv(env, "PORT")),
    synopticToken,
    github: missingGitHub.length === 0 ? { token, owner, repo } : null,
    upstreamTimeoutMs: UPSTREAM_TIMEOUT_MS,
    staticPath,
  };
}
