// @vitest-environment node
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { TIMESERIES_TIMEOUT_MS } from "@/lib/config";
import { loadEnvFiles, loadServerConfig, UPSTREAM_TIMEOUT_MS } from "./config";

describe("loadServerConfig", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reads every setting from the environment", () => {
    const config = loadServerConfig(
      {
        syn_token: "test-token",
        GITHUB_TOKEN: "test-github-token",
        REPO_OWNER: "example-org",
        REPO_NAME: "dashboard",
        PORT: "8080",
      },
      "/srv/public"
    );

    expect(config).toEqual({
      port: 8080,
      synopticToken: "test-token",
      github: { token: "test-github-token", owner: "example-org", repo: "dashboard" },
      upstreamTimeoutMs: 8_000,
      staticPath: "/srv/public",
    });
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("falls back to SYNOPTIC_TOKEN and the default port", () => {
    const config = loadServerConfig({ SYNOPTIC_TOKEN: "test-token", PORT: "not-a-port" }, "/srv/public");

    expect(config.synopticToken).toBe("test-token");
    expect(config.port).toBe(3000);
  });

  it("leaves the tracker unconfigured and names what is missing", () => {
    const config = loadServerConfig({ syn_token: "test-token", GITHUB_TOKEN: "test-github-token" }, "/srv/public");

    expect(config.github).toBeNull();
    expect(console.warn).toHaveBeenCalledWith("[server] REPO_OWNER, REPO_NAME not set; /api/feedback will answer 503");
  });

  it("warns when the weather token is missing", () => {
    const config = loadServerConfig({}, "/srv/public");

    expect(config.synopticToken).toBe("");
    expect(console.warn).toHaveBeenCalledWith(
      "[server] syn_token / SYNOPTIC_TOKEN not set; /api/timeseries will answer 503"
    );
  });
});

describe("upstream timeout", () => {
  it("gives up before the browser does", () => {
    expect(UPSTREAM_TIMEOUT_MS).toBeLessThan(TIMESERIES_TIMEOUT_MS);
  });
});

describe("loadEnvFiles", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "dashboard-env-"));
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("reads the tokens from a .env file", () => {
    writeFileSync(
      path.join(dir, ".env"),
      "syn_token=test-token\nGITHUB_TOKEN=test-github-token\nREPO_OWNER=example-org\nREPO_NAME=dashboard\n"
    );

    const config = loadServerConfig(loadEnvFiles(dir, {}), "/srv/public");

    expect(config.synopticToken).toBe("test-token");
    expect(config.github).toEqual({ token: "test-github-token", owner: "example-org", repo: "dashboard" });
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("lets .env.local override .env and the environment override both", () => {
    writeFileSync(path.join(dir, ".env"), "syn_token=from-env-file\nPORT=4000\nREPO_NAME=dashboard\n");
    writeFileSync(path.join(dir, ".env.local"), "syn_token=from-local-file\nPORT=5000\n");

    const env = loadEnvFiles(dir, { PORT: "6000" });

    expect(env).toEqual({ syn_token: "from-local-file", PORT: "6000", REPO_NAME: "dashboard" });
  });

  it("leaves the environment alone when there is no file", () => {
    expect(loadEnvFiles(dir, { syn_token: "test-token" })).toEqual({ syn_token: "test-token" });
  });
});
