/**
 * CI tracking against a temp database, with `gh` answered from a table
 * of canned REST responses keyed by API path.
 */
import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

const gh = vi.hoisted(() => ({
  responses: new Map<string, string>(),
  calls: new Array<string>(),
}));

vi.mock("node:child_process", () => ({
  execFile: (
    _cmd: string,
    args: string[],
    _opts: unknown,
    cb: (err: Error | null, result?: { stdout: string; stderr: string }) => void
  ) => {
    const path = args[args.length - 1];
    gh.calls.push(path);
    const body = gh.responses.get(path);
    if (body === undefined) {
      cb(new Error(`gh: Not Found (HTTP 404) ${path}`));
    } else {
      cb(null, { stdout: body, stderr: "" });
    }
  },
}));

const tempDir = mkdtempSync(join(tmpdir(), "rc-ci-"));
process.env.RELEASE_DB_PATH = join(tempDir, "state.db");
process.env.GITHUB_ORG = "acme";

vi.spyOn(console, "error").mockImplementation(() => {});

const { getDb, closeDb } = await import("../db.js");
const { addRepos, createRelease, updateRepo } = await import("../releases.js");
const {
  extractChartInfo,
  getCachedCIStatuses,
  getCIStatusesForRelease,
  initCITracking,
  isActiveCIState,
  mapWorkflowStatus,
  pickWorkflowRun,
  pollIncompleteStatuses,
  refreshChartInfo,
  startCITracker,
} = await import("../ci-status.js");

afterAll(() => {
  closeDb();
  rmSync(tempDir, { recursive: true, force: true });
});

const UPDATED_AT = "2026-03-02T10:05:00Z";

function run(id: number, path: string, status: string, conclusion: string | null, headSha = "m1") {
  return {
    id,
    run_number: id + 100,
    html_url: `https://github.com/acme/auth-service/actions/runs/${id}`,
    path,
    status,
    conclusion,
    head_sha: headSha,
    run_started_at: "2026-03-02T10:00:00Z",
    updated_at: UPDATED_AT,
  };
}

function respond(path: string, body: unknown) {
  gh.responses.set(path, typeof body === "string" ? body : JSON.stringify(body));
}

// ─── Pure Helpers ───────────────────────────────────────

describe("mapWorkflowStatus()", () => {
  it("maps run states to CI states", () => {
    expect(mapWorkflowStatus("queued", null)).toBe("queued");
    expect(mapWorkflowStatus("waiting", null)).toBe("queued");
    expect(mapWorkflowStatus("in_progress", null)).toBe("in_progress");
    expect(mapWorkflowStatus("requested", null)).toBe("requested");
    expect(mapWorkflowStatus(null, null)).toBe("pending");
  });

  it("uses the conclusion of a completed run", () => {
    expect(mapWorkflowStatus("completed", "success")).toBe("success");
    expect(mapWorkflowStatus("completed", "failure")).toBe("failure");
    expect(mapWorkflowStatus("completed", "cancelled")).toBe("cancelled");
    expect(mapWorkflowStatus("completed", "skipped")).toBe("skipped");
    expect(mapWorkflowStatus("completed", "timed_out")).toBe("timed_out");
    expect(mapWorkflowStatus("completed", null)).toBe("completed");
  });
});

describe("isActiveCIState()", () => {
  it("is true only while a run can still change", () => {
    expect(isActiveCIState("pending")).toBe(true);
    expect(isActiveCIState("queued")).toBe(true);
    expect(isActiveCIState("in_progress")).toBe(true);
    expect(isActiveCIState("success")).toBe(false);
    expect(isActiveCIState("timed_out")).toBe(false);
  });
});

describe("extractChartInfo()", () => {
  it("reads the chart name and version", () => {
    expect(extractChartInfo("Packaging...\nChart: billing-api v1.4.2\nPushed")).toEqual({
      chartName: "billing-api",
      chartVersion: "1.4.2",
    });
    expect(extractChartInfo("Chart:  billing-api 2.0.0")).toEqual({
      chartName: "billing-api",
      chartVersion: "2.0.0",
    });
  });

  it("falls back to CHART_VERSION", () => {
    expect(extractChartInfo("export CHART_VERSION=3.1.0")).toEqual({
      chartName: null,
      chartVersion: "3.1.0",
    });
  });

  it("returns null without a full x.y.z version", () => {
    expect(extractChartInfo("Chart: billing-api v1.4")).toBeNull();
    expect(extractChartInfo("no chart here")).toBeNull();
  });
});

describe("pickWorkflowRun()", () => {
  it("prefers the general pipeline", () => {
    const lint = run(1, ".github/workflows/lint.yaml", "completed", "success");
    const general = run(2, ".github/workflows/general.yml", "in_progress", null);
    expect(pickWorkflowRun([lint, general])).toBe(general);
  });

  it("falls back to the first run", () => {
    const lint = run(1, ".github/workflows/lint.yaml", "completed", "success");
    const test = run(2, ".github/workflows/test.yaml", "completed", "success");
    expect(pickWorkflowRun([lint, test])).toBe(lint);
    expect(pickWorkflowRun([])).toBeNull();
  });
});

// ─── Tracking ───────────────────────────────────────────

describe("CI tracking", () => {
  let releaseId = "";
  let authId = 0;
  let apiId = 0;

  beforeAll(async () => {
    const release = await createRelease({
      sourceBranch: "develop",
      destBranch: "main",
      createdBy: "release-bot",
    });
    const repos = await addRepos(release.id, [
      { repoName: "auth-service", commitCount: 2, additions: 10, deletions: 1, contributors: ["alice"], mergeCommitSha: "m1" },
      { repoName: "api-gateway", commitCount: 1, additions: 5, deletions: 0, contributors: ["bob"] },
      { repoName: "docs", commitCount: 1, additions: 1, deletions: 1, contributors: ["carol"], mergeCommitSha: "m3" },
    ]);
    releaseId = release.id;
    authId = repos[0].id;
    apiId = repos[1].id;
    await updateRepo(release.id, repos[2].id, { excluded: true }, "alice");
  });

  it("starts tracking every shipping repo", async () => {
    respond("repos/acme/auth-service/actions/runs?head_sha=m1", {
      total_count: 2,
      workflow_runs: [
        run(11, ".github/workflows/lint.yaml", "completed", "success"),
        run(12, ".github/workflows/general.yaml", "in_progress", null),
      ],
    });

    const statuses = await initCITracking(releaseId);

    expect(statuses).toHaveLength(2);
    expect(statuses[0]).toMatchObject({
      releaseRepoId: authId,
      workflowRunId: 12,
      workflowRunNumber: 112,
      workflowUrl: "https://github.com/acme/auth-service/actions/runs/12",
      status: "in_progress",
      mergeCommitSha: "m1",
      startedAt: Date.parse("2026-03-02T10:00:00Z"),
      completedAt: null,
      chartVersion: null,
    });
    expect(statuses[1]).toMatchObject({
      releaseRepoId: apiId,
      workflowRunId: null,
      status: "pending",
      mergeCommitSha: null,
    });
    expect(gh.calls.some((path) => path.includes("/docs/"))).toBe(false);
  });

  it("serves statuses through the cache", async () => {
    const first = await getCachedCIStatuses(releaseId);
    expect(first.anyInProgress).toBe(true);
    expect(first.statuses.map((s) => s.status)).toEqual(["in_progress", "pending"]);

    // a write behind the cache's back is not seen until invalidation
    const db = await getDb();
    db.prepare("UPDATE repo_ci_status SET status = 'queued' WHERE release_repo_id = ?").run(apiId);
    const second = await getCachedCIStatuses(releaseId);
    expect(second.statuses.map((s) => s.status)).toEqual(["in_progress", "pending"]);

    db.prepare("UPDATE repo_ci_status SET status = 'pending' WHERE release_repo_id = ?").run(apiId);
  });

  it("polls running statuses and records the published chart", async () => {
    respond("repos/acme/auth-service/actions/runs/12", run(12, ".github/workflows/general.yaml", "completed", "success"));
    respond("repos/acme/auth-service/actions/runs/12/jobs", {
      total_count: 2,
      jobs: [
        { id: 21, name: "lint", status: "completed", conclusion: "success" },
        { id: 22, name: "Build & Push Helm Chart", status: "completed", conclusion: "success" },
      ],
    });
    respond("repos/acme/auth-service/actions/jobs/22/logs", "Step 4/6\nChart: auth-service v1.4.2\nDone");

    expect(await pollIncompleteStatuses()).toEqual({ checked: 2, failed: 0 });
    expect(gh.calls).not.toContain("repos/acme/auth-service/actions/jobs/21/logs");

    const [auth, api] = await getCIStatusesForRelease(releaseId);
    expect(auth).toMatchObject({
      status: "success",
      chartName: "auth-service",
      chartVersion: "1.4.2",
      completedAt: Date.parse(UPDATED_AT),
    });
    expect(api.status).toBe("pending");

    // the poll invalidated the cached copy
    const cachedView = await getCachedCIStatuses(releaseId);
    expect(cachedView.statuses.map((s) => s.status)).toEqual(["success", "pending"]);
    expect(cachedView.anyInProgress).toBe(true);
  });

  it("counts a repo whose lookup fails and keeps going", async () => {
    const db = await getDb();
    db.prepare("UPDATE release_repos SET merge_commit_sha = 'm2' WHERE id = ?").run(apiId);

    expect(await pollIncompleteStatuses()).toEqual({ checked: 1, failed: 1 });
  });

  it("re-reads chart info on request", async () => {
    respond("repos/acme/auth-service/actions/jobs/22/logs", "CHART_VERSION=1.4.3");

    expect(await refreshChartInfo(authId)).toEqual({ chartName: null, chartVersion: "1.4.3" });
    const [auth] = await getCIStatusesForRelease(releaseId);
    expect(auth.chartVersion).toBe("1.4.3");
  });

  it("returns null for a repo without a workflow run", async () => {
    expect(await refreshChartInfo(apiId)).toBeNull();
  });

  it("polls on an interval until stopped", async () => {
    respond("repos/acme/api-gateway/actions/runs?head_sha=m2", {
      total_count: 1,
      workflow_runs: [run(31, ".github/workflows/general.yaml", "queued", null, "m2")],
    });
    respond("repos/acme/api-gateway/actions/runs/31", run(31, ".github/workflows/general.yaml", "queued", null, "m2"));

    const stop = await startCITracker(20);
    await vi.waitFor(
      async () => {
        const [, api] = await getCIStatusesForRelease(releaseId);
        expect(api).toMatchObject({ workflowRunId: 31, status: "queued" });
      },
      { timeout: 2000, interval: 20 }
    );
    stop();

    // let a poll that was already running finish
    await new Promise((r) => setTimeout(r, 60));
    const callsAfterStop = gh.calls.length;
    await new Promise((r) => setTimeout(r, 100));
    expect(gh.calls.length).toBe(callsAfterStop);
  });
});
