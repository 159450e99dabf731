/**
 * CI status tracking for the merge commits of a release.
 *
 * Each non-excluded repository gets one repo_ci_status row. The tracker
 * polls GitHub Actions for rows that are still running and records the
 * Helm chart version the build published.
 *
 * Readers go through getCachedCIStatuses(): read-through with a short TTL
 * and a single refill per release, however many callers miss at once.
 */

import { getDb, type CIStatusRow } from "./db.js";
import { getConfig, CI_ACTIVE_STATES } from "./config.js";
import { cached, invalidate, invalidatePrefix } from "./cache.js";
import {
  getJobLogs,
  getWorkflowJobs,
  getWorkflowRun,
  getWorkflowRunsForCommit,
  type WorkflowRun,
} from "./github.js";
import { getRepo, getRepos, type ReleaseRepo } from "./releases.js";
import { log } from "./logger.js";
import { startPoller, type PollResult } from "./poller.js";

// ─── Types ──────────────────────────────────────────────

export interface CIStatus {
  releaseRepoId: number;
  workflowRunId: number | null;
  workflowRunNumber: number | null;
  workflowUrl: string | null;
  status: string;
  chartName: string | null;
  chartVersion: string | null;
  mergeCommitSha: string | null;
  startedAt: number | null;
  completedAt: number | null;
  lastCheckedAt: number | null;
}

export interface ChartInfo {
  chartName: string | null;
  chartVersion: string;
}

function toCIStatus(row: CIStatusRow): CIStatus {
  return {
    releaseRepoId: row.release_repo_id,
    workflowRunId: row.workflow_run_id,
    workflowRunNumber: row.workflow_run_number,
    workflowUrl: row.workflow_url,
    status: row.status,
    chartName: row.chart_name,
    chartVersion: row.chart_version,
    mergeCommitSha: row.merge_commit_sha,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    lastCheckedAt: row.last_checked_at,
  };
}

// ─── Pure Helpers ───────────────────────────────────────

/** Collapse a GitHub run status/conclusion pair into one CI state */
export function mapWorkflowStatus(
  status: string | null,
  conclusion: string | null
): string {
  switch (status) {
    case "queued":
    case "waiting":
      return "queued";
    case "in_progress":
      return "in_progress";
    case "completed":
      return conclusion ?? "completed";
    default:
      return status ?? "pending";
  }
}

export function isActiveCIState(status: string): boolean {
  return CI_ACTIVE_STATES.some((state) => state === status);
}

const CHART_INFO = /Chart:\s+(\S+)\s+v?(\d+\.\d+\.\d+)/;
const CHART_VERSION = /CHART_VERSION=(\d+\.\d+\.\d+)/;

/** Find the published chart in a build log */
export function extractChartInfo(logs: string): ChartInfo | null {
  const info = CHART_INFO.exec(logs);
  if (info) return { chartName: info[1], chartVersion: info[2] };

  const version = CHART_VERSION.exec(logs);
  if (version) return { chartName: null, chartVersion: version[1] };

  return null;
}

/** Prefer the general.yaml pipeline; fall back to the first run */
export function pickWorkflowRun(runs: readonly WorkflowRun[]): WorkflowRun | null {
  const general = runs.find(
    (run) => run.path.endsWith("general.yaml") || run.path.endsWith("general.yml")
  );
  return general ?? runs[0] ?? null;
}

function toEpochMs(iso: string | null): number | null {
  if (!iso) return null;
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? null : ms;
}

// ─── Persistence ────────────────────────────────────────

async function saveCIStatus(status: CIStatus): Promise<void> {
  const db = await getDb();
  db.prepare(`
    INSERT INTO repo_ci_status (
      release_repo_id, workflow_run_id, workflow_run_number, workflow_url, status,
      chart_name, chart_version, merge_commit_sha, started_at, completed_at, last_checked_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(release_repo_id) DO UPDATE SET
      workflow_run_id     = excluded.workflow_run_id,
      workflow_run_number = excluded.workflow_run_number,
      workflow_url        = excluded.workflow_url,
      status              = excluded.status,
      chart_name          = excluded.chart_name,
      chart_version       = excluded.chart_version,
      merge_commit_sha    = excluded.merge_commit_sha,
      started_at          = excluded.started_at,
      completed_at        = excluded.completed_at,
      last_checked_at     = excluded.last_checked_at
  `).run(
    status.releaseRepoId,
    status.workflowRunId,
    status.workflowRunNumber,
    status.workflowUrl,
    status.status,
    status.chartName,
    status.chartVersion,
    status.mergeCommitSha,
    status.startedAt,
    status.completedAt,
    status.lastCheckedAt
  );
}

export async function getCIStatus(releaseRepoId: number): Promise<CIStatus | null> {
  const db = await getDb();
  const row = db
    .prepare<[number], CIStatusRow>(
      "SELECT * FROM repo_ci_status WHERE release_repo_id = ?"
    )
    .get(releaseRepoId);
  return row ? toCIStatus(row) : null;
}

export async function getCIStatusesForRelease(releaseId: string): Promise<CIStatus[]> {
  const db = await getDb();
  return db
    .prepare<[string], CIStatusRow>(`
      SELECT s.* FROM repo_ci_status s
      JOIN release_repos r ON r.id = s.release_repo_id
      WHERE r.release_id = ?
      ORDER BY s.release_repo_id ASC
    `)
    .all(releaseId)
    .map(toCIStatus);
}

/** Statuses the tracker should poll again */
export async function getIncompleteCIStatuses(): Promise<CIStatus[]> {
  const db = await getDb();
  const placeholders = CI_ACTIVE_STATES.map(() => "?").join(", ");
  return db
    .prepare<string[], CIStatusRow>(
      `SELECT * FROM repo_ci_status WHERE status IN (${placeholders}) ORDER BY id ASC`
    )
    .all(...CI_ACTIVE_STATES)
    .map(toCIStatus);
}

// ─── GitHub Lookups ─────────────────────────────────────

/** Search the helm/build/release jobs of a run for the published chart */
async function findChartInRun(
  org: string,
  repoName: string,
  runId: number
): Promise<ChartInfo | null> {
  const jobs = await getWorkflowJobs(org, repoName, runId);

  for (const job of jobs) {
    const name = job.name.toLowerCase();
    if (!name.includes("helm") && !name.includes("build") && !name.includes("release")) {
      continue;
    }

    let logs: string;
    try {
      logs = await getJobLogs(org, repoName, job.id);
    } catch (error) {
      log("debug", "job logs unavailable", {
        repo: repoName,
        job: job.id,
        error: error instanceof Error ? error.message : String(error),
      });
      continue;
    }

    const chart = extractChartInfo(logs);
    if (chart) {
      log("info", "found chart info", { repo: repoName, ...chart });
      return chart;
    }
  }

  return null;
}

/** Attach the workflow run of the repo's merge commit to its status */
async function attachWorkflowRun(
  org: string,
  repo: ReleaseRepo,
  status: CIStatus
): Promise<CIStatus> {
  if (!repo.mergeCommitSha) {
    log("debug", "no merge commit yet", { repo: repo.repoName });
    return status;
  }

  const run = pickWorkflowRun(
    await getWorkflowRunsForCommit(org, repo.repoName, repo.mergeCommitSha)
  );
  if (!run) {
    log("debug", "no workflow runs for commit", {
      repo: repo.repoName,
      sha: repo.mergeCommitSha,
    });
    return status;
  }

  const next: CIStatus = {
    ...status,
    workflowRunId: run.id,
    workflowRunNumber: run.run_number,
    workflowUrl: run.html_url,
    status: mapWorkflowStatus(run.status, run.conclusion),
    mergeCommitSha: run.head_sha,
    startedAt: toEpochMs(run.run_started_at),
    completedAt: run.status === "completed" ? toEpochMs(run.updated_at) : null,
    lastCheckedAt: Date.now(),
  };
  await saveCIStatus(next);
  log("info", "found workflow run", {
    repo: repo.repoName,
    run: run.id,
    path: run.path,
    status: next.status,
  });
  return next;
}

async function refreshCIStatus(org: string, status: CIStatus): Promise<CIStatus> {
  const repo = await getRepo(status.releaseRepoId);

  if (status.workflowRunId === null) {
    return attachWorkflowRun(org, repo, status);
  }

  const run = await getWorkflowRun(org, repo.repoName, status.workflowRunId);
  const next: CIStatus = {
    ...status,
    status: mapWorkflowStatus(run.status, run.conclusion),
    lastCheckedAt: Date.now(),
  };

  if (run.status === "completed") {
    next.completedAt = toEpochMs(run.updated_at);
    if (!next.chartVersion) {
      const chart = await findChartInRun(org, repo.repoName, run.id);
      if (chart) {
        next.chartName = chart.chartName;
        next.chartVersion = chart.chartVersion;
      }
    }
  }

  await saveCIStatus(next);
  return next;
}

// ─── Public Functions ───────────────────────────────────

/**
 * Start tracking CI for every non-excluded repository of a release.
 * Repos without a merge commit stay `pending` until one appears.
 */
export async function initCITracking(releaseId: string): Promise<CIStatus[]> {
  const config = await getConfig();
  const repos = await getRepos(releaseId);
  log("info", "initializing CI tracking", { release: releaseId, repos: repos.length });

  for (const repo of repos) {
    if (repo.excluded) continue;

    const status: CIStatus = {
      releaseRepoId: repo.id,
      workflowRunId: null,
      workflowRunNumber: null,
      workflowUrl: null,
      status: "pending",
      chartName: null,
      chartVersion: null,
      mergeCommitSha: repo.mergeCommitSha,
      startedAt: null,
      completedAt: null,
      lastCheckedAt: Date.now(),
    };
    await saveCIStatus(status);

    if (!repo.mergeCommitSha) {
      log("warn", "no merge commit SHA, PR may not be merged yet", { repo: repo.repoName });
      continue;
    }

    try {
      await attachWorkflowRun(config.org, repo, status);
    } catch (error) {
      log("error", "workflow run lookup failed", {
        repo: repo.repoName,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  invalidate(ciCacheKey(releaseId));
  return getCIStatusesForRelease(releaseId);
}

/** Poll every running status once. Failures are logged per repository. */
export async function pollIncompleteStatuses(): Promise<PollResult> {
  const config = await getConfig();
  const statuses = await getIncompleteCIStatuses();
  let failed = 0;

  for (const status of statuses) {
    try {
      await refreshCIStatus(config.org, status);
    } catch (error) {
      failed++;
      log("error", "CI status refresh failed", {
        repoId: status.releaseRepoId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  if (statuses.length > 0) {
    invalidatePrefix("ci:");
  }
  return { checked: statuses.length, failed };
}

/** Re-read the chart version of a repo's completed run */
export async function refreshChartInfo(releaseRepoId: number): Promise<ChartInfo | null> {
  const status = await getCIStatus(releaseRepoId);
  if (!status || status.workflowRunId === null) return null;

  const config = await getConfig();
  const repo = await getRepo(releaseRepoId);
  const chart = await findChartInRun(config.org, repo.repoName, status.workflowRunId);
  if (chart) {
    await saveCIStatus({ ...status, ...chart });
    invalidate(ciCacheKey(repo.releaseId));
  }
  return chart;
}

function ciCacheKey(releaseId: string): string {
  return `ci:${releaseId}`;
}

/**
 * CI statuses of a release through the read-through cache.
 * `anyInProgress` tells callers whether polling again is worthwhile.
 */
export async function getCachedCIStatuses(
  releaseId: string
): Promise<{ statuses: CIStatus[]; anyInProgress: boolean }> {
  const config = await getConfig();
  const statuses = await cached(ciCacheKey(releaseId), config.ci.cacheTtlMs, () =>
    getCIStatusesForRelease(releaseId)
  );
  return {
    statuses,
    anyInProgress: statuses.some((s) => isActiveCIState(s.status)),
  };
}

/** Poll running CI statuses on an interval until the returned function is called */
export async function startCITracker(intervalMs?: number): Promise<() => void> {
  const config = await getConfig();
  return startPoller("CI", intervalMs ?? config.ci.pollIntervalMs, pollIncompleteStatuses);
}
