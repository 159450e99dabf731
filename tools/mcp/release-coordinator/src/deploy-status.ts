/**
 * ArgoCD rollout tracking for the charts a release's CI published.
 *
 * A repository is deployable once its CI run succeeded with a chart
 * version. It then gets one repo_deployment_status row per configured
 * ArgoCD environment, and the tracker compares the application's target
 * revision, sync and health with that version until it reads `deployed`.
 */

import { z } from "zod";
import { getDb, type DeploymentStatusRow } from "./db.js";
import {
  getConfig,
  ROLLOUT_STATUSES,
  type ArgoCDConfig,
  type RolloutStatus,
} from "./config.js";
import { cached, invalidate, invalidatePrefix } from "./cache.js";
import { getApplication, type AppStatus } from "./argocd.js";
import { getRelease } from "./releases.js";
import { log } from "./logger.js";
import { startPoller, type PollResult } from "./poller.js";

// ─── Types ──────────────────────────────────────────────

export interface DeploymentStatus {
  releaseRepoId: number;
  environment: string;
  appName: string;
  expectedVersion: string;
  currentVersion: string | null;
  syncStatus: string | null;
  healthStatus: string | null;
  rolloutStatus: RolloutStatus;
  lastCheckedAt: number;
}

interface DeployableRepo {
  id: number;
  release_id: string;
  repo_name: string;
  chart_version: string;
}

const RolloutStatusSchema = z.enum(ROLLOUT_STATUSES);

function toDeploymentStatus(row: DeploymentStatusRow): DeploymentStatus {
  return {
    releaseRepoId: row.release_repo_id,
    environment: row.environment,
    appName: row.app_name,
    expectedVersion: row.expected_version,
    currentVersion: row.current_version,
    syncStatus: row.sync_status,
    healthStatus: row.health_status,
    rolloutStatus: RolloutStatusSchema.parse(row.rollout_status),
    lastCheckedAt: row.last_checked_at,
  };
}

// ─── Pure Helpers ───────────────────────────────────────

/**
 * ArgoCD application name of a repository in one environment:
 * an override for `<repo>-<env>`, then one for `<repo>`, then the repo
 * name with the environment's suffix.
 */
export function resolveAppName(
  argocd: Pick<ArgoCDConfig, "environments" | "overrides">,
  repoName: string,
  environment: string
): string {
  const override =
    argocd.overrides[`${repoName}-${environment}`] ?? argocd.overrides[repoName];
  if (override) return override;
  return repoName + (argocd.environments[environment]?.appSuffix ?? "");
}

export function determineRolloutStatus(
  app: AppStatus,
  expectedVersion: string
): RolloutStatus {
  if (app.currentVersion !== expectedVersion) return "pending";
  if (app.syncStatus !== "Synced") return "syncing";
  if (app.healthStatus !== "Healthy") return "unhealthy";
  return "deployed";
}

export function isRolloutPending(status: RolloutStatus): boolean {
  return status !== "deployed";
}

// ─── Persistence ────────────────────────────────────────

async function saveDeploymentStatus(status: DeploymentStatus): Promise<void> {
  const db = await getDb();
  db.prepare(`
    INSERT INTO repo_deployment_status (
      release_repo_id, environment, app_name, expected_version, current_version,
      sync_status, health_status, rollout_status, last_checked_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(release_repo_id, environment) DO UPDATE SET
      app_name         = excluded.app_name,
      expected_version = excluded.expected_version,
      current_version  = excluded.current_version,
      sync_status      = excluded.sync_status,
      health_status    = excluded.health_status,
      rollout_status   = excluded.rollout_status,
      last_checked_at  = excluded.last_checked_at
  `).run(
    status.releaseRepoId,
    status.environment,
    status.appName,
    status.expectedVersion,
    status.currentVersion,
    status.syncStatus,
    status.healthStatus,
    status.rolloutStatus,
    status.lastCheckedAt
  );
}

async function getDeploymentStatus(
  releaseRepoId: number,
  environment: string
): Promise<DeploymentStatus | null> {
  const db = await getDb();
  const row = db
    .prepare<[number, string], DeploymentStatusRow>(
      "SELECT * FROM repo_deployment_status WHERE release_repo_id = ? AND environment = ?"
    )
    .get(releaseRepoId, environment);
  return row ? toDeploymentStatus(row) : null;
}

export async function getDeploymentStatusesForRelease(
  releaseId: string
): Promise<DeploymentStatus[]> {
  const db = await getDb();
  return db
    .prepare<[string], DeploymentStatusRow>(`
      SELECT d.* FROM repo_deployment_status d
      JOIN release_repos r ON r.id = d.release_repo_id
      WHERE r.release_id = ?
      ORDER BY d.release_repo_id ASC, d.environment ASC
    `)
    .all(releaseId)
    .map(toDeploymentStatus);
}

const DEPLOYABLE_SQL = `
  SELECT r.id, r.release_id, r.repo_name, s.chart_version
  FROM release_repos r
  JOIN repo_ci_status s ON s.release_repo_id = r.id
  WHERE s.status = 'success'
    AND s.chart_version IS NOT NULL AND s.chart_version != ''
    AND r.excluded = 0
`;

/** Non-excluded repos whose CI succeeded with a chart, optionally for one release */
async function selectDeployableRepos(releaseId?: string): Promise<DeployableRepo[]> {
  const db = await getDb();
  return releaseId === undefined
    ? db.prepare<[], DeployableRepo>(`${DEPLOYABLE_SQL} ORDER BY r.id ASC`).all()
    : db
        .prepare<[string], DeployableRepo>(
          `${DEPLOYABLE_SQL} AND r.release_id = ? ORDER BY r.id ASC`
        )
        .all(releaseId);
}

// ─── Public Functions ───────────────────────────────────

/**
 * Create a `pending` rollout per deployable repository and environment.
 * Repos still building, failed or without a chart are skipped; the poll
 * picks them up once CI records a chart.
 */
export async function initDeploymentTracking(
  releaseId: string
): Promise<DeploymentStatus[]> {
  await getRelease(releaseId);
  const config = await getConfig();
  const environments = Object.keys(config.argocd.environments);
  if (environments.length === 0) {
    log("warn", "no ArgoCD environments configured", { release: releaseId });
    return [];
  }

  const repos = await selectDeployableRepos(releaseId);
  log("info", "initializing deployment tracking", {
    release: releaseId,
    repos: repos.length,
    environments: environments.join(","),
  });

  for (const repo of repos) {
    for (const environment of environments) {
      await saveDeploymentStatus({
        releaseRepoId: repo.id,
        environment,
        appName: resolveAppName(config.argocd, repo.repo_name, environment),
        expectedVersion: repo.chart_version,
        currentVersion: null,
        syncStatus: null,
        healthStatus: null,
        rolloutStatus: "pending",
        lastCheckedAt: Date.now(),
      });
    }
  }

  invalidate(deployCacheKey(releaseId));
  return getDeploymentStatusesForRelease(releaseId);
}

/**
 * Check every deployable repository in every environment once.
 * A rollout already `deployed` at the expected version is not asked again.
 */
export async function pollDeployments(): Promise<PollResult> {
  const config = await getConfig();
  const environments = Object.entries(config.argocd.environments);
  if (environments.length === 0) return { checked: 0, failed: 0 };

  const repos = await selectDeployableRepos();
  let checked = 0;
  let failed = 0;

  for (const repo of repos) {
    for (const [environment, env] of environments) {
      const previous = await getDeploymentStatus(repo.id, environment);
      if (
        previous?.rolloutStatus === "deployed" &&
        previous.expectedVersion === repo.chart_version
      ) {
        continue;
      }

      checked++;
      const appName = resolveAppName(config.argocd, repo.repo_name, environment);
      try {
        const app = await getApplication(env, appName);
        const rolloutStatus = app
          ? determineRolloutStatus(app, repo.chart_version)
          : "not_found";
        await saveDeploymentStatus({
          releaseRepoId: repo.id,
          environment,
          appName,
          expectedVersion: repo.chart_version,
          currentVersion: app?.currentVersion ?? null,
          syncStatus: app?.syncStatus ?? null,
          healthStatus: app?.healthStatus ?? null,
          rolloutStatus,
          lastCheckedAt: Date.now(),
        });
        if (rolloutStatus === "deployed") {
          log("info", "rollout complete", {
            repo: repo.repo_name,
            env: environment,
            version: repo.chart_version,
          });
        }
      } catch (error) {
        failed++;
        log("error", "ArgoCD lookup failed", {
          repo: repo.repo_name,
          env: environment,
          app: appName,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  if (checked > 0) {
    invalidatePrefix("deploy:");
  }
  return { checked, failed };
}

function deployCacheKey(releaseId: string): string {
  return `deploy:${releaseId}`;
}

/**
 * Rollouts of a release through the read-through cache.
 * `anyPending` is true while some environment has not reached `deployed`.
 */
export async function getCachedDeploymentStatuses(
  releaseId: string
): Promise<{ statuses: DeploymentStatus[]; anyPending: boolean }> {
  const config = await getConfig();
  const statuses = await cached(deployCacheKey(releaseId), config.argocd.cacheTtlMs, () =>
    getDeploymentStatusesForRelease(releaseId)
  );
  return {
    statuses,
    anyPending: statuses.some((s) => isRolloutPending(s.rolloutStatus)),
  };
}

/** Poll ArgoCD on an interval; a no-op without configured environments */
export async function startDeployTracker(intervalMs?: number): Promise<() => void> {
  const config = await getConfig();
  if (Object.keys(config.argocd.environments).length === 0) {
    log("info", "deploy tracker disabled, no ArgoCD environments configured");
    return () => {};
  }
  return startPoller("deploy", intervalMs ?? config.argocd.pollIntervalMs, pollDeployments);
}
