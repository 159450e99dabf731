/**
 * Release service: releases, their repositories, dependency declarations,
 * approvals, contributor confirmations and the audit history.
 *
 * Everything returned from here is decoded: list columns come back as
 * string arrays, flags as booleans. Every mutation records a history entry.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  getDb,
  type Db,
  type HistoryRow,
  type ReleaseRepoRow,
  type ReleaseRow,
  type UserRow,
} from "./db.js";
import {
  getConfig,
  RELEASE_STATUSES,
  type ApprovalType,
  type ReleaseStatus,
} from "./config.js";
import { decodeStringList, encodeStringList } from "./codec.js";
import {
  computeDeployOrderFromRecords,
  findUnresolvedDependencies,
  groupByWave,
  type DeployOrder,
  type Wave,
} from "./deploy-order.js";
import {
  ConfirmationError,
  DuplicateRepoError,
  NotFoundError,
  ParseError,
  isDeployOrderError,
} from "./errors.js";
import { log } from "./logger.js";

// ─── Types ──────────────────────────────────────────────

export interface Release {
  id: string;
  sourceBranch: string;
  destBranch: string;
  status: ReleaseStatus;
  notes: string;
  breakingChanges: string;
  createdBy: string;
  channelId: string;
  devApprovedBy: string | null;
  devApprovedAt: number | null;
  qaApprovedBy: string | null;
  qaApprovedAt: number | null;
  declinedBy: string | null;
  declinedAt: number | null;
  lastRefreshedAt: number | null;
  createdAt: number;
}

export interface ReleaseRepo {
  id: number;
  releaseId: string;
  repoName: string;
  commitCount: number;
  additions: number;
  deletions: number;
  contributors: string[];
  prNumber: number | null;
  prUrl: string | null;
  prMerged: boolean;
  excluded: boolean;
  dependsOn: string[];
  summary: string;
  isBreaking: boolean;
  confirmedBy: string[];
  confirmedAt: number | null;
  infraChanges: string[];
  mergeCommitSha: string | null;
  headSha: string | null;
}

/** Repository data gathered from GitHub for a release */
export interface RepoData {
  repoName: string;
  commitCount: number;
  additions: number;
  deletions: number;
  contributors: string[];
  prNumber?: number | null;
  prUrl?: string | null;
  prMerged?: boolean;
  summary?: string;
  isBreaking?: boolean;
  infraChanges?: string[];
  mergeCommitSha?: string | null;
  headSha?: string | null;
}

/**
 * A repository as shown in the release detail. A list field is null when
 * its stored value cannot be decoded; `deployOrder` is null whenever the
 * release's deploy order cannot be computed.
 */
export interface ReleaseRepoView
  extends Omit<ReleaseRepo, "dependsOn" | "contributors" | "confirmedBy" | "infraChanges"> {
  dependsOn: string[] | null;
  contributors: string[] | null;
  confirmedBy: string[] | null;
  infraChanges: string[] | null;
  deployOrder: number | null;
}

export interface ReleaseDetail {
  release: Release;
  repos: ReleaseRepoView[];
  /** Set when the deploy order cannot be computed (cycle, bad data) */
  deployOrderError: string | null;
  /** Dependency names that match no repository in this release */
  unresolvedDependencies: Array<{ repo: string; missing: string[] }>;
}

export interface HistoryEntry {
  id: number;
  releaseId: string;
  action: string;
  actor: string;
  details: Record<string, unknown> | null;
  createdAt: number;
}

export interface User {
  id: number;
  email: string;
  githubUser: string | null;
  chatUser: string | null;
  createdAt: number;
  updatedAt: number;
}

export interface PendingAction {
  githubUser: string;
  /** Chat username of the contributor, when known */
  chatUser: string | null;
  actionType: "confirm_repo";
  repoName: string;
}

// ─── Row Mapping ────────────────────────────────────────

const ReleaseStatusSchema = z.enum(RELEASE_STATUSES);
const HistoryDetailsSchema = z.record(z.unknown());

function toRelease(row: ReleaseRow): Release {
  return {
    id: row.id,
    sourceBranch: row.source_branch,
    destBranch: row.dest_branch,
    status: ReleaseStatusSchema.parse(row.status),
    notes: row.notes,
    breakingChanges: row.breaking_changes,
    createdBy: row.created_by,
    channelId: row.channel_id,
    devApprovedBy: row.dev_approved_by,
    devApprovedAt: row.dev_approved_at,
    qaApprovedBy: row.qa_approved_by,
    qaApprovedAt: row.qa_approved_at,
    declinedBy: row.declined_by,
    declinedAt: row.declined_at,
    lastRefreshedAt: row.last_refreshed_at,
    createdAt: row.created_at,
  };
}

function toReleaseRepo(row: ReleaseRepoRow): ReleaseRepo {
  return {
    id: row.id,
    releaseId: row.release_id,
    repoName: row.repo_name,
    commitCount: row.commit_count,
    additions: row.additions,
    deletions: row.deletions,
    contributors: decodeStringList("contributors", row.contributors),
    prNumber: row.pr_number,
    prUrl: row.pr_url,
    prMerged: row.pr_merged === 1,
    excluded: row.excluded === 1,
    dependsOn: decodeStringList("depends_on", row.depends_on),
    summary: row.summary,
    isBreaking: row.is_breaking === 1,
    confirmedBy: decodeStringList("confirmed_by", row.confirmed_by),
    confirmedAt: row.confirmed_at,
    infraChanges: decodeStringList("infra_changes", row.infra_changes),
    mergeCommitSha: row.merge_commit_sha,
    headSha: row.head_sha,
  };
}

function decodeForView(
  row: ReleaseRepoRow,
  field: "depends_on" | "contributors" | "confirmed_by" | "infra_changes"
): string[] | null {
  try {
    return decodeStringList(field, row[field]);
  } catch (error) {
    if (!(error instanceof ParseError)) throw error;
    log("warn", "undecodable list column", { repo: row.repo_name, error: error.message });
    return null;
  }
}

function toRepoView(
  row: ReleaseRepoRow,
  order: DeployOrder<number> | null
): ReleaseRepoView {
  return {
    ...toReleaseRepo({
      ...row,
      depends_on: null,
      contributors: null,
      confirmed_by: null,
      infra_changes: null,
    }),
    dependsOn: decodeForView(row, "depends_on"),
    contributors: decodeForView(row, "contributors"),
    confirmedBy: decodeForView(row, "confirmed_by"),
    infraChanges: decodeForView(row, "infra_changes"),
    deployOrder: order?.get(row.id) ?? null,
  };
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    githubUser: row.github_user,
    chatUser: row.chat_user,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toHistoryEntry(row: HistoryRow): HistoryEntry {
  let details: Record<string, unknown> | null = null;
  if (row.details) {
    const parsed = HistoryDetailsSchema.safeParse(JSON.parse(row.details));
    details = parsed.success ? parsed.data : { raw: row.details };
  }
  return {
    id: row.id,
    releaseId: row.release_id,
    action: row.action,
    actor: row.actor,
    details,
    createdAt: row.created_at,
  };
}

// ─── Queries ────────────────────────────────────────────

async function selectReleaseRow(id: string): Promise<ReleaseRow> {
  const db = await getDb();
  const row = db
    .prepare<[string], ReleaseRow>("SELECT * FROM releases WHERE id = ?")
    .get(id);
  if (!row) throw new NotFoundError("release", id);
  return row;
}

function readRepoRows(db: Db, releaseId: string): ReleaseRepoRow[] {
  return db
    .prepare<[string], ReleaseRepoRow>(
      "SELECT * FROM release_repos WHERE release_id = ? ORDER BY id ASC"
    )
    .all(releaseId);
}

function readRepoRow(db: Db, repoId: number): ReleaseRepoRow {
  const row = db
    .prepare<[number], ReleaseRepoRow>("SELECT * FROM release_repos WHERE id = ?")
    .get(repoId);
  if (!row) throw new NotFoundError("repo", repoId);
  return row;
}

async function selectRepoRows(releaseId: string): Promise<ReleaseRepoRow[]> {
  return readRepoRows(await getDb(), releaseId);
}

async function selectRepoRow(repoId: number): Promise<ReleaseRepoRow> {
  return readRepoRow(await getDb(), repoId);
}

export async function getRelease(id: string): Promise<Release> {
  return toRelease(await selectReleaseRow(id));
}

/** List releases newest first, optionally filtered by status */
export async function listReleases(status?: ReleaseStatus): Promise<Release[]> {
  const db = await getDb();
  const rows = status
    ? db
        .prepare<[string], ReleaseRow>(
          "SELECT * FROM releases WHERE status = ? ORDER BY created_at DESC, rowid DESC"
        )
        .all(status)
    : db
        .prepare<[], ReleaseRow>(
          "SELECT * FROM releases ORDER BY created_at DESC, rowid DESC"
        )
        .all();
  return rows.map(toRelease);
}

export async function getRepo(repoId: number): Promise<ReleaseRepo> {
  return toReleaseRepo(await selectRepoRow(repoId));
}

export async function getRepos(releaseId: string): Promise<ReleaseRepo[]> {
  const rows = await selectRepoRows(releaseId);
  return rows.map(toReleaseRepo);
}

/**
 * Release with every repository and its deploy wave.
 *
 * A cycle, a malformed depends_on or an over-long chain does not fail the
 * query: every repo gets `deployOrder: null` and `deployOrderError` says why.
 */
export async function getReleaseDetail(id: string): Promise<ReleaseDetail> {
  const release = await getRelease(id);
  const config = await getConfig();
  const rows = await selectRepoRows(id);

  let order: DeployOrder<number> | null = null;
  let deployOrderError: string | null = null;
  try {
    order = computeDeployOrderFromRecords(rows, {
      maxDepth: config.deployOrder.maxDepth,
    });
  } catch (error) {
    if (!isDeployOrderError(error)) throw error;
    deployOrderError = `cannot compute deploy order: ${error.message}`;
    log("warn", deployOrderError, { release: id, kind: error.kind });
  }

  const repos = rows.map((row) => toRepoView(row, order));

  const unresolvedDependencies = order
    ? findUnresolvedDependencies(
        repos.map((repo) => ({
          id: repo.id,
          name: repo.repoName,
          dependsOn: repo.dependsOn ?? [],
        }))
      ).map(({ name, missing }) => ({ repo: name, missing }))
    : [];

  if (config.deployOrder.warnUnresolved) {
    for (const { repo, missing } of unresolvedDependencies) {
      log("warn", "dependency not in release", {
        release: id,
        repo,
        missing: missing.join(","),
      });
    }
  }

  return { release, repos, deployOrderError, unresolvedDependencies };
}

/**
 * Deploy waves of the repositories that ship with a release.
 * Wave numbers are the ones getReleaseDetail() reports; excluded repos
 * are left out of the grouping.
 */
export async function getDeployWaves(id: string): Promise<{
  waves: Wave[];
  deployOrderError: string | null;
  unresolvedDependencies: ReleaseDetail["unresolvedDependencies"];
}> {
  const detail = await getReleaseDetail(id);
  if (detail.deployOrderError) {
    return {
      waves: [],
      deployOrderError: detail.deployOrderError,
      unresolvedDependencies: detail.unresolvedDependencies,
    };
  }

  const shipping = detail.repos.filter((repo) => !repo.excluded);
  const order: DeployOrder<number> = new Map();
  for (const repo of shipping) {
    if (repo.deployOrder !== null) order.set(repo.id, repo.deployOrder);
  }

  return {
    waves: groupByWave(
      shipping.map((repo) => ({ id: repo.id, name: repo.repoName })),
      order
    ),
    deployOrderError: null,
    unresolvedDependencies: detail.unresolvedDependencies,
  };
}

// ─── History ────────────────────────────────────────────

export async function recordHistory(
  releaseId: string,
  action: string,
  actor: string,
  details?: Record<string, unknown>
): Promise<void> {
  const db = await getDb();
  db.prepare(`
    INSERT INTO release_history (release_id, action, actor, details, created_at)
    VALUES (?, ?, ?, ?, ?)
  `).run(
    releaseId,
    action,
    actor,
    details ? JSON.stringify(details) : null,
    Date.now()
  );
}

/** History of a release, newest first */
export async function getHistory(releaseId: string): Promise<HistoryEntry[]> {
  const db = await getDb();
  return db
    .prepare<[string], HistoryRow>(
      "SELECT * FROM release_history WHERE release_id = ? ORDER BY created_at DESC, id DESC"
    )
    .all(releaseId)
    .map(toHistoryEntry);
}

// ─── Release Lifecycle ──────────────────────────────────

export async function createRelease(input: {
  sourceBranch: string;
  destBranch: string;
  createdBy: string;
  channelId?: string;
}): Promise<Release> {
  const db = await getDb();
  const id = randomUUID();

  db.prepare(`
    INSERT INTO releases (id, source_branch, dest_branch, status, created_by, channel_id, created_at)
    VALUES (?, ?, ?, 'pending', ?, ?, ?)
  `).run(
    id,
    input.sourceBranch,
    input.destBranch,
    input.createdBy,
    input.channelId ?? "",
    Date.now()
  );

  await recordHistory(id, "release_created", input.createdBy, {
    source: input.sourceBranch,
    dest: input.destBranch,
  });
  log("info", "release created", {
    release: id,
    source: input.sourceBranch,
    dest: input.destBranch,
  });

  return getRelease(id);
}

export async function updateRelease(
  id: string,
  changes: { notes?: string; breakingChanges?: string },
  actor: string
): Promise<Release> {
  const before = await getRelease(id);
  const db = await getDb();

  if (changes.notes !== undefined) {
    db.prepare("UPDATE releases SET notes = ? WHERE id = ?").run(changes.notes, id);
    await recordHistory(id, "notes_updated", actor, {
      old: before.notes,
      new: changes.notes,
    });
  }
  if (changes.breakingChanges !== undefined) {
    db.prepare("UPDATE releases SET breaking_changes = ? WHERE id = ?").run(
      changes.breakingChanges,
      id
    );
    await recordHistory(id, "breaking_changes_updated", actor, {
      old: before.breakingChanges,
      new: changes.breakingChanges,
    });
  }

  return getRelease(id);
}

// ─── Approvals ──────────────────────────────────────────

type FullApprovalListener = (release: Release) => void;

const fullApprovalListeners = new Set<FullApprovalListener>();

/** Subscribe to releases reaching dev + QA approval. Returns unsubscribe. */
export function onFullApproval(listener: FullApprovalListener): () => void {
  fullApprovalListeners.add(listener);
  return () => {
    fullApprovalListeners.delete(listener);
  };
}

function notifyFullApproval(release: Release): void {
  for (const listener of fullApprovalListeners) {
    try {
      listener(release);
    } catch (error) {
      log("error", "full-approval listener failed", {
        release: release.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Record a dev or QA approval. When both are present the release moves
 * to `approved` and full-approval listeners run.
 */
export async function approveRelease(
  id: string,
  type: ApprovalType,
  user: string
): Promise<Release> {
  await selectReleaseRow(id);
  const db = await getDb();
  const now = Date.now();

  const becameApproved = db.transaction(() => {
    if (type === "dev") {
      db.prepare(
        "UPDATE releases SET dev_approved_by = ?, dev_approved_at = ? WHERE id = ?"
      ).run(user, now, id);
    } else {
      db.prepare(
        "UPDATE releases SET qa_approved_by = ?, qa_approved_at = ? WHERE id = ?"
      ).run(user, now, id);
    }

    const row = db
      .prepare<[string], Pick<ReleaseRow, "status" | "dev_approved_by" | "qa_approved_by">>(
        "SELECT status, dev_approved_by, qa_approved_by FROM releases WHERE id = ?"
      )
      .get(id);
    if (!row?.dev_approved_by || !row.qa_approved_by || row.status === "approved") {
      return false;
    }
    db.prepare("UPDATE releases SET status = 'approved' WHERE id = ?").run(id);
    return true;
  })();

  await recordHistory(id, `${type}_approved`, user);

  const release = await getRelease(id);
  if (becameApproved) {
    log("info", "release fully approved", { release: id });
    notifyFullApproval(release);
  }
  return release;
}

export async function revokeApproval(
  id: string,
  type: ApprovalType,
  actor: string
): Promise<Release> {
  await selectReleaseRow(id);
  const db = await getDb();

  const column = type === "dev" ? "dev" : "qa";
  db.prepare(`
    UPDATE releases
    SET ${column}_approved_by = NULL, ${column}_approved_at = NULL, status = 'pending'
    WHERE id = ?
  `).run(id);

  await recordHistory(id, `${type}_approval_revoked`, actor);
  return getRelease(id);
}

/** Decline a release; clears both approvals */
export async function declineRelease(id: string, user: string): Promise<Release> {
  await selectReleaseRow(id);
  const db = await getDb();

  db.prepare(`
    UPDATE releases
    SET status = 'declined', declined_by = ?, declined_at = ?,
        dev_approved_by = NULL, dev_approved_at = NULL,
        qa_approved_by = NULL, qa_approved_at = NULL
    WHERE id = ?
  `).run(user, Date.now(), id);

  await recordHistory(id, "release_declined", user);
  return getRelease(id);
}

// ─── Repositories ───────────────────────────────────────

const INSERT_REPO_SQL = `
  INSERT INTO release_repos (
    release_id, repo_name, commit_count, additions, deletions, contributors,
    pr_number, pr_url, pr_merged, summary, is_breaking, infra_changes,
    merge_commit_sha, head_sha
  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
`;

function repoInsertParams(releaseId: string, repo: RepoData) {
  return [
    releaseId,
    repo.repoName,
    repo.commitCount,
    repo.additions,
    repo.deletions,
    encodeStringList(repo.contributors),
    repo.prNumber ?? null,
    repo.prUrl ?? null,
    repo.prMerged ? 1 : 0,
    repo.summary ?? "",
    repo.isBreaking ? 1 : 0,
    encodeStringList(repo.infraChanges ?? []),
    repo.mergeCommitSha ?? null,
    repo.headSha ?? null,
  ] as const;
}

/** Add repositories to a release. A name already in the release is rejected. */
export async function addRepos(
  releaseId: string,
  repos: readonly RepoData[]
): Promise<ReleaseRepo[]> {
  await selectReleaseRow(releaseId);
  const db = await getDb();
  const insert = db.prepare(INSERT_REPO_SQL);
  const exists = db.prepare<[string, string], { id: number }>(
    "SELECT id FROM release_repos WHERE release_id = ? AND repo_name = ?"
  );

  const ids = db.transaction(() =>
    repos.map((repo) => {
      if (exists.get(releaseId, repo.repoName)) {
        throw new DuplicateRepoError(releaseId, repo.repoName);
      }
      return Number(insert.run(...repoInsertParams(releaseId, repo)).lastInsertRowid);
    })
  )();

  return Promise.all(ids.map((repoId) => getRepo(repoId)));
}

/**
 * Re-sync a release's repositories with fresh GitHub data.
 *
 * Repos are matched by name. A stored summary survives when the head SHA
 * is unchanged. Repos missing from `repos` are removed with their CI and
 * deployment status. The existing rows are read inside the write
 * transaction, so overlapping refreshes never insert a name twice.
 */
export async function refreshRepos(
  releaseId: string,
  repos: readonly RepoData[],
  actor: string
): Promise<{ added: number; updated: number; removed: number }> {
  await selectReleaseRow(releaseId);
  const db = await getDb();

  const insert = db.prepare(INSERT_REPO_SQL);
  const update = db.prepare(`
    UPDATE release_repos
    SET commit_count = ?, additions = ?, deletions = ?, contributors = ?,
        pr_number = ?, pr_url = ?, pr_merged = ?, summary = ?, is_breaking = ?,
        infra_changes = ?, merge_commit_sha = ?, head_sha = ?
    WHERE id = ?
  `);
  const remove = db.prepare("DELETE FROM release_repos WHERE id = ?");

  const counts = db.transaction(() => {
    const existingRows = readRepoRows(db, releaseId);
    const existingByName = new Map(existingRows.map((row) => [row.repo_name, row]));
    let added = 0;
    let updated = 0;
    let removed = 0;
    const incoming = new Set<string>();

    for (const repo of repos) {
      if (incoming.has(repo.repoName)) {
        throw new DuplicateRepoError(releaseId, repo.repoName);
      }
      incoming.add(repo.repoName);
      const existing = existingByName.get(repo.repoName);

      let summary = repo.summary ?? "";
      let isBreaking = repo.isBreaking ?? false;
      if (
        existing?.head_sha &&
        existing.head_sha === repo.headSha &&
        existing.summary !== ""
      ) {
        summary = existing.summary;
        isBreaking = existing.is_breaking === 1;
      }

      if (existing) {
        update.run(
          repo.commitCount,
          repo.additions,
          repo.deletions,
          encodeStringList(repo.contributors),
          repo.prNumber ?? null,
          repo.prUrl ?? null,
          repo.prMerged ? 1 : 0,
          summary,
          isBreaking ? 1 : 0,
          encodeStringList(repo.infraChanges ?? []),
          repo.mergeCommitSha ?? null,
          repo.headSha ?? null,
          existing.id
        );
        updated++;
      } else {
        insert.run(...repoInsertParams(releaseId, { ...repo, summary, isBreaking }));
        added++;
      }
    }

    for (const row of existingRows) {
      if (!incoming.has(row.repo_name)) {
        // CI and deployment rows go with it (ON DELETE CASCADE)
        remove.run(row.id);
        removed++;
      }
    }

    db.prepare("UPDATE releases SET last_refreshed_at = ? WHERE id = ?").run(
      Date.now(),
      releaseId
    );
    return { added, updated, removed };
  })();

  await recordHistory(releaseId, "release_refreshed", actor, counts);
  return counts;
}

/**
 * Update a repository's exclusion flag and/or dependency list.
 *
 * Dependency changes are recorded with the added and removed names. A
 * stored list that cannot be decoded is replaced and recorded as old: null.
 */
export async function updateRepo(
  releaseId: string,
  repoId: number,
  changes: { excluded?: boolean; dependsOn?: readonly string[] },
  actor: string
): Promise<ReleaseRepo> {
  const row = await selectRepoRow(repoId);
  if (row.release_id !== releaseId) throw new NotFoundError("repo", repoId);
  const db = await getDb();

  if (changes.excluded !== undefined) {
    db.prepare("UPDATE release_repos SET excluded = ? WHERE id = ?").run(
      changes.excluded ? 1 : 0,
      repoId
    );
    await recordHistory(
      releaseId,
      changes.excluded ? "repo_excluded" : "repo_included",
      actor,
      { repo: row.repo_name }
    );
  }

  if (changes.dependsOn !== undefined) {
    let oldDeps: string[] | null;
    try {
      oldDeps = decodeStringList("depends_on", row.depends_on);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      log("warn", "replacing undecodable depends_on", {
        repo: row.repo_name,
        error: error.message,
      });
      oldDeps = null;
    }

    const newDeps = [...changes.dependsOn];
    db.prepare("UPDATE release_repos SET depends_on = ? WHERE id = ?").run(
      encodeStringList(newDeps),
      repoId
    );

    const oldSet = new Set(oldDeps ?? []);
    const newSet = new Set(newDeps);
    await recordHistory(releaseId, "repo_dependencies_updated", actor, {
      repo: row.repo_name,
      old: oldDeps,
      new: newDeps,
      added: newDeps.filter((dep) => !oldSet.has(dep)),
      removed: (oldDeps ?? []).filter((dep) => !newSet.has(dep)),
    });
  }

  return getRepo(repoId);
}

// ─── Confirmations ──────────────────────────────────────

/** A repo is confirmed once a strict majority of its contributors confirmed */
export function isRepoConfirmed(
  repo: Pick<ReleaseRepo, "contributors" | "confirmedBy">
): boolean {
  if (repo.contributors.length === 0) return false;
  return repo.confirmedBy.length > Math.floor(repo.contributors.length / 2);
}

const UPDATE_CONFIRMATIONS_SQL =
  "UPDATE release_repos SET confirmed_by = ?, confirmed_at = ? WHERE id = ?";

/** Read, check and write confirmed_by in one transaction */
export async function confirmRepo(
  repoId: number,
  githubUser: string
): Promise<ReleaseRepo> {
  const db = await getDb();

  const repo = db.transaction(() => {
    const current = toReleaseRepo(readRepoRow(db, repoId));
    if (!current.contributors.includes(githubUser)) {
      throw new ConfirmationError("not_contributor", githubUser, current.repoName);
    }
    if (current.confirmedBy.includes(githubUser)) {
      throw new ConfirmationError("already_confirmed", githubUser, current.repoName);
    }
    db.prepare(UPDATE_CONFIRMATIONS_SQL).run(
      encodeStringList([...current.confirmedBy, githubUser]),
      Date.now(),
      repoId
    );
    return current;
  })();

  await recordHistory(repo.releaseId, "repo_confirmed", githubUser, {
    repo: repo.repoName,
  });
  return getRepo(repoId);
}

export async function unconfirmRepo(
  repoId: number,
  githubUser: string
): Promise<ReleaseRepo> {
  const db = await getDb();

  const repo = db.transaction(() => {
    const current = toReleaseRepo(readRepoRow(db, repoId));
    const remaining = current.confirmedBy.filter((user) => user !== githubUser);
    db.prepare(UPDATE_CONFIRMATIONS_SQL).run(
      encodeStringList(remaining),
      remaining.length > 0 ? Date.now() : null,
      repoId
    );
    return current;
  })();

  await recordHistory(repo.releaseId, "repo_unconfirmed", githubUser, {
    repo: repo.repoName,
  });
  return getRepo(repoId);
}

/**
 * Outstanding contributor confirmations for a release: one action per
 * contributor who has not confirmed a non-excluded, unconfirmed repo.
 */
export async function getPendingActions(releaseId: string): Promise<PendingAction[]> {
  await selectReleaseRow(releaseId);
  const db = await getDb();

  const chatByGithub = new Map<string, string>();
  const users = db
    .prepare<[], UserRow>("SELECT * FROM users WHERE github_user IS NOT NULL")
    .all();
  for (const user of users) {
    if (user.github_user && user.chat_user) {
      chatByGithub.set(user.github_user, user.chat_user);
    }
  }

  const actions: PendingAction[] = [];
  for (const repo of await getRepos(releaseId)) {
    if (repo.excluded || isRepoConfirmed(repo)) continue;

    const confirmed = new Set(repo.confirmedBy);
    for (const contributor of repo.contributors) {
      if (confirmed.has(contributor)) continue;
      actions.push({
        githubUser: contributor,
        chatUser: chatByGithub.get(contributor) ?? null,
        actionType: "confirm_repo",
        repoName: repo.repoName,
      });
    }
  }

  return actions;
}

// ─── Users ──────────────────────────────────────────────

export async function getUserByEmail(email: string): Promise<User | null> {
  const db = await getDb();
  const row = db
    .prepare<[string], UserRow>("SELECT * FROM users WHERE email = ?")
    .get(email);
  return row ? toUser(row) : null;
}

/** Create a user or fill in the handles that are given */
export async function upsertUser(
  email: string,
  handles: { githubUser?: string; chatUser?: string }
): Promise<User> {
  const db = await getDb();
  const now = Date.now();

  db.prepare(`
    INSERT INTO users (email, github_user, chat_user, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?)
    ON CONFLICT(email) DO UPDATE SET
      github_user = COALESCE(excluded.github_user, users.github_user),
      chat_user   = COALESCE(excluded.chat_user, users.chat_user),
      updated_at  = excluded.updated_at
  `).run(email, handles.githubUser || null, handles.chatUser || null, now, now);

  const user = await getUserByEmail(email);
  if (!user) throw new Error(`User ${email} missing after upsert`);
  return user;
}
