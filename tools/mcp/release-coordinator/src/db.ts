/**
 * Local SQLite database: releases, their repositories, approvals,
 * confirmations, history, polled CI state and ArgoCD rollouts.
 *
 * List-valued columns (depends_on, contributors, confirmed_by,
 * infra_changes) hold JSON array text; see codec.ts. Timestamps are
 * epoch milliseconds.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { getConfig } from "./config.js";
import { log } from "./logger.js";

// ─── Database Singleton ─────────────────────────────────

export type Db = Database.Database;

let _db: Database.Database | null = null;
let _opening: Promise<Database.Database> | null = null;

async function openDb(): Promise<Database.Database> {
  const config = await getConfig();
  const path = config.dbPath === ":memory:" ? ":memory:" : resolve(config.dbPath);
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);

  // Performance pragmas
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");

  migrate(db);
  log("debug", "database opened", { path });

  _db = db;
  return db;
}

/** Get or create the database connection */
export async function getDb(): Promise<Database.Database> {
  if (_db) return _db;
  _opening ??= openDb().finally(() => {
    _opening = null;
  });
  return _opening;
}

/** Close the database connection */
export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

// ─── Schema Migrations ──────────────────────────────────

const MIGRATIONS: Array<{ version: number; sql: string }> = [
  {
    version: 1,
    sql: `
      CREATE TABLE IF NOT EXISTS releases (
        id                 TEXT PRIMARY KEY,
        source_branch      TEXT NOT NULL,
        dest_branch        TEXT NOT NULL,
        status             TEXT NOT NULL DEFAULT 'pending',  -- pending/approved/declined
        notes              TEXT NOT NULL DEFAULT '',
        breaking_changes   TEXT NOT NULL DEFAULT '',
        created_by         TEXT NOT NULL,
        channel_id         TEXT NOT NULL DEFAULT '',
        dev_approved_by    TEXT,
        dev_approved_at    INTEGER,
        qa_approved_by     TEXT,
        qa_approved_at     INTEGER,
        declined_by        TEXT,
        declined_at        INTEGER,
        last_refreshed_at  INTEGER,
        created_at         INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS release_repos (
        id                INTEGER PRIMARY KEY AUTOINCREMENT,
        release_id        TEXT NOT NULL REFERENCES releases(id) ON DELETE CASCADE,
        repo_name         TEXT NOT NULL,
        commit_count      INTEGER NOT NULL DEFAULT 0,
        additions         INTEGER NOT NULL DEFAULT 0,
        deletions         INTEGER NOT NULL DEFAULT 0,
        contributors      TEXT,                             -- JSON array
        pr_number         INTEGER,
        pr_url            TEXT,
        pr_merged         INTEGER NOT NULL DEFAULT 0,
        excluded          INTEGER NOT NULL DEFAULT 0,
        depends_on        TEXT,                             -- JSON array of repo names
        summary           TEXT NOT NULL DEFAULT '',
        is_breaking       INTEGER NOT NULL DEFAULT 0,
        confirmed_by      TEXT,                             -- JSON array
        confirmed_at      INTEGER,
        infra_changes     TEXT,                             -- JSON array
        merge_commit_sha  TEXT,
        head_sha          TEXT
      );

      CREATE TABLE IF NOT EXISTS release_history (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        release_id  TEXT NOT NULL,
        action      TEXT NOT NULL,
        actor       TEXT NOT NULL,
        details     TEXT,                                   -- JSON object
        created_at  INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS users (
        id           INTEGER PRIMARY KEY AUTOINCREMENT,
        email        TEXT NOT NULL UNIQUE,
        github_user  TEXT,
        chat_user    TEXT,
        created_at   INTEGER NOT NULL,
        updated_at   INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS repo_ci_status (
        id                   INTEGER PRIMARY KEY AUTOINCREMENT,
        release_repo_id      INTEGER NOT NULL UNIQUE REFERENCES release_repos(id) ON DELETE CASCADE,
        workflow_run_id      INTEGER,
        workflow_run_number  INTEGER,
        workflow_url         TEXT,
        status               TEXT NOT NULL DEFAULT 'pending',
        chart_name           TEXT,
        chart_version        TEXT,
        merge_commit_sha     TEXT,
        started_at           INTEGER,
        completed_at         INTEGER,
        last_checked_at      INTEGER
      );

      CREATE INDEX IF NOT EXISTS idx_releases_status ON releases(status);
      CREATE INDEX IF NOT EXISTS idx_release_repos_release ON release_repos(release_id);
      CREATE INDEX IF NOT EXISTS idx_history_release ON release_history(release_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_users_github ON users(github_user);
      CREATE INDEX IF NOT EXISTS idx_ci_status ON repo_ci_status(status);

      INSERT OR IGNORE INTO schema_version (version) VALUES (1);
    `,
  },
  {
    version: 2,
    sql: `
      -- one row per repository and release; the latest row wins
      DELETE FROM release_repos
      WHERE id NOT IN (SELECT MAX(id) FROM release_repos GROUP BY release_id, repo_name);

      CREATE UNIQUE INDEX IF NOT EXISTS idx_release_repos_name
        ON release_repos(release_id, repo_name);

      INSERT OR IGNORE INTO schema_version (version) VALUES (2);
    `,
  },
  {
    version: 3,
    sql: `
      CREATE TABLE IF NOT EXISTS repo_deployment_status (
        id                INTEGER PRIMARY KEY AUTOINCREMENT,
        release_repo_id   INTEGER NOT NULL REFERENCES release_repos(id) ON DELETE CASCADE,
        environment       TEXT NOT NULL,
        app_name          TEXT NOT NULL,
        expected_version  TEXT NOT NULL,
        current_version   TEXT,
        sync_status       TEXT,
        health_status     TEXT,
        rollout_status    TEXT NOT NULL DEFAULT 'pending',  -- pending/syncing/unhealthy/deployed/not_found
        last_checked_at   INTEGER NOT NULL,
        UNIQUE (release_repo_id, environment)
      );

      CREATE INDEX IF NOT EXISTS idx_deployment_rollout ON repo_deployment_status(rollout_status);

      INSERT OR IGNORE INTO schema_version (version) VALUES (3);
    `,
  },
];

/** Run pending migrations */
function migrate(db: Database.Database): void {
  // Ensure schema_version table exists (bootstrap)
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version       INTEGER PRIMARY KEY,
      applied_at    TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const currentVersion =
    db
      .prepare<[], { v: number | null }>("SELECT MAX(version) as v FROM schema_version")
      .get()?.v ?? 0;

  for (const migration of MIGRATIONS) {
    if (migration.version > currentVersion) {
      db.transaction(() => db.exec(migration.sql))();
    }
  }
}

// ─── Row Types ───────────────────────────────────────────

export interface ReleaseRow {
  id: string;
  source_branch: string;
  dest_branch: string;
  status: string;
  notes: string;
  breaking_changes: string;
  created_by: string;
  channel_id: string;
  dev_approved_by: string | null;
  dev_approved_at: number | null;
  qa_approved_by: string | null;
  qa_approved_at: number | null;
  declined_by: string | null;
  declined_at: number | null;
  last_refreshed_at: number | null;
  created_at: number;
}

export interface ReleaseRepoRow {
  id: number;
  release_id: string;
  repo_name: string;
  commit_count: number;
  additions: number;
  deletions: number;
  contributors: string | null;
  pr_number: number | null;
  pr_url: string | null;
  pr_merged: number;
  excluded: number;
  depends_on: string | null;
  summary: string;
  is_breaking: number;
  confirmed_by: string | null;
  confirmed_at: number | null;
  infra_changes: string | null;
  merge_commit_sha: string | null;
  head_sha: string | null;
}

export interface HistoryRow {
  id: number;
  release_id: string;
  action: string;
  actor: string;
  details: string | null;
  created_at: number;
}

export interface UserRow {
  id: number;
  email: string;
  github_user: string | null;
  chat_user: string | null;
  created_at: number;
  updated_at: number;
}

export interface CIStatusRow {
  id: number;
  release_repo_id: number;
  workflow_run_id: number | null;
  workflow_run_number: number | null;
  workflow_url: string | null;
  status: string;
  chart_name: string | null;
  chart_version: string | null;
  merge_commit_sha: string | null;
  started_at: number | null;
  completed_at: number | null;
  last_checked_at: number | null;
}

export interface DeploymentStatusRow {
  id: number;
  release_repo_id: number;
  environment: string;
  app_name: string;
  expected_version: string;
  current_version: string | null;
  sync_status: string | null;
  health_status: string | null;
  rollout_status: string;
  last_checked_at: number;
}
