/**
 * Release coordinator configuration: local-first, JSON on disk.
 *
 * Config is read from .release-coordinator.json in the working directory
 * (or the file named by RELEASE_COORDINATOR_CONFIG). Every field has a
 * default, so a missing file is a valid configuration.
 *
 * Environment overrides:
 *   GITHUB_ORG       → org
 *   RELEASE_DB_PATH  → dbPath
 *
 * ArgoCD environments are optional. With none configured, deployment
 * tracking stays off.
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";

// ─── Config Schema ───────────────────────────────────────

export const CONFIG_FILE = ".release-coordinator.json";

export const DEFAULT_DB_PATH = ".release-coordinator/state.db";

const ArgoEnvironmentSchema = z.object({
  /** Base URL of the ArgoCD server, e.g. https://argocd.staging.example.com */
  url: z.string().url(),
  /** Cloudflare Access service token sent with every request */
  cfClientId: z.string().default(""),
  cfClientSecret: z.string().default(""),
  /** Appended to the repo name to form the application name */
  appSuffix: z.string().default(""),
});

export type ArgoEnvironment = z.infer<typeof ArgoEnvironmentSchema>;

const ConfigSchema = z.object({
  /** GitHub organisation that owns every repository in a release */
  org: z.string().default(""),
  /** Repositories never picked up when collecting release changes */
  ignoreRepos: z.array(z.string()).default([]),
  dbPath: z.string().min(1).default(DEFAULT_DB_PATH),
  ci: z
    .object({
      pollIntervalMs: z.number().int().positive().default(30_000),
      cacheTtlMs: z.number().int().positive().default(5_000),
    })
    .default({}),
  deployOrder: z
    .object({
      maxDepth: z.number().int().positive().default(1000),
      warnUnresolved: z.boolean().default(true),
    })
    .default({}),
  argocd: z
    .object({
      pollIntervalMs: z.number().int().positive().default(30_000),
      cacheTtlMs: z.number().int().positive().default(10_000),
      /** Keyed by environment name (staging, prod, ...) */
      environments: z.record(ArgoEnvironmentSchema).default({}),
      /** Application name per `<repo>-<env>` or `<repo>`; beats appSuffix */
      overrides: z.record(z.string()).default({}),
    })
    .default({}),
});

export type CoordinatorConfig = z.infer<typeof ConfigSchema>;

export type ArgoCDConfig = CoordinatorConfig["argocd"];

// ─── Config Loading ──────────────────────────────────────

let _config: CoordinatorConfig | null = null;

/** Path of the config file for this process */
export function getConfigPath(): string {
  return resolve(process.env.RELEASE_COORDINATOR_CONFIG ?? CONFIG_FILE);
}

/**
 * Validate raw config JSON and apply environment overrides.
 * Throws with every schema violation listed.
 */
export function parseConfig(
  raw: unknown,
  env: Record<string, string | undefined> = {}
): CoordinatorConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const config = result.data;
  if (env.GITHUB_ORG) config.org = env.GITHUB_ORG;
  if (env.RELEASE_DB_PATH) config.dbPath = env.RELEASE_DB_PATH;
  return config;
}

/** Load config from disk once per process */
export async function getConfig(): Promise<CoordinatorConfig> {
  if (_config) return _config;

  const path = getConfigPath();
  let raw: unknown = {};
  if (existsSync(path)) {
    const content = await readFile(path, "utf-8");
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new Error(
        `Cannot parse ${path}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  _config = parseConfig(raw, process.env);
  return _config;
}

/** Forget the loaded config (next getConfig() re-reads the file) */
export function resetConfig(): void {
  _config = null;
}

// ─── Release Constants ───────────────────────────────────

export const RELEASE_STATUSES = ["pending", "approved", "declined"] as const;

export type ReleaseStatus = (typeof RELEASE_STATUSES)[number];

export const APPROVAL_TYPES = ["dev", "qa"] as const;

export type ApprovalType = (typeof APPROVAL_TYPES)[number];

/** CI states that will not change on further polling */
export const CI_TERMINAL_STATES = [
  "success",
  "failure",
  "cancelled",
  "skipped",
] as const;

/** CI states that mean "still running, poll again" */
export const CI_ACTIVE_STATES = ["pending", "queued", "in_progress"] as const;

/** Rollout of an expected chart version to one ArgoCD environment */
export const ROLLOUT_STATUSES = [
  "pending",
  "syncing",
  "unhealthy",
  "deployed",
  "not_found",
] as const;

export type RolloutStatus = (typeof ROLLOUT_STATUSES)[number];

// ─── Operational Defaults ────────────────────────────────

/** gh CLI limits */
export const GH_LIMITS = {
  timeoutMs: 30_000,
  maxBuffer: 10 * 1024 * 1024,
  /** Repositories compared in parallel when collecting release changes */
  compareConcurrency: 4,
  reposPerOrg: 500,
} as const;

/** ArgoCD API limits */
export const ARGOCD_LIMITS = {
  timeoutMs: 30_000,
} as const;
