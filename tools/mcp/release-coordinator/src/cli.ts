#!/usr/bin/env node

/**
 * rc: release coordination from the terminal.
 *
 * Commands:
 *   rc list [status]                          Releases, newest first
 *   rc create <source> <dest> <user>          Collect changed repos into a new release
 *   rc show <id>                              Release detail with deploy waves
 *   rc waves <id>                             Deploy waves only
 *   rc deps <releaseId> <repoId> [names...]   Replace a repo's dependencies
 *   rc approve <id> <dev|qa> <user>           Record an approval
 *   rc revoke <id> <dev|qa> [user]            Clear an approval
 *   rc decline <id> <user>                    Decline a release
 *   rc history <id>                           Audit trail
 *   rc ci <id>                                CI status per repo
 *   rc track <id>                             Start CI tracking for a release
 *   rc deploys <id> [--init]                  ArgoCD rollout per repo and environment
 *   rc watch                                  Poll CI and rollouts until interrupted
 */

import { APPROVAL_TYPES, RELEASE_STATUSES } from "./config.js";
import {
  addRepos,
  approveRelease,
  createRelease,
  declineRelease,
  getDeployWaves,
  getHistory,
  getReleaseDetail,
  listReleases,
  revokeApproval,
  updateRepo,
  isRepoConfirmed,
  type HistoryEntry,
  type Release,
} from "./releases.js";
import { collectReleaseChanges } from "./changes.js";
import { getCachedCIStatuses, initCITracking, startCITracker } from "./ci-status.js";
import {
  getCachedDeploymentStatuses,
  initDeploymentTracking,
  startDeployTracker,
} from "./deploy-status.js";
import { closeDb } from "./db.js";

// ─── ANSI Colors ─────────────────────────────────────────

const c = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
};

const STATUS_COLORS: Record<string, string> = {
  pending: c.yellow,
  approved: c.green,
  declined: c.red,
  success: c.green,
  failure: c.red,
  cancelled: c.dim,
  skipped: c.dim,
  queued: c.cyan,
  in_progress: c.blue,
  deployed: c.green,
  syncing: c.blue,
  unhealthy: c.red,
  not_found: c.dim,
};

function colorStatus(status: string): string {
  return `${STATUS_COLORS[status] ?? ""}${status}${c.reset}`;
}

function usageError(...lines: string[]): never {
  for (const line of lines) console.error(line);
  process.exit(1);
}

// ─── Commands ────────────────────────────────────────────

async function cmdList(args: string[]): Promise<void> {
  let status: Release["status"] | undefined;
  if (args[0]) {
    status = RELEASE_STATUSES.find((s) => s === args[0]);
    if (!status) {
      usageError(`Invalid status: ${args[0]}`, `Valid statuses: ${RELEASE_STATUSES.join(", ")}`);
    }
  }

  const releases = await listReleases(status);
  if (releases.length === 0) {
    console.log("No releases found.");
    return;
  }

  console.log(`\n${c.bold}Releases${c.reset} (${releases.length})\n`);
  for (const release of releases) {
    console.log(
      `${c.dim}${release.id}${c.reset}  ${release.sourceBranch} → ${release.destBranch}  ` +
        `${colorStatus(release.status)}  ${c.dim}${new Date(release.createdAt).toLocaleString()}${c.reset}`
    );
  }
}

async function cmdCreate(args: string[]): Promise<void> {
  const [source, dest, user] = args;
  if (!source || !dest || !user) {
    usageError("Usage: rc create <source_branch> <dest_branch> <user>");
  }

  console.log(`Comparing ${source} → ${dest} across the org...`);
  const repos = await collectReleaseChanges(source, dest);
  const release = await createRelease({ sourceBranch: source, destBranch: dest, createdBy: user });
  await addRepos(release.id, repos);

  console.log(
    `${c.green}Release created${c.reset} ${release.id} with ${repos.length} changed ${repos.length === 1 ? "repo" : "repos"}`
  );
}

async function cmdShow(args: string[]): Promise<void> {
  const id = args[0];
  if (!id) usageError("Usage: rc show <release_id>");

  const { release, repos, deployOrderError, unresolvedDependencies } =
    await getReleaseDetail(id);

  console.log(
    `\n${c.bold}${release.sourceBranch} → ${release.destBranch}${c.reset}  ${colorStatus(release.status)}`
  );
  console.log(`${c.dim}${release.id} · created by ${release.createdBy}${c.reset}`);
  console.log(
    `  Dev: ${release.devApprovedBy ?? `${c.dim}—${c.reset}`}   QA: ${release.qaApprovedBy ?? `${c.dim}—${c.reset}`}`
  );
  if (release.breakingChanges) {
    console.log(`  ${c.red}Breaking:${c.reset} ${release.breakingChanges}`);
  }

  console.log(`\n${c.bold}Repositories${c.reset} (${repos.length})\n`);
  for (const repo of repos) {
    const wave = repo.deployOrder === null ? "  -" : `W${String(repo.deployOrder).padStart(2)}`;
    const confirmed =
      repo.contributors === null || repo.confirmedBy === null
        ? `${c.red}?${c.reset}`
        : isRepoConfirmed({ contributors: repo.contributors, confirmedBy: repo.confirmedBy })
          ? `${c.green}✓${c.reset}`
          : " ";
    const name = repo.excluded ? `${c.dim}${repo.repoName} (excluded)${c.reset}` : repo.repoName;
    const deps = repo.dependsOn === null
      ? ` ${c.red}[unreadable dependencies]${c.reset}`
      : repo.dependsOn.length > 0
        ? ` ${c.dim}after ${repo.dependsOn.join(", ")}${c.reset}`
        : "";
    console.log(
      `  ${c.cyan}${wave}${c.reset} ${confirmed} ${c.dim}#${repo.id}${c.reset} ${name}  ` +
        `${c.green}+${repo.additions}${c.reset}/${c.red}-${repo.deletions}${c.reset}${deps}`
    );
  }

  if (deployOrderError) {
    console.log(`\n${c.red}${deployOrderError}${c.reset}`);
  }
  for (const { repo, missing } of unresolvedDependencies) {
    console.log(`${c.yellow}${repo}${c.reset} depends on repos not in this release: ${missing.join(", ")}`);
  }
}

async function cmdWaves(args: string[]): Promise<void> {
  const id = args[0];
  if (!id) usageError("Usage: rc waves <release_id>");

  const { waves, deployOrderError } = await getDeployWaves(id);
  if (deployOrderError) {
    console.error(`${c.red}${deployOrderError}${c.reset}`);
    process.exit(1);
  }
  if (waves.length === 0) {
    console.log("No repositories to deploy.");
    return;
  }

  console.log(`\n${c.bold}Deploy order${c.reset}\n`);
  for (const { wave, repos } of waves) {
    console.log(`  ${c.cyan}Wave ${wave}${c.reset}  ${repos.join(", ")}`);
  }
}

async function cmdDeps(args: string[]): Promise<void> {
  const [releaseId, repoArg, ...names] = args;
  const repoId = parseInt(repoArg ?? "");
  if (!releaseId || isNaN(repoId)) {
    usageError(
      "Usage: rc deps <release_id> <repo_id> [repo_name...]",
      "Means: <repo_id> deploys after every named repo (no names clears the list)"
    );
  }

  const repo = await updateRepo(releaseId, repoId, { dependsOn: names }, process.env.USER ?? "cli");
  console.log(
    `${c.green}Dependencies updated:${c.reset} ${repo.repoName}` +
      (repo.dependsOn.length > 0 ? ` after ${repo.dependsOn.join(", ")}` : " has no dependencies")
  );
}

async function cmdApprove(args: string[]): Promise<void> {
  const [id, typeArg, user] = args;
  const type = APPROVAL_TYPES.find((t) => t === typeArg);
  if (!id || !type || !user) {
    usageError(`Usage: rc approve <release_id> <${APPROVAL_TYPES.join("|")}> <user>`);
  }

  const release = await approveRelease(id, type, user);
  console.log(`${c.green}${type.toUpperCase()} approved${c.reset} by ${user} — ${colorStatus(release.status)}`);
}

async function cmdRevoke(args: string[]): Promise<void> {
  const [id, typeArg, user] = args;
  const type = APPROVAL_TYPES.find((t) => t === typeArg);
  if (!id || !type) {
    usageError(`Usage: rc revoke <release_id> <${APPROVAL_TYPES.join("|")}> [user]`);
  }

  const release = await revokeApproval(id, type, user ?? process.env.USER ?? "cli");
  console.log(`${c.yellow}${type.toUpperCase()} approval revoked${c.reset} — ${colorStatus(release.status)}`);
}

async function cmdDecline(args: string[]): Promise<void> {
  const [id, user] = args;
  if (!id || !user) usageError("Usage: rc decline <release_id> <user>");

  await declineRelease(id, user);
  console.log(`${c.red}Release declined${c.reset} by ${user}`);
}

async function cmdHistory(args: string[]): Promise<void> {
  const id = args[0];
  if (!id) usageError("Usage: rc history <release_id>");
  const limit = parseInt(args.find((a) => a.startsWith("--limit="))?.split("=")[1] || "20");

  const history = (await getHistory(id)).slice(0, limit);
  if (history.length === 0) {
    console.log("No history found.");
    return;
  }

  console.log(`\n${c.bold}History${c.reset} (${history.length} entries)\n`);
  for (const entry of history) {
    const time = new Date(entry.createdAt).toLocaleString();
    console.log(`${c.dim}${time}${c.reset} ${formatHistory(entry)}`);
  }
}

async function cmdCI(args: string[]): Promise<void> {
  const id = args[0];
  if (!id) usageError("Usage: rc ci <release_id>");

  const { repos } = await getReleaseDetail(id);
  const names = new Map(repos.map((repo) => [repo.id, repo.repoName]));
  const { statuses, anyInProgress } = await getCachedCIStatuses(id);

  if (statuses.length === 0) {
    console.log(`Not tracked yet. Run ${c.bold}rc track ${id}${c.reset} first.`);
    return;
  }

  console.log(`\n${c.bold}CI status${c.reset}\n`);
  for (const status of statuses) {
    const chart = status.chartVersion
      ? `${c.dim}${status.chartName ?? "chart"} ${status.chartVersion}${c.reset}`
      : "";
    const run = status.workflowRunNumber !== null ? `#${status.workflowRunNumber}` : "";
    console.log(
      `  ${(names.get(status.releaseRepoId) ?? String(status.releaseRepoId)).padEnd(30)} ` +
        `${colorStatus(status.status).padEnd(22)} ${run} ${chart}`
    );
  }
  if (anyInProgress) {
    console.log(`\n${c.dim}Builds still running. Run rc watch to keep polling.${c.reset}`);
  }
}

async function cmdTrack(args: string[]): Promise<void> {
  const id = args[0];
  if (!id) usageError("Usage: rc track <release_id>");

  const statuses = await initCITracking(id);
  console.log(`${c.green}Tracking CI${c.reset} for ${statuses.length} ${statuses.length === 1 ? "repo" : "repos"}`);
}

async function cmdDeploys(args: string[]): Promise<void> {
  const id = args.find((a) => !a.startsWith("--"));
  if (!id) usageError("Usage: rc deploys <release_id> [--init]");

  if (args.includes("--init")) {
    const created = await initDeploymentTracking(id);
    console.log(
      `${c.green}Tracking rollouts${c.reset} for ${created.length} ${created.length === 1 ? "app" : "apps"}`
    );
  }

  const { repos } = await getReleaseDetail(id);
  const names = new Map(repos.map((repo) => [repo.id, repo.repoName]));
  const { statuses, anyPending } = await getCachedDeploymentStatuses(id);

  if (statuses.length === 0) {
    console.log(`No rollouts tracked. Run ${c.bold}rc deploys ${id} --init${c.reset} once CI published charts.`);
    return;
  }

  console.log(`\n${c.bold}Rollouts${c.reset}\n`);
  for (const status of statuses) {
    const current = status.currentVersion ?? "-";
    console.log(
      `  ${(names.get(status.releaseRepoId) ?? String(status.releaseRepoId)).padEnd(30)} ` +
        `${status.environment.padEnd(12)} ${colorStatus(status.rolloutStatus).padEnd(20)} ` +
        `${c.dim}${current} / ${status.expectedVersion}${c.reset}`
    );
  }
  if (anyPending) {
    console.log(`\n${c.dim}Rollouts still pending. Run rc watch to keep polling.${c.reset}`);
  }
}

async function cmdWatch(): Promise<void> {
  const stops = [await startCITracker(), await startDeployTracker()];
  console.log(`${c.dim}Polling CI status and rollouts. Ctrl-C to stop.${c.reset}`);

  process.on("SIGINT", () => {
    for (const stop of stops) stop();
    closeDb();
    process.exit(0);
  });
}

// ─── Helpers ─────────────────────────────────────────────

function formatHistory(entry: HistoryEntry): string {
  const d = entry.details ?? {};
  const list = (value: unknown) => (Array.isArray(value) ? value.join(", ") : "");

  switch (entry.action) {
    case "release_created":
      return `${c.green}created${c.reset} ${String(d.source)} → ${String(d.dest)} (${entry.actor})`;
    case "dev_approved":
    case "qa_approved":
      return `${c.green}${entry.action.replace("_", " ")}${c.reset} (${entry.actor})`;
    case "dev_approval_revoked":
    case "qa_approval_revoked":
      return `${c.yellow}${entry.action.replace(/_/g, " ")}${c.reset} (${entry.actor})`;
    case "release_declined":
      return `${c.red}declined${c.reset} (${entry.actor})`;
    case "repo_dependencies_updated":
      return `${String(d.repo)} dependencies: +[${list(d.added)}] -[${list(d.removed)}] (${entry.actor})`;
    case "repo_excluded":
    case "repo_included":
    case "repo_confirmed":
    case "repo_unconfirmed":
      return `${String(d.repo)} ${entry.action.slice("repo_".length)} (${entry.actor})`;
    default:
      return `${entry.action} (${entry.actor})`;
  }
}

// ─── Main ────────────────────────────────────────────────

async function main(): Promise<void> {
  const [command, ...args] = process.argv.slice(2);

  try {
    switch (command) {
      case "list":
        await cmdList(args);
        break;
      case "create":
        await cmdCreate(args);
        break;
      case "show":
        await cmdShow(args);
        break;
      case "waves":
        await cmdWaves(args);
        break;
      case "deps":
        await cmdDeps(args);
        break;
      case "approve":
        await cmdApprove(args);
        break;
      case "revoke":
        await cmdRevoke(args);
        break;
      case "decline":
        await cmdDecline(args);
        break;
      case "history":
        await cmdHistory(args);
        break;
      case "ci":
        await cmdCI(args);
        break;
      case "track":
        await cmdTrack(args);
        break;
      case "deploys":
        await cmdDeploys(args);
        break;
      case "watch":
        await cmdWatch();
        break;
      default:
        printUsage();
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`${c.red}Error:${c.reset} ${message}`);
    process.exit(1);
  }
}

function printUsage(): void {
  console.log(`
${c.bold}rc${c.reset} — multi-repository release coordination

${c.bold}Commands:${c.reset}
  ${c.cyan}rc list${c.reset} [status]                       Releases (${RELEASE_STATUSES.join(", ")})
  ${c.cyan}rc create${c.reset} <source> <dest> <user>       New release from changed repos
  ${c.cyan}rc show${c.reset} <id>                           Release detail with deploy waves
  ${c.cyan}rc waves${c.reset} <id>                          Deploy waves
  ${c.cyan}rc deps${c.reset} <id> <repo_id> [names...]      Set the repos a repo deploys after
  ${c.cyan}rc approve${c.reset} <id> <dev|qa> <user>        Record an approval
  ${c.cyan}rc revoke${c.reset} <id> <dev|qa> [user]         Clear an approval
  ${c.cyan}rc decline${c.reset} <id> <user>                 Decline a release
  ${c.cyan}rc history${c.reset} <id> [--limit=N]            Audit trail
  ${c.cyan}rc ci${c.reset} <id>                             CI status per repo
  ${c.cyan}rc track${c.reset} <id>                          Start CI tracking
  ${c.cyan}rc deploys${c.reset} <id> [--init]              ArgoCD rollouts (--init starts tracking)
  ${c.cyan}rc watch${c.reset}                               Poll CI and rollouts until Ctrl-C

${c.bold}Release flow:${c.reset}
  pending → (dev + qa approved) → approved
     ↓
  declined

${c.dim}Data stored in .release-coordinator/state.db (local, gitignored)${c.reset}
`);
}

void main();
