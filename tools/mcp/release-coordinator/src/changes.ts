/**
 * Collect what changed per repository between two branches.
 *
 * Compares `source` against `dest` for every non-archived, non-ignored
 * repository of the org and keeps the ones with commits and files.
 */

import { getConfig, GH_LIMITS } from "./config.js";
import {
  compareBranches,
  findPullRequest,
  listOrgRepos,
  type CompareResult,
  type FileChange,
} from "./github.js";
import { cached, TTL } from "./cache.js";
import { log } from "./logger.js";
import type { RepoData } from "./releases.js";

/** Kinds of infrastructure touched by a change set */
export function detectInfraChanges(files: readonly FileChange[]): string[] {
  const kinds = new Set<string>();

  for (const file of files) {
    const path = file.filename.toLowerCase();

    if (
      path.endsWith(".tf") ||
      path.endsWith(".tfvars") ||
      path.includes("terraform/")
    ) {
      kinds.add("terraform");
    }

    if (
      path.includes("helm/") ||
      path.includes("charts/") ||
      path.endsWith("/chart.yaml") ||
      path.endsWith("/values.yaml") ||
      (path.includes("/templates/") && (path.endsWith(".yaml") || path.endsWith(".yml")))
    ) {
      kinds.add("helm");
    }

    if (path.startsWith("dockerfile") || path.endsWith("dockerfile")) {
      kinds.add("docker");
    }

    if (
      path.includes(".github/workflows/") ||
      path.includes(".gitlab-ci") ||
      path.endsWith("jenkinsfile")
    ) {
      kinds.add("ci/cd");
    }

    if (
      path.includes("k8s/") ||
      path.includes("kubernetes/") ||
      path.includes("kustomize/")
    ) {
      kinds.add("kubernetes");
    }
  }

  return [...kinds].sort();
}

/** Distinct commit author logins, in first-seen order */
export function collectContributors(compare: CompareResult): string[] {
  const seen = new Set<string>();
  for (const commit of compare.commits) {
    const login = commit.author?.login;
    if (login) seen.add(login);
  }
  return [...seen];
}

/** Build RepoData from a comparison, or null when nothing changed */
export function toRepoData(
  repoName: string,
  compare: CompareResult
): RepoData | null {
  if (compare.total_commits === 0 || compare.files.length === 0) return null;

  let additions = 0;
  let deletions = 0;
  for (const file of compare.files) {
    additions += file.additions;
    deletions += file.deletions;
  }

  return {
    repoName,
    commitCount: compare.total_commits,
    additions,
    deletions,
    contributors: collectContributors(compare),
    infraChanges: detectInfraChanges(compare.files),
    headSha: compare.commits.at(-1)?.sha ?? null,
  };
}

async function collectRepo(
  org: string,
  repoName: string,
  source: string,
  dest: string
): Promise<RepoData | null> {
  const compare = await compareBranches(org, repoName, dest, source);
  const data = toRepoData(repoName, compare);
  if (!data) return null;

  // the compare commit list is truncated on long branches; the PR head is not
  const pr = await findPullRequest(org, repoName, source, dest);
  if (pr) {
    data.headSha = pr.head.sha;
    data.prNumber = pr.number;
    data.prUrl = pr.html_url;
    data.prMerged = pr.merged_at !== null;
    data.mergeCommitSha = pr.merged_at ? pr.merge_commit_sha : null;
  }
  return data;
}

/**
 * Changed repositories between `source` and `dest` across the org.
 * A repository whose comparison fails is logged and left out.
 */
export async function collectReleaseChanges(
  source: string,
  dest: string
): Promise<RepoData[]> {
  const config = await getConfig();
  if (!config.org) throw new Error("No GitHub org configured (set org or GITHUB_ORG)");

  const ignored = new Set(config.ignoreRepos);
  const repos = (
    await cached(`github:repos:${config.org}`, TTL.GITHUB, () => listOrgRepos(config.org))
  ).filter((name) => !ignored.has(name));

  const results: RepoData[] = [];
  for (let i = 0; i < repos.length; i += GH_LIMITS.compareConcurrency) {
    const batch = repos.slice(i, i + GH_LIMITS.compareConcurrency);
    const settled = await Promise.allSettled(
      batch.map((name) => collectRepo(config.org, name, source, dest))
    );

    settled.forEach((outcome, j) => {
      if (outcome.status === "fulfilled") {
        if (outcome.value) results.push(outcome.value);
      } else {
        log("warn", "compare failed", {
          repo: batch[j],
          error: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
        });
      }
    });
  }

  return results.sort((a, b) => a.repoName.localeCompare(b.repoName));
}
