/**
 * GitHub REST integration via the `gh` CLI.
 *
 * Every call goes through `gh api`, so the user's existing gh
 * authentication is reused and no API client library is needed.
 * Responses are validated with zod before they reach the rest of the code.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { z } from "zod";
import { GH_LIMITS } from "./config.js";

const execFileAsync = promisify(execFile);

/** Execute a gh CLI command and return stdout */
async function gh(args: string[]): Promise<string> {
  const { stdout } = await execFileAsync("gh", args, {
    timeout: GH_LIMITS.timeoutMs,
    maxBuffer: GH_LIMITS.maxBuffer,
  });
  return stdout.trim();
}

/** GET a REST endpoint and validate the JSON body */
async function ghApi<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const raw = await gh(["api", "-H", "Accept: application/vnd.github+json", path]);
  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch (error) {
    throw new Error(
      `gh api ${path}: invalid JSON (${error instanceof Error ? error.message : String(error)})`
    );
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `gh api ${path}: unexpected response (${issue ? `${issue.path.join(".")}: ${issue.message}` : "no detail"})`
    );
  }
  return parsed.data;
}

// ─── Response Schemas ────────────────────────────────────

const RepositorySchema = z.object({
  name: z.string(),
  isArchived: z.boolean().default(false),
});

const WorkflowRunSchema = z.object({
  id: z.number(),
  run_number: z.number(),
  html_url: z.string(),
  path: z.string().default(""),
  status: z.string().nullable(),
  conclusion: z.string().nullable(),
  head_sha: z.string(),
  run_started_at: z.string().nullable().default(null),
  updated_at: z.string(),
});

export type WorkflowRun = z.infer<typeof WorkflowRunSchema>;

const WorkflowRunsSchema = z.object({
  total_count: z.number(),
  workflow_runs: z.array(WorkflowRunSchema),
});

const WorkflowJobSchema = z.object({
  id: z.number(),
  name: z.string(),
  status: z.string().nullable(),
  conclusion: z.string().nullable(),
});

export type WorkflowJob = z.infer<typeof WorkflowJobSchema>;

const WorkflowJobsSchema = z.object({
  total_count: z.number(),
  jobs: z.array(WorkflowJobSchema),
});

const FileChangeSchema = z.object({
  filename: z.string(),
  status: z.string(),
  additions: z.number(),
  deletions: z.number(),
});

export type FileChange = z.infer<typeof FileChangeSchema>;

const CompareSchema = z.object({
  status: z.string(),
  ahead_by: z.number(),
  behind_by: z.number(),
  total_commits: z.number(),
  commits: z.array(
    z.object({
      sha: z.string(),
      author: z.object({ login: z.string() }).nullable(),
    })
  ),
  files: z.array(FileChangeSchema).default([]),
});

export type CompareResult = z.infer<typeof CompareSchema>;

const PullRequestSchema = z.object({
  number: z.number(),
  html_url: z.string(),
  merged_at: z.string().nullable(),
  merge_commit_sha: z.string().nullable(),
  head: z.object({ sha: z.string() }),
});

export type PullRequest = z.infer<typeof PullRequestSchema>;

// ─── Repositories ────────────────────────────────────────

/** Non-archived repositories of an organisation */
export async function listOrgRepos(org: string): Promise<string[]> {
  const raw = await gh([
    "repo",
    "list",
    org,
    "--json",
    "name,isArchived",
    "--limit",
    String(GH_LIMITS.reposPerOrg),
  ]);
  const repos = z.array(RepositorySchema).parse(JSON.parse(raw));
  return repos.filter((r) => !r.isArchived).map((r) => r.name);
}

/** Commits and files on `head` that are not on `base` */
export async function compareBranches(
  org: string,
  repo: string,
  base: string,
  head: string
): Promise<CompareResult> {
  return ghApi(
    `repos/${org}/${repo}/compare/${encodeURIComponent(base)}...${encodeURIComponent(head)}`,
    CompareSchema
  );
}

/** The open-or-merged PR from `head` into `base`, newest first */
export async function findPullRequest(
  org: string,
  repo: string,
  head: string,
  base: string
): Promise<PullRequest | null> {
  const prs = await ghApi(
    `repos/${org}/${repo}/pulls?state=all&head=${encodeURIComponent(`${org}:${head}`)}&base=${encodeURIComponent(base)}&per_page=1`,
    z.array(PullRequestSchema)
  );
  return prs[0] ?? null;
}

// ─── Actions ─────────────────────────────────────────────

export async function getWorkflowRunsForCommit(
  org: string,
  repo: string,
  sha: string
): Promise<WorkflowRun[]> {
  const result = await ghApi(
    `repos/${org}/${repo}/actions/runs?head_sha=${sha}`,
    WorkflowRunsSchema
  );
  return result.workflow_runs;
}

export async function getWorkflowRun(
  org: string,
  repo: string,
  runId: number
): Promise<WorkflowRun> {
  return ghApi(`repos/${org}/${repo}/actions/runs/${runId}`, WorkflowRunSchema);
}

export async function getWorkflowJobs(
  org: string,
  repo: string,
  runId: number
): Promise<WorkflowJob[]> {
  const result = await ghApi(
    `repos/${org}/${repo}/actions/runs/${runId}/jobs`,
    WorkflowJobsSchema
  );
  return result.jobs;
}

/** Plain-text log of a job */
export async function getJobLogs(
  org: string,
  repo: string,
  jobId: number
): Promise<string> {
  return gh(["api", `repos/${org}/${repo}/actions/jobs/${jobId}/logs`]);
}
