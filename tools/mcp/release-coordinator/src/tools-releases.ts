import { z } from "zod";
import { APPROVAL_TYPES, RELEASE_STATUSES } from "./config.js";
import {
  addRepos,
  approveRelease,
  confirmRepo,
  createRelease,
  declineRelease,
  getDeployWaves,
  getHistory,
  getPendingActions,
  getRelease,
  getReleaseDetail,
  listReleases,
  refreshRepos,
  revokeApproval,
  unconfirmRepo,
  updateRelease,
  updateRepo,
} from "./releases.js";
import { collectReleaseChanges } from "./changes.js";
import { McpServer, toolResponse, wrapTool } from "./tool-helpers.js";

const releaseId = z.string().uuid().describe("Release id (UUID)");
const repoId = z.number().int().positive().describe("Release repository id");

export function register(server: McpServer) {
  server.registerTool(
    "list_releases",
    {
      title: "List Releases",
      description:
        "List releases newest first with status, branches and approvals. Filter by status to find releases still waiting on approval.",
      inputSchema: {
        status: z.enum(RELEASE_STATUSES).optional().describe("Only releases in this status"),
      },
    },
    wrapTool("list_releases", async ({ status }) => {
      const releases = await listReleases(status);
      return toolResponse(releases);
    })
  );

  server.registerTool(
    "create_release",
    {
      title: "Create Release",
      description:
        "Create a release from source into dest. Compares the branches in every repository of the configured GitHub org and adds the repos that changed, with their PRs, contributors and infrastructure changes.",
      inputSchema: {
        sourceBranch: z.string().min(1).describe("Branch being released (e.g. develop)"),
        destBranch: z.string().min(1).describe("Branch released into (e.g. main)"),
        createdBy: z.string().min(1).describe("Who is creating the release"),
        channelId: z.string().optional().describe("Chat channel that announces the release"),
      },
    },
    wrapTool("create_release", async ({ sourceBranch, destBranch, createdBy, channelId }) => {
      const repos = await collectReleaseChanges(sourceBranch, destBranch);
      const release = await createRelease({ sourceBranch, destBranch, createdBy, channelId });
      const added = await addRepos(release.id, repos);
      return toolResponse({ release, repos: added });
    })
  );

  server.registerTool(
    "refresh_release",
    {
      title: "Refresh Release",
      description:
        "Re-compare the release branches and sync the release's repositories: new repos are added, changed repos updated, repos without changes removed. Summaries survive when the head commit is unchanged.",
      inputSchema: {
        releaseId,
        actor: z.string().min(1).describe("Who requested the refresh"),
      },
    },
    wrapTool("refresh_release", async ({ releaseId, actor }) => {
      const release = await getRelease(releaseId);
      const repos = await collectReleaseChanges(release.sourceBranch, release.destBranch);
      const counts = await refreshRepos(releaseId, repos, actor);
      return toolResponse(counts);
    })
  );

  server.registerTool(
    "get_release",
    {
      title: "Get Release",
      description:
        "Get a release with every repository and its deploy wave. When the deploy order cannot be computed (circular dependency, malformed dependency data) every wave is null and deployOrderError says why.",
      inputSchema: { releaseId },
    },
    wrapTool("get_release", async ({ releaseId }) => {
      const detail = await getReleaseDetail(releaseId);
      return toolResponse(detail);
    })
  );

  server.registerTool(
    "update_release",
    {
      title: "Update Release",
      description: "Update the release notes and/or the breaking-changes text.",
      inputSchema: {
        releaseId,
        notes: z.string().optional().describe("Release notes"),
        breakingChanges: z.string().optional().describe("Breaking changes description"),
        actor: z.string().min(1).describe("Who made the change"),
      },
    },
    wrapTool("update_release", async ({ releaseId, notes, breakingChanges, actor }) => {
      const release = await updateRelease(releaseId, { notes, breakingChanges }, actor);
      return toolResponse(release);
    })
  );

  server.registerTool(
    "get_deploy_order",
    {
      title: "Get Deploy Order",
      description:
        "Group the release's non-excluded repositories into deploy waves. Repos in the same wave can deploy in parallel; a later wave waits for earlier ones. Dependency names that match no repo in the release are listed as unresolved.",
      inputSchema: { releaseId },
    },
    wrapTool("get_deploy_order", async ({ releaseId }) => {
      const waves = await getDeployWaves(releaseId);
      return toolResponse(waves);
    })
  );

  server.registerTool(
    "update_repo",
    {
      title: "Update Release Repository",
      description:
        "Exclude/include a repository or replace the list of repositories it must deploy after. Dependency changes are recorded in the release history with the names added and removed.",
      inputSchema: {
        releaseId,
        repoId,
        excluded: z.boolean().optional().describe("Leave this repository out of the release"),
        dependsOn: z
          .array(z.string().min(1))
          .optional()
          .describe("Repository names this one deploys after (replaces the current list)"),
        actor: z.string().min(1).describe("Who made the change"),
      },
    },
    wrapTool("update_repo", async ({ releaseId, repoId, excluded, dependsOn, actor }) => {
      const repo = await updateRepo(releaseId, repoId, { excluded, dependsOn }, actor);
      return toolResponse(repo);
    })
  );

  server.registerTool(
    "approve_release",
    {
      title: "Approve Release",
      description:
        "Record a dev or QA approval. Once both are present the release becomes approved.",
      inputSchema: {
        releaseId,
        type: z.enum(APPROVAL_TYPES).describe("Approval type"),
        user: z.string().min(1).describe("Approving user"),
      },
    },
    wrapTool("approve_release", async ({ releaseId, type, user }) => {
      const release = await approveRelease(releaseId, type, user);
      return toolResponse(release);
    })
  );

  server.registerTool(
    "revoke_approval",
    {
      title: "Revoke Approval",
      description: "Clear a dev or QA approval; the release goes back to pending.",
      inputSchema: {
        releaseId,
        type: z.enum(APPROVAL_TYPES).describe("Approval type"),
        actor: z.string().min(1).describe("Who revoked the approval"),
      },
    },
    wrapTool("revoke_approval", async ({ releaseId, type, actor }) => {
      const release = await revokeApproval(releaseId, type, actor);
      return toolResponse(release);
    })
  );

  server.registerTool(
    "decline_release",
    {
      title: "Decline Release",
      description: "Decline a release. Both approvals are cleared.",
      inputSchema: {
        releaseId,
        user: z.string().min(1).describe("Declining user"),
      },
    },
    wrapTool("decline_release", async ({ releaseId, user }) => {
      const release = await declineRelease(releaseId, user);
      return toolResponse(release);
    })
  );

  server.registerTool(
    "confirm_repo",
    {
      title: "Confirm Repository",
      description:
        "A contributor confirms their changes in a repository are ready. A repo counts as confirmed once a strict majority of its contributors confirmed.",
      inputSchema: {
        repoId,
        githubUser: z.string().min(1).describe("GitHub login of the contributor"),
      },
    },
    wrapTool("confirm_repo", async ({ repoId, githubUser }) => {
      const repo = await confirmRepo(repoId, githubUser);
      return toolResponse(repo);
    })
  );

  server.registerTool(
    "unconfirm_repo",
    {
      title: "Withdraw Confirmation",
      description: "Withdraw a contributor's confirmation of a repository.",
      inputSchema: {
        repoId,
        githubUser: z.string().min(1).describe("GitHub login of the contributor"),
      },
    },
    wrapTool("unconfirm_repo", async ({ repoId, githubUser }) => {
      const repo = await unconfirmRepo(repoId, githubUser);
      return toolResponse(repo);
    })
  );

  server.registerTool(
    "get_pending_actions",
    {
      title: "Get Pending Actions",
      description:
        "List contributors who still have to confirm a repository, with their chat username when known.",
      inputSchema: { releaseId },
    },
    wrapTool("get_pending_actions", async ({ releaseId }) => {
      const actions = await getPendingActions(releaseId);
      return toolResponse(actions);
    })
  );

  server.registerTool(
    "get_release_history",
    {
      title: "Get Release History",
      description: "Audit trail of a release, newest first.",
      inputSchema: {
        releaseId,
        limit: z.number().int().positive().optional().describe("Max entries (default: all)"),
      },
    },
    wrapTool("get_release_history", async ({ releaseId, limit }) => {
      const history = await getHistory(releaseId);
      return toolResponse(limit ? history.slice(0, limit) : history);
    })
  );
}
