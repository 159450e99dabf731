import { z } from "zod";
import {
  getCachedCIStatuses,
  initCITracking,
  pollIncompleteStatuses,
  refreshChartInfo,
} from "./ci-status.js";
import {
  getCachedDeploymentStatuses,
  initDeploymentTracking,
  pollDeployments,
} from "./deploy-status.js";
import { getCacheStats } from "./cache.js";
import { getOperationMetrics } from "./logger.js";
import { McpServer, toolResponse, wrapTool } from "./tool-helpers.js";

export function register(server: McpServer) {
  server.registerTool(
    "get_ci_status",
    {
      title: "Get CI Status",
      description:
        "CI status of every tracked repository in a release: workflow run, state and published chart version. " +
        "Served from a short-lived cache; anyInProgress tells whether polling again is worthwhile.",
      inputSchema: {
        releaseId: z.string().uuid().describe("Release id (UUID)"),
      },
    },
    wrapTool("get_ci_status", async ({ releaseId }) => {
      const result = await getCachedCIStatuses(releaseId);
      return toolResponse(result);
    })
  );

  server.registerTool(
    "init_ci_tracking",
    {
      title: "Start CI Tracking",
      description:
        "Start tracking CI for a release: one pending status per non-excluded repository, " +
        "then the workflow run of each merge commit (general.yaml preferred). Repos whose PR is not merged stay pending.",
      inputSchema: {
        releaseId: z.string().uuid().describe("Release id (UUID)"),
      },
    },
    wrapTool("init_ci_tracking", async ({ releaseId }) => {
      const statuses = await initCITracking(releaseId);
      return toolResponse(statuses);
    })
  );

  server.registerTool(
    "poll_ci_status",
    {
      title: "Poll CI Status",
      description:
        "Refresh every CI status that is still pending, queued or in progress. The background tracker does this on an interval.",
    },
    wrapTool("poll_ci_status", async () => {
      const result = await pollIncompleteStatuses();
      return toolResponse(result);
    })
  );

  server.registerTool(
    "refresh_chart_info",
    {
      title: "Refresh Chart Info",
      description: "Re-read the published Helm chart version from a repository's workflow logs.",
      inputSchema: {
        repoId: z.number().int().positive().describe("Release repository id"),
      },
    },
    wrapTool("refresh_chart_info", async ({ repoId }) => {
      const chart = await refreshChartInfo(repoId);
      return toolResponse(chart ?? "No chart version found in the workflow logs");
    })
  );

  server.registerTool(
    "get_deploy_status",
    {
      title: "Get Deployment Status",
      description:
        "ArgoCD rollout of each tracked repository per environment: expected chart version, the version the application targets, " +
        "sync and health, and a rollout status (pending, syncing, unhealthy, deployed, not_found). " +
        "Served from a short-lived cache; anyPending tells whether a rollout is still under way.",
      inputSchema: {
        releaseId: z.string().uuid().describe("Release id (UUID)"),
      },
    },
    wrapTool("get_deploy_status", async ({ releaseId }) => {
      const result = await getCachedDeploymentStatuses(releaseId);
      return toolResponse(result);
    })
  );

  server.registerTool(
    "init_deploy_tracking",
    {
      title: "Start Deployment Tracking",
      description:
        "Start tracking ArgoCD rollouts for a release: one pending status per configured environment for every repository " +
        "whose CI succeeded with a chart version.",
      inputSchema: {
        releaseId: z.string().uuid().describe("Release id (UUID)"),
      },
    },
    wrapTool("init_deploy_tracking", async ({ releaseId }) => {
      const statuses = await initDeploymentTracking(releaseId);
      return toolResponse(statuses);
    })
  );

  server.registerTool(
    "poll_deploy_status",
    {
      title: "Poll Deployment Status",
      description:
        "Ask ArgoCD once for every rollout not yet deployed at its expected version. The background tracker does this on an interval.",
    },
    wrapTool("poll_deploy_status", async () => {
      const result = await pollDeployments();
      return toolResponse(result);
    })
  );

  server.registerTool(
    "get_operation_metrics",
    {
      title: "Get Operation Metrics",
      description:
        "Per-tool call counts, error counts and average latency since the server started, plus cache statistics.",
    },
    wrapTool("get_operation_metrics", async () => {
      return toolResponse({
        operations: getOperationMetrics(),
        cache: getCacheStats(),
      });
    })
  );
}
