#!/usr/bin/env node

/**
 * Release Coordinator MCP Server
 *
 * Coordinates multi-repository releases: which repos changed between two
 * branches, the order they deploy in, who approved and confirmed, and
 * what CI published for each merge commit and where ArgoCD rolled it out.
 *
 * Tool groups:
 *   - tools-releases: releases, deploy waves, approvals, confirmations, history
 *   - tools-ci: CI and ArgoCD tracking, chart versions, operation metrics
 *
 * Background trackers poll running CI statuses and pending rollouts while
 * the server is up.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { register as registerReleaseTools } from "./tools-releases.js";
import { register as registerCITools } from "./tools-ci.js";
import { startCITracker } from "./ci-status.js";
import { startDeployTracker } from "./deploy-status.js";
import { closeDb } from "./db.js";

const VERSION = "0.3.0";

const server = new McpServer({
  name: "release-coordinator",
  version: VERSION,
});

registerReleaseTools(server);
registerCITools(server);

const stopTrackers: Array<() => void> = [];

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  stopTrackers.push(await startCITracker(), await startDeployTracker());
  console.error(`Release Coordinator MCP Server v${VERSION} running on stdio`);
}

process.on("SIGINT", async () => {
  console.error("Shutting down Release Coordinator MCP server...");
  for (const stop of stopTrackers) stop();
  await server.close();
  closeDb();
  process.exit(0);
});

main().catch((error) => {
  console.error("Fatal error in Release Coordinator MCP server:", error);
  process.exit(1);
});
