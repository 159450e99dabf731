/**
 * ArgoCD REST client: read one application's sync, health and revision.
 *
 * Servers sit behind Cloudflare Access, so each request carries the
 * environment's service-token headers.
 */

import axios from "axios";
import { z } from "zod";
import { ARGOCD_LIMITS, type ArgoEnvironment } from "./config.js";

const ApplicationSchema = z.object({
  metadata: z.object({ name: z.string() }),
  spec: z
    .object({
      source: z
        .object({
          chart: z.string().optional(),
          targetRevision: z.string().default(""),
        })
        .default({}),
    })
    .default({}),
  status: z
    .object({
      sync: z.object({ status: z.string().default("") }).default({}),
      health: z.object({ status: z.string().default("") }).default({}),
    })
    .default({}),
});

export interface AppStatus {
  name: string;
  syncStatus: string;
  healthStatus: string;
  /** Chart version the application targets */
  currentVersion: string;
}

export function applicationUrl(env: ArgoEnvironment, appName: string): string {
  return `${env.url.replace(/\/+$/, "")}/api/v1/applications/${encodeURIComponent(appName)}`;
}

/** Fetch an application; null when ArgoCD does not know it */
export async function getApplication(
  env: ArgoEnvironment,
  appName: string
): Promise<AppStatus | null> {
  const url = applicationUrl(env, appName);

  const response = await axios
    .get<unknown>(url, {
      headers: {
        "CF-Access-Client-Id": env.cfClientId,
        "CF-Access-Client-Secret": env.cfClientSecret,
        Accept: "application/json",
      },
      timeout: ARGOCD_LIMITS.timeoutMs,
      validateStatus: () => true,
    })
    .catch((error: unknown) => {
      throw axios.isAxiosError(error)
        ? new Error(`ArgoCD request for ${appName} failed: ${error.message}`)
        : error;
    });

  if (response.status === 404) return null;
  if (response.status !== 200) {
    throw new Error(`ArgoCD API error: ${response.status} (${appName})`);
  }

  const parsed = ApplicationSchema.safeParse(response.data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `ArgoCD ${appName}: unexpected response (${issue ? `${issue.path.join(".")}: ${issue.message}` : "no detail"})`
    );
  }

  const app = parsed.data;
  return {
    name: app.metadata.name,
    syncStatus: app.status.sync.status,
    healthStatus: app.status.health.status,
    currentVersion: app.spec.source.targetRevision,
  };
}
