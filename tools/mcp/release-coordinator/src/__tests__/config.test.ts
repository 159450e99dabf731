import { describe, it, expect } from "vitest";
import {
  parseConfig,
  DEFAULT_DB_PATH,
  RELEASE_STATUSES,
  APPROVAL_TYPES,
  CI_ACTIVE_STATES,
  CI_TERMINAL_STATES,
  GH_LIMITS,
} from "../config.js";

describe("parseConfig()", () => {
  it("fills every default from an empty object", () => {
    expect(parseConfig({})).toEqual({
      org: "",
      ignoreRepos: [],
      dbPath: DEFAULT_DB_PATH,
      ci: { pollIntervalMs: 30_000, cacheTtlMs: 5_000 },
      deployOrder: { maxDepth: 1000, warnUnresolved: true },
      argocd: { pollIntervalMs: 30_000, cacheTtlMs: 10_000, environments: {}, overrides: {} },
    });
  });

  it("fills defaults inside each ArgoCD environment", () => {
    const config = parseConfig({
      argocd: {
        environments: { staging: { url: "https://argocd.staging.test", appSuffix: "-stg" } },
        overrides: { "web-staging": "web-frontend" },
      },
    });
    expect(config.argocd.environments).toEqual({
      staging: {
        url: "https://argocd.staging.test",
        cfClientId: "",
        cfClientSecret: "",
        appSuffix: "-stg",
      },
    });
    expect(config.argocd.overrides).toEqual({ "web-staging": "web-frontend" });
  });

  it("rejects an ArgoCD environment without a valid URL", () => {
    expect(() => parseConfig({ argocd: { environments: { prod: { url: "argocd" } } } })).toThrow(
      "Invalid configuration: argocd.environments.prod.url: Invalid url"
    );
  });

  it("keeps given values and defaults the rest of a section", () => {
    const config = parseConfig({
      org: "acme",
      ignoreRepos: ["sandbox"],
      ci: { pollIntervalMs: 10_000 },
      deployOrder: { warnUnresolved: false },
    });
    expect(config.org).toBe("acme");
    expect(config.ignoreRepos).toEqual(["sandbox"]);
    expect(config.ci).toEqual({ pollIntervalMs: 10_000, cacheTtlMs: 5_000 });
    expect(config.deployOrder).toEqual({ maxDepth: 1000, warnUnresolved: false });
  });

  it("applies environment overrides", () => {
    const config = parseConfig(
      { org: "acme", dbPath: "state.db" },
      { GITHUB_ORG: "acme-labs", RELEASE_DB_PATH: ":memory:" }
    );
    expect(config.org).toBe("acme-labs");
    expect(config.dbPath).toBe(":memory:");
  });

  it("ignores empty environment values", () => {
    expect(parseConfig({ org: "acme" }, { GITHUB_ORG: "" }).org).toBe("acme");
  });

  it("lists every schema violation", () => {
    expect(() =>
      parseConfig({ ci: { pollIntervalMs: -1 }, deployOrder: { maxDepth: "deep" } })
    ).toThrow(
      "Invalid configuration: ci.pollIntervalMs: Number must be greater than 0; deployOrder.maxDepth: Expected number, received string"
    );
  });

  it("rejects a non-object root", () => {
    expect(() => parseConfig([])).toThrow(/^Invalid configuration: \(root\): /);
  });
});

describe("domain constants", () => {
  it("has the release statuses", () => {
    expect(RELEASE_STATUSES).toEqual(["pending", "approved", "declined"]);
  });

  it("has the approval types", () => {
    expect(APPROVAL_TYPES).toEqual(["dev", "qa"]);
  });

  it("keeps active and terminal CI states apart", () => {
    for (const state of CI_ACTIVE_STATES) {
      expect(CI_TERMINAL_STATES.some((terminal: string) => terminal === state)).toBe(false);
    }
    expect(CI_TERMINAL_STATES).toContain("success");
    expect(CI_ACTIVE_STATES).toContain("in_progress");
  });

  it("GH_LIMITS has reasonable defaults", () => {
    expect(GH_LIMITS.timeoutMs).toBe(30_000);
    expect(GH_LIMITS.maxBuffer).toBe(10 * 1024 * 1024);
    expect(GH_LIMITS.compareConcurrency).toBe(4);
  });
});
