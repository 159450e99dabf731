import { describe, it, expect } from "vitest";
import {
  computeDeployOrder,
  computeDeployOrderFromRecords,
  groupByWave,
  findUnresolvedDependencies,
  type RepoNode,
} from "../deploy-order.js";
import { CycleError, DepthLimitError, ParseError } from "../errors.js";

function waves<Id extends string | number>(nodes: Array<RepoNode<Id>>) {
  return Object.fromEntries(computeDeployOrder(nodes));
}

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) return [items];
  return items.flatMap((item, i) =>
    permutations([...items.slice(0, i), ...items.slice(i + 1)]).map((rest) => [item, ...rest])
  );
}

const diamond: Array<RepoNode<number>> = [
  { id: 1, name: "core" },
  { id: 2, name: "service-a", dependsOn: ["core"] },
  { id: 3, name: "service-b", dependsOn: ["core"] },
  { id: 4, name: "aggregator", dependsOn: ["service-a", "service-b"] },
];

describe("computeDeployOrder()", () => {
  it("returns an empty map for no repositories", () => {
    expect(computeDeployOrder([]).size).toBe(0);
  });

  it("puts a single repository in wave 1", () => {
    expect(waves([{ id: 1, name: "auth-service" }])).toEqual({ 1: 1 });
  });

  it("puts independent repositories in wave 1", () => {
    expect(
      waves([
        { id: 1, name: "auth-service" },
        { id: 2, name: "api-gateway" },
      ])
    ).toEqual({ 1: 1, 2: 1 });
  });

  it("numbers a chain one wave per link", () => {
    expect(
      waves([
        { id: 1, name: "auth-service" },
        { id: 2, name: "api-gateway", dependsOn: ["auth-service"] },
        { id: 3, name: "notification-svc", dependsOn: ["api-gateway"] },
      ])
    ).toEqual({ 1: 1, 2: 2, 3: 3 });
  });

  it("takes the longest path through a diamond", () => {
    expect(waves(diamond)).toEqual({ 1: 1, 2: 2, 3: 2, 4: 3 });
  });

  it("ignores dependencies on repositories outside the release", () => {
    expect(
      waves([
        { id: 1, name: "auth-service" },
        { id: 2, name: "api-gateway", dependsOn: ["unknown-service"] },
      ])
    ).toEqual({ 1: 1, 2: 1 });
  });

  it("counts only the resolvable dependencies of a repo", () => {
    expect(
      waves([
        { id: 1, name: "auth-service" },
        { id: 2, name: "api-gateway", dependsOn: ["unknown-service", "auth-service"] },
      ])
    ).toEqual({ 1: 1, 2: 2 });
  });

  it("treats an empty dependency list like no dependencies", () => {
    expect(waves([{ id: 1, name: "auth-service", dependsOn: [] }])).toEqual({ 1: 1 });
  });

  it("resolves a repeated name to the last repository with it", () => {
    expect(
      waves([
        { id: 1, name: "worker" },
        { id: 2, name: "worker", dependsOn: ["db-migrations"] },
        { id: 3, name: "scheduler", dependsOn: ["worker"] },
        { id: 4, name: "db-migrations" },
      ])
    ).toEqual({ 1: 1, 2: 2, 3: 3, 4: 1 });
  });

  it("works with string ids", () => {
    expect(
      waves([
        { id: "a", name: "auth-service" },
        { id: "b", name: "api-gateway", dependsOn: ["auth-service"] },
      ])
    ).toEqual({ a: 1, b: 2 });
  });

  it("gives the same waves for every input order", () => {
    const expected = waves(diamond);
    for (const order of permutations(diamond)) {
      expect(waves(order)).toEqual(expected);
    }
  });

  it("gives the same waves for every order of a chain with a dangling ref", () => {
    const nodes: Array<RepoNode<number>> = [
      { id: 1, name: "auth-service" },
      { id: 2, name: "api-gateway", dependsOn: ["auth-service", "legacy-billing"] },
      { id: 3, name: "notification-svc", dependsOn: ["api-gateway"] },
      { id: 4, name: "web", dependsOn: ["notification-svc", "auth-service"] },
      { id: 5, name: "docs" },
    ];
    const expected = { 1: 1, 2: 2, 3: 3, 4: 4, 5: 1 };
    for (const order of permutations(nodes)) {
      expect(waves(order)).toEqual(expected);
    }
  });

  it("places every repo after all of its resolvable dependencies", () => {
    const nodes: Array<RepoNode<number>> = Array.from({ length: 30 }, (_, i) => ({
      id: i,
      name: `repo-${i}`,
      // each repo depends on up to three lower-numbered repos
      dependsOn: [i - 1, i - 3, i - 7].filter((j) => j >= 0).map((j) => `repo-${j}`),
    }));
    const order = computeDeployOrder(nodes);

    expect(order.size).toBe(30);
    for (const node of nodes) {
      const wave = order.get(node.id) ?? 0;
      expect(wave).toBeGreaterThanOrEqual(1);
      if ((node.dependsOn ?? []).length === 0) {
        expect(wave).toBe(1);
      }
      for (const dep of node.dependsOn ?? []) {
        const depId = Number(dep.slice("repo-".length));
        expect(order.get(depId) ?? 0).toBeLessThan(wave);
      }
    }
  });

  describe("cycles", () => {
    it("rejects a repo that depends on itself", () => {
      const call = () => computeDeployOrder([{ id: 1, name: "service-a", dependsOn: ["service-a"] }]);
      expect(call).toThrow(CycleError);
      expect(call).toThrow("circular dependency detected: service-a → service-a");
    });

    it("rejects two repos that depend on each other", () => {
      const call = () =>
        computeDeployOrder([
          { id: 1, name: "service-a", dependsOn: ["service-b"] },
          { id: 2, name: "service-b", dependsOn: ["service-a"] },
        ]);
      expect(call).toThrow(CycleError);
      expect(call).toThrow("circular dependency detected: service-a → service-b → service-a");
    });

    it("rejects a three-repo transitive cycle", () => {
      try {
        computeDeployOrder([
          { id: 1, name: "a", dependsOn: ["c"] },
          { id: 2, name: "b", dependsOn: ["a"] },
          { id: 3, name: "c", dependsOn: ["b"] },
        ]);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(CycleError);
        if (error instanceof CycleError) {
          expect(error.kind).toBe("cycle");
          expect(error.path).toEqual(["a", "c", "b", "a"]);
          expect(error.message).toContain("circular");
        }
      }
    });

    it("rejects a cycle reached from an acyclic prefix", () => {
      expect(() =>
        computeDeployOrder([
          { id: 1, name: "web", dependsOn: ["api"] },
          { id: 2, name: "api", dependsOn: ["worker"] },
          { id: 3, name: "worker", dependsOn: ["api"] },
        ])
      ).toThrow("circular dependency detected: api → worker → api");
    });

    it("ignores a dangling ref that would have closed a cycle", () => {
      expect(
        waves([
          { id: 1, name: "service-a", dependsOn: ["service-b"] },
          { id: 2, name: "service-b", dependsOn: ["service-a-old"] },
        ])
      ).toEqual({ 1: 2, 2: 1 });
    });
  });

  describe("depth limit", () => {
    const chain = (length: number): Array<RepoNode<number>> =>
      Array.from({ length }, (_, i) => ({
        id: i,
        name: `repo-${i}`,
        dependsOn: i + 1 < length ? [`repo-${i + 1}`] : [],
      }));

    it("accepts a chain as long as the limit", () => {
      const order = computeDeployOrder(chain(3), { maxDepth: 3 });
      expect(Object.fromEntries(order)).toEqual({ 0: 3, 1: 2, 2: 1 });
    });

    it("rejects a longer chain", () => {
      const call = () => computeDeployOrder(chain(5), { maxDepth: 3 });
      expect(call).toThrow(DepthLimitError);
      expect(call).toThrow("dependency chain exceeds 3 repositories");
    });

    it("handles a long chain under the default limit", () => {
      const order = computeDeployOrder(chain(500));
      expect(order.get(0)).toBe(500);
      expect(order.get(499)).toBe(1);
    });
  });
});

describe("computeDeployOrderFromRecords()", () => {
  it("decodes stored dependency lists", () => {
    const order = computeDeployOrderFromRecords([
      { id: 10, repo_name: "auth-service", depends_on: null },
      { id: 11, repo_name: "api-gateway", depends_on: '["auth-service"]' },
      { id: 12, repo_name: "web", depends_on: "" },
    ]);
    expect(Object.fromEntries(order)).toEqual({ 10: 1, 11: 2, 12: 1 });
  });

  it("fails the whole call when one row is not valid JSON", () => {
    const call = () =>
      computeDeployOrderFromRecords([
        { id: 1, repo_name: "auth-service", depends_on: "[]" },
        { id: 2, repo_name: "api-gateway", depends_on: '["auth-service"' },
        { id: 3, repo_name: "web", depends_on: '["api-gateway"]' },
      ]);
    expect(call).toThrow(ParseError);
    expect(call).toThrow(/^unmarshaling depends_on: /);
  });

  it("fails on JSON that is not a list of names", () => {
    const call = () =>
      computeDeployOrderFromRecords([{ id: 1, repo_name: "auth-service", depends_on: '{"repo":"x"}' }]);
    expect(call).toThrow("unmarshaling depends_on: expected a JSON array of strings");
  });

  it("reports bad data before looking for cycles", () => {
    expect(() =>
      computeDeployOrderFromRecords([
        { id: 1, repo_name: "a", depends_on: '["b"]' },
        { id: 2, repo_name: "b", depends_on: '["a"]' },
        { id: 3, repo_name: "c", depends_on: "[1]" },
      ])
    ).toThrow(ParseError);
  });
});

describe("groupByWave()", () => {
  it("groups names by wave, waves ascending and names sorted", () => {
    expect(groupByWave(diamond, computeDeployOrder(diamond))).toEqual([
      { wave: 1, repos: ["core"] },
      { wave: 2, repos: ["service-a", "service-b"] },
      { wave: 3, repos: ["aggregator"] },
    ]);
  });

  it("skips nodes with no wave", () => {
    const order = new Map([[1, 1]]);
    expect(groupByWave(diamond, order)).toEqual([{ wave: 1, repos: ["core"] }]);
  });
});

describe("findUnresolvedDependencies()", () => {
  it("lists names that match no repository", () => {
    expect(
      findUnresolvedDependencies([
        { id: 1, name: "auth-service" },
        { id: 2, name: "api-gateway", dependsOn: ["auth-service", "unknown-service"] },
      ])
    ).toEqual([{ id: 2, name: "api-gateway", missing: ["unknown-service"] }]);
  });

  it("returns nothing when every name resolves", () => {
    expect(findUnresolvedDependencies(diamond)).toEqual([]);
  });
});
