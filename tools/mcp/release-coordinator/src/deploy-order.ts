/**
 * Deploy order: which repositories of a release can ship together.
 *
 * Each repository gets a wave number: 1 when none of its declared
 * dependencies are part of the release, otherwise one more than the
 * highest wave among the dependencies that are. Repositories sharing a
 * wave may deploy in parallel; a later wave waits for earlier ones.
 *
 * Dependencies are declared by repository name. Names that match no
 * repository in the release are dropped (the depended-on repo has no
 * changes this time, or the name is mistyped); findUnresolvedDependencies()
 * reports them without failing.
 *
 * Nodes live in a dense index arena; traversal is a memoized DFS with
 * visited/onStack markers, so the result does not depend on input order.
 */

import { decodeStringList } from "./codec.js";
import { CycleError, DepthLimitError } from "./errors.js";

// ─── Types ──────────────────────────────────────────────

export interface RepoNode<Id = number> {
  id: Id;
  name: string;
  /** Names of repositories this one deploys after */
  dependsOn?: readonly string[];
}

/** id → wave (1-based) */
export type DeployOrder<Id = number> = Map<Id, number>;

export interface DeployOrderOptions {
  /** Longest dependency chain accepted before failing */
  maxDepth?: number;
}

/** A repo row as stored, with depends_on still encoded */
export interface RepoRecord {
  id: number;
  repo_name: string;
  depends_on: string | null;
}

export interface Wave {
  wave: number;
  repos: string[];
}

export const DEFAULT_MAX_DEPTH = 1000;

// ─── Graph Construction ─────────────────────────────────

/** name → arena index; a repeated name keeps its last node */
function indexByName<Id>(nodes: ReadonlyArray<RepoNode<Id>>): Map<string, number> {
  const index = new Map<string, number>();
  nodes.forEach((node, i) => index.set(node.name, i));
  return index;
}

/** Arena adjacency: deps[i] holds the indices node i deploys after */
function resolveEdges<Id>(
  nodes: ReadonlyArray<RepoNode<Id>>,
  index: Map<string, number>
): number[][] {
  return nodes.map((node) => {
    const resolved: number[] = [];
    for (const name of node.dependsOn ?? []) {
      const target = index.get(name);
      if (target !== undefined) resolved.push(target);
    }
    return resolved;
  });
}

// ─── Public Functions ───────────────────────────────────

/**
 * Compute the wave of every node.
 *
 * @throws CycleError when resolvable dependencies form a cycle
 * @throws DepthLimitError when a chain is longer than `maxDepth`
 */
export function computeDeployOrder<Id>(
  nodes: ReadonlyArray<RepoNode<Id>>,
  options: DeployOrderOptions = {}
): DeployOrder<Id> {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const deps = resolveEdges(nodes, indexByName(nodes));

  const waves = new Array<number>(nodes.length).fill(0);
  const visited = new Array<boolean>(nodes.length).fill(false);
  const onStack = new Array<boolean>(nodes.length).fill(false);
  const stack: number[] = [];

  function visit(i: number): number {
    if (onStack[i]) {
      const cycle = [...stack.slice(stack.indexOf(i)), i];
      throw new CycleError(cycle.map((j) => nodes[j].name));
    }
    if (visited[i]) return waves[i];
    if (stack.length >= maxDepth) throw new DepthLimitError(maxDepth);

    onStack[i] = true;
    stack.push(i);

    let deepest = 0;
    for (const dep of deps[i]) {
      deepest = Math.max(deepest, visit(dep));
    }

    stack.pop();
    onStack[i] = false;
    visited[i] = true;
    waves[i] = deepest + 1;
    return waves[i];
  }

  const order: DeployOrder<Id> = new Map();
  nodes.forEach((node, i) => {
    order.set(node.id, visit(i));
  });
  return order;
}

/**
 * Compute the deploy order straight from stored rows.
 *
 * Every row is decoded before anything is computed: one malformed
 * depends_on fails the whole call with ParseError.
 */
export function computeDeployOrderFromRecords(
  records: ReadonlyArray<RepoRecord>,
  options: DeployOrderOptions = {}
): DeployOrder<number> {
  const nodes: Array<RepoNode<number>> = records.map((record) => ({
    id: record.id,
    name: record.repo_name,
    dependsOn: decodeStringList("depends_on", record.depends_on),
  }));
  return computeDeployOrder(nodes, options);
}

/** Group repository names by wave, waves ascending, names sorted */
export function groupByWave<Id>(
  nodes: ReadonlyArray<RepoNode<Id>>,
  order: DeployOrder<Id>
): Wave[] {
  const byWave = new Map<number, string[]>();
  for (const node of nodes) {
    const wave = order.get(node.id);
    if (wave === undefined) continue;
    const names = byWave.get(wave) ?? [];
    names.push(node.name);
    byWave.set(wave, names);
  }

  return [...byWave.entries()]
    .sort(([a], [b]) => a - b)
    .map(([wave, repos]) => ({ wave, repos: repos.sort() }));
}

/** Declared dependency names that match no node in the set */
export function findUnresolvedDependencies<Id>(
  nodes: ReadonlyArray<RepoNode<Id>>
): Array<{ id: Id; name: string; missing: string[] }> {
  const names = new Set(nodes.map((n) => n.name));
  const unresolved: Array<{ id: Id; name: string; missing: string[] }> = [];

  for (const node of nodes) {
    const missing = (node.dependsOn ?? []).filter((dep) => !names.has(dep));
    if (missing.length > 0) {
      unresolved.push({ id: node.id, name: node.name, missing });
    }
  }

  return unresolved;
}
