/**
 * Error taxonomy. Callers branch on `kind`, never on message text.
 */

/** The resolvable dependency edges of a release contain a cycle */
export class CycleError extends Error {
  readonly kind = "cycle" as const;

  constructor(readonly path: readonly string[]) {
    super(
      path.length > 0
        ? `circular dependency detected: ${path.join(" → ")}`
        : "circular dependency detected"
    );
    this.name = "CycleError";
  }
}

/** A stored list column could not be decoded */
export class ParseError extends Error {
  readonly kind = "parse" as const;

  constructor(
    readonly field: string,
    detail: string
  ) {
    super(`unmarshaling ${field}: ${detail}`);
    this.name = "ParseError";
  }
}

/** A dependency chain is longer than the configured limit */
export class DepthLimitError extends Error {
  readonly kind = "depth_limit" as const;

  constructor(readonly limit: number) {
    super(`dependency chain exceeds ${limit} repositories`);
    this.name = "DepthLimitError";
  }
}

export class NotFoundError extends Error {
  readonly kind = "not_found" as const;

  constructor(
    readonly entity: "release" | "repo",
    readonly id: string | number
  ) {
    super(`${entity} ${id} not found`);
    this.name = "NotFoundError";
  }
}

/** A repository name appears twice in one release */
export class DuplicateRepoError extends Error {
  readonly kind = "duplicate_repo" as const;

  constructor(
    readonly releaseId: string,
    readonly repoName: string
  ) {
    super(`repo ${repoName} is already part of release ${releaseId}`);
    this.name = "DuplicateRepoError";
  }
}

export class ConfirmationError extends Error {
  constructor(
    readonly kind: "not_contributor" | "already_confirmed",
    readonly githubUser: string,
    readonly repoName: string
  ) {
    super(
      kind === "not_contributor"
        ? `${githubUser} is not a contributor to ${repoName}`
        : `${githubUser} already confirmed ${repoName}`
    );
    this.name = "ConfirmationError";
  }
}

export type DeployOrderError = CycleError | ParseError | DepthLimitError;

/** True for the failures that mean "cannot compute deploy order" */
export function isDeployOrderError(error: unknown): error is DeployOrderError {
  return (
    error instanceof CycleError ||
    error instanceof ParseError ||
    error instanceof DepthLimitError
  );
}
