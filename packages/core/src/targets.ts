// ---------------------------------------------------------------------------
// Repository targets — one (repository, branch) pair per tracked unit
// ---------------------------------------------------------------------------

export interface RepoTarget {
  /** "owner/name" */
  repo: string;
  /** null tracks the repository's default branch */
  branch: string | null;
}

const REPO_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?\/[A-Za-z0-9._-]+$/;
const BRANCH_PATTERN = /^[^\s:~^?*[\\]+$/;

export function isValidRepo(repo: string): boolean {
  return REPO_PATTERN.test(repo) && !repo.endsWith(".git");
}

export function isValidBranch(branch: string): boolean {
  return (
    BRANCH_PATTERN.test(branch) &&
    !branch.startsWith("/") &&
    !branch.endsWith("/") &&
    !branch.includes("..")
  );
}

/**
 * Parses "owner/name" or "owner/name:branch". Returns an error message
 * instead of throwing so config loading can report every bad entry at once.
 */
export function parseRepoTarget(
  spec: string,
): { ok: true; target: RepoTarget } | { ok: false; error: string } {
  const trimmed = spec.trim();
  const sep = trimmed.indexOf(":");
  const repo = sep === -1 ? trimmed : trimmed.slice(0, sep);
  const branch = sep === -1 ? null : trimmed.slice(sep + 1);

  if (!isValidRepo(repo)) {
    return {
      ok: false,
      error: `"${spec}" is not a repository of the form owner/name`,
    };
  }
  if (branch !== null && !isValidBranch(branch)) {
    return { ok: false, error: `"${spec}" has an invalid branch name` };
  }
  return { ok: true, target: { repo, branch } };
}

export function targetKey(target: RepoTarget): string {
  return target.branch === null ? target.repo : `${target.repo}#${target.branch}`;
}

export function formatTarget(target: RepoTarget): string {
  return target.branch === null ? target.repo : `${target.repo}:${target.branch}`;
}

export function sameTarget(a: RepoTarget, b: RepoTarget): boolean {
  return a.repo === b.repo && a.branch === b.branch;
}
