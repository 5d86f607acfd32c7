export const DEFAULT_BRANCH = "main";

/** Paths the pipeline writes itself; attachments may not take them. */
export const RESERVED_PATHS: readonly string[] = [
  "index.html",
  "styles.css",
  "script.js",
  "README.md",
  "LICENSE",
];

/**
 * Mirrors GitHub's own rewrite of repository names: each character outside
 * `[A-Za-z0-9._-]` becomes `-`. Whitespace runs collapse to a single `-` first.
 */
export function repoSlug(name: string): string {
  return name.replace(/\s+/g, "-").replace(/[^A-Za-z0-9._-]/g, "-");
}

export function repoNameFor(task: string, nonce: string): string {
  return repoSlug(`${task}-${nonce}`);
}

export function publishBranchFor(round: number): string {
  return round <= 1 ? DEFAULT_BRANCH : `round-${round}`;
}

export function pagesUrlFor(owner: string, repo: string): string {
  return `https://${owner.toLowerCase()}.github.io/${repo}/`;
}
