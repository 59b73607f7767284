import type { PullRequestRef } from './types.js';

const PR_URL_REGEX =
  /^https?:\/\/github\.com\/([a-zA-Z0-9_.-]+)\/([a-zA-Z0-9_.-]+)\/pull\/(\d+)(?:\/(?:commits|checks|files)?)?\/?(?:\?.*)?(?:#.*)?$/;

const PR_SHORTHAND_REGEX = /^([a-zA-Z0-9_.-]+)\/([a-zA-Z0-9_.-]+)#(\d+)$/;

/**
 * Parse a pull request reference into its components.
 *
 * Accepts full GitHub PR URLs (optionally pointing at the commits, checks or
 * files tab) and the `owner/repo#123` shorthand:
 *   https://github.com/owner/repo/pull/123
 *   https://github.com/owner/repo/pull/123/commits
 *   owner/repo#123
 *
 * Returns null for any invalid, malformed, or non-GitHub input.
 */
export function parsePullRequestRef(input: string): PullRequestRef | null {
  const shorthand = input.trim().match(PR_SHORTHAND_REGEX);
  if (shorthand) {
    return toRef(shorthand[1], shorthand[2], shorthand[3]);
  }

  try {
    new URL(input);
  } catch {
    return null;
  }

  const match = input.match(PR_URL_REGEX);
  if (!match) return null;

  return toRef(match[1], match[2], match[3]);
}

function toRef(owner: string, repo: string, prNumber: string): PullRequestRef | null {
  const parsed = Number.parseInt(prNumber, 10);
  if (parsed <= 0 || !Number.isSafeInteger(parsed)) return null;
  return { owner, repo, prNumber: parsed };
}
