import type { Commit, EffectiveConfig, SkipDecision, User } from './types.js';

function isMember(user: User | undefined, members: readonly string[]): boolean {
  return user?.login !== undefined && members.includes(user.login);
}

/**
 * Decide whether a commit is exempt from signing off.
 *
 * In priority order: merge commits, commits authored by a bot, and verified
 * commits from a trusted member (only when the configuration does not require
 * members to sign off).
 */
export function classifyCommit(commit: Commit, config: EffectiveConfig, members: readonly string[]): SkipDecision {
  if (commit.isMerge) {
    return { skip: true, reason: 'is_merge' };
  }

  if (commit.author?.isBot) {
    return { skip: true, reason: 'from_bot' };
  }

  if (
    !config.require.members &&
    commit.verified === true &&
    (isMember(commit.author, members) || isMember(commit.committer, members))
  ) {
    return { skip: true, reason: 'from_member' };
  }

  return { skip: false };
}
