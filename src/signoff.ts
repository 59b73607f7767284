import type { Commit, SignOff, User } from './types.js';

/**
 * Sign-off line: `Signed-off-by: Name <email>`. Whitespace around the name and
 * inside the brackets is allowed and trimmed; the brackets themselves are required.
 * The email is the last bracketed part of the line.
 */
const SIGN_OFF_REGEX = /^Signed-off-by:[ \t]*(.*)[ \t]*<[ \t]*([^<>]*?)[ \t]*>[ \t]*\r?$/gim;

/**
 * Extract every sign-off found in a commit message, in order of appearance.
 * Lines missing the name or the email are ignored.
 */
export function extractSignOffs(message: string): SignOff[] {
  const signoffs: SignOff[] = [];

  for (const match of message.matchAll(SIGN_OFF_REGEX)) {
    const name = match[1]?.trim();
    const email = match[2];
    if (name && email) {
      signoffs.push({ name, email });
    }
  }

  return signoffs;
}

/**
 * Case-insensitive comparison of both name and email.
 */
export function identityMatches(identity: Pick<User, 'name' | 'email'>, user: User | undefined): boolean {
  if (!user) return false;
  return (
    identity.name.toLowerCase() === user.name.toLowerCase() &&
    identity.email.toLowerCase() === user.email.toLowerCase()
  );
}

/**
 * Whether the identity is the commit's author or committer.
 */
export function matchesAuthorOrCommitter(identity: Pick<User, 'name' | 'email'>, commit: Commit): boolean {
  return identityMatches(identity, commit.author) || identityMatches(identity, commit.committer);
}

/**
 * Check if any of the sign-offs matches the commit's author or committer.
 */
export function signOffsMatch(signoffs: SignOff[], commit: Commit): boolean {
  return signoffs.some((signoff) => matchesAuthorOrCommitter(signoff, commit));
}
