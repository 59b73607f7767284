import { z } from 'zod';
import type { Commit, CommitError } from './types.js';

// One @ between a local part and a domain, no whitespace
const EmailSchema = z.email({ pattern: z.regexes.unicodeEmail });

/** Check an email address is syntactically valid */
export function isValidEmail(email: string): boolean {
  return EmailSchema.safeParse(email).success;
}

/**
 * Validate the author and committer emails of a commit.
 *
 * The committer is validated first. The author email is only validated when it
 * differs from the committer's, so one invalid address shared by both is
 * reported once (as the committer's).
 */
export function validateEmails(commit: Commit): CommitError[] {
  const errors: CommitError[] = [];

  const committerEmail = commit.committer?.email;
  if (committerEmail !== undefined && !isValidEmail(committerEmail)) {
    errors.push('invalid_committer_email');
  }

  const authorEmail = commit.author?.email;
  if (authorEmail !== undefined && authorEmail !== committerEmail && !isValidEmail(authorEmail)) {
    errors.push('invalid_author_email');
  }

  return errors;
}
