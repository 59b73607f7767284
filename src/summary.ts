import type { CheckOutput, CommitCheckOutput, CommitError, CommitSuccessReason } from './types.js';

/** Human readable descriptions of commit errors */
export const COMMIT_ERROR_DESCRIPTIONS: Record<CommitError, string> = {
  invalid_author_email: 'invalid author email',
  invalid_committer_email: 'invalid committer email',
  signoff_mismatch: 'sign-off not matching author or committer',
  signoff_not_found: 'sign-off not found',
};

/** Human readable descriptions of success reasons */
export const SUCCESS_REASON_DESCRIPTIONS: Record<CommitSuccessReason, string> = {
  is_merge: 'merge commit',
  from_bot: 'commit authored by a bot',
  from_member: 'verified commit from an organization member',
  valid_signoff: 'valid sign-off found',
  valid_signoff_in_remediation_commit: 'valid sign-off found in remediation commit',
};

/** Length of the abbreviated commit sha shown in the summary */
const SHORT_SHA_LENGTH = 7;

/**
 * First line of a commit message, trimmed.
 */
export function commitTitle(message: string): string {
  return message.split('\n', 1)[0]?.trim() ?? '';
}

function commitRef(output: CommitCheckOutput): string {
  const shortSha = output.commit.sha.slice(0, SHORT_SHA_LENGTH);
  const title = commitTitle(output.commit.message);
  const sha = output.commit.htmlUrl ? `[${shortSha}](${output.commit.htmlUrl})` : `\`${shortSha}\``;
  return title ? `${sha} ${title}` : sha;
}

function author(output: CommitCheckOutput): string {
  const user = output.commit.author ?? output.commit.committer;
  return user ? ` (${user.name} <${user.email}>)` : '';
}

/**
 * Render the check output as the Markdown summary of the check run.
 *
 * Structure:
 *   result line
 *   per-commit list (errors or success reason)
 *   on failure: how to fix, depending on which commits failed and the
 *   remediation options enabled
 */
export function renderSummary(output: CheckOutput): string {
  const total = output.commits.length;

  if (output.numCommitsWithErrors === 0) {
    let body = `All commits are signed off! (${total} commit${total === 1 ? '' : 's'} checked)`;
    if (total > 0) {
      body += '\n';
      for (const c of output.commits) {
        const reason = c.successReason ? SUCCESS_REASON_DESCRIPTIONS[c.successReason] : 'no issues found';
        body += `\n- ${commitRef(c)} -- ${reason}`;
      }
    }
    return body;
  }

  const failing = output.commits.filter((c) => c.errors.length > 0);
  let body = `There ${failing.length === 1 ? 'is one commit' : `are ${failing.length} commits`} incorrectly signed off. This means that the author(s) of these commits failed to include a Signed-off-by line in their commit message.\n`;
  for (const c of failing) {
    const errors = c.errors.map((e) => COMMIT_ERROR_DESCRIPTIONS[e]).join(', ');
    body += `\n- ${commitRef(c)}${author(c)} -- ${errors}`;
  }

  const emailErrors = failing.some((c) =>
    c.errors.some((e) => e === 'invalid_author_email' || e === 'invalid_committer_email'),
  );
  if (emailErrors) {
    body += '\n\n**Invalid emails**: make sure the author and committer emails of the commits are valid addresses, then push the commits again.';
  }

  body += '\n\n---\n\n**How to fix**\n';
  if (output.onlyLastCommitContainsErrors) {
    body += '\nOnly the last commit is missing a valid sign-off. Amend it and force push:\n';
    body += '\n```\ngit commit --amend --no-edit --signoff\ngit push --force-with-lease\n```';
  } else {
    body += `\nRebase the branch adding the sign-off to every commit, then force push:\n`;
    body += `\n\`\`\`\ngit rebase HEAD~${total} --signoff\ngit push --force-with-lease origin ${output.headRef}\n\`\`\``;
  }

  const { individual, thirdParty } = output.config.allowRemediationCommits;
  if (individual) {
    body += '\n\n**Remediation commits**\n';
    body += '\nThis repository accepts remediation commits. Instead of rewriting history, push a new commit whose message includes, for each failing commit:\n';
    body += '\n```\nI, Your Name <your@email>, hereby add my Signed-off-by to this commit: <sha>\n```';
    if (thirdParty) {
      body += '\n\nTo sign off on behalf of someone else:\n';
      body += '\n```\nOn behalf of Their Name <their@email>, I, Your Name <your@email>, hereby add my Signed-off-by to this commit: <sha>\n```';
    }
    body += '\n\nThe remediation commit must be signed off as well.';
  }

  return body;
}
