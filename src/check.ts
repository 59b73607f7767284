import { classifyCommit } from './classifier.js';
import { validateEmails } from './email.js';
import { collectRemediations, remediationsMatch } from './remediation.js';
import { extractSignOffs, signOffsMatch } from './signoff.js';
import type { CheckInput, CheckOutput, Commit, CommitCheckOutput, Remediation } from './types.js';

/**
 * Run the DCO check over the commits of a pull request.
 *
 * Remediations are collected from every commit first, so a statement in a later
 * commit can clear the errors of an earlier one. Then each commit is evaluated
 * in order. Never throws: a commit without author or committer simply has no
 * identity for sign-offs to match.
 */
export function check(input: CheckInput): CheckOutput {
  const remediations = collectRemediations(input.commits, input.config);
  const commits = input.commits.map((commit) => checkCommit(commit, input, remediations));

  const numCommitsWithErrors = commits.filter((c) => c.errors.length > 0).length;
  const last = commits.at(-1);

  return {
    commits,
    config: input.config,
    headRef: input.headRef,
    numCommitsWithErrors,
    onlyLastCommitContainsErrors: numCommitsWithErrors === 1 && last !== undefined && last.errors.length > 0,
  };
}

function checkCommit(commit: Commit, input: CheckInput, remediations: Remediation[]): CommitCheckOutput {
  const decision = classifyCommit(commit, input.config, input.members);
  if (decision.skip) {
    return { commit, errors: [], successReason: decision.reason };
  }

  const output: CommitCheckOutput = { commit, errors: validateEmails(commit) };
  const emailsAreValid = output.errors.length === 0;

  const signoffs = extractSignOffs(commit.message);
  if (signoffs.length === 0) {
    output.errors.push('signoff_not_found');
  }

  if (emailsAreValid && signoffs.length > 0) {
    if (signOffsMatch(signoffs, commit)) {
      output.successReason = 'valid_signoff';
    } else {
      output.errors.push('signoff_mismatch');
    }
  }

  // A valid remediation overrides whatever errors were found for this commit
  if (output.successReason === undefined && remediationsMatch(remediations, commit)) {
    output.errors = [];
    output.successReason = 'valid_signoff_in_remediation_commit';
  }

  return output;
}
