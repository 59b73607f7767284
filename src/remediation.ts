import { matchesAuthorOrCommitter } from './signoff.js';
import type { Commit, EffectiveConfig, Remediation } from './types.js';

/** `I, Name <email>, hereby add my Signed-off-by to this commit: <sha>` */
const INDIVIDUAL_REMEDIATION_REGEX =
  /^I,[ \t]*(.*?)[ \t]*<[ \t]*(.*?)[ \t]*>,[ \t]*hereby add my Signed-off-by to this commit:[ \t]*(\S+)[ \t]*\r?$/gim;

/** `On behalf of Name <email>, I, Name <email>, hereby add my Signed-off-by to this commit: <sha>` */
const THIRD_PARTY_REMEDIATION_REGEX =
  /^On behalf of[ \t]*(.*?)[ \t]*<[ \t]*(.*?)[ \t]*>,[ \t]*I,[ \t]*(.*?)[ \t]*<[ \t]*(.*?)[ \t]*>,[ \t]*hereby add my Signed-off-by to this commit:[ \t]*(\S+)[ \t]*\r?$/gim;

/**
 * Collect the remediations declared in the messages of all the commits.
 *
 * Individual statements count only when the declarant is the author or
 * committer of the commit carrying them. In third-party statements that
 * requirement applies to the representative; the declarant on whose behalf the
 * statement is made is recorded as is. Statements failing these checks are
 * dropped without being reported.
 *
 * Third-party statements are only collected when individual remediations are
 * enabled too.
 */
export function collectRemediations(commits: Commit[], config: EffectiveConfig): Remediation[] {
  const { individual, thirdParty } = config.allowRemediationCommits;
  if (!individual) return [];

  const remediations: Remediation[] = [];
  for (const commit of commits) {
    remediations.push(...individualRemediations(commit));
    if (thirdParty) {
      remediations.push(...thirdPartyRemediations(commit));
    }
  }
  return remediations;
}

function individualRemediations(commit: Commit): Remediation[] {
  const remediations: Remediation[] = [];

  for (const match of commit.message.matchAll(INDIVIDUAL_REMEDIATION_REGEX)) {
    const [, name, email, targetSha] = match;
    if (!name || !email || !targetSha) continue;

    const declarant = { name, email };
    if (matchesAuthorOrCommitter(declarant, commit)) {
      remediations.push({ declarant, targetSha, kind: 'individual' });
    }
  }

  return remediations;
}

function thirdPartyRemediations(commit: Commit): Remediation[] {
  const remediations: Remediation[] = [];

  for (const match of commit.message.matchAll(THIRD_PARTY_REMEDIATION_REGEX)) {
    const [, declName, declEmail, repName, repEmail, targetSha] = match;
    if (!declName || !declEmail || !repName || !repEmail || !targetSha) continue;

    if (matchesAuthorOrCommitter({ name: repName, email: repEmail }, commit)) {
      remediations.push({
        declarant: { name: declName, email: declEmail },
        targetSha,
        kind: 'third_party',
      });
    }
  }

  return remediations;
}

/**
 * Check if any remediation targets the commit and was declared by its author or committer.
 */
export function remediationsMatch(remediations: Remediation[], commit: Commit): boolean {
  return remediations.some(
    (remediation) => remediation.targetSha === commit.sha && matchesAuthorOrCommitter(remediation.declarant, commit),
  );
}
