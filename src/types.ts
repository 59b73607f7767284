import type { RepoConfig } from './schemas.js';

/** Reference to a GitHub pull request, parsed from a URL or shorthand */
export interface PullRequestRef {
  owner: string;
  repo: string;
  prNumber: number;
}

/** Target of a GitHub API request */
export interface Ctx {
  owner: string;
  repo: string;
  /** GitHub App installation; absent when the client runs with a personal token */
  installationId?: number;
}

/** Git identity attached to a commit, enriched with the GitHub account when known */
export interface User {
  name: string;
  email: string;
  isBot: boolean;
  login?: string;
}

/** A commit of a pull request, as returned by the compare API */
export interface Commit {
  sha: string;
  author?: User;
  committer?: User;
  message: string;
  isMerge: boolean;
  verified?: boolean;
  htmlUrl?: string;
}

/** Repository configuration with every default applied */
export interface EffectiveConfig {
  allowRemediationCommits: {
    individual: boolean;
    thirdParty: boolean;
  };
  require: {
    members: boolean;
  };
}

export type { RepoConfig };

/** Sign-off line found in a commit message */
export interface SignOff {
  name: string;
  email: string;
}

/** Statement in a commit message adding a sign-off to another commit */
export interface Remediation {
  declarant: Pick<User, 'name' | 'email'>;
  targetSha: string;
  kind: 'individual' | 'third_party';
}

export type CommitError =
  | 'invalid_author_email'
  | 'invalid_committer_email'
  | 'signoff_mismatch'
  | 'signoff_not_found';

export type CommitSuccessReason =
  | 'is_merge'
  | 'from_bot'
  | 'from_member'
  | 'valid_signoff'
  | 'valid_signoff_in_remediation_commit';

/** Reasons a commit is exempt from the sign-off requirement */
export type SkipReason = Extract<CommitSuccessReason, 'is_merge' | 'from_bot' | 'from_member'>;

export type SkipDecision = { skip: true; reason: SkipReason } | { skip: false };

export interface CheckInput {
  commits: Commit[];
  config: EffectiveConfig;
  headRef: string;
  /** Logins exempt from signing off (only consulted when members are not required to) */
  members: string[];
}

export interface CommitCheckOutput {
  commit: Commit;
  errors: CommitError[];
  successReason?: CommitSuccessReason;
}

export interface CheckOutput {
  commits: CommitCheckOutput[];
  config: EffectiveConfig;
  headRef: string;
  numCommitsWithErrors: number;
  onlyLastCommitContainsErrors: boolean;
}

export type CheckRunConclusion = 'success' | 'action_required';

export interface CheckRunAction {
  label: string;
  description: string;
  identifier: string;
}

/** A completed check run, ready to be submitted */
export interface CheckRun {
  name: string;
  headSha: string;
  status: 'completed';
  conclusion: CheckRunConclusion;
  title: string;
  summary: string;
  actions: CheckRunAction[];
  startedAt: Date;
  completedAt: Date;
}

/** Pull request details needed to run the check outside a webhook delivery */
export interface PullRequestData {
  number: number;
  title: string;
  author: string;
  baseRef: string;
  baseSha: string;
  headRef: string;
  headSha: string;
  ownerLogin: string;
  organization?: string;
}

/** A prerequisite check failure with actionable help */
export interface PrereqFailure {
  name: string;
  message: string;
  help: string;
}
