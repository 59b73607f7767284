import { check } from './check.js';
import { newCheckRun } from './check-run.js';
import { withContext } from './errors.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { effectiveConfig } from './repo-config.js';
import { renderSummary } from './summary.js';
import type { GitHubClient } from './github.js';
import type { CheckRunEvent, Event, MergeGroupEvent, PullRequestEvent } from './schemas.js';
import type { CheckOutput, CheckRunAction, Commit, Ctx } from './types.js';

/** Name of the check displayed in GitHub */
export const CHECK_NAME = 'DCO';

export const CHECK_PASSED_TITLE = 'Check passed!';
export const CHECK_FAILED_TITLE = 'Check failed';

/** Identifier of the action that sets the check result to passed */
export const OVERRIDE_ACTION_IDENTIFIER = 'override';
export const OVERRIDE_ACTION_LABEL = 'Set DCO to pass';
export const OVERRIDE_ACTION_DESCRIPTION = 'Manually set DCO check result to passed';
export const OVERRIDE_ACTION_SUMMARY = 'Check result was manually set to passed';

export const MERGE_GROUP_CHECKS_REQUESTED_SUMMARY = 'Check result set to passed for the merge group';

export const OVERRIDE_ACTION: CheckRunAction = {
  label: OVERRIDE_ACTION_LABEL,
  description: OVERRIDE_ACTION_DESCRIPTION,
  identifier: OVERRIDE_ACTION_IDENTIFIER,
};

export interface ProcessEventOptions {
  logger?: Logger;
  now?: () => Date;
}

/** Details of a pull request needed to run the check */
export interface PullRequestTarget {
  baseSha: string;
  headSha: string;
  headRef: string;
  /** Organization owning the repository, if any */
  organization?: string;
  /** Repository owner login (the only trusted member outside organizations) */
  ownerLogin: string;
}

function ctxOf(payload: { installation: { id: number }; repository: { name: string; owner: { login: string } } }): Ctx {
  return {
    owner: payload.repository.owner.login,
    repo: payload.repository.name,
    installationId: payload.installation.id,
  };
}

/**
 * Process a GitHub webhook event, creating a check run when the event calls for one.
 * Events and actions the app does not act on are ignored.
 */
export async function processEvent(client: GitHubClient, event: Event, options: ProcessEventOptions = {}): Promise<void> {
  switch (event.name) {
    case 'check_run':
      return processCheckRunEvent(client, event.payload, options);
    case 'merge_group':
      return processMergeGroupEvent(client, event.payload, options);
    case 'pull_request':
      return processPullRequestEvent(client, event.payload, options);
  }
}

/**
 * Manual override: a maintainer clicked the override action on a failed check run.
 */
async function processCheckRunEvent(client: GitHubClient, event: CheckRunEvent, options: ProcessEventOptions): Promise<void> {
  const now = options.now ?? (() => new Date());
  const startedAt = now();

  if (event.action !== 'requested_action') return;
  if (event.requested_action?.identifier !== OVERRIDE_ACTION_IDENTIFIER) return;

  const checkRun = newCheckRun(
    {
      name: CHECK_NAME,
      headSha: event.check_run.head_sha,
      conclusion: 'success',
      title: OVERRIDE_ACTION_SUMMARY,
      summary: OVERRIDE_ACTION_SUMMARY,
      actions: [],
      startedAt,
      completedAt: now(),
    },
    options.logger,
  );
  await withContext('error creating check run', () => client.createCheckRun(ctxOf(event), checkRun));
}

/**
 * Checks requested for a merge group. The pull requests in the group passed the
 * check before being queued, so the result is set to passed without running it.
 */
async function processMergeGroupEvent(client: GitHubClient, event: MergeGroupEvent, options: ProcessEventOptions): Promise<void> {
  const now = options.now ?? (() => new Date());
  const startedAt = now();

  if (event.action !== 'checks_requested') return;

  const checkRun = newCheckRun(
    {
      name: CHECK_NAME,
      headSha: event.merge_group.head_commit.id,
      conclusion: 'success',
      title: MERGE_GROUP_CHECKS_REQUESTED_SUMMARY,
      summary: MERGE_GROUP_CHECKS_REQUESTED_SUMMARY,
      actions: [],
      startedAt,
      completedAt: now(),
    },
    options.logger,
  );
  await withContext('error creating check run', () => client.createCheckRun(ctxOf(event), checkRun));
}

async function processPullRequestEvent(client: GitHubClient, event: PullRequestEvent, options: ProcessEventOptions): Promise<void> {
  const now = options.now ?? (() => new Date());
  const log = options.logger ?? rootLogger;
  const startedAt = now();

  if (event.action !== 'opened' && event.action !== 'synchronize') return;

  const ctx = ctxOf(event);
  const output = await runCheck(
    client,
    ctx,
    {
      baseSha: event.pull_request.base.sha,
      headSha: event.pull_request.head.sha,
      headRef: event.pull_request.head.ref,
      ownerLogin: event.repository.owner.login,
      ...(event.organization ? { organization: event.organization.login } : {}),
    },
    log,
  );

  const passed = output.numCommitsWithErrors === 0;
  const checkRun = newCheckRun(
    {
      name: CHECK_NAME,
      headSha: event.pull_request.head.sha,
      conclusion: passed ? 'success' : 'action_required',
      title: passed ? CHECK_PASSED_TITLE : CHECK_FAILED_TITLE,
      summary: renderSummary(output),
      actions: passed ? [] : [OVERRIDE_ACTION],
      startedAt,
      completedAt: now(),
    },
    log,
  );
  await withContext('error creating check run', () => client.createCheckRun(ctx, checkRun));
  log.info('check run created', { conclusion: checkRun.conclusion, headSha: checkRun.headSha });
}

/**
 * Fetch everything the check needs for a pull request and run it.
 * Rejects when any fetch fails; nothing is reported in that case.
 */
export async function runCheck(
  client: GitHubClient,
  ctx: Ctx,
  target: PullRequestTarget,
  log: Logger = rootLogger,
): Promise<CheckOutput> {
  const commits = await withContext('error getting pull request commits', () =>
    client.compareCommits(ctx, target.baseSha, target.headSha),
  );

  const config = effectiveConfig(
    await withContext('error getting repository configuration', () => client.getConfig(ctx)),
  );

  let members: string[] = [];
  if (!config.require.members) {
    members = await withContext('error collecting members', () => collectMembers(client, ctx, target, commits));
  }

  const output = check({ commits, config, headRef: target.headRef, members });
  logCheckOutput(output, log);
  return output;
}

/**
 * Logins of the people not required to sign off their commits.
 *
 * For organization repositories these are the organization members among the
 * authors and committers of verified commits; otherwise only the repository owner.
 */
export async function collectMembers(
  client: GitHubClient,
  ctx: Ctx,
  target: PullRequestTarget,
  commits: Commit[],
): Promise<string[]> {
  if (target.organization === undefined) {
    return [target.ownerLogin];
  }

  const candidates = new Set<string>();
  for (const commit of commits) {
    if (commit.verified !== true) continue;
    for (const user of [commit.author, commit.committer]) {
      if (user?.login !== undefined) candidates.add(user.login);
    }
  }

  const members: string[] = [];
  for (const login of candidates) {
    if (await client.isOrganizationMember(ctx, target.organization, login)) {
      members.push(login);
    }
  }
  return members;
}

function logCheckOutput(output: CheckOutput, log: Logger): void {
  if (!log.isEnabled('debug')) return;
  for (const c of output.commits) {
    log.debug('commit processed', {
      sha: c.commit.sha,
      errors: c.errors,
      successReason: c.successReason ?? null,
      author: c.commit.author ?? null,
      committer: c.commit.committer ?? null,
    });
  }
}
