import { execFileSync } from 'node:child_process';
import { Octokit, type RestEndpointMethodTypes } from '@octokit/rest';
import { createAppAuth } from '@octokit/auth-app';
import { CONFIG_FILE_PATH, parseRepoConfig } from './repo-config.js';
import { ConfigError } from './errors.js';
import type { GitHubAppConfig } from './server-config.js';
import type { CheckRun, Commit, Ctx, PullRequestData, PullRequestRef, RepoConfig, User } from './types.js';

const USER_AGENT = 'signoff-check';

/** Commits requested per page from the compare API */
const COMPARE_PAGE_SIZE = 100;

type CompareCommit =
  RestEndpointMethodTypes['repos']['compareCommitsWithBasehead']['response']['data']['commits'][number];

/**
 * Operations the check needs from GitHub. Implemented by `OctokitGitHubClient`
 * in production and by an in-memory fake in tests.
 */
export interface GitHubClient {
  /** Commits between two shas, oldest first */
  compareCommits(ctx: Ctx, baseSha: string, headSha: string): Promise<Commit[]>;
  /** Repository configuration, or null when the repository has none */
  getConfig(ctx: Ctx): Promise<RepoConfig | null>;
  isOrganizationMember(ctx: Ctx, org: string, username: string): Promise<boolean>;
  createCheckRun(ctx: Ctx, checkRun: CheckRun): Promise<void>;
}

/**
 * Get a GitHub auth token from the environment or, failing that, the gh CLI.
 */
function getGitHubToken(): string {
  const envToken = process.env.GH_TOKEN ?? process.env.GITHUB_TOKEN;
  if (envToken) return envToken;

  const token = execFileSync('gh', ['auth', 'token'], {
    encoding: 'utf-8',
    stdio: ['pipe', 'pipe', 'pipe'],
  }).trim();

  if (!token) {
    throw new Error('gh auth token returned empty string');
  }

  return token;
}

/**
 * Create an Octokit instance authenticated with a personal token.
 * Used by the CLI; the server authenticates as a GitHub App instead.
 */
export function createOctokit(): Octokit {
  const token = getGitHubToken();
  return new Octokit({ auth: token, userAgent: USER_AGENT });
}

/**
 * Build a function returning an Octokit instance authenticated as the given
 * installation of the GitHub App. Instances are reused per installation so
 * installation tokens are cached between deliveries.
 */
export function createAppOctokitFactory(app: GitHubAppConfig): (ctx: Ctx) => Octokit {
  const instances = new Map<number, Octokit>();

  return (ctx) => {
    if (ctx.installationId === undefined) {
      throw new Error(`no installation id for ${ctx.owner}/${ctx.repo}`);
    }

    let octokit = instances.get(ctx.installationId);
    if (!octokit) {
      octokit = new Octokit({
        authStrategy: createAppAuth,
        auth: {
          appId: app.appId,
          privateKey: app.privateKey,
          installationId: ctx.installationId,
        },
        baseUrl: app.apiHost,
        userAgent: USER_AGENT,
      });
      instances.set(ctx.installationId, octokit);
    }
    return octokit;
  };
}

function hasStatus(error: unknown, status: number): boolean {
  return typeof error === 'object' && error !== null && 'status' in error && error.status === status;
}

function accountOf(account: object | null | undefined): { login?: string; isBot: boolean } {
  if (!account || !('login' in account) || typeof account.login !== 'string') {
    return { isBot: false };
  }
  return { login: account.login, isBot: 'type' in account && account.type === 'Bot' };
}

function gitUser(
  identity: { name?: string; email?: string } | null | undefined,
  account: object | null | undefined,
): User | undefined {
  if (!identity) return undefined;
  const { login, isBot } = accountOf(account);
  return {
    name: identity.name ?? '',
    email: identity.email ?? '',
    isBot,
    ...(login !== undefined ? { login } : {}),
  };
}

/**
 * Convert a commit from the compare API into a `Commit`.
 */
export function toCommit(c: CompareCommit): Commit {
  const author = gitUser(c.commit.author, c.author);
  const committer = gitUser(c.commit.committer, c.committer);
  const verified = c.commit.verification?.verified;

  return {
    sha: c.sha,
    message: c.commit.message,
    isMerge: c.parents.length > 1,
    htmlUrl: c.html_url,
    ...(author ? { author } : {}),
    ...(committer ? { committer } : {}),
    ...(verified !== undefined ? { verified } : {}),
  };
}

/**
 * `GitHubClient` implementation on top of Octokit's REST API.
 */
export class OctokitGitHubClient implements GitHubClient {
  private readonly octokitFor: (ctx: Ctx) => Octokit;

  constructor(octokitFor: (ctx: Ctx) => Octokit) {
    this.octokitFor = octokitFor;
  }

  async compareCommits(ctx: Ctx, baseSha: string, headSha: string): Promise<Commit[]> {
    const octokit = this.octokitFor(ctx);
    const commits: Commit[] = [];

    for (let page = 1; ; page++) {
      const response = await octokit.repos.compareCommitsWithBasehead({
        owner: ctx.owner,
        repo: ctx.repo,
        basehead: `${baseSha}...${headSha}`,
        per_page: COMPARE_PAGE_SIZE,
        page,
      });
      const batch = response.data.commits;
      commits.push(...batch.map(toCommit));
      if (batch.length < COMPARE_PAGE_SIZE || commits.length >= response.data.total_commits) {
        break;
      }
    }

    return commits;
  }

  async getConfig(ctx: Ctx): Promise<RepoConfig | null> {
    const octokit = this.octokitFor(ctx);

    const response = await octokit.repos
      .getContent({ owner: ctx.owner, repo: ctx.repo, path: CONFIG_FILE_PATH })
      .catch((error: unknown) => {
        if (hasStatus(error, 404)) return null;
        throw error;
      });
    if (response === null) return null;

    const { data } = response;
    if (Array.isArray(data) || data.type !== 'file' || !('content' in data)) {
      throw new ConfigError(`${CONFIG_FILE_PATH} is not a file`);
    }

    // Content is base64 with embedded newlines, which Buffer ignores
    return parseRepoConfig(Buffer.from(data.content, 'base64').toString('utf-8'));
  }

  async isOrganizationMember(ctx: Ctx, org: string, username: string): Promise<boolean> {
    const octokit = this.octokitFor(ctx);
    try {
      const response = await octokit.orgs.checkMembershipForUser({ org, username });
      return response.status === 204;
    } catch (error: unknown) {
      if (hasStatus(error, 404)) return false;
      throw error;
    }
  }

  async createCheckRun(ctx: Ctx, checkRun: CheckRun): Promise<void> {
    const octokit = this.octokitFor(ctx);
    await octokit.checks.create({
      owner: ctx.owner,
      repo: ctx.repo,
      name: checkRun.name,
      head_sha: checkRun.headSha,
      status: checkRun.status,
      conclusion: checkRun.conclusion,
      started_at: checkRun.startedAt.toISOString(),
      completed_at: checkRun.completedAt.toISOString(),
      output: {
        title: checkRun.title,
        summary: checkRun.summary,
      },
      actions: checkRun.actions,
    });
  }
}

/**
 * Fetch the pull request details needed to run the check from the CLI.
 */
export async function fetchPullRequest(octokit: Octokit, ref: PullRequestRef): Promise<PullRequestData> {
  const { data: pr } = await octokit.pulls.get({
    owner: ref.owner,
    repo: ref.repo,
    pull_number: ref.prNumber,
  });

  const owner = pr.base.repo?.owner;
  return {
    number: pr.number,
    title: pr.title,
    author: pr.user?.login ?? 'unknown',
    baseRef: pr.base.ref,
    baseSha: pr.base.sha,
    headRef: pr.head.ref,
    headSha: pr.head.sha,
    ownerLogin: owner?.login ?? ref.owner,
    ...(owner?.type === 'Organization' ? { organization: owner.login } : {}),
  };
}
