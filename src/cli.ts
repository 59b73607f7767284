#!/usr/bin/env node
import { Command } from 'commander';
import pc from 'picocolors';
import { parsePullRequestRef } from './url-parser.js';
import { checkPrerequisites } from './prerequisites.js';
import { createOctokit, fetchPullRequest, OctokitGitHubClient } from './github.js';
import { runCheck } from './event.js';
import { logger } from './logger.js';
import { loadServerConfig, type ServerConfig } from './server-config.js';
import { startServer } from './server.js';
import {
  printCheckSummary,
  printCommitResults,
  printDebug,
  printErrors,
  printProgress,
  printProgressDone,
  printPullRequestSummary,
  formatDuration,
} from './output.js';
import {
  EXIT_API_ERROR,
  EXIT_CONFIG_ERROR,
  EXIT_INVALID_URL,
  EXIT_PREREQ,
  EXIT_SERVER_ERROR,
  ConfigError,
  describeError,
  sanitizeError,
} from './errors.js';
import type { CheckOutput, PullRequestData } from './types.js';

const program = new Command();

program
  .name('signoff-check')
  .description('Developer Certificate of Origin check for GitHub pull requests')
  .version('0.1.0');

program
  .command('serve')
  .description('Run the GitHub App webhook server')
  .option('-c, --config-file <path>', 'YAML configuration file')
  .action(async (options: { configFile?: string }) => {
    let config: ServerConfig;
    try {
      config = loadServerConfig(options.configFile);
    } catch (error: unknown) {
      console.error(pc.red('✖ ' + sanitizeError(error)));
      process.exit(EXIT_CONFIG_ERROR);
    }

    logger.configure({ format: config.logFormat });
    try {
      await startServer(config);
    } catch (error: unknown) {
      logger.error('server error', { error: describeError(error) });
      process.exit(EXIT_SERVER_ERROR);
    }
  });

program
  .command('check')
  .description('Run the DCO check on a pull request without reporting a check run')
  .argument('<pr>', 'GitHub pull request URL or owner/repo#number')
  .option('--verbose', 'Show debug info: timing and per-commit details')
  .action(async (prInput: string, options: { verbose?: boolean }) => {
    // 1. Check prerequisites (collect all failures, report at once)
    const failures = checkPrerequisites();
    if (failures.length > 0) {
      printErrors(failures);
      process.exit(EXIT_PREREQ);
    }

    // 2. Parse PR reference
    const ref = parsePullRequestRef(prInput);
    if (!ref) {
      console.error(pc.red('✖ Invalid pull request: ' + prInput));
      console.error(pc.dim('  Expected: https://github.com/owner/repo/pull/123 or owner/repo#123'));
      process.exit(EXIT_INVALID_URL);
    }

    // Engine details go through the logger only with --verbose
    logger.configure({ format: 'pretty', level: options.verbose ? 'debug' : 'error' });

    const octokit = createOctokit();
    const client = new OctokitGitHubClient(() => octokit);
    const ctx = { owner: ref.owner, repo: ref.repo };

    // 3. Fetch PR and run the check
    let pr: PullRequestData;
    let output: CheckOutput;
    const start = performance.now();
    try {
      printProgress('Fetching pull request...');
      pr = await fetchPullRequest(octokit, ref);
      printProgressDone();

      printProgress('Checking commits...');
      output = await runCheck(client, ctx, {
        baseSha: pr.baseSha,
        headSha: pr.headSha,
        headRef: pr.headRef,
        ownerLogin: pr.ownerLogin,
        ...(pr.organization !== undefined ? { organization: pr.organization } : {}),
      });
      printProgressDone();
    } catch (error: unknown) {
      console.log(); // newline after progress message
      console.error(pc.red('✖ Failed to check pull request'));
      console.error(pc.dim('  ' + describeError(error)));
      const configFailure = error instanceof ConfigError || (error instanceof Error && error.cause instanceof ConfigError);
      process.exit(configFailure ? EXIT_CONFIG_ERROR : EXIT_API_ERROR);
    }
    if (options.verbose) {
      printDebug(`Check: ${formatDuration(performance.now() - start)}`);
    }

    // 4. Report
    console.log();
    printPullRequestSummary(pr);
    printCheckSummary(output);
    printCommitResults(output);

    process.exitCode = output.numCommitsWithErrors === 0 ? 0 : 1;
  });

await program.parseAsync();
