import pc from 'picocolors';
import { COMMIT_ERROR_DESCRIPTIONS, SUCCESS_REASON_DESCRIPTIONS, commitTitle } from './summary.js';
import type { CheckOutput, PrereqFailure, PullRequestData } from './types.js';

/**
 * Print a colored compact pull request header.
 */
export function printPullRequestSummary(pr: PullRequestData): void {
  console.log(pc.bold(pr.title));
  console.log(`${pc.dim(`#${pr.number}`)} ${pc.cyan(pr.author)} ${pc.dim(`${pr.headRef} -> ${pr.baseRef}`)}`);
  console.log();
}

/**
 * Print prerequisite failures as red errors with actionable help.
 */
export function printErrors(failures: PrereqFailure[]): void {
  for (const f of failures) {
    console.error(pc.red(`✖ ${f.message}`));
    console.error(pc.dim(`  ${f.help}`));
  }
}

/**
 * Print a progress message without a trailing newline.
 * Used for "Fetching commits..." where " done" is appended on the same line.
 */
export function printProgress(message: string): void {
  process.stdout.write(message);
}

/**
 * Complete a progress line by printing " done" in green with a newline.
 */
export function printProgressDone(): void {
  console.log(pc.green(' done'));
}

/**
 * Print a [debug] line in dimmed text. Only call when --verbose is active.
 */
export function printDebug(message: string): void {
  console.log(pc.dim(`[debug] ${message}`));
}

/**
 * Format milliseconds as human-readable duration.
 * Under 60s: "1.2s", over 60s: "1m 12s"
 */
export function formatDuration(ms: number): string {
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Print the overall result line: passed, or how many commits failed.
 */
export function printCheckSummary(output: CheckOutput): void {
  const total = output.commits.length;
  const checked = pc.dim(`(${total} commit${total === 1 ? '' : 's'} checked)`);

  if (output.numCommitsWithErrors === 0) {
    console.log(`${pc.green('✔ DCO check passed')} ${checked}`);
    return;
  }

  const failed = output.numCommitsWithErrors;
  console.log(`${pc.red(`✖ DCO check failed: ${failed} commit${failed === 1 ? '' : 's'} with errors`)} ${checked}`);
}

/**
 * Print one line per commit: short sha, title, then errors (red) or the
 * success reason (dim). Empty output for a pull request without commits.
 */
export function printCommitResults(output: CheckOutput): void {
  for (const c of output.commits) {
    const sha = pc.yellow(c.commit.sha.slice(0, 7));
    const title = commitTitle(c.commit.message);

    if (c.errors.length > 0) {
      const errors = c.errors.map((e) => COMMIT_ERROR_DESCRIPTIONS[e]).join(', ');
      console.log(`  ${pc.red('✖')} ${sha} ${title}`);
      console.log(`    ${pc.red(errors)}`);
    } else {
      const reason = c.successReason ? SUCCESS_REASON_DESCRIPTIONS[c.successReason] : 'no issues found';
      console.log(`  ${pc.green('✔')} ${sha} ${title} ${pc.dim(`-- ${reason}`)}`);
    }
  }
}
