import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  formatDuration,
  printCheckSummary,
  printCommitResults,
  printDebug,
  printErrors,
  printPullRequestSummary,
} from '../src/output.js';
import { effectiveConfig } from '../src/repo-config.js';
import type { CheckOutput, PullRequestData } from '../src/types.js';
import { commit } from './helpers/fake-github.js';

const mockPR: PullRequestData = {
  number: 42,
  title: 'Add feature X',
  author: 'testauthor',
  baseRef: 'main',
  baseSha: 'base-sha',
  headRef: 'feature-x',
  headSha: 'head-sha',
  ownerLogin: 'owner',
};

function checkOutput(failing: boolean): CheckOutput {
  return {
    commits: [
      { commit: commit('abcdef123456', 'First commit'), errors: [], successReason: 'valid_signoff' },
      failing
        ? { commit: commit('0123456789ab', 'Second commit'), errors: ['signoff_mismatch'] }
        : { commit: commit('0123456789ab', 'Second commit'), errors: [], successReason: 'is_merge' },
    ],
    config: effectiveConfig(),
    headRef: 'feature-x',
    numCommitsWithErrors: failing ? 1 : 0,
    onlyLastCommitContainsErrors: failing,
  };
}

let logSpy: ReturnType<typeof vi.spyOn>;
let errorSpy: ReturnType<typeof vi.spyOn>;

beforeEach(() => {
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  logSpy.mockRestore();
  errorSpy.mockRestore();
});

function printed(spy: ReturnType<typeof vi.spyOn>): string {
  return spy.mock.calls.map((c) => String(c[0] ?? '')).join('\n');
}

describe('printPullRequestSummary', () => {
  it('prints the title, number, author and branches', () => {
    printPullRequestSummary(mockPR);
    const output = printed(logSpy);
    expect(output).toContain('Add feature X');
    expect(output).toContain('#42');
    expect(output).toContain('testauthor');
    expect(output).toContain('feature-x -> main');
  });
});

describe('printErrors', () => {
  it('prints each failure with its help to stderr', () => {
    printErrors([{ name: 'gh', message: 'gh CLI not found and no GH_TOKEN set', help: 'Install it' }]);
    const output = printed(errorSpy);
    expect(output).toContain('gh CLI not found and no GH_TOKEN set');
    expect(output).toContain('Install it');
    expect(logSpy).not.toHaveBeenCalled();
  });
});

describe('printDebug', () => {
  it('prefixes the message', () => {
    printDebug('Check: 1.2s');
    expect(printed(logSpy)).toContain('[debug] Check: 1.2s');
  });
});

describe('formatDuration', () => {
  it('formats seconds under a minute', () => {
    expect(formatDuration(1234)).toBe('1.2s');
    expect(formatDuration(0)).toBe('0.0s');
  });

  it('formats minutes and seconds', () => {
    expect(formatDuration(72_000)).toBe('1m 12s');
    expect(formatDuration(60_000)).toBe('1m 0s');
  });
});

describe('printCheckSummary', () => {
  it('reports a passing check', () => {
    printCheckSummary(checkOutput(false));
    const output = printed(logSpy);
    expect(output).toContain('DCO check passed');
    expect(output).toContain('(2 commits checked)');
  });

  it('reports the number of failing commits', () => {
    printCheckSummary(checkOutput(true));
    expect(printed(logSpy)).toContain('DCO check failed: 1 commit with errors');
  });
});

describe('printCommitResults', () => {
  it('prints the success reason of passing commits', () => {
    printCommitResults(checkOutput(false));
    const output = printed(logSpy);
    expect(output).toContain('abcdef1');
    expect(output).toContain('First commit');
    expect(output).toContain('-- valid sign-off found');
    expect(output).toContain('-- merge commit');
  });

  it('prints the errors of failing commits', () => {
    printCommitResults(checkOutput(true));
    const output = printed(logSpy);
    expect(output).toContain('Second commit');
    expect(output).toContain('sign-off not matching author or committer');
  });
});
