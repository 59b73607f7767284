import { execFileSync } from 'node:child_process';
import type { PrereqFailure } from './types.js';

/**
 * Check what the CLI needs to talk to GitHub and collect failures.
 *
 * A token in GH_TOKEN or GITHUB_TOKEN is enough. Otherwise the gh CLI must be
 * installed and authenticated. Returns an empty array when all checks pass.
 */
export function checkPrerequisites(env: NodeJS.ProcessEnv = process.env): PrereqFailure[] {
  if (env.GH_TOKEN || env.GITHUB_TOKEN) {
    return [];
  }

  const failures: PrereqFailure[] = [];
  const whichCmd = process.platform === 'win32' ? 'where' : 'which';

  try {
    execFileSync(whichCmd, ['gh'], { stdio: 'pipe' });
  } catch {
    failures.push({
      name: 'gh',
      message: 'gh CLI not found and no GH_TOKEN set',
      help: 'Install it (https://cli.github.com) or export GH_TOKEN',
    });
    return failures;
  }

  try {
    execFileSync('gh', ['auth', 'status'], { stdio: 'pipe' });
  } catch {
    failures.push({
      name: 'gh-auth',
      message: 'gh CLI is not authenticated',
      help: 'Run: gh auth login',
    });
  }

  return failures;
}
