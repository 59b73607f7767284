import { logger as rootLogger, type Logger } from './logger.js';
import type { CheckRun, CheckRunAction, CheckRunConclusion } from './types.js';

/** Field length limits enforced by the GitHub checks API */
export const MAX_SUMMARY_LENGTH = 65535;
export const MAX_ACTION_LABEL_LENGTH = 20;
export const MAX_ACTION_DESCRIPTION_LENGTH = 40;
export const MAX_ACTION_IDENTIFIER_LENGTH = 20;

export interface NewCheckRunInput {
  name: string;
  headSha: string;
  conclusion: CheckRunConclusion;
  title: string;
  summary: string;
  actions: CheckRunAction[];
  startedAt: Date;
  completedAt: Date;
}

/**
 * Truncate a string to at most `max` characters (code points), without an ellipsis.
 */
export function truncateChars(value: string, max: number): string {
  if (value.length <= max) return value;
  const chars = Array.from(value);
  if (chars.length <= max) return value;
  return chars.slice(0, max).join('');
}

/**
 * Build a completed check run, truncating the fields GitHub limits in length.
 * Truncation is logged as a warning, never an error.
 */
export function newCheckRun(input: NewCheckRunInput, log: Logger = rootLogger): CheckRun {
  const fit = (value: string, max: number, field: string): string => {
    const truncated = truncateChars(value, max);
    if (truncated !== value) {
      log.warn(`check run ${field} truncated`, { max });
    }
    return truncated;
  };

  return {
    name: input.name,
    headSha: input.headSha,
    status: 'completed',
    conclusion: input.conclusion,
    title: input.title,
    summary: fit(input.summary, MAX_SUMMARY_LENGTH, 'summary'),
    actions: input.actions.map((action) => ({
      label: fit(action.label, MAX_ACTION_LABEL_LENGTH, 'action label'),
      description: fit(action.description, MAX_ACTION_DESCRIPTION_LENGTH, 'action description'),
      identifier: fit(action.identifier, MAX_ACTION_IDENTIFIER_LENGTH, 'action identifier'),
    })),
    startedAt: input.startedAt,
    completedAt: input.completedAt,
  };
}
