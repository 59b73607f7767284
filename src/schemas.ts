import { z } from 'zod';

/** Schema for the repository configuration file (.github/dco.yml) */
export const RepoConfigSchema = z.object({
  allowRemediationCommits: z
    .object({
      individual: z.boolean().optional(),
      thirdParty: z.boolean().optional(),
    })
    .optional(),
  require: z
    .object({
      members: z.boolean().optional(),
    })
    .optional(),
});

/** Repository configuration as written by the repository owners (every field optional) */
export type RepoConfig = z.infer<typeof RepoConfigSchema>;

/*
 * Webhook payloads. Only the fields the app reads are declared; unknown keys are
 * stripped. Actions the app does not handle collapse to 'other'.
 */

const other = z.string().transform((): 'other' => 'other');

const InstallationSchema = z.object({ id: z.number().int() });

const RepositorySchema = z.object({
  name: z.string(),
  owner: z.object({ login: z.string() }),
});

export const CheckRunEventSchema = z.object({
  action: z.union([z.enum(['requested_action']), other]),
  check_run: z.object({ head_sha: z.string() }),
  installation: InstallationSchema,
  repository: RepositorySchema,
  requested_action: z.object({ identifier: z.string() }).nullish(),
});

export const MergeGroupEventSchema = z.object({
  action: z.union([z.enum(['checks_requested']), other]),
  installation: InstallationSchema,
  merge_group: z.object({
    head_commit: z.object({ id: z.string() }),
  }),
  repository: RepositorySchema,
});

export const PullRequestEventSchema = z.object({
  action: z.union([z.enum(['opened', 'synchronize']), other]),
  installation: InstallationSchema,
  organization: z.object({ login: z.string() }).nullish(),
  pull_request: z.object({
    base: z.object({ ref: z.string(), sha: z.string() }),
    head: z.object({ ref: z.string(), sha: z.string() }),
  }),
  repository: RepositorySchema,
});

export type CheckRunEvent = z.infer<typeof CheckRunEventSchema>;
export type MergeGroupEvent = z.infer<typeof MergeGroupEventSchema>;
export type PullRequestEvent = z.infer<typeof PullRequestEventSchema>;

/** A parsed webhook delivery the app knows how to handle */
export type Event =
  | { name: 'check_run'; payload: CheckRunEvent }
  | { name: 'merge_group'; payload: MergeGroupEvent }
  | { name: 'pull_request'; payload: PullRequestEvent };
