import yaml from 'js-yaml';
import { RepoConfigSchema, type RepoConfig } from './schemas.js';
import { ConfigError } from './errors.js';
import type { EffectiveConfig } from './types.js';

/** Path of the configuration file in the repository */
export const CONFIG_FILE_PATH = '.github/dco.yml';

/**
 * Resolve a repository configuration into one with every field set.
 *
 * Defaults: remediation commits (individual and third-party) are not allowed,
 * and organization members are required to sign off.
 */
export function effectiveConfig(config?: RepoConfig | null): EffectiveConfig {
  return {
    allowRemediationCommits: {
      individual: config?.allowRemediationCommits?.individual ?? false,
      thirdParty: config?.allowRemediationCommits?.thirdParty ?? false,
    },
    require: {
      members: config?.require?.members ?? true,
    },
  };
}

/**
 * Parse the YAML content of the configuration file.
 * An empty document is a configuration with nothing set.
 */
export function parseRepoConfig(content: string): RepoConfig {
  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`invalid YAML in ${CONFIG_FILE_PATH}`, [reason]);
  }

  if (document === undefined || document === null) {
    return {};
  }

  const result = RepoConfigSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new ConfigError(`invalid ${CONFIG_FILE_PATH}`, issues);
  }

  return result.data;
}
