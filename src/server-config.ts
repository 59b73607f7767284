import { readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';

/** Prefix of the environment variables overriding the configuration file */
export const ENV_PREFIX = 'SIGNOFF_CHECK_';

/** Separator of nested keys in environment variable names */
const ENV_NESTING_SEPARATOR = '__';

const GitHubAppConfigSchema = z.object({
  apiHost: z.url().optional(),
  appId: z.coerce.number().int().positive(),
  privateKey: z.string().min(1),
  webhookSecret: z.string().min(1),
});

export const ServerConfigSchema = z.object({
  githubApp: GitHubAppConfigSchema,
  logFormat: z.enum(['json', 'pretty']),
  serverAddr: z.string().regex(/^[^\s:]*:\d{1,5}$/, 'expected host:port'),
});

export type GitHubAppConfig = z.infer<typeof GitHubAppConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;

const DEFAULTS = {
  logFormat: 'json',
  serverAddr: 'localhost:9000',
};

type Document = Record<string, unknown>;

function isDocument(value: unknown): value is Document {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** snake_case or SCREAMING_SNAKE to camelCase (GITHUB_APP -> githubApp); camelCase keys are kept */
function camelCase(key: string): string {
  if (!key.includes('_') && key !== key.toUpperCase()) return key;
  return key.toLowerCase().replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

/**
 * Merge `source` into `target` recursively. Keys are normalized to camelCase so
 * `github_app` in a file and `GITHUB_APP` in the environment land on the same key.
 */
function merge(target: Document, source: Document): Document {
  for (const [rawKey, value] of Object.entries(source)) {
    const key = camelCase(rawKey);
    const existing = target[key];
    if (isDocument(value)) {
      target[key] = merge(isDocument(existing) ? existing : {}, value);
    } else {
      target[key] = value;
    }
  }
  return target;
}

/**
 * Collect the configuration overrides found in the environment.
 * `SIGNOFF_CHECK_GITHUB_APP__APP_ID=1` becomes `{ githubApp: { appId: '1' } }`.
 */
export function envOverrides(env: NodeJS.ProcessEnv): Document {
  const overrides: Document = {};

  for (const [name, value] of Object.entries(env)) {
    if (!name.startsWith(ENV_PREFIX) || value === undefined) continue;

    const path = name.slice(ENV_PREFIX.length).split(ENV_NESTING_SEPARATOR).map(camelCase);
    const leaf = path.pop();
    if (!leaf) continue;

    let node = overrides;
    for (const segment of path) {
      const child = node[segment];
      node = isDocument(child) ? child : (node[segment] = {});
    }
    node[leaf] = value;
  }

  return overrides;
}

/**
 * Load the server configuration: defaults, then the YAML file (if any), then
 * environment overrides. The result is validated; every problem is reported at once.
 */
export function loadServerConfig(configFile?: string, env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const document: Document = merge({}, DEFAULTS);

  if (configFile !== undefined) {
    let content: unknown;
    try {
      content = yaml.load(readFileSync(configFile, 'utf-8'));
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`error reading configuration file ${configFile}`, [reason]);
    }
    if (content !== undefined && content !== null) {
      if (!isDocument(content)) {
        throw new ConfigError(`configuration file ${configFile} must contain a mapping`);
      }
      merge(document, content);
    }
  }

  merge(document, envOverrides(env));

  const result = ServerConfigSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`);
    throw new ConfigError('invalid server configuration', issues);
  }
  return result.data;
}

/**
 * Split a `host:port` address.
 */
export function parseServerAddr(addr: string): { host: string; port: number } {
  const separator = addr.lastIndexOf(':');
  return {
    host: addr.slice(0, separator),
    port: Number.parseInt(addr.slice(separator + 1), 10),
  };
}
