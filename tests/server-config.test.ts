import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { envOverrides, loadServerConfig, parseServerAddr } from '../src/server-config.js';
import { ConfigError } from '../src/errors.js';

const APP_ENV = {
  SIGNOFF_CHECK_GITHUB_APP__APP_ID: '1',
  SIGNOFF_CHECK_GITHUB_APP__PRIVATE_KEY: 'test-key',
  SIGNOFF_CHECK_GITHUB_APP__WEBHOOK_SECRET: 'test-secret',
};

let dir: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), 'signoff-check-config-'));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeConfig(name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content);
  return path;
}

describe('envOverrides', () => {
  it('nests keys on double underscores and camel cases them', () => {
    expect(
      envOverrides({
        SIGNOFF_CHECK_GITHUB_APP__APP_ID: '1',
        SIGNOFF_CHECK_LOG_FORMAT: 'pretty',
        OTHER_VARIABLE: 'ignored',
      }),
    ).toEqual({ githubApp: { appId: '1' }, logFormat: 'pretty' });
  });
});

describe('loadServerConfig', () => {
  it('loads the configuration from the environment with defaults', () => {
    expect(loadServerConfig(undefined, APP_ENV)).toEqual({
      githubApp: { appId: 1, privateKey: 'test-key', webhookSecret: 'test-secret' },
      logFormat: 'json',
      serverAddr: 'localhost:9000',
    });
  });

  it('loads the configuration from a YAML file', () => {
    const file = writeConfig(
      'config.yml',
      [
        'githubApp:',
        '  apiHost: https://github.example.test/api/v3',
        '  appId: 2',
        '  privateKey: test-key',
        '  webhookSecret: test-secret',
        'logFormat: pretty',
        'serverAddr: 0.0.0.0:8080',
      ].join('\n'),
    );

    expect(loadServerConfig(file, {})).toEqual({
      githubApp: {
        apiHost: 'https://github.example.test/api/v3',
        appId: 2,
        privateKey: 'test-key',
        webhookSecret: 'test-secret',
      },
      logFormat: 'pretty',
      serverAddr: '0.0.0.0:8080',
    });
  });

  it('accepts snake case keys in the file', () => {
    const file = writeConfig(
      'snake.yml',
      ['github_app:', '  app_id: 3', '  private_key: test-key', '  webhook_secret: test-secret'].join('\n'),
    );
    expect(loadServerConfig(file, {}).githubApp.appId).toBe(3);
  });

  it('lets the environment override the file', () => {
    const file = writeConfig(
      'override.yml',
      ['githubApp:', '  appId: 2', '  privateKey: test-key', '  webhookSecret: test-secret', 'serverAddr: 0.0.0.0:8080'].join('\n'),
    );

    const config = loadServerConfig(file, { SIGNOFF_CHECK_SERVER_ADDR: ':9100', SIGNOFF_CHECK_GITHUB_APP__APP_ID: '7' });
    expect(config.serverAddr).toBe(':9100');
    expect(config.githubApp.appId).toBe(7);
    expect(config.githubApp.privateKey).toBe('test-key');
  });

  it('reports every invalid field', () => {
    let error: unknown;
    try {
      loadServerConfig(undefined, {
        ...APP_ENV,
        SIGNOFF_CHECK_GITHUB_APP__APP_ID: 'abc',
        SIGNOFF_CHECK_LOG_FORMAT: 'xml',
        SIGNOFF_CHECK_SERVER_ADDR: 'localhost',
      });
    } catch (e: unknown) {
      error = e;
    }

    expect(error).toBeInstanceOf(ConfigError);
    const issues = error instanceof ConfigError ? error.issues : [];
    expect([...new Set(issues.map((issue) => issue.split(':')[0]))]).toEqual(['githubApp.appId', 'logFormat', 'serverAddr']);
    expect(issues).toContain('serverAddr: expected host:port');
  });

  it('requires the GitHub App settings', () => {
    expect(() => loadServerConfig(undefined, {})).toThrow(/^invalid server configuration: githubApp: /);
  });

  it('rejects a missing file', () => {
    expect(() => loadServerConfig(join(dir, 'missing.yml'), APP_ENV)).toThrow(ConfigError);
  });

  it('rejects a file that is not a mapping', () => {
    const file = writeConfig('list.yml', '- a\n- b\n');
    expect(() => loadServerConfig(file, APP_ENV)).toThrow(`configuration file ${file} must contain a mapping`);
  });
});

describe('parseServerAddr', () => {
  it('splits host and port', () => {
    expect(parseServerAddr('localhost:9000')).toEqual({ host: 'localhost', port: 9000 });
  });

  it('allows an empty host', () => {
    expect(parseServerAddr(':9100')).toEqual({ host: '', port: 9100 });
  });
});
