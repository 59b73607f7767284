import { describe, it, expect, vi, beforeEach } from 'vitest';
import { sign } from '@octokit/webhooks-methods';
import { handleWebhookRequest, parseEvent, verifySignature, type Headers } from '../src/webhook.js';
import { EventError } from '../src/errors.js';
import { createLogger } from '../src/logger.js';
import { FakeGitHubClient, commit } from './helpers/fake-github.js';

const SECRET = 'test-secret';

const pullRequestPayload = {
  action: 'opened',
  installation: { id: 1 },
  organization: null,
  pull_request: {
    base: { ref: 'main', sha: 'base-sha' },
    head: { ref: 'feature-x', sha: 'head-sha' },
    html_url: 'https://github.com/owner/repo/pull/1',
    title: 'extra fields are ignored',
  },
  repository: { name: 'repo', owner: { login: 'owner' } },
  sender: { login: 'user1' },
};

async function delivery(event: string | undefined, payload: unknown, secret = SECRET): Promise<{ headers: Headers; body: Buffer }> {
  const body = JSON.stringify(payload);
  const headers: Headers = {
    'x-github-delivery': 'delivery-1',
    'x-hub-signature-256': await sign(secret, body),
  };
  if (event !== undefined) headers['x-github-event'] = event;
  return { headers, body: Buffer.from(body) };
}

let client: FakeGitHubClient;
const logger = createLogger({ level: 'error' });

beforeEach(() => {
  client = new FakeGitHubClient();
});

describe('verifySignature', () => {
  it('accepts a valid signature', async () => {
    const signature = await sign(SECRET, 'payload');
    expect(await verifySignature(SECRET, 'payload', signature)).toBe(true);
  });

  it('rejects a signature computed with another secret', async () => {
    const signature = await sign('other-secret', 'payload');
    expect(await verifySignature(SECRET, 'payload', signature)).toBe(false);
  });

  it('rejects a missing or malformed signature', async () => {
    expect(await verifySignature(SECRET, 'payload', undefined)).toBe(false);
    expect(await verifySignature(SECRET, 'payload', 'sha1=abc')).toBe(false);
    expect(await verifySignature(SECRET, 'payload', 'sha256=zz')).toBe(false);
  });
});

describe('parseEvent', () => {
  it('parses a pull request event', () => {
    const event = parseEvent('pull_request', JSON.stringify(pullRequestPayload));
    expect(event.name).toBe('pull_request');
    expect(event.payload.action).toBe('opened');
  });

  it('collapses unknown actions', () => {
    const event = parseEvent('pull_request', JSON.stringify({ ...pullRequestPayload, action: 'closed' }));
    expect(event.payload.action).toBe('other');
  });

  it('does not require the pull request URL', () => {
    const { html_url: _, ...pullRequest } = pullRequestPayload.pull_request;
    const event = parseEvent('pull_request', JSON.stringify({ ...pullRequestPayload, pull_request: pullRequest }));
    expect(event.name).toBe('pull_request');
  });

  it('collapses check run actions other than requested_action', () => {
    const payload = {
      action: 'rerequested',
      check_run: { head_sha: 'head-sha' },
      installation: { id: 1 },
      repository: { name: 'repo', owner: { login: 'owner' } },
    };
    expect(parseEvent('check_run', JSON.stringify(payload)).payload.action).toBe('other');
  });

  it('rejects a missing event name', () => {
    expect(() => parseEvent(undefined, '{}')).toThrow(new EventError('missing_header'));
  });

  it('rejects unsupported events', () => {
    expect(() => parseEvent('push', '{}')).toThrow('unsupported event');
  });

  it('rejects invalid JSON and payloads missing fields', () => {
    expect(() => parseEvent('pull_request', '{')).toThrow('invalid payload');
    expect(() => parseEvent('check_run', JSON.stringify({ action: 'requested_action' }))).toThrow('invalid payload');
  });
});

describe('handleWebhookRequest', () => {
  const deps = () => ({ client, webhookSecret: SECRET, logger });

  it('processes a valid delivery', async () => {
    client.commits = [commit('sha1', 'Test\n\nSigned-off-by: user1 <user1@email.test>')];
    const { headers, body } = await delivery('pull_request', pullRequestPayload);

    expect(await handleWebhookRequest(deps(), headers, body)).toEqual({ status: 200, body: '' });
    expect(client.checkRuns[0]?.checkRun.conclusion).toBe('success');
  });

  it('rejects an invalid signature', async () => {
    const { headers, body } = await delivery('pull_request', pullRequestPayload, 'other-secret');

    expect(await handleWebhookRequest(deps(), headers, body)).toEqual({ status: 400, body: 'no valid signature found' });
    expect(client.checkRuns).toEqual([]);
  });

  it('rejects a delivery without signature', async () => {
    const { body } = await delivery('pull_request', pullRequestPayload);
    const response = await handleWebhookRequest(deps(), { 'x-github-event': 'pull_request' }, body);
    expect(response.status).toBe(400);
  });

  it('rejects a delivery without event header', async () => {
    const { headers, body } = await delivery(undefined, pullRequestPayload);
    expect(await handleWebhookRequest(deps(), headers, body)).toEqual({ status: 400, body: 'event header missing' });
  });

  it('rejects an invalid payload', async () => {
    const { headers, body } = await delivery('pull_request', { action: 'opened' });
    expect(await handleWebhookRequest(deps(), headers, body)).toEqual({ status: 400, body: 'invalid payload' });
  });

  it('acknowledges unsupported events without doing anything', async () => {
    const { headers, body } = await delivery('push', { ref: 'refs/heads/main' });
    expect(await handleWebhookRequest(deps(), headers, body)).toEqual({ status: 200, body: '' });
    expect(client.checkRuns).toEqual([]);
  });

  it('answers 500 when processing fails', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    client.failures.compareCommits = new Error('Not Found');
    const { headers, body } = await delivery('pull_request', pullRequestPayload);

    expect(await handleWebhookRequest(deps(), headers, body)).toEqual({ status: 500, body: '' });
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain(
      '"msg":"error processing event","eventId":"delivery-1","event":"pull_request","error":"error getting pull request commits: Not Found"',
    );
    errorSpy.mockRestore();
  });
});
