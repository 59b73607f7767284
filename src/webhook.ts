import { verify } from '@octokit/webhooks-methods';
import type { ZodType } from 'zod';
import { EventError, describeError } from './errors.js';
import { processEvent } from './event.js';
import { logger as rootLogger, type Logger } from './logger.js';
import {
  CheckRunEventSchema,
  MergeGroupEventSchema,
  PullRequestEventSchema,
  type Event,
} from './schemas.js';
import type { GitHubClient } from './github.js';

/** Header carrying the unique identifier of the delivery */
export const EVENT_ID_HEADER = 'x-github-delivery';

/** Header carrying the HMAC-SHA256 signature of the payload */
export const EVENT_SIGNATURE_HEADER = 'x-hub-signature-256';

/** Header carrying the name of the event */
export const EVENT_NAME_HEADER = 'x-github-event';

export type Headers = Record<string, string | string[] | undefined>;

export interface WebhookDeps {
  client: GitHubClient;
  webhookSecret: string;
  logger?: Logger;
}

export interface WebhookResponse {
  status: number;
  body: string;
}

function header(headers: Headers, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Verify the `sha256=<hex>` signature GitHub computed over the raw request body.
 */
export async function verifySignature(secret: string, body: string, signature: string | undefined): Promise<boolean> {
  if (!signature?.startsWith('sha256=') || !secret) return false;
  try {
    return await verify(secret, body, signature);
  } catch {
    // Malformed signature (bad hex, wrong length)
    return false;
  }
}

function parsePayload<T>(schema: ZodType<T>, body: string): T {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    throw new EventError('invalid_payload');
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    throw new EventError('invalid_payload');
  }
  return result.data;
}

/**
 * Parse a webhook delivery into an event, given the value of the event name header.
 */
export function parseEvent(eventName: string | undefined, body: string): Event {
  switch (eventName) {
    case undefined:
      throw new EventError('missing_header');
    case 'check_run':
      return { name: 'check_run', payload: parsePayload(CheckRunEventSchema, body) };
    case 'merge_group':
      return { name: 'merge_group', payload: parsePayload(MergeGroupEventSchema, body) };
    case 'pull_request':
      return { name: 'pull_request', payload: parsePayload(PullRequestEventSchema, body) };
    default:
      throw new EventError('unsupported_event');
  }
}

/**
 * Handle one webhook delivery: verify it, parse it and process the event.
 *
 * 400 for an invalid signature, a missing event header or an invalid payload;
 * 200 (nothing done) for unsupported events; 500 when processing fails.
 */
export async function handleWebhookRequest(deps: WebhookDeps, headers: Headers, body: Buffer): Promise<WebhookResponse> {
  const eventId = header(headers, EVENT_ID_HEADER);
  const log = (deps.logger ?? rootLogger).child(eventId !== undefined ? { eventId } : {});
  const payload = body.toString('utf-8');

  if (!(await verifySignature(deps.webhookSecret, payload, header(headers, EVENT_SIGNATURE_HEADER)))) {
    log.warn('invalid webhook signature');
    return { status: 400, body: 'no valid signature found' };
  }

  let event: Event;
  try {
    event = parseEvent(header(headers, EVENT_NAME_HEADER), payload);
  } catch (error: unknown) {
    if (error instanceof EventError) {
      if (error.kind === 'unsupported_event') {
        return { status: 200, body: '' };
      }
      log.warn('invalid webhook event', { error: error.message });
      return { status: 400, body: error.message };
    }
    throw error;
  }

  try {
    await processEvent(deps.client, event, { logger: log });
  } catch (error: unknown) {
    log.error('error processing event', { event: event.name, error: describeError(error) });
    return { status: 500, body: '' };
  }

  log.info('event processed successfully', { event: event.name });
  return { status: 200, body: '' };
}
