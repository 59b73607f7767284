import express, { type Express } from 'express';
import type { Server } from 'node:http';
import { createAppOctokitFactory, OctokitGitHubClient } from './github.js';
import { logger } from './logger.js';
import { withMembershipCache } from './membership-cache.js';
import { parseServerAddr, type ServerConfig } from './server-config.js';
import { handleWebhookRequest, type WebhookDeps } from './webhook.js';

/** Largest webhook payload accepted */
const MAX_BODY_SIZE = '25mb';

/**
 * Build the HTTP app: a health check and the GitHub webhook endpoint.
 * The raw body is kept as is, since the signature is computed over it.
 */
export function createApp(deps: WebhookDeps): Express {
  const app = express();

  app.get('/health-check', (_req, res) => {
    res.sendStatus(200);
  });

  app.post('/webhook/github', express.raw({ type: () => true, limit: MAX_BODY_SIZE }), async (req, res, next) => {
    try {
      const body: unknown = req.body;
      const raw = Buffer.isBuffer(body) ? body : Buffer.alloc(0);
      const response = await handleWebhookRequest(deps, req.headers, raw);
      res.status(response.status).send(response.body);
    } catch (error: unknown) {
      next(error);
    }
  });

  return app;
}

/**
 * Start the server and resolve once it has been stopped by SIGINT or SIGTERM.
 */
export async function startServer(config: ServerConfig): Promise<void> {
  const client = withMembershipCache(new OctokitGitHubClient(createAppOctokitFactory(config.githubApp)));
  const app = createApp({ client, webhookSecret: config.githubApp.webhookSecret, logger });
  const { host, port } = parseServerAddr(config.serverAddr);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, host, () => resolve(listening));
    listening.once('error', reject);
  });
  logger.info('server started', { serverAddr: config.serverAddr });

  await new Promise<void>((resolve, reject) => {
    const shutdown = (signal: NodeJS.Signals): void => {
      logger.info('shutting down', { signal });
      server.close((error) => (error ? reject(error) : resolve()));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
  logger.info('server stopped');
}
