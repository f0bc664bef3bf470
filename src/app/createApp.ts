import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import type { AppConfig } from '../config/index.js';
import { OfferRegistry } from '../domain/offerRegistry.js';
import { AptosAccountClient, type AccountLookup } from '../infra/aptos/accountClient.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { NftClaimer } from './handlers/nftClaimer.js';
import { registerRoutes } from './routes.js';

export type AppOverrides = {
  accounts?: AccountLookup;
  logger?: Logger;
};

// Shape of body-parser failures (http-errors): a 4xx status plus a machine-readable type.
const ClientErrorSchema = z.object({
  status: z.number().int().min(400).max(499),
  type: z.string().optional(),
});

const CLIENT_ERROR_CODES: Record<string, string> = {
  'entity.parse.failed': 'invalid_json',
  'entity.too.large': 'payload_too_large',
  'encoding.unsupported': 'unsupported_encoding',
  'charset.unsupported': 'unsupported_charset',
};

export function createApp(config: AppConfig, overrides: AppOverrides = {}): { app: Express; registry: OfferRegistry } {
  const logger = overrides.logger ?? defaultLogger;
  const registry = new OfferRegistry(config.offers);
  const accounts =
    overrides.accounts ?? new AptosAccountClient({ nodeUrls: config.nodeUrls, timeoutMs: config.nodeTimeoutMs });

  const app = express();
  app.disable('x-powered-by');
  registerRoutes(app, { registry, claimer: new NftClaimer(accounts), apiToken: config.apiToken, logger });

  // Body-parser rejections keep their status; anything else a route rethrows is a 500.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const clientError = ClientErrorSchema.safeParse(err);
    if (clientError.success) {
      const { status, type } = clientError.data;
      logger.info('request_rejected', { status, type });
      res.status(status).json({ error: (type && CLIENT_ERROR_CODES[type]) || 'bad_request' });
      return;
    }
    logger.error('request_failed', { err: String(err) });
    res.status(500).json({ error: 'internal_error' });
  });

  return { app, registry };
}
