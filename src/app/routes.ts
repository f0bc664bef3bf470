import type { Express } from 'express';
import express from 'express';
import { z } from 'zod';
import { hasValidBearer, makeBearerAuth } from './middleware/auth.js';
import type { NftClaimer } from './handlers/nftClaimer.js';
import { buildClaimSteps, parseMintedTransactionHash } from '../domain/claimSteps.js';
import { AccountAddressSchema, WalletAddressSchema, toPublicOffer, type OfferRecord } from '../domain/offerRecord.js';
import { OfferNotFoundError, type OfferRegistry } from '../domain/offerRegistry.js';
import { AccountNotFoundError, AptosNodeError } from '../infra/aptos/accountClient.js';
import type { Logger } from '../utils/logger.js';

export type RouteDeps = {
  registry: OfferRegistry;
  claimer: NftClaimer;
  apiToken: string;
  logger: Logger;
};

const ClaimRequestSchema = z.object({
  walletAddress: WalletAddressSchema,
  walletName: z.string().trim().min(1).max(64),
});

export function registerRoutes(app: Express, deps: RouteDeps): void {
  const { registry, claimer, logger } = deps;
  const authMiddleware = makeBearerAuth(deps.apiToken);

  // One claim per (offer, wallet) at a time.
  const inFlightClaims = new Set<string>();

  app.use(express.json({ limit: '16kb' }));

  app.get('/health', (_req, res) => {
    res.status(200).json({ ok: true, ts: Date.now() });
  });

  app.get('/nft-offers/:slug', (req, res) => {
    let offer: OfferRecord;
    try {
      offer = registry.resolve(req.params.slug);
    } catch (err) {
      if (err instanceof OfferNotFoundError) return res.status(404).json({ error: err.code });
      throw err;
    }

    const transactionHash = parseMintedTransactionHash(req.query.txn);
    if (transactionHash) {
      return res.status(200).json({ status: 'minted', offer: toPublicOffer(offer), transactionHash });
    }

    const signedIn = hasValidBearer(req, deps.apiToken);
    const walletConnected = AccountAddressSchema.safeParse(req.query.wallet).success;
    res.status(200).json({
      status: 'claimable',
      offer: toPublicOffer(offer),
      steps: buildClaimSteps({ signedIn, walletConnected }),
    });
  });

  app.patch('/nft-offers/:slug', authMiddleware, async (req, res, next) => {
    let offer: OfferRecord;
    try {
      offer = registry.resolve(req.params.slug);
    } catch (err) {
      if (err instanceof OfferNotFoundError) return res.status(404).json({ error: err.code });
      return next(err);
    }

    const parsed = ClaimRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'invalid_payload', issues: parsed.error.issues });
    }

    const wallet = { address: parsed.data.walletAddress, name: parsed.data.walletName };
    const claimKey = `${offer.slug}:${wallet.address}`;
    if (inFlightClaims.has(claimKey)) {
      return res.status(409).json({ error: 'claim_in_progress' });
    }
    inFlightClaims.add(claimKey);

    try {
      const result = await claimer.claimNft({ offer, wallet });
      logger.info('offer_claim_signed', { slug: offer.slug, network: offer.network, wallet: wallet.address });
      return res.status(200).json({
        wallet_name: wallet.name,
        module_address: offer.moduleAddress,
        message: result.message,
        signature: result.signature,
      });
    } catch (err) {
      if (err instanceof AccountNotFoundError) {
        logger.info('offer_claim_account_missing', { slug: offer.slug, wallet: wallet.address });
        return res.status(422).json({ error: err.code });
      }
      if (err instanceof AptosNodeError) {
        logger.warn('offer_claim_node_error', { slug: offer.slug, status: err.status, err: err.message });
        return res.status(502).json({ error: err.code });
      }
      logger.error('offer_claim_failed', { slug: offer.slug, err: String(err) });
      return res.status(500).json({ error: 'internal_error' });
    } finally {
      inFlightClaims.delete(claimKey);
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'not_found' });
  });
}
