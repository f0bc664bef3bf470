import * as dotenv from 'dotenv';
import { z } from 'zod';
import { OfferRecordSchema, type Network, type OfferRecord } from '../domain/offerRecord.js';
import { OFFER_CATALOG, type OfferDefinition } from './offers.js';

export type Env = Record<string, string | undefined>;

export type AppConfig = Readonly<{
  port: number;
  // Bearer token for claim endpoints. Empty => no auth (local dev only).
  apiToken: string;
  nodeUrls: Readonly<Record<Network, string>>;
  nodeTimeoutMs: number;
  offers: readonly OfferRecord[];
  /** Catalog slugs with no env values at all; they resolve as not found. */
  unconfiguredOffers: readonly string[];
}>;

export class ConfigError extends Error {
  readonly code = 'invalid_config';

  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const EnvSchema = z.object({
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65_535).default(8787)),
  OFFERS_API_TOKEN: z.preprocess(blankToUndefined, z.string().default('')),
  APTOS_NODE_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(5_000)),
  APTOS_DEVNET_NODE_URL: z.preprocess(blankToUndefined, z.string().url().default('https://fullnode.devnet.aptoslabs.com')),
  APTOS_TESTNET_NODE_URL: z.preprocess(
    blankToUndefined,
    z.string().url().default('https://fullnode.testnet.aptoslabs.com')
  ),
  APTOS_MAINNET_NODE_URL: z.preprocess(
    blankToUndefined,
    z.string().url().default('https://fullnode.mainnet.aptoslabs.com')
  ),
});

function readOffer(def: OfferDefinition, env: Env, problems: string[]): OfferRecord | null {
  const moduleAddress = env[def.moduleAddressEnv]?.trim() || '';
  const signingKey = env[def.signingKeyEnv]?.trim() || '';

  if (!moduleAddress && !signingKey) return null;
  if (!moduleAddress) {
    problems.push(`${def.moduleAddressEnv} is required when ${def.signingKeyEnv} is set`);
    return null;
  }
  if (!signingKey) {
    problems.push(`${def.signingKeyEnv} is required when ${def.moduleAddressEnv} is set`);
    return null;
  }

  const parsed = OfferRecordSchema.safeParse({ slug: def.slug, network: def.network, moduleAddress, signingKey });
  if (!parsed.success) {
    const envNames: Record<string, string> = {
      moduleAddress: def.moduleAddressEnv,
      signingKey: def.signingKeyEnv,
    };
    // Messages only; issues never echo the secret back.
    for (const issue of parsed.error.issues) {
      const field = String(issue.path[0] ?? '');
      problems.push(`${envNames[field] ?? `${def.slug}.${field}`}: ${issue.message}`);
    }
    return null;
  }
  return parsed.data;
}

export function loadConfig(env: Env, catalog: readonly OfferDefinition[] = OFFER_CATALOG): AppConfig {
  const problems: string[] = [];

  const parsedEnv = EnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    for (const issue of parsedEnv.error.issues) {
      problems.push(`${issue.path.join('.')}: ${issue.message}`);
    }
  }

  const offers: OfferRecord[] = [];
  const unconfiguredOffers: string[] = [];
  for (const def of catalog) {
    const hasAny = Boolean(env[def.moduleAddressEnv]?.trim() || env[def.signingKeyEnv]?.trim());
    const offer = readOffer(def, env, problems);
    if (offer) offers.push(offer);
    else if (!hasAny) unconfiguredOffers.push(def.slug);
  }

  if (!parsedEnv.success || problems.length > 0) {
    throw new ConfigError(problems);
  }

  const e = parsedEnv.data;
  return Object.freeze({
    port: e.PORT,
    apiToken: e.OFFERS_API_TOKEN,
    nodeUrls: Object.freeze({
      devnet: e.APTOS_DEVNET_NODE_URL,
      testnet: e.APTOS_TESTNET_NODE_URL,
      mainnet: e.APTOS_MAINNET_NODE_URL,
    }),
    nodeTimeoutMs: e.APTOS_NODE_TIMEOUT_MS,
    offers: Object.freeze(offers),
    unconfiguredOffers: Object.freeze(unconfiguredOffers),
  });
}

/** Reads `.env` into process.env, then validates it. Called once at process start. */
export function loadProcessConfig(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
