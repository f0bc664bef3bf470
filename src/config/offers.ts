import type { Network } from '../domain/offerRecord.js';

export type OfferDefinition = {
  slug: string;
  network: Network;
  /** Env var holding the minting module address. */
  moduleAddressEnv: string;
  /** Env var holding the issuer's signing key. Never logged. */
  signingKeyEnv: string;
};

export const OFFER_CATALOG: readonly OfferDefinition[] = [
  {
    slug: 'aptos-zero',
    network: 'devnet',
    moduleAddressEnv: 'APTOS_ZERO_NFT_MODULE_ADDRESS',
    signingKeyEnv: 'APTOS_ZERO_NFT_PRIVATE_KEY',
  },
];
