import crypto from 'crypto';
import { normalizeAccountAddress, signingKeyBytes, type OfferRecord } from '../../domain/offerRecord.js';
import type { AccountLookup } from '../../infra/aptos/accountClient.js';

export type ClaimWallet = {
  address: string;
  name: string;
};

export type ClaimResult = {
  message: string;
  signature: string;
};

// PKCS#8 DER header for a raw 32-byte Ed25519 seed.
const ED25519_PKCS8_PREFIX = Buffer.from('302e020100300506032b657004220420', 'hex');

export function ed25519PrivateKey(seed: Buffer): crypto.KeyObject {
  if (seed.length !== 32) throw new Error(`Ed25519 seed must be 32 bytes, got ${seed.length}`);
  return crypto.createPrivateKey({
    key: Buffer.concat([ED25519_PKCS8_PREFIX, seed]),
    format: 'der',
    type: 'pkcs8',
  });
}

export function buildClaimMessage(offer: OfferRecord, walletAddress: string, sequenceNumber: bigint): string {
  return [
    'nft_offer',
    offer.slug,
    normalizeAccountAddress(offer.moduleAddress),
    normalizeAccountAddress(walletAddress),
    sequenceNumber.toString(),
  ].join(':');
}

/**
 * Produces the issuer's authorization for a wallet to mint the offer's NFT.
 * The wallet submits the mint itself; this never touches the chain beyond the account lookup.
 */
export class NftClaimer {
  constructor(private readonly accounts: AccountLookup) {}

  public async claimNft(params: { offer: OfferRecord; wallet: ClaimWallet }): Promise<ClaimResult> {
    const { offer, wallet } = params;
    const address = normalizeAccountAddress(wallet.address);
    // Sequence number binds the signature to the wallet's current state.
    const sequenceNumber = await this.accounts.getSequenceNumber(offer.network, address);

    const message = Buffer.from(buildClaimMessage(offer, address, sequenceNumber), 'utf8');
    const signature = crypto.sign(null, message, ed25519PrivateKey(signingKeyBytes(offer)));

    return {
      message: `0x${message.toString('hex')}`,
      signature: `0x${signature.toString('hex')}`,
    };
  }
}
