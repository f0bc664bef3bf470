import { z } from 'zod';

export const NetworkSchema = z.enum(['devnet', 'testnet', 'mainnet']);

export type Network = z.infer<typeof NetworkSchema>;

export const AccountAddressSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{1,64}$/, 'expected 0x followed by 1-64 hex digits');

/** Long form of an account address: `0x` + 64 lower-case hex digits. `0x1f`, `0x01F` and `0x00..1f` are one account. */
export function normalizeAccountAddress(address: string): string {
  return `0x${address.slice(2).toLowerCase().padStart(64, '0')}`;
}

export const WalletAddressSchema = AccountAddressSchema.transform(normalizeAccountAddress);

// 32-byte Ed25519 seed, hex encoded.
export const SigningKeySchema = z.string().regex(/^0x[0-9a-fA-F]{64}$/, 'expected 0x followed by 64 hex digits');

export const OfferRecordSchema = z.object({
  slug: z.string().min(1),
  network: NetworkSchema,
  moduleAddress: AccountAddressSchema,
  signingKey: SigningKeySchema,
});

export type OfferRecord = Readonly<z.infer<typeof OfferRecordSchema>>;

/** What an offer looks like to anyone outside the issuance flow. */
export type PublicOffer = Omit<OfferRecord, 'signingKey'>;

export function toPublicOffer(offer: OfferRecord): PublicOffer {
  return {
    slug: offer.slug,
    network: offer.network,
    moduleAddress: offer.moduleAddress,
  };
}

export function signingKeyBytes(offer: OfferRecord): Buffer {
  return Buffer.from(offer.signingKey.slice(2), 'hex');
}
