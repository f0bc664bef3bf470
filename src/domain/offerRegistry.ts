import type { OfferRecord } from './offerRecord.js';

export class OfferNotFoundError extends Error {
  readonly code = 'offer_not_found';

  constructor(readonly slug: string) {
    super(`NFT offer not found: ${slug}`);
    this.name = 'OfferNotFoundError';
  }
}

/**
 * Resolves offer slugs to their issuance records.
 *
 * Built once from the loaded config; lookups never touch the environment.
 */
export class OfferRegistry {
  private readonly offers: ReadonlyMap<string, OfferRecord>;

  constructor(offers: Iterable<OfferRecord>) {
    const bySlug = new Map<string, OfferRecord>();
    for (const offer of offers) {
      if (bySlug.has(offer.slug)) {
        throw new Error(`Duplicate NFT offer slug: ${offer.slug}`);
      }
      bySlug.set(offer.slug, { ...offer });
    }
    this.offers = bySlug;
  }

  public resolve(slug: string): OfferRecord {
    const offer = this.offers.get(slug);
    if (!offer) throw new OfferNotFoundError(slug);
    return Object.freeze({ ...offer });
  }

  public has(slug: string): boolean {
    return this.offers.has(slug);
  }

  public slugs(): string[] {
    return [...this.offers.keys()];
  }
}
