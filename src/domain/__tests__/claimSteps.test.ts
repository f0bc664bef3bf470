import { describe, it, expect } from 'vitest';
import { buildClaimSteps, parseMintedTransactionHash } from '../claimSteps.js';

describe('parseMintedTransactionHash', () => {
  const hash = `0x${'ab'.repeat(32)}`;

  it('accepts a lower-case 32-byte hash', () => {
    expect(parseMintedTransactionHash(hash)).toBe(hash);
  });

  it('rejects anything else', () => {
    expect(parseMintedTransactionHash(undefined)).toBeNull();
    expect(parseMintedTransactionHash(hash.toUpperCase())).toBeNull();
    expect(parseMintedTransactionHash(hash.slice(0, -2))).toBeNull();
    expect(parseMintedTransactionHash([hash])).toBeNull();
  });
});

describe('buildClaimSteps', () => {
  it('locks every step after sign-in for anonymous visitors', () => {
    expect(buildClaimSteps({ signedIn: false, walletConnected: false })).toEqual([
      { name: 'sign_in', completed: false, disabled: false },
      { name: 'connect_wallet', completed: false, disabled: true },
      { name: 'claim_nft', completed: false, disabled: true },
    ]);
  });

  it('does not count a wallet as connected before sign-in', () => {
    const steps = buildClaimSteps({ signedIn: false, walletConnected: true });
    expect(steps[1]).toEqual({ name: 'connect_wallet', completed: false, disabled: true });
  });

  it('opens wallet connection once signed in', () => {
    expect(buildClaimSteps({ signedIn: true, walletConnected: false })).toEqual([
      { name: 'sign_in', completed: true, disabled: false },
      { name: 'connect_wallet', completed: false, disabled: false },
      { name: 'claim_nft', completed: false, disabled: true },
    ]);
  });

  it('leaves only the claim open when everything else is done', () => {
    expect(buildClaimSteps({ signedIn: true, walletConnected: true })).toEqual([
      { name: 'sign_in', completed: true, disabled: false },
      { name: 'connect_wallet', completed: true, disabled: false },
      { name: 'claim_nft', completed: false, disabled: false },
    ]);
  });
});
