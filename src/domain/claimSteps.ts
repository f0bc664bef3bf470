export type ClaimStepName = 'sign_in' | 'connect_wallet' | 'claim_nft';

export type ClaimStep = {
  name: ClaimStepName;
  completed: boolean;
  disabled: boolean;
};

export type ClaimProgress = {
  signedIn: boolean;
  walletConnected: boolean;
};

const MINTED_TXN_RE = /^0x[0-9a-f]{64}$/;

/** The front end redirects back with `?txn=<hash>` once the mint transaction is submitted. */
export function parseMintedTransactionHash(txn: unknown): string | null {
  return typeof txn === 'string' && MINTED_TXN_RE.test(txn) ? txn : null;
}

export function buildClaimSteps(progress: ClaimProgress): ClaimStep[] {
  const steps: ClaimStep[] = [
    { name: 'sign_in', completed: progress.signedIn, disabled: false },
    { name: 'connect_wallet', completed: progress.signedIn && progress.walletConnected, disabled: false },
    { name: 'claim_nft', completed: false, disabled: false },
  ];

  // Everything after the first incomplete step stays locked.
  const firstIncomplete = steps.findIndex(step => !step.completed);
  if (firstIncomplete >= 0) {
    for (const step of steps.slice(firstIncomplete + 1)) step.disabled = true;
  }
  return steps;
}
