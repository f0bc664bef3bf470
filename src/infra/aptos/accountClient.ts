import { z } from 'zod';
import type { Network } from '../../domain/offerRecord.js';

export class AccountNotFoundError extends Error {
  readonly code = 'account_not_found';

  constructor(
    readonly network: Network,
    readonly address: string
  ) {
    super(`Account ${address} not found on ${network}`);
    this.name = 'AccountNotFoundError';
  }
}

export class AptosNodeError extends Error {
  readonly code = 'node_unavailable';

  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'AptosNodeError';
  }
}

export interface AccountLookup {
  getSequenceNumber(network: Network, address: string): Promise<bigint>;
}

export type AptosAccountClientOptions = {
  nodeUrls: Readonly<Record<Network, string>>;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};

const AccountResourceSchema = z.object({
  sequence_number: z.string().regex(/^\d+$/),
});

/** Minimal fullnode REST client: just enough to confirm a wallet exists before signing for it. */
export class AptosAccountClient implements AccountLookup {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: AptosAccountClientOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  public async getSequenceNumber(network: Network, address: string): Promise<bigint> {
    const url = `${this.opts.nodeUrls[network].replace(/\/+$/, '')}/v1/accounts/${encodeURIComponent(address)}`;

    const ac = new AbortController();
    const timeout = setTimeout(() => ac.abort(), this.opts.timeoutMs);
    const timedOut = () => new AptosNodeError(`Aptos ${network} node timed out after ${this.opts.timeoutMs}ms`);

    // The timer covers the body as well; a node can send headers and then stall.
    try {
      let res: Response;
      try {
        res = await this.fetchImpl(url, { method: 'GET', headers: { Accept: 'application/json' }, signal: ac.signal });
      } catch (err) {
        if (ac.signal.aborted) throw timedOut();
        throw new AptosNodeError(`Aptos ${network} node request failed: ${String(err)}`);
      }

      if (res.status === 404) throw new AccountNotFoundError(network, address);
      if (!res.ok) {
        const text = await res.text().catch(() => '');
        if (ac.signal.aborted) throw timedOut();
        throw new AptosNodeError(`Aptos ${network} node returned ${res.status}: ${text.slice(0, 200)}`, res.status);
      }

      let body: unknown = null;
      try {
        body = await res.json();
      } catch (err) {
        if (ac.signal.aborted) throw timedOut();
        throw new AptosNodeError(`Aptos ${network} node returned unreadable JSON: ${String(err)}`, res.status);
      }

      const parsed = AccountResourceSchema.safeParse(body);
      if (!parsed.success) {
        throw new AptosNodeError(`Aptos ${network} node returned an unexpected account payload`, res.status);
      }
      return BigInt(parsed.data.sequence_number);
    } finally {
      clearTimeout(timeout);
    }
  }
}
