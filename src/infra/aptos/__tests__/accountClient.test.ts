import http from 'http';
import type { AddressInfo } from 'net';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AccountNotFoundError, AptosAccountClient, AptosNodeError } from '../accountClient.js';

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('AptosAccountClient', () => {
  let client: AptosAccountClient;

  beforeEach(() => {
    fetchMock.mockReset();
    client = new AptosAccountClient({
      nodeUrls: {
        devnet: 'http://devnet.node.test/',
        testnet: 'http://testnet.node.test',
        mainnet: 'http://mainnet.node.test',
      },
      timeoutMs: 1000,
      fetchImpl: fetchMock,
    });
  });

  it('reads the sequence number from the network the offer lives on', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(200, { sequence_number: '7', authentication_key: '0x1f' }));

    await expect(client.getSequenceNumber('devnet', '0x1f')).resolves.toBe(7n);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://devnet.node.test/v1/accounts/0x1f');
  });

  it('uses the per-network node url', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(200, { sequence_number: '0' }));

    await expect(client.getSequenceNumber('testnet', '0x2')).resolves.toBe(0n);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://testnet.node.test/v1/accounts/0x2');
  });

  it('maps 404 to AccountNotFoundError', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(404, { error_code: 'account_not_found' }));

    const err = await client.getSequenceNumber('devnet', '0x1f').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AccountNotFoundError);
    expect(err).toMatchObject({ code: 'account_not_found', network: 'devnet', address: '0x1f' });
  });

  it('surfaces other failures as AptosNodeError', async () => {
    fetchMock.mockResolvedValueOnce(new Response('boom', { status: 503 }));

    const err = await client.getSequenceNumber('devnet', '0x1f').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AptosNodeError);
    expect(err).toMatchObject({ status: 503, message: 'Aptos devnet node returned 503: boom' });
  });

  it('wraps transport errors', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(client.getSequenceNumber('mainnet', '0x1')).rejects.toThrow(
      'Aptos mainnet node request failed: TypeError: fetch failed'
    );
  });

  it('rejects a body that is not json', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }));

    const err = await client.getSequenceNumber('devnet', '0x1').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AptosNodeError);
    expect(err).toMatchObject({ status: 200 });
  });

  it('rejects payloads without a sequence number', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(200, { sequence_number: 7 }));

    await expect(client.getSequenceNumber('devnet', '0x1')).rejects.toBeInstanceOf(AptosNodeError);
  });
});

describe('AptosAccountClient against a stalling node', () => {
  let server: http.Server;
  let nodeUrl: string;

  beforeEach(async () => {
    // Headers and half a body, then nothing.
    server = http.createServer((_req, res) => {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.write('{"sequence_number":');
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
    const address: AddressInfo | string | null = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no port');
    nodeUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  it('times out while reading the body', async () => {
    const client = new AptosAccountClient({
      nodeUrls: { devnet: nodeUrl, testnet: nodeUrl, mainnet: nodeUrl },
      timeoutMs: 100,
    });

    const err = await client.getSequenceNumber('devnet', '0x1f').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AptosNodeError);
    expect(err).toMatchObject({ message: 'Aptos devnet node timed out after 100ms' });
  });
});
