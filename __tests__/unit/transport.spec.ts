/**
 * Unit tests for the JSON-RPC transport
 */

import { Keypair } from '@solana/web3.js';
import { FetchLike, JsonRpcTransport, generateRequestId, selectEndpoint } from '../../src/rpc/transport';
import { RpcClient } from '../../src/rpc/client';
import { BalanceSchema } from '../../src/rpc/schemas';
import {
  CancelledError,
  ConnectionFailedError,
  InvalidParameterError,
  OtherError,
  ProtocolError,
  TimeoutError,
  TransactionFailedError,
} from '../../src/errors';
import { MockRpcServer } from '../mocks/rpc-stub';

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const hanging: FetchLike = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
  });

describe('JSON-RPC transport', () => {
  const address = Keypair.generate().publicKey;

  const transportWith = (fetch: FetchLike, timeoutMs?: number): JsonRpcTransport =>
    new JsonRpcTransport({ endpoints: ['http://stub'], fetch, timeoutMs });

  it('should post a JSON-RPC 2.0 request and decode the result', async () => {
    const server = new MockRpcServer().respond('getBalance', { context: { slot: 1 }, value: 42 });
    const rpc = new RpcClient(transportWith(server.fetch));

    expect(await rpc.getBalance(address)).toBe(42);
    expect(server.calls).toEqual([
      { method: 'getBalance', params: [address.toBase58(), { commitment: 'confirmed' }] },
    ]);
  });

  it('should map non-2xx statuses to ConnectionFailedError', async () => {
    const transport = transportWith(async () => new Response('busy', { status: 503 }));

    const failure = transport.send('getBalance', [], BalanceSchema);
    await expect(failure).rejects.toBeInstanceOf(ConnectionFailedError);
    await expect(failure).rejects.toThrow('HTTP 503 from http://stub');
  });

  it('should discard the body of a failed response', async () => {
    const response = new Response('busy', { status: 503 });
    const transport = transportWith(async () => response);

    await expect(transport.send('getBalance', [], BalanceSchema)).rejects.toBeInstanceOf(ConnectionFailedError);
    expect(response.bodyUsed).toBe(true);
  });

  it('should map network failures to ConnectionFailedError', async () => {
    const transport = transportWith(async () => {
      throw new TypeError('fetch failed');
    });

    await expect(transport.send('getBalance', [], BalanceSchema)).rejects.toBeInstanceOf(ConnectionFailedError);
  });

  it('should surface JSON-RPC error objects as ProtocolError with the program detail', async () => {
    const transport = transportWith(async () =>
      jsonResponse({
        jsonrpc: '2.0',
        id: 1,
        error: {
          code: -32002,
          message: 'Transaction simulation failed',
          data: { logs: ['Program log: Error Message: Insufficient balance.'] },
        },
      })
    );

    const failure = transport.send('getBalance', [], BalanceSchema);
    await expect(failure).rejects.toBeInstanceOf(ProtocolError);
    await expect(failure).rejects.toThrow(
      'RPC error -32002: Transaction simulation failed (Insufficient balance)'
    );
  });

  it('should reject a response without a result field', async () => {
    const transport = transportWith(async () => jsonResponse({ jsonrpc: '2.0', id: 1 }));

    await expect(transport.send('getBalance', [], BalanceSchema)).rejects.toThrow('Response missing result field');
  });

  it('should reject results that do not match the schema', async () => {
    const transport = transportWith(async () => jsonResponse({ jsonrpc: '2.0', id: 1, result: { value: 'x' } }));

    const failure = transport.send('getBalance', [], BalanceSchema);
    await expect(failure).rejects.toBeInstanceOf(OtherError);
    await expect(failure).rejects.toThrow('Unexpected getBalance result');
  });

  it('should reject bodies that are not JSON', async () => {
    const transport = transportWith(async () => new Response('<html>', { status: 200 }));

    await expect(transport.send('getBalance', [], BalanceSchema)).rejects.toThrow(
      'Invalid JSON in response to getBalance'
    );
  });

  it('should time out with TimeoutError', async () => {
    const transport = transportWith(hanging, 20);

    await expect(transport.send('getBalance', [], BalanceSchema)).rejects.toBeInstanceOf(TimeoutError);
  });

  it('should report caller aborts as CancelledError', async () => {
    const transport = transportWith(hanging, 5_000);
    const controller = new AbortController();

    const pending = transport.send('getBalance', [], BalanceSchema, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it('should not call fetch when already cancelled', async () => {
    const fetch = jest.fn<Promise<Response>, Parameters<FetchLike>>();
    const controller = new AbortController();
    controller.abort();

    await expect(
      transportWith(fetch).send('getBalance', [], BalanceSchema, { signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('should re-raise sendTransaction RPC errors as TransactionFailedError', async () => {
    const server = new MockRpcServer().on('sendTransaction', () => ({
      error: {
        code: -32002,
        message: 'Transaction simulation failed',
        data: { logs: ['Program log: Error Message: Memo too short.'] },
      },
    }));
    const rpc = new RpcClient(transportWith(server.fetch));

    const failure = rpc.sendTransaction('AAAA');
    await expect(failure).rejects.toBeInstanceOf(TransactionFailedError);
    await expect(failure).rejects.toThrow('Memo too short');
  });

  it('should raise OtherError for a malformed owner key', async () => {
    const server = new MockRpcServer().respond('getAccountInfo', {
      context: { slot: 1 },
      value: { data: ['', 'base64'], owner: 'not-a-key!', lamports: 1, executable: false },
    });
    const rpc = new RpcClient(transportWith(server.fetch));

    const lookup = rpc.getAccountInfo(address);
    await expect(lookup).rejects.toBeInstanceOf(OtherError);
    await expect(lookup).rejects.toThrow('Invalid public key in response: not-a-key!');
  });

  it('should skip malformed program accounts only when asked to', async () => {
    const owner = address.toBase58();
    const account = { data: ['', 'base64'], owner, lamports: 1, executable: false };
    const server = new MockRpcServer().respond('getProgramAccounts', [
      { pubkey: 'bad-key', account },
      { pubkey: owner, account },
    ]);
    const rpc = new RpcClient(transportWith(server.fetch));
    const skipped: string[] = [];

    const accounts = await rpc.getProgramAccounts(address, { onMalformed: (pubkey) => skipped.push(pubkey) });

    expect(accounts.map((entry) => entry.pubkey.toBase58())).toEqual([owner]);
    expect(skipped).toEqual(['bad-key']);
    await expect(rpc.getProgramAccounts(address)).rejects.toThrow('Invalid public key in response: bad-key');
  });

  it('should generate ids that survive JSON', () => {
    for (let i = 0; i < 20; i++) {
      const id = generateRequestId();
      expect(Number.isSafeInteger(id)).toBe(true);
      expect(id).toBeGreaterThanOrEqual(0);
    }
  });

  describe('selectEndpoint', () => {
    const endpoints = ['http://a', 'http://b', 'http://c'];

    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should prefer a non-blank custom endpoint', () => {
      expect(selectEndpoint(endpoints, '  http://custom  ')).toBe('http://custom');
      expect(selectEndpoint(['http://a'], '   ')).toBe('http://a');
    });

    it('should refuse an empty candidate list', () => {
      expect(() => selectEndpoint([])).toThrow(InvalidParameterError);
    });

    it('should try each random source in turn', () => {
      const failing = (): number => {
        throw new Error('no entropy');
      };
      const outOfRange = (): number => 7;

      expect(selectEndpoint(endpoints, undefined, [failing, outOfRange, () => 1])).toBe('http://b');
    });

    it('should fall back to the clock', () => {
      jest.spyOn(Date, 'now').mockReturnValue(5);

      expect(selectEndpoint(endpoints, undefined, [])).toBe('http://c');
    });
  });
});
