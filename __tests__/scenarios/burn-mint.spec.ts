/**
 * Scenario: plain burns, burn statistics and minting
 */

import { Keypair } from '@solana/web3.js';
import { ASSOCIATED_TOKEN_PROGRAM_ID } from '@solana/spl-token';
import { MemoClient } from '../../src/client';
import { BorshWriter } from '../../src/codec/borsh';
import { decodeMemoText, encodeMemo } from '../../src/codec/memo';
import { encodeRecord } from '../../src/codec/records';
import { instructionDiscriminator } from '../../src/program/discriminator';
import { userTokenAccount } from '../../src/program/pda';
import { KeypairSigner } from '../../src/tx/pipeline';
import { InvalidParameterError } from '../../src/errors';
import { MockRpcServer, withDiscriminator } from '../mocks/rpc-stub';

const MESSAGE = 'burning a little for the memo community today';

function statsData(user: Keypair['publicKey'], totalBurned: bigint): string {
  return withDiscriminator(
    new BorshWriter().pubkey(user).u64(totalBurned).u64(1n).i64(0).u8(255).toBuffer()
  ).toString('base64');
}

describe('Scenario: burn and mint', () => {
  const user = Keypair.generate();
  let server: MockRpcServer;
  let client: MemoClient;

  beforeEach(() => {
    server = new MockRpcServer();
    client = new MemoClient({ settings: { logLevel: 'none' }, fetch: server.fetch });
  });

  describe('burn', () => {
    it('should carry the message in the memo and the amount in the instruction', async () => {
      server.simulateWith(120_000).respond('sendTransaction', 'sig-burn');
      const operation = client.burn.buildBurn(user.publicKey, 3_000_000n, MESSAGE);

      const result = await client.submit(operation, new KeypairSigner(user));

      // burn policy floor
      expect(result.unitLimit).toBe(300_000);
      const memo = operation.draft.memo;
      const envelope = memo ? decodeMemoText(memo.data.toString('utf8')) : undefined;
      expect(envelope?.burnAmount).toBe(3_000_000n);
      expect(envelope?.payload.toString('utf8')).toBe(MESSAGE);

      const [program] = operation.draft.instructions;
      expect(program.data.subarray(0, 8).equals(instructionDiscriminator('process_burn'))).toBe(true);
      expect(program.data.readBigUInt64LE(8)).toBe(3_000_000n);
      expect(program.keys).toHaveLength(6);
    });

    it('should bound the amount', () => {
      expect(() => client.burn.buildBurn(user.publicKey, 999_999n, MESSAGE)).toThrow(InvalidParameterError);
      expect(() => client.burn.buildBurn(user.publicKey, 10n ** 18n + 1_000_000n, MESSAGE)).toThrow(
        'Burn amount too large. Maximum allowed: 1000000000000 tokens'
      );
    });

    it('should rank top burners by total, skipping empty, unreadable and malformed entries', async () => {
      const [a, b, c] = [Keypair.generate(), Keypair.generate(), Keypair.generate()].map((kp) => kp.publicKey);
      const account = (data: string) => ({ data: [data, 'base64'], owner: client.network.programs.memoBurn.toBase58(), lamports: 1, executable: false });
      server.respond('getProgramAccounts', [
        { pubkey: a.toBase58(), account: account(statsData(a, 5_000_000n)) },
        { pubkey: b.toBase58(), account: account(statsData(b, 0n)) },
        { pubkey: c.toBase58(), account: account(statsData(c, 9_000_000n)) },
        { pubkey: c.toBase58(), account: account('AAAA') },
        { pubkey: 'not-a-key!', account: account(statsData(b, 7_000_000n)) },
      ]);

      const top = await client.burn.getTopBurners(10);

      expect(top.map((burner) => [burner.user.toBase58(), burner.totalBurned])).toEqual([
        [c.toBase58(), 9_000_000n],
        [a.toBase58(), 5_000_000n],
      ]);
      expect((await client.burn.getTopBurners(1)).length).toBe(1);
      const [call] = server.callsTo('getProgramAccounts');
      expect(call.params[1]).toEqual({ encoding: 'base64', commitment: 'confirmed', filters: [{ dataSize: 65 }] });
    });

    it('should return the newest decodable burn', async () => {
      const profileMemo = encodeMemo(
        encodeRecord({
          category: 'profile',
          operation: 'create_profile',
          userPubkey: user.publicKey.toBase58(),
          username: 'alice',
          image: '',
        }),
        420_000_000n
      );
      server.respond('getSignaturesForAddress', [
        { signature: 'foreign', slot: 3, err: null, memo: '[5] hello', blockTime: 30 },
        { signature: 'profile', slot: 2, err: null, memo: `[${profileMemo.length}] ${profileMemo}`, blockTime: 20 },
      ]);

      const latest = await client.burn.getLatestBurn();

      expect(latest?.signature).toBe('profile');
      expect(latest?.burnAmount).toBe(420_000_000n);
      expect(latest?.actor).toBe(user.publicKey.toBase58());
      const [listing] = server.callsTo('getSignaturesForAddress');
      expect(listing.params[0]).toBe(client.network.programs.memoBurn.toBase58());
    });

    it('should list the latest burn signatures, newest first', async () => {
      server.respond('getSignaturesForAddress', [
        { signature: 'sig-3', slot: 30, err: null, memo: null, blockTime: 300 },
        { signature: 'sig-2', slot: 20, err: null, memo: null, blockTime: 200 },
      ]);

      expect(await client.burn.getLatestBurnSignatures(2)).toEqual(['sig-3', 'sig-2']);
      const [listing] = server.callsTo('getSignaturesForAddress');
      expect(listing.params).toEqual([
        client.network.programs.memoBurn.toBase58(),
        { commitment: 'confirmed', limit: 2 },
      ]);
    });

    it('should return null stats for a user who never burned', async () => {
      expect(await client.burn.getUserGlobalBurnStats(user.publicKey)).toBeNull();
    });
  });

  describe('mint', () => {
    const memo = 'm'.repeat(69);

    it('should create the token account first when it is missing', async () => {
      const operation = await client.mint.buildMint(user.publicKey, memo);
      const [createAta, mint] = operation.draft.instructions;

      expect(operation.draft.instructions).toHaveLength(2);
      expect(createAta.programId.equals(ASSOCIATED_TOKEN_PROGRAM_ID)).toBe(true);
      expect(mint.data.equals(instructionDiscriminator('process_mint'))).toBe(true);
      expect(operation.draft.memoLength).toBe(69);
      expect(operation.policy.name).toBe('mint');
    });

    it('should skip the create when the token account exists', async () => {
      const { programs } = client.network;
      server.setAccount(
        userTokenAccount(user.publicKey, programs.tokenMint, programs.token2022),
        Buffer.alloc(165),
        programs.token2022
      );

      const operation = await client.mint.buildMint(user.publicKey, memo);

      expect(operation.draft.instructions).toHaveLength(1);
    });

    it('should reject memos outside 69-800 bytes', async () => {
      await expect(client.mint.buildMint(user.publicKey, 'short')).rejects.toThrow(
        'Memo too short: 5 bytes (min: 69)'
      );
      expect(server.calls).toHaveLength(0);
    });

    it('should derive the reward from the current supply', async () => {
      server.respond('getTokenSupply', {
        context: { slot: 1 },
        value: { amount: '250000000000000', decimals: 6, uiAmount: 250_000_000, uiAmountString: '250000000' },
      });

      expect(await client.mint.getCurrentSupplyTierInfo()).toMatchObject({
        supply: 250_000_000_000_000n,
        tier: { label: '100M-1B' },
      });
      expect(await client.mint.getCurrentMintRewardFormatted()).toBe('+0.1 MEMO');
    });

    it('should report a zero balance when the token account is missing', async () => {
      expect((await client.mint.getTokenBalance(user.publicKey)).amount).toBe(0n);
      expect(server.callsTo('getTokenAccountBalance')).toHaveLength(0);
    });
  });
});
