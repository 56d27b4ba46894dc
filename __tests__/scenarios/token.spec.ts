/**
 * Scenario: memo-token profiles, mint, burns and burn history
 */

import { ComputeBudgetInstruction, Keypair, PublicKey, Transaction } from '@solana/web3.js';
import { ASSOCIATED_TOKEN_PROGRAM_ID } from '@solana/spl-token';
import { MemoClient } from '../../src/client';
import { BorshWriter } from '../../src/codec/borsh';
import { instructionDiscriminator } from '../../src/program/discriminator';
import { globalTopBurnIndexAddress, topBurnShardAddress } from '../../src/program/pda';
import { TOP_BURN_THRESHOLD, createBurnMemo } from '../../src/domains/token';
import { KeypairSigner } from '../../src/tx/pipeline';
import { InvalidParameterError, OtherError } from '../../src/errors';
import { MockRpcServer, withDiscriminator } from '../mocks/rpc-stub';

const SIGNATURE = 'placeholder-signature';

function profileData(user: PublicKey, historyIndex?: bigint): Buffer {
  return withDiscriminator(
    new BorshWriter()
      .pubkey(user)
      .u64(10n)
      .u64(5n)
      .u64(2n)
      .u64(1n)
      .i64(1_700_000_000)
      .i64(1_700_000_100)
      .option(historyIndex, (writer, index) => writer.u64(index))
      .u8(254)
      .toBuffer()
  );
}

describe('Scenario: memo token', () => {
  const user = Keypair.generate();
  let server: MockRpcServer;
  let client: MemoClient;
  let programs: MemoClient['network']['programs'];

  beforeEach(() => {
    server = new MockRpcServer();
    client = new MemoClient({ settings: { logLevel: 'none' }, fetch: server.fetch });
    programs = client.network.programs;
  });

  const withProfile = (historyIndex?: bigint): void => {
    server.setAccount(client.token.profileAddress(user.publicKey), profileData(user.publicKey, historyIndex), programs.memoToken);
  };

  describe('burn memo', () => {
    it('should pad short messages with spaces to 69 bytes', () => {
      const memo = createBurnMemo('hi', 'sig');

      expect(memo).toBe(`{"message":"hi${' '.repeat(35)}","signature":"sig"}`);
      expect(Buffer.byteLength(memo)).toBe(69);
    });

    it('should keep long enough memos as they are', () => {
      const message = 'burning tokens for the weekly community memo thread';

      expect(JSON.parse(createBurnMemo(message, SIGNATURE))).toEqual({ message, signature: SIGNATURE });
    });

    it('should reject memos over 700 bytes', () => {
      expect(() => createBurnMemo('a'.repeat(700), 'sig')).toThrow('Memo too long: 732 bytes (max: 700)');
    });
  });

  describe('profile', () => {
    it('should initialize and close the profile with the discriminator alone', () => {
      const init = client.token.buildInitializeUserProfile(user.publicKey);
      const close = client.token.buildCloseUserProfile(user.publicKey);
      const [initIx] = init.draft.instructions;
      const [closeIx] = close.draft.instructions;

      expect(init.draft.memo).toBeUndefined();
      expect(initIx.programId.equals(programs.memoToken)).toBe(true);
      expect(initIx.data.equals(instructionDiscriminator('initialize_user_profile'))).toBe(true);
      expect(closeIx.data.equals(instructionDiscriminator('close_user_profile'))).toBe(true);
      expect(initIx.keys.map((meta) => meta.pubkey.toBase58())).toEqual([
        user.publicKey.toBase58(),
        client.token.profileAddress(user.publicKey).toBase58(),
        '11111111111111111111111111111111',
      ]);
    });

    it('should size an initialize from the fallback when simulation reports no units', async () => {
      server.simulateWith(null).respond('sendTransaction', 'sig-profile');

      const result = await client.submit(client.token.buildInitializeUserProfile(user.publicKey), new KeypairSigner(user));

      expect(result).toEqual({ signature: 'sig-profile', unitLimit: 220_000, simulatedUnits: 200_000 });
      const [send] = server.callsTo('sendTransaction');
      const sent = Transaction.from(Buffer.from(String(send.params[0]), 'base64'));
      expect(sent.instructions).toHaveLength(2);
      expect(ComputeBudgetInstruction.decodeSetComputeUnitLimit(sent.instructions[1]).units).toBe(220_000);
    });

    it('should decode the profile and its burn history index', async () => {
      withProfile(4n);

      const profile = await client.token.getUserProfile(user.publicKey);

      expect(profile?.user.equals(user.publicKey)).toBe(true);
      expect(profile).toMatchObject({
        totalMinted: 10n,
        totalBurned: 5n,
        mintCount: 2n,
        burnCount: 1n,
        createdAt: 1_700_000_000,
        lastUpdated: 1_700_000_100,
        burnHistoryIndex: 4n,
      });
      expect(await client.token.getBurnHistoryIndex(user.publicKey)).toBe(4n);
    });

    it('should report no history index without a profile', async () => {
      expect(await client.token.getUserProfile(user.publicKey)).toBeNull();
      expect(await client.token.getBurnHistoryIndex(user.publicKey)).toBeNull();
    });
  });

  describe('mint', () => {
    const memo = 'm'.repeat(69);

    it('should create the token account and skip the missing profile', async () => {
      const operation = await client.token.buildMint(user.publicKey, memo);
      const [createAta, mint] = operation.draft.instructions;

      expect(createAta.programId.equals(ASSOCIATED_TOKEN_PROGRAM_ID)).toBe(true);
      expect(mint.programId.equals(programs.memoToken)).toBe(true);
      expect(mint.data.equals(instructionDiscriminator('process_transfer'))).toBe(true);
      expect(mint.keys).toHaveLength(6);
      expect(mint.keys[1].pubkey.equals(programs.memoTokenMint)).toBe(true);
      expect(operation.policy.name).toBe('token');
      expect(operation.draft.memoLength).toBe(69);
    });

    it('should credit an existing profile', async () => {
      withProfile();

      const operation = await client.token.buildMint(user.publicKey, memo);
      const mint = operation.draft.instructions[operation.draft.instructions.length - 1];

      expect(mint.keys).toHaveLength(7);
      expect(mint.keys[6].pubkey.equals(client.token.profileAddress(user.publicKey))).toBe(true);
      expect(mint.keys[6].isWritable).toBe(true);
    });

    it('should reject memos outside 69-700 bytes before any RPC call', async () => {
      await expect(client.token.buildMint(user.publicKey, 'm'.repeat(701))).rejects.toThrow(
        'Memo too long: 701 bytes (max: 700)'
      );
      expect(server.calls).toHaveLength(0);
    });
  });

  describe('burn', () => {
    const message = 'a memo token burn message long enough to stand alone';

    it('should pass the shard accounts and the amount', async () => {
      const operation = await client.token.buildBurn(user.publicKey, TOP_BURN_THRESHOLD, message, SIGNATURE);
      const [burn] = operation.draft.instructions;

      expect(operation.name).toBe('token/process_burn');
      expect(operation.policy.name).toBe('token-burn');
      expect(burn.data.subarray(0, 8).equals(instructionDiscriminator('process_burn'))).toBe(true);
      expect(burn.data.readBigUInt64LE(8)).toBe(420_000_000_000n);
      expect(burn.keys).toHaveLength(7);
      expect(burn.keys[6].pubkey.equals(globalTopBurnIndexAddress(programs.memoToken).address)).toBe(true);
      expect(operation.draft.memo?.data.toString('utf8')).toBe(createBurnMemo(message, SIGNATURE));
    });

    it('should add the current top shard and the profile when they exist', async () => {
      withProfile();
      server.setAccount(
        globalTopBurnIndexAddress(programs.memoToken).address,
        withDiscriminator(new BorshWriter().u64(3n).option(2n, (writer, index) => writer.u64(index)).toBuffer()),
        programs.memoToken
      );

      const operation = await client.token.buildBurn(user.publicKey, 1_000_000_000n, message, SIGNATURE);
      const keys = operation.draft.instructions[0].keys.map((meta) => meta.pubkey.toBase58());

      expect(keys).toHaveLength(9);
      expect(keys[7]).toBe(topBurnShardAddress(programs.memoToken, 2n).address.toBase58());
      expect(keys[8]).toBe(client.token.profileAddress(user.publicKey).toBase58());
      expect(await client.token.getCurrentTopBurnShardIndex()).toBe(2n);
    });

    it('should refuse burns under one token', async () => {
      const failure = client.token.buildBurn(user.publicKey, 999_999_999n, message, SIGNATURE);

      await expect(failure).rejects.toBeInstanceOf(InvalidParameterError);
      await expect(failure).rejects.toThrow('Burn amount too small. Must be at least 1 tokens');
    });
  });

  describe('burn history', () => {
    const message = 'burning with a history record attached to my profile';

    it('should require a profile, an index and the history account', async () => {
      const burn = () => client.token.buildBurnWithHistory(user.publicKey, 1_000_000_000n, message, SIGNATURE);

      await expect(burn()).rejects.toThrow('User profile must exist for burn with history operation');
      withProfile();
      await expect(burn()).rejects.toThrow(
        'User profile has no burn history index. Please initialize burn history first.'
      );
      withProfile(4n);
      await expect(burn()).rejects.toThrow(
        'Burn history account does not exist. Please initialize burn history first.'
      );
    });

    it('should append to the newest history account', async () => {
      withProfile(4n);
      const history = client.token.burnHistoryAddress(user.publicKey, 4n);
      server.setAccount(history, withDiscriminator(Buffer.alloc(16)), programs.memoToken);

      const operation = await client.token.buildBurnWithHistory(user.publicKey, 2_000_000_000n, message, SIGNATURE);
      const [burn] = operation.draft.instructions;

      expect(operation.policy.name).toBe('token-burn-history');
      expect(burn.data.subarray(0, 8).equals(instructionDiscriminator('process_burn_with_history'))).toBe(true);
      expect(burn.keys.slice(-2).map((meta) => meta.pubkey.toBase58())).toEqual([
        client.token.profileAddress(user.publicKey).toBase58(),
        history.toBase58(),
      ]);
      expect((await client.token.getUserBurnHistory(user.publicKey, 4n))?.owner.equals(programs.memoToken)).toBe(true);
    });

    it('should initialize the next index', async () => {
      await expect(client.token.buildInitializeBurnHistory(user.publicKey)).rejects.toThrow(
        'User profile must exist before initializing user burn history'
      );

      withProfile();
      const first = await client.token.buildInitializeBurnHistory(user.publicKey);
      expect(first.draft.instructions[0].data.equals(instructionDiscriminator('initialize_burn_history'))).toBe(true);
      expect(first.draft.instructions[0].keys[2].pubkey.equals(client.token.burnHistoryAddress(user.publicKey, 0n))).toBe(
        true
      );

      withProfile(4n);
      const next = await client.token.buildInitializeBurnHistory(user.publicKey);
      expect(next.draft.instructions[0].keys[2].pubkey.equals(client.token.burnHistoryAddress(user.publicKey, 5n))).toBe(
        true
      );
    });

    it('should close the newest history account', async () => {
      await expect(client.token.buildCloseBurnHistory(user.publicKey)).rejects.toBeInstanceOf(OtherError);
      await expect(client.token.buildCloseBurnHistory(user.publicKey)).rejects.toThrow(
        'User has no user burn history records to close'
      );

      withProfile(4n);
      const operation = await client.token.buildCloseBurnHistory(user.publicKey);
      const [close] = operation.draft.instructions;

      expect(close.data.equals(instructionDiscriminator('close_user_burn_history'))).toBe(true);
      expect(close.keys[2].pubkey.equals(client.token.burnHistoryAddress(user.publicKey, 4n))).toBe(true);
      expect(operation.policy.name).toBe('token-account');
    });
  });

  it('should read shard accounts raw and report a missing top burn index as null', async () => {
    expect(await client.token.getLatestBurnShard()).toBeNull();
    expect(await client.token.getTopBurnShard(0n)).toBeNull();
    expect(await client.token.getGlobalTopBurnIndex()).toBeNull();
    expect(await client.token.getCurrentTopBurnShardIndex()).toBeNull();
  });
});
