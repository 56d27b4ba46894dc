/**
 * memo-token: 9-decimal token with memo-gated mint, burns tracked in shards
 * and optional per-user burn history
 * @module domains/token
 */

import { AccountMeta, PublicKey, TransactionInstruction } from '@solana/web3.js';
import { createAssociatedTokenAccountIdempotentInstruction } from '@solana/spl-token';
import {
  GlobalTopBurnIndex,
  TokenUserProfile,
  parseGlobalTopBurnIndex,
  parseTokenUserProfile,
} from '../accounts/parsers.js';
import { BorshWriter, utf8Length } from '../codec/borsh.js';
import { TOKEN_MEMO_BOUNDS, validateMemoText } from '../codec/memo.js';
import { InvalidParameterError, OtherError } from '../errors.js';
import {
  globalTopBurnIndexAddress,
  latestBurnShardAddress,
  mintAuthorityAddress,
  parseAddress,
  tokenUserProfileAddress,
  topBurnShardAddress,
  userBurnHistoryAddress,
  userTokenAccount,
} from '../program/pda.js';
import { AccountInfo } from '../rpc/client.js';
import {
  ComputePolicy,
  TOKEN_ACCOUNT_POLICY,
  TOKEN_BURN_HISTORY_POLICY,
  TOKEN_BURN_POLICY,
  TOKEN_POLICY,
} from '../tx/compute.js';
import { OperationDescriptor } from '../tx/pipeline.js';
import {
  DomainContext,
  ProgramService,
  SYSTEM_PROGRAM_ID,
  SYSVAR_INSTRUCTIONS,
  payer,
  readOnly,
  writable,
} from './base.js';

/** Base units per whole memo-token token */
export const MEMO_TOKEN_UNIT = 1_000_000_000n;
export const MIN_TOKEN_BURN = MEMO_TOKEN_UNIT;
/** Burns at or above this land in the top burn shards */
export const TOP_BURN_THRESHOLD = 420n * MEMO_TOKEN_UNIT;

/**
 * `{"message":...,"signature":...}`, the message padded with spaces up to
 * the minimum memo length
 */
export function createBurnMemo(message: string, signature: string): string {
  let memo = JSON.stringify({ message, signature });
  const shortBy = TOKEN_MEMO_BOUNDS.min - utf8Length(memo);
  if (shortBy > 0) {
    memo = JSON.stringify({ message: message + ' '.repeat(shortBy), signature });
  }
  validateMemoText(memo, TOKEN_MEMO_BOUNDS);
  return memo;
}

function requireTokenBurn(amount: bigint): void {
  if (amount < MIN_TOKEN_BURN) {
    throw new InvalidParameterError(
      'amount',
      `Burn amount too small. Must be at least ${MIN_TOKEN_BURN / MEMO_TOKEN_UNIT} tokens`
    );
  }
}

export class TokenService extends ProgramService {
  constructor(context: DomainContext) {
    super(context, 'token');
  }

  private get programId(): PublicKey {
    return this.programs.memoToken;
  }

  profileAddress(user: PublicKey): PublicKey {
    return tokenUserProfileAddress(this.programId, user).address;
  }

  burnHistoryAddress(user: PublicKey, index: bigint): PublicKey {
    return userBurnHistoryAddress(this.programId, user, index).address;
  }

  /** Owner's Token-2022 account for the memo-token mint */
  memoTokenAccount(owner: PublicKey): PublicKey {
    return userTokenAccount(owner, this.programs.memoTokenMint, this.programs.token2022);
  }

  buildInitializeUserProfile(user: PublicKey): OperationDescriptor {
    return this.profileOperation(user, 'initialize_user_profile');
  }

  buildCloseUserProfile(user: PublicKey): OperationDescriptor {
    return this.profileOperation(user, 'close_user_profile');
  }

  private profileOperation(user: PublicKey, name: string): OperationDescriptor {
    return {
      name: `token/${name}`,
      policy: TOKEN_ACCOUNT_POLICY,
      draft: {
        feePayer: user,
        instructions: [
          this.instruction(this.programId, name, Buffer.alloc(0), [
            payer(user),
            writable(this.profileAddress(user)),
            readOnly(SYSTEM_PROGRAM_ID),
          ]),
        ],
        memoLength: 0,
      },
    };
  }

  /**
   * Mint with a plain-text memo. Creates the token account when missing and
   * credits the profile when there is one.
   */
  async buildMint(user: PublicKey, memo: string): Promise<OperationDescriptor> {
    validateMemoText(memo, TOKEN_MEMO_BOUNDS);

    const tokenAccount = this.memoTokenAccount(user);
    const instructions: TransactionInstruction[] = [];

    if (!(await this.rpc.getAccountInfo(tokenAccount))) {
      this.logger.info(`Token account ${tokenAccount.toBase58()} missing, adding create instruction`);
      instructions.push(
        createAssociatedTokenAccountIdempotentInstruction(
          user,
          tokenAccount,
          user,
          this.programs.memoTokenMint,
          this.programs.token2022
        )
      );
    }

    const keys: AccountMeta[] = [
      payer(user),
      writable(this.programs.memoTokenMint),
      writable(mintAuthorityAddress(this.programId).address),
      writable(tokenAccount),
      readOnly(this.programs.token2022),
      readOnly(SYSVAR_INSTRUCTIONS),
    ];
    if (await this.getUserProfile(user)) {
      keys.push(writable(this.profileAddress(user)));
    }
    instructions.push(this.instruction(this.programId, 'process_transfer', Buffer.alloc(0), keys));

    return {
      name: 'token/process_transfer',
      policy: TOKEN_POLICY,
      draft: {
        feePayer: user,
        memo: this.memoInstruction(memo, [user]),
        instructions,
        memoLength: utf8Length(memo),
      },
    };
  }

  /**
   * Burn `amount` base units. The shard accounts are always passed; the
   * current top shard and the profile only when they exist.
   */
  async buildBurn(user: PublicKey, amount: bigint, message: string, signature: string): Promise<OperationDescriptor> {
    requireTokenBurn(amount);
    const memo = createBurnMemo(message, signature);

    const [profile, topShard] = await Promise.all([this.getUserProfile(user), this.getCurrentTopBurnShardIndex()]);
    const keys = this.burnKeys(user, topShard);
    if (profile) {
      keys.push(writable(this.profileAddress(user)));
    }

    return this.burnOperation(user, 'process_burn', TOKEN_BURN_POLICY, amount, memo, keys);
  }

  /**
   * Burn and append to the user's newest burn history account, which must
   * already be initialized
   */
  async buildBurnWithHistory(
    user: PublicKey,
    amount: bigint,
    message: string,
    signature: string
  ): Promise<OperationDescriptor> {
    requireTokenBurn(amount);
    const memo = createBurnMemo(message, signature);

    const profile = await this.getUserProfile(user);
    if (!profile) {
      throw new OtherError('User profile must exist for burn with history operation');
    }
    if (profile.burnHistoryIndex === undefined) {
      throw new OtherError('User profile has no burn history index. Please initialize burn history first.');
    }
    const history = this.burnHistoryAddress(user, profile.burnHistoryIndex);
    if (!(await this.fetchOwned(history, this.programId, 'burn history'))) {
      throw new OtherError('Burn history account does not exist. Please initialize burn history first.');
    }

    const keys = this.burnKeys(user, await this.getCurrentTopBurnShardIndex());
    keys.push(writable(this.profileAddress(user)), writable(history));

    return this.burnOperation(user, 'process_burn_with_history', TOKEN_BURN_HISTORY_POLICY, amount, memo, keys);
  }

  private burnKeys(user: PublicKey, topShard: bigint | null): AccountMeta[] {
    const keys: AccountMeta[] = [
      payer(user),
      writable(this.programs.memoTokenMint),
      writable(this.memoTokenAccount(user)),
      readOnly(this.programs.token2022),
      readOnly(SYSVAR_INSTRUCTIONS),
      writable(latestBurnShardAddress(this.programId).address),
      writable(globalTopBurnIndexAddress(this.programId).address),
    ];
    if (topShard !== null) {
      keys.push(writable(topBurnShardAddress(this.programId, topShard).address));
    }
    return keys;
  }

  private burnOperation(
    user: PublicKey,
    name: string,
    policy: ComputePolicy,
    amount: bigint,
    memo: string,
    keys: AccountMeta[]
  ): OperationDescriptor {
    return {
      name: `token/${name}`,
      policy,
      draft: {
        feePayer: user,
        memo: this.memoInstruction(memo, [user]),
        instructions: [
          this.instruction(this.programId, name, new BorshWriter().u64(amount, 'amount').toBuffer(), keys),
        ],
        memoLength: utf8Length(memo),
      },
    };
  }

  /**
   * Open the next burn history account: index 0 for the first, then one
   * past the newest
   */
  async buildInitializeBurnHistory(user: PublicKey): Promise<OperationDescriptor> {
    const profile = await this.getUserProfile(user);
    if (!profile) {
      throw new OtherError('User profile must exist before initializing user burn history');
    }
    const next = profile.burnHistoryIndex === undefined ? 0n : profile.burnHistoryIndex + 1n;
    this.logger.debug(`Initializing burn history ${next} for ${user.toBase58()}`);
    return this.historyOperation(user, 'initialize_burn_history', next);
  }

  /** Close the newest burn history account */
  async buildCloseBurnHistory(user: PublicKey): Promise<OperationDescriptor> {
    const index = await this.getBurnHistoryIndex(user);
    if (index === null) {
      throw new OtherError('User has no user burn history records to close');
    }
    return this.historyOperation(user, 'close_user_burn_history', index);
  }

  private historyOperation(user: PublicKey, name: string, index: bigint): OperationDescriptor {
    return {
      name: `token/${name}`,
      policy: TOKEN_ACCOUNT_POLICY,
      draft: {
        feePayer: user,
        instructions: [
          this.instruction(this.programId, name, Buffer.alloc(0), [
            payer(user),
            writable(this.profileAddress(user)),
            writable(this.burnHistoryAddress(user, index)),
            readOnly(SYSTEM_PROGRAM_ID),
          ]),
        ],
        memoLength: 0,
      },
    };
  }

  async getUserProfile(user: string | PublicKey): Promise<TokenUserProfile | null> {
    const info = await this.fetchOwned(this.profileAddress(parseAddress(user)), this.programId, 'token user profile');
    return info ? parseTokenUserProfile(info.data) : null;
  }

  /** Index of the newest burn history account; null without profile or history */
  async getBurnHistoryIndex(user: string | PublicKey): Promise<bigint | null> {
    const profile = await this.getUserProfile(user);
    return profile?.burnHistoryIndex ?? null;
  }

  async getGlobalTopBurnIndex(): Promise<GlobalTopBurnIndex | null> {
    const info = await this.fetchOwned(
      globalTopBurnIndexAddress(this.programId).address,
      this.programId,
      'global top burn index'
    );
    return info ? parseGlobalTopBurnIndex(info.data) : null;
  }

  async getCurrentTopBurnShardIndex(): Promise<bigint | null> {
    const index = await this.getGlobalTopBurnIndex();
    return index?.currentIndex ?? null;
  }

  // Shard and history layouts belong to the program; these return raw accounts.

  getLatestBurnShard(): Promise<AccountInfo | null> {
    return this.rpc.getAccountInfo(latestBurnShardAddress(this.programId).address);
  }

  getTopBurnShard(index: bigint): Promise<AccountInfo | null> {
    return this.rpc.getAccountInfo(topBurnShardAddress(this.programId, index).address);
  }

  getUserBurnHistory(user: string | PublicKey, index: bigint): Promise<AccountInfo | null> {
    return this.rpc.getAccountInfo(this.burnHistoryAddress(parseAddress(user), index));
  }
}
