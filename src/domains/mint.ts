/**
 * memo-mint: mint with a memo, and the supply-dependent reward schedule
 * @module domains/mint
 */

import { PublicKey, TransactionInstruction } from '@solana/web3.js';
import { createAssociatedTokenAccountIdempotentInstruction } from '@solana/spl-token';
import { utf8Length } from '../codec/borsh.js';
import { STANDARD_MEMO_BOUNDS, validateMemoText } from '../codec/memo.js';
import { parseAddress, mintAuthorityAddress } from '../program/pda.js';
import { TokenAmount } from '../rpc/client.js';
import { MINT_POLICY } from '../tx/compute.js';
import { OperationDescriptor } from '../tx/pipeline.js';
import { DomainContext, ProgramService, SYSVAR_INSTRUCTIONS, payer, readOnly, writable } from './base.js';

export interface SupplyTier {
  /** Inclusive, base units */
  min: bigint;
  /** Exclusive, base units */
  max: bigint;
  /** Whole tokens per mint */
  reward: number;
  label: string;
}

const U64_MAX = 0xffff_ffff_ffff_ffffn;

export const SUPPLY_TIERS: readonly SupplyTier[] = [
  { min: 0n, max: 10n ** 14n, reward: 1, label: '0-100M' },
  { min: 10n ** 14n, max: 10n ** 15n, reward: 0.1, label: '100M-1B' },
  { min: 10n ** 15n, max: 10n ** 16n, reward: 0.01, label: '1B-10B' },
  { min: 10n ** 16n, max: 10n ** 17n, reward: 0.001, label: '10B-100B' },
  { min: 10n ** 17n, max: 10n ** 18n, reward: 0.0001, label: '100B-1T' },
  { min: 10n ** 18n, max: U64_MAX, reward: 0.000001, label: '1T+' },
];

// (supply, percent) pairs; the low tiers get more of the bar
const PROGRESS_BREAKPOINTS: ReadonlyArray<readonly [bigint, number]> = [
  [0n, 0],
  [10n ** 14n, 50],
  [10n ** 15n, 75],
  [10n ** 16n, 87],
  [10n ** 17n, 95],
  [10n ** 18n, 100],
];

export function getCurrentSupplyTier(supply: bigint): SupplyTier {
  const tier = SUPPLY_TIERS.find((candidate) => supply >= candidate.min && supply < candidate.max);
  return tier ?? SUPPLY_TIERS[SUPPLY_TIERS.length - 1];
}

export function calculateMintReward(supply: bigint): number {
  return getCurrentSupplyTier(supply).reward;
}

/**
 * "+1 MEMO", "+0.01 MEMO", "+0.000001 MEMO"
 */
export function formatMintReward(amount: number): string {
  if (Number.isInteger(amount)) {
    return `+${amount} MEMO`;
  }
  if (amount >= 1) {
    return `+${String(amount)} MEMO`;
  }

  let digits = 6;
  if (amount >= 0.1) digits = 1;
  else if (amount >= 0.01) digits = 2;
  else if (amount >= 0.001) digits = 3;
  else if (amount >= 0.0001) digits = 4;
  else if (amount >= 0.00001) digits = 5;

  const trimmed = amount.toFixed(digits).replace(/0+$/, '').replace(/\.$/, '');
  return `+${trimmed} MEMO`;
}

/**
 * Position of `supply` on a 0-100 progress bar, interpolated between breakpoints
 */
export function supplyProgressPercentage(supply: bigint): number {
  for (let i = 0; i < PROGRESS_BREAKPOINTS.length - 1; i++) {
    const [lowerSupply, lowerPercent] = PROGRESS_BREAKPOINTS[i];
    const [upperSupply, upperPercent] = PROGRESS_BREAKPOINTS[i + 1];
    if (supply >= lowerSupply && supply <= upperSupply) {
      const ratio = Number(supply - lowerSupply) / Number(upperSupply - lowerSupply);
      return lowerPercent + ratio * (upperPercent - lowerPercent);
    }
  }
  return 100;
}

export interface SupplyTierInfo {
  supply: bigint;
  tier: SupplyTier;
}

export class MintService extends ProgramService {
  constructor(context: DomainContext) {
    super(context, 'mint');
  }

  /**
   * Mint with a plain-text memo. The user's token account is created in the
   * same transaction when it does not exist yet.
   */
  async buildMint(user: PublicKey, memo: string): Promise<OperationDescriptor> {
    validateMemoText(memo, STANDARD_MEMO_BOUNDS);

    const tokenAccount = this.tokenAccount(user);
    const instructions: TransactionInstruction[] = [];

    const existing = await this.rpc.getAccountInfo(tokenAccount);
    if (!existing) {
      this.logger.info(`Token account ${tokenAccount.toBase58()} missing, adding create instruction`);
      instructions.push(
        createAssociatedTokenAccountIdempotentInstruction(
          user,
          tokenAccount,
          user,
          this.programs.tokenMint,
          this.programs.token2022
        )
      );
    }

    instructions.push(
      this.instruction(this.programs.memoMint, 'process_mint', Buffer.alloc(0), [
        payer(user),
        writable(this.programs.tokenMint),
        readOnly(mintAuthorityAddress(this.programs.memoMint).address),
        writable(tokenAccount),
        readOnly(this.programs.token2022),
        readOnly(SYSVAR_INSTRUCTIONS),
      ])
    );

    return {
      name: 'mint/process_mint',
      policy: MINT_POLICY,
      draft: {
        feePayer: user,
        memo: this.memoInstruction(memo, [user]),
        instructions,
        memoLength: utf8Length(memo),
      },
    };
  }

  async getTokenSupply(): Promise<bigint> {
    const supply = await this.rpc.getTokenSupply(this.programs.tokenMint);
    this.logger.debug(`Current token supply: ${supply.amount}`);
    return supply.amount;
  }

  async getCurrentSupplyTierInfo(): Promise<SupplyTierInfo> {
    const supply = await this.getTokenSupply();
    return { supply, tier: getCurrentSupplyTier(supply) };
  }

  async getCurrentMintRewardFormatted(): Promise<string> {
    return formatMintReward(calculateMintReward(await this.getTokenSupply()));
  }

  /**
   * Memo-token balance of `owner`; zero when the token account does not exist
   */
  async getTokenBalance(owner: string | PublicKey): Promise<TokenAmount> {
    const account = this.tokenAccount(parseAddress(owner));
    const info = await this.rpc.getAccountInfo(account);
    if (!info) {
      return { amount: 0n, decimals: 6, uiAmountString: '0' };
    }
    return this.rpc.getTokenAccountBalance(account);
  }
}
