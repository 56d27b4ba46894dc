/**
 * memo-burn: plain burns and per-user burn statistics
 * @module domains/burn
 */

import { PublicKey } from '@solana/web3.js';
import { USER_BURN_STATS_SIZE, UserBurnStats, parseUserBurnStats } from '../accounts/parsers.js';
import { BorshWriter } from '../codec/borsh.js';
import { encodeMemo } from '../codec/memo.js';
import { InvalidParameterError } from '../errors.js';
import { ReplayedMemo, RECENT_TRANSACTIONS_LIMIT, recordActor, replaySignatures } from '../history/replay.js';
import { parseAddress } from '../program/pda.js';
import { BURN_POLICY } from '../tx/compute.js';
import { OperationDescriptor } from '../tx/pipeline.js';
import {
  DomainContext,
  ProgramService,
  SYSTEM_PROGRAM_ID,
  SYSVAR_INSTRUCTIONS,
  TOKEN_UNIT,
  payer,
  readOnly,
  requireBurnAmount,
  writable,
} from './base.js';

export const MIN_BURN = TOKEN_UNIT;
export const MAX_BURN_PER_TX = 1_000_000_000_000n * TOKEN_UNIT;

export interface TopBurner {
  user: PublicKey;
  totalBurned: bigint;
  burnCount: bigint;
}

export interface LatestBurn extends ReplayedMemo {
  actor?: string;
}

export class BurnService extends ProgramService {
  constructor(context: DomainContext) {
    super(context, 'burn');
  }

  statsAddress(user: PublicKey): PublicKey {
    return this.burnStats(user);
  }

  /**
   * The memo payload is the raw message; the envelope carries the amount
   */
  buildBurn(user: PublicKey, amount: bigint, message: string): OperationDescriptor {
    requireBurnAmount(amount, MIN_BURN, 'amount');
    if (amount > MAX_BURN_PER_TX) {
      throw new InvalidParameterError(
        'amount',
        `Burn amount too large. Maximum allowed: ${MAX_BURN_PER_TX / TOKEN_UNIT} tokens`
      );
    }

    const memo = encodeMemo(Buffer.from(message, 'utf8'), amount);
    const instruction = this.instruction(
      this.programs.memoBurn,
      'process_burn',
      new BorshWriter().u64(amount, 'amount').toBuffer(),
      [
        payer(user),
        writable(this.programs.tokenMint),
        writable(this.tokenAccount(user)),
        writable(this.burnStats(user)),
        readOnly(this.programs.token2022),
        readOnly(SYSVAR_INSTRUCTIONS),
      ]
    );

    this.logger.info(`Building burn of ${amount / TOKEN_UNIT} tokens for ${user.toBase58()}`);

    return {
      name: 'burn/process_burn',
      policy: BURN_POLICY,
      draft: {
        feePayer: user,
        memo: this.memoInstruction(memo, [user]),
        instructions: [instruction],
        memoLength: memo.length,
      },
    };
  }

  buildInitializeBurnStats(user: PublicKey): OperationDescriptor {
    const instruction = this.instruction(
      this.programs.memoBurn,
      'initialize_user_global_burn_stats',
      Buffer.alloc(0),
      [payer(user), writable(this.burnStats(user)), readOnly(SYSTEM_PROGRAM_ID)]
    );
    return {
      name: 'burn/initialize_user_global_burn_stats',
      policy: BURN_POLICY,
      draft: { feePayer: user, instructions: [instruction], memoLength: 0 },
    };
  }

  async getUserGlobalBurnStats(user: string | PublicKey): Promise<UserBurnStats | null> {
    const key = parseAddress(user);
    const info = await this.fetchOwned(this.burnStats(key), this.programs.memoBurn, 'Burn stats');
    return info ? parseUserBurnStats(info.data) : null;
  }

  /**
   * Burners by total burned, largest first. Accounts with nothing burned
   * are left out.
   */
  async getTopBurners(limit: number): Promise<TopBurner[]> {
    const accounts = await this.rpc.getProgramAccounts(this.programs.memoBurn, {
      dataSize: USER_BURN_STATS_SIZE,
      onMalformed: (pubkey, error) => this.logger.warn(`Skipping malformed burn stats entry ${pubkey}`, error),
    });

    const burners: TopBurner[] = [];
    for (const { pubkey, account } of accounts) {
      try {
        const stats = parseUserBurnStats(account.data);
        if (stats.totalBurned > 0n) {
          burners.push({ user: stats.user, totalBurned: stats.totalBurned, burnCount: stats.burnCount });
        }
      } catch (error) {
        this.logger.warn(`Skipping unreadable burn stats ${pubkey.toBase58()}`, error);
      }
    }

    burners.sort((a, b) => (a.totalBurned === b.totalBurned ? 0 : a.totalBurned > b.totalBurned ? -1 : 1));
    return burners.slice(0, Math.max(0, limit));
  }

  async getLatestBurnSignatures(limit: number): Promise<string[]> {
    const signatures = await this.rpc.getSignaturesForAddress(this.programs.memoBurn, { limit });
    return signatures.map((info) => info.signature);
  }

  /**
   * Most recent burn whose memo decodes to a known record, of any category
   */
  async getLatestBurn(): Promise<LatestBurn | null> {
    const signatures = await this.rpc.getSignaturesForAddress(this.programs.memoBurn, {
      limit: RECENT_TRANSACTIONS_LIMIT,
    });
    const [latest] = replaySignatures(signatures);
    if (!latest) {
      this.logger.info('No decodable burn found in recent transactions');
      return null;
    }
    return { ...latest, actor: recordActor(latest.record) };
  }
}
