/**
 * Shared plumbing for the per-program services
 * @module domains/base
 */

import {
  AccountMeta,
  PublicKey,
  SYSVAR_INSTRUCTIONS_PUBKEY,
  SystemProgram,
  TransactionInstruction,
} from '@solana/web3.js';
import { createMemoInstruction } from '@solana/spl-memo';
import { AccountInfo, RpcClient } from '../rpc/client.js';
import { ProgramIds } from '../config/networks.js';
import { InvalidParameterError } from '../errors.js';
import { assertOwner } from '../accounts/parsers.js';
import { instructionDiscriminator } from '../program/discriminator.js';
import { userBurnStatsAddress, userTokenAccount } from '../program/pda.js';
import { Logger } from '../utils/logger.js';

/** Base units per whole memo token */
export const TOKEN_UNIT = 1_000_000n;

export interface DomainContext {
  rpc: RpcClient;
  programs: ProgramIds;
  logger: Logger;
  /** Parallel reads for bulk queries */
  maxConcurrency: number;
}

export const writable = (pubkey: PublicKey): AccountMeta => ({ pubkey, isSigner: false, isWritable: true });
export const readOnly = (pubkey: PublicKey): AccountMeta => ({ pubkey, isSigner: false, isWritable: false });
export const payer = (pubkey: PublicKey): AccountMeta => ({ pubkey, isSigner: true, isWritable: true });

export const SYSTEM_PROGRAM_ID = SystemProgram.programId;
export const SYSVAR_INSTRUCTIONS = SYSVAR_INSTRUCTIONS_PUBKEY;

/**
 * Enforce a minimum burn and whole-token granularity
 */
export function requireBurnAmount(amount: bigint, minimum: bigint, field: string = 'burnAmount'): void {
  if (amount < minimum) {
    throw new InvalidParameterError(
      field,
      `Burn amount must be at least ${minimum / TOKEN_UNIT} MEMO tokens`
    );
  }
  if (amount % TOKEN_UNIT !== 0n) {
    throw new InvalidParameterError(field, 'Burn amount must be a whole number of tokens');
  }
}

export abstract class ProgramService {
  protected readonly rpc: RpcClient;
  protected readonly programs: ProgramIds;
  protected readonly logger: Logger;
  protected readonly maxConcurrency: number;

  constructor(context: DomainContext, component: string) {
    this.rpc = context.rpc;
    this.programs = context.programs;
    this.logger = context.logger.child(component);
    this.maxConcurrency = context.maxConcurrency;
  }

  protected instruction(
    programId: PublicKey,
    name: string,
    args: Buffer,
    keys: AccountMeta[]
  ): TransactionInstruction {
    return new TransactionInstruction({
      programId,
      keys,
      data: Buffer.concat([instructionDiscriminator(name), args]),
    });
  }

  protected memoInstruction(text: string, signers: PublicKey[]): TransactionInstruction {
    return createMemoInstruction(text, signers);
  }

  protected tokenAccount(owner: PublicKey): PublicKey {
    return userTokenAccount(owner, this.programs.tokenMint, this.programs.token2022);
  }

  protected burnStats(user: PublicKey): PublicKey {
    return userBurnStatsAddress(this.programs.memoBurn, user).address;
  }

  /**
   * Account data, or null when missing. Data owned by another program is
   * rejected.
   */
  protected async fetchOwned(address: PublicKey, owner: PublicKey, what: string): Promise<AccountInfo | null> {
    const info = await this.rpc.getAccountInfo(address);
    if (!info) {
      return null;
    }
    assertOwner(info.owner, owner, what);
    return info;
  }
}
