/**
 * Program-derived addresses for the memo programs
 * @module program/pda
 */

import { PublicKey } from '@solana/web3.js';
import { getAssociatedTokenAddressSync } from '@solana/spl-token';
import { InvalidAddressError, OtherError } from '../errors.js';
import { BorshWriter } from '../codec/borsh.js';

export interface DerivedAddress {
  address: PublicKey;
  bump: number;
}

export function deriveAddress(programId: PublicKey, seeds: Array<Buffer | Uint8Array>): DerivedAddress {
  try {
    const [address, bump] = PublicKey.findProgramAddressSync(seeds, programId);
    return { address, bump };
  } catch (error) {
    throw new OtherError(`Unable to find a viable program address for ${programId.toBase58()}`, error);
  }
}

export function parseAddress(input: string | PublicKey): PublicKey {
  if (input instanceof PublicKey) {
    return input;
  }
  try {
    return new PublicKey(input.trim());
  } catch (error) {
    throw new InvalidAddressError(input, error);
  }
}

function seed(text: string): Buffer {
  return Buffer.from(text, 'utf8');
}

function idSeed(id: bigint): Buffer {
  return new BorshWriter().u64(id, 'id').toBuffer();
}

export const profileAddress = (programId: PublicKey, user: PublicKey): DerivedAddress =>
  deriveAddress(programId, [seed('profile'), user.toBuffer()]);

export const blogCounterAddress = (programId: PublicKey): DerivedAddress =>
  deriveAddress(programId, [seed('global_blog_counter')]);

export const blogAddress = (programId: PublicKey, blogId: bigint): DerivedAddress =>
  deriveAddress(programId, [seed('blog'), idSeed(blogId)]);

export const forumCounterAddress = (programId: PublicKey): DerivedAddress =>
  deriveAddress(programId, [seed('global_counter')]);

export const postAddress = (programId: PublicKey, postId: bigint): DerivedAddress =>
  deriveAddress(programId, [seed('post'), idSeed(postId)]);

export const projectCounterAddress = (programId: PublicKey): DerivedAddress =>
  deriveAddress(programId, [seed('global_counter')]);

export const projectAddress = (programId: PublicKey, projectId: bigint): DerivedAddress =>
  deriveAddress(programId, [seed('project'), idSeed(projectId)]);

export const burnLeaderboardAddress = (programId: PublicKey): DerivedAddress =>
  deriveAddress(programId, [seed('burn_leaderboard')]);

export const userBurnStatsAddress = (burnProgramId: PublicKey, user: PublicKey): DerivedAddress =>
  deriveAddress(burnProgramId, [seed('user_global_burn_stats'), user.toBuffer()]);

export const mintAuthorityAddress = (mintProgramId: PublicKey): DerivedAddress =>
  deriveAddress(mintProgramId, [seed('mint_authority')]);

export const tokenUserProfileAddress = (tokenProgramId: PublicKey, user: PublicKey): DerivedAddress =>
  deriveAddress(tokenProgramId, [seed('user_profile'), user.toBuffer()]);

export const latestBurnShardAddress = (tokenProgramId: PublicKey): DerivedAddress =>
  deriveAddress(tokenProgramId, [seed('latest_burn_shard')]);

export const globalTopBurnIndexAddress = (tokenProgramId: PublicKey): DerivedAddress =>
  deriveAddress(tokenProgramId, [seed('global_top_burn_index')]);

export const topBurnShardAddress = (tokenProgramId: PublicKey, index: bigint): DerivedAddress =>
  deriveAddress(tokenProgramId, [seed('top_burn_shard'), idSeed(index)]);

export const userBurnHistoryAddress = (tokenProgramId: PublicKey, user: PublicKey, index: bigint): DerivedAddress =>
  deriveAddress(tokenProgramId, [seed('burn_history'), user.toBuffer(), idSeed(index)]);

/**
 * Owner's Token-2022 associated account for a memo token mint
 */
export function userTokenAccount(owner: PublicKey, mint: PublicKey, token2022: PublicKey): PublicKey {
  return getAssociatedTokenAddressSync(mint, owner, false, token2022);
}
