/**
 * memo-profile: create, update and delete profiles
 * @module domains/profile
 */

import { PublicKey } from '@solana/web3.js';
import { BorshWriter } from '../codec/borsh.js';
import { encodeMemo } from '../codec/memo.js';
import { ProfileCreateRecord, ProfileUpdateRecord, encodeRecord, validateRecord } from '../codec/records.js';
import { ProfileAccount, parseProfileAccount } from '../accounts/parsers.js';
import { parseAddress, profileAddress as deriveProfileAddress } from '../program/pda.js';
import { mapWithConcurrency } from '../query/bulk.js';
import { CONTENT_POLICY } from '../tx/compute.js';
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

/** Both create and update burn at least 420 tokens */
export const MIN_PROFILE_BURN = 420n * TOKEN_UNIT;

export interface CreateProfileInput {
  username: string;
  image: string;
  aboutMe?: string;
}

/**
 * Omitted fields are left unchanged; `aboutMe: null` clears it
 */
export interface UpdateProfileInput {
  username?: string;
  image?: string;
  aboutMe?: string | null;
}

export interface DisplayInfo {
  address: string;
  /** Username, or a shortened address when there is no profile */
  label: string;
  image?: string;
  hasProfile: boolean;
}

export function shortAddress(address: string): string {
  return address.length > 8 ? `${address.slice(0, 4)}...${address.slice(-4)}` : address;
}

export class ProfileService extends ProgramService {
  constructor(context: DomainContext) {
    super(context, 'profile');
  }

  profileAddress(user: PublicKey): PublicKey {
    return deriveProfileAddress(this.programs.memoProfile, user).address;
  }

  buildCreateProfile(user: PublicKey, input: CreateProfileInput, burnAmount: bigint): OperationDescriptor {
    requireBurnAmount(burnAmount, MIN_PROFILE_BURN);

    const record: ProfileCreateRecord = {
      category: 'profile',
      operation: 'create_profile',
      userPubkey: user.toBase58(),
      username: input.username,
      image: input.image,
      aboutMe: input.aboutMe,
    };
    validateRecord(record);
    const memo = encodeMemo(encodeRecord(record), burnAmount);

    const instruction = this.instruction(
      this.programs.memoProfile,
      'create_profile',
      new BorshWriter().u64(burnAmount, 'burnAmount').toBuffer(),
      [
        payer(user),
        writable(this.profileAddress(user)),
        writable(this.programs.tokenMint),
        writable(this.tokenAccount(user)),
        readOnly(this.programs.token2022),
        readOnly(this.programs.memoBurn),
        readOnly(SYSTEM_PROGRAM_ID),
        readOnly(SYSVAR_INSTRUCTIONS),
      ]
    );

    this.logger.info(`Building create_profile for ${user.toBase58()}: ${burnAmount / TOKEN_UNIT} tokens`);

    return {
      name: 'profile/create_profile',
      policy: CONTENT_POLICY,
      draft: {
        feePayer: user,
        memo: this.memoInstruction(memo, []),
        instructions: [instruction],
        memoLength: memo.length,
      },
    };
  }

  buildUpdateProfile(user: PublicKey, input: UpdateProfileInput, burnAmount: bigint): OperationDescriptor {
    requireBurnAmount(burnAmount, MIN_PROFILE_BURN);

    const record: ProfileUpdateRecord = {
      category: 'profile',
      operation: 'update_profile',
      userPubkey: user.toBase58(),
      username: input.username,
      image: input.image,
      aboutMe: input.aboutMe,
    };
    validateRecord(record);
    const memo = encodeMemo(encodeRecord(record), burnAmount);

    const args = new BorshWriter()
      .u64(burnAmount, 'burnAmount')
      .option(input.username, (w, value) => {
        w.string(value);
      })
      .option(input.image, (w, value) => {
        w.string(value);
      })
      .option(input.aboutMe, (w, value) => {
        w.option(value ?? undefined, (inner, text) => {
          inner.string(text);
        });
      })
      .toBuffer();

    const instruction = this.instruction(this.programs.memoProfile, 'update_profile', args, [
      payer(user),
      writable(this.programs.tokenMint),
      writable(this.tokenAccount(user)),
      writable(this.profileAddress(user)),
      readOnly(this.programs.token2022),
      readOnly(SYSVAR_INSTRUCTIONS),
      readOnly(this.programs.memoBurn),
    ]);

    return {
      name: 'profile/update_profile',
      policy: CONTENT_POLICY,
      draft: {
        feePayer: user,
        memo: this.memoInstruction(memo, []),
        instructions: [instruction],
        memoLength: memo.length,
      },
    };
  }

  buildDeleteProfile(user: PublicKey): OperationDescriptor {
    const instruction = this.instruction(this.programs.memoProfile, 'delete_profile', Buffer.alloc(0), [
      payer(user),
      writable(this.profileAddress(user)),
    ]);

    return {
      name: 'profile/delete_profile',
      policy: CONTENT_POLICY,
      draft: { feePayer: user, instructions: [instruction], memoLength: 0 },
    };
  }

  async getProfile(user: string | PublicKey): Promise<ProfileAccount | null> {
    const key = parseAddress(user);
    const info = await this.fetchOwned(this.profileAddress(key), this.programs.memoProfile, 'Profile');
    return info ? parseProfileAccount(info.data) : null;
  }

  /**
   * One entry per input; a failed or missing profile is null
   */
  async getProfilesBatch(users: ReadonlyArray<string | PublicKey>): Promise<Array<ProfileAccount | null>> {
    const settled = await mapWithConcurrency(users, this.maxConcurrency, (user) => this.getProfile(user));
    return settled.map((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        return outcome.value;
      }
      this.logger.warn(`Failed to fetch profile for ${String(users[index])}`, outcome.reason);
      return null;
    });
  }

  async getDisplayInfo(user: string | PublicKey): Promise<DisplayInfo> {
    const [info] = await this.getDisplayInfoBatch([user]);
    return info;
  }

  async getDisplayInfoBatch(users: ReadonlyArray<string | PublicKey>): Promise<DisplayInfo[]> {
    const profiles = await this.getProfilesBatch(users);
    return profiles.map((profile, index) => {
      const raw = users[index];
      const address = typeof raw === 'string' ? raw : raw.toBase58();
      if (profile) {
        return { address, label: profile.username, image: profile.image, hasProfile: true };
      }
      return { address, label: shortAddress(address), hasProfile: false };
    });
  }
}
