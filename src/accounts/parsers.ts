/**
 * Decoders for memo program account data
 * @module accounts/parsers
 */

import { PublicKey } from '@solana/web3.js';
import { BorshReader } from '../codec/borsh.js';
import { OtherError } from '../errors.js';
import { Logger, silentLogger } from '../utils/logger.js';

const ACCOUNT_DISCRIMINATOR_LENGTH = 8;
const U64_MAX = (1n << 64n) - 1n;

/** Size of a UserGlobalBurnStats account, discriminator included */
export const USER_BURN_STATS_SIZE = 65;

export interface BlogAccount {
  blogId: bigint;
  creator: PublicKey;
  createdAt: number;
  lastUpdated: number;
  name: string;
  description: string;
  image: string;
  memoCount: bigint;
  burnedAmount: bigint;
  mintedAmount: bigint;
  lastMemoTime: number;
  bump: number;
}

export interface PostAccount {
  postId: bigint;
  creator: PublicKey;
  createdAt: number;
  lastUpdated: number;
  title: string;
  content: string;
  image: string;
  replyCount: bigint;
  burnedAmount: bigint;
  lastReplyTime: number;
  bump: number;
}

export interface ProjectAccount {
  projectId: bigint;
  creator: PublicKey;
  createdAt: number;
  lastUpdated: number;
  name: string;
  description: string;
  image: string;
  website: string;
  tags: string[];
  memoCount: bigint;
  burnedAmount: bigint;
  lastMemoTime: number;
  bump: number;
}

export interface ProfileAccount {
  user: PublicKey;
  username: string;
  image: string;
  createdAt: number;
  lastUpdated: number;
  aboutMe?: string;
  bump: number;
}

export interface UserBurnStats {
  user: PublicKey;
  totalBurned: bigint;
  burnCount: bigint;
  lastBurnTime: number;
  bump: number;
}

/** UserProfile on the memo-token program */
export interface TokenUserProfile {
  user: PublicKey;
  totalMinted: bigint;
  totalBurned: bigint;
  mintCount: bigint;
  burnCount: bigint;
  createdAt: number;
  lastUpdated: number;
  /** Newest burn history account, if any were created */
  burnHistoryIndex?: bigint;
}

export interface GlobalTopBurnIndex {
  totalCount: bigint;
  /** Top burn shard currently being filled */
  currentIndex?: bigint;
}

export interface LeaderboardEntry {
  projectId: bigint;
  burnedAmount: bigint;
  /** 1-based position as stored on-chain */
  rank: number;
}

export interface BurnLeaderboard {
  entries: LeaderboardEntry[];
  totalBurned: bigint;
}

function accountReader(data: Uint8Array): BorshReader {
  const reader = new BorshReader(data);
  reader.skip(ACCOUNT_DISCRIMINATOR_LENGTH, 'discriminator');
  return reader;
}

export function parseBlogAccount(data: Uint8Array): BlogAccount {
  const r = accountReader(data);
  return {
    blogId: r.u64('blogId'),
    creator: r.pubkey('creator'),
    createdAt: r.i64('createdAt'),
    lastUpdated: r.i64('lastUpdated'),
    name: r.string('name'),
    description: r.string('description'),
    image: r.string('image'),
    memoCount: r.u64('memoCount'),
    burnedAmount: r.u64('burnedAmount'),
    mintedAmount: r.u64('mintedAmount'),
    lastMemoTime: r.i64('lastMemoTime'),
    bump: r.u8('bump'),
  };
}

export function parsePostAccount(data: Uint8Array): PostAccount {
  const r = accountReader(data);
  return {
    postId: r.u64('postId'),
    creator: r.pubkey('creator'),
    createdAt: r.i64('createdAt'),
    lastUpdated: r.i64('lastUpdated'),
    title: r.string('title'),
    content: r.string('content'),
    image: r.string('image'),
    replyCount: r.u64('replyCount'),
    burnedAmount: r.u64('burnedAmount'),
    lastReplyTime: r.i64('lastReplyTime'),
    bump: r.u8('bump'),
  };
}

export function parseProjectAccount(data: Uint8Array): ProjectAccount {
  const r = accountReader(data);
  return {
    projectId: r.u64('projectId'),
    creator: r.pubkey('creator'),
    createdAt: r.i64('createdAt'),
    lastUpdated: r.i64('lastUpdated'),
    name: r.string('name'),
    description: r.string('description'),
    image: r.string('image'),
    website: r.string('website'),
    tags: r.stringVec('tags'),
    memoCount: r.u64('memoCount'),
    burnedAmount: r.u64('burnedAmount'),
    lastMemoTime: r.i64('lastMemoTime'),
    bump: r.u8('bump'),
  };
}

export function parseProfileAccount(data: Uint8Array): ProfileAccount {
  const r = accountReader(data);
  return {
    user: r.pubkey('user'),
    username: r.string('username'),
    image: r.string('image'),
    createdAt: r.i64('createdAt'),
    lastUpdated: r.i64('lastUpdated'),
    aboutMe: r.option('aboutMe', (inner) => inner.string('aboutMe')),
    bump: r.u8('bump'),
  };
}

export function parseUserBurnStats(data: Uint8Array): UserBurnStats {
  const r = accountReader(data);
  return {
    user: r.pubkey('user'),
    totalBurned: r.u64('totalBurned'),
    burnCount: r.u64('burnCount'),
    lastBurnTime: r.i64('lastBurnTime'),
    bump: r.u8('bump'),
  };
}

export function parseTokenUserProfile(data: Uint8Array): TokenUserProfile {
  const r = accountReader(data);
  return {
    user: r.pubkey('user'),
    totalMinted: r.u64('totalMinted'),
    totalBurned: r.u64('totalBurned'),
    mintCount: r.u64('mintCount'),
    burnCount: r.u64('burnCount'),
    createdAt: r.i64('createdAt'),
    lastUpdated: r.i64('lastUpdated'),
    burnHistoryIndex: r.option('burnHistoryIndex', (inner) => inner.u64('burnHistoryIndex')),
  };
}

export function parseGlobalTopBurnIndex(data: Uint8Array): GlobalTopBurnIndex {
  const r = accountReader(data);
  return {
    totalCount: r.u64('totalCount'),
    currentIndex: r.option('currentIndex', (inner) => inner.u64('currentIndex')),
  };
}

/**
 * Counter accounts hold the next id as a u64 right after the discriminator
 */
export function parseGlobalCounter(data: Uint8Array): bigint {
  return accountReader(data).u64('counter');
}

/**
 * A short trailing entry ends the list with a warning instead of failing
 * the whole leaderboard.
 */
export function parseBurnLeaderboard(data: Uint8Array, logger: Logger = silentLogger): BurnLeaderboard {
  const r = accountReader(data);
  const count = r.u32('entries.length');
  const entries: LeaderboardEntry[] = [];
  let totalBurned = 0n;

  for (let i = 0; i < count; i++) {
    if (r.remaining < 16) {
      logger.warn(`Leaderboard data too short for entry ${i}, stopping parse`);
      break;
    }
    const projectId = r.u64(`entries[${i}].projectId`);
    const burnedAmount = r.u64(`entries[${i}].burnedAmount`);
    totalBurned = totalBurned + burnedAmount > U64_MAX ? U64_MAX : totalBurned + burnedAmount;
    entries.push({ projectId, burnedAmount, rank: i + 1 });
  }

  return { entries, totalBurned };
}

/**
 * Reject account data not owned by the expected program
 */
export function assertOwner(owner: PublicKey, expected: PublicKey, what: string): void {
  if (!owner.equals(expected)) {
    throw new OtherError(
      `${what} not owned by expected program. Expected: ${expected.toBase58()}, Got: ${owner.toBase58()}`
    );
  }
}
