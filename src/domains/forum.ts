/**
 * memo-forum: posts, with burn and mint replies
 * @module domains/forum
 */

import { AccountMeta, PublicKey } from '@solana/web3.js';
import { PostAccount, parsePostAccount } from '../accounts/parsers.js';
import { BorshWriter } from '../codec/borsh.js';
import { validateRecord } from '../codec/records.js';
import { MessagePage } from '../history/replay.js';
import { forumCounterAddress, mintAuthorityAddress, postAddress } from '../program/pda.js';
import { OperationDescriptor } from '../tx/pipeline.js';
import {
  DomainContext,
  SYSTEM_PROGRAM_ID,
  SYSVAR_INSTRUCTIONS,
  TOKEN_UNIT,
  payer,
  readOnly,
  requireBurnAmount,
  writable,
} from './base.js';
import { ContentService, ContentStatistics } from './content.js';

export const MIN_POST_BURN = TOKEN_UNIT;

export interface CreatePostInput {
  title: string;
  content: string;
  image: string;
}

export class ForumService extends ContentService<PostAccount> {
  protected readonly category = 'forum' as const;
  protected readonly programId: PublicKey;

  constructor(context: DomainContext) {
    super(context, 'forum');
    this.programId = context.programs.memoForum;
  }

  protected counterAddress(): PublicKey {
    return forumCounterAddress(this.programId).address;
  }

  entityAddress(postId: bigint): PublicKey {
    return postAddress(this.programId, postId).address;
  }

  protected parseEntity(data: Buffer): PostAccount {
    return parsePostAccount(data);
  }

  protected memoCountOf(post: PostAccount): bigint {
    return post.replyCount;
  }

  protected burnedOf(post: PostAccount): bigint {
    return post.burnedAmount;
  }

  async buildCreatePost(user: PublicKey, input: CreatePostInput, burnAmount: bigint): Promise<OperationDescriptor> {
    requireBurnAmount(burnAmount, MIN_POST_BURN);
    const creator = user.toBase58();
    validateRecord({ category: 'forum', operation: 'create_post', creator, postId: 0n, ...input });

    const postId = await this.getTotal();
    this.logger.info(`Building create_post '${input.title}' as id ${postId}`);

    const args = new BorshWriter().u64(postId, 'postId').u64(burnAmount, 'burnAmount').toBuffer();
    const instruction = this.instruction(this.programId, 'create_post', args, [
      payer(user),
      writable(this.counterAddress()),
      writable(this.entityAddress(postId)),
      writable(this.programs.tokenMint),
      writable(this.tokenAccount(user)),
      writable(this.burnStats(user)),
      readOnly(this.programs.token2022),
      readOnly(this.programs.memoBurn),
      readOnly(SYSTEM_PROGRAM_ID),
      readOnly(SYSVAR_INSTRUCTIONS),
    ]);

    return this.describe(
      user,
      { category: 'forum', operation: 'create_post', creator, postId, ...input },
      burnAmount,
      instruction
    );
  }

  buildBurnForPost(user: PublicKey, postId: bigint, burnAmount: bigint, message: string): OperationDescriptor {
    requireBurnAmount(burnAmount, MIN_POST_BURN);
    const args = new BorshWriter().u64(postId, 'postId').u64(burnAmount, 'burnAmount').toBuffer();
    const keys: AccountMeta[] = [
      payer(user),
      writable(this.entityAddress(postId)),
      writable(this.programs.tokenMint),
      writable(this.tokenAccount(user)),
      writable(this.burnStats(user)),
      readOnly(this.programs.token2022),
      readOnly(this.programs.memoBurn),
      readOnly(SYSVAR_INSTRUCTIONS),
    ];
    return this.describe(
      user,
      { category: 'forum', operation: 'burn_for_post', user: user.toBase58(), postId, message },
      burnAmount,
      this.instruction(this.programId, 'burn_for_post', args, keys)
    );
  }

  buildMintForPost(user: PublicKey, postId: bigint, message: string): OperationDescriptor {
    const args = new BorshWriter().u64(postId, 'postId').toBuffer();
    const keys: AccountMeta[] = [
      payer(user),
      writable(this.entityAddress(postId)),
      writable(this.programs.tokenMint),
      readOnly(mintAuthorityAddress(this.programs.memoMint).address),
      writable(this.tokenAccount(user)),
      readOnly(this.programs.token2022),
      readOnly(this.programs.memoMint),
      readOnly(SYSVAR_INSTRUCTIONS),
    ];
    return this.describe(
      user,
      { category: 'forum', operation: 'mint_for_post', user: user.toBase58(), postId, message },
      0n,
      this.instruction(this.programId, 'mint_for_post', args, keys)
    );
  }

  getPost(postId: bigint): Promise<PostAccount | null> {
    return this.getEntity(postId);
  }

  postExists(postId: bigint): Promise<boolean> {
    return this.entityExists(postId);
  }

  getTotalPosts(): Promise<bigint> {
    return this.getTotal();
  }

  async getAllPosts(): Promise<ContentStatistics<PostAccount>> {
    return this.getStatistics();
  }

  async getPostReplies(postId: bigint, limit: number, before?: string): Promise<MessagePage> {
    return this.getMessages(postId, limit, before);
  }
}
