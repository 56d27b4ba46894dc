/**
 * memo-blog: blogs, burns and mints against a blog
 * @module domains/blog
 */

import { AccountMeta, PublicKey } from '@solana/web3.js';
import { BlogAccount, parseBlogAccount } from '../accounts/parsers.js';
import { BorshWriter } from '../codec/borsh.js';
import { validateRecord } from '../codec/records.js';
import { MessagePage } from '../history/replay.js';
import { blogAddress, blogCounterAddress, mintAuthorityAddress } from '../program/pda.js';
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

export const MIN_BLOG_BURN = TOKEN_UNIT;

export interface CreateBlogInput {
  name: string;
  description: string;
  image: string;
}

export type UpdateBlogInput = Partial<CreateBlogInput>;

export class BlogService extends ContentService<BlogAccount> {
  protected readonly category = 'blog' as const;
  protected readonly programId: PublicKey;

  constructor(context: DomainContext) {
    super(context, 'blog');
    this.programId = context.programs.memoBlog;
  }

  protected counterAddress(): PublicKey {
    return blogCounterAddress(this.programId).address;
  }

  entityAddress(blogId: bigint): PublicKey {
    return blogAddress(this.programId, blogId).address;
  }

  protected parseEntity(data: Buffer): BlogAccount {
    return parseBlogAccount(data);
  }

  protected memoCountOf(blog: BlogAccount): bigint {
    return blog.memoCount;
  }

  protected burnedOf(blog: BlogAccount): bigint {
    return blog.burnedAmount;
  }

  /**
   * The blog id is the counter's current value, read before building
   */
  async buildCreateBlog(user: PublicKey, input: CreateBlogInput, burnAmount: bigint): Promise<OperationDescriptor> {
    requireBurnAmount(burnAmount, MIN_BLOG_BURN);
    validateRecord({ category: 'blog', operation: 'create_blog', blogId: 0n, ...input });

    const blogId = await this.getTotal();
    this.logger.info(`Building create_blog '${input.name}' as id ${blogId}: ${burnAmount / TOKEN_UNIT} tokens`);

    const args = new BorshWriter().u64(blogId, 'blogId').u64(burnAmount, 'burnAmount').toBuffer();
    const instruction = this.instruction(this.programId, 'create_blog', args, [
      payer(user),
      writable(this.counterAddress()),
      writable(this.entityAddress(blogId)),
      writable(this.programs.tokenMint),
      writable(this.tokenAccount(user)),
      writable(this.burnStats(user)),
      readOnly(this.programs.token2022),
      readOnly(this.programs.memoBurn),
      readOnly(SYSTEM_PROGRAM_ID),
      readOnly(SYSVAR_INSTRUCTIONS),
    ]);

    return this.describe(user, { category: 'blog', operation: 'create_blog', blogId, ...input }, burnAmount, instruction);
  }

  buildUpdateBlog(user: PublicKey, blogId: bigint, input: UpdateBlogInput, burnAmount: bigint): OperationDescriptor {
    requireBurnAmount(burnAmount, MIN_BLOG_BURN);
    const args = new BorshWriter().u64(blogId, 'blogId').u64(burnAmount, 'burnAmount').toBuffer();
    const instruction = this.instruction(this.programId, 'update_blog', args, this.burnAccounts(user, blogId));
    return this.describe(user, { category: 'blog', operation: 'update_blog', blogId, ...input }, burnAmount, instruction);
  }

  buildBurnForBlog(user: PublicKey, blogId: bigint, burnAmount: bigint, message: string): OperationDescriptor {
    requireBurnAmount(burnAmount, MIN_BLOG_BURN);
    const args = new BorshWriter().u64(blogId, 'blogId').u64(burnAmount, 'burnAmount').toBuffer();
    const instruction = this.instruction(this.programId, 'burn_for_blog', args, this.burnAccounts(user, blogId));
    return this.describe(
      user,
      { category: 'blog', operation: 'burn_for_blog', blogId, burner: user.toBase58(), message },
      burnAmount,
      instruction
    );
  }

  buildMintForBlog(user: PublicKey, blogId: bigint, message: string): OperationDescriptor {
    const args = new BorshWriter().u64(blogId, 'blogId').toBuffer();
    const instruction = this.instruction(this.programId, 'mint_for_blog', args, [
      payer(user),
      writable(this.entityAddress(blogId)),
      writable(this.programs.tokenMint),
      readOnly(mintAuthorityAddress(this.programs.memoMint).address),
      writable(this.tokenAccount(user)),
      readOnly(this.programs.token2022),
      readOnly(this.programs.memoMint),
      readOnly(SYSVAR_INSTRUCTIONS),
    ]);
    return this.describe(
      user,
      { category: 'blog', operation: 'mint_for_blog', blogId, minter: user.toBase58(), message },
      0n,
      instruction
    );
  }

  getBlog(blogId: bigint): Promise<BlogAccount | null> {
    return this.getEntity(blogId);
  }

  blogExists(blogId: bigint): Promise<boolean> {
    return this.entityExists(blogId);
  }

  getTotalBlogs(): Promise<bigint> {
    return this.getTotal();
  }

  getBlogsRange(start: bigint, end: bigint): Promise<BlogAccount[]> {
    return this.getRange(start, end);
  }

  getAllStatistics(): Promise<ContentStatistics<BlogAccount>> {
    return this.getStatistics();
  }

  getMemoMessages(blogId: bigint, limit: number, before?: string): Promise<MessagePage> {
    return this.getMessages(blogId, limit, before);
  }

  private burnAccounts(user: PublicKey, blogId: bigint): AccountMeta[] {
    return [
      payer(user),
      writable(this.entityAddress(blogId)),
      writable(this.programs.tokenMint),
      writable(this.tokenAccount(user)),
      writable(this.burnStats(user)),
      readOnly(this.programs.token2022),
      readOnly(this.programs.memoBurn),
      readOnly(SYSVAR_INSTRUCTIONS),
    ];
  }
}
