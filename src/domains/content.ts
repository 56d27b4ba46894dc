/**
 * Queries shared by the counter-indexed content programs (blog, forum, project)
 * @module domains/content
 */

import { PublicKey, TransactionInstruction } from '@solana/web3.js';
import { parseGlobalCounter } from '../accounts/parsers.js';
import { encodeMemo } from '../codec/memo.js';
import { DomainRecord, RecordCategory, encodeRecord, validateRecord } from '../codec/records.js';
import { OtherError } from '../errors.js';
import {
  ContractTransaction,
  MessagePage,
  RECENT_TRANSACTIONS_LIMIT,
  collectContractTransactions,
  collectMessages,
  validateHistoryLimit,
} from '../history/replay.js';
import { BulkResult, fetchEach, idRange } from '../query/bulk.js';
import { CONTENT_POLICY } from '../tx/compute.js';
import { OperationDescriptor } from '../tx/pipeline.js';
import { DomainContext, ProgramService } from './base.js';

export interface ContentStatistics<T> extends BulkResult<T> {
  totalMemos: bigint;
  totalBurned: bigint;
}

export interface GlobalStatistics {
  /** Entities created so far; the next id to be assigned */
  total: bigint;
}

export abstract class ContentService<TAccount> extends ProgramService {
  protected abstract readonly category: RecordCategory;
  protected abstract readonly programId: PublicKey;

  constructor(context: DomainContext, component: string) {
    super(context, component);
  }

  protected abstract counterAddress(): PublicKey;
  abstract entityAddress(id: bigint): PublicKey;
  protected abstract parseEntity(data: Buffer): TAccount;
  protected abstract memoCountOf(entity: TAccount): bigint;
  protected abstract burnedOf(entity: TAccount): bigint;

  /**
   * Next id to be assigned, which is also the number created so far
   */
  async getTotal(): Promise<bigint> {
    const info = await this.fetchOwned(this.counterAddress(), this.programId, `${this.category} counter`);
    if (!info) {
      throw new OtherError(`${this.category} counter not found; the program is not initialized`);
    }
    return parseGlobalCounter(info.data);
  }

  async getGlobalStatistics(): Promise<GlobalStatistics> {
    return { total: await this.getTotal() };
  }

  /**
   * Returns null when no account exists for `id`
   */
  async getEntity(id: bigint): Promise<TAccount | null> {
    const info = await this.fetchOwned(this.entityAddress(id), this.programId, `${this.category} ${id}`);
    return info ? this.parseEntity(info.data) : null;
  }

  async entityExists(id: bigint): Promise<boolean> {
    return (await this.getEntity(id)) !== null;
  }

  /**
   * Existing entities with ids in [start, end); missing or unreadable ids are skipped
   */
  async getRange(start: bigint, end: bigint): Promise<TAccount[]> {
    const result = await fetchEach(idRange(start, end), (id) => this.requireEntity(id), {
      concurrency: this.maxConcurrency,
      logger: this.logger,
      label: this.category,
    });
    return result.items;
  }

  async getStatistics(): Promise<ContentStatistics<TAccount>> {
    const total = await this.getTotal();
    const ids = total > 0n ? idRange(0n, total) : [];
    const result = await fetchEach(ids, (id) => this.requireEntity(id), {
      concurrency: this.maxConcurrency,
      logger: this.logger,
      label: this.category,
    });

    let totalMemos = 0n;
    let totalBurned = 0n;
    for (const item of result.items) {
      totalMemos += this.memoCountOf(item);
      totalBurned += this.burnedOf(item);
    }

    this.logger.info(`${this.category} statistics: ${result.valid}/${result.total} valid`);
    return { ...result, totalMemos, totalBurned };
  }

  /**
   * Burn and mint messages attached to one entity, newest first
   */
  async getMessages(id: bigint, limit: number, before?: string): Promise<MessagePage> {
    validateHistoryLimit(limit);
    if (!(await this.entityExists(id))) {
      throw new OtherError(`${this.category} ${id} not found`);
    }
    const signatures = await this.rpc.getSignaturesForAddress(this.entityAddress(id), { limit, before });
    return collectMessages(signatures, limit);
  }

  async getRecentTransactions(): Promise<ContractTransaction[]> {
    const signatures = await this.rpc.getSignaturesForAddress(this.programId, {
      limit: RECENT_TRANSACTIONS_LIMIT,
    });
    return collectContractTransactions(signatures, this.category);
  }

  /**
   * Validate and encode the record into the memo, then pair it with the
   * program instruction. The memo is signed by `user`.
   */
  protected describe(
    user: PublicKey,
    record: DomainRecord,
    burnAmount: bigint,
    instruction: TransactionInstruction
  ): OperationDescriptor {
    validateRecord(record);
    const memo = encodeMemo(encodeRecord(record), burnAmount);
    return {
      name: `${record.category}/${record.operation}`,
      policy: CONTENT_POLICY,
      draft: {
        feePayer: user,
        memo: this.memoInstruction(memo, [user]),
        instructions: [instruction],
        memoLength: memo.length,
      },
    };
  }

  private async requireEntity(id: bigint): Promise<TAccount> {
    const entity = await this.getEntity(id);
    if (entity === null) {
      throw new OtherError(`${this.category} ${id} not found`);
    }
    return entity;
  }
}
