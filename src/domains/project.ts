/**
 * memo-project: projects, project burns and the burn leaderboard
 * @module domains/project
 */

import { AccountMeta, PublicKey } from '@solana/web3.js';
import { BurnLeaderboard, ProjectAccount, parseBurnLeaderboard, parseProjectAccount } from '../accounts/parsers.js';
import { BorshWriter } from '../codec/borsh.js';
import { validateRecord } from '../codec/records.js';
import { OtherError } from '../errors.js';
import { MessagePage } from '../history/replay.js';
import { burnLeaderboardAddress, projectAddress, projectCounterAddress } from '../program/pda.js';
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

export const MIN_PROJECT_CREATE_BURN = 42_069n * TOKEN_UNIT;
export const MIN_PROJECT_UPDATE_BURN = 42_069n * TOKEN_UNIT;
export const MIN_PROJECT_BURN = 420n * TOKEN_UNIT;

export interface CreateProjectInput {
  name: string;
  description: string;
  image: string;
  website: string;
  tags: string[];
}

export type UpdateProjectInput = Partial<CreateProjectInput>;

export class ProjectService extends ContentService<ProjectAccount> {
  protected readonly category = 'project' as const;
  protected readonly programId: PublicKey;

  constructor(context: DomainContext) {
    super(context, 'project');
    this.programId = context.programs.memoProject;
  }

  protected counterAddress(): PublicKey {
    return projectCounterAddress(this.programId).address;
  }

  entityAddress(projectId: bigint): PublicKey {
    return projectAddress(this.programId, projectId).address;
  }

  leaderboardAddress(): PublicKey {
    return burnLeaderboardAddress(this.programId).address;
  }

  protected parseEntity(data: Buffer): ProjectAccount {
    return parseProjectAccount(data);
  }

  protected memoCountOf(project: ProjectAccount): bigint {
    return project.memoCount;
  }

  protected burnedOf(project: ProjectAccount): bigint {
    return project.burnedAmount;
  }

  async buildCreateProject(
    user: PublicKey,
    input: CreateProjectInput,
    burnAmount: bigint
  ): Promise<OperationDescriptor> {
    requireBurnAmount(burnAmount, MIN_PROJECT_CREATE_BURN);
    validateRecord({ category: 'project', operation: 'create_project', projectId: 0n, ...input });

    const projectId = await this.getTotal();
    this.logger.info(`Building create_project '${input.name}' as id ${projectId}`);

    const args = new BorshWriter().u64(projectId, 'projectId').u64(burnAmount, 'burnAmount').toBuffer();
    const instruction = this.instruction(this.programId, 'create_project', args, [
      payer(user),
      writable(this.counterAddress()),
      writable(this.entityAddress(projectId)),
      writable(this.leaderboardAddress()),
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
      { category: 'project', operation: 'create_project', projectId, ...input },
      burnAmount,
      instruction
    );
  }

  buildUpdateProject(
    user: PublicKey,
    projectId: bigint,
    input: UpdateProjectInput,
    burnAmount: bigint
  ): OperationDescriptor {
    requireBurnAmount(burnAmount, MIN_PROJECT_UPDATE_BURN);
    const args = new BorshWriter().u64(projectId, 'projectId').u64(burnAmount, 'burnAmount').toBuffer();
    return this.describe(
      user,
      { category: 'project', operation: 'update_project', projectId, ...input },
      burnAmount,
      this.instruction(this.programId, 'update_project', args, this.burnAccounts(user, projectId))
    );
  }

  buildBurnForProject(user: PublicKey, projectId: bigint, burnAmount: bigint, message: string): OperationDescriptor {
    requireBurnAmount(burnAmount, MIN_PROJECT_BURN);
    const args = new BorshWriter().u64(projectId, 'projectId').u64(burnAmount, 'burnAmount').toBuffer();
    return this.describe(
      user,
      { category: 'project', operation: 'burn_for_project', projectId, burner: user.toBase58(), message },
      burnAmount,
      this.instruction(this.programId, 'burn_for_project', args, this.burnAccounts(user, projectId))
    );
  }

  getProject(projectId: bigint): Promise<ProjectAccount | null> {
    return this.getEntity(projectId);
  }

  projectExists(projectId: bigint): Promise<boolean> {
    return this.entityExists(projectId);
  }

  getTotalProjects(): Promise<bigint> {
    return this.getTotal();
  }

  getProjectsRange(start: bigint, end: bigint): Promise<ProjectAccount[]> {
    return this.getRange(start, end);
  }

  getAllStatistics(): Promise<ContentStatistics<ProjectAccount>> {
    return this.getStatistics();
  }

  async getBurnLeaderboard(): Promise<BurnLeaderboard> {
    const info = await this.fetchOwned(this.leaderboardAddress(), this.programId, 'Burn leaderboard');
    if (!info) {
      throw new OtherError('Project burn leaderboard not found; the program is not initialized');
    }
    const leaderboard = parseBurnLeaderboard(info.data, this.logger);
    this.logger.info(
      `Parsed burn leaderboard: ${leaderboard.entries.length} entries, total burned ${leaderboard.totalBurned / TOKEN_UNIT} tokens`
    );
    return leaderboard;
  }

  /**
   * 1-based rank, or null when the project is not on the leaderboard
   */
  async getBurnRank(projectId: bigint): Promise<number | null> {
    const leaderboard = await this.getBurnLeaderboard();
    const entry = leaderboard.entries.find((candidate) => candidate.projectId === projectId);
    return entry ? entry.rank : null;
  }

  async getBurnMessages(projectId: bigint, limit: number, before?: string): Promise<MessagePage> {
    return this.getMessages(projectId, limit, before);
  }

  private burnAccounts(user: PublicKey, projectId: bigint): AccountMeta[] {
    return [
      payer(user),
      writable(this.entityAddress(projectId)),
      writable(this.leaderboardAddress()),
      writable(this.programs.tokenMint),
      writable(this.tokenAccount(user)),
      writable(this.burnStats(user)),
      readOnly(this.programs.token2022),
      readOnly(this.programs.memoBurn),
      readOnly(SYSVAR_INSTRUCTIONS),
    ];
  }
}
