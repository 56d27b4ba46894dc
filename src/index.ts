/**
 * x1-memo-sdk: transaction construction and JSON-RPC client for the X1
 * memo programs
 *
 * - Typed operation builders per program (profile, blog, forum, project, burn, mint)
 * - Simulation-sized compute budgets
 * - BurnMemo envelope and record codec
 * - Account parsers and history replay
 *
 * @packageDocumentation
 */

export * from './client.js';
export * from './errors.js';
export * from './utils/logger.js';

export * from './config/networks.js';
export * from './config/settings.js';

export * from './codec/borsh.js';
export * from './codec/memo.js';
export * from './codec/records.js';

export * from './program/discriminator.js';
export * from './program/pda.js';

export * from './rpc/transport.js';
export * from './rpc/client.js';

export * from './tx/assembler.js';
export * from './tx/compute.js';
export * from './tx/pipeline.js';

export * from './accounts/parsers.js';
export * from './query/bulk.js';
export * from './history/replay.js';

export * from './domains/base.js';
export * from './domains/content.js';
export * from './domains/profile.js';
export * from './domains/blog.js';
export * from './domains/forum.js';
export * from './domains/project.js';
export * from './domains/burn.js';
export * from './domains/mint.js';
export * from './domains/token.js';
