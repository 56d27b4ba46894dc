/**
 * Main memo SDK client
 * @module client
 */

import { PublicKey } from '@solana/web3.js';
import { NetworkConfig, NetworkType, getNetworkConfig } from './config/networks.js';
import { ClientSettings, ClientSettingsInput, SettingsProvider, StaticSettings, parseSettings } from './config/settings.js';
import { BlogService } from './domains/blog.js';
import { BurnService } from './domains/burn.js';
import { DomainContext } from './domains/base.js';
import { ForumService } from './domains/forum.js';
import { MintService } from './domains/mint.js';
import { ProfileService } from './domains/profile.js';
import { ProjectService } from './domains/project.js';
import { TokenService } from './domains/token.js';
import { parseAddress } from './program/pda.js';
import { RpcClient } from './rpc/client.js';
import { FetchLike, JsonRpcTransport, RandomIndexSource, RequestOptions } from './rpc/transport.js';
import { ComputeBudgetEstimator } from './tx/compute.js';
import {
  OperationDescriptor,
  OperationPipeline,
  PreparedTransaction,
  SubmitResult,
  TransactionSigner,
} from './tx/pipeline.js';
import { Logger, parseLogLevel } from './utils/logger.js';

/**
 * Memo client configuration
 */
export interface MemoClientConfig {
  /** Validated settings, or raw input to validate (default: testnet defaults) */
  settings?: ClientSettings | ClientSettingsInput;
  /** Replaces the built-in network table entry for `settings.network` */
  networkConfig?: NetworkConfig;
  /** HTTP implementation (default: global fetch) */
  fetch?: FetchLike;
  /** Endpoint choice among the network's candidates */
  randomSources?: readonly RandomIndexSource[];
  /** Logger (default: built from `settings.logLevel`) */
  logger?: Logger;
}

/**
 * Main memo client
 *
 * Wires one transport, one estimator and one pipeline, and exposes a
 * service per on-chain program. Services build operation descriptors;
 * `prepare` and `submit` turn them into transactions.
 */
export class MemoClient {
  readonly settings: ClientSettings;
  readonly network: NetworkConfig;
  readonly rpc: RpcClient;

  readonly profile: ProfileService;
  readonly blog: BlogService;
  readonly forum: ForumService;
  readonly project: ProjectService;
  readonly burn: BurnService;
  readonly mint: MintService;
  readonly token: TokenService;

  private readonly pipeline: OperationPipeline;
  private readonly logger: Logger;

  constructor(config: MemoClientConfig = {}) {
    this.settings = parseSettings(config.settings);
    this.network = config.networkConfig ?? getNetworkConfig(this.settings.network);
    this.logger = config.logger ?? new Logger(parseLogLevel(this.settings.logLevel), 'x1-memo');

    const provider: SettingsProvider = new StaticSettings(this.settings);

    const transport = new JsonRpcTransport({
      endpoints: this.network.rpcEndpoints,
      customEndpoint: provider.customEndpoint(),
      fetch: config.fetch,
      timeoutMs: this.settings.requestTimeoutMs,
      randomSources: config.randomSources,
      logger: this.logger.child('rpc'),
    });
    this.rpc = new RpcClient(transport);

    const estimator = new ComputeBudgetEstimator(this.rpc, {
      unitPriceMicroLamports: provider.cuPriceMicroLamports(),
      multiplierOverride: provider.cuBufferMultiplier(),
      logger: this.logger.child('compute'),
    });
    this.pipeline = new OperationPipeline(this.rpc, estimator, this.logger.child('pipeline'));

    const context: DomainContext = {
      rpc: this.rpc,
      programs: this.network.programs,
      logger: this.logger,
      maxConcurrency: this.settings.maxConcurrency,
    };
    this.profile = new ProfileService(context);
    this.blog = new BlogService(context);
    this.forum = new ForumService(context);
    this.project = new ProjectService(context);
    this.burn = new BurnService(context);
    this.mint = new MintService(context);
    this.token = new TokenService(context);

    this.logger.info(`Client ready on ${this.settings.network} via ${transport.endpoint}`);
  }

  get endpoint(): string {
    return this.rpc.endpoint;
  }

  get networkType(): NetworkType {
    return this.settings.network;
  }

  /**
   * Simulate, size the compute budget and rebuild. The result is unsigned.
   */
  async prepare(operation: OperationDescriptor, request?: RequestOptions): Promise<PreparedTransaction> {
    return this.pipeline.assemble(operation, request);
  }

  async submit(
    operation: OperationDescriptor,
    signer: TransactionSigner,
    request?: RequestOptions
  ): Promise<SubmitResult> {
    return this.pipeline.submit(operation, signer, request);
  }

  async sendPrepared(
    prepared: PreparedTransaction,
    signer: TransactionSigner,
    request?: RequestOptions
  ): Promise<SubmitResult> {
    return this.pipeline.sendPrepared(prepared, signer, request);
  }

  /**
   * Native balance in lamports
   */
  async getBalance(address: string | PublicKey, request?: RequestOptions): Promise<number> {
    return this.rpc.getBalance(parseAddress(address), request);
  }

  async getVersion(request?: RequestOptions): Promise<{ solanaCore: string; featureSet?: number }> {
    return this.rpc.getVersion(request);
  }
}
