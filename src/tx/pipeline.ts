/**
 * Operation pipeline: estimate, rebuild with a fresh block, sign, send
 * @module tx/pipeline
 */

import { Keypair, PublicKey, Transaction } from '@solana/web3.js';
import { InvalidParameterError } from '../errors.js';
import { BlockReference, RpcClient } from '../rpc/client.js';
import { RequestOptions } from '../rpc/transport.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { TransactionDraft, buildTransaction, encodeTransaction } from './assembler.js';
import { ComputeBudgetEstimator, ComputePolicy } from './compute.js';

/**
 * Holds the signing key. The SDK never sees key material.
 */
export interface TransactionSigner {
  readonly publicKey: PublicKey;
  signTransaction(tx: Transaction): Promise<Transaction>;
}

/**
 * Signer backed by an in-memory keypair, for scripts and tests
 */
export class KeypairSigner implements TransactionSigner {
  constructor(private readonly keypair: Keypair) {}

  get publicKey(): PublicKey {
    return this.keypair.publicKey;
  }

  async signTransaction(tx: Transaction): Promise<Transaction> {
    tx.sign(this.keypair);
    return tx;
  }
}

/**
 * What a domain service hands the pipeline
 */
export interface OperationDescriptor {
  /** Short label for logs, e.g. "blog/create_blog" */
  name: string;
  draft: TransactionDraft;
  policy: ComputePolicy;
}

export interface PreparedTransaction {
  operation: string;
  /** Unsigned, built against `block` */
  transaction: Transaction;
  unitLimit: number;
  simulatedUnits: number;
  usedFallback: boolean;
  block: BlockReference;
}

export interface SubmitResult {
  signature: string;
  unitLimit: number;
  simulatedUnits: number;
}

export class OperationPipeline {
  private readonly logger: Logger;

  constructor(
    private readonly rpc: RpcClient,
    private readonly estimator: ComputeBudgetEstimator,
    logger: Logger = silentLogger
  ) {
    this.logger = logger;
  }

  /**
   * Estimate, then rebuild against a fresh block reference. The result is
   * unsigned.
   */
  async assemble(operation: OperationDescriptor, request?: RequestOptions): Promise<PreparedTransaction> {
    const estimate = await this.estimator.estimate(operation.draft, operation.policy, request);
    const block = await this.rpc.getLatestBlockhash(request);

    const transaction = buildTransaction(
      operation.draft,
      {
        unitLimit: estimate.unitLimit,
        unitPriceMicroLamports: this.estimator.unitPriceMicroLamports,
      },
      block
    );

    this.logger.info(
      `Assembled ${operation.name} with CU limit=${estimate.unitLimit} (simulated: ${estimate.simulatedUnits})`
    );

    return {
      operation: operation.name,
      transaction,
      unitLimit: estimate.unitLimit,
      simulatedUnits: estimate.simulatedUnits,
      usedFallback: estimate.usedFallback,
      block,
    };
  }

  async sendPrepared(
    prepared: PreparedTransaction,
    signer: TransactionSigner,
    request?: RequestOptions
  ): Promise<SubmitResult> {
    const feePayer = prepared.transaction.feePayer;
    if (!feePayer || !feePayer.equals(signer.publicKey)) {
      throw new InvalidParameterError(
        'signer',
        `Signer ${signer.publicKey.toBase58()} does not match fee payer ${feePayer?.toBase58() ?? 'unset'}`
      );
    }

    const signed = await signer.signTransaction(prepared.transaction);
    const signature = await this.rpc.sendTransaction(encodeTransaction(signed), request);

    this.logger.info(`Submitted ${prepared.operation}: ${signature}`);

    return {
      signature,
      unitLimit: prepared.unitLimit,
      simulatedUnits: prepared.simulatedUnits,
    };
  }

  async submit(
    operation: OperationDescriptor,
    signer: TransactionSigner,
    request?: RequestOptions
  ): Promise<SubmitResult> {
    const prepared = await this.assemble(operation, request);
    return this.sendPrepared(prepared, signer, request);
  }
}
