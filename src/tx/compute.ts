/**
 * Compute budget estimation via simulation
 * @module tx/compute
 */

import { OtherError, TransactionFailedError, extractProgramErrorMessage } from '../errors.js';
import { BlockReference, RpcClient } from '../rpc/client.js';
import { RequestOptions } from '../rpc/transport.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { TransactionDraft, buildTransaction, encodeTransaction } from './assembler.js';

/** Per-transaction ceiling enforced by the runtime */
export const MAX_COMPUTE_UNITS = 1_400_000;

/**
 * How simulated units become the final limit
 */
export interface ComputePolicy {
  name: string;
  multiplier: number;
  floor: number;
  /** Units to use when the simulation reports none; null makes that an error */
  fallbackUnits(memoLength: number): number | null;
}

const TOKEN_FALLBACK_TABLE: ReadonlyArray<readonly [number, number]> = [
  [100, 100_000],
  [200, 150_000],
  [300, 200_000],
  [400, 250_000],
  [500, 300_000],
  [600, 350_000],
  [700, 400_000],
];

const CONTENT_FALLBACK_TABLE: ReadonlyArray<readonly [number, number]> = [
  [100, 120_000],
  [200, 160_000],
  [300, 200_000],
  [400, 250_000],
  [500, 300_000],
  [600, 350_000],
  [700, 400_000],
];

function lookup(table: ReadonlyArray<readonly [number, number]>, memoLength: number, otherwise: number): number {
  for (const [maxLength, units] of table) {
    if (memoLength <= maxLength) {
      return units;
    }
  }
  return otherwise;
}

export const BURN_POLICY: ComputePolicy = {
  name: 'burn',
  multiplier: 1.0,
  floor: 300_000,
  fallbackUnits: () => 400_000,
};

export const TOKEN_POLICY: ComputePolicy = {
  name: 'token',
  multiplier: 1.1,
  floor: 1_000,
  fallbackUnits: (memoLength) => lookup(TOKEN_FALLBACK_TABLE, memoLength, 400_000),
};

/** memo-mint has no fallback: a simulation without units fails the mint */
export const MINT_POLICY: ComputePolicy = {
  name: 'mint',
  multiplier: 1.1,
  floor: 1_000,
  fallbackUnits: () => null,
};

export const TOKEN_BURN_POLICY: ComputePolicy = {
  name: 'token-burn',
  multiplier: 1.1,
  floor: 1_000,
  fallbackUnits: () => 440_000,
};

export const TOKEN_BURN_HISTORY_POLICY: ComputePolicy = {
  name: 'token-burn-history',
  multiplier: 1.1,
  floor: 1_000,
  fallbackUnits: () => 480_000,
};

/** Profile and burn-history account upkeep on the memo-token program */
export const TOKEN_ACCOUNT_POLICY: ComputePolicy = {
  name: 'token-account',
  multiplier: 1.1,
  floor: 1_000,
  fallbackUnits: () => 200_000,
};

export const CONTENT_POLICY: ComputePolicy = {
  name: 'content',
  multiplier: 1.1,
  floor: 1_000,
  fallbackUnits: (memoLength) => lookup(CONTENT_FALLBACK_TABLE, memoLength, 450_000),
};

/**
 * max(ceil(units * multiplier), floor), capped at the runtime ceiling
 */
export function finalComputeUnits(units: number, multiplier: number, floor: number): number {
  // 100000 * 1.1 is 110000.00000000001 in floating point
  const buffered = Math.ceil(units * multiplier - 1e-9);
  return Math.min(Math.max(buffered, floor), MAX_COMPUTE_UNITS);
}

export interface ComputeEstimate {
  /** Units reported by the simulation, or the fallback */
  simulatedUnits: number;
  unitLimit: number;
  usedFallback: boolean;
}

export interface EstimatorOptions {
  /** Priority fee attached to both the simulation and the final build */
  unitPriceMicroLamports?: number;
  /** Replaces the policy multiplier when set */
  multiplierOverride?: number;
  logger?: Logger;
}

export class ComputeBudgetEstimator {
  private readonly logger: Logger;

  constructor(
    private readonly rpc: RpcClient,
    private readonly options: EstimatorOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  get unitPriceMicroLamports(): number | undefined {
    return this.options.unitPriceMicroLamports;
  }

  /**
   * Simulate the draft at the ceiling and derive its final limit.
   * A program error during simulation is raised, not estimated around.
   */
  async estimate(
    draft: TransactionDraft,
    policy: ComputePolicy,
    request?: RequestOptions
  ): Promise<ComputeEstimate> {
    const block: BlockReference = await this.rpc.getLatestBlockhash(request);
    const simulationTx = buildTransaction(
      draft,
      { unitLimit: MAX_COMPUTE_UNITS, unitPriceMicroLamports: this.options.unitPriceMicroLamports },
      block
    );

    const simulation = await this.rpc.simulateTransaction(encodeTransaction(simulationTx), request);

    if (simulation.err !== null && simulation.err !== undefined) {
      const detail = extractProgramErrorMessage(simulation.logs);
      throw new TransactionFailedError(
        `Simulation failed: ${detail ?? JSON.stringify(simulation.err)}`,
        undefined,
        detail,
        simulation.logs
      );
    }

    let simulatedUnits = simulation.unitsConsumed;
    let usedFallback = false;
    if (simulatedUnits === undefined) {
      const fallback = policy.fallbackUnits(draft.memoLength);
      if (fallback === null) {
        throw new OtherError('Failed to get compute units from simulation');
      }
      simulatedUnits = fallback;
      usedFallback = true;
      this.logger.warn(
        `Simulation reported no units for ${policy.name}; using fallback ${simulatedUnits}`
      );
    }

    const multiplier = this.options.multiplierOverride ?? policy.multiplier;
    const unitLimit = finalComputeUnits(simulatedUnits, multiplier, policy.floor);

    this.logger.debug(
      `${policy.name}: simulated=${simulatedUnits} multiplier=${multiplier} limit=${unitLimit}`
    );

    return { simulatedUnits, unitLimit, usedFallback };
  }
}
