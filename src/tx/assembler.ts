/**
 * Transaction assembly with a fixed instruction order
 * @module tx/assembler
 */

import {
  ComputeBudgetProgram,
  PublicKey,
  Transaction,
  TransactionInstruction,
} from '@solana/web3.js';
import { InvalidParameterError } from '../errors.js';
import { BlockReference } from '../rpc/client.js';

/**
 * Instructions of one operation, before any compute budget is attached
 */
export interface TransactionDraft {
  feePayer: PublicKey;
  /** SPL memo instruction; placed first when present */
  memo?: TransactionInstruction;
  /** Program instructions, in order */
  instructions: TransactionInstruction[];
  /** Memo text length in bytes, used to pick fallback compute units */
  memoLength: number;
}

export interface ComputeBudget {
  unitLimit: number;
  /** Omitted or 0 means no price instruction */
  unitPriceMicroLamports?: number;
}

/**
 * Memo, program instructions, unit limit, then unit price when configured.
 * Simulation and final builds share this order.
 */
export function orderInstructions(draft: TransactionDraft, budget: ComputeBudget): TransactionInstruction[] {
  const ordered: TransactionInstruction[] = [];

  if (draft.memo) {
    ordered.push(draft.memo);
  }
  ordered.push(...draft.instructions);
  ordered.push(ComputeBudgetProgram.setComputeUnitLimit({ units: budget.unitLimit }));

  if (budget.unitPriceMicroLamports !== undefined && budget.unitPriceMicroLamports > 0) {
    ordered.push(
      ComputeBudgetProgram.setComputeUnitPrice({ microLamports: budget.unitPriceMicroLamports })
    );
  }

  return ordered;
}

/**
 * Build an unsigned legacy transaction
 */
export function buildTransaction(
  draft: TransactionDraft,
  budget: ComputeBudget,
  block: BlockReference
): Transaction {
  if (!draft.memo && draft.instructions.length === 0) {
    throw new InvalidParameterError('instructions', 'Cannot build transaction with zero instructions');
  }

  const tx = new Transaction({
    feePayer: draft.feePayer,
    blockhash: block.blockhash,
    lastValidBlockHeight: block.lastValidBlockHeight,
  });
  tx.add(...orderInstructions(draft, budget));
  return tx;
}

/**
 * Wire encoding for simulate/send. Unsigned transactions carry empty
 * signature slots.
 */
export function encodeTransaction(tx: Transaction): string {
  return tx
    .serialize({ requireAllSignatures: false, verifySignatures: false })
    .toString('base64');
}
