/**
 * zod schemas for the JSON-RPC results the SDK consumes
 * @module rpc/schemas
 */

import { z } from 'zod';

const ContextSchema = z.object({ slot: z.number() });

export const LatestBlockhashSchema = z.object({
  context: ContextSchema,
  value: z.object({
    blockhash: z.string(),
    lastValidBlockHeight: z.number(),
  }),
});

export const BalanceSchema = z.object({
  context: ContextSchema,
  value: z.number(),
});

export const VersionSchema = z.object({
  'solana-core': z.string(),
  'feature-set': z.number().optional(),
});

export const AccountSchema = z.object({
  data: z.tuple([z.string(), z.literal('base64')]),
  owner: z.string(),
  lamports: z.number(),
  executable: z.boolean(),
});

export const AccountInfoSchema = z.object({
  context: ContextSchema,
  value: AccountSchema.nullable(),
});

export const SignatureInfoSchema = z.object({
  signature: z.string(),
  slot: z.number(),
  err: z.unknown().nullable(),
  memo: z.string().nullable(),
  blockTime: z.number().nullish(),
  confirmationStatus: z.string().nullish(),
});

export const SignaturesSchema = z.array(SignatureInfoSchema);

export const SimulationSchema = z.object({
  context: ContextSchema,
  value: z.object({
    err: z.unknown().nullable(),
    logs: z.array(z.string()).nullish(),
    unitsConsumed: z.number().nullish(),
  }),
});

export const SignatureSchema = z.string();

export const TokenAmountSchema = z.object({
  context: ContextSchema,
  value: z.object({
    amount: z.string().regex(/^\d+$/),
    decimals: z.number(),
    uiAmount: z.number().nullable(),
    uiAmountString: z.string(),
  }),
});

export const ProgramAccountsSchema = z.array(
  z.object({
    pubkey: z.string(),
    account: AccountSchema,
  })
);

export type RawAccount = z.infer<typeof AccountSchema>;
export type RawSignatureInfo = z.infer<typeof SignatureInfoSchema>;
