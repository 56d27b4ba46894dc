/**
 * Typed wrappers over the JSON-RPC methods the SDK uses
 * @module rpc/client
 */

import { PublicKey } from '@solana/web3.js';
import { OtherError, asTransactionFailure } from '../errors.js';
import { JsonRpcTransport, RequestOptions } from './transport.js';
import {
  AccountInfoSchema,
  BalanceSchema,
  LatestBlockhashSchema,
  ProgramAccountsSchema,
  RawAccount,
  SignatureSchema,
  SignaturesSchema,
  SimulationSchema,
  TokenAmountSchema,
  VersionSchema,
} from './schemas.js';

const COMMITMENT = 'confirmed';

export interface BlockReference {
  blockhash: string;
  lastValidBlockHeight: number;
}

export interface AccountInfo {
  data: Buffer;
  owner: PublicKey;
  lamports: number;
  executable: boolean;
}

export interface SignatureInfo {
  signature: string;
  slot: number;
  /** Present when the transaction failed */
  err: unknown;
  memo: string | null;
  blockTime: number | null;
}

export interface SimulationResult {
  err: unknown;
  logs: string[];
  unitsConsumed?: number;
}

export interface TokenAmount {
  /** Raw amount in base units */
  amount: bigint;
  decimals: number;
  uiAmountString: string;
}

export interface ProgramAccount {
  pubkey: PublicKey;
  account: AccountInfo;
}

export interface SignaturePageOptions {
  limit: number;
  before?: string;
}

export interface ProgramAccountsOptions {
  dataSize?: number;
  /**
   * Called for an entry whose address or owner is not a valid key. When
   * given, the entry is skipped; otherwise the whole call fails.
   */
  onMalformed?: (pubkey: string, error: OtherError) => void;
}

/**
 * Keys arrive as plain strings; a bad one is a malformed response
 */
function responseKey(value: string): PublicKey {
  try {
    return new PublicKey(value);
  } catch (error) {
    throw new OtherError(`Invalid public key in response: ${value}`, error);
  }
}

function toAccountInfo(raw: RawAccount): AccountInfo {
  return {
    data: Buffer.from(raw.data[0], 'base64'),
    owner: responseKey(raw.owner),
    lamports: raw.lamports,
    executable: raw.executable,
  };
}

export class RpcClient {
  constructor(private readonly transport: JsonRpcTransport) {}

  get endpoint(): string {
    return this.transport.endpoint;
  }

  async getLatestBlockhash(options?: RequestOptions): Promise<BlockReference> {
    const result = await this.transport.send(
      'getLatestBlockhash',
      [{ commitment: COMMITMENT }],
      LatestBlockhashSchema,
      options
    );
    return result.value;
  }

  /** Balance in lamports */
  async getBalance(address: PublicKey, options?: RequestOptions): Promise<number> {
    const result = await this.transport.send(
      'getBalance',
      [address.toBase58(), { commitment: COMMITMENT }],
      BalanceSchema,
      options
    );
    return result.value;
  }

  async getVersion(options?: RequestOptions): Promise<{ solanaCore: string; featureSet?: number }> {
    const result = await this.transport.send('getVersion', [], VersionSchema, options);
    return { solanaCore: result['solana-core'], featureSet: result['feature-set'] };
  }

  /**
   * Returns null when the account does not exist
   */
  async getAccountInfo(address: PublicKey, options?: RequestOptions): Promise<AccountInfo | null> {
    const result = await this.transport.send(
      'getAccountInfo',
      [address.toBase58(), { encoding: 'base64', commitment: COMMITMENT }],
      AccountInfoSchema,
      options
    );
    return result.value ? toAccountInfo(result.value) : null;
  }

  async getSignaturesForAddress(
    address: PublicKey,
    page: SignaturePageOptions,
    options?: RequestOptions
  ): Promise<SignatureInfo[]> {
    const config: Record<string, unknown> = { limit: page.limit, commitment: COMMITMENT };
    if (page.before) {
      config['before'] = page.before;
    }
    const result = await this.transport.send(
      'getSignaturesForAddress',
      [address.toBase58(), config],
      SignaturesSchema,
      options
    );
    return result.map((info) => ({
      signature: info.signature,
      slot: info.slot,
      err: info.err,
      memo: info.memo,
      blockTime: info.blockTime ?? null,
    }));
  }

  async simulateTransaction(serialized: string, options?: RequestOptions): Promise<SimulationResult> {
    const result = await this.transport.send(
      'simulateTransaction',
      [
        serialized,
        {
          encoding: 'base64',
          commitment: COMMITMENT,
          replaceRecentBlockhash: true,
          sigVerify: false,
        },
      ],
      SimulationSchema,
      options
    );
    return {
      err: result.value.err ?? null,
      logs: result.value.logs ?? [],
      unitsConsumed: result.value.unitsConsumed ?? undefined,
    };
  }

  /**
   * Submit a signed transaction. A structured RPC error here means the
   * ledger refused it, so it surfaces as TransactionFailedError.
   */
  async sendTransaction(serialized: string, options?: RequestOptions): Promise<string> {
    try {
      return await this.transport.send(
        'sendTransaction',
        [
          serialized,
          {
            encoding: 'base64',
            preflightCommitment: COMMITMENT,
            skipPreflight: false,
            maxRetries: 3,
          },
        ],
        SignatureSchema,
        options
      );
    } catch (error) {
      throw asTransactionFailure(error);
    }
  }

  async getTokenSupply(mint: PublicKey, options?: RequestOptions): Promise<TokenAmount> {
    const result = await this.transport.send(
      'getTokenSupply',
      [mint.toBase58(), { commitment: COMMITMENT }],
      TokenAmountSchema,
      options
    );
    return {
      amount: BigInt(result.value.amount),
      decimals: result.value.decimals,
      uiAmountString: result.value.uiAmountString,
    };
  }

  async getTokenAccountBalance(account: PublicKey, options?: RequestOptions): Promise<TokenAmount> {
    const result = await this.transport.send(
      'getTokenAccountBalance',
      [account.toBase58(), { commitment: COMMITMENT }],
      TokenAmountSchema,
      options
    );
    return {
      amount: BigInt(result.value.amount),
      decimals: result.value.decimals,
      uiAmountString: result.value.uiAmountString,
    };
  }

  async getProgramAccounts(
    programId: PublicKey,
    filter: ProgramAccountsOptions = {},
    options?: RequestOptions
  ): Promise<ProgramAccount[]> {
    const filters = filter.dataSize !== undefined ? [{ dataSize: filter.dataSize }] : [];
    const result = await this.transport.send(
      'getProgramAccounts',
      [programId.toBase58(), { encoding: 'base64', commitment: COMMITMENT, filters }],
      ProgramAccountsSchema,
      options
    );

    const accounts: ProgramAccount[] = [];
    for (const entry of result) {
      try {
        accounts.push({ pubkey: responseKey(entry.pubkey), account: toAccountInfo(entry.account) });
      } catch (error) {
        if (!(error instanceof OtherError) || !filter.onMalformed) {
          throw error;
        }
        filter.onMalformed(entry.pubkey, error);
      }
    }
    return accounts;
  }
}
