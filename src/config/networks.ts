/**
 * Network selection and per-network program addresses
 * @module config/networks
 */

import { PublicKey } from '@solana/web3.js';

export enum NetworkType {
  Testnet = 'testnet',
  ProdStaging = 'prod-staging',
  Mainnet = 'mainnet',
}

/**
 * On-chain programs and accounts the SDK talks to
 */
export interface ProgramIds {
  memoMint: PublicKey;
  memoBurn: PublicKey;
  memoProfile: PublicKey;
  memoProject: PublicKey;
  memoBlog: PublicKey;
  memoForum: PublicKey;
  /** Mint of the burnable memo token */
  tokenMint: PublicKey;
  token2022: PublicKey;
  /** memo-token program and its 9-decimal mint; one deployment on every network */
  memoToken: PublicKey;
  memoTokenMint: PublicKey;
}

/**
 * Everything that differs between networks. Passed explicitly, never read
 * from a global.
 */
export interface NetworkConfig {
  network: NetworkType;
  /** Candidate RPC endpoints; one is picked per transport */
  rpcEndpoints: readonly string[];
  programs: ProgramIds;
}

const TOKEN_2022 = 'TokenzQdBNbLqP5VEhdkAS6EPFLC1PHnBqCXEpPxuEb';
const MEMO_TOKEN = 'TD8dwXKKg7M3QpWa9mQQpcvzaRasDU1MjmQWqZ9UZiw';
const MEMO_TOKEN_MINT = 'MEM69mjnKAMxgqwosg5apfYNk2rMuV26FR9THDfT3Q7';

const TESTNET_PROGRAMS = {
  memoMint: 'A31a17bhgQyRQygeZa1SybytjbCdjMpu6oPr9M3iQWzy',
  memoBurn: 'FEjJ9KKJETocmaStfsFteFrktPchDLAVNTMeTvndoxaP',
  memoProfile: 'BwQTxuShrwJR15U6Utdfmfr4kZ18VT6FA1fcp58sT8US',
  memoProject: 'ENVapgjzzMjbRhLJ279yNsSgaQtDYYVgWq98j54yYnyx',
  memoBlog: 'HPvqPUneCLwb8YYoYTrWmy6o7viRKsnLTgxwkg7CCpfB',
  memoForum: '9kwS5nSidmoHq84TyNzqFrtD29odp4sdRxm97tCbdpbS',
  tokenMint: 'HLCoc7wNDavNMfWWw2Bwd7U7A24cesuhBSNkxZgvZm1',
  token2022: TOKEN_2022,
  memoToken: MEMO_TOKEN,
  memoTokenMint: MEMO_TOKEN_MINT,
} as const;

const MAINNET_PROGRAMS = {
  memoMint: '8iq6zqaEVcfaym2u8t939PAN5jmfPVc6Z333RuxKTTZX',
  memoBurn: '2sb3gz5Cmr2g1ia5si2rmCZqPACxgaZXEmiS5k6Htcvh',
  memoProfile: '2BY8vPpQRFFwAqK3HqU5qL3qsGMH3VnX9Gv9bud3vzH8',
  memoProject: '6Vavot6ybhWBG3rjNXnLfNRPVTz7Garf6E4EZk3byp3a',
  memoBlog: '3EKdp88FgyPC41bxRDzFAtCDUMV2g9SVt5UiytE8wdzM',
  memoForum: '6gzhG5BveTkJfTi466toX4qmN3BtU9qp1Grnk61GvmXD',
  tokenMint: 'memoX1sJsBY6od7CfQ58XooRALwnocAZen4L7mW1ick',
  token2022: TOKEN_2022,
  memoToken: MEMO_TOKEN,
  memoTokenMint: MEMO_TOKEN_MINT,
} as const;

const TESTNET_RPC = 'https://rpc.testnet.x1.xyz';
const MAINNET_RPC = 'https://rpc.mainnet.x1.xyz';

function toProgramIds(raw: Record<keyof ProgramIds, string>): ProgramIds {
  return {
    memoMint: new PublicKey(raw.memoMint),
    memoBurn: new PublicKey(raw.memoBurn),
    memoProfile: new PublicKey(raw.memoProfile),
    memoProject: new PublicKey(raw.memoProject),
    memoBlog: new PublicKey(raw.memoBlog),
    memoForum: new PublicKey(raw.memoForum),
    tokenMint: new PublicKey(raw.tokenMint),
    token2022: new PublicKey(raw.token2022),
    memoToken: new PublicKey(raw.memoToken),
    memoTokenMint: new PublicKey(raw.memoTokenMint),
  };
}

/**
 * Build the config for a network. Production staging talks to the testnet
 * RPC but uses the mainnet program set.
 */
export function getNetworkConfig(network: NetworkType): NetworkConfig {
  switch (network) {
    case NetworkType.Testnet:
      return { network, rpcEndpoints: [TESTNET_RPC], programs: toProgramIds(TESTNET_PROGRAMS) };
    case NetworkType.ProdStaging:
      return { network, rpcEndpoints: [TESTNET_RPC], programs: toProgramIds(MAINNET_PROGRAMS) };
    case NetworkType.Mainnet:
      return { network, rpcEndpoints: [MAINNET_RPC], programs: toProgramIds(MAINNET_PROGRAMS) };
  }
}

export function isProductionNetwork(network: NetworkType): boolean {
  return network !== NetworkType.Testnet;
}

export function networkDisplayName(network: NetworkType): string {
  switch (network) {
    case NetworkType.Testnet:
      return 'Testnet';
    case NetworkType.ProdStaging:
      return 'Production Staging';
    case NetworkType.Mainnet:
      return 'Mainnet';
  }
}
