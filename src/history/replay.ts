/**
 * Turning signature-listing memos back into typed records
 * @module history/replay
 */

import { decodeMemoText } from '../codec/memo.js';
import { DomainRecord, tryDecodeRecord } from '../codec/records.js';
import { InvalidParameterError } from '../errors.js';
import { SignatureInfo } from '../rpc/client.js';

export const MAX_HISTORY_LIMIT = 1000;
export const RECENT_TRANSACTIONS_LIMIT = 20;

export interface ReplayedMemo {
  signature: string;
  slot: number;
  /** Block time in seconds, 0 when unknown */
  timestamp: number;
  burnAmount: bigint;
  record: DomainRecord;
}

export type MemoMessageKind = 'burn' | 'mint';

export interface MemoMessage {
  signature: string;
  user: string;
  message: string;
  timestamp: number;
  slot: number;
  amount: bigint;
  kind: MemoMessageKind;
}

export interface MessagePage {
  messages: MemoMessage[];
  totalFound: number;
  /** The listing filled the requested page, so older entries may exist */
  hasMore: boolean;
}

export function validateHistoryLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_HISTORY_LIMIT) {
    throw new InvalidParameterError('limit', `Limit must be between 1 and ${MAX_HISTORY_LIMIT}`);
  }
}

/**
 * Decode one memo. Foreign or malformed memos yield undefined.
 */
export function replayMemo(memo: string | null): { burnAmount: bigint; record: DomainRecord } | undefined {
  if (memo === null) {
    return undefined;
  }
  const envelope = decodeMemoText(memo);
  if (!envelope) {
    return undefined;
  }
  const record = tryDecodeRecord(envelope.payload);
  return record ? { burnAmount: envelope.burnAmount, record } : undefined;
}

export function replaySignatures(infos: readonly SignatureInfo[]): ReplayedMemo[] {
  const replayed: ReplayedMemo[] = [];
  for (const info of infos) {
    const decoded = replayMemo(info.memo);
    if (decoded) {
      replayed.push({
        signature: info.signature,
        slot: info.slot,
        timestamp: info.blockTime ?? 0,
        burnAmount: decoded.burnAmount,
        record: decoded.record,
      });
    }
  }
  return replayed;
}

/**
 * The account that acted, as recorded in the memo itself
 */
export function recordActor(record: DomainRecord): string | undefined {
  switch (record.operation) {
    case 'create_profile':
    case 'update_profile':
      return record.userPubkey;
    case 'burn_for_blog':
    case 'burn_for_project':
      return record.burner;
    case 'mint_for_blog':
      return record.minter;
    case 'create_post':
      return record.creator;
    case 'burn_for_post':
    case 'mint_for_post':
      return record.user;
    default:
      return undefined;
  }
}

export function toMemoMessage(entry: ReplayedMemo): MemoMessage | undefined {
  const { record } = entry;
  let user: string;
  let kind: MemoMessageKind;

  switch (record.operation) {
    case 'burn_for_blog':
    case 'burn_for_project':
      user = record.burner;
      kind = 'burn';
      break;
    case 'burn_for_post':
      user = record.user;
      kind = 'burn';
      break;
    case 'mint_for_blog':
      user = record.minter;
      kind = 'mint';
      break;
    case 'mint_for_post':
      user = record.user;
      kind = 'mint';
      break;
    default:
      return undefined;
  }

  if (record.message.trim().length === 0) {
    return undefined;
  }

  return {
    signature: entry.signature,
    user,
    message: record.message,
    timestamp: entry.timestamp,
    slot: entry.slot,
    amount: kind === 'mint' ? 0n : entry.burnAmount,
    kind,
  };
}

/**
 * Burn and mint messages from one page of signatures, newest first
 */
export function collectMessages(infos: readonly SignatureInfo[], limit: number): MessagePage {
  const messages: MemoMessage[] = [];
  for (const entry of replaySignatures(infos)) {
    const message = toMemoMessage(entry);
    if (message) {
      messages.push(message);
    }
  }
  messages.sort((a, b) => b.timestamp - a.timestamp);

  return { messages, totalFound: messages.length, hasMore: infos.length === limit };
}

export interface ContractTransaction {
  signature: string;
  timestamp: number;
  slot: number;
  operation: DomainRecord['operation'];
  actor?: string;
  burnAmount: bigint;
  record: DomainRecord;
}

/**
 * Every decodable record of `category`, in listing order
 */
export function collectContractTransactions(
  infos: readonly SignatureInfo[],
  category: DomainRecord['category']
): ContractTransaction[] {
  return replaySignatures(infos)
    .filter((entry) => entry.record.category === category)
    .map((entry) => ({
      signature: entry.signature,
      timestamp: entry.timestamp,
      slot: entry.slot,
      operation: entry.record.operation,
      actor: recordActor(entry.record),
      burnAmount: entry.burnAmount,
      record: entry.record,
    }));
}
