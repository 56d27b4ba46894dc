/**
 * BurnMemo envelope: the Base64 text carried by the SPL memo instruction
 * @module codec/memo
 */

import { InvalidParameterError, OtherError } from '../errors.js';
import { BorshReader, BorshWriter, utf8Length } from './borsh.js';

export const BURN_MEMO_VERSION = 1;

/** version (1) + burn_amount (8) + payload length prefix (4) */
export const MEMO_ENVELOPE_OVERHEAD = 13;
export const MAX_MEMO_PAYLOAD = 800 - MEMO_ENVELOPE_OVERHEAD;

export interface MemoBounds {
  min: number;
  max: number;
}

/** Bounds enforced by the burn, mint and content programs */
export const STANDARD_MEMO_BOUNDS: MemoBounds = { min: 69, max: 800 };
/** Bounds enforced by the token program */
export const TOKEN_MEMO_BOUNDS: MemoBounds = { min: 69, max: 700 };

export interface BurnMemo {
  version: number;
  burnAmount: bigint;
  payload: Buffer;
}

/**
 * Length of the Base64 memo text for a payload of `payloadLength` bytes
 */
export function encodedMemoLength(payloadLength: number): number {
  return 4 * Math.ceil((MEMO_ENVELOPE_OVERHEAD + payloadLength) / 3);
}

export function checkMemoLength(length: number, bounds: MemoBounds): void {
  if (length < bounds.min) {
    throw new InvalidParameterError(
      'memo',
      `Memo too short: ${length} bytes (min: ${bounds.min})`
    );
  }
  if (length > bounds.max) {
    throw new InvalidParameterError(
      'memo',
      `Memo too long: ${length} bytes (max: ${bounds.max})`
    );
  }
}

/**
 * Check a plain-text memo (no envelope) against the bounds
 */
export function validateMemoText(text: string, bounds: MemoBounds = STANDARD_MEMO_BOUNDS): void {
  checkMemoLength(utf8Length(text), bounds);
}

/**
 * Wrap a payload in a BurnMemo envelope and Base64 it. The final length is
 * checked before anything is encoded.
 */
export function encodeMemo(
  payload: Uint8Array,
  burnAmount: bigint,
  bounds: MemoBounds = STANDARD_MEMO_BOUNDS
): string {
  if (payload.length > MAX_MEMO_PAYLOAD) {
    throw new InvalidParameterError(
      'payload',
      `Payload too long: ${payload.length} bytes (max: ${MAX_MEMO_PAYLOAD})`
    );
  }
  checkMemoLength(encodedMemoLength(payload.length), bounds);

  return new BorshWriter()
    .u8(BURN_MEMO_VERSION)
    .u64(burnAmount, 'burnAmount')
    .bytes(payload)
    .toBuffer()
    .toString('base64');
}

/**
 * Strict envelope decode: known version, every byte consumed
 */
export function decodeBurnMemo(bytes: Uint8Array): BurnMemo {
  const reader = new BorshReader(bytes);
  const version = reader.u8('version');
  if (version !== BURN_MEMO_VERSION) {
    throw new OtherError(`Unsupported burn memo version: ${version}`);
  }
  const burnAmount = reader.u64('burnAmount');
  const payload = reader.bytes('payload');
  reader.expectEnd('BurnMemo');
  return { version, burnAmount, payload };
}

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Signature listings render memos as "[len] text"; keep only the text
 */
export function stripHistoryPrefix(memo: string): string {
  const trimmed = memo.trim();
  const space = trimmed.indexOf(' ');
  return space === -1 ? trimmed : trimmed.slice(space + 1).trim();
}

/**
 * Decode memo text found on the ledger. Third-party memos are common, so
 * anything that isn't a well-formed envelope yields undefined.
 */
export function decodeMemoText(memo: string): BurnMemo | undefined {
  const text = stripHistoryPrefix(memo);
  if (text.length === 0 || !BASE64_PATTERN.test(text)) {
    return undefined;
  }
  try {
    return decodeBurnMemo(Buffer.from(text, 'base64'));
  } catch {
    return undefined;
  }
}
