/**
 * Error taxonomy for memo SDK operations
 * @module errors
 */

/**
 * Coarse classification every failure maps onto
 */
export enum ErrorKind {
  ConnectionFailed = 'ConnectionFailed',
  InvalidAddress = 'InvalidAddress',
  InvalidParameter = 'InvalidParameter',
  TransactionFailed = 'TransactionFailed',
  Protocol = 'Protocol',
  Timeout = 'Timeout',
  Cancelled = 'Cancelled',
  Other = 'Other',
}

/**
 * Base error class for all memo SDK errors
 */
export class MemoSdkError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly kind: ErrorKind,
    public readonly retriable: boolean = false
  ) {
    super(message);
    this.name = 'MemoSdkError';
    Object.setPrototypeOf(this, MemoSdkError.prototype);
  }
}

/**
 * Thrown when the endpoint cannot be reached or answers with a non-2xx status
 */
export class ConnectionFailedError extends MemoSdkError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: unknown
  ) {
    super(message, 'ERR_CONNECTION_FAILED', ErrorKind.ConnectionFailed, true);
    this.name = 'ConnectionFailedError';
    this.cause = cause;
    Object.setPrototypeOf(this, ConnectionFailedError.prototype);
  }
}

/**
 * Thrown when the transport's own deadline fires
 */
export class TimeoutError extends MemoSdkError {
  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, 'ERR_TIMEOUT', ErrorKind.Timeout, true);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Thrown when the caller aborts an in-flight request
 */
export class CancelledError extends MemoSdkError {
  constructor(message: string = 'Request cancelled') {
    super(message, 'ERR_CANCELLED', ErrorKind.Cancelled, false);
    this.name = 'CancelledError';
    Object.setPrototypeOf(this, CancelledError.prototype);
  }
}

export class InvalidAddressError extends MemoSdkError {
  constructor(public readonly input: string, cause?: unknown) {
    super(`Invalid address: ${input}`, 'ERR_INVALID_ADDRESS', ErrorKind.InvalidAddress, false);
    this.name = 'InvalidAddressError';
    this.cause = cause;
    Object.setPrototypeOf(this, InvalidAddressError.prototype);
  }
}

/**
 * Thrown when caller input violates a documented limit. `field` names the
 * offending input so callers can point at it.
 */
export class InvalidParameterError extends MemoSdkError {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(message, 'ERR_INVALID_PARAMETER', ErrorKind.InvalidParameter, false);
    this.name = 'InvalidParameterError';
    Object.setPrototypeOf(this, InvalidParameterError.prototype);
  }
}

/**
 * Thrown when the ledger rejects a transaction, during simulation or send
 */
export class TransactionFailedError extends MemoSdkError {
  constructor(
    message: string,
    public readonly rpcCode?: number,
    public readonly detail?: string,
    public readonly logs?: string[]
  ) {
    super(message, 'ERR_TRANSACTION_FAILED', ErrorKind.TransactionFailed, false);
    this.name = 'TransactionFailedError';
    Object.setPrototypeOf(this, TransactionFailedError.prototype);
  }
}

/**
 * Thrown when the endpoint answers with a JSON-RPC error object
 */
export class ProtocolError extends MemoSdkError {
  constructor(
    public readonly rpcCode: number,
    message: string,
    public readonly detail?: string,
    public readonly logs?: string[]
  ) {
    super(
      detail ? `RPC error ${rpcCode}: ${message} (${detail})` : `RPC error ${rpcCode}: ${message}`,
      'ERR_PROTOCOL',
      ErrorKind.Protocol,
      false
    );
    this.name = 'ProtocolError';
    Object.setPrototypeOf(this, ProtocolError.prototype);
  }
}

export class OtherError extends MemoSdkError {
  constructor(message: string, cause?: unknown) {
    super(message, 'ERR_OTHER', ErrorKind.Other, false);
    this.name = 'OtherError';
    this.cause = cause;
    Object.setPrototypeOf(this, OtherError.prototype);
  }
}

/**
 * Thrown by binary readers when the input ends before a field does
 */
export class TruncatedError extends OtherError {
  constructor(
    public readonly field: string,
    public readonly needed: number,
    public readonly available: number
  ) {
    super(`Truncated data reading ${field}: needed ${needed} bytes, ${available} available`);
    this.name = 'TruncatedError';
    Object.setPrototypeOf(this, TruncatedError.prototype);
  }
}

/**
 * Classify any thrown value. fetch rejects with a TypeError on network
 * failure, so that counts as a connection failure.
 */
export function errorKindOf(error: unknown): ErrorKind {
  if (error instanceof MemoSdkError) {
    return error.kind;
  }
  if (error instanceof TypeError) {
    return ErrorKind.ConnectionFailed;
  }
  return ErrorKind.Other;
}

/**
 * Wrap an arbitrary thrown value so callers always see a MemoSdkError
 */
export function toMemoSdkError(error: unknown): MemoSdkError {
  if (error instanceof MemoSdkError) {
    return error;
  }
  if (error instanceof TypeError) {
    return new ConnectionFailedError(error.message, undefined, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new OtherError(message, error);
}

const PROGRAM_ERROR_MARKER = 'Error Message: ';

/**
 * Pull the human-readable program error out of execution logs.
 * Returns undefined when no log line carries one.
 */
export function extractProgramErrorMessage(logs: readonly string[] | undefined): string | undefined {
  if (!logs) {
    return undefined;
  }
  for (const line of logs) {
    const at = line.indexOf(PROGRAM_ERROR_MARKER);
    if (at === -1) {
      continue;
    }
    const text = line.slice(at + PROGRAM_ERROR_MARKER.length).trim().replace(/\.$/, '');
    if (text.length > 0) {
      return text;
    }
  }
  return undefined;
}

/**
 * Re-raise a structured RPC error from sendTransaction as a rejected transaction
 */
export function asTransactionFailure(error: unknown): unknown {
  if (error instanceof ProtocolError) {
    return new TransactionFailedError(
      error.detail ?? error.message,
      error.rpcCode,
      error.detail,
      error.logs
    );
  }
  return error;
}
