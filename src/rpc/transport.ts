/**
 * JSON-RPC 2.0 over HTTP POST
 * @module rpc/transport
 */

import { randomBytes, randomInt } from 'node:crypto';
import { z } from 'zod';
import {
  CancelledError,
  ConnectionFailedError,
  InvalidParameterError,
  OtherError,
  ProtocolError,
  TimeoutError,
  extractProgramErrorMessage,
} from '../errors.js';
import { Logger, silentLogger } from '../utils/logger.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/** Picks an index in [0, n); may throw, in which case the next source is tried */
export type RandomIndexSource = (n: number) => number;

export const defaultRandomSources: readonly RandomIndexSource[] = [
  (n) => randomInt(n),
  (n) => Math.floor(Math.random() * n),
];

export interface TransportOptions {
  /** Candidate endpoints; one is chosen at construction */
  endpoints: readonly string[];
  /** Takes precedence over `endpoints` when non-blank */
  customEndpoint?: string;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
  /** Per-request deadline (default: 30000) */
  timeoutMs?: number;
  randomSources?: readonly RandomIndexSource[];
  logger?: Logger;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

const ErrorObjectSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

const EnvelopeSchema = z.object({
  result: z.unknown().optional(),
  error: ErrorObjectSchema.optional(),
});

const ErrorDataSchema = z.object({
  logs: z.array(z.string()).nullish(),
});

/**
 * Pick the endpoint for a transport. Never fails while at least one
 * candidate exists: each random source is tried in turn and the clock is
 * the last resort.
 */
export function selectEndpoint(
  endpoints: readonly string[],
  customEndpoint?: string,
  sources: readonly RandomIndexSource[] = defaultRandomSources,
  logger: Logger = silentLogger
): string {
  const custom = customEndpoint?.trim();
  if (custom) {
    return custom;
  }
  if (endpoints.length === 0) {
    throw new InvalidParameterError('endpoints', 'No RPC endpoints configured');
  }

  for (const source of sources) {
    try {
      const index = source(endpoints.length);
      const endpoint = Number.isInteger(index) ? endpoints[index] : undefined;
      if (endpoint !== undefined) {
        return endpoint;
      }
    } catch (error) {
      logger.debug('Random source failed, trying next', error);
    }
  }

  return endpoints[Date.now() % endpoints.length];
}

const SAFE_ID_MASK = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Random request id that survives a JSON round trip as a number
 */
export function generateRequestId(): number {
  try {
    return Number(randomBytes(8).readBigUInt64LE(0) & SAFE_ID_MASK);
  } catch {
    return (Date.now() % 10_000_000_000) * 10_000 + Math.floor(Math.random() * 10_000);
  }
}

function hasResult(raw: unknown): boolean {
  return typeof raw === 'object' && raw !== null && 'result' in raw;
}

export class JsonRpcTransport {
  readonly endpoint: string;
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: TransportOptions) {
    this.logger = options.logger ?? silentLogger;
    this.endpoint = selectEndpoint(
      options.endpoints,
      options.customEndpoint,
      options.randomSources,
      this.logger
    );
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  /**
   * One POST, no retries. The result is decoded with `schema` exactly once.
   */
  async send<T>(
    method: string,
    params: unknown[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    const raw = await this.post(method, params, options.signal);

    const envelope = EnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      throw new OtherError(`Malformed JSON-RPC response to ${method}`);
    }

    const rpcError = envelope.data.error;
    if (rpcError) {
      const data = ErrorDataSchema.safeParse(rpcError.data);
      const logs = data.success ? data.data.logs ?? undefined : undefined;
      throw new ProtocolError(rpcError.code, rpcError.message, extractProgramErrorMessage(logs), logs);
    }

    if (!hasResult(raw)) {
      throw new OtherError('Response missing result field');
    }

    const decoded = schema.safeParse(envelope.data.result);
    if (!decoded.success) {
      const issues = decoded.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new OtherError(`Unexpected ${method} result: ${issues.join('; ')}`);
    }
    return decoded.data;
  }

  private async post(method: string, params: unknown[], signal?: AbortSignal): Promise<unknown> {
    if (signal?.aborted) {
      throw new CancelledError();
    }

    const id = generateRequestId();
    const body = JSON.stringify({ jsonrpc: '2.0', id, method, params });

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    this.logger.debug(`-> ${method} #${id}`);

    try {
      const response = await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
        signal: controller.signal,
      });

      if (!response.ok) {
        // release the connection; the body is never read
        await response.body?.cancel();
        throw new ConnectionFailedError(
          `HTTP ${response.status} from ${this.endpoint}`,
          response.status
        );
      }

      try {
        return await response.json();
      } catch (error) {
        if (controller.signal.aborted) {
          throw error;
        }
        throw new OtherError(`Invalid JSON in response to ${method}`, error);
      }
    } catch (error) {
      if (timedOut) {
        throw new TimeoutError(this.timeoutMs);
      }
      if (signal?.aborted) {
        throw new CancelledError();
      }
      if (error instanceof ConnectionFailedError || error instanceof OtherError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ConnectionFailedError(`Request to ${this.endpoint} failed: ${message}`, undefined, error);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
