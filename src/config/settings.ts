/**
 * Client settings: validated with zod, loadable from the environment
 * @module config/settings
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { InvalidParameterError } from '../errors.js';
import { NetworkType } from './networks.js';

const SettingsSchema = z.object({
  network: z.nativeEnum(NetworkType).default(NetworkType.Testnet),
  /** Custom RPC endpoint; blank means "use the network default" */
  rpcUrl: z
    .string()
    .trim()
    .transform((value) => (value.length > 0 ? value : undefined))
    .pipe(z.string().url().optional())
    .optional(),
  /** Priority fee per compute unit; 0 means no price instruction */
  cuPriceMicroLamports: z.coerce.number().int().nonnegative().default(0),
  /** Overrides every compute policy's multiplier when set */
  cuBufferPercent: z.coerce.number().int().min(0).max(100).optional(),
  requestTimeoutMs: z.coerce.number().int().positive().default(30_000),
  maxConcurrency: z.coerce.number().int().positive().default(4),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'none']).default('warn'),
});

export type ClientSettingsInput = z.input<typeof SettingsSchema>;
export type ClientSettings = z.output<typeof SettingsSchema>;

/**
 * Validate raw settings. Throws InvalidParameterError listing every issue.
 */
export function parseSettings(input: ClientSettingsInput = {}): ClientSettings {
  return validate(input);
}

function validate(input: unknown): ClientSettings {
  const result = SettingsSchema.safeParse(input);

  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    const field = result.error.issues[0]?.path.join('.') ?? 'settings';
    throw new InvalidParameterError(field, `Invalid settings:\n${errors.join('\n')}`);
  }

  return result.data;
}

/**
 * Read settings from X1_* environment variables. When no env is given the
 * process environment is used, after loading any .env file.
 */
export function loadSettingsFromEnv(env?: Record<string, string | undefined>): ClientSettings {
  let source = env;
  if (source === undefined) {
    loadDotenv();
    source = process.env;
  }

  // numeric fields arrive as strings and are coerced by the schema
  return validate({
    network: pickNetwork(source['X1_NETWORK']),
    rpcUrl: source['X1_RPC_URL'],
    cuPriceMicroLamports: nonBlank(source['X1_CU_PRICE']),
    cuBufferPercent: nonBlank(source['X1_CU_BUFFER_PERCENT']),
    requestTimeoutMs: nonBlank(source['X1_REQUEST_TIMEOUT_MS']),
    maxConcurrency: nonBlank(source['X1_MAX_CONCURRENCY']),
    logLevel: pickLogLevel(source['X1_LOG_LEVEL']),
  });
}

function nonBlank(raw: string | undefined): string | undefined {
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

function pickNetwork(raw: string | undefined): NetworkType | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const match = Object.values(NetworkType).find((value) => value === raw.trim());
  if (!match) {
    throw new InvalidParameterError('network', `Unknown network: ${raw}`);
  }
  return match;
}

function pickLogLevel(raw: string | undefined): ClientSettings['logLevel'] | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const parsed = SettingsSchema.shape.logLevel.safeParse(raw.trim().toLowerCase());
  if (!parsed.success) {
    throw new InvalidParameterError('logLevel', `Unknown log level: ${raw}`);
  }
  return parsed.data;
}

/**
 * Read-only view of user settings consumed by the transport and estimator
 */
export interface SettingsProvider {
  customEndpoint(): string | undefined;
  cuPriceMicroLamports(): number | undefined;
  cuBufferMultiplier(): number | undefined;
}

export class StaticSettings implements SettingsProvider {
  constructor(private readonly settings: ClientSettings) {}

  customEndpoint(): string | undefined {
    return this.settings.rpcUrl;
  }

  cuPriceMicroLamports(): number | undefined {
    return this.settings.cuPriceMicroLamports > 0 ? this.settings.cuPriceMicroLamports : undefined;
  }

  cuBufferMultiplier(): number | undefined {
    const percent = this.settings.cuBufferPercent;
    if (percent === undefined) {
      return undefined;
    }
    return percent === 0 ? 1.0 : 1 + Math.min(percent, 100) / 100;
  }
}
