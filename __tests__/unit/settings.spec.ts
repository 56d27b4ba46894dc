/**
 * Unit tests for settings and network configuration
 */

import { StaticSettings, loadSettingsFromEnv, parseSettings } from '../../src/config/settings';
import {
  NetworkType,
  getNetworkConfig,
  isProductionNetwork,
  networkDisplayName,
} from '../../src/config/networks';
import { InvalidParameterError } from '../../src/errors';

describe('Settings', () => {
  it('should apply defaults', () => {
    expect(parseSettings()).toEqual({
      network: NetworkType.Testnet,
      cuPriceMicroLamports: 0,
      requestTimeoutMs: 30_000,
      maxConcurrency: 4,
      logLevel: 'warn',
    });
  });

  it('should treat a blank rpcUrl as unset and reject malformed ones', () => {
    expect(parseSettings({ rpcUrl: '   ' }).rpcUrl).toBeUndefined();
    expect(parseSettings({ rpcUrl: ' https://rpc.example.com ' }).rpcUrl).toBe('https://rpc.example.com');
    expect(() => parseSettings({ rpcUrl: 'not a url' })).toThrow(InvalidParameterError);
  });

  it('should name the first invalid field', () => {
    try {
      parseSettings({ cuBufferPercent: 150 });
      throw new Error('expected failure');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidParameterError);
      expect(error instanceof InvalidParameterError && error.field).toBe('cuBufferPercent');
    }
  });

  it('should read X1_* variables, coercing numbers', () => {
    const settings = loadSettingsFromEnv({
      X1_NETWORK: 'mainnet',
      X1_RPC_URL: '',
      X1_CU_PRICE: '1500',
      X1_CU_BUFFER_PERCENT: '20',
      X1_REQUEST_TIMEOUT_MS: ' ',
      X1_LOG_LEVEL: 'DEBUG',
    });

    expect(settings).toEqual({
      network: NetworkType.Mainnet,
      cuPriceMicroLamports: 1500,
      cuBufferPercent: 20,
      requestTimeoutMs: 30_000,
      maxConcurrency: 4,
      logLevel: 'debug',
    });
  });

  it('should reject unknown networks and log levels', () => {
    expect(() => loadSettingsFromEnv({ X1_NETWORK: 'devnet' })).toThrow('Unknown network: devnet');
    expect(() => loadSettingsFromEnv({ X1_LOG_LEVEL: 'loud' })).toThrow('Unknown log level: loud');
  });

  describe('StaticSettings', () => {
    it('should map a zero price to no price', () => {
      expect(new StaticSettings(parseSettings()).cuPriceMicroLamports()).toBeUndefined();
      expect(new StaticSettings(parseSettings({ cuPriceMicroLamports: 10 })).cuPriceMicroLamports()).toBe(10);
    });

    it('should turn the buffer percent into a multiplier', () => {
      expect(new StaticSettings(parseSettings()).cuBufferMultiplier()).toBeUndefined();
      expect(new StaticSettings(parseSettings({ cuBufferPercent: 0 })).cuBufferMultiplier()).toBe(1.0);
      expect(new StaticSettings(parseSettings({ cuBufferPercent: 50 })).cuBufferMultiplier()).toBe(1.5);
    });
  });
});

describe('Networks', () => {
  it('should pair production staging with the testnet RPC and mainnet programs', () => {
    const staging = getNetworkConfig(NetworkType.ProdStaging);
    const mainnet = getNetworkConfig(NetworkType.Mainnet);
    const testnet = getNetworkConfig(NetworkType.Testnet);

    expect(staging.rpcEndpoints).toEqual(testnet.rpcEndpoints);
    expect(staging.programs.memoBurn.equals(mainnet.programs.memoBurn)).toBe(true);
    expect(staging.programs.memoBurn.equals(testnet.programs.memoBurn)).toBe(false);
  });

  it('should describe networks', () => {
    expect(isProductionNetwork(NetworkType.Testnet)).toBe(false);
    expect(isProductionNetwork(NetworkType.ProdStaging)).toBe(true);
    expect(networkDisplayName(NetworkType.ProdStaging)).toBe('Production Staging');
  });
});
