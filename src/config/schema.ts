// src/config/schema.ts
// rules-vm configuration schema and validation

import { isLogLevel, type LogLevel } from '../utils/logger.js';

export interface RulesVmConfig {
  logLevel?: LogLevel;
  uriCacheSize?: number;
  standardLibrary?: boolean;
  /** Evaluation context handed to builtin providers and extensions */
  context?: Record<string, unknown>;
  /** Static builtin values, registered as builtin providers */
  builtins?: Record<string, unknown>;
}

export interface ResolvedRulesVmConfig {
  logLevel: LogLevel;
  uriCacheSize: number;
  standardLibrary: boolean;
  context: Record<string, unknown>;
  builtins: Record<string, unknown>;
}

/**
 * Default settings
 */
export const DEFAULT_CONFIG: ResolvedRulesVmConfig = {
  logLevel: 'warn',
  uriCacheSize: 32,
  standardLibrary: true,
  context: {},
  builtins: {},
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a config object, returning the problems found
 */
export function configErrors(config: unknown): string[] {
  if (!isRecord(config)) {
    return ['config must be a mapping'];
  }

  const errors: string[] = [];
  if (config.logLevel !== undefined && !isLogLevel(config.logLevel)) {
    errors.push(`logLevel must be one of debug, info, warn, error, silent`);
  }
  if (
    config.uriCacheSize !== undefined &&
    (typeof config.uriCacheSize !== 'number' || !Number.isInteger(config.uriCacheSize) || config.uriCacheSize < 1)
  ) {
    errors.push('uriCacheSize must be a positive integer');
  }
  if (config.standardLibrary !== undefined && typeof config.standardLibrary !== 'boolean') {
    errors.push('standardLibrary must be a boolean');
  }
  if (config.context !== undefined && !isRecord(config.context)) {
    errors.push('context must be a mapping');
  }
  if (config.builtins !== undefined && !isRecord(config.builtins)) {
    errors.push('builtins must be a mapping');
  }
  return errors;
}

export function validateConfig(config: unknown): config is RulesVmConfig {
  return configErrors(config).length === 0;
}

export function resolveConfig(config: RulesVmConfig = {}): ResolvedRulesVmConfig {
  return {
    logLevel: config.logLevel ?? DEFAULT_CONFIG.logLevel,
    uriCacheSize: config.uriCacheSize ?? DEFAULT_CONFIG.uriCacheSize,
    standardLibrary: config.standardLibrary ?? DEFAULT_CONFIG.standardLibrary,
    context: { ...DEFAULT_CONFIG.context, ...config.context },
    builtins: { ...DEFAULT_CONFIG.builtins, ...config.builtins },
  };
}
