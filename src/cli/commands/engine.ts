import { resolve } from 'node:path';
import { findConfig, loadConfig } from '../../config/loader.js';
import { resolveConfig, type ResolvedRulesVmConfig } from '../../config/schema.js';
import { RulesEngine } from '../../engine/rules-engine.js';
import { createLogger, type Logger } from '../../utils/logger.js';

export interface EngineSetup {
  engine: RulesEngine;
  config: ResolvedRulesVmConfig;
  logger: Logger;
}

/**
 * Build an engine from an explicit config path, a config found in the
 * working directory, or the defaults.
 */
export function setupEngine(configPath?: string, verbose = false): EngineSetup | { error: string } {
  const bootstrap = createLogger(verbose ? 'debug' : 'warn');
  const path = configPath ? resolve(configPath) : findConfig();

  let config = resolveConfig();
  if (path) {
    const loaded = loadConfig(path, bootstrap);
    if (!loaded) {
      return { error: `Invalid config: ${path}` };
    }
    config = resolveConfig(loaded);
  }

  const logger = createLogger(verbose ? 'debug' : config.logLevel);
  const engine = new RulesEngine({
    logger,
    uriCacheSize: config.uriCacheSize,
    standardLibrary: config.standardLibrary,
  });
  for (const [name, value] of Object.entries(config.builtins)) {
    engine.addBuiltinProvider(name, () => value);
  }
  return { engine, config, logger };
}
