// src/config/loader.ts
// Load and parse rules-vm configuration files

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { Logger } from '../utils/logger.js';
import { configErrors, validateConfig, type RulesVmConfig } from './schema.js';

const CONFIG_YAML = 'rules-vm.config.yaml';
const CONFIG_YML = 'rules-vm.config.yml';
const CONFIG_JSON = 'rules-vm.config.json';

/**
 * Find a config file in the given directory
 */
export function findConfig(dir: string = process.cwd()): string | null {
  for (const name of [CONFIG_YAML, CONFIG_YML, CONFIG_JSON]) {
    const path = join(dir, name);
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Parse YAML or JSON text. JSON is a subset of YAML, but JSON files are
 * parsed strictly so syntax errors are reported as JSON errors.
 */
export function parseDocument(content: string, path: string): unknown {
  return path.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
}

/**
 * Load and validate a config file. Returns null (and logs why) when the
 * file is missing, unparsable or invalid.
 */
export function loadConfig(path: string, logger: Logger): RulesVmConfig | null {
  if (!existsSync(path)) {
    logger.warn('Config file not found', { path });
    return null;
  }

  let parsed: unknown;
  try {
    parsed = parseDocument(readFileSync(path, 'utf-8'), path) ?? {};
  } catch (err) {
    logger.error('Failed to parse config', { path }, err instanceof Error ? err : new Error(String(err)));
    return null;
  }

  if (!validateConfig(parsed)) {
    logger.error('Invalid config', { path, errors: configErrors(parsed) });
    return null;
  }
  logger.debug('Loaded config', { path });
  return parsed;
}
