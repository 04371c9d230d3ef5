import { existsSync, readFileSync } from 'node:fs';
import { resolve as resolvePath } from 'node:path';
import { parseDocument } from '../../config/loader.js';
import { errorMessage } from '../../errors.js';
import { stringifyValue } from '../../runtime/values.js';
import { Endpoint } from '../../vm/endpoint.js';
import type { CommandResult } from './disassemble.js';
import { setupEngine } from './engine.js';

export interface ResolveOptions {
  file: string;
  /** YAML or JSON file with a parameter mapping */
  paramsFile?: string;
  /** `name=value` pairs; `true` and `false` become booleans */
  params?: string[];
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export type ParsedParams = { ok: true; params: Record<string, unknown> } | { ok: false; error: string };

export function parseParamPairs(pairs: readonly string[]): ParsedParams {
  const result: Record<string, unknown> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      return { ok: false, error: `Invalid --param '${pair}', expected name=value` };
    }
    const raw = pair.slice(eq + 1);
    Object.defineProperty(result, pair.slice(0, eq), {
      value: raw === 'true' ? true : raw === 'false' ? false : raw,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return { ok: true, params: result };
}

export function formatEndpoint(endpoint: Endpoint): string {
  const lines = [`Endpoint: ${endpoint.uri.toString()}`];
  for (const [name, values] of Object.entries(endpoint.headers)) {
    lines.push(`  header ${name}: ${values.join(', ')}`);
  }
  for (const [key, value] of Object.entries(endpoint.properties)) {
    lines.push(`  property ${key}: ${stringifyValue(value)}`);
  }
  return lines.join('\n');
}

export function resolveCommand(options: ResolveOptions): CommandResult {
  const path = resolvePath(options.file);
  if (!existsSync(path)) {
    return { success: false, error: `File not found: ${options.file}` };
  }

  let params: Record<string, unknown> = {};
  if (options.paramsFile) {
    try {
      const parsed = parseDocument(readFileSync(resolvePath(options.paramsFile), 'utf-8'), options.paramsFile);
      if (!isRecord(parsed)) {
        return { success: false, error: 'Parameters file must contain a mapping' };
      }
      params = parsed;
    } catch (err) {
      return { success: false, error: `Failed to read parameters: ${errorMessage(err)}` };
    }
  }
  const pairs = parseParamPairs(options.params ?? []);
  if (!pairs.ok) {
    return { success: false, error: pairs.error };
  }
  params = { ...params, ...pairs.params };

  const setup = setupEngine(options.config, options.verbose);
  if ('error' in setup) {
    return { success: false, error: setup.error };
  }

  try {
    const program = setup.engine.loadFile(path);
    const result = program.run(params, setup.config.context);
    if (result === null) {
      return { success: false, error: 'No rule matched' };
    }
    if (options.json) {
      return { success: true, output: JSON.stringify(result, null, 2) };
    }
    return {
      success: true,
      output: result instanceof Endpoint ? formatEndpoint(result) : `Value: ${stringifyValue(result)}`,
    };
  } catch (err) {
    return { success: false, error: errorMessage(err) };
  }
}
