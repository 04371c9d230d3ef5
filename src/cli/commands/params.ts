import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { formatConstant } from '../../bytecode/disassembler.js';
import type { ParameterDefinition } from '../../engine/rules-program.js';
import { errorMessage } from '../../errors.js';
import type { CommandResult } from './disassemble.js';
import { setupEngine } from './engine.js';

export interface ParamsOptions {
  file: string;
  config?: string;
  json?: boolean;
}

/**
 * List the parameters a program accepts.
 */
export function paramsCommand(options: ParamsOptions): CommandResult {
  const path = resolve(options.file);
  if (!existsSync(path)) {
    return { success: false, error: `File not found: ${options.file}` };
  }
  const setup = setupEngine(options.config);
  if ('error' in setup) {
    return { success: false, error: setup.error };
  }

  let parameters: ParameterDefinition[];
  try {
    parameters = setup.engine.loadFile(path).parameters;
  } catch (err) {
    return { success: false, error: errorMessage(err) };
  }

  if (options.json) {
    return { success: true, output: JSON.stringify(parameters, null, 2) };
  }
  const lines = parameters.map((p) => {
    let line = p.name;
    if (p.required) line += ' (required)';
    if (p.defaultValue !== null) line += ` default=${formatConstant(p.defaultValue)}`;
    if (p.builtin !== null) line += ` builtin=${p.builtin}`;
    return line;
  });
  return { success: true, output: lines.length > 0 ? lines.join('\n') : '(no parameters)' };
}
