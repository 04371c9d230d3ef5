import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { errorMessage } from '../../errors.js';
import { setupEngine } from './engine.js';

export interface DisassembleOptions {
  file: string;
  config?: string;
  verbose?: boolean;
}

export interface CommandResult {
  success: boolean;
  output?: string;
  error?: string;
}

export function disassembleCommand(options: DisassembleOptions): CommandResult {
  const path = resolve(options.file);
  if (!existsSync(path)) {
    return { success: false, error: `File not found: ${options.file}` };
  }
  const setup = setupEngine(options.config, options.verbose);
  if ('error' in setup) {
    return { success: false, error: setup.error };
  }
  try {
    return { success: true, output: setup.engine.loadFile(path).disassemble() };
  } catch (err) {
    return { success: false, error: errorMessage(err) };
  }
}
