#!/usr/bin/env node

import { disassembleCommand, type CommandResult } from './commands/disassemble.js';
import { paramsCommand } from './commands/params.js';
import { resolveCommand } from './commands/resolve.js';

const VERSION = '0.1.0';

function printHelp(): void {
  console.log(`
rules-vm - Endpoint rules bytecode toolkit

Usage:
  rules-vm <command> [options]

Commands:
  disassemble <file>                Print a readable listing of a compiled program
  params <file>                     List the parameters a program accepts
  resolve <file>                    Evaluate a program and print the result
  version                           Show version information
  help                              Show this help message

Global Options:
  --config <path>   Config file (default: rules-vm.config.yaml in the current directory)
  --json            Output as JSON
  --verbose         Verbose output
  --help, -h        Show help

Command Options:
  resolve:
    --params <path>       YAML or JSON file with parameter values
    --param <name=value>  Parameter value; repeatable; true/false become booleans

Exit Codes:
  0  Success
  1  Failure (invalid program, evaluation error, no rule matched)
  2  Usage error (invalid arguments)

Examples:
  rules-vm disassemble rules.bin
  rules-vm resolve rules.bin --param region=us-west-2 --param useFips=true
  rules-vm resolve rules.bin --params params.yaml --json
`);
}

function printVersion(): void {
  console.log(`rules-vm v${VERSION}`);
}

interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
  params: string[];
}

function parseArgs(args: string[]): ParsedArgs {
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};
  const positionals: string[] = [];
  const params: string[] = [];
  let command = '';

  const valueFlags = new Set(['config', 'params']);

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const flag = arg.slice(2);
      if (flag === 'param' && i + 1 < args.length) {
        params.push(args[++i]);
      } else if (valueFlags.has(flag) && i + 1 < args.length) {
        options[flag] = args[++i];
      } else {
        flags[flag] = true;
      }
    } else if (arg.startsWith('-')) {
      for (const f of arg.slice(1).split('')) {
        switch (f) {
          case 'h': flags['help'] = true; break;
          case 'v': flags['verbose'] = true; break;
        }
      }
    } else if (!command) {
      command = arg;
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags, options, params };
}

function finish(result: CommandResult): never {
  if (result.success) {
    if (result.output) console.log(result.output);
    process.exit(0);
  }
  console.error(`Error: ${result.error ?? 'Unknown error'}`);
  process.exit(1);
}

function main(): void {
  const { command, positionals, flags, options, params } = parseArgs(process.argv.slice(2));

  if (flags['help'] || command === 'help') {
    printHelp();
    process.exit(0);
  }

  if (flags['version'] || command === 'version') {
    printVersion();
    process.exit(0);
  }

  const file = positionals[0];
  switch (command) {
    case 'disassemble':
    case 'params':
    case 'resolve':
      if (!file) {
        console.error(`Error: ${command} requires a bytecode file`);
        process.exit(2);
      }
      break;
    case '':
      printHelp();
      process.exit(2);
    default:
      console.error(`Unknown command: ${command}`);
      console.error('Run "rules-vm help" for usage.');
      process.exit(2);
  }

  if (command === 'disassemble') {
    finish(disassembleCommand({ file, config: options['config'], verbose: flags['verbose'] }));
  }
  if (command === 'params') {
    finish(paramsCommand({ file, config: options['config'], json: flags['json'] }));
  }
  finish(
    resolveCommand({
      file,
      paramsFile: options['params'],
      params,
      config: options['config'],
      json: flags['json'],
      verbose: flags['verbose'],
    }),
  );
}

main();
