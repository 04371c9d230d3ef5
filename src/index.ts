/**
 * endpoint-rules-vm
 *
 * Bytecode virtual machine for compiled endpoint rule sets.
 *
 * @module endpoint-rules-vm
 */

// Errors
export {
  RulesErrorCode,
  RulesEngineError,
  InvalidProgramError,
  BytecodeFormatError,
  RulesCompileError,
  RulesEvaluationError,
} from './errors.js';

// Runtime values
export type { RuntimeValue, RuntimeMap, RuntimeTypeName } from './runtime/values.js';
export { isSet, isRuntimeMap, typeName, valuesEqual, stringifyValue, normalizeValue } from './runtime/values.js';
export { ParsedUri, UriSyntaxError } from './runtime/uri.js';
export { LruCache, type LruCacheOptions } from './runtime/lru-cache.js';
export { UriCache, DEFAULT_URI_CACHE_SIZE } from './runtime/uri-cache.js';
export { substring, split, uriEncode, isValidHostLabel } from './runtime/string-functions.js';

// Bytecode
export { Opcode, EndpointFlag, getOpcodeInfo, type OpcodeInfo, type OpcodeName, type OperandKind } from './bytecode/opcodes.js';
export { MAGIC, VERSION, HEADER_SIZE, ConstantTag, MAX_REGISTERS, MAX_CONSTANT_DEPTH } from './bytecode/format.js';
export { Bytecode, type BytecodeInit, type RegisterDefinition } from './bytecode/bytecode.js';
export { serializeBytecode, deserializeBytecode, type FunctionLookup } from './bytecode/codec.js';
export { BytecodeWriter, type BuildOptions } from './bytecode/writer.js';
export { ConstantPool } from './bytecode/constant-pool.js';
export { RegisterAllocator, type RegisterOptions } from './bytecode/register-allocator.js';
export { BytecodeWalker } from './bytecode/walker.js';
export { BytecodeDisassembler, disassemble, formatConstant } from './bytecode/disassembler.js';

// BDD
export {
  TRUE_REF,
  FALSE_REF,
  RESULT_OFFSET,
  evaluateBdd,
  validateBdd,
  resultRef,
  nodeRef,
  describeRef,
  type BddOutcome,
} from './bdd/bdd.js';

// VM
export { VARIADIC, defineFunction, type RulesFunction } from './vm/functions.js';
export { Endpoint, EndpointBuilder, type HeaderMap, type RulesResult } from './vm/endpoint.js';
export {
  RegisterFiller,
  type BuiltinProvider,
  type EvaluationContext,
  type Parameters,
} from './vm/register-filler.js';
export { BytecodeEvaluator, type EvaluatorOptions } from './vm/evaluator.js';

// Engine
export type { RulesExtension } from './engine/extension.js';
export { standardExtension, STANDARD_FUNCTIONS, ENDPOINT_BUILTIN } from './engine/std-extension.js';
export { RulesEngine, type RulesEngineOptions } from './engine/rules-engine.js';
export { RulesProgram, type RulesProgramOptions, type ParameterDefinition } from './engine/rules-program.js';

// Config & logging
export { createLogger, type Logger, type LogLevel } from './utils/logger.js';
export {
  DEFAULT_CONFIG,
  validateConfig,
  resolveConfig,
  type RulesVmConfig,
  type ResolvedRulesVmConfig,
} from './config/schema.js';
export { findConfig, loadConfig } from './config/loader.js';
