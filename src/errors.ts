/**
 * Error taxonomy for the rules engine.
 *
 * Callers can tell "this program is invalid" ({@link InvalidProgramError})
 * apart from "this program failed on this input" ({@link RulesEvaluationError}).
 *
 * @module errors
 */

export const RulesErrorCode = {
  INVALID_FORMAT: 'INVALID_FORMAT',
  COMPILE_ERROR: 'COMPILE_ERROR',
  EVALUATION_ERROR: 'EVALUATION_ERROR',
} as const;

export type RulesErrorCode = (typeof RulesErrorCode)[keyof typeof RulesErrorCode];

export class RulesEngineError extends Error {
  readonly code: RulesErrorCode;

  constructor(code: RulesErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RulesEngineError';
    this.code = code;
  }
}

export class InvalidProgramError extends RulesEngineError {
  constructor(code: RulesErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = 'InvalidProgramError';
  }
}

/**
 * Malformed binary input: bad magic, unsupported version, truncation,
 * inconsistent offsets, unknown constant tags or excessive nesting.
 */
export class BytecodeFormatError extends InvalidProgramError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(RulesErrorCode.INVALID_FORMAT, message, options);
    this.name = 'BytecodeFormatError';
  }
}

/**
 * Build or link failure: duplicate registers, too many registers,
 * unregistered functions, bad operands.
 */
export class RulesCompileError extends InvalidProgramError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(RulesErrorCode.COMPILE_ERROR, message, options);
    this.name = 'RulesCompileError';
  }
}

export interface RulesEvaluationErrorOptions {
  /** Instruction address that raised the error, when known */
  address?: number;
  cause?: unknown;
}

export class RulesEvaluationError extends RulesEngineError {
  readonly address: number | undefined;

  constructor(message: string, options?: RulesEvaluationErrorOptions) {
    super(RulesErrorCode.EVALUATION_ERROR, message, { cause: options?.cause });
    this.name = 'RulesEvaluationError';
    this.address = options?.address;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
