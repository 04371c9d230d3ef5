/**
 * Instruction set.
 *
 * Every instruction is a one-byte opcode followed by fixed-width operands.
 * Two-byte operands are big-endian and unsigned.
 *
 * @module bytecode/opcodes
 */

export const Opcode = {
  /** Push constant [u8 index] */
  LOAD_CONST: 0x00,
  /** Push constant [u16 index] */
  LOAD_CONST_W: 0x01,
  /** Pop and store into register [u8 register] */
  SET_REGISTER: 0x02,
  LOAD_REGISTER: 0x03,
  /** Replace top with true iff it is exactly false */
  NOT: 0x04,
  ISSET: 0x05,
  TEST_REGISTER_ISSET: 0x06,
  TEST_REGISTER_NOT_SET: 0x07,
  LIST0: 0x08,
  LIST1: 0x09,
  LIST2: 0x0a,
  /** Build a list from the top [u8 count] values */
  LISTN: 0x0b,
  MAP0: 0x0c,
  MAP1: 0x0d,
  MAP2: 0x0e,
  MAP3: 0x0f,
  MAP4: 0x10,
  /** Build a map from [u8 count] (value, key) pairs, key on top */
  MAPN: 0x11,
  /** Concatenate the top [u8 count] strings */
  RESOLVE_TEMPLATE: 0x12,
  FN0: 0x13,
  FN1: 0x14,
  FN2: 0x15,
  FN3: 0x16,
  /** Call [u8 function] with its declared argument count */
  FN: 0x17,
  /** Property of top [u16 constant name] */
  GET_PROPERTY: 0x18,
  /** Element of top [u8 index] */
  GET_INDEX: 0x19,
  GET_PROPERTY_REG: 0x1a,
  GET_INDEX_REG: 0x1b,
  IS_TRUE: 0x1c,
  TEST_REGISTER_IS_TRUE: 0x1d,
  TEST_REGISTER_IS_FALSE: 0x1e,
  EQUALS: 0x1f,
  STRING_EQUALS: 0x20,
  BOOLEAN_EQUALS: 0x21,
  /** [u8 start][u8 end][u8 reverse] */
  SUBSTRING: 0x22,
  IS_VALID_HOST_LABEL: 0x23,
  PARSE_URL: 0x24,
  URI_ENCODE: 0x25,
  RETURN_ERROR: 0x26,
  /** [u8 flags] bit 0 = headers, bit 1 = properties */
  RETURN_ENDPOINT: 0x27,
  RETURN_VALUE: 0x28,
  SPLIT: 0x29,
  /** Jump [u16 forward offset] if top is set, else pop */
  JNN_OR_POP: 0x2a,
  /** Call [u8 function] with [u8 count] arguments */
  FN_VARIADIC: 0x2b,
} as const;

export type Opcode = (typeof Opcode)[keyof typeof Opcode];
export type OpcodeName = keyof typeof Opcode;

export const EndpointFlag = {
  HEADERS: 0x01,
  PROPERTIES: 0x02,
} as const;

/** What an operand refers to, used for validation and disassembly */
export type OperandKind = 'constant' | 'register' | 'function' | 'count' | 'index' | 'int' | 'flags' | 'jump';

export interface OperandSpec {
  kind: OperandKind;
  width: 1 | 2;
}

export interface OpcodeInfo {
  name: OpcodeName;
  code: Opcode;
  operands: readonly OperandSpec[];
  /** Total instruction length including the opcode byte */
  length: number;
  /** Ends an instruction body */
  terminal: boolean;
}

const u8 = (kind: OperandKind): OperandSpec => ({ kind, width: 1 });
const u16 = (kind: OperandKind): OperandSpec => ({ kind, width: 2 });

const OPERANDS: Record<OpcodeName, readonly OperandSpec[]> = {
  LOAD_CONST: [u8('constant')],
  LOAD_CONST_W: [u16('constant')],
  SET_REGISTER: [u8('register')],
  LOAD_REGISTER: [u8('register')],
  NOT: [],
  ISSET: [],
  TEST_REGISTER_ISSET: [u8('register')],
  TEST_REGISTER_NOT_SET: [u8('register')],
  LIST0: [],
  LIST1: [],
  LIST2: [],
  LISTN: [u8('count')],
  MAP0: [],
  MAP1: [],
  MAP2: [],
  MAP3: [],
  MAP4: [],
  MAPN: [u8('count')],
  RESOLVE_TEMPLATE: [u8('count')],
  FN0: [u8('function')],
  FN1: [u8('function')],
  FN2: [u8('function')],
  FN3: [u8('function')],
  FN: [u8('function')],
  GET_PROPERTY: [u16('constant')],
  GET_INDEX: [u8('index')],
  GET_PROPERTY_REG: [u8('register'), u16('constant')],
  GET_INDEX_REG: [u8('register'), u8('index')],
  IS_TRUE: [],
  TEST_REGISTER_IS_TRUE: [u8('register')],
  TEST_REGISTER_IS_FALSE: [u8('register')],
  EQUALS: [],
  STRING_EQUALS: [],
  BOOLEAN_EQUALS: [],
  SUBSTRING: [u8('int'), u8('int'), u8('flags')],
  IS_VALID_HOST_LABEL: [],
  PARSE_URL: [],
  URI_ENCODE: [],
  RETURN_ERROR: [],
  RETURN_ENDPOINT: [u8('flags')],
  RETURN_VALUE: [],
  SPLIT: [],
  JNN_OR_POP: [u16('jump')],
  FN_VARIADIC: [u8('function'), u8('count')],
};

const TERMINALS: ReadonlySet<OpcodeName> = new Set<OpcodeName>(['RETURN_ERROR', 'RETURN_ENDPOINT', 'RETURN_VALUE']);

function isOpcodeName(name: string): name is OpcodeName {
  return Object.hasOwn(Opcode, name);
}

const OPCODE_TABLE: ReadonlyArray<OpcodeInfo | undefined> = (() => {
  const table: Array<OpcodeInfo | undefined> = new Array(256).fill(undefined);
  for (const name of Object.keys(Opcode)) {
    if (!isOpcodeName(name)) continue;
    const operands = OPERANDS[name];
    table[Opcode[name]] = {
      name,
      code: Opcode[name],
      operands,
      length: 1 + operands.reduce((sum, op) => sum + op.width, 0),
      terminal: TERMINALS.has(name),
    };
  }
  return table;
})();

/** Metadata for an opcode byte, or undefined when the byte is not an opcode. */
export function getOpcodeInfo(code: number): OpcodeInfo | undefined {
  return OPCODE_TABLE[code];
}

/** Fixed argument count of FN0..FN3, or undefined for other opcodes. */
export function fixedArity(code: number): number | undefined {
  switch (code) {
    case Opcode.FN0:
      return 0;
    case Opcode.FN1:
      return 1;
    case Opcode.FN2:
      return 2;
    case Opcode.FN3:
      return 3;
    default:
      return undefined;
  }
}

export function formatByte(value: number): string {
  return `0x${value.toString(16).padStart(2, '0')}`;
}
