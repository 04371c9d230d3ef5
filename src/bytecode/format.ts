/**
 * Binary container constants.
 *
 * Header layout (big-endian, 44 bytes):
 *
 * | offset | size | field                 |
 * |--------|------|-----------------------|
 * | 0      | 4    | magic `RULE`          |
 * | 4      | 2    | version (major.minor) |
 * | 6      | 2    | condition count       |
 * | 8      | 2    | result count          |
 * | 10     | 2    | register count        |
 * | 12     | 2    | constant count        |
 * | 14     | 2    | function count        |
 * | 16     | 4    | BDD node count        |
 * | 20     | 4    | BDD root reference    |
 * | 24     | 4    | condition table       |
 * | 28     | 4    | result table          |
 * | 32     | 4    | function table        |
 * | 36     | 4    | constant pool         |
 * | 40     | 4    | BDD table             |
 *
 * Sections follow in this order: condition table, result table, function
 * table, register table, BDD table, instructions, constant pool.
 *
 * @module bytecode/format
 */

export const MAGIC = 0x52554c45;
export const VERSION = 0x0101;
export const HEADER_SIZE = 44;

export const MAX_REGISTERS = 256;
export const MAX_FUNCTIONS = 256;
export const MAX_CONSTANTS = 0x10000;
export const MAX_CONSTANT_DEPTH = 100;
export const MAX_UTF_LENGTH = 0xffff;

export const ConstantTag = {
  NULL: 0,
  STRING: 1,
  INTEGER: 2,
  BOOLEAN: 3,
  LIST: 4,
  MAP: 5,
} as const;

export type ConstantTag = (typeof ConstantTag)[keyof typeof ConstantTag];

export function formatVersion(version: number): string {
  return `${version >> 8}.${version & 0xff}`;
}
