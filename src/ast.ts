import { formatNumber } from "./util";

export const keywords = [
  'add',
  'sub',
  'mul',
  'div',
  'mod',
  'pow',
  'concat',
  'print',
  'input',
  'equal',
  'less-than',
  'greater-than',
  'eval',
  'when',
  'if-else',
  'while',
  'until',
  'let',
  'pop',
] as const;

export type Instruction = typeof keywords[number];

const keywordSet: ReadonlySet<string> = new Set(keywords);

export function isInstruction(word: string): word is Instruction {
  return keywordSet.has(word);
}

export type ErrorKind = 'StackEmpty';

export interface NumberValue {
  readonly kind: 'number';
  readonly value: number;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface BoolValue {
  readonly kind: 'bool';
  readonly value: boolean;
}

// An unresolved `$name`. Evaluation swaps it for the bound value, if any.
export interface VariableValue {
  readonly kind: 'variable';
  readonly name: string;
}

export interface InstructionValue {
  readonly kind: 'instruction';
  readonly instruction: Instruction;
}

export interface BlockValue {
  readonly kind: 'block';
  readonly body: readonly Value[];
}

export interface ErrorValue {
  readonly kind: 'error';
  readonly error: ErrorKind;
}

export type Value = NumberValue | StringValue | BoolValue | VariableValue | InstructionValue | BlockValue | ErrorValue;

export type Program = readonly Value[];

export function num(value: number): NumberValue {
  return { kind: 'number', value };
}

export function str(value: string): StringValue {
  return { kind: 'string', value };
}

export function bool(value: boolean): BoolValue {
  return { kind: 'bool', value };
}

export function variable(name: string): VariableValue {
  return { kind: 'variable', name };
}

export function instruction(instruction: Instruction): InstructionValue {
  return { kind: 'instruction', instruction };
}

export function block(body: Program): BlockValue {
  return { kind: 'block', body };
}

export const stackEmpty: ErrorValue = { kind: 'error', error: 'StackEmpty' };

/*
 * Coercions never fail. Anything of the wrong kind collapses to the
 * zero value of the requested type.
 */

export function asNumber(value: Value): number {
  return value.kind === 'number' ? value.value : 0;
}

export function asString(value: Value): string {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'variable':
      return value.name;
    case 'number':
      return formatNumber(value.value);
    default:
      return '';
  }
}

export function asBool(value: Value): boolean {
  return value.kind === 'bool' ? value.value : false;
}

export function asBlock(value: Value): Program {
  return value.kind === 'block' ? value.body : [value];
}

export function show(value: Value): string {
  switch (value.kind) {
    case 'number':
      return formatNumber(value.value);
    case 'string':
      return `"${value.value}"`;
    case 'bool':
      return String(value.value);
    case 'variable':
      return `$${value.name}`;
    case 'instruction':
      return value.instruction;
    case 'block':
      return value.body.length === 0 ? '{}' : `{ ${showProgram(value.body)} }`;
    case 'error':
      return `Error(${value.error})`;
  }
}

export function showProgram(program: Program): string {
  return program.map(show).join(' ');
}
