// Intel-syntax line parsing for the x86-64 assembler.
import { resolveRegister } from '../machine/registers';
import type { SubReg } from '../machine/registers';

export type Operand =
  | { kind: 'reg'; reg: SubReg; text: string }
  | { kind: 'imm'; value: bigint; text: string }
  | { kind: 'mem'; text: string };

export interface ParsedLine {
  mnemonic: string;
  operands: Operand[];
}

export class OperandSyntaxError extends Error {
  constructor(public readonly what: string) { super(what); }
}

// Accepts 0x.., 0b.., trailing-h hex (0ffh), decimal, with an optional sign.
export function parseImmediate(text: string): bigint | null {
  const t = text.trim().toLowerCase().replace(/_/g, '');
  const m = t.match(/^([+-]?)(0x[0-9a-f]+|0b[01]+|[0-9][0-9a-f]*h|\d+)$/);
  if (!m) return null;
  const body = m[2];
  const mag = body.endsWith('h') ? BigInt(`0x${body.slice(0, -1)}`) : BigInt(body);
  return m[1] === '-' ? -mag : mag;
}

function parseOperand(text: string): Operand {
  const t = text.trim();
  if (t.length === 0) throw new OperandSyntaxError('empty operand');
  if (t.includes('[')) return { kind: 'mem', text: t };
  const reg = resolveRegister(t);
  if (reg) return { kind: 'reg', reg, text: t };
  const imm = parseImmediate(t);
  if (imm !== null) return { kind: 'imm', value: imm, text: t };
  throw new OperandSyntaxError(`unrecognized operand '${t}'`);
}

export function parseLine(line: string): ParsedLine {
  const semi = line.indexOf(';');
  const body = (semi >= 0 ? line.slice(0, semi) : line).trim();
  if (body.length === 0) throw new OperandSyntaxError('empty instruction');
  const m = body.match(/^([a-z][a-z0-9]*)\s*(.*)$/i);
  if (!m) throw new OperandSyntaxError('missing mnemonic');
  const mnemonic = m[1].toLowerCase();
  const rest = m[2].trim();
  const operands = rest.length === 0 ? [] : rest.split(',').map(parseOperand);
  return { mnemonic, operands };
}
