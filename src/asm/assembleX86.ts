// Intel-syntax x86-64 assembler for the register-direct subset the verification corpus uses.
import { EncodingError } from '../harness/errors';
import type { SubReg, Width } from '../machine/registers';
import { OperandSyntaxError, parseLine } from './parseOperands';
import type { Operand, ParsedLine } from './parseOperands';

export interface Encoder {
  encode(lines: readonly string[]): Uint8Array;
}

// Group-2 /digit for shifts and rotates.
export const SHIFT_DIGIT: Record<string, number> = {
  rol: 0, ror: 1, rcl: 2, rcr: 3, shl: 4, sal: 4, shr: 5, sar: 7,
};

// Group-1 /digit for two-operand ALU ops; reg,reg opcode base is digit * 8.
export const ALU_DIGIT: Record<string, number> = {
  add: 0, or: 1, adc: 2, sbb: 3, and: 4, sub: 5, xor: 6, cmp: 7,
};

export const UNARY_DIGIT: Record<string, { op8: number; op: number; digit: number }> = {
  inc: { op8: 0xfe, op: 0xff, digit: 0 },
  dec: { op8: 0xfe, op: 0xff, digit: 1 },
  not: { op8: 0xf6, op: 0xf7, digit: 2 },
  neg: { op8: 0xf6, op: 0xf7, digit: 3 },
};

class Unsupported extends Error {}

function has(table: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(table, key);
}

function fits(v: bigint, lo: bigint, hi: bigint): boolean {
  return v >= lo && v <= hi;
}

function immBytes(v: bigint, bytes: number): number[] {
  const u = BigInt.asUintN(bytes * 8, v);
  const out: number[] = [];
  for (let i = 0; i < bytes; i++) out.push(Number((u >> BigInt(i * 8)) & 0xffn));
  return out;
}

// Range check for an immediate that is stored in `width` bits (either signedness accepted).
function checkImm(v: bigint, width: number): void {
  const lo = -(1n << BigInt(width - 1));
  const hi = (1n << BigInt(width)) - 1n;
  if (!fits(v, lo, hi)) throw new Unsupported(`immediate ${v} does not fit in ${width} bits`);
}

function reg(op: Operand | undefined): SubReg {
  if (!op) throw new Unsupported('missing operand');
  if (op.kind === 'mem') throw new Unsupported(`memory operand '${op.text}' is not supported`);
  if (op.kind !== 'reg') throw new Unsupported(`expected a register, got '${op.text}'`);
  return op.reg;
}

interface EmitArgs {
  width: Width;
  opcode: number[];
  regField: number; // ModRM.reg: /digit or register index
  rm?: SubReg;      // ModRM.rm register; omitted for opcode+reg forms
  regOperand?: SubReg;
  opReg?: SubReg;   // register folded into the low 3 opcode bits
  imm?: number[];
}

function emit(a: EmitArgs): number[] {
  const out: number[] = [];
  if (a.width === 16) out.push(0x66);
  const r = a.regOperand && a.regOperand.index >= 8 ? 1 : 0;
  const baseReg = a.rm ?? a.opReg;
  const b = baseReg && baseReg.index >= 8 ? 1 : 0;
  const w = a.width === 64 ? 1 : 0;
  const force = [a.rm, a.regOperand, a.opReg].some(x => x !== undefined && x.needsRex);
  if (w || r || b || force) out.push(0x40 | (w << 3) | (r << 2) | b);
  const opcode = [...a.opcode];
  if (a.opReg) opcode[opcode.length - 1] |= a.opReg.index & 7;
  out.push(...opcode);
  if (a.rm) out.push(0xc0 | ((a.regField & 7) << 3) | (a.rm.index & 7));
  if (a.imm) out.push(...a.imm);
  return out;
}

function sameWidth(a: SubReg, b: SubReg): void {
  if (a.width !== b.width) throw new Unsupported(`operand size mismatch (${a.width} vs ${b.width} bits)`);
}

function encodeShift(mn: string, ops: Operand[]): number[] {
  const digit = SHIFT_DIGIT[mn];
  const dst = reg(ops[0]);
  const is8 = dst.width === 8;
  if (ops.length === 1) {
    return emit({ width: dst.width, opcode: [is8 ? 0xd0 : 0xd1], regField: digit, rm: dst });
  }
  if (ops.length !== 2) throw new Unsupported(`${mn} takes one or two operands`);
  const src = ops[1];
  if (src.kind === 'reg') {
    if (src.reg.index !== 1 || src.reg.width !== 8) throw new Unsupported(`shift count register must be cl`);
    return emit({ width: dst.width, opcode: [is8 ? 0xd2 : 0xd3], regField: digit, rm: dst });
  }
  if (src.kind !== 'imm') throw new Unsupported(`memory operand '${src.text}' is not supported`);
  checkImm(src.value, 8);
  if (src.value === 1n) {
    return emit({ width: dst.width, opcode: [is8 ? 0xd0 : 0xd1], regField: digit, rm: dst });
  }
  return emit({ width: dst.width, opcode: [is8 ? 0xc0 : 0xc1], regField: digit, rm: dst, imm: immBytes(src.value, 1) });
}

// Immediate for group-1/test/mov r/m forms: 8/16/32 bits as-is, 64-bit sign-extended from 32.
function wideImm(v: bigint, width: Width): number[] {
  if (width === 64) {
    const s = BigInt.asIntN(64, v);
    checkImm(v, 64);
    if (!fits(s, -(1n << 31n), (1n << 31n) - 1n)) {
      throw new Unsupported(`immediate ${v} does not fit in a sign-extended 32-bit field`);
    }
    return immBytes(s, 4);
  }
  checkImm(v, width);
  return immBytes(v, width / 8);
}

function encodeAlu(mn: string, ops: Operand[]): number[] {
  const digit = ALU_DIGIT[mn];
  if (ops.length !== 2) throw new Unsupported(`${mn} takes two operands`);
  const dst = reg(ops[0]);
  const src = ops[1];
  const is8 = dst.width === 8;
  if (src.kind === 'reg') {
    sameWidth(dst, src.reg);
    return emit({ width: dst.width, opcode: [digit * 8 + (is8 ? 0 : 1)], regField: src.reg.index, rm: dst, regOperand: src.reg });
  }
  if (src.kind !== 'imm') throw new Unsupported(`memory operand '${src.text}' is not supported`);
  if (is8) {
    checkImm(src.value, 8);
    return emit({ width: 8, opcode: [0x80], regField: digit, rm: dst, imm: immBytes(src.value, 1) });
  }
  const imm = wideImm(src.value, dst.width);
  const s = BigInt.asIntN(dst.width, src.value);
  if (fits(s, -128n, 127n)) {
    return emit({ width: dst.width, opcode: [0x83], regField: digit, rm: dst, imm: immBytes(s, 1) });
  }
  return emit({ width: dst.width, opcode: [0x81], regField: digit, rm: dst, imm });
}

function encodeTest(ops: Operand[]): number[] {
  if (ops.length !== 2) throw new Unsupported('test takes two operands');
  const dst = reg(ops[0]);
  const src = ops[1];
  const is8 = dst.width === 8;
  if (src.kind === 'reg') {
    sameWidth(dst, src.reg);
    return emit({ width: dst.width, opcode: [is8 ? 0x84 : 0x85], regField: src.reg.index, rm: dst, regOperand: src.reg });
  }
  if (src.kind !== 'imm') throw new Unsupported(`memory operand '${src.text}' is not supported`);
  if (is8) {
    checkImm(src.value, 8);
    return emit({ width: 8, opcode: [0xf6], regField: 0, rm: dst, imm: immBytes(src.value, 1) });
  }
  return emit({ width: dst.width, opcode: [0xf7], regField: 0, rm: dst, imm: wideImm(src.value, dst.width) });
}

function encodeUnary(mn: string, ops: Operand[]): number[] {
  const u = UNARY_DIGIT[mn];
  if (ops.length !== 1) throw new Unsupported(`${mn} takes one operand`);
  const dst = reg(ops[0]);
  return emit({ width: dst.width, opcode: [dst.width === 8 ? u.op8 : u.op], regField: u.digit, rm: dst });
}

function encodeMov(ops: Operand[]): number[] {
  if (ops.length !== 2) throw new Unsupported('mov takes two operands');
  const dst = reg(ops[0]);
  const src = ops[1];
  if (src.kind === 'reg') {
    sameWidth(dst, src.reg);
    return emit({ width: dst.width, opcode: [dst.width === 8 ? 0x88 : 0x89], regField: src.reg.index, rm: dst, regOperand: src.reg });
  }
  if (src.kind !== 'imm') throw new Unsupported(`memory operand '${src.text}' is not supported`);
  if (dst.width === 64) {
    checkImm(src.value, 64);
    const s = BigInt.asIntN(64, src.value);
    if (fits(s, -(1n << 31n), (1n << 31n) - 1n)) {
      return emit({ width: 64, opcode: [0xc7], regField: 0, rm: dst, imm: immBytes(s, 4) });
    }
    return emit({ width: 64, opcode: [0xb8], regField: 0, opReg: dst, imm: immBytes(src.value, 8) });
  }
  checkImm(src.value, dst.width);
  return emit({ width: dst.width, opcode: [dst.width === 8 ? 0xb0 : 0xb8], regField: 0, opReg: dst, imm: immBytes(src.value, dst.width / 8) });
}

export function assembleLine(line: string): number[] {
  let parsed: ParsedLine;
  try {
    parsed = parseLine(line);
  } catch (e) {
    if (e instanceof OperandSyntaxError) throw new EncodingError(line, e.what);
    throw e;
  }
  const { mnemonic: mn, operands: ops } = parsed;
  try {
    if (has(SHIFT_DIGIT, mn)) return encodeShift(mn, ops);
    if (has(ALU_DIGIT, mn)) return encodeAlu(mn, ops);
    if (has(UNARY_DIGIT, mn)) return encodeUnary(mn, ops);
    if (mn === 'test') return encodeTest(ops);
    if (mn === 'mov' || mn === 'movabs') return encodeMov(ops);
    if (mn === 'nop') {
      if (ops.length !== 0) throw new Unsupported('nop takes no operands');
      return [0x90];
    }
  } catch (e) {
    if (e instanceof Unsupported) throw new EncodingError(line, e.message);
    throw e;
  }
  throw new EncodingError(line, `unknown mnemonic '${mn}'`);
}

export class IntelEncoder implements Encoder {
  encode(lines: readonly string[]): Uint8Array {
    const out: number[] = [];
    for (const line of lines) out.push(...assembleLine(line));
    return new Uint8Array(out);
  }
}

export function intel(lines: readonly string[]): Uint8Array {
  return new IntelEncoder().encode(lines);
}
