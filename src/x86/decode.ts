// Decoder for the register-direct x86-64 subset the assembler emits.
import { ExecutionError } from '../harness/errors';
import type { Width } from '../machine/registers';

export type ShiftOp = 'rol' | 'ror' | 'rcl' | 'rcr' | 'shl' | 'shr' | 'sar';
export type AluOp = 'add' | 'or' | 'adc' | 'sbb' | 'and' | 'sub' | 'xor' | 'cmp';
export type UnaryOp = 'inc' | 'dec' | 'not' | 'neg';

export type Source =
  | { kind: 'reg'; index: number }
  | { kind: 'imm'; value: bigint } // already sign/zero extended to the operand width
  | { kind: 'cl' }
  | { kind: 'one' };

export type Insn =
  | { op: 'shift'; shift: ShiftOp; width: Width; dst: number; count: Source; length: number }
  | { op: 'alu'; alu: AluOp; width: Width; dst: number; src: Source; length: number }
  | { op: 'test'; width: Width; dst: number; src: Source; length: number }
  | { op: 'unary'; unary: UnaryOp; width: Width; dst: number; length: number }
  | { op: 'mov'; width: Width; dst: number; src: Source; length: number }
  | { op: 'nop'; length: number };

const SHIFTS: (ShiftOp | undefined)[] = ['rol', 'ror', 'rcl', 'rcr', 'shl', 'shr', undefined, 'sar'];
const ALUS: AluOp[] = ['add', 'or', 'adc', 'sbb', 'and', 'sub', 'xor', 'cmp'];
const UNARY_F6: (UnaryOp | undefined)[] = [undefined, undefined, 'not', 'neg', undefined, undefined, undefined, undefined];

function hex(b: number): string {
  return b.toString(16).padStart(2, '0');
}

class Cursor {
  pos: number;
  constructor(private readonly bytes: Uint8Array, private readonly start: number) { this.pos = start; }

  u8(): number {
    if (this.pos >= this.bytes.length) {
      throw new ExecutionError('decode', `truncated instruction at offset ${this.start}`);
    }
    return this.bytes[this.pos++];
  }

  // Little-endian immediate of `n` bytes, sign-extended to `width` bits when `signed`.
  imm(n: number, width: Width, signed: boolean): bigint {
    let v = 0n;
    for (let i = 0; i < n; i++) v |= BigInt(this.u8()) << BigInt(8 * i);
    const bits = n * 8;
    const ext = signed ? BigInt.asIntN(bits, v) : v;
    return BigInt.asUintN(width, ext);
  }

  get length(): number { return this.pos - this.start; }
}

interface ModRM { reg: number; rm: number }

function modrm(c: Cursor, rexR: number, rexB: number): ModRM {
  const b = c.u8();
  if ((b >> 6) !== 3) {
    throw new ExecutionError('unsupported', `memory operand (modrm ${hex(b)}) is not modelled`);
  }
  return { reg: ((b >> 3) & 7) | (rexR << 3), rm: (b & 7) | (rexB << 3) };
}

// Without REX, 8-bit register numbers 4..7 name ah/ch/dh/bh.
function rejectHighByte(insn: Insn, rex: number): Insn {
  if (insn.op === 'nop' || insn.width !== 8 || rex !== 0) return insn;
  const regs = [insn.dst];
  if (insn.op !== 'shift' && insn.op !== 'unary' && insn.src.kind === 'reg') regs.push(insn.src.index);
  if (regs.some(r => r >= 4 && r <= 7)) {
    throw new ExecutionError('unsupported', 'high-byte registers (ah/ch/dh/bh) are not modelled');
  }
  return insn;
}

export function decodeOne(bytes: Uint8Array, offset: number): Insn {
  const c = new Cursor(bytes, offset);
  let opsize16 = false;
  let b = c.u8();
  if (b === 0x66) { opsize16 = true; b = c.u8(); }
  let rex = 0;
  if ((b & 0xf0) === 0x40) { rex = b; b = c.u8(); }
  return rejectHighByte(decodeOpcode(c, b, rex, opsize16, offset), rex);
}

function decodeOpcode(c: Cursor, b: number, rex: number, opsize16: boolean, offset: number): Insn {
  const W = (rex >> 3) & 1, R = (rex >> 2) & 1, B = rex & 1;
  const wide: Width = W ? 64 : opsize16 ? 16 : 32;

  // Group 1 reg,reg: 00..3b with low bits 0/1 (r/m, r)
  if (b < 0x40 && (b & 7) <= 1) {
    const alu = ALUS[b >> 3];
    const width: Width = (b & 1) ? wide : 8;
    const m = modrm(c, R, B);
    return { op: 'alu', alu, width, dst: m.rm, src: { kind: 'reg', index: m.reg }, length: c.length };
  }

  switch (b) {
    case 0x80: case 0x81: case 0x83: {
      const width: Width = b === 0x80 ? 8 : wide;
      const m = modrm(c, R, B);
      const value = b === 0x81 ? c.imm(width === 16 ? 2 : 4, width, true) : c.imm(1, width, true);
      return { op: 'alu', alu: ALUS[m.reg & 7], width, dst: m.rm, src: { kind: 'imm', value }, length: c.length };
    }
    case 0x84: case 0x85: {
      const m = modrm(c, R, B);
      return { op: 'test', width: b === 0x84 ? 8 : wide, dst: m.rm, src: { kind: 'reg', index: m.reg }, length: c.length };
    }
    case 0x88: case 0x89: {
      const m = modrm(c, R, B);
      return { op: 'mov', width: b === 0x88 ? 8 : wide, dst: m.rm, src: { kind: 'reg', index: m.reg }, length: c.length };
    }
    case 0x90:
      if (rex & 1) break; // xchg r8, rax
      return { op: 'nop', length: c.length };
    case 0xc0: case 0xc1: case 0xd0: case 0xd1: case 0xd2: case 0xd3: {
      const width: Width = (b & 1) ? wide : 8;
      const m = modrm(c, R, B);
      const shift = SHIFTS[m.reg & 7];
      if (!shift) throw new ExecutionError('decode', `undefined group-2 encoding /6 after ${hex(b)}`);
      const count: Source = b <= 0xc1 ? { kind: 'imm', value: c.imm(1, 8, false) } : b <= 0xd1 ? { kind: 'one' } : { kind: 'cl' };
      return { op: 'shift', shift, width, dst: m.rm, count, length: c.length };
    }
    case 0xc7: {
      const m = modrm(c, R, B);
      if ((m.reg & 7) !== 0) break;
      const value = c.imm(wide === 16 ? 2 : 4, wide, true);
      return { op: 'mov', width: wide, dst: m.rm, src: { kind: 'imm', value }, length: c.length };
    }
    case 0xf6: case 0xf7: {
      const width: Width = b === 0xf6 ? 8 : wide;
      const m = modrm(c, R, B);
      const sub = m.reg & 7;
      if (sub === 0) {
        const value = width === 8 ? c.imm(1, 8, false) : c.imm(width === 16 ? 2 : 4, width, true);
        return { op: 'test', width, dst: m.rm, src: { kind: 'imm', value }, length: c.length };
      }
      const unary = UNARY_F6[sub];
      if (!unary) throw new ExecutionError('unsupported', `group-3 /${sub} is not modelled`);
      return { op: 'unary', unary, width, dst: m.rm, length: c.length };
    }
    case 0xfe: case 0xff: {
      const m = modrm(c, R, B);
      const sub = m.reg & 7;
      if (sub > 1) throw new ExecutionError('unsupported', `group-${b === 0xfe ? 4 : 5} /${sub} is not modelled`);
      return { op: 'unary', unary: sub === 0 ? 'inc' : 'dec', width: b === 0xfe ? 8 : wide, dst: m.rm, length: c.length };
    }
  }

  if (b >= 0xb0 && b <= 0xbf) {
    const dst = (b & 7) | (B << 3);
    if (b < 0xb8) return { op: 'mov', width: 8, dst, src: { kind: 'imm', value: c.imm(1, 8, false) }, length: c.length };
    const n = wide === 64 ? 8 : wide / 8;
    return { op: 'mov', width: wide, dst, src: { kind: 'imm', value: c.imm(n, wide, false) }, length: c.length };
  }

  throw new ExecutionError('decode', `unknown opcode ${hex(b)} at offset ${offset}`);
}
