// Result and flag semantics for the modelled x86-64 operations.
// Architecturally undefined flags carry `defined: false` plus the value a count-of-one
// style formula would give, so a provider can choose how to resolve them.
import { MASK } from '../machine/registers';
import type { FlagName, Width } from '../machine/registers';
import type { AluOp, ShiftOp, UnaryOp } from './decode';

export type Bit = 0 | 1;

export interface FlagOut {
  bit: Bit;
  defined: boolean;
}

export type FlagEffects = Partial<Record<FlagName, FlagOut>>;

export interface OpResult {
  value?: bigint; // omitted when the destination is not written (cmp, test)
  flags: FlagEffects;
}

const def = (bit: Bit): FlagOut => ({ bit, defined: true });
const undef = (hint: Bit): FlagOut => ({ bit: hint, defined: false });

function bit(v: bigint, n: number): Bit {
  return ((v >> BigInt(n)) & 1n) === 1n ? 1 : 0;
}

function xor(a: Bit, b: Bit): Bit {
  return a === b ? 0 : 1;
}

export function msb(v: bigint, w: Width): Bit {
  return bit(v, w - 1);
}

// PF is set when the low byte has an even number of set bits.
export function parity(v: bigint): Bit {
  let x = Number(v & 0xffn);
  x ^= x >> 4;
  x ^= x >> 2;
  x ^= x >> 1;
  return (x & 1) === 0 ? 1 : 0;
}

function szp(res: bigint, w: Width): FlagEffects {
  return { SF: def(msb(res, w)), ZF: def(res === 0n ? 1 : 0), PF: def(parity(res)) };
}

function add(a: bigint, b: bigint, c: Bit, w: Width): OpResult {
  const r = a + b + BigInt(c);
  const res = r & MASK[w];
  return {
    value: res,
    flags: {
      CF: def(r > MASK[w] ? 1 : 0),
      OF: def(msb(~(a ^ b) & (a ^ res), w)),
      AF: def(bit(a ^ b ^ res, 4)),
      ...szp(res, w),
    },
  };
}

function sub(a: bigint, b: bigint, c: Bit, w: Width): OpResult {
  const res = BigInt.asUintN(w, a - b - BigInt(c));
  return {
    value: res,
    flags: {
      CF: def(a < b + BigInt(c) ? 1 : 0),
      OF: def(msb((a ^ b) & (a ^ res), w)),
      AF: def(bit(a ^ b ^ res, 4)),
      ...szp(res, w),
    },
  };
}

function logic(res: bigint, w: Width): OpResult {
  return { value: res, flags: { CF: def(0), OF: def(0), AF: undef(0), ...szp(res, w) } };
}

export function aluOp(op: AluOp | 'test', a: bigint, b: bigint, carryIn: Bit, w: Width): OpResult {
  switch (op) {
    case 'add': return add(a, b, 0, w);
    case 'adc': return add(a, b, carryIn, w);
    case 'sub': return sub(a, b, 0, w);
    case 'sbb': return sub(a, b, carryIn, w);
    case 'cmp': return { flags: sub(a, b, 0, w).flags };
    case 'and': return logic(a & b, w);
    case 'or': return logic(a | b, w);
    case 'xor': return logic(a ^ b, w);
    case 'test': return { flags: logic(a & b, w).flags };
  }
}

export function unaryOp(op: UnaryOp, a: bigint, w: Width): OpResult {
  switch (op) {
    case 'not':
      return { value: ~a & MASK[w], flags: {} };
    case 'neg':
      return sub(0n, a, 0, w);
    case 'inc': {
      const { value, flags } = add(a, 1n, 0, w);
      delete flags.CF;
      return { value, flags };
    }
    case 'dec': {
      const { value, flags } = sub(a, 1n, 0, w);
      delete flags.CF;
      return { value, flags };
    }
  }
}

export function countMask(w: Width): number {
  return w === 64 ? 0x3f : 0x1f;
}

// True when executing `op` with this raw count reads CF.
export function shiftReadsCarry(op: ShiftOp, rawCount: number, w: Width): boolean {
  return (op === 'rcl' || op === 'rcr') && (rawCount & countMask(w)) !== 0;
}

function rotl(a: bigint, r: number, w: Width): bigint {
  if (r === 0) return a;
  return ((a << BigInt(r)) | (a >> BigInt(w - r))) & MASK[w];
}

function rotr(a: bigint, r: number, w: Width): bigint {
  if (r === 0) return a;
  return ((a >> BigInt(r)) | (a << BigInt(w - r))) & MASK[w];
}

export function shiftOp(op: ShiftOp, a: bigint, rawCount: number, carryIn: Bit, w: Width): OpResult {
  const n = rawCount & countMask(w);
  if (n === 0) return { value: a, flags: {} };

  switch (op) {
    case 'shl': {
      const res = n >= w ? 0n : (a << BigInt(n)) & MASK[w];
      const cf: Bit = n <= w ? bit(a, w - n) : 0;
      const of = xor(msb(res, w), cf);
      return {
        value: res,
        flags: { CF: n < w ? def(cf) : undef(cf), OF: n === 1 ? def(of) : undef(of), AF: undef(0), ...szp(res, w) },
      };
    }
    case 'shr': {
      const res = n >= w ? 0n : a >> BigInt(n);
      const cf: Bit = n <= w ? bit(a, n - 1) : 0;
      const of = msb(a, w);
      return {
        value: res,
        flags: { CF: n < w ? def(cf) : undef(cf), OF: n === 1 ? def(of) : undef(of), AF: undef(0), ...szp(res, w) },
      };
    }
    case 'sar': {
      const signed = BigInt.asIntN(w, a);
      const res = BigInt.asUintN(w, signed >> BigInt(Math.min(n, w - 1)));
      const cf: Bit = n < w ? bit(a, n - 1) : msb(a, w);
      return {
        value: res,
        flags: { CF: def(cf), OF: n === 1 ? def(0) : undef(0), AF: undef(0), ...szp(res, w) },
      };
    }
    case 'rol': {
      const res = rotl(a, n % w, w);
      const cf = bit(res, 0);
      const of = xor(msb(res, w), cf);
      return { value: res, flags: { CF: def(cf), OF: n === 1 ? def(of) : undef(of) } };
    }
    case 'ror': {
      const res = rotr(a, n % w, w);
      const cf = msb(res, w);
      const of = xor(msb(res, w), bit(res, w - 2));
      return { value: res, flags: { CF: def(cf), OF: n === 1 ? def(of) : undef(of) } };
    }
    case 'rcl': {
      const steps = w === 8 ? n % 9 : w === 16 ? n % 17 : n;
      let v = a;
      let cf = carryIn;
      for (let i = 0; i < steps; i++) {
        const out = msb(v, w);
        v = ((v << 1n) | BigInt(cf)) & MASK[w];
        cf = out;
      }
      const of = xor(msb(v, w), cf);
      return { value: v, flags: { CF: def(cf), OF: n === 1 ? def(of) : undef(of) } };
    }
    case 'rcr': {
      const steps = w === 8 ? n % 9 : w === 16 ? n % 17 : n;
      const of = xor(msb(a, w), carryIn);
      let v = a;
      let cf = carryIn;
      for (let i = 0; i < steps; i++) {
        const out = bit(v, 0);
        v = (v >> 1n) | (BigInt(cf) << BigInt(w - 1));
        cf = out;
      }
      return { value: v, flags: { CF: def(cf), OF: n === 1 ? def(of) : undef(of) } };
    }
  }
}
