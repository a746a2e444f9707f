import { ExecutionError } from '../harness/errors';
import type { ExecutionProvider } from '../harness/provider';
import { dbg } from '../debug/log';
import { GPRS, MASK, subRegName } from '../machine/registers';
import type { FlagName, Width } from '../machine/registers';
import type { State } from '../machine/state';
import { Tri } from '../machine/triState';
import { aluOp, shiftOp, shiftReadsCarry, unaryOp } from './alu';
import type { Bit, FlagOut, OpResult } from './alu';
import { decodeOne } from './decode';
import type { Insn, Source } from './decode';

// How an architecturally undefined flag is materialized in the result state.
//  preserve: Tri.Undefined (reference behaviour)
//  zero:     0
//  compute:  the value the count-of-one formula yields, as most lifters do
export type UndefinedFlagPolicy = 'preserve' | 'zero' | 'compute';

export interface InterpreterOptions {
  name?: string;
  undefinedFlags?: UndefinedFlagPolicy;
  maxInstructions?: number;
}

/**
 * Executes the register-direct x86-64 subset sequentially from RIP until the
 * byte buffer is exhausted. Reads of unset (or undefined) inputs are errors.
 */
export class X86Interpreter implements ExecutionProvider {
  readonly name: string;
  private readonly policy: UndefinedFlagPolicy;
  private readonly maxInstructions: number;

  constructor(opts: InterpreterOptions = {}) {
    this.policy = opts.undefinedFlags ?? 'preserve';
    this.name = opts.name ?? `x86-interp(${this.policy})`;
    this.maxInstructions = opts.maxInstructions ?? 64;
  }

  execute(bytes: Uint8Array, input: State): State {
    let state = input;
    let offset = 0;
    let executed = 0;
    while (offset < bytes.length) {
      if (executed++ >= this.maxInstructions) {
        throw new ExecutionError('unsupported', `more than ${this.maxInstructions} instructions`, this.name);
      }
      const insn = decodeOne(bytes, offset);
      dbg('INTERP', `${this.name} +${offset} ${insn.op}`);
      state = this.step(state, insn);
      offset += insn.length;
    }
    return state.set('RIP', input.ip + BigInt(bytes.length));
  }

  private readReg(state: State, index: number, width: Width): bigint {
    const v = state.reg(GPRS[index]);
    if (v === undefined) {
      throw new ExecutionError('unset-input', `read of unset register ${subRegName(index, width)}`, this.name);
    }
    return v & MASK[width];
  }

  private readCarry(state: State): Bit {
    const cf = state.flag('CF');
    if (cf === undefined) throw new ExecutionError('unset-input', 'read of unset flag CF', this.name);
    if (cf === Tri.Undefined) throw new ExecutionError('unset-input', 'read of undefined flag CF', this.name);
    return cf === Tri.One ? 1 : 0;
  }

  // 32-bit writes zero-extend into the full register; 8/16-bit writes merge.
  private writeReg(state: State, index: number, width: Width, value: bigint): State {
    const reg = GPRS[index];
    if (width === 64 || width === 32) return state.set(reg, value & MASK[width]);
    const old = this.readReg(state, index, 64);
    return state.set(reg, (old & ~MASK[width]) | (value & MASK[width]));
  }

  private source(state: State, src: Source, width: Width): bigint {
    switch (src.kind) {
      case 'reg': return this.readReg(state, src.index, width);
      case 'imm': return src.value & MASK[width];
      case 'cl': return this.readReg(state, 1, 8);
      case 'one': return 1n;
    }
  }

  private resolve(out: FlagOut): Tri {
    if (out.defined) return out.bit === 1 ? Tri.One : Tri.Zero;
    switch (this.policy) {
      case 'preserve': return Tri.Undefined;
      case 'zero': return Tri.Zero;
      case 'compute': return out.bit === 1 ? Tri.One : Tri.Zero;
    }
  }

  private apply(state: State, dst: number, width: Width, res: OpResult): State {
    let next = res.value === undefined ? state : this.writeReg(state, dst, width, res.value);
    for (const [flag, out] of Object.entries(res.flags)) {
      if (out) next = next.set(flagName(flag), this.resolve(out));
    }
    return next;
  }

  private step(state: State, insn: Insn): State {
    switch (insn.op) {
      case 'nop':
        return state;
      case 'mov':
        return this.writeReg(state, insn.dst, insn.width, this.source(state, insn.src, insn.width));
      case 'alu': {
        const a = this.readReg(state, insn.dst, insn.width);
        const b = this.source(state, insn.src, insn.width);
        const c = insn.alu === 'adc' || insn.alu === 'sbb' ? this.readCarry(state) : 0;
        return this.apply(state, insn.dst, insn.width, aluOp(insn.alu, a, b, c, insn.width));
      }
      case 'test': {
        const a = this.readReg(state, insn.dst, insn.width);
        const b = this.source(state, insn.src, insn.width);
        return this.apply(state, insn.dst, insn.width, aluOp('test', a, b, 0, insn.width));
      }
      case 'unary': {
        const a = this.readReg(state, insn.dst, insn.width);
        return this.apply(state, insn.dst, insn.width, unaryOp(insn.unary, a, insn.width));
      }
      case 'shift': {
        const a = this.readReg(state, insn.dst, insn.width);
        const count = Number(this.source(state, insn.count, 8));
        const c = shiftReadsCarry(insn.shift, count, insn.width) ? this.readCarry(state) : 0;
        return this.apply(state, insn.dst, insn.width, shiftOp(insn.shift, a, count, c, insn.width));
      }
    }
  }
}

const FLAG_NAMES: readonly FlagName[] = ['CF', 'PF', 'AF', 'ZF', 'SF', 'OF'];

function flagName(s: string): FlagName {
  const f = FLAG_NAMES.find(x => x === s);
  if (!f) throw new Error(`not a flag: ${s}`);
  return f;
}
