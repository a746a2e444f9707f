import { ARITH_FLAGS, FIELDS, isFlag } from './registers';
import type { Field, FlagName, RegName } from './registers';
import { StateWireSchema, describeIssues } from './stateSchema';
import { Tri, toTri, triToString } from './triState';
import type { TriInput } from './triState';

export type RegValue = bigint | number;
export type FieldValue = bigint | Tri;

export type StateInit = Partial<Record<RegName, RegValue>> & Partial<Record<FlagName, TriInput>>;

// Wire form: registers as 0x-prefixed hex, flags as 0 | 1 | 'U'.
export type StateJson = Partial<Record<Field, string | number>>;

// A register number that could not be stored exactly. Construction never throws;
// the value is truncated or rounded and the case reports it.
export interface Coercion {
  field: RegName;
  given: number;
  stored: bigint;
  reason: 'not-finite' | 'fraction' | 'unsafe';
}

export function coerceReg(field: RegName, v: RegValue, out: Coercion[]): bigint {
  if (typeof v === 'bigint') return BigInt.asUintN(64, v);
  const whole = Number.isFinite(v) ? Math.trunc(v) : 0;
  const stored = BigInt.asUintN(64, BigInt(whole));
  if (!Number.isFinite(v)) out.push({ field, given: v, stored, reason: 'not-finite' });
  else if (!Number.isInteger(v)) out.push({ field, given: v, stored, reason: 'fraction' });
  else if (!Number.isSafeInteger(v)) out.push({ field, given: v, stored, reason: 'unsafe' });
  return stored;
}

export function describeCoercion(c: Coercion): string {
  const why = c.reason === 'unsafe' ? 'is above 2^53 and was rounded; write it as a bigint'
    : c.reason === 'fraction' ? 'is not an integer and was truncated'
      : 'is not a finite number';
  return `${c.field}: ${c.given} ${why} (stored 0x${c.stored.toString(16)})`;
}

function coerceFlag(v: RegValue | TriInput): Tri {
  if (typeof v === 'boolean') return v ? Tri.One : Tri.Zero;
  if (typeof v === 'bigint') return v !== 0n ? Tri.One : Tri.Zero;
  if (v === Tri.Undefined) return Tri.Undefined;
  return v !== 0 ? Tri.One : Tri.Zero;
}

export function formatValue(field: Field, v: FieldValue | undefined): string {
  if (v === undefined) return '-';
  if (isFlag(field)) return typeof v === 'bigint' ? v.toString() : triToString(v);
  return typeof v === 'bigint' ? `0x${v.toString(16)}` : String(v);
}

export function sameValue(a: FieldValue | undefined, b: FieldValue | undefined): boolean {
  return a === b;
}

/**
 * Processor register and flag values before (or after) an instruction executes.
 *
 * Immutable: every setter returns a new State. Fields that were never set are
 * unset, which is distinct from zero. Register numbers that were not stored
 * exactly are listed in `coercions`.
 */
export class State {
  private constructor(
    private readonly values: ReadonlyMap<Field, FieldValue>,
    readonly coercions: readonly Coercion[] = [],
  ) {}

  static at(ip: RegValue): State {
    const coercions: Coercion[] = [];
    return new State(new Map<Field, FieldValue>([['RIP', coerceReg('RIP', ip, coercions)]]), coercions);
  }

  get ip(): bigint {
    const v = this.values.get('RIP');
    return typeof v === 'bigint' ? v : 0n;
  }

  has(field: Field): boolean {
    return this.values.has(field);
  }

  get(field: Field): FieldValue | undefined {
    return this.values.get(field);
  }

  reg(name: RegName): bigint | undefined {
    const v = this.values.get(name);
    return typeof v === 'bigint' ? v : undefined;
  }

  flag(name: FlagName): Tri | undefined {
    const v = this.values.get(name);
    return typeof v === 'bigint' ? undefined : v;
  }

  set(field: RegName, value: RegValue): State;
  set(field: FlagName, value: TriInput): State;
  set(field: Field, value: RegValue | TriInput): State {
    const next = new Map(this.values);
    const coercions = [...this.coercions];
    if (isFlag(field)) {
      next.set(field, coerceFlag(value));
    } else {
      next.set(field, coerceReg(field, typeof value === 'boolean' ? Number(value) : value, coercions));
    }
    return new State(next, coercions);
  }

  with(init: StateInit): State {
    const next = new Map(this.values);
    const coercions = [...this.coercions];
    for (const field of FIELDS) {
      if (isFlag(field)) {
        const v = init[field];
        if (v !== undefined) next.set(field, toTri(v));
      } else {
        const v = init[field];
        if (v !== undefined) next.set(field, coerceReg(field, v, coercions));
      }
    }
    return new State(next, coercions);
  }

  // Sets every arithmetic flag to the same value.
  aflags(v: TriInput): State {
    const next = new Map(this.values);
    for (const f of ARITH_FLAGS) next.set(f, toTri(v));
    return new State(next, this.coercions);
  }

  unset(field: Exclude<Field, 'RIP'>): State {
    const next = new Map(this.values);
    next.delete(field);
    return new State(next, this.coercions);
  }

  fields(): Field[] {
    return FIELDS.filter(f => this.values.has(f));
  }

  equals(other: State): boolean {
    if (this.values.size !== other.values.size) return false;
    for (const [k, v] of this.values) {
      if (!sameValue(v, other.values.get(k))) return false;
    }
    return true;
  }

  toJSON(): StateJson {
    const out: StateJson = {};
    for (const f of this.fields()) {
      const v = this.values.get(f);
      if (v === undefined) continue;
      if (isFlag(f)) out[f] = typeof v === 'bigint' ? Number(v & 1n) : (v === Tri.Undefined ? 'U' : v);
      else out[f] = typeof v === 'bigint' ? `0x${v.toString(16)}` : String(v);
    }
    return out;
  }

  toString(): string {
    return this.fields().map(f => `${f}=${formatValue(f, this.values.get(f))}`).join(' ');
  }

  // Throws TypeError naming every offending field.
  static fromJSON(json: unknown): State {
    const parsed = StateWireSchema.safeParse(json);
    if (!parsed.success) throw new TypeError(describeIssues(parsed.error));
    const next = new Map<Field, FieldValue>();
    for (const field of FIELDS) {
      const v = parsed.data[field];
      if (v !== undefined) next.set(field, v);
    }
    return new State(next);
  }
}

export function S(ip: RegValue): State {
  return State.at(ip);
}
