import { fieldOrder, isFlag } from './registers';
import type { Field, FlagName, RegName } from './registers';
import { coerceReg, formatValue } from './state';
import type { Coercion, FieldValue, RegValue } from './state';
import { toTri } from './triState';
import type { Tri, TriInput } from './triState';

export type Designation =
  | { kind: 'value'; value: FieldValue } // required concrete value
  | { kind: 'undefined' }                // providers may diverge on this field
  | { kind: 'unchecked' };               // not checked at all

// Strength used to detect an expectation being weakened by a later call.
const STRENGTH: Record<Designation['kind'], number> = { value: 2, undefined: 1, unchecked: 0 };

export interface DeltaOverwrite {
  field: Field;
  from: Designation;
  to: Designation;
}

export interface DesignateOptions {
  override?: boolean; // the weakening is intended; do not record a warning
}

export function describeDesignation(field: Field, d: Designation | undefined): string {
  if (!d) return 'agree';
  if (d.kind === 'value') return `= ${formatValue(field, d.value)}`;
  return d.kind;
}

/**
 * Machine-state delta: the sparse expectation a case places on the post-execution state.
 *
 * Starts empty; each call narrows one field and returns a new delta. The last
 * designation of a field wins. Weakening an expectation (value -> undefined or
 * unchecked, undefined -> unchecked) is recorded in `warnings` unless the call
 * passes `{ override: true }`. Register numbers that could not be stored exactly
 * are recorded in `coercions`.
 */
export class MachineStateDelta {
  private constructor(
    private readonly entries: ReadonlyMap<Field, Designation>,
    readonly warnings: readonly DeltaOverwrite[],
    readonly coercions: readonly Coercion[] = [],
  ) {}

  static empty(): MachineStateDelta {
    return new MachineStateDelta(new Map(), []);
  }

  get isEmpty(): boolean {
    return this.entries.size === 0;
  }

  designation(field: Field): Designation | undefined {
    return this.entries.get(field);
  }

  fields(): Field[] {
    return [...this.entries.keys()].sort((a, b) => fieldOrder(a) - fieldOrder(b));
  }

  expect(field: RegName, value: RegValue, opts?: DesignateOptions): MachineStateDelta;
  expect(field: FlagName, value: Exclude<TriInput, Tri.Undefined>, opts?: DesignateOptions): MachineStateDelta;
  expect(field: Field, value: RegValue | TriInput, opts: DesignateOptions = {}): MachineStateDelta {
    if (isFlag(field)) {
      const v = typeof value === 'bigint' ? toTri(value !== 0n) : typeof value === 'boolean' ? toTri(value) : toTri(value === 0 ? 0 : 1);
      return this.designate(field, { kind: 'value', value: v }, opts);
    }
    const coercions = [...this.coercions];
    const v = coerceReg(field, typeof value === 'boolean' ? Number(value) : value, coercions);
    return this.designate(field, { kind: 'value', value: v }, opts, coercions);
  }

  undef(field: Field, opts: DesignateOptions = {}): MachineStateDelta {
    return this.designate(field, { kind: 'undefined' }, opts);
  }

  ignore(field: Field, opts: DesignateOptions = {}): MachineStateDelta {
    return this.designate(field, { kind: 'unchecked' }, opts);
  }

  uCF(): MachineStateDelta { return this.undef('CF'); }
  uPF(): MachineStateDelta { return this.undef('PF'); }
  uAF(): MachineStateDelta { return this.undef('AF'); }
  uZF(): MachineStateDelta { return this.undef('ZF'); }
  uSF(): MachineStateDelta { return this.undef('SF'); }
  uOF(): MachineStateDelta { return this.undef('OF'); }

  toString(): string {
    if (this.isEmpty) return 'MS()';
    return `MS(${this.fields().map(f => `${f} ${describeDesignation(f, this.entries.get(f))}`).join(', ')})`;
  }

  private designate(
    field: Field,
    d: Designation,
    opts: DesignateOptions,
    coercions: readonly Coercion[] = this.coercions,
  ): MachineStateDelta {
    const prev = this.entries.get(field);
    const warnings = [...this.warnings];
    if (prev && !opts.override && STRENGTH[d.kind] < STRENGTH[prev.kind]) {
      warnings.push({ field, from: prev, to: d });
    }
    const next = new Map(this.entries);
    next.set(field, d);
    return new MachineStateDelta(next, warnings, coercions);
  }
}

export function MS(): MachineStateDelta {
  return MachineStateDelta.empty();
}
