import { MachineStateDelta } from '../machine/delta';
import type { Designation } from '../machine/delta';
import { fieldOrder, isFlag } from '../machine/registers';
import type { Field } from '../machine/registers';
import { formatValue, sameValue } from '../machine/state';
import type { FieldValue, State } from '../machine/state';
import { Tri } from '../machine/triState';
import type { FieldRule, Party, ReconciliationMismatch } from './errors';

export interface FieldDelta {
  field: Field;
  initial?: FieldValue;
  reference?: FieldValue;
  subject?: FieldValue;
  changed: boolean; // reference differs from initial
  agree: boolean;   // reference equals subject
}

// Per-field view of what the two providers did to the initial state.
export function computeActualDelta(
  initial: State,
  reference: State,
  subject: State,
  expected: MachineStateDelta = MachineStateDelta.empty(),
): FieldDelta[] {
  const fields = new Set<Field>([...initial.fields(), ...reference.fields(), ...subject.fields(), ...expected.fields()]);
  return [...fields]
    .sort((a, b) => fieldOrder(a) - fieldOrder(b))
    .map(field => {
      const i = initial.get(field);
      const r = reference.get(field);
      const s = subject.get(field);
      return { field, initial: i, reference: r, subject: s, changed: !sameValue(r, i), agree: sameValue(r, s) };
    });
}

function ruleOf(d: Designation | undefined): FieldRule | 'unchecked' {
  if (!d) return 'agree';
  return d.kind;
}

function mismatch(
  fd: FieldDelta,
  rule: FieldRule,
  diverged: Party,
  message: string,
  expected?: FieldValue,
): ReconciliationMismatch {
  return {
    field: fd.field,
    rule,
    diverged,
    initial: fd.initial,
    expected,
    reference: fd.reference,
    subject: fd.subject,
    message: `${fd.field}: ${message}`,
  };
}

function missing(fd: FieldDelta, rule: FieldRule): ReconciliationMismatch | undefined {
  const r = fd.reference === undefined;
  const s = fd.subject === undefined;
  if (!r && !s) return undefined;
  // A field the subject invents, absent from the input and the reference, is the subject's divergence.
  if (r && !s && fd.initial === undefined) return mismatch(fd, rule, 'subject', 'reported only by subject');
  const diverged: Party = r && s ? 'both' : r ? 'reference' : 'subject';
  return mismatch(fd, rule, diverged, `not reported by ${diverged === 'both' ? 'either provider' : diverged}`);
}

function reconcileField(fd: FieldDelta, d: Designation | undefined): ReconciliationMismatch | undefined {
  const rule = ruleOf(d);
  if (rule === 'unchecked') return undefined;

  const absent = missing(fd, rule);
  if (absent) return absent;
  const { field, reference: ref, subject: subj } = fd;

  if (rule === 'undefined') return undefined;

  if (d && d.kind === 'value') {
    const want = d.value;
    if (ref === Tri.Undefined) {
      return mismatch(fd, rule, 'expectation', `expected ${formatValue(field, want)} but the reference leaves it undefined`, want);
    }
    const refOk = sameValue(ref, want);
    // Flags are checked against the reference; registers against the required value.
    const subjOk = isFlag(field) ? sameValue(subj, ref) : sameValue(subj, want);
    if (refOk && subjOk) return undefined;
    const diverged: Party = !refOk && !subjOk ? 'both' : !refOk ? 'reference' : 'subject';
    return mismatch(
      fd,
      rule,
      diverged,
      `expected ${formatValue(field, want)}, reference ${formatValue(field, ref)}, subject ${formatValue(field, subj)}`,
      want,
    );
  }

  if (ref === Tri.Undefined) {
    return mismatch(fd, 'agree', 'expectation', 'reference leaves it undefined but the case does not mark it undefined');
  }
  if (fd.agree) return undefined;
  return mismatch(
    fd,
    'agree',
    'subject',
    `reference ${formatValue(field, ref)}, subject ${formatValue(field, subj)} (initial ${formatValue(field, fd.initial)})`,
  );
}

export interface Reconciliation {
  fields: FieldDelta[];
  mismatches: ReconciliationMismatch[];
}

/**
 * Reconciles both providers' results against the expected delta, field by field.
 * Every discrepancy is collected; nothing is thrown.
 */
export function reconcile(initial: State, reference: State, subject: State, expected: MachineStateDelta): Reconciliation {
  const fields = computeActualDelta(initial, reference, subject, expected);
  const mismatches: ReconciliationMismatch[] = [];
  for (const fd of fields) {
    const m = reconcileField(fd, expected.designation(fd.field));
    if (m) mismatches.push(m);
  }
  return { fields, mismatches };
}
