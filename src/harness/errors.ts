import type { Field } from '../machine/registers';
import type { FieldValue } from '../machine/state';

// Build time: a line the encoder could not turn into bytes. Aborts the whole run.
export class EncodingError extends Error {
  constructor(public readonly line: string, public readonly reason: string) {
    super(`Cannot encode '${line}': ${reason}`);
    this.name = 'EncodingError';
  }
}

export type ExecutionErrorKind =
  | 'decode'
  | 'unsupported'
  | 'unset-input'
  | 'timeout'
  | 'crash'
  | 'protocol'
  | 'nondeterministic';

// Per case: a provider could not produce a result state. Sibling cases continue.
export class ExecutionError extends Error {
  constructor(
    public readonly kind: ExecutionErrorKind,
    message: string,
    public readonly provider: string = '?',
  ) {
    super(message);
    this.name = 'ExecutionError';
  }

  withProvider(provider: string): ExecutionError {
    return new ExecutionError(this.kind, this.message, provider);
  }
}

export type Party = 'reference' | 'subject' | 'both' | 'expectation';

export type FieldRule = 'value' | 'undefined' | 'agree';

// Per field: an actual value disagrees with what the case requires. Collected, not thrown.
export interface ReconciliationMismatch {
  field: Field;
  rule: FieldRule;
  diverged: Party;
  initial?: FieldValue;
  expected?: FieldValue;
  reference?: FieldValue;
  subject?: FieldValue;
  message: string;
}

export type VerdictMismatchReason = 'verdict' | 'authoring';

// Per case: the computed verdict disagrees with the author's expected verdict.
export interface VerdictMismatch {
  reason: VerdictMismatchReason;
  expected: boolean;
  actual: boolean;
  message: string;
}
