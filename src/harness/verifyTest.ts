import type { BytesSource } from '../asm/bytesSource';
import { MachineStateDelta } from '../machine/delta';
import type { State } from '../machine/state';

export interface VerifyCase {
  index: number;
  input: State;
  delta: MachineStateDelta;
  expected: boolean;
  note?: string;
  // Set for cases whose expected verdict is not yet settled; reported, never asserted.
  disputed?: string;
}

export interface CaseSpec {
  input: State;
  delta?: MachineStateDelta;
  expected: boolean;
  note?: string;
}

export interface DisputedSpec extends CaseSpec {
  reason: string;
}

/**
 * A named set of verification cases sharing one instruction byte sequence.
 *
 *   VerifyTest('rcl_rdx_cl').tags(['rcl', 'min']).bytes(asm(['rcl rdx, cl']))
 *     .case({ input: S(0x100).with({ RDX: 1n, RCX: 1 }).aflags(0), expected: true });
 */
export class VerificationSet {
  private readonly tagSet = new Set<string>();
  private source?: BytesSource;
  private readonly caseList: VerifyCase[] = [];

  constructor(readonly name: string) {}

  tags(tags: Iterable<string>): this {
    for (const t of tags) this.tagSet.add(t);
    return this;
  }

  bytes(source: BytesSource): this {
    if (this.source) throw new Error(`${this.name}: bytes already attached`);
    this.source = source;
    return this;
  }

  case(spec: CaseSpec): this {
    this.caseList.push({
      index: this.caseList.length,
      input: spec.input,
      delta: spec.delta ?? MachineStateDelta.empty(),
      expected: spec.expected,
      note: spec.note,
    });
    return this;
  }

  disputed(spec: DisputedSpec): this {
    this.case(spec);
    this.caseList[this.caseList.length - 1].disputed = spec.reason;
    return this;
  }

  get tagList(): string[] {
    return [...this.tagSet].sort();
  }

  hasTag(tag: string): boolean {
    return this.tagSet.has(tag);
  }

  get cases(): readonly VerifyCase[] {
    return this.caseList;
  }

  describeBytes(): string {
    return this.source ? this.source.describe() : '(no bytes)';
  }

  // Throws EncodingError for a line the encoder rejects.
  encode(): Uint8Array {
    if (!this.source) throw new Error(`${this.name}: no bytes attached`);
    return this.source.encode();
  }
}

export function VerifyTest(name: string): VerificationSet {
  return new VerificationSet(name);
}
