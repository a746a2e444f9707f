import { describe, it, expect } from 'vitest';
import { asm, raw } from '../../src/asm/bytesSource';
import { EncodingError, ExecutionError } from '../../src/harness/errors';
import type { ExecutionProvider } from '../../src/harness/provider';
import { evaluateCase, runPool, runSuites } from '../../src/harness/runner';
import { VerifyTest } from '../../src/harness/verifyTest';
import { MS } from '../../src/machine/delta';
import { S } from '../../src/machine/state';
import type { State } from '../../src/machine/state';
import { X86Interpreter } from '../../src/x86/interpreter';

const reference = new X86Interpreter({ name: 'ref', undefinedFlags: 'preserve' });
const subject = new X86Interpreter({ name: 'subj', undefinedFlags: 'compute' });

class FakeProvider implements ExecutionProvider {
  calls = 0;
  constructor(
    readonly name: string,
    private readonly fn: (input: State, signal?: AbortSignal) => State | Promise<State>,
  ) {}

  execute(_bytes: Uint8Array, input: State, signal?: AbortSignal): State | Promise<State> {
    this.calls++;
    return this.fn(input, signal);
  }
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));
const RDX_MAX = 0x7fffffffffffffffn;

function rclSet() {
  return VerifyTest('rcl_rdx_cl').tags(['rcl', 'min']).bytes(asm(['rcl rdx, cl']))
    .case({ input: S(0x100).with({ RDX: RDX_MAX, RCX: 63 }).aflags(0), delta: MS().uOF(), expected: true })
    .case({ input: S(0x100).with({ RDX: RDX_MAX, RCX: 63 }).aflags(1), delta: MS().uOF(), expected: true })
    .case({ input: S(0x100).with({ RDX: RDX_MAX, RCX: 63 }).aflags(0), delta: MS(), expected: false })
    .case({ input: S(0x100).with({ RDX: RDX_MAX, RCX: 63 }).aflags(0), delta: MS().expect('OF', 0), expected: false });
}

describe('runSuites', () => {
  it('matches every expected verdict of the rotate-through-carry cases', async () => {
    const report = await runSuites([rclSet()], { reference, subject });
    expect(report.ok).toBe(true);
    expect(report.totals).toEqual({ sets: 1, cases: 4, passed: 4, failed: 0, disputed: 0, skipped: 0, executionErrors: 0 });
    expect(report.sets[0].cases.map(c => c.verdict)).toEqual([true, true, false, false]);
    expect(report.sets[0].bytes).toBe('48 d3 d2');
    expect(report.reference).toBe('ref');
    expect(report.subject).toBe('subj');
  });

  it('reports the failing field of a negative case', async () => {
    const report = await runSuites([rclSet()], { reference, subject });
    const negative = report.sets[0].cases[2];
    expect(negative.verdictMismatch).toBeUndefined();
    expect(negative.mismatches.map(m => [m.field, m.diverged])).toEqual([['OF', 'expectation']]);
  });

  it('fails a negative case that passes', async () => {
    const set = VerifyTest('nop').bytes(asm(['nop'])).case({ input: S(0x100), expected: false });
    const report = await runSuites([set], { reference, subject });
    expect(report.ok).toBe(false);
    expect(report.sets[0].passed).toBe(false);
    expect(report.sets[0].cases[0].verdictMismatch).toEqual({
      reason: 'verdict', expected: false, actual: true, message: 'expected fail, got pass',
    });
  });

  it('reports disputed cases without counting them', async () => {
    const set = VerifyTest('rcl_65').bytes(asm(['rcl rdx, cl']))
      .disputed({ input: S(0x100).with({ RDX: RDX_MAX, RCX: 65 }).aflags(1), delta: MS().uOF(), expected: false, reason: 'open' });
    const report = await runSuites([set], { reference, subject });
    const c = report.sets[0].cases[0];
    expect(c.disputed).toBe('open');
    expect(c.verdict).toBe(true);
    expect(c.verdictMismatch?.reason).toBe('verdict');
    expect(report.ok).toBe(true);
    expect(report.totals.disputed).toBe(1);
    expect(report.totals.failed).toBe(0);
  });

  it('records execution errors and keeps evaluating sibling cases', async () => {
    const crashing = new FakeProvider('crashy', input => {
      if (input.reg('RAX') === 1n) throw new Error('boom');
      return input.set('RIP', input.ip + 1n);
    });
    const set = VerifyTest('nop').bytes(asm(['nop']))
      .case({ input: S(0x100).with({ RAX: 1 }), expected: true })
      .case({ input: S(0x100).with({ RAX: 2 }), expected: true });
    const report = await runSuites([set], { reference, subject: crashing });
    const [first, second] = report.sets[0].cases;
    expect(first.verdict).toBe(false);
    expect(first.errors.map(e => [e.kind, e.provider, e.message])).toEqual([['crash', 'crashy', 'boom']]);
    expect(second.verdict).toBe(true);
    expect(report.totals.executionErrors).toBe(1);
    expect(report.totals.failed).toBe(1);
  });

  it('turns a provider that never answers into a timeout', async () => {
    const hanging = new FakeProvider('hang', (_input, signal) => new Promise<State>((_, reject) => {
      signal?.addEventListener('abort', () => reject(new Error('aborted')));
    }));
    const set = VerifyTest('nop').bytes(asm(['nop'])).case({ input: S(0x100), expected: false });
    const report = await runSuites([set], { reference, subject: hanging, config: { timeoutMs: 20 } });
    const c = report.sets[0].cases[0];
    expect(c.errors.map(e => e.kind)).toEqual(['timeout']);
    expect(c.errors[0].message).toBe('no result within 20 ms');
    expect(report.ok).toBe(true);
  });

  it('stops scheduling after the first failure in fail-fast mode', async () => {
    const set = VerifyTest('add').bytes(asm(['add rax, 1']))
      .case({ input: S(0x100).with({ RAX: 1 }).aflags(0), delta: MS().expect('RAX', 7), expected: true })
      .case({ input: S(0x100).with({ RAX: 1 }).aflags(0), expected: true })
      .case({ input: S(0x100).with({ RAX: 1 }).aflags(0), expected: true });
    const report = await runSuites([set], { reference, subject, config: { failFast: true, concurrency: 1 } });
    expect(report.sets[0].cases.map(c => c.skipped)).toEqual([false, true, true]);
    expect(report.totals.skipped).toBe(2);
    expect(report.aborted).toBe(true);
    expect(report.ok).toBe(false);
  });

  it('skips everything when the run is cancelled up front', async () => {
    const controller = new AbortController();
    controller.abort();
    const report = await runSuites([rclSet()], { reference, subject, signal: controller.signal });
    expect(report.totals.skipped).toBe(4);
    expect(report.sets[0].cases.every(c => c.verdict === undefined)).toBe(true);
  });

  it('bounds the number of cases in flight', async () => {
    let active = 0;
    let peak = 0;
    const slow = new FakeProvider('slow', async input => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      active--;
      return input.set('RIP', input.ip + 1n);
    });
    const set = VerifyTest('nop').bytes(asm(['nop']));
    for (let i = 0; i < 6; i++) set.case({ input: S(0x100), expected: true });
    const report = await runSuites([set], { reference: slow, subject, config: { concurrency: 2 } });
    expect(report.ok).toBe(true);
    expect(slow.calls).toBe(6);
    expect(peak).toBe(2);
  });

  it('aborts before any provider runs when a line cannot be encoded', async () => {
    const counting = new FakeProvider('count', input => input);
    const good = VerifyTest('nop').bytes(asm(['nop'])).case({ input: S(0x100), expected: true });
    const bad = VerifyTest('bad').bytes(asm(['nop', 'frob rax'])).case({ input: S(0x100), expected: true });
    await expect(runSuites([good, bad], { reference: counting, subject: counting })).rejects.toThrow(EncodingError);
    await expect(runSuites([good, bad], { reference: counting, subject: counting })).rejects.toThrow("Cannot encode 'frob rax'");
    expect(counting.calls).toBe(0);
  });

  it('flags providers that answer differently for equal inputs', async () => {
    let n = 0;
    const flaky = new FakeProvider('flaky', input => input.with({ RIP: input.ip + 1n, RAX: n++ }));
    const set = VerifyTest('nop').bytes(raw([0x90])).case({ input: S(0x100).with({ RAX: 0 }), expected: false });
    const report = await runSuites([set], { reference, subject: flaky, config: { determinism: true } });
    const c = report.sets[0].cases[0];
    expect(c.errors.map(e => [e.kind, e.provider])).toEqual([['nondeterministic', 'flaky']]);
    expect(flaky.calls).toBe(2);
  });

  it('fails weakened expectations in strict mode', async () => {
    const set = VerifyTest('rcl').bytes(asm(['rcl rdx, cl']))
      .case({ input: S(0x100).with({ RDX: RDX_MAX, RCX: 63 }).aflags(0), delta: MS().expect('OF', 1).uOF(), expected: true });
    const lenient = await runSuites([set], { reference, subject });
    expect(lenient.ok).toBe(true);
    expect(lenient.sets[0].cases[0].warnings).toHaveLength(1);
    const strict = await runSuites([set], { reference, subject, config: { strictDeltas: true } });
    expect(strict.ok).toBe(false);
    expect(strict.sets[0].cases[0].verdictMismatch?.reason).toBe('authoring');
    expect(strict.sets[0].cases[0].verdictMismatch?.message).toBe('delta weakens an expectation without override (OF)');
  });

  it('reports register numbers that were rounded on construction', async () => {
    const set = VerifyTest('nop').bytes(raw([0x90])).case({ input: S(0x100).with({ RAX: 2 ** 60 }), expected: true });
    const lenient = await runSuites([set], { reference, subject });
    expect(lenient.ok).toBe(true);
    expect(lenient.sets[0].cases[0].coercions.map(c => [c.field, c.reason])).toEqual([['RAX', 'unsafe']]);
    const strict = await runSuites([set], { reference, subject, config: { strictDeltas: true } });
    expect(strict.ok).toBe(false);
    expect(strict.sets[0].cases[0].verdictMismatch?.message).toBe('register value not stored exactly (RAX)');
  });
});

describe('evaluateCase', () => {
  it('is deterministic across repeated runs', async () => {
    const set = rclSet();
    const bytes = set.encode();
    const a = await evaluateCase(set, bytes, set.cases[0], { reference, subject });
    const b = await evaluateCase(set, bytes, set.cases[0], { reference, subject });
    expect(a.verdict).toBe(b.verdict);
    expect(a.fields).toEqual(b.fields);
    expect(a.subject?.equals(b.subject ?? S(0))).toBe(true);
  });

  it('retags errors with the provider that raised them', async () => {
    const set = VerifyTest('x').bytes(raw([0x0f, 0x0b])).case({ input: S(0x100), expected: false });
    const r = await evaluateCase(set, set.encode(), set.cases[0], { reference, subject });
    expect(r.errors.map(e => [e.kind, e.provider])).toEqual([['decode', 'ref'], ['decode', 'subj']]);
    expect(r.errors[0]).toBeInstanceOf(ExecutionError);
    expect(r.verdictMismatch).toBeUndefined();
  });
});

describe('runPool', () => {
  it('preserves item order and leaves stopped items undefined', async () => {
    let stop = false;
    const out = await runPool([1, 2, 3, 4], 1, async n => {
      if (n === 2) stop = true;
      return n * 10;
    }, () => stop);
    expect(out).toEqual([10, 20, undefined, undefined]);
  });

  it('handles an empty input', async () => {
    expect(await runPool([], 4, async () => 1)).toEqual([]);
  });
});
