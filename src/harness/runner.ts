import { toHexBytes } from '../asm/bytesSource';
import { dbg, warn } from '../debug/log';
import type { DeltaOverwrite, MachineStateDelta } from '../machine/delta';
import { describeCoercion } from '../machine/state';
import type { Coercion, State } from '../machine/state';
import { reconcile } from './comparator';
import type { FieldDelta } from './comparator';
import { DEFAULT_CONFIG } from './config';
import type { HarnessConfig } from './config';
import { ExecutionError } from './errors';
import type { ReconciliationMismatch, VerdictMismatch } from './errors';
import { invokeProvider } from './provider';
import type { ExecutionProvider, Outcome } from './provider';
import type { VerificationSet, VerifyCase } from './verifyTest';

export interface RunOptions {
  reference: ExecutionProvider;
  subject: ExecutionProvider;
  config?: Partial<HarnessConfig>;
  signal?: AbortSignal;
}

export interface CaseResult {
  set: string;
  index: number;
  input: State;
  delta: MachineStateDelta;
  expected: boolean;
  note?: string;
  disputed?: string;
  skipped: boolean;
  verdict?: boolean; // computed pass/fail; absent when skipped
  reference?: State;
  subject?: State;
  errors: ExecutionError[];
  fields: FieldDelta[];
  mismatches: ReconciliationMismatch[];
  warnings: readonly DeltaOverwrite[];
  coercions: readonly Coercion[]; // inexact register numbers in the input or the delta
  verdictMismatch?: VerdictMismatch;
  elapsedMs: number;
}

export interface SetResult {
  name: string;
  tags: string[];
  source: string;
  bytes: string;
  cases: CaseResult[];
  passed: boolean; // no verdict mismatch among evaluated, non-disputed cases
}

export interface RunTotals {
  sets: number;
  cases: number;
  passed: number;       // verdict matched the expected verdict
  failed: number;       // verdict mismatch on a non-disputed case
  disputed: number;
  skipped: number;
  executionErrors: number;
}

export interface RunReport {
  reference: string;
  subject: string;
  sets: SetResult[];
  totals: RunTotals;
  aborted: boolean;
  ok: boolean;
}

interface Job {
  set: VerificationSet;
  bytes: Uint8Array;
  testCase: VerifyCase;
}

type Providers = Pick<RunOptions, 'reference' | 'subject'>;

async function runOnce(
  provider: ExecutionProvider,
  bytes: Uint8Array,
  input: State,
  config: HarnessConfig,
  signal?: AbortSignal,
): Promise<Outcome> {
  const first = await invokeProvider(provider, bytes, input, { timeoutMs: config.timeoutMs, signal });
  if (!config.determinism || !first.ok) return first;
  const second = await invokeProvider(provider, bytes, input, { timeoutMs: config.timeoutMs, signal });
  if (second.ok && second.state.equals(first.state)) return first;
  const detail = second.ok ? `${first.state} then ${second.state}` : `second run failed: ${second.error.message}`;
  return {
    ok: false,
    error: new ExecutionError('nondeterministic', `different results for equal inputs: ${detail}`, provider.name),
    elapsedMs: first.elapsedMs + second.elapsedMs,
  };
}

function skippedResult(set: VerificationSet, c: VerifyCase): CaseResult {
  return {
    set: set.name,
    index: c.index,
    input: c.input,
    delta: c.delta,
    expected: c.expected,
    note: c.note,
    disputed: c.disputed,
    skipped: true,
    errors: [],
    fields: [],
    mismatches: [],
    warnings: c.delta.warnings,
    coercions: [...c.input.coercions, ...c.delta.coercions],
    elapsedMs: 0,
  };
}

/**
 * Runs one case through both providers and reconciles the results.
 * Execution errors and mismatches are collected on the result; nothing throws.
 */
export async function evaluateCase(
  set: VerificationSet,
  bytes: Uint8Array,
  c: VerifyCase,
  providers: Providers,
  config: HarnessConfig = DEFAULT_CONFIG,
  signal?: AbortSignal,
): Promise<CaseResult> {
  const [ref, subj] = await Promise.all([
    runOnce(providers.reference, bytes, c.input, config, signal),
    runOnce(providers.subject, bytes, c.input, config, signal),
  ]);
  const errors: ExecutionError[] = [];
  if (!ref.ok) errors.push(ref.error);
  if (!subj.ok) errors.push(subj.error);

  const result: CaseResult = {
    ...skippedResult(set, c),
    skipped: false,
    reference: ref.ok ? ref.state : undefined,
    subject: subj.ok ? subj.state : undefined,
    errors,
    elapsedMs: ref.elapsedMs + subj.elapsedMs,
  };
  if (ref.ok && subj.ok) {
    const r = reconcile(c.input, ref.state, subj.state, c.delta);
    result.fields = r.fields;
    result.mismatches = r.mismatches;
  }

  const verdict = errors.length === 0 && result.mismatches.length === 0;
  result.verdict = verdict;
  const authoring: string[] = [];
  if (c.delta.warnings.length > 0) {
    authoring.push(`delta weakens an expectation without override (${c.delta.warnings.map(w => w.field).join(', ')})`);
  }
  if (result.coercions.length > 0) {
    authoring.push(`register value not stored exactly (${result.coercions.map(w => w.field).join(', ')})`);
  }
  if (config.strictDeltas && authoring.length > 0) {
    result.verdictMismatch = {
      reason: 'authoring',
      expected: c.expected,
      actual: verdict,
      message: authoring.join('; '),
    };
  } else if (verdict !== c.expected) {
    result.verdictMismatch = {
      reason: 'verdict',
      expected: c.expected,
      actual: verdict,
      message: c.expected
        ? `expected pass, got fail (${errors.length} execution error(s), ${result.mismatches.length} mismatch(es))`
        : 'expected fail, got pass',
    };
  }
  return result;
}

// Bounded-concurrency pool. `stop` is consulted before each item is started;
// items never started come back as undefined.
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  stop: () => boolean = () => false,
): Promise<(R | undefined)[]> {
  const results: (R | undefined)[] = new Array<R | undefined>(items.length).fill(undefined);
  let next = 0;
  const lanes = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, async () => {
    while (next < items.length && !stop()) {
      const i = next++;
      results[i] = await worker(items[i], i);
    }
  });
  await Promise.all(lanes);
  return results;
}

function countsAsFailure(r: CaseResult): boolean {
  return !r.skipped && !r.disputed && r.verdictMismatch !== undefined;
}

/**
 * Encodes every selected set, then evaluates all their cases on a bounded pool.
 * An EncodingError propagates before any provider runs.
 */
export async function runSuites(sets: readonly VerificationSet[], opts: RunOptions): Promise<RunReport> {
  const config: HarnessConfig = { ...DEFAULT_CONFIG, ...opts.config };

  const encoded = sets.map(set => ({ set, bytes: set.encode() }));
  const jobs: Job[] = encoded.flatMap(({ set, bytes }) => set.cases.map(testCase => ({ set, bytes, testCase })));
  dbg('RUN', `${sets.length} set(s), ${jobs.length} case(s), concurrency ${config.concurrency}`);

  let failedFast = false;
  const stop = () => failedFast || opts.signal?.aborted === true;
  const outcomes = await runPool(jobs, config.concurrency, async job => {
    const r = await evaluateCase(job.set, job.bytes, job.testCase, opts, config, opts.signal);
    dbg('CASE', `${r.set}#${r.index} verdict=${r.verdict ? 'pass' : 'fail'} expected=${r.expected ? 'pass' : 'fail'}`);
    if (r.warnings.length > 0 && !config.strictDeltas) {
      warn('DELTA', `${r.set}#${r.index}: expectation weakened on ${r.warnings.map(w => w.field).join(', ')}`);
    }
    if (r.coercions.length > 0 && !config.strictDeltas) {
      for (const c of r.coercions) warn('VALUE', `${r.set}#${r.index}: ${describeCoercion(c)}`);
    }
    if (config.failFast && countsAsFailure(r)) failedFast = true;
    return r;
  }, stop);

  const results = jobs.map((job, i) => outcomes[i] ?? skippedResult(job.set, job.testCase));
  const setResults: SetResult[] = encoded.map(({ set, bytes }) => {
    const cases = results.filter((_, i) => jobs[i].set === set);
    return {
      name: set.name,
      tags: set.tagList,
      source: set.describeBytes(),
      bytes: toHexBytes(bytes),
      cases,
      passed: !cases.some(countsAsFailure),
    };
  });

  const totals: RunTotals = {
    sets: setResults.length,
    cases: results.length,
    passed: results.filter(r => !r.skipped && !r.disputed && !r.verdictMismatch).length,
    failed: results.filter(countsAsFailure).length,
    disputed: results.filter(r => !r.skipped && r.disputed !== undefined).length,
    skipped: results.filter(r => r.skipped).length,
    executionErrors: results.reduce((n, r) => n + r.errors.length, 0),
  };
  const aborted = totals.skipped > 0;
  return {
    reference: opts.reference.name,
    subject: opts.subject.name,
    sets: setResults,
    totals,
    aborted,
    ok: totals.failed === 0 && !aborted,
  };
}
