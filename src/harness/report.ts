import { describeDesignation } from '../machine/delta';
import { describeCoercion, formatValue } from '../machine/state';
import type { StateJson } from '../machine/state';
import type { CaseResult, RunReport } from './runner';

function verdictWord(v: boolean | undefined): string {
  if (v === undefined) return 'skipped';
  return v ? 'pass' : 'fail';
}

function caseHeader(r: CaseResult): string {
  const parts = [`${r.set}#${r.index}`, `expected ${verdictWord(r.expected)}`, `got ${verdictWord(r.verdict)}`];
  if (r.note) parts.push(`(${r.note})`);
  return parts.join(' ');
}

function caseDetail(r: CaseResult): string[] {
  const lines: string[] = [];
  lines.push(`    initial:  ${r.input.toString()}`);
  lines.push(`    expected: ${r.delta.toString()}`);
  if (r.verdictMismatch) lines.push(`    ${r.verdictMismatch.reason}: ${r.verdictMismatch.message}`);
  for (const e of r.errors) lines.push(`    error [${e.provider}] ${e.kind}: ${e.message}`);
  for (const m of r.mismatches) {
    lines.push(`    ${m.field.padEnd(3)} ${describeDesignation(m.field, r.delta.designation(m.field)).padEnd(10)}`
      + ` ref=${formatValue(m.field, m.reference)} subj=${formatValue(m.field, m.subject)}`
      + ` init=${formatValue(m.field, m.initial)} diverged=${m.diverged}`);
  }
  for (const w of r.warnings) {
    lines.push(`    warning: ${w.field} ${describeDesignation(w.field, w.from)} overwritten by ${describeDesignation(w.field, w.to)}`);
  }
  for (const c of r.coercions) lines.push(`    coerced: ${describeCoercion(c)}`);
  return lines;
}

// Human-readable report: one line per set, details for failing and disputed cases.
export function formatText(report: RunReport): string {
  const out: string[] = [];
  out.push(`reference: ${report.reference}`);
  out.push(`subject:   ${report.subject}`);
  for (const set of report.sets) {
    const evaluated = set.cases.filter(c => !c.skipped).length;
    out.push(`${set.passed ? 'PASS' : 'FAIL'} ${set.name} [${set.tags.join(',')}] ${set.source} (${evaluated}/${set.cases.length} cases)`);
    for (const c of set.cases) {
      if (c.skipped) continue;
      if (c.disputed !== undefined) {
        out.push(`  DISPUTED ${caseHeader(c)}: ${c.disputed}`);
        continue;
      }
      if (!c.verdictMismatch) continue;
      out.push(`  ${caseHeader(c)}`);
      out.push(...caseDetail(c));
    }
  }
  const t = report.totals;
  out.push(
    `${report.ok ? 'OK' : 'FAILED'}: ${t.passed} passed, ${t.failed} failed, ${t.disputed} disputed, `
    + `${t.skipped} skipped, ${t.executionErrors} execution error(s) in ${t.sets} set(s)`,
  );
  return out.join('\n');
}

export interface CaseJson {
  index: number;
  expected: boolean;
  verdict: boolean | null;
  skipped: boolean;
  disputed?: string;
  note?: string;
  input: StateJson;
  delta: string;
  reference?: StateJson;
  subject?: StateJson;
  errors: { provider: string; kind: string; message: string }[];
  mismatches: { field: string; rule: string; diverged: string; message: string }[];
  warnings: { field: string; from: string; to: string }[];
  coercions: string[];
  verdictMismatch?: { reason: string; message: string };
}

export interface ReportJson {
  reference: string;
  subject: string;
  ok: boolean;
  aborted: boolean;
  totals: RunReport['totals'];
  sets: { name: string; tags: string[]; source: string; bytes: string; passed: boolean; cases: CaseJson[] }[];
}

function caseJson(r: CaseResult): CaseJson {
  return {
    index: r.index,
    expected: r.expected,
    verdict: r.verdict ?? null,
    skipped: r.skipped,
    disputed: r.disputed,
    note: r.note,
    input: r.input.toJSON(),
    delta: r.delta.toString(),
    reference: r.reference?.toJSON(),
    subject: r.subject?.toJSON(),
    errors: r.errors.map(e => ({ provider: e.provider, kind: e.kind, message: e.message })),
    mismatches: r.mismatches.map(m => ({ field: m.field, rule: m.rule, diverged: m.diverged, message: m.message })),
    warnings: r.warnings.map(w => ({
      field: w.field,
      from: describeDesignation(w.field, w.from),
      to: describeDesignation(w.field, w.to),
    })),
    coercions: r.coercions.map(describeCoercion),
    verdictMismatch: r.verdictMismatch && { reason: r.verdictMismatch.reason, message: r.verdictMismatch.message },
  };
}

export function toJson(report: RunReport): ReportJson {
  return {
    reference: report.reference,
    subject: report.subject,
    ok: report.ok,
    aborted: report.aborted,
    totals: report.totals,
    sets: report.sets.map(s => ({
      name: s.name,
      tags: s.tags,
      source: s.source,
      bytes: s.bytes,
      passed: s.passed,
      cases: s.cases.map(caseJson),
    })),
  };
}
