import fs from 'node:fs';
import { error, setDebug } from '../debug/log';
import { loadConfig, parseBool } from '../harness/config';
import type { HarnessConfig } from '../harness/config';
import { EncodingError } from '../harness/errors';
import type { ExecutionProvider } from '../harness/provider';
import type { SuiteRegistry } from '../harness/registry';
import { formatText, toJson } from '../harness/report';
import { runSuites } from '../harness/runner';
import { ProcessProvider } from '../providers/processProvider';
import { builtinRegistry } from '../suites';
import { X86Interpreter } from '../x86/interpreter';
import type { UndefinedFlagPolicy } from '../x86/interpreter';

export const EXIT_OK = 0;
export const EXIT_MISMATCH = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
  writeFile(path: string, text: string): void;
  env: Record<string, string | undefined>;
}

export const processIO: CliIO = {
  out: text => process.stdout.write(`${text}\n`),
  err: text => process.stderr.write(`${text}\n`),
  writeFile: (path, text) => fs.writeFileSync(path, text),
  env: process.env,
};

export const USAGE = `usage: verify [--tags=a,b] [--exclude=c] [--name=regex] [--failFast] [--timeout=ms]
              [--concurrency=n] [--json=path] [--reference=provider] [--subject=provider] [--list]
providers: interp:preserve | interp:zero | interp:compute | any other value is run as a command`;

class UsageError extends Error {}

const KNOWN = new Set(['tags', 'exclude', 'name', 'failFast', 'timeout', 'concurrency', 'json', 'reference', 'subject', 'list', 'debug', 'help']);

function parseArgs(argv: readonly string[]): Map<string, string> {
  const out = new Map<string, string>();
  for (const a of argv) {
    const m = a.match(/^--([A-Za-z]+)(?:=(.*))?$/);
    if (!m || !KNOWN.has(m[1])) throw new UsageError(`unknown argument '${a}'`);
    out.set(m[1], m[2] ?? 'true');
  }
  return out;
}

function list(v: string | undefined): string[] {
  return v ? v.split(',').map(s => s.trim()).filter(s => s.length > 0) : [];
}

function positive(name: string, v: string | undefined, def: number): number {
  if (v === undefined) return def;
  const n = Number(v);
  if (!Number.isInteger(n) || n <= 0) throw new UsageError(`--${name} must be a positive integer`);
  return n;
}

const POLICIES: readonly UndefinedFlagPolicy[] = ['preserve', 'zero', 'compute'];

export function providerFromArg(spec: string, role: string): ExecutionProvider {
  if (spec.startsWith('interp:')) {
    const policy = POLICIES.find(p => `interp:${p}` === spec);
    if (!policy) throw new UsageError(`unknown interpreter policy in '${spec}'`);
    return new X86Interpreter({ name: `${role}:interp(${policy})`, undefinedFlags: policy });
  }
  const [command, ...args] = spec.split(/\s+/).filter(s => s.length > 0);
  if (!command) throw new UsageError(`empty --${role} command`);
  return new ProcessProvider({ name: `${role}:${command}`, command, args });
}

/**
 * Runs the selected verification sets and returns the process exit code:
 * 0 when every verdict matches, 1 when any disagrees, 2 on usage or encoding errors.
 */
export async function main(argv: readonly string[], io: CliIO = processIO, registry: SuiteRegistry = builtinRegistry()): Promise<number> {
  try {
    const args = parseArgs(argv);
    if (args.has('help')) {
      io.out(USAGE);
      return EXIT_OK;
    }
    const env = loadConfig(io.env);
    const config: HarnessConfig = {
      ...env,
      timeoutMs: positive('timeout', args.get('timeout'), env.timeoutMs),
      concurrency: positive('concurrency', args.get('concurrency'), env.concurrency),
      failFast: parseBool(args.get('failFast'), env.failFast),
      debug: parseBool(args.get('debug'), env.debug),
    };
    setDebug(config.debug);

    let name: RegExp | undefined;
    const pattern = args.get('name');
    if (pattern !== undefined) {
      try {
        name = new RegExp(pattern);
      } catch (e) {
        throw new UsageError(`--name is not a valid pattern: ${e instanceof Error ? e.message : String(e)}`);
      }
    }
    const sets = registry.select({ include: list(args.get('tags')), exclude: list(args.get('exclude')), name });

    if (args.has('list')) {
      for (const s of sets) io.out(`${s.name} [${s.tagList.join(',')}] ${s.describeBytes()} (${s.cases.length} cases)`);
      return EXIT_OK;
    }
    if (sets.length === 0) {
      io.err('no verification sets match the selection');
      return EXIT_USAGE;
    }

    const reference = providerFromArg(args.get('reference') ?? 'interp:preserve', 'reference');
    const subject = providerFromArg(args.get('subject') ?? 'interp:compute', 'subject');
    const report = await runSuites(sets, { reference, subject, config });
    io.out(formatText(report));
    const jsonPath = args.get('json');
    if (jsonPath) io.writeFile(jsonPath, `${JSON.stringify(toJson(report), null, 2)}\n`);
    return report.ok ? EXIT_OK : EXIT_MISMATCH;
  } catch (e) {
    if (e instanceof UsageError) {
      io.err(e.message);
      io.err(USAGE);
      return EXIT_USAGE;
    }
    if (e instanceof EncodingError) {
      error('ENCODE', e.message);
      io.err(e.message);
      return EXIT_USAGE;
    }
    throw e;
  }
}
