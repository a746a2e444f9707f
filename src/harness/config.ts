import { warn } from '../debug/log';

export interface HarnessConfig {
  timeoutMs: number;     // wall-clock budget per provider call
  concurrency: number;   // cases evaluated at once
  failFast: boolean;     // stop scheduling cases after the first verdict mismatch
  strictDeltas: boolean; // fail cases whose delta weakened an expectation without override
  determinism: boolean;  // run each provider twice and compare
  debug: boolean;
}

export const DEFAULT_CONFIG: HarnessConfig = {
  timeoutMs: 2000,
  concurrency: 4,
  failFast: false,
  strictDeltas: false,
  determinism: false,
  debug: false,
};

type Env = Record<string, string | undefined>;

export function parseBool(v: string | undefined, def: boolean): boolean {
  if (v === undefined || v.trim() === '') return def;
  if (/^\s*(1|true|yes)\s*$/i.test(v)) return true;
  if (/^\s*(0|false|no)\s*$/i.test(v)) return false;
  return def;
}

export function parsePositiveInt(name: string, v: string | undefined, def: number): number {
  if (v === undefined || v.trim() === '') return def;
  const n = Number(v);
  if (!Number.isInteger(n) || n <= 0) {
    warn('CONFIG', `${name}=${v} is not a positive integer; using ${def}`);
    return def;
  }
  return n;
}

export function loadConfig(env: Env = process.env): HarnessConfig {
  return {
    timeoutMs: parsePositiveInt('VERIFY_TIMEOUT_MS', env.VERIFY_TIMEOUT_MS, DEFAULT_CONFIG.timeoutMs),
    concurrency: parsePositiveInt('VERIFY_CONCURRENCY', env.VERIFY_CONCURRENCY, DEFAULT_CONFIG.concurrency),
    failFast: parseBool(env.VERIFY_FAIL_FAST, DEFAULT_CONFIG.failFast),
    strictDeltas: parseBool(env.VERIFY_STRICT_DELTAS, DEFAULT_CONFIG.strictDeltas),
    determinism: parseBool(env.VERIFY_DETERMINISM, DEFAULT_CONFIG.determinism),
    debug: parseBool(env.VERIFY_DEBUG, DEFAULT_CONFIG.debug),
  };
}
