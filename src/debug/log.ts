// Console logging with debug output gated by VERIFY_DEBUG=1.

function envFlag(name: string): boolean {
  const v = process.env[name];
  return v !== undefined && /^\s*(1|true|yes)\s*$/i.test(v);
}

let debugOverride: boolean | undefined;

export function setDebug(enabled: boolean | undefined): void {
  debugOverride = enabled;
}

export function debugEnabled(): boolean {
  return debugOverride ?? envFlag('VERIFY_DEBUG');
}

export function dbg(tag: string, ...args: unknown[]): void {
  if (!debugEnabled()) return;
  // eslint-disable-next-line no-console
  console.log(`[${tag}]`, ...args);
}

export function warn(tag: string, ...args: unknown[]): void {
  // eslint-disable-next-line no-console
  console.warn(`[${tag}]`, ...args);
}

export function error(tag: string, ...args: unknown[]): void {
  // eslint-disable-next-line no-console
  console.error(`[${tag}]`, ...args);
}
