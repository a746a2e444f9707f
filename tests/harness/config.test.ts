import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_CONFIG, loadConfig, parseBool } from '../../src/harness/config';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.timeoutMs).toBe(2000);
    expect(DEFAULT_CONFIG.concurrency).toBe(4);
  });

  it('reads every variable', () => {
    expect(loadConfig({
      VERIFY_TIMEOUT_MS: '50',
      VERIFY_CONCURRENCY: '8',
      VERIFY_FAIL_FAST: 'yes',
      VERIFY_STRICT_DELTAS: '1',
      VERIFY_DETERMINISM: 'TRUE',
      VERIFY_DEBUG: '0',
    })).toEqual({ timeoutMs: 50, concurrency: 8, failFast: true, strictDeltas: true, determinism: true, debug: false });
  });

  it('falls back with a warning on invalid numbers', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(loadConfig({ VERIFY_TIMEOUT_MS: 'soon', VERIFY_CONCURRENCY: '0' })).toMatchObject({ timeoutMs: 2000, concurrency: 4 });
    expect(spy).toHaveBeenCalledWith('[CONFIG]', 'VERIFY_TIMEOUT_MS=soon is not a positive integer; using 2000');
    spy.mockRestore();
  });
});

describe('parseBool', () => {
  it('keeps the default for empty or unknown values', () => {
    expect(parseBool(undefined, true)).toBe(true);
    expect(parseBool('', false)).toBe(false);
    expect(parseBool('maybe', true)).toBe(true);
    expect(parseBool(' no ', true)).toBe(false);
  });
});
