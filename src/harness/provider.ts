import type { State } from '../machine/state';
import { ExecutionError } from './errors';

/**
 * Something that can execute instruction bytes from an initial state: the
 * reference (ground truth) or the subject (implementation under test).
 *
 * Must be deterministic for equal inputs. A provider that cannot produce a
 * result throws `ExecutionError`; anything else it throws is treated as a crash.
 */
export interface ExecutionProvider {
  readonly name: string;
  execute(bytes: Uint8Array, input: State, signal?: AbortSignal): State | Promise<State>;
}

export type Outcome =
  | { ok: true; state: State; elapsedMs: number }
  | { ok: false; error: ExecutionError; elapsedMs: number };

export interface InvokeOptions {
  timeoutMs: number;
  signal?: AbortSignal; // run-level cancellation
}

function asExecutionError(e: unknown, provider: string): ExecutionError {
  if (e instanceof ExecutionError) return e.provider === provider ? e : e.withProvider(provider);
  const message = e instanceof Error ? e.message : String(e);
  return new ExecutionError('crash', message, provider);
}

// Races one provider call against its wall-clock budget. A synchronous provider
// cannot be interrupted mid-call; its result is discarded once the budget expires.
export async function invokeProvider(
  provider: ExecutionProvider,
  bytes: Uint8Array,
  input: State,
  opts: InvokeOptions,
): Promise<Outcome> {
  const started = performance.now();
  const elapsed = () => performance.now() - started;
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  opts.signal?.addEventListener('abort', onAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ExecutionError('timeout', `no result within ${opts.timeoutMs} ms`, provider.name));
      controller.abort();
    }, opts.timeoutMs);
  });

  try {
    const call = Promise.resolve().then(() => provider.execute(Uint8Array.from(bytes), input, controller.signal));
    const state = await Promise.race([call, timeout]);
    return { ok: true, state, elapsedMs: elapsed() };
  } catch (e) {
    return { ok: false, error: asExecutionError(e, provider.name), elapsedMs: elapsed() };
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener('abort', onAbort);
  }
}
