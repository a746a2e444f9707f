import { spawn } from 'node:child_process';
import { toHexBytes } from '../asm/bytesSource';
import { dbg } from '../debug/log';
import { ExecutionError } from '../harness/errors';
import type { ExecutionErrorKind } from '../harness/errors';
import type { ExecutionProvider } from '../harness/provider';
import { State } from '../machine/state';
import { ErrorReplySchema, describeIssues } from '../machine/stateSchema';

export interface ProcessProviderOptions {
  name?: string;
  command: string;
  args?: string[];
  env?: Record<string, string | undefined>;
}

const KINDS: readonly ExecutionErrorKind[] = ['decode', 'unsupported', 'unset-input', 'timeout', 'crash', 'protocol', 'nondeterministic'];

// One JSON object per request on stdin: {"bytes":"48d3d2","state":{...}}
export function encodeRequest(bytes: Uint8Array, state: State): string {
  return JSON.stringify({ bytes: toHexBytes(bytes).replace(/ /g, ''), state: state.toJSON() });
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function errorKind(v: unknown): ExecutionErrorKind {
  const k = KINDS.find(x => x === v);
  return k ?? 'crash';
}

// A State JSON object, or {"error":{"kind":"decode","message":"..."}}.
export function decodeResponse(stdout: string, provider: string): State {
  let json: unknown;
  try {
    json = JSON.parse(stdout.trim());
  } catch (e) {
    throw new ExecutionError('protocol', `output is not JSON: ${e instanceof Error ? e.message : String(e)}`, provider);
  }
  if (isRecord(json) && 'error' in json) {
    const reply = ErrorReplySchema.safeParse(json);
    if (!reply.success) throw new ExecutionError('protocol', describeIssues(reply.error), provider);
    const { kind, message } = reply.data.error;
    throw new ExecutionError(errorKind(kind), message ?? 'unknown error', provider);
  }
  try {
    return State.fromJSON(json);
  } catch (e) {
    throw new ExecutionError('protocol', e instanceof Error ? e.message : String(e), provider);
  }
}

/**
 * Runs an external executable once per case. The child reads one request from
 * stdin and writes one response to stdout; it is killed when the call is aborted.
 */
export class ProcessProvider implements ExecutionProvider {
  readonly name: string;

  constructor(private readonly opts: ProcessProviderOptions) {
    this.name = opts.name ?? opts.command;
  }

  execute(bytes: Uint8Array, input: State, signal?: AbortSignal): Promise<State> {
    return new Promise<State>((resolve, reject) => {
      const child = spawn(this.opts.command, this.opts.args ?? [], {
        env: { ...process.env, ...this.opts.env },
        stdio: ['pipe', 'pipe', 'pipe'],
        signal,
      });
      let stdout = '';
      let stderr = '';
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => { stdout += chunk; });
      child.stderr.on('data', (chunk: string) => { stderr += chunk; });
      child.on('error', err => {
        if (err.name === 'AbortError') reject(new ExecutionError('timeout', 'aborted', this.name));
        else reject(new ExecutionError('crash', err.message, this.name));
      });
      child.on('close', (code, sig) => {
        if (stderr) dbg('PROC', `${this.name} stderr: ${stderr.trim()}`);
        if (code !== 0) {
          reject(new ExecutionError('crash', `exited with ${sig ?? `code ${code}`}`, this.name));
          return;
        }
        try {
          resolve(decodeResponse(stdout, this.name));
        } catch (e) {
          reject(e);
        }
      });
      child.stdin.on('error', err => dbg('PROC', `${this.name} stdin: ${err.message}`));
      child.stdin.end(`${encodeRequest(bytes, input)}\n`);
    });
  }
}
