import { IntelEncoder } from './assembleX86';
import type { Encoder } from './assembleX86';

// Where a verification set's instruction bytes come from. Encoding is deferred so a
// bad line surfaces while the run is being prepared, before any provider executes.
export interface BytesSource {
  describe(): string;
  encode(): Uint8Array;
}

export function asm(lines: readonly string[], encoder: Encoder = new IntelEncoder()): BytesSource {
  const copy = [...lines];
  return {
    describe: () => copy.join('; '),
    encode: () => encoder.encode(copy),
  };
}

export function raw(bytes: ArrayLike<number>): BytesSource {
  const copy = Uint8Array.from(bytes);
  return {
    describe: () => `raw ${toHexBytes(copy)}`,
    encode: () => Uint8Array.from(copy),
  };
}

export function toHexBytes(bytes: ArrayLike<number>): string {
  const out: string[] = [];
  for (let i = 0; i < bytes.length; i++) out.push((bytes[i] & 0xff).toString(16).padStart(2, '0'));
  return out.join(' ');
}
