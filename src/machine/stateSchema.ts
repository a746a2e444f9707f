import { z } from 'zod';
import type { Field } from './registers';
import { Tri } from './triState';

const U64_MAX = 0xffffffffffffffffn;

const HexOrDecimal = z
  .string()
  .regex(/^(0x[0-9a-f]+|\d+)$/i, 'must be a decimal or 0x-prefixed hex string')
  .transform(s => BigInt(s))
  .pipe(z.bigint().max(U64_MAX, 'does not fit in 64 bits'));

// Larger values lose precision as JSON numbers and must be sent as strings.
const SafeInteger = z
  .number()
  .int('must be an integer')
  .nonnegative('must not be negative')
  .max(Number.MAX_SAFE_INTEGER, 'must be sent as a string above 2^53')
  .transform(n => BigInt(n));

const RegWire = z.union([HexOrDecimal, SafeInteger], {
  errorMap: () => ({ message: 'must be an integer or hex string' }),
});

const FlagWire = z
  .union([z.literal(0), z.literal(1), z.literal('U')], {
    errorMap: () => ({ message: 'must be 0, 1 or "U"' }),
  })
  .transform(v => (v === 'U' ? Tri.Undefined : v === 1 ? Tri.One : Tri.Zero));

const shape = {
  RIP: RegWire.optional(),
  RAX: RegWire.optional(),
  RCX: RegWire.optional(),
  RDX: RegWire.optional(),
  RBX: RegWire.optional(),
  RSP: RegWire.optional(),
  RBP: RegWire.optional(),
  RSI: RegWire.optional(),
  RDI: RegWire.optional(),
  R8: RegWire.optional(),
  R9: RegWire.optional(),
  R10: RegWire.optional(),
  R11: RegWire.optional(),
  R12: RegWire.optional(),
  R13: RegWire.optional(),
  R14: RegWire.optional(),
  R15: RegWire.optional(),
  CF: FlagWire.optional(),
  PF: FlagWire.optional(),
  AF: FlagWire.optional(),
  ZF: FlagWire.optional(),
  SF: FlagWire.optional(),
  OF: FlagWire.optional(),
} satisfies Record<Field, z.ZodTypeAny>;

// Wire form of a State: registers as strings or safe integers, flags as 0 | 1 | "U".
export const StateWireSchema = z
  .object(shape, { invalid_type_error: 'state must be a JSON object' })
  .strict('unknown field')
  .refine(s => s.RIP !== undefined, { message: 'missing', path: ['RIP'] });

// {"error":{"kind":"decode","message":"..."}} from an external provider.
export const ErrorReplySchema = z.object({
  error: z.object(
    { kind: z.string(), message: z.string().optional() },
    { invalid_type_error: 'malformed error object' },
  ),
});

export function describeIssues(err: z.ZodError): string {
  return err.issues
    .map(i => {
      const where = i.code === 'unrecognized_keys' ? i.keys.join(', ') : i.path.join('.');
      return where ? `${where}: ${i.message}` : i.message;
    })
    .join('; ');
}
