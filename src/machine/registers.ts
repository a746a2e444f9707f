// Register and flag identifiers of the x86-64 subset the harness models.

// Encoding order: the index is the 4-bit register number used by ModRM/REX.
export const GPRS = [
  'RAX', 'RCX', 'RDX', 'RBX', 'RSP', 'RBP', 'RSI', 'RDI',
  'R8', 'R9', 'R10', 'R11', 'R12', 'R13', 'R14', 'R15',
] as const;

export type Gpr = typeof GPRS[number];
export type RegName = Gpr | 'RIP';

export const ARITH_FLAGS = ['CF', 'PF', 'AF', 'ZF', 'SF', 'OF'] as const;
export type FlagName = typeof ARITH_FLAGS[number];

export type Field = RegName | FlagName;

// Canonical order for reports and JSON: RIP, GPRs, then flags.
export const FIELDS: readonly Field[] = ['RIP', ...GPRS, ...ARITH_FLAGS];

export type Width = 8 | 16 | 32 | 64;

export const MASK: Record<Width, bigint> = {
  8: 0xffn,
  16: 0xffffn,
  32: 0xffffffffn,
  64: 0xffffffffffffffffn,
};

export function isFlag(f: Field): f is FlagName {
  return (ARITH_FLAGS as readonly string[]).includes(f);
}

export function fieldOrder(f: Field): number {
  return FIELDS.indexOf(f);
}

export interface SubReg {
  index: number; // 0..15
  reg: Gpr;
  width: Width;
  needsRex: boolean; // spl/bpl/sil/dil are only addressable with a REX prefix
}

const LEGACY32 = ['eax', 'ecx', 'edx', 'ebx', 'esp', 'ebp', 'esi', 'edi'];
const LEGACY16 = ['ax', 'cx', 'dx', 'bx', 'sp', 'bp', 'si', 'di'];
const LEGACY8 = ['al', 'cl', 'dl', 'bl', 'spl', 'bpl', 'sil', 'dil'];

function buildAliases(): Map<string, SubReg> {
  const out = new Map<string, SubReg>();
  GPRS.forEach((reg, index) => {
    out.set(reg.toLowerCase(), { index, reg, width: 64, needsRex: false });
    if (index < 8) {
      out.set(LEGACY32[index], { index, reg, width: 32, needsRex: false });
      out.set(LEGACY16[index], { index, reg, width: 16, needsRex: false });
      out.set(LEGACY8[index], { index, reg, width: 8, needsRex: index >= 4 });
    } else {
      const base = reg.toLowerCase();
      out.set(`${base}d`, { index, reg, width: 32, needsRex: false });
      out.set(`${base}w`, { index, reg, width: 16, needsRex: false });
      out.set(`${base}b`, { index, reg, width: 8, needsRex: false });
    }
  });
  return out;
}

const ALIASES = buildAliases();

export function resolveRegister(name: string): SubReg | undefined {
  return ALIASES.get(name.trim().toLowerCase());
}

// Name of register `index` viewed at `width` (used by the decoder for diagnostics).
export function subRegName(index: number, width: Width): string {
  for (const [name, sr] of ALIASES) {
    if (sr.index === index && sr.width === width) return name;
  }
  return `r${index}:${width}`;
}
