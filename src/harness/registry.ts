import type { VerificationSet } from './verifyTest';

export interface Selection {
  include?: readonly string[]; // keep sets carrying any of these tags
  exclude?: readonly string[]; // drop sets carrying any of these tags
  name?: RegExp;
}

export class SuiteRegistry {
  private readonly sets = new Map<string, VerificationSet>();

  register(...sets: VerificationSet[]): this {
    for (const s of sets) {
      if (this.sets.has(s.name)) throw new Error(`duplicate verification set '${s.name}'`);
      this.sets.set(s.name, s);
    }
    return this;
  }

  all(): VerificationSet[] {
    return [...this.sets.values()];
  }

  select(sel: Selection = {}): VerificationSet[] {
    return selectSets(this.all(), sel);
  }
}

export function selectSets(sets: readonly VerificationSet[], sel: Selection): VerificationSet[] {
  const include = sel.include ?? [];
  const exclude = sel.exclude ?? [];
  return sets.filter(s => {
    if (include.length > 0 && !include.some(t => s.hasTag(t))) return false;
    if (exclude.some(t => s.hasTag(t))) return false;
    if (sel.name && !sel.name.test(s.name)) return false;
    return true;
  });
}
