// Flag values. Undefined models an architecturally unspecified outcome and is never coerced to 0/1.
export enum Tri {
  Zero = 0,
  One = 1,
  Undefined = 2,
}

export type TriInput = Tri | 0 | 1 | boolean;

export function toTri(v: TriInput): Tri {
  if (v === true) return Tri.One;
  if (v === false) return Tri.Zero;
  return v;
}

export function triToString(v: Tri): string {
  return v === Tri.Undefined ? 'U' : String(v);
}
