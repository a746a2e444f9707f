import { describe, it, expect } from 'vitest';
import { MS, describeDesignation } from '../../src/machine/delta';
import { Tri } from '../../src/machine/triState';

describe('MachineStateDelta', () => {
  it('starts empty', () => {
    const d = MS();
    expect(d.isEmpty).toBe(true);
    expect(d.fields()).toEqual([]);
    expect(d.designation('OF')).toBeUndefined();
    expect(d.toString()).toBe('MS()');
  });

  it('records designations per field in canonical order', () => {
    const d = MS().uOF().expect('CF', 1).expect('RAX', 3).ignore('PF');
    expect(d.fields()).toEqual(['RAX', 'CF', 'PF', 'OF']);
    expect(d.designation('RAX')).toEqual({ kind: 'value', value: 3n });
    expect(d.designation('CF')).toEqual({ kind: 'value', value: Tri.One });
    expect(d.toString()).toBe('MS(RAX = 0x3, CF = 1, PF unchecked, OF undefined)');
  });

  it('shorthands mark single flags undefined', () => {
    const d = MS().uCF().uPF().uAF().uZF().uSF().uOF();
    expect(d.fields()).toEqual(['CF', 'PF', 'AF', 'ZF', 'SF', 'OF']);
    expect(d.fields().every(f => d.designation(f)?.kind === 'undefined')).toBe(true);
  });

  it('is immutable', () => {
    const base = MS().expect('RAX', 1);
    const next = base.uOF();
    expect(base.designation('OF')).toBeUndefined();
    expect(next.designation('OF')).toEqual({ kind: 'undefined' });
  });

  it('last write wins and weakening is recorded', () => {
    const d = MS().expect('OF', 1).uOF();
    expect(d.designation('OF')).toEqual({ kind: 'undefined' });
    expect(d.warnings).toEqual([{ field: 'OF', from: { kind: 'value', value: Tri.One }, to: { kind: 'undefined' } }]);
  });

  it('does not warn when strengthening or when overridden', () => {
    expect(MS().uOF().expect('OF', 0).warnings).toEqual([]);
    expect(MS().expect('RAX', 1).ignore('RAX', { override: true }).warnings).toEqual([]);
    expect(MS().uCF().ignore('CF').warnings).toHaveLength(1);
  });

  it('records register expectations that could not be stored exactly', () => {
    const d = MS().expect('RAX', 1.5).uOF();
    expect(d.designation('RAX')).toEqual({ kind: 'value', value: 1n });
    expect(d.coercions).toEqual([{ field: 'RAX', given: 1.5, stored: 1n, reason: 'fraction' }]);
    expect(MS().expect('RAX', 1n).expect('CF', 1).coercions).toEqual([]);
  });

  it('masks register expectations to 64 bits', () => {
    expect(MS().expect('RDX', -1).designation('RDX')).toEqual({ kind: 'value', value: 0xffffffffffffffffn });
  });

  it('describes missing designations as agree', () => {
    expect(describeDesignation('ZF', undefined)).toBe('agree');
    expect(describeDesignation('RAX', { kind: 'value', value: 16n })).toBe('= 0x10');
  });
});
