import { asm } from '../asm/bytesSource';
import { VerifyTest } from '../harness/verifyTest';
import { MS } from '../machine/delta';
import { S } from '../machine/state';

export const shiftSets = [
  VerifyTest('shl_rax_1').tags(['min', 'shl']).bytes(asm(['shl rax, 1']))
    .case({
      input: S(0x100).with({ RAX: 0x8000000000000001n }).aflags(0),
      delta: MS().uAF().expect('RAX', 2).expect('CF', 1).expect('OF', 1),
      expected: true,
    })
    .case({ input: S(0x100).with({ RAX: 0x8000000000000001n }).aflags(0), delta: MS(), expected: false, note: 'AF is undefined' }),

  VerifyTest('shr_eax_imm8').tags(['shr']).bytes(asm(['shr eax, 4']))
    .case({
      input: S(0x100).with({ RAX: 0xffffffff000000ffn }).aflags(0),
      delta: MS().uAF().uOF().expect('RAX', 0xf).expect('CF', 1),
      expected: true,
    }),

  VerifyTest('sar_rdx_cl').tags(['sar', 'boundary']).bytes(asm(['sar rdx, cl']))
    .case({
      input: S(0x100).with({ RDX: 0x8000000000000000n, RCX: 63 }).aflags(0),
      delta: MS().uAF().uOF().expect('RDX', 0xffffffffffffffffn).expect('CF', 0),
      expected: true,
    }),

  // Count equal to the operand width: CF is undefined as well.
  VerifyTest('shl_al_cl').tags(['shl', 'boundary']).bytes(asm(['shl al, cl']))
    .case({
      input: S(0x100).with({ RAX: 0x1234, RCX: 8 }).aflags(0),
      delta: MS().uCF().uOF().uAF().expect('RAX', 0x1200).expect('ZF', 1),
      expected: true,
    })
    .case({ input: S(0x100).with({ RAX: 0x1234, RCX: 8 }).aflags(0), delta: MS().uOF().uAF(), expected: false }),

  VerifyTest('shr_rbx_0').tags(['shr']).bytes(asm(['shr rbx, 0']))
    .case({ input: S(0x100).with({ RBX: 0xf0 }).aflags(1), expected: true }),
];
