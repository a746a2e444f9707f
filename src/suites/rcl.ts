import { asm } from '../asm/bytesSource';
import { VerifyTest } from '../harness/verifyTest';
import { MS } from '../machine/delta';
import { S } from '../machine/state';

const RDX_MAX = 0x7fffffffffffffffn;

export const rclSets = [
  VerifyTest('rcl_rax').tags(['min', 'rcl']).bytes(asm(['rcl rax']))
    .case({ input: S(0x100).with({ RAX: 0b101 }).aflags(0), expected: true })
    .case({ input: S(0x100).with({ RAX: 0b1010 }).aflags(0), expected: true })
    .case({
      input: S(0x100).with({ RAX: 0b101 }).aflags(0),
      delta: MS().expect('RAX', 0b1010).expect('CF', 0).expect('OF', 0),
      expected: true,
    }),

  // OF is only defined for a count of one, so these cases mark it undefined on purpose
  // where a plain MS() would demand agreement on a value the reference leaves undefined.
  VerifyTest('rcl_rbx_imm8').tags(['min', 'rcl']).bytes(asm(['rcl rbx, 0x5']))
    .case({ input: S(0x100).with({ RBX: 0b1011111 }).aflags(0), delta: MS().uOF(), expected: true })
    .case({ input: S(0x100).with({ RBX: 0b1000000 }).aflags(0), delta: MS().uOF(), expected: true }),

  VerifyTest('rcl_rbx_0').tags(['rcl']).bytes(asm(['rcl rbx, 0']))
    .case({ input: S(0x100).with({ RBX: 0b101 }).aflags(0), expected: true })
    .case({ input: S(0x100).with({ RBX: 0b101 }).aflags(1), expected: true }),

  VerifyTest('rcl_rdx_cl').tags(['rcl', 'min']).bytes(asm(['rcl rdx, cl']))
    .case({ input: S(0x100).with({ RDX: RDX_MAX, RCX: 63 }).aflags(0), delta: MS(), expected: false })
    .case({ input: S(0x100).with({ RDX: RDX_MAX, RCX: 63 }).aflags(0), delta: MS().uOF(), expected: true })
    .case({ input: S(0x100).with({ RDX: RDX_MAX, RCX: 63 }).aflags(1), delta: MS().uOF(), expected: true })
    .case({
      input: S(0x100).with({ RDX: RDX_MAX, RCX: 63 }).aflags(0),
      delta: MS().expect('OF', 0),
      expected: false,
      note: 'OF is not defined for a count of 63',
    })
    .disputed({
      input: S(0x100).with({ RDX: RDX_MAX, RCX: 65 }).aflags(1),
      delta: MS().uOF(),
      expected: false,
      reason: '65 & 63 is 1, so OF may well be defined here',
    })
    .case({ input: S(0x100).with({ RDX: RDX_MAX, RCX: 65 }).aflags(1), delta: MS(), expected: true })
    .case({ input: S(0x100).with({ RDX: RDX_MAX, RCX: 1 }).aflags(0), delta: MS(), expected: true })
    .case({ input: S(0x100).with({ RDX: RDX_MAX, RCX: 1 }).aflags(1), delta: MS(), expected: true }),

  // 8-bit rotate through carry works modulo 9.
  VerifyTest('rcl_al_cl').tags(['rcl', 'boundary']).bytes(asm(['rcl al, cl']))
    .case({ input: S(0x100).with({ RAX: 0x1281, RCX: 9 }).aflags(1), delta: MS().uOF(), expected: true })
    .case({ input: S(0x100).with({ RAX: 0x1281, RCX: 9 }).aflags(1), delta: MS().expect('RAX', 0x1281), expected: false }),
];
