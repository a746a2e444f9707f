import { asm } from '../asm/bytesSource';
import { VerifyTest } from '../harness/verifyTest';
import { MS } from '../machine/delta';
import { S } from '../machine/state';

export const rotateSets = [
  VerifyTest('rol_rax_1').tags(['min', 'rol']).bytes(asm(['rol rax, 1']))
    .case({
      input: S(0x100).with({ RAX: 0x8000000000000000n }).aflags(0),
      delta: MS().expect('RAX', 1).expect('CF', 1).expect('OF', 1),
      expected: true,
    }),

  VerifyTest('ror_ecx_imm8').tags(['ror']).bytes(asm(['ror ecx, 8']))
    .case({ input: S(0x100).with({ RCX: 0x12345678 }).aflags(0), delta: MS().uOF().expect('RCX', 0x78123456), expected: true })
    .case({ input: S(0x100).with({ RCX: 0x12345678 }).aflags(0), delta: MS(), expected: false }),

  // Masked count 9 rotates an 8-bit operand by one, but OF stays undefined.
  VerifyTest('rol_bl_9').tags(['rol', 'boundary']).bytes(asm(['rol bl, 9']))
    .case({ input: S(0x100).with({ RBX: 0x81 }).aflags(0), delta: MS().uOF().expect('RBX', 0x03).expect('CF', 1), expected: true }),

  VerifyTest('rcr_rdx_1').tags(['min', 'rcr']).bytes(asm(['rcr rdx, 1']))
    .case({
      input: S(0x100).with({ RDX: 1 }).aflags(1),
      delta: MS().expect('RDX', 0x8000000000000000n).expect('CF', 1).expect('OF', 1),
      expected: true,
    }),

  VerifyTest('rcr_ebx_cl').tags(['rcr']).bytes(asm(['rcr ebx, cl']))
    .case({ input: S(0x100).with({ RBX: 0xffffffff00000010n, RCX: 4 }).aflags(0), delta: MS().uOF().expect('RBX', 1), expected: true })
    .case({ input: S(0x100).with({ RBX: 0xffffffff00000010n, RCX: 4 }).aflags(0), delta: MS(), expected: false }),
];
