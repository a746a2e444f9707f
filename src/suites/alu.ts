import { asm } from '../asm/bytesSource';
import { VerifyTest } from '../harness/verifyTest';
import { MS } from '../machine/delta';
import { S } from '../machine/state';

export const aluSets = [
  VerifyTest('add_rax_rbx').tags(['min', 'add']).bytes(asm(['add rax, rbx']))
    .case({ input: S(0x100).with({ RAX: 1, RBX: 2 }).aflags(0), delta: MS().expect('RAX', 3), expected: true })
    .case({ input: S(0x100).with({ RAX: 1, RBX: 2 }).aflags(0), delta: MS().expect('RAX', 4), expected: false })
    .case({ input: S(0x100).with({ RAX: 1 }).aflags(0), expected: false, note: 'RBX is never set' }),

  VerifyTest('adc_eax_imm32').tags(['adc']).bytes(asm(['adc eax, 0x7fffffff']))
    .case({ input: S(0x100).with({ RAX: 1 }).aflags(1), delta: MS().expect('RAX', 0x80000001).expect('OF', 1), expected: true }),

  VerifyTest('sub_rcx_rcx').tags(['sub']).bytes(asm(['sub rcx, rcx']))
    .case({ input: S(0x100).with({ RCX: 5 }).aflags(1), delta: MS().expect('RCX', 0).expect('ZF', 1).expect('CF', 0), expected: true }),

  VerifyTest('sbb_dl_imm8').tags(['sbb']).bytes(asm(['sbb dl, 1']))
    .case({ input: S(0x100).with({ RDX: 0 }).aflags(1), delta: MS().expect('RDX', 0xfe).expect('CF', 1), expected: true }),

  VerifyTest('xor_rax_rax').tags(['min', 'xor']).bytes(asm(['xor rax, rax']))
    .case({ input: S(0x100).with({ RAX: 0x55 }).aflags(1), delta: MS().uAF().expect('RAX', 0), expected: true })
    .case({ input: S(0x100).with({ RAX: 0x55 }).aflags(1), delta: MS(), expected: false }),

  VerifyTest('and_r9d_imm32').tags(['and']).bytes(asm(['and r9d, 0xff']))
    .case({ input: S(0x100).with({ R9: 0xffffffffffff1234n }).aflags(0), delta: MS().uAF().expect('R9', 0x34), expected: true }),

  VerifyTest('cmp_rsi_rdi').tags(['cmp']).bytes(asm(['cmp rsi, rdi']))
    .case({ input: S(0x100).with({ RSI: 1, RDI: 2 }).aflags(0), delta: MS().expect('CF', 1), expected: true }),

  VerifyTest('test_sil_sil').tags(['test']).bytes(asm(['test sil, sil']))
    .case({ input: S(0x100).with({ RSI: 0 }).aflags(0), delta: MS().uAF().expect('ZF', 1), expected: true }),

  VerifyTest('inc_r15').tags(['inc']).bytes(asm(['inc r15']))
    .case({
      input: S(0x100).with({ R15: 0xffffffffffffffffn }).aflags(1),
      delta: MS().expect('R15', 0).expect('ZF', 1).expect('CF', 1),
      expected: true,
    }),

  VerifyTest('not_r8w').tags(['not']).bytes(asm(['not r8w']))
    .case({ input: S(0x100).with({ R8: 0xff }).aflags(0), delta: MS().expect('R8', 0xff00), expected: true }),

  VerifyTest('mov_imm').tags(['mov']).bytes(asm(['mov eax, -1', 'mov rbx, 0x123456789abcdef0']))
    .case({
      input: S(0x100).with({ RAX: 0xffffffffffffffffn, RBX: 0 }),
      delta: MS().expect('RAX', 0xffffffff).expect('RBX', 0x123456789abcdef0n),
      expected: true,
    }),

  VerifyTest('nop').tags(['min', 'nop']).bytes(asm(['nop']))
    .case({ input: S(0x100), delta: MS().expect('RIP', 0x101), expected: true }),
];
