#!/usr/bin/env tsx
import { main } from '../src/cli/main';

main(process.argv.slice(2)).then(
  code => { process.exitCode = code; },
  (e: unknown) => {
    // eslint-disable-next-line no-console
    console.error('[VERIFY]', e);
    process.exitCode = 2;
  },
);
