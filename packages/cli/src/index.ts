#!/usr/bin/env -S node --import tsx
// packages/cli/src/index.ts
import { toError } from '@cmsync/utils';

import { buildProgram } from './program.js';

// --- MUST await parseAsync or Node may exit before Commander prints/help runs ---
(async () => {
  await buildProgram().parseAsync(process.argv);
})().catch((err: unknown) => {
  console.error(`[cmsync] error: ${toError(err).message}`);
  process.exitCode = 1;
});
