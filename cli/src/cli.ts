#!/usr/bin/env node

import { ConfigValidationError } from '@telemetry-guard/configuration';
import { toError } from '@telemetry-guard/errors';

import { createProgram } from './program.js';

const program = createProgram();

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof ConfigValidationError) {
    console.error(`💥 ${error.message}`);
    for (const line of error.getFormattedErrors()) {
      console.error(`   ${line}`);
    }
  } else {
    console.error('💥 Command failed:', toError(error).message);
  }
  process.exitCode = 1;
});
