#!/usr/bin/env node
import { buildProgram } from './program';

const fail = (err: unknown) => {
  console.error(`hostglance: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
};

// EPIPE and friends arrive as events, not as throws from write().
process.stdout.on('error', fail);

buildProgram().parseAsync(process.argv).catch(fail);
