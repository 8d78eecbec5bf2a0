#!/usr/bin/env node
import log from 'loglevel';
import { describeCause } from '../strength/index.js';
import { buildProgram } from './program.js';

log.setLevel('info');

buildProgram()
  .parseAsync(process.argv)
  .catch((e: unknown) => {
    log.error('Error:', describeCause(e));
    process.exitCode = 1;
  });
