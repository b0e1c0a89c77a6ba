#!/usr/bin/env node
import log from 'loglevel';
import { DEFAULT_LOG_LEVEL } from './const.js';
import { buildProgram } from './program.js';

log.setLevel(DEFAULT_LOG_LEVEL);

await buildProgram().parseAsync(process.argv);
