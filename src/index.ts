#!/usr/bin/env node
import 'dotenv/config';
import { buildCli } from './cli/commands.js';
import { reportFatal } from './cli/fatal.js';

const program = buildCli();
program.parseAsync(process.argv).catch((err: unknown) => {
  process.exitCode = reportFatal(err, process.stderr);
});
