#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import { runVerifyCli } from '../lib/verify/cli';

runVerifyCli(hideBin(process.argv)).then(code => {
  process.exitCode = code;
});
