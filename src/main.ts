#!/usr/bin/env -S npx tsx
import { config } from 'dotenv';
import { runCli } from './cli.ts';

config();

runCli(process.argv.slice(2), {
  stdout: line => console.log(line),
  stderr: line => console.error(line),
  cwd: process.cwd(),
  env: process.env,
})
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    console.error('Extraction failed:', err);
    process.exitCode = 1;
  });
