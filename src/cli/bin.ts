#!/usr/bin/env node
import { run } from './index.js';

run(process.argv).then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);
