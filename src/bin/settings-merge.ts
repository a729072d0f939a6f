#!/usr/bin/env node
import { runMerge } from '../cli/merge.js';

runMerge(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
