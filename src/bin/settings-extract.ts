#!/usr/bin/env node
import { runExtract } from '../cli/extract.js';

runExtract(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
