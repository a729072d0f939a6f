export { runMerge, EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE } from './merge.js';
export type { RunOptions } from './merge.js';
export { runExtract } from './extract.js';
export { parseMergeArgs, parseExtractArgs, mergeUsage, extractUsage } from './args.js';
export { processStreams } from './ui.js';
export type { CliStreams } from './ui.js';
