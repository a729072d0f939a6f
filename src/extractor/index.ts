export { extractPattern, extractPatterns, toCategoryDocument } from './parser.js';
export { convertAll, convertFile, findCatalogs, outputPathFor } from './converter.js';
export type {
  ConversionFailure,
  ConversionResult,
  ConvertAllOptions,
  ConvertAllResult,
} from './converter.js';
