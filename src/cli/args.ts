/**
 * Command-line argument parsing for settings-merge and settings-extract
 */

import { ArgumentError } from '../base/utils/errors.js';
import {
  ExtractOptionsSchema,
  MergeOptionsSchema,
  validateConfig,
  type ExtractOptions,
  type MergeOptions,
} from '../base/config/schema.js';

/**
 * Split `--name=value` into its parts; other arguments pass through
 */
function splitInlineValue(arg: string): [string, string | undefined] {
  if (arg.startsWith('--')) {
    const eq = arg.indexOf('=');
    if (eq !== -1) {
      return [arg.slice(0, eq), arg.slice(eq + 1)];
    }
  }
  return [arg, undefined];
}

/**
 * Value of an option: inline (`--opt=value`) or the next argument
 */
function takeValue(
  name: string,
  inline: string | undefined,
  args: readonly string[],
  index: number
): { value: string; next: number } {
  if (inline !== undefined) {
    return { value: inline, next: index };
  }
  const value = args[index + 1];
  if (value === undefined || (value.startsWith('-') && value !== '-')) {
    throw new ArgumentError(`Option ${name} requires a value`);
  }
  return { value, next: index + 1 };
}

function rejectInlineValue(name: string, inline: string | undefined): void {
  if (inline !== undefined) {
    throw new ArgumentError(`Option ${name} does not take a value`);
  }
}

function validated<T>(result: { valid: boolean; data?: T; errors?: string[] }): T {
  if (!result.valid || result.data === undefined) {
    throw new ArgumentError((result.errors ?? ['Invalid arguments']).join('; '));
  }
  return result.data;
}

// ============================================================================
// settings-merge
// ============================================================================

export function parseMergeArgs(args: readonly string[]): MergeOptions {
  const raw: {
    files: string[];
    output?: string;
    indent?: string;
    compact?: boolean;
    backup?: boolean;
    help?: boolean;
  } = { files: [] };

  let optionsEnded = false;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (optionsEnded || arg === '-' || !arg.startsWith('-')) {
      raw.files.push(arg);
      continue;
    }

    const [name, inline] = splitInlineValue(arg);
    switch (name) {
      case '--':
        optionsEnded = true;
        break;
      case '-o':
      case '--output': {
        const { value, next } = takeValue(name, inline, args, i);
        raw.output = value;
        i = next;
        break;
      }
      case '--indent': {
        const { value, next } = takeValue(name, inline, args, i);
        raw.indent = value;
        i = next;
        break;
      }
      case '--compact':
        rejectInlineValue(name, inline);
        raw.compact = true;
        break;
      case '--no-backup':
      case '-f':
      case '--force':
        rejectInlineValue(name, inline);
        raw.backup = false;
        break;
      case '-h':
      case '--help':
        raw.help = true;
        break;
      default:
        throw new ArgumentError(`Unknown option: ${name}`);
    }
  }

  if (raw.indent !== undefined && !/^\d+$/.test(raw.indent)) {
    throw new ArgumentError(`Indent must be a non-negative integer, got '${raw.indent}'`);
  }

  return validated(validateConfig(MergeOptionsSchema, raw, 'arguments'));
}

export function mergeUsage(): string {
  return [
    'Usage: settings-merge [options] <file|glob>...',
    '',
    'Merge permission lists from several settings.json files. Allow and deny',
    'lists are combined in argument order without duplicates; all other',
    'settings come from the first file.',
    '',
    'Options:',
    '  -o, --output <path>   Output file path (default: print to stdout)',
    '  --indent <n>          JSON indentation spaces (default: 2)',
    '  --compact             Output compact JSON without indentation',
    '  --no-backup           Do not create a .bak backup when the output file exists',
    '  -f, --force           Alias for --no-backup',
    '  -h, --help            Show this help',
    '',
    'Examples:',
    '  settings-merge settings1.json settings2.json -o merged.json',
    "  settings-merge base.json 'gh-*.json' -o complete-settings.json",
    "  settings-merge '*.json' --output final-settings.json",
  ].join('\n');
}

// ============================================================================
// settings-extract
// ============================================================================

export function parseExtractArgs(args: readonly string[]): ExtractOptions {
  const raw: { dir?: string; prefix?: string; suffix?: string; help?: boolean } = {};

  for (let i = 0; i < args.length; i++) {
    const [name, inline] = splitInlineValue(args[i]);
    switch (name) {
      case '-d':
      case '--dir': {
        const { value, next } = takeValue(name, inline, args, i);
        raw.dir = value;
        i = next;
        break;
      }
      case '--prefix': {
        const { value, next } = takeValue(name, inline, args, i);
        raw.prefix = value;
        i = next;
        break;
      }
      case '--suffix': {
        const { value, next } = takeValue(name, inline, args, i);
        raw.suffix = value;
        i = next;
        break;
      }
      case '-h':
      case '--help':
        raw.help = true;
        break;
      default:
        throw new ArgumentError(
          name.startsWith('-') ? `Unknown option: ${name}` : `Unexpected argument: ${name}`
        );
    }
  }

  return validated(validateConfig(ExtractOptionsSchema, raw, 'arguments'));
}

export function extractUsage(): string {
  return [
    'Usage: settings-extract [options]',
    '',
    'Convert markdown catalogs (gh-*.md) into permission files (gh-*.json).',
    'Each bullet line (* or -) contributes its first `backtick` span.',
    '',
    'Options:',
    '  -d, --dir <path>      Directory to scan (default: current directory)',
    '  --prefix <prefix>     Catalog name prefix (default: gh-)',
    '  --suffix <suffix>     Catalog name suffix (default: .md)',
    '  -h, --help            Show this help',
  ].join('\n');
}
