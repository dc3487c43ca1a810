// engine/cli.ts — Command-line surface for structscore

import { analyzeFile, formatReport, InvalidPathError, ParseError } from './index.js';
import { resolveConfig } from './config.js';
import type { ConfigOverrides } from './config.js';

export const USAGE = `
structscore — Structural quality scores for a single Python file

Usage:
  structscore <command> [options]

Commands:
  analyze   Score one file and print the eleven metrics

Options:
  -i, --input-path <path>   File to analyze (required)
  --format <json|markdown>  Output format (default: json)
  --total                   Also print the unweighted mean of all metrics
  --help                    Show this help message

Examples:
  structscore analyze -i app/models.py
  structscore analyze --input-path app/models.py --format markdown --total
`.trim();

/** Exit codes: 0 success, 1 parse failure, 2 usage or input-path error. */
export const EXIT_OK = 0;
export const EXIT_PARSE_FAILURE = 1;
export const EXIT_USAGE = 2;

interface ParsedArgs {
  command: string | undefined;
  inputPath: string | undefined;
  overrides: ConfigOverrides;
  help: boolean;
  errors: string[];
}

export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    command: undefined,
    inputPath: undefined,
    overrides: {},
    help: false,
    errors: [],
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '--help':
      case '-h':
        parsed.help = true;
        continue;

      case '-i':
      case '--input-path':
      case '--format': {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith('-')) {
          parsed.errors.push(`Option '${arg}' requires a value.`);
          continue;
        }
        i++; // skip next arg
        if (arg === '--format') {
          if (value === 'json' || value === 'markdown') {
            parsed.overrides.report = { ...parsed.overrides.report, format: value };
          } else {
            parsed.errors.push(`Invalid value for '--format': '${value}' (expected json or markdown).`);
          }
        } else {
          parsed.inputPath = value;
        }
        continue;
      }

      case '--total':
        parsed.overrides.report = { ...parsed.overrides.report, includeTotal: true };
        continue;

      default:
        break;
    }

    if (arg.startsWith('-')) {
      parsed.errors.push(`No such option: ${arg}`);
      continue;
    }

    // First positional argument is the command
    if (!parsed.command) {
      parsed.command = arg;
    } else {
      parsed.errors.push(`Unexpected argument: ${arg}`);
    }
  }

  return parsed;
}

/**
 * Run the CLI against an argument vector (without the node/script prefix) and
 * return the process exit code. Reports go to stdout, diagnostics to stderr.
 */
export function runCli(argv: string[]): number {
  const args = parseArgs(argv);

  if (args.help || argv.length === 0) {
    console.log(USAGE);
    return EXIT_OK;
  }

  if (args.errors.length > 0) {
    for (const error of args.errors) console.error(`Error: ${error}`);
    return EXIT_USAGE;
  }

  switch (args.command) {
    case 'analyze': {
      if (!args.inputPath) {
        console.error("Error: Missing option '-i' / '--input-path'.");
        return EXIT_USAGE;
      }

      const config = resolveConfig(args.overrides);

      try {
        const result = analyzeFile(args.inputPath, { language: config.language });
        console.log(formatReport(result, config.report));
        return EXIT_OK;
      } catch (err) {
        if (err instanceof InvalidPathError) {
          console.error(`Error: ${err.message}`);
          return EXIT_USAGE;
        }
        if (err instanceof ParseError) {
          console.error(`Error: ${err.message}`);
          return EXIT_PARSE_FAILURE;
        }
        throw err;
      }
    }

    default:
      console.error(`Unknown command: ${args.command ?? ''}`);
      console.error('');
      console.log(USAGE);
      return EXIT_USAGE;
  }
}
