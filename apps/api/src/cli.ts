#!/usr/bin/env tsx
/**
 * report-merge command line
 *
 * Runs one merge (or lists a template's placeholders, or starts the HTTP
 * service) with settings layered as config file < environment < flags.
 * Exit codes: 0 success, 1 merge failure, 2 usage error.
 */

import { pathToFileURL } from 'url';
import { APP_NAME, APP_VERSION, DEFAULT_API_HOST, DEFAULT_API_PORT, isMergeError, UploadError } from '@report-merge/shared';
import type { MergeResult } from '@report-merge/shared';
import { createDependencies, formatVariableReport, inspectTemplate, loadSettings, merge } from '@report-merge/merger';
import type { LoadSettingsOptions, MergeSettings } from '@report-merge/merger';
import { startServer } from './main';
import type { ServerOptions } from './main';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const HELP_TEXT = `${APP_NAME} v${APP_VERSION}

Usage:
  report-merge [options]

Options:
  -c, --config <path>        Config file (default: ./config.json when present)
  -t, --template <path>      Template .docx
  -o, --output-dir <dir>     Output directory
      --naming <pattern>     Output file name, tokens {timestamp} {date} {time}
      --target-date <YYYYMM> Report month (default: previous month)
  -m, --minio                Read sources from object storage
      --upload / --no-upload Upload the result to object storage
      --pdf                  Also write a PDF through LibreOffice
      --no-date-folder       Write straight into the output directory
      --list-placeholders    Print the template's placeholder keys and exit
  -v, --verbose              Debug logging and a matched/missing/unused key report
  -a, --api                  Start the HTTP service instead of merging
      --host <host>          Service host (default: ${DEFAULT_API_HOST})
      --port <port>          Service port (default: ${DEFAULT_API_PORT})
  -h, --help                 Show this help`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliOptions {
  configPath?: string;
  /** Snake_case settings taken from flags. */
  overrides: Record<string, unknown>;
  listPlaceholders: boolean;
  api: boolean;
  host: string;
  port: number;
  help: boolean;
}

const VALUE_FLAGS: Record<string, string> = {
  '-t': 'template_path',
  '--template': 'template_path',
  '-o': 'output_dir',
  '--output-dir': 'output_dir',
  '--naming': 'output_naming_pattern',
  '--target-date': 'target_date',
};

const SWITCHES: Record<string, [setting: string, value: boolean]> = {
  '-m': ['use_minio', true],
  '--minio': ['use_minio', true],
  '--upload': ['upload', true],
  '--no-upload': ['upload', false],
  '--pdf': ['convert_to_pdf', true],
  '--no-date-folder': ['create_date_folder', false],
  '-v': ['verbose', true],
  '--verbose': ['verbose', true],
};

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new UsageError(`--port must be an integer between 1 and 65535, got "${raw}"`);
  }
  return port;
}

/** @throws UsageError on unknown options, missing values or positional arguments. */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    overrides: {},
    listPlaceholders: false,
    api: false,
    host: DEFAULT_API_HOST,
    port: DEFAULT_API_PORT,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const inline = eq > 0 ? arg.slice(eq + 1) : undefined;

    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new UsageError(`${flag} requires a value`);
      }
      i++;
      return next;
    };

    const setting = VALUE_FLAGS[flag];
    if (setting) {
      options.overrides[setting] = takeValue();
      continue;
    }
    const toggle = SWITCHES[flag];
    if (toggle && inline === undefined) {
      options.overrides[toggle[0]] = toggle[1];
      continue;
    }

    switch (flag) {
      case '-c':
      case '--config':
        options.configPath = takeValue();
        break;
      case '--list-placeholders':
        options.listPlaceholders = true;
        break;
      case '-a':
      case '--api':
        options.api = true;
        break;
      case '--host':
        options.host = takeValue();
        break;
      case '--port':
        options.port = parsePort(takeValue());
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new UsageError(arg.startsWith('-') ? `Unknown option ${flag}` : `Unexpected argument "${arg}"`);
    }
  }

  return options;
}

export interface CliOutput {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliDependencies {
  loadSettings: (options: LoadSettingsOptions) => Promise<MergeSettings>;
  merge: (settings: MergeSettings) => Promise<MergeResult>;
  inspectTemplate: (path: string) => Promise<string[]>;
  startServer: (options: ServerOptions) => Promise<unknown>;
}

const defaultOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const defaultDependencies: CliDependencies = {
  loadSettings,
  merge: (settings) => merge(settings, createDependencies(settings)),
  inspectTemplate: (path) => inspectTemplate(path),
  startServer,
};

function printResult(result: MergeResult, output: CliOutput, verbose: boolean): void {
  output.out(`Output file: ${result.outputFile}`);
  if (result.pdfFile) output.out(`PDF file: ${result.pdfFile}`);
  if (result.uploadUrl) output.out(`Uploaded: ${result.uploadUrl}`);
  if (result.pdfUploadUrl) output.out(`PDF uploaded: ${result.pdfUploadUrl}`);
  output.out(`Matched placeholders: ${result.matched.length}`);
  if (result.unmatched.length > 0) {
    output.out(`Unmatched placeholders: ${result.unmatched.join(', ')}`);
  }
  if (verbose) {
    output.out(
      formatVariableReport({ matched: result.matched, missing: result.unmatched, unused: result.unused ?? [] }),
    );
  }
}

function printFailure(err: unknown, output: CliOutput): void {
  if (isMergeError(err)) {
    output.err(`Error [${err.code}]: ${err.message}`);
    if (err instanceof UploadError) {
      output.err(`Local output kept at ${err.outputFile}`);
    }
    return;
  }
  output.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
}

export async function runCli(
  argv: readonly string[],
  output: CliOutput = defaultOutput,
  deps: CliDependencies = defaultDependencies,
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      output.err(`${err.message}\nRun with --help for usage.`);
      return EXIT_USAGE;
    }
    throw err;
  }

  if (options.help) {
    output.out(HELP_TEXT);
    return EXIT_OK;
  }

  try {
    if (options.api) {
      await deps.startServer({ host: options.host, port: options.port, configPath: options.configPath });
      return EXIT_OK;
    }

    const settings = await deps.loadSettings({ configPath: options.configPath, overrides: options.overrides });

    if (options.listPlaceholders) {
      const keys = await deps.inspectTemplate(settings.templatePath);
      keys.forEach((key) => output.out(key));
      return EXIT_OK;
    }

    printResult(await deps.merge(settings), output, settings.verbose);
    return EXIT_OK;
  } catch (err) {
    printFailure(err, output);
    return EXIT_FAILURE;
  }
}

const invokedDirectly = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = EXIT_FAILURE;
    });
}
