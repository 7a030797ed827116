import { createRequire } from 'node:module';
import { parseArgs } from 'node:util';
import { readConfigFile } from './config-reader/reader.js';
import { DEFAULT_NAME_FIELD, DEFAULT_POLICY_SECTIONS, scanConfig } from './config-reader/parser.js';
import { isOutputFormat, renderRules } from './renderer/render.js';
import { OUTPUT_FORMATS, type OutputFormat } from './renderer/types.js';
import { writeOutputFile } from './output/writer.js';
import {
  printError,
  printHeader,
  printHint,
  printNoRulesFound,
  printOutputWritten,
  printScanSummary,
  printSkippedRules,
  printStrictFailure,
  printVerbose,
} from './utils/logger.js';
import { brand, color } from './ui/theme.js';

const require = createRequire(import.meta.url);
const { version: VERSION } = require('../package.json') as { version: string };

export const TOOL_NAME = 'fwrule-extract';

export interface CliOptions {
  configFile: string;
  format: OutputFormat;
  output: string | undefined;
  sections: string[] | undefined;
  nameField: string | undefined;
  strict: boolean;
  verbose: boolean;
}

export type ParsedCLI =
  | { command: 'help' }
  | { command: 'version' }
  | { command: 'extract'; options: CliOptions }
  | { command: 'invalid'; error: string };

export interface CliIO {
  stdout: (text: string) => void;
}

const defaultIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export function printHelp(): void {
  console.log(`
${brand(TOOL_NAME)} <config-file> [options]

Extract firewall rule ids and names from a FortiGate configuration export.

${color.bold('Options:')}
  -f, --format <fmt>    Output format: ${OUTPUT_FORMATS.join(', ')} (default: detailed)
  -o, --output <path>   Write output to a file (default: stdout)
  --section <name>      Policy section to read, repeatable (default: "${DEFAULT_POLICY_SECTIONS.join('", "')}")
  --name-field <attr>   Attribute holding the rule name (default: ${DEFAULT_NAME_FIELD})
  --strict              Fail on rules with a malformed identifier instead of skipping them
  --verbose             Show parse details on stderr
  -h, --help            Show this help
  -V, --version         Show version
`.trimEnd());
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      format: { type: 'string', short: 'f' },
      output: { type: 'string', short: 'o' },
      section: { type: 'string', multiple: true },
      'name-field': { type: 'string' },
      strict: { type: 'boolean', default: false },
      verbose: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'V', default: false },
    },
    strict: true,
    allowPositionals: true,
  });
}

export function parseCLIArgs(argv: string[]): ParsedCLI {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (err: unknown) {
    return { command: 'invalid', error: err instanceof Error ? err.message : String(err) };
  }

  const { values, positionals } = parsed;

  if (values.help) return { command: 'help' };
  if (values.version) return { command: 'version' };

  if (positionals.length === 0) {
    return { command: 'invalid', error: 'Missing configuration file argument' };
  }
  if (positionals.length > 1) {
    return { command: 'invalid', error: `Unexpected argument: ${positionals[1]}` };
  }

  const format = values.format ?? 'detailed';
  if (!isOutputFormat(format)) {
    return {
      command: 'invalid',
      error: `Unknown format: ${format} (expected one of ${OUTPUT_FORMATS.join(', ')})`,
    };
  }

  const nameField = values['name-field'];
  if (nameField !== undefined && !/^\S+$/.test(nameField)) {
    return { command: 'invalid', error: `Invalid --name-field: "${nameField}"` };
  }

  return {
    command: 'extract',
    options: {
      configFile: positionals[0],
      format,
      output: values.output,
      sections: values.section,
      nameField,
      strict: Boolean(values.strict),
      verbose: Boolean(values.verbose),
    },
  };
}

/**
 * Run the CLI and resolve with the process exit code.
 */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const cli = parseCLIArgs(argv);

  switch (cli.command) {
    case 'help':
      printHelp();
      return EXIT_OK;
    case 'version':
      console.log(VERSION);
      return EXIT_OK;
    case 'invalid':
      printError(cli.error);
      printHint(`Run ${TOOL_NAME} --help for usage.`);
      return EXIT_FAILURE;
    case 'extract':
      return runExtract(cli.options, io);
  }
}

async function runExtract(opts: CliOptions, io: CliIO): Promise<number> {
  if (opts.verbose) {
    printHeader(opts.configFile, opts.format);
  }

  const input = await readConfigFile(opts.configFile);
  if (!input.success) {
    printError(input.error);
    return EXIT_FAILURE;
  }

  const scan = scanConfig(input.content, {
    sections: opts.sections,
    nameField: opts.nameField,
  });

  if (opts.verbose) {
    printScanSummary(scan, input.sizeBytes);
  }

  if (opts.strict && scan.skipped.length > 0) {
    printStrictFailure(scan.skipped);
    return EXIT_FAILURE;
  }

  printSkippedRules(scan.skipped);

  if (scan.rules.length === 0) {
    printNoRulesFound();
  }

  const rendered = renderRules(scan.rules, opts.format);

  if (!opts.output) {
    io.stdout(rendered);
    return EXIT_OK;
  }

  const written = await writeOutputFile(opts.output, rendered);
  if (!written.success) {
    printError(written.error ?? `Cannot write ${opts.output}`);
    return EXIT_FAILURE;
  }

  if (opts.verbose) {
    printVerbose(`Wrote ${rendered.length} characters`);
  }
  printOutputWritten(opts.output);
  return EXIT_OK;
}
