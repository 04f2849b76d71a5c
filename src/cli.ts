import { writeFile } from 'node:fs/promises';
import { basename, extname, resolve } from 'node:path';
import { loadConfigFromEnv } from './lib/config.ts';
import { AppError, ValidationError } from './lib/errors.ts';
import { extractDoorsFromSource, silentLogger, type ExtractionLogger } from './lib/extraction.ts';
import { formatForPath, serializeRecords } from './lib/output.ts';
import { REPORT_RULE, formatReport } from './lib/report.ts';
import { createExtractSource, readTableExtract } from './lib/tableSource.ts';

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

const HELP_FLAGS = new Set(['-h', '--help', 'help']);
const QUIET_FLAGS = new Set(['-q', '--quiet']);

export const USAGE_LINE = 'Usage: door-schedule <input_json> [output]';

export function helpText(): string[] {
  return [
    REPORT_RULE,
    'Door Schedule Extractor - Command Line Tool',
    REPORT_RULE,
    '',
    'Usage:',
    '  door-schedule <input_json> [output] [--quiet]',
    '',
    'Arguments:',
    '  input_json   : Table extract (JSON pages of tables) to read (required)',
    '  output       : Output file (optional). A .csv path is written as CSV,',
    '                 anything else as JSON.',
    '                 Default: <input_filename>_door_schedule.json',
    '',
    'Options:',
    '  -q, --quiet  : Suppress the per-page trace',
    '  -h, --help   : Show this help',
    '',
    'Environment:',
    '  DOOR_SCHEDULE_EXTRA_MARKERS : Extra comma-separated title-block markers to reject',
    '  DOOR_SCHEDULE_LOOKAHEAD     : Columns searched for a split dimension (default 2)',
    '',
    REPORT_RULE,
  ];
}

export function defaultOutputPath(inputPath: string): string {
  return `${basename(inputPath, extname(inputPath))}_door_schedule.json`;
}

function reportError(err: AppError, io: CliIo): void {
  io.stderr(`Error: ${err.message}`);
  if (err instanceof ValidationError) {
    for (const detail of err.details ?? []) {
      io.stderr(detail.field ? `  ${detail.field}: ${detail.message}` : `  ${detail.message}`);
    }
  }
}

/** Run the extractor for the given arguments and return the exit code. */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  if (argv.length > 0 && HELP_FLAGS.has(argv[0])) {
    helpText().forEach(line => io.stdout(line));
    return 0;
  }

  const quiet = argv.some(arg => QUIET_FLAGS.has(arg));
  const [inputArg, outputArg] = argv.filter(arg => !QUIET_FLAGS.has(arg));

  if (!inputArg) {
    io.stderr('Error: Input file path is required!');
    io.stderr('');
    io.stderr(USAGE_LINE);
    io.stderr('Use -h or --help for more information');
    return 1;
  }

  const outputPath = outputArg ?? defaultOutputPath(inputArg);

  try {
    const config = loadConfigFromEnv(io.env);
    const extract = await readTableExtract(resolve(io.cwd, inputArg));

    const logger: ExtractionLogger = quiet
      ? silentLogger
      : { info: io.stdout, warn: io.stderr, error: io.stderr };

    io.stdout(`Processing: ${inputArg}`);
    io.stdout(REPORT_RULE);
    io.stdout(`Total pages: ${extract.pages.length}`);
    io.stdout('');

    const records = await extractDoorsFromSource(createExtractSource(extract), { config, logger });

    await writeFile(
      resolve(io.cwd, outputPath),
      serializeRecords(records, formatForPath(outputPath)),
      'utf-8',
    );

    formatReport(records, outputPath).forEach(line => io.stdout(line));
    return 0;
  } catch (err) {
    if (err instanceof AppError) {
      reportError(err, io);
      return 1;
    }
    throw err;
  }
}
