#!/usr/bin/env node
import { parseArgs } from 'util';
import { logger, initializeLogger } from './utils/logging.js';
import { getErrorMessage } from './utils/errorHandling.js';
import { ApplicationError, ConfigurationError } from './errors/index.js';
import { ConfigManager } from './config/ConfigManager.js';
import { MetadataService, toJson } from './services/metadataService.js';
import { MetadataSource, crawlDirectory } from './services/directoryScanService.js';

export const USAGE = 'Usage: metadump --path <dir> [--verbose] [--indent <n>]';

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_PARTIAL = 2;

export interface CliOutput {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliOptions {
  output?: CliOutput;
  /** Defaults to the service built from the validated environment configuration */
  service?: MetadataSource;
}

const processOutput: CliOutput = {
  stdout: text => process.stdout.write(`${text}\n`),
  stderr: text => process.stderr.write(`${text}\n`),
};

interface ParsedArgs {
  root: string;
  verbose: boolean;
  indent: number;
}

function parseCliArgs(argv: string[]): ParsedArgs | string {
  let values: { path?: string; verbose?: boolean; indent?: string; help?: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        path: { type: 'string', short: 'p' },
        verbose: { type: 'boolean', short: 'v' },
        indent: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    return getErrorMessage(error);
  }

  if (values.help) {
    return '';
  }

  if (!values.path) {
    return 'Missing required option --path';
  }

  const indent = values.indent === undefined ? 2 : Number(values.indent);
  if (!Number.isInteger(indent) || indent < 0 || indent > 10) {
    return `Invalid --indent '${values.indent}': expected an integer from 0 to 10`;
  }

  return { root: values.path, verbose: values.verbose ?? false, indent };
}

/**
 * Crawl a directory and print one JSON record per file.
 *
 * @returns the process exit code
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const output = options.output ?? processOutput;

  const parsed = parseCliArgs(argv);
  if (typeof parsed === 'string') {
    if (parsed) output.stderr(parsed);
    output.stderr(USAGE);
    return parsed ? EXIT_USAGE : EXIT_OK;
  }

  if (parsed.verbose) {
    logger.level = 'debug';
  }

  let service = options.service;
  if (!service) {
    try {
      const config = ConfigManager.getInstance();
      config.validate();
      service = MetadataService.fromConfig(config.getConfig());
    } catch (error) {
      if (error instanceof ConfigurationError) {
        output.stderr(error.message);
        return EXIT_USAGE;
      }
      throw error;
    }
  }

  let failed = 0;
  let processed = 0;

  try {
    for await (const entry of crawlDirectory(parsed.root, service)) {
      processed++;
      output.stdout(`processing file: ${entry.filePath}`);

      if ('error' in entry) {
        failed++;
        continue;
      }
      output.stdout(toJson(entry.record, parsed.indent));
    }
  } catch (error) {
    if (error instanceof ApplicationError && error.isOperational) {
      output.stderr(error.message);
      return EXIT_USAGE;
    }
    throw error;
  }

  logger.info('Crawl finished', { root: parsed.root, processed, failed });
  return failed > 0 ? EXIT_PARTIAL : EXIT_OK;
}

if (require.main === module) {
  initializeLogger();

  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logger.error('metadump failed', { error: getErrorMessage(error) });
      process.exitCode = EXIT_USAGE;
    });
}
