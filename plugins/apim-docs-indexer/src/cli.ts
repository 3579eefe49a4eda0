#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import { loadSettings, type Settings } from './config/config';
import { ConfigError, ErrorHandler } from './services/ErrorHandler';
import { createLogger } from './services/logger';
import { createPipelineFromConfig, type PipelineDeps, type RunMode } from './pipeline';

export type CliOptions = {
  config?: string;
  downloadOnly?: boolean;
  convertOnly?: boolean;
  indexOnly?: boolean;
  wikiOnly?: boolean;
};

const MODE_FLAGS: Array<[keyof CliOptions, RunMode]> = [
  ['downloadOnly', 'download-only'],
  ['convertOnly', 'convert-only'],
  ['indexOnly', 'index-only'],
  ['wikiOnly', 'wiki-only'],
];

export function resolveRunMode(opts: CliOptions): RunMode {
  const selected = MODE_FLAGS.filter(([flag]) => opts[flag] === true).map(([, mode]) => mode);
  if (selected.length > 1) {
    throw new InvalidArgumentError(`Only one mode flag may be given (got ${selected.map(m => `--${m}`).join(', ')})`);
  }
  return selected[0] ?? 'full';
}

export function buildProgram(): Command {
  return new Command()
    .name('apim-docs')
    .description('Download API specifications from Azure API Management, render them and index them in Azure AI Search')
    .option('-c, --config <path>', 'Path to the YAML configuration file (default: config/config.yaml)')
    .option('--download-only', 'Only download specifications')
    .option('--convert-only', 'Only convert specifications to Markdown')
    .option('--index-only', 'Only index documents in Azure AI Search')
    .option('--wiki-only', 'Only process wiki documents');
}

export async function main(argv: string[] = process.argv, deps: PipelineDeps = {}): Promise<number> {
  dotenv.config();

  const program = buildProgram();
  program.parse(argv);
  const opts = program.opts<CliOptions>();

  let mode: RunMode;
  try {
    mode = resolveRunMode(opts);
  } catch (error) {
    if (error instanceof InvalidArgumentError) {
      program.error(error.message, { exitCode: 2, code: 'apim-docs.usage' });
    }
    throw error;
  }

  let settings: Settings;
  try {
    settings = loadSettings(opts.config);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    createLogger().error({ err: error.message }, 'Configuration error');
    return 1;
  }

  const logger = createLogger({ level: settings.logging.level });
  const pipeline = createPipelineFromConfig(settings, logger, deps);
  const summary = await pipeline.run(mode);

  const metricsFile = settings.observability.metricsFile;
  if (metricsFile) {
    try {
      await pipeline.observability.writeMetrics(metricsFile);
      logger.info({ file: metricsFile }, 'Wrote metrics');
    } catch (error) {
      logger.error({ file: metricsFile, err: ErrorHandler.describe(error) }, 'Could not write metrics file');
    }
  }
  return summary.exitCode;
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
