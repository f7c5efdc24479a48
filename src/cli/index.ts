#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { loadEnvFile, loadRunConfig } from '../config/config.js';
import { Orchestrator } from '../core/orchestrator.js';
import { logger } from '../utils/logger.js';

interface CompareOptions {
  master?: string;
  target?: string;
  envFile?: string;
  outputDir?: string;
  report?: string;
  sqlFile?: string;
  sync: boolean;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('schema-mirror')
    .description('Compare the table/column structure of two databases and draft SQL to align them')
    .version('1.0.0');

  program
    .command('compare')
    .description('Compare DB1 (master) with DB2 (target), export a report and a sync script')
    .option('-m, --master <url>', 'Master connection string (defaults to DATABASE_URL1)')
    .option('-t, --target <url>', 'Target connection string (defaults to DATABASE_URL2)')
    .option('-e, --env-file <path>', 'Environment file to load', '.env')
    .option('-o, --output-dir <path>', 'Directory for the report and the sync script')
    .option('-r, --report <file>', 'Report file name (.xlsx, or .csv for differences only)')
    .option('-s, --sql-file <file>', 'Sync script file name')
    .option('--no-sync', 'Skip sync script generation')
    .action(async (options: CompareOptions) => {
      try {
        loadEnvFile(options.envFile);
        const config = loadRunConfig({
          master: options.master,
          target: options.target,
          outputDir: options.outputDir,
          reportFile: options.report,
          sqlFile: options.sqlFile,
          sync: options.sync,
        });

        await new Orchestrator(config).run();
      } catch (error) {
        if (error instanceof z.ZodError) {
          logger.error({ errors: error.issues }, 'Invalid configuration');
        } else {
          logger.error({ error }, 'Error during execution');
        }
        process.exitCode = 1;
      }
    });

  return program;
}

export async function runCli(argv: string[] = process.argv) {
  await buildProgram().parseAsync(argv);
}

const isMain = process.argv[1] !== undefined && fileURLToPath(import.meta.url) === fs.realpathSync(process.argv[1]);

if (isMain) {
  runCli().catch((error: unknown) => {
    logger.error({ error }, 'Unexpected failure');
    process.exitCode = 1;
  });
}
