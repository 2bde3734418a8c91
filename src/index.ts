#!/usr/bin/env node
import 'dotenv/config';
import { loadPipelineConfig } from './config/pipeline.js';
import { runPipeline } from './pipeline.js';
import { USAGE, getStringArg, parseCliArgs } from './utils/cli.js';
import { log } from './utils/log.js';

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception', error);
  process.exit(1);
});

async function main() {
  const rawArgs = parseCliArgs(process.argv.slice(2));

  if (rawArgs.help !== undefined) {
    process.stdout.write(USAGE);
    return;
  }

  const config = loadPipelineConfig({
    dataRoot: getStringArg(rawArgs, 'data-root'),
    databasePath: getStringArg(rawArgs, 'db'),
    manifestPath: getStringArg(rawArgs, 'manifest'),
    workDir: getStringArg(rawArgs, 'work-dir'),
    fromStep: getStringArg(rawArgs, 'from-step'),
    exportPath: getStringArg(rawArgs, 'export'),
    exportSumlev: getStringArg(rawArgs, 'sumlev'),
    exportState: getStringArg(rawArgs, 'state')
  });

  log.info('ETL started', {
    dataRoot: config.dataRoot,
    database: config.databasePath,
    fromStep: config.fromStep
  });

  const result = await runPipeline(config);

  log.info('ETL finished', {
    runId: result.runId,
    steps: result.steps,
    tables: result.tables,
    exported: result.exported
  });
}

main().catch((error) => {
  log.error('ETL failed', error);
  process.exitCode = 1;
});
