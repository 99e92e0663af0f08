#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { CliCommand, CliUsageError, parseCliArgs } from './cli-args';
import { PipelineService, StageSummary, hasFailures } from './pipeline/pipeline.service';

const logger = new Logger('Cli');

async function execute(
  pipeline: PipelineService,
  command: CliCommand,
): Promise<{ output: unknown; failed: boolean }> {
  switch (command.name) {
    case 'import-sites':
      return report(await pipeline.importSites(command.limit));
    case 'download-csvs':
      return report(await pipeline.downloadCsvs());
    case 'upload-production':
      return report(await pipeline.uploadProduction());
    case 'calculate-profiles':
      return report(
        await pipeline.calculateProfiles({ recompute: command.recompute }),
      );
    case 'run-all': {
      const summary = await pipeline.runAll(command.limit);
      const stages: StageSummary[] = Object.values(summary);
      return { output: summary, failed: stages.some(hasFailures) };
    }
  }
}

function report(summary: StageSummary): { output: unknown; failed: boolean } {
  return { output: summary, failed: hasFailures(summary) };
}

async function main(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n`);
      return 2;
    }
    throw error;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error'],
  });
  try {
    const { output, failed } = await execute(app.get(PipelineService), command);
    process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
    return failed ? 1 : 0;
  } finally {
    await app.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(
      error instanceof Error ? error.message : String(error),
      error instanceof Error ? error.stack : undefined,
    );
    process.exitCode = 1;
  });
