#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext, LogLevel, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { describeError } from './batch/errors';
import { CliCommand, USAGE, parseCliArgs } from './cli/cli-options';
import { runFix, runGenerate, runPreview, runScan } from './cli/commands';

async function bootstrap(): Promise<number> {
  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.command === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const logger: LogLevel[] = cli.verbose ? ['error', 'warn', 'log', 'debug'] : ['error', 'warn', 'log'];
  const app = await NestFactory.createApplicationContext(AppModule, { logger });
  // SIGINT is handled by the render commands so an interrupted run still writes its report.
  app.enableShutdownHooks(['SIGTERM']);

  try {
    return await dispatch(app, cli);
  } finally {
    await app.close();
  }
}

function dispatch(app: INestApplicationContext, cli: Exclude<CliCommand, { command: 'help' }>): Promise<number> {
  switch (cli.command) {
    case 'scan':
      return runScan(app, cli.inputFolder, cli.recursive);
    case 'generate':
      return runGenerate(app, cli.request);
    case 'preview':
      return runPreview(app, cli.request, cli.open);
    case 'fix':
      return runFix(app, cli.inputFolder, cli.recursive, cli.dryRun);
  }
}

bootstrap().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    new Logger('flowsnap').error(describeError(error));
    process.exitCode = 1;
  },
);
