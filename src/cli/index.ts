#!/usr/bin/env node

import { Command } from 'commander';
import { createServices, exitWithError, type Services, type ServicesFactory } from './services.js';
import { registerExtractCommand } from './commands/extract.js';
import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerSearchCommand } from './commands/search.js';
import { registerScanCommand } from './commands/scan.js';
import { registerKeywordsCommand } from './commands/keywords.js';
import { registerStatusCommand } from './commands/status.js';

/** Services are built on first use, so `--help` needs no configuration. */
function lazy(factory: ServicesFactory): ServicesFactory {
  let services: Services | undefined;
  return () => {
    if (!services) {
      services = factory();
    }
    return services;
  };
}

export function buildProgram(factory: ServicesFactory = () => createServices()): Command {
  const program = new Command();
  const services = lazy(factory);

  program
    .name('scout')
    .description('Classifieds listing extractor and deal scanner')
    .version('0.1.0');

  registerExtractCommand(program, services);
  registerAnalyzeCommand(program, services);
  registerSearchCommand(program, services);
  registerScanCommand(program, services);
  registerKeywordsCommand(program, services);
  registerStatusCommand(program, services);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  runCli().catch(exitWithError);
}
