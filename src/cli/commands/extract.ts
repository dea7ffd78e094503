// src/cli/commands/extract.ts
import { Command } from 'commander';
import type { ServicesFactory } from '../services.js';
import { exitWithError } from '../services.js';
import { formatListing } from '../../core/notify/format.js';

interface ExtractCommandOptions {
  json?: boolean;
}

export function registerExtractCommand(program: Command, services: ServicesFactory): void {
  program
    .command('extract <url...>')
    .description('Extract listing details from one or more URLs')
    .option('--json', 'Output JSON to stdout', false)
    .action(async (urls: string[], options: ExtractCommandOptions) => {
      try {
        const { extractor } = services();
        let failed = 0;

        for (const url of urls) {
          const outcome = await extractor.extract(url);

          if (options.json) {
            console.log(JSON.stringify(outcome, null, 2));
          } else if (outcome.status === 'success') {
            console.log(formatListing(outcome.listing));
            console.log('');
          } else {
            console.error(`Failed [${outcome.failure.kind}]: ${outcome.failure.message}`);
          }

          if (outcome.status === 'failed') failed++;
        }

        if (failed > 0) {
          process.exit(1);
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}
