// src/cli/commands/scan.ts
import { Command } from 'commander';
import type { Services, ServicesFactory } from '../services.js';
import { exitWithError } from '../services.js';
import { ScanOrchestrator } from '../../core/orchestrator.js';
import { ScanScheduler } from '../../core/scheduler.js';
import { parseNonNegativeNumber } from '../../core/config/settings.js';
import { ScoutError, ErrorCode } from '../../core/errors.js';

interface ScanCommandOptions {
  to?: string;
  verbose?: boolean;
}

interface WatchCommandOptions extends ScanCommandOptions {
  interval?: string;
}

export function createOrchestrator(services: Services, verbose = false): ScanOrchestrator {
  return new ScanOrchestrator(
    {
      keywords: services.keywords,
      search: services.search,
      seen: services.seen,
      notifier: services.notifier,
    },
    {
      maxPrice: services.settings.maxPrice,
      delayMs: services.settings.scanDelayMs,
      verbose,
    }
  );
}

export function registerScanCommand(program: Command, services: ServicesFactory): void {
  program
    .command('scan')
    .description('Run one discovery scan over all keywords')
    .option('--to <destination>', 'Alert destination (defaults to ALERT_DESTINATION)')
    .option('--verbose', 'Verbose output', false)
    .action(async (options: ScanCommandOptions) => {
      try {
        const context = services();
        const destination = options.to ?? context.settings.alertDestination;
        const accepted = await createOrchestrator(context, options.verbose).run(destination);
        console.log(`New listings: ${accepted}`);
      } catch (error) {
        exitWithError(error);
      }
    });

  program
    .command('watch')
    .description('Scan on a fixed interval until interrupted')
    .option('--to <destination>', 'Alert destination (defaults to ALERT_DESTINATION)')
    .option('--interval <minutes>', 'Minutes between scans (defaults to SCAN_INTERVAL)')
    .option('--verbose', 'Verbose output', false)
    .action(async (options: WatchCommandOptions) => {
      try {
        const context = services();
        const destination = (options.to ?? context.settings.alertDestination).trim();
        if (!destination) {
          throw new ScoutError(
            ErrorCode.INVALID_CONFIG,
            'No alert destination set',
            false,
            'Pass --to or set ALERT_DESTINATION'
          );
        }
        const minutes =
          options.interval !== undefined
            ? parseNonNegativeNumber('--interval', options.interval)
            : context.settings.scanIntervalMinutes;
        if (minutes === 0) {
          throw new ScoutError(ErrorCode.INVALID_CONFIG, 'Scan interval must be greater than 0');
        }

        const orchestrator = createOrchestrator(context, options.verbose);
        const scheduler = new ScanScheduler(() => orchestrator.run(destination), {
          intervalMs: minutes * 60_000,
        });

        console.log(`Watching: every ${minutes} min, first scan in 60 s. Press Ctrl+C to stop.`);
        scheduler.start();

        await new Promise<void>(resolve => {
          process.once('SIGINT', () => {
            console.log('Stopping...');
            scheduler.stop().then(resolve, resolve);
          });
        });
      } catch (error) {
        exitWithError(error);
      }
    });
}
