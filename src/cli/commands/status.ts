import { Command } from 'commander';
import type { ServicesFactory } from '../services.js';
import { exitWithError } from '../services.js';
import { PLATFORM_LABELS } from '../../core/types/index.js';

export function registerStatusCommand(program: Command, services: ServicesFactory): void {
  program
    .command('status')
    .description('Show keywords, seen listings and scan settings')
    .action(async () => {
      try {
        const { settings, keywords, seen, search } = services();
        const keywordCount = (await keywords.list()).length;
        const seenCount = await seen.size();

        console.log(`Keywords: ${keywordCount}`);
        console.log(`Seen listings: ${seenCount}`);
        console.log(`Scan interval: ${settings.scanIntervalMinutes} min`);
        console.log(`Max price: ${settings.maxPrice} zł`);
        console.log(`Min margin: ${settings.minMarginPercent}%`);
        console.log(`Platforms: ${search.platforms().map(p => PLATFORM_LABELS[p]).join(', ')}`);
        console.log(`Alerts: ${settings.alertDestination || 'not configured'}`);
        console.log(`Data: ${settings.dataDir}`);
      } catch (error) {
        exitWithError(error);
      }
    });
}
