// src/cli/commands/search.ts
import { Command } from 'commander';
import type { ServicesFactory } from '../services.js';
import { exitWithError } from '../services.js';
import type { Platform } from '../../core/types/index.js';
import { parseNonNegativeNumber } from '../../core/config/settings.js';
import { formatPrice } from '../../core/notify/format.js';
import { ScoutError, ErrorCode } from '../../core/errors.js';

interface SearchCommandOptions {
  platform?: string;
  maxPrice?: string;
  json?: boolean;
}

export function registerSearchCommand(program: Command, services: ServicesFactory): void {
  program
    .command('search <keyword>')
    .description('Search discovery platforms for a keyword')
    .option('--platform <platform>', 'Only search this platform')
    .option('--max-price <price>', 'Price ceiling in zł')
    .option('--json', 'Output JSON to stdout', false)
    .action(async (keyword: string, options: SearchCommandOptions) => {
      try {
        const { search, settings } = services();
        const ceiling =
          options.maxPrice !== undefined ? parseNonNegativeNumber('--max-price', options.maxPrice) : settings.maxPrice;
        const platforms = selectPlatforms(search.platforms(), options.platform);

        for (const platform of platforms) {
          const stubs = await search.search(platform, keyword, ceiling);

          if (options.json) {
            console.log(JSON.stringify({ platform, stubs }, null, 2));
            continue;
          }

          console.log(`${platform}: ${stubs.length} results`);
          for (const stub of stubs) {
            console.log(`  ${formatPrice(stub.price)}  ${stub.title}`);
            console.log(`    ${stub.url}`);
          }
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}

export function selectPlatforms(available: Platform[], requested?: string): Platform[] {
  if (requested === undefined) return available;

  const match = available.find(platform => platform === requested.toLowerCase());
  if (!match) {
    throw new ScoutError(
      ErrorCode.INVALID_CONFIG,
      `Unsupported search platform: ${requested}`,
      false,
      `Use one of: ${available.join(', ')}`
    );
  }
  return [match];
}
