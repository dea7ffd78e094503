// src/cli/commands/keywords.ts
import { Command } from 'commander';
import type { ServicesFactory } from '../services.js';
import { exitWithError } from '../services.js';

export function registerKeywordsCommand(program: Command, services: ServicesFactory): void {
  const keywordsCmd = program
    .command('keywords')
    .description('Manage scan keywords');

  keywordsCmd
    .command('list')
    .description('List keywords')
    .action(async () => {
      try {
        const keywords = await services().keywords.list();
        console.log(`Keywords (${keywords.length}):`);
        keywords.forEach((keyword, index) => console.log(`${index + 1}. ${keyword}`));
      } catch (error) {
        exitWithError(error);
      }
    });

  keywordsCmd
    .command('add <keyword...>')
    .description('Add keywords (each argument is one keyword; quote phrases)')
    .action(async (keywords: string[]) => {
      try {
        const { changed, skipped } = await services().keywords.add(keywords);
        for (const keyword of changed) console.log(`Added: ${keyword}`);
        for (const keyword of skipped) console.log(`Already present: ${keyword}`);
      } catch (error) {
        exitWithError(error);
      }
    });

  keywordsCmd
    .command('remove <target...>')
    .description('Remove keywords by number or exact text')
    .action(async (targets: string[]) => {
      try {
        const { changed, skipped } = await services().keywords.remove(targets);
        for (const keyword of changed) console.log(`Removed: ${keyword}`);
        for (const target of skipped) console.log(`Not found: ${target}`);
      } catch (error) {
        exitWithError(error);
      }
    });
}
