// src/core/keywords/store.ts
import { backupCorruptFile, readJsonFile, writeJsonFile } from '../storage/json-file.js';
import { ScoutError, ErrorCode, errorMessage } from '../errors.js';
import { DEFAULT_KEYWORDS } from '../config/constants.js';

export interface KeywordChange {
  changed: string[];
  skipped: string[];
}

/**
 * Ordered, duplicate-free search terms persisted as a JSON array.
 */
export class KeywordStore {
  constructor(
    private readonly filePath: string,
    private readonly defaults: readonly string[] = DEFAULT_KEYWORDS
  ) {}

  async list(): Promise<string[]> {
    const result = await readJsonFile(this.filePath);

    if (result.status === 'ok') {
      const keywords = parseKeywords(result.data);
      if (keywords) return keywords;
    }

    if (result.status !== 'missing') {
      console.error(`[Keywords] ${this.filePath} is unreadable; using defaults`);
      await backupCorruptFile(this.filePath);
    }

    return [...this.defaults];
  }

  async add(candidates: string[]): Promise<KeywordChange> {
    const keywords = await this.list();
    const change: KeywordChange = { changed: [], skipped: [] };

    for (const candidate of candidates) {
      const keyword = candidate.trim();
      if (!keyword || keywords.includes(keyword)) {
        change.skipped.push(candidate);
        continue;
      }
      keywords.push(keyword);
      change.changed.push(keyword);
    }

    if (change.changed.length > 0) {
      await this.save(keywords);
    }
    return change;
  }

  /**
   * Removes by 1-based position (as printed by `keywords list`) or by exact text.
   * Positions refer to the list before any removal.
   */
  async remove(targets: string[]): Promise<KeywordChange> {
    const keywords = await this.list();
    const change: KeywordChange = { changed: [], skipped: [] };
    const doomed = new Set<string>();

    for (const target of targets) {
      const keyword = resolveTarget(keywords, target.trim());
      if (keyword === undefined || doomed.has(keyword)) {
        change.skipped.push(target);
        continue;
      }
      doomed.add(keyword);
      change.changed.push(keyword);
    }

    if (doomed.size > 0) {
      await this.save(keywords.filter(keyword => !doomed.has(keyword)));
    }
    return change;
  }

  private async save(keywords: string[]): Promise<void> {
    try {
      await writeJsonFile(this.filePath, keywords);
    } catch (error) {
      throw new ScoutError(
        ErrorCode.PERSISTENCE_ERROR,
        `Failed to write keywords: ${errorMessage(error)}`,
        true,
        'Check that the data directory is writable',
        { path: this.filePath }
      );
    }
  }
}

export function parseKeywords(data: unknown): string[] | undefined {
  if (!Array.isArray(data)) return undefined;

  const keywords: string[] = [];
  for (const value of data) {
    if (typeof value !== 'string') continue;
    const keyword = value.trim();
    if (keyword && !keywords.includes(keyword)) keywords.push(keyword);
  }
  return keywords;
}

function resolveTarget(keywords: string[], target: string): string | undefined {
  if (keywords.includes(target)) return target;

  if (/^\d+$/.test(target)) {
    return keywords[Number(target) - 1];
  }
  return undefined;
}
