// src/core/storage/json-file.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import { errorMessage } from '../errors.js';

export type JsonReadResult =
  | { status: 'missing' }
  | { status: 'ok'; data: unknown }
  | { status: 'corrupt'; error: string };

export async function readJsonFile(filePath: string): Promise<JsonReadResult> {
  if (!existsSync(filePath)) {
    return { status: 'missing' };
  }

  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return { status: 'ok', data: JSON.parse(content) };
  } catch (error) {
    return { status: 'corrupt', error: errorMessage(error) };
  }
}

/**
 * Moves an unreadable file aside to `<file>.bak`. Returns the backup path, or
 * undefined when the move itself failed.
 */
export async function backupCorruptFile(filePath: string): Promise<string | undefined> {
  const backupPath = filePath + '.bak';

  try {
    await fs.rename(filePath, backupPath);
    return backupPath;
  } catch (error) {
    console.warn(`[Storage] Could not back up ${filePath}: ${errorMessage(error)}`);
    return undefined;
  }
}

/**
 * Writes through a temp file and a rename, so readers never see half a file.
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tempPath, JSON.stringify(data, null, 2));
  await fs.rename(tempPath, filePath);
}
