/**
 * Stats Store
 *
 * Persistence port for the stats store plus its JSON file implementation.
 * Writes go to a temp file that is renamed over the target. There is no
 * locking, so only one scanner may write a given file.
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { StatsStoreError, getErrorMessage } from '../errors/index.js';
import { isStatsStore, type StatsStore } from './types.js';

// ============ Port ============

export interface StatsPersistence {
  /**
   * Load the store; null when none exists yet.
   * @throws StatsStoreError when the stored data is unreadable or corrupt
   */
  load(): Promise<StatsStore | null>;

  save(store: StatsStore): Promise<void>;
}

// ============ JSON File ============

export class JsonFileStatsStore implements StatsPersistence {
  constructor(private readonly filePath: string) {}

  async load(): Promise<StatsStore | null> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw new StatsStoreError(`Cannot read stats file: ${getErrorMessage(error)}`, { path: this.filePath });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error: unknown) {
      throw new StatsStoreError(`Stats file is not valid JSON: ${getErrorMessage(error)}`, { path: this.filePath });
    }

    if (!isStatsStore(parsed)) {
      throw new StatsStoreError('Stats file has an unexpected shape', { path: this.filePath });
    }
    return parsed;
  }

  async save(store: StatsStore): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });

    // Readers only ever see a complete file
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tmpPath, JSON.stringify(store, null, 2), 'utf-8');
    await rename(tmpPath, this.filePath);
  }
}
