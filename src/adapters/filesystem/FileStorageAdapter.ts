/**
 * File-based storage adapter
 *
 * Stores data as JSON files in a base directory. Keys map to file paths
 * (e.g., "results/geography" -> "results/geography.json"). Writes replace
 * the file atomically: readers see either the old or the new content.
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  readdirSync,
  renameSync,
  rmSync,
  unlinkSync,
  writeFileSync,
} from 'node:fs';
import { dirname, join } from 'node:path';
import type { IStorageAdapter } from '@/ports/IStorageAdapter';

/**
 * File-based implementation of IStorageAdapter
 */
export class FileStorageAdapter implements IStorageAdapter {
  private baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
    if (!existsSync(baseDir)) {
      mkdirSync(baseDir, { recursive: true });
    }
  }

  private getFilePath(key: string): string {
    return join(this.baseDir, `${key}.json`);
  }

  async read(key: string): Promise<unknown> {
    const filePath = this.getFilePath(key);
    if (!existsSync(filePath)) {
      return null;
    }
    const content = readFileSync(filePath, 'utf-8');
    try {
      const data: unknown = JSON.parse(content);
      return data;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Stored value for '${key}' is not valid JSON: ${reason}`, { cause: error });
    }
  }

  async write(key: string, data: unknown): Promise<void> {
    const filePath = this.getFilePath(key);
    const dir = dirname(filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const tempPath = `${filePath}.${process.pid}.tmp`;
    const fd = openSync(tempPath, 'w');
    let flushed = false;
    try {
      writeFileSync(fd, JSON.stringify(data, null, 2));
      fsyncSync(fd);
      flushed = true;
    } finally {
      closeSync(fd);
      if (!flushed) rmSync(tempPath, { force: true });
    }
    renameSync(tempPath, filePath);
  }

  async exists(key: string): Promise<boolean> {
    return existsSync(this.getFilePath(key));
  }

  async delete(key: string): Promise<void> {
    const filePath = this.getFilePath(key);
    if (existsSync(filePath)) {
      unlinkSync(filePath);
    }
  }

  async keys(): Promise<string[]> {
    return this.collectKeys(this.baseDir, '');
  }

  private collectKeys(dir: string, prefix: string): string[] {
    if (!existsSync(dir)) {
      return [];
    }

    const keys: string[] = [];
    const entries = readdirSync(dir, { withFileTypes: true });

    for (const entry of entries) {
      const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        keys.push(...this.collectKeys(join(dir, entry.name), relativePath));
      } else if (entry.isFile() && entry.name.endsWith('.json')) {
        keys.push(relativePath.slice(0, -'.json'.length));
      }
    }

    return keys;
  }

  async clear(): Promise<void> {
    if (existsSync(this.baseDir)) {
      rmSync(this.baseDir, { recursive: true, force: true });
      mkdirSync(this.baseDir, { recursive: true });
    }
  }
}
