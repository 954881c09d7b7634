/**
 * Storage Module
 *
 * Responsibilities:
 * - Define the FileStore interface used for ledgers, key pools and reports
 * - Implement FsFileStore on the local filesystem
 * - Implement MemoryFileStore for testing and dry runs
 *
 * Files written by the pipeline:
 * - key_assignments.json
 * - influencers_with_contacts.csv / influencers_priority_top50.csv
 * - influencers_backup.json / influencers_priority_top50.json
 * - email_drafts.txt / followup_drafts.txt
 */

import { mkdir, readFile, stat, writeFile } from 'fs/promises';
import { dirname } from 'path';

/**
 * Whole-file text persistence. Writes overwrite; there is no merge.
 */
export interface FileStore {
  /**
   * Read a file as UTF-8
   * @returns File content, or null when the file does not exist
   * @throws On any other read failure
   */
  readText(path: string): Promise<string | null>;

  /**
   * Write a file as UTF-8, replacing any previous content
   */
  writeText(path: string, content: string): Promise<void>;

  /**
   * Check whether a file exists
   */
  exists(path: string): Promise<boolean>;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Local filesystem implementation of FileStore
 */
export class FsFileStore implements FileStore {
  async readText(path: string): Promise<string | null> {
    try {
      return await readFile(path, 'utf-8');
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async writeText(path: string, content: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }
}

/**
 * In-memory file store for testing and dry runs
 */
export class MemoryFileStore implements FileStore {
  private files: Map<string, string>;

  constructor(initialFiles: Record<string, string> = {}) {
    this.files = new Map(Object.entries(initialFiles));
  }

  async readText(path: string): Promise<string | null> {
    return this.files.get(path) ?? null;
  }

  async writeText(path: string, content: string): Promise<void> {
    this.files.set(path, content);
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path);
  }

  /**
   * Synchronous peek at a stored file (useful for testing)
   */
  get(path: string): string | undefined {
    return this.files.get(path);
  }

  /**
   * Get all stored paths (useful for debugging)
   */
  paths(): string[] {
    return Array.from(this.files.keys());
  }

  /**
   * Clear all stored files (useful for test cleanup)
   */
  clear(): void {
    this.files.clear();
  }
}

/**
 * Factory function to create a file store
 */
export function createFileStore(config: { type: 'fs' | 'memory' } = { type: 'fs' }): FileStore {
  if (config.type === 'memory') {
    return new MemoryFileStore();
  }
  return new FsFileStore();
}
