/**
 * Secret store adapters for the Backand SDK
 *
 * - MemoryTokenStorage: Map-backed, lost when the process exits
 * - FileTokenStorage: JSON file on disk, survives process restarts
 * - localStorage: picked automatically in browsers
 */

import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import type { TokenStorage } from '../types';

export class MemoryTokenStorage implements TokenStorage {
  private store = new Map<string, string>();

  getItem(key: string): string | null {
    return this.store.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.store.set(key, value);
  }

  removeItem(key: string): void {
    this.store.delete(key);
  }
}

/**
 * File-backed storage
 *
 * Every call reads or rewrites the whole file, so the on-disk copy is always
 * the source of truth. The file is written with owner-only permissions.
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   appName: 'my-app',
 *   storage: new FileTokenStorage(path.join(os.homedir(), '.my-app', 'session.json')),
 * });
 * ```
 */
export class FileTokenStorage implements TokenStorage {
  constructor(private readonly filePath: string) {}

  getItem(key: string): string | null {
    return this.read()[key] ?? null;
  }

  setItem(key: string, value: string): void {
    this.write({ ...this.read(), [key]: value });
  }

  removeItem(key: string): void {
    const entries = this.read();
    if (!(key in entries)) return;
    delete entries[key];
    if (Object.keys(entries).length === 0) {
      rmSync(this.filePath, { force: true });
      return;
    }
    this.write(entries);
  }

  private read(): Record<string, string> {
    let raw: string;
    try {
      raw = readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return {};
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      console.warn(`[Backand:Storage] Ignoring unreadable token file at ${this.filePath}`);
      return {};
    }

    const entries: Record<string, string> = {};
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === 'string') entries[key] = value;
      }
    }
    return entries;
  }

  private write(entries: Record<string, string>): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.${randomUUID()}.tmp`;
    writeFileSync(tempPath, JSON.stringify(entries), { encoding: 'utf8', mode: 0o600 });
    renameSync(tempPath, this.filePath);
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Pick the default secret store: localStorage in browsers, memory elsewhere
 */
export function createDefaultStorage(): TokenStorage {
  if (typeof globalThis.localStorage !== 'undefined') {
    return globalThis.localStorage;
  }
  return new MemoryTokenStorage();
}
