import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { IKeyValueStore } from './IKeyValueStore.js';
import { StorageUnavailableError } from '../../domain/errors/index.js';
import { logger as rootLogger, type Logger } from '../logger.js';

type Entries = Record<string, string>;

// key-value store in one JSON object file; re-read on every call, missing file reads as empty
export class FileKeyValueStore implements IKeyValueStore {
  private readonly log: Logger;

  constructor(
    private readonly filePath: string,
    logger?: Logger
  ) {
    this.log = logger ?? rootLogger.child({ module: 'file-store' });
  }

  getItem(key: string): string | null {
    return this.readEntries(key)[key] ?? null;
  }

  setItem(key: string, value: string): void {
    let entries: Entries;
    try {
      entries = this.readEntries(key);
    } catch (err) {
      // a half-written or corrupt file must not block every later save
      this.log.warn({ err, file: this.filePath }, 'store file unreadable, overwriting it');
      entries = {};
    }
    entries[key] = value;
    this.writeEntries(key, entries);
  }

  private readEntries(key: string): Entries {
    if (!existsSync(this.filePath)) return {};

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, 'utf8'));
    } catch (err) {
      throw new StorageUnavailableError('read', key, err);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new StorageUnavailableError('read', key, new Error(`${this.filePath} is not a JSON object`));
    }

    const entries: Entries = {};
    for (const [k, v] of Object.entries(parsed)) {
      if (typeof v === 'string') entries[k] = v;
    }
    return entries;
  }

  // temp file + rename so a crash mid-write leaves the previous file intact
  private writeEntries(key: string, entries: Entries): void {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(tmpPath, JSON.stringify(entries, null, 2), 'utf8');
      renameSync(tmpPath, this.filePath);
    } catch (err) {
      rmSync(tmpPath, { force: true });
      throw new StorageUnavailableError('write', key, err);
    }
  }
}
