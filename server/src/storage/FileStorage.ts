// ============================================
// File Storage
// All keys in one JSON document on disk
// ============================================

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import path from 'path';
import type { JsonValue } from '@asteroid-tap/shared';
import type { KeyValueStorage } from './types';

type Document = Record<string, JsonValue>;

function isDocument(value: unknown): value is Document {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Pending operations per resolved file path, shared by every instance
const fileQueues = new Map<string, Promise<unknown>>();
let tempFileCounter = 0;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * FileStorage - persists a flat key/value map as a single JSON file.
 *
 * Operations on the same file run one at a time in call order, across all
 * instances in the process. Writes go to a temp file that is renamed over
 * the original, so a crash mid-write leaves the previous document intact.
 */
export class FileStorage implements KeyValueStorage {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  read(key: string): Promise<JsonValue | undefined> {
    return this.enqueue(async () => {
      const document = await this.load();
      return document[key];
    });
  }

  write(key: string, value: JsonValue): Promise<void> {
    return this.enqueue(async () => {
      const document = await this.load();
      document[key] = value;
      await this.save(document);
    });
  }

  delete(key: string): Promise<void> {
    return this.enqueue(async () => {
      const document = await this.load();
      if (!(key in document)) return;
      delete document[key];
      await this.save(document);
    });
  }

  clear(): Promise<void> {
    return this.enqueue(() => rm(this.filePath, { force: true }));
  }

  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const previous = fileQueues.get(this.filePath) ?? Promise.resolve();
    const run = previous.then(operation, operation);
    // The queue only orders operations; each failure reaches its caller via `run`.
    fileQueues.set(
      this.filePath,
      run.then(
        () => undefined,
        () => undefined
      )
    );
    return run;
  }

  private async load(): Promise<Document> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return {};
      throw error;
    }
    const parsed: unknown = JSON.parse(text);
    if (!isDocument(parsed)) {
      throw new Error(`Storage file ${this.filePath} does not contain a JSON object`);
    }
    return parsed;
  }

  private async save(document: Document): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    tempFileCounter += 1;
    const tempPath = `${this.filePath}.${process.pid}.${tempFileCounter}.tmp`;
    await writeFile(tempPath, JSON.stringify(document, null, 2), 'utf8');
    await rename(tempPath, this.filePath);
  }
}
