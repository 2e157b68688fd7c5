import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve, sep } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { DocumentStore } from '../../application/index.js';

/**
 * Writes documents under a base directory and hands back `file://`
 * URIs. Keys are relative paths; a key that escapes the base directory
 * is rejected.
 */
export class LocalDocumentStore implements DocumentStore {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);
  }

  async put(key: string, content: string, _contentType: string): Promise<string> {
    const target = resolve(this.baseDir, key);
    if (!target.startsWith(this.baseDir + sep)) {
      throw new Error(`Document key escapes the storage directory: ${key}`);
    }
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, 'utf-8');
    return pathToFileURL(target).href;
  }
}
