import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { CacheClient, CacheEntry, CacheWriteInput } from './cache.js';

interface MetadataFile {
  storedAt: string;
  metadata?: Record<string, unknown>;
}

export interface FileCacheOptions {
  baseDir?: string;
}

const NAMESPACE_PATTERN = /^[a-z0-9][a-z0-9._-]*$/i;

/** Stores each entry as `<checksum>.body` plus `<checksum>.meta.json` under `<baseDir>/<namespace>/`. */
export class FileCache implements CacheClient {
  private readonly baseDir: string;

  constructor(options: FileCacheOptions = {}) {
    this.baseDir = options.baseDir ?? '.cache';
  }

  async read(namespace: string, checksum: string): Promise<CacheEntry | null> {
    const { bodyPath, metaPath } = this.paths(namespace, checksum);

    let body: string;
    let metaRaw: string;
    try {
      [body, metaRaw] = await Promise.all([fs.readFile(bodyPath, 'utf8'), fs.readFile(metaPath, 'utf8')]);
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    const meta = parseMetadata(metaRaw, metaPath);
    return {
      checksum,
      body,
      storedAt: meta.storedAt,
      ...(meta.metadata ? { metadata: meta.metadata } : {}),
    };
  }

  async write(namespace: string, entry: CacheWriteInput): Promise<void> {
    const { dir, bodyPath, metaPath } = this.paths(namespace, entry.checksum);
    await fs.mkdir(dir, { recursive: true });

    const metadata: MetadataFile = { storedAt: new Date().toISOString() };
    if (entry.metadata) {
      metadata.metadata = entry.metadata;
    }

    // Metadata last: read() treats a body without metadata as a miss.
    await fs.writeFile(bodyPath, entry.body, 'utf8');
    await fs.writeFile(metaPath, JSON.stringify(metadata, null, 2), 'utf8');
  }

  private paths(namespace: string, checksum: string) {
    if (!NAMESPACE_PATTERN.test(namespace) || !NAMESPACE_PATTERN.test(checksum)) {
      throw new Error(`Invalid cache key: ${namespace}/${checksum}`);
    }
    const dir = path.join(this.baseDir, namespace);
    return {
      dir,
      bodyPath: path.join(dir, `${checksum}.body`),
      metaPath: path.join(dir, `${checksum}.meta.json`),
    };
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function parseMetadata(raw: string, metaPath: string): MetadataFile {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || !('storedAt' in parsed) || typeof parsed.storedAt !== 'string') {
    throw new Error(`Cache metadata at ${metaPath} is missing storedAt`);
  }

  const result: MetadataFile = { storedAt: parsed.storedAt };
  if ('metadata' in parsed && typeof parsed.metadata === 'object' && parsed.metadata !== null && !Array.isArray(parsed.metadata)) {
    result.metadata = Object.fromEntries(Object.entries(parsed.metadata));
  }
  return result;
}
