/**
 * Content-addressed result cache persisted as a flat JSON document.
 *
 * Keys are digests of (model id, prompt template id, normalized inputs), so an
 * identical request under an identical policy always hits and any change of
 * model or prompt wording always misses. Entries are immutable once written.
 * Read and write failures are logged and never block the caller.
 */

import * as fs from 'node:fs';
import type { z } from 'zod';
import { CacheIOError } from './errors.js';
import { getLogger } from './logger.js';
import { hash, normalizeText, writeFileAtomic } from './utils.js';

/**
 * Derive a cache key. Pure: the same model, template and inputs always give
 * the same 64-char hex digest.
 */
export function cacheKey(modelId: string, templateId: string, inputs: readonly string[]): string {
  return hash(JSON.stringify([modelId, templateId, ...inputs.map(normalizeText)]));
}

export class ContentCache<V> {
  private entries = new Map<string, V>();
  private dirty = false;

  constructor(
    readonly domain: string,
    private readonly filePath: string,
    private readonly schema: z.ZodType<V, z.ZodTypeDef, unknown>
  ) {}

  get path(): string {
    return this.filePath;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /** Store a value. Returns false when the key already exists (the old value is kept). */
  put(key: string, value: V): boolean {
    if (this.entries.has(key)) return false;
    this.entries.set(key, value);
    this.dirty = true;
    return true;
  }

  /**
   * Load the persisted document. A missing file is an empty cache; an
   * unreadable or corrupt one is logged and treated as empty.
   */
  load(): void {
    const log = getLogger();
    this.entries.clear();
    this.dirty = false;

    if (!fs.existsSync(this.filePath)) {
      log.debug('cache', `No ${this.domain} cache file found`);
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      log.warn('cache', new CacheIOError(this.filePath, 'read', error).message);
      return;
    }

    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
      log.warn('cache', new CacheIOError(this.filePath, 'read', 'not a key/value object').message);
      return;
    }

    let dropped = 0;
    for (const [key, raw] of Object.entries(parsed)) {
      const result = this.schema.safeParse(raw);
      if (result.success) {
        this.entries.set(key, result.data);
      } else {
        dropped++;
      }
    }

    if (dropped > 0) {
      log.warn('cache', `Dropped ${dropped} malformed ${this.domain} cache entr${dropped === 1 ? 'y' : 'ies'}`);
    }
    log.debug('cache', `Loaded ${this.entries.size} ${this.domain} cache entries`);
  }

  /** Rewrite the persisted document if anything changed. Failures are logged and dropped. */
  flush(): void {
    if (!this.dirty) return;
    try {
      writeFileAtomic(this.filePath, JSON.stringify(Object.fromEntries(this.entries)));
      this.dirty = false;
    } catch (error) {
      getLogger().warn('cache', new CacheIOError(this.filePath, 'write', error).message);
    }
  }

  /** Forget every entry and remove the persisted document. */
  clear(): void {
    this.entries.clear();
    this.dirty = false;
    try {
      fs.rmSync(this.filePath, { force: true });
    } catch (error) {
      getLogger().warn('cache', new CacheIOError(this.filePath, 'write', error).message);
    }
  }
}
