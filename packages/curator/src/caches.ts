/**
 * The three persisted result caches used by curation.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { ContentCache, resolveProjectPath, type FlashsyncConfig } from '@flashsync/core';

export const CACHE_DOMAINS = ['embeddings', 'classifications', 'gradings'] as const;
export type CacheDomain = (typeof CACHE_DOMAINS)[number];

export const embeddingSchema = z.array(z.number());

export const classificationSchema = z.object({
  classification: z.enum(['duplicate', 'complementary', 'unclear']),
  reasoning: z.string(),
});

export const gradeSchema = z.object({
  score: z.number().int().min(0).max(10),
  reasoning: z.string(),
});

export type CachedClassification = z.output<typeof classificationSchema>;
export type Grade = z.output<typeof gradeSchema>;

export interface CacheDomainStats {
  domain: CacheDomain;
  entries: number;
  path: string;
  bytes: number;
}

export function isCacheDomain(value: string): value is CacheDomain {
  return CACHE_DOMAINS.some((d) => d === value);
}

export class CacheStore {
  readonly embeddings: ContentCache<number[]>;
  readonly classifications: ContentCache<CachedClassification>;
  readonly gradings: ContentCache<Grade>;

  constructor(readonly dir: string) {
    this.embeddings = new ContentCache('embeddings', path.join(dir, 'embeddings.json'), embeddingSchema);
    this.classifications = new ContentCache(
      'classifications',
      path.join(dir, 'classifications.json'),
      classificationSchema
    );
    this.gradings = new ContentCache('gradings', path.join(dir, 'gradings.json'), gradeSchema);
  }

  static fromConfig(projectDir: string, config: FlashsyncConfig): CacheStore {
    return new CacheStore(resolveProjectPath(projectDir, config.cache.dir));
  }

  private domain(domain: CacheDomain): ContentCache<unknown> {
    switch (domain) {
      case 'embeddings':
        return this.embeddings;
      case 'classifications':
        return this.classifications;
      case 'gradings':
        return this.gradings;
    }
  }

  load(): void {
    for (const domain of CACHE_DOMAINS) this.domain(domain).load();
  }

  flush(): void {
    for (const domain of CACHE_DOMAINS) this.domain(domain).flush();
  }

  /** Entry counts as loaded, plus on-disk size */
  stats(): CacheDomainStats[] {
    return CACHE_DOMAINS.map((domain) => {
      const cache = this.domain(domain);
      const bytes = fs.existsSync(cache.path) ? fs.statSync(cache.path).size : 0;
      return { domain, entries: cache.size, path: cache.path, bytes };
    });
  }

  /** Remove one domain's file, or all of them */
  clear(domain?: CacheDomain): CacheDomain[] {
    const domains = domain ? [domain] : [...CACHE_DOMAINS];
    for (const d of domains) this.domain(d).clear();
    return domains;
  }
}
