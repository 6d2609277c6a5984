import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { ContentCache, cacheKey } from '../cache.js';
import { initLogger, type Logger } from '../logger.js';

const gradeSchema = z.object({ score: z.number().int(), reasoning: z.string() });

describe('cacheKey', () => {
  test('is stable for identical inputs', () => {
    expect(cacheKey('model-a', 'grade@v1', ['Q', 'A'])).toBe(cacheKey('model-a', 'grade@v1', ['Q', 'A']));
    expect(cacheKey('model-a', 'grade@v1', ['Q'])).toMatch(/^[0-9a-f]{64}$/);
  });

  test('normalizes whitespace and line endings', () => {
    expect(cacheKey('m', 't', ['  line one\r\nline two \n'])).toBe(cacheKey('m', 't', ['line one\nline two']));
  });

  test('changes when the model or template changes', () => {
    const base = cacheKey('model-a', 'grade@v1', ['Q']);

    expect(cacheKey('model-b', 'grade@v1', ['Q'])).not.toBe(base);
    expect(cacheKey('model-a', 'grade@v2', ['Q'])).not.toBe(base);
  });

  test('keeps input boundaries apart', () => {
    expect(cacheKey('m', 't', ['ab', 'c'])).not.toBe(cacheKey('m', 't', ['a', 'bc']));
  });
});

describe('ContentCache', () => {
  let dir: string;
  let filePath: string;
  let logger: Logger;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flashsync-cache-'));
    filePath = path.join(dir, 'cache', 'gradings.json');
    logger = initLogger({});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const warnings = (): string[] =>
    logger.allEntries.filter((e) => e.level === 'warn').map((e) => e.message);

  test('entries are immutable once written', () => {
    const cache = new ContentCache('gradings', filePath, gradeSchema);

    expect(cache.put('k', { score: 8, reasoning: 'clear' })).toBe(true);
    expect(cache.put('k', { score: 2, reasoning: 'other' })).toBe(false);
    expect(cache.get('k')).toEqual({ score: 8, reasoning: 'clear' });
    expect(cache.size).toBe(1);
  });

  test('persists entries across instances', () => {
    const first = new ContentCache('gradings', filePath, gradeSchema);
    first.load();
    first.put('k1', { score: 7, reasoning: 'ok' });
    first.flush();

    const second = new ContentCache('gradings', filePath, gradeSchema);
    second.load();

    expect(second.has('k1')).toBe(true);
    expect(second.get('k1')).toEqual({ score: 7, reasoning: 'ok' });
  });

  test('starts empty when no file exists', () => {
    const cache = new ContentCache('gradings', filePath, gradeSchema);
    cache.load();

    expect(cache.size).toBe(0);
    expect(warnings()).toEqual([]);
  });

  test('treats a corrupt file as empty and warns', () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, '{not json');
    const cache = new ContentCache('gradings', filePath, gradeSchema);

    cache.load();

    expect(cache.size).toBe(0);
    expect(warnings()).toHaveLength(1);
    expect(warnings()[0]).toContain(`Cache read failed for ${filePath}`);
  });

  test('drops entries that fail validation', () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(
      filePath,
      JSON.stringify({
        good: { score: 9, reasoning: 'fine' },
        bad: { score: 'high' },
      })
    );
    const cache = new ContentCache('gradings', filePath, gradeSchema);

    cache.load();

    expect(cache.size).toBe(1);
    expect(cache.has('bad')).toBe(false);
    expect(warnings()).toEqual(['Dropped 1 malformed gradings cache entry']);
  });

  test('a failed write is logged and the entries stay in memory', () => {
    // A directory where the file should be makes the rename fail
    fs.mkdirSync(filePath, { recursive: true });
    const cache = new ContentCache('gradings', filePath, gradeSchema);
    cache.put('k', { score: 1, reasoning: 'poor' });

    expect(() => cache.flush()).not.toThrow();
    expect(cache.get('k')).toEqual({ score: 1, reasoning: 'poor' });
    expect(warnings()).toHaveLength(1);
    expect(warnings()[0]).toContain(`Cache write failed for ${filePath}`);
  });

  test('clear removes the persisted file', () => {
    const cache = new ContentCache('gradings', filePath, gradeSchema);
    cache.put('k', { score: 5, reasoning: 'meh' });
    cache.flush();
    expect(fs.existsSync(filePath)).toBe(true);

    cache.clear();

    expect(cache.size).toBe(0);
    expect(fs.existsSync(filePath)).toBe(false);
  });
});
