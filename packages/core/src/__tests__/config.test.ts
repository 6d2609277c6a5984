import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { CONFIG_FILENAME, getDefaultConfig, loadConfig, resolveProjectPath, writeDefaultConfig } from '../config.js';
import { ValidationError } from '../errors.js';

describe('config', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flashsync-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('defaults apply when no file exists', () => {
    const config = loadConfig(dir);

    expect(config).toEqual(getDefaultConfig());
    expect(config.dedupe.threshold).toBe(0.85);
    expect(config.dedupe.backend).toBe('auto');
    expect(config.llm.concurrency).toBe(10);
    expect(config.remote.apiKeyEnv).toBe('MOCHI_API_KEY');
  });

  test('snake_case keys are read and missing keys defaulted', () => {
    fs.writeFileSync(
      path.join(dir, CONFIG_FILENAME),
      ['dedupe:', '  threshold: 0.9', '  index_min_cards: 50', 'llm:', '  max_retries: 1'].join('\n')
    );

    const config = loadConfig(dir);

    expect(config.dedupe.threshold).toBe(0.9);
    expect(config.dedupe.indexMinCards).toBe(50);
    expect(config.dedupe.topK).toBe(100);
    expect(config.llm.maxRetries).toBe(1);
    expect(config.llm.maxTokens).toBe(1024);
  });

  test('the written default file loads back to the defaults', () => {
    const configPath = writeDefaultConfig(dir);

    expect(configPath).toBe(path.join(dir, CONFIG_FILENAME));
    expect(loadConfig(dir)).toEqual(getDefaultConfig());
  });

  test('invalid values are a validation error naming the field', () => {
    fs.writeFileSync(path.join(dir, CONFIG_FILENAME), 'dedupe:\n  backend: fuzzy\n');

    expect(() => loadConfig(dir)).toThrow(ValidationError);
    expect(() => loadConfig(dir)).toThrow(/dedupe\.backend/);
  });

  test('relative directories resolve against the project root', () => {
    expect(resolveProjectPath('/proj', '.flashsync/cache')).toBe(path.join('/proj', '.flashsync/cache'));
    expect(resolveProjectPath('/proj', '/var/cache')).toBe('/var/cache');
  });
});
