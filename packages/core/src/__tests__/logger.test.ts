import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Logger, getLogger, initLogger, type LogEntry } from '../logger.js';

describe('Logger', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flashsync-logger-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('captures entries and forwards them to onLog', () => {
    const seen: LogEntry[] = [];
    const logger = new Logger({ onLog: (e) => seen.push(e) });

    logger.warn('cache', 'Dropped 1 entry', { domain: 'gradings' });

    expect(logger.allEntries).toHaveLength(1);
    expect(seen[0]).toMatchObject({
      level: 'warn',
      category: 'cache',
      message: 'Dropped 1 entry',
      data: { domain: 'gradings' },
    });
    expect(logger.filePath).toBe('');
  });

  test('writes a log file under the project directory', async () => {
    const logger = new Logger({ projectDir: dir, command: 'push' });
    logger.info('push', 'Plan ready');
    const filePath = logger.filePath;

    expect(path.dirname(filePath)).toBe(path.join(dir, '.flashsync', 'logs'));
    expect(path.basename(filePath)).toMatch(/^push-\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}\.log$/);

    logger.close();
    await logger.flushed();

    const lines = fs.readFileSync(filePath, 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[1]).toMatch(/^\S+ INFO  \[push\] {5}Plan ready$/);
  });

  test('keeps logging in memory when the log file cannot be opened', async () => {
    const logger = new Logger({ projectDir: dir, command: 'pull' });
    fs.rmSync(dir, { recursive: true, force: true });
    logger.info('pull', 'Fetching cards');

    await logger.flushed();
    logger.info('pull', 'Wrote deck file');
    logger.close();

    expect(logger.filePath).toBe('');
    expect(logger.allEntries.map((e) => e.message)).toEqual([
      'Log session started',
      'Fetching cards',
      expect.stringMatching(/^Log file disabled: ENOENT/),
      'Wrote deck file',
    ]);
  });

  test('does not keep entries when capture is off', () => {
    const logger = new Logger({ capture: false });
    logger.error('llm', 'boom');
    expect(logger.allEntries).toHaveLength(0);
  });

  test('the run logger replaces the silent default', () => {
    const logger = initLogger({});
    expect(getLogger()).toBe(logger);
  });
});
