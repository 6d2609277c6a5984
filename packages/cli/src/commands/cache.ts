/**
 * `flashsync cache` command: inspect or clear the embedding,
 * classification and grading caches.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { CACHE_DOMAINS, CacheStore, isCacheDomain, type CacheDomain } from '@flashsync/curator';
import { confirm } from '../prompt.js';
import { createSpinner } from '../spinner.js';
import { failCommand, openSession, type Session } from '../session.js';

function parseDomain(value: string): CacheDomain {
  if (isCacheDomain(value)) return value;
  throw new InvalidArgumentError(`Cache must be one of: ${CACHE_DOMAINS.join(', ')}.`);
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function registerCacheCommand(program: Command): void {
  const cache = program.command('cache').description('Inspect or clear the result caches');

  cache
    .command('stats')
    .description('Show entry counts and file sizes')
    .action(async (_options: unknown, command: Command) => {
      const spinner = createSpinner();
      let session: Session | null = null;

      try {
        session = openSession(command, 'cache');
        const store = CacheStore.fromConfig(session.projectDir, session.config);
        store.load();

        console.log(chalk.bold(`\n  Caches in ${store.dir}:\n`));
        for (const stat of store.stats()) {
          console.log(
            `    ${stat.domain.padEnd(16)} ${chalk.cyan(String(stat.entries).padStart(6))} entries  ` +
              chalk.gray(formatBytes(stat.bytes))
          );
        }
        console.log('');
        session.logger.close();
      } catch (error: unknown) {
        await failCommand(spinner, 'Could not read caches', error, session);
      }
    });

  cache
    .command('clear')
    .description('Delete one cache, or all of them')
    .argument('[domain]', `One of: ${CACHE_DOMAINS.join(', ')}`, parseDomain)
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (domain: CacheDomain | undefined, options: { yes?: boolean }, command: Command) => {
      const spinner = createSpinner();
      let session: Session | null = null;

      try {
        session = openSession(command, 'cache');
        const store = CacheStore.fromConfig(session.projectDir, session.config);
        const what = domain ? `the ${domain} cache` : 'all caches';

        if (!options.yes && !(await confirm(`Delete ${what}?`))) {
          console.log(chalk.gray('\n  Aborted.\n'));
          session.logger.close();
          return;
        }

        const cleared = store.clear(domain);
        console.log(chalk.green(`\n  ✓ Cleared ${cleared.join(', ')}\n`));
        session.logger.close();
      } catch (error: unknown) {
        await failCommand(spinner, 'Could not clear caches', error, session);
      }
    });
}
