#!/usr/bin/env tsx

/**
 * @flashsync/cli - Command-line entry point.
 *
 * Mirrors flashcard decks to Markdown files, reconciles them with the card
 * service and runs the dedupe and curation pipelines.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

// Load .env from the working directory. Existing variables win.
function loadDotenv(dir: string): void {
  const envPath = path.resolve(dir, '.env');
  if (!fs.existsSync(envPath)) return;

  const content = fs.readFileSync(envPath, 'utf-8');
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    let value = trimmed.slice(eqIdx + 1).trim();
    // Strip surrounding quotes
    if ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

loadDotenv(process.cwd());

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { registerInitCommand } from './commands/init.js';
import { registerDecksCommand } from './commands/decks.js';
import { registerPullCommand } from './commands/pull.js';
import { registerPushCommand } from './commands/push.js';
import { registerSyncCommand } from './commands/sync.js';
import { registerDedupeCommand } from './commands/dedupe.js';
import { registerCurateCommand } from './commands/curate.js';
import { registerCacheCommand } from './commands/cache.js';

const program = new Command();

program
  .name('flashsync')
  .version('0.1.0')
  .description('Keep flashcard decks as Markdown files in sync with your card service')
  .option('--path <dir>', 'Project directory (deck files, .flashsync.yml, caches)', '.')
  .option('--verbose', 'Echo debug logs to stderr');

registerInitCommand(program);
registerDecksCommand(program);
registerPullCommand(program);
registerPushCommand(program);
registerSyncCommand(program);
registerDedupeCommand(program);
registerCurateCommand(program);
registerCacheCommand(program);

// Global error handler
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // Commander has already printed usage errors; help and version exit cleanly
      process.exit(error.exitCode);
    }
    console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : String(error)}`));
    if (process.env.FLASHSYNC_DEBUG && error instanceof Error) {
      console.error(chalk.gray(error.stack ?? ''));
    }
    process.exit(1);
  }
}

void main();
