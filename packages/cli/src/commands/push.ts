/**
 * `flashsync push` command.
 *
 * One-way upload: the local deck file is the source of truth. Without a
 * file argument every `deck-*.md` in the project directory is pushed.
 */

import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import {
  pushAllDeckFiles,
  pushDeckFile,
  type BatchPushOutcome,
  type ReconcileOutcome,
} from '@flashsync/reconciler';
import { formatCounts } from '../render.js';
import { createSpinner } from '../spinner.js';
import { createWorkflowContext, failCommand, openSession, resolveFile, type Session } from '../session.js';

interface ReconcileFlags {
  force?: boolean;
  yes?: boolean;
}

/**
 * Print the result of a push or sync. Returns false when the command
 * should exit non-zero.
 */
export function printOutcome(outcome: ReconcileOutcome): boolean {
  const name = path.basename(outcome.filePath);
  switch (outcome.status) {
    case 'applied':
      console.log(chalk.green(`\n  ✓ ${name}: ${outcome.counts ? formatCounts(outcome.counts) : 'done'}`));
      return true;
    case 'up-to-date':
      console.log(chalk.green(`\n  ✓ ${name} is already up to date`));
      return true;
    case 'aborted':
      console.log(chalk.gray(`\n  Aborted, nothing changed.`));
      return true;
    case 'blocked':
      console.log(chalk.yellow(`\n  Nothing pushed. Remove the duplicates or re-run with --force to create them anyway.`));
      return false;
  }
}

function printBatch(outcomes: BatchPushOutcome[]): boolean {
  let ok = true;
  console.log(chalk.bold('\n  Results:'));
  for (const { filePath, outcome, error } of outcomes) {
    const name = path.basename(filePath);
    if (error !== null) {
      ok = false;
      console.log(chalk.red(`    ✗ ${name}: ${error}`));
    } else if (outcome) {
      const detail =
        outcome.status === 'applied' && outcome.counts ? formatCounts(outcome.counts) : outcome.status;
      if (outcome.status === 'blocked') ok = false;
      console.log(`    ${outcome.status === 'blocked' ? chalk.yellow('!') : chalk.green('✓')} ${name}: ${chalk.gray(detail)}`);
    }
  }
  return ok;
}

export function registerPushCommand(program: Command): void {
  program
    .command('push')
    .description('Upload local deck changes to the card service')
    .argument('[file]', 'Deck file to push (default: every deck-*.md in the project directory)')
    .option('--force', 'Create cards even when identical content already exists remotely')
    .option('-y, --yes', 'Skip confirmation prompts')
    .action(async (file: string | undefined, options: ReconcileFlags, command: Command) => {
      const spinner = createSpinner();
      let session: Session | null = null;

      try {
        session = openSession(command, 'push');
        const ctx = createWorkflowContext(session, spinner);
        const flags = { force: options.force, yes: options.yes };

        let ok: boolean;
        if (file) {
          const outcome = await pushDeckFile(ctx, resolveFile(session, file), flags);
          spinner.stop();
          ok = printOutcome(outcome);
        } else {
          const outcomes = await pushAllDeckFiles(ctx, session.projectDir, flags);
          spinner.stop();
          if (outcomes === null) {
            console.log(chalk.gray(`\n  Aborted, nothing changed.`));
            ok = true;
          } else {
            ok = printBatch(outcomes);
          }
        }

        console.log('');
        session.logger.close();
        if (!ok) process.exitCode = 1;
      } catch (error: unknown) {
        await failCommand(spinner, 'Push failed', error, session);
      }
    });
}
