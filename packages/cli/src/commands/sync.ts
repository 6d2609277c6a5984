/**
 * `flashsync sync` command.
 *
 * Bidirectional: local edits go up, and cards deleted on the card service
 * are removed from the file. Only works for decks that already exist
 * remotely.
 */

import { Command } from 'commander';
import { syncDeckFile } from '@flashsync/reconciler';
import { createSpinner } from '../spinner.js';
import { createWorkflowContext, failCommand, openSession, resolveFile, type Session } from '../session.js';
import { printOutcome } from './push.js';

export function registerSyncCommand(program: Command): void {
  program
    .command('sync')
    .description('Reconcile a deck file with the card service in both directions')
    .argument('<file>', 'Deck file to sync (its name must carry the deck id)')
    .option('--force', 'Create cards even when identical content already exists remotely')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (file: string, options: { force?: boolean; yes?: boolean }, command: Command) => {
      const spinner = createSpinner();
      let session: Session | null = null;

      try {
        session = openSession(command, 'sync');
        const ctx = createWorkflowContext(session, spinner);
        const outcome = await syncDeckFile(ctx, resolveFile(session, file), {
          force: options.force,
          yes: options.yes,
        });
        spinner.stop();
        const ok = printOutcome(outcome);
        console.log('');
        session.logger.close();
        if (!ok) process.exitCode = 1;
      } catch (error: unknown) {
        await failCommand(spinner, 'Sync failed', error, session);
      }
    });
}
