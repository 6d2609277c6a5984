/**
 * `flashsync pull` command.
 *
 * Downloads a deck into `deck-<name>-<id>.md`. When the file already exists
 * and a base snapshot is available, remote changes are merged in and local
 * edits win conflicts.
 */

import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { pullDeck } from '@flashsync/reconciler';
import { createSpinner } from '../spinner.js';
import { createWorkflowContext, failCommand, openSession, type Session } from '../session.js';

export function registerPullCommand(program: Command): void {
  program
    .command('pull')
    .description('Download a deck from the card service into a Markdown file')
    .argument('<deck>', 'Deck id, or (part of) the deck name')
    .option('-y, --yes', 'Overwrite a deck file with no sync history without asking')
    .action(async (deck: string, options: { yes?: boolean }, command: Command) => {
      const spinner = createSpinner();
      let session: Session | null = null;

      try {
        session = openSession(command, 'pull');
        const ctx = createWorkflowContext(session, spinner, { assumeYes: options.yes });
        const outcome = await pullDeck(ctx, deck, session.projectDir);
        spinner.stop();

        if (outcome.status === 'aborted') {
          console.log(chalk.gray(`\n  Aborted, ${path.basename(outcome.filePath)} left unchanged.\n`));
        } else {
          console.log(
            chalk.green(`\n  ✓ Pulled '${outcome.deck.name}': ${outcome.cards} card(s) in ${path.basename(outcome.filePath)}`)
          );
          if (outcome.merge && outcome.merge.conflicts.length > 0) {
            console.log(
              chalk.yellow(`  ${outcome.merge.conflicts.length} conflict(s) resolved in favour of the local file.`)
            );
          }
          console.log('');
        }
        session.logger.close();
      } catch (error: unknown) {
        await failCommand(spinner, 'Pull failed', error, session);
      }
    });
}
