/**
 * `flashsync decks` command. Lists the decks on the card service.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createCardService } from '@flashsync/remote';
import { createSpinner } from '../spinner.js';
import { failCommand, openSession, type Session } from '../session.js';

export function registerDecksCommand(program: Command): void {
  program
    .command('decks')
    .description('List the decks available on the card service')
    .option('--json', 'Output the list as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      const spinner = createSpinner();
      let session: Session | null = null;

      try {
        session = openSession(command, 'decks');
        if (!options.json) spinner.start('Fetching decks...');
        const decks = await createCardService(session.config).listDecks();
        const sorted = [...decks].sort((a, b) => a.name.localeCompare(b.name));
        spinner.stop();

        if (options.json) {
          console.log(JSON.stringify(sorted, null, 2));
        } else if (sorted.length === 0) {
          console.log(chalk.gray('\n  No decks found.\n'));
        } else {
          const width = Math.max(...sorted.map((d) => d.name.length));
          console.log(chalk.bold(`\n  ${sorted.length} deck(s):\n`));
          for (const deck of sorted) {
            console.log(`    ${deck.name.padEnd(width)}  ${chalk.gray(deck.id)}`);
          }
          console.log(chalk.gray(`\n  Download one with: flashsync pull <name or id>\n`));
        }
        session.logger.close();
      } catch (error: unknown) {
        await failCommand(spinner, 'Could not list decks', error, session);
      }
    });
}
