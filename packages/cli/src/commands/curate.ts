/**
 * `flashsync curate` command.
 *
 * Grades every card, asks for rewrites of the ones below the minimum score
 * and walks the user through accepting, keeping or removing them.
 */

import * as path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { AnthropicChatProvider } from '@flashsync/core';
import { readDeckFile, writeDeckFile } from '@flashsync/deck';
import {
  CacheStore,
  applyRemovals,
  applyRewrites,
  gradeCards,
  improveCards,
  resolveQuality,
  type QualityChooser,
} from '@flashsync/curator';
import { confirm, parseQualityChoice, promptChoice } from '../prompt.js';
import { createSpinner } from '../spinner.js';
import { failCommand, openSession, resolveFile, type Session } from '../session.js';

function parseMinScore(value: string): number {
  const score = Number(value);
  if (!Number.isInteger(score) || score < 0 || score > 10) {
    throw new InvalidArgumentError('Minimum score must be an integer from 0 to 10.');
  }
  return score;
}

function scoreColour(score: number): (s: string) => string {
  if (score >= 7) return chalk.green;
  if (score >= 4) return chalk.yellow;
  return chalk.red;
}

const interactiveChooser: QualityChooser = async (review, position) => {
  const { card, grade, improvement } = review;
  console.log(
    chalk.bold(`\n  Card ${review.index + 1} (${position.current}/${position.total})  `) +
      scoreColour(grade.score)(`${grade.score}/10`)
  );
  console.log(chalk.gray(`  ${grade.reasoning}\n`));
  console.log(`    Q: ${card.question.replace(/\n/g, '\n       ')}`);
  console.log(`    A: ${card.answer.replace(/\n/g, '\n       ')}`);

  if (improvement) {
    console.log(chalk.cyan('\n  Suggested rewrite:'));
    console.log(chalk.cyan(`    Q: ${improvement.question.replace(/\n/g, '\n       ')}`));
    console.log(chalk.cyan(`    A: ${improvement.answer.replace(/\n/g, '\n       ')}`));
  } else {
    console.log(chalk.gray('\n  No rewrite available.'));
  }

  const options = improvement
    ? '[a] accept rewrite  [k] keep  [r] remove  [s] skip  [q] quit: '
    : '[k] keep  [r] remove  [s] skip  [q] quit: ';
  return promptChoice(chalk.cyan(`\n  ${options}`), parseQualityChoice);
};

export function registerCurateCommand(program: Command): void {
  program
    .command('curate')
    .description('Grade card quality and review suggested rewrites')
    .argument('<file>', 'Deck file to curate')
    .option('--min-score <n>', 'Cards scoring below this get a suggested rewrite', parseMinScore)
    .option('-y, --yes', 'Write the result without a final confirmation')
    .action(async (file: string, options: { minScore?: number; yes?: boolean }, command: Command) => {
      const spinner = createSpinner();
      let session: Session | null = null;

      try {
        session = openSession(command, 'curate');
        const { config } = session;
        const filePath = resolveFile(session, file);
        const { cards } = readDeckFile(filePath);
        const minScore = options.minScore ?? config.curate.minScore;

        const store = CacheStore.fromConfig(session.projectDir, config);
        store.load();
        const provider = new AnthropicChatProvider(config);

        spinner.start(`Grading ${cards.length} card(s)...`);
        const graded = await gradeCards(cards, store.gradings, {
          provider,
          windowSize: config.llm.concurrency,
          onWindow: (p) => {
            spinner.text = `Grading cards... ${p.completed}/${p.total}`;
          },
        });
        store.flush();

        const failed = graded.filter((g) => g.failed).length;
        const scored = graded.filter((g) => !g.failed);
        const average = scored.length > 0 ? scored.reduce((sum, g) => sum + g.grade.score, 0) / scored.length : 0;
        spinner.succeed(
          `Graded ${scored.length} card(s), average ${average.toFixed(1)}/10` +
            (failed > 0 ? chalk.yellow(` (${failed} could not be graded)`) : '')
        );

        const below = scored.filter((g) => g.grade.score < minScore).length;
        if (below === 0) {
          console.log(chalk.green(`\n  Every graded card scored ${minScore} or more.\n`));
          session.logger.close();
          return;
        }

        spinner.start(`Suggesting rewrites for ${below} card(s)...`);
        const reviews = await improveCards(graded, minScore, {
          provider,
          windowSize: config.llm.concurrency,
          onWindow: (p) => {
            spinner.text = `Suggesting rewrites... ${p.completed}/${p.total}`;
          },
        });
        spinner.stop();

        const resolution = await resolveQuality(reviews, interactiveChooser);
        if (resolution.aborted) {
          console.log(chalk.gray('\n  Aborted, deck file unchanged.\n'));
          session.logger.close();
          return;
        }

        const { rewrites, removed } = resolution;
        if (rewrites.size === 0 && removed.size === 0) {
          console.log(chalk.green('\n  No changes.\n'));
          session.logger.close();
          return;
        }

        const name = path.basename(filePath);
        const proceed =
          options.yes ||
          (await confirm(`Rewrite ${rewrites.size} and remove ${removed.size} card(s) in ${name}?`));
        if (!proceed) {
          console.log(chalk.gray('\n  Aborted, deck file unchanged.\n'));
          session.logger.close();
          return;
        }

        // Rewrites are keyed by original position, so apply them before removing
        writeDeckFile(filePath, applyRemovals(applyRewrites(cards, rewrites), removed));
        console.log(chalk.green(`\n  ✓ Updated ${name}: ${rewrites.size} rewritten, ${removed.size} removed`));
        console.log(chalk.gray(`  Run 'flashsync push ${file}' to upload the changes.\n`));
        session.logger.close();
      } catch (error: unknown) {
        await failCommand(spinner, 'Curate failed', error, session);
      }
    });
}
