/**
 * `flashsync dedupe` command.
 *
 * Embeds every card, pairs up cards above the similarity threshold, asks the
 * chat model to classify each pair and lets the user decide which cards to
 * drop. The deck file is written only after a final confirmation; run
 * `flashsync push` afterwards to delete the dropped cards remotely.
 */

import * as path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import {
  AnthropicChatProvider,
  OpenAiEmbeddingProvider,
  type SimilarityBackend,
} from '@flashsync/core';
import { readDeckFile, writeDeckFile, type Card } from '@flashsync/deck';
import {
  CacheStore,
  applyRemovals,
  classifyPairs,
  embedCards,
  findCandidatePairs,
  policyDuplicateChooser,
  resolveDuplicates,
  type ClassifiedPair,
  type DuplicateChooser,
} from '@flashsync/curator';
import { confirm, parseDuplicateChoice, promptChoice } from '../prompt.js';
import { createSpinner } from '../spinner.js';
import { failCommand, openSession, resolveFile, type Session } from '../session.js';

interface DedupeFlags {
  threshold?: number;
  backend?: SimilarityBackend;
  auto?: boolean;
  yes?: boolean;
}

function parseThreshold(value: string): number {
  const threshold = Number(value);
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new InvalidArgumentError('Threshold must be a number between 0 and 1.');
  }
  return threshold;
}

function parseBackend(value: string): SimilarityBackend {
  if (value === 'auto' || value === 'exact' || value === 'indexed') return value;
  throw new InvalidArgumentError('Backend must be one of: auto, exact, indexed.');
}

const CLASSIFICATION_COLOURS: Record<ClassifiedPair['classification'], (s: string) => string> = {
  duplicate: chalk.red,
  complementary: chalk.green,
  unclear: chalk.yellow,
  error: chalk.gray,
};

function printCard(label: string, card: Card): void {
  console.log(chalk.bold(`  ${label}`) + (card.id ? chalk.gray(` [${card.id}]`) : ''));
  console.log(`    Q: ${card.question.replace(/\n/g, '\n       ')}`);
  console.log(`    A: ${card.answer.replace(/\n/g, '\n       ')}`);
}

const interactiveChooser: DuplicateChooser = async (pair, first, second, position) => {
  const colour = CLASSIFICATION_COLOURS[pair.classification];
  console.log(
    chalk.bold(`\n  Pair ${position.current}/${position.total}`) +
      chalk.gray(`  similarity ${pair.score.toFixed(3)}  `) +
      colour(pair.classification)
  );
  console.log(chalk.gray(`  ${pair.reasoning}\n`));
  printCard('Card 1', first);
  printCard('Card 2', second);
  return promptChoice(
    chalk.cyan('\n  [1] keep card 1  [2] keep card 2  [b] keep both  [s] skip  [q] quit: '),
    parseDuplicateChoice
  );
};

export function registerDedupeCommand(program: Command): void {
  program
    .command('dedupe')
    .description('Find and remove semantically duplicate cards in a deck file')
    .argument('<file>', 'Deck file to check')
    .option('--threshold <n>', 'Minimum cosine similarity for a candidate pair', parseThreshold)
    .option('--backend <name>', 'Similarity backend: auto, exact or indexed', parseBackend)
    .option('--auto', 'Keep the first card of every pair classified as duplicate, without prompting')
    .option('-y, --yes', 'Write the result without a final confirmation')
    .action(async (file: string, options: DedupeFlags, command: Command) => {
      const spinner = createSpinner();
      let session: Session | null = null;

      try {
        session = openSession(command, 'dedupe');
        const { config } = session;
        const filePath = resolveFile(session, file);
        const { cards } = readDeckFile(filePath);
        const threshold = options.threshold ?? config.dedupe.threshold;

        const store = CacheStore.fromConfig(session.projectDir, config);
        store.load();

        spinner.start(`Embedding ${cards.length} card(s)...`);
        const vectors = await embedCards(cards, new OpenAiEmbeddingProvider(config), store.embeddings, {
          batchSize: config.embeddings.batchSize,
          onBatch: (done, total) => {
            spinner.text = `Embedding cards... ${done}/${total}`;
          },
        });

        spinner.text = 'Comparing cards...';
        const pairs = findCandidatePairs(vectors, threshold, {
          backend: options.backend ?? config.dedupe.backend,
          topK: config.dedupe.topK,
          indexMinCards: config.dedupe.indexMinCards,
        });

        if (pairs.length === 0) {
          spinner.succeed(`No card pairs at or above similarity ${threshold}`);
          session.logger.close();
          return;
        }

        spinner.text = `Classifying ${pairs.length} candidate pair(s)...`;
        const classified = await classifyPairs(pairs, cards, store.classifications, {
          provider: new AnthropicChatProvider(config),
          windowSize: config.llm.concurrency,
          onWindow: (p) => {
            spinner.text = `Classifying pairs... ${p.completed}/${p.total}`;
          },
        });
        store.flush();

        const tally = new Map<string, number>();
        for (const pair of classified) {
          tally.set(pair.classification, (tally.get(pair.classification) ?? 0) + 1);
        }
        spinner.succeed(
          `${classified.length} candidate pair(s): ` +
            [...tally.entries()].map(([label, n]) => `${n} ${label}`).join(', ')
        );

        const resolution = await resolveDuplicates(
          classified,
          cards,
          options.auto ? policyDuplicateChooser : interactiveChooser
        );
        if (resolution.aborted) {
          console.log(chalk.gray('\n  Aborted, deck file unchanged.\n'));
          session.logger.close();
          return;
        }

        if (resolution.autoSkipped > 0) {
          console.log(chalk.gray(`\n  ${resolution.autoSkipped} pair(s) skipped because a card was already removed.`));
        }

        if (resolution.removed.size === 0) {
          console.log(chalk.green('\n  No cards removed.\n'));
          session.logger.close();
          return;
        }

        const name = path.basename(filePath);
        const proceed =
          options.yes || (await confirm(`Remove ${resolution.removed.size} card(s) from ${name}?`));
        if (!proceed) {
          console.log(chalk.gray('\n  Aborted, deck file unchanged.\n'));
          session.logger.close();
          return;
        }

        writeDeckFile(filePath, applyRemovals(cards, resolution.removed));
        console.log(chalk.green(`\n  ✓ Removed ${resolution.removed.size} card(s) from ${name}`));
        console.log(chalk.gray(`  Run 'flashsync push ${file}' to delete them on the card service.\n`));
        session.logger.close();
      } catch (error: unknown) {
        await failCommand(spinner, 'Dedupe failed', error, session);
      }
    });
}
