/**
 * Deck file IO: validated reads, atomic writes, discovery and renames.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ValidationError, getLogger, writeFileAtomic } from '@flashsync/core';
import { cardProblems, type Card } from './card.js';
import { parseDeck, serializeDeck } from './codec.js';
import {
  DECK_FILE_EXT,
  DECK_FILE_PREFIX,
  deckFileName,
  parseDeckFileName,
  type DeckRef,
} from './filename.js';

export interface DeckFile {
  filePath: string;
  deck: DeckRef;
  cards: Card[];
}

/**
 * Read and validate a deck file. Every structural problem is a
 * ValidationError; nothing is read from the remote side here.
 */
export function readDeckFile(filePath: string): DeckFile {
  if (!fs.existsSync(filePath)) {
    throw new ValidationError(`Deck file not found: ${filePath}`, filePath);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Cannot read file ${filePath}: ${message}`, filePath);
  }

  if (!content.trim()) {
    throw new ValidationError(`Deck file is empty: ${filePath}`, filePath);
  }

  const deck = parseDeckFileName(filePath);
  const cards = parseDeck(content);

  if (cards.length === 0) {
    throw new ValidationError(`No cards found in deck file: ${filePath}`, filePath);
  }

  cards.forEach((card, idx) => {
    const problems = cardProblems(card);
    if (problems.length > 0) {
      throw new ValidationError(`Card ${idx + 1}: ${problems.join(', ')}`, filePath);
    }
  });

  const seen = new Set<string>();
  cards.forEach((card, idx) => {
    if (!card.id) return;
    if (seen.has(card.id)) {
      throw new ValidationError(`Card ${idx + 1}: Duplicate card_id ${card.id}`, filePath);
    }
    seen.add(card.id);
  });

  getLogger().debug('deck', `Read ${cards.length} cards from ${filePath}`, {
    deckId: deck.deckId,
  });
  return { filePath, deck, cards };
}

/** Replace the deck file's contents in one step */
export function writeDeckFile(filePath: string, cards: readonly Card[]): void {
  writeFileAtomic(filePath, serializeDeck(cards));
  getLogger().info('deck', `Wrote ${cards.length} cards to ${filePath}`);
}

/** `deck-*.md` files directly inside `dir`, sorted by name */
export function findDeckFiles(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter(
      (entry) =>
        entry.isFile() &&
        entry.name.startsWith(DECK_FILE_PREFIX) &&
        entry.name.endsWith(DECK_FILE_EXT)
    )
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

/**
 * Rename a deck file to carry its (new) remote id. Returns the new path.
 */
export function renameDeckFile(filePath: string, deckName: string, deckId: string): string {
  const target = path.join(path.dirname(filePath), deckFileName(deckName, deckId));
  if (target !== filePath) {
    if (fs.existsSync(target)) {
      throw new ValidationError(`Cannot rename ${filePath}: ${target} already exists`, filePath);
    }
    fs.renameSync(filePath, target);
    getLogger().info('deck', `Renamed ${path.basename(filePath)} to ${path.basename(target)}`);
  }
  return target;
}
