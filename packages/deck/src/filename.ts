/**
 * Deck file naming: `deck-<name>-<deckId>.md`, or `deck-<name>.md` for a deck
 * that does not exist remotely yet.
 */

import * as path from 'node:path';
import { ValidationError } from '@flashsync/core';

export const DECK_FILE_PREFIX = 'deck-';
export const DECK_FILE_EXT = '.md';

export interface DeckRef {
  /** Remote deck id, or null for a deck not yet created */
  deckId: string | null;
  deckName: string;
}

/** Lower-case, drop punctuation, collapse whitespace/hyphen runs into one hyphen */
export function sanitizeDeckName(name: string): string {
  return name
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/[-\s]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .toLowerCase();
}

export function deckFileName(deckName: string, deckId: string | null): string {
  const base = `${DECK_FILE_PREFIX}${sanitizeDeckName(deckName)}`;
  return deckId ? `${base}-${deckId}${DECK_FILE_EXT}` : `${base}${DECK_FILE_EXT}`;
}

/** True for an 8-char alphanumeric token with both upper- and lower-case letters */
export function looksLikeDeckId(token: string): boolean {
  return /^[A-Za-z0-9]{8}$/.test(token) && /[A-Z]/.test(token) && /[a-z]/.test(token);
}

function stemOf(filePath: string): string {
  const base = path.basename(filePath);
  const stem = base.endsWith(DECK_FILE_EXT) ? base.slice(0, -DECK_FILE_EXT.length) : base;
  if (!stem.startsWith(DECK_FILE_PREFIX) || stem.length === DECK_FILE_PREFIX.length) {
    throw new ValidationError(
      `Invalid filename format. Expected: deck-<name>-<deck_id>.md or deck-<name>.md, got: ${base}`,
      filePath
    );
  }
  return stem.slice(DECK_FILE_PREFIX.length);
}

/**
 * Parse a deck filename. The last hyphen-separated token is the remote id
 * only if it looks like one; otherwise it belongs to the name.
 */
export function parseDeckFileName(filePath: string): DeckRef {
  const rest = stemOf(filePath);
  const parts = rest.split('-');
  if (parts.length > 1) {
    const candidate = parts[parts.length - 1];
    if (looksLikeDeckId(candidate)) {
      return { deckId: candidate, deckName: parts.slice(0, -1).join('-') };
    }
  }
  return { deckId: null, deckName: rest };
}

export function extractDeckId(filePath: string): string | null {
  return parseDeckFileName(filePath).deckId;
}

export function deckNameFromFileName(filePath: string): string {
  return parseDeckFileName(filePath).deckName;
}
