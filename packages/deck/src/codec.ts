/**
 * Markdown deck codec.
 *
 * A deck file is a sequence of blocks separated by `---` lines. Each card is
 * three consecutive blocks: frontmatter, question, answer.
 *
 *     ---
 *     card_id: AbCd1234
 *     tags: ["biology"]
 *     ---
 *     What is a ribosome?
 *     ---
 *     The site of protein synthesis.
 *
 * Empty blocks and blocks starting with `#` (headings) are skipped without
 * advancing the parser, so decks may carry titles and notes between cards.
 */

import { createCard, DELIMITER, type Card } from './card.js';

type ParseState = 'expectFrontmatter' | 'expectQuestion' | 'expectAnswer';

interface Frontmatter {
  id: string | null;
  tags: string[];
  archived: boolean;
}

/** Split text into trimmed blocks at delimiter lines */
function splitBlocks(text: string): string[] {
  const blocks: string[] = [];
  let current: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === DELIMITER) {
      blocks.push(current.join('\n').trim());
      current = [];
    } else {
      current.push(line);
    }
  }
  blocks.push(current.join('\n').trim());
  return blocks;
}

function parseTags(value: string | undefined): string[] {
  if (!value) return [];
  try {
    const parsed: unknown = JSON.parse(value);
    if (Array.isArray(parsed) && parsed.every((t): t is string => typeof t === 'string')) {
      return parsed;
    }
  } catch {
    // malformed tags read as no tags
  }
  return [];
}

function parseFrontmatter(block: string): Frontmatter {
  const fields = new Map<string, string>();
  for (const raw of block.split('\n')) {
    const line = raw.trim();
    const colon = line.indexOf(':');
    if (colon === -1) continue;
    fields.set(line.slice(0, colon).trim(), line.slice(colon + 1).trim());
  }

  const idValue = fields.get('card_id') ?? '';
  const id = ['null', 'none', ''].includes(idValue.toLowerCase()) ? null : idValue;

  return {
    id,
    tags: parseTags(fields.get('tags')),
    archived: (fields.get('archived') ?? 'false').toLowerCase() === 'true',
  };
}

/**
 * Parse a deck file into cards, in file order. A trailing incomplete card is
 * ignored. Never throws; validation happens in `readDeckFile`.
 */
export function parseDeck(text: string): Card[] {
  const cards: Card[] = [];
  let state: ParseState = 'expectFrontmatter';
  let frontmatter: Frontmatter = { id: null, tags: [], archived: false };
  let question = '';

  for (const block of splitBlocks(text)) {
    if (!block || block.startsWith('#')) continue;

    switch (state) {
      case 'expectFrontmatter':
        frontmatter = parseFrontmatter(block);
        state = 'expectQuestion';
        break;
      case 'expectQuestion':
        question = block;
        state = 'expectAnswer';
        break;
      case 'expectAnswer':
        cards.push(createCard({ ...frontmatter, question, answer: block }));
        frontmatter = { id: null, tags: [], archived: false };
        question = '';
        state = 'expectFrontmatter';
        break;
    }
  }

  return cards;
}

/** Render one card as a block sequence (no trailing newline) */
export function serializeCard(card: Card): string {
  const lines = [DELIMITER, `card_id: ${card.id ?? 'null'}`];
  if (card.tags.length > 0) {
    lines.push(`tags: ${JSON.stringify(card.tags)}`);
  }
  if (card.archived) {
    lines.push('archived: true');
  }
  lines.push(DELIMITER, card.question, DELIMITER, card.answer);
  return lines.join('\n');
}

export function serializeDeck(cards: readonly Card[]): string {
  return cards.map((card) => serializeCard(card) + '\n').join('');
}
