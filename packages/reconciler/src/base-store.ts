/**
 * Base snapshots: the remote state of a deck as of the last push, sync or
 * pull, kept as the common ancestor for three-way merges.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { getLogger, now, writeFileAtomic } from '@flashsync/core';
import { createCard, type Card } from '@flashsync/deck';

const snapshotSchema = z.object({
  deckId: z.string(),
  savedAt: z.string(),
  cards: z.array(
    z.object({
      id: z.string(),
      question: z.string(),
      answer: z.string(),
      tags: z.array(z.string()).default([]),
      archived: z.boolean().default(false),
    })
  ),
});

export class BaseStore {
  constructor(private readonly dir: string) {}

  pathFor(deckId: string): string {
    return path.join(this.dir, `${deckId}.json`);
  }

  /**
   * The stored snapshot, or null when there is none or it cannot be read.
   */
  load(deckId: string): Card[] | null {
    const filePath = this.pathFor(deckId);
    if (!fs.existsSync(filePath)) return null;

    try {
      const parsed = snapshotSchema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
      if (!parsed.success) {
        getLogger().warn('base', `Ignoring malformed base snapshot ${filePath}`);
        return null;
      }
      return parsed.data.cards.map((c) => createCard(c));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      getLogger().warn('base', `Cannot read base snapshot ${filePath}: ${message}`);
      return null;
    }
  }

  /** Store the cards that carry an id; id-less cards are not remote state. */
  save(deckId: string, cards: readonly Card[]): void {
    const snapshot = {
      deckId,
      savedAt: now(),
      cards: cards.flatMap((c) =>
        c.id ? [{ id: c.id, question: c.question, answer: c.answer, tags: c.tags, archived: c.archived }] : []
      ),
    };
    writeFileAtomic(this.pathFor(deckId), JSON.stringify(snapshot, null, 2) + '\n');
    getLogger().debug('base', `Saved base snapshot for ${deckId}`, { cards: snapshot.cards.length });
  }
}
