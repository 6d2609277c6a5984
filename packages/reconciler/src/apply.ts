/**
 * Apply a plan against the card service.
 *
 * Order: creates, updates, remote deletes, then local removals. Remote calls
 * are sequential. New ids come only from the creation responses.
 */

import { RemoteError, getLogger, truncate } from '@flashsync/core';
import { formatRemoteContent, withId, type Card } from '@flashsync/deck';
import type { CardService } from '@flashsync/remote';
import type { DuplicateMatch, OperationSet } from './plan.js';

export interface ApplyOptions {
  /** Create id-less cards even when their content already exists remotely */
  force?: boolean;
}

export interface ApplyCounts {
  created: number;
  updated: number;
  deletedRemote: number;
  deletedLocal: number;
}

export type ApplyResult =
  | { blocked: 'duplicates'; duplicates: DuplicateMatch[] }
  | { blocked: null; cards: Card[]; counts: ApplyCounts };

/**
 * A remote call failed part way through. `appliedCards` is the local deck
 * with every id created before the failure, so the caller can persist it.
 */
export class PartialApplyError extends RemoteError {
  constructor(
    cause: RemoteError,
    readonly appliedCards: Card[],
    readonly counts: ApplyCounts
  ) {
    super(cause.status, cause.body, cause.url, cause.method);
    this.name = 'PartialApplyError';
  }
}

export async function applyPlan(
  service: CardService,
  deckId: string,
  local: readonly Card[],
  plan: OperationSet,
  options: ApplyOptions = {}
): Promise<ApplyResult> {
  if (plan.duplicates.length > 0 && !options.force) {
    return { blocked: 'duplicates', duplicates: plan.duplicates };
  }

  const log = getLogger();
  const counts: ApplyCounts = { created: 0, updated: 0, deletedRemote: 0, deletedLocal: 0 };
  const toCreate = new Set<Card>([...plan.toCreate, ...plan.duplicates.map((d) => d.card)]);
  const assigned = new Map<Card, string>();

  const currentCards = (): Card[] =>
    local.map((card) => {
      const id = assigned.get(card);
      return id ? withId(card, id) : card;
    });

  try {
    // Local order, not plan order, so forced duplicates land where they sit in the file
    for (const card of local) {
      if (!toCreate.has(card)) continue;
      const created = await service.createCard(deckId, formatRemoteContent(card.question, card.answer), {
        ...(card.tags.length > 0 ? { tags: card.tags } : {}),
        ...(card.archived ? { archived: true } : {}),
      });
      assigned.set(card, created.id);
      counts.created++;
      log.info('push', `Created ${created.id}: ${truncate(card.question, 50)}`);
    }

    for (const card of plan.toUpdate) {
      if (!card.id) continue;
      await service.updateCard(card.id, {
        content: formatRemoteContent(card.question, card.answer),
        tags: card.tags,
        archived: card.archived,
      });
      counts.updated++;
      log.info('push', `Updated ${card.id}: ${truncate(card.question, 50)}`);
    }

    for (const id of plan.toDeleteRemote) {
      await service.deleteCard(id);
      counts.deletedRemote++;
      log.info('push', `Deleted ${id}`);
    }
  } catch (error) {
    if (error instanceof RemoteError) {
      log.error('push', `Stopped after a remote failure: ${error.message}`, { ...counts });
      throw new PartialApplyError(error, currentCards(), counts);
    }
    throw error;
  }

  const dropped = new Set(plan.toDeleteLocal);
  const cards = currentCards().filter((_, idx) => !dropped.has(local[idx]));
  counts.deletedLocal = local.length - cards.length;

  return { blocked: null, cards, counts };
}
