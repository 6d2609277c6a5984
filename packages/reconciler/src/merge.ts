/**
 * Three-way merge used by pull when a base snapshot exists.
 *
 * Cards are matched by remote id across local, remote and base. Local wins
 * every true conflict; conflicts are reported, never blocking.
 */

import { withId, type Card } from '@flashsync/deck';

export type ConflictKind =
  /** Both sides changed the card since the base */
  | 'both-changed'
  /** No base entry and the two sides differ */
  | 'no-base'
  /** Changed locally but deleted remotely; kept as a new card */
  | 'deleted-remotely';

export interface MergeConflict {
  id: string;
  kind: ConflictKind;
  local: Card;
  remote: Card | null;
}

export interface MergeStats {
  keptLocal: number;
  acceptedRemote: number;
  addedRemote: number;
  /** Deleted locally since the base; the remote copy is dropped */
  droppedRemote: number;
  /** Deleted remotely and unchanged locally */
  droppedLocal: number;
  /** Local cards without an id, carried through untouched */
  unsynced: number;
}

export interface MergeResult {
  cards: Card[];
  conflicts: MergeConflict[];
  stats: MergeStats;
}

function indexById(cards: readonly Card[]): Map<string, Card> {
  const map = new Map<string, Card>();
  for (const card of cards) {
    if (card.id) map.set(card.id, card);
  }
  return map;
}

export function mergeThreeWay(
  local: readonly Card[],
  remote: readonly Card[],
  base: readonly Card[]
): MergeResult {
  const remoteById = indexById(remote);
  const baseById = indexById(base);
  const localIds = new Set<string>();
  const cards: Card[] = [];
  const conflicts: MergeConflict[] = [];
  const stats: MergeStats = {
    keptLocal: 0,
    acceptedRemote: 0,
    addedRemote: 0,
    droppedRemote: 0,
    droppedLocal: 0,
    unsynced: 0,
  };

  for (const localCard of local) {
    if (!localCard.id) {
      cards.push(localCard);
      stats.unsynced++;
      continue;
    }

    const id = localCard.id;
    localIds.add(id);
    const remoteCard = remoteById.get(id);
    const baseCard = baseById.get(id);

    if (!remoteCard) {
      if (baseCard && baseCard.contentHash === localCard.contentHash) {
        stats.droppedLocal++;
      } else {
        cards.push(withId(localCard, null));
        conflicts.push({ id, kind: 'deleted-remotely', local: localCard, remote: null });
        stats.keptLocal++;
      }
      continue;
    }

    if (!baseCard) {
      if (remoteCard.contentHash === localCard.contentHash) {
        cards.push(remoteCard);
        stats.acceptedRemote++;
      } else {
        cards.push(localCard);
        conflicts.push({ id, kind: 'no-base', local: localCard, remote: remoteCard });
        stats.keptLocal++;
      }
      continue;
    }

    const localChanged = localCard.contentHash !== baseCard.contentHash;
    const remoteChanged = remoteCard.contentHash !== baseCard.contentHash;

    if (localChanged && remoteChanged && localCard.contentHash !== remoteCard.contentHash) {
      cards.push(localCard);
      conflicts.push({ id, kind: 'both-changed', local: localCard, remote: remoteCard });
      stats.keptLocal++;
    } else if (localChanged) {
      cards.push(localCard);
      stats.keptLocal++;
    } else {
      cards.push(remoteCard);
      stats.acceptedRemote++;
    }
  }

  for (const remoteCard of remote) {
    if (!remoteCard.id || localIds.has(remoteCard.id)) continue;
    if (baseById.has(remoteCard.id)) {
      stats.droppedRemote++;
    } else {
      cards.push(remoteCard);
      stats.addedRemote++;
    }
  }

  return { cards, conflicts, stats };
}
