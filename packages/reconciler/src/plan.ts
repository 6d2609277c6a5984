/**
 * Push and sync planning.
 *
 * A plan is computed from the local deck and the live remote snapshot
 * before anything is written, so the caller can show it and ask for
 * confirmation. Planning never touches the network.
 */

import { InconsistencyError } from '@flashsync/core';
import { createCard, parseRemoteContent, type Card } from '@flashsync/deck';
import type { RemoteCard } from '@flashsync/remote';

// ─── Types ──────────────────────────────────────────────────────────

export interface RemoteIndex {
  byId: Map<string, Card>;
  /** Content hash to the id of a remote card carrying it */
  hashToId: Map<string, string>;
}

/** An id-less local card whose content already exists remotely */
export interface DuplicateMatch {
  card: Card;
  remoteId: string;
}

export interface OperationSet {
  toCreate: Card[];
  toUpdate: Card[];
  toDeleteRemote: string[];
  /** Sync only: local cards whose remote counterpart is gone */
  toDeleteLocal: Card[];
  duplicates: DuplicateMatch[];
}

export interface PlanSummary {
  create: number;
  update: number;
  deleteRemote: number;
  deleteLocal: number;
  duplicates: number;
}

export type PlanMode = 'push' | 'sync';

// ─── Remote snapshot ────────────────────────────────────────────────

export function cardFromRemote(remote: RemoteCard): Card {
  const { question, answer } = parseRemoteContent(remote.content);
  return createCard({
    id: remote.id,
    question,
    answer,
    tags: remote.tags,
    archived: remote.archived,
  });
}

export function buildRemoteIndex(remoteCards: readonly Card[]): RemoteIndex {
  const byId = new Map<string, Card>();
  const hashToId = new Map<string, string>();
  for (const card of remoteCards) {
    if (!card.id) continue;
    byId.set(card.id, card);
    if (!hashToId.has(card.contentHash)) {
      hashToId.set(card.contentHash, card.id);
    }
  }
  return { byId, hashToId };
}

// ─── Planning ───────────────────────────────────────────────────────

function plan(local: readonly Card[], remote: RemoteIndex, mode: PlanMode): OperationSet {
  const result: OperationSet = {
    toCreate: [],
    toUpdate: [],
    toDeleteRemote: [],
    toDeleteLocal: [],
    duplicates: [],
  };
  const missing: Card[] = [];
  const localIds = new Set<string>();

  for (const card of local) {
    if (card.id) {
      localIds.add(card.id);
      const remoteCard = remote.byId.get(card.id);
      if (!remoteCard) {
        missing.push(card);
      } else if (remoteCard.contentHash !== card.contentHash) {
        result.toUpdate.push(card);
      }
      continue;
    }

    const remoteId = remote.hashToId.get(card.contentHash);
    if (remoteId) {
      result.duplicates.push({ card, remoteId });
    } else {
      result.toCreate.push(card);
    }
  }

  if (missing.length > 0) {
    if (mode === 'push') {
      throw new InconsistencyError(
        missing.map((c) => ({ id: c.id ?? '', question: c.question }))
      );
    }
    result.toDeleteLocal = missing;
  }

  for (const id of remote.byId.keys()) {
    if (!localIds.has(id)) result.toDeleteRemote.push(id);
  }

  return result;
}

/**
 * Plan a one-way push. Local ids missing remotely are fatal: push must not
 * be used to reconcile deletions made on the remote side.
 */
export function planPush(local: readonly Card[], remote: RemoteIndex): OperationSet {
  return plan(local, remote, 'push');
}

/** Plan a bidirectional sync. Local ids missing remotely are removed locally. */
export function planSync(local: readonly Card[], remote: RemoteIndex): OperationSet {
  return plan(local, remote, 'sync');
}

export function summarizePlan(plan: OperationSet): PlanSummary {
  return {
    create: plan.toCreate.length,
    update: plan.toUpdate.length,
    deleteRemote: plan.toDeleteRemote.length,
    deleteLocal: plan.toDeleteLocal.length,
    duplicates: plan.duplicates.length,
  };
}

/** True when applying the plan would change nothing (duplicates aside) */
export function planIsEmpty(plan: OperationSet): boolean {
  return (
    plan.toCreate.length === 0 &&
    plan.toUpdate.length === 0 &&
    plan.toDeleteRemote.length === 0 &&
    plan.toDeleteLocal.length === 0
  );
}
