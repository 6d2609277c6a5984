/**
 * Command workflows: pull, push, push-all and sync.
 *
 * Every workflow computes its plan before the first write and asks through
 * `confirm` before mutating anything; `report` receives progress and plan
 * events for the caller to render. Nothing here prints.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { FlashsyncError, ValidationError, describeError, getLogger } from '@flashsync/core';
import {
  cardProblems,
  deckFileName,
  extractDeckId,
  findDeckFiles,
  looksLikeDeckId,
  readDeckFile,
  renameDeckFile,
  writeDeckFile,
  type Card,
} from '@flashsync/deck';
import { findDeck, type CardService, type RemoteDeck } from '@flashsync/remote';
import { applyPlan, PartialApplyError, type ApplyCounts, type ApplyResult } from './apply.js';
import type { BaseStore } from './base-store.js';
import { mergeThreeWay, type MergeResult } from './merge.js';
import {
  buildRemoteIndex,
  cardFromRemote,
  planIsEmpty,
  planPush,
  planSync,
  summarizePlan,
  type DuplicateMatch,
  type OperationSet,
  type PlanMode,
  type PlanSummary,
} from './plan.js';

// ─── Types ──────────────────────────────────────────────────────────

export type WorkflowEvent =
  | { type: 'step'; message: string }
  | { type: 'validated'; filePath: string; cards: number }
  | { type: 'plan'; mode: PlanMode; plan: OperationSet; summary: PlanSummary }
  | { type: 'duplicates'; duplicates: DuplicateMatch[] }
  | { type: 'deck-created'; deck: RemoteDeck; filePath: string }
  | { type: 'merged'; result: MergeResult }
  | { type: 'deck-files'; files: string[] };

export interface WorkflowContext {
  service: CardService;
  baseStore: BaseStore;
  /** Ask a yes/no question; false means no mutation may happen */
  confirm: (question: string) => Promise<boolean>;
  report: (event: WorkflowEvent) => void;
}

export interface ReconcileOptions {
  force?: boolean;
  /** Skip the confirmation prompt */
  yes?: boolean;
}

export type ReconcileStatus = 'applied' | 'up-to-date' | 'blocked' | 'aborted';

export interface ReconcileOutcome {
  status: ReconcileStatus;
  /** Final path of the deck file (renamed when a deck was created) */
  filePath: string;
  deckId: string | null;
  summary: PlanSummary | null;
  counts: ApplyCounts | null;
}

export interface PullOutcome {
  status: 'written' | 'aborted';
  filePath: string;
  deck: RemoteDeck;
  cards: number;
  merge: MergeResult | null;
}

export interface BatchPushOutcome {
  filePath: string;
  outcome: ReconcileOutcome | null;
  error: string | null;
}

// ─── Pull ───────────────────────────────────────────────────────────

async function resolveDeck(service: CardService, query: string): Promise<RemoteDeck> {
  if (looksLikeDeckId(query)) {
    return service.getDeck(query);
  }
  const deck = findDeck(await service.listDecks(), { name: query });
  if (!deck) {
    throw new FlashsyncError(`No deck matching '${query}'`, 'DECK_NOT_FOUND');
  }
  return deck;
}

/** An existing file for this deck id, even if the deck was renamed since */
function existingDeckFile(dir: string, deckId: string): string | null {
  if (!fs.existsSync(dir)) return null;
  return findDeckFiles(dir).find((file) => extractDeckId(file) === deckId) ?? null;
}

/**
 * Refuse remote cards whose content would not read back unchanged from a
 * deck file; writing one would shift the sections of every later card.
 */
function assertWritable(cards: readonly Card[], filePath: string): void {
  const rejected = cards.flatMap((card) => {
    const problems = cardProblems(card);
    return problems.length > 0 ? [`${card.id ?? '?'}: ${problems.join(', ')}`] : [];
  });
  if (rejected.length > 0) {
    throw new ValidationError(
      `Cannot write ${rejected.length} remote card(s) to a deck file; fix them remotely first:\n  ${rejected.join('\n  ')}`,
      filePath
    );
  }
}

/**
 * Download a deck. With an existing file and a base snapshot the remote
 * state is merged in; with a file but no base the user must agree to
 * overwrite it.
 */
export async function pullDeck(ctx: WorkflowContext, query: string, dir: string): Promise<PullOutcome> {
  ctx.report({ type: 'step', message: `Fetching deck info for ${query}...` });
  const deck = await resolveDeck(ctx.service, query);
  const filePath = existingDeckFile(dir, deck.id) ?? path.join(dir, deckFileName(deck.name, deck.id));

  ctx.report({ type: 'step', message: `Fetching cards from deck '${deck.name}'...` });
  const remote = (await ctx.service.listCards(deck.id)).map(cardFromRemote);
  assertWritable(remote, filePath);

  let cards: Card[] = remote;
  let merge: MergeResult | null = null;

  if (fs.existsSync(filePath)) {
    const base = ctx.baseStore.load(deck.id);
    if (base) {
      const local = readDeckFile(filePath).cards;
      merge = mergeThreeWay(local, remote, base);
      cards = merge.cards;
      ctx.report({ type: 'merged', result: merge });
    } else {
      const proceed = await ctx.confirm(
        `${path.basename(filePath)} already exists and has no sync history. Overwrite local changes?`
      );
      if (!proceed) {
        return { status: 'aborted', filePath, deck, cards: 0, merge: null };
      }
    }
  }

  writeDeckFile(filePath, cards);
  ctx.baseStore.save(deck.id, remote);
  getLogger().info('pull', `Pulled ${remote.length} remote cards into ${filePath}`, {
    deckId: deck.id,
    conflicts: merge?.conflicts.length ?? 0,
  });

  return { status: 'written', filePath, deck, cards: cards.length, merge };
}

// ─── Push / sync ────────────────────────────────────────────────────

async function reconcileFile(
  ctx: WorkflowContext,
  filePath: string,
  mode: PlanMode,
  options: ReconcileOptions
): Promise<ReconcileOutcome> {
  const log = getLogger();
  const { deck, cards } = readDeckFile(filePath);
  ctx.report({ type: 'validated', filePath, cards: cards.length });

  if (mode === 'sync' && !deck.deckId) {
    throw new ValidationError(
      'Cannot sync a new deck file (no deck id in the filename). Push it first to create the deck.',
      filePath
    );
  }

  let deckId = deck.deckId;
  let currentPath = filePath;

  let remote: Card[] = [];
  if (deckId) {
    ctx.report({ type: 'step', message: 'Fetching remote cards...' });
    remote = (await ctx.service.listCards(deckId)).map(cardFromRemote);
  }

  const index = buildRemoteIndex(remote);
  const plan = mode === 'push' ? planPush(cards, index) : planSync(cards, index);
  const summary = summarizePlan(plan);
  ctx.report({ type: 'plan', mode, plan, summary });
  log.info(mode, `Plan for ${path.basename(filePath)}`, { ...summary });

  const outcome = (status: ReconcileStatus, counts: ApplyCounts | null = null): ReconcileOutcome => ({
    status,
    filePath: currentPath,
    deckId,
    summary,
    counts,
  });

  if (plan.duplicates.length > 0 && !options.force) {
    ctx.report({ type: 'duplicates', duplicates: plan.duplicates });
    return outcome('blocked');
  }

  if (planIsEmpty(plan) && plan.duplicates.length === 0) {
    return outcome('up-to-date');
  }

  if (!options.yes) {
    const question = deckId
      ? mode === 'push'
        ? 'Proceed?'
        : 'Proceed with sync?'
      : `Create deck '${deck.deckName}' with ${cards.length} card(s)?`;
    if (!(await ctx.confirm(question))) {
      return outcome('aborted');
    }
  }

  if (!deckId) {
    ctx.report({ type: 'step', message: `Creating deck '${deck.deckName}'...` });
    const created = await ctx.service.createDeck(deck.deckName);
    deckId = created.id;
    currentPath = renameDeckFile(filePath, deck.deckName, created.id);
    ctx.report({ type: 'deck-created', deck: created, filePath: currentPath });
  }

  ctx.report({ type: 'step', message: 'Applying changes...' });
  let result: ApplyResult;
  try {
    result = await applyPlan(ctx.service, deckId, cards, plan, { force: options.force });
  } catch (error) {
    if (error instanceof PartialApplyError && error.counts.created > 0) {
      // Keep the ids that did get created so a rerun does not duplicate them
      writeDeckFile(currentPath, error.appliedCards);
    }
    throw error;
  }

  if (result.blocked !== null) {
    ctx.report({ type: 'duplicates', duplicates: result.duplicates });
    return outcome('blocked');
  }

  if (result.counts.created > 0 || result.counts.deletedLocal > 0) {
    writeDeckFile(currentPath, result.cards);
  }
  ctx.baseStore.save(deckId, result.cards);

  return outcome('applied', result.counts);
}

/** One-way push: the local file is the source of truth. */
export function pushDeckFile(
  ctx: WorkflowContext,
  filePath: string,
  options: ReconcileOptions = {}
): Promise<ReconcileOutcome> {
  return reconcileFile(ctx, filePath, 'push', options);
}

/** Bidirectional sync: also removes local cards deleted on the remote side. */
export function syncDeckFile(
  ctx: WorkflowContext,
  filePath: string,
  options: ReconcileOptions = {}
): Promise<ReconcileOutcome> {
  return reconcileFile(ctx, filePath, 'sync', options);
}

/**
 * Push every deck file in `dir`. A failing file is recorded and the
 * remaining files are still pushed.
 */
export async function pushAllDeckFiles(
  ctx: WorkflowContext,
  dir: string,
  options: ReconcileOptions = {}
): Promise<BatchPushOutcome[] | null> {
  const files = findDeckFiles(dir);
  if (files.length === 0) {
    throw new ValidationError(`No deck files found in ${dir} (expected deck-*.md)`);
  }

  ctx.report({ type: 'deck-files', files });
  if (!options.yes && !(await ctx.confirm(`Push ${files.length} deck file(s)?`))) {
    return null;
  }

  const outcomes: BatchPushOutcome[] = [];
  for (const filePath of files) {
    try {
      const outcome = await pushDeckFile(ctx, filePath, options);
      outcomes.push({ filePath, outcome, error: null });
    } catch (error) {
      getLogger().error('push', `Push failed for ${filePath}: ${describeError(error)}`);
      outcomes.push({ filePath, outcome: null, error: describeError(error) });
    }
  }
  return outcomes;
}
