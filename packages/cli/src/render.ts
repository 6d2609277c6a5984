/**
 * Console rendering for workflow events and results.
 *
 * The `format*` helpers return plain text; colour is added by the callers
 * that print.
 */

import * as path from 'node:path';
import chalk from 'chalk';
import type { Ora } from 'ora';
import { truncate, type LogEntry } from '@flashsync/core';
import type { Card } from '@flashsync/deck';
import type {
  ApplyCounts,
  ConflictKind,
  MergeStats,
  PlanMode,
  PlanSummary,
  WorkflowEvent,
} from '@flashsync/reconciler';

// ─── Plain formatters ───────────────────────────────────────────────

export function formatPlanSummary(summary: PlanSummary, mode: PlanMode): string {
  const parts = [
    `${summary.create} to create`,
    `${summary.update} to update`,
    `${summary.deleteRemote} to delete remotely`,
  ];
  if (mode === 'sync') parts.push(`${summary.deleteLocal} to remove locally`);
  return parts.join(', ');
}

export function formatCounts(counts: ApplyCounts): string {
  const parts = [
    `${counts.created} created`,
    `${counts.updated} updated`,
    `${counts.deletedRemote} deleted remotely`,
  ];
  if (counts.deletedLocal > 0) parts.push(`${counts.deletedLocal} removed locally`);
  return parts.join(', ');
}

const MERGE_STAT_LABELS: Array<[keyof MergeStats, string]> = [
  ['keptLocal', 'kept local'],
  ['acceptedRemote', 'updated from remote'],
  ['addedRemote', 'added from remote'],
  ['droppedRemote', 'deleted locally'],
  ['droppedLocal', 'deleted remotely'],
  ['unsynced', 'not yet pushed'],
];

/** Non-zero merge counters, or `no changes` */
export function formatMergeStats(stats: MergeStats): string {
  const parts = MERGE_STAT_LABELS.filter(([key]) => stats[key] > 0).map(
    ([key, label]) => `${stats[key]} ${label}`
  );
  return parts.length > 0 ? parts.join(', ') : 'no changes';
}

const CONFLICT_LABELS: Record<ConflictKind, string> = {
  'both-changed': 'changed on both sides, kept local',
  'no-base': 'differs and has no sync history, kept local',
  'deleted-remotely': 'deleted remotely but edited locally, kept as a new card',
};

export function describeConflict(kind: ConflictKind): string {
  return CONFLICT_LABELS[kind];
}

/** First line of the question, shortened for one-line listings */
export function cardLabel(card: Pick<Card, 'question'>, maxLength = 60): string {
  const firstLine = card.question.trim().split('\n')[0];
  return truncate(firstLine, maxLength);
}

/** Lines printed for an event; `step` events only update the spinner */
export function eventLines(event: WorkflowEvent): string[] {
  switch (event.type) {
    case 'step':
      return [];
    case 'validated':
      return [`${path.basename(event.filePath)}: ${event.cards} valid card(s)`];
    case 'plan':
      return [`Plan (${event.mode}): ${formatPlanSummary(event.summary, event.mode)}`];
    case 'duplicates':
      return [
        `${event.duplicates.length} new card(s) match remote cards with identical content:`,
        ...event.duplicates.map((d) => `  - ${cardLabel(d.card)} (remote ${d.remoteId})`),
      ];
    case 'deck-created':
      return [`Created deck '${event.deck.name}' (${event.deck.id}), file is now ${path.basename(event.filePath)}`];
    case 'merged':
      return [
        `Merged: ${formatMergeStats(event.result.stats)}`,
        ...event.result.conflicts.map((c) => `  ! ${cardLabel(c.local)} [${c.id}]: ${describeConflict(c.kind)}`),
      ];
    case 'deck-files':
      return [`Found ${event.files.length} deck file(s):`, ...event.files.map((f) => `  ${path.basename(f)}`)];
  }
}

// ─── Console output ─────────────────────────────────────────────────

function colourFor(event: WorkflowEvent): (text: string) => string {
  switch (event.type) {
    case 'validated':
    case 'deck-created':
      return chalk.green;
    case 'duplicates':
      return chalk.yellow;
    case 'merged':
      return event.result.conflicts.length > 0 ? chalk.yellow : chalk.green;
    default:
      return chalk.white;
  }
}

/**
 * Reporter for workflow events: steps drive the spinner, everything else
 * is printed between spinner frames.
 */
export function createReporter(spinner: Ora): (event: WorkflowEvent) => void {
  return (event) => {
    if (event.type === 'step') {
      spinner.start(event.message);
      return;
    }
    const wasSpinning = spinner.isSpinning;
    spinner.stop();
    const colour = colourFor(event);
    for (const line of eventLines(event)) {
      console.log(`  ${colour(line)}`);
    }
    if (wasSpinning) spinner.start();
  };
}

/**
 * Console handler for --verbose mode.
 * Formats log entries for real-time console display.
 */
export function verboseConsoleHandler(entry: LogEntry): void {
  const levelColors: Record<LogEntry['level'], (s: string) => string> = {
    debug: chalk.gray,
    info: chalk.blue,
    warn: chalk.yellow,
    error: chalk.red,
  };
  const prefix = levelColors[entry.level](`  [${entry.level.toUpperCase()}]`);
  const cat = chalk.gray(`[${entry.category}]`);

  let line = `${prefix} ${cat} ${entry.message}`;
  if (entry.data) {
    const dataStr = Object.entries(entry.data)
      .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
      .join(' ');
    line += chalk.gray(` ${dataStr}`);
  }

  process.stderr.write(line + '\n');
}
