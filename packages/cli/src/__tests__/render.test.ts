import { createCard } from '@flashsync/deck';
import type { MergeStats } from '@flashsync/reconciler';
import {
  cardLabel,
  describeConflict,
  eventLines,
  formatCounts,
  formatMergeStats,
  formatPlanSummary,
} from '../render.js';

const zeroStats: MergeStats = {
  keptLocal: 0,
  acceptedRemote: 0,
  addedRemote: 0,
  droppedRemote: 0,
  droppedLocal: 0,
  unsynced: 0,
};

describe('formatters', () => {
  const summary = { create: 2, update: 1, deleteRemote: 0, deleteLocal: 3, duplicates: 0 };

  test('plan summary mentions local removals only for sync', () => {
    expect(formatPlanSummary(summary, 'push')).toBe('2 to create, 1 to update, 0 to delete remotely');
    expect(formatPlanSummary(summary, 'sync')).toBe(
      '2 to create, 1 to update, 0 to delete remotely, 3 to remove locally'
    );
  });

  test('apply counts', () => {
    expect(formatCounts({ created: 1, updated: 0, deletedRemote: 2, deletedLocal: 0 })).toBe(
      '1 created, 0 updated, 2 deleted remotely'
    );
    expect(formatCounts({ created: 0, updated: 0, deletedRemote: 0, deletedLocal: 1 })).toBe(
      '0 created, 0 updated, 0 deleted remotely, 1 removed locally'
    );
  });

  test('merge stats list only non-zero counters', () => {
    expect(formatMergeStats(zeroStats)).toBe('no changes');
    expect(formatMergeStats({ ...zeroStats, keptLocal: 2, addedRemote: 1 })).toBe('2 kept local, 1 added from remote');
  });

  test('card labels use the first question line', () => {
    expect(cardLabel({ question: 'What is ATP?\nExplain briefly.' })).toBe('What is ATP?');
    expect(cardLabel({ question: 'abcdefghij' }, 8)).toBe('abcde...');
  });
});

describe('eventLines', () => {
  test('steps print nothing', () => {
    expect(eventLines({ type: 'step', message: 'Fetching...' })).toEqual([]);
  });

  test('validated files are named by basename', () => {
    expect(eventLines({ type: 'validated', filePath: '/decks/deck-bio-AbCd1234.md', cards: 4 })).toEqual([
      'deck-bio-AbCd1234.md: 4 valid card(s)',
    ]);
  });

  test('duplicates list the matching remote ids', () => {
    const card = createCard({ question: 'What is ATP?', answer: 'Energy currency' });
    expect(eventLines({ type: 'duplicates', duplicates: [{ card, remoteId: 'rem00001' }] })).toEqual([
      '1 new card(s) match remote cards with identical content:',
      '  - What is ATP? (remote rem00001)',
    ]);
  });

  test('merge conflicts are listed under the stats', () => {
    const local = createCard({ id: 'card0001', question: 'Local Q', answer: 'A' });
    const lines = eventLines({
      type: 'merged',
      result: {
        cards: [local],
        conflicts: [{ id: 'card0001', kind: 'both-changed', local, remote: null }],
        stats: { ...zeroStats, keptLocal: 1 },
      },
    });
    expect(lines).toEqual([
      'Merged: 1 kept local',
      `  ! Local Q [card0001]: ${describeConflict('both-changed')}`,
    ]);
  });

  test('deck file listings', () => {
    expect(eventLines({ type: 'deck-files', files: ['/d/deck-a.md', '/d/deck-b-AbCd1234.md'] })).toEqual([
      'Found 2 deck file(s):',
      '  deck-a.md',
      '  deck-b-AbCd1234.md',
    ]);
  });
});
