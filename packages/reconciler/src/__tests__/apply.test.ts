import { RemoteError } from '@flashsync/core';
import { createCard, type Card } from '@flashsync/deck';
import { applyPlan, PartialApplyError } from '../apply.js';
import { buildRemoteIndex, cardFromRemote, planIsEmpty, planPush, planSync } from '../plan.js';
import { FakeCardService } from './fake-card-service.js';

const DECK = 'AbCd1234';

async function remoteIndex(service: FakeCardService) {
  return buildRemoteIndex((await service.listCards(DECK)).map(cardFromRemote));
}

describe('applyPlan', () => {
  let service: FakeCardService;

  beforeEach(() => {
    service = new FakeCardService();
    service.addDeck(DECK, 'Biology');
    service.addCard(DECK, 'id1', 'Q1', 'A1');
  });

  test('creates new cards and writes the returned ids back', async () => {
    const local = [createCard({ id: 'id1', question: 'Q1', answer: 'A1' }), createCard({ question: 'Q2', answer: 'A2', tags: ['t'] })];
    const plan = planPush(local, await remoteIndex(service));

    const result = await applyPlan(service, DECK, local, plan);

    expect(result.blocked).toBeNull();
    if (result.blocked !== null) return;
    expect(result.counts).toEqual({ created: 1, updated: 0, deletedRemote: 0, deletedLocal: 0 });
    expect(result.cards.map((c) => c.id)).toEqual(['id1', 'new-1']);
    expect(service.cards.get('new-1')).toEqual({
      id: 'new-1',
      deckId: DECK,
      content: 'Q2\n---\nA2',
      tags: ['t'],
      archived: false,
    });
  });

  test('a second push of the same state plans nothing', async () => {
    const local = [createCard({ id: 'id1', question: 'Q1', answer: 'A1' }), createCard({ question: 'Q2', answer: 'A2' })];
    const first = await applyPlan(service, DECK, local, planPush(local, await remoteIndex(service)));
    if (first.blocked !== null) throw new Error('unexpected block');

    const second = planPush(first.cards, await remoteIndex(service));

    expect(planIsEmpty(second)).toBe(true);
    expect(second.duplicates).toEqual([]);
  });

  test('duplicates block every write unless forced', async () => {
    service.addCard(DECK, 'id2', 'Q2', 'A2');
    const local = [createCard({ id: 'id1', question: 'Q1', answer: 'A1' }), createCard({ question: 'Q2', answer: 'A2' })];
    const plan = planPush(local, await remoteIndex(service));

    const blocked = await applyPlan(service, DECK, local, plan);

    expect(blocked.blocked).toBe('duplicates');
    expect(service.mutations).toEqual([]);

    const forced = await applyPlan(service, DECK, local, plan, { force: true });

    expect(forced.blocked).toBeNull();
    expect(service.mutations).toEqual(['createCard Q2', 'deleteCard id2']);
  });

  test('updates send content, tags and archived', async () => {
    const local = [createCard({ id: 'id1', question: 'Q1', answer: 'A1 revised', tags: ['x'], archived: true })];

    await applyPlan(service, DECK, local, planPush(local, await remoteIndex(service)));

    expect(service.cards.get('id1')).toMatchObject({ content: 'Q1\n---\nA1 revised', tags: ['x'], archived: true });
  });

  test('sync removes cards deleted remotely from the local list', async () => {
    const orphan = createCard({ id: 'X', question: 'Orphan', answer: 'A' });
    const local = [orphan, createCard({ id: 'id1', question: 'Q1', answer: 'A1' })];

    const result = await applyPlan(service, DECK, local, planSync(local, await remoteIndex(service)));

    if (result.blocked !== null) throw new Error('unexpected block');
    expect(result.cards.map((c) => c.id)).toEqual(['id1']);
    expect(result.counts.deletedLocal).toBe(1);
    expect(service.mutations).toEqual([]);
  });

  test('a mid-way failure carries the ids created so far', async () => {
    service.failOnMutation = 2;
    const local: Card[] = [createCard({ id: 'id1', question: 'Q1', answer: 'A1' }), createCard({ question: 'Q2', answer: 'A2' }), createCard({ question: 'Q3', answer: 'A3' })];
    const plan = planPush(local, await remoteIndex(service));

    const error = await applyPlan(service, DECK, local, plan).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PartialApplyError);
    expect(error).toBeInstanceOf(RemoteError);
    if (!(error instanceof PartialApplyError)) return;
    expect(error.status).toBe(500);
    expect(error.counts.created).toBe(1);
    expect(error.appliedCards.map((c) => c.id)).toEqual(['id1', 'new-1', null]);
  });
});
