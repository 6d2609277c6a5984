import { RemoteError } from '@flashsync/core';
import type {
  CardService,
  CreateCardOptions,
  RemoteCard,
  RemoteDeck,
  UpdateCardFields,
} from '@flashsync/remote';

/** In-memory card service that records every mutating call */
export class FakeCardService implements CardService {
  readonly decks = new Map<string, RemoteDeck>();
  readonly cards = new Map<string, RemoteCard>();
  readonly mutations: string[] = [];
  /** Make the n-th mutating call (1-based) fail with a 500 */
  failOnMutation: number | null = null;
  private nextCard = 1;
  private nextDeck = 1;

  addDeck(id: string, name: string): void {
    this.decks.set(id, { id, name });
  }

  addCard(deckId: string, id: string, question: string, answer: string, extra: Partial<RemoteCard> = {}): void {
    this.cards.set(id, {
      id,
      deckId,
      content: `${question}\n---\n${answer}`,
      tags: [],
      archived: false,
      ...extra,
    });
  }

  async listDecks(): Promise<RemoteDeck[]> {
    return [...this.decks.values()];
  }

  async getDeck(deckId: string): Promise<RemoteDeck> {
    const deck = this.decks.get(deckId);
    if (!deck) throw new RemoteError(404, 'not found', `fake://decks/${deckId}`);
    return deck;
  }

  async createDeck(name: string): Promise<RemoteDeck> {
    this.mutate(`createDeck ${name}`);
    const deck = { id: `NewDk${String(this.nextDeck++).padStart(3, '0')}`, name };
    this.decks.set(deck.id, deck);
    return deck;
  }

  async listCards(deckId: string): Promise<RemoteCard[]> {
    return [...this.cards.values()].filter((c) => c.deckId === deckId);
  }

  async createCard(deckId: string, content: string, options: CreateCardOptions = {}): Promise<RemoteCard> {
    this.mutate(`createCard ${content.split('\n')[0]}`);
    const card: RemoteCard = {
      id: `new-${this.nextCard++}`,
      deckId,
      content,
      tags: options.tags ?? [],
      archived: options.archived ?? false,
    };
    this.cards.set(card.id, card);
    return card;
  }

  async updateCard(cardId: string, fields: UpdateCardFields): Promise<RemoteCard> {
    this.mutate(`updateCard ${cardId}`);
    const existing = this.cards.get(cardId);
    if (!existing) throw new RemoteError(404, 'not found', `fake://cards/${cardId}`, 'POST');
    const updated: RemoteCard = {
      ...existing,
      ...(fields.content !== undefined ? { content: fields.content } : {}),
      ...(fields.tags !== undefined ? { tags: fields.tags } : {}),
      ...(fields.archived !== undefined ? { archived: fields.archived } : {}),
    };
    this.cards.set(cardId, updated);
    return updated;
  }

  async deleteCard(cardId: string): Promise<void> {
    this.mutate(`deleteCard ${cardId}`);
    this.cards.delete(cardId);
  }

  private mutate(call: string): void {
    this.mutations.push(call);
    if (this.failOnMutation === this.mutations.length) {
      throw new RemoteError(500, 'server exploded', `fake://${call}`, 'POST');
    }
  }
}
