import type { RemoteDeck } from './types.js';

export interface DeckQuery {
  id?: string;
  name?: string;
}

/**
 * Look a deck up by exact id, else exact name, else the first deck whose
 * name contains `name` (case-insensitive).
 */
export function findDeck(decks: readonly RemoteDeck[], query: DeckQuery): RemoteDeck | undefined {
  if (query.id) {
    return decks.find((d) => d.id === query.id);
  }
  if (query.name) {
    const needle = query.name.toLowerCase();
    return (
      decks.find((d) => d.name === query.name) ??
      decks.find((d) => d.name.toLowerCase().includes(needle))
    );
  }
  return undefined;
}
