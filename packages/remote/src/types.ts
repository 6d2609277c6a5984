/**
 * Card service types. Wire names (`deck-id`, `archived?`) stay inside the
 * client; everything here is the shape the rest of flashsync sees.
 */

// ─── Types ──────────────────────────────────────────────────────────

export interface RemoteDeck {
  id: string;
  name: string;
}

export interface RemoteCard {
  id: string;
  deckId: string;
  /** Raw markdown body: question, a `---` line, answer */
  content: string;
  tags: string[];
  archived: boolean;
}

/** Optional fields sent when creating a card */
export interface CreateCardOptions {
  tags?: string[];
  archived?: boolean;
}

/** Fields sent when updating a card; omitted fields are left unchanged */
export interface UpdateCardFields {
  content?: string;
  tags?: string[];
  archived?: boolean;
  deckId?: string;
  trashed?: boolean;
}

/**
 * Remote card store. Every method rejects with a RemoteError on transport
 * or HTTP failure; nothing is retried.
 */
export interface CardService {
  listDecks(): Promise<RemoteDeck[]>;
  getDeck(deckId: string): Promise<RemoteDeck>;
  createDeck(name: string): Promise<RemoteDeck>;
  /** All cards of a deck, following pagination to the end */
  listCards(deckId: string): Promise<RemoteCard[]>;
  createCard(deckId: string, content: string, options?: CreateCardOptions): Promise<RemoteCard>;
  updateCard(cardId: string, fields: UpdateCardFields): Promise<RemoteCard>;
  deleteCard(cardId: string): Promise<void>;
}
