/**
 * @flashsync/remote - Client for the remote card service.
 */

export type {
  CardService,
  CreateCardOptions,
  RemoteCard,
  RemoteDeck,
  UpdateCardFields,
} from './types.js';

export { MochiClient, createCardService, type MochiClientOptions } from './mochi-client.js';
export { findDeck, type DeckQuery } from './find-deck.js';
