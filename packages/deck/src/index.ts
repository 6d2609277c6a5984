/**
 * @flashsync/deck - Card model and the Markdown deck file format.
 */

export {
  DELIMITER,
  contentHash,
  createCard,
  withContent,
  withId,
  normalizeTags,
  cardProblems,
  isValidCard,
  parseRemoteContent,
  formatRemoteContent,
  type Card,
  type CardFields,
} from './card.js';

export { parseDeck, serializeCard, serializeDeck } from './codec.js';

export {
  DECK_FILE_PREFIX,
  DECK_FILE_EXT,
  sanitizeDeckName,
  deckFileName,
  looksLikeDeckId,
  parseDeckFileName,
  extractDeckId,
  deckNameFromFileName,
  type DeckRef,
} from './filename.js';

export {
  readDeckFile,
  writeDeckFile,
  findDeckFiles,
  renameDeckFile,
  type DeckFile,
} from './deck-file.js';
