/**
 * Card model.
 *
 * `contentHash` is derived from the question and answer and is recomputed by
 * every constructor here; it is never read back from a file.
 */

import { hash } from '@flashsync/core';

/** Literal line separating the sections of a card */
export const DELIMITER = '---';

export interface Card {
  /** Remote id; null until the remote service has created the card */
  id: string | null;
  question: string;
  answer: string;
  tags: string[];
  archived: boolean;
  contentHash: string;
}

export interface CardFields {
  id?: string | null;
  question: string;
  answer: string;
  tags?: readonly string[];
  archived?: boolean;
}

/**
 * Stable 16-hex-char digest of the normalized question and answer.
 */
export function contentHash(question: string, answer: string): string {
  return hash(`${question.trim()}\n${DELIMITER}\n${answer.trim()}`).slice(0, 16);
}

/** Drop repeated tags, keeping first-seen order */
export function normalizeTags(tags: readonly string[]): string[] {
  return [...new Set(tags)];
}

export function createCard(fields: CardFields): Card {
  return {
    id: fields.id ?? null,
    question: fields.question,
    answer: fields.answer,
    tags: normalizeTags(fields.tags ?? []),
    archived: fields.archived ?? false,
    contentHash: contentHash(fields.question, fields.answer),
  };
}

/** Copy of `card` with new content and a recomputed hash */
export function withContent(card: Card, question: string, answer: string): Card {
  return { ...card, question, answer, contentHash: contentHash(question, answer) };
}

export function withId(card: Card, id: string | null): Card {
  return { ...card, id };
}

const DELIMITER_LINE = /^[ \t]*---[ \t]*$/m;

/**
 * Reasons a card cannot be written to a deck file and read back unchanged,
 * or an empty list when it is valid.
 */
export function cardProblems(card: Pick<Card, 'question' | 'answer'>): string[] {
  const problems: string[] = [];
  const question = card.question.trim();
  const answer = card.answer.trim();

  if (!question) problems.push('Empty question');
  if (!answer) problems.push('Empty answer');
  // Sections are trimmed when a deck file is read
  if (question && question !== card.question) problems.push('Question has leading or trailing whitespace');
  if (answer && answer !== card.answer) problems.push('Answer has leading or trailing whitespace');
  if (DELIMITER_LINE.test(card.question)) problems.push(`Question contains a '${DELIMITER}' line`);
  if (DELIMITER_LINE.test(card.answer)) problems.push(`Answer contains a '${DELIMITER}' line`);
  if (question.startsWith('#')) problems.push("Question starts with '#' (read as a heading)");
  if (answer.startsWith('#')) problems.push("Answer starts with '#' (read as a heading)");

  return problems;
}

export function isValidCard(card: Pick<Card, 'question' | 'answer'>): boolean {
  return cardProblems(card).length === 0;
}

/** Split a remote card body at its first delimiter line */
export function parseRemoteContent(content: string): { question: string; answer: string } {
  const lines = content.split(/\r?\n/);
  const idx = lines.findIndex((line) => line.trim() === DELIMITER);
  if (idx === -1) {
    return { question: content.trim(), answer: '' };
  }
  return {
    question: lines.slice(0, idx).join('\n').trim(),
    answer: lines.slice(idx + 1).join('\n').trim(),
  };
}

/** Body sent to the remote service for a card */
export function formatRemoteContent(question: string, answer: string): string {
  return `${question}\n${DELIMITER}\n${answer}`;
}
