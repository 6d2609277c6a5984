/**
 * Prompt templates. Each template has a stable id, and cache keys fold in
 * both the id and a digest of the text, so editing a prompt invalidates
 * the results it produced.
 */

import { hash } from '@flashsync/core';

export interface PromptTemplate {
  id: string;
  text: string;
}

export const CLASSIFY_PAIR: PromptTemplate = {
  id: 'classify-pair@v1',
  text: `Compare these two flashcards and classify their relationship:

Card 1:
Q: {{question1}}
A: {{answer1}}

Card 2:
Q: {{question2}}
A: {{answer2}}

Classify as ONE of:
- "duplicate": Same concept, essentially redundant (one should be removed)
- "complementary": Related but covering different aspects/opposite scenarios (both should be kept)
- "unclear": Cannot determine confidently

Respond with EXACTLY this format:
classification | reasoning (one line explanation)

Example: complementary | Card 1 asks about increasing X, Card 2 about decreasing X - opposite scenarios of same concept`,
};

export const GRADE_CARD: PromptTemplate = {
  id: 'grade-card@v1',
  text: `Rate the quality of this flashcard for spaced-repetition study.

Q: {{question}}
A: {{answer}}

Judge it on:
- Clarity: the question has one unambiguous reading
- Atomicity: it tests a single idea
- Accuracy: the answer is correct and complete but not padded

Respond with EXACTLY this format:
score | reasoning (one line explanation)

The score is an integer from 0 (unusable) to 10 (excellent).

Example: 6 | Correct answer, but the question asks about two separate facts`,
};

export const IMPROVE_CARD: PromptTemplate = {
  id: 'improve-card@v1',
  text: `Rewrite this flashcard so it makes a better spaced-repetition card. Keep the fact it tests.

Q: {{question}}
A: {{answer}}

A reviewer scored it {{score}}/10: {{reasoning}}

Do not use Markdown headings or lines consisting only of "---".
Respond with EXACTLY this format and nothing else:
QUESTION: <rewritten question>
ANSWER: <rewritten answer>`,
};

/** Template id plus text digest, as folded into cache keys */
export function templateKey(template: PromptTemplate): string {
  return `${template.id}#${hash(template.text).slice(0, 12)}`;
}

/** Fill `{{name}}` placeholders; unknown placeholders are left as they are */
export function renderPrompt(template: PromptTemplate, values: Record<string, string | number>): string {
  return template.text.replace(/\{\{(\w+)\}\}/g, (match, name: string) =>
    name in values ? String(values[name]) : match
  );
}
