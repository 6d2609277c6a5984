/**
 * Terminal prompts. Parsing is kept apart from IO so the answer rules can
 * be tested without a terminal.
 */

import * as readline from 'node:readline';
import type { DuplicateChoice, QualityChoice } from '@flashsync/curator';

/** Prompt the user for a line of input */
export function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

/** Only an explicit `y` or `yes` counts as agreement */
export function parseYesNo(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

export async function confirm(question: string): Promise<boolean> {
  return parseYesNo(await prompt(`  ${question} (y/N): `));
}

const DUPLICATE_KEYS = new Map<string, DuplicateChoice>([
  ['1', 'keep-first'],
  ['2', 'keep-second'],
  ['b', 'keep-both'],
  ['s', 'skip'],
  ['', 'skip'],
  ['q', 'abort'],
]);

const QUALITY_KEYS = new Map<string, QualityChoice>([
  ['a', 'accept'],
  ['k', 'keep'],
  ['', 'keep'],
  ['r', 'remove'],
  ['s', 'skip'],
  ['q', 'abort'],
]);

export function parseDuplicateChoice(answer: string): DuplicateChoice | null {
  return DUPLICATE_KEYS.get(answer.trim().toLowerCase()) ?? null;
}

export function parseQualityChoice(answer: string): QualityChoice | null {
  return QUALITY_KEYS.get(answer.trim().toLowerCase()) ?? null;
}

/** Ask until the answer parses */
export async function promptChoice<T>(question: string, parse: (answer: string) => T | null): Promise<T> {
  for (;;) {
    const choice = parse(await prompt(question));
    if (choice !== null) return choice;
  }
}
