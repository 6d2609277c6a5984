/**
 * Spinner used by every long-running flashsync command: a card flipping
 * over while requests are in flight.
 */

import ora, { type Ora } from 'ora';

const CARD_FRAMES = ['[Q  ]', '[ Q ]', '[  Q]', '[ | ]', '[A  ]', '[ A ]', '[  A]', '[ | ]'];

export function createSpinner(): Ora {
  return ora({
    text: '',
    spinner: { interval: 120, frames: CARD_FRAMES },
    color: 'cyan',
  });
}
