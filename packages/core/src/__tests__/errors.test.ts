import {
  CacheIOError,
  InconsistencyError,
  LlmAuthError,
  LlmError,
  RemoteError,
  ValidationError,
  describeError,
} from '../errors.js';

describe('error taxonomy', () => {
  test('inconsistency lists the orphaned cards', () => {
    const error = new InconsistencyError([
      { id: 'Card0001', question: 'Q1' },
      { id: 'Card0002', question: 'Q2' },
    ]);

    expect(error.name).toBe('Inconsistency');
    expect(error.code).toBe('INCONSISTENCY');
    expect(error.cards.map((c) => c.id)).toEqual(['Card0001', 'Card0002']);
    expect(error.message).toBe(
      'Push failed: 2 local card(s) not found remotely. Run sync to reconcile cards deleted on the remote side.'
    );
  });

  test('remote errors distinguish transport from HTTP failures', () => {
    const transport = new RemoteError(0, 'timeout', 'https://cards.test/decks/', 'GET');
    const http = new RemoteError(500, 'oops', 'https://cards.test/cards/', 'POST');

    expect(transport.code).toBe('REMOTE_TRANSPORT');
    expect(transport.message).toBe('Card service request failed (GET https://cards.test/decks/): timeout');
    expect(http.code).toBe('REMOTE_HTTP');
    expect(http.message).toBe('Card service error 500 for POST https://cards.test/cards/: oops');
  });

  test('cache errors carry the cause message', () => {
    const error = new CacheIOError('/tmp/x.json', 'read', new Error('EACCES'));

    expect(error.message).toBe('Cache read failed for /tmp/x.json: EACCES');
  });
});

describe('describeError', () => {
  test('maps known errors to short reasons', () => {
    expect(describeError(new ValidationError('Card 1: Empty answer'))).toBe('Card 1: Empty answer');
    expect(describeError(new RemoteError(401, '', 'https://cards.test/decks/'))).toBe(
      'Card service rejected the API key'
    );
    expect(describeError(new RemoteError(404, '', 'https://cards.test/decks/x'))).toBe(
      'Not found on the card service (https://cards.test/decks/x)'
    );
    expect(describeError(new LlmAuthError('ANTHROPIC_API_KEY', 'grading'))).toBe('API key invalid or missing');
    expect(describeError(new LlmError('bad', 'MAX_RETRIES'))).toBe('LLM error (MAX_RETRIES): bad');
  });

  test('falls back to the message or string form', () => {
    expect(describeError(new Error('plain'))).toBe('plain');
    expect(describeError('text')).toBe('text');
  });
});
