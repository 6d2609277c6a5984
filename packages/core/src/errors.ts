/**
 * Error taxonomy shared by every flashsync package.
 *
 * Each error carries a stable `code` so the CLI can map failures to short
 * user-facing reasons without string matching on messages.
 */

// ─── Base ───────────────────────────────────────────────────────────

export class FlashsyncError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'FlashsyncError';
  }
}

// ─── Deck files ─────────────────────────────────────────────────────

/** Malformed deck file, filename or card. Nothing has been mutated. */
export class ValidationError extends FlashsyncError {
  constructor(message: string, public readonly filePath?: string) {
    super(message, 'VALIDATION_FAILED');
    this.name = 'ValidationError';
  }
}

/** A card that carries a remote id the remote service does not know about. */
export interface OrphanedCard {
  id: string;
  question: string;
}

/**
 * Raised by push when local cards reference remote ids that no longer exist.
 * Push never reconciles remote deletions; the caller has to run sync instead.
 */
export class InconsistencyError extends FlashsyncError {
  constructor(public readonly cards: OrphanedCard[]) {
    super(
      `Push failed: ${cards.length} local card(s) not found remotely. ` +
        `Run sync to reconcile cards deleted on the remote side.`,
      'INCONSISTENCY'
    );
    this.name = 'Inconsistency';
  }
}

// ─── Remote service ─────────────────────────────────────────────────

/**
 * Any transport or HTTP failure talking to the card service.
 * `status` is 0 when no HTTP response was received (network error, timeout).
 */
export class RemoteError extends FlashsyncError {
  constructor(
    public readonly status: number,
    public readonly body: string,
    public readonly url: string,
    public readonly method: string = 'GET'
  ) {
    super(
      status === 0
        ? `Card service request failed (${method} ${url}): ${body}`
        : `Card service error ${status} for ${method} ${url}: ${body}`,
      status === 0 ? 'REMOTE_TRANSPORT' : 'REMOTE_HTTP'
    );
    this.name = 'RemoteError';
  }
}

// ─── LLM providers ──────────────────────────────────────────────────

export class LlmError extends FlashsyncError {
  constructor(message: string, code: string) {
    super(message, code);
    this.name = 'LlmError';
  }
}

export class LlmAuthError extends LlmError {
  constructor(apiKeyEnv: string, purpose: string) {
    super(
      `\nAPI key required for ${purpose}.\n\n` +
        `Set it as an environment variable (or in a .env file):\n\n` +
        `  export ${apiKeyEnv}=...\n`,
      'AUTH_MISSING'
    );
    this.name = 'LlmAuthError';
  }
}

export class LlmRateLimitError extends LlmError {
  constructor(public readonly retryAfterMs: number) {
    super(`Rate limited by the LLM provider. Retry after ${retryAfterMs}ms.`, 'RATE_LIMIT');
    this.name = 'LlmRateLimitError';
  }
}

// ─── Cache ──────────────────────────────────────────────────────────

/** The persisted cache could not be read or written. Never fatal. */
export class CacheIOError extends FlashsyncError {
  constructor(
    public readonly filePath: string,
    public readonly operation: 'read' | 'write',
    cause: unknown
  ) {
    super(
      `Cache ${operation} failed for ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'CACHE_IO'
    );
    this.name = 'CacheIOError';
  }
}

/**
 * Map an error to a one-line reason for the final CLI failure message.
 */
export function describeError(error: unknown): string {
  if (error instanceof InconsistencyError) return error.message;
  if (error instanceof ValidationError) return error.message;
  if (error instanceof RemoteError) {
    if (error.status === 401 || error.status === 403) {
      return 'Card service rejected the API key';
    }
    if (error.status === 404) return `Not found on the card service (${error.url})`;
    return error.message;
  }
  if (error instanceof LlmAuthError) return 'API key invalid or missing';
  if (error instanceof LlmRateLimitError) return 'LLM provider rate limited';
  if (error instanceof LlmError) return `LLM error (${error.code}): ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}
