/**
 * REST client for a Mochi-compatible card service.
 * JSON over HTTPS with Basic authentication (the API key is the user name
 * and the password is empty). Each request has a fixed timeout; failures
 * surface as RemoteError and are never retried.
 */

import { z } from 'zod';
import { RemoteError, getLogger, requireApiKey, type FlashsyncConfig } from '@flashsync/core';
import type {
  CardService,
  CreateCardOptions,
  RemoteCard,
  RemoteDeck,
  UpdateCardFields,
} from './types.js';

// ─── Options ────────────────────────────────────────────────────────

export interface MochiClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  /** Cards requested per page when listing a deck */
  pageSize: number;
  /** Replaces the global fetch (tests) */
  fetch?: typeof fetch;
}

// ─── Raw API Response Types ─────────────────────────────────────────

const rawDeckSchema = z.object({
  id: z.string(),
  name: z.string(),
});

const rawCardSchema = z.object({
  id: z.string(),
  content: z.string().default(''),
  'deck-id': z.string().default(''),
  tags: z.array(z.string()).default([]),
  'archived?': z.boolean().optional(),
  'trashed?': z.unknown().optional(),
});

const deckPageSchema = z.object({
  docs: z.array(rawDeckSchema),
});

const cardPageSchema = z.object({
  docs: z.array(rawCardSchema),
  bookmark: z.string().nullish(),
});

type RawCard = z.output<typeof rawCardSchema>;

function toRemoteCard(raw: RawCard): RemoteCard {
  return {
    id: raw.id,
    deckId: raw['deck-id'],
    content: raw.content,
    tags: raw.tags,
    archived: raw['archived?'] ?? false,
  };
}

/** Trashed cards are deleted as far as flashsync is concerned */
function isLive(raw: RawCard): boolean {
  return raw['trashed?'] === undefined || raw['trashed?'] === null || raw['trashed?'] === false;
}

// ─── Client ─────────────────────────────────────────────────────────

export class MochiClient implements CardService {
  private readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: MochiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.authHeader = `Basic ${Buffer.from(`${options.apiKey}:`).toString('base64')}`;
    this.fetchFn = options.fetch ?? fetch;
  }

  async listDecks(): Promise<RemoteDeck[]> {
    const page = await this.request('GET', '/decks/', deckPageSchema);
    return page.docs.map((d) => ({ id: d.id, name: d.name }));
  }

  async getDeck(deckId: string): Promise<RemoteDeck> {
    const deck = await this.request('GET', `/decks/${encodeURIComponent(deckId)}`, rawDeckSchema);
    return { id: deck.id, name: deck.name };
  }

  async createDeck(name: string): Promise<RemoteDeck> {
    const deck = await this.request('POST', '/decks/', rawDeckSchema, { name });
    return { id: deck.id, name: deck.name };
  }

  async listCards(deckId: string): Promise<RemoteCard[]> {
    const cards: RemoteCard[] = [];
    let bookmark: string | undefined;

    for (;;) {
      const params = new URLSearchParams({
        'deck-id': deckId,
        limit: String(this.options.pageSize),
      });
      if (bookmark) params.set('bookmark', bookmark);

      const page = await this.request('GET', `/cards/?${params.toString()}`, cardPageSchema);
      if (page.docs.length === 0) break;

      cards.push(...page.docs.filter(isLive).map(toRemoteCard));

      // Some servers hand back the last bookmark again on the final page
      if (!page.bookmark || page.bookmark === bookmark) break;
      bookmark = page.bookmark;
    }

    getLogger().debug('remote', `Listed ${cards.length} cards`, { deckId });
    return cards;
  }

  async createCard(deckId: string, content: string, options: CreateCardOptions = {}): Promise<RemoteCard> {
    const body: Record<string, unknown> = { content, 'deck-id': deckId };
    if (options.tags && options.tags.length > 0) body.tags = options.tags;
    if (options.archived) body['archived?'] = true;

    const card = await this.request('POST', '/cards/', rawCardSchema, body);
    return toRemoteCard(card);
  }

  async updateCard(cardId: string, fields: UpdateCardFields): Promise<RemoteCard> {
    const body: Record<string, unknown> = {};
    if (fields.content !== undefined) body.content = fields.content;
    if (fields.tags !== undefined) body.tags = fields.tags;
    if (fields.archived !== undefined) body['archived?'] = fields.archived;
    if (fields.deckId !== undefined) body['deck-id'] = fields.deckId;
    if (fields.trashed !== undefined) body['trashed?'] = fields.trashed;

    const card = await this.request('POST', `/cards/${encodeURIComponent(cardId)}`, rawCardSchema, body);
    return toRemoteCard(card);
  }

  async deleteCard(cardId: string): Promise<void> {
    await this.request('DELETE', `/cards/${encodeURIComponent(cardId)}`, null);
  }

  // ─── Helpers ──────────────────────────────────────────────────────

  /** Make an authenticated request and validate the JSON response (if a schema is given) */
  private async request(method: string, pathAndQuery: string, schema: null, body?: unknown): Promise<void>;
  private async request<S extends z.ZodTypeAny>(
    method: string,
    pathAndQuery: string,
    schema: S,
    body?: unknown
  ): Promise<z.output<S>>;
  private async request<S extends z.ZodTypeAny>(
    method: string,
    pathAndQuery: string,
    schema: S | null,
    body?: unknown
  ): Promise<z.output<S> | void> {
    const url = `${this.baseUrl}${pathAndQuery}`;
    const log = getLogger();
    const startTime = Date.now();

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: {
          Authorization: this.authHeader,
          Accept: 'application/json',
          ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.remoteRequest({ method, url, status: 0, latencyMs: Date.now() - startTime });
      throw new RemoteError(0, message, url, method);
    }

    log.remoteRequest({ method, url, status: response.status, latencyMs: Date.now() - startTime });

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new RemoteError(response.status, text, url, method);
    }

    if (schema === null) return;

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RemoteError(response.status, `Invalid JSON response: ${message}`, url, method);
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid shape';
      throw new RemoteError(response.status, `Unexpected response (${where})`, url, method);
    }
    return result.data;
  }
}

/**
 * Build the card service client from config. Throws when the API key
 * environment variable is not set.
 */
export function createCardService(config: FlashsyncConfig): CardService {
  return new MochiClient({
    apiKey: requireApiKey(config.remote.apiKeyEnv, 'the card service'),
    baseUrl: config.remote.baseUrl,
    timeoutMs: config.remote.requestTimeoutMs,
    pageSize: config.remote.pageSize,
  });
}
