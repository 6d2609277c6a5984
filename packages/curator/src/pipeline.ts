import type { ChatProvider, WindowProgress } from '@flashsync/core';

/** Shared settings for the windowed LLM stages */
export interface PipelineOptions {
  provider: ChatProvider;
  /** Requests in flight per window */
  windowSize: number;
  onWindow?: (progress: WindowProgress) => void;
}

/** A parsed model answer; `ok` is false when `value` is a fallback for malformed output */
export interface ParseOutcome<T> {
  value: T;
  ok: boolean;
}

export function failureReason(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `LLM request failed: ${message.slice(0, 100)}`;
}
