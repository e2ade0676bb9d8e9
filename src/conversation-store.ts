import type { ConversationConfig } from './config';

export interface Exchange {
  readonly speakerId: string | null;
  readonly promptText: string;
  readonly responseText: string;
  readonly timestamp: number;
}

export type HistoryPolicy = 'global' | 'channel' | 'none';

export const GLOBAL_SCOPE = 'global';

/**
 * Scope key for a history policy. `none` has no scope.
 */
export function scopeKeyFor(policy: HistoryPolicy, channelId: string): string | null {
  switch (policy) {
    case 'global':
      return GLOBAL_SCOPE;
    case 'channel':
      return `channel:${channelId}`;
    case 'none':
      return null;
  }
}

export function createExchange(
  speakerId: string | null,
  promptText: string,
  responseText: string,
  timestamp = Date.now(),
): Exchange {
  return Object.freeze({ speakerId, promptText, responseText, timestamp });
}

/**
 * In-memory conversation history, one ordered list of exchanges per scope key.
 * Lives for the lifetime of the process; each scope keeps at most
 * `maxExchanges` entries, evicting the oldest first.
 */
export class ConversationStore {
  private scopes: Map<string, Exchange[]> = new Map();

  constructor(private config: ConversationConfig) {}

  get(scopeKey: string): readonly Exchange[] {
    return [...(this.scopes.get(scopeKey) ?? [])];
  }

  append(scopeKey: string, exchange: Exchange): void {
    let history = this.scopes.get(scopeKey);
    if (!history) {
      history = [];
      this.scopes.set(scopeKey, history);
    }

    history.push(exchange);
    if (history.length > this.config.maxExchanges) {
      history.splice(0, history.length - this.config.maxExchanges);
    }
  }

  size(scopeKey: string): number {
    return this.scopes.get(scopeKey)?.length ?? 0;
  }
}
