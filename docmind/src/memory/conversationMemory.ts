export type Exchange = {
  /** 1-based, restarts after {@link ConversationMemory.clear}. */
  sequence: number;
  question: string;
  answer: string;
  at: number;
};

export const DEFAULT_MAX_EXCHANGES = 50;
export const DEFAULT_WINDOW_SIZE = 5;

/**
 * Bounded question/answer log for one session. Oldest exchanges are evicted
 * first once `maxExchanges` is exceeded. Never persisted.
 */
export class ConversationMemory {
  readonly maxExchanges: number;
  private exchanges: Exchange[] = [];
  private lastSequence = 0;

  constructor(options: { maxExchanges?: number } = {}) {
    this.maxExchanges = Math.max(0, Math.floor(options.maxExchanges ?? DEFAULT_MAX_EXCHANGES));
  }

  get size(): number {
    return this.exchanges.length;
  }

  append(question: string, answer: string, at: number = Date.now()): Exchange {
    this.lastSequence += 1;
    const exchange: Exchange = { sequence: this.lastSequence, question, answer, at };
    this.exchanges.push(exchange);
    if (this.exchanges.length > this.maxExchanges) {
      this.exchanges = this.exchanges.slice(this.exchanges.length - this.maxExchanges);
    }
    return exchange;
  }

  /** Last `n` exchanges, oldest first. */
  recentWindow(n: number): Exchange[] {
    const count = Math.floor(n);
    if (!(count > 0)) return [];
    return this.exchanges.slice(-count);
  }

  all(): Exchange[] {
    return [...this.exchanges];
  }

  /** @returns how many exchanges were dropped. */
  clear(): number {
    const removed = this.exchanges.length;
    this.exchanges = [];
    this.lastSequence = 0;
    return removed;
  }
}
