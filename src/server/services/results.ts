export const DEFAULT_RESULT_TTL_MS = 5 * 60 * 1000;

interface StoredResult {
  text: string;
  createdAt: number;
}

/**
 * Finalized text per caller id, kept until read once or until it expires.
 */
export class ResultStore {
  private readonly results = new Map<string, StoredResult>();

  constructor(
    private readonly ttlMs: number = DEFAULT_RESULT_TTL_MS,
    private readonly now: () => number = Date.now
  ) {}

  put(callerId: string, text: string): void {
    this.results.set(callerId, { text, createdAt: this.now() });
  }

  peek(callerId: string): string | undefined {
    this.expire();
    return this.results.get(callerId)?.text;
  }

  take(callerId: string): string | undefined {
    const text = this.peek(callerId);
    this.results.delete(callerId);
    return text;
  }

  /**
   * Drop results older than the TTL. Returns how many were removed.
   */
  expire(): number {
    const cutoff = this.now() - this.ttlMs;
    let removed = 0;
    for (const [callerId, result] of this.results) {
      if (result.createdAt <= cutoff) {
        this.results.delete(callerId);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.results.size;
  }
}
